/**
 * Immutable-value emitter: the `*.freezed.dart` part for a `@freezed` class.
 *
 * Output follows freezed 2.x: a `_$X` mixin, copyWith interfaces and
 * implementations, one `_$<Case>Impl` class per redirecting factory with
 * value equality, hashing and `toString`, and `when`/`map` for unions.
 */

import { UnsupportedTypeError } from "@dartsmith/core";
import { CollectionKind } from "../enums";
import type { Parameter, ValueCase, ValueTypeDeclaration } from "../types";
import { argumentList, emitOutput, type EmitOutput, nonPrivate, parameterList } from "./dart";

export interface FreezedOptions {
    /** Emit `fromJson`/`toJson` plumbing for json_serializable. */
    withJson: boolean;
    /** Freezed classes of the same library whose `$XCopyWith` a field can chain into. */
    copyWithTypes?: ReadonlySet<string>;
    file?: string;
}

const EMITTER = "freezed";
const COPY_WITH_DOC = ["/// Create a copy of {name}", "/// with the given fields replaced by the non-null parameter values."];
const NO_JSON = "@JsonKey(includeFromJson: false, includeToJson: false)";
const THROWS = "throw _privateConstructorUsedError";
const VIEW: Record<CollectionKind, string> = {
    [CollectionKind.None]: "",
    [CollectionKind.List]: "EqualUnmodifiableListView",
    [CollectionKind.Map]: "EqualUnmodifiableMapView",
    [CollectionKind.Set]: "EqualUnmodifiableSetView",
};
// Object.hash takes at most 20 arguments, runtimeType included.
const MAX_HASH_ARGS = 20;

/** Lines every `.freezed.dart` file starts its body with. */
export const FREEZED_PRELUDE = `T _$identity<T>(T value) => value;

final _privateConstructorUsedError = UnsupportedError(
    'It seems like you constructed your class using \`MyClass._()\`. This constructor is only meant to be used by freezed and you are not supposed to need it nor use it.\\nPlease check the documentation here for more information: https://github.com/rrousselGit/freezed#adding-getters-and-methods-to-our-models');`;

// ── Plans ───────────────────────────────────────────────────────────

interface FieldPlan {
    name: string;
    kind: Parameter["kind"];
    required: boolean;
    type: string;
    nullable: boolean;
    resolved: boolean;
    collection: CollectionKind;
    /** Class name of a same-library freezed type, for a nested copyWith getter. */
    nested: string | null;
    /** Value of `@Default(...)`, or a `= value` default. */
    defaultValue: string | null;
    annotations: string[];
}

interface CasePlan {
    constructorName: string | null;
    /** `when` callback name. */
    callback: string;
    /** `runtimeType` value in JSON. */
    jsonKey: string;
    caseClass: string;
    impl: string;
    /** Impl name without its leading underscore, used to name companions: `$UserImpl`. */
    stem: string;
    fields: FieldPlan[];
    isConst: boolean;
}

function planField(param: Parameter, copyWithTypes: ReadonlySet<string>): FieldPlan {
    const annotations = param.markers
        .filter((m) => m.name === "JsonKey")
        .map((m) => `@JsonKey(${m.args.join(", ")})`);
    const hasDefaultMarker = param.markers.some((m) => m.name === "Default");
    if (hasDefaultMarker && annotations.length === 0) annotations.push("@JsonKey()");
    return {
        name: param.name,
        kind: param.kind,
        required: param.required,
        type: param.type?.text ?? "dynamic",
        nullable: param.type?.nullable ?? true,
        resolved: param.type !== null,
        collection: param.type?.collection ?? CollectionKind.None,
        nested: nestedType(param, copyWithTypes),
        defaultValue: param.kind === "positional" ? null : param.defaultValue,
        annotations,
    };
}

function nestedType(param: Parameter, copyWithTypes: ReadonlySet<string>): string | null {
    const type = param.type;
    if (type === null || type.shape !== "named" || type.args.length > 0) return null;
    return copyWithTypes.has(type.name) ? type.name : null;
}

/** The `$XCopyWith` interface is emitted for `decl`, so other copyWith implementations can chain into it. */
export function hasCopyWith(decl: ValueTypeDeclaration): boolean {
    return decl.typeParameters === null && decl.cases.some((c) => c.parameters.some((p) => p.type !== null));
}

/** `_User` → `_$UserImpl`, `ResultOk` → `_$ResultOkImpl`. */
export function implName(redirect: string): string {
    return `_$${nonPrivate(redirect)}Impl`;
}

function planCase(c: ValueCase, copyWithTypes: ReadonlySet<string>): CasePlan {
    return {
        constructorName: c.constructorName,
        callback: c.constructorName ?? "$default",
        jsonKey: c.constructorName ?? "default",
        caseClass: c.redirect,
        impl: implName(c.redirect),
        stem: nonPrivate(implName(c.redirect)),
        fields: c.parameters.map((p) => planField(p, copyWithTypes)),
        isConst: c.isConst,
    };
}

/** Fields present with the same type in every case. */
function commonFields(cases: CasePlan[]): FieldPlan[] {
    const [first, ...rest] = cases;
    if (!first) return [];
    return first.fields.filter((f) =>
        rest.every((c) => c.fields.some((g) => g.name === f.name && g.type === f.type && g.resolved === f.resolved)),
    );
}

const copyable = (fields: FieldPlan[]) => fields.filter((f) => f.resolved);
const isCollection = (f: FieldPlan) => f.resolved && f.collection !== CollectionKind.None;
interface NestedField {
    name: string;
    type: string;
    nullable: boolean;
}

const nestedFields = (fields: FieldPlan[]): NestedField[] =>
    fields.flatMap((f) => (f.nested === null ? [] : [{ name: f.name, type: f.nested, nullable: f.nullable }]));
const nestedCopyWith = (n: NestedField) => `$${nonPrivate(n.type)}CopyWith<$Res>${n.nullable ? "?" : ""}`;
const storage = (f: FieldPlan) => (isCollection(f) ? `_${f.name}` : f.name);

// ── Emitter ─────────────────────────────────────────────────────────

class FreezedWriter {
    private readonly out: string[] = [];
    private readonly cases: CasePlan[];
    private readonly common: FieldPlan[];
    private readonly isUnion: boolean;
    private readonly hasBaseCopyWith: boolean;

    constructor(
        private readonly decl: ValueTypeDeclaration,
        private readonly options: FreezedOptions,
    ) {
        const copyWithTypes = options.copyWithTypes ?? new Set<string>();
        this.cases = decl.cases.map((c) => planCase(c, copyWithTypes));
        this.isUnion = this.cases.length > 1;
        this.common = this.isUnion ? commonFields(this.cases) : (this.cases[0]?.fields ?? []);
        this.hasBaseCopyWith = this.cases.some((c) => copyable(c.fields).length > 0);
    }

    write(): string {
        if (this.options.withJson) this.fromJsonFunction();
        this.mixin();
        if (this.hasBaseCopyWith) this.baseCopyWith();
        for (const c of this.cases) {
            if (copyable(c.fields).length > 0) this.caseCopyWith(c);
            this.implClass(c);
            this.caseClass(c);
        }
        return this.out.join("\n\n");
    }

    private get name(): string {
        return this.decl.name;
    }

    private doc(indent: string): string[] {
        return COPY_WITH_DOC.map((l) => `${indent}${l.replace("{name}", this.name)}`);
    }

    // -- top level --

    private fromJsonFunction(): void {
        const name = this.name;
        const [only] = this.cases;
        if (!this.isUnion && only) {
            this.out.push(
                `${name} _$${nonPrivate(name)}FromJson(Map<String, dynamic> json) {\n  return ${only.caseClass}.fromJson(json);\n}`,
            );
            return;
        }
        const lines = [`${name} _$${nonPrivate(name)}FromJson(Map<String, dynamic> json) {`, "  switch (json['runtimeType']) {"];
        for (const c of this.cases) {
            lines.push(`    case '${c.jsonKey}':`, `      return ${c.caseClass}.fromJson(json);`);
        }
        lines.push(
            "",
            "    default:",
            `      throw CheckedFromJsonException(json, 'runtimeType', '${name}',`,
            "          'Invalid union type \"${json['runtimeType']}\"!');",
            "  }",
            "}",
        );
        this.out.push(lines.join("\n"));
    }

    private mixin(): void {
        const lines = ["/// @nodoc", `mixin _$${nonPrivate(this.name)} {`];
        for (const f of this.common) lines.push(`  ${f.type} get ${f.name} => ${THROWS};`);
        if (this.isUnion) {
            for (const method of UNION_METHODS) {
                lines.push("  @optionalTypeArgs", `  ${this.unionSignature(method, ` => ${THROWS};`)}`);
            }
        }
        if (this.options.withJson) {
            lines.push("", `  /// Serializes this ${this.name} to a JSON map.`, `  Map<String, dynamic> toJson() => ${THROWS};`);
        }
        if (copyable(this.common).length > 0) {
            lines.push(
                "",
                ...this.doc("  "),
                `  ${NO_JSON}`,
                `  $${nonPrivate(this.name)}CopyWith<${this.name}> get copyWith =>`,
                `      ${THROWS};`,
            );
        }
        lines.push("}");
        this.out.push(lines.join("\n"));
    }

    // -- copyWith --

    private callSignature(fields: FieldPlan[], suffix: string): string {
        const named = copyable(fields).map((f) => `${f.type} ${f.name}`);
        return `  ${parameterList("$Res call(", { positional: [], named }, `)${suffix}`, "  ")}`;
    }

    private sentinelParams(fields: FieldPlan[]): string {
        const named = copyable(fields).map((f) => `Object? ${f.name} = ${f.nullable ? "freezed" : "null"}`);
        return `  ${parameterList("$Res call(", { positional: [], named }, ") {", "  ")}`;
    }

    private replaced(f: FieldPlan, valueAccess: string): string {
        const sentinel = f.nullable ? "freezed" : "null";
        return [
            `${sentinel} == ${f.name}`,
            `          ? _value.${valueAccess}`,
            `          : ${f.name} // ignore: cast_nullable_to_non_nullable`,
            `              as ${f.type}`,
        ].join("\n");
    }

    private baseCopyWith(): void {
        const base = `$${nonPrivate(this.name)}CopyWith`;
        const impl = `_$${nonPrivate(this.name)}CopyWithImpl`;
        const fields = copyable(this.common);

        const iface = [
            "/// @nodoc",
            `abstract class ${base}<$Res> {`,
            `  factory ${base}(${this.name} value, $Res Function(${this.name}) then) =`,
            `      ${impl}<$Res, ${this.name}>;`,
        ];
        if (fields.length > 0) iface.push("  @useResult", this.callSignature(fields, ";"));
        for (const f of nestedFields(fields)) iface.push("", `  ${nestedCopyWith(f)} get ${f.name};`);
        iface.push("}");
        this.out.push(iface.join("\n"));

        const body = [
            "/// @nodoc",
            `class ${impl}<$Res, $Val extends ${this.name}>`,
            `    implements ${base}<$Res> {`,
            `  ${impl}(this._value, this._then);`,
            "",
            "  // ignore: unused_field",
            "  final $Val _value;",
            "  // ignore: unused_field",
            "  final $Res Function($Val) _then;",
        ];
        if (fields.length > 0) {
            body.push(
                "",
                ...this.doc("  "),
                "  @pragma('vm:prefer-inline')",
                "  @override",
                this.sentinelParams(fields),
                "    return _then(_value.copyWith(",
                ...fields.map((f) => `      ${f.name}: ${this.replaced(f, f.name)},`),
                "    ) as $Val);",
                "  }",
            );
        }
        for (const f of nestedFields(fields)) body.push("", ...this.nestedGetter(f));
        body.push("}");
        this.out.push(body.join("\n"));
    }

    /** Chains a copy of the nested value back into `_then`. */
    private nestedGetter(f: NestedField): string[] {
        const copyWith = `$${nonPrivate(f.type)}CopyWith<$Res>`;
        const lines = [...this.doc("  "), "  @override", "  @pragma('vm:prefer-inline')", `  ${nestedCopyWith(f)} get ${f.name} {`];
        if (f.nullable) lines.push(`    if (_value.${f.name} == null) {`, "      return null;", "    }", "");
        lines.push(
            `    return ${copyWith}(_value.${f.name}${f.nullable ? "!" : ""}, (value) {`,
            `      return _then(_value.copyWith(${f.name}: value) as $Val);`,
            "    });",
            "  }",
        );
        return lines;
    }

    private caseCopyWith(c: CasePlan): void {
        const iface = `_$${c.stem}CopyWith`;
        const impl = `__$${c.stem}CopyWithImpl`;
        const base = `$${nonPrivate(this.name)}CopyWith`;
        const baseImpl = `_$${nonPrivate(this.name)}CopyWithImpl`;
        const overridesCall = copyable(this.common).length > 0;

        this.out.push(
            [
                "/// @nodoc",
                `abstract class ${iface}<$Res> implements ${base}<$Res> {`,
                `  factory ${iface}(${c.impl} value, $Res Function(${c.impl}) then) =`,
                `      ${impl}<$Res>;`,
                ...(overridesCall ? ["  @override"] : []),
                "  @useResult",
                this.callSignature(c.fields, ";"),
                ...nestedFields(copyable(this.common)).flatMap((f) => ["", "  @override", `  ${nestedCopyWith(f)} get ${f.name};`]),
                "}",
            ].join("\n"),
        );

        const args = c.fields.map((f) => {
            const value = f.resolved ? this.replaced(f, storage(f)) : `_value.${storage(f)}`;
            return f.kind === "named" ? `      ${f.name}: ${value},` : `      ${value},`;
        });
        this.out.push(
            [
                "/// @nodoc",
                `class ${impl}<$Res>`,
                `    extends ${baseImpl}<$Res, ${c.impl}>`,
                `    implements ${iface}<$Res> {`,
                `  ${impl}(${c.impl} _value, $Res Function(${c.impl}) _then)`,
                "      : super(_value, _then);",
                "",
                ...this.doc("  "),
                "  @pragma('vm:prefer-inline')",
                "  @override",
                this.sentinelParams(c.fields),
                `    return _then(${c.impl}(`,
                ...args,
                "    ));",
                "  }",
                "}",
            ].join("\n"),
        );
    }

    // -- implementation --

    private implClass(c: CasePlan): void {
        const lines = ["/// @nodoc"];
        if (this.options.withJson) lines.push("@JsonSerializable()");
        const relation = this.decl.hasPrivateConstructor ? "extends" : "implements";
        lines.push(`class ${c.impl} ${relation} ${c.caseClass} {`);

        lines.push(this.implConstructor(c));
        if (this.options.withJson) {
            lines.push(
                "",
                `  factory ${c.impl}.fromJson(Map<String, dynamic> json) =>`,
                `      _$${c.stem}FromJson(json);`,
            );
        }

        for (const f of c.fields) {
            lines.push("", ...this.implField(f));
        }
        if (this.isUnion && this.options.withJson) {
            lines.push("", "  @JsonKey(name: 'runtimeType')", "  final String $type;");
        }

        lines.push("", ...this.toStringMethod(c), "", ...this.equality(c), "", ...this.hashCodeGetter(c));

        if (copyable(c.fields).length > 0) {
            lines.push(
                "",
                ...this.doc("  "),
                ...(this.options.withJson ? [`  ${NO_JSON}`] : []),
                "  @override",
                "  @pragma('vm:prefer-inline')",
                `  _$${c.stem}CopyWith<${c.impl}> get copyWith =>`,
                `      __$${c.stem}CopyWithImpl<${c.impl}>(this, _$identity);`,
            );
        }

        if (this.isUnion) {
            for (const method of UNION_METHODS) {
                lines.push("", "  @override", "  @optionalTypeArgs", `  ${this.unionSignature(method, " {")}`);
                lines.push(...this.unionBody(method, c), "  }");
            }
        }

        if (this.options.withJson) {
            lines.push(
                "",
                "  @override",
                "  Map<String, dynamic> toJson() {",
                `    return _$${c.stem}ToJson(`,
                "      this,",
                "    );",
                "  }",
            );
        }
        lines.push("}");
        this.out.push(lines.join("\n"));
    }

    private implConstructor(c: CasePlan): string {
        const positional: string[] = [];
        const optional: string[] = [];
        const named: string[] = [];
        const initializers: string[] = [];

        for (const f of c.fields) {
            const collection = isCollection(f);
            const target = collection ? `final ${f.type} ${f.name}` : `this.${f.name}`;
            const withDefault = f.defaultValue === null ? target : `${target} = ${f.defaultValue}`;
            if (collection) initializers.push(`_${f.name} = ${f.name}`);
            if (f.kind === "positional") positional.push(target);
            else if (f.kind === "optional") optional.push(withDefault);
            else named.push(`${f.required ? "required " : ""}${withDefault}`);
        }
        if (this.isUnion && this.options.withJson && optional.length === 0) {
            named.push("final String? $type");
            initializers.push(`$type = $type ?? '${c.jsonKey}'`);
        }
        if (this.decl.hasPrivateConstructor) initializers.push("super._()");

        const head = `${c.isConst ? "const " : ""}${c.impl}(`;
        const tail = initializers.length > 0 ? ")" : ");";
        let text = `  ${parameterList(head, { positional, optional, named }, tail, "  ")}`;
        if (initializers.length > 0) {
            text += `\n      : ${initializers.join(",\n        ")};`;
        }
        return text;
    }

    private implField(f: FieldPlan): string[] {
        if (!isCollection(f)) {
            return ["  @override", ...f.annotations.map((a) => `  ${a}`), `  final ${f.type} ${f.name};`];
        }
        const view = VIEW[f.collection];
        const lines = [`  final ${f.type} _${f.name};`, "  @override", ...f.annotations.map((a) => `  ${a}`)];
        lines.push(`  ${f.type} get ${f.name} {`);
        if (f.nullable) {
            lines.push(
                `    final value = _${f.name};`,
                "    if (value == null) return null;",
                `    if (_${f.name} is ${view}) return _${f.name};`,
                "    // ignore: implicit_dynamic_type",
                `    return ${view}(value);`,
            );
        } else {
            lines.push(
                `    if (_${f.name} is ${view}) return _${f.name};`,
                "    // ignore: implicit_dynamic_type",
                `    return ${view}(_${f.name});`,
            );
        }
        lines.push("  }");
        return lines;
    }

    private displayName(c: CasePlan): string {
        return c.constructorName === null ? this.name : `${this.name}.${c.constructorName}`;
    }

    private toStringMethod(c: CasePlan): string[] {
        const fields = copyable(c.fields).map((f) => `${f.name}: $${f.name}`);
        return [
            "  @override",
            "  String toString() {",
            `    return '${this.displayName(c)}(${fields.join(", ")})';`,
            "  }",
        ];
    }

    private equality(c: CasePlan): string[] {
        const conditions = ["other.runtimeType == runtimeType", `other is ${c.impl}`];
        for (const f of copyable(c.fields)) {
            conditions.push(
                isCollection(f)
                    ? `const DeepCollectionEquality().equals(other._${f.name}, _${f.name})`
                    : `(identical(other.${f.name}, ${f.name}) || other.${f.name} == ${f.name})`,
            );
        }
        return [
            "  @override",
            "  bool operator ==(Object other) {",
            "    return identical(this, other) ||",
            `        (${conditions.join(" &&\n            ")});`,
            "  }",
        ];
    }

    private hashCodeGetter(c: CasePlan): string[] {
        const lines = this.options.withJson ? [`  ${NO_JSON}`, "  @override"] : ["  @override"];
        const parts = copyable(c.fields).map((f) =>
            isCollection(f) ? `const DeepCollectionEquality().hash(_${f.name})` : f.name,
        );
        if (parts.length === 0) {
            lines.push("  int get hashCode => runtimeType.hashCode;");
        } else if (parts.length + 1 <= MAX_HASH_ARGS) {
            lines.push(`  ${argumentList("int get hashCode => Object.hash(", ["runtimeType", ...parts], ");", "  ")}`);
        } else {
            lines.push(`  ${argumentList("int get hashCode => Object.hashAll([", ["runtimeType", ...parts], "]);", "  ")}`);
        }
        return lines;
    }

    // -- case class --

    private caseClass(c: CasePlan): void {
        const relation = this.decl.hasPrivateConstructor ? "extends" : "implements";
        const lines = [`abstract class ${c.caseClass} ${relation} ${this.name} {`];

        const positional: string[] = [];
        const optional: string[] = [];
        const named: string[] = [];
        for (const f of c.fields) {
            const param = `final ${f.type} ${f.name}`;
            if (f.kind === "positional") positional.push(param);
            else if (f.kind === "optional") optional.push(param);
            else named.push(`${f.required ? "required " : ""}${param}`);
        }
        const head = `${c.isConst ? "const " : ""}factory ${c.caseClass}(`;
        lines.push(`  ${parameterList(head, { positional, optional, named }, `) = ${c.impl};`, "  ")}`);
        if (this.decl.hasPrivateConstructor) {
            lines.push(`  ${c.isConst ? "const " : ""}${c.caseClass}._() : super._();`);
        }
        if (this.options.withJson) {
            lines.push(
                "",
                `  factory ${c.caseClass}.fromJson(Map<String, dynamic> json) =`,
                `      ${c.impl}.fromJson;`,
            );
        }

        const common = new Set(this.common.map((f) => f.name));
        for (const f of c.fields) {
            lines.push("");
            if (common.has(f.name)) lines.push("  @override");
            lines.push(`  ${f.type} get ${f.name};`);
        }

        if (copyable(c.fields).length > 0) {
            lines.push("", ...this.doc("  "));
            if (copyable(this.common).length > 0) lines.push("  @override");
            if (this.options.withJson) lines.push(`  ${NO_JSON}`);
            lines.push(`  _$${c.stem}CopyWith<${c.impl}> get copyWith =>`, `      ${THROWS};`);
        }
        lines.push("}");
        this.out.push(lines.join("\n"));
    }

    // -- unions --

    private unionSignature(method: UnionMethod, tail: string): string {
        const params = this.cases.map((c) => {
            const fn = method.pattern ? `${method.result} Function(${c.caseClass} value)` : this.whenFunction(c, method);
            return method.style === "required" ? `required ${fn} ${c.callback}` : `${fn}? ${c.callback}`;
        });
        if (method.style === "orElse") params.push("required TResult orElse()");
        const head = `${method.result} ${method.name}<TResult extends Object?>(`;
        return parameterList(head, { positional: [], named: params }, `)${tail}`, "  ");
    }

    private whenFunction(c: CasePlan, method: UnionMethod): string {
        const params = c.fields.map((f) => `${f.type} ${f.name}`);
        return `${method.result} Function(${params.join(", ")})`;
    }

    private unionBody(method: UnionMethod, c: CasePlan): string[] {
        const args = method.pattern ? "this" : c.fields.map((f) => f.name).join(", ");
        switch (method.style) {
            case "required":
                return [`    return ${c.callback}(${args});`];
            case "nullable":
                return [`    return ${c.callback}?.call(${args});`];
            case "orElse":
                return [
                    `    if (${c.callback} != null) {`,
                    `      return ${c.callback}(${args});`,
                    "    }",
                    "    return orElse();",
                ];
        }
    }
}

interface UnionMethod {
    name: string;
    result: "TResult" | "TResult?";
    style: "required" | "nullable" | "orElse";
    /** Callbacks receive the case object instead of its fields. */
    pattern: boolean;
}

const UNION_METHODS: UnionMethod[] = [
    { name: "when", result: "TResult", style: "required", pattern: false },
    { name: "whenOrNull", result: "TResult?", style: "nullable", pattern: false },
    { name: "maybeWhen", result: "TResult", style: "orElse", pattern: false },
    { name: "map", result: "TResult", style: "required", pattern: true },
    { name: "mapOrNull", result: "TResult?", style: "nullable", pattern: true },
    { name: "maybeMap", result: "TResult", style: "orElse", pattern: true },
];

/**
 * Emit the freezed companion section of one value type.
 *
 * Generic classes are not supported and produce only an error. Members whose
 * type is unknown are kept as `dynamic` fields but left out of equality,
 * hashing, `toString` and copyWith, each with an UnsupportedTypeError.
 */
export function emitFreezed(decl: ValueTypeDeclaration, options: FreezedOptions): EmitOutput {
    const scope = { file: options.file };
    if (decl.typeParameters !== null) {
        return emitOutput("", {
            errors: [new UnsupportedTypeError(decl.name, "<type parameters>", decl.typeParameters, EMITTER, scope)],
        });
    }

    const errors: UnsupportedTypeError[] = [];
    for (const c of decl.cases) {
        for (const p of c.parameters) {
            if (p.type === null) errors.push(new UnsupportedTypeError(decl.name, p.name, "dynamic", EMITTER, scope));
        }
    }
    return emitOutput(new FreezedWriter(decl, options).write(), { errors });
}
