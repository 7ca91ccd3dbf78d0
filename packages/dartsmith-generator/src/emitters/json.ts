/**
 * JSON codec emitter: json_serializable 6.x style `_$XFromJson` and
 * `_$XToJson` functions for the `*.g.dart` part.
 */

import { type JsonOptions, UnsupportedTypeError, VariantKind } from "@dartsmith/core";
import { booleanArgs } from "../classifier";
import { CollectionKind } from "../enums";
import type { EnumInfo, GenerationVariant, Parameter, TypeDescriptor, ValueTypeDeclaration } from "../types";
import { emitOutput, type EmitOutput, nonNullableText, nonPrivate, stringLiteralValue } from "./dart";
import { implName } from "./freezed";

const EMITTER = "json";
const UNION_KEY = "runtimeType";

export interface JsonEmitOptions {
    json: JsonOptions;
    enums: ReadonlyMap<string, EnumInfo>;
    file?: string;
}

/** A class json_serializable writes functions for. */
export interface JsonTarget {
    className: string;
    parameters: Parameter[];
    /** Freezed union case: carries the `runtimeType` discriminator as `$type`. */
    unionCase: boolean;
}

type JsonVariant = Extract<GenerationVariant, { kind: VariantKind.Immutable | VariantKind.JsonCodec }>;

export function jsonTargetsOf(decl: ValueTypeDeclaration, variant: JsonVariant): JsonTarget[] {
    if (variant.kind === VariantKind.JsonCodec) {
        return [{ className: decl.name, parameters: decl.parameters, unionCase: false }];
    }
    const union = decl.cases.length > 1;
    return decl.cases.map((c) => ({ className: implName(c.redirect), parameters: c.parameters, unionCase: union }));
}

/** `_$UserImpl` → `r'_$UserImpl'`, `name` → `'name'`. */
function literal(value: string): string {
    return value.includes("$") ? `r'${value}'` : `'${value}'`;
}

// ── Field plans ─────────────────────────────────────────────────────

interface JsonField {
    name: string;
    key: string;
    type: TypeDescriptor;
    named: boolean;
    defaultValue: string | null;
    requiredKey: boolean;
    decode: boolean;
    encode: boolean;
}

class Unsupported extends Error {
    constructor(readonly type: string) {
        super(type);
    }
}

/** A constructor parameter with no decoded value, and the type reported for it. */
interface Omission {
    param: Parameter;
    type: string;
}

/** The constructor cannot be called without a value for `param`. */
function needsValue(param: Parameter): boolean {
    return param.kind === "positional" || (param.required && param.defaultValue === null);
}

function planFields(target: JsonTarget, converter: Converter): { fields: JsonField[]; omitted: Omission[] } {
    const fields: JsonField[] = [];
    const omitted: Omission[] = [];
    for (const param of target.parameters) {
        if (param.type === null || param.type.shape !== "named") {
            omitted.push({ param, type: param.type?.text ?? "dynamic" });
            continue;
        }
        try {
            converter.decode(param.type, "v");
            converter.encode(param.type, "x");
        } catch (error) {
            if (!(error instanceof Unsupported)) throw error;
            omitted.push({ param, type: error.type });
            continue;
        }
        const jsonKey = param.markers.find((m) => m.name === "JsonKey");
        const flags = jsonKey ? booleanArgs(jsonKey) : new Map<string, boolean>();
        let key = param.name;
        let defaultValue = param.kind === "positional" ? null : param.defaultValue;
        for (const arg of jsonKey?.args ?? []) {
            const [, name, value] = /^(\w+)\s*:\s*([\s\S]+)$/.exec(arg) ?? [];
            if (name === "name" && value !== undefined) key = stringLiteralValue(value) ?? key;
            if (name === "defaultValue" && value !== undefined) defaultValue = value.trim();
        }
        const ignored = flags.get("ignore") === true;
        const decode = !ignored && flags.get("includeFromJson") !== false;
        if (!decode && needsValue(param)) omitted.push({ param, type: `${param.type.text} (not decoded)` });
        fields.push({
            name: param.name,
            key,
            type: param.type,
            named: param.kind === "named",
            defaultValue,
            requiredKey: flags.get("required") === true,
            decode,
            encode: !ignored && flags.get("includeToJson") !== false,
        });
    }
    return { fields, omitted };
}

// ── Conversions ─────────────────────────────────────────────────────

const PLAIN = new Set(["String", "bool", "num"]);
const PARSED = new Set(["DateTime", "Uri", "BigInt"]);
const DYNAMIC: TypeDescriptor = {
    name: "dynamic",
    nullable: true,
    args: [],
    collection: CollectionKind.None,
    shape: "named",
    text: "dynamic",
};

class Converter {
    readonly enumMaps = new Set<string>();

    constructor(
        private readonly enums: ReadonlyMap<string, EnumInfo>,
        private readonly explicitToJson: boolean,
    ) {}

    private enumMap(name: string): string {
        this.enumMaps.add(name);
        return `_$${name}EnumMap`;
    }

    /** Dart expression turning the JSON value `v` into `type`. */
    decode(type: TypeDescriptor, v: string): string {
        const q = type.nullable ? "?" : "";
        if (type.shape !== "named") throw new Unsupported(type.text);

        switch (type.collection) {
            case CollectionKind.List:
            case CollectionKind.Set: {
                const elem = type.args[0] ?? DYNAMIC;
                const finish = type.collection === CollectionKind.Set ? "toSet" : "toList";
                if (elem.name === "dynamic" && type.collection === CollectionKind.List) return `${v} as List<dynamic>${q}`;
                const mapped = elem.name === "dynamic" ? "" : `map((e) => ${this.decode(elem, "e")}).`;
                return `(${v} as List<dynamic>${q})${q}.${mapped}${finish}()`;
            }
            case CollectionKind.Map: {
                const keyType = type.args[0] ?? DYNAMIC;
                const valueType = type.args[1] ?? DYNAMIC;
                if (keyType.name === "String" && valueType.name === "dynamic") return `${v} as Map<String, dynamic>${q}`;
                return `(${v} as Map<String, dynamic>${q})${q}.map((k, e) => MapEntry(${this.decodeKey(keyType)}, ${this.decode(valueType, "e")}))`;
            }
            case CollectionKind.None:
                break;
        }

        const name = type.name;
        if (name === "dynamic" || (name === "Object" && type.nullable)) return v;
        if (name === "Object" || PLAIN.has(name)) return `${v} as ${name}${q}`;
        if (name === "int" || name === "double") {
            const to = name === "int" ? "toInt" : "toDouble";
            return `(${v} as num${q})${q}.${to}()`;
        }
        if (type.args.length > 0) throw new Unsupported(type.text);

        let converted: string;
        if (PARSED.has(name)) {
            converted = `${name}.parse(${v} as String)`;
        } else if (name === "Duration") {
            converted = `Duration(microseconds: (${v} as num).toInt())`;
        } else if (this.enums.has(name)) {
            return `$enumDecode${type.nullable ? "Nullable" : ""}(${this.enumMap(name)}, ${v})`;
        } else {
            converted = `${name}.fromJson(${v} as Map<String, dynamic>)`;
        }
        return type.nullable ? `${v} == null ? null : ${converted}` : converted;
    }

    private decodeKey(type: TypeDescriptor): string {
        if (type.name === "String") return "k";
        if (type.name === "int") return "int.parse(k)";
        if (this.enums.has(type.name)) return `$enumDecode(${this.enumMap(type.name)}, k)`;
        throw new Unsupported(`Map key ${type.text}`);
    }

    /** Dart expression turning `x` of `type` into a JSON value. */
    encode(type: TypeDescriptor, x: string): string {
        const q = type.nullable ? "?" : "";
        if (type.shape !== "named") throw new Unsupported(type.text);

        switch (type.collection) {
            case CollectionKind.List:
            case CollectionKind.Set: {
                const elem = type.args[0] ?? DYNAMIC;
                const inner = this.encode(elem, "e");
                if (inner !== "e") return `${x}${q}.map((e) => ${inner}).toList()`;
                return type.collection === CollectionKind.Set ? `${x}${q}.toList()` : x;
            }
            case CollectionKind.Map: {
                const keyType = type.args[0] ?? DYNAMIC;
                const valueType = type.args[1] ?? DYNAMIC;
                const k = this.encodeKey(keyType);
                const e = this.encode(valueType, "e");
                if (k === "k" && e === "e") return x;
                return `${x}${q}.map((k, e) => MapEntry(${k}, ${e}))`;
            }
            case CollectionKind.None:
                break;
        }

        const name = type.name;
        if (name === "dynamic" || name === "Object" || name === "int" || name === "double" || PLAIN.has(name)) return x;
        if (name === "DateTime") return `${x}${q}.toIso8601String()`;
        if (name === "Uri" || name === "BigInt") return `${x}${q}.toString()`;
        if (name === "Duration") return `${x}${q}.inMicroseconds`;
        if (this.enums.has(name)) return `${this.enumMap(name)}[${x}]${type.nullable ? "" : "!"}`;
        if (type.args.length > 0) throw new Unsupported(type.text);
        return this.explicitToJson ? `${x}${q}.toJson()` : x;
    }

    private encodeKey(type: TypeDescriptor): string {
        if (type.name === "String" || type.name === "dynamic") return "k";
        if (type.name === "int") return "k.toString()";
        if (this.enums.has(type.name)) return `${this.enumMap(type.name)}[k]!`;
        throw new Unsupported(`Map key ${type.text}`);
    }
}

function asNonNullable(type: TypeDescriptor): TypeDescriptor {
    return type.nullable ? { ...type, nullable: false, text: nonNullableText(type) } : type;
}

function asNullable(type: TypeDescriptor): TypeDescriptor {
    return type.nullable ? type : { ...type, nullable: true, text: `${type.text}?` };
}

// ── Functions ───────────────────────────────────────────────────────

interface Settings {
    checked: boolean;
    includeIfNull: boolean;
}

class JsonWriter {
    constructor(
        private readonly target: JsonTarget,
        private readonly fields: JsonField[],
        private readonly converter: Converter,
        private readonly settings: Settings,
    ) {}

    private get stem(): string {
        return nonPrivate(this.target.className);
    }

    private decodeValue(f: JsonField, v: string): string {
        if (f.defaultValue === null) return this.converter.decode(f.type, v);
        const expr = this.converter.decode(asNullable(f.type), v);
        const wrapped = expr.includes(" ? null : ") ? `(${expr})` : expr;
        return `${wrapped} ?? ${f.defaultValue}`;
    }

    fromJson(): string {
        const { className } = this.target;
        const decoded = this.fields.filter((f) => f.decode);
        const requiredKeys = decoded.filter((f) => f.requiredKey).map((f) => literal(f.key));
        const signature = `${className} _$${this.stem}FromJson(Map<String, dynamic> json)`;

        if (this.settings.checked) {
            const args = decoded.map((f) => {
                const value = `$checkedConvert(${literal(f.key)}, (v) => ${this.decodeValue(f, "v")})`;
                return `          ${f.named ? `${f.name}: ` : ""}${value},`;
            });
            if (this.target.unionCase) args.push(`          $type: $checkedConvert('${UNION_KEY}', (v) => v as String?),`);
            const renamed = decoded.filter((f) => f.key !== f.name).map((f) => `${literal(f.name)}: ${literal(f.key)}`);
            if (this.target.unionCase) renamed.push(`r'$type': '${UNION_KEY}'`);

            const lines = [`${signature} => $checkedCreate(`, `      ${literal(className)},`, "      json,", "      ($checkedConvert) {"];
            if (requiredKeys.length > 0) {
                lines.push("        $checkKeys(", "          json,", `          requiredKeys: const [${requiredKeys.join(", ")}],`, "        );");
            }
            lines.push(...this.construct("        final val = ", args, "        "), "        return val;", "      },");
            if (renamed.length > 0) lines.push(`      fieldKeyMap: const {${renamed.join(", ")}},`);
            lines.push("    );");
            return lines.join("\n");
        }

        const args = decoded.map((f) => {
            const value = this.decodeValue(f, `json[${literal(f.key)}]`);
            return `      ${f.named ? `${f.name}: ` : ""}${value},`;
        });
        if (this.target.unionCase) args.push(`      $type: json['${UNION_KEY}'] as String?,`);

        if (requiredKeys.length === 0) {
            const [first, ...rest] = this.construct("", args, "    ");
            return [`${signature} => ${first ?? ""}`, ...rest].join("\n");
        }
        const body = args.map((a) => a.slice(2));
        return [
            `${signature} {`,
            "  $checkKeys(",
            "    json,",
            `    requiredKeys: const [${requiredKeys.join(", ")}],`,
            "  );",
            ...this.construct("  return ", body, "  "),
            "}",
        ].join("\n");
    }

    /** `prefix ClassName(args);` with args already indented. */
    private construct(prefix: string, args: string[], indent: string): string[] {
        if (args.length === 0) return [`${prefix}${this.target.className}();`];
        return [`${prefix}${this.target.className}(`, ...args, `${indent});`];
    }

    toJson(): string {
        const { className } = this.target;
        const entries: string[] = [];
        for (const f of this.fields) {
            if (!f.encode) continue;
            const key = literal(f.key);
            if (f.type.nullable && !this.settings.includeIfNull) {
                const value = this.converter.encode(asNonNullable(f.type), "value");
                entries.push(`      if (instance.${f.name} case final value?) ${key}: ${value},`);
            } else {
                entries.push(`      ${key}: ${this.converter.encode(f.type, `instance.${f.name}`)},`);
            }
        }
        if (this.target.unionCase) entries.push(`      '${UNION_KEY}': instance.$type,`);

        const head = `Map<String, dynamic> _$${this.stem}ToJson(${className} instance) =>`;
        if (entries.length === 0) return `${head} <String, dynamic>{};`;
        return [`${head} <String, dynamic>{`, ...entries, "    };"].join("\n");
    }
}

export function emitEnumMap(info: EnumInfo): string {
    const entries = info.values.map((v) => `  ${info.name}.${v}: ${literal(v)},`);
    return [`const _$${info.name}EnumMap = {`, ...entries, "};"].join("\n");
}

/**
 * Emit the json_serializable section of one declaration.
 *
 * `@JsonSerializable` arguments override the configured defaults. A
 * member whose type has no JSON conversion is left out with an
 * UnsupportedTypeError. When the constructor still needs a value for a
 * left-out or undecoded member, no codec is written for that class.
 */
export function emitJson(decl: ValueTypeDeclaration, variant: JsonVariant, options: JsonEmitOptions): EmitOutput {
    const settings: Settings = {
        checked: variant.json.checked ?? options.json.checked,
        includeIfNull: variant.json.includeIfNull ?? false,
    };
    const converter = new Converter(options.enums, variant.json.explicitToJson ?? options.json.explicitToJson);
    const errors: UnsupportedTypeError[] = [];
    const sections: string[] = [];

    for (const target of jsonTargetsOf(decl, variant)) {
        const { fields, omitted } = planFields(target, converter);
        const blocked = omitted.some((o) => needsValue(o.param));
        const consequence = blocked ? `no codec for "${target.className}"` : undefined;
        for (const { param, type } of omitted) {
            errors.push(new UnsupportedTypeError(decl.name, param.name, type, EMITTER, { file: options.file }, consequence));
        }
        if (blocked) continue;
        const writer = new JsonWriter(target, fields, converter, settings);
        sections.push(writer.fromJson(), writer.toJson());
    }

    return emitOutput(sections.join("\n\n"), { errors, enumMaps: [...converter.enumMaps] });
}
