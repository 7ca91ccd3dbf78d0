/**
 * Reactive-provider emitter: riverpod_generator 2.x style providers for
 * `@riverpod` functions and notifier classes.
 */

import { createHash } from "node:crypto";
import { UnsupportedTypeError, type VariantKind } from "@dartsmith/core";
import { CollectionKind, DeclarationKind, ProviderFlavor } from "../enums";
import type { FunctionDeclaration, GenerationVariant, Parameter, StatefulUnitDeclaration } from "../types";
import { emitOutput, type EmitOutput, lowerFirst, parameterList, typeText, upperFirst } from "./dart";

const EMITTER = "riverpod";
const PRODUCT_CHECK = "const bool.fromEnvironment('dart.vm.product') ? null";
const REF_DEPRECATION = ["@Deprecated('Will be removed in 3.0. Use Ref instead')", "// ignore: unused_element"];

export type ProviderVariant = Extract<GenerationVariant, { kind: VariantKind.Provider }>;

export interface ProviderOptions {
    file?: string;
}

/** Emitted once per file that declares a family. */
export const SYSTEM_HASH = `/// Copied from Dart SDK
class _SystemHash {
  _SystemHash._();

  static int combine(int hash, int value) {
    // ignore: parameter_assignments
    hash = 0x1fffffff & (hash + value);
    // ignore: parameter_assignments
    hash = 0x1fffffff & (hash + ((0x0007ffff & hash) << 10));
    return hash ^ (hash >> 6);
  }

  static int finish(int hash) {
    // ignore: parameter_assignments
    hash = 0x1fffffff & (hash + ((0x03ffffff & hash) << 3));
    // ignore: parameter_assignments
    hash = hash ^ (hash >> 11);
    return 0x1fffffff & (hash + ((0x00003fff & hash) << 15));
  }
}`;

/** Source hash riverpod uses to detect stale generated code. */
export function sourceHash(source: string): string {
    return createHash("sha1").update(source).digest("hex");
}

// ── Names ───────────────────────────────────────────────────────────

interface ProviderNames {
    /** `getUserName`, `UserNotifier`. */
    source: string;
    /** `getUserNameProvider`. */
    provider: string;
    hash: string;
    /** `GetUserName`. */
    pascal: string;
    /** Value type: `String` for `Future<String>`. */
    value: string;
}

function namesOf(decl: FunctionDeclaration | StatefulUnitDeclaration): ProviderNames {
    const base = decl.kind === DeclarationKind.StatefulUnit ? lowerFirst(decl.name) : decl.name;
    const ret = decl.returnType;
    const unwrapped = ret !== null && ["Future", "FutureOr", "Stream"].includes(ret.name) ? (ret.args[0] ?? null) : ret;
    return {
        source: decl.name,
        provider: `${base}Provider`,
        hash: `_$${base}Hash`,
        pascal: upperFirst(decl.name),
        value: typeText(unwrapped),
    };
}

interface FlavorNames {
    /** `AutoDisposeFutureProvider<T>` */
    provider: string;
    ref: string;
    element: string;
    /** Family state type. */
    state: string;
}

function flavorNames(variant: ProviderVariant, value: string, unitClass?: string): FlavorNames {
    const ad = variant.keepAlive ? "" : "AutoDispose";
    const async = variant.flavor !== ProviderFlavor.Plain;
    const state = async ? `AsyncValue<${value}>` : value;
    if (unitClass !== undefined) {
        const n = variant.flavor === ProviderFlavor.Future ? "Async" : variant.flavor === ProviderFlavor.Stream ? "Stream" : "";
        return {
            provider: `${ad}${n}NotifierProviderImpl<${unitClass}, ${value}>`,
            ref: `${ad}${n}NotifierProviderRef<${value}>`,
            element: `${ad}${n}NotifierProviderElement<${unitClass}, ${value}>`,
            state,
        };
    }
    const f = variant.flavor === ProviderFlavor.Future ? "Future" : variant.flavor === ProviderFlavor.Stream ? "Stream" : "";
    return {
        provider: `${ad}${f}Provider<${value}>`,
        ref: `${ad}${f}ProviderRef<${value}>`,
        element: `${ad}${f}ProviderElement<${value}>`,
        state,
    };
}

// ── Parameters ──────────────────────────────────────────────────────

function declare(p: Parameter): string {
    const base = `${typeText(p.type)} ${p.name}`;
    const withDefault = p.defaultValue !== null && p.kind !== "positional" ? `${base} = ${p.defaultValue}` : base;
    return p.kind === "named" && p.required ? `required ${withDefault}` : withDefault;
}

function groups(params: Parameter[], render: (p: Parameter) => string) {
    return {
        positional: params.filter((p) => p.kind === "positional").map(render),
        optional: params.filter((p) => p.kind === "optional").map(render),
        named: params.filter((p) => p.kind === "named").map(render),
    };
}

/** Arguments forwarding `params`, reading each from `prefix`. */
function forward(params: Parameter[], prefix = ""): string[] {
    return params.map((p) => (p.kind === "named" ? `${p.name}: ${prefix}${p.name}` : `${prefix}${p.name}`));
}

const isCollection = (p: Parameter) => (p.type?.collection ?? CollectionKind.None) !== CollectionKind.None;

// ── Emitter ─────────────────────────────────────────────────────────

class ProviderWriter {
    private readonly out: string[] = [];
    private readonly names: ProviderNames;
    private readonly isUnit: boolean;
    private readonly args: Parameter[];
    private readonly flavor: FlavorNames;

    constructor(
        private readonly decl: FunctionDeclaration | StatefulUnitDeclaration,
        private readonly variant: ProviderVariant,
    ) {
        this.names = namesOf(decl);
        this.isUnit = decl.kind === DeclarationKind.StatefulUnit;
        this.args = this.isUnit ? decl.parameters : decl.parameters.slice(1);
        this.flavor = flavorNames(variant, this.names.value, this.isUnit ? decl.name : undefined);
    }

    write(): string {
        this.out.push(`String ${this.names.hash}() => r'${sourceHash(this.decl.source)}';`);
        if (this.isUnit) this.unitBase();
        if (this.variant.isFamily) {
            this.familyConstant();
            this.familyClass();
            this.familyProvider();
            this.familyRef();
        } else if (this.isUnit) {
            this.unitProvider();
        } else {
            this.functionProvider();
        }
        return this.out.join("\n\n");
    }

    private seeAlso(indent = ""): string {
        return `${indent}/// See also [${this.names.source}].`;
    }

    private get hashDebug(): string {
        return `${PRODUCT_CHECK} : ${this.names.hash}`;
    }

    // -- function providers --

    private functionProvider(): void {
        const { source, provider, pascal } = this.names;
        const cls = this.flavor.provider;
        this.out.push(
            [
                this.seeAlso(),
                `@ProviderFor(${source})`,
                `final ${provider} = ${cls}.internal(`,
                `  ${source},`,
                `  name: r'${provider}',`,
                "  debugGetCreateSourceHash:",
                `      ${this.hashDebug},`,
                "  dependencies: null,",
                "  allTransitiveDependencies: null,",
                ");",
            ].join("\n"),
        );
        this.out.push([...REF_DEPRECATION, `typedef ${pascal}Ref = ${this.flavor.ref};`].join("\n"));
    }

    // -- notifier classes --

    private buildReturn(): string {
        const value = this.names.value;
        switch (this.variant.flavor) {
            case ProviderFlavor.Future:
                return `FutureOr<${value}>`;
            case ProviderFlavor.Stream:
                return `Stream<${value}>`;
            case ProviderFlavor.Plain:
                return value;
        }
    }

    private unitBase(): void {
        const ad = this.variant.keepAlive ? "" : "AutoDispose";
        const n = this.variant.flavor === ProviderFlavor.Future ? "Async" : this.variant.flavor === ProviderFlavor.Stream ? "Stream" : "";
        const ret = this.buildReturn();
        const lines = [`abstract class _$${this.names.source} extends Buildless${ad}${n}Notifier<${this.names.value}> {`];
        for (const p of this.args) lines.push(`  late final ${typeText(p.type)} ${p.name};`);
        if (this.args.length > 0) lines.push("");

        const call = forward(this.args).join(", ");
        lines.push(
            "  bool _$disposed = false;",
            `  late final ${ret} _$initial = build(${call});`,
            "",
            `  ${parameterList(`${ret} build(`, groups(this.args, declare), ");", "  ")}`,
            "",
            "  /// Runs [build] once per notifier and hands back its first result.",
            `  ${ret} _$runBuild() {`,
            "    _$disposed = false;",
            "    ref.onDispose(() => _$disposed = true);",
            "    return _$initial;",
            "  }",
            "",
            "  @override",
            `  set state(${this.flavor.state} value) {`,
            "    if (_$disposed) {",
            `      throw StateError('${this.names.source} was used after being disposed.');`,
            "    }",
            "    super.state = value;",
            "  }",
            "}",
        );
        this.out.push(lines.join("\n"));
    }

    private runNotifierBuild(): string[] {
        return [
            "  @override",
            `  ${this.buildReturn()} runNotifierBuild(`,
            `    covariant ${this.names.source} notifier,`,
            "  ) {",
            "    return notifier._$runBuild();",
            "  }",
        ];
    }

    private unitProvider(): void {
        const { source, provider, pascal } = this.names;
        const cls = `${pascal}Provider`;
        this.out.push(
            [
                this.seeAlso(),
                `@ProviderFor(${source})`,
                `final ${provider} = ${cls}._();`,
                "",
                this.seeAlso(),
                `class ${cls} extends ${this.flavor.provider} {`,
                `  ${cls}._()`,
                "      : super.internal(",
                `          ${source}.new,`,
                `          name: r'${provider}',`,
                "          debugGetCreateSourceHash:",
                `              ${this.hashDebug},`,
                "          dependencies: null,",
                "          allTransitiveDependencies: null,",
                "        );",
                "",
                ...this.runNotifierBuild(),
                "}",
            ].join("\n"),
        );
    }

    // -- families --

    private get familyName(): string {
        return `${this.names.pascal}Family`;
    }

    private get providerClass(): string {
        return `${this.names.pascal}Provider`;
    }

    private familyConstant(): void {
        this.out.push(
            [this.seeAlso(), `@ProviderFor(${this.names.source})`, `const ${this.names.provider} = ${this.familyName}();`].join("\n"),
        );
    }

    private familyClass(): void {
        const family = this.familyName;
        const cls = this.providerClass;
        this.out.push(
            [
                this.seeAlso(),
                `class ${family} extends Family<${this.flavor.state}> {`,
                this.seeAlso("  "),
                `  const ${family}();`,
                "",
                this.seeAlso("  "),
                `  ${parameterList(`${cls} call(`, groups(this.args, declare), ") {", "  ")}`,
                `    return ${parameterList(`${cls}(`, { positional: forward(this.args) }, ");", "    ")}`,
                "  }",
                "",
                "  @override",
                `  ${cls} getProviderOverride(`,
                `    covariant ${cls} provider,`,
                "  ) {",
                `    return ${parameterList("call(", { positional: forward(this.args, "provider.") }, ");", "    ")}`,
                "  }",
                "",
                "  static const Iterable<ProviderOrFamily>? _dependencies = null;",
                "",
                "  @override",
                "  Iterable<ProviderOrFamily>? get dependencies => _dependencies;",
                "",
                "  static const Iterable<ProviderOrFamily>? _allTransitiveDependencies = null;",
                "",
                "  @override",
                "  Iterable<ProviderOrFamily>? get allTransitiveDependencies =>",
                "      _allTransitiveDependencies;",
                "",
                "  @override",
                `  String? get name => r'${this.names.provider}';`,
                "}",
            ].join("\n"),
        );
    }

    private create(): string {
        const { source, pascal } = this.names;
        if (this.isUnit) {
            const cascade = this.args.map((p) => `..${p.name} = ${p.name}`).join("");
            return `() => ${source}()${cascade}`;
        }
        const args = [`ref as ${pascal}Ref`, ...forward(this.args)];
        return `(ref) => ${source}(\n            ${args.join(",\n            ")},\n          )`;
    }

    private familyProvider(): void {
        const { provider } = this.names;
        const family = this.familyName;
        const cls = this.providerClass;
        const inits = this.args.map((p) => `          ${p.name}: ${p.name},`);

        const lines = [
            this.seeAlso(),
            `class ${cls} extends ${this.flavor.provider} {`,
            this.seeAlso("  "),
            `  ${parameterList(`${cls}(`, groups(this.args, declare), ")", "  ")}`,
            "      : this._internal(",
            `          ${this.create()},`,
            `          from: ${provider},`,
            `          name: r'${provider}',`,
            "          debugGetCreateSourceHash:",
            `              ${this.hashDebug},`,
            `          dependencies: ${family}._dependencies,`,
            "          allTransitiveDependencies:",
            `              ${family}._allTransitiveDependencies,`,
            ...inits,
            "        );",
            "",
            `  ${cls}._internal(`,
            "    super._createNotifier, {",
            "    required super.name,",
            "    required super.dependencies,",
            "    required super.allTransitiveDependencies,",
            "    required super.debugGetCreateSourceHash,",
            "    required super.from,",
            ...this.args.map((p) => `    required this.${p.name},`),
            "  }) : super.internal();",
            "",
            ...this.args.map((p) => `  final ${typeText(p.type)} ${p.name};`),
        ];
        if (this.isUnit) lines.push("", ...this.runNotifierBuild());
        lines.push(
            "",
            "  @override",
            `  ${this.flavor.element} createElement() {`,
            `    return _${cls}Element(this);`,
            "  }",
            "",
            "  @override",
            "  bool operator ==(Object other) {",
            `    return ${[`other is ${cls}`, ...this.args.map(equalsArg)].join(" && ")};`,
            "  }",
            "",
            "  @override",
            "  int get hashCode {",
            "    var hash = _SystemHash.combine(0, runtimeType.hashCode);",
            ...this.args.map((p) => `    hash = _SystemHash.combine(hash, ${hashArg(p)});`),
            "",
            "    return _SystemHash.finish(hash);",
            "  }",
            "}",
        );
        this.out.push(lines.join("\n"));
    }

    private familyRef(): void {
        const { pascal } = this.names;
        const cls = this.providerClass;
        const mixin = [...REF_DEPRECATION, `mixin ${pascal}Ref on ${this.flavor.ref} {`];
        this.args.forEach((p, i) => {
            if (i > 0) mixin.push("");
            mixin.push(`  /// The parameter \`${p.name}\` of this provider.`, `  ${typeText(p.type)} get ${p.name};`);
        });
        mixin.push("}");
        this.out.push(mixin.join("\n"));

        const element = [
            `class _${cls}Element extends ${this.flavor.element}`,
            `    with ${pascal}Ref {`,
            `  _${cls}Element(super.provider);`,
        ];
        for (const p of this.args) {
            element.push("", "  @override", `  ${typeText(p.type)} get ${p.name} => (origin as ${cls}).${p.name};`);
        }
        element.push("}");
        this.out.push(element.join("\n"));
    }
}

/** Collection arguments compare by content so equal argument lists share one cache entry. */
function equalsArg(p: Parameter): string {
    return isCollection(p) ? `const DeepCollectionEquality().equals(other.${p.name}, ${p.name})` : `other.${p.name} == ${p.name}`;
}

function hashArg(p: Parameter): string {
    return isCollection(p) ? `const DeepCollectionEquality().hash(${p.name})` : `${p.name}.hashCode`;
}

/**
 * Emit the providers of one `@riverpod` declaration.
 *
 * A function without a ref parameter cannot be wrapped and produces only an
 * error. Family arguments without a declared type are typed `dynamic`.
 */
export function emitProvider(
    decl: FunctionDeclaration | StatefulUnitDeclaration,
    variant: ProviderVariant,
    options: ProviderOptions = {},
): EmitOutput {
    const scope = { file: options.file };
    if (decl.kind === DeclarationKind.PlainFunction && decl.parameters.length === 0) {
        return emitOutput("", { errors: [new UnsupportedTypeError(decl.name, "ref", "missing", EMITTER, scope)] });
    }
    const args = decl.kind === DeclarationKind.StatefulUnit ? decl.parameters : decl.parameters.slice(1);
    const errors = args
        .filter((p) => p.type === null)
        .map((p) => new UnsupportedTypeError(decl.name, p.name, "dynamic", EMITTER, scope));
    return emitOutput(new ProviderWriter(decl, variant).write(), {
        errors,
        usesSystemHash: variant.isFamily,
        usesDeepEquality: variant.isFamily && args.some(isCollection),
    });
}
