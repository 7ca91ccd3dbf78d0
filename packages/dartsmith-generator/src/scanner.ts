/**
 * Declaration extractor.
 *
 * Walks a parsed Dart file and builds the declaration model: value types,
 * provider functions and stateful units, plus the enums and `part`
 * directives the emitters need. Discovery of source files uses tinyglobby.
 */

import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import { ConfigError, type ExtractionWarning, extractionWarning, isGeneratedPath } from "@dartsmith/core";
import { glob } from "tinyglobby";
import { parseDart } from "./grammar/reader";
import type {
    AnnotationNode,
    ClassNode,
    CompilationUnit,
    ConstructorNode,
    FunctionNode,
    MethodNode,
    ParameterNode,
    Span,
    TypeNode,
} from "./grammar/types";
import { CollectionKind, DeclarationKind } from "./enums";
import type {
    Declaration,
    EnumInfo,
    ExtractedFile,
    FunctionDeclaration,
    Marker,
    Parameter,
    StatefulUnitDeclaration,
    TypeDescriptor,
    ValueCase,
    ValueTypeDeclaration,
} from "./types";

// ── File discovery ──────────────────────────────────────────────────

const IGNORE = ["**/.dart_tool/**", "**/build/**", "**/.git/**"];

/**
 * List the Dart sources below the input paths, sorted, without generated
 * companions. An input path may be a directory or a single file.
 */
export async function discoverSources(inputPaths: readonly string[]): Promise<string[]> {
    const found = new Set<string>();
    for (const inputPath of inputPaths) {
        const info = await stat(inputPath).catch((cause: unknown) => {
            throw new ConfigError(`[dartsmith] input path "${inputPath}" cannot be read`, { cause });
        });
        if (info.isFile()) {
            if (inputPath.endsWith(".dart") && !isGeneratedPath(inputPath)) found.add(resolve(inputPath));
            continue;
        }
        const paths = await glob(["**/*.dart"], { cwd: inputPath, absolute: true, ignore: IGNORE });
        for (const path of paths) {
            if (!isGeneratedPath(path)) found.add(resolve(path));
        }
    }
    return [...found].sort();
}

/** List existing `*.g.dart` and `*.freezed.dart` files below `roots`. Missing roots are skipped. */
export async function discoverGenerated(roots: readonly string[]): Promise<string[]> {
    const found = new Set<string>();
    for (const root of roots) {
        const info = await stat(root).catch(() => null);
        if (info === null || !info.isDirectory()) continue;
        const paths = await glob(["**/*.g.dart", "**/*.freezed.dart"], { cwd: root, absolute: true, ignore: IGNORE });
        for (const path of paths) found.add(resolve(path));
    }
    return [...found].sort();
}

// ── Types ───────────────────────────────────────────────────────────

const COLLECTIONS: Record<string, CollectionKind> = {
    List: CollectionKind.List,
    Map: CollectionKind.Map,
    Set: CollectionKind.Set,
};

export function describeType(node: TypeNode): TypeDescriptor {
    if (node.kind === "named-type") {
        const args = node.args.map(describeType);
        const argText = args.length > 0 ? `<${args.map((a) => a.text).join(", ")}>` : "";
        return {
            name: node.name,
            nullable: node.nullable,
            args,
            collection: COLLECTIONS[node.name] ?? CollectionKind.None,
            shape: "named",
            text: `${node.name}${argText}${node.nullable ? "?" : ""}`,
        };
    }
    return {
        name: node.nullable ? node.text.replace(/\?$/, "") : node.text,
        nullable: node.nullable,
        args: [],
        collection: CollectionKind.None,
        shape: node.kind === "function-type" ? "function" : "record",
        text: node.text,
    };
}

// ── Markers ─────────────────────────────────────────────────────────

/** `@f.Freezed()` → `Freezed`. */
export function markerName(name: string): string {
    const dot = name.lastIndexOf(".");
    return dot === -1 ? name : name.slice(dot + 1);
}

function toMarkers(annotations: AnnotationNode[]): Marker[] {
    return annotations.map((a) => ({ name: markerName(a.name), args: a.args ?? [] }));
}

const IGNORED_MARKERS = new Set(["override", "immutable", "protected", "visibleForTesting", "Deprecated", "deprecated"]);

function hasGenerationMarker(markers: Marker[]): boolean {
    return markers.some((m) => !IGNORED_MARKERS.has(m.name));
}

// ── Parameters ──────────────────────────────────────────────────────

class ParameterReader {
    readonly warnings: ExtractionWarning[] = [];

    constructor(
        private readonly declaration: string,
        private readonly fields: ReadonlyMap<string, FieldInfo> = new Map(),
    ) {}

    read(nodes: ParameterNode[]): Parameter[] {
        const seen = new Set<string>();
        const params: Parameter[] = [];
        for (const node of nodes) {
            if (node.isSuper) {
                this.warn(`super parameter "${node.name}" is not supported and was skipped`, node);
                continue;
            }
            if (seen.has(node.name)) {
                this.warn(`duplicate parameter "${node.name}" was skipped`, node);
                continue;
            }
            seen.add(node.name);

            const field = node.isField ? this.fields.get(node.name) : undefined;
            const markers = [...toMarkers(node.annotations), ...(field?.markers ?? [])];
            let type = node.type ? describeType(node.type) : null;
            if (type === null) type = field?.type ?? null;
            if (type === null) this.warn(`parameter "${node.name}" has no declared type`, node);

            params.push({
                name: node.name,
                type,
                kind: node.section,
                required: node.required,
                defaultValue: node.defaultValue ?? defaultFromMarker(markers),
                markers,
            });
        }
        return params;
    }

    warn(message: string, node: { span: Span }): void {
        this.warnings.push(extractionWarning(message, this.declaration, node.span.location));
    }
}

function defaultFromMarker(markers: Marker[]): string | null {
    const marker = markers.find((m) => m.name === "Default");
    return marker?.args[0] ?? null;
}

interface FieldInfo {
    type: TypeDescriptor | null;
    markers: Marker[];
}

/** Instance fields by name, for `this.x` parameters. */
function fieldsOf(node: ClassNode): Map<string, FieldInfo> {
    const fields = new Map<string, FieldInfo>();
    for (const member of node.members) {
        if (member.kind !== "field" || member.modifiers.includes("static")) continue;
        const info = { type: member.type ? describeType(member.type) : null, markers: toMarkers(member.annotations) };
        for (const { name } of member.names) fields.set(name, info);
    }
    return fields;
}

// ── Declarations ────────────────────────────────────────────────────

function sourceOf(unit: CompilationUnit, span: { start: number; end: number }): string {
    return unit.source.slice(span.start, span.end);
}

function constructorsOf(node: ClassNode): ConstructorNode[] {
    return node.members.filter((m): m is ConstructorNode => m.kind === "constructor");
}

function methodsOf(node: ClassNode): MethodNode[] {
    return node.members.filter((m): m is MethodNode => m.kind === "method");
}

function isUnitClass(node: ClassNode): boolean {
    const base = node.superclass;
    if (base?.kind !== "named-type" || base.name !== `_$${node.name}`) return false;
    return methodsOf(node).some((m) => m.name === "build" && !m.isStatic && m.accessor === null);
}

function extractUnit(unit: CompilationUnit, node: ClassNode, markers: Marker[]): StatefulUnitDeclaration {
    const reader = new ParameterReader(node.name);
    const build = methodsOf(node).find((m) => m.name === "build" && !m.isStatic);
    const parameters = build ? reader.read(build.parameters) : [];
    if (build && build.returnType === null) {
        reader.warn("build() has no declared return type", build);
    }
    return {
        kind: DeclarationKind.StatefulUnit,
        name: node.name,
        baseName: `_$${node.name}`,
        returnType: build?.returnType ? describeType(build.returnType) : null,
        parameters,
        markers,
        location: node.span.location,
        source: sourceOf(unit, node.span),
        warnings: reader.warnings,
    };
}

function extractValueType(unit: CompilationUnit, node: ClassNode, markers: Marker[]): ValueTypeDeclaration {
    const reader = new ParameterReader(node.name, fieldsOf(node));
    const ctors = constructorsOf(node);
    const methods = methodsOf(node);

    const cases: ValueCase[] = [];
    for (const ctor of ctors) {
        if (!ctor.isFactory || ctor.redirect === null) continue;
        if (ctor.redirect.kind !== "named-type") {
            reader.warn(`factory ${ctor.name ?? node.name} redirects to an unsupported target`, ctor);
            continue;
        }
        cases.push({
            constructorName: ctor.name,
            redirect: ctor.redirect.name,
            parameters: reader.read(ctor.parameters),
            isConst: ctor.isConst,
        });
    }

    let parameters: Parameter[] = [];
    const first = cases[0];
    if (cases.length === 1 && first !== undefined) {
        parameters = first.parameters;
    } else if (cases.length === 0) {
        const generative =
            ctors.find((c) => !c.isFactory && c.name === null) ?? ctors.find((c) => !c.isFactory && c.name !== "_");
        if (generative) parameters = reader.read(generative.parameters);
    }

    const hasFromJson =
        ctors.some((c) => c.isFactory && c.name === "fromJson") ||
        methods.some((m) => m.isStatic && m.name === "fromJson");

    return {
        kind: DeclarationKind.ValueType,
        name: node.name,
        typeParameters: node.typeParameters,
        cases,
        parameters,
        hasPrivateConstructor: ctors.some((c) => !c.isFactory && c.name === "_"),
        hasFromJson,
        hasToJson: methods.some((m) => m.name === "toJson" && !m.isStatic),
        markers,
        location: node.span.location,
        source: sourceOf(unit, node.span),
        warnings: reader.warnings,
    };
}

function extractFunction(unit: CompilationUnit, node: FunctionNode, markers: Marker[]): FunctionDeclaration {
    const reader = new ParameterReader(node.name);
    const parameters = reader.read(node.parameters);
    if (node.returnType === null) reader.warn("function has no declared return type", node);
    return {
        kind: DeclarationKind.PlainFunction,
        name: node.name,
        returnType: node.returnType ? describeType(node.returnType) : null,
        parameters,
        markers,
        location: node.span.location,
        source: sourceOf(unit, node.span),
        warnings: reader.warnings,
    };
}

/**
 * Build the declaration model of one parsed file.
 *
 * Only declarations carrying at least one annotation other than the
 * standard ones (`@override`, `@immutable`, ...) are returned.
 */
export function extractDeclarations(unit: CompilationUnit, path: string): ExtractedFile {
    const declarations: Declaration[] = [];
    const enums: EnumInfo[] = [];
    const warnings: ExtractionWarning[] = [];

    for (const node of unit.declarations) {
        if (node.kind === "enum") {
            enums.push({ name: node.name, values: node.values });
            continue;
        }
        const markers = toMarkers(node.annotations);
        if (!hasGenerationMarker(markers)) continue;

        switch (node.kind) {
            case "class":
                declarations.push(
                    isUnitClass(node) ? extractUnit(unit, node, markers) : extractValueType(unit, node, markers),
                );
                break;
            case "function":
                declarations.push(extractFunction(unit, node, markers));
                break;
            case "opaque":
                warnings.push(
                    extractionWarning(
                        `annotated ${node.keyword} declarations are not generated`,
                        node.name ?? undefined,
                        node.span.location,
                    ),
                );
                break;
        }
    }

    for (const declaration of declarations) warnings.push(...declaration.warnings);

    const parts: string[] = [];
    const imports: string[] = [];
    for (const directive of unit.directives) {
        if (directive.uri === null) continue;
        if (directive.keyword === "part") parts.push(directive.uri);
        if (directive.keyword === "import") imports.push(directive.uri);
    }

    return { path, declarations, enums, parts, imports, warnings };
}

/**
 * Parse and extract one source text. Throws ParseError on malformed input.
 * The Dart grammar must be loaded first (`loadDartGrammar()`).
 */
export function scanSource(source: string, path: string): ExtractedFile {
    return extractDeclarations(parseDart(source, path), path);
}
