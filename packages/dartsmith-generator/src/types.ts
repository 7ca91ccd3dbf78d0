/**
 * Declaration model.
 *
 * The scanner builds these from the syntax tree; the classifier and the
 * emitters consume them. Nothing here refers back to syntax nodes.
 */
import type { CompanionKind, ExtractionWarning, SourceLocation, VariantKind } from "@dartsmith/core";
import type { CollectionKind, DeclarationKind, ProviderFlavor } from "./enums";

// ── Types and parameters ────────────────────────────────────────────

export type TypeShape = "named" | "function" | "record";

export interface TypeDescriptor {
    /** `List`, `int`, `m.Item`. For function and record types, the written type. */
    name: string;
    nullable: boolean;
    args: TypeDescriptor[];
    collection: CollectionKind;
    shape: TypeShape;
    /** Normalized spelling, e.g. `Map<String, List<int>>?`. */
    text: string;
}

export type ParameterKind = "positional" | "optional" | "named";

export interface Marker {
    name: string;
    args: string[];
}

export interface Parameter {
    name: string;
    /** Null when neither the parameter nor its field declares a type. */
    type: TypeDescriptor | null;
    kind: ParameterKind;
    required: boolean;
    defaultValue: string | null;
    markers: Marker[];
}

// ── Declarations ────────────────────────────────────────────────────

interface DeclarationBase {
    name: string;
    markers: Marker[];
    location: SourceLocation;
    /** Source text of the whole declaration, annotations included. */
    source: string;
    warnings: ExtractionWarning[];
}

/** One redirecting factory of a value type: `const factory Result.ok(int v) = ResultOk;`. */
export interface ValueCase {
    /** Constructor name, `null` for the unnamed one. */
    constructorName: string | null;
    /** Redirect target, e.g. `_User`. */
    redirect: string;
    parameters: Parameter[];
    isConst: boolean;
}

export interface ValueTypeDeclaration extends DeclarationBase {
    kind: DeclarationKind.ValueType;
    /** `<T>` when the class is generic. */
    typeParameters: string | null;
    /** Redirecting factories, in declaration order. Empty for plain classes. */
    cases: ValueCase[];
    /** Parameters of the backing constructor: the single case, or the generative constructor. */
    parameters: Parameter[];
    /** A `const X._()` constructor is present, so the implementation must call it. */
    hasPrivateConstructor: boolean;
    hasFromJson: boolean;
    hasToJson: boolean;
}

export interface FunctionDeclaration extends DeclarationBase {
    kind: DeclarationKind.PlainFunction;
    returnType: TypeDescriptor | null;
    parameters: Parameter[];
}

export interface StatefulUnitDeclaration extends DeclarationBase {
    kind: DeclarationKind.StatefulUnit;
    /** Generated base class the unit extends, e.g. `_$Counter`. */
    baseName: string;
    /** Return type of `build`. */
    returnType: TypeDescriptor | null;
    /** Parameters of `build`. */
    parameters: Parameter[];
}

export type Declaration = ValueTypeDeclaration | FunctionDeclaration | StatefulUnitDeclaration;

export interface EnumInfo {
    name: string;
    values: string[];
}

/** Everything the scanner pulls out of one source file. */
export interface ExtractedFile {
    path: string;
    declarations: Declaration[];
    enums: EnumInfo[];
    parts: string[];
    imports: string[];
    warnings: ExtractionWarning[];
}

// ── Classification ──────────────────────────────────────────────────

/** Per-declaration `@JsonSerializable(...)` overrides. */
export interface JsonAnnotationOptions {
    checked?: boolean;
    explicitToJson?: boolean;
    includeIfNull?: boolean;
}

export type GenerationVariant =
    | { kind: VariantKind.Immutable; withJson: boolean; json: JsonAnnotationOptions }
    | { kind: VariantKind.JsonCodec; json: JsonAnnotationOptions }
    | {
          kind: VariantKind.Provider;
          isFamily: boolean;
          isUnit: boolean;
          keepAlive: boolean;
          flavor: ProviderFlavor;
      };

export interface ClassifiedDeclaration {
    declaration: Declaration;
    variant: GenerationVariant;
}

// ── Emission ────────────────────────────────────────────────────────

export interface EmissionResult {
    path: string;
    kind: CompanionKind;
    text: string;
    /** `source#Declaration` for every declaration in the file. */
    declarations: string[];
}
