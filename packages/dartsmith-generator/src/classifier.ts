import {
    ConflictError,
    type DartsmithError,
    type ExtractionWarning,
    extractionWarning,
    VariantKind,
} from "@dartsmith/core";
import { DeclarationKind, ProviderFlavor } from "./enums";
import type {
    ClassifiedDeclaration,
    Declaration,
    GenerationVariant,
    JsonAnnotationOptions,
    Marker,
    TypeDescriptor,
} from "./types";

// ── Marker table ────────────────────────────────────────────────────

const MARKER_VARIANT = new Map<string, VariantKind>([
    ["freezed", VariantKind.Immutable],
    ["Freezed", VariantKind.Immutable],
    ["JsonSerializable", VariantKind.JsonCodec],
    ["riverpod", VariantKind.Provider],
    ["Riverpod", VariantKind.Provider],
]);

function isJsonFlag(name: string): name is keyof JsonAnnotationOptions {
    return name === "checked" || name === "explicitToJson" || name === "includeIfNull";
}

/** Read `name: true|false` arguments of a marker. Other arguments are ignored. */
export function booleanArgs(marker: Marker): Map<string, boolean> {
    const flags = new Map<string, boolean>();
    for (const arg of marker.args) {
        const match = /^(\w+)\s*:\s*(true|false)$/.exec(arg);
        if (match?.[1] !== undefined) flags.set(match[1], match[2] === "true");
    }
    return flags;
}

function jsonOptions(markers: Marker[]): JsonAnnotationOptions {
    const options: JsonAnnotationOptions = {};
    const marker = markers.find((m) => m.name === "JsonSerializable");
    if (!marker) return options;
    for (const [name, value] of booleanArgs(marker)) {
        if (isJsonFlag(name)) options[name] = value;
    }
    return options;
}

export function providerFlavor(returnType: TypeDescriptor | null): ProviderFlavor {
    switch (returnType?.name) {
        case "Future":
        case "FutureOr":
            return ProviderFlavor.Future;
        case "Stream":
            return ProviderFlavor.Stream;
        default:
            return ProviderFlavor.Plain;
    }
}

// ── Classification ──────────────────────────────────────────────────

export type Classification =
    | { outcome: "variant"; variant: GenerationVariant }
    | { outcome: "none" }
    | { outcome: "skipped"; warning: ExtractionWarning };

/**
 * Resolve a declaration's markers to at most one generation variant.
 *
 * Throws ConflictError when the provider marker is combined with a value
 * or JSON marker.
 */
export function classify(declaration: Declaration, file?: string): Classification {
    const recognized = declaration.markers.filter((m) => MARKER_VARIANT.has(m.name));
    const kinds = new Set(recognized.map((m) => MARKER_VARIANT.get(m.name)));
    if (kinds.size === 0) return { outcome: "none" };

    if (kinds.has(VariantKind.Provider) && kinds.size > 1) {
        throw new ConflictError(
            declaration.name,
            recognized.map((m) => m.name),
            { file },
        );
    }

    const skip = (reason: string): Classification => ({
        outcome: "skipped",
        warning: extractionWarning(reason, declaration.name, declaration.location),
    });

    if (kinds.has(VariantKind.Provider)) {
        if (declaration.kind === DeclarationKind.ValueType) {
            return skip(`@riverpod class ${declaration.name} must extend _$${declaration.name} and define build()`);
        }
        const marker = recognized.find((m) => MARKER_VARIANT.get(m.name) === VariantKind.Provider);
        const isUnit = declaration.kind === DeclarationKind.StatefulUnit;
        // A provider function's first parameter is its ref; anything after it makes a family.
        const isFamily = isUnit ? declaration.parameters.length > 0 : declaration.parameters.length > 1;
        return {
            outcome: "variant",
            variant: {
                kind: VariantKind.Provider,
                isFamily,
                isUnit,
                keepAlive: marker ? booleanArgs(marker).get("keepAlive") === true : false,
                flavor: providerFlavor(declaration.returnType),
            },
        };
    }

    if (declaration.kind !== DeclarationKind.ValueType) {
        return skip(`@${recognized[0]?.name ?? "freezed"} applies to classes only`);
    }

    const json = jsonOptions(declaration.markers);
    if (kinds.has(VariantKind.Immutable)) {
        if (declaration.cases.length === 0) {
            return skip(`@freezed class ${declaration.name} has no redirecting factory constructor`);
        }
        const withJson = declaration.hasFromJson || kinds.has(VariantKind.JsonCodec);
        return { outcome: "variant", variant: { kind: VariantKind.Immutable, withJson, json } };
    }
    return { outcome: "variant", variant: { kind: VariantKind.JsonCodec, json } };
}

export interface ClassifiedFile {
    classified: ClassifiedDeclaration[];
    warnings: ExtractionWarning[];
    errors: DartsmithError[];
}

/** Classify every declaration of a file. A conflict skips only its own declaration. */
export function classifyAll(declarations: readonly Declaration[], file?: string): ClassifiedFile {
    const result: ClassifiedFile = { classified: [], warnings: [], errors: [] };
    for (const declaration of declarations) {
        try {
            const classification = classify(declaration, file);
            if (classification.outcome === "variant") {
                result.classified.push({ declaration, variant: classification.variant });
            } else if (classification.outcome === "skipped") {
                result.warnings.push(classification.warning);
            }
        } catch (error) {
            if (!(error instanceof ConflictError)) throw error;
            result.errors.push(error);
        }
    }
    return result;
}
