// ── Pipeline ────────────────────────────────────────────────────────
export { classify, classifyAll } from "./classifier";
export type { Classification, ClassifiedFile } from "./classifier";
export { RegenerationCoordinator } from "./coordinator";
export type { ChangeNotification, CoordinatorOptions } from "./coordinator";
export { generate } from "./generator";
export type { GeneratorInput, GeneratorOutput } from "./generator";
export { discoverGenerated, discoverSources, scanSource } from "./scanner";
export { OutputWriter } from "./writer";
export type { RemoveOutcome, WriteOutcome } from "./writer";
// ── Emitters ────────────────────────────────────────────────────────
export { emitFreezed } from "./emitters/freezed";
export type { FreezedOptions } from "./emitters/freezed";
export { emitEnumMap, emitJson } from "./emitters/json";
export type { JsonEmitOptions } from "./emitters/json";
export { emitProvider, sourceHash } from "./emitters/riverpod";
export type { ProviderOptions, ProviderVariant } from "./emitters/riverpod";
// ── Model ───────────────────────────────────────────────────────────
export { ChangeKind, CollectionKind, DeclarationKind, ProviderFlavor } from "./enums";
export type {
    ClassifiedDeclaration,
    Declaration,
    EmissionResult,
    EnumInfo,
    ExtractedFile,
    FunctionDeclaration,
    GenerationVariant,
    Marker,
    Parameter,
    ParameterKind,
    StatefulUnitDeclaration,
    TypeDescriptor,
    ValueCase,
    ValueTypeDeclaration,
} from "./types";
export { loadDartGrammar, parseDart } from "./grammar";
