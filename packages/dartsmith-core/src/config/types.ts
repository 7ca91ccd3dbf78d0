import type { CompanionKind, VariantKind } from "./enums";

export interface JsonOptions {
    /** Wrap decoding in `$checkedCreate` so bad input names the failing key. */
    checked: boolean;
    /** Call `toJson()` on nested objects instead of handing them to the encoder. */
    explicitToJson: boolean;
}

export interface DefineConfigInput {
    /** Source directories or files, relative to `root`. */
    input: string | readonly string[];
    /** Directory for companions. Omit to write them beside their sources. */
    output?: string | null;
    /** Base for relative paths. Defaults to `process.cwd()`. */
    root?: string;
    variants?: readonly VariantKind[];
    concurrency?: number;
    debounceMs?: number;
    deleteConflictingOutputs?: boolean;
    json?: Partial<JsonOptions>;
}

export type OutputMapping = (sourcePath: string, kind: CompanionKind) => string;

export interface ResolvedConfig {
    root: string;
    inputPaths: readonly string[];
    outputDir: string | null;
    outputMapping: OutputMapping;
    enabledVariants: ReadonlySet<VariantKind>;
    concurrency: number;
    debounceMs: number;
    deleteConflictingOutputs: boolean;
    json: JsonOptions;
}
