import type { VariantKind } from "../../config/enums";
import type { SourceLocation } from "../errors/errors";

export type Severity = "warning" | "error";

export interface Diagnostic {
    severity: Severity;
    code: string;
    message: string;
    file?: string;
    declaration?: string;
    location?: SourceLocation;
}

export type VariantCounts = Record<VariantKind, number>;

export interface RunReport {
    filesProcessed: number;
    /** Declarations that produced output, by variant. */
    declarationsEmittedByVariant: VariantCounts;
    /** Companion files that received output from a variant. */
    companionsByVariant: VariantCounts;
    filesWritten: number;
    filesUnchanged: number;
    filesRemoved: number;
    warnings: Diagnostic[];
    errors: Diagnostic[];
    /** Set when configuration or the change stream failed. */
    fatal: boolean;
}
