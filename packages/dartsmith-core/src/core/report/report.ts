import { VariantKind } from "../../config/enums";
import { DartsmithError, type ExtractionWarning } from "../errors/errors";
import type { Diagnostic, RunReport, VariantCounts } from "./types";

const VARIANT_LABEL: Record<VariantKind, string> = {
    [VariantKind.Immutable]: "immutable values",
    [VariantKind.JsonCodec]: "JSON codecs",
    [VariantKind.Provider]: "providers",
};

export function emptyCounts(): VariantCounts {
    return { [VariantKind.Immutable]: 0, [VariantKind.JsonCodec]: 0, [VariantKind.Provider]: 0 };
}

export function emptyReport(): RunReport {
    return {
        filesProcessed: 0,
        declarationsEmittedByVariant: emptyCounts(),
        companionsByVariant: emptyCounts(),
        filesWritten: 0,
        filesUnchanged: 0,
        filesRemoved: 0,
        warnings: [],
        errors: [],
        fatal: false,
    };
}

/** Turn anything thrown inside a file's pipeline into a diagnostic. */
export function errorToDiagnostic(error: unknown, file?: string): Diagnostic {
    if (error instanceof DartsmithError) {
        const diagnostic: Diagnostic = { severity: "error", code: error.code, message: error.message };
        const scopedFile = error.file ?? file;
        if (scopedFile !== undefined) diagnostic.file = scopedFile;
        if ("declaration" in error && typeof error.declaration === "string") {
            diagnostic.declaration = error.declaration;
        }
        if ("location" in error && isLocation(error.location)) {
            diagnostic.location = error.location;
        }
        return diagnostic;
    }
    const message = error instanceof Error ? error.message : String(error);
    return file === undefined
        ? { severity: "error", code: "internal", message }
        : { severity: "error", code: "internal", message, file };
}

export function warningToDiagnostic(warning: ExtractionWarning, file?: string): Diagnostic {
    const diagnostic: Diagnostic = { severity: "warning", code: warning.code, message: warning.message };
    if (file !== undefined) diagnostic.file = file;
    if (warning.declaration !== undefined) diagnostic.declaration = warning.declaration;
    if (warning.location !== undefined) diagnostic.location = warning.location;
    return diagnostic;
}

function isLocation(value: unknown): value is Diagnostic["location"] {
    return typeof value === "object" && value !== null && "line" in value && "column" in value;
}

/** Accumulates the outcome of one batch or watch pass. */
export class ReportBuilder {
    private readonly report: RunReport = emptyReport();

    fileProcessed(): this {
        this.report.filesProcessed += 1;
        return this;
    }

    declarationEmitted(variant: VariantKind, count = 1): this {
        this.report.declarationsEmittedByVariant[variant] += count;
        return this;
    }

    companionEmitted(variant: VariantKind): this {
        this.report.companionsByVariant[variant] += 1;
        return this;
    }

    written(outcome: "written" | "unchanged" | "removed"): this {
        if (outcome === "written") this.report.filesWritten += 1;
        else if (outcome === "unchanged") this.report.filesUnchanged += 1;
        else this.report.filesRemoved += 1;
        return this;
    }

    add(diagnostic: Diagnostic): this {
        if (diagnostic.severity === "error") this.report.errors.push(diagnostic);
        else this.report.warnings.push(diagnostic);
        return this;
    }

    fail(error: unknown, file?: string): this {
        this.add(errorToDiagnostic(error, file));
        if (error instanceof DartsmithError && error.fatal) this.report.fatal = true;
        return this;
    }

    merge(other: RunReport): this {
        const r = this.report;
        r.filesProcessed += other.filesProcessed;
        r.filesWritten += other.filesWritten;
        r.filesUnchanged += other.filesUnchanged;
        r.filesRemoved += other.filesRemoved;
        for (const variant of Object.values(VariantKind)) {
            r.declarationsEmittedByVariant[variant] += other.declarationsEmittedByVariant[variant];
            r.companionsByVariant[variant] += other.companionsByVariant[variant];
        }
        r.warnings.push(...other.warnings);
        r.errors.push(...other.errors);
        r.fatal ||= other.fatal;
        return this;
    }

    build(): RunReport {
        const r = this.report;
        return {
            ...r,
            declarationsEmittedByVariant: { ...r.declarationsEmittedByVariant },
            companionsByVariant: { ...r.companionsByVariant },
            warnings: [...r.warnings],
            errors: [...r.errors],
        };
    }
}

/** Human-readable lines, one per variant that produced output. */
export function summarizeReport(report: RunReport): string[] {
    const lines: string[] = [];
    for (const variant of Object.values(VariantKind)) {
        const count = report.companionsByVariant[variant];
        if (count === 0) continue;
        lines.push(`Generated ${count} companion file${count === 1 ? "" : "s"} for ${VARIANT_LABEL[variant]}`);
    }
    if (lines.length === 0) lines.push("Nothing to generate");
    return lines;
}

/** 1 when a fatal or file-level error occurred, 0 otherwise. */
export function exitCodeFor(report: RunReport): number {
    return report.fatal || report.errors.length > 0 ? 1 : 0;
}
