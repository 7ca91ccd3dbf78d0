import { ErrorCode } from "./enums";

/** Zero-based offset plus one-based line and column. */
export interface SourceLocation {
    offset: number;
    line: number;
    column: number;
}

export interface ErrorScope {
    file?: string;
    cause?: unknown;
}

export abstract class DartsmithError extends Error {
    abstract readonly code: ErrorCode;
    readonly file: string | undefined;

    constructor(message: string, scope: ErrorScope = {}) {
        super(message, scope.cause === undefined ? undefined : { cause: scope.cause });
        this.name = new.target.name;
        this.file = scope.file;
    }

    /** Fatal errors end the whole run instead of a single file. */
    get fatal(): boolean {
        return false;
    }
}

// ── File-scoped ─────────────────────────────────────────────────────

export class ParseError extends DartsmithError {
    readonly code = ErrorCode.Parse;

    constructor(
        readonly reason: string,
        readonly location: SourceLocation,
        scope?: ErrorScope,
    ) {
        super(`${location.line}:${location.column}: ${reason}`, scope);
    }
}

export class ConflictError extends DartsmithError {
    readonly code = ErrorCode.Conflict;

    constructor(
        readonly declaration: string,
        readonly markers: readonly string[],
        scope?: ErrorScope,
    ) {
        super(
            `"${declaration}" carries markers that cannot be combined: ${markers.map((m) => `@${m}`).join(", ")}`,
            scope,
        );
    }
}

export class UnsupportedTypeError extends DartsmithError {
    readonly code = ErrorCode.UnsupportedType;

    constructor(
        readonly declaration: string,
        readonly member: string,
        readonly type: string,
        readonly emitter: string,
        scope?: ErrorScope,
        consequence = "member omitted",
    ) {
        super(`${emitter}: "${declaration}.${member}" has unsupported type "${type}"; ${consequence}`, scope);
    }
}

export class WriteError extends DartsmithError {
    readonly code = ErrorCode.Write;

    constructor(
        readonly path: string,
        cause: unknown,
    ) {
        super(`Cannot write "${path}": ${cause instanceof Error ? cause.message : String(cause)}`, {
            file: path,
            cause,
        });
    }
}

// ── Run-scoped ──────────────────────────────────────────────────────

export class ConfigError extends DartsmithError {
    readonly code = ErrorCode.Config;

    override get fatal(): boolean {
        return true;
    }
}

export class WatchError extends DartsmithError {
    readonly code = ErrorCode.Watch;

    override get fatal(): boolean {
        return true;
    }
}

export class LifecycleError extends DartsmithError {
    readonly code = ErrorCode.Lifecycle;
}

// ── Non-thrown diagnostics ──────────────────────────────────────────

/** A partially understood declaration. Emission continues with what was read. */
export interface ExtractionWarning {
    code: ErrorCode.Extraction;
    message: string;
    declaration?: string;
    location?: SourceLocation;
}

export function extractionWarning(
    message: string,
    declaration?: string,
    location?: SourceLocation,
): ExtractionWarning {
    return { code: ErrorCode.Extraction, message, declaration, location };
}
