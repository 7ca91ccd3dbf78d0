// ── Config ──────────────────────────────────────────────────────────
export { DEFAULT_DEBOUNCE_MS, defineConfig } from "./config/define-config";
export { CompanionKind, VariantKind } from "./config/enums";
export { companionFileName, createOutputMapping, isGeneratedPath } from "./config/output-mapping";
export type { DefineConfigInput, JsonOptions, OutputMapping, ResolvedConfig } from "./config/types";
// ── Errors ──────────────────────────────────────────────────────────
export { ErrorCode } from "./core/errors/enums";
export {
    ConfigError,
    ConflictError,
    DartsmithError,
    extractionWarning,
    LifecycleError,
    ParseError,
    UnsupportedTypeError,
    WatchError,
    WriteError,
} from "./core/errors/errors";
export type { ErrorScope, ExtractionWarning, SourceLocation } from "./core/errors/errors";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler, formatDetails } from "./core/logger/console-handler";
export type { ConsoleHandlerOptions } from "./core/logger/console-handler";
export { createSilentLogger, Logger } from "./core/logger/logger";
export type { LogDetails, LogEntry, LoggerContext, LogHandler, LogLevel } from "./core/logger/types";
// ── Report ──────────────────────────────────────────────────────────
export {
    emptyCounts,
    emptyReport,
    errorToDiagnostic,
    exitCodeFor,
    ReportBuilder,
    summarizeReport,
    warningToDiagnostic,
} from "./core/report/report";
export type { Diagnostic, RunReport, Severity, VariantCounts } from "./core/report/types";
// ── State machine ───────────────────────────────────────────────────
export { StateMachine } from "./core/state-machine/state-machine";
export type { StateMachineConfig, TransitionListener } from "./core/state-machine/types";
