export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogDetails = Record<string, unknown>;

export interface LogEntry {
    level: LogLevel;
    /** Stage that logged: scan, parse, extract, classify, emit, write, watch or config. */
    code: string;
    message: string;
    details?: LogDetails;
    timestamp: number;
}

export type LogHandler = (entry: LogEntry) => void;

/** Narrow logging surface handed to the pipeline and the coordinator. */
export interface LoggerContext {
    debug(code: string, message: string, details?: LogDetails): void;
    info(code: string, message: string, details?: LogDetails): void;
    warn(code: string, message: string, details?: LogDetails): void;
    error(code: string, message: string, details?: LogDetails): void;
}
