import type { LogDetails, LogEntry, LoggerContext, LogHandler, LogLevel } from "./types";

/** Hands every entry to each attached handler, in attach order. */
export class Logger implements LoggerContext {
    private readonly handlers: LogHandler[];

    constructor(handlers: Iterable<LogHandler> = []) {
        this.handlers = [...handlers];
    }

    /** Returns a function that detaches the handler. */
    addHandler(handler: LogHandler): () => void {
        this.handlers.push(handler);
        return () => {
            const at = this.handlers.indexOf(handler);
            if (at !== -1) this.handlers.splice(at, 1);
        };
    }

    log(level: LogLevel, code: string, message: string, details?: LogDetails): void {
        if (this.handlers.length === 0) return;
        const entry: LogEntry = { level, code, message, timestamp: Date.now() };
        if (details !== undefined) entry.details = details;
        for (const handler of this.handlers) handler(entry);
    }

    debug(code: string, message: string, details?: LogDetails): void {
        this.log("debug", code, message, details);
    }

    info(code: string, message: string, details?: LogDetails): void {
        this.log("info", code, message, details);
    }

    warn(code: string, message: string, details?: LogDetails): void {
        this.log("warn", code, message, details);
    }

    error(code: string, message: string, details?: LogDetails): void {
        this.log("error", code, message, details);
    }
}

/** A logger with no handlers. */
export function createSilentLogger(): Logger {
    return new Logger();
}
