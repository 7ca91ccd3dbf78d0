import type { LogDetails, LogEntry, LogHandler, LogLevel } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const yellow = "\x1b[33m";
const red = "\x1b[31m";
const reset = "\x1b[0m";

const rank: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const levelColor: Record<LogLevel, string> = { debug: dim, info: cyan, warn: yellow, error: red };

export interface ConsoleHandlerOptions {
    /** Entries below this level are dropped. Defaults to "debug". */
    minLevel?: LogLevel;
    /** ANSI colors around the level tag. Defaults to true. */
    color?: boolean;
}

function formatTime(ts: number): string {
    const d = new Date(ts);
    return [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":");
}

/** `key=value` pairs; strings stay bare unless they contain spaces. */
export function formatDetails(details: LogDetails): string {
    return Object.entries(details)
        .map(([key, value]) => {
            const text = typeof value === "string" && !/\s/.test(value) ? value : JSON.stringify(value) ?? String(value);
            return `${key}=${text}`;
        })
        .join(" ");
}

/** Renders `HH:MM:SS [level] code → message key=value` to the console stream of its level. */
export function createConsoleHandler(options: ConsoleHandlerOptions = {}): LogHandler {
    const threshold = rank[options.minLevel ?? "debug"];
    const color = options.color ?? true;

    return (entry: LogEntry) => {
        if (rank[entry.level] < threshold) return;

        const tag = color ? `${levelColor[entry.level]}[${entry.level}]${reset}` : `[${entry.level}]`;
        const details = entry.details ? ` ${formatDetails(entry.details)}` : "";
        const line = `${formatTime(entry.timestamp)} ${tag} ${entry.code} → ${entry.message}${details}`;

        switch (entry.level) {
            case "error":
                console.error(line);
                break;
            case "warn":
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    };
}
