import { basename, relative } from "node:path";
import { type Diagnostic, type LogEntry, Logger, type RunReport, summarizeReport } from "@dartsmith/core";

// ── ANSI constants ──────────────────────────────────────────────────

const yellow = "\x1b[33m";
const green = "\x1b[32m";
const cyan = "\x1b[36m";
const red = "\x1b[31m";
const magenta = "\x1b[35m";
const dim = "\x1b[90m";
const bold = "\x1b[1m";
const reset = "\x1b[0m";

// ── Log level gating ────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
    return levels[currentLevel] <= levels[level];
}

// ── Basic log functions ─────────────────────────────────────────────

export function info(msg: string): void {
    if (!enabled("info")) return;
    console.log(`  ${dim}▸${reset} ${msg}`);
}

export function warn(msg: string): void {
    if (!enabled("warn")) return;
    console.log(`  ${yellow}⚠ ${msg}${reset}`);
}

export function error(msg: string): void {
    if (!enabled("error")) return;
    console.error(`  ${red}✗ ${msg}${reset}`);
}

export function note(msg: string): void {
    if (!enabled("info")) return;
    console.log(`    ${dim}${msg}${reset}`);
}

// ── Timer ───────────────────────────────────────────────────────────

export function startTimer(): () => string {
    const startedAt = Date.now();
    return () => formatDuration(Date.now() - startedAt);
}

export function formatDuration(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    const seconds = ms / 1000;
    if (seconds < 60) return `${seconds.toFixed(1)}s`;
    const minutes = Math.floor(seconds / 60);
    const rest = Math.round(seconds % 60)
        .toString()
        .padStart(2, "0");
    return `${minutes}m${rest}s`;
}

// ── Step output with dot-leaders ────────────────────────────────────

const STEP_WIDTH = 26;

export function step(label: string, duration: string, extra?: string): void {
    if (!enabled("info")) return;
    const dots = "·".repeat(Math.max(2, STEP_WIDTH - label.length - 1));
    const suffix = extra ? `  ${dim}${extra}${reset}` : "";
    console.log(`  ${label} ${dim}${dots}${reset} ${green}✓${reset} ${green}${duration.padStart(5)}${reset}${suffix}`);
}

export function stepFail(label: string, message: string): void {
    const dots = "·".repeat(Math.max(2, STEP_WIDTH - label.length - 1));
    console.error(`  ${label} ${dim}${dots}${reset} ${red}✗ ${message}${reset}`);
}

// ── Runtime event log (timestamped) ─────────────────────────────────

function colorRuntimeMessage(msg: string): string {
    if (msg.startsWith("wrote")) return `${green}wrote${reset}${msg.slice("wrote".length)}`;
    if (msg.startsWith("removed")) return `${yellow}removed${reset}${msg.slice("removed".length)}`;
    if (msg.startsWith("configuration")) return `${magenta}${msg}${reset}`;
    if (msg.startsWith("failed")) return `${red}${msg}${reset}`;
    return msg;
}

function formatTime(d: Date): string {
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

export function runtimeLog(scope: string, msg: string): void {
    if (!enabled("info")) return;
    console.log(`${dim}${formatTime(new Date())}${reset} ${yellow}[dartsmith]${reset} ${dim}(${scope})${reset} ${colorRuntimeMessage(msg)}`);
}

// ── Header and footer ───────────────────────────────────────────────

export function header(command: string, root: string): void {
    if (!enabled("info")) return;
    console.log(`\n${bold}${yellow}⚡ dartsmith ${command}${reset} → ${cyan}${basename(root)}${reset}\n`);
}

export function footer(message: string): void {
    if (!enabled("info")) return;
    console.log(`\n  ${bold}${green}✓ ${message}${reset}\n`);
}

// ── Core logger bridge ──────────────────────────────────────────────

/**
 * A core Logger that prints pipeline and coordinator entries. Write events
 * go through {@link runtimeLog}; debug entries show only at the debug level.
 */
export function createRunLogger(): Logger {
    return new Logger([
        (entry: LogEntry) => {
            switch (entry.level) {
                case "debug":
                    if (enabled("debug")) console.log(`    ${dim}(${entry.code}) ${entry.message}${reset}`);
                    return;
                case "info":
                    runtimeLog(entry.code, entry.code === "write" && !entry.message.startsWith("removed") ? `wrote ${entry.message}` : entry.message);
                    return;
                case "warn":
                    warn(entry.message);
                    return;
                case "error":
                    error(entry.message);
                    return;
            }
        },
    ]);
}

// ── Reports ─────────────────────────────────────────────────────────

/** `lib/user.dart:6:1: message`, relative to the project root. */
export function formatDiagnostic(diagnostic: Diagnostic, root: string): string {
    if (diagnostic.file === undefined) return diagnostic.message;
    const location = diagnostic.location ? `:${diagnostic.location.line}:${diagnostic.location.column}` : "";
    return `${relative(root, diagnostic.file) || diagnostic.file}${location}: ${diagnostic.message}`;
}

export function logDiagnostics(report: RunReport, root: string): void {
    for (const diagnostic of report.warnings) warn(formatDiagnostic(diagnostic, root));
    for (const diagnostic of report.errors) error(formatDiagnostic(diagnostic, root));
}

/** Print warnings and errors of a run, then its summary lines. */
export function logReport(report: RunReport, root: string): void {
    logDiagnostics(report, root);
    for (const line of summarizeReport(report)) info(line);
}
