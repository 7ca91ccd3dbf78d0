import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { ConfigError, defineConfig, type JsonOptions, type ResolvedConfig, type VariantKind } from "@dartsmith/core";
import { parse } from "yaml";
import { parseVariants, VARIANT_NAMES, validateInteger } from "../validate";

export const DEFAULT_CONFIG_FILE = "dartsmith.yaml";

/** Flags shared by the commands. cac hands numbers over as numbers or strings. */
export interface CliOptions {
    config?: string;
    input?: string | string[];
    output?: string;
    type?: string;
    deleteConflictingOutputs?: boolean;
    logLevel?: string;
    concurrency?: number | string;
    debounceMs?: number | string;
}

export interface LoadedConfig {
    config: ResolvedConfig;
    /** Absolute path of the config file, null when none was read. */
    configPath: string | null;
    /** Directory of the config file, or the working directory. */
    root: string;
}

/** The `generate:` section of dartsmith.yaml. */
export interface FileOptions {
    input?: string[];
    output?: string | null;
    variants?: VariantKind[];
    json?: Partial<JsonOptions>;
    deleteConflictingOutputs?: boolean;
    concurrency?: number;
    debounceMs?: number;
}

const KNOWN_KEYS = new Set([
    "input",
    "output",
    "freezed",
    "json",
    "riverpod",
    "delete_conflicting_outputs",
    "concurrency",
    "debounce_ms",
]);

// ── File parsing ────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

class FileReader {
    constructor(private readonly path: string) {}

    fail(key: string, expected: string): never {
        throw new ConfigError(`[dartsmith] ${this.path}: "generate.${key}" must be ${expected}`, { file: this.path });
    }

    boolean(section: Record<string, unknown>, key: string): boolean | undefined {
        const value = section[key];
        if (value === undefined || typeof value === "boolean") return value;
        return this.fail(key, "true or false");
    }

    paths(section: Record<string, unknown>, key: string): string[] | undefined {
        const value = section[key];
        if (value === undefined) return undefined;
        if (typeof value === "string") return [value];
        if (Array.isArray(value) && value.length > 0 && value.every((v): v is string => typeof v === "string")) return value;
        return this.fail(key, "a path or a non-empty list of paths");
    }

    json(section: Record<string, unknown>): { enabled: boolean | undefined; options: Partial<JsonOptions> } {
        const value = section.json;
        if (value === undefined || typeof value === "boolean") return { enabled: value, options: {} };
        if (!isRecord(value)) return this.fail("json", "true, false or a mapping");
        const options: Partial<JsonOptions> = {};
        const checked = value.checked;
        const explicit = value.explicit_to_json;
        if (checked !== undefined) {
            if (typeof checked !== "boolean") return this.fail("json.checked", "true or false");
            options.checked = checked;
        }
        if (explicit !== undefined) {
            if (typeof explicit !== "boolean") return this.fail("json.explicit_to_json", "true or false");
            options.explicitToJson = explicit;
        }
        return { enabled: true, options };
    }
}

/**
 * Read the `generate:` section of a dartsmith.yaml text. A variant is on
 * unless its key is `false`; `json` may also be a mapping of codec options.
 */
export function parseConfigFile(text: string, path: string): FileOptions {
    let doc: unknown;
    try {
        doc = parse(text);
    } catch (cause) {
        throw new ConfigError(`[dartsmith] ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { file: path, cause });
    }
    if (doc === null || doc === undefined) return {};
    if (!isRecord(doc)) throw new ConfigError(`[dartsmith] ${path}: expected a mapping at the top level`, { file: path });

    const section = doc.generate;
    if (section === undefined || section === null) return {};
    if (!isRecord(section)) throw new ConfigError(`[dartsmith] ${path}: "generate" must be a mapping`, { file: path });

    const unknown = Object.keys(section).filter((key) => !KNOWN_KEYS.has(key));
    if (unknown.length > 0) {
        throw new ConfigError(`[dartsmith] ${path}: unknown key(s) under "generate": ${unknown.join(", ")}`, { file: path });
    }

    const reader = new FileReader(path);
    const options: FileOptions = {};
    const input = reader.paths(section, "input");
    if (input) options.input = input;

    const output = section.output;
    if (output !== undefined) {
        if (output !== null && typeof output !== "string") reader.fail("output", "a path or null");
        options.output = typeof output === "string" ? output : null;
    }

    const json = reader.json(section);
    if (Object.keys(json.options).length > 0) options.json = json.options;
    const switches = {
        freezed: reader.boolean(section, "freezed"),
        json: json.enabled,
        riverpod: reader.boolean(section, "riverpod"),
    };
    if (Object.values(switches).some((s) => s !== undefined)) {
        options.variants = (["freezed", "json", "riverpod"] as const).filter((n) => switches[n] !== false).map((n) => VARIANT_NAMES[n]);
    }

    const deleteConflicting = reader.boolean(section, "delete_conflicting_outputs");
    if (deleteConflicting !== undefined) options.deleteConflictingOutputs = deleteConflicting;
    const concurrency = validateInteger(`${path}: generate.concurrency`, section.concurrency, 1);
    if (concurrency !== undefined) options.concurrency = concurrency;
    const debounceMs = validateInteger(`${path}: generate.debounce_ms`, section.debounce_ms, 0);
    if (debounceMs !== undefined) options.debounceMs = debounceMs;
    return options;
}

// ── Loading ─────────────────────────────────────────────────────────

/**
 * Resolve the configuration from dartsmith.yaml and the command line.
 * Flags win over file values. Paths in the file are relative to the file's
 * directory; paths given as flags are relative to `cwd`. A missing default
 * config file is fine; a missing explicit one is a ConfigError.
 */
export async function loadConfig(options: CliOptions, cwd: string = process.cwd()): Promise<LoadedConfig> {
    const candidate = resolve(cwd, options.config ?? DEFAULT_CONFIG_FILE);
    let file: FileOptions = {};
    let configPath: string | null = null;
    let root = cwd;

    if (existsSync(candidate)) {
        file = parseConfigFile(await readFile(candidate, "utf-8"), candidate);
        configPath = candidate;
        root = dirname(candidate);
    } else if (options.config !== undefined) {
        throw new ConfigError(`[dartsmith] config file not found: ${candidate}`);
    }

    const flagInputs = options.input === undefined ? undefined : [options.input].flat().map((p) => resolve(cwd, p));
    const config = defineConfig({
        root,
        input: flagInputs ?? file.input ?? ["lib"],
        output: options.output !== undefined ? resolve(cwd, options.output) : file.output,
        variants: options.type !== undefined ? parseVariants(options.type) : file.variants,
        concurrency: validateInteger("--concurrency", options.concurrency, 1) ?? file.concurrency,
        debounceMs: validateInteger("--debounce-ms", options.debounceMs, 0) ?? file.debounceMs,
        deleteConflictingOutputs: options.deleteConflictingOutputs ?? file.deleteConflictingOutputs,
        json: file.json,
    });
    return { config, configPath, root };
}
