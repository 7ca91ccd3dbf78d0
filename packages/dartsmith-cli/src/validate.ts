import { ConfigError, VariantKind } from "@dartsmith/core";
import { LOG_LEVELS, type LogLevel, warn } from "./dev/logger";

/** Names the command line and dartsmith.yaml use for each variant. */
export const VARIANT_NAMES = {
    freezed: VariantKind.Immutable,
    json: VariantKind.JsonCodec,
    riverpod: VariantKind.Provider,
} as const satisfies Record<string, VariantKind>;

type VariantName = keyof typeof VARIANT_NAMES;

function isVariantName(name: string): name is VariantName {
    return Object.hasOwn(VARIANT_NAMES, name);
}

// ── --type ──────────────────────────────────────────────────────────

/** `freezed`, `json,riverpod` or `all`. */
export function parseVariants(value: string): VariantKind[] {
    const names = value
        .split(",")
        .map((n) => n.trim())
        .filter((n) => n.length > 0);
    if (names.length === 0) {
        throw new ConfigError("[dartsmith] --type needs at least one variant");
    }
    const variants = new Set<VariantKind>();
    for (const name of names) {
        if (name === "all") return Object.values(VARIANT_NAMES);
        if (!isVariantName(name)) {
            throw new ConfigError(`[dartsmith] unknown --type "${name}"; expected one of: ${[...Object.keys(VARIANT_NAMES), "all"].join(", ")}`);
        }
        variants.add(VARIANT_NAMES[name]);
    }
    return [...variants];
}

// ── --log-level ─────────────────────────────────────────────────────

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/** Warns on unrecognized values and falls back to "info". */
export function validateLogLevel(value: string | undefined): LogLevel {
    if (value === undefined) return "info";
    if (isLogLevel(value)) return value;
    warn(`Unknown --log-level value "${value}". Valid values: ${LOG_LEVELS.join(", ")}. Defaulting to "info".`);
    return "info";
}

// ── Numbers ─────────────────────────────────────────────────────────

/** A whole number of at least `min`, from a flag or a YAML value. */
export function validateInteger(name: string, value: unknown, min: number): number | undefined {
    if (value === undefined || value === null) return undefined;
    const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    if (typeof n !== "number" || !Number.isInteger(n) || n < min) {
        throw new ConfigError(`[dartsmith] ${name} must be a whole number of at least ${min}, got ${JSON.stringify(value)}`);
    }
    return n;
}
