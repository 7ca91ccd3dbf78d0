import { availableParallelism } from "node:os";
import { resolve } from "node:path";
import { ConfigError } from "../core/errors/errors";
import { VariantKind } from "./enums";
import { createOutputMapping } from "./output-mapping";
import type { DefineConfigInput, JsonOptions, ResolvedConfig } from "./types";

export const DEFAULT_DEBOUNCE_MS = 80;

const KNOWN_VARIANTS = new Set<string>(Object.values(VariantKind));

function defaultConcurrency(): number {
    return Math.max(1, Math.min(8, availableParallelism()));
}

export function defineConfig(input: DefineConfigInput): ResolvedConfig {
    const root = resolve(input.root ?? process.cwd());
    const inputs = typeof input.input === "string" ? [input.input] : [...input.input];

    if (inputs.length === 0) {
        throw new ConfigError("[dartsmith] defineConfig: at least one input path is required");
    }

    const variants = input.variants ?? Object.values(VariantKind);
    for (const variant of variants) {
        if (!KNOWN_VARIANTS.has(variant)) {
            throw new ConfigError(`[dartsmith] defineConfig: unknown variant "${variant}"`);
        }
    }
    if (variants.length === 0) {
        throw new ConfigError("[dartsmith] defineConfig: no generation variant is enabled");
    }

    const concurrency = input.concurrency ?? defaultConcurrency();
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ConfigError(`[dartsmith] defineConfig: concurrency must be a positive integer, got ${concurrency}`);
    }

    const debounceMs = input.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    if (!Number.isFinite(debounceMs) || debounceMs < 0) {
        throw new ConfigError(`[dartsmith] defineConfig: debounceMs must be zero or more, got ${debounceMs}`);
    }

    const inputPaths = [...new Set(inputs.map((p) => resolve(root, p)))];
    const outputDir = input.output ? resolve(root, input.output) : null;
    const json: JsonOptions = {
        checked: input.json?.checked ?? true,
        explicitToJson: input.json?.explicitToJson ?? false,
    };

    return {
        root,
        inputPaths,
        outputDir,
        outputMapping: createOutputMapping(inputPaths, outputDir),
        enabledVariants: new Set(variants),
        concurrency,
        debounceMs,
        deleteConflictingOutputs: input.deleteConflictingOutputs ?? false,
        json,
    };
}
