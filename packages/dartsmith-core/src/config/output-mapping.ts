import { basename, dirname, isAbsolute, join, relative } from "node:path";
import { CompanionKind } from "./enums";
import type { OutputMapping } from "./types";

const SUFFIX: Record<CompanionKind, string> = {
    [CompanionKind.Freezed]: ".freezed.dart",
    [CompanionKind.Generated]: ".g.dart",
};

const GENERATED_RE = /\.(g|freezed)\.dart$/;

export function isGeneratedPath(path: string): boolean {
    return GENERATED_RE.test(path);
}

/** `lib/user.dart` + Freezed → `user.freezed.dart` */
export function companionFileName(sourcePath: string, kind: CompanionKind): string {
    return `${basename(sourcePath).replace(/\.dart$/, "")}${SUFFIX[kind]}`;
}

function containingRoot(sourcePath: string, inputRoots: readonly string[]): string | null {
    let best: string | null = null;
    for (const root of inputRoots) {
        const rel = relative(root, sourcePath);
        if (rel.startsWith("..") || isAbsolute(rel)) continue;
        if (best === null || root.length > best.length) best = root;
    }
    return best;
}

/**
 * Build the source → companion path function.
 *
 * Without an output directory the companion sits beside its source. With one,
 * the source's path below its input root is kept under the output directory.
 */
export function createOutputMapping(inputRoots: readonly string[], outputDir: string | null): OutputMapping {
    return (sourcePath, kind) => {
        const fileName = companionFileName(sourcePath, kind);
        if (outputDir === null) {
            return join(dirname(sourcePath), fileName);
        }
        const root = containingRoot(sourcePath, inputRoots);
        const subdir = root === null || root === sourcePath ? "" : dirname(relative(root, sourcePath));
        return join(outputDir, subdir, fileName);
    };
}
