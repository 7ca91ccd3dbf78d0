import { mkdir, readFile, rename, rm, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { WriteError } from "@dartsmith/core";
import { KeyedLock } from "./keyed-lock";

export type WriteOutcome = "written" | "unchanged";
export type RemoveOutcome = "removed" | "absent";

/** ENOENT from a node:fs call. */
export function isMissing(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Writes companion files.
 *
 * Operations on one path run one at a time. A write lands through a
 * temporary sibling and a rename, so readers never see partial text, and is
 * skipped when the file already holds the same text.
 */
export class OutputWriter {
    private readonly lock = new KeyedLock();
    private sequence = 0;

    async write(path: string, text: string): Promise<WriteOutcome> {
        return this.lock.run(path, async () => {
            if ((await readIfExists(path)) === text) return "unchanged";

            const temp = `${path}.${process.pid}.${++this.sequence}.tmp`;
            try {
                await mkdir(dirname(path), { recursive: true });
                await writeFile(temp, text, "utf-8");
                await rename(temp, path);
            } catch (cause) {
                await rm(temp, { force: true });
                throw new WriteError(path, cause);
            }
            return "written";
        });
    }

    async remove(path: string): Promise<RemoveOutcome> {
        return this.lock.run(path, async () => {
            try {
                await unlink(path);
                return "removed";
            } catch (cause) {
                if (isMissing(cause)) return "absent";
                throw new WriteError(path, cause);
            }
        });
    }

    /** Paths with an operation running or waiting. */
    get busyPaths(): string[] {
        return this.lock.keys;
    }
}

async function readIfExists(path: string): Promise<string | null> {
    try {
        return await readFile(path, "utf-8");
    } catch (error) {
        if (isMissing(error)) return null;
        throw new WriteError(path, error);
    }
}
