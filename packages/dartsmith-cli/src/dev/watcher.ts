import { on } from "node:events";
import { relative, resolve, sep } from "node:path";
import { WatchError } from "@dartsmith/core";
import { ChangeKind, type ChangeNotification } from "@dartsmith/generator";
import { type FSWatcher, watch } from "chokidar";

export interface WatchOptions {
    roots: readonly string[];
    /** Events on this file become config-changed notifications. */
    configPath: string | null;
    signal: AbortSignal;
}

const IGNORED_DIRS = [".dart_tool", "build", ".git"];

const KINDS: Record<string, ChangeKind | undefined> = {
    add: ChangeKind.Created,
    change: ChangeKind.Modified,
    unlink: ChangeKind.Deleted,
};

// ── Event mapping ───────────────────────────────────────────────────

/** One chokidar event as a notification. Directory events are dropped. */
export function toNotification(event: string, path: string, configPath: string | null): ChangeNotification | null {
    const kind = KINDS[event];
    if (kind === undefined) return null;
    const absolute = resolve(path);
    if (absolute === configPath) return { path: absolute, kind: ChangeKind.ConfigChanged };
    return { path: absolute, kind };
}

/** Tool and build directories below any of `roots`. */
export function ignoredBelow(roots: readonly string[]): (path: string) => boolean {
    return (path) =>
        roots.some((root) => {
            const rel = relative(root, path);
            return !rel.startsWith("..") && rel.split(sep).some((segment) => IGNORED_DIRS.includes(segment));
        });
}

// ── Watching ────────────────────────────────────────────────────────

/** A chokidar watcher over the input roots and the config file. Existing files are not reported. */
export function createWatcher(roots: readonly string[], configPath: string | null): FSWatcher {
    const paths = configPath === null ? [...roots] : [...roots, configPath];
    return watch(paths, { ignoreInitial: true, ignored: ignoredBelow(roots) });
}

/**
 * Notifications from `watcher` until `signal` aborts. A watcher `error`
 * event ends the stream with a WatchError.
 */
export async function* notificationsOf(
    watcher: FSWatcher,
    configPath: string | null,
    signal: AbortSignal,
): AsyncGenerator<ChangeNotification> {
    try {
        for await (const args of on(watcher, "all", { signal })) {
            const [event, path]: unknown[] = args;
            if (typeof event !== "string" || typeof path !== "string") continue;
            const notification = toNotification(event, path, configPath);
            if (notification !== null) yield notification;
        }
    } catch (error) {
        if (signal.aborted) return;
        const reason = error instanceof Error ? error.message : String(error);
        throw new WatchError(`[dartsmith] file watcher failed: ${reason}`, { cause: error });
    }
}

/**
 * Change notifications for every input root (recursively) and the config
 * file, until `signal` aborts. The watcher is closed when the stream ends.
 */
export async function* watchChanges(options: WatchOptions): AsyncGenerator<ChangeNotification> {
    const watcher = createWatcher(options.roots, options.configPath);
    try {
        yield* notificationsOf(watcher, options.configPath, options.signal);
    } finally {
        await watcher.close();
    }
}
