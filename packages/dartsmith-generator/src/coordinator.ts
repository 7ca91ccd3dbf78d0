/**
 * Regeneration coordinator.
 *
 * Drives the per-file pipeline for a whole batch and for a stream of change
 * notifications. Each source path owns a small lifecycle:
 *
 *   idle → scheduled → running → idle
 *                         ↓  ↑
 *                        stale
 *
 * Events while `scheduled` restart the debounce timer. Events while
 * `running` mark the path `stale`, which buys exactly one more pass once the
 * current one finishes. A pass that has started is never cancelled.
 */

import { readFile } from "node:fs/promises";
import { relative } from "node:path";
import {
    CompanionKind,
    ConfigError,
    createSilentLogger,
    isGeneratedPath,
    type Logger,
    ReportBuilder,
    type ResolvedConfig,
    type RunReport,
    StateMachine,
    WatchError,
} from "@dartsmith/core";
import { Semaphore } from "es-toolkit";
import { ChangeKind } from "./enums";
import { generate } from "./generator";
import { loadDartGrammar } from "./grammar/loader";
import { KeyedLock } from "./keyed-lock";
import { discoverGenerated, discoverSources } from "./scanner";
import { isMissing, OutputWriter } from "./writer";

export interface ChangeNotification {
    path: string;
    kind: ChangeKind;
}

export interface CoordinatorOptions {
    config: ResolvedConfig;
    logger?: Logger;
    writer?: OutputWriter;
    /** Produces the configuration after a config-changed event. Without it the current one is kept. */
    reloadConfig?: () => Promise<ResolvedConfig>;
    /** Receives the report of every pass started by a notification. */
    onReport?: (report: RunReport) => void;
}

type PathState = "idle" | "scheduled" | "running" | "stale";

const PATH_TRANSITIONS: Record<PathState, readonly PathState[]> = {
    idle: ["scheduled"],
    scheduled: ["running", "idle"],
    running: ["stale", "idle"],
    stale: ["running", "idle"],
};

/** Key of the pass that reloads the configuration and reruns everything. */
const CONFIG_KEY = "\0config";

interface PathTask {
    machine: StateMachine<PathState>;
    timer: ReturnType<typeof setTimeout> | null;
    /** Latest event kind seen for the path. */
    kind: ChangeKind;
}

export class RegenerationCoordinator {
    private _config: ResolvedConfig;
    private readonly logger: Logger;
    private readonly writer: OutputWriter;
    private readonly reloadConfig: (() => Promise<ResolvedConfig>) | undefined;
    private readonly onReport: ((report: RunReport) => void) | undefined;

    private readonly tasks = new Map<string, PathTask>();
    private readonly sourceLock = new KeyedLock();
    /** Source text of the last pass per path. Cleared by a config change. */
    private readonly digests = new Map<string, string>();
    /** Companions written per source, so a later empty pass can remove them. */
    private readonly produced = new Map<string, Set<string>>();
    private idleWaiters: Array<() => void> = [];
    private disposed = false;

    constructor(options: CoordinatorOptions) {
        this._config = options.config;
        this.logger = options.logger ?? createSilentLogger();
        this.writer = options.writer ?? new OutputWriter();
        this.reloadConfig = options.reloadConfig;
        this.onReport = options.onReport;
    }

    get config(): ResolvedConfig {
        return this._config;
    }

    /** State of a path's lifecycle, `idle` when nothing is pending. */
    stateOf(path: string): PathState {
        return this.tasks.get(path)?.machine.current ?? "idle";
    }

    // ── Batch ───────────────────────────────────────────────────────

    /**
     * Generate every discovered source, at most `concurrency` at a time.
     * Reports are merged in source order.
     */
    async runAll(): Promise<RunReport> {
        const report = new ReportBuilder();
        let sources: string[];
        try {
            sources = await discoverSources(this._config.inputPaths);
        } catch (error) {
            this.logger.error("scan", error instanceof Error ? error.message : String(error));
            return report.fail(error).build();
        }
        this.logger.debug("scan", `found ${sources.length} source file(s)`);

        if (this._config.deleteConflictingOutputs) report.merge(await this.clean());

        const semaphore = new Semaphore(this._config.concurrency);
        const reports = await Promise.all(
            sources.map(async (path) => {
                await semaphore.acquire();
                try {
                    return await this.processFile(path);
                } finally {
                    semaphore.release();
                }
            }),
        );
        for (const fileReport of reports) report.merge(fileReport);
        return report.build();
    }

    /** Remove every generated companion below the input paths and the output directory. */
    async clean(): Promise<RunReport> {
        const report = new ReportBuilder();
        const roots = [...this._config.inputPaths];
        if (this._config.outputDir !== null) roots.push(this._config.outputDir);
        for (const path of await discoverGenerated(roots)) {
            try {
                if ((await this.writer.remove(path)) === "removed") report.written("removed");
            } catch (error) {
                report.fail(error);
            }
        }
        this.produced.clear();
        this.digests.clear();
        return report.build();
    }

    // ── Single file ─────────────────────────────────────────────────

    /**
     * Regenerate one source. A source whose text matches the previous pass
     * is skipped; a source that no longer exists loses its companions.
     */
    async processFile(path: string): Promise<RunReport> {
        return this.sourceLock.run(path, async () => {
            let source: string;
            try {
                source = await readFile(path, "utf-8");
            } catch (error) {
                if (isMissing(error)) return this.removeCompanions(path);
                return new ReportBuilder().fail(error, path).build();
            }
            if (this.digests.get(path) === source) {
                this.logger.debug("emit", `${this.display(path)} unchanged`);
                return new ReportBuilder().build();
            }
            return this.emitAndWrite(path, source);
        });
    }

    /** Remove the companions of a deleted source. */
    async removeOutputs(path: string): Promise<RunReport> {
        return this.sourceLock.run(path, () => this.removeCompanions(path));
    }

    private async emitAndWrite(path: string, source: string): Promise<RunReport> {
        await loadDartGrammar();
        const result = generate({ path, source, config: this._config });
        const report = new ReportBuilder().merge(result.report);
        const previous = this.produced.get(path) ?? new Set<string>();
        const current = new Set<string>();
        let failed = false;

        for (const output of result.outputs) {
            try {
                const outcome = await this.writer.write(output.path, output.text);
                report.written(outcome);
                current.add(output.path);
                if (outcome === "written") this.logger.info("write", this.display(output.path));
            } catch (error) {
                failed = true;
                report.fail(error, path);
            }
        }
        for (const stale of result.absent) {
            if (!previous.has(stale)) continue;
            try {
                if ((await this.writer.remove(stale)) === "removed") {
                    report.written("removed");
                    this.logger.info("write", `removed ${this.display(stale)}`);
                }
            } catch (error) {
                failed = true;
                report.fail(error, path);
            }
        }

        if (result.absent.length === 0 && result.outputs.length === 0) {
            // Parse failure: earlier companions stay on disk and stay tracked.
            for (const kept of previous) current.add(kept);
        }
        this.produced.set(path, current);
        if (failed) this.digests.delete(path);
        else this.digests.set(path, source);
        return report.build();
    }

    private async removeCompanions(path: string): Promise<RunReport> {
        const report = new ReportBuilder();
        const targets = new Set(this.produced.get(path));
        for (const kind of Object.values(CompanionKind)) targets.add(this._config.outputMapping(path, kind));
        for (const target of targets) {
            try {
                if ((await this.writer.remove(target)) === "removed") {
                    report.written("removed");
                    this.logger.info("write", `removed ${this.display(target)}`);
                }
            } catch (error) {
                report.fail(error, path);
            }
        }
        this.produced.delete(path);
        this.digests.delete(path);
        return report.build();
    }

    // ── Change stream ───────────────────────────────────────────────

    /** Queue one change. Paths that are not Dart sources are ignored. */
    notify(change: ChangeNotification): void {
        if (this.disposed) {
            this.logger.debug("watch", `ignored ${change.kind} ${change.path} after dispose`);
            return;
        }
        if (change.kind === ChangeKind.ConfigChanged) {
            this.schedule(CONFIG_KEY, change.kind);
            return;
        }
        if (!change.path.endsWith(".dart") || isGeneratedPath(change.path)) return;
        this.schedule(change.path, change.kind);
    }

    /**
     * Feed every notification of `changes` to {@link notify}. A failing stream
     * is fatal and surfaces as WatchError.
     */
    async consume(changes: AsyncIterable<ChangeNotification>): Promise<void> {
        try {
            for await (const change of changes) this.notify(change);
        } catch (error) {
            if (error instanceof WatchError) throw error;
            throw new WatchError("[dartsmith] change stream failed", { cause: error });
        }
    }

    /** Resolves once no path is scheduled or running. */
    idle(): Promise<void> {
        if (this.tasks.size === 0) return Promise.resolve();
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    /** Drop scheduled passes and wait for running ones. Later notifications are ignored. */
    async dispose(): Promise<void> {
        this.disposed = true;
        for (const [key, task] of this.tasks) {
            if (task.timer !== null) clearTimeout(task.timer);
            if (task.machine.is("scheduled")) {
                task.machine.transition("idle");
                this.tasks.delete(key);
            }
        }
        this.settle();
        await this.idle();
    }

    private schedule(key: string, kind: ChangeKind): void {
        let task = this.tasks.get(key);
        if (!task) {
            const label = this.display(key);
            task = {
                machine: new StateMachine<PathState>({ transitions: PATH_TRANSITIONS, initial: "idle", name: label }),
                timer: null,
                kind,
            };
            task.machine.onTransition((from, to) => this.logger.debug("watch", `${label}: ${from} → ${to}`));
            this.tasks.set(key, task);
        }
        task.kind = kind;

        switch (task.machine.current) {
            case "idle":
                task.machine.transition("scheduled");
                this.arm(key, task);
                break;
            case "scheduled":
                this.arm(key, task);
                break;
            case "running":
                task.machine.transition("stale");
                break;
            case "stale":
                break;
        }
    }

    private arm(key: string, task: PathTask): void {
        if (task.timer !== null) clearTimeout(task.timer);
        task.timer = setTimeout(() => {
            task.timer = null;
            task.machine.transition("running");
            this.drive(key, task).catch((error: unknown) => {
                this.logger.error("watch", `pass for ${this.display(key)} failed`, { error: String(error) });
            });
        }, this._config.debounceMs);
    }

    private async drive(key: string, task: PathTask): Promise<void> {
        try {
            for (;;) {
                const report = await this.pass(key, task.kind);
                this.onReport?.(report);
                if (!task.machine.is("stale")) break;
                task.machine.transition("running");
            }
        } finally {
            task.machine.transition("idle");
            this.tasks.delete(key);
            this.settle();
        }
    }

    private async pass(key: string, kind: ChangeKind): Promise<RunReport> {
        if (key === CONFIG_KEY) return this.reconfigure();
        this.logger.debug("watch", `${kind} ${this.display(key)}`);
        return kind === ChangeKind.Deleted ? this.removeOutputs(key) : this.processFile(key);
    }

    private async reconfigure(): Promise<RunReport> {
        if (this.reloadConfig) {
            try {
                this._config = await this.reloadConfig();
            } catch (error) {
                const failure =
                    error instanceof ConfigError
                        ? error
                        : new ConfigError(`[dartsmith] cannot reload configuration: ${String(error)}`, { cause: error });
                this.logger.error("config", failure.message);
                return new ReportBuilder().fail(failure).build();
            }
        }
        this.digests.clear();
        this.logger.info("config", "configuration changed, regenerating everything");
        return this.runAll();
    }

    private settle(): void {
        if (this.tasks.size > 0) return;
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
    }

    private display(path: string): string {
        return path === CONFIG_KEY ? "config" : relative(this._config.root, path) || path;
    }
}
