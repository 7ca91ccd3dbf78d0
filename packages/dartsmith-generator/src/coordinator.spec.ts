/**
 * Contract: RegenerationCoordinator -- batch runs and debounced change handling.
 *
 * Sections:
 *   1. Batch runs
 *   2. Stale companions
 *   3. Change notifications
 *   4. Configuration changes
 *   5. Change streams and disposal
 */
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, unlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { defineConfig, type ResolvedConfig, type RunReport, VariantKind, WatchError } from "@dartsmith/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type ChangeNotification, RegenerationCoordinator } from "./coordinator";
import { ChangeKind } from "./enums";
import { OutputWriter, type WriteOutcome } from "./writer";

const USER = `part 'user.freezed.dart';
part 'user.g.dart';

@freezed
class User with _$User {
  const factory User({required String name}) = _User;

  factory User.fromJson(Map<String, dynamic> json) => _$UserFromJson(json);
}
`;

const COUNT = "part 'count.g.dart';\n\n@riverpod\nint count(CountRef ref) => 0;\n";

/** Holds every write until `open()` is called. */
class GatedWriter extends OutputWriter {
    entered = 0;
    private release: () => void = () => {};
    private readonly gate = new Promise<void>((resolve) => {
        this.release = resolve;
    });

    open(): void {
        this.release();
    }

    override async write(path: string, text: string): Promise<WriteOutcome> {
        this.entered += 1;
        await this.gate;
        return super.write(path, text);
    }
}

describe("RegenerationCoordinator", () => {
    let root: string;
    let config: ResolvedConfig;
    const lib = (name: string) => join(root, "lib", name);

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), "dartsmith-coord-"));
        mkdirSync(join(root, "lib"));
        writeFileSync(lib("user.dart"), USER);
        writeFileSync(lib("count.dart"), COUNT);
        config = defineConfig({ root, input: "lib", concurrency: 1, debounceMs: 10 });
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
    });

    // -- 1. Batch runs --
    describe("runAll", () => {
        it("writes every companion and merges the reports", async () => {
            const report = await new RegenerationCoordinator({ config }).runAll();
            expect(report.filesProcessed).toBe(2);
            expect(report.filesWritten).toBe(3);
            expect(report.errors).toEqual([]);
            expect(["count.g.dart", "user.freezed.dart", "user.g.dart"].map((f) => existsSync(lib(f)))).toEqual([true, true, true]);
        });

        it("skips sources whose text has not changed since the last pass", async () => {
            const coordinator = new RegenerationCoordinator({ config });
            await coordinator.runAll();
            const again = await coordinator.runAll();
            expect([again.filesProcessed, again.filesWritten]).toEqual([0, 0]);
        });

        it("leaves identical companions untouched on a fresh run", async () => {
            await new RegenerationCoordinator({ config }).runAll();
            const report = await new RegenerationCoordinator({ config }).runAll();
            expect([report.filesWritten, report.filesUnchanged]).toEqual([0, 3]);
        });

        it("still writes the companions of good sources beside a malformed one", async () => {
            writeFileSync(lib("broken.dart"), "@freezed\nclass Broken with _$Broken {\n  const factory Broken(");
            const report = await new RegenerationCoordinator({ config }).runAll();
            expect(report.errors.map((e) => [e.code, e.file])).toEqual([["parse", lib("broken.dart")]]);
            expect(report.fatal).toBe(false);
            expect(report.filesWritten).toBe(3);
            expect(["count.g.dart", "user.freezed.dart", "user.g.dart"].map((f) => existsSync(lib(f)))).toEqual([true, true, true]);
        });

        it("processes at most `concurrency` sources at a time", async () => {
            for (let i = 0; i < 4; i++) writeFileSync(lib(`p${i}.dart`), `part 'p${i}.g.dart';\n\n@riverpod\nint p${i}(Ref ref) => ${i};\n`);
            const writer = new GatedWriter();
            const parallel = defineConfig({ root, input: "lib", concurrency: 4, debounceMs: 10 });
            const run = new RegenerationCoordinator({ config: parallel, writer }).runAll();

            await vi.waitFor(() => expect(writer.entered).toBe(4));
            await new Promise((resolve) => setTimeout(resolve, 50));
            expect(writer.entered).toBe(4);

            writer.open();
            const report = await run;
            expect(report.errors).toEqual([]);
            expect(report.filesWritten).toBe(7);
        });

        it("reports a missing input path as fatal", async () => {
            const broken = defineConfig({ root, input: "missing" });
            const report = await new RegenerationCoordinator({ config: broken }).runAll();
            expect(report.fatal).toBe(true);
            expect(report.errors.map((e) => e.code)).toEqual(["config"]);
        });

        it("removes conflicting outputs first when asked to", async () => {
            writeFileSync(lib("old.g.dart"), "// stale\n");
            const cleaning = defineConfig({ root, input: "lib", concurrency: 1, deleteConflictingOutputs: true });
            const report = await new RegenerationCoordinator({ config: cleaning }).runAll();
            expect(report.filesRemoved).toBe(1);
            expect(existsSync(lib("old.g.dart"))).toBe(false);
            expect(report.filesWritten).toBe(3);
        });
    });

    // -- 2. Stale companions --
    describe("stale companions", () => {
        it("removes a companion it produced once its source stops needing it", async () => {
            const coordinator = new RegenerationCoordinator({ config });
            await coordinator.processFile(lib("user.dart"));
            writeFileSync(lib("user.dart"), "part 'user.g.dart';\n\n@riverpod\nint age(AgeRef ref) => 0;\n");
            const report = await coordinator.processFile(lib("user.dart"));
            expect([report.filesWritten, report.filesRemoved]).toEqual([1, 1]);
            expect(existsSync(lib("user.freezed.dart"))).toBe(false);
        });

        it("keeps companions it did not produce", async () => {
            writeFileSync(lib("count.freezed.dart"), "// hand written\n");
            const report = await new RegenerationCoordinator({ config }).processFile(lib("count.dart"));
            expect(report.filesRemoved).toBe(0);
            expect(readFileSync(lib("count.freezed.dart"), "utf-8")).toBe("// hand written\n");
        });

        it("keeps earlier companions when the source stops parsing", async () => {
            const coordinator = new RegenerationCoordinator({ config });
            await coordinator.processFile(lib("user.dart"));
            writeFileSync(lib("user.dart"), "@freezed\nclass User with _$User {\n  const factory User(");
            const report = await coordinator.processFile(lib("user.dart"));
            expect(report.errors.map((e) => e.code)).toEqual(["parse"]);
            expect(report.filesRemoved).toBe(0);
            expect(existsSync(lib("user.freezed.dart"))).toBe(true);
        });

        it("removes both companions of a source that no longer exists", async () => {
            const coordinator = new RegenerationCoordinator({ config });
            await coordinator.processFile(lib("user.dart"));
            unlinkSync(lib("user.dart"));
            const report = await coordinator.processFile(lib("user.dart"));
            expect(report.filesRemoved).toBe(2);
            expect(existsSync(lib("user.g.dart"))).toBe(false);
        });
    });

    // -- 3. Change notifications --
    describe("notify", () => {
        it("coalesces a burst of events for one path into a single pass", async () => {
            const reports: RunReport[] = [];
            const coordinator = new RegenerationCoordinator({ config, onReport: (r) => reports.push(r) });
            for (let i = 0; i < 3; i++) coordinator.notify({ path: lib("count.dart"), kind: ChangeKind.Modified });
            expect(coordinator.stateOf(lib("count.dart"))).toBe("scheduled");
            await coordinator.idle();
            expect(reports.map((r) => r.filesWritten)).toEqual([1]);
            expect(coordinator.stateOf(lib("count.dart"))).toBe("idle");
        });

        it("ignores generated companions and files that are not Dart sources", async () => {
            const coordinator = new RegenerationCoordinator({ config });
            coordinator.notify({ path: lib("count.g.dart"), kind: ChangeKind.Modified });
            coordinator.notify({ path: lib("notes.txt"), kind: ChangeKind.Created });
            expect(coordinator.stateOf(lib("count.g.dart"))).toBe("idle");
            expect(coordinator.stateOf(lib("notes.txt"))).toBe("idle");
            await coordinator.idle();
        });

        it("runs once more when the path changes during a pass", async () => {
            const writer = new GatedWriter();
            const reports: RunReport[] = [];
            const coordinator = new RegenerationCoordinator({ config, writer, onReport: (r) => reports.push(r) });
            const path = lib("count.dart");

            coordinator.notify({ path, kind: ChangeKind.Modified });
            await vi.waitFor(() => expect(writer.entered).toBe(1));
            expect(coordinator.stateOf(path)).toBe("running");

            writeFileSync(path, COUNT.replace("=> 0", "=> 1"));
            coordinator.notify({ path, kind: ChangeKind.Modified });
            coordinator.notify({ path, kind: ChangeKind.Modified });
            expect(coordinator.stateOf(path)).toBe("stale");

            writer.open();
            await coordinator.idle();
            expect(reports.map((r) => r.filesWritten)).toEqual([1, 1]);
            expect(coordinator.stateOf(path)).toBe("idle");
        });

        it("removes the companions of a deleted source", async () => {
            const reports: RunReport[] = [];
            const coordinator = new RegenerationCoordinator({ config, onReport: (r) => reports.push(r) });
            await coordinator.runAll();
            unlinkSync(lib("user.dart"));
            coordinator.notify({ path: lib("user.dart"), kind: ChangeKind.Deleted });
            await coordinator.idle();
            expect(reports.map((r) => r.filesRemoved)).toEqual([2]);
            expect(existsSync(lib("user.freezed.dart"))).toBe(false);
        });
    });

    // -- 4. Configuration changes --
    describe("configuration changes", () => {
        it("reloads the configuration and regenerates everything", async () => {
            const reloaded = defineConfig({ root, input: "lib", concurrency: 1, debounceMs: 10, variants: [VariantKind.Provider] });
            const reloadConfig = vi.fn(async () => reloaded);
            const reports: RunReport[] = [];
            const coordinator = new RegenerationCoordinator({ config, reloadConfig, onReport: (r) => reports.push(r) });
            await coordinator.runAll();

            coordinator.notify({ path: join(root, "dartsmith.yaml"), kind: ChangeKind.ConfigChanged });
            await coordinator.idle();
            expect(reloadConfig).toHaveBeenCalledTimes(1);
            expect(coordinator.config).toBe(reloaded);
            expect(reports).toHaveLength(1);
            expect([reports[0]?.filesRemoved, reports[0]?.filesUnchanged]).toEqual([2, 1]);
        });

        it("reports a failing reload as a fatal configuration error", async () => {
            const reports: RunReport[] = [];
            const coordinator = new RegenerationCoordinator({
                config,
                reloadConfig: () => Promise.reject(new Error("nope")),
                onReport: (r) => reports.push(r),
            });
            coordinator.notify({ path: join(root, "dartsmith.yaml"), kind: ChangeKind.ConfigChanged });
            await coordinator.idle();
            expect(reports[0]?.fatal).toBe(true);
            expect(reports[0]?.errors.map((e) => e.message)).toEqual(["[dartsmith] cannot reload configuration: Error: nope"]);
            expect(coordinator.config).toBe(config);
        });
    });

    // -- 5. Change streams and disposal --
    describe("streams and disposal", () => {
        it("feeds a change stream into notify", async () => {
            const reports: RunReport[] = [];
            const coordinator = new RegenerationCoordinator({ config, onReport: (r) => reports.push(r) });
            async function* changes(): AsyncGenerator<ChangeNotification> {
                yield { path: lib("count.dart"), kind: ChangeKind.Modified };
                yield { path: lib("user.dart"), kind: ChangeKind.Modified };
            }
            await coordinator.consume(changes());
            await coordinator.idle();
            expect(reports).toHaveLength(2);
        });

        it("wraps a failing stream in a WatchError", async () => {
            const coordinator = new RegenerationCoordinator({ config });
            async function* changes(): AsyncGenerator<ChangeNotification> {
                yield { path: lib("notes.txt"), kind: ChangeKind.Modified };
                throw new Error("watcher closed");
            }
            const error = await coordinator.consume(changes()).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(WatchError);
            expect(error instanceof WatchError && [error.message, error.fatal]).toEqual(["[dartsmith] change stream failed", true]);
        });

        it("passes a WatchError from the stream through unchanged", async () => {
            const coordinator = new RegenerationCoordinator({ config });
            const failure = new WatchError("[dartsmith] file watcher failed: EMFILE");
            async function* changes(): AsyncGenerator<ChangeNotification> {
                yield { path: lib("notes.txt"), kind: ChangeKind.Modified };
                throw failure;
            }
            await expect(coordinator.consume(changes())).rejects.toBe(failure);
        });

        it("drops scheduled passes on dispose and ignores later events", async () => {
            const onReport = vi.fn();
            const coordinator = new RegenerationCoordinator({ config, onReport });
            coordinator.notify({ path: lib("count.dart"), kind: ChangeKind.Modified });
            await coordinator.dispose();
            coordinator.notify({ path: lib("user.dart"), kind: ChangeKind.Modified });
            expect(coordinator.stateOf(lib("count.dart"))).toBe("idle");
            expect(coordinator.stateOf(lib("user.dart"))).toBe("idle");
            await new Promise((resolve) => setTimeout(resolve, 30));
            expect(onReport).not.toHaveBeenCalled();
            expect(existsSync(lib("count.g.dart"))).toBe(false);
        });
    });
});
