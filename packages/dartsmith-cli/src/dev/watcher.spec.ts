/**
 * Contract: watcher -- chokidar events to change notifications.
 *
 * Sections:
 *   1. Event mapping
 *   2. Ignored directories
 *   3. Notification stream
 */
import { once } from "node:events";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { WatchError } from "@dartsmith/core";
import { ChangeKind } from "@dartsmith/generator";
import type { FSWatcher } from "chokidar";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createWatcher, ignoredBelow, notificationsOf, toNotification } from "./watcher";

// -- 1. Event mapping --
describe("toNotification", () => {
    const CONFIG = "/project/dartsmith.yaml";

    it("maps add, change and unlink to created, modified and deleted", () => {
        expect(toNotification("add", "/project/lib/a.dart", CONFIG)).toEqual({ path: "/project/lib/a.dart", kind: ChangeKind.Created });
        expect(toNotification("change", "/project/lib/a.dart", CONFIG)?.kind).toBe(ChangeKind.Modified);
        expect(toNotification("unlink", "/project/lib/a.dart", CONFIG)?.kind).toBe(ChangeKind.Deleted);
    });

    it("maps any file event on the config file to a configuration change", () => {
        expect(toNotification("unlink", CONFIG, CONFIG)).toEqual({ path: CONFIG, kind: ChangeKind.ConfigChanged });
        expect(toNotification("change", CONFIG, CONFIG)?.kind).toBe(ChangeKind.ConfigChanged);
    });

    it("drops directory events", () => {
        expect(toNotification("addDir", "/project/lib/models", CONFIG)).toBeNull();
        expect(toNotification("unlinkDir", "/project/lib/models", CONFIG)).toBeNull();
    });
});

// -- 2. Ignored directories --
describe("ignoredBelow", () => {
    const ignored = ignoredBelow(["/work/build/app/lib"]);

    it("skips tool and build directories inside a root", () => {
        expect(ignored("/work/build/app/lib/.dart_tool/x.dart")).toBe(true);
        expect(ignored("/work/build/app/lib/build/y.dart")).toBe(true);
    });

    it("does not look at directories above the root", () => {
        expect(ignored("/work/build/app/lib/models/user.dart")).toBe(false);
    });
});

// -- 3. Notification stream --
describe("notificationsOf", () => {
    let root: string;
    let watcher: FSWatcher;

    beforeEach(async () => {
        root = mkdtempSync(join(tmpdir(), "dartsmith-watch-"));
        mkdirSync(join(root, "lib"));
        watcher = createWatcher([join(root, "lib")], join(root, "dartsmith.yaml"));
        await once(watcher, "ready");
    });

    afterEach(async () => {
        await watcher.close();
        rmSync(root, { recursive: true, force: true });
    });

    it("reports a file created below a root", async () => {
        const controller = new AbortController();
        const changes = notificationsOf(watcher, join(root, "dartsmith.yaml"), controller.signal);
        const first = changes.next();
        writeFileSync(join(root, "lib", "user.dart"), "class User {}\n");
        expect((await first).value).toEqual({ path: join(root, "lib", "user.dart"), kind: ChangeKind.Created });
        controller.abort();
        await changes.return(undefined);
    });

    it("ends without an error when the signal aborts", async () => {
        const controller = new AbortController();
        const changes = notificationsOf(watcher, null, controller.signal);
        const first = changes.next();
        controller.abort();
        expect(await first).toEqual({ done: true, value: undefined });
    });

    it("turns a watcher error into a fatal WatchError", async () => {
        const controller = new AbortController();
        const changes = notificationsOf(watcher, null, controller.signal);
        const first = changes.next();
        watcher.emit("error", new Error("EMFILE: too many open files"));
        const error = await first.catch((e: unknown) => e);
        expect(error).toBeInstanceOf(WatchError);
        expect(error instanceof WatchError && [error.message, error.fatal]).toEqual([
            "[dartsmith] file watcher failed: EMFILE: too many open files",
            true,
        ]);
    });
});
