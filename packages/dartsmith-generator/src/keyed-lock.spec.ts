import { describe, expect, it } from "vitest";
import { KeyedLock } from "./keyed-lock";

describe("KeyedLock", () => {
    it("runs tasks for one key one at a time and others side by side", async () => {
        const lock = new KeyedLock();
        const events: string[] = [];
        let release: () => void = () => {};
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });

        const first = lock.run("a", async () => {
            events.push("a1 start");
            await gate;
            events.push("a1 end");
        });
        const second = lock.run("a", async () => {
            events.push("a2");
        });
        const other = lock.run("b", async () => {
            events.push("b");
        });

        await other;
        expect(events).toEqual(["a1 start", "b"]);
        expect(lock.keys).toEqual(["a"]);
        release();
        await Promise.all([first, second]);
        expect(events).toEqual(["a1 start", "b", "a1 end", "a2"]);
        expect(lock.keys).toEqual([]);
    });

    it("releases the key when the task throws", async () => {
        const lock = new KeyedLock();
        await expect(lock.run("a", () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
        expect(lock.keys).toEqual([]);
        expect(await lock.run("a", async () => 1)).toBe(1);
    });
});
