import { Mutex } from "es-toolkit";

/** One mutex per key, dropped once nobody holds or waits for it. */
export class KeyedLock {
    private readonly locks = new Map<string, Mutex>();

    async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
        let mutex = this.locks.get(key);
        if (!mutex) {
            mutex = new Mutex();
            this.locks.set(key, mutex);
        }
        await mutex.acquire();
        try {
            return await fn();
        } finally {
            mutex.release();
            if (!mutex.isLocked) this.locks.delete(key);
        }
    }

    /** Keys with an operation running or waiting. */
    get keys(): string[] {
        return [...this.locks.keys()];
    }
}
