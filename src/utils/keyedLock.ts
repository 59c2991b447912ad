/**
 * Serializes async work per key. Callers holding the same key run one at a
 * time in arrival order; different keys never wait on each other.
 */
export class KeyedLock {
    private tails = new Map<string, Promise<void>>();

    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const pending = this.tails.get(key) || Promise.resolve();

        let release: () => void = () => undefined;
        const next = new Promise<void>(resolve => { release = resolve; });
        this.tails.set(key, next);

        try {
            await pending; // wait for the previous holder of this key
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === next) {
                this.tails.delete(key);
            }
        }
    }
}
