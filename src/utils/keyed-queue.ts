/**
 * Runs tasks one at a time per key; tasks on different keys run concurrently.
 * A failed task does not block the ones queued behind it.
 */
export class KeyedSerialQueue {
    private readonly tails = new Map<string, Promise<void>>();

    run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(task);
        const tail = result.then(
            () => undefined,
            () => undefined,
        );
        this.tails.set(key, tail);
        void tail.then(() => {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        });
        return result;
    }

    async whenIdle(key: string): Promise<void> {
        let tail = this.tails.get(key);
        while (tail) {
            await tail;
            tail = this.tails.get(key);
        }
    }

    async whenAllIdle(): Promise<void> {
        while (this.tails.size > 0) {
            await Promise.all(Array.from(this.tails.values()));
        }
    }
}
