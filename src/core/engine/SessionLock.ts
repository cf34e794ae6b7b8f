/**
 * @file Session Lock
 *
 * Promise-chain mutex. Tasks run strictly one after another in call
 * order; a failing task does not break the chain.
 *
 * @module core/engine
 */

export class SessionLock {
    private tail: Promise<void> = Promise.resolve();
    private pending: number = 0;

    /** True while a task is running or queued. */
    public get busy(): boolean {
        return this.pending > 0;
    }

    /**
     * Queue a task behind every task queued before it.
     */
    public run<T>(task: () => Promise<T>): Promise<T> {
        this.pending++;
        const result: Promise<T> = this.tail.then(task);
        this.tail = result.then(
            (): void => undefined,
            (): void => undefined
        );
        return result.finally((): void => {
            this.pending--;
        });
    }
}
