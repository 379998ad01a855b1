/**
 * Runs async tasks one at a time in submission order. A task that fails does
 * not stop the queue; its caller gets the rejection.
 */
export class SerialExecutor {
    private tail: Promise<void> = Promise.resolve();
    private queued = 0;

    run<T>(task: () => Promise<T>): Promise<T> {
        this.queued++;
        const result = this.tail.then(task);
        this.tail = result.then(
            () => { this.queued--; },
            () => { this.queued--; }
        );
        return result;
    }

    /** tasks submitted and not yet finished, the running one included */
    get pending(): number {
        return this.queued;
    }

    /** resolves once everything submitted so far has finished */
    idle(): Promise<void> {
        return this.tail;
    }
}
