/**
 * CompletionLatch - single-fire guard for racing completion signals.
 *
 * Process exit, end-of-stream, spawn errors and timeouts arrive on independent
 * event sources; only the first one to call settle() reaches the callback.
 */
export class CompletionLatch<T> {
    private completed = false;
    private readonly onComplete: (outcome: T) => void;

    constructor(onComplete: (outcome: T) => void) {
        this.onComplete = onComplete;
    }

    get isCompleted(): boolean {
        return this.completed;
    }

    /**
     * @returns true if this call completed the latch
     */
    settle(outcome: T): boolean {
        if (this.completed) return false;
        this.completed = true;
        this.onComplete(outcome);
        return true;
    }
}
