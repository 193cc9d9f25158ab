/**
 * Deadline-bounded execution.
 *
 * The guarded operation is started with an AbortSignal and raced against a timer. When the timer wins,
 * the signal is aborted and the caller gets a DeadlineExceededError right away. The operation is not
 * guaranteed to stop: it may observe the signal or run to completion, and its late result is discarded.
 *
 * @module deadline
 */

/** Raised when a guarded operation does not settle before its deadline */
export class DeadlineExceededError extends Error {
    constructor(public readonly seconds: number) {
        super(`Operation did not finish within ${seconds}s`);
        this.name = 'DeadlineExceededError';
    }
}

/**
 * Tells whether a deadline value is enforced. Zero, negative and missing values mean no deadline.
 */
export const hasDeadline = (seconds: number | undefined): seconds is number => {
    return seconds !== undefined && Number.isFinite(seconds) && seconds > 0;
};

/**
 * Runs an operation under a deadline.
 *
 * @param seconds - The deadline; zero, negative or undefined runs the operation without one
 * @param operation - Receives a signal that is aborted when the deadline expires
 * @throws {DeadlineExceededError} If the deadline expires first
 * @example
 * ```typescript
 * const bytes = await withDeadline(5, (signal) => fetcher(url, signal));
 * ```
 */
export const withDeadline = async <T>(seconds: number | undefined, operation: (signal: AbortSignal) => Promise<T>): Promise<T> => {
    const controller = new AbortController();
    if (!hasDeadline(seconds)) {
        return operation(controller.signal);
    }
    const limit = seconds;

    // A synchronous throw of `operation` becomes a rejection
    const task = Promise.resolve().then(() => operation(controller.signal));
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            const error = new DeadlineExceededError(limit);
            controller.abort(error);
            reject(error);
        }, limit * 1000);
    });

    try {
        // A late rejection of `task` is already handled by the race
        return await Promise.race([task, expired]);
    } finally {
        clearTimeout(timer);
    }
};
