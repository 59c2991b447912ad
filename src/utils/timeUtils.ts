export class TimeoutError extends Error {
    constructor(public timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

export const secondsToMs = (seconds: number): number => Math.round(seconds * 1000);

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with TimeoutError at that moment even if the task ignores
 * the signal.
 */
export async function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new TimeoutError(timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([task(controller.signal), expired]);
    } finally {
        clearTimeout(timer);
    }
}
