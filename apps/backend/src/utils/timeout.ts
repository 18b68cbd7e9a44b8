import { TimeoutError } from '../errors/pipelineErrors';

/**
 * Races `task` against a timer. On expiry the signal handed to the task is
 * aborted so the underlying request can be cancelled, and the caller gets a
 * `TimeoutError`.
 */
export async function callWithTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
): Promise<T> {
    const controller = new AbortController();
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timeoutHandle = setTimeout(() => {
            const error = new TimeoutError(label, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([task(controller.signal), timeoutPromise]);
    } finally {
        clearTimeout(timeoutHandle);
    }
}
