/**
 * Races `work` against a timer. On timeout the signal handed to `work` is
 * aborted with the timeout error, so the underlying request is cancelled too.
 * `parent` aborts it as well. The timer is always cleared.
 */
export async function withTimeout<T>(
    work: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error,
    parent?: AbortSignal
): Promise<T> {
    const controller = new AbortController();
    const signal = parent ? AbortSignal.any([parent, controller.signal]) : controller.signal;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = onTimeout();
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });
    try {
        return await Promise.race([work(signal), deadline]);
    } finally {
        clearTimeout(timer);
    }
}
