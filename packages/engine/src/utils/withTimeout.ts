/**
 * @fileoverview Timeout wrapper for upstream calls
 *
 * @module @govwatch/engine/utils/withTimeout
 */

import { TimeoutError } from "../errors.js";

/**
 * Run an abortable operation with a deadline.
 *
 * The operation receives a signal that is aborted when the deadline passes;
 * the returned promise rejects with TimeoutError at that moment whether or
 * not the operation honours the signal.
 *
 * @param operation - Work to run; should pass the signal to fetch()
 * @param timeoutMs - Deadline in milliseconds
 * @param label - Description used in the error message
 */
export async function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([operation(controller.signal), deadline]);
    }
    finally {
        clearTimeout(timer);
    }
}
