/**
 * Timeout interceptor
 *
 * Prevents requests from hanging indefinitely.
 *
 * @module timeout
 */

import { HttpError, type Interceptor } from "@portico/core";
import { TaskCancelledError, TimeoutStrategy, timeout } from "cockatiel";
import type { TimeoutOptions } from "./types.ts";

/**
 * Create timeout interceptor
 *
 * Enforces a deadline on the rest of the chain. Handlers receive a signal
 * that aborts at the deadline (or at server shutdown) and must stop
 * writing to the response once it fires. Requests that exceed the
 * deadline fail with a 504 HttpError.
 *
 * @param options - Timeout options
 * @returns HTTP interceptor
 *
 * @example Server-side usage with createServer
 * ```typescript
 * import { createServer } from '@portico/core';
 * import { createTimeoutInterceptor } from '@portico/interceptors';
 *
 * const server = createServer({
 *   endpoints: [reportsEndpoints],
 *   interceptors: [
 *     createTimeoutInterceptor({ duration: 30000 }),
 *   ],
 * });
 * ```
 */
export function createTimeoutInterceptor(options: TimeoutOptions = {}): Interceptor {
    const { duration = 30000 } = options;

    // Validate options
    if (duration <= 0 || !Number.isFinite(duration)) {
        throw new Error("duration must be a positive finite number");
    }

    // Create timeout policy with Aggressive strategy
    const policy = timeout(duration, TimeoutStrategy.Aggressive);

    return (next) => async (ctx) => {
        try {
            await policy.execute(({ signal }) => next({ ...ctx, signal: AbortSignal.any([ctx.signal, signal]) }));
        } catch (err) {
            // Convert the cancellation into a gateway timeout
            if (err instanceof TaskCancelledError) {
                throw new HttpError(504, `Request timeout after ${duration}ms`, { path: ctx.request.url }, { cause: err });
            }

            // Re-throw other errors
            throw err;
        }
    };
}
