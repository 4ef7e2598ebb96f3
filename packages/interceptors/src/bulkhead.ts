/**
 * Bulkhead interceptor
 *
 * Limits concurrent requests to prevent resource exhaustion.
 *
 * @module bulkhead
 */

import { HttpError, type Interceptor } from "@portico/core";
import { BulkheadRejectedError, bulkhead } from "cockatiel";
import type { BulkheadOptions } from "./types.ts";

/**
 * Create bulkhead interceptor
 *
 * Limits concurrent requests to prevent resource exhaustion.
 * Requests beyond capacity are queued. Requests beyond queue size fail
 * with a 503 HttpError.
 *
 * @param options - Bulkhead options
 * @returns HTTP interceptor
 *
 * @example Server-side usage with createServer
 * ```typescript
 * import { createServer } from '@portico/core';
 * import { createBulkheadInterceptor } from '@portico/interceptors';
 *
 * const server = createServer({
 *   endpoints: [ordersEndpoints],
 *   interceptors: [
 *     createBulkheadInterceptor({
 *       capacity: 10,       // Max 10 concurrent requests
 *       queueSize: 10,      // Queue up to 10 pending requests
 *     }),
 *   ],
 * });
 * ```
 */
export function createBulkheadInterceptor(options: BulkheadOptions = {}): Interceptor {
    const { capacity = 10, queueSize = 10 } = options;

    // Validate options
    if (capacity < 1 || !Number.isFinite(capacity)) {
        throw new Error("capacity must be a positive finite number");
    }

    if (queueSize < 0 || !Number.isFinite(queueSize)) {
        throw new Error("queueSize must be a non-negative finite number");
    }

    // Create bulkhead policy
    const policy = bulkhead(capacity, queueSize);

    return (next) => async (ctx) => {
        try {
            await policy.execute(() => next(ctx));
        } catch (err) {
            if (err instanceof BulkheadRejectedError) {
                throw new HttpError(
                    503,
                    "Server is at capacity",
                    { capacity, queueSize, freeExecutionSlots: policy.executionSlots, freeQueueSlots: policy.queueSlots },
                    { cause: err },
                );
            }

            // Re-throw other errors
            throw err;
        }
    };
}
