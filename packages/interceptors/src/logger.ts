/**
 * Logger interceptor
 *
 * Logs every request with its status and timing.
 *
 * @module logger
 */

import type { Interceptor } from "@portico/core";
import type { LoggerOptions } from "./types.ts";

/**
 * Create logger interceptor
 *
 * Logs the method and path when a request enters the chain and its status
 * and duration when it leaves, whether it succeeded or threw.
 *
 * @param options - Logger options
 * @returns HTTP interceptor
 *
 * @example Server-side usage with createServer
 * ```typescript
 * import { createServer } from '@portico/core';
 * import { createLoggerInterceptor } from '@portico/interceptors';
 *
 * const server = createServer({
 *   endpoints: [ordersEndpoints],
 *   interceptors: [
 *     createLoggerInterceptor({
 *       level: 'info',
 *       skipPaths: ['/healthz'],
 *     }),
 *   ],
 * });
 * ```
 */
export function createLoggerInterceptor(options: LoggerOptions = {}): Interceptor {
    const { level = "debug", skipPaths = [] } = options;
    const logger = options.logger ?? console[level];

    return (next) => async (ctx) => {
        const method = ctx.request.method ?? "UNKNOWN";
        const path = (ctx.request.url ?? "/").split("?")[0] ?? "/";

        if (skipPaths.includes(path)) {
            await next(ctx);
            return;
        }

        const startTime = performance.now();
        logger(`HTTP ${method} ${path} request`);

        try {
            await next(ctx);
        } finally {
            const duration = (performance.now() - startTime).toFixed(2);
            logger(`HTTP ${method} ${path} ${ctx.response.statusCode} completed in ${duration}ms`);
        }
    };
}
