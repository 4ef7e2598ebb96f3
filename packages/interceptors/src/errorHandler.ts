/**
 * Error handler interceptor
 *
 * Turns errors thrown further down the chain into JSON error responses.
 * Recognizes the SanitizableError protocol for safe client-facing messages.
 *
 * @module errorHandler
 */

import { isSanitizableError, type Interceptor, resolveErrorResponse, respondJSON, toError } from "@portico/core";
import type { ErrorHandlerOptions, ErrorInfo } from "./types.ts";

/**
 * Create error handler interceptor
 *
 * Catches all errors and answers with `{ "message": ... }` and the status
 * resolved by the core (HttpError, registered error class, or 500). Server
 * details of a SanitizableError go to the log or `onError`, never to the
 * client.
 *
 * IMPORTANT: This interceptor should be FIRST in the chain to catch all errors.
 *
 * @param options - Error handler options
 * @returns HTTP interceptor
 *
 * @example Server-side usage with createServer
 * ```typescript
 * import { createServer } from '@portico/core';
 * import { createErrorHandlerInterceptor } from '@portico/interceptors';
 * import { ordersEndpoints } from './orders.ts';
 *
 * const server = createServer({
 *   endpoints: [ordersEndpoints],
 *   interceptors: [
 *     createErrorHandlerInterceptor({
 *       onError: ({ error, status, serverDetails, stack }) => {
 *         logger.error('request failed', { error: error.message, status, serverDetails, stack });
 *       },
 *     }),
 *   ],
 * });
 *
 * await server.run();
 * ```
 */
export function createErrorHandlerInterceptor(options: ErrorHandlerOptions = {}): Interceptor {
    const {
        logErrors = process.env.NODE_ENV !== "production",
        includeStackTrace = process.env.NODE_ENV !== "production",
        onError,
        logger = console.error,
    } = options;

    return (next) => async (ctx) => {
        try {
            await next(ctx);
        } catch (err) {
            const error = toError(err);
            const { status, body } = resolveErrorResponse(err);

            const info: ErrorInfo = { error, status };
            if (isSanitizableError(err)) info.serverDetails = err.serverDetails;
            if (includeStackTrace && error.stack) info.stack = error.stack;

            if (onError) {
                onError(info);
            } else if (logErrors) {
                logger(`Request ${ctx.request.method} ${ctx.request.url} failed with ${status}:`, err);
                if (info.serverDetails) {
                    logger("Server details:", info.serverDetails);
                }
                if (info.stack) {
                    logger("Stack trace:", info.stack);
                }
            }

            // Too late for a status line; drop the connection instead
            if (ctx.response.headersSent) {
                ctx.response.destroy();
                return;
            }
            respondJSON(ctx.response, status, body);
        }
    };
}
