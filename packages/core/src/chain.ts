/**
 * Interceptor chain
 *
 * @module chain
 */

import type { Handler, Interceptor } from "./types.ts";

/**
 * Compose interceptors around a terminal handler.
 *
 * The first interceptor is the outermost: it runs first and sees the
 * outcome of everything after it. Missing entries are skipped. With no
 * interceptors the terminal handler itself is returned.
 *
 * @param interceptors - Interceptors in registration order
 * @param handler - Terminal handler
 * @returns The composed handler
 * @throws TypeError when the terminal handler is missing
 *
 * @example
 * ```typescript
 * const handler = createChain([errorHandler, logger], ({ response }) => {
 *   response.end("PONG");
 * });
 * ```
 */
export function createChain(interceptors: ReadonlyArray<Interceptor | null | undefined> | null | undefined, handler: Handler | null | undefined): Handler {
    if (typeof handler !== "function") {
        throw new TypeError("interceptor chain requires a terminal handler");
    }

    if (!interceptors?.length) {
        return handler;
    }

    return interceptors.reduceRight<Handler>((next, interceptor) => (interceptor ? interceptor(next) : next), handler);
}
