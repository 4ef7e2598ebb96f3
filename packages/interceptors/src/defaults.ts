/**
 * Default interceptor chain factory
 *
 * Creates the production interceptor chain. The interceptor order is fixed:
 * errorHandler → timeout → bulkhead.
 *
 * @module defaults
 */

import type { Interceptor } from "@portico/core";
import { createBulkheadInterceptor } from "./bulkhead.ts";
import { createErrorHandlerInterceptor } from "./errorHandler.ts";
import { createTimeoutInterceptor } from "./timeout.ts";
import type { BulkheadOptions, ErrorHandlerOptions, TimeoutOptions } from "./types.ts";

/**
 * Configuration options for the default interceptor chain.
 *
 * Each interceptor can be:
 * - `false` to disable it entirely
 * - `true` to enable with default options
 * - An options object to enable with custom configuration
 */
export interface DefaultInterceptorOptions {
    /**
     * Error handler interceptor (first in chain).
     * Turns errors into JSON error responses.
     * @default true
     */
    errorHandler?: boolean | ErrorHandlerOptions;

    /**
     * Timeout interceptor.
     * Enforces request deadline before any processing.
     * @default true (30s)
     */
    timeout?: boolean | TimeoutOptions;

    /**
     * Bulkhead interceptor.
     * Limits concurrent requests to prevent resource exhaustion.
     * @default true (10/10)
     */
    bulkhead?: boolean | BulkheadOptions;
}

/**
 * Creates the default interceptor chain with the specified configuration.
 *
 * 1. **errorHandler** - Catch-all error responses (outermost, must be first)
 * 2. **timeout** - Enforce deadline before any processing
 * 3. **bulkhead** - Limit concurrency
 *
 * @param options - Configuration for each interceptor
 * @returns Array of configured interceptors in the correct order
 *
 * @example
 * ```typescript
 * // All defaults
 * const interceptors = createDefaultInterceptors();
 *
 * // Disable bulkhead, custom timeout
 * const interceptors = createDefaultInterceptors({
 *   bulkhead: false,
 *   timeout: { duration: 10000 },
 * });
 * ```
 */
export function createDefaultInterceptors(options: DefaultInterceptorOptions = {}): Interceptor[] {
    const interceptors: Interceptor[] = [];

    // 1. Error handler (must be first!)
    if (options.errorHandler !== false) {
        const opts = typeof options.errorHandler === "object" ? options.errorHandler : {};
        interceptors.push(createErrorHandlerInterceptor(opts));
    }

    // 2. Timeout
    if (options.timeout !== false) {
        const opts = typeof options.timeout === "object" ? options.timeout : {};
        interceptors.push(createTimeoutInterceptor(opts));
    }

    // 3. Bulkhead
    if (options.bulkhead !== false) {
        const opts = typeof options.bulkhead === "object" ? options.bulkhead : {};
        interceptors.push(createBulkheadInterceptor(opts));
    }

    return interceptors;
}
