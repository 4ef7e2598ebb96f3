/**
 * @portico/interceptors
 *
 * HTTP interceptors with resilience patterns for @portico/core.
 *
 * Default chain (3 interceptors):
 * errorHandler → timeout → bulkhead
 *
 * @module @portico/interceptors
 */

// Default interceptor chain factory
export { createDefaultInterceptors } from "./defaults.ts";
export type { DefaultInterceptorOptions } from "./defaults.ts";

// Interceptor factories
export { createErrorHandlerInterceptor } from "./errorHandler.ts";
export { createLoggerInterceptor } from "./logger.ts";
export { createTimeoutInterceptor } from "./timeout.ts";
export { createBulkheadInterceptor } from "./bulkhead.ts";

// Types
export type {
    BulkheadOptions,
    ErrorHandlerOptions,
    ErrorInfo,
    LogFunction,
    LoggerOptions,
    TimeoutOptions,
} from "./types.ts";
