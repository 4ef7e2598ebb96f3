/**
 * Shared types for HTTP interceptors
 *
 * @module types
 */

/**
 * Logging function used by the interceptors
 */
export type LogFunction = (message: string, ...args: unknown[]) => void;

/**
 * What the error handler reports for each failed request
 */
export interface ErrorInfo {
    error: Error;
    /** Status the client is answered with */
    status: number;
    serverDetails?: Readonly<Record<string, unknown>>;
    stack?: string;
}

/**
 * Error handler interceptor options
 */
export interface ErrorHandlerOptions {
    /**
     * Log errors when no onError callback is given
     * @default process.env.NODE_ENV !== "production"
     */
    logErrors?: boolean;

    /**
     * Include stack trace in logs
     * @default process.env.NODE_ENV !== "production"
     */
    includeStackTrace?: boolean;

    /**
     * Receives every error instead of the log
     */
    onError?: (info: ErrorInfo) => void;

    /**
     * @default console.error
     */
    logger?: LogFunction;
}

/**
 * Logger interceptor options
 */
export interface LoggerOptions {
    /**
     * Log level
     * @default "debug"
     */
    level?: "debug" | "info" | "warn" | "error";

    /**
     * Request paths that are not logged, e.g. health probes
     * @default []
     */
    skipPaths?: ReadonlyArray<string>;

    /**
     * Custom logger function
     * @default console[level]
     */
    logger?: LogFunction;
}

/**
 * Timeout interceptor options
 */
export interface TimeoutOptions {
    /**
     * Request timeout in milliseconds
     * @default 30000 (30 seconds)
     */
    duration?: number;
}

/**
 * Bulkhead interceptor options
 */
export interface BulkheadOptions {
    /**
     * Maximum number of concurrent requests
     * @default 10
     */
    capacity?: number;

    /**
     * Maximum queue size for pending requests
     * @default 10
     */
    queueSize?: number;
}
