/**
 * Error types
 *
 * Construction, registration and lifecycle errors thrown by the core, plus
 * the sanitizable error protocol used when a handler error becomes an
 * HTTP response.
 *
 * @module errors
 */

/**
 * Sanitizable error interface.
 *
 * Errors implementing this protocol carry rich server-side details
 * but expose only a safe message to clients.
 */
export interface SanitizableError {
    readonly clientMessage: string;
    readonly serverDetails: Readonly<Record<string, unknown>>;
}

/**
 * Type guard for SanitizableError.
 *
 * Checks for clientMessage (string), serverDetails (non-null object)
 * and a numeric HTTP status.
 */
export function isSanitizableError(err: unknown): err is Error & SanitizableError & { status: number } {
    if (!(err instanceof Error)) return false;
    const clientMessage: unknown = Reflect.get(err, "clientMessage");
    const serverDetails: unknown = Reflect.get(err, "serverDetails");
    const status: unknown = Reflect.get(err, "status");
    return typeof clientMessage === "string" && typeof serverDetails === "object" && serverDetails !== null && typeof status === "number";
}

/**
 * Error raised by handlers and interceptors to answer with a specific status.
 *
 * @example
 * ```typescript
 * throw new HttpError(404, "order not found", { orderId });
 * ```
 */
export class HttpError extends Error implements SanitizableError {
    readonly status: number;
    readonly clientMessage: string;
    readonly serverDetails: Readonly<Record<string, unknown>>;

    constructor(status: number, clientMessage: string, serverDetails: Record<string, unknown> = {}, options?: ErrorOptions) {
        super(clientMessage, options);
        this.name = "HttpError";
        this.status = status;
        this.clientMessage = clientMessage;
        this.serverDetails = serverDetails;
    }
}

/**
 * Invalid or unloadable server configuration (config provider, TLS material)
 */
export class ConfigurationError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "ConfigurationError";
    }
}

/**
 * A client CA file could not be read
 */
export class ClientCAReadError extends ConfigurationError {
    readonly path: string;

    constructor(path: string, options?: ErrorOptions) {
        super(`could not read client CA certificate on path ${path}`, options);
        this.name = "ClientCAReadError";
        this.path = path;
    }
}

/**
 * A client CA file was read but holds no usable certificate
 */
export class ClientCAParseError extends ConfigurationError {
    readonly path: string;

    constructor(path: string, options?: ErrorOptions) {
        super(`failed to append client CA certificate (${path})`, options);
        this.name = "ClientCAParseError";
        this.path = path;
    }
}

/**
 * Misconfigured route registration. Raised at registration time.
 */
export class RegistrationError extends ConfigurationError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "RegistrationError";
    }
}

/**
 * Misuse of the server lifecycle
 */
export class LifecycleError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "LifecycleError";
    }
}

/**
 * The server could not bind, or stopped serving without being asked to
 */
export class ServeError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(options?.cause instanceof Error ? `${message}: ${options.cause.message}` : message, options);
        this.name = "ServeError";
    }
}

/**
 * The drain did not finish before the caller's deadline
 */
export class ShutdownTimeoutError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ShutdownTimeoutError";
    }
}

/**
 * Normalizes an unknown thrown value
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
