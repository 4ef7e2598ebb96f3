/**
 * Public API types for Server
 *
 * @module types
 */

import type { EventEmitter } from "node:events";
import type { IncomingMessage, Server as HttpServer, ServerResponse } from "node:http";
import type { Server as HttpsServer } from "node:https";
import type { AddressInfo, ListenOptions } from "node:net";
import type { HttpServerConfig } from "./config/envSchema.ts";
import type { RouteTableBuilder } from "./RouteTableBuilder.ts";

// =============================================================================
// HANDLERS
// =============================================================================

/**
 * HTTP methods accepted by the route table
 */
export const HttpMethod = {
    CONNECT: "CONNECT",
    DELETE: "DELETE",
    GET: "GET",
    HEAD: "HEAD",
    OPTIONS: "OPTIONS",
    PATCH: "PATCH",
    POST: "POST",
    PUT: "PUT",
    TRACE: "TRACE",
} as const;

export type HttpMethod = (typeof HttpMethod)[keyof typeof HttpMethod];

/**
 * Per-request state handed to handlers and interceptors
 */
export interface RequestContext {
    readonly request: IncomingMessage;
    readonly response: ServerResponse;

    /** Values of the `{name}` segments of the matched path */
    readonly params: Readonly<Record<string, string | undefined>>;

    /**
     * Aborted when the server begins shutdown. Interceptors may replace it
     * with a narrower signal (e.g. a request timeout).
     */
    readonly signal: AbortSignal;
}

/**
 * Terminal request handler
 */
export type Handler = (ctx: RequestContext) => void | Promise<void>;

/**
 * Wraps the next handler in the chain. The returned handler decides,
 * per request, whether to call `next`.
 *
 * @example
 * ```typescript
 * const requestId: Interceptor = (next) => async (ctx) => {
 *   ctx.response.setHeader("X-Request-Id", randomUUID());
 *   await next(ctx);
 * };
 * ```
 */
export type Interceptor = (next: Handler) => Handler;

/**
 * Endpoint definition passed to `RouteTableBuilder.register()`
 */
export interface Endpoint {
    /** Endpoint-specific interceptors, run after the server's common interceptors */
    interceptors?: ReadonlyArray<Interceptor | null | undefined>;

    /** Terminal handler; a 501 handler is used when omitted */
    handler?: Handler | null;
}

/**
 * Endpoint as stored in a compiled route table
 */
export interface CompiledEndpoint {
    readonly interceptors: ReadonlyArray<Interceptor>;
    readonly handler: Handler;
}

/**
 * Compiled route table: path -> method -> endpoint
 */
export type RouteTable = ReadonlyMap<string, ReadonlyMap<HttpMethod, CompiledEndpoint>>;

/**
 * Endpoint route function
 *
 * Function that registers endpoints on the builder.
 */
export type EndpointRoute = (builder: RouteTableBuilder) => void;

/**
 * Object-style endpoint registration
 */
export interface EndpointProvider {
    registerEndpoints(builder: RouteTableBuilder): void;
}

// =============================================================================
// AMBIENT
// =============================================================================

/**
 * Logger used by the server core
 *
 * `console` satisfies it.
 */
export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

/**
 * Underlying Node.js server
 */
export type TransportServer = HttpServer | HttpsServer;

/**
 * Supplies the validated server configuration
 */
export type ConfigProvider = () => HttpServerConfig;

/**
 * Turns the configured bind address into listen options
 */
export type ListenerProvider = (bindIp: string, bindPort: number) => ListenOptions | Promise<ListenOptions>;

// =============================================================================
// SERVER API
// =============================================================================

/**
 * Server state constants
 */
export const ServerState = {
    /** Server created but not started */
    CREATED: "created",
    /** Server is binding its listener */
    STARTING: "starting",
    /** Server is running and accepting connections */
    RUNNING: "running",
    /** Server is draining */
    STOPPING: "stopping",
    /** Server has stopped */
    STOPPED: "stopped",
} as const;

export type ServerState = (typeof ServerState)[keyof typeof ServerState];

/**
 * Lifecycle event names
 */
export const LifecycleEvent = {
    /** Emitted when run() begins binding */
    START: "start",
    /** Emitted once the listener is bound */
    READY: "ready",
    /** Emitted once, when the drain begins */
    STOPPING: "stopping",
    /** Emitted when the drain has finished */
    STOP: "stop",
} as const;

export type LifecycleEvent = (typeof LifecycleEvent)[keyof typeof LifecycleEvent];

/**
 * Server-level graceful shutdown options
 */
export interface ServerShutdownOptions {
    /**
     * Default drain deadline in milliseconds, used when shutdown() gets none
     * @default 30000
     */
    timeout?: number;

    /**
     * Destroy remaining connections when the deadline is exceeded
     * @default true
     */
    forceCloseOnTimeout?: boolean;

    /**
     * Call shutdown() when one of `signals` is received
     * @default false
     */
    autoShutdown?: boolean;

    /**
     * Signals to listen for when autoShutdown is enabled
     * @default ["SIGTERM", "SIGINT"]
     */
    signals?: NodeJS.Signals[];
}

/**
 * Options for a single shutdown() call
 */
export interface ShutdownOptions {
    /** Drain deadline in milliseconds */
    timeout?: number;

    /** Caller cancellation; aborting it ends the drain like a deadline */
    signal?: AbortSignal;

    /** Overrides the server-level setting */
    forceCloseOnTimeout?: boolean;
}

/**
 * Server configuration options for createServer()
 */
export interface CreateServerOptions {
    /**
     * Endpoint registrations, each called once during construction
     */
    endpoints?: Array<EndpointRoute | EndpointProvider>;

    /**
     * Interceptors applied to every endpoint, outermost first
     */
    interceptors?: Array<Interceptor | null | undefined>;

    /**
     * Configuration source
     * @default reads HTTP_SERVER_* from process.env
     */
    configProvider?: ConfigProvider;

    /**
     * Listen options source
     * @default validates the bind IP and listens on it
     */
    listenerProvider?: ListenerProvider;

    /**
     * Called once, after the socket is listening
     */
    onBound?: (address: AddressInfo) => void;

    /**
     * @default console
     */
    logger?: Logger;

    /**
     * Graceful shutdown configuration
     */
    shutdown?: ServerShutdownOptions;
}

/**
 * Server interface with run-once / shutdown-idempotent lifecycle
 *
 * @example
 * ```typescript
 * import { createServer } from '@portico/core';
 *
 * const server = createServer({
 *   endpoints: [(builder) => {
 *     builder.register("/", "GET", {
 *       handler: ({ response }) => {
 *         response.end("PONG");
 *       },
 *     });
 *   }],
 *   onBound: (address) => console.log(`listening on ${address.port}`),
 * });
 *
 * const running = server.run();
 *
 * // Later
 * await server.shutdown({ timeout: 5000 });
 * await running;
 * ```
 */
export interface Server extends EventEmitter {
    /**
     * Bind and serve until shutdown.
     *
     * Resolves after a caller-initiated shutdown, rejects with a ServeError
     * on any other termination.
     *
     * @throws LifecycleError synchronously when called a second time
     */
    run(): Promise<void>;

    /**
     * Drain and stop. Every call returns the outcome of the first one.
     */
    shutdown(options?: ShutdownOptions): Promise<void>;

    /**
     * Current server address, null until bound
     */
    readonly address: AddressInfo | null;

    readonly isRunning: boolean;

    readonly state: ServerState;

    /**
     * Configuration returned by the config provider
     */
    readonly config: Readonly<HttpServerConfig>;

    /**
     * Compiled route table
     */
    readonly routes: RouteTable;

    /**
     * Aborted when shutdown begins
     */
    readonly shutdownSignal: AbortSignal;

    on(event: "start", listener: () => void): this;
    on(event: "ready", listener: (address: AddressInfo) => void): this;
    on(event: "stopping", listener: () => void): this;
    on(event: "stop", listener: () => void): this;

    once(event: "start", listener: () => void): this;
    once(event: "ready", listener: (address: AddressInfo) => void): this;
    once(event: "stopping", listener: () => void): this;
    once(event: "stop", listener: () => void): this;

    off(event: "start", listener: () => void): this;
    off(event: "ready", listener: (address: AddressInfo) => void): this;
    off(event: "stopping", listener: () => void): this;
    off(event: "stop", listener: () => void): this;
}
