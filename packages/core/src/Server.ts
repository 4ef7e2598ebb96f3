/**
 * Server implementation with a run-once / shutdown-idempotent lifecycle
 *
 * @module Server
 */

import { EventEmitter } from "node:events";
import type { IncomingMessage, ServerResponse } from "node:http";
import { type AddressInfo, isIP, type ListenOptions } from "node:net";
import { buildRoutes, type NodeHandler } from "./buildRoutes.ts";
import type { HttpServerConfig } from "./config/envSchema.ts";
import { parseEnvConfig } from "./config/envSchema.ts";
import { ConfigurationError, LifecycleError, ServeError, toError } from "./errors.ts";
import { performGracefulShutdown } from "./gracefulShutdown.ts";
import { HeaderName } from "./headers.ts";
import { RouteTableBuilder } from "./RouteTableBuilder.ts";
import { type ResolvedTLS, resolveTLSConfig } from "./TLSConfig.ts";
import { TransportManager } from "./TransportManager.ts";
import type { CreateServerOptions, ListenerProvider, Logger, RouteTable, Server, ShutdownOptions } from "./types.ts";
import { ServerState } from "./types.ts";

const DEFAULT_SHUTDOWN_TIMEOUT = 30_000;

/**
 * Default listener provider: the bind IP must be a literal address.
 */
export const defaultListenerProvider: ListenerProvider = (bindIp, bindPort) => {
    if (isIP(bindIp) === 0) {
        throw new Error(`failed to parse bind IP: ${bindIp}`);
    }
    return { host: bindIp, port: bindPort };
};

function loadConfig(options: CreateServerOptions): HttpServerConfig {
    const provider = options.configProvider ?? (() => parseEnvConfig());
    try {
        return provider();
    } catch (error) {
        const cause = toError(error);
        throw new ConfigurationError(`could not load configuration: ${cause.message}`, { cause });
    }
}

function compileRoutes(options: CreateServerOptions): RouteTable {
    const builder = new RouteTableBuilder();
    for (const endpoints of options.endpoints ?? []) {
        if (typeof endpoints === "function") {
            endpoints(builder);
        } else {
            endpoints.registerEndpoints(builder);
        }
    }
    return builder.compile();
}

/**
 * Server implementation class
 *
 * Internal implementation of the Server interface.
 * Use createServer() factory function to create instances.
 */
class ServerImpl extends EventEmitter implements Server {
    // =========================================================================
    // Private state
    // =========================================================================

    private _state: ServerState = ServerState.CREATED;
    private readonly _options: CreateServerOptions;
    private readonly _logger: Logger;
    private readonly _config: HttpServerConfig;
    private readonly _routes: RouteTable;
    private readonly _dispatch: NodeHandler;
    private readonly _tls: ResolvedTLS;
    private readonly _abortController = new AbortController();
    private readonly _transport = new TransportManager();
    private _signalHandlers: Map<NodeJS.Signals, () => void> = new Map();

    private _ran = false;
    private _shutdownStarted = false;
    private _listening: Promise<AddressInfo> | null = null;
    private _runSettled: Promise<void> = Promise.resolve();
    private _shutdownPromise: Promise<void> | null = null;

    // =========================================================================
    // Constructor
    // =========================================================================

    constructor(options: CreateServerOptions) {
        super();
        this._options = options;
        this._logger = options.logger ?? console;
        this._config = loadConfig(options);
        this._routes = compileRoutes(options);
        this._dispatch = buildRoutes({
            table: this._routes,
            interceptors: options.interceptors ?? [],
            shutdownSignal: this._abortController.signal,
            logger: this._logger,
        }).handler;
        this._tls = resolveTLSConfig(this._config);
    }

    // =========================================================================
    // State properties
    // =========================================================================

    get address(): AddressInfo | null {
        return this._transport.address;
    }

    get isRunning(): boolean {
        return this._state === ServerState.RUNNING;
    }

    get state(): ServerState {
        return this._state;
    }

    get config(): Readonly<HttpServerConfig> {
        return this._config;
    }

    get routes(): RouteTable {
        return this._routes;
    }

    get shutdownSignal(): AbortSignal {
        return this._abortController.signal;
    }

    // =========================================================================
    // Lifecycle methods
    // =========================================================================

    run(): Promise<void> {
        if (this._ran) {
            throw new LifecycleError("HTTP server can only be run once per instance");
        }
        this._ran = true;

        const running = this._serve();
        this._runSettled = running.then(
            () => undefined,
            () => undefined,
        );
        return running;
    }

    shutdown(options: ShutdownOptions = {}): Promise<void> {
        if (!this._shutdownPromise) {
            this._shutdownStarted = true;
            this._shutdownPromise = this._drainAndWait(options);
        }
        return this._shutdownPromise;
    }

    // =========================================================================
    // Private methods
    // =========================================================================

    private _handleRequest = (req: IncomingMessage, res: ServerResponse): void => {
        if (!this._config.keepAlive || this._shutdownStarted) {
            res.setHeader(HeaderName.CONNECTION, "close");
        }
        this._dispatch(req, res);
    };

    private async _bind(): Promise<AddressInfo> {
        const listenerProvider = this._options.listenerProvider ?? defaultListenerProvider;
        const listenOptions: ListenOptions = await listenerProvider(this._config.bindIp, this._config.bindPort);

        return this._transport.listen(this._handleRequest, {
            tls: this._tls,
            timeouts: this._config,
            maxHeaderBytes: this._config.maxHeaderBytes,
            logger: this._logger,
        }, listenOptions);
    }

    private async _serve(): Promise<void> {
        if (this._shutdownStarted) return;

        this._state = ServerState.STARTING;
        this.emit("start");

        const listening = this._bind();
        this._listening = listening;

        let address: AddressInfo;
        try {
            address = await listening;
        } catch (error) {
            this._state = ServerState.STOPPED;
            throw new ServeError("failed to create the network listener", { cause: toError(error) });
        }

        try {
            this._options.onBound?.(address);
        } catch (error) {
            const cause = toError(error);
            await this._closeAfterFailure();
            throw new ServeError("bound callback failed", { cause });
        }

        if (!this._shutdownStarted) {
            this._state = ServerState.RUNNING;
            this._setupAutoShutdown();
        }
        this.emit("ready", address);

        try {
            await this._transport.closed;
        } catch (error) {
            const cause = toError(error);
            await this._closeAfterFailure();
            throw new ServeError("error encountered while serving http requests", { cause });
        }

        this._state = ServerState.STOPPED;
        if (!this._shutdownStarted) {
            this._removeAutoShutdown();
            throw new ServeError("listener closed unexpectedly");
        }
        this.emit("stop");
    }

    private async _drainAndWait(options: ShutdownOptions): Promise<void> {
        const { shutdown = {} } = this._options;
        const forceClose = options.forceCloseOnTimeout ?? shutdown.forceCloseOnTimeout ?? true;

        try {
            await this._drain(options, forceClose);
        } catch (error) {
            // run() settles once a forced close completes
            if (forceClose) {
                await this._runSettled;
            }
            throw error;
        }
        await this._runSettled;
    }

    private async _drain(options: ShutdownOptions, forceClose: boolean): Promise<void> {
        this._state = ServerState.STOPPING;
        this.emit("stopping");

        // Lets handlers of long-running requests stop early
        this._abortController.abort();
        this._removeAutoShutdown();

        if (this._listening) {
            // A bind failure is reported by run()
            await this._listening.catch(() => undefined);
        }

        if (!this._transport.listening) {
            this._state = ServerState.STOPPED;
            this.emit("stop");
            return;
        }

        const { shutdown = {} } = this._options;
        await performGracefulShutdown(this._transport, {
            timeout: options.timeout ?? shutdown.timeout ?? DEFAULT_SHUTDOWN_TIMEOUT,
            forceCloseOnTimeout: forceClose,
            signal: options.signal,
            logger: this._logger,
        });
    }

    private async _closeAfterFailure(): Promise<void> {
        this._state = ServerState.STOPPED;
        this._removeAutoShutdown();
        this._transport.destroyAllConnections();
        try {
            await this._transport.close();
        } catch (error) {
            this._logger.error("Error closing the listener after a serve failure:", error);
        } finally {
            this._transport.dispose();
        }
    }

    private _setupAutoShutdown(): void {
        const { shutdown = {} } = this._options;

        if (!shutdown.autoShutdown) {
            return;
        }

        const signals = shutdown.signals ?? ["SIGTERM", "SIGINT"];

        for (const signal of signals) {
            const handler = () => {
                this._logger.info(`Received ${signal}, initiating graceful shutdown...`);
                this.shutdown().catch((err: unknown) => {
                    this._logger.error("Graceful shutdown failed:", err);
                });
            };

            this._signalHandlers.set(signal, handler);
            process.on(signal, handler);
        }
    }

    private _removeAutoShutdown(): void {
        for (const [signal, handler] of this._signalHandlers) {
            process.removeListener(signal, handler);
        }
        this._signalHandlers.clear();
    }
}

/**
 * Create a new server instance
 *
 * Loads the configuration, compiles the route table and resolves TLS.
 * Returns a server that is not yet running; call server.run() to bind.
 *
 * @param options - Server configuration options
 * @returns Unstarted server instance
 * @throws ConfigurationError when the configuration, a registration or the TLS material is invalid
 *
 * @example
 * ```typescript
 * import { createServer } from '@portico/core';
 * import { createDefaultInterceptors } from '@portico/interceptors';
 *
 * const server = createServer({
 *   endpoints: [ordersEndpoints],
 *   interceptors: createDefaultInterceptors(),
 *   shutdown: { autoShutdown: true },
 * });
 *
 * await server.run();
 * ```
 */
export function createServer(options: CreateServerOptions = {}): Server {
    return new ServerImpl(options);
}
