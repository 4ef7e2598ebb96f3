/**
 * Transport Manager
 *
 * Manages the lifecycle of the HTTP server: create, listen, close, destroy
 * connections. Supports 2 transport modes:
 * - Plaintext HTTP/1.1: via http.createServer
 * - TLS (server or mutual): via https.createServer
 *
 * @module TransportManager
 */

import { createServer as createHttpServer } from "node:http";
import { createServer as createHttpsServer } from "node:https";
import type { AddressInfo, ListenOptions, Server as NetServer } from "node:net";
import type { NodeHandler } from "./buildRoutes.ts";
import type { HttpServerConfig } from "./config/envSchema.ts";
import type { ResolvedTLS } from "./TLSConfig.ts";
import type { Logger, TransportServer } from "./types.ts";

/**
 * Transport configuration for server creation
 */
export interface TransportConfig {
    tls: ResolvedTLS;
    timeouts: Pick<HttpServerConfig, "readTimeout" | "writeTimeout" | "idleTimeout" | "headerReadTimeout">;
    maxHeaderBytes: number;
    logger: Logger;
}

/**
 * Owns the listening socket: creation, listening, and shutdown.
 */
export class TransportManager {
    private _server: TransportServer | null = null;
    private _address: AddressInfo | null = null;
    private _closed: Promise<void> | null = null;

    /**
     * The underlying server instance
     */
    get server(): TransportServer | null {
        return this._server;
    }

    /**
     * The address the server is listening on
     */
    get address(): AddressInfo | null {
        return this._address;
    }

    /**
     * Whether the server is currently bound
     */
    get listening(): boolean {
        return this._server?.listening ?? false;
    }

    /**
     * Settles when the listening server closes: resolves on close, rejects
     * on a server error after binding. Null until listen() succeeds.
     */
    get closed(): Promise<void> | null {
        return this._closed;
    }

    /**
     * Create the server and start listening.
     *
     * Timeouts: read -> requestTimeout, header -> headersTimeout,
     * idle -> keepAliveTimeout, write -> socket inactivity timeout.
     * Header and idle fall back to read when zero.
     *
     * @param handler - Request listener
     * @param config - Transport configuration
     * @param listenOptions - Where to bind
     * @returns The bound address
     */
    async listen(handler: NodeHandler, config: TransportConfig, listenOptions: ListenOptions): Promise<AddressInfo> {
        const { tls, timeouts, maxHeaderBytes, logger } = config;

        if (tls.mode === "off") {
            this._server = createHttpServer({ maxHeaderSize: maxHeaderBytes }, handler);
        } else {
            const server = createHttpsServer({ ...tls.options, maxHeaderSize: maxHeaderBytes }, handler);
            server.on("tlsClientError", (err, socket) => {
                logger.debug(`TLS handshake with ${socket.remoteAddress ?? "unknown peer"} failed: ${err.message}`);
            });
            this._server = server;
        }

        this._server.requestTimeout = timeouts.readTimeout;
        this._server.headersTimeout = timeouts.headerReadTimeout || timeouts.readTimeout;
        this._server.keepAliveTimeout = timeouts.idleTimeout || timeouts.readTimeout;
        this._server.timeout = timeouts.writeTimeout;

        const server: NetServer = this._server;

        const address = await new Promise<AddressInfo>((resolve, reject) => {
            const onError = (err: Error) => {
                reject(err);
            };
            server.once("error", onError);

            try {
                server.listen(listenOptions, () => {
                    server.removeListener("error", onError);

                    const bound = server.address();
                    if (!bound || typeof bound === "string") {
                        reject(new Error(`unexpected listener address: ${String(bound)}`));
                        return;
                    }
                    resolve(bound);
                });
            } catch (err) {
                server.removeListener("error", onError);
                reject(err);
            }
        });

        this._address = address;
        this._closed = new Promise<void>((resolve, reject) => {
            server.once("close", () => resolve());
            server.once("error", reject);
        });

        const displayHost = address.family === "IPv6" ? `[${address.address}]` : address.address;
        logger.info(`Server listening ${tls.mode === "off" ? "http" : "https"}://${displayHost}:${address.port}`);

        return address;
    }

    /**
     * Stop accepting connections, close idle keep-alive connections, and
     * resolve once every in-flight request has finished.
     */
    async close(): Promise<void> {
        const transport = this._server;
        if (!transport?.listening) return;

        const server: NetServer = transport;
        await new Promise<void>((resolve, reject) => {
            server.close((err) => {
                if (err) reject(err);
                else resolve();
            });
            transport.closeIdleConnections();
        });
    }

    /**
     * Forcefully destroy every open connection
     */
    destroyAllConnections(): void {
        this._server?.closeAllConnections();
    }

    /**
     * Reset internal state (nullify server and address)
     */
    dispose(): void {
        this._server = null;
        this._address = null;
    }
}
