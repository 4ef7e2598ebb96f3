/**
 * Graceful Shutdown
 *
 * Orchestrates the drain: close the transport, race it against the
 * deadline and the caller's signal, force-close on expiry.
 *
 * @module gracefulShutdown
 */

import { ShutdownTimeoutError } from "./errors.ts";
import type { TransportManager } from "./TransportManager.ts";
import type { Logger } from "./types.ts";

/**
 * Options for graceful shutdown behavior
 */
export interface GracefulShutdownOptions {
    timeout: number;
    forceCloseOnTimeout: boolean;
    signal?: AbortSignal | undefined;
    logger: Logger;
}

/**
 * The subset of TransportManager the drain needs
 */
export type DrainableTransport = Pick<TransportManager, "server" | "close" | "destroyAllConnections" | "dispose">;

/**
 * Perform a graceful shutdown sequence:
 *
 * 1. Close the transport (stop accepting, close idle keep-alive connections)
 * 2. Race the close against the deadline and the caller's signal
 * 3. On expiry: destroy the remaining connections when forcing, then
 *    reject with ShutdownTimeoutError
 * 4. Dispose transport state
 *
 * @param transport - The transport to drain
 * @param options - Deadline, cancellation and force-close configuration
 * @throws ShutdownTimeoutError when the drain did not finish in time
 */
export async function performGracefulShutdown(transport: DrainableTransport, options: GracefulShutdownOptions): Promise<void> {
    if (!transport.server) return;

    const { timeout: shutdownTimeout, forceCloseOnTimeout: forceClose, signal, logger } = options;

    const graceful = transport.close().then(() => "closed" as const);

    // Observed here so a late failure after the deadline is not unhandled
    graceful.catch((err: unknown) => {
        logger.error("Error during graceful close:", err);
    });

    let timer: ReturnType<typeof globalThis.setTimeout> | undefined;
    let onAbort: (() => void) | undefined;
    const expired = new Promise<"timeout" | "aborted">((resolve) => {
        timer = globalThis.setTimeout(() => resolve("timeout"), shutdownTimeout);
        if (signal) {
            if (signal.aborted) {
                resolve("aborted");
                return;
            }
            onAbort = () => resolve("aborted");
            signal.addEventListener("abort", onAbort, { once: true });
        }
    });

    try {
        const result = await Promise.race([graceful, expired]);

        if (result !== "closed") {
            const reason = result === "timeout" ? `Shutdown timeout (${shutdownTimeout}ms) exceeded` : "Shutdown cancelled by caller";
            logger.warn(reason);
            if (forceClose) {
                transport.destroyAllConnections();
                await graceful;
            }
            throw new ShutdownTimeoutError(`server did not drain: ${reason}`);
        }
    } finally {
        if (timer !== undefined) {
            globalThis.clearTimeout(timer);
        }
        if (signal && onAbort) {
            signal.removeEventListener("abort", onAbort);
        }
        transport.dispose();
    }
}
