/**
 * TLS configuration utilities
 *
 * Resolves the configured trust mode into options for `https.createServer`.
 *
 * @module TLSConfig
 */

import { X509Certificate } from "node:crypto";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { createSecureContext, type TlsOptions } from "node:tls";
import { TLSMode } from "./config/envSchema.ts";
import { ClientCAParseError, ClientCAReadError, ConfigurationError, toError } from "./errors.ts";

/**
 * Inputs of the resolver. `tlsMode` is a plain string so that values from
 * untyped sources reach the mode check.
 */
export interface TLSSettings {
    tlsMode: string;
    certPath?: string | undefined;
    keyPath?: string | undefined;
    clientCaPaths?: ReadonlyArray<string> | undefined;
}

/**
 * Resolved transport security: exactly one variant per mode
 */
export type ResolvedTLS =
    | { readonly mode: typeof TLSMode.OFF }
    | { readonly mode: typeof TLSMode.TLS; readonly options: Readonly<TlsOptions> }
    | { readonly mode: typeof TLSMode.MUTUAL_TLS; readonly options: Readonly<TlsOptions> };

const MIN_TLS_VERSION = "TLSv1.3";

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Read TLS certificates from configuration
 *
 * Reads the certificate and key and checks that they form a usable pair.
 *
 * @returns TLS key and cert buffers
 * @throws ConfigurationError "failed to load the server certificates"
 */
export function readTLSCertificates(certPath: string | undefined, keyPath: string | undefined): { key: Buffer; cert: Buffer } {
    try {
        if (!certPath || !keyPath) {
            throw new Error("certificate and key paths are required");
        }
        const cert = readFileSync(resolve(certPath));
        const key = readFileSync(resolve(keyPath));
        createSecureContext({ cert, key });
        return { cert, key };
    } catch (error) {
        const cause = toError(error);
        throw new ConfigurationError(`failed to load the server certificates: ${cause.message}`, { cause });
    }
}

/**
 * Read and parse client CA certificates into a PEM list
 *
 * Each file must hold at least one parseable PEM certificate.
 *
 * @throws ClientCAReadError when a file cannot be read
 * @throws ClientCAParseError when a file holds no usable certificate
 */
export function readClientCAs(paths: ReadonlyArray<string>): string[] {
    const pool: string[] = [];

    for (const path of paths) {
        let contents: string;
        try {
            contents = readFileSync(resolve(path), "utf8");
        } catch (error) {
            throw new ClientCAReadError(path, { cause: toError(error) });
        }

        const blocks = contents.match(PEM_CERTIFICATE) ?? [];
        if (blocks.length === 0) {
            throw new ClientCAParseError(path);
        }
        for (const block of blocks) {
            try {
                new X509Certificate(block);
            } catch (error) {
                throw new ClientCAParseError(path, { cause: toError(error) });
            }
            pool.push(block);
        }
    }

    return pool;
}

/**
 * Resolve the trust mode into a transport security configuration.
 *
 * - `off`: nothing is read
 * - `tls`: server certificate + key
 * - `mutual_tls`: server certificate + key, client CAs, and a verified
 *   client certificate required on every connection
 *
 * @throws ConfigurationError for missing or unusable material, or an unknown mode
 *
 * @example
 * ```typescript
 * const tls = resolveTLSConfig({
 *   tlsMode: 'mutual_tls',
 *   certPath: '/etc/app/server.crt',
 *   keyPath: '/etc/app/server.key',
 *   clientCaPaths: ['/etc/app/clients-ca.crt'],
 * });
 * ```
 */
export function resolveTLSConfig(settings: TLSSettings): ResolvedTLS {
    switch (settings.tlsMode) {
        case TLSMode.OFF:
            return { mode: TLSMode.OFF };

        case TLSMode.TLS: {
            const { cert, key } = readTLSCertificates(settings.certPath, settings.keyPath);
            return {
                mode: TLSMode.TLS,
                options: { cert, key, minVersion: MIN_TLS_VERSION },
            };
        }

        case TLSMode.MUTUAL_TLS: {
            const clientCaPaths = settings.clientCaPaths ?? [];
            if (clientCaPaths.length === 0) {
                throw new ConfigurationError("no client CAs provided");
            }
            const { cert, key } = readTLSCertificates(settings.certPath, settings.keyPath);

            let ca: string[];
            try {
                ca = readClientCAs(clientCaPaths);
            } catch (error) {
                const cause = toError(error);
                throw new ConfigurationError(`failed to load client CA certificates: ${cause.message}`, { cause });
            }

            return {
                mode: TLSMode.MUTUAL_TLS,
                options: {
                    cert,
                    key,
                    ca,
                    minVersion: MIN_TLS_VERSION,
                    requestCert: true,
                    rejectUnauthorized: true,
                },
            };
        }

        default:
            throw new ConfigurationError(`invalid TLS mode: ${settings.tlsMode}`);
    }
}
