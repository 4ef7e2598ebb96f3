/**
 * Environment configuration validation with Zod
 *
 * Reads the HTTP_SERVER_* variables and turns them into the server's
 * configuration value.
 *
 * @module @portico/core/config
 */

import { z } from "zod";

/**
 * Transport security posture
 *
 * Note: Using const object instead of enum for native TypeScript compatibility
 */
export const TLSMode = {
    /** Plain HTTP */
    OFF: "off",
    /** HTTP over TLS, server authenticated */
    TLS: "tls",
    /** HTTP over TLS, server and client authenticated */
    MUTUAL_TLS: "mutual_tls",
} as const;

export type TLSMode = (typeof TLSMode)[keyof typeof TLSMode];

/**
 * TLS mode schema
 */
export const TLSModeSchema = z.enum([TLSMode.OFF, TLSMode.TLS, TLSMode.MUTUAL_TLS]).default(TLSMode.TLS);

/**
 * Boolean from string schema (for ENV variables)
 */
export const BooleanFromStringSchema = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((v) => v === "true" || v === "1" || v === "yes");

/**
 * Millisecond duration, zero meaning "no timeout"
 */
const DurationSchema = z.coerce.number().int().min(0);

/**
 * JSON array of file paths
 */
export const PathListFromStringSchema = z
    .string()
    .default("[]")
    .transform((value, ctx) => {
        let parsed: unknown;
        try {
            parsed = JSON.parse(value);
        } catch {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON array of paths" });
            return z.NEVER;
        }
        const result = z.array(z.string().min(1)).safeParse(parsed);
        if (!result.success) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON array of non-empty paths" });
            return z.NEVER;
        }
        return result.data;
    });

/**
 * HTTP server environment schema
 *
 * @example
 * ```typescript
 * const config = HttpServerEnvSchema.parse(process.env);
 * console.log(config.bindIp); // '::1' (default)
 * ```
 */
export const HttpServerEnvSchema = z
    .object({
        /**
         * Address to bind
         * @default '::1'
         */
        HTTP_SERVER_BIND_IP: z.string().ip().default("::1"),

        /**
         * Port to bind, 0 picks a free one
         * @default 0
         */
        HTTP_SERVER_BIND_PORT: z.coerce.number().int().min(0).max(65535).default(0),

        /**
         * Maximum time to read a whole request
         * @default 120000
         */
        HTTP_SERVER_READ_TIMEOUT_MS: DurationSchema.default(120_000),

        /**
         * Socket inactivity limit while a response is written
         * @default 120000
         */
        HTTP_SERVER_WRITE_TIMEOUT_MS: DurationSchema.default(120_000),

        /**
         * Keep-alive idle limit; 0 falls back to the read timeout
         * @default 0
         */
        HTTP_SERVER_IDLE_TIMEOUT_MS: DurationSchema.default(0),

        /**
         * Header read limit; 0 falls back to the read timeout
         * @default 0
         */
        HTTP_SERVER_HEADER_READ_TIMEOUT_MS: DurationSchema.default(0),

        /**
         * @default 'tls'
         */
        HTTP_SERVER_TLS_MODE: TLSModeSchema,

        /**
         * Server certificate (PEM) path
         */
        HTTP_SERVER_CERT: z.string().min(1).optional(),

        /**
         * Server private key (PEM) path
         */
        HTTP_SERVER_KEY: z.string().min(1).optional(),

        /**
         * Client CA certificate paths as a JSON array
         * @default '[]'
         */
        HTTP_SERVER_CLIENT_CA_CERTS: PathListFromStringSchema,

        /**
         * Maximum request header size in bytes
         * @default 1048576
         */
        HTTP_SERVER_MAX_HEADER_BYTES: z.coerce.number().int().min(4096).max(1_073_741_824).default(1_048_576),

        /**
         * Keep connections open between requests
         * @default true
         */
        HTTP_SERVER_KEEP_ALIVE: BooleanFromStringSchema.default("true"),
    })
    .superRefine((env, ctx) => {
        if (env.HTTP_SERVER_TLS_MODE === TLSMode.OFF) return;

        if (!env.HTTP_SERVER_CERT) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["HTTP_SERVER_CERT"], message: `required when HTTP_SERVER_TLS_MODE is ${env.HTTP_SERVER_TLS_MODE}` });
        }
        if (!env.HTTP_SERVER_KEY) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["HTTP_SERVER_KEY"], message: `required when HTTP_SERVER_TLS_MODE is ${env.HTTP_SERVER_TLS_MODE}` });
        }
        if (env.HTTP_SERVER_TLS_MODE === TLSMode.MUTUAL_TLS && env.HTTP_SERVER_CLIENT_CA_CERTS.length === 0) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["HTTP_SERVER_CLIENT_CA_CERTS"], message: "required when HTTP_SERVER_TLS_MODE is mutual_tls" });
        }
    })
    .transform((env) => ({
        bindIp: env.HTTP_SERVER_BIND_IP,
        bindPort: env.HTTP_SERVER_BIND_PORT,
        readTimeout: env.HTTP_SERVER_READ_TIMEOUT_MS,
        writeTimeout: env.HTTP_SERVER_WRITE_TIMEOUT_MS,
        idleTimeout: env.HTTP_SERVER_IDLE_TIMEOUT_MS,
        headerReadTimeout: env.HTTP_SERVER_HEADER_READ_TIMEOUT_MS,
        tlsMode: env.HTTP_SERVER_TLS_MODE,
        certPath: env.HTTP_SERVER_CERT,
        keyPath: env.HTTP_SERVER_KEY,
        clientCaPaths: env.HTTP_SERVER_CLIENT_CA_CERTS,
        maxHeaderBytes: env.HTTP_SERVER_MAX_HEADER_BYTES,
        keepAlive: env.HTTP_SERVER_KEEP_ALIVE,
    }));

/**
 * HTTP server configuration
 */
export interface HttpServerConfig {
    bindIp: string;
    bindPort: number;
    /** Milliseconds, 0 = none */
    readTimeout: number;
    /** Milliseconds, 0 = none */
    writeTimeout: number;
    /** Milliseconds, 0 = use readTimeout */
    idleTimeout: number;
    /** Milliseconds, 0 = use readTimeout */
    headerReadTimeout: number;
    tlsMode: TLSMode;
    certPath?: string | undefined;
    keyPath?: string | undefined;
    clientCaPaths: string[];
    maxHeaderBytes: number;
    keepAlive: boolean;
}

/**
 * Parse and validate environment configuration
 *
 * @example
 * ```typescript
 * const config = parseEnvConfig();
 * // or with custom env
 * const config = parseEnvConfig({ HTTP_SERVER_TLS_MODE: 'off' });
 * ```
 */
export function parseEnvConfig(env: Record<string, string | undefined> = process.env): HttpServerConfig {
    return HttpServerEnvSchema.parse(env);
}

/**
 * Safely parse environment configuration (returns result object)
 *
 * @example
 * ```typescript
 * const result = safeParseEnvConfig();
 * if (result.success) {
 *   console.log(result.data.bindPort);
 * } else {
 *   console.error(result.error.format());
 * }
 * ```
 */
export function safeParseEnvConfig(env: Record<string, string | undefined> = process.env) {
    return HttpServerEnvSchema.safeParse(env);
}
