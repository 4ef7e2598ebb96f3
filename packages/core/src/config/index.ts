/**
 * Configuration module
 *
 * Provides type-safe environment configuration validation
 * using Zod schemas.
 *
 * @example
 * ```typescript
 * import { parseEnvConfig, type HttpServerConfig } from '@portico/core/config';
 *
 * const config = parseEnvConfig();
 * console.log(`Binding ${config.bindIp}:${config.bindPort} (${config.tlsMode})`);
 * ```
 *
 * @module @portico/core/config
 */

export {
    HttpServerEnvSchema,
    TLSModeSchema,
    TLSMode,
    BooleanFromStringSchema,
    PathListFromStringSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    type HttpServerConfig,
} from "./envSchema.ts";
