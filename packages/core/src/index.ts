/**
 * @portico/core
 *
 * Main entry point for Portico.
 *
 * Provides:
 * - createServer: Factory function to create an HTTP server with a run-once lifecycle
 * - RouteTableBuilder: Write-once endpoint registry
 * - createChain: Interceptor composition
 * - Responders, parameter decoding and the error-response registry
 * - TLS: Configuration utilities
 *
 * @module @portico/core
 */

// =============================================================================
// SERVER API
// =============================================================================

// Main createServer factory
export { createServer, defaultListenerProvider } from "./Server.ts";

// =============================================================================
// ROUTING
// =============================================================================

export { RouteTableBuilder } from "./RouteTableBuilder.ts";
export { createChain } from "./chain.ts";
export { buildRoutes, formatAllowHeader, type BuildRoutesOptions, type BuildRoutesResult, type NodeHandler } from "./buildRoutes.ts";
export { EndpointPathSchema, HttpMethodSchema } from "./paths.ts";

// =============================================================================
// RESPONSES & ERRORS
// =============================================================================

export {
    registerErrorResponse,
    unregisterErrorResponse,
    resolveErrorResponse,
    respondError,
    respondJSON,
    respondJSONStream,
    respondStatus,
    createJSONHandler,
    createJSONStreamHandler,
    type ErrorClass,
    type ErrorResponseBody,
    type JSONResult,
    type JSONStreamResult,
} from "./responders.ts";
export { decodeParameters, DEFAULT_MAX_BODY_BYTES, type DecodeOptions, type RawParameters, type RawParameterValue } from "./parameters.ts";
export { ContentType, HeaderName } from "./headers.ts";
export {
    ClientCAParseError,
    ClientCAReadError,
    ConfigurationError,
    HttpError,
    LifecycleError,
    RegistrationError,
    ServeError,
    ShutdownTimeoutError,
    isSanitizableError,
    toError,
    type SanitizableError,
} from "./errors.ts";

// =============================================================================
// UTILITIES
// =============================================================================

// TLS utilities
export { readClientCAs, readTLSCertificates, resolveTLSConfig, type ResolvedTLS, type TLSSettings } from "./TLSConfig.ts";

// =============================================================================
// TYPES
// =============================================================================

// Server API types
export { HttpMethod, ServerState, LifecycleEvent } from "./types.ts";

export type {
    // Server API
    Server,
    CreateServerOptions,
    ServerShutdownOptions,
    ShutdownOptions,
    ConfigProvider,
    ListenerProvider,
    // Endpoint API
    Endpoint,
    EndpointProvider,
    EndpointRoute,
    CompiledEndpoint,
    RouteTable,
    RequestContext,
    Handler,
    Interceptor,
    // Common types
    Logger,
    TransportServer,
} from "./types.ts";

// =============================================================================
// CONFIGURATION
// =============================================================================

// Environment configuration (12-Factor App)
export {
    HttpServerEnvSchema,
    TLSModeSchema,
    TLSMode,
    BooleanFromStringSchema,
    PathListFromStringSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    type HttpServerConfig,
} from "./config/index.ts";
