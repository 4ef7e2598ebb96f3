/**
 * Response helpers
 *
 * JSON, streamed JSON, status and error responses, handlers that decode
 * parameters before answering, and the registry that maps error classes
 * to HTTP statuses.
 *
 * @module responders
 */

import { once } from "node:events";
import { STATUS_CODES, type ServerResponse } from "node:http";
import type { z } from "zod";
import { isSanitizableError } from "./errors.ts";
import { ContentType, HeaderName } from "./headers.ts";
import { type DecodeOptions, decodeParameters } from "./parameters.ts";
import type { Handler, RequestContext } from "./types.ts";

/**
 * Body of every error response
 */
export interface ErrorResponseBody {
    message: string;
}

/**
 * Any error class, whatever its constructor arguments
 */
export type ErrorClass<E extends Error = Error> = abstract new (...args: never[]) => E;

interface RegisteredErrorResponse {
    readonly errorClass: ErrorClass;
    readonly status: number;
    readonly toMessage: (error: Error) => string;
}

/** Process-wide, write-once per class */
const registeredErrorResponses = new Map<ErrorClass, RegisteredErrorResponse>();

/**
 * Map an error class to an HTTP status for respondError().
 *
 * Matching is on the exact class, not subclasses.
 *
 * @param errorClass - Error class to match
 * @param status - Response status
 * @param toMessage - Client-facing message, defaults to `error.message`
 * @throws Error if the class is already registered
 *
 * @example
 * ```typescript
 * registerErrorResponse(ZodError, 400, (err) => err.issues.map((i) => i.message).join(", "));
 * ```
 */
export function registerErrorResponse<E extends Error>(errorClass: ErrorClass<E>, status: number, toMessage?: (error: E) => string): void {
    if (registeredErrorResponses.has(errorClass)) {
        throw new Error(`error response already registered for ${errorClass.name}`);
    }
    registeredErrorResponses.set(errorClass, {
        errorClass,
        status,
        toMessage: (error) => (toMessage && error instanceof errorClass ? toMessage(error) : error.message),
    });
}

/**
 * Remove a registration. Intended for tests.
 */
export function unregisterErrorResponse(errorClass: ErrorClass): boolean {
    return registeredErrorResponses.delete(errorClass);
}

function findRegistration(error: Error): RegisteredErrorResponse | undefined {
    for (const entry of registeredErrorResponses.values()) {
        if (entry.errorClass === error.constructor) return entry;
    }
    return undefined;
}

/**
 * Children to search after the error itself: AggregateError members, then the cause
 */
function children(error: Error): Error[] {
    const found: Error[] = [];
    if (error instanceof AggregateError) {
        for (const member of error.errors) {
            if (member instanceof Error) found.push(member);
        }
    }
    if (error.cause instanceof Error) {
        found.push(error.cause);
    }
    return found;
}

/**
 * Resolve the status and message for an error, depth first.
 */
export function resolveErrorResponse(error: unknown): { status: number; body: ErrorResponseBody } {
    const pending: Error[] = error instanceof Error ? [error] : [];
    const visited = new Set<Error>();

    while (pending.length > 0) {
        const current = pending.shift();
        if (!current || visited.has(current)) continue;
        visited.add(current);

        if (isSanitizableError(current)) {
            return { status: current.status, body: { message: current.clientMessage } };
        }

        const registered = findRegistration(current);
        if (registered) {
            return { status: registered.status, body: { message: registered.toMessage(current) } };
        }

        pending.unshift(...children(current));
    }

    return { status: 500, body: { message: STATUS_CODES[500] ?? "Internal Server Error" } };
}

/**
 * Write a JSON response. An undefined body is sent as `null`.
 */
export function respondJSON(res: ServerResponse, status: number, body: unknown): void {
    const payload = JSON.stringify(body ?? null);
    res.statusCode = status;
    res.setHeader(HeaderName.CONTENT_TYPE, ContentType.JSON);
    res.setHeader(HeaderName.CONTENT_LENGTH, Buffer.byteLength(payload));
    res.end(payload);
}

/**
 * Write an empty response with the given status
 */
export function respondStatus(res: ServerResponse, status: number): void {
    res.statusCode = status;
    res.setHeader(HeaderName.CONTENT_LENGTH, 0);
    res.end();
}

/**
 * Write an error response: `{ "message": ... }` with the status resolved
 * from the error (HttpError, registered class, or 500).
 */
export function respondError(res: ServerResponse, error: unknown): void {
    const { status, body } = resolveErrorResponse(error);
    respondJSON(res, status, body);
}

/**
 * Stream JSON values as newline-delimited chunks.
 *
 * Writes the status and headers, then one `JSON.stringify(value)` line per
 * value, waiting for the socket to drain when needed. Stops early, ending
 * the response, when `ctx.signal` aborts or the client goes away. An error
 * from the source propagates after the headers are sent.
 */
export async function respondJSONStream(ctx: RequestContext, status: number, source: AsyncIterable<unknown>): Promise<void> {
    const { response, signal } = ctx;

    response.statusCode = status;
    response.setHeader(HeaderName.CONTENT_TYPE, ContentType.JSON);
    response.setHeader(HeaderName.TRANSFER_ENCODING, "chunked");
    response.flushHeaders();

    let onAbort: (() => void) | undefined;
    const stopped = new Promise<"stopped">((resolve) => {
        onAbort = () => resolve("stopped");
        if (signal.aborted || response.destroyed) {
            resolve("stopped");
            return;
        }
        signal.addEventListener("abort", onAbort, { once: true });
        response.once("close", onAbort);
    });

    const iterator = source[Symbol.asyncIterator]();
    try {
        while (true) {
            const next = await Promise.race([iterator.next(), stopped]);
            if (next === "stopped" || next.done) break;

            const line = `${JSON.stringify(next.value ?? null)}\n`;
            if (!response.write(line)) {
                const drained = await Promise.race([once(response, "drain").then(() => "drained" as const), stopped]);
                if (drained === "stopped") break;
            }
        }
    } finally {
        if (onAbort) {
            signal.removeEventListener("abort", onAbort);
            response.removeListener("close", onAbort);
        }
    }

    if (!response.destroyed) {
        response.end();
    }
}

/**
 * What a JSON handler callback answers with
 */
export interface JSONResult<T = unknown> {
    status: number;
    body: T;
}

/**
 * What a JSON stream handler callback answers with
 */
export interface JSONStreamResult<T = unknown> {
    status: number;
    stream: AsyncIterable<T>;
}

/**
 * Build a handler that decodes the request parameters, calls `callback`
 * and writes its result as JSON.
 *
 * Decoding and callback failures propagate to the chain, where they are
 * answered by respondError() or an error interceptor.
 *
 * @example
 * ```typescript
 * builder.register("/orders/{id}", "GET", {
 *   handler: createJSONHandler(z.object({ path: z.object({ id: z.string() }) }), async ({ path }) => ({
 *     status: 200,
 *     body: await orders.get(path.id),
 *   })),
 * });
 * ```
 */
export function createJSONHandler<S extends z.ZodTypeAny>(
    schema: S,
    callback: (params: z.output<S>, ctx: RequestContext) => JSONResult | Promise<JSONResult>,
    options: DecodeOptions = {},
): Handler {
    return async (ctx) => {
        const params = await decodeParameters(ctx, schema, options);
        const { status, body } = await callback(params, ctx);
        respondJSON(ctx.response, status, body);
    };
}

/**
 * Build a handler that decodes the request parameters, calls `callback`
 * and streams the values it yields with respondJSONStream().
 */
export function createJSONStreamHandler<S extends z.ZodTypeAny>(
    schema: S,
    callback: (params: z.output<S>, ctx: RequestContext) => JSONStreamResult | Promise<JSONStreamResult>,
    options: DecodeOptions = {},
): Handler {
    return async (ctx) => {
        const params = await decodeParameters(ctx, schema, options);
        const { status, stream } = await callback(params, ctx);
        await respondJSONStream(ctx, status, stream);
    };
}
