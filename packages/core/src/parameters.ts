/**
 * Request parameter decoding
 *
 * Collects path parameters, query values, headers and a JSON body into one
 * object and validates it with a zod schema:
 *
 * ```typescript
 * const GetOrderParams = z.object({
 *   path: z.object({ id: z.string() }),
 *   query: z.object({ expand: z.enum(["lines"]).optional() }),
 *   headers: z.object({ "x-tenant": z.string() }),
 * });
 * ```
 *
 * @module parameters
 */

import type { IncomingMessage } from "node:http";
import type { z } from "zod";
import { HttpError } from "./errors.ts";
import { ContentType } from "./headers.ts";
import type { RequestContext } from "./types.ts";

export const DEFAULT_MAX_BODY_BYTES = 1_048_576;

/**
 * A query or header value: a string when it appears once, all values otherwise
 */
export type RawParameterValue = string | string[];

/**
 * What the schema is applied to
 */
export interface RawParameters {
    path: Record<string, string>;
    query: Record<string, RawParameterValue>;
    /** Keyed by lower-case header name */
    headers: Record<string, RawParameterValue>;
    /** Parsed JSON, or undefined when the request is not `application/json` */
    body: unknown;
}

export interface DecodeOptions {
    /**
     * Largest JSON body accepted; larger bodies fail with 413
     * @default 1048576
     */
    maxBodyBytes?: number;
}

function single(values: string[]): RawParameterValue {
    return values.length === 1 && values[0] !== undefined ? values[0] : values;
}

function readQuery(request: IncomingMessage): Record<string, RawParameterValue> {
    const { searchParams } = new URL(request.url ?? "/", "http://localhost");
    const query: Record<string, RawParameterValue> = {};
    for (const name of new Set(searchParams.keys())) {
        query[name] = single(searchParams.getAll(name));
    }
    return query;
}

function readHeaders(request: IncomingMessage): Record<string, RawParameterValue> {
    const headers: Record<string, RawParameterValue> = {};
    for (const [name, values] of Object.entries(request.headersDistinct)) {
        if (values) headers[name] = single(values);
    }
    return headers;
}

function isJSONRequest(request: IncomingMessage): boolean {
    const mediaType = request.headers["content-type"]?.split(";")[0]?.trim().toLowerCase();
    return mediaType === ContentType.JSON;
}

async function readJSONBody(request: IncomingMessage, maxBodyBytes: number): Promise<unknown> {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    // Oversized bodies are drained without buffering
    for await (const chunk of request) {
        const bufferChunk = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        totalBytes += bufferChunk.length;
        if (totalBytes <= maxBodyBytes) {
            chunks.push(bufferChunk);
        }
    }
    if (totalBytes > maxBodyBytes) {
        throw new HttpError(413, `Request body exceeds ${maxBodyBytes} bytes`, { totalBytes });
    }

    try {
        const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString("utf8"));
        return parsed;
    } catch (error) {
        throw new HttpError(400, "Request body is not valid JSON", {}, { cause: error });
    }
}

function describeIssues(error: z.ZodError): string {
    return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");
}

/**
 * Decode and validate the parameters of a request.
 *
 * The JSON body is read only when the request's content type is
 * `application/json`. A query or header that appears more than once is
 * handed to the schema as an array.
 *
 * @throws HttpError 400 when the body is not JSON or validation fails, 413 when the body is too large
 */
export async function decodeParameters<S extends z.ZodTypeAny>(ctx: RequestContext, schema: S, options: DecodeOptions = {}): Promise<z.output<S>> {
    const { request } = ctx;

    const path: Record<string, string> = {};
    for (const [name, value] of Object.entries(ctx.params)) {
        if (value !== undefined) path[name] = value;
    }

    const raw: RawParameters = {
        path,
        query: readQuery(request),
        headers: readHeaders(request),
        body: isJSONRequest(request) ? await readJSONBody(request, options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES) : undefined,
    };

    const result = await schema.safeParseAsync(raw);
    if (!result.success) {
        throw new HttpError(400, `Invalid request parameters: ${describeIssues(result.error)}`, { issues: result.error.issues }, { cause: result.error });
    }
    return result.data;
}
