/**
 * Endpoint path and method validation
 *
 * @module paths
 */

import { z } from "zod";
import { HttpMethod } from "./types.ts";

const VALID_CHARACTERS = /^[a-zA-Z0-9/{}]+$/;

/**
 * Returns why a path is not a valid endpoint path, or null when it is.
 */
function describePathViolation(path: string): string | null {
    if (path.length === 0) return "path cannot be empty";
    if (path === "/") return null;
    if (!VALID_CHARACTERS.test(path)) return "path contains invalid characters";
    if (!path.startsWith("/")) return "path must start with '/'";
    if (path.endsWith("/")) return "path cannot end with '/'";

    const seen = new Set<string>();
    for (const part of path.split("/").slice(1)) {
        if (part === "") return "path parts cannot be empty";
        if (seen.has(part)) return "path parts must be unique";
        seen.add(part);

        if (part.includes("{") || part.includes("}")) {
            if (!part.startsWith("{") || !part.endsWith("}")) {
                return "path parameters must start with '{' and end with '}'";
            }
            if (part.split("{").length !== 2 || part.split("}").length !== 2) {
                return "path parameters must have exactly one '{' and one '}'";
            }
            if (part === "{}") return "path parameters cannot be empty";
        }
    }
    return null;
}

/**
 * Endpoint path grammar
 *
 * `/` alone, or `/`-separated non-empty, unique segments of
 * `[a-zA-Z0-9]` or `{name}` parameters, without a trailing `/`.
 */
export const EndpointPathSchema = z.string().superRefine((path, ctx) => {
    const violation = describePathViolation(path);
    if (violation) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: violation });
    }
});

/**
 * Methods accepted by the route table
 */
export const HttpMethodSchema = z.enum([
    HttpMethod.CONNECT,
    HttpMethod.DELETE,
    HttpMethod.GET,
    HttpMethod.HEAD,
    HttpMethod.OPTIONS,
    HttpMethod.PATCH,
    HttpMethod.POST,
    HttpMethod.PUT,
    HttpMethod.TRACE,
]);

const PARAMETER = /\{([a-zA-Z0-9]+)\}/g;

/**
 * Parameter names of a path, in order
 */
export function pathParameterNames(path: string): string[] {
    return Array.from(path.matchAll(PARAMETER), (match) => match[1] ?? "");
}

/**
 * Translates `{name}` segments into the router's positional `:p0`, `:p1`, ...
 *
 * Paths that differ only in parameter names share one router path.
 */
export function toRouterPath(path: string): string {
    let index = 0;
    return path.replace(PARAMETER, () => `:p${index++}`);
}
