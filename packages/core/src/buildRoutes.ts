/**
 * Route dispatcher
 *
 * Composes the compiled route table and the common interceptors into a
 * Node.js request listener.
 *
 * @module buildRoutes
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import findMyWay from "find-my-way";
import { createChain } from "./chain.ts";
import { ContentType, HeaderName } from "./headers.ts";
import { pathParameterNames, toRouterPath } from "./paths.ts";
import { respondError } from "./responders.ts";
import type { Handler, HttpMethod, Interceptor, Logger, RequestContext, RouteTable } from "./types.ts";

/**
 * Options for building routes
 */
export interface BuildRoutesOptions {
    table: RouteTable;
    interceptors: ReadonlyArray<Interceptor | null | undefined>;
    shutdownSignal: AbortSignal;
    logger: Logger;
}

/**
 * Node.js request listener
 */
export type NodeHandler = (req: IncomingMessage, res: ServerResponse) => void;

/**
 * Result of building routes
 */
export interface BuildRoutesResult {
    handler: NodeHandler;
}

/**
 * Value of the Allow header for a set of methods: sorted, comma separated.
 */
export function formatAllowHeader(methods: Iterable<HttpMethod | string>): string {
    return [...methods].sort().join(", ");
}

interface MergedRoute {
    handler: Handler;
    parameterNames: ReadonlyArray<string>;
}

function writePlain(res: ServerResponse, status: number, body: string): void {
    res.statusCode = status;
    res.setHeader(HeaderName.CONTENT_TYPE, ContentType.TEXT);
    res.setHeader(HeaderName.CONTENT_LENGTH, Buffer.byteLength(body));
    res.end(body);
}

/**
 * Run a merged handler, turning a throw or rejection into an error response.
 */
function invoke(handler: Handler, ctx: RequestContext, logger: Logger): void {
    Promise.resolve(ctx)
        .then(handler)
        .catch((error: unknown) => {
            logger.error(`Handler for ${ctx.request.method} ${ctx.request.url} failed:`, error);
            if (ctx.response.headersSent) {
                ctx.response.destroy();
                return;
            }
            respondError(ctx.response, error);
        });
}

/**
 * Build the request listener for a compiled route table.
 *
 * Every (path, method) gets one handler composed once from the common
 * interceptors, the endpoint's interceptors and its terminal handler.
 * A known path requested with an unregistered method is answered with
 * 405 and an Allow header; unknown paths fall through to the router's
 * 404.
 *
 * @param options - Route table, common interceptors, shutdown signal, logger
 * @returns The request listener
 */
export function buildRoutes(options: BuildRoutesOptions): BuildRoutesResult {
    const { table, interceptors, shutdownSignal, logger } = options;

    const router = findMyWay({
        ignoreTrailingSlash: false,
        defaultRoute(_req, res) {
            writePlain(res, 404, "Not Found");
        },
    });

    // Paths differing only in parameter names share a router path; the
    // builder guarantees each method is claimed by one of them.
    const routes = new Map<string, Map<string, MergedRoute>>();
    for (const [path, endpoints] of table) {
        const routerPath = toRouterPath(path);
        let methods = routes.get(routerPath);
        if (!methods) {
            methods = new Map();
            routes.set(routerPath, methods);
        }
        const parameterNames = pathParameterNames(path);
        for (const [method, endpoint] of endpoints) {
            methods.set(method, {
                handler: createChain([...interceptors, ...endpoint.interceptors], endpoint.handler),
                parameterNames,
            });
        }
    }

    for (const [routerPath, methods] of routes) {
        const allow = formatAllowHeader(methods.keys());

        router.all(routerPath, (req, res, positional) => {
            const route = req.method === undefined ? undefined : methods.get(req.method);
            if (!route) {
                res.setHeader(HeaderName.ALLOW, allow);
                writePlain(res, 405, "Method Not Allowed");
                return;
            }
            const params: Record<string, string | undefined> = {};
            route.parameterNames.forEach((name, index) => {
                params[name] = positional[`p${index}`];
            });
            invoke(route.handler, { request: req, response: res, params, signal: shutdownSignal }, logger);
        });
    }

    return {
        handler: (req, res) => {
            router.lookup(req, res);
        },
    };
}
