/**
 * Route table builder
 *
 * Write-once registry of (path, method) -> endpoint.
 *
 * @module RouteTableBuilder
 */

import { RegistrationError } from "./errors.ts";
import { EndpointPathSchema, HttpMethodSchema, toRouterPath } from "./paths.ts";
import { respondStatus } from "./responders.ts";
import type { CompiledEndpoint, Endpoint, Handler, HttpMethod, Interceptor, RouteTable } from "./types.ts";

/**
 * Handler used when an endpoint is registered without one
 */
const notImplemented: Handler = ({ response }) => {
    respondStatus(response, 501);
};

type BuilderState = { readonly tag: "building" } | { readonly tag: "compiled"; readonly table: RouteTable };

/**
 * Collects endpoint registrations and compiles them into a read-only
 * route table. After compile() the builder rejects further registrations.
 *
 * @example
 * ```typescript
 * const builder = new RouteTableBuilder();
 * builder.register("/orders/{id}", "GET", { handler: getOrder });
 * builder.register("/orders/{id}", "DELETE", { interceptors: [requireAdmin], handler: deleteOrder });
 * const table = builder.compile();
 * ```
 */
export class RouteTableBuilder {
    private _state: BuilderState = { tag: "building" };
    private readonly _endpoints = new Map<string, Map<HttpMethod, CompiledEndpoint>>();
    /** Router path -> method -> the path that claimed it */
    private readonly _claims = new Map<string, Map<HttpMethod, string>>();

    /**
     * Whether compile() has been called
     */
    get compiled(): boolean {
        return this._state.tag === "compiled";
    }

    /**
     * Register an endpoint.
     *
     * @param path - Endpoint path, e.g. `/orders/{id}`
     * @param method - HTTP method
     * @param endpoint - Interceptors and handler; a 501 handler is used when omitted
     * @throws RegistrationError on a malformed path, an unsupported method,
     *   a duplicate (path, method) pair, a path that matches the same
     *   requests as an existing one for that method, or a compiled builder
     */
    register(path: string, method: string, endpoint?: Endpoint | null): void {
        if (this._state.tag === "compiled") {
            throw new RegistrationError(`cannot register ${method} ${path}: route table has already been compiled`);
        }

        const pathResult = EndpointPathSchema.safeParse(path);
        if (!pathResult.success) {
            const reason = pathResult.error.issues.map((issue) => issue.message).join(", ");
            throw new RegistrationError(`endpoint path "${path}" is not correctly formatted: ${reason}`, { cause: pathResult.error });
        }

        const methodResult = HttpMethodSchema.safeParse(method);
        if (!methodResult.success) {
            throw new RegistrationError(`http method "${method}" is invalid`, { cause: methodResult.error });
        }
        const httpMethod = methodResult.data;

        let methods = this._endpoints.get(path);
        if (methods?.has(httpMethod)) {
            throw new RegistrationError(`method "${httpMethod}" already registered for path "${path}"`);
        }

        const routerPath = toRouterPath(path);
        let claims = this._claims.get(routerPath);
        const claimedBy = claims?.get(httpMethod);
        if (claimedBy !== undefined) {
            throw new RegistrationError(`${httpMethod} ${path} conflicts with ${httpMethod} ${claimedBy}`);
        }

        const declared: ReadonlyArray<Interceptor | null | undefined> = endpoint?.interceptors ?? [];
        const interceptors = declared.filter((interceptor): interceptor is Interceptor => interceptor != null);
        const compiled: CompiledEndpoint = Object.freeze({
            interceptors: Object.freeze(interceptors),
            handler: endpoint?.handler ?? notImplemented,
        });

        if (!methods) {
            methods = new Map();
            this._endpoints.set(path, methods);
        }
        methods.set(httpMethod, compiled);

        if (!claims) {
            claims = new Map();
            this._claims.set(routerPath, claims);
        }
        claims.set(httpMethod, path);
    }

    /**
     * Freeze the builder and return the route table snapshot.
     */
    compile(): RouteTable {
        if (this._state.tag === "compiled") {
            return this._state.table;
        }

        const table = new Map<string, ReadonlyMap<HttpMethod, CompiledEndpoint>>();
        for (const [path, methods] of this._endpoints) {
            table.set(path, new Map(methods));
        }

        this._state = { tag: "compiled", table };
        return table;
    }
}
