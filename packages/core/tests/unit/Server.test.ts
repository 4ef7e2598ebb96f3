/**
 * Server lifecycle tests
 *
 * Run-once, shutdown-idempotent behaviour of createServer().
 */

import assert from "node:assert";
import { Agent } from "node:http";
import type { AddressInfo } from "node:net";
import { afterEach, describe, it, mock } from "node:test";
import { ConfigurationError, LifecycleError, RegistrationError, ServeError, ShutdownTimeoutError } from "../../src/errors.ts";
import type { RouteTableBuilder } from "../../src/RouteTableBuilder.ts";
import { createServer, defaultListenerProvider } from "../../src/Server.ts";
import type { CreateServerOptions, EndpointRoute, Server } from "../../src/types.ts";
import { ServerState } from "../../src/types.ts";
import { createTestLogger, deferred, listenOnLoopback, send, testConfig, urlOf } from "../helpers/http.ts";

const pong: EndpointRoute = (builder) => {
    builder.register("/", "GET", {
        handler: ({ response }) => {
            response.end("PONG");
        },
    });
};

/**
 * Run the server and wait until it is bound
 */
async function start(server: Server): Promise<{ running: Promise<void>; address: AddressInfo }> {
    const ready = new Promise<AddressInfo>((resolve) => {
        server.once("ready", resolve);
    });
    const running = server.run();
    return { running, address: await ready };
}

describe("createServer", () => {
    let servers: Server[] = [];

    function create(options: CreateServerOptions = {}): Server {
        const server = createServer({
            endpoints: [pong],
            configProvider: () => testConfig(),
            logger: createTestLogger(),
            ...options,
        });
        servers.push(server);
        return server;
    }

    afterEach(async () => {
        await Promise.allSettled(servers.map((server) => server.shutdown({ timeout: 1000 })));
        servers = [];
    });

    describe("construction", () => {
        it("should return an unstarted server", () => {
            const server = create();

            assert.strictEqual(server.state, ServerState.CREATED);
            assert.strictEqual(server.isRunning, false);
            assert.strictEqual(server.address, null);
            assert.strictEqual(server.config.bindIp, "127.0.0.1");
            assert.strictEqual(server.shutdownSignal.aborted, false);
        });

        it("should compile function and object endpoint registrations", () => {
            const server = create({
                endpoints: [
                    pong,
                    {
                        registerEndpoints(builder: RouteTableBuilder) {
                            builder.register("/orders", "POST");
                        },
                    },
                ],
            });

            assert.deepStrictEqual([...server.routes.keys()], ["/", "/orders"]);
        });

        it("should wrap config provider failures", () => {
            const cause = new Error("vault unreachable");

            assert.throws(
                () =>
                    createServer({
                        configProvider: () => {
                            throw cause;
                        },
                    }),
                (err: unknown) => {
                    assert.ok(err instanceof ConfigurationError);
                    assert.strictEqual(err.message, "could not load configuration: vault unreachable");
                    assert.strictEqual(err.cause, cause);
                    return true;
                },
            );
        });

        it("should surface registration errors", () => {
            assert.throws(
                () =>
                    createServer({
                        configProvider: () => testConfig(),
                        endpoints: [pong, pong],
                    }),
                RegistrationError,
            );
        });

        it("should accept paths differing only in parameter names for different methods", async () => {
            const server = create({
                endpoints: [
                    (builder) => {
                        builder.register("/a/{id}", "GET", {
                            handler: ({ params, response }) => {
                                response.end(`id=${params.id}`);
                            },
                        });
                        builder.register("/a/{name}", "POST", {
                            handler: ({ params, response }) => {
                                response.end(`name=${params.name}`);
                            },
                        });
                    },
                ],
            });
            const { running, address } = await start(server);

            assert.strictEqual((await send(`${urlOf(address)}/a/7`)).body, "id=7");
            assert.strictEqual((await send(`${urlOf(address)}/a/pen`, { method: "POST" })).body, "name=pen");

            await server.shutdown();
            await running;
        });

        it("should report a same-method parameter-name clash as a ConfigurationError", () => {
            assert.throws(
                () =>
                    createServer({
                        configProvider: () => testConfig(),
                        endpoints: [
                            (builder) => {
                                builder.register("/a/{id}", "GET");
                                builder.register("/a/{name}", "GET");
                            },
                        ],
                    }),
                (err: unknown) => {
                    assert.ok(err instanceof ConfigurationError);
                    assert.strictEqual(err.message, "GET /a/{name} conflicts with GET /a/{id}");
                    return true;
                },
            );
        });

        it("should surface TLS errors", () => {
            assert.throws(() => createServer({ configProvider: () => testConfig({ tlsMode: "tls" }) }), {
                name: "ConfigurationError",
                message: "failed to load the server certificates: certificate and key paths are required",
            });
        });
    });

    describe("run()", () => {
        it("should bind, call onBound once and serve requests", async () => {
            const onBound = mock.fn<(address: AddressInfo) => void>();
            const server = create({ onBound });

            const { running, address } = await start(server);

            assert.strictEqual(onBound.mock.callCount(), 1);
            assert.deepStrictEqual(onBound.mock.calls[0]?.arguments, [address]);
            assert.deepStrictEqual(server.address, address);
            assert.strictEqual(server.state, ServerState.RUNNING);
            assert.strictEqual(server.isRunning, true);

            const result = await send(`${urlOf(address)}/`);
            assert.strictEqual(result.status, 200);
            assert.strictEqual(result.body, "PONG");

            await server.shutdown();
            await running;
            assert.strictEqual(server.state, ServerState.STOPPED);
        });

        it("should throw synchronously on a second call and keep serving", async () => {
            const server = create();
            const { running, address } = await start(server);

            assert.throws(() => server.run(), (err: unknown) => {
                assert.ok(err instanceof LifecycleError);
                assert.strictEqual(err.message, "HTTP server can only be run once per instance");
                return true;
            });

            assert.strictEqual((await send(`${urlOf(address)}/`)).body, "PONG");

            await server.shutdown();
            await running;
        });

        it("should emit lifecycle events in order", async () => {
            const server = create();
            const events: string[] = [];
            server.on("start", () => events.push("start"));
            server.on("ready", () => events.push("ready"));
            server.on("stopping", () => events.push("stopping"));
            server.on("stop", () => events.push("stop"));

            const { running } = await start(server);
            await server.shutdown();
            await running;

            assert.deepStrictEqual(events, ["start", "ready", "stopping", "stop"]);
        });

        it("should reject with ServeError when the port is taken", async () => {
            const occupied = await listenOnLoopback(() => {});
            const onBound = mock.fn();
            const server = create({
                configProvider: () => testConfig({ bindPort: Number(new URL(occupied.url).port) }),
                onBound,
            });

            try {
                await assert.rejects(server.run(), (err: unknown) => {
                    assert.ok(err instanceof ServeError);
                    assert.match(err.message, /^failed to create the network listener: listen EADDRINUSE/);
                    return true;
                });
                assert.strictEqual(onBound.mock.callCount(), 0);
                assert.strictEqual(server.state, ServerState.STOPPED);
            } finally {
                await occupied.close();
            }
        });

        it("should close the listener and reject with ServeError when onBound throws", async () => {
            let bound: AddressInfo | undefined;
            const server = create({
                onBound: (address) => {
                    bound = address;
                    throw new Error("boom");
                },
            });

            await assert.rejects(server.run(), (err: unknown) => {
                assert.ok(err instanceof ServeError);
                assert.strictEqual(err.message, "bound callback failed: boom");
                assert.ok(err.cause instanceof Error);
                assert.strictEqual(err.cause.message, "boom");
                return true;
            });

            assert.strictEqual(server.state, ServerState.STOPPED);
            assert.strictEqual(server.address, null);
            await assert.rejects(send(`${urlOf(bound ?? null)}/`), { code: "ECONNREFUSED" });
        });

        it("should reject with ServeError for an unparseable bind address", async () => {
            const server = create({ configProvider: () => testConfig({ bindIp: "not-an-ip" }) });

            await assert.rejects(server.run(), {
                name: "ServeError",
                message: "failed to create the network listener: failed to parse bind IP: not-an-ip",
            });
        });

        it("should bind where the listener provider says", async () => {
            const listenerProvider = mock.fn((_bindIp: string, _bindPort: number) => ({ host: "127.0.0.1", port: 0 }));
            const server = create({
                configProvider: () => testConfig({ bindIp: "192.0.2.10", bindPort: 9999 }),
                listenerProvider,
            });

            const { running, address } = await start(server);

            assert.deepStrictEqual(listenerProvider.mock.calls[0]?.arguments, ["192.0.2.10", 9999]);
            assert.strictEqual(address.address, "127.0.0.1");

            await server.shutdown();
            await running;
        });

        it("should resolve without binding when shutdown came first", async () => {
            const onBound = mock.fn();
            const server = create({ onBound });

            await server.shutdown();
            await server.run();

            assert.strictEqual(onBound.mock.callCount(), 0);
            assert.strictEqual(server.address, null);
            assert.strictEqual(server.state, ServerState.STOPPED);
        });
    });

    describe("keep-alive", () => {
        it("should keep connections open by default", async () => {
            const agent = new Agent({ keepAlive: true });
            const server = create();
            const { running, address } = await start(server);

            try {
                const result = await send(`${urlOf(address)}/`, { agent });
                assert.strictEqual(result.headers.connection, "keep-alive");
            } finally {
                agent.destroy();
            }

            await server.shutdown();
            await running;
        });

        it("should close connections after each response when disabled", async () => {
            const agent = new Agent({ keepAlive: true });
            const server = create({ configProvider: () => testConfig({ keepAlive: false }) });
            const { running, address } = await start(server);

            try {
                const result = await send(`${urlOf(address)}/`, { agent });
                assert.strictEqual(result.headers.connection, "close");
            } finally {
                agent.destroy();
            }

            await server.shutdown();
            await running;
        });
    });

    describe("shutdown()", () => {
        it("should share one drain among concurrent callers", async () => {
            const server = create();
            let stopping = 0;
            server.on("stopping", () => {
                stopping++;
            });
            const { running } = await start(server);

            const calls = Array.from({ length: 10 }, () => server.shutdown());

            for (const call of calls) {
                assert.strictEqual(call, calls[0]);
            }
            await Promise.all(calls);
            await running;
            assert.strictEqual(stopping, 1);
            assert.strictEqual(server.shutdown(), calls[0]);
        });

        it("should abort the shutdown signal", async () => {
            const server = create();
            const { running } = await start(server);

            const stopped = server.shutdown();

            assert.strictEqual(server.shutdownSignal.aborted, true);
            assert.strictEqual(server.state, ServerState.STOPPING);
            await stopped;
            await running;
        });

        it("should let in-flight requests finish", async () => {
            const entered = deferred();
            const gate = deferred();
            const server = create({
                endpoints: [
                    (builder) => {
                        builder.register("/slow", "GET", {
                            handler: async ({ response }) => {
                                entered.resolve();
                                await gate.promise;
                                response.end("done");
                            },
                        });
                    },
                ],
            });
            const { running, address } = await start(server);

            const pending = send(`${urlOf(address)}/slow`);
            await entered.promise;
            const stopped = server.shutdown({ timeout: 5000 });
            gate.resolve();

            const result = await pending;
            assert.strictEqual(result.status, 200);
            assert.strictEqual(result.body, "done");
            await stopped;
            await running;
            assert.strictEqual(server.state, ServerState.STOPPED);
        });

        it("should force-close and reject with ShutdownTimeoutError past the deadline", async () => {
            const entered = deferred();
            const gate = deferred();
            const server = create({
                endpoints: [
                    (builder) => {
                        builder.register("/stuck", "GET", {
                            handler: async ({ response }) => {
                                entered.resolve();
                                await gate.promise;
                                response.end();
                            },
                        });
                    },
                ],
            });
            const { running, address } = await start(server);

            const pending = send(`${urlOf(address)}/stuck`).then(
                () => "completed",
                () => "failed",
            );
            await entered.promise;

            const stopEvents = mock.fn();
            server.on("stop", stopEvents);

            const stopped = server.shutdown({ timeout: 50 });
            await assert.rejects(stopped, ShutdownTimeoutError);
            assert.strictEqual(server.shutdown(), stopped);
            assert.strictEqual(server.state, ServerState.STOPPED);
            assert.strictEqual(stopEvents.mock.callCount(), 1);

            await running;
            assert.strictEqual(await pending, "failed");
            gate.resolve();
        });
    });

    describe("autoShutdown", () => {
        it("should shut down on a configured signal", async () => {
            const server = create({ shutdown: { autoShutdown: true, signals: ["SIGUSR2"] } });
            const { running } = await start(server);

            assert.strictEqual(process.listenerCount("SIGUSR2"), 1);
            process.emit("SIGUSR2", "SIGUSR2");

            await running;
            assert.strictEqual(server.state, ServerState.STOPPED);
            assert.strictEqual(process.listenerCount("SIGUSR2"), 0);
        });
    });
});

describe("defaultListenerProvider", () => {
    it("should pass through literal addresses", () => {
        assert.deepStrictEqual(defaultListenerProvider("::1", 8080), { host: "::1", port: 8080 });
        assert.deepStrictEqual(defaultListenerProvider("0.0.0.0", 0), { host: "0.0.0.0", port: 0 });
    });

    it("should reject host names", () => {
        assert.throws(() => defaultListenerProvider("localhost", 80), { message: "failed to parse bind IP: localhost" });
    });
});
