/**
 * Full Interceptor Chain Integration Tests
 *
 * Runs the default chain inside a real server on a loopback port.
 *
 * @module full-chain.test
 */

import assert from "node:assert";
import { request } from "node:http";
import type { AddressInfo } from "node:net";
import { after, before, describe, it, mock } from "node:test";
import { createServer, type EndpointRoute, HttpError, parseEnvConfig, type Server } from "@portico/core";
import { createDefaultInterceptors } from "../../src/defaults.ts";
import type { ErrorInfo } from "../../src/types.ts";

function get(url: string): Promise<{ status: number; body: string }> {
    return new Promise((resolve, reject) => {
        const req = request(url, { agent: false }, (res) => {
            const chunks: Buffer[] = [];
            res.on("data", (chunk: Buffer) => chunks.push(chunk));
            res.on("error", reject);
            res.on("end", () => resolve({ status: res.statusCode ?? 0, body: Buffer.concat(chunks).toString("utf8") }));
        });
        req.on("error", reject);
        req.end();
    });
}

const reports: EndpointRoute = (builder) => {
    builder.register("/slow", "GET", {
        handler: async ({ signal }) => {
            await new Promise<void>((resolve) => {
                const timer = setTimeout(resolve, 5000);
                signal.addEventListener("abort", () => {
                    clearTimeout(timer);
                    resolve();
                });
            });
        },
    });
    builder.register("/forbidden", "GET", {
        handler: () => {
            throw new HttpError(403, "Access denied", { reason: "no role" });
        },
    });
    builder.register("/broken", "GET", {
        handler: () => {
            throw new Error("database unavailable");
        },
    });
    builder.register("/ok", "GET", {
        handler: ({ response }) => {
            response.end("fine");
        },
    });
};

describe("Full Interceptor Chain Integration", () => {
    const onError = mock.fn<(info: ErrorInfo) => void>();
    let server: Server;
    let running: Promise<void>;
    let url: string;

    before(async () => {
        server = createServer({
            endpoints: [reports],
            interceptors: createDefaultInterceptors({
                errorHandler: { onError },
                timeout: { duration: 50 },
                bulkhead: { capacity: 4, queueSize: 4 },
            }),
            configProvider: () => parseEnvConfig({ HTTP_SERVER_BIND_IP: "127.0.0.1", HTTP_SERVER_TLS_MODE: "off" }),
            logger: { debug: mock.fn(), info: mock.fn(), warn: mock.fn(), error: mock.fn() },
        });
        const ready = new Promise<AddressInfo>((resolve) => {
            server.once("ready", resolve);
        });
        running = server.run();
        const address = await ready;
        url = `http://127.0.0.1:${address.port}`;
    });

    after(async () => {
        await server.shutdown();
        await running;
    });

    it("should pass successful requests through every interceptor", async () => {
        assert.deepStrictEqual(await get(`${url}/ok`), { status: 200, body: "fine" });
    });

    it("should answer slow requests with 504", async () => {
        assert.deepStrictEqual(await get(`${url}/slow`), { status: 504, body: '{"message":"Request timeout after 50ms"}' });
    });

    it("should answer with the status of an HttpError", async () => {
        assert.deepStrictEqual(await get(`${url}/forbidden`), { status: 403, body: '{"message":"Access denied"}' });
    });

    it("should answer unknown errors with 500 and report them", async () => {
        onError.mock.resetCalls();

        assert.deepStrictEqual(await get(`${url}/broken`), { status: 500, body: '{"message":"Internal Server Error"}' });
        assert.strictEqual(onError.mock.callCount(), 1);
        assert.strictEqual(onError.mock.calls[0]?.arguments[0].error.message, "database unavailable");
        assert.strictEqual(onError.mock.calls[0]?.arguments[0].status, 500);
    });
});
