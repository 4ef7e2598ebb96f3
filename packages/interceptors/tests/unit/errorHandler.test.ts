/**
 * Error handler interceptor tests
 */

import assert from "node:assert";
import { describe, it, mock } from "node:test";
import { HttpError } from "@portico/core";
import { createErrorHandlerInterceptor } from "../../src/errorHandler.ts";
import type { ErrorInfo, LogFunction } from "../../src/types.ts";
import { createContext } from "../helpers/context.ts";

describe("errorHandler interceptor", () => {
    it("should pass through successful requests", async () => {
        const interceptor = createErrorHandlerInterceptor({ logErrors: false });
        const ctx = createContext();
        const next = mock.fn(async () => {
            ctx.response.statusCode = 202;
        });

        await interceptor(next)(ctx);

        assert.strictEqual(next.mock.callCount(), 1);
        assert.strictEqual(ctx.response.statusCode, 202);
    });

    it("should answer unknown errors with 500", async () => {
        const interceptor = createErrorHandlerInterceptor({ logErrors: false });
        const ctx = createContext();

        await interceptor(async () => {
            throw new Error("something went wrong");
        })(ctx);

        assert.strictEqual(ctx.response.statusCode, 500);
        assert.strictEqual(ctx.response.getHeader("content-type"), "application/json");
        assert.strictEqual(ctx.response.getHeader("content-length"), Buffer.byteLength('{"message":"Internal Server Error"}'));
        assert.strictEqual(ctx.response.headersSent, true);
    });

    it("should answer an HttpError with its status", async () => {
        const interceptor = createErrorHandlerInterceptor({ logErrors: false });
        const ctx = createContext();

        await interceptor(() => {
            throw new HttpError(404, "order not found");
        })(ctx);

        assert.strictEqual(ctx.response.statusCode, 404);
        assert.strictEqual(ctx.response.getHeader("content-length"), Buffer.byteLength('{"message":"order not found"}'));
    });

    it("should report to onError with server details", async () => {
        const onError = mock.fn<(info: ErrorInfo) => void>();
        const interceptor = createErrorHandlerInterceptor({ onError, includeStackTrace: false });
        const error = new HttpError(403, "forbidden", { rule: "admin-only" });

        await interceptor(() => {
            throw error;
        })(createContext());

        assert.strictEqual(onError.mock.callCount(), 1);
        assert.deepStrictEqual(onError.mock.calls[0]?.arguments, [{ error, status: 403, serverDetails: { rule: "admin-only" } }]);
    });

    it("should include the stack when asked", async () => {
        const onError = mock.fn<(info: ErrorInfo) => void>();
        const interceptor = createErrorHandlerInterceptor({ onError, includeStackTrace: true });
        const error = new Error("boom");

        await interceptor(() => {
            throw error;
        })(createContext());

        assert.strictEqual(onError.mock.calls[0]?.arguments[0].stack, error.stack);
    });

    it("should log through the configured logger", async () => {
        const logger = mock.fn<LogFunction>();
        const interceptor = createErrorHandlerInterceptor({ logErrors: true, includeStackTrace: false, logger });
        const error = new HttpError(409, "conflict", { version: 2 });

        await interceptor(() => {
            throw error;
        })(createContext({ method: "PUT", url: "/orders/o1" }));

        assert.deepStrictEqual(
            logger.mock.calls.map((call) => call.arguments),
            [
                ["Request PUT /orders/o1 failed with 409:", error],
                ["Server details:", { version: 2 }],
            ],
        );
    });

    it("should stay silent when logging is off", async () => {
        const logger = mock.fn<LogFunction>();
        const interceptor = createErrorHandlerInterceptor({ logErrors: false, logger });

        await interceptor(() => {
            throw new Error("quiet");
        })(createContext());

        assert.strictEqual(logger.mock.callCount(), 0);
    });

    it("should destroy the response when headers were already sent", async () => {
        const interceptor = createErrorHandlerInterceptor({ logErrors: false });
        const ctx = createContext();

        await interceptor(({ response }) => {
            response.writeHead(200);
            response.flushHeaders();
            throw new Error("failed mid-body");
        })(ctx);

        assert.strictEqual(ctx.response.statusCode, 200);
        assert.strictEqual(ctx.response.destroyed, true);
    });
});
