/**
 * Header names and values used by the core
 *
 * @module headers
 */

export const HeaderName = {
    ALLOW: "Allow",
    CONNECTION: "Connection",
    CONTENT_LENGTH: "Content-Length",
    CONTENT_TYPE: "Content-Type",
    TRANSFER_ENCODING: "Transfer-Encoding",
} as const;

export const ContentType = {
    JSON: "application/json",
    TEXT: "text/plain; charset=utf-8",
} as const;
