import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";

/** Headers applied to every response of the HTTP transport. */
export function applySecurityHeaders(res: Pick<ServerResponse, "setHeader">): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
  res.setHeader("Cache-Control", "no-store");
}

/**
 * Echoes the caller's `x-request-id` when present, otherwise mints one, and
 * returns the id used for the response.
 */
export function ensureRequestId(
  req: Pick<IncomingMessage, "headers">,
  res: Pick<ServerResponse, "setHeader">,
): string {
  const incoming = req.headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}
