import { Buffer } from "node:buffer";
import { timingSafeEqual } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

function headerValues(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Constant-time comparison between the presented token and the configured
 * secret. Missing or empty values never match.
 */
export function checkToken(reqToken: string | undefined, expected: string): boolean {
  if (!reqToken || expected.length === 0) {
    return false;
  }
  const provided = Buffer.from(reqToken);
  const reference = Buffer.from(expected);
  if (provided.length !== reference.length) {
    return false;
  }
  return timingSafeEqual(provided, reference);
}

/**
 * Extracts the token presented by the client: `Authorization: Bearer <t>`
 * first, then the `X-MCP-Token` header.
 */
export function resolveHttpAuthToken(headers: IncomingHttpHeaders): string | undefined {
  for (const raw of headerValues(headers["authorization"])) {
    const match = BEARER_PATTERN.exec(raw.trim());
    if (match?.[1]) {
      return match[1];
    }
  }
  for (const raw of headerValues(headers["x-mcp-token"])) {
    const trimmed = raw.trim();
    if (trimmed.length > 0) {
      return trimmed;
    }
  }
  return undefined;
}
