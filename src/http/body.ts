import { Buffer } from "node:buffer";

/** Default upper bound for a JSON-RPC request body (1 MiB). */
export const DEFAULT_MAX_BODY_BYTES = 1 << 20;

/** Carries the HTTP status the caller should answer with. */
export class HttpBodyError extends Error {
  constructor(
    readonly status: 400 | 413,
    message: string,
  ) {
    super(message);
    this.name = "HttpBodyError";
  }
}

/**
 * Reads and parses a JSON request body, rejecting payloads above
 * {@link maxBytes} before they are fully buffered.
 */
export async function readJsonBody(
  req: AsyncIterable<Buffer | string>,
  maxBytes: number = DEFAULT_MAX_BODY_BYTES,
): Promise<unknown> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    totalBytes += buffer.length;
    if (totalBytes > maxBytes) {
      throw new HttpBodyError(413, "Payload Too Large");
    }
    buffers.push(buffer);
  }

  const raw = Buffer.concat(buffers).toString("utf8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpBodyError(400, "Parse error");
  }
}
