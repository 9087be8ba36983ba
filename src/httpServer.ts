import { createServer as createHttpServer, type IncomingMessage, type Server as NodeHttpServer, type ServerResponse } from "node:http";
import { performance } from "node:perf_hooks";

import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";

import type { ServerContext } from "./context.js";
import { checkToken, resolveHttpAuthToken } from "./http/auth.js";
import { HttpBodyError, readJsonBody } from "./http/body.js";
import { applySecurityHeaders, ensureRequestId } from "./http/headers.js";
import type { ToolRegistry } from "./mcp/registry.js";
import { errorMessage } from "./nodePrimitives.js";
import { createProtocolServer } from "./orchestrator/runtime.js";
import type { HttpRuntimeOptions } from "./serverOptions.js";

export interface HttpServerHandle {
  close: () => Promise<void>;
  /** Port actually bound (useful when `0` was requested). */
  port: number;
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload), "utf8");
}

/** JSON-RPC error envelope used for requests rejected before the transport. */
function sendJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  sendJson(res, status, { jsonrpc: "2.0", id: null, error: { code, message } });
}

function extractListeningPort(server: NodeHttpServer): number {
  const address = server.address();
  if (typeof address === "object" && address && typeof address.port === "number") {
    return address.port;
  }
  return 0;
}

/**
 * Serves one MCP request in stateless mode: a fresh protocol server and
 * transport per request, both closed once the response is sent.
 */
async function serveMcpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  registry: ToolRegistry,
  context: ServerContext,
  requestId: string,
): Promise<void> {
  // Stateless mode has no session to stream to, so GET and DELETE are refused.
  if (req.method !== "POST") {
    res.setHeader("Allow", "POST");
    sendJsonRpcError(res, 405, -32000, "Method not allowed");
    return;
  }

  let body: unknown;
  try {
    body = await readJsonBody(req);
  } catch (error) {
    if (error instanceof HttpBodyError) {
      context.logger.warn("http_body_rejected", { request_id: requestId, status: error.status });
      sendJsonRpcError(res, error.status, error.status === 413 ? -32600 : -32700, error.message);
      return;
    }
    throw error;
  }

  const server = createProtocolServer(registry, context, "http");
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined, enableJsonResponse: true });
  transport.onerror = (error) => {
    context.logger.error("http_transport_error", { request_id: requestId, message: error.message });
  };
  res.once("close", () => {
    transport.close().catch((error: unknown) => {
      context.logger.warn("http_transport_close_failed", {
        request_id: requestId,
        message: errorMessage(error),
      });
    });
    server.close().catch((error: unknown) => {
      context.logger.warn("http_server_close_failed", {
        request_id: requestId,
        message: errorMessage(error),
      });
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

/**
 * Builds the request listener: `/healthz` is public, the MCP path requires
 * the bearer token when one is configured, everything else is a 404.
 */
export function createHttpRequestListener(
  registry: ToolRegistry,
  context: ServerContext,
  options: HttpRuntimeOptions,
): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const { logger } = context;

  return async (req, res) => {
    applySecurityHeaders(res);
    const requestId = ensureRequestId(req, res);
    const startedAt = performance.now();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    res.once("finish", () => {
      logger.info("http_access", {
        request_id: requestId,
        method: req.method ?? "UNKNOWN",
        route: url.pathname,
        status: res.statusCode,
        duration_ms: Math.round(performance.now() - startedAt),
      });
    });

    if (url.pathname === "/healthz") {
      sendJson(res, 200, { status: "ok", tools: registry.names() });
      return;
    }

    if (url.pathname !== options.path) {
      sendJsonRpcError(res, 404, -32601, "Not found");
      return;
    }

    if (options.token !== null && !checkToken(resolveHttpAuthToken(req.headers), options.token)) {
      logger.warn("http_auth_rejected", { request_id: requestId });
      sendJsonRpcError(res, 401, -32001, "Authentication required");
      return;
    }

    try {
      await serveMcpRequest(req, res, registry, context, requestId);
    } catch (error) {
      logger.error("http_request_failure", {
        request_id: requestId,
        message: errorMessage(error),
      });
      if (!res.headersSent) {
        sendJsonRpcError(res, 500, -32603, "Internal error");
      } else {
        res.end();
      }
    }
  };
}

/** Starts the Streamable HTTP transport and resolves once it listens. */
export async function startHttpServer(
  registry: ToolRegistry,
  context: ServerContext,
  options: HttpRuntimeOptions,
): Promise<HttpServerHandle> {
  const listener = createHttpRequestListener(registry, context, options);
  const httpServer = createHttpServer((req, res) => {
    listener(req, res).catch((error: unknown) => {
      context.logger.error("http_listener_failure", {
        message: errorMessage(error),
      });
    });
  });

  httpServer.on("clientError", (error, socket) => {
    context.logger.warn("http_client_error", { message: error.message });
    socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const port = extractListeningPort(httpServer);
  context.logger.info("http_listening", {
    host: options.host,
    port,
    path: options.path,
    auth: options.token !== null,
  });

  return {
    port,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        httpServer.closeAllConnections();
      });
    },
  };
}
