#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { realpathSync } from "node:fs";
import process from "node:process";
import type { Readable, Writable } from "node:stream";
import { pathToFileURL } from "node:url";

import type { ServerContext } from "./context.js";
import { startHttpServer } from "./httpServer.js";
import { StructuredLogger } from "./logger.js";
import type { ToolRegistry } from "./mcp/registry.js";
import { createProtocolServer, createServerContext, createToolRegistry, type ServerContextOverrides } from "./orchestrator/runtime.js";
import { errnoCode, errorMessage } from "./nodePrimitives.js";
import { parseServerOptions, type ServerOptions } from "./serverOptions.js";

export * from "./orchestrator/runtime.js";

export interface RunningServer {
  readonly context: ServerContext;
  readonly registry: ToolRegistry;
  /** Port bound by the HTTP transport, when enabled. */
  readonly httpPort: number | null;
  /** Aborts in-flight calls, closes every transport and flushes the logger. */
  close(): Promise<void>;
}

export interface StartServerOverrides extends Omit<ServerContextOverrides, "shutdownSignal"> {
  /** Streams carrying the stdio transport; the process's own when omitted. */
  readonly stdio?: { readonly input: Readable; readonly output: Writable };
}

/**
 * Builds the context, seals the registry and connects the transports named by
 * {@link options}. The end of stdin means the stdio client went away: the
 * server then closes itself, cancelling whatever it was still running.
 */
export async function startServer(options: ServerOptions, overrides: StartServerOverrides = {}): Promise<RunningServer> {
  const { stdio, ...contextOverrides } = overrides;
  const shutdown = new AbortController();
  const context = await createServerContext(options, { ...contextOverrides, shutdownSignal: shutdown.signal });
  const registry = createToolRegistry(context);
  const { logger } = context;
  const cleanup: Array<() => Promise<void>> = [];

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    closing ??= (async () => {
      shutdown.abort();
      for (const closer of cleanup) {
        try {
          await closer();
        } catch (error) {
          logger.error("transport_close_failed", { message: errorMessage(error) });
        }
      }
      logger.info("server_stopped");
      await logger.flush();
    })();
    return closing;
  };

  let httpPort: number | null = null;
  if (options.http) {
    const handle = await startHttpServer(registry, context, options.http);
    httpPort = handle.port;
    cleanup.push(handle.close);
  }

  if (options.enableStdio) {
    const input = stdio?.input ?? process.stdin;
    const output = stdio?.output ?? process.stdout;
    const server = createProtocolServer(registry, context, "stdio");
    await server.connect(new StdioServerTransport(input, output));
    cleanup.push(() => server.close());
    input.once("end", () => {
      logger.info("stdio_client_disconnected");
      close().catch((error: unknown) => {
        logger.error("shutdown_failed", { message: errorMessage(error) });
      });
    });
    logger.info("stdio_listening");
  }

  logger.info("server_started", {
    stdio: options.enableStdio,
    http: options.http !== null,
    tools: registry.names(),
  });

  return { context, registry, httpPort, close };
}

async function main(): Promise<void> {
  let options: ServerOptions;
  try {
    options = parseServerOptions(process.argv.slice(2));
  } catch (error) {
    new StructuredLogger().error("cli_options_invalid", {
      message: errorMessage(error),
    });
    process.exitCode = 1;
    return;
  }

  let running: RunningServer;
  try {
    running = await startServer(options);
  } catch (error) {
    new StructuredLogger().error("server_start_failed", {
      message: errorMessage(error),
    });
    process.exitCode = 1;
    return;
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    running.context.logger.warn("shutdown_signal", { signal });
    running.close().then(
      () => process.exit(0),
      () => process.exit(1),
    );
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

/**
 * True when {@link entry} (normally `process.argv[1]`) designates the module
 * at {@link moduleUrl}. npm installs `bin` entries as symlinks while Node
 * reports the module under its real path, so the entry is resolved first.
 */
export function isEntryPoint(entry: string | undefined, moduleUrl: string): boolean {
  if (!entry) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(entry)).href === moduleUrl;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  void main();
}
