import { realpath, stat } from "node:fs/promises";

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";

import type { ServerContext } from "../context.js";
import { createProcessRunner, type ProcessRunner } from "../gateways/processRunner.js";
import { linkAbortSignals } from "../infra/abort.js";
import { runWithRequestContext, type RequestContext } from "../infra/requestContext.js";
import { WorkspaceGate } from "../infra/workspaceGate.js";
import { StructuredLogger } from "../logger.js";
import { ToolRegistry } from "../mcp/registry.js";
import { errnoCode } from "../nodePrimitives.js";
import type { ServerOptions } from "../serverOptions.js";
import { loadToolchainConfig } from "../toolchain/config.js";
import { ANALYZE_SPEC, LINT_SPEC, createAnalysisHandlers } from "../tools/analysisTools.js";
import { FORMAT_CHECK_SPEC, FORMAT_FIX_SPEC, createFormatHandlers } from "../tools/formatTools.js";
import { toCallToolResult } from "../tools/shared.js";
import { PROJECT_STATUS_SPEC, createStatusHandler } from "../tools/statusTools.js";
import {
  CHECK_WORKFLOW_RUNS_SPEC,
  VALIDATE_WORKFLOW_YAML_SPEC,
  createWorkflowHandlers,
} from "../tools/workflowTools.js";
import { FULL_CI_SPEC, createFullCiHandler } from "./pipeline.js";

export const SERVER_NAME = "ci-toolbox-mcp";
export const SERVER_VERSION = "0.1.0";

/** Pieces a caller (usually a test) may supply instead of the defaults. */
export interface ServerContextOverrides {
  readonly logger?: StructuredLogger;
  readonly runner?: ProcessRunner;
  readonly shutdownSignal?: AbortSignal;
}

async function resolveWorkspaceRoot(root: string): Promise<string> {
  try {
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      throw new Error(`workspace ${root} is not a directory`);
    }
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      throw new Error(`workspace ${root} does not exist`);
    }
    throw error;
  }
  return realpath(root);
}

/** Assembles the immutable context shared by every handler. */
export async function createServerContext(
  options: ServerOptions,
  overrides: ServerContextOverrides = {},
): Promise<ServerContext> {
  const workspaceRoot = await resolveWorkspaceRoot(options.workspaceRoot);
  const logger =
    overrides.logger ??
    new StructuredLogger({
      logFile: options.logFile,
      level: options.logLevel,
      redactionEnabled: options.redactLogs,
      redactSecrets: [...options.redactTokens, options.vcsToken, options.http?.token].filter(
        (secret): secret is string => typeof secret === "string",
      ),
    });
  const toolchain = await loadToolchainConfig(options.configFile, { required: options.configRequired });
  const runner =
    overrides.runner ?? createProcessRunner({ logger, maxOutputBytes: options.maxOutputBytes });

  logger.info("server_context_ready", {
    workspace: workspaceRoot,
    toolchain_config: toolchain.source,
    formatter: toolchain.formatter.command,
    linter: toolchain.linter.command,
    analyzer: toolchain.analyzer.command,
  });

  return {
    workspaceRoot,
    logger,
    runner,
    toolchain,
    vcsToken: options.vcsToken,
    timeouts: options.timeouts,
    gate: new WorkspaceGate(logger),
    ...(overrides.shutdownSignal ? { shutdownSignal: overrides.shutdownSignal } : {}),
  };
}

/**
 * Registers the closed tool set. Registration order fixes the listing order
 * and the order in which `full_ci` runs its stages.
 */
export function createToolRegistry(context: ServerContext): ToolRegistry {
  const registry = new ToolRegistry(context.logger);
  const format = createFormatHandlers(context);
  const analysis = createAnalysisHandlers(context);
  const workflows = createWorkflowHandlers(context);

  registry.register(FORMAT_CHECK_SPEC, format.check);
  registry.register(LINT_SPEC, analysis.lint);
  registry.register(ANALYZE_SPEC, analysis.analyze);
  registry.register(FORMAT_FIX_SPEC, format.fix);
  registry.register(FULL_CI_SPEC, createFullCiHandler(context, registry));
  registry.register(CHECK_WORKFLOW_RUNS_SPEC, workflows.runs);
  registry.register(VALIDATE_WORKFLOW_YAML_SPEC, workflows.yaml);
  registry.register(PROJECT_STATUS_SPEC, createStatusHandler(context));
  registry.seal();
  return registry;
}

/**
 * Binds a sealed registry to a protocol server instance. One instance serves
 * one transport; HTTP builds a fresh one per request.
 */
export function createProtocolServer(
  registry: ToolRegistry,
  context: ServerContext,
  transport: RequestContext["transport"],
): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: registry.list() }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name } = request.params;
    const linked = linkAbortSignals(extra.signal, context.shutdownSignal);
    try {
      const outcome = await runWithRequestContext({ requestId: extra.requestId, tool: name, transport }, () =>
        registry.dispatch(
          { name, arguments: request.params.arguments },
          { signal: linked.signal, requestId: extra.requestId },
        ),
      );
      return toCallToolResult(outcome);
    } finally {
      linked.dispose();
    }
  });

  server.onerror = (error) => {
    context.logger.error("protocol_error", { message: error.message });
  };
  return server;
}
