import { stat } from "node:fs/promises";
import path from "node:path";

import type { ServerContext } from "../context.js";
import { classifyProcessFailure } from "../gateways/processRunner.js";
import type { ToolHandler, ToolInvocation, ToolSpec } from "../mcp/registry.js";
import { errnoCode } from "../nodePrimitives.js";
import type { Finding, ToolResult } from "../types.js";
import { failureResult, successResult } from "./shared.js";
import { WORKFLOWS_DIRECTORY } from "./workflowTools.js";

export const PROJECT_STATUS_SPEC: ToolSpec = {
  name: "project_status",
  title: "Project status",
  description: "Reports the workspace root, the toolchain in use and whether each external tool is installed.",
  parameters: {},
};

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === "ENOENT" || errnoCode(error) === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}

async function checkToolVersion(
  context: ServerContext,
  role: string,
  command: string,
  invocation: ToolInvocation,
): Promise<Finding> {
  const result = await context.runner.run({
    command,
    args: ["--version"],
    cwd: context.workspaceRoot,
    timeoutMs: context.timeouts.versionCheckMs,
    signal: invocation.signal,
  });
  const failure = classifyProcessFailure(result, context.timeouts.versionCheckMs);
  if (failure || result.exitCode !== 0) {
    return {
      severity: "warning",
      message: `${role}: ${failure ? failure.message : `${command} --version exited with code ${result.exitCode ?? "unknown"}`}`,
      rule: "toolchain",
      data: { tool: role, command, available: false, version: null },
    };
  }
  const version = `${result.stdout}\n${result.stderr}`.split("\n").find((line) => line.trim().length > 0)?.trim() ?? "";
  return {
    severity: "info",
    message: `${role}: ${version || command}`,
    rule: "toolchain",
    data: { tool: role, command, available: true, version: version || null },
  };
}

export async function projectStatus(context: ServerContext, invocation: ToolInvocation): Promise<ToolResult> {
  const { toolchain } = context;
  const hasWorkflows = await isDirectory(path.join(context.workspaceRoot, WORKFLOWS_DIRECTORY));
  const versionChecks = await Promise.all([
    checkToolVersion(context, "formatter", toolchain.formatter.command, invocation),
    checkToolVersion(context, "linter", toolchain.linter.command, invocation),
    checkToolVersion(context, "analyzer", toolchain.analyzer.command, invocation),
    checkToolVersion(context, "vcs", toolchain.vcs.command, invocation),
  ]);

  const details: Finding[] = [
    {
      severity: "info",
      message: `workspace: ${context.workspaceRoot}`,
      rule: "workspace",
      data: {
        root: context.workspaceRoot,
        workflows: hasWorkflows,
        toolchain_config: toolchain.source,
        vcs_credential: context.vcsToken !== null,
      },
    },
    ...versionChecks,
  ];

  const missing = versionChecks.filter((finding) => finding.severity === "warning");
  if (missing.length > 0) {
    return failureResult(`project_status: ${missing.length} of ${versionChecks.length} tools unavailable`, details);
  }
  return successResult(`project_status: all ${versionChecks.length} tools available`, details);
}

export function createStatusHandler(context: ServerContext): ToolHandler {
  return (_args, invocation) => projectStatus(context, invocation);
}
