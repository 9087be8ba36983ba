import type { ServerContext } from "../context.js";
import { classifyProcessFailure } from "../gateways/processRunner.js";
import type { ToolArguments, ToolHandler, ToolInvocation, ToolSpec } from "../mcp/registry.js";
import { ToolError } from "../server/toolErrors.js";
import type { AnalyzerConfig } from "../toolchain/config.js";
import { parseDiagnostics } from "../toolchain/diagnostics.js";
import { chunk, toCommandPath } from "../toolchain/fileSet.js";
import { ERROR_CODES, type Finding, type ProcessResult, type ToolResult } from "../types.js";
import { FILE_SET_PARAMETERS, resolveFileSetArguments } from "./fileSetArguments.js";
import { countFindings, errorResult, failureResult, successResult } from "./shared.js";

export const LINT_SPEC: ToolSpec = {
  name: "lint",
  title: "Lint",
  description: "Runs the linter over a file set and reports its diagnostics as findings.",
  parameters: FILE_SET_PARAMETERS,
  stage: true,
};

export const ANALYZE_SPEC: ToolSpec = {
  name: "analyze",
  title: "Static analysis",
  description: "Runs the static analyzer over a file set and reports its diagnostics as findings.",
  parameters: FILE_SET_PARAMETERS,
  stage: true,
};

/**
 * Shared body of `lint` and `analyze`: batches the file set, parses the
 * combined output of every batch, then derives the status.
 */
export async function runAnalyzer(
  toolName: string,
  analyzer: AnalyzerConfig,
  context: ServerContext,
  args: ToolArguments,
  invocation: ToolInvocation,
): Promise<ToolResult> {
  const files = await resolveFileSetArguments(context, args, analyzer.extensions);
  if (files.length === 0) {
    return successResult(`${toolName}: no matching files`);
  }

  const results: ProcessResult[] = [];
  const findings: Finding[] = [];
  const seen = new Set<string>();
  let unparsed = 0;
  const unparsedSamples: string[] = [];

  for (const batch of chunk(files, context.toolchain.batchSize)) {
    const result = await context.runner.run({
      command: analyzer.command,
      args: [...analyzer.args, ...batch.map(toCommandPath)],
      cwd: context.workspaceRoot,
      timeoutMs: context.timeouts.processMs,
      signal: invocation.signal,
    });
    const failure = classifyProcessFailure(result, context.timeouts.processMs);
    if (failure) {
      throw new ToolError(failure.code, failure.message, {
        ...(failure.hint ? { hint: failure.hint } : {}),
        rawOutput: [...results, result],
      });
    }
    results.push(result);

    const parsed = parseDiagnostics(`${result.stdout}\n${result.stderr}`, {
      root: context.workspaceRoot,
      ignorePatterns: context.toolchain.ignoreOutputPatterns,
    });
    for (const finding of parsed.findings) {
      const key = JSON.stringify(finding);
      if (!seen.has(key)) {
        seen.add(key);
        findings.push(finding);
      }
    }
    unparsed += parsed.unparsed;
    unparsedSamples.push(...parsed.unparsedSamples.slice(0, Math.max(0, 5 - unparsedSamples.length)));
  }

  if (unparsed > 0) {
    context.logger.debug("analyzer_unparsed_output", { tool: toolName, count: unparsed, samples: unparsedSamples });
  }
  const unparsedNote = unparsed > 0 ? `; ${unparsed} unparsed output line${unparsed === 1 ? "" : "s"}` : "";
  const scope = `${files.length} file${files.length === 1 ? "" : "s"}`;

  if (findings.length > 0) {
    return failureResult(`${toolName}: ${countFindings(findings)} in ${scope}${unparsedNote}`, findings, results);
  }

  const crashed = results.find((result) => result.exitCode !== 0);
  if (crashed) {
    return errorResult(
      ERROR_CODES.ANALYZER_EXIT,
      `${toolName}: ${analyzer.command} exited with code ${crashed.exitCode ?? crashed.signal ?? "unknown"} without reporting diagnostics${unparsedNote}`,
      [],
      results,
    );
  }
  return successResult(`${toolName}: no findings in ${scope}${unparsedNote}`);
}

export function createAnalysisHandlers(context: ServerContext): { lint: ToolHandler; analyze: ToolHandler } {
  return {
    lint: (args, invocation) => runAnalyzer("lint", context.toolchain.linter, context, args, invocation),
    analyze: (args, invocation) => runAnalyzer("analyze", context.toolchain.analyzer, context, args, invocation),
  };
}
