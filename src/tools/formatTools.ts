import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import path from "node:path";

import pLimit from "p-limit";

import type { ServerContext } from "../context.js";
import { classifyProcessFailure } from "../gateways/processRunner.js";
import { linkAbortSignals } from "../infra/abort.js";
import type { ToolArguments, ToolHandler, ToolInvocation, ToolSpec } from "../mcp/registry.js";
import { ToolError } from "../server/toolErrors.js";
import { chunk, toCommandPath } from "../toolchain/fileSet.js";
import { ERROR_CODES, type Finding, type ProcessResult, type ToolResult } from "../types.js";
import { FILE_SET_PARAMETERS, resolveFileSetArguments } from "./fileSetArguments.js";
import { failureResult, successResult } from "./shared.js";

export const FORMAT_CHECK_SPEC: ToolSpec = {
  name: "format_check",
  title: "Format check",
  description:
    "Runs the formatter in check mode over a file set. Reports one finding per file that needs reformatting.",
  parameters: FILE_SET_PARAMETERS,
  stage: true,
};

export const FORMAT_FIX_SPEC: ToolSpec = {
  name: "format_fix",
  title: "Format fix",
  description: "Rewrites the files of a file set in place with the formatter and lists the files that changed.",
  parameters: FILE_SET_PARAMETERS,
};

/** Throws the classified failure of a process that did not run to completion. */
function assertProcessRan(result: ProcessResult, timeoutMs: number, collected: readonly ProcessResult[]): void {
  const failure = classifyProcessFailure(result, timeoutMs);
  if (failure) {
    throw new ToolError(failure.code, failure.message, {
      ...(failure.hint ? { hint: failure.hint } : {}),
      rawOutput: [...collected, result],
    });
  }
}

export async function runFormatCheck(
  context: ServerContext,
  args: ToolArguments,
  invocation: ToolInvocation,
): Promise<ToolResult> {
  const formatter = context.toolchain.formatter;
  const files = await resolveFileSetArguments(context, args, formatter.extensions);
  if (files.length === 0) {
    return successResult("format_check: no matching files");
  }

  // The first process that cannot run cancels the checks still queued.
  const linked = linkAbortSignals(invocation.signal);
  const limit = pLimit(formatter.concurrency);
  try {
    const results = await Promise.all(
      files.map((file) =>
        limit(async () => {
          const result = await context.runner.run({
            command: formatter.command,
            args: [...formatter.args, ...formatter.checkArgs, toCommandPath(file)],
            cwd: context.workspaceRoot,
            timeoutMs: context.timeouts.processMs,
            signal: linked.signal,
          });
          if (classifyProcessFailure(result) && !linked.signal.aborted) {
            linked.abort();
          }
          return { file, result };
        }),
      ),
    );

    // Report the root cause, not the checks it cancelled.
    const broken =
      results.find(({ result }) => classifyProcessFailure(result) !== null && !result.cancelled) ??
      results.find(({ result }) => classifyProcessFailure(result) !== null);
    if (broken) {
      assertProcessRan(broken.result, context.timeouts.processMs, []);
    }

    const offenders = results.filter(({ result }) => result.exitCode !== 0);
    if (offenders.length === 0) {
      return successResult(`format_check: ${files.length} file${files.length === 1 ? "" : "s"} formatted correctly`);
    }
    const details: Finding[] = offenders.map(({ file }) => ({
      file,
      severity: "warning",
      message: "file is not formatted",
      rule: "format",
    }));
    return failureResult(
      `format_check: ${offenders.length} of ${files.length} files need formatting`,
      details,
      offenders.map(({ result }) => result),
    );
  } finally {
    linked.dispose();
  }
}

async function hashFile(root: string, file: string): Promise<string> {
  const content = await readFile(path.join(root, file));
  return createHash("sha256").update(content).digest("hex");
}

async function hashFiles(root: string, files: readonly string[]): Promise<Map<string, string>> {
  const limit = pLimit(8);
  const entries = await Promise.all(files.map((file) => limit(async () => [file, await hashFile(root, file)] as const)));
  return new Map(entries);
}

export async function runFormatFix(
  context: ServerContext,
  args: ToolArguments,
  invocation: ToolInvocation,
): Promise<ToolResult> {
  const formatter = context.toolchain.formatter;
  const files = await resolveFileSetArguments(context, args, formatter.extensions);
  if (files.length === 0) {
    return successResult("format_fix: no matching files");
  }

  const before = await hashFiles(context.workspaceRoot, files);
  const collected: ProcessResult[] = [];
  for (const batch of chunk(files, context.toolchain.batchSize)) {
    const result = await context.runner.run({
      command: formatter.command,
      args: [...formatter.args, ...formatter.fixArgs, ...batch.map(toCommandPath)],
      cwd: context.workspaceRoot,
      timeoutMs: context.timeouts.processMs,
      signal: invocation.signal,
    });
    assertProcessRan(result, context.timeouts.processMs, collected);
    collected.push(result);
    if (result.exitCode !== 0) {
      throw new ToolError(ERROR_CODES.FORMAT_FAILED, `${formatter.command} exited with code ${result.exitCode}`, {
        rawOutput: collected,
      });
    }
  }

  const after = await hashFiles(context.workspaceRoot, files);
  const changed = files.filter((file) => before.get(file) !== after.get(file));
  const details: Finding[] = changed.map((file) => ({
    file,
    severity: "info",
    message: "file reformatted",
    rule: "format",
  }));
  return successResult(`format_fix: reformatted ${changed.length} of ${files.length} files`, details);
}

/** Handlers bound to a context; `format_fix` holds the workspace gate. */
export function createFormatHandlers(context: ServerContext): { check: ToolHandler; fix: ToolHandler } {
  return {
    check: (args, invocation) => runFormatCheck(context, args, invocation),
    fix: (args, invocation) =>
      context.gate.runExclusive(context.workspaceRoot, () => runFormatFix(context, args, invocation)),
  };
}
