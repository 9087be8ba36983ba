import type { ServerContext } from "../context.js";
import { linkAbortSignals } from "../infra/abort.js";
import type { ToolArguments, ToolHandler, ToolInvocation, ToolRegistry, ToolSpec } from "../mcp/registry.js";
import { errorResult } from "../tools/shared.js";
import { FILE_SET_PARAMETERS } from "../tools/fileSetArguments.js";
import { aggregateStatus, ERROR_CODES, type PipelineReport, type PipelineStageRecord, type ToolResult } from "../types.js";

export const FULL_CI_SPEC: ToolSpec = {
  name: "full_ci",
  title: "Full CI",
  description:
    "Runs format_check, lint and analyze in that order. Findings do not stop the pipeline; a stage that cannot run skips the remaining ones.",
  parameters: FILE_SET_PARAMETERS,
};

/** Decision taken after each stage. */
export type StageContinuation = "continue" | "abort";

export type ContinuationPolicy = (result: ToolResult) => StageContinuation;

/** Findings never hide later stages; an infrastructure error makes them meaningless. */
export const continueOnFailureAbortOnError: ContinuationPolicy = (result) =>
  result.status === "error" ? "abort" : "continue";

export type StageRunner = (stage: string) => Promise<ToolResult>;

interface PipelineState {
  readonly stages: readonly PipelineStageRecord[];
  readonly skipped: readonly string[];
  readonly aborted: boolean;
}

/**
 * Folds the ordered stage list into a report. Stages run strictly one after
 * the other; once the policy aborts, the remaining names only land in
 * `skipped`.
 */
export async function runPipeline(
  stages: readonly string[],
  runStage: StageRunner,
  policy: ContinuationPolicy = continueOnFailureAbortOnError,
): Promise<PipelineReport> {
  const initial: PipelineState = { stages: [], skipped: [], aborted: false };
  const final = await stages.reduce<Promise<PipelineState>>(async (pending, stage) => {
    const state = await pending;
    if (state.aborted) {
      return { ...state, skipped: [...state.skipped, stage] };
    }
    const result = await runStage(stage);
    return {
      stages: [...state.stages, { tool: stage, result }],
      skipped: state.skipped,
      aborted: policy(result) === "abort",
    };
  }, Promise.resolve(initial));

  const status = aggregateStatus(final.stages.map((stage) => stage.result.status));
  const ran = final.stages.map((stage) => `${stage.tool}: ${stage.result.status}`).join(", ");
  const skipped = final.skipped.length > 0 ? `; skipped: ${final.skipped.join(", ")}` : "";
  return {
    status,
    summary: `full_ci: ${status} (${ran || "no stages"})${skipped}`,
    stages: [...final.stages],
    skipped: [...final.skipped],
  };
}

/**
 * `full_ci` runs the registered stage tools through the registry itself, so
 * each stage gets the same validation and fault isolation as a direct call.
 * The pipeline timeout aborts the stage in flight.
 */
export async function runFullCi(
  context: ServerContext,
  registry: ToolRegistry,
  args: ToolArguments,
  invocation: ToolInvocation,
): Promise<PipelineReport> {
  const linked = linkAbortSignals(invocation.signal);
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    context.logger.warn("pipeline_timeout", { timeout_ms: context.timeouts.pipelineMs });
    linked.abort();
  }, context.timeouts.pipelineMs);
  timer.unref();

  const forwarded = args.toRecord();
  const runStage: StageRunner = async (stage) => {
    if (timedOut) {
      return errorResult(ERROR_CODES.PIPELINE_TIMEOUT, `${stage}: pipeline timed out after ${context.timeouts.pipelineMs}ms`);
    }
    const outcome = await registry.dispatch(
      { name: stage, arguments: forwarded },
      { signal: linked.signal, requestId: invocation.requestId },
    );
    if (outcome.kind === "schema_error") {
      return errorResult(outcome.error.code, outcome.error.message);
    }
    if (outcome.kind === "report") {
      return errorResult(ERROR_CODES.TOOL_UNEXPECTED, `${stage} cannot run as a pipeline stage`);
    }
    if (timedOut && outcome.result.status === "error") {
      return {
        ...outcome.result,
        summary: `${stage}: pipeline timed out after ${context.timeouts.pipelineMs}ms`,
        error_code: ERROR_CODES.PIPELINE_TIMEOUT,
      };
    }
    return outcome.result;
  };

  try {
    return await runPipeline(registry.stageNames(), runStage);
  } finally {
    clearTimeout(timer);
    linked.dispose();
  }
}

export function createFullCiHandler(context: ServerContext, registry: ToolRegistry): ToolHandler {
  return (args, invocation) =>
    context.gate.runExclusive(context.workspaceRoot, () => runFullCi(context, registry, args, invocation));
}
