/**
 * Shared type definitions for the tool-dispatch server: the result model every
 * handler returns, the captured process output, and the catalogue of stable
 * error codes surfaced to clients.
 */

/**
 * Stable error codes carried in `error_code`. Keys are `<FAMILY>_<CASE>`; the
 * values never change once published.
 */
export const ERROR_CODES = {
  SCHEMA_UNKNOWN_TOOL: "E-SCHEMA-UNKNOWN-TOOL",
  SCHEMA_INVALID_ARGS: "E-SCHEMA-INVALID-ARGS",
  PROCESS_NOT_FOUND: "E-PROCESS-NOT-FOUND",
  PROCESS_PERMISSION: "E-PROCESS-PERMISSION",
  PROCESS_SPAWN: "E-PROCESS-SPAWN",
  PROCESS_TIMEOUT: "E-PROCESS-TIMEOUT",
  PROCESS_CANCELLED: "E-PROCESS-CANCELLED",
  PATH_ESCAPE: "E-PATH-ESCAPE",
  FILESET_MISSING: "E-FILESET-MISSING",
  FORMAT_FAILED: "E-FORMAT-FAILED",
  ANALYZER_EXIT: "E-ANALYZER-EXIT",
  VCS_AUTH: "E-VCS-AUTH",
  VCS_CLI: "E-VCS-CLI",
  VCS_OUTPUT: "E-VCS-OUTPUT",
  WORKFLOW_NOT_FOUND: "E-WORKFLOW-NOT-FOUND",
  WORKFLOW_YAML_SYNTAX: "E-YAML-SYNTAX",
  PIPELINE_TIMEOUT: "E-PIPELINE-TIMEOUT",
  TOOL_UNEXPECTED: "E-TOOL-UNEXPECTED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Maximum number of UTF-16 code units kept in error messages and hints. */
const ERROR_TEXT_MAX_LENGTH = 240;

/** Single line, at most {@link ERROR_TEXT_MAX_LENGTH} long; blank text yields `undefined`. */
function clampErrorText(text: string): string | undefined {
  const oneLine = text.replace(/\s+/g, " ").trim();
  if (!oneLine) {
    return undefined;
  }
  return oneLine.length > ERROR_TEXT_MAX_LENGTH ? `${oneLine.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…` : oneLine;
}

export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  return clampErrorText(text) ?? fallback;
}

export function normaliseErrorHint(hint?: string): string | undefined {
  return hint === undefined ? undefined : clampErrorText(hint);
}

/**
 * Outcome of a tool invocation.
 *
 * - `success`: the operation ran and found nothing to report.
 * - `failure`: the operation ran correctly and found issues.
 * - `error`: the operation itself could not run.
 */
export type ToolStatus = "success" | "failure" | "error";

export type FindingSeverity = "error" | "warning" | "info";

/** One structured issue reported by a tool. */
export interface Finding {
  file?: string;
  line?: number;
  column?: number;
  severity: FindingSeverity;
  message: string;
  /** Analyzer rule, violation code or check identifier. */
  rule?: string;
  /** Tool specific structured payload (e.g. the fields of a workflow run). */
  data?: Record<string, string | number | boolean | null>;
}

/** Failure to start a process at all. */
export interface SpawnFailure {
  code: string;
  message: string;
}

/** Captured outcome of one external process invocation. */
export interface ProcessResult {
  command: string;
  args: string[];
  cwd: string;
  /** `null` when the process never started or was terminated by a signal. */
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  stdoutTruncated: boolean;
  stderrTruncated: boolean;
  durationMs: number;
  timedOut: boolean;
  cancelled: boolean;
  spawnError?: SpawnFailure;
}

/** Common shape returned by every handler. */
export interface ToolResult {
  status: ToolStatus;
  summary: string;
  details: Finding[];
  /** Stable code attached to `error` results. */
  error_code?: ErrorCode;
  raw_output?: ProcessResult[];
}

/** One executed stage of the composite pipeline. */
export interface PipelineStageRecord {
  tool: string;
  result: ToolResult;
}

/** Aggregated outcome of the `full_ci` pipeline. */
export interface PipelineReport {
  status: ToolStatus;
  summary: string;
  stages: PipelineStageRecord[];
  /** Names of the stages that did not run because an earlier stage errored. */
  skipped: string[];
}

/** Orders statuses by severity: error > failure > success. */
const STATUS_RANK: Record<ToolStatus, number> = { success: 0, failure: 1, error: 2 };

/** Returns the most severe status among the provided ones (`success` for none). */
export function aggregateStatus(statuses: Iterable<ToolStatus>): ToolStatus {
  let worst: ToolStatus = "success";
  for (const status of statuses) {
    if (STATUS_RANK[status] > STATUS_RANK[worst]) {
      worst = status;
    }
  }
  return worst;
}
