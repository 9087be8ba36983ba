/**
 * Result builders shared by every handler, plus the conversion of dispatch
 * outcomes into the MCP `CallToolResult` envelope.
 */
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import type { SchemaError } from "../server/toolErrors.js";
import {
  type ErrorCode,
  type Finding,
  type FindingSeverity,
  type PipelineReport,
  type ProcessResult,
  type ToolResult,
} from "../types.js";

/** Structured payload type surfaced by MCP tool responses. */
type ToolStructuredContent = NonNullable<CallToolResult["structuredContent"]>;

function withRawOutput(result: ToolResult, rawOutput: readonly ProcessResult[] | undefined): ToolResult {
  if (rawOutput && rawOutput.length > 0) {
    result.raw_output = [...rawOutput];
  }
  return result;
}

export function successResult(summary: string, details: Finding[] = [], rawOutput?: readonly ProcessResult[]): ToolResult {
  return withRawOutput({ status: "success", summary, details }, rawOutput);
}

export function failureResult(summary: string, details: Finding[], rawOutput?: readonly ProcessResult[]): ToolResult {
  return withRawOutput({ status: "failure", summary, details }, rawOutput);
}

export function errorResult(
  code: ErrorCode,
  summary: string,
  details: Finding[] = [],
  rawOutput?: readonly ProcessResult[],
): ToolResult {
  return withRawOutput({ status: "error", summary, details, error_code: code }, rawOutput);
}

/** Renders `2 errors, 1 warning` style counters for summaries. */
export function countFindings(findings: readonly Finding[]): string {
  const counts: Record<FindingSeverity, number> = { error: 0, warning: 0, info: 0 };
  for (const finding of findings) {
    counts[finding.severity] += 1;
  }
  const parts: string[] = [];
  for (const severity of ["error", "warning", "info"] as const) {
    const count = counts[severity];
    if (count > 0) {
      parts.push(`${count} ${severity}${count === 1 || severity === "info" ? "" : "s"}`);
    }
  }
  return parts.length > 0 ? parts.join(", ") : "no findings";
}

/**
 * `failure` when any finding is an error or a warning, `success` otherwise.
 * Info findings alone never fail an operation.
 */
export function resultFromFindings(
  summary: string,
  findings: Finding[],
  rawOutput?: readonly ProcessResult[],
): ToolResult {
  const failing = findings.some((finding) => finding.severity !== "info");
  return failing ? failureResult(summary, findings, rawOutput) : successResult(summary, findings, rawOutput);
}

/** Outcome of routing one request through the registry. */
export type DispatchOutcome =
  | { readonly kind: "result"; readonly tool: string; readonly result: ToolResult }
  | { readonly kind: "report"; readonly tool: string; readonly report: PipelineReport }
  | { readonly kind: "schema_error"; readonly tool: string; readonly error: SchemaError };

/**
 * Parameters accepted by {@link buildToolResponse}. Callers pre-render the
 * textual payload; the structured payload travels under `structuredContent`.
 */
interface BuildToolResponseParams<TStructured extends ToolStructuredContent> {
  readonly text: string;
  readonly structured: TStructured;
  readonly isError: boolean;
}

export function buildToolResponse<TStructured extends ToolStructuredContent>({
  text,
  structured,
  isError,
}: BuildToolResponseParams<TStructured>): CallToolResult & { structuredContent: TStructured } {
  return {
    isError,
    content: [{ type: "text", text }],
    structuredContent: structured,
  };
}

/**
 * Serialises an outcome for the protocol layer. `isError` is set for `error`
 * results and schema errors; `failure` is a normal answer.
 */
export function toCallToolResult(outcome: DispatchOutcome): CallToolResult {
  switch (outcome.kind) {
    case "result": {
      const structured: ToolStructuredContent = { ...outcome.result };
      return buildToolResponse({
        text: JSON.stringify(structured, null, 2),
        structured,
        isError: outcome.result.status === "error",
      });
    }
    case "report": {
      const structured: ToolStructuredContent = { ...outcome.report };
      return buildToolResponse({
        text: JSON.stringify(structured, null, 2),
        structured,
        isError: outcome.report.status === "error",
      });
    }
    case "schema_error": {
      const structured: ToolStructuredContent = outcome.error.toJSON();
      return buildToolResponse({ text: JSON.stringify(structured, null, 2), structured, isError: true });
    }
  }
}
