import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { errorMessage } from "../nodePrimitives.js";
import {
  ERROR_CODES,
  normaliseErrorHint,
  normaliseErrorMessage,
  type ErrorCode,
  type Finding,
  type ProcessResult,
  type ToolResult,
} from "../types.js";

/** One problem found while validating a tool request. */
export interface SchemaIssue {
  /** Parameter name, or `""` when the issue concerns the request as a whole. */
  readonly parameter: string;
  readonly message: string;
}

/** Codes a {@link SchemaError} may carry. */
export type SchemaErrorCode = typeof ERROR_CODES.SCHEMA_UNKNOWN_TOOL | typeof ERROR_CODES.SCHEMA_INVALID_ARGS;

/**
 * Malformed or unknown request, rejected before any handler runs. Returned as
 * a value by the registry rather than thrown.
 */
export class SchemaError extends Error {
  public readonly code: SchemaErrorCode;
  public readonly tool: string;
  public readonly issues: readonly SchemaIssue[];

  constructor(code: SchemaErrorCode, tool: string, issues: readonly SchemaIssue[]) {
    super(describeSchemaIssues(code, tool, issues));
    this.name = "SchemaError";
    this.code = code;
    this.tool = tool;
    this.issues = issues;
  }

  /** JSON body sent back to the caller. */
  toJSON(): { error: "SchemaError"; code: SchemaErrorCode; tool: string; message: string; issues: SchemaIssue[] } {
    return {
      error: "SchemaError",
      code: this.code,
      tool: this.tool,
      message: this.message,
      issues: this.issues.map((issue) => ({ ...issue })),
    };
  }
}

function describeSchemaIssues(code: SchemaErrorCode, tool: string, issues: readonly SchemaIssue[]): string {
  if (code === ERROR_CODES.SCHEMA_UNKNOWN_TOOL) {
    return `unknown tool "${tool}"`;
  }
  const parts = issues.map((issue) => (issue.parameter ? `${issue.parameter}: ${issue.message}` : issue.message));
  return `invalid arguments for ${tool}: ${parts.join("; ")}`;
}

/**
 * Failure raised by a handler that cannot run its operation. The dispatch
 * boundary turns it into a `status=error` result carrying {@link code}.
 */
export class ToolError extends Error {
  public readonly code: ErrorCode;
  public readonly hint?: string;
  public readonly details?: Finding[];
  public readonly rawOutput?: ProcessResult[];

  constructor(
    code: ErrorCode,
    message: string,
    options: { hint?: string; details?: Finding[]; rawOutput?: ProcessResult[] } = {},
  ) {
    super(message);
    this.name = "ToolError";
    this.code = code;
    if (options.hint !== undefined) {
      this.hint = options.hint;
    }
    if (options.details !== undefined) {
      this.details = options.details;
    }
    if (options.rawOutput !== undefined) {
      this.rawOutput = options.rawOutput;
    }
  }
}

/** Error thrown when the tool table is misused during startup. */
export class ToolRegistrationError extends Error {
  public readonly code = "E-TOOL-REGISTRATION";

  constructor(message: string) {
    super(message);
    this.name = "ToolRegistrationError";
  }
}

/**
 * Normalised representation of a thrown error used to enrich tool results and
 * log entries with machine readable metadata.
 */
export interface NormalisedToolError {
  code: ErrorCode;
  message: string;
  hint?: string;
}

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ERROR_CODES));

function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && KNOWN_CODES.has(value);
}

/**
 * Errors that already carry a catalogued `code` (ToolError,
 * PathResolutionError) keep it; anything else gets {@link defaultCode}. Zod
 * failures raised inside a handler are tagged with an `invalid_input` hint.
 */
export function normaliseToolError(error: unknown, defaultCode: ErrorCode): NormalisedToolError {
  const message = errorMessage(error);
  let code = defaultCode;
  let hint: string | undefined;

  if (error instanceof z.ZodError) {
    hint = "invalid_input";
  } else if (error instanceof Error && "code" in error && isErrorCode(error.code)) {
    code = error.code;
    if ("hint" in error && typeof error.hint === "string") {
      hint = error.hint;
    }
  }

  const normalisedHint = normaliseErrorHint(hint);
  return {
    code,
    message: normaliseErrorMessage(message),
    ...(normalisedHint !== undefined ? { hint: normalisedHint } : {}),
  };
}

/**
 * Converts a thrown value into a `status=error` result and logs it. Details
 * and raw output attached to a {@link ToolError} survive the conversion.
 */
export function toolErrorResult(
  logger: StructuredLogger,
  toolName: string,
  error: unknown,
  context: Record<string, unknown> = {},
): ToolResult {
  const normalised = normaliseToolError(error, ERROR_CODES.TOOL_UNEXPECTED);
  logger.error(`${toolName}_failed`, {
    ...context,
    code: normalised.code,
    message: normalised.message,
    ...(normalised.hint ? { hint: normalised.hint } : {}),
    ...(error instanceof Error && !(error instanceof ToolError) && error.stack ? { stack: error.stack } : {}),
  });

  const summary = normalised.hint ? `${normalised.message} (${normalised.hint})` : normalised.message;
  const result: ToolResult = {
    status: "error",
    summary,
    details: error instanceof ToolError && error.details ? error.details : [],
    error_code: normalised.code,
  };
  if (error instanceof ToolError && error.rawOutput && error.rawOutput.length > 0) {
    result.raw_output = error.rawOutput;
  }
  return result;
}
