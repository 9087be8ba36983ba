import { performance } from "node:perf_hooks";

import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import {
  SchemaError,
  ToolRegistrationError,
  toolErrorResult,
  type SchemaIssue,
} from "../server/toolErrors.js";
import type { DispatchOutcome } from "../tools/shared.js";
import { ERROR_CODES, type PipelineReport, type ToolResult } from "../types.js";

/** Declarative description of one tool parameter. */
export type ParameterSpec =
  | {
      readonly type: "string";
      readonly description: string;
      readonly required?: boolean;
      readonly default?: string;
      readonly enum?: readonly string[];
    }
  | {
      readonly type: "integer";
      readonly description: string;
      readonly required?: boolean;
      readonly default?: number;
      readonly minimum?: number;
      readonly maximum?: number;
    }
  | {
      readonly type: "string_array";
      readonly description: string;
      readonly required?: boolean;
      readonly default?: readonly string[];
    };

/** Immutable description of a registered tool. */
export interface ToolSpec {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
  /** Marks the tools composed by the CI pipeline. */
  readonly stage?: boolean;
  /**
   * Cross-parameter rules evaluated after the per-parameter checks succeeded
   * (e.g. mutually exclusive inputs).
   */
  readonly crossValidate?: (args: ToolArguments) => SchemaIssue[];
}

/** Per-call data handed to handlers next to the validated arguments. */
export interface ToolInvocation {
  /** Aborted when the caller cancels or disconnects. */
  readonly signal: AbortSignal;
  readonly requestId: string | number | null;
}

/** A handler either answers with a single result or a pipeline report. */
export type ToolHandler = (args: ToolArguments, invocation: ToolInvocation) => Promise<ToolResult | PipelineReport>;

export interface ToolRequest {
  readonly name: string;
  readonly arguments?: unknown;
}

/**
 * Read-only view over validated arguments. Accessors narrow values that the
 * schema already checked, so handlers never touch the raw payload.
 */
export class ToolArguments {
  private readonly values: ReadonlyMap<string, unknown>;

  constructor(values: Record<string, unknown>) {
    this.values = new Map(Object.entries(values).filter(([, value]) => value !== undefined));
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  optionalString(name: string): string | undefined {
    const value = this.values.get(name);
    return typeof value === "string" ? value : undefined;
  }

  optionalInteger(name: string): number | undefined {
    const value = this.values.get(name);
    return typeof value === "number" ? value : undefined;
  }

  integer(name: string, fallback: number): number {
    return this.optionalInteger(name) ?? fallback;
  }

  optionalStringArray(name: string): string[] | undefined {
    const value = this.values.get(name);
    if (!Array.isArray(value)) {
      return undefined;
    }
    return value.filter((entry): entry is string => typeof entry === "string");
  }

  /** Plain copy, used when forwarding arguments to other tools. */
  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}

function buildParameterSchema(spec: ParameterSpec): z.ZodTypeAny {
  let schema: z.ZodTypeAny;
  switch (spec.type) {
    case "string": {
      const [first, ...rest] = spec.enum ?? [];
      schema = first !== undefined ? z.enum([first, ...rest]) : z.string();
      break;
    }
    case "integer": {
      let integer = z.number().int();
      if (spec.minimum !== undefined) {
        integer = integer.min(spec.minimum);
      }
      if (spec.maximum !== undefined) {
        integer = integer.max(spec.maximum);
      }
      schema = integer;
      break;
    }
    case "string_array":
      schema = z.array(z.string());
      break;
  }
  if (spec.default !== undefined) {
    return schema.default(spec.default);
  }
  return spec.required ? schema : schema.optional();
}

/** Strict zod object: unknown keys are rejected, not stripped. */
export function buildArgumentsSchema(parameters: Readonly<Record<string, ParameterSpec>>): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(parameters)) {
    shape[name] = buildParameterSchema(spec);
  }
  return z.object(shape).strict();
}

type JsonSchemaProperty = Record<string, unknown>;

function describeParameter(spec: ParameterSpec): JsonSchemaProperty {
  const property: JsonSchemaProperty = { description: spec.description };
  switch (spec.type) {
    case "string":
      property.type = "string";
      if (spec.enum) {
        property.enum = [...spec.enum];
      }
      break;
    case "integer":
      property.type = "integer";
      if (spec.minimum !== undefined) {
        property.minimum = spec.minimum;
      }
      if (spec.maximum !== undefined) {
        property.maximum = spec.maximum;
      }
      break;
    case "string_array":
      property.type = "array";
      property.items = { type: "string" };
      break;
  }
  if (spec.default !== undefined) {
    property.default = Array.isArray(spec.default) ? [...spec.default] : spec.default;
  }
  return property;
}

/** JSON Schema advertised through `tools/list`. */
export function buildInputJsonSchema(parameters: Readonly<Record<string, ParameterSpec>>): Tool["inputSchema"] {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];
  for (const [name, spec] of Object.entries(parameters)) {
    properties[name] = describeParameter(spec);
    if (spec.required && spec.default === undefined) {
      required.push(name);
    }
  }
  return {
    type: "object",
    properties,
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: false,
  };
}

function issuesFromZod(error: z.ZodError): SchemaIssue[] {
  const issues: SchemaIssue[] = [];
  for (const issue of error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const key of issue.keys) {
        issues.push({ parameter: key, message: "unknown parameter" });
      }
      continue;
    }
    const parameter = issue.path.map(String).join(".");
    const message =
      issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined" ? "required parameter is missing" : issue.message;
    issues.push({ parameter, message });
  }
  return issues;
}

interface ToolRegistration {
  readonly spec: ToolSpec;
  readonly schema: z.ZodTypeAny;
  readonly handler: ToolHandler;
}

export type ValidationOutcome =
  | { readonly ok: true; readonly spec: ToolSpec; readonly args: ToolArguments }
  | { readonly ok: false; readonly error: SchemaError };

function isPipelineReport(value: ToolResult | PipelineReport): value is PipelineReport {
  return "stages" in value;
}

function freezeSpec(spec: ToolSpec): ToolSpec {
  const parameters: Record<string, ParameterSpec> = {};
  for (const [name, parameter] of Object.entries(spec.parameters)) {
    parameters[name] = Object.freeze({ ...parameter });
  }
  return Object.freeze({ ...spec, parameters: Object.freeze(parameters) });
}

/**
 * Closed table of tools. Registration happens at startup only: once
 * {@link seal} ran, the table is read-only and safe to share between
 * concurrent requests. Untrusted names only ever reach `Map#get`.
 */
export class ToolRegistry {
  private readonly entries = new Map<string, ToolRegistration>();
  private sealed = false;

  constructor(private readonly logger: StructuredLogger) {}

  register(spec: ToolSpec, handler: ToolHandler): void {
    if (this.sealed) {
      throw new ToolRegistrationError(`cannot register "${spec.name}": the registry is sealed`);
    }
    const name = spec.name.trim();
    if (!name || name !== spec.name) {
      throw new ToolRegistrationError("tool name must be a non-empty string without surrounding whitespace");
    }
    if (this.entries.has(name)) {
      throw new ToolRegistrationError(`tool "${name}" is already registered`);
    }
    const frozen = freezeSpec(spec);
    this.entries.set(name, { spec: frozen, schema: buildArgumentsSchema(frozen.parameters), handler });
  }

  /** Forbids further registrations. Called before transports connect. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /** Names of the CI stage tools, in registration order. */
  stageNames(): string[] {
    return [...this.entries.values()].filter(({ spec }) => spec.stage === true).map(({ spec }) => spec.name);
  }

  /** Tool descriptors for `tools/list`, in registration order. */
  list(): Tool[] {
    return [...this.entries.values()].map(({ spec }) => ({
      name: spec.name,
      title: spec.title,
      description: spec.description,
      inputSchema: buildInputJsonSchema(spec.parameters),
    }));
  }

  /** Checks a request without running anything; every issue is reported. */
  validate(request: ToolRequest): ValidationOutcome {
    const checked = this.check(request);
    return checked.ok ? { ok: true, spec: checked.entry.spec, args: checked.args } : checked;
  }

  private check(
    request: ToolRequest,
  ): { ok: true; entry: ToolRegistration; args: ToolArguments } | { ok: false; error: SchemaError } {
    const entry = this.entries.get(request.name);
    if (!entry) {
      return {
        ok: false,
        error: new SchemaError(ERROR_CODES.SCHEMA_UNKNOWN_TOOL, request.name, [
          { parameter: "", message: `known tools: ${this.names().join(", ")}` },
        ]),
      };
    }

    const raw = request.arguments ?? {};
    const parsed = entry.schema.safeParse(raw);
    if (!parsed.success) {
      const issues =
        typeof raw !== "object" || raw === null || Array.isArray(raw)
          ? [{ parameter: "", message: "arguments must be an object" }]
          : issuesFromZod(parsed.error);
      return { ok: false, error: new SchemaError(ERROR_CODES.SCHEMA_INVALID_ARGS, request.name, issues) };
    }

    const values: Record<string, unknown> = { ...parsed.data };
    const args = new ToolArguments(values);
    const crossIssues = entry.spec.crossValidate?.(args) ?? [];
    if (crossIssues.length > 0) {
      return { ok: false, error: new SchemaError(ERROR_CODES.SCHEMA_INVALID_ARGS, request.name, crossIssues) };
    }
    return { ok: true, entry, args };
  }

  /**
   * Validates then runs the handler. Never rejects: schema problems come back
   * as `schema_error` and handler faults as `status=error` results.
   */
  async dispatch(request: ToolRequest, invocation: ToolInvocation): Promise<DispatchOutcome> {
    const validation = this.check(request);
    if (!validation.ok) {
      this.logger.warn("tool_call_rejected", {
        tool: request.name,
        code: validation.error.code,
        issues: validation.error.issues,
      });
      return { kind: "schema_error", tool: request.name, error: validation.error };
    }

    const { entry, args } = validation;
    const startedAt = performance.now();
    this.logger.info("tool_call_started", { tool: request.name });
    try {
      const output = await entry.handler(args, invocation);
      const durationMs = Math.round(performance.now() - startedAt);
      if (isPipelineReport(output)) {
        this.logger.info("tool_call_finished", { tool: request.name, status: output.status, duration_ms: durationMs });
        return { kind: "report", tool: request.name, report: output };
      }
      this.logger.info("tool_call_finished", {
        tool: request.name,
        status: output.status,
        findings: output.details.length,
        duration_ms: durationMs,
        ...(output.error_code ? { code: output.error_code } : {}),
      });
      return { kind: "result", tool: request.name, result: output };
    } catch (error) {
      return {
        kind: "result",
        tool: request.name,
        result: toolErrorResult(this.logger, request.name, error, {
          duration_ms: Math.round(performance.now() - startedAt),
        }),
      };
    }
  }
}
