import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { ServerContext } from "../context.js";
import { classifyProcessFailure } from "../gateways/processRunner.js";
import type { ToolArguments, ToolHandler, ToolInvocation, ToolSpec } from "../mcp/registry.js";
import { errnoCode } from "../nodePrimitives.js";
import { assertRealPathWithin, resolveWorkspacePath, toWorkspaceRelative } from "../paths.js";
import { ToolError, type SchemaIssue } from "../server/toolErrors.js";
import { ERROR_CODES, type Finding, type FindingSeverity, type ToolResult } from "../types.js";
import { validateWorkflowText } from "../workflows/validator.js";
import { countFindings, errorResult, failureResult, resultFromFindings, successResult } from "./shared.js";

/** Directory holding the workflow definitions, relative to the workspace. */
export const WORKFLOWS_DIRECTORY = path.join(".github", "workflows");

const RUN_FIELDS = "databaseId,status,conclusion,name,workflowName,headBranch,createdAt,url";

const FAILED_CONCLUSIONS = new Set(["failure", "timed_out", "startup_failure"]);
const ATTENTION_CONCLUSIONS = new Set(["cancelled", "action_required"]);

const AUTH_FAILURE_PATTERNS: readonly RegExp[] = [
  /gh auth login/i,
  /authentication/i,
  /HTTP 401/i,
  /bad credentials/i,
  /GH_TOKEN/,
];

const NO_RUNS_PATTERNS: readonly RegExp[] = [/no runs found/i, /could not find any workflows/i, /no workflow runs/i];

export const CHECK_WORKFLOW_RUNS_SPEC: ToolSpec = {
  name: "check_workflow_runs",
  title: "Check workflow runs",
  description:
    "Lists recent CI workflow runs (or describes one run) through the gh CLI. Failed runs make the result a failure.",
  parameters: {
    run_id: { type: "string", description: "Numeric identifier of a single run to describe." },
    repo: { type: "string", description: "Repository as owner/name; defaults to the workspace checkout." },
    workflow: { type: "string", description: "Workflow name or file used to filter the listing." },
    workflow_name: { type: "string", description: "Older name of `workflow`; give one or the other." },
    branch: { type: "string", description: "Branch used to filter the listing." },
    limit: {
      type: "integer",
      description: "Maximum number of runs listed.",
      minimum: 1,
      maximum: 100,
      default: 10,
    },
  },
  crossValidate: (args) => {
    const issues: SchemaIssue[] = [];
    const runId = args.optionalString("run_id");
    if (runId !== undefined && !/^\d+$/.test(runId)) {
      issues.push({ parameter: "run_id", message: "must be a numeric run identifier" });
    }
    const repo = args.optionalString("repo");
    if (repo !== undefined && !/^[\w.-]+\/[\w.-]+$/.test(repo)) {
      issues.push({ parameter: "repo", message: "must look like owner/name" });
    }
    if (args.optionalString("workflow") !== undefined && args.optionalString("workflow_name") !== undefined) {
      issues.push({ parameter: "workflow_name", message: "cannot be combined with workflow" });
    }
    for (const name of ["workflow", "workflow_name", "branch"]) {
      if (args.optionalString(name)?.trim() === "") {
        issues.push({ parameter: name, message: "must not be empty" });
      }
    }
    return issues;
  },
};

export const VALIDATE_WORKFLOW_YAML_SPEC: ToolSpec = {
  name: "validate_workflow_yaml",
  title: "Validate workflow YAML",
  description:
    "Checks CI workflow definitions: inline content, one workflow file, or every file under .github/workflows.",
  parameters: {
    content: { type: "string", description: "Inline YAML document to validate." },
    workflow_file: {
      type: "string",
      description: "Workflow file relative to the workspace, or a bare name looked up under .github/workflows.",
    },
  },
  crossValidate: (args) =>
    args.has("content") && args.has("workflow_file")
      ? [{ parameter: "content", message: 'cannot be combined with "workflow_file"' }]
      : [],
};

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const WorkflowRunSchema = z.object({
  databaseId: z.number().int(),
  status: optionalText,
  conclusion: optionalText,
  name: optionalText,
  workflowName: optionalText,
  headBranch: optionalText,
  createdAt: optionalText,
  url: optionalText,
});

type WorkflowRun = z.infer<typeof WorkflowRunSchema>;

function severityForConclusion(conclusion: string): FindingSeverity {
  if (FAILED_CONCLUSIONS.has(conclusion)) {
    return "error";
  }
  if (ATTENTION_CONCLUSIONS.has(conclusion)) {
    return "warning";
  }
  return "info";
}

function runToFinding(run: WorkflowRun): Finding {
  const state = run.conclusion ? `${run.status}/${run.conclusion}` : run.status || "unknown";
  const label = run.workflowName || run.name || "workflow";
  const branch = run.headBranch ? ` on ${run.headBranch}` : "";
  return {
    severity: severityForConclusion(run.conclusion),
    message: `run ${run.databaseId} (${label}${branch}): ${state}`,
    rule: run.conclusion || run.status || "unknown",
    data: {
      id: run.databaseId,
      status: run.status,
      conclusion: run.conclusion || null,
      workflow: label,
      branch: run.headBranch || null,
      url: run.url || null,
      created_at: run.createdAt || null,
    },
  };
}

/** Parses `gh --json` output: one object for `run view`, an array for `run list`. */
function parseRuns(stdout: string, single: boolean): WorkflowRun[] | null {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    return null;
  }
  const parsed = single ? WorkflowRunSchema.safeParse(json) : z.array(WorkflowRunSchema).safeParse(json);
  if (!parsed.success) {
    return null;
  }
  return Array.isArray(parsed.data) ? parsed.data : [parsed.data];
}

export async function checkWorkflowRuns(
  context: ServerContext,
  args: ToolArguments,
  invocation: ToolInvocation,
): Promise<ToolResult> {
  const runId = args.optionalString("run_id");
  const repo = args.optionalString("repo");
  const commandArgs = runId
    ? ["run", "view", runId, "--json", RUN_FIELDS]
    : ["run", "list", "--limit", String(args.integer("limit", 10)), "--json", RUN_FIELDS];
  if (!runId) {
    const workflow = args.optionalString("workflow") ?? args.optionalString("workflow_name");
    const branch = args.optionalString("branch");
    if (workflow) {
      commandArgs.push(`--workflow=${workflow}`);
    }
    if (branch) {
      commandArgs.push(`--branch=${branch}`);
    }
  }
  if (repo) {
    commandArgs.push(`--repo=${repo}`);
  }

  const vcs = context.toolchain.vcs.command;
  const result = await context.runner.run({
    command: vcs,
    args: commandArgs,
    cwd: context.workspaceRoot,
    timeoutMs: context.timeouts.processMs,
    signal: invocation.signal,
    env: {
      GH_PROMPT_DISABLED: "1",
      NO_COLOR: "1",
      ...(context.vcsToken ? { GH_TOKEN: context.vcsToken } : {}),
    },
  });

  const failure = classifyProcessFailure(result, context.timeouts.processMs);
  if (failure) {
    return errorResult(failure.code, failure.hint ? `${failure.message} (${failure.hint})` : failure.message, [], [result]);
  }

  if (result.exitCode !== 0) {
    const output = `${result.stderr}\n${result.stdout}`;
    if (AUTH_FAILURE_PATTERNS.some((pattern) => pattern.test(output))) {
      return errorResult(
        ERROR_CODES.VCS_AUTH,
        `${vcs} is not authenticated (set GH_TOKEN or GITHUB_TOKEN, or run "gh auth login")`,
        [],
        [result],
      );
    }
    if (NO_RUNS_PATTERNS.some((pattern) => pattern.test(output))) {
      return successResult("check_workflow_runs: no workflow runs found");
    }
    const firstLine = result.stderr.split("\n").find((line) => line.trim().length > 0) ?? "no error output";
    return errorResult(
      ERROR_CODES.VCS_CLI,
      `${vcs} exited with code ${result.exitCode ?? result.signal ?? "unknown"}: ${firstLine.trim()}`,
      [],
      [result],
    );
  }

  const runs = parseRuns(result.stdout, runId !== undefined);
  if (!runs) {
    return errorResult(ERROR_CODES.VCS_OUTPUT, `${vcs} returned output that is not the expected run JSON`, [], [result]);
  }
  if (runs.length === 0) {
    return successResult("check_workflow_runs: no workflow runs found");
  }

  const details = runs.map(runToFinding);
  const failed = details.filter((finding) => finding.severity === "error").length;
  const summary = `check_workflow_runs: ${runs.length} run${runs.length === 1 ? "" : "s"}, ${failed} failed`;
  return failed > 0 ? failureResult(summary, details) : successResult(summary, details);
}

/**
 * Resolves `workflow_file`: a bare name is looked up under the workflows
 * directory first, anything else is a workspace path.
 */
async function resolveWorkflowFile(root: string, requested: string): Promise<string> {
  const candidates: string[] = [];
  if (!requested.includes("/") && !requested.includes(path.sep)) {
    candidates.push(resolveWorkspacePath(root, path.join(WORKFLOWS_DIRECTORY, requested)));
  }
  candidates.push(resolveWorkspacePath(root, requested));

  for (const candidate of candidates) {
    try {
      if ((await stat(candidate)).isFile()) {
        await assertRealPathWithin(root, candidate, requested);
        return candidate;
      }
    } catch (error) {
      if (errnoCode(error) !== "ENOENT" && errnoCode(error) !== "ENOTDIR") {
        throw error;
      }
    }
  }
  throw new ToolError(ERROR_CODES.WORKFLOW_NOT_FOUND, `workflow file not found: ${requested}`, {
    hint: `bare names are looked up under ${WORKFLOWS_DIRECTORY.split(path.sep).join("/")}`,
  });
}

async function listWorkflowFiles(root: string): Promise<string[]> {
  const directory = path.join(root, WORKFLOWS_DIRECTORY);
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (errnoCode(error) === "ENOENT" || errnoCode(error) === "ENOTDIR") {
      throw new ToolError(ERROR_CODES.WORKFLOW_NOT_FOUND, "no .github/workflows directory in the workspace", {
        hint: "pass content or workflow_file to validate a single document",
      });
    }
    throw error;
  }
  await assertRealPathWithin(root, directory, WORKFLOWS_DIRECTORY.split(path.sep).join("/"));
  return entries
    .filter((entry) => entry.isFile() && /\.ya?ml$/i.test(entry.name))
    .map((entry) => path.join(directory, entry.name))
    .sort();
}

export async function validateWorkflowYaml(context: ServerContext, args: ToolArguments): Promise<ToolResult> {
  const content = args.optionalString("content");
  if (content !== undefined) {
    return summariseSingle(validateWorkflowText(content), "inline workflow");
  }

  const root = context.workspaceRoot;
  const requested = args.optionalString("workflow_file");
  if (requested !== undefined) {
    const file = await resolveWorkflowFile(root, requested);
    const relative = toWorkspaceRelative(root, file);
    return summariseSingle(validateWorkflowText(await readFile(file, "utf8"), relative), relative);
  }

  const files = await listWorkflowFiles(root);
  if (files.length === 0) {
    return successResult("validate_workflow_yaml: no workflow files found");
  }

  const details: Finding[] = [];
  const broken: string[] = [];
  for (const file of files) {
    const relative = toWorkspaceRelative(root, file);
    const validation = validateWorkflowText(await readFile(file, "utf8"), relative);
    if (validation.syntaxError) {
      broken.push(relative);
      details.push(validation.syntaxError);
    } else {
      details.push(...validation.findings);
    }
  }

  const scope = `${files.length} workflow file${files.length === 1 ? "" : "s"}`;
  if (broken.length > 0) {
    return errorResult(
      ERROR_CODES.WORKFLOW_YAML_SYNTAX,
      `validate_workflow_yaml: ${broken.length} of ${scope} could not be parsed (${broken.join(", ")}); ${countFindings(details)}`,
      details,
    );
  }
  return resultFromFindings(`validate_workflow_yaml: ${countFindings(details)} in ${scope}`, details);
}

function summariseSingle(
  validation: ReturnType<typeof validateWorkflowText>,
  label: string,
): ToolResult {
  if (validation.syntaxError) {
    const position =
      validation.syntaxError.line !== undefined
        ? ` at line ${validation.syntaxError.line}, column ${validation.syntaxError.column ?? 1}`
        : "";
    return errorResult(
      ERROR_CODES.WORKFLOW_YAML_SYNTAX,
      `validate_workflow_yaml: ${label} is not valid YAML${position}`,
      [validation.syntaxError],
    );
  }
  return resultFromFindings(`validate_workflow_yaml: ${countFindings(validation.findings)} in ${label}`, validation.findings);
}

export function createWorkflowHandlers(context: ServerContext): { runs: ToolHandler; yaml: ToolHandler } {
  return {
    runs: (args, invocation) => checkWorkflowRuns(context, args, invocation),
    yaml: (args) => validateWorkflowYaml(context, args),
  };
}
