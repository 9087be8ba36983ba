import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { symlink } from "node:fs/promises";
import path from "node:path";

import { createToolRegistry } from "../src/orchestrator/runtime.js";
import { ToolArguments } from "../src/mcp/registry.js";
import { PathResolutionError } from "../src/paths.js";
import { ToolError } from "../src/server/toolErrors.js";
import { checkWorkflowRuns, validateWorkflowYaml } from "../src/tools/workflowTools.js";
import { ERROR_CODES } from "../src/types.js";
import { ScriptedRunner } from "./helpers/fakeRunner.js";
import { createTempWorkspace, createTestContext, type TempWorkspace } from "./helpers/workspace.js";

const invocation = { signal: new AbortController().signal, requestId: "workflow-test" };
const RUN_FIELDS = "databaseId,status,conclusion,name,workflowName,headBranch,createdAt,url";

const VALID_WORKFLOW = [
  "on: push",
  "jobs:",
  "  build:",
  "    runs-on: ubuntu-latest",
  "    steps:",
  "      - run: make",
  "",
].join("\n");

async function expectRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  expect.fail("expected the promise to reject");
}

describe("workflow tools", () => {
  let workspace: TempWorkspace;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
  });

  afterEach(async () => {
    await workspace.dispose();
  });

  describe("check_workflow_runs", () => {
    it("lists runs and fails when one of them failed", async () => {
      const runner = new ScriptedRunner(() => ({
        stdout: JSON.stringify([
          {
            databaseId: 101,
            status: "completed",
            conclusion: "failure",
            name: "Build",
            workflowName: "CI",
            headBranch: "main",
            createdAt: "2026-01-02T03:04:05Z",
            url: "https://example.invalid/runs/101",
          },
          {
            databaseId: 100,
            status: "completed",
            conclusion: "success",
            name: "Build",
            workflowName: "CI",
            headBranch: "main",
            createdAt: "2026-01-01T03:04:05Z",
            url: "https://example.invalid/runs/100",
          },
        ]),
      }));
      const context = createTestContext({ root: workspace.root, runner, vcsToken: "test-secret" });

      const result = await checkWorkflowRuns(
        context,
        new ToolArguments({ limit: 5, workflow: "ci.yml", branch: "main" }),
        invocation,
      );

      expect(runner.commandLines()).to.deep.equal([
        `gh run list --limit 5 --json ${RUN_FIELDS} --workflow=ci.yml --branch=main`,
      ]);
      expect(runner.calls[0]?.env).to.deep.equal({ GH_PROMPT_DISABLED: "1", NO_COLOR: "1", GH_TOKEN: "test-secret" });
      expect(result.status).to.equal("failure");
      expect(result.summary).to.equal("check_workflow_runs: 2 runs, 1 failed");
      expect(result.details.map((finding) => [finding.severity, finding.message])).to.deep.equal([
        ["error", "run 101 (CI on main): completed/failure"],
        ["info", "run 100 (CI on main): completed/success"],
      ]);
      expect(result.details[0]?.data).to.deep.equal({
        id: 101,
        status: "completed",
        conclusion: "failure",
        workflow: "CI",
        branch: "main",
        url: "https://example.invalid/runs/101",
        created_at: "2026-01-02T03:04:05Z",
      });
    });

    it("describes a single run", async () => {
      const runner = new ScriptedRunner(() => ({
        stdout: JSON.stringify({ databaseId: 42, status: "in_progress", conclusion: null, name: "Nightly" }),
      }));
      const context = createTestContext({ root: workspace.root, runner });

      const result = await checkWorkflowRuns(
        context,
        new ToolArguments({ run_id: "42", repo: "acme/widgets", limit: 10 }),
        invocation,
      );

      expect(runner.commandLines()).to.deep.equal([`gh run view 42 --json ${RUN_FIELDS} --repo=acme/widgets`]);
      expect(runner.calls[0]?.env).to.deep.equal({ GH_PROMPT_DISABLED: "1", NO_COLOR: "1" });
      expect(result.status).to.equal("success");
      expect(result.summary).to.equal("check_workflow_runs: 1 run, 0 failed");
      expect(result.details[0]?.message).to.equal("run 42 (Nightly): in_progress");
      expect(result.details[0]?.rule).to.equal("in_progress");
    });

    it("reports missing credentials as an authentication error", async () => {
      const runner = new ScriptedRunner(() => ({
        exitCode: 4,
        stderr: "To get started with GitHub CLI, please run:  gh auth login\n",
      }));
      const context = createTestContext({ root: workspace.root, runner });

      const result = await checkWorkflowRuns(context, new ToolArguments({}), invocation);

      expect(result.status).to.equal("error");
      expect(result.error_code).to.equal(ERROR_CODES.VCS_AUTH);
      expect(result.summary).to.equal('gh is not authenticated (set GH_TOKEN or GITHUB_TOKEN, or run "gh auth login")');
      expect(result.raw_output).to.have.length(1);
    });

    it("treats an empty history as success", async () => {
      const empty = createTestContext({ root: workspace.root, runner: new ScriptedRunner(() => ({ stdout: "[]" })) });
      const none = createTestContext({
        root: workspace.root,
        runner: new ScriptedRunner(() => ({ exitCode: 1, stderr: "no runs found\n" })),
      });

      for (const context of [empty, none]) {
        const result = await checkWorkflowRuns(context, new ToolArguments({}), invocation);
        expect(result).to.deep.equal({
          status: "success",
          summary: "check_workflow_runs: no workflow runs found",
          details: [],
        });
      }
    });

    it("reports unexpected output and other CLI failures", async () => {
      const garbled = createTestContext({
        root: workspace.root,
        runner: new ScriptedRunner(() => ({ stdout: "<html>" })),
      });
      const failing = createTestContext({
        root: workspace.root,
        runner: new ScriptedRunner(() => ({ exitCode: 1, stderr: "\nHTTP 404: Not Found\n" })),
      });

      const output = await checkWorkflowRuns(garbled, new ToolArguments({}), invocation);
      const cli = await checkWorkflowRuns(failing, new ToolArguments({}), invocation);

      expect([output.error_code, output.summary]).to.deep.equal([
        ERROR_CODES.VCS_OUTPUT,
        "gh returned output that is not the expected run JSON",
      ]);
      expect([cli.error_code, cli.summary]).to.deep.equal([ERROR_CODES.VCS_CLI, "gh exited with code 1: HTTP 404: Not Found"]);
    });

    it("reports a missing gh binary", async () => {
      const runner = new ScriptedRunner(() => ({
        exitCode: null,
        spawnError: { code: "ENOENT", message: "spawn gh ENOENT" },
      }));
      const context = createTestContext({ root: workspace.root, runner });

      const result = await checkWorkflowRuns(context, new ToolArguments({}), invocation);

      expect(result.error_code).to.equal(ERROR_CODES.PROCESS_NOT_FOUND);
      expect(result.summary).to.equal("gh not found (install gh or point the toolchain configuration at it)");
    });

    it("validates run identifiers and repositories before calling gh", async () => {
      const runner = new ScriptedRunner();
      const registry = createToolRegistry(createTestContext({ root: workspace.root, runner }));

      const outcome = await registry.dispatch(
        { name: "check_workflow_runs", arguments: { run_id: "latest", repo: "widgets" } },
        invocation,
      );

      expect(outcome.kind).to.equal("schema_error");
      if (outcome.kind === "schema_error") {
        expect(outcome.error.issues).to.deep.equal([
          { parameter: "run_id", message: "must be a numeric run identifier" },
          { parameter: "repo", message: "must look like owner/name" },
        ]);
      }
      expect(runner.calls).to.have.length(0);
    });

    it("accepts workflow_name in place of workflow", async () => {
      const runner = new ScriptedRunner(() => ({ stdout: "[]" }));
      const context = createTestContext({ root: workspace.root, runner });

      await checkWorkflowRuns(context, new ToolArguments({ limit: 3, workflow_name: "ci.yml" }), invocation);

      expect(runner.commandLines()).to.deep.equal([`gh run list --limit 3 --json ${RUN_FIELDS} --workflow=ci.yml`]);
    });

    it("refuses workflow and workflow_name together", async () => {
      const runner = new ScriptedRunner();
      const registry = createToolRegistry(createTestContext({ root: workspace.root, runner }));

      const outcome = await registry.dispatch(
        { name: "check_workflow_runs", arguments: { workflow: "ci.yml", workflow_name: "release.yml" } },
        invocation,
      );

      expect(outcome.kind).to.equal("schema_error");
      if (outcome.kind === "schema_error") {
        expect(outcome.error.issues).to.deep.equal([
          { parameter: "workflow_name", message: "cannot be combined with workflow" },
        ]);
      }
      expect(runner.calls).to.have.length(0);
    });
  });

  describe("validate_workflow_yaml", () => {
    it("validates inline content", async () => {
      const context = createTestContext({ root: workspace.root });

      const result = await validateWorkflowYaml(context, new ToolArguments({ content: VALID_WORKFLOW }));

      expect(result).to.deep.equal({
        status: "success",
        summary: "validate_workflow_yaml: no findings in inline workflow",
        details: [],
      });
    });

    it("reports inline content that is not YAML as an error", async () => {
      const context = createTestContext({ root: workspace.root });

      const result = await validateWorkflowYaml(context, new ToolArguments({ content: "jobs: [build\n" }));

      expect(result.status).to.equal("error");
      expect(result.error_code).to.equal(ERROR_CODES.WORKFLOW_YAML_SYNTAX);
      expect(result.summary).to.match(/^validate_workflow_yaml: inline workflow is not valid YAML/);
      expect(result.details).to.have.length(1);
    });

    it("fails a workflow whose jobs mapping is empty", async () => {
      const context = createTestContext({ root: workspace.root });

      const result = await validateWorkflowYaml(context, new ToolArguments({ content: "name: build\non: push\njobs: {}" }));

      expect(result.status).to.equal("failure");
      expect(result.summary).to.equal("validate_workflow_yaml: 1 error in inline workflow");
      expect(result.details.map((finding) => finding.rule)).to.deep.equal(["missing-steps"]);
    });

    it("reports an unterminated flow mapping as a syntax error", async () => {
      const context = createTestContext({ root: workspace.root });

      const result = await validateWorkflowYaml(context, new ToolArguments({ content: "{{{" }));

      expect(result.status).to.equal("error");
      expect(result.error_code).to.equal(ERROR_CODES.WORKFLOW_YAML_SYNTAX);
    });

    it("looks bare file names up under the workflows directory", async () => {
      await workspace.write(".github/workflows/ci.yml", VALID_WORKFLOW);
      const context = createTestContext({ root: workspace.root });

      const result = await validateWorkflowYaml(context, new ToolArguments({ workflow_file: "ci.yml" }));

      expect(result.summary).to.equal("validate_workflow_yaml: no findings in .github/workflows/ci.yml");
    });

    it("rejects unknown files and paths outside the workspace", async () => {
      const context = createTestContext({ root: workspace.root });

      const missing = await expectRejection(validateWorkflowYaml(context, new ToolArguments({ workflow_file: "nope.yml" })));
      const escaping = await expectRejection(
        validateWorkflowYaml(context, new ToolArguments({ workflow_file: "../outside.yml" })),
      );

      expect(missing).to.be.instanceOf(ToolError);
      if (missing instanceof ToolError) {
        expect(missing.code).to.equal(ERROR_CODES.WORKFLOW_NOT_FOUND);
        expect(missing.message).to.equal("workflow file not found: nope.yml");
      }
      expect(escaping).to.be.instanceOf(PathResolutionError);
    });

    it("refuses workflow files reached through a symlinked directory", async function () {
      if (process.platform === "win32") {
        this.skip();
      }
      const outside = await createTempWorkspace({ "wf.yml": VALID_WORKFLOW, "workflows/ci.yml": VALID_WORKFLOW });
      try {
        await symlink(outside.root, path.join(workspace.root, "link"));
        await symlink(outside.root, path.join(workspace.root, ".github"));
        const context = createTestContext({ root: workspace.root });

        const direct = await expectRejection(
          validateWorkflowYaml(context, new ToolArguments({ workflow_file: "link/wf.yml" })),
        );
        const listed = await expectRejection(validateWorkflowYaml(context, new ToolArguments({})));

        expect(direct).to.be.instanceOf(PathResolutionError);
        if (direct instanceof PathResolutionError) {
          expect(direct.message).to.equal('path "link/wf.yml" resolves outside the workspace root');
        }
        expect(listed).to.be.instanceOf(PathResolutionError);
      } finally {
        await outside.dispose();
      }
    });

    it("validates every workflow file and keeps the findings of the readable ones", async () => {
      await workspace.write(".github/workflows/ci.yml", VALID_WORKFLOW);
      await workspace.write(".github/workflows/broken.yml", "jobs: [build\n");
      await workspace.write(".github/workflows/release.yaml", "on: push\njobs:\n  publish:\n    runs-on: ubuntu-latest\n");
      await workspace.write(".github/workflows/notes.txt", "not a workflow\n");
      const context = createTestContext({ root: workspace.root });

      const result = await validateWorkflowYaml(context, new ToolArguments({}));

      expect(result.status).to.equal("error");
      expect(result.error_code).to.equal(ERROR_CODES.WORKFLOW_YAML_SYNTAX);
      expect(result.summary).to.equal(
        "validate_workflow_yaml: 1 of 3 workflow files could not be parsed (.github/workflows/broken.yml); 2 errors",
      );
      expect(result.details.map((finding) => [finding.file, finding.rule])).to.deep.equal([
        [".github/workflows/broken.yml", "yaml-syntax"],
        [".github/workflows/release.yaml", "missing-steps"],
      ]);
    });

    it("handles a workspace without workflows", async () => {
      const context = createTestContext({ root: workspace.root });

      const error = await expectRejection(validateWorkflowYaml(context, new ToolArguments({})));
      expect(error).to.be.instanceOf(ToolError);
      if (error instanceof ToolError) {
        expect(error.message).to.equal("no .github/workflows directory in the workspace");
      }

      await workspace.write(".github/workflows/README.md", "docs\n");
      const result = await validateWorkflowYaml(context, new ToolArguments({}));
      expect(result).to.deep.equal({
        status: "success",
        summary: "validate_workflow_yaml: no workflow files found",
        details: [],
      });
    });

    it("refuses content combined with a workflow file", async () => {
      const registry = createToolRegistry(createTestContext({ root: workspace.root }));

      const outcome = await registry.dispatch(
        { name: "validate_workflow_yaml", arguments: { content: VALID_WORKFLOW, workflow_file: "ci.yml" } },
        invocation,
      );

      expect(outcome.kind).to.equal("schema_error");
      if (outcome.kind === "schema_error") {
        expect(outcome.error.message).to.equal(
          'invalid arguments for validate_workflow_yaml: content: cannot be combined with "workflow_file"',
        );
      }
    });
  });
});
