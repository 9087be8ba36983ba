import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import type { RunProcessOptions } from "../src/gateways/processRunner.js";
import { runPipeline } from "../src/orchestrator/pipeline.js";
import { createToolRegistry } from "../src/orchestrator/runtime.js";
import { ERROR_CODES, type PipelineReport, type ToolResult, type ToolStatus } from "../src/types.js";
import { ScriptedRunner, type ScriptedOutcome } from "./helpers/fakeRunner.js";
import { createTempWorkspace, createTestContext, type TempWorkspace } from "./helpers/workspace.js";

function stageResult(status: ToolStatus): ToolResult {
  return { status, summary: status, details: [] };
}

const invocation = { signal: new AbortController().signal, requestId: "pipeline-test" };

describe("pipeline", () => {
  describe("runPipeline", () => {
    it("keeps running after a stage that found issues", async () => {
      const ran: string[] = [];
      const report = await runPipeline(["a", "b", "c"], async (stage) => {
        ran.push(stage);
        return stageResult(stage === "a" ? "failure" : "success");
      });

      expect(ran).to.deep.equal(["a", "b", "c"]);
      expect(report.status).to.equal("failure");
      expect(report.skipped).to.deep.equal([]);
      expect(report.summary).to.equal("full_ci: failure (a: failure, b: success, c: success)");
    });

    it("skips the remaining stages after an error", async () => {
      const ran: string[] = [];
      const report = await runPipeline(["a", "b", "c"], async (stage) => {
        ran.push(stage);
        return stageResult(stage === "b" ? "error" : "success");
      });

      expect(ran).to.deep.equal(["a", "b"]);
      expect(report.status).to.equal("error");
      expect(report.stages.map((stage) => stage.tool)).to.deep.equal(["a", "b"]);
      expect(report.skipped).to.deep.equal(["c"]);
      expect(report.summary).to.equal("full_ci: error (a: success, b: error); skipped: c");
    });

    it("honours a custom continuation policy", async () => {
      const report = await runPipeline(
        ["a", "b"],
        async () => stageResult("failure"),
        (result) => (result.status === "success" ? "continue" : "abort"),
      );

      expect(report.skipped).to.deep.equal(["b"]);
    });
  });

  describe("full_ci", () => {
    let workspace: TempWorkspace;

    beforeEach(async () => {
      workspace = await createTempWorkspace({ "src/a.cpp": "int a;\n", "src/b.cpp": "int b;\n" });
    });

    afterEach(async () => {
      await workspace.dispose();
    });

    async function runFullCi(
      script: (request: RunProcessOptions) => ScriptedOutcome | Promise<ScriptedOutcome>,
      options: { args?: Record<string, unknown>; pipelineMs?: number } = {},
    ): Promise<{ report: PipelineReport; runner: ScriptedRunner }> {
      const runner = new ScriptedRunner(script);
      const context = createTestContext({
        root: workspace.root,
        runner,
        ...(options.pipelineMs !== undefined ? { timeouts: { pipelineMs: options.pipelineMs } } : {}),
      });
      const registry = createToolRegistry(context);
      const outcome = await registry.dispatch({ name: "full_ci", arguments: options.args ?? {} }, invocation);
      if (outcome.kind !== "report") {
        expect.fail(`expected a pipeline report, got ${outcome.kind}`);
      }
      return { report: outcome.report, runner };
    }

    it("runs format_check, lint and analyze in that order", async () => {
      const { report, runner } = await runFullCi((request) =>
        request.command === "clang-tidy"
          ? { exitCode: 1, stdout: "src/a.cpp:1:5: warning: narrowing [bugprone-narrowing-conversions]\n" }
          : {},
      );

      expect(report.stages.map((stage) => [stage.tool, stage.result.status])).to.deep.equal([
        ["format_check", "success"],
        ["lint", "failure"],
        ["analyze", "success"],
      ]);
      expect(report.status).to.equal("failure");
      expect(report.skipped).to.deep.equal([]);
      expect(runner.calls.map((call) => call.command)).to.deep.equal([
        "clang-format",
        "clang-format",
        "clang-tidy",
        "cppcheck",
      ]);
    });

    it("skips the analyzer when the linter cannot run", async () => {
      const { report, runner } = await runFullCi((request) =>
        request.command === "clang-tidy"
          ? { exitCode: null, spawnError: { code: "ENOENT", message: "spawn clang-tidy ENOENT" } }
          : {},
      );

      expect(report.status).to.equal("error");
      expect(report.stages.map((stage) => stage.tool)).to.deep.equal(["format_check", "lint"]);
      expect(report.stages[1]?.result.error_code).to.equal(ERROR_CODES.PROCESS_NOT_FOUND);
      expect(report.skipped).to.deep.equal(["analyze"]);
      expect(runner.calls.some((call) => call.command === "cppcheck")).to.equal(false);
    });

    it("forwards the file-set arguments to every stage", async () => {
      const { runner } = await runFullCi(() => ({}), { args: { files: ["src/b.cpp"] } });

      expect(runner.commandLines()).to.deep.equal([
        "clang-format --dry-run --Werror src/b.cpp",
        "clang-tidy --quiet src/b.cpp",
        `cppcheck --enable=warning,style,performance,portability --quiet --template={file}:{line}:{column}: {severity}: {message} [{id}] src/b.cpp`,
      ]);
    });

    it("rejects invalid arguments before any stage runs", async () => {
      const runner = new ScriptedRunner();
      const registry = createToolRegistry(createTestContext({ root: workspace.root, runner }));

      const outcome = await registry.dispatch({ name: "full_ci", arguments: { files: "src/a.cpp" } }, invocation);

      expect(outcome.kind).to.equal("schema_error");
      expect(runner.calls).to.have.length(0);
    });

    it("stops the stage in flight when the pipeline times out", async function () {
      this.timeout(5_000);
      const { report } = await runFullCi(
        (request) =>
          new Promise<ScriptedOutcome>((resolve) => {
            request.signal?.addEventListener("abort", () => resolve({ exitCode: null, cancelled: true }), { once: true });
          }),
        { pipelineMs: 50 },
      );

      expect(report.status).to.equal("error");
      expect(report.stages).to.have.length(1);
      expect(report.stages[0]?.result.error_code).to.equal(ERROR_CODES.PIPELINE_TIMEOUT);
      expect(report.stages[0]?.result.summary).to.equal("format_check: pipeline timed out after 50ms");
      expect(report.skipped).to.deep.equal(["lint", "analyze"]);
    });
  });
});
