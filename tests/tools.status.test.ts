import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import { projectStatus } from "../src/tools/statusTools.js";
import { ScriptedRunner } from "./helpers/fakeRunner.js";
import { createTempWorkspace, createTestContext, type TempWorkspace } from "./helpers/workspace.js";

const invocation = { signal: new AbortController().signal, requestId: "status-test" };

describe("project_status", () => {
  let workspace: TempWorkspace;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
  });

  afterEach(async () => {
    await workspace.dispose();
  });

  it("checks the version of every configured tool and describes the workspace", async () => {
    await workspace.write(".github/workflows/ci.yml", "on: push\n");
    const runner = new ScriptedRunner((request) => ({ stdout: `\n${request.command} version 1.2.3\n` }));
    const context = createTestContext({ root: workspace.root, runner, vcsToken: "test-secret" });

    const result = await projectStatus(context, invocation);

    expect(runner.commandLines()).to.deep.equal([
      "clang-format --version",
      "clang-tidy --version",
      "cppcheck --version",
      "gh --version",
    ]);
    expect(runner.calls.map((call) => call.timeoutMs)).to.deep.equal([2_000, 2_000, 2_000, 2_000]);
    expect(result.status).to.equal("success");
    expect(result.summary).to.equal("project_status: all 4 tools available");
    expect(result.details[0]).to.deep.equal({
      severity: "info",
      message: `workspace: ${workspace.root}`,
      rule: "workspace",
      data: { root: workspace.root, workflows: true, toolchain_config: null, vcs_credential: true },
    });
    expect(result.details[1]).to.deep.equal({
      severity: "info",
      message: "formatter: clang-format version 1.2.3",
      rule: "toolchain",
      data: { tool: "formatter", command: "clang-format", available: true, version: "clang-format version 1.2.3" },
    });
  });

  it("flags tools that are missing or broken", async () => {
    const runner = new ScriptedRunner((request) => {
      if (request.command === "cppcheck") {
        return { exitCode: null, spawnError: { code: "ENOENT", message: "spawn cppcheck ENOENT" } };
      }
      if (request.command === "gh") {
        return { exitCode: 1 };
      }
      return { stdout: "ok 1.0\n" };
    });
    const context = createTestContext({ root: workspace.root, runner });

    const result = await projectStatus(context, invocation);

    expect(result.status).to.equal("failure");
    expect(result.summary).to.equal("project_status: 2 of 4 tools unavailable");
    expect(result.details.slice(3).map((finding) => [finding.severity, finding.message])).to.deep.equal([
      ["warning", "analyzer: cppcheck not found"],
      ["warning", "vcs: gh --version exited with code 1"],
    ]);
    expect(result.details[3]?.data).to.deep.equal({
      tool: "analyzer",
      command: "cppcheck",
      available: false,
      version: null,
    });
    expect(result.details[0]?.data).to.deep.include({ workflows: false, vcs_credential: false });
  });
});
