import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { ToolArguments, ToolRegistry, type ToolSpec } from "../src/mcp/registry.js";
import { createToolRegistry } from "../src/orchestrator/runtime.js";
import { ToolError, ToolRegistrationError } from "../src/server/toolErrors.js";
import { ERROR_CODES, type ToolResult } from "../src/types.js";
import { ScriptedRunner } from "./helpers/fakeRunner.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { createTestContext } from "./helpers/workspace.js";

const ECHO_SPEC: ToolSpec = {
  name: "echo",
  title: "Echo",
  description: "Returns its arguments.",
  parameters: {
    text: { type: "string", description: "Text to echo.", required: true },
    mode: { type: "string", description: "Rendering.", enum: ["plain", "upper"] },
    limit: { type: "integer", description: "Cap.", minimum: 1, maximum: 10, default: 5 },
    tags: { type: "string_array", description: "Labels." },
  },
};

const invocation = { signal: new AbortController().signal, requestId: 1 };

function ok(summary: string): ToolResult {
  return { status: "success", summary, details: [] };
}

function createRegistry(handler = sinon.stub().resolves(ok("done"))): { registry: ToolRegistry; logger: RecordingLogger } {
  const logger = new RecordingLogger();
  const registry = new ToolRegistry(logger);
  registry.register(ECHO_SPEC, handler);
  registry.seal();
  return { registry, logger };
}

describe("tool registry", () => {
  describe("validation", () => {
    it("rejects unknown tools without running anything", () => {
      const { registry } = createRegistry();
      const outcome = registry.validate({ name: "nonexistent_tool", arguments: {} });

      expect(outcome.ok).to.equal(false);
      if (outcome.ok) {
        return;
      }
      expect(outcome.error.code).to.equal(ERROR_CODES.SCHEMA_UNKNOWN_TOOL);
      expect(outcome.error.message).to.equal('unknown tool "nonexistent_tool"');
      expect(outcome.error.issues).to.deep.equal([{ parameter: "", message: "known tools: echo" }]);
    });

    it("rejects unknown parameters instead of stripping them", () => {
      const { registry } = createRegistry();
      const outcome = registry.validate({ name: "echo", arguments: { text: "hi", colour: "red" } });

      expect(outcome.ok).to.equal(false);
      if (outcome.ok) {
        return;
      }
      expect(outcome.error.code).to.equal(ERROR_CODES.SCHEMA_INVALID_ARGS);
      expect(outcome.error.issues).to.deep.equal([{ parameter: "colour", message: "unknown parameter" }]);
      expect(outcome.error.message).to.equal("invalid arguments for echo: colour: unknown parameter");
    });

    it("reports every issue at once", () => {
      const { registry } = createRegistry();
      const outcome = registry.validate({ name: "echo", arguments: { mode: "loud", limit: 11 } });

      expect(outcome.ok).to.equal(false);
      if (outcome.ok) {
        return;
      }
      const parameters = outcome.error.issues.map((issue) => issue.parameter);
      expect(parameters).to.have.members(["text", "mode", "limit"]);
      expect(outcome.error.issues.find((issue) => issue.parameter === "text")?.message).to.equal(
        "required parameter is missing",
      );
    });

    it("rejects a wrongly typed value", () => {
      const { registry } = createRegistry();
      const outcome = registry.validate({ name: "echo", arguments: { text: 42 } });

      expect(outcome.ok).to.equal(false);
      if (outcome.ok) {
        return;
      }
      expect(outcome.error.issues).to.deep.equal([{ parameter: "text", message: "Expected string, received number" }]);
    });

    it("rejects arguments that are not an object", () => {
      const { registry } = createRegistry();
      const outcome = registry.validate({ name: "echo", arguments: ["hi"] });

      expect(outcome.ok).to.equal(false);
      if (outcome.ok) {
        return;
      }
      expect(outcome.error.issues).to.deep.equal([{ parameter: "", message: "arguments must be an object" }]);
    });

    it("applies defaults to omitted parameters", () => {
      const { registry } = createRegistry();
      const outcome = registry.validate({ name: "echo", arguments: { text: "hi" } });

      expect(outcome.ok).to.equal(true);
      if (!outcome.ok) {
        return;
      }
      expect(outcome.args.toRecord()).to.deep.equal({ text: "hi", limit: 5 });
      expect(outcome.args.integer("limit", 1)).to.equal(5);
      expect(outcome.args.optionalStringArray("tags")).to.equal(undefined);
    });

    it("runs cross-parameter checks after the per-parameter ones", () => {
      const logger = new RecordingLogger();
      const registry = new ToolRegistry(logger);
      registry.register(
        {
          ...ECHO_SPEC,
          name: "exclusive",
          crossValidate: (args: ToolArguments) =>
            args.has("mode") && args.has("tags") ? [{ parameter: "mode", message: "cannot be combined with tags" }] : [],
        },
        async () => ok("done"),
      );

      const outcome = registry.validate({ name: "exclusive", arguments: { text: "a", mode: "plain", tags: ["x"] } });

      expect(outcome.ok).to.equal(false);
      if (outcome.ok) {
        return;
      }
      expect(outcome.error.message).to.equal("invalid arguments for exclusive: mode: cannot be combined with tags");
    });
  });

  describe("registration", () => {
    it("refuses registrations once sealed", () => {
      const { registry } = createRegistry();
      expect(() => registry.register({ ...ECHO_SPEC, name: "late" }, async () => ok("late"))).to.throw(
        ToolRegistrationError,
        'cannot register "late": the registry is sealed',
      );
    });

    it("refuses duplicate names", () => {
      const registry = new ToolRegistry(new RecordingLogger());
      registry.register(ECHO_SPEC, async () => ok("a"));
      expect(() => registry.register(ECHO_SPEC, async () => ok("b"))).to.throw('tool "echo" is already registered');
    });

    it("advertises a closed JSON schema", () => {
      const { registry } = createRegistry();
      const [tool] = registry.list();

      expect(tool?.name).to.equal("echo");
      expect(tool?.inputSchema).to.deep.equal({
        type: "object",
        properties: {
          text: { type: "string", description: "Text to echo." },
          mode: { type: "string", description: "Rendering.", enum: ["plain", "upper"] },
          limit: { type: "integer", description: "Cap.", minimum: 1, maximum: 10, default: 5 },
          tags: { type: "array", description: "Labels.", items: { type: "string" } },
        },
        required: ["text"],
        additionalProperties: false,
      });
    });

    it("advertises only string, integer and string array parameters for the built-in tools", () => {
      const registry = createToolRegistry(createTestContext({ root: "/repo", runner: new ScriptedRunner() }));
      const types = new Set<unknown>();
      for (const tool of registry.list()) {
        for (const property of Object.values(tool.inputSchema.properties ?? {})) {
          if (typeof property === "object" && property !== null && "type" in property) {
            types.add(property.type);
          }
        }
      }

      expect([...types].sort()).to.deep.equal(["array", "integer", "string"]);
    });

    it("lists stage tools in registration order", () => {
      const registry = new ToolRegistry(new RecordingLogger());
      const handler = async (): Promise<ToolResult> => ok("x");
      registry.register({ ...ECHO_SPEC, name: "b_stage", stage: true }, handler);
      registry.register({ ...ECHO_SPEC, name: "not_a_stage" }, handler);
      registry.register({ ...ECHO_SPEC, name: "a_stage", stage: true }, handler);

      expect(registry.stageNames()).to.deep.equal(["b_stage", "a_stage"]);
    });
  });

  describe("dispatch", () => {
    it("hands validated arguments to the handler", async () => {
      const handler = sinon.stub().resolves(ok("echoed"));
      const { registry, logger } = createRegistry(handler);

      const outcome = await registry.dispatch({ name: "echo", arguments: { text: "hi" } }, invocation);

      expect(outcome).to.deep.equal({ kind: "result", tool: "echo", result: ok("echoed") });
      const [args, passedInvocation] = handler.firstCall.args;
      expect(args).to.be.instanceOf(ToolArguments);
      expect(args.optionalString("text")).to.equal("hi");
      expect(passedInvocation).to.equal(invocation);
      expect(logger.messages()).to.deep.equal(["tool_call_started", "tool_call_finished"]);
    });

    it("never calls the handler for an invalid request", async () => {
      const handler = sinon.stub().resolves(ok("unused"));
      const { registry, logger } = createRegistry(handler);

      const outcome = await registry.dispatch({ name: "echo", arguments: {} }, invocation);

      expect(outcome.kind).to.equal("schema_error");
      expect(handler.called).to.equal(false);
      expect(logger.messages()).to.deep.equal(["tool_call_rejected"]);
    });

    it("turns a tool error into an error result with its code", async () => {
      const { registry } = createRegistry(
        sinon.stub().rejects(new ToolError(ERROR_CODES.VCS_AUTH, "gh is not authenticated", { hint: "run gh auth login" })),
      );

      const outcome = await registry.dispatch({ name: "echo", arguments: { text: "hi" } }, invocation);

      expect(outcome).to.deep.equal({
        kind: "result",
        tool: "echo",
        result: {
          status: "error",
          summary: "gh is not authenticated (run gh auth login)",
          details: [],
          error_code: ERROR_CODES.VCS_AUTH,
        },
      });
    });

    it("contains unexpected handler faults", async () => {
      const { registry, logger } = createRegistry(sinon.stub().rejects(new TypeError("boom")));

      const outcome = await registry.dispatch({ name: "echo", arguments: { text: "hi" } }, invocation);

      expect(outcome.kind).to.equal("result");
      if (outcome.kind !== "result") {
        return;
      }
      expect(outcome.result.status).to.equal("error");
      expect(outcome.result.error_code).to.equal(ERROR_CODES.TOOL_UNEXPECTED);
      expect(outcome.result.summary).to.equal("boom");
      expect(logger.messages()).to.include("echo_failed");
    });
  });
});
