import type { ProcessRunner } from "./gateways/processRunner.js";
import type { WorkspaceGate } from "./infra/workspaceGate.js";
import type { StructuredLogger } from "./logger.js";
import type { ToolchainConfig } from "./toolchain/config.js";

export interface ServerTimeouts {
  /** Per-process limit applied by every handler. */
  readonly processMs: number;
  /** Overall limit for one `full_ci` run. */
  readonly pipelineMs: number;
  /** Limit for `--version` checks. */
  readonly versionCheckMs: number;
}

/**
 * Everything a handler may depend on, assembled once at startup. Handlers
 * receive it explicitly so tests can fabricate one without touching the
 * process environment.
 */
export interface ServerContext {
  /** Absolute root every file argument is resolved against. */
  readonly workspaceRoot: string;
  readonly logger: StructuredLogger;
  readonly runner: ProcessRunner;
  readonly toolchain: ToolchainConfig;
  /** Credential forwarded to the VCS CLI as `GH_TOKEN`. */
  readonly vcsToken: string | null;
  readonly timeouts: ServerTimeouts;
  readonly gate: WorkspaceGate;
  /** Aborted on shutdown; in-flight calls terminate their processes. */
  readonly shutdownSignal?: AbortSignal;
}

export const DEFAULT_PROCESS_TIMEOUT_MS = 300_000;
export const DEFAULT_PIPELINE_TIMEOUT_MS = 600_000;
export const DEFAULT_VERSION_CHECK_TIMEOUT_MS = 10_000;
