import { Buffer } from "node:buffer";
import type { ChildProcessWithoutNullStreams } from "node:child_process";
import { performance } from "node:perf_hooks";

import type { StructuredLogger } from "../logger.js";
import { errnoCode, errorMessage } from "../nodePrimitives.js";
import { ERROR_CODES, type ErrorCode, type ProcessResult } from "../types.js";
import { createChildProcessGateway, DEFAULT_ALLOWED_ENV_KEYS, type ChildProcessGateway } from "./childProcess.js";

/** Default cap applied to each captured stream (1 MiB). */
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

/** Delay between SIGTERM and SIGKILL when a child must be terminated. */
const DEFAULT_KILL_GRACE_MS = 2_000;

/** Request accepted by {@link ProcessRunner.run}. */
export interface RunProcessOptions {
  readonly command: string;
  readonly args?: readonly string[];
  readonly cwd: string;
  readonly timeoutMs: number;
  /** Text written to the child's stdin before it is closed. */
  readonly stdin?: string;
  /** Aborting the signal terminates the child (caller cancellation). */
  readonly signal?: AbortSignal;
  /** Extra environment entries (e.g. a credential for the VCS CLI). */
  readonly env?: Record<string, string>;
}

/**
 * Executes external commands. Implementations never reject because a command
 * failed: spawn failures, timeouts and cancellations are all reported on the
 * returned {@link ProcessResult}.
 */
export interface ProcessRunner {
  run(options: RunProcessOptions): Promise<ProcessResult>;
}

export interface ProcessRunnerOptions {
  readonly logger?: StructuredLogger;
  readonly gateway?: ChildProcessGateway;
  readonly maxOutputBytes?: number;
  readonly killGraceMs?: number;
  readonly allowedEnvKeys?: readonly string[];
  readonly inheritEnv?: Record<string, string | undefined>;
  readonly platform?: NodeJS.Platform;
}

/** Accumulates a stream up to a byte limit and remembers what was dropped. */
class BoundedCapture {
  private readonly chunks: Buffer[] = [];
  private kept = 0;
  private omitted = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.kept;
    if (room <= 0) {
      this.omitted += chunk.length;
      return;
    }
    if (chunk.length <= room) {
      this.chunks.push(chunk);
      this.kept += chunk.length;
      return;
    }
    this.chunks.push(chunk.subarray(0, room));
    this.kept += room;
    this.omitted += chunk.length - room;
  }

  get truncated(): boolean {
    return this.omitted > 0;
  }

  render(): string {
    const text = Buffer.concat(this.chunks).toString("utf8");
    if (this.omitted === 0) {
      return text;
    }
    return `${text}\n[output truncated: ${this.omitted} bytes omitted]`;
  }
}

/**
 * Creates the runner used by every handler. Each call owns its child process:
 * the child is started in its own process group, and every exit path (normal
 * completion, timeout, cancellation) waits for the child to close before the
 * promise resolves.
 */
export function createProcessRunner(options: ProcessRunnerOptions = {}): ProcessRunner {
  const gateway = options.gateway ?? createChildProcessGateway();
  const maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  const allowedEnvKeys = options.allowedEnvKeys ?? DEFAULT_ALLOWED_ENV_KEYS;
  const platform = options.platform ?? process.platform;
  const logger = options.logger;

  return {
    async run(request: RunProcessOptions): Promise<ProcessResult> {
      const args = [...(request.args ?? [])];
      const startedAt = performance.now();
      const base = { command: request.command, args, cwd: request.cwd };

      if (request.signal?.aborted) {
        return emptyResult(base, { cancelled: true });
      }

      let child: ChildProcessWithoutNullStreams;
      try {
        child = gateway.spawn({
          command: request.command,
          args,
          cwd: request.cwd,
          allowedEnvKeys,
          ...(options.inheritEnv ? { inheritEnv: options.inheritEnv } : {}),
          ...(request.env ? { extraEnv: request.env } : {}),
          ownProcessGroup: true,
        });
      } catch (error) {
        return emptyResult(base, {
          spawnError: {
            code: errnoCode(error) ?? "EINVAL",
            message: errorMessage(error),
          },
        });
      }

      logger?.debug("process_started", { command: request.command, args, cwd: request.cwd, pid: child.pid ?? null });

      return await new Promise<ProcessResult>((resolve) => {
        const stdout = new BoundedCapture(maxOutputBytes);
        const stderr = new BoundedCapture(maxOutputBytes);
        let timedOut = false;
        let cancelled = false;
        let settled = false;
        let graceTimer: NodeJS.Timeout | null = null;

        const signalChild = (signal: NodeJS.Signals): void => {
          const pid = child.pid;
          if (pid !== undefined && platform !== "win32") {
            try {
              process.kill(-pid, signal);
              return;
            } catch (error) {
              if (errnoCode(error) === "ESRCH") {
                return;
              }
              logger?.warn("process_group_signal_failed", { pid, signal, message: errorMessage(error) });
            }
          }
          child.kill(signal);
        };

        const terminate = (): void => {
          if (child.exitCode !== null || child.signalCode !== null) {
            return;
          }
          signalChild("SIGTERM");
          if (graceTimer === null) {
            graceTimer = setTimeout(() => signalChild("SIGKILL"), killGraceMs);
            graceTimer.unref();
          }
        };

        const timeoutTimer = setTimeout(() => {
          timedOut = true;
          logger?.warn("process_timeout", { command: request.command, timeout_ms: request.timeoutMs, pid: child.pid ?? null });
          terminate();
        }, request.timeoutMs);
        timeoutTimer.unref();

        const onAbort = (): void => {
          cancelled = true;
          logger?.info("process_cancelled", { command: request.command, pid: child.pid ?? null });
          terminate();
        };
        request.signal?.addEventListener("abort", onAbort, { once: true });

        const finish = (result: ProcessResult): void => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(timeoutTimer);
          if (graceTimer !== null) {
            clearTimeout(graceTimer);
          }
          request.signal?.removeEventListener("abort", onAbort);
          if ((timedOut || cancelled) && child.pid !== undefined) {
            // The group leader is gone; reap anything it left behind.
            signalChild("SIGKILL");
          }
          resolve(result);
        };

        child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

        child.once("error", (error) => {
          // A child without a pid never started; `close` may not follow.
          if (child.pid !== undefined) {
            logger?.warn("process_error", { command: request.command, message: error.message });
            return;
          }
          finish({
            ...base,
            exitCode: null,
            signal: null,
            stdout: "",
            stderr: "",
            stdoutTruncated: false,
            stderrTruncated: false,
            durationMs: Math.round(performance.now() - startedAt),
            timedOut: false,
            cancelled: false,
            spawnError: { code: errnoCode(error) ?? "ESPAWN", message: error.message },
          });
        });

        child.once("close", (code, signal) => {
          const durationMs = Math.round(performance.now() - startedAt);
          logger?.debug("process_exited", { command: request.command, exit_code: code, signal, duration_ms: durationMs, timed_out: timedOut });
          finish({
            ...base,
            exitCode: timedOut || cancelled ? null : code,
            signal: signal ?? null,
            stdout: stdout.render(),
            stderr: stderr.render(),
            stdoutTruncated: stdout.truncated,
            stderrTruncated: stderr.truncated,
            durationMs,
            timedOut,
            cancelled,
          });
        });

        child.stdin.on("error", (error) => {
          // EPIPE when the child exits before consuming its input.
          logger?.debug("process_stdin_error", { command: request.command, message: error.message });
        });
        if (request.stdin !== undefined) {
          child.stdin.end(request.stdin, "utf8");
        } else {
          child.stdin.end();
        }
      });
    },
  };
}

function emptyResult(
  base: { command: string; args: string[]; cwd: string },
  overrides: Partial<ProcessResult>,
): ProcessResult {
  return {
    ...base,
    exitCode: null,
    signal: null,
    stdout: "",
    stderr: "",
    stdoutTruncated: false,
    stderrTruncated: false,
    durationMs: 0,
    timedOut: false,
    cancelled: false,
    ...overrides,
  };
}

/** Structured reason why a process could not produce a usable outcome. */
export interface ProcessFailure {
  readonly code: ErrorCode;
  readonly message: string;
  readonly hint?: string;
}

/**
 * Maps spawn failures, timeouts and cancellations to a tool error. Returns
 * `null` when the process ran to completion, whatever its exit code.
 */
export function classifyProcessFailure(result: ProcessResult, timeoutMs?: number): ProcessFailure | null {
  if (result.spawnError) {
    const { code, message } = result.spawnError;
    if (code === "ENOENT") {
      return {
        code: ERROR_CODES.PROCESS_NOT_FOUND,
        message: `${result.command} not found`,
        hint: `install ${result.command} or point the toolchain configuration at it`,
      };
    }
    if (code === "EACCES" || code === "EPERM") {
      return { code: ERROR_CODES.PROCESS_PERMISSION, message: `${result.command} is not executable: ${message}` };
    }
    return { code: ERROR_CODES.PROCESS_SPAWN, message: `${result.command} could not be started: ${message}` };
  }
  if (result.timedOut) {
    const limit = timeoutMs !== undefined ? ` after ${timeoutMs}ms` : "";
    return { code: ERROR_CODES.PROCESS_TIMEOUT, message: `${result.command} timed out${limit}` };
  }
  if (result.cancelled) {
    return { code: ERROR_CODES.PROCESS_CANCELLED, message: `${result.command} was cancelled` };
  }
  return null;
}
