import path from "node:path";

import {
  readOptionalEnum,
  readOptionalInt,
  readOptionalString,
  type EnvSource,
} from "./config/env.js";
import {
  DEFAULT_PIPELINE_TIMEOUT_MS,
  DEFAULT_VERSION_CHECK_TIMEOUT_MS,
  DEFAULT_PROCESS_TIMEOUT_MS,
  type ServerTimeouts,
} from "./context.js";
import { DEFAULT_MAX_OUTPUT_BYTES } from "./gateways/processRunner.js";
import { LOG_LEVELS, parseRedactionDirectives, type LogLevel } from "./logger.js";

/** Name of the toolchain file looked up at the workspace root. */
export const DEFAULT_CONFIG_FILENAME = ".ci-toolbox.json";

export interface HttpRuntimeOptions {
  readonly port: number;
  readonly host: string;
  readonly path: string;
  /** Bearer token required on every request; `null` disables the check. */
  readonly token: string | null;
}

export interface ServerOptions {
  readonly workspaceRoot: string;
  readonly configFile: string;
  /** True when the toolchain file was named explicitly and must exist. */
  readonly configRequired: boolean;
  readonly logFile: string | null;
  readonly logLevel: LogLevel;
  readonly redactLogs: boolean;
  /** Extra literal secrets listed in `CI_TOOLBOX_LOG_REDACT`. */
  readonly redactTokens: readonly string[];
  readonly enableStdio: boolean;
  readonly http: HttpRuntimeOptions | null;
  readonly timeouts: ServerTimeouts;
  readonly maxOutputBytes: number;
  readonly vcsToken: string | null;
}

/** Flags that consume the next argument (or an inline `=value`). */
const FLAG_WITH_VALUE = new Set([
  "--workspace",
  "--config",
  "--log-file",
  "--log-level",
  "--http-port",
  "--http-host",
  "--http-path",
  "--http-token",
  "--default-timeout-ms",
  "--pipeline-timeout-ms",
  "--max-output-bytes",
]);

const BOOLEAN_FLAGS = new Set(["--http", "--no-stdio"]);

function parsePositiveInteger(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`value ${value} for ${flag} must be a positive integer`);
  }
  return num;
}

/** Longest delay Node timers honour; larger values fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

function parseDuration(value: string, flag: string): number {
  const ms = parsePositiveInteger(value, flag);
  if (ms > MAX_TIMER_MS) {
    throw new Error(`value ${value} for ${flag} must not exceed ${MAX_TIMER_MS} ms`);
  }
  return ms;
}

function parsePort(value: string, flag: string): number {
  const port = parsePositiveInteger(value, flag);
  if (port > 65_535) {
    throw new Error(`value ${value} for ${flag} must be a TCP port`);
  }
  return port;
}

function requireNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (!trimmed.length) {
    throw new Error(`${flag} cannot be empty`);
  }
  return trimmed;
}

/** Ensures an HTTP path is absolute and non-empty. */
export function normalizeHttpPath(raw: string): string {
  const cleaned = raw.trim();
  if (!cleaned.length) {
    throw new Error("the HTTP path cannot be empty");
  }
  return cleaned.startsWith("/") ? cleaned : `/${cleaned}`;
}

function parseLogLevel(value: string, flag: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw new Error(`value ${value} for ${flag} must be one of ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

/** Splits argv into flag values, rejecting unknown flags and missing values. */
function collectFlags(argv: readonly string[]): Map<string, string> {
  const flags = new Map<string, string>();
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined || !arg.startsWith("--")) {
      throw new Error(`unexpected argument ${arg ?? ""}`);
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    const inlineValue = separator === -1 ? undefined : arg.slice(separator + 1);

    if (BOOLEAN_FLAGS.has(flag)) {
      if (inlineValue !== undefined) {
        throw new Error(`flag ${flag} does not take a value`);
      }
      flags.set(flag, "");
      continue;
    }
    if (!FLAG_WITH_VALUE.has(flag)) {
      throw new Error(`unknown flag ${flag}`);
    }

    let value = inlineValue;
    if (value === undefined || value === "") {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`flag ${flag} requires a value`);
      }
      value = next;
      index += 1;
    }
    flags.set(flag, value);
  }
  return flags;
}

/**
 * Builds the runtime options from `process.argv.slice(2)`. Flags win over
 * environment variables, which win over defaults.
 */
export function parseServerOptions(
  argv: readonly string[],
  env: EnvSource = process.env,
  cwd: string = process.cwd(),
): ServerOptions {
  const flags = collectFlags(argv);

  const workspaceRaw = flags.get("--workspace") ?? readOptionalString("CI_TOOLBOX_WORKSPACE", env);
  const workspaceRoot = path.resolve(cwd, workspaceRaw ? requireNonEmpty(workspaceRaw, "--workspace") : ".");

  const configRaw = flags.get("--config") ?? readOptionalString("CI_TOOLBOX_CONFIG", env);
  const configFile = configRaw
    ? path.resolve(workspaceRoot, requireNonEmpty(configRaw, "--config"))
    : path.join(workspaceRoot, DEFAULT_CONFIG_FILENAME);

  const logFileRaw = flags.get("--log-file") ?? readOptionalString("CI_TOOLBOX_LOG_FILE", env);
  const logLevelFlag = flags.get("--log-level");
  const logLevel = logLevelFlag
    ? parseLogLevel(logLevelFlag, "--log-level")
    : readOptionalEnum("CI_TOOLBOX_LOG_LEVEL", LOG_LEVELS, env) ?? "info";

  const portFlag = flags.get("--http-port");
  const envPort = readOptionalInt("CI_TOOLBOX_HTTP_PORT", { min: 1, max: 65_535 }, env);
  const httpEnabled =
    flags.has("--http") ||
    portFlag !== undefined ||
    flags.has("--http-host") ||
    flags.has("--http-path") ||
    envPort !== undefined;

  let http: HttpRuntimeOptions | null = null;
  if (httpEnabled) {
    const hostRaw = flags.get("--http-host") ?? readOptionalString("CI_TOOLBOX_HTTP_HOST", env) ?? "127.0.0.1";
    const pathRaw = flags.get("--http-path") ?? readOptionalString("CI_TOOLBOX_HTTP_PATH", env) ?? "/mcp";
    const tokenRaw = flags.get("--http-token") ?? readOptionalString("CI_TOOLBOX_HTTP_TOKEN", env);
    http = {
      port: portFlag !== undefined ? parsePort(portFlag, "--http-port") : envPort ?? 4000,
      host: requireNonEmpty(hostRaw, "--http-host"),
      path: normalizeHttpPath(pathRaw),
      token: tokenRaw ? tokenRaw.trim() : null,
    };
  }

  const enableStdio = !flags.has("--no-stdio") && !httpEnabled;
  if (!enableStdio && !http) {
    throw new Error("no transport enabled: drop --no-stdio or enable --http");
  }

  const timeoutFlag = flags.get("--default-timeout-ms");
  const pipelineFlag = flags.get("--pipeline-timeout-ms");
  const outputFlag = flags.get("--max-output-bytes");

  const redaction = parseRedactionDirectives(readOptionalString("CI_TOOLBOX_LOG_REDACT", env));
  const vcsToken = readOptionalString("GH_TOKEN", env) ?? readOptionalString("GITHUB_TOKEN", env) ?? null;

  return {
    workspaceRoot,
    configFile,
    configRequired: Boolean(configRaw),
    logFile: logFileRaw ? path.resolve(cwd, logFileRaw) : null,
    logLevel,
    redactLogs: redaction.enabled,
    redactTokens: redaction.tokens,
    enableStdio,
    http,
    timeouts: {
      processMs:
        timeoutFlag !== undefined
          ? parseDuration(timeoutFlag, "--default-timeout-ms")
          : readOptionalInt("CI_TOOLBOX_TIMEOUT_MS", { min: 1, max: MAX_TIMER_MS }, env) ?? DEFAULT_PROCESS_TIMEOUT_MS,
      pipelineMs:
        pipelineFlag !== undefined
          ? parseDuration(pipelineFlag, "--pipeline-timeout-ms")
          : readOptionalInt("CI_TOOLBOX_PIPELINE_TIMEOUT_MS", { min: 1, max: MAX_TIMER_MS }, env) ?? DEFAULT_PIPELINE_TIMEOUT_MS,
      versionCheckMs: DEFAULT_VERSION_CHECK_TIMEOUT_MS,
    },
    maxOutputBytes:
      outputFlag !== undefined
        ? parsePositiveInteger(outputFlag, "--max-output-bytes")
        : readOptionalInt("CI_TOOLBOX_MAX_OUTPUT_BYTES", { min: 1 }, env) ?? DEFAULT_MAX_OUTPUT_BYTES,
    vcsToken,
  };
}
