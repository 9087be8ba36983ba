import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { errnoCode, errorMessage } from "./nodePrimitives.js";
import { getRequestContext } from "./infra/requestContext.js";

/** Placeholder inserted when a secret value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ON = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_OFF = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Payload keys whose values are redacted when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "token",
  "access_token",
  "gh_token",
  "github_token",
  "http_token",
  "credential",
  "password",
]);

/** Redaction toggle plus extra literal secrets. */
export interface RedactionDirectives {
  readonly enabled: boolean;
  readonly tokens: string[];
}

/**
 * Reads `CI_TOOLBOX_LOG_REDACT`: a comma-separated list mixing on/off
 * switches and literal substrings to scrub, e.g. `"on,ghp_"` or `"off"`.
 * The last switch wins; redaction is on when none is given.
 */
export function parseRedactionDirectives(raw: string | undefined): RedactionDirectives {
  let enabled = true;
  const tokens = new Set<string>();
  for (const directive of (raw ?? "").split(",")) {
    const trimmed = directive.trim();
    if (!trimmed) {
      continue;
    }
    const word = trimmed.toLowerCase();
    if (REDACTION_ON.has(word)) {
      enabled = true;
    } else if (REDACTION_OFF.has(word)) {
      enabled = false;
    } else {
      tokens.add(trimmed);
    }
  }
  return { enabled, tokens: [...tokens] };
}

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  request_id?: string | number | null;
  tool?: string | null;
  transport?: string | null;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Minimum level written out; lower levels are dropped. */
  readonly level?: LogLevel;
  /** Maximum size in bytes before the mirrored log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Literal secrets scrubbed from every string in the payload, whatever the toggle. */
  readonly redactSecrets?: readonly string[];
  /** Key-based payload redaction; on unless set to `false`. */
  readonly redactionEnabled?: boolean;
  /** Line sink, stderr by default since stdout carries the stdio protocol. */
  readonly sink?: (line: string) => void;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * JSON-lines logger. Every entry goes to the sink (stderr) and, when a log
 * file is configured, is appended to it in emission order with size-based
 * rotation.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly level: LogLevel;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: readonly string[];
  private readonly redactionEnabled: boolean;
  private readonly sink: (line: string) => void;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Whether the directory containing {@link logFile} already exists. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.level = options.level ?? "info";
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.redactSecrets = [...new Set(options.redactSecrets ?? [])].filter((secret) => secret.length > 0);
    this.redactionEnabled = options.redactionEnabled ?? true;
    this.sink = options.sink ?? ((line) => process.stderr.write(line));
    this.entryListener = options.onEntry;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }
    const context = getRequestContext();
    const safePayload = payload !== undefined ? this.redact(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context ? { request_id: context.requestId, tool: context.tool, transport: context.transport } : {}),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink(line);
    this.entryListener?.(structuredClone(entry));
    if (this.logFile) {
      this.persist(this.logFile, line);
    }
  }

  /** Appends to the mirror file behind every write already queued. */
  private persist(logFile: string, line: string): void {
    const append = async (): Promise<void> => {
      await this.ensureLogDestination(logFile);
      await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
      await appendFile(logFile, line, "utf8");
    };
    this.writeQueue = this.writeQueue.then(append).catch((err: unknown) => {
      this.reportInternalFailure("log_file_write_failed", err);
      // the directory may have been removed underneath us
      this.logDirectoryReady = false;
    });
  }

  /** Resolves once every queued file append has settled. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private reportInternalFailure(message: string, error: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: { message: errorMessage(error) },
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the mirrored file when appending {@link pendingBytes} would exceed
   * the size limit. At most {@link maxFileCount} files are kept.
   */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    const keep = this.maxFileCount;
    if (keep === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${keep - 1}`, { force: true });
    for (let index = keep - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private redact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrubSecrets(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item));
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrubSecrets(value.message) };
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.redactionEnabled && SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.redact(entry);
      }
      return result;
    }
    return value;
  }

  private scrubSecrets(value: string): string {
    let sanitised = value;
    for (const secret of this.redactSecrets) {
      sanitised = sanitised.split(secret).join(REDACTION_TOKEN);
    }
    return sanitised;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (errnoCode(error) !== "ENOENT") {
      throw error;
    }
  }
}
