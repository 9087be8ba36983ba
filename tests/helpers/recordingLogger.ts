import { StructuredLogger, type LogLevel } from "../../src/logger.js";

export interface RecordedEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly payload?: unknown;
}

/**
 * Logger double for handler tests: keeps every entry in memory instead of
 * writing JSON lines to stderr. Redaction is off so payloads are asserted as
 * emitted.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: RecordedEntry[] = [];

  constructor() {
    super({ logFile: null, redactionEnabled: false, sink: () => undefined });
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push(payload === undefined ? { level, message } : { level, message, payload });
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }

  /** Event names in emission order. */
  messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }
}
