import { toWorkspaceRelative } from "../paths.js";
import type { Finding, FindingSeverity } from "../types.js";

/**
 * `path:line[:column]: severity: message [rule]`, the shape shared by
 * compiler-style linters and by the analyzer's configured template.
 */
const DIAGNOSTIC_PATTERN =
  /^(?<file>.+?):(?<line>\d+)(?::(?<column>\d+))?:\s*(?<severity>fatal error|error|warning|note|style|performance|portability|information|info)\s*:\s*(?<message>.*?)(?:\s+\[(?<rule>[^\]\s]+)\])?\s*$/;

const SEVERITY_MAP: ReadonlyMap<string, FindingSeverity> = new Map([
  ["fatal error", "error"],
  ["error", "error"],
  ["warning", "warning"],
  ["style", "warning"],
  ["performance", "warning"],
  ["portability", "warning"],
  ["note", "info"],
  ["information", "info"],
  ["info", "info"],
]);

/** Number of unparsed lines kept verbatim for the summary and logs. */
const UNPARSED_SAMPLE_LIMIT = 5;

export interface DiagnosticsParseOptions {
  /** Workspace root used to relativise reported paths. */
  readonly root: string;
  readonly ignorePatterns?: readonly RegExp[];
}

export interface DiagnosticsParseResult {
  readonly findings: Finding[];
  readonly unparsed: number;
  readonly unparsedSamples: string[];
}

/**
 * Line-oriented parser for analyzer output. Lines that match no diagnostic
 * are counted, never fatal. Identical diagnostics (headers included from
 * several translation units) are reported once.
 */
export function parseDiagnostics(text: string, options: DiagnosticsParseOptions): DiagnosticsParseResult {
  const findings: Finding[] = [];
  const seen = new Set<string>();
  const unparsedSamples: string[] = [];
  let unparsed = 0;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    if (line.trim().length === 0) {
      continue;
    }
    if (options.ignorePatterns?.some((pattern) => pattern.test(line))) {
      continue;
    }

    const groups = DIAGNOSTIC_PATTERN.exec(line)?.groups;
    const severity = groups ? SEVERITY_MAP.get(groups.severity ?? "") : undefined;
    if (!groups || !severity || groups.file === undefined || groups.line === undefined) {
      unparsed += 1;
      if (unparsedSamples.length < UNPARSED_SAMPLE_LIMIT) {
        unparsedSamples.push(line);
      }
      continue;
    }

    const lineNumber = Number.parseInt(groups.line, 10);
    const columnNumber = groups.column !== undefined ? Number.parseInt(groups.column, 10) : 0;
    const finding: Finding = {
      file: toWorkspaceRelative(options.root, groups.file.trim()),
      severity,
      message: groups.message ?? "",
    };
    if (lineNumber > 0) {
      finding.line = lineNumber;
    }
    if (columnNumber > 0) {
      finding.column = columnNumber;
    }
    if (groups.rule) {
      finding.rule = groups.rule;
    }

    const key = [finding.file, finding.line, finding.column, finding.severity, finding.message, finding.rule].join("\u0000");
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    findings.push(finding);
  }

  return { findings, unparsed, unparsedSamples };
}
