import { readFile } from "node:fs/promises";

import { z } from "zod";

import { errnoCode, errorMessage } from "../nodePrimitives.js";

/** Extensions scanned when neither the request nor the config narrows them. */
export const DEFAULT_EXTENSIONS: readonly string[] = [".c", ".cc", ".cpp", ".cxx", ".h", ".hh", ".hpp", ".hxx"];

/** Directory names never entered by a recursive scan. */
export const DEFAULT_EXCLUDED_DIRECTORIES: readonly string[] = [".git", "node_modules", "build", "dist", ".cache", "third_party"];

/**
 * Progress chatter printed by the default analyzers. Matching lines are
 * neither findings nor counted as unparsed.
 */
export const DEFAULT_IGNORE_OUTPUT_PATTERNS: readonly string[] = [
  "^\\d+ warnings?( and \\d+ errors?)? generated\\.?$",
  "^\\d+ errors? generated\\.?$",
  "^Suppressed \\d+ warnings?",
  "^Use -header-filter=",
  "^Checking .+\\.\\.\\.$",
  "^\\d+/\\d+ files checked",
  "^Error while processing ",
  "^\\s*\\^[~^]*\\s*$",
];

/** Maximum number of files passed to one analyzer or formatter invocation. */
export const DEFAULT_BATCH_SIZE = 200;

export interface FormatterConfig {
  readonly command: string;
  /** Arguments placed before the mode-specific ones. */
  readonly args: readonly string[];
  readonly checkArgs: readonly string[];
  readonly fixArgs: readonly string[];
  readonly extensions: readonly string[];
  /** Parallel per-file checks. */
  readonly concurrency: number;
}

export interface AnalyzerConfig {
  readonly command: string;
  readonly args: readonly string[];
  readonly extensions: readonly string[];
}

export interface ToolchainConfig {
  readonly formatter: FormatterConfig;
  readonly linter: AnalyzerConfig;
  readonly analyzer: AnalyzerConfig;
  readonly vcs: { readonly command: string };
  readonly excludeDirectories: readonly string[];
  readonly ignoreOutputPatterns: readonly RegExp[];
  readonly batchSize: number;
  /** Absolute path of the file the overrides came from, `null` for defaults. */
  readonly source: string | null;
}

const commandSchema = z.string().trim().min(1);
const argsSchema = z.array(z.string());
const extensionsSchema = z
  .array(z.string().regex(/^\.[A-Za-z0-9_+-]+$/, "extensions look like \".cpp\""))
  .min(1);

const patternSchema = z.string().superRefine((value, ctx) => {
  try {
    new RegExp(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid regular expression: ${errorMessage(error)}`,
    });
  }
});

/** Shape of the optional JSON toolchain file; every key overrides a default. */
export const ToolchainFileSchema = z
  .object({
    formatter: z
      .object({
        command: commandSchema,
        args: argsSchema,
        checkArgs: argsSchema,
        fixArgs: argsSchema,
        extensions: extensionsSchema,
        concurrency: z.number().int().min(1).max(32),
      })
      .partial()
      .strict(),
    linter: z.object({ command: commandSchema, args: argsSchema, extensions: extensionsSchema }).partial().strict(),
    analyzer: z.object({ command: commandSchema, args: argsSchema, extensions: extensionsSchema }).partial().strict(),
    vcs: z.object({ command: commandSchema }).partial().strict(),
    extensions: extensionsSchema,
    excludeDirectories: z.array(z.string().min(1)),
    ignoreOutputPatterns: z.array(patternSchema),
    batchSize: z.number().int().min(1).max(10_000),
  })
  .partial()
  .strict();

export type ToolchainFile = z.infer<typeof ToolchainFileSchema>;

/** Raised at startup when the toolchain file cannot be used. */
export class ToolchainConfigError extends Error {
  constructor(
    message: string,
    public readonly file: string,
  ) {
    super(message);
    this.name = "ToolchainConfigError";
  }
}

/** Defaults merged with the optional overrides. */
export function buildToolchainConfig(overrides: ToolchainFile = {}, source: string | null = null): ToolchainConfig {
  const extensions = overrides.extensions ?? DEFAULT_EXTENSIONS;
  return {
    formatter: {
      command: overrides.formatter?.command ?? "clang-format",
      args: overrides.formatter?.args ?? [],
      checkArgs: overrides.formatter?.checkArgs ?? ["--dry-run", "--Werror"],
      fixArgs: overrides.formatter?.fixArgs ?? ["-i"],
      extensions: overrides.formatter?.extensions ?? extensions,
      concurrency: overrides.formatter?.concurrency ?? 4,
    },
    linter: {
      command: overrides.linter?.command ?? "clang-tidy",
      args: overrides.linter?.args ?? ["--quiet"],
      extensions: overrides.linter?.extensions ?? extensions,
    },
    analyzer: {
      command: overrides.analyzer?.command ?? "cppcheck",
      args: overrides.analyzer?.args ?? [
        "--enable=warning,style,performance,portability",
        "--quiet",
        "--template={file}:{line}:{column}: {severity}: {message} [{id}]",
      ],
      extensions: overrides.analyzer?.extensions ?? extensions,
    },
    vcs: { command: overrides.vcs?.command ?? "gh" },
    excludeDirectories: overrides.excludeDirectories ?? DEFAULT_EXCLUDED_DIRECTORIES,
    ignoreOutputPatterns: (overrides.ignoreOutputPatterns ?? DEFAULT_IGNORE_OUTPUT_PATTERNS).map(
      (pattern) => new RegExp(pattern),
    ),
    batchSize: overrides.batchSize ?? DEFAULT_BATCH_SIZE,
    source,
  };
}

/**
 * Reads and validates the toolchain file. A missing file is only an error
 * when it was named explicitly; otherwise the defaults apply.
 */
export async function loadToolchainConfig(file: string, options: { required: boolean }): Promise<ToolchainConfig> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT" && !options.required) {
      return buildToolchainConfig();
    }
    throw new ToolchainConfigError(
      `cannot read toolchain config ${file}: ${errorMessage(error)}`,
      file,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ToolchainConfigError(
      `toolchain config ${file} is not valid JSON: ${errorMessage(error)}`,
      file,
    );
  }

  const parsed = ToolchainFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ToolchainConfigError(`toolchain config ${file} is invalid: ${issues.join("; ")}`, file);
  }
  return buildToolchainConfig(parsed.data, file);
}
