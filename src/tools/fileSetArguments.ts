import type { ServerContext } from "../context.js";
import type { ParameterSpec, ToolArguments } from "../mcp/registry.js";
import { resolveFileSet } from "../toolchain/fileSet.js";

/** Parameters shared by every tool operating on a file set. */
export const FILE_SET_PARAMETERS = {
  files: {
    type: "string_array",
    description: "Explicit files, relative to the workspace root.",
  },
  paths: {
    type: "string_array",
    description: "Files or directories scanned recursively (default: the workspace root when no files are given).",
  },
  extensions: {
    type: "string_array",
    description: "Extensions kept by the recursive scan, e.g. [\".cpp\", \".h\"].",
  },
} satisfies Record<string, ParameterSpec>;

/** Resolves the file-set arguments of a call against the workspace. */
export async function resolveFileSetArguments(
  context: ServerContext,
  args: ToolArguments,
  defaultExtensions: readonly string[],
): Promise<string[]> {
  const files = args.optionalStringArray("files");
  const paths = args.optionalStringArray("paths");
  return resolveFileSet(context.workspaceRoot, {
    ...(files ? { files } : {}),
    ...(paths ? { paths } : {}),
    extensions: normaliseExtensions(args.optionalStringArray("extensions")) ?? defaultExtensions,
    excludeDirectories: context.toolchain.excludeDirectories,
  });
}

/** Accepts `cpp` as well as `.cpp`; blank entries are dropped. */
function normaliseExtensions(values: string[] | undefined): string[] | undefined {
  if (!values) {
    return undefined;
  }
  const normalised = values
    .map((value) => value.trim())
    .filter((value) => value.length > 0)
    .map((value) => (value.startsWith(".") ? value : `.${value}`));
  return normalised.length > 0 ? normalised : undefined;
}
