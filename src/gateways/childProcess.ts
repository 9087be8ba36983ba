/**
 * The only place the server calls `spawn`. Commands never go through a shell,
 * and children see an allow-listed slice of the server environment plus the
 * variables a tool asks for, so `GH_TOKEN` reaches `gh` and nothing else.
 */
import { spawn as nodeSpawn, type ChildProcessWithoutNullStreams } from "node:child_process";

/** Inherited by every child when set in the server environment. */
export const DEFAULT_ALLOWED_ENV_KEYS: readonly string[] = [
  "PATH",
  "HOME",
  "USER",
  "LANG",
  "LC_ALL",
  "TMPDIR",
  "TEMP",
  "TMP",
  "SYSTEMROOT",
  "PATHEXT",
];

export interface SpawnRequest {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly allowedEnvKeys: readonly string[];
  /** Environment the allow-list is applied to; `process.env` when omitted. */
  readonly inheritEnv?: Record<string, string | undefined>;
  /** Set verbatim on top of the inherited slice. */
  readonly extraEnv?: Record<string, string>;
  /** Make the child a process-group leader so a timeout can kill its descendants. No-op on Windows. */
  readonly ownProcessGroup?: boolean;
}

/** Thrown before spawning when the command line cannot be passed to `execve`. */
export class InvalidSpawnRequestError extends TypeError {
  readonly code = "EINVAL";

  constructor(message: string) {
    super(message);
    this.name = "InvalidSpawnRequestError";
  }
}

export interface ChildProcessGateway {
  spawn(request: SpawnRequest): ChildProcessWithoutNullStreams;
}

interface GatewayDependencies {
  readonly spawnImpl?: typeof nodeSpawn;
  readonly platform?: NodeJS.Platform;
}

function assertSpawnable(command: string, args: readonly string[]): void {
  if (command.trim() === "" || command.includes("\u0000")) {
    throw new InvalidSpawnRequestError(`invalid command "${command}"`);
  }
  const bad = args.findIndex((arg) => arg.includes("\u0000"));
  if (bad !== -1) {
    throw new InvalidSpawnRequestError(`argument ${bad} of ${command} contains a NUL byte`);
  }
}

function childEnvironment(request: SpawnRequest): Record<string, string> {
  const source = request.inheritEnv ?? process.env;
  const env: Record<string, string> = {};
  for (const key of request.allowedEnvKeys) {
    const value = source[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return { ...env, ...request.extraEnv };
}

export function createChildProcessGateway({
  spawnImpl = nodeSpawn,
  platform = process.platform,
}: GatewayDependencies = {}): ChildProcessGateway {
  return {
    spawn(request) {
      assertSpawnable(request.command, request.args);
      return spawnImpl(request.command, [...request.args], {
        cwd: request.cwd,
        env: childEnvironment(request),
        stdio: "pipe",
        shell: false,
        windowsHide: true,
        detached: request.ownProcessGroup === true && platform !== "win32",
      });
    },
  };
}
