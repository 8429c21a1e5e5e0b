// Every external command goes through a CommandRunner. Arguments are always
// passed as arrays; nothing here builds a shell string.
import { closeSync, mkdirSync, openSync } from "fs";
import { basename, dirname } from "path";
import { execa } from "execa";
import { TIMEOUTS } from "./constants";
import { ErrorCode, RoachyardError } from "./errors";

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export interface DetachedOptions {
  cwd?: string;
  env?: Record<string, string>;
  logFile: string;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ExecResult>;
  /**
   * Launch a process in its own session, detached from this one, with stdout
   * and stderr appended to logFile. Resolves with the child's pid once spawned.
   */
  spawnDetached(command: string, args: string[], options: DetachedOptions): Promise<number>;
}

export const execaRunner: CommandRunner = {
  async run(command, args, options) {
    try {
      const result = await execa(command, args, {
        cwd: options?.cwd,
        env: options?.env,
        timeout: options?.timeoutMs ?? TIMEOUTS.command,
        reject: false,
      });
      return {
        stdout: typeof result.stdout === "string" ? result.stdout : "",
        stderr: typeof result.stderr === "string" ? result.stderr : "",
        exitCode: result.exitCode ?? (result.isTerminated ? 128 : 1),
        signal: result.signal ?? undefined,
      };
    } catch (err) {
      throw new RoachyardError(ErrorCode.EXTERNAL_TOOL, `Command failed to spawn: ${command}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  },

  async spawnDetached(command, args, options) {
    mkdirSync(dirname(options.logFile), { recursive: true });
    const out = openSync(options.logFile, "a");

    const subprocess = execa(command, args, {
      cwd: options.cwd,
      env: options.env,
      detached: true,
      cleanup: false,
      reject: false,
      stdio: ["ignore", out, out],
    });
    closeSync(out);

    const { pid } = subprocess;
    if (pid === undefined) {
      const result = await subprocess;
      throw new RoachyardError(ErrorCode.EXTERNAL_TOOL, `Failed to launch ${command}`, {
        cause: result.message ?? "no pid reported",
        logFile: options.logFile,
      });
    }

    // the result promise never rejects and is left to settle on its own
    subprocess.unref();
    return pid;
  },
};

/**
 * Run a command and throw EXTERNAL_TOOL with the captured output on a non-zero exit
 */
export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions
): Promise<ExecResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    const label = args.length > 0 ? `${basename(command)} ${args[0]}` : basename(command);
    throw new RoachyardError(
      ErrorCode.EXTERNAL_TOOL,
      `${label} exited with ${result.exitCode}`,
      {
        exitCode: result.exitCode,
        stdout: result.stdout.trim(),
        stderr: result.stderr.trim(),
      }
    );
  }
  return result;
}
