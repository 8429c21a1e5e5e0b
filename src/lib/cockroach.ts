import { chmod, copyFile, mkdtemp, readdir, rm } from "fs/promises";
import { homedir, tmpdir } from "os";
import { join } from "path";
import { COCKROACH_BINARY_PATHS, COCKROACH_DOWNLOADS } from "./constants";
import { ErrorCode, RoachyardError } from "./errors";
import { type CommandRunner, type ExecResult, runOrThrow } from "./exec";
import { ensureDir, fileExists } from "./fs";
import type { Logger } from "./logger";

// =============================================================================
// BINARY
// =============================================================================

export interface CockroachBinaryOptions {
  candidates?: readonly string[];
  installDir?: string;
}

/**
 * Locates, versions and installs the cockroach executable
 */
export class CockroachBinary {
  private readonly candidates: readonly string[];
  private readonly installDir: string;
  private resolved: string | null = null;

  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    options: CockroachBinaryOptions = {}
  ) {
    this.candidates = options.candidates ?? COCKROACH_BINARY_PATHS;
    this.installDir = options.installDir ?? defaultInstallDir();
  }

  /**
   * Well-known paths first, then PATH lookup. Falls back to the bare name.
   */
  async resolve(): Promise<string> {
    if (this.resolved) return this.resolved;

    const found = await this.locate();
    this.resolved = found ?? "cockroach";
    return this.resolved;
  }

  async isInstalled(): Promise<boolean> {
    return (await this.locate()) !== null;
  }

  /**
   * First line of `cockroach version`, or null when not installed
   */
  async version(): Promise<string | null> {
    const path = await this.locate();
    if (!path) return null;

    const result = await this.runner.run(path, ["version"]);
    if (result.exitCode !== 0) return null;
    return result.stdout.split("\n")[0]?.trim() || null;
  }

  /**
   * Download the release tarball, unpack it and copy the binary into place
   */
  async install(arch: string = process.arch): Promise<string> {
    const url = COCKROACH_DOWNLOADS[arch];
    if (!url) {
      throw new RoachyardError(ErrorCode.INVALID_STATE, `Unsupported architecture: ${arch}`, {
        supported: Object.keys(COCKROACH_DOWNLOADS),
      });
    }

    const workDir = await mkdtemp(join(tmpdir(), "roachyard-install-"));
    try {
      const archive = join(workDir, "cockroach.tgz");
      await this.download(url, archive);
      await runOrThrow(this.runner, "tar", ["xzf", archive, "-C", workDir]);

      const extracted = (await readdir(workDir)).find((entry) => entry.startsWith("cockroach-"));
      if (!extracted) {
        throw new RoachyardError(ErrorCode.EXTERNAL_TOOL, "Archive did not contain a cockroach-* directory", { url });
      }

      await ensureDir(this.installDir);
      const target = join(this.installDir, "cockroach");
      await copyFile(join(workDir, extracted, "cockroach"), target);
      await chmod(target, 0o755);

      this.resolved = target;
      return target;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async download(url: string, destination: string): Promise<void> {
    const wget = await this.runner.run("wget", ["-q", url, "-O", destination]);
    if (wget.exitCode === 0) return;

    this.logger.warn(`wget failed (exit ${wget.exitCode}), retrying with curl`);
    await runOrThrow(this.runner, "curl", ["-sL", "--fail", url, "-o", destination]);
  }

  private async locate(): Promise<string | null> {
    for (const candidate of this.candidates) {
      if (await fileExists(candidate)) return candidate;
    }

    const which = await this.runner.run("which", ["cockroach"]);
    const path = which.stdout.trim();
    return which.exitCode === 0 && path.length > 0 ? path : null;
  }
}

function defaultInstallDir(): string {
  const isRoot = typeof process.getuid === "function" && process.getuid() === 0;
  return isRoot ? "/usr/local/bin" : join(homedir(), "bin");
}

// =============================================================================
// SQL
// =============================================================================

export interface SqlTarget {
  certsDir: string;
  sqlPort: number;
}

/**
 * Runs statements through `cockroach sql` as the root client
 */
export class SqlClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly binary: CockroachBinary,
    private readonly target: () => Promise<SqlTarget>
  ) {}

  async execute(statement: string, database?: string): Promise<ExecResult> {
    return this.sql([...(database ? [`--database=${database}`] : []), `--execute=${statement}`]);
  }

  async executeFile(path: string): Promise<ExecResult> {
    return this.sql([`--file=${path}`]);
  }

  /**
   * First column of the first row, or null for an empty result
   */
  async queryValue(statement: string, database?: string): Promise<string | null> {
    const result = await this.sql([
      ...(database ? [`--database=${database}`] : []),
      "--format=csv",
      `--execute=${statement}`,
    ]);
    const rows = result.stdout.split("\n").map((line) => line.trim()).filter((line) => line.length > 0);
    const first = rows[1];
    return first === undefined ? null : first.split(",")[0];
  }

  private async sql(args: string[]): Promise<ExecResult> {
    const binary = await this.binary.resolve();
    const { certsDir, sqlPort } = await this.target();
    return runOrThrow(this.runner, binary, [
      "sql",
      `--certs-dir=${certsDir}`,
      `--host=localhost:${sqlPort}`,
      ...args,
    ]);
  }
}
