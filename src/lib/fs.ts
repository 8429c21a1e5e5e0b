import { access, mkdir, readFile, readdir, rename, rm, stat, writeFile } from "fs/promises";
import { join } from "path";
import type { Stats } from "fs";
import { nanoid } from "nanoid";
import type { Layout } from "./constants";
import { ErrorCode, RoachyardError, errorMessage } from "./errors";

// =============================================================================
// DIRECTORIES
// =============================================================================

/**
 * Ensures every directory of the layout exists
 */
export async function ensureDirectories(paths: Layout): Promise<void> {
  for (const path of Object.values(paths)) {
    await ensureDir(path);
  }
}

export async function ensureDir(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (err) {
    throw new RoachyardError(ErrorCode.PERSISTENCE, `Failed to create directory: ${path}`, {
      cause: errorMessage(err),
    });
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// =============================================================================
// FILES
// =============================================================================

/**
 * Read and parse a JSON file. Returns undefined when the file does not exist;
 * a file that exists but cannot be parsed is an error.
 */
export async function readJson(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw new RoachyardError(ErrorCode.PERSISTENCE, `Failed to read ${path}`, { cause: errorMessage(err) });
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new RoachyardError(ErrorCode.PERSISTENCE, `Invalid JSON in ${path}`, { cause: errorMessage(err) });
  }
}

/**
 * Write JSON file atomically using temp file + rename
 */
export async function writeJson(path: string, data: unknown): Promise<void> {
  await atomicWrite(path, JSON.stringify(data, null, 2) + "\n");
}

/**
 * Write a file atomically using temp file + rename
 */
export async function atomicWrite(path: string, content: string | Uint8Array): Promise<void> {
  const tempPath = `${path}.tmp.${process.pid}.${nanoid(6)}`;
  try {
    await writeFile(tempPath, content);
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw new RoachyardError(ErrorCode.PERSISTENCE, `Failed to write ${path}`, { cause: errorMessage(err) });
  }
}

export async function removeFile(path: string): Promise<void> {
  await rm(path, { force: true });
}

/**
 * Remove a file or directory tree. Missing paths are fine.
 */
export async function removePath(path: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (err) {
    throw new RoachyardError(ErrorCode.PERSISTENCE, `Failed to remove ${path}`, { cause: errorMessage(err) });
  }
}

/**
 * Total size in bytes of a file or directory tree (0 when missing)
 */
export async function pathSize(path: string): Promise<number> {
  let info: Stats;
  try {
    info = await stat(path);
  } catch {
    return 0;
  }
  if (!info.isDirectory()) return info.size;

  let total = 0;
  for (const entry of await readdir(path)) {
    total += await pathSize(join(path, entry));
  }
  return total;
}

// =============================================================================
// PID FILES
// =============================================================================

/**
 * Read a PID file. Missing, empty or garbled files all read as null.
 */
export async function readPidFile(path: string): Promise<number | null> {
  try {
    const content = await readFile(path, "utf-8");
    const pid = parseInt(content.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

export async function writePidFile(path: string, pid: number): Promise<void> {
  await atomicWrite(path, `${pid}\n`);
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
