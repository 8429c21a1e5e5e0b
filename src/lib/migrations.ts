import { readFile, readdir, writeFile } from "fs/promises";
import { basename, join } from "path";
import { nanoid } from "nanoid";
import { MIGRATIONS_TABLE } from "./constants";
import type { SqlClient } from "./cockroach";
import type { ConfigStore } from "./config";
import { isValidIdentifier, sanitizeName } from "./crypto";
import { ErrorCode, RoachyardError, errorMessage } from "./errors";
import { ensureDir, removeFile } from "./fs";
import type { Logger } from "./logger";
import type { MigrationFile, MigrationRun } from "./types";

export interface MigrationEngineDeps {
  sql: SqlClient;
  config: ConfigStore;
  migrationsDir: string;
  stagingDir: string;
  logger: Logger;
}

export interface MigrationStatus {
  currentVersion: number;
  known: MigrationFile[];
  pending: MigrationFile[];
}

/**
 * Versioned .sql files applied in order. Every file inserts its own row into
 * schema_migrations; the engine only reads that table.
 *
 * There is no lock: two concurrent runs may apply the same file twice.
 */
export class MigrationEngine {
  constructor(private readonly deps: MigrationEngineDeps) {}

  get directory(): string {
    return this.deps.migrationsDir;
  }

  /**
   * Highest tracked version. Any failure (no table, no database) reads as 0.
   */
  async currentVersion(): Promise<number> {
    const database = await this.databaseName();
    try {
      const value = await this.deps.sql.queryValue(
        `SELECT COALESCE(MAX(version), 0) FROM ${database}.${MIGRATIONS_TABLE}`
      );
      const version = value === null ? 0 : parseInt(value, 10);
      return Number.isInteger(version) ? version : 0;
    } catch (err) {
      this.deps.logger.detail(`Could not read schema version: ${errorMessage(err)}`);
      return 0;
    }
  }

  /**
   * Every migration file with a numeric prefix, sorted by version
   */
  async listMigrations(): Promise<MigrationFile[]> {
    const { migrationsDir, logger } = this.deps;

    let entries: string[];
    try {
      entries = await readdir(migrationsDir);
    } catch (err) {
      logger.warn(`Migrations directory not readable: ${migrationsDir} (${errorMessage(err)})`);
      return [];
    }

    const byVersion = new Map<number, MigrationFile>();
    for (const filename of entries.filter((entry) => entry.endsWith(".sql"))) {
      const prefix = basename(filename, ".sql").split("_")[0];
      if (!/^\d+$/.test(prefix)) {
        logger.warn(`Skipping migration file without a version prefix: ${filename}`);
        continue;
      }

      const version = parseInt(prefix, 10);
      const clash = byVersion.get(version);
      if (clash) {
        throw new RoachyardError(
          ErrorCode.INVALID_STATE,
          `Migrations ${clash.filename} and ${filename} share version ${version}`,
          { version, files: [clash.filename, filename] }
        );
      }
      byVersion.set(version, { version, filename, path: join(migrationsDir, filename) });
    }

    return [...byVersion.values()].sort((a, b) => a.version - b.version);
  }

  async pendingMigrations(): Promise<MigrationFile[]> {
    const { pending } = await this.status();
    return pending;
  }

  async status(): Promise<MigrationStatus> {
    const currentVersion = await this.currentVersion();
    const known = await this.listMigrations();
    return {
      currentVersion,
      known,
      pending: known.filter((m) => m.version > currentVersion),
    };
  }

  /**
   * Run one file against the configured database. The staging copy is
   * always removed.
   */
  async applyMigration(migration: MigrationFile): Promise<void> {
    const { sql, stagingDir, logger } = this.deps;
    const database = await this.databaseName();
    const content = await readFile(migration.path, "utf-8");

    await ensureDir(stagingDir);
    const staging = join(stagingDir, `migration_${migration.version}_${nanoid(8)}.sql`);

    try {
      await writeFile(staging, `USE ${database};\n${content}`);
      logger.info(`Applying migration ${migration.version}: ${migration.filename}`);
      await sql.executeFile(staging);
    } finally {
      await removeFile(staging);
    }
  }

  /**
   * Apply pending migrations in order, stopping at the first failure.
   * Nothing already applied is rolled back.
   */
  async migrateAll(): Promise<MigrationRun> {
    const { logger } = this.deps;
    const { currentVersion, pending } = await this.status();

    if (pending.length === 0) {
      logger.success(`Schema is up to date (version ${currentVersion})`);
      return { applied: [], currentVersion };
    }

    logger.info(`${pending.length} pending migration(s)`);
    const applied: number[] = [];

    for (const migration of pending) {
      try {
        await this.applyMigration(migration);
      } catch (err) {
        const stderr = err instanceof RoachyardError ? err.context?.stderr : undefined;
        throw new RoachyardError(
          ErrorCode.MIGRATION_HALTED,
          `Migration ${migration.version} (${migration.filename}) failed; stopped`,
          { version: migration.version, applied, cause: errorMessage(err), stderr }
        );
      }
      applied.push(migration.version);
    }

    const after = await this.currentVersion();
    logger.success(`Applied ${applied.length} migration(s), schema at version ${after}`);
    return { applied, currentVersion: after };
  }

  /**
   * Write a stub for the next version. Never overwrites an existing file.
   */
  async createMigration(name: string): Promise<MigrationFile> {
    const { migrationsDir, logger } = this.deps;

    const slug = sanitizeName(name);
    if (slug.length === 0) {
      throw new RoachyardError(ErrorCode.CONFIG_INVALID, `Migration name "${name}" has no usable characters`);
    }

    const current = await this.currentVersion();
    const known = await this.listMigrations();
    const highest = known.length > 0 ? known[known.length - 1].version : 0;
    const version = Math.max(current + 1, highest + 1);

    const stem = `${String(version).padStart(3, "0")}_${slug}`;
    const filename = `${stem}.sql`;
    const path = join(migrationsDir, filename);

    await ensureDir(migrationsDir);
    try {
      await writeFile(path, migrationTemplate(version, stem, slug), { flag: "wx" });
    } catch (err) {
      throw new RoachyardError(ErrorCode.PERSISTENCE, `Could not create ${path}`, { cause: errorMessage(err) });
    }

    logger.success(`Created migration ${path}`);
    return { version, filename, path };
  }

  private async databaseName(): Promise<string> {
    const { database_name } = await this.deps.config.load();
    const check = isValidIdentifier(database_name);
    if (!check.valid) {
      throw new RoachyardError(ErrorCode.CONFIG_INVALID, `Invalid database_name "${database_name}": ${check.error}`);
    }
    return database_name;
  }
}

function migrationTemplate(version: number, stem: string, slug: string): string {
  const title = slug.replace(/_/g, " ");
  return `-- Migration ${String(version).padStart(3, "0")}: ${title}

-- Schema changes go here (CREATE TABLE, ALTER TABLE, ...)

INSERT INTO ${MIGRATIONS_TABLE} (version, name)
VALUES (${version}, '${stem}')
ON CONFLICT (version) DO NOTHING;
`;
}
