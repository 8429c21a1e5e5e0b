import {
  ALREADY_INITIALIZED_MARKER,
  COCKROACH_PROCESS_PATTERN,
  INTERVALS,
  type Layout,
  type LayoutFiles,
} from "./constants";
import type { CaServerController } from "./ca-server";
import type { CockroachBinary, SqlClient } from "./cockroach";
import type { ConfigStore } from "./config";
import { isValidIdentifier, quoteLiteral } from "./crypto";
import { ErrorCode, RoachyardError, errorMessage } from "./errors";
import type { CommandRunner } from "./exec";
import { atomicWrite, ensureDir, pathSize, removeFile, removePath, writePidFile } from "./fs";
import type { Logger } from "./logger";
import type { MigrationEngine } from "./migrations";
import { buildJoinList, getPrimaryIp } from "./network";
import type { ProcessSupervisor, Sleep } from "./supervisor";
import type { CaServerStart, MigrationRun, ServiceHandle, StartOutcome, StopOutcome } from "./types";

export type ClusterStartResult = StartOutcome & {
  caServer?: CaServerStart;
  caServerError?: string;
};

export type DatabaseSetup =
  | { ok: true; run: MigrationRun }
  | { ok: false; error: string };

export type InitResult =
  | { status: "initialized"; database: DatabaseSetup }
  | { status: "already-initialized" };

export interface WebUser {
  url: string;
  username: string;
  password: string;
  file: string;
}

export interface PurgeTarget {
  path: string;
  bytes: number;
}

export interface ClusterControllerDeps {
  paths: Layout;
  files: LayoutFiles;
  runner: CommandRunner;
  supervisor: ProcessSupervisor;
  binary: CockroachBinary;
  sql: SqlClient;
  config: ConfigStore;
  migrations: MigrationEngine;
  caServer: CaServerController;
  logger: Logger;
  sleep: Sleep;
}

/**
 * Lifecycle of the local cockroach node and the cluster-wide setup steps
 */
export class ClusterController {
  constructor(private readonly deps: ClusterControllerDeps) {}

  /**
   * Pid of the running node, found by command line
   */
  async runningPid(): Promise<number | null> {
    const [first] = await this.deps.supervisor.findProcesses(COCKROACH_PROCESS_PATTERN);
    return first ? first.pid : null;
  }

  async start(options: { isFirstNode: boolean }): Promise<ClusterStartResult> {
    const { paths, files, runner, supervisor, binary, config, caServer, logger, sleep } = this.deps;
    const cluster = await config.load();

    const existing = await this.runningPid();
    if (existing !== null) {
      return { status: "already-running", handle: this.handle(existing, cluster.sql_port) };
    }

    if (!options.isFirstNode && cluster.cluster_nodes.length === 0) {
      logger.warn("No cluster_nodes configured; this node will only join itself");
    }

    await ensureDir(paths.store);
    await ensureDir(paths.logs);

    const ip = await getPrimaryIp(runner);
    const join = buildJoinList(cluster);
    logger.detail(`Advertise: ${ip}:${cluster.sql_port}`);
    logger.detail(`Join: ${join}`);

    await runner.spawnDetached(
      await binary.resolve(),
      [
        "start",
        `--certs-dir=${paths.certs}`,
        `--store=${paths.store}`,
        `--listen-addr=0.0.0.0:${cluster.sql_port}`,
        `--advertise-addr=${ip}:${cluster.sql_port}`,
        `--http-addr=0.0.0.0:${cluster.http_port}`,
        `--join=${join}`,
      ],
      { logFile: files.cockroachLog }
    );

    await sleep(INTERVALS.databaseStartup);
    const [started] = await supervisor.findProcesses(COCKROACH_PROCESS_PATTERN);
    if (!started) {
      throw new RoachyardError(ErrorCode.EXTERNAL_TOOL, "cockroach exited right after start", {
        logFile: files.cockroachLog,
        hint: `tail -50 ${files.cockroachLog}`,
      });
    }

    await writePidFile(files.cockroachPid, started.pid);
    logger.success(`Node running (PID ${started.pid}), console at https://${ip}:${cluster.http_port}`);

    const result: ClusterStartResult = { status: "started", handle: this.handle(started.pid, cluster.sql_port) };
    try {
      result.caServer = await caServer.start();
    } catch (err) {
      result.caServerError = errorMessage(err);
      logger.warn(`CA server not started: ${result.caServerError}`);
    }
    return result;
  }

  /**
   * SIGTERM, then SIGKILL to every matching process, checking after each
   */
  async stop(): Promise<StopOutcome> {
    const { files, supervisor, logger, sleep } = this.deps;

    const running = await supervisor.findProcesses(COCKROACH_PROCESS_PATTERN);
    if (running.length === 0) {
      await removeFile(files.cockroachPid);
      return { status: "already-stopped" };
    }

    logger.detail(`Sending SIGTERM to ${running.map((p) => p.pid).join(", ")}`);
    await supervisor.killByPattern(COCKROACH_PROCESS_PATTERN, false);
    await sleep(INTERVALS.gracefulStop);

    if ((await supervisor.findProcesses(COCKROACH_PROCESS_PATTERN)).length === 0) {
      await removeFile(files.cockroachPid);
      return { status: "stopped", forced: false };
    }

    logger.warn("Node still running, forcing stop");
    await supervisor.killByPattern(COCKROACH_PROCESS_PATTERN, true);
    await sleep(INTERVALS.forcedStop);

    const survivors = await supervisor.findProcesses(COCKROACH_PROCESS_PATTERN);
    if (survivors.length > 0) {
      throw new RoachyardError(ErrorCode.STOP_FAILED, "Could not stop cockroach", {
        pids: survivors.map((p) => p.pid),
        hint: `pkill -9 -f '${COCKROACH_PROCESS_PATTERN}'`,
      });
    }

    await removeFile(files.cockroachPid);
    return { status: "stopped", forced: true };
  }

  /**
   * One-time cluster bootstrap, followed by database creation. A failure
   * after init is reported in the result, not thrown.
   */
  async initCluster(): Promise<InitResult> {
    const { paths, runner, binary, config, logger } = this.deps;
    const { sql_port } = await config.load();

    const result = await runner.run(await binary.resolve(), [
      "init",
      `--certs-dir=${paths.certs}`,
      `--host=localhost:${sql_port}`,
    ]);

    if (result.exitCode !== 0) {
      // cockroach reports a second init as an error; only its message tells them apart
      if (result.stderr.includes(ALREADY_INITIALIZED_MARKER)) {
        return { status: "already-initialized" };
      }
      throw new RoachyardError(ErrorCode.EXTERNAL_TOOL, `cockroach init exited with ${result.exitCode}`, {
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
    }

    logger.success("Cluster initialized");
    try {
      return { status: "initialized", database: { ok: true, run: await this.createDatabase() } };
    } catch (err) {
      logger.warn(`Database setup failed: ${errorMessage(err)}`);
      return { status: "initialized", database: { ok: false, error: errorMessage(err) } };
    }
  }

  async createDatabase(): Promise<MigrationRun> {
    const { sql, migrations, logger } = this.deps;
    const database = await this.databaseName();

    await sql.execute(`CREATE DATABASE IF NOT EXISTS ${database}`);
    logger.success(`Database ${database} ready`);
    return migrations.migrateAll();
  }

  async dropDatabase(): Promise<string> {
    const database = await this.databaseName();
    await this.deps.sql.execute(`DROP DATABASE IF EXISTS ${database} CASCADE`);
    this.deps.logger.success(`Database ${database} dropped`);
    return database;
  }

  /**
   * (Re)create a password user with the admin role for the web console
   */
  async createWebUser(username?: string, password?: string): Promise<WebUser> {
    const { files, runner, sql, config, logger } = this.deps;
    const cluster = await config.load();
    const user = username ?? cluster.admin_user;
    const secret = password ?? cluster.admin_password;

    const check = isValidIdentifier(user);
    if (!check.valid) {
      throw new RoachyardError(ErrorCode.CONFIG_INVALID, `Invalid username "${user}": ${check.error}`);
    }

    try {
      await sql.execute(`DROP USER IF EXISTS ${user}`);
    } catch (err) {
      logger.detail(`DROP USER ${user} failed: ${errorMessage(err)}`);
    }
    await sql.execute(`CREATE USER ${user} WITH PASSWORD ${quoteLiteral(secret)}; GRANT admin TO ${user}`);

    const ip = await getPrimaryIp(runner);
    const url = `https://${ip}:${cluster.http_port}`;
    await atomicWrite(files.webCredentials, `URL: ${url}\nUser: ${user}\nPassword: ${secret}\n`);

    logger.success(`User ${user} created`);
    return { url, username: user, password: secret, file: files.webCredentials };
  }

  /**
   * What purge would delete, with sizes
   */
  async purgeTargets(): Promise<PurgeTarget[]> {
    const { paths, files } = this.deps;
    const targets = [paths.store, paths.certs, paths.logs, files.webCredentials, files.cockroachPid, files.caServerPid];
    const result: PurgeTarget[] = [];
    for (const path of targets) {
      result.push({ path, bytes: await pathSize(path) });
    }
    return result;
  }

  /**
   * Delete data, certificates, logs and credentials. Refuses while the node runs.
   */
  async purge(): Promise<PurgeTarget[]> {
    const pid = await this.runningPid();
    if (pid !== null) {
      throw new RoachyardError(ErrorCode.INVALID_STATE, `cockroach is running (PID ${pid}); stop it first`);
    }

    const targets = await this.purgeTargets();
    for (const { path } of targets) {
      await removePath(path);
    }
    this.deps.logger.success("All cluster data removed");
    return targets;
  }

  private handle(pid: number, port: number): ServiceHandle {
    return { kind: "database", pid, port };
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
