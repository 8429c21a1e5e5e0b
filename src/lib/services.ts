import { join, resolve } from "path";
import { COCKROACH_PROCESS_PATTERN, INTERVALS, LIMITS, type Layout } from "./constants";
import type { ConfigStore } from "./config";
import { ErrorCode, RoachyardError } from "./errors";
import type { CommandRunner } from "./exec";
import { ensureDir, fileExists } from "./fs";
import type { Logger } from "./logger";
import type { ProcessSupervisor } from "./supervisor";
import type { ServiceHandle, ServiceKind, ServicesConfig, StartOutcome, StopOutcome } from "./types";

export type AppServiceKind = Exclude<ServiceKind, "database">;

export type ServiceStartResult = StartOutcome & { logFile?: string };

interface LaunchSpec {
  command: string;
  args: string[];
  cwd: string;
  port: number;
  attempts: number;
}

export interface ServiceManagerDeps {
  paths: Pick<Layout, "logs">;
  runner: CommandRunner;
  supervisor: ProcessSupervisor;
  config: ConfigStore;
  logger: Logger;
  now?: () => Date;
}

/**
 * Timestamp used in service log names: 20260131_235959
 */
export function logTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Backend and dashboard processes, tracked by the port they bind
 */
export class ServiceManager {
  constructor(private readonly deps: ServiceManagerDeps) {}

  async start(kind: AppServiceKind): Promise<ServiceStartResult> {
    const { paths, runner, supervisor, logger } = this.deps;
    const launch = await this.launchSpec(kind);

    const owner = await supervisor.isPortInUse(launch.port);
    if (owner.inUse) {
      return { status: "already-running", handle: { kind, pid: owner.pid, port: launch.port } };
    }

    await ensureDir(paths.logs);
    const now = this.deps.now ? this.deps.now() : new Date();
    const logFile = join(paths.logs, `${kind}_${logTimestamp(now)}.log`);

    logger.info(`Starting ${kind} on port ${launch.port}`);
    await runner.spawnDetached(launch.command, launch.args, { cwd: launch.cwd, logFile });

    const bound = await supervisor.waitForPort(launch.port, launch.attempts, INTERVALS.servicePoll);
    if (!bound) {
      throw new RoachyardError(ErrorCode.EXTERNAL_TOOL, `${kind} did not bind port ${launch.port}`, {
        logFile,
        hint: `tail -50 ${logFile}`,
      });
    }

    const { pid } = await supervisor.isPortInUse(launch.port);
    logger.success(`${kind} running at http://localhost:${launch.port}`);
    return { status: "started", handle: { kind, pid, port: launch.port }, logFile };
  }

  async stop(kind: AppServiceKind): Promise<StopOutcome> {
    const { supervisor } = this.deps;
    const port = portOf(kind, await this.deps.config.loadServices());

    const owner = await supervisor.isPortInUse(port);
    if (!owner.inUse) {
      return { status: "already-stopped" };
    }
    if (owner.pid === null || !(await supervisor.killProcess(owner.pid))) {
      throw new RoachyardError(ErrorCode.STOP_FAILED, `Could not stop ${kind} on port ${port}`, {
        pid: owner.pid,
        hint: owner.pid === null ? `lsof -i :${port}` : `kill -9 ${owner.pid}`,
      });
    }

    const released = await supervisor.waitForPortFree(port, LIMITS.serviceStopAttempts, INTERVALS.servicePoll);
    if (!released) {
      throw new RoachyardError(ErrorCode.STOP_FAILED, `${kind} still holds port ${port}`, {
        pid: owner.pid,
        hint: `kill -9 ${owner.pid}`,
      });
    }

    this.deps.logger.success(`${kind} stopped`);
    return { status: "stopped", forced: false };
  }

  /**
   * One handle per service; pid is null when nothing is running
   */
  async status(): Promise<ServiceHandle[]> {
    const { supervisor, config } = this.deps;
    const services = await config.loadServices();
    const cluster = await config.load();

    const handles: ServiceHandle[] = [];
    for (const kind of ["backend", "dashboard"] as const) {
      const port = portOf(kind, services);
      const { pid } = await supervisor.isPortInUse(port);
      handles.push({ kind, pid, port });
    }

    const [database] = await supervisor.findProcesses(COCKROACH_PROCESS_PATTERN);
    handles.push({ kind: "database", pid: database ? database.pid : null, port: cluster.sql_port });
    return handles;
  }

  private async launchSpec(kind: AppServiceKind): Promise<LaunchSpec> {
    const services = await this.deps.config.loadServices();
    const root = resolve(services.project_root);

    if (kind === "backend") {
      const binary = resolve(root, services.backend_binary);
      if (!(await fileExists(binary))) {
        throw new RoachyardError(ErrorCode.INVALID_STATE, `Backend binary not found: ${binary}`, {
          hint: "Build the backend first",
        });
      }
      return {
        command: binary,
        args: ["--api-port", String(services.backend_port)],
        cwd: root,
        port: services.backend_port,
        attempts: LIMITS.backendStartAttempts,
      };
    }

    const dir = resolve(root, services.dashboard_dir);
    if (!(await fileExists(join(dir, "package.json")))) {
      throw new RoachyardError(ErrorCode.INVALID_STATE, `Dashboard not found: ${dir}`);
    }
    return {
      command: "npm",
      args: ["run", "dev", "--", "--host", "--port", String(services.dashboard_port)],
      cwd: dir,
      port: services.dashboard_port,
      attempts: LIMITS.dashboardStartAttempts,
    };
  }
}

function portOf(kind: AppServiceKind, services: ServicesConfig): number {
  return kind === "backend" ? services.backend_port : services.dashboard_port;
}
