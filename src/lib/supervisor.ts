import { setTimeout as delay } from "timers/promises";
import type { CommandRunner } from "./exec";
import type { PortOwner, ProcessInfo } from "./types";

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface SupervisorOptions {
  sleep?: Sleep;
  /** Pid never reported by findProcesses (defaults to this process) */
  ownPid?: number;
}

/**
 * Port and process lookups over lsof, kill and ps
 */
export class ProcessSupervisor {
  private readonly sleep: Sleep;
  private readonly ownPid: number;

  constructor(
    private readonly runner: CommandRunner,
    options: SupervisorOptions = {}
  ) {
    this.sleep = options.sleep ?? realSleep;
    this.ownPid = options.ownPid ?? process.pid;
  }

  /**
   * Check whether something listens on a port, and who
   */
  async isPortInUse(port: number): Promise<PortOwner> {
    const result = await this.runner.run("lsof", ["-i", `:${port}`, "-t"]);
    if (result.exitCode !== 0) {
      return { inUse: false, pid: null };
    }

    const first = result.stdout.split("\n").map((line) => line.trim()).find((line) => line.length > 0);
    if (!first) {
      return { inUse: false, pid: null };
    }

    const pid = parseInt(first, 10);
    return { inUse: true, pid: Number.isInteger(pid) ? pid : null };
  }

  /**
   * Send SIGTERM, or SIGKILL when forced. True when kill succeeded.
   */
  async killProcess(pid: number, force: boolean = false): Promise<boolean> {
    const result = await this.runner.run("kill", [force ? "-9" : "-15", String(pid)]);
    return result.exitCode === 0;
  }

  /**
   * Poll until the port is bound, at most maxAttempts checks
   */
  async waitForPort(port: number, maxAttempts: number, intervalMs: number): Promise<boolean> {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const { inUse } = await this.isPortInUse(port);
      if (inUse) return true;
      if (attempt < maxAttempts) {
        await this.sleep(intervalMs);
      }
    }
    return false;
  }

  /**
   * Poll until nothing listens on the port
   */
  async waitForPortFree(port: number, maxAttempts: number, intervalMs: number): Promise<boolean> {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const { inUse } = await this.isPortInUse(port);
      if (!inUse) return true;
      if (attempt < maxAttempts) {
        await this.sleep(intervalMs);
      }
    }
    return false;
  }

  async isProcessAlive(pid: number): Promise<boolean> {
    const result = await this.runner.run("kill", ["-0", String(pid)]);
    return result.exitCode === 0;
  }

  /**
   * Processes whose full command line contains pattern as a literal substring
   */
  async findProcesses(pattern: string): Promise<ProcessInfo[]> {
    const result = await this.runner.run("ps", ["-eo", "pid=,args="]);
    if (result.exitCode !== 0) return [];

    const matches: ProcessInfo[] = [];
    for (const line of result.stdout.split("\n")) {
      const match = /^\s*(\d+)\s+(.*)$/.exec(line);
      if (!match) continue;

      const pid = parseInt(match[1], 10);
      const args = match[2];
      if (pid === this.ownPid || !args.includes(pattern)) continue;
      matches.push({ pid, args });
    }
    return matches;
  }

  /**
   * Kill every process matching pattern. Returns the pids that were signalled.
   */
  async killByPattern(pattern: string, force: boolean = false): Promise<number[]> {
    const killed: number[] = [];
    for (const { pid } of await this.findProcesses(pattern)) {
      if (await this.killProcess(pid, force)) {
        killed.push(pid);
      }
    }
    return killed;
  }
}
