import { readFile } from "fs/promises";
import type { IncomingMessage, ServerResponse } from "http";
import { createServer, type Server } from "https";
import type { LayoutFiles } from "./constants";
import type { ConfigStore } from "./config";
import { ErrorCode, RoachyardError, errorMessage } from "./errors";
import type { CommandRunner } from "./exec";
import { fileExists, readPidFile, removeFile, writePidFile } from "./fs";
import type { Logger } from "./logger";
import type { ProcessSupervisor } from "./supervisor";
import type { CaServerStart, StopOutcome } from "./types";

// =============================================================================
// REQUEST HANDLING
// =============================================================================

const SERVED_PATHS = new Set(["/", "/ca.crt"]);

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => void;

/**
 * Handler serving the CA certificate at / and /ca.crt, and 404 for the rest
 */
export function createCaRequestHandler(caCertPath: string, logger: Logger): RequestHandler {
  return (req, res) => {
    serveCa(caCertPath, req, res).catch((err: unknown) => {
      logger.error(`Request ${req.url ?? ""} failed: ${errorMessage(err)}`);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "text/plain" });
      }
      res.end();
    });
  };
}

async function serveCa(caCertPath: string, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

  if (req.method !== "GET" || !SERVED_PATHS.has(pathname)) {
    sendNotFound(res, "Not Found");
    return;
  }

  let body: Buffer;
  try {
    body = await readFile(caCertPath);
  } catch {
    sendNotFound(res, "CA certificate not found");
    return;
  }

  res.writeHead(200, {
    "Content-Type": "application/x-x509-ca-cert",
    "Content-Disposition": 'attachment; filename="ca.crt"',
    "Content-Length": body.length,
  });
  res.end(body);
}

function sendNotFound(res: ServerResponse, message: string): void {
  res.writeHead(404, { "Content-Type": "text/plain" });
  res.end(message);
}

// =============================================================================
// FOREGROUND SERVER
// =============================================================================

export interface CaServerOptions {
  port: number;
  host?: string;
  caCertPath: string;
  tlsCertPath: string;
  tlsKeyPath: string;
  logger: Logger;
}

/**
 * Start the HTTPS server and resolve once it is listening
 */
export async function listenCaServer(options: CaServerOptions): Promise<Server> {
  const [cert, key] = await Promise.all([readFile(options.tlsCertPath), readFile(options.tlsKeyPath)]);
  const server = createServer({ cert, key }, createCaRequestHandler(options.caCertPath, options.logger));
  const host = options.host ?? "0.0.0.0";

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  options.logger.info(`CA server listening on https://${host}:${options.port}/ca.crt`);
  return server;
}

/**
 * Serve until SIGTERM or SIGINT, then close and resolve
 */
export async function runCaServer(options: CaServerOptions): Promise<void> {
  const server = await listenCaServer(options);

  await new Promise<void>((resolve, reject) => {
    const shutdown = (signal: NodeJS.Signals) => {
      options.logger.info(`Received ${signal}, shutting down`);
      server.close((err) => (err ? reject(err) : resolve()));
    };
    process.once("SIGTERM", shutdown);
    process.once("SIGINT", shutdown);
  });
}

// =============================================================================
// BACKGROUND CONTROL
// =============================================================================

export interface CaServerLauncher {
  command: string;
  args: string[];
}

export interface CaServerControllerDeps {
  files: Pick<LayoutFiles, "caCert" | "transportCert" | "transportKey" | "caServerPid" | "caServerLog">;
  runner: CommandRunner;
  supervisor: ProcessSupervisor;
  config: ConfigStore;
  logger: Logger;
  launcher: CaServerLauncher;
}

/**
 * Runs the CA server as a detached process tracked by a PID file
 */
export class CaServerController {
  constructor(private readonly deps: CaServerControllerDeps) {}

  async runningPid(): Promise<number | null> {
    const pid = await readPidFile(this.deps.files.caServerPid);
    if (pid === null) return null;
    return (await this.deps.supervisor.isProcessAlive(pid)) ? pid : null;
  }

  async start(): Promise<CaServerStart> {
    const { files, runner, config, logger, launcher } = this.deps;

    const existing = await this.runningPid();
    if (existing !== null) {
      return { status: "already-running", pid: existing };
    }

    if (!(await fileExists(files.caCert))) {
      throw new RoachyardError(ErrorCode.INVALID_STATE, "ca.crt does not exist; generate certificates first");
    }
    if (!(await fileExists(files.transportCert)) || !(await fileExists(files.transportKey))) {
      throw new RoachyardError(ErrorCode.INVALID_STATE, "TLS certificate for the CA server not found", {
        hint: "Run 'roachyard ca-server cert' to request one",
      });
    }

    const pid = await runner.spawnDetached(launcher.command, launcher.args, { logFile: files.caServerLog });
    await writePidFile(files.caServerPid, pid);

    const { domain, ca_server_port } = await config.load();
    logger.success(`CA server started (PID ${pid}) at https://${domain}:${ca_server_port}/ca.crt`);
    return { status: "started", pid };
  }

  async stop(): Promise<StopOutcome> {
    const { files, supervisor, logger } = this.deps;

    const pid = await readPidFile(files.caServerPid);
    if (pid === null) {
      return { status: "already-stopped" };
    }

    if (!(await supervisor.isProcessAlive(pid))) {
      await removeFile(files.caServerPid);
      logger.detail(`Removed stale PID file for ${pid}`);
      return { status: "already-stopped" };
    }

    if (!(await supervisor.killProcess(pid))) {
      throw new RoachyardError(ErrorCode.STOP_FAILED, `Could not signal CA server (PID ${pid})`, {
        hint: `kill ${pid}`,
      });
    }

    await removeFile(files.caServerPid);
    return { status: "stopped", forced: false };
  }
}
