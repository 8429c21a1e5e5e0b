import { obtainTransportCertificate } from "../lib/acme";
import { runCaServer } from "../lib/ca-server";
import type { AppContext } from "../lib/context";
import { ErrorCode, RoachyardError } from "../lib/errors";
import { fileExists } from "../lib/fs";
import { createLineLogger } from "../lib/logger";
import * as ui from "../lib/ui";

export async function caServerStart(ctx: AppContext): Promise<void> {
  const spin = ui.spinner("Starting CA server...").start();
  try {
    const result = await ctx.caServer.start();
    if (result.status === "already-running") {
      spin.info(`CA server is already running (PID ${result.pid})`);
      return;
    }
    spin.succeed(`CA server started (PID ${result.pid})`);
    const { domain, ca_server_port } = await ctx.config.load();
    ui.printPanel(`https://${domain}:${ca_server_port}/ca.crt`, "Peers fetch the cluster CA from");
  } catch (err) {
    spin.fail("Failed to start CA server");
    throw err;
  }
}

export async function caServerStop(ctx: AppContext): Promise<void> {
  const result = await ctx.caServer.stop();
  if (result.status === "already-stopped") {
    ui.info("CA server is not running");
  } else {
    ui.success("CA server stopped");
  }
}

export async function caServerStatus(ctx: AppContext): Promise<void> {
  const pid = await ctx.caServer.runningPid();
  const { domain, ca_server_port } = await ctx.config.load();

  ui.printSection("CA server");
  ui.printKeyValue("Status", ui.formatStatus(pid !== null ? "running" : "stopped"));
  if (pid !== null) ui.printKeyValue("PID", String(pid));
  ui.printKeyValue("URL", `https://${domain}:${ca_server_port}/ca.crt`);
  ui.printKeyValue(
    "TLS certificate",
    ui.formatStatus((await fileExists(ctx.files.transportCert)) ? "present" : "missing")
  );
}

/**
 * Request the Let's Encrypt certificate the CA server presents
 */
export async function caServerCert(ctx: AppContext, options: { yes?: boolean } = {}): Promise<void> {
  const config = await ctx.config.load();

  if (!options.yes) {
    ui.warning("Before continuing make sure that:");
    ui.printKeyValue("DNS", `${config.domain} resolves to this host`);
    ui.printKeyValue("Firewall", `port ${config.ca_server_port} is reachable from the internet`);
    const confirmed = await ui.confirm("Request the certificate now?", true);
    if (!confirmed) {
      ui.info("Cancelled.");
      return;
    }
  }

  const result = await obtainTransportCertificate(config, {
    runner: ctx.runner,
    logger: ctx.logger,
    letsencryptDir: ctx.paths.letsencrypt,
  });
  ui.printKeyValue("Certificate", result.certPath);
  ui.printKeyValue("Key", result.keyPath);
}

/**
 * Foreground server, run by the detached process `start` launches
 */
export async function caServerRun(ctx: AppContext): Promise<void> {
  const logger = createLineLogger();
  const { ca_server_port } = await ctx.config.load();

  if (!(await fileExists(ctx.files.caCert))) {
    throw new RoachyardError(ErrorCode.INVALID_STATE, `${ctx.files.caCert} does not exist`);
  }

  await runCaServer({
    port: ca_server_port,
    caCertPath: ctx.files.caCert,
    tlsCertPath: ctx.files.transportCert,
    tlsKeyPath: ctx.files.transportKey,
    logger,
  });
  logger.info("CA server stopped");
}
