import { userInfo } from "os";
import { join } from "path";
import { CLUSTER_DEFAULTS } from "./constants";
import { ErrorCode, RoachyardError } from "./errors";
import { type CommandRunner, runOrThrow } from "./exec";
import { ensureDir } from "./fs";
import type { Logger } from "./logger";
import type { ClusterConfig } from "./types";

const LIVE_DIR = "/etc/letsencrypt/live";

export interface AcmeOptions {
  runner: CommandRunner;
  logger: Logger;
  letsencryptDir: string;
  /** Prefix privileged commands with sudo (off when already root) */
  sudo?: boolean;
}

export async function isCertbotInstalled(runner: CommandRunner): Promise<boolean> {
  const result = await runner.run("which", ["certbot"]);
  return result.exitCode === 0;
}

/**
 * Request a Let's Encrypt certificate for the configured domain with an HTTP-01
 * challenge on the CA server port, then copy it where the CA server reads it.
 */
export async function obtainTransportCertificate(
  config: Pick<ClusterConfig, "domain" | "ca_server_email" | "ca_server_port">,
  options: AcmeOptions
): Promise<{ certPath: string; keyPath: string }> {
  const { runner, logger, letsencryptDir } = options;
  const useSudo = options.sudo ?? !isRoot();

  if (!config.domain || config.domain === CLUSTER_DEFAULTS.domain) {
    throw new RoachyardError(ErrorCode.CONFIG_INVALID, "Set a public domain before requesting a certificate", {
      domain: config.domain,
    });
  }
  if (!config.ca_server_email) {
    throw new RoachyardError(ErrorCode.CONFIG_INVALID, "Set ca_server_email before requesting a certificate");
  }
  if (!(await isCertbotInstalled(runner))) {
    throw new RoachyardError(ErrorCode.EXTERNAL_TOOL, "certbot is not installed");
  }

  const privileged = (command: string, args: string[]) =>
    useSudo ? runOrThrow(runner, "sudo", [command, ...args]) : runOrThrow(runner, command, args);

  logger.info(`Requesting certificate for ${config.domain}`);
  await privileged("certbot", [
    "certonly",
    "--standalone",
    "--preferred-challenges", "http",
    "--http-01-port", String(config.ca_server_port),
    "-d", config.domain,
    "--email", config.ca_server_email,
    "--agree-tos",
    "--non-interactive",
  ]);

  await ensureDir(letsencryptDir);
  const certPath = join(letsencryptDir, "fullchain.pem");
  const keyPath = join(letsencryptDir, "privkey.pem");
  const live = join(LIVE_DIR, config.domain);

  await privileged("cp", [join(live, "fullchain.pem"), certPath]);
  await privileged("cp", [join(live, "privkey.pem"), keyPath]);

  if (useSudo) {
    const { username } = userInfo();
    await privileged("chown", [`${username}:${username}`, certPath, keyPath]);
  }

  logger.success(`Certificate copied to ${letsencryptDir}`);
  return { certPath, keyPath };
}

function isRoot(): boolean {
  return typeof process.getuid === "function" && process.getuid() === 0;
}
