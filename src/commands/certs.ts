import type { AppContext } from "../lib/context";
import { ErrorCode, isRoachyardError } from "../lib/errors";
import type { CertificateSet, ClientCertResult } from "../lib/types";
import * as ui from "../lib/ui";

const CERT_FILES: Array<keyof CertificateSet> = [
  "caCert",
  "caKey",
  "nodeCert",
  "nodeKey",
  "clientCert",
  "clientKey",
  "clientKeyPkcs8",
];

interface CreateCaOptions {
  regenerate?: boolean;
  force?: boolean;
}

export async function certsStatus(ctx: AppContext): Promise<void> {
  const status = await ctx.certs.status();
  const { files } = ctx.certs;

  ui.printSection("Certificates");
  ui.printKeyValue("State", ui.brand.highlight(status.state));
  ui.printKeyValue("Directory", ctx.paths.certs);
  console.log();

  const table = ui.createTable(["File", "Status"]);
  for (const key of CERT_FILES) {
    const path = files[key];
    const label = status.stale.includes(path) ? "stale" : status.present[key] ? "present" : "missing";
    table.push([path, ui.formatStatus(label)]);
  }
  console.log(table.toString());

  if (status.stale.length > 0) {
    console.log();
    ui.warning("Stale certificates were signed by a previous CA.");
    ui.muted("Re-issue them with 'roachyard certs node' and 'roachyard certs client'.");
  }
}

export async function certsCreateCa(ctx: AppContext, options: CreateCaOptions = {}): Promise<void> {
  if (options.regenerate) {
    if (!options.force) {
      ui.warning("Regenerating the CA invalidates every node and client certificate it signed.");
      const confirmed = await ui.confirm("Replace the CA?");
      if (!confirmed) {
        ui.info("Cancelled.");
        return;
      }
    }

    const spin = ui.spinner("Regenerating CA...").start();
    try {
      const status = await ctx.certs.regenerateCA();
      spin.succeed("CA regenerated");
      for (const path of status.stale) {
        ui.printKeyValue("Stale", path);
      }
    } catch (err) {
      spin.fail("Failed to regenerate CA");
      throw err;
    }
    return;
  }

  const spin = ui.spinner("Creating CA...").start();
  try {
    await ctx.certs.createCA();
    spin.succeed(`CA created at ${ctx.files.caCert}`);
  } catch (err) {
    spin.fail("Failed to create CA");
    throw err;
  }
}

export async function certsFetchCa(ctx: AppContext, options: { url?: string } = {}): Promise<void> {
  const spin = ui.spinner("Fetching CA from cluster...").start();
  try {
    if (options.url) {
      await ctx.certs.fetchCAFromPeer(options.url);
      spin.succeed(`CA downloaded from ${options.url}`);
    } else {
      const url = await ctx.certs.fetchCAFromPeers();
      spin.succeed(`CA downloaded from ${url}`);
    }
  } catch (err) {
    spin.fail("Could not fetch the CA");
    throw err;
  }
}

export async function certsNode(ctx: AppContext): Promise<void> {
  const spin = ui.spinner("Issuing node certificate...").start();
  try {
    const sans = await ctx.certs.issueNodeCert();
    spin.succeed("Node certificate issued");
    ui.printKeyValue("SAN", sans.join(" "));
  } catch (err) {
    spin.fail("Failed to issue node certificate");
    throw err;
  }
}

export async function certsClient(ctx: AppContext): Promise<void> {
  const spin = ui.spinner("Issuing client certificate...").start();
  let result: ClientCertResult;
  try {
    result = await ctx.certs.issueClientCert();
  } catch (err) {
    spin.fail("Failed to issue client certificate");
    throw err;
  }

  if (result.pkcs8KeyPath) {
    spin.succeed("Client certificate issued");
    ui.printKeyValue("PKCS#8 key", result.pkcs8KeyPath);
  } else {
    spin.warn("Client certificate issued without a PKCS#8 key");
    ui.printKeyValue("Error", result.conversionError ?? "unknown");
  }
}

/**
 * Walk the whole chain from the current state: CA, node, client
 */
export async function certsInit(ctx: AppContext, options: { firstNode: boolean }): Promise<void> {
  let { state } = await ctx.certs.status();

  if (state === "none") {
    if (options.firstNode) {
      await certsCreateCa(ctx);
    } else {
      try {
        await certsFetchCa(ctx);
      } catch (err) {
        if (!isRoachyardError(err, ErrorCode.PEER_UNREACHABLE)) throw err;
        ui.warning("No peer served a CA; creating a new one for this node.");
        await certsCreateCa(ctx);
      }
    }
    state = (await ctx.certs.status()).state;
  }

  if (state === "has-ca") {
    await certsNode(ctx);
    state = (await ctx.certs.status()).state;
  }

  if (state === "has-node-cert") {
    await certsClient(ctx);
  }
}
