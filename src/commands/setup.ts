import type { AppContext } from "../lib/context";
import { ensureDirectories } from "../lib/fs";
import { getPrimaryIp } from "../lib/network";
import * as ui from "../lib/ui";
import { certsInit } from "./certs";
import { configEdit } from "./config";
import { install } from "./install";

interface SetupOptions {
  firstNode?: boolean;
  yes?: boolean;
}

/**
 * First-run wizard: directories, binary, configuration, certificates
 */
export async function setup(ctx: AppContext, options: SetupOptions = {}): Promise<void> {
  ui.printBanner();

  const dirSpin = ui.spinner("Creating data directories...").start();
  await ensureDirectories(ctx.paths);
  dirSpin.succeed(`Data directories ready in ${ctx.home}`);

  if (!(await ctx.binary.isInstalled())) {
    ui.warning("cockroach is not installed.");
    const proceed = options.yes || (await ui.confirm("Download and install it now?", true));
    if (!proceed) {
      ui.muted("Run 'roachyard install' when ready, then 'roachyard setup' again.");
      return;
    }
    await install(ctx);
  } else {
    ui.success(`cockroach found: ${(await ctx.binary.version()) ?? "unknown version"}`);
  }

  const ip = await getPrimaryIp(ctx.runner);
  ui.printKeyValue("Primary IP", ip);

  if (!options.yes) {
    ui.printSection("Configuration");
    await configEdit(ctx);
  }

  const firstNode =
    options.firstNode ??
    (options.yes ? false : await ui.confirm("Is this the first node of the cluster?", false));

  ui.printSection("Certificates");
  await certsInit(ctx, { firstNode });

  console.log();
  ui.success("Setup complete");
  ui.printSection("Next steps");
  ui.printKeyValue("Start the node", `roachyard cluster start${firstNode ? " --first-node" : ""}`);
  if (firstNode) {
    ui.printKeyValue("Bootstrap", "roachyard cluster init");
    ui.printKeyValue("Web user", "roachyard db user --generate");
  }
  console.log();
  ui.muted("Run 'roachyard --help' for all available commands.");
}
