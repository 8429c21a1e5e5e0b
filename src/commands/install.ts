import type { AppContext } from "../lib/context";
import * as ui from "../lib/ui";

export async function install(ctx: AppContext, options: { force?: boolean } = {}): Promise<void> {
  if (!options.force && (await ctx.binary.isInstalled())) {
    const version = await ctx.binary.version();
    ui.info(`cockroach is already installed${version ? ` (${version})` : ""}`);
    ui.muted("Use --force to reinstall.");
    return;
  }

  const spin = ui.spinner("Downloading cockroach...").start();
  try {
    const path = await ctx.binary.install();
    spin.succeed(`cockroach installed at ${path}`);
  } catch (err) {
    spin.fail("Failed to install cockroach");
    throw err;
  }

  const version = await ctx.binary.version();
  if (version) ui.printKeyValue("Version", version);
}
