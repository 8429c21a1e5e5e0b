import type { AppContext } from "../lib/context";
import * as ui from "../lib/ui";

const CONFIRMATIONS = [
  "Delete ALL cluster data?",
  "Are you completely sure? (second confirmation)",
  "Last chance. This cannot be undone. Continue?",
];

export async function purge(ctx: AppContext, options: { force?: boolean } = {}): Promise<void> {
  const targets = await ctx.cluster.purgeTargets();

  console.log();
  ui.warning("This permanently deletes:");
  for (const target of targets) {
    ui.printKeyValue(target.path, ui.formatBytes(target.bytes));
  }
  ui.muted("The configuration file and the cockroach binary are kept.");
  console.log();

  if (!options.force) {
    for (const question of CONFIRMATIONS) {
      if (!(await ui.confirm(question))) {
        ui.info("Purge cancelled.");
        return;
      }
    }
  }

  if ((await ctx.cluster.runningPid()) !== null) {
    const stop = options.force || (await ui.confirm("cockroach is running. Stop it now?", true));
    if (!stop) {
      ui.info("Purge cancelled.");
      return;
    }
    await ctx.cluster.stop();
  }

  const spin = ui.spinner("Removing data...").start();
  try {
    const removed = await ctx.cluster.purge();
    spin.succeed(`Removed ${removed.length} item(s)`);
  } catch (err) {
    spin.fail("Purge failed");
    throw err;
  }
}
