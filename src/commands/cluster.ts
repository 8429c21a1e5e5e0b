import type { AppContext } from "../lib/context";
import * as ui from "../lib/ui";

interface StartOptions {
  firstNode?: boolean;
}

export async function clusterStart(ctx: AppContext, options: StartOptions = {}): Promise<void> {
  const spin = ui.spinner("Starting cockroach...").start();

  try {
    const result = await ctx.cluster.start({ isFirstNode: options.firstNode ?? false });

    if (result.status === "already-running") {
      spin.info(`cockroach is already running (PID ${result.handle.pid ?? "?"})`);
      return;
    }

    spin.succeed(`cockroach started (PID ${result.handle.pid ?? "?"})`);
    if (result.caServer) {
      ui.printKeyValue("CA server", `PID ${result.caServer.pid}`);
    } else if (result.caServerError) {
      ui.warning(`CA server not started: ${result.caServerError}`);
    }
    ui.muted(`Logs: tail -f ${ctx.files.cockroachLog}`);
  } catch (err) {
    spin.fail("Failed to start cockroach");
    throw err;
  }
}

export async function clusterStop(ctx: AppContext): Promise<void> {
  const spin = ui.spinner("Stopping cockroach...").start();

  try {
    const result = await ctx.cluster.stop();
    if (result.status === "already-stopped") {
      spin.info("cockroach is not running");
    } else if (result.forced) {
      spin.warn("cockroach force stopped");
    } else {
      spin.succeed("cockroach stopped");
    }
  } catch (err) {
    spin.fail("Failed to stop cockroach");
    throw err;
  }
}

export async function clusterInit(ctx: AppContext): Promise<void> {
  const spin = ui.spinner("Initializing cluster...").start();

  try {
    const result = await ctx.cluster.initCluster();
    if (result.status === "already-initialized") {
      spin.info("Cluster was already initialized");
      return;
    }

    spin.succeed("Cluster initialized");
    if (result.database.ok) {
      const { applied, currentVersion } = result.database.run;
      ui.success(`Database ready, ${applied.length} migration(s) applied (schema version ${currentVersion})`);
    } else {
      ui.warning(`Database setup failed: ${result.database.error}`);
      ui.muted("Retry with 'roachyard db create'.");
    }
  } catch (err) {
    spin.fail("Failed to initialize cluster");
    throw err;
  }
}
