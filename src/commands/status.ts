import type { AppContext } from "../lib/context";
import * as ui from "../lib/ui";

/**
 * One-screen overview of every moving part on this host
 */
export async function status(ctx: AppContext): Promise<void> {
  const spin = ui.spinner("Collecting status...").start();

  const version = await ctx.binary.version();
  const certs = await ctx.certs.status();
  const handles = await ctx.services.status();
  const caServerPid = await ctx.caServer.runningPid();
  const config = await ctx.config.load();
  const database = handles.find((h) => h.kind === "database");
  const schemaVersion = database && database.pid !== null ? await ctx.migrations.currentVersion() : null;

  spin.stop();

  ui.printSection("Node");
  ui.printKeyValue("Home", ctx.home);
  ui.printKeyValue("cockroach", version ?? ui.brand.warning("not installed"));
  ui.printKeyValue("Domain", config.domain);
  ui.printKeyValue("Peers", config.cluster_nodes.length > 0 ? config.cluster_nodes.join(", ") : "(none)");
  ui.printKeyValue("Certificates", certs.state + (certs.stale.length > 0 ? ui.brand.error(` (${certs.stale.length} stale)`) : ""));
  ui.printKeyValue("Schema version", schemaVersion === null ? "-" : String(schemaVersion));

  ui.printSection("Processes");
  const table = ui.createTable(["Service", "Status", "PID", "Port"]);
  for (const handle of handles) {
    table.push([
      ui.brand.primary(handle.kind),
      ui.formatStatus(handle.pid !== null ? "running" : "stopped"),
      handle.pid !== null ? String(handle.pid) : "-",
      String(handle.port),
    ]);
  }
  table.push([
    ui.brand.primary("ca-server"),
    ui.formatStatus(caServerPid !== null ? "running" : "stopped"),
    caServerPid !== null ? String(caServerPid) : "-",
    String(config.ca_server_port),
  ]);
  console.log(table.toString());
}
