import type { AppContext } from "../lib/context";
import { ErrorCode, RoachyardError } from "../lib/errors";
import type { AppServiceKind } from "../lib/services";
import * as ui from "../lib/ui";

const KINDS: AppServiceKind[] = ["backend", "dashboard"];

export function parseServiceKind(value: string): AppServiceKind {
  const kind = KINDS.find((k) => k === value);
  if (!kind) {
    throw new RoachyardError(ErrorCode.CONFIG_INVALID, `Unknown service "${value}" (expected backend or dashboard)`);
  }
  return kind;
}

export async function servicesStart(ctx: AppContext, kind: AppServiceKind): Promise<void> {
  const spin = ui.spinner(`Starting ${kind}...`).start();
  try {
    const result = await ctx.services.start(kind);
    if (result.status === "already-running") {
      spin.info(`${kind} is already running on port ${result.handle.port}`);
      return;
    }
    spin.succeed(`${kind} started on port ${result.handle.port}`);
    if (result.logFile) ui.muted(`Logs: tail -f ${result.logFile}`);
  } catch (err) {
    spin.fail(`Failed to start ${kind}`);
    throw err;
  }
}

export async function servicesStop(ctx: AppContext, kind: AppServiceKind): Promise<void> {
  const spin = ui.spinner(`Stopping ${kind}...`).start();
  try {
    const result = await ctx.services.stop(kind);
    if (result.status === "already-stopped") {
      spin.info(`${kind} is not running`);
    } else {
      spin.succeed(`${kind} stopped`);
    }
  } catch (err) {
    spin.fail(`Failed to stop ${kind}`);
    throw err;
  }
}

export async function servicesStatus(ctx: AppContext): Promise<void> {
  const handles = await ctx.services.status();

  const table = ui.createTable(["Service", "Status", "PID", "Port"]);
  for (const handle of handles) {
    table.push([
      ui.brand.primary(handle.kind),
      ui.formatStatus(handle.pid !== null ? "running" : "stopped"),
      handle.pid !== null ? String(handle.pid) : "-",
      String(handle.port),
    ]);
  }

  console.log();
  console.log(table.toString());
}
