import type { AppContext } from "../lib/context";
import * as ui from "../lib/ui";

export async function migrateRun(ctx: AppContext): Promise<void> {
  const run = await ctx.migrations.migrateAll();
  if (run.applied.length > 0) {
    ui.printKeyValue("Applied", run.applied.join(", "));
  }
}

export async function migrateStatus(ctx: AppContext): Promise<void> {
  const status = await ctx.migrations.status();
  const pending = new Set(status.pending.map((m) => m.version));

  ui.printSection("Migrations");
  ui.printKeyValue("Current version", String(status.currentVersion));
  ui.printKeyValue("Directory", ctx.migrations.directory);
  console.log();

  if (status.known.length === 0) {
    ui.muted("No migration files found.");
    return;
  }

  const table = ui.createTable(["Version", "File", "Status"]);
  for (const migration of status.known) {
    const state = pending.has(migration.version) ? ui.brand.warning("pending") : ui.brand.success("applied");
    table.push([String(migration.version), migration.filename, state]);
  }
  console.log(table.toString());
}

export async function migrateCreate(ctx: AppContext, name: string): Promise<void> {
  const migration = await ctx.migrations.createMigration(name);
  ui.printKeyValue("Version", String(migration.version));
  ui.muted(`Edit ${migration.path}, then run 'roachyard migrate run'.`);
}
