import type { AppContext } from "../lib/context";
import * as ui from "../lib/ui";
import { caServerCert, caServerStart, caServerStatus, caServerStop } from "./ca-server";
import { certsClient, certsCreateCa, certsFetchCa, certsNode, certsStatus } from "./certs";
import { clusterInit, clusterStart, clusterStop } from "./cluster";
import { configEdit, configShow } from "./config";
import { dbCreate, dbDrop, dbUser } from "./db";
import { install } from "./install";
import { migrateRun, migrateStatus } from "./migrate";
import { purge } from "./purge";
import { servicesStart, servicesStatus, servicesStop } from "./services";
import { setup } from "./setup";
import { status } from "./status";

export interface MenuEntry {
  value: string;
  label: string;
  run: (ctx: AppContext) => Promise<void>;
}

export const MENU_ENTRIES: MenuEntry[] = [
  { value: "status", label: "Show status", run: status },
  { value: "setup", label: "Run setup wizard", run: (ctx) => setup(ctx) },
  { value: "install", label: "Install cockroach", run: (ctx) => install(ctx) },
  { value: "config-show", label: "Show configuration", run: configShow },
  { value: "config-edit", label: "Edit configuration", run: configEdit },
  { value: "certs-status", label: "Certificate status", run: certsStatus },
  { value: "certs-create-ca", label: "Create CA", run: (ctx) => certsCreateCa(ctx) },
  { value: "certs-fetch-ca", label: "Fetch CA from a peer", run: (ctx) => certsFetchCa(ctx) },
  { value: "certs-node", label: "Issue node certificate", run: certsNode },
  { value: "certs-client", label: "Issue client certificate", run: certsClient },
  {
    value: "cluster-start-first",
    label: "Start node (first node)",
    run: (ctx) => clusterStart(ctx, { firstNode: true }),
  },
  { value: "cluster-start", label: "Start node (join)", run: (ctx) => clusterStart(ctx) },
  { value: "cluster-stop", label: "Stop node", run: clusterStop },
  { value: "cluster-init", label: "Initialize cluster", run: clusterInit },
  { value: "db-create", label: "Create database and migrate", run: dbCreate },
  { value: "db-drop", label: "Drop database", run: (ctx) => dbDrop(ctx) },
  { value: "db-user", label: "Create web user", run: (ctx) => dbUser(ctx, { generate: true }) },
  { value: "migrate-run", label: "Run pending migrations", run: migrateRun },
  { value: "migrate-status", label: "Migration status", run: migrateStatus },
  { value: "ca-server-start", label: "Start CA server", run: caServerStart },
  { value: "ca-server-stop", label: "Stop CA server", run: caServerStop },
  { value: "ca-server-status", label: "CA server status", run: caServerStatus },
  { value: "ca-server-cert", label: "Obtain CA server certificate", run: (ctx) => caServerCert(ctx) },
  { value: "backend-start", label: "Start backend", run: (ctx) => servicesStart(ctx, "backend") },
  { value: "backend-stop", label: "Stop backend", run: (ctx) => servicesStop(ctx, "backend") },
  { value: "dashboard-start", label: "Start dashboard", run: (ctx) => servicesStart(ctx, "dashboard") },
  { value: "dashboard-stop", label: "Stop dashboard", run: (ctx) => servicesStop(ctx, "dashboard") },
  { value: "services-status", label: "Service status", run: servicesStatus },
  { value: "purge", label: "Purge all data", run: (ctx) => purge(ctx) },
];

const EXIT = "exit";

/**
 * Interactive loop over every operation; a failed action is reported and the
 * loop continues
 */
export async function menu(ctx: AppContext): Promise<void> {
  ui.printBanner();

  const choices = [
    ...MENU_ENTRIES.map((entry) => ({ name: entry.label, value: entry.value })),
    { name: "Exit", value: EXIT },
  ];

  while (true) {
    const selected = await ui.select("What would you like to do?", choices);
    if (selected === EXIT) return;

    const entry = MENU_ENTRIES.find((e) => e.value === selected);
    if (!entry) continue;

    try {
      await entry.run(ctx);
    } catch (err) {
      ui.printError(err);
    }
    console.log();
  }
}
