import { parsePort } from "../lib/config";
import type { AppContext } from "../lib/context";
import { ErrorCode, RoachyardError } from "../lib/errors";
import type { ClusterConfig, ServicesConfig } from "../lib/types";
import * as ui from "../lib/ui";

const CLUSTER_PORT_KEYS = ["sql_port", "http_port", "ca_server_port"] as const;
const CLUSTER_TEXT_KEYS = ["domain", "database_name", "admin_user", "admin_password", "ca_server_email"] as const;
const SERVICES_PORT_KEYS = ["backend_port", "dashboard_port"] as const;
const SERVICES_TEXT_KEYS = ["project_root", "backend_binary", "dashboard_dir"] as const;

function includes<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((item) => item === value);
}

/**
 * Turn `key value` from the command line into a partial section update
 */
export function parseSetting(
  key: string,
  value: string
): { section: "cluster"; fields: Partial<ClusterConfig> } | { section: "services"; fields: Partial<ServicesConfig> } {
  if (key.startsWith("services.")) {
    const field = key.slice("services.".length);
    const fields: Partial<ServicesConfig> = {};
    if (includes(SERVICES_PORT_KEYS, field)) {
      fields[field] = parsePort(value);
      return { section: "services", fields };
    }
    if (includes(SERVICES_TEXT_KEYS, field)) {
      fields[field] = value;
      return { section: "services", fields };
    }
  } else {
    const fields: Partial<ClusterConfig> = {};
    if (includes(CLUSTER_PORT_KEYS, key)) {
      fields[key] = parsePort(value);
      return { section: "cluster", fields };
    }
    if (includes(CLUSTER_TEXT_KEYS, key)) {
      fields[key] = value;
      return { section: "cluster", fields };
    }
    if (key === "cluster_nodes") {
      const nodes = value.split(",").map((node) => node.trim()).filter((node) => node.length > 0);
      return { section: "cluster", fields: { cluster_nodes: nodes } };
    }
  }

  const known = [
    ...CLUSTER_PORT_KEYS,
    ...CLUSTER_TEXT_KEYS,
    "cluster_nodes",
    ...[...SERVICES_PORT_KEYS, ...SERVICES_TEXT_KEYS].map((k) => `services.${k}`),
  ];
  throw new RoachyardError(ErrorCode.CONFIG_INVALID, `Unknown setting "${key}"`, { known: known.join(", ") });
}

export async function configShow(ctx: AppContext): Promise<void> {
  const cluster = await ctx.config.load();
  const services = await ctx.config.loadServices();

  ui.printSection("Cluster");
  const clusterTable = ui.createTable(["Key", "Value"]);
  for (const [key, value] of Object.entries(cluster)) {
    const shown = key === "admin_password" ? "••••••" : Array.isArray(value) ? value.join(", ") || "(none)" : String(value);
    clusterTable.push([key, shown]);
  }
  console.log(clusterTable.toString());

  ui.printSection("Services");
  const servicesTable = ui.createTable(["Key", "Value"]);
  for (const [key, value] of Object.entries(services)) {
    servicesTable.push([`services.${key}`, String(value)]);
  }
  console.log(servicesTable.toString());

  console.log();
  ui.muted(`File: ${ctx.config.path}`);
}

export async function configSet(ctx: AppContext, key: string, value: string): Promise<void> {
  const setting = parseSetting(key, value);
  if (setting.section === "cluster") {
    await ctx.config.save(setting.fields);
  } else {
    await ctx.config.saveServices(setting.fields);
  }
  ui.success(`${key} updated`);
}

export async function configAddNode(ctx: AppContext, node: string): Promise<void> {
  const { cluster_nodes } = await ctx.config.load();
  if (cluster_nodes.includes(node)) {
    ui.info(`${node} is already listed`);
    return;
  }
  await ctx.config.save({ cluster_nodes: [...cluster_nodes, node] });
  ui.success(`Added ${node}`);
}

export async function configRemoveNode(ctx: AppContext, node: string): Promise<void> {
  const { cluster_nodes } = await ctx.config.load();
  if (!cluster_nodes.includes(node)) {
    ui.info(`${node} is not listed`);
    return;
  }
  await ctx.config.save({ cluster_nodes: cluster_nodes.filter((entry) => entry !== node) });
  ui.success(`Removed ${node}`);
}

/**
 * Prompt for every cluster setting, prefilled with the current values
 */
export async function configEdit(ctx: AppContext): Promise<void> {
  const current = await ctx.config.load();
  const portCheck = (value: string): true | string => {
    try {
      parsePort(value);
      return true;
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  };

  const domain = await ui.input("Domain of this node", current.domain);
  const sqlPort = await ui.input("SQL port", String(current.sql_port), portCheck);
  const httpPort = await ui.input("HTTP console port", String(current.http_port), portCheck);
  const caPort = await ui.input("CA server port", String(current.ca_server_port), portCheck);
  const nodes = await ui.input("Peers (host:port, comma separated)", current.cluster_nodes.join(","));
  const email = await ui.input("Email for TLS certificates", current.ca_server_email);

  await ctx.config.save({
    domain,
    sql_port: parsePort(sqlPort),
    http_port: parsePort(httpPort),
    ca_server_port: parsePort(caPort),
    cluster_nodes: nodes.split(",").map((node) => node.trim()).filter((node) => node.length > 0),
    ca_server_email: email,
  });
  ui.success("Configuration saved");
}
