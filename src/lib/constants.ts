import { homedir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";

// =============================================================================
// VERSION
// =============================================================================

export const VERSION = "1.0.0";

// =============================================================================
// PATHS & DIRECTORIES
// =============================================================================

/**
 * Base directory for all Roachyard data.
 * ROACHYARD_HOME relocates the whole layout (useful for tests and sandboxes).
 */
export function getRoachyardHome(): string {
  return process.env.ROACHYARD_HOME || join(homedir(), ".roachyard");
}

export interface Layout {
  root: string;
  config: string;
  certs: string;
  store: string;
  state: string;
  logs: string;
  letsencrypt: string;
}

export interface LayoutFiles {
  config: string;
  caCert: string;
  caKey: string;
  nodeCert: string;
  nodeKey: string;
  clientCert: string;
  clientKey: string;
  clientKeyPkcs8: string;
  transportCert: string;
  transportKey: string;
  cockroachPid: string;
  caServerPid: string;
  cockroachLog: string;
  caServerLog: string;
  webCredentials: string;
}

export function getPaths(home: string = getRoachyardHome()): Layout {
  return {
    root: home,
    config: join(home, "config"),
    certs: join(home, "certs"),
    store: join(home, "cockroach-data"),
    state: join(home, "state"),
    logs: join(home, "logs"),
    letsencrypt: join(home, "letsencrypt"),
  };
}

export function getFiles(paths: Layout = getPaths()): LayoutFiles {
  return {
    // Config
    config: join(paths.config, "config.json"),

    // Cluster certificates (names fixed by the cockroach CLI)
    caCert: join(paths.certs, "ca.crt"),
    caKey: join(paths.certs, "ca.key"),
    nodeCert: join(paths.certs, "node.crt"),
    nodeKey: join(paths.certs, "node.key"),
    clientCert: join(paths.certs, "client.root.crt"),
    clientKey: join(paths.certs, "client.root.key"),
    clientKeyPkcs8: join(paths.certs, "client.root.pk8.key"),

    // Transport certificate for the CA distribution server
    transportCert: join(paths.letsencrypt, "fullchain.pem"),
    transportKey: join(paths.letsencrypt, "privkey.pem"),

    // PID files
    cockroachPid: join(paths.state, "cockroach.pid"),
    caServerPid: join(paths.state, "ca-server.pid"),

    // Logs
    cockroachLog: join(paths.logs, "cockroach.log"),
    caServerLog: join(paths.logs, "ca-server.log"),

    webCredentials: join(paths.root, "web_credentials.txt"),
  };
}

/**
 * Directory holding the versioned .sql migrations shipped with the tool.
 */
export function getMigrationsDir(): string {
  return process.env.ROACHYARD_MIGRATIONS_DIR || fileURLToPath(new URL("../../migrations", import.meta.url));
}

// =============================================================================
// DEFAULTS
// =============================================================================

export const CLUSTER_DEFAULTS = {
  sql_port: 26257,
  http_port: 8080,
  domain: "roachyard.local",
  database_name: "defaultdb",
  admin_user: "roachyard_admin",
  admin_password: "admin",
  ca_server_port: 8443,
  ca_server_email: "",
} as const;

export const SERVICES_DEFAULTS = {
  project_root: join(homedir(), "app"),
  backend_binary: "target/release/backend",
  backend_port: 3000,
  dashboard_dir: "dashboard",
  dashboard_port: 5173,
} as const;

// Sections of config.json owned by this tool
export const CONFIG_SECTIONS = {
  cluster: "cockroachdb",
  services: "services",
} as const;

// =============================================================================
// INTERVALS & TIMEOUTS (in milliseconds)
// =============================================================================

export const INTERVALS = {
  databaseStartup: 3 * 1000,          // wait before checking a fresh cockroach start
  gracefulStop: 2 * 1000,             // wait after SIGTERM before re-checking
  forcedStop: 1 * 1000,               // wait after SIGKILL before the last check
  servicePoll: 1000,                  // port poll interval for backend/dashboard
} as const;

export const TIMEOUTS = {
  peerFetch: 5 * 1000,                // per-peer CA download
  command: 5 * 60 * 1000,             // ceiling for any single external command
} as const;

export const LIMITS = {
  backendStartAttempts: 5,
  dashboardStartAttempts: 10,
  serviceStopAttempts: 5,
} as const;

// =============================================================================
// EXTERNAL TOOLS
// =============================================================================

export const COCKROACH_BINARY_PATHS = [
  "/usr/local/bin/cockroach",
  "/usr/bin/cockroach",
  join(homedir(), "bin", "cockroach"),
] as const;

export const COCKROACH_DOWNLOADS: Record<string, string> = {
  x64: "https://binaries.cockroachdb.com/cockroach-latest.linux-amd64.tgz",
  arm64: "https://binaries.cockroachdb.com/cockroach-latest.linux-arm64.tgz",
};

// Exact command-line substring of a running cockroach server. Must include the
// subcommand so that `cockroach sql` sessions and the ps lookup never match.
export const COCKROACH_PROCESS_PATTERN = "cockroach start";

// Marker printed by `cockroach init` when the cluster is already bootstrapped
export const ALREADY_INITIALIZED_MARKER = "cluster has already been initialized";

export const MIGRATIONS_TABLE = "schema_migrations";
