export interface ClusterConfig {
  sql_port: number;
  http_port: number;
  domain: string;
  cluster_nodes: string[]; // "host:port", insertion order = join order
  database_name: string;
  admin_user: string;
  admin_password: string;
  ca_server_port: number;
  ca_server_email: string;
}

export interface ServicesConfig {
  project_root: string;
  backend_binary: string;
  backend_port: number;
  dashboard_dir: string;
  dashboard_port: number;
}

/**
 * The on-disk config document. Sections not owned by this tool are
 * carried through untouched.
 */
export type ConfigDocument = Record<string, unknown>;

// =============================================================================
// CERTIFICATES
// =============================================================================

export type CertState = "none" | "has-ca" | "has-node-cert" | "has-client-cert";

export interface CertificateSet {
  caCert: string;
  caKey: string;
  nodeCert: string;
  nodeKey: string;
  clientCert: string;
  clientKey: string;
  clientKeyPkcs8: string;
}

export interface CertStatus {
  state: CertState;
  present: Record<keyof CertificateSet, boolean>;
  stale: string[]; // issued certs that no longer verify against ca.crt
}

export interface ClientCertResult {
  certPath: string;
  keyPath: string;
  pkcs8KeyPath: string | null;
  conversionError?: string;
}

// =============================================================================
// PROCESSES & SERVICES
// =============================================================================

export type ServiceKind = "backend" | "dashboard" | "database";

export interface ServiceHandle {
  kind: ServiceKind;
  pid: number | null;
  port: number;
}

export interface PortOwner {
  inUse: boolean;
  pid: number | null;
}

export interface ProcessInfo {
  pid: number;
  args: string;
}

export type StartOutcome =
  | { status: "started"; handle: ServiceHandle }
  | { status: "already-running"; handle: ServiceHandle };

export type StopOutcome =
  | { status: "stopped"; forced: boolean }
  | { status: "already-stopped" };

// =============================================================================
// MIGRATIONS
// =============================================================================

export interface MigrationFile {
  version: number;
  filename: string;
  path: string;
}

export interface MigrationRecord {
  version: number;
  filename: string;
  appliedAt: string;
}

export interface MigrationRun {
  applied: number[];
  currentVersion: number;
}

// =============================================================================
// CA SERVER
// =============================================================================

export type CaServerStart =
  | { status: "started"; pid: number }
  | { status: "already-running"; pid: number };
