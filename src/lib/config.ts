import { dirname } from "path";
import { z } from "zod";
import { CLUSTER_DEFAULTS, CONFIG_SECTIONS, SERVICES_DEFAULTS } from "./constants";
import { ErrorCode, RoachyardError, isRoachyardError } from "./errors";
import { ensureDir, readJson, writeJson } from "./fs";
import type { Logger } from "./logger";
import type { ClusterConfig, ConfigDocument, ServicesConfig } from "./types";

// =============================================================================
// SCHEMAS
// =============================================================================

export const portSchema = z.coerce
  .number({ invalid_type_error: "Port must be a number" })
  .int("Port must be an integer")
  .min(1, "Port must be between 1 and 65535")
  .max(65535, "Port must be between 1 and 65535");

const peerSchema = z
  .string()
  .regex(/^[A-Za-z0-9.-]+:\d{1,5}$/, "Peers must be written as host:port");

export const clusterConfigSchema = z
  .object({
    sql_port: portSchema.default(CLUSTER_DEFAULTS.sql_port),
    http_port: portSchema.default(CLUSTER_DEFAULTS.http_port),
    domain: z.string().min(1).default(CLUSTER_DEFAULTS.domain),
    cluster_nodes: z.array(peerSchema).default(() => []),
    database_name: z.string().min(1).default(CLUSTER_DEFAULTS.database_name),
    admin_user: z.string().min(1).default(CLUSTER_DEFAULTS.admin_user),
    admin_password: z.string().min(1).default(CLUSTER_DEFAULTS.admin_password),
    ca_server_port: portSchema.default(CLUSTER_DEFAULTS.ca_server_port),
    ca_server_email: z.string().default(CLUSTER_DEFAULTS.ca_server_email),
  })
  .superRefine((config, ctx) => {
    const ports = [config.sql_port, config.http_port, config.ca_server_port];
    if (new Set(ports).size !== ports.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `sql_port, http_port and ca_server_port must be distinct (got ${ports.join(", ")})`,
      });
    }
  });

export const servicesConfigSchema = z
  .object({
    project_root: z.string().min(1).default(SERVICES_DEFAULTS.project_root),
    backend_binary: z.string().min(1).default(SERVICES_DEFAULTS.backend_binary),
    backend_port: portSchema.default(SERVICES_DEFAULTS.backend_port),
    dashboard_dir: z.string().min(1).default(SERVICES_DEFAULTS.dashboard_dir),
    dashboard_port: portSchema.default(SERVICES_DEFAULTS.dashboard_port),
  })
  .refine((config) => config.backend_port !== config.dashboard_port, {
    message: "backend_port and dashboard_port must be distinct",
  });

/**
 * Parse a port typed on the command line or at a prompt
 */
export function parsePort(value: string): number {
  const result = portSchema.safeParse(value);
  if (!result.success) {
    throw new RoachyardError(ErrorCode.CONFIG_INVALID, result.error.issues[0]?.message ?? "Invalid port", {
      value,
    });
  }
  return result.data;
}

// =============================================================================
// MERGE
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge source into target. Nested plain objects merge key by key; arrays and
 * scalars are replaced. Undefined values in source leave the target untouched.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// =============================================================================
// STORE
// =============================================================================

/**
 * Reads and writes config.json. Each component owns one top-level section;
 * saving a section never touches the others. No locking: one operator per host.
 */
export class ConfigStore {
  constructor(
    private readonly file: string,
    private readonly logger: Logger
  ) {}

  get path(): string {
    return this.file;
  }

  async load(): Promise<ClusterConfig> {
    return this.loadSection(CONFIG_SECTIONS.cluster, clusterConfigSchema);
  }

  async save(partial: Partial<ClusterConfig>): Promise<ClusterConfig> {
    return this.saveSection(CONFIG_SECTIONS.cluster, clusterConfigSchema, { ...partial });
  }

  /**
   * Load the current section, apply the fields and write the result
   */
  async update(fields: Partial<ClusterConfig>): Promise<ClusterConfig> {
    const current = await this.load();
    return this.save({ ...current, ...fields });
  }

  async loadServices(): Promise<ServicesConfig> {
    return this.loadSection(CONFIG_SECTIONS.services, servicesConfigSchema);
  }

  async saveServices(partial: Partial<ServicesConfig>): Promise<ServicesConfig> {
    return this.saveSection(CONFIG_SECTIONS.services, servicesConfigSchema, { ...partial });
  }

  /**
   * Read the whole document. Missing file reads as empty.
   */
  async readDocument(): Promise<ConfigDocument> {
    const raw = await readJson(this.file);
    if (raw === undefined) return {};
    if (!isRecord(raw)) {
      throw new RoachyardError(ErrorCode.PERSISTENCE, `${this.file} does not hold a JSON object`);
    }
    return raw;
  }

  private async loadSection<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const defaults = schema.parse({});

    let document: ConfigDocument;
    try {
      document = await this.readDocument();
    } catch (err) {
      if (!isRoachyardError(err, ErrorCode.PERSISTENCE)) throw err;
      this.logger.warn(`Could not read config (${err.message}), using defaults`);
      return defaults;
    }

    const section = document[key];
    if (section === undefined) return defaults;

    const result = schema.safeParse(section);
    if (!result.success) {
      this.logger.warn(`Invalid "${key}" section in config (${formatIssues(result.error)}), using defaults`);
      return defaults;
    }
    return result.data;
  }

  private async saveSection<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    partial: Record<string, unknown>
  ): Promise<T> {
    const document = await this.readDocument();
    const existing = document[key];
    const merged = deepMerge(isRecord(existing) ? existing : {}, partial);

    const result = schema.safeParse(merged);
    if (!result.success) {
      throw new RoachyardError(ErrorCode.CONFIG_INVALID, `Invalid "${key}" configuration: ${formatIssues(result.error)}`);
    }

    await ensureDir(dirname(this.file));
    await writeJson(this.file, { ...document, [key]: result.data });
    return result.data;
  }
}
