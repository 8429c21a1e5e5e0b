import { afterEach, beforeEach, expect, test } from "vitest";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { deepMerge, parsePort } from "../src/lib/config";
import { ErrorCode } from "../src/lib/errors";
import { parseSetting } from "../src/commands/config";
import { type TestContext, createTestContext } from "./helpers/context";

let t: TestContext;

beforeEach(async () => {
  t = await createTestContext();
});

afterEach(async () => {
  await t.cleanup();
});

async function writeConfig(content: string): Promise<void> {
  await mkdir(dirname(t.ctx.files.config), { recursive: true });
  await writeFile(t.ctx.files.config, content);
}

async function readConfig(): Promise<Record<string, Record<string, unknown>>> {
  return JSON.parse(await readFile(t.ctx.files.config, "utf-8"));
}

test("load returns defaults when no config file exists", async () => {
  const config = await t.ctx.config.load();

  expect(config).toEqual({
    sql_port: 26257,
    http_port: 8080,
    domain: "roachyard.local",
    cluster_nodes: [],
    database_name: "defaultdb",
    admin_user: "roachyard_admin",
    admin_password: "admin",
    ca_server_port: 8443,
    ca_server_email: "",
  });
  expect(t.logger.messages("warn")).toEqual([]);
});

test("load fills missing fields from defaults", async () => {
  await writeConfig(JSON.stringify({ cockroachdb: { domain: "node1.example.test" } }));

  const config = await t.ctx.config.load();
  expect(config.domain).toBe("node1.example.test");
  expect(config.sql_port).toBe(26257);
});

test("save keeps sections and fields it does not own", async () => {
  await writeConfig(
    JSON.stringify({
      other_tool: { keep: true },
      cockroachdb: { domain: "node1.example.test", cluster_nodes: ["node2.example.test:26257"] },
    })
  );

  await t.ctx.config.save({ sql_port: 26300 });

  const document = await readConfig();
  expect(document.other_tool).toEqual({ keep: true });
  expect(document.cockroachdb.domain).toBe("node1.example.test");
  expect(document.cockroachdb.cluster_nodes).toEqual(["node2.example.test:26257"]);
  expect(document.cockroachdb.sql_port).toBe(26300);
});

test("saving the cluster section leaves the services section alone", async () => {
  await t.ctx.config.saveServices({ backend_port: 4000 });
  await t.ctx.config.save({ domain: "db.example.test" });

  const services = await t.ctx.config.loadServices();
  expect(services.backend_port).toBe(4000);
  expect((await t.ctx.config.load()).domain).toBe("db.example.test");
});

test("save replaces the peer list instead of merging it", async () => {
  await t.ctx.config.save({ cluster_nodes: ["a.example.test:26257", "b.example.test:26257"] });
  await t.ctx.config.save({ cluster_nodes: ["c.example.test:26257"] });

  expect((await t.ctx.config.load()).cluster_nodes).toEqual(["c.example.test:26257"]);
});

test("save rejects clashing ports and writes nothing", async () => {
  await expect(t.ctx.config.save({ http_port: 26257 })).rejects.toMatchObject({ code: ErrorCode.CONFIG_INVALID });
  await expect(readFile(t.ctx.files.config, "utf-8")).rejects.toThrow();
});

test("save rejects a peer without a port", async () => {
  await expect(t.ctx.config.save({ cluster_nodes: ["node2"] })).rejects.toMatchObject({
    code: ErrorCode.CONFIG_INVALID,
  });
});

test("services ports must differ", async () => {
  await expect(t.ctx.config.saveServices({ backend_port: 5173 })).rejects.toMatchObject({
    code: ErrorCode.CONFIG_INVALID,
  });
});

test("load warns and falls back to defaults on unparseable JSON", async () => {
  await writeConfig("{not json");

  const config = await t.ctx.config.load();

  expect(config.sql_port).toBe(26257);
  expect(t.logger.messages("warn")).toEqual([
    `Could not read config (Invalid JSON in ${t.ctx.files.config}), using defaults`,
  ]);
});

test("save refuses to overwrite an unparseable file", async () => {
  await writeConfig("{not json");

  await expect(t.ctx.config.save({ domain: "x.example.test" })).rejects.toMatchObject({
    code: ErrorCode.PERSISTENCE,
  });
  expect(await readFile(t.ctx.files.config, "utf-8")).toBe("{not json");
});

test("load warns on an invalid section", async () => {
  await writeConfig(JSON.stringify({ cockroachdb: { sql_port: "not-a-port" } }));

  const config = await t.ctx.config.load();
  expect(config.sql_port).toBe(26257);
  expect(t.logger.messages("warn")).toHaveLength(1);
  expect(t.logger.messages("warn")[0]).toContain('Invalid "cockroachdb" section');
});

test("deepMerge merges nested objects and replaces arrays", () => {
  const merged = deepMerge(
    { a: { x: 1, y: 2 }, list: [1, 2, 3], keep: "yes" },
    { a: { y: 20 }, list: [9], keep: undefined }
  );
  expect(merged).toEqual({ a: { x: 1, y: 20 }, list: [9], keep: "yes" });
});

test("parsePort accepts numeric strings in range", () => {
  expect(parsePort("8080")).toBe(8080);
  expect(() => parsePort("70000")).toThrow("Port must be between 1 and 65535");
  expect(() => parsePort("abc")).toThrow("Port must be a number");
});

test("parseSetting routes keys to their section", () => {
  expect(parseSetting("sql_port", "26300")).toEqual({ section: "cluster", fields: { sql_port: 26300 } });
  expect(parseSetting("cluster_nodes", "a.test:26257, b.test:26257")).toEqual({
    section: "cluster",
    fields: { cluster_nodes: ["a.test:26257", "b.test:26257"] },
  });
  expect(parseSetting("services.dashboard_dir", "web")).toEqual({
    section: "services",
    fields: { dashboard_dir: "web" },
  });
  expect(() => parseSetting("nonsense", "1")).toThrow('Unknown setting "nonsense"');
});
