import { afterEach, beforeEach, expect, test } from "vitest";
import { readFile, writeFile } from "fs/promises";
import { ErrorCode } from "../src/lib/errors";
import { ensureDirectories, fileExists } from "../src/lib/fs";
import { TEST_BINARY, TEST_IP, type TestContext, createTestContext } from "./helpers/context";
import { placeFixture, placeKey } from "./helpers/fixtures";

let t: TestContext;
let processes: number[];

beforeEach(async () => {
  t = await createTestContext();
  await ensureDirectories(t.ctx.paths);
  processes = [];

  t.runner.on("ps", () => ({
    stdout: ["    1 /usr/bin/node cli.ts cluster stop", ...processes.map((pid) => `${pid} ${TEST_BINARY} start --join=x`)]
      .join("\n"),
  }));
});

afterEach(async () => {
  await t.cleanup();
});

test("a joining node lists itself first, then its peers", async () => {
  await t.ctx.config.save({ domain: "node1.local", cluster_nodes: ["node2.local:26257", "node3.local:26257"] });
  t.runner.onSpawn = () => {
    processes.push(4242);
    return 4242;
  };

  const result = await t.ctx.cluster.start({ isFirstNode: false });

  expect(result.status).toBe("started");
  expect(result.handle).toEqual({ kind: "database", pid: 4242, port: 26257 });
  const [launch] = t.runner.detached;
  expect(launch.command).toBe(TEST_BINARY);
  expect(launch.args).toEqual([
    "start",
    `--certs-dir=${t.ctx.paths.certs}`,
    `--store=${t.ctx.paths.store}`,
    "--listen-addr=0.0.0.0:26257",
    `--advertise-addr=${TEST_IP}:26257`,
    "--http-addr=0.0.0.0:8080",
    "--join=node1.local:26257,node2.local:26257,node3.local:26257",
  ]);
  expect(launch.options.logFile).toBe(t.ctx.files.cockroachLog);
  expect(await readFile(t.ctx.files.cockroachPid, "utf-8")).toBe("4242\n");
  expect(t.sleeps).toEqual([3000]);
});

test("the first node with no peers joins only itself", async () => {
  await t.ctx.config.save({ domain: "node1.local" });
  t.runner.onSpawn = () => {
    processes.push(4242);
    return 4242;
  };

  await t.ctx.cluster.start({ isFirstNode: true });

  expect(t.runner.detached[0].args).toContain("--join=node1.local:26257");
  expect(t.logger.messages("warn")).not.toContain("No cluster_nodes configured; this node will only join itself");
});

test("start records a CA server failure without failing the node", async () => {
  t.runner.onSpawn = () => {
    processes.push(4242);
    return 4242;
  };

  const result = await t.ctx.cluster.start({ isFirstNode: true });

  expect(result.status).toBe("started");
  expect(result.caServerError).toBe("ca.crt does not exist; generate certificates first");
});

test("start launches the CA server when its certificates are present", async () => {
  const { files } = t.ctx;
  await placeFixture("ca-a.crt", files.caCert);
  await placeKey(files.transportCert);
  await placeKey(files.transportKey);
  let nextPid = 4242;
  t.runner.onSpawn = () => {
    const pid = nextPid++;
    if (pid === 4242) processes.push(pid);
    return pid;
  };

  const result = await t.ctx.cluster.start({ isFirstNode: true });

  expect(result.caServer).toEqual({ status: "started", pid: 4243 });
  expect(t.runner.detached[1].args).toEqual(["cli.ts", "ca-server", "run"]);
  expect(await readFile(files.caServerPid, "utf-8")).toBe("4243\n");
});

test("start is a no-op when cockroach already runs", async () => {
  processes.push(777);

  const result = await t.ctx.cluster.start({ isFirstNode: true });

  expect(result).toEqual({ status: "already-running", handle: { kind: "database", pid: 777, port: 26257 } });
  expect(t.runner.detached).toEqual([]);
});

test("start fails when cockroach dies right away", async () => {
  await expect(t.ctx.cluster.start({ isFirstNode: true })).rejects.toMatchObject({
    code: ErrorCode.EXTERNAL_TOOL,
    message: "cockroach exited right after start",
  });
  expect(await fileExists(t.ctx.files.cockroachPid)).toBe(false);
});

test("stop with nothing running is already-stopped", async () => {
  expect(await t.ctx.cluster.stop()).toEqual({ status: "already-stopped" });
  expect(t.runner.callsTo("kill")).toEqual([]);
});

test("stop sends SIGTERM and stops there when the process exits", async () => {
  processes.push(500);
  t.runner.on("kill -15", () => {
    processes = [];
    return {};
  });

  expect(await t.ctx.cluster.stop()).toEqual({ status: "stopped", forced: false });
  expect(t.runner.callsTo("kill").map((call) => call.args)).toEqual([["-15", "500"]]);
  expect(t.sleeps).toEqual([2000]);
});

test("stop escalates to SIGKILL when SIGTERM is ignored", async () => {
  processes.push(500);
  t.runner.on("kill -9", () => {
    processes = [];
    return {};
  });

  expect(await t.ctx.cluster.stop()).toEqual({ status: "stopped", forced: true });
  expect(t.runner.callsTo("kill").map((call) => call.args)).toEqual([
    ["-15", "500"],
    ["-9", "500"],
  ]);
  expect(t.sleeps).toEqual([2000, 1000]);
});

test("stop fails with guidance when the process survives SIGKILL", async () => {
  processes.push(500);
  await writeFile(t.ctx.files.cockroachPid, "500\n");

  await expect(t.ctx.cluster.stop()).rejects.toMatchObject({
    code: ErrorCode.STOP_FAILED,
    context: { pids: [500], hint: "pkill -9 -f 'cockroach start'" },
  });
  expect(await fileExists(t.ctx.files.cockroachPid)).toBe(true);
});

test("init on an initialized cluster is success, not an error", async () => {
  t.runner.on("cockroach init", {
    exitCode: 1,
    stderr: "ERROR: cluster has already been initialized\n",
  });

  expect(await t.ctx.cluster.initCluster()).toEqual({ status: "already-initialized" });
  expect(t.runner.callsTo("cockroach").map((call) => call.args[0])).toEqual(["init"]);
});

test("init failures other than already-initialized are surfaced", async () => {
  t.runner.on("cockroach init", { exitCode: 1, stderr: "connection refused\n" });

  await expect(t.ctx.cluster.initCluster()).rejects.toMatchObject({
    code: ErrorCode.EXTERNAL_TOOL,
    context: { stderr: "connection refused" },
  });
});

test("init creates the database after bootstrapping", async () => {
  const result = await t.ctx.cluster.initCluster();

  expect(result).toEqual({ status: "initialized", database: { ok: true, run: { applied: [], currentVersion: 0 } } });
  const sql = t.runner.callsTo("cockroach").filter((call) => call.args[0] === "sql");
  expect(sql[0].args).toEqual([
    "sql",
    `--certs-dir=${t.ctx.paths.certs}`,
    "--host=localhost:26257",
    "--execute=CREATE DATABASE IF NOT EXISTS defaultdb",
  ]);
});

test("init reports a database failure in its result", async () => {
  t.runner.on("cockroach sql", { exitCode: 1, stderr: "permission denied" });

  const result = await t.ctx.cluster.initCluster();

  expect(result).toEqual({
    status: "initialized",
    database: { ok: false, error: "cockroach sql exited with 1" },
  });
});

test("createWebUser recreates the user and saves the credentials", async () => {
  const user = await t.ctx.cluster.createWebUser("console_admin", "test-secret");

  expect(user).toEqual({
    url: `https://${TEST_IP}:8080`,
    username: "console_admin",
    password: "test-secret",
    file: t.ctx.files.webCredentials,
  });
  const statements = t.runner
    .callsTo("cockroach")
    .map((call) => call.args.find((arg) => arg.startsWith("--execute=")));
  expect(statements).toEqual([
    "--execute=DROP USER IF EXISTS console_admin",
    "--execute=CREATE USER console_admin WITH PASSWORD 'test-secret'; GRANT admin TO console_admin",
  ]);
  expect(await readFile(t.ctx.files.webCredentials, "utf-8")).toBe(
    `URL: https://${TEST_IP}:8080\nUser: console_admin\nPassword: test-secret\n`
  );
});

test("createWebUser rejects a username that is not an identifier", async () => {
  await expect(t.ctx.cluster.createWebUser("drop table;", "test-secret")).rejects.toMatchObject({
    code: ErrorCode.CONFIG_INVALID,
  });
  expect(t.runner.callsTo("cockroach")).toEqual([]);
});

test("createWebUser refuses the built-in admin role", async () => {
  await expect(t.ctx.cluster.createWebUser("admin", "test-secret")).rejects.toMatchObject({
    code: ErrorCode.CONFIG_INVALID,
    message: 'Invalid username "admin": "admin" is a reserved name',
  });
  expect(t.runner.callsTo("cockroach")).toEqual([]);
});

test("createWebUser falls back to the configured admin user", async () => {
  await t.ctx.config.save({ admin_password: "test-secret" });

  const user = await t.ctx.cluster.createWebUser();

  expect(user.username).toBe("roachyard_admin");
  expect(t.runner.callsTo("cockroach").map((call) => call.args.find((arg) => arg.startsWith("--execute=")))).toEqual([
    "--execute=DROP USER IF EXISTS roachyard_admin",
    "--execute=CREATE USER roachyard_admin WITH PASSWORD 'test-secret'; GRANT admin TO roachyard_admin",
  ]);
});

test("purge refuses while the node runs", async () => {
  processes.push(500);

  await expect(t.ctx.cluster.purge()).rejects.toMatchObject({ code: ErrorCode.INVALID_STATE });
});

test("purge removes data and keeps the configuration", async () => {
  await t.ctx.config.save({ domain: "node1.local" });
  await placeFixture("ca-a.crt", t.ctx.files.caCert);
  await writeFile(t.ctx.files.webCredentials, "URL: x\n");

  const removed = await t.ctx.cluster.purge();

  expect(removed.map((target) => target.path)).toEqual([
    t.ctx.paths.store,
    t.ctx.paths.certs,
    t.ctx.paths.logs,
    t.ctx.files.webCredentials,
    t.ctx.files.cockroachPid,
    t.ctx.files.caServerPid,
  ]);
  expect(await fileExists(t.ctx.paths.certs)).toBe(false);
  expect(await fileExists(t.ctx.files.webCredentials)).toBe(false);
  expect(await fileExists(t.ctx.files.config)).toBe(true);
});
