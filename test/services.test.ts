import { afterEach, beforeEach, expect, test } from "vitest";
import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { ErrorCode } from "../src/lib/errors";
import { ServiceManager, logTimestamp } from "../src/lib/services";
import { type TestContext, createTestContext } from "./helpers/context";

let t: TestContext;
let services: ServiceManager;
let root: string;
let listening: number | null;

beforeEach(async () => {
  t = await createTestContext();
  root = join(t.home, "project");
  listening = null;

  await t.ctx.config.saveServices({ project_root: root });
  services = new ServiceManager({
    paths: t.ctx.paths,
    runner: t.runner,
    supervisor: t.ctx.supervisor,
    config: t.ctx.config,
    logger: t.logger,
    now: () => new Date(2026, 0, 31, 23, 59, 5),
  });

  t.runner.on("lsof", () => (listening === null ? { exitCode: 1 } : { stdout: `${listening}\n` }));
  t.runner.on("kill -15", () => {
    listening = null;
    return {};
  });
});

afterEach(async () => {
  await t.cleanup();
});

async function buildBackend(): Promise<string> {
  const binary = join(root, "target", "release", "backend");
  await mkdir(join(root, "target", "release"), { recursive: true });
  await writeFile(binary, "#!/bin/sh\n");
  return binary;
}

test("logTimestamp formats local time", () => {
  expect(logTimestamp(new Date(2026, 0, 31, 23, 59, 5))).toBe("20260131_235905");
});

test("starts the backend and waits for its port", async () => {
  const binary = await buildBackend();
  t.runner.onSpawn = () => {
    listening = 6100;
    return 6100;
  };

  const result = await services.start("backend");

  const logFile = join(t.ctx.paths.logs, "backend_20260131_235905.log");
  expect(result).toEqual({ status: "started", handle: { kind: "backend", pid: 6100, port: 3000 }, logFile });
  expect(t.runner.detached[0]).toEqual({
    command: binary,
    args: ["--api-port", "3000"],
    options: { cwd: root, logFile },
  });
});

test("starts the dashboard dev server on the configured port", async () => {
  await mkdir(join(root, "dashboard"), { recursive: true });
  await writeFile(join(root, "dashboard", "package.json"), "{}\n");
  t.runner.onSpawn = () => {
    listening = 6200;
    return 6200;
  };

  await services.start("dashboard");

  expect(t.runner.detached[0].command).toBe("npm");
  expect(t.runner.detached[0].args).toEqual(["run", "dev", "--", "--host", "--port", "5173"]);
  expect(t.runner.detached[0].options.cwd).toBe(join(root, "dashboard"));
});

test("start is a no-op when the port is already taken", async () => {
  await buildBackend();
  listening = 555;

  expect(await services.start("backend")).toEqual({
    status: "already-running",
    handle: { kind: "backend", pid: 555, port: 3000 },
  });
  expect(t.runner.detached).toEqual([]);
});

test("start fails when the port is never bound", async () => {
  await buildBackend();

  await expect(services.start("backend")).rejects.toMatchObject({
    code: ErrorCode.EXTERNAL_TOOL,
    message: "backend did not bind port 3000",
  });
  expect(t.sleeps).toEqual([1000, 1000, 1000, 1000]);
});

test("start refuses a missing backend binary", async () => {
  await expect(services.start("backend")).rejects.toMatchObject({ code: ErrorCode.INVALID_STATE });
  expect(t.runner.detached).toEqual([]);
});

test("stop kills the port owner and waits for the port to free up", async () => {
  listening = 6100;

  expect(await services.stop("backend")).toEqual({ status: "stopped", forced: false });
  expect(t.runner.callsTo("kill").map((call) => call.args)).toEqual([["-15", "6100"]]);
});

test("stop on a free port is already-stopped", async () => {
  expect(await services.stop("dashboard")).toEqual({ status: "already-stopped" });
});

test("stop fails when the port stays bound", async () => {
  listening = 6100;
  t.runner.on("kill -15", {});

  await expect(services.stop("backend")).rejects.toMatchObject({
    code: ErrorCode.STOP_FAILED,
    message: "backend still holds port 3000",
  });
});

test("status reports every service with its port", async () => {
  t.runner.on("ps", { stdout: "900 /opt/cockroach/cockroach start --join=x\n" });

  expect(await services.status()).toEqual([
    { kind: "backend", pid: null, port: 3000 },
    { kind: "dashboard", pid: null, port: 5173 },
    { kind: "database", pid: 900, port: 26257 },
  ]);
});
