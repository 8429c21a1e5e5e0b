import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createServer, type Server } from "http";
import { readFile, writeFile } from "fs/promises";
import { createCaRequestHandler } from "../src/lib/ca-server";
import { ErrorCode } from "../src/lib/errors";
import { ensureDirectories, fileExists } from "../src/lib/fs";
import { type TestContext, createTestContext } from "./helpers/context";
import { createMemoryLogger } from "./helpers/memory-logger";
import { fixturePath, placeFixture, placeKey } from "./helpers/fixtures";

describe("request handler", () => {
  let server: Server;
  let base: string;
  let caPath = fixturePath("ca-a.crt");

  beforeEach(async () => {
    caPath = fixturePath("ca-a.crt");
    server = createServer((req, res) => createCaRequestHandler(caPath, createMemoryLogger())(req, res));
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  test("serves the CA certificate at /ca.crt as a download", async () => {
    const response = await fetch(`${base}/ca.crt`);

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("application/x-x509-ca-cert");
    expect(response.headers.get("content-disposition")).toBe('attachment; filename="ca.crt"');
    expect(await response.text()).toBe(await readFile(caPath, "utf-8"));
  });

  test("serves the same certificate at the root path", async () => {
    const response = await fetch(`${base}/`);
    expect(response.status).toBe(200);
    expect(await response.text()).toBe(await readFile(caPath, "utf-8"));
  });

  test("answers 404 for any other path", async () => {
    const response = await fetch(`${base}/ca.key`);
    expect(response.status).toBe(404);
    expect(await response.text()).toBe("Not Found");
  });

  test("answers 404 for methods other than GET", async () => {
    const response = await fetch(`${base}/ca.crt`, { method: "POST" });
    expect(response.status).toBe(404);
  });

  test("answers 404 when the certificate is missing", async () => {
    caPath = "/nonexistent/ca.crt";
    const response = await fetch(`${base}/ca.crt`);
    expect(response.status).toBe(404);
    expect(await response.text()).toBe("CA certificate not found");
  });
});

describe("background controller", () => {
  let t: TestContext;

  beforeEach(async () => {
    t = await createTestContext();
    await ensureDirectories(t.ctx.paths);
  });

  afterEach(async () => {
    await t.cleanup();
  });

  async function placeServerCerts(): Promise<void> {
    await placeFixture("ca-a.crt", t.ctx.files.caCert);
    await placeKey(t.ctx.files.transportCert);
    await placeKey(t.ctx.files.transportKey);
  }

  test("start spawns the server detached and records its pid", async () => {
    await placeServerCerts();
    t.runner.nextPid = 9100;

    const result = await t.ctx.caServer.start();

    expect(result).toEqual({ status: "started", pid: 9100 });
    expect(t.runner.detached[0]).toEqual({
      command: "/usr/bin/node",
      args: ["cli.ts", "ca-server", "run"],
      options: { logFile: t.ctx.files.caServerLog },
    });
    expect(await readFile(t.ctx.files.caServerPid, "utf-8")).toBe("9100\n");
  });

  test("start is a no-op while the recorded pid is alive", async () => {
    await writeFile(t.ctx.files.caServerPid, "9100\n");

    expect(await t.ctx.caServer.start()).toEqual({ status: "already-running", pid: 9100 });
    expect(t.runner.detached).toEqual([]);
  });

  test("start needs the transport certificate", async () => {
    await placeFixture("ca-a.crt", t.ctx.files.caCert);

    await expect(t.ctx.caServer.start()).rejects.toMatchObject({
      code: ErrorCode.INVALID_STATE,
      message: "TLS certificate for the CA server not found",
    });
  });

  test("stop without a pid file is already-stopped", async () => {
    expect(await t.ctx.caServer.stop()).toEqual({ status: "already-stopped" });
    expect(t.runner.callsTo("kill")).toEqual([]);
  });

  test("stop removes a stale pid file", async () => {
    await writeFile(t.ctx.files.caServerPid, "9100\n");
    t.runner.on("kill -0", { exitCode: 1 });

    expect(await t.ctx.caServer.stop()).toEqual({ status: "already-stopped" });
    expect(await fileExists(t.ctx.files.caServerPid)).toBe(false);
  });

  test("stop signals the recorded pid and removes the pid file", async () => {
    await writeFile(t.ctx.files.caServerPid, "9100\n");

    expect(await t.ctx.caServer.stop()).toEqual({ status: "stopped", forced: false });
    expect(t.runner.callsTo("kill").map((call) => call.args)).toEqual([
      ["-0", "9100"],
      ["-15", "9100"],
    ]);
    expect(await fileExists(t.ctx.files.caServerPid)).toBe(false);
  });

  test("stop fails when the process cannot be signalled", async () => {
    await writeFile(t.ctx.files.caServerPid, "9100\n");
    t.runner.on("kill -15", { exitCode: 1 });

    await expect(t.ctx.caServer.stop()).rejects.toMatchObject({ code: ErrorCode.STOP_FAILED });
    expect(await fileExists(t.ctx.files.caServerPid)).toBe(true);
  });
});
