import { afterEach, beforeEach, expect, test } from "vitest";
import { buildProgram } from "../src/program";
import { MENU_ENTRIES } from "../src/commands/menu";
import { type TestContext, createTestContext } from "./helpers/context";

let t: TestContext;

beforeEach(async () => {
  t = await createTestContext();
});

afterEach(async () => {
  process.exitCode = undefined;
  await t.cleanup();
});

test("exposes every operation as a top-level command", () => {
  const program = buildProgram(() => t.ctx);

  expect(program.commands.map((command) => command.name())).toEqual([
    "setup",
    "install",
    "status",
    "config",
    "certs",
    "cluster",
    "db",
    "migrate",
    "ca-server",
    "services",
    "purge",
    "menu",
  ]);
});

test("building the program does not create a context", () => {
  let created = 0;
  buildProgram(() => {
    created++;
    return t.ctx;
  });

  expect(created).toBe(0);
});

test("config set writes through to the config file", async () => {
  await buildProgram(() => t.ctx).parseAsync(["config", "set", "sql_port", "26300"], { from: "user" });

  expect((await t.ctx.config.load()).sql_port).toBe(26300);
  expect(process.exitCode).toBeUndefined();
});

test("config add-node appends a peer once", async () => {
  const program = buildProgram(() => t.ctx);
  await program.parseAsync(["config", "add-node", "node2.local:26257"], { from: "user" });
  await buildProgram(() => t.ctx).parseAsync(["config", "add-node", "node2.local:26257"], { from: "user" });

  expect((await t.ctx.config.load()).cluster_nodes).toEqual(["node2.local:26257"]);
});

test("a failing command sets exit code 1 instead of throwing", async () => {
  await buildProgram(() => t.ctx).parseAsync(["services", "start", "database"], { from: "user" });

  expect(process.exitCode).toBe(1);
  expect(t.runner.detached).toEqual([]);
});

test("menu entries have unique values", () => {
  const values = MENU_ENTRIES.map((entry) => entry.value);
  expect(new Set(values).size).toBe(values.length);
  expect(values).not.toContain("exit");
});

test("db user documents the username fallback", () => {
  const db = buildProgram(() => t.ctx).commands.find((command) => command.name() === "db");
  const user = db?.commands.find((command) => command.name() === "user");
  const username = user?.options.find((option) => option.long === "--username");

  expect(username?.description).toBe("User name (defaults to admin_user)");
});
