import { expect, test } from "vitest";
import { buildJoinList, caUrlFor, getPrimaryIp, isValidIp, parsePeer } from "../src/lib/network";
import { FakeRunner } from "./helpers/fake-runner";

test("getPrimaryIp takes the first address reported", async () => {
  const runner = new FakeRunner().on("hostname -I", { stdout: "192.168.1.20 10.8.0.1 fe80::1\n" });
  expect(await getPrimaryIp(runner)).toBe("192.168.1.20");
});

test("getPrimaryIp falls back to loopback", async () => {
  expect(await getPrimaryIp(new FakeRunner().on("hostname", { exitCode: 1 }))).toBe("127.0.0.1");
  expect(await getPrimaryIp(new FakeRunner().on("hostname", { stdout: "\n" }))).toBe("127.0.0.1");
});

test("isValidIp validates IPv4 octets", () => {
  expect(isValidIp("10.0.0.1")).toBe(true);
  expect(isValidIp("256.0.0.1")).toBe(false);
  expect(isValidIp("not-an-ip")).toBe(false);
});

test("parsePeer splits on the last colon", () => {
  expect(parsePeer("node2.example.test:26257")).toEqual({ host: "node2.example.test", port: 26257 });
  expect(parsePeer("node2")).toEqual({ host: "node2", port: null });
});

test("buildJoinList puts this node first and keeps peer order", () => {
  expect(buildJoinList({ domain: "node1.local", sql_port: 26257, cluster_nodes: [] })).toBe("node1.local:26257");
  expect(
    buildJoinList({ domain: "node1.local", sql_port: 26300, cluster_nodes: ["node3.local:26257", "node2.local:26257"] })
  ).toBe("node1.local:26300,node3.local:26257,node2.local:26257");
});

test("caUrlFor uses the CA server port, not the peer's SQL port", () => {
  expect(caUrlFor(parsePeer("node2.local:26257").host, 8443)).toBe("https://node2.local:8443/ca.crt");
});
