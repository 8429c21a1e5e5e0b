import type { CommandRunner } from "./exec";
import type { ClusterConfig } from "./types";

/**
 * First address reported by `hostname -I`, or 127.0.0.1
 */
export async function getPrimaryIp(runner: CommandRunner): Promise<string> {
  const result = await runner.run("hostname", ["-I"]);
  if (result.exitCode !== 0) return "127.0.0.1";

  const ips = result.stdout.trim().split(/\s+/);
  const first = ips.find((ip) => isValidIp(ip));
  return first ?? "127.0.0.1";
}

/**
 * Validate IP address format
 */
export function isValidIp(ip: string): boolean {
  // IPv4
  const ipv4Regex = /^(\d{1,3}\.){3}\d{1,3}$/;
  if (ipv4Regex.test(ip)) {
    const parts = ip.split(".").map(Number);
    return parts.every((p) => p >= 0 && p <= 255);
  }

  // IPv6 (simplified check)
  const ipv6Regex = /^([0-9a-fA-F]{0,4}:){2,7}[0-9a-fA-F]{0,4}$/;
  return ipv6Regex.test(ip);
}

/**
 * Split a "host:port" peer entry
 */
export function parsePeer(peer: string): { host: string; port: number | null } {
  const separator = peer.lastIndexOf(":");
  if (separator <= 0) {
    return { host: peer, port: null };
  }
  const port = parseInt(peer.slice(separator + 1), 10);
  return { host: peer.slice(0, separator), port: Number.isInteger(port) ? port : null };
}

/**
 * Join targets for `cockroach start`: this node first, then peers in config order
 */
export function buildJoinList(config: Pick<ClusterConfig, "domain" | "sql_port" | "cluster_nodes">): string {
  return [`${config.domain}:${config.sql_port}`, ...config.cluster_nodes].join(",");
}

/**
 * Where a peer serves its CA certificate
 */
export function caUrlFor(host: string, caServerPort: number): string {
  return `https://${host}:${caServerPort}/ca.crt`;
}
