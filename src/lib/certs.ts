import { X509Certificate } from "crypto";
import { readFile } from "fs/promises";
import { TIMEOUTS } from "./constants";
import type { CockroachBinary } from "./cockroach";
import type { ConfigStore } from "./config";
import { ErrorCode, RoachyardError, errorMessage } from "./errors";
import { type CommandRunner, runOrThrow } from "./exec";
import { atomicWrite, ensureDir, fileExists } from "./fs";
import type { Logger } from "./logger";
import { caUrlFor, getPrimaryIp, parsePeer } from "./network";
import type { CertState, CertStatus, CertificateSet, ClientCertResult } from "./types";

export type FetchFn = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface CertificateManagerDeps {
  certsDir: string;
  files: CertificateSet;
  runner: CommandRunner;
  binary: CockroachBinary;
  config: ConfigStore;
  logger: Logger;
  fetch: FetchFn;
}

/**
 * Owns the cluster CA and the certificates it signs.
 *
 * State is never stored; it is derived from the files in the certs directory
 * every time, and a node or client certificate only counts when it verifies
 * against the ca.crt currently on disk.
 */
export class CertificateManager {
  constructor(private readonly deps: CertificateManagerDeps) {}

  get files(): CertificateSet {
    return this.deps.files;
  }

  async status(): Promise<CertStatus> {
    const { files } = this.deps;
    const present: Record<keyof CertificateSet, boolean> = {
      caCert: await fileExists(files.caCert),
      caKey: await fileExists(files.caKey),
      nodeCert: await fileExists(files.nodeCert),
      nodeKey: await fileExists(files.nodeKey),
      clientCert: await fileExists(files.clientCert),
      clientKey: await fileExists(files.clientKey),
      clientKeyPkcs8: await fileExists(files.clientKeyPkcs8),
    };

    const stale: string[] = [];
    let nodeValid = false;
    let clientValid = false;

    if (present.caCert && present.nodeCert) {
      nodeValid = await this.verifyAgainstCA(files.nodeCert);
      if (!nodeValid) stale.push(files.nodeCert);
    }
    if (present.caCert && present.clientCert) {
      clientValid = await this.verifyAgainstCA(files.clientCert);
      if (!clientValid) stale.push(files.clientCert);
    }

    let state: CertState = "none";
    if (present.caCert) {
      state = "has-ca";
      if (nodeValid && present.nodeKey) {
        state = "has-node-cert";
        if (clientValid && present.clientKey) {
          state = "has-client-cert";
        }
      }
    }

    return { state, present, stale };
  }

  /**
   * True when the certificate was issued and signed by the current ca.crt
   */
  async verifyAgainstCA(certPath: string): Promise<boolean> {
    try {
      const ca = new X509Certificate(await readFile(this.deps.files.caCert));
      const cert = new X509Certificate(await readFile(certPath));
      return cert.checkIssued(ca) && cert.verify(ca.publicKey);
    } catch {
      return false;
    }
  }

  // ===========================================================================
  // CA
  // ===========================================================================

  async createCA(): Promise<void> {
    await this.requireState("none", "create a CA");
    await this.runCreateCA(false);
    this.deps.logger.success(`CA created at ${this.deps.files.caCert}`);
  }

  /**
   * Replace the CA. Issued certificates are left in place and turn stale.
   */
  async regenerateCA(): Promise<CertStatus> {
    await this.runCreateCA(true);
    const status = await this.status();
    if (status.stale.length > 0) {
      this.deps.logger.warn(`${status.stale.length} certificate(s) no longer match the CA and must be re-issued`);
    }
    return status;
  }

  /**
   * Download the CA from one peer. Only valid before this node holds a CA.
   */
  async fetchCAFromPeer(url: string): Promise<void> {
    await this.requireState("none", "fetch the CA");
    await this.downloadCA(url);
  }

  private async downloadCA(url: string): Promise<void> {
    const response = await this.deps.fetch(url, { signal: AbortSignal.timeout(TIMEOUTS.peerFetch) });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    const pem = await response.text();
    if (!isCertificate(pem)) {
      throw new Error("response is not a PEM certificate");
    }

    await ensureDir(this.deps.certsDir);
    await atomicWrite(this.deps.files.caCert, pem);
  }

  /**
   * Try each configured peer in order and keep the first CA served.
   * Returns the URL that answered.
   */
  async fetchCAFromPeers(): Promise<string> {
    await this.requireState("none", "fetch the CA");
    const config = await this.deps.config.load();
    const tried: string[] = [];
    const errors: string[] = [];

    for (const node of config.cluster_nodes) {
      const url = caUrlFor(parsePeer(node).host, config.ca_server_port);
      tried.push(url);
      this.deps.logger.detail(`Trying ${url}`);

      try {
        await this.downloadCA(url);
        this.deps.logger.success(`CA downloaded from ${url}`);
        return url;
      } catch (err) {
        errors.push(`${url}: ${errorMessage(err)}`);
      }
    }

    throw new RoachyardError(
      ErrorCode.PEER_UNREACHABLE,
      tried.length === 0 ? "No cluster nodes configured to fetch the CA from" : "No peer served a CA certificate",
      { tried, errors }
    );
  }

  // ===========================================================================
  // ISSUANCE
  // ===========================================================================

  /**
   * SANs for this node's certificate. Only this node's own names.
   */
  async nodeSans(): Promise<string[]> {
    const config = await this.deps.config.load();
    const ip = await getPrimaryIp(this.deps.runner);
    return ["localhost", "127.0.0.1", ip, config.domain];
  }

  async issueNodeCert(): Promise<string[]> {
    await this.requireState("has-ca", "issue a node certificate");
    await this.requireCaKey();

    const sans = await this.nodeSans();
    await this.cockroachCert(["create-node", ...sans]);
    this.deps.logger.success(`Node certificate issued for ${sans.join(" ")}`);
    return sans;
  }

  /**
   * Issue the root client certificate and convert its key to PKCS#8.
   * A failed conversion keeps the issued certificate.
   */
  async issueClientCert(): Promise<ClientCertResult> {
    await this.requireState("has-node-cert", "issue a client certificate");
    await this.requireCaKey();

    const { files, runner, logger } = this.deps;
    await this.cockroachCert(["create-client", "root"]);

    const result: ClientCertResult = {
      certPath: files.clientCert,
      keyPath: files.clientKey,
      pkcs8KeyPath: null,
    };

    try {
      await runOrThrow(runner, "openssl", [
        "pkcs8", "-topk8", "-inform", "PEM", "-outform", "PEM", "-nocrypt",
        "-in", files.clientKey,
        "-out", files.clientKeyPkcs8,
      ]);
      result.pkcs8KeyPath = files.clientKeyPkcs8;
      logger.success("Client certificate issued");
    } catch (err) {
      const stderr = err instanceof RoachyardError ? err.context?.stderr : undefined;
      result.conversionError = typeof stderr === "string" && stderr.length > 0 ? stderr : errorMessage(err);
      logger.warn(`Client certificate issued, but PKCS#8 conversion failed: ${result.conversionError}`);
    }

    return result;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async requireState(expected: CertState, action: string): Promise<void> {
    const { state } = await this.status();
    if (state !== expected) {
      throw new RoachyardError(ErrorCode.INVALID_STATE, `Cannot ${action} in state "${state}" (needs "${expected}")`, {
        state,
        expected,
      });
    }
  }

  private async requireCaKey(): Promise<void> {
    if (!(await fileExists(this.deps.files.caKey))) {
      throw new RoachyardError(ErrorCode.INVALID_STATE, `CA key not found at ${this.deps.files.caKey}`, {
        hint: "Certificates can only be issued on the node holding ca.key",
      });
    }
  }

  private async runCreateCA(overwrite: boolean): Promise<void> {
    await this.cockroachCert(["create-ca"], overwrite);
  }

  private async cockroachCert(args: string[], overwrite: boolean = true): Promise<void> {
    const { certsDir, files, runner, binary } = this.deps;
    await ensureDir(certsDir);
    await runOrThrow(runner, await binary.resolve(), [
      "cert",
      ...args,
      `--certs-dir=${certsDir}`,
      `--ca-key=${files.caKey}`,
      ...(overwrite ? ["--overwrite"] : []),
    ]);
  }
}

function isCertificate(pem: string): boolean {
  try {
    return new X509Certificate(pem).subject.length > 0;
  } catch {
    return false;
  }
}
