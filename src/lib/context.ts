import { CaServerController, type CaServerLauncher } from "./ca-server";
import { CertificateManager, type FetchFn } from "./certs";
import { ClusterController } from "./cluster";
import { CockroachBinary, type CockroachBinaryOptions, SqlClient } from "./cockroach";
import { ConfigStore } from "./config";
import { type Layout, type LayoutFiles, getFiles, getMigrationsDir, getPaths, getRoachyardHome } from "./constants";
import { type CommandRunner, execaRunner } from "./exec";
import { type Logger, uiLogger } from "./logger";
import { MigrationEngine } from "./migrations";
import { ServiceManager } from "./services";
import { ProcessSupervisor, type Sleep, realSleep } from "./supervisor";

/**
 * Everything a command needs, built once per invocation
 */
export interface AppContext {
  home: string;
  paths: Layout;
  files: LayoutFiles;
  runner: CommandRunner;
  logger: Logger;
  config: ConfigStore;
  supervisor: ProcessSupervisor;
  binary: CockroachBinary;
  sql: SqlClient;
  certs: CertificateManager;
  caServer: CaServerController;
  migrations: MigrationEngine;
  cluster: ClusterController;
  services: ServiceManager;
}

export interface ContextOptions {
  home?: string;
  runner?: CommandRunner;
  logger?: Logger;
  sleep?: Sleep;
  fetch?: FetchFn;
  migrationsDir?: string;
  binary?: CockroachBinaryOptions;
  caServerLauncher?: CaServerLauncher;
  ownPid?: number;
}

/**
 * Re-run this same CLI entry point as `ca-server run`
 */
export function selfLauncher(): CaServerLauncher {
  return {
    command: process.execPath,
    args: [...process.execArgv, process.argv[1] ?? "roachyard", "ca-server", "run"],
  };
}

export function createContext(options: ContextOptions = {}): AppContext {
  const home = options.home ?? getRoachyardHome();
  const paths = getPaths(home);
  const files = getFiles(paths);
  const runner = options.runner ?? execaRunner;
  const logger = options.logger ?? uiLogger;
  const sleep = options.sleep ?? realSleep;

  const config = new ConfigStore(files.config, logger);
  const supervisor = new ProcessSupervisor(runner, { sleep, ownPid: options.ownPid });
  const binary = new CockroachBinary(runner, logger, options.binary);
  const sql = new SqlClient(runner, binary, async () => ({
    certsDir: paths.certs,
    sqlPort: (await config.load()).sql_port,
  }));

  const certs = new CertificateManager({
    certsDir: paths.certs,
    files: {
      caCert: files.caCert,
      caKey: files.caKey,
      nodeCert: files.nodeCert,
      nodeKey: files.nodeKey,
      clientCert: files.clientCert,
      clientKey: files.clientKey,
      clientKeyPkcs8: files.clientKeyPkcs8,
    },
    runner,
    binary,
    config,
    logger,
    fetch: options.fetch ?? fetch,
  });

  const caServer = new CaServerController({
    files,
    runner,
    supervisor,
    config,
    logger,
    launcher: options.caServerLauncher ?? selfLauncher(),
  });

  const migrations = new MigrationEngine({
    sql,
    config,
    migrationsDir: options.migrationsDir ?? getMigrationsDir(),
    stagingDir: paths.state,
    logger,
  });

  const cluster = new ClusterController({
    paths,
    files,
    runner,
    supervisor,
    binary,
    sql,
    config,
    migrations,
    caServer,
    logger,
    sleep,
  });

  const services = new ServiceManager({ paths, runner, supervisor, config, logger });

  return {
    home,
    paths,
    files,
    runner,
    logger,
    config,
    supervisor,
    binary,
    sql,
    certs,
    caServer,
    migrations,
    cluster,
    services,
  };
}
