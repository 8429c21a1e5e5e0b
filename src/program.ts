import { Command } from "commander";
import { caServerCert, caServerRun, caServerStart, caServerStatus, caServerStop } from "./commands/ca-server";
import { certsClient, certsCreateCa, certsFetchCa, certsInit, certsNode, certsStatus } from "./commands/certs";
import { clusterInit, clusterStart, clusterStop } from "./commands/cluster";
import { configAddNode, configEdit, configRemoveNode, configSet, configShow } from "./commands/config";
import { dbCreate, dbDrop, dbUser } from "./commands/db";
import { install } from "./commands/install";
import { menu } from "./commands/menu";
import { migrateCreate, migrateRun, migrateStatus } from "./commands/migrate";
import { purge } from "./commands/purge";
import { parseServiceKind, servicesStart, servicesStatus, servicesStop } from "./commands/services";
import { setup } from "./commands/setup";
import { status } from "./commands/status";
import type { AppContext } from "./lib/context";
import { VERSION } from "./lib/constants";
import { ensureDirectories } from "./lib/fs";
import * as ui from "./lib/ui";

type ContextFactory = () => AppContext;

/**
 * Build the command tree. Every action gets the context lazily so `--help`
 * never touches the filesystem; failures print and set exit code 1.
 */
export function buildProgram(getContext: ContextFactory): Command {
  let ctx: AppContext | undefined;
  const context = (): AppContext => {
    ctx ??= getContext();
    return ctx;
  };

  const run =
    <A extends unknown[]>(fn: (ctx: AppContext, ...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await fn(context(), ...args);
      } catch (err) {
        ui.printError(err);
        process.exitCode = 1;
      }
    };

  const program = new Command();

  program
    .name("roachyard")
    .description("Bootstrap and operate a secure CockroachDB node on a single host")
    .version(VERSION)
    .hook("preAction", async () => {
      await ensureDirectories(context().paths);
    });

  program
    .command("setup")
    .description("First-run wizard: install, configure and create certificates")
    .option("--first-node", "Treat this host as the first node of the cluster")
    .option("-y, --yes", "Accept defaults without prompting")
    .action(run((c: AppContext, options: { firstNode?: boolean; yes?: boolean }) => setup(c, options)));

  program
    .command("install")
    .description("Download and install the cockroach binary")
    .option("-f, --force", "Reinstall even if already present")
    .action(run((c: AppContext, options: { force?: boolean }) => install(c, options)));

  program.command("status").description("Show an overview of this node").action(run(status));

  // config
  const config = program.command("config").description("Manage the configuration");

  config.command("show").description("Print the current configuration").action(run(configShow));

  config
    .command("set <key> <value>")
    .description("Set one setting (prefix with services. for the services section)")
    .action(run((c: AppContext, key: string, value: string) => configSet(c, key, value)));

  config
    .command("add-node <host:port>")
    .description("Add a peer to the join list")
    .action(run((c: AppContext, node: string) => configAddNode(c, node)));

  config
    .command("remove-node <host:port>")
    .description("Remove a peer from the join list")
    .action(run((c: AppContext, node: string) => configRemoveNode(c, node)));

  config.command("edit").description("Edit the configuration interactively").action(run(configEdit));

  // certs
  const certs = program.command("certs").description("Manage TLS certificates");

  certs.command("status").description("Show which certificate files are present").action(run(certsStatus));

  certs
    .command("create-ca")
    .description("Create the cluster certificate authority")
    .option("--regenerate", "Replace an existing CA")
    .option("-f, --force", "Skip the confirmation when regenerating")
    .action(run((c: AppContext, options: { regenerate?: boolean; force?: boolean }) => certsCreateCa(c, options)));

  certs
    .command("fetch-ca")
    .description("Download the CA certificate from a peer's CA server")
    .option("--url <url>", "Fetch from this URL instead of the configured peers")
    .action(run((c: AppContext, options: { url?: string }) => certsFetchCa(c, options)));

  certs.command("node").description("Issue the node certificate").action(run(certsNode));
  certs.command("client").description("Issue the root client certificate").action(run(certsClient));

  certs
    .command("init")
    .description("Create or fetch the CA, then issue node and client certificates")
    .option("--first-node", "Create a new CA instead of fetching one")
    .action(run((c: AppContext, options: { firstNode?: boolean }) => certsInit(c, { firstNode: options.firstNode ?? false })));

  // cluster
  const cluster = program.command("cluster").description("Control the local cockroach node");

  cluster
    .command("start")
    .description("Start the node and the CA server")
    .option("--first-node", "This node starts the cluster")
    .action(run((c: AppContext, options: { firstNode?: boolean }) => clusterStart(c, options)));

  cluster.command("stop").description("Stop the node").action(run(clusterStop));
  cluster.command("init").description("Initialize the cluster and create the database").action(run(clusterInit));

  // db
  const db = program.command("db").description("Manage the application database");

  db.command("create").description("Create the database and apply migrations").action(run(dbCreate));

  db.command("drop")
    .description("Drop the database")
    .option("-f, --force", "Skip the confirmation prompt")
    .action(run((c: AppContext, options: { force?: boolean }) => dbDrop(c, options)));

  db.command("user")
    .description("Create an admin user for the web console")
    .option("-u, --username <username>", "User name (defaults to admin_user)")
    .option("-p, --password <password>", "Password")
    .option("--generate", "Generate a random password")
    .action(run((c: AppContext, options: { username?: string; password?: string; generate?: boolean }) => dbUser(c, options)));

  // migrate
  const migrate = program.command("migrate").description("Manage schema migrations");

  migrate.command("run").description("Apply all pending migrations").action(run(migrateRun));
  migrate.command("status").description("Show applied and pending migrations").action(run(migrateStatus));
  migrate
    .command("create <name>")
    .description("Create a new migration file")
    .action(run((c: AppContext, name: string) => migrateCreate(c, name)));

  // ca-server
  const caServer = program.command("ca-server").description("Serve the CA certificate to joining nodes");

  caServer.command("start").description("Start the CA server in the background").action(run(caServerStart));
  caServer.command("stop").description("Stop the CA server").action(run(caServerStop));
  caServer.command("status").description("Show whether the CA server is running").action(run(caServerStatus));
  caServer
    .command("cert")
    .description("Obtain the CA server's HTTPS certificate with certbot")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(run((c: AppContext, options: { yes?: boolean }) => caServerCert(c, options)));
  caServer.command("run", { hidden: true }).description("Run the CA server in the foreground").action(run(caServerRun));

  // services
  const services = program.command("services").description("Manage the backend and dashboard");

  services
    .command("start <service>")
    .description("Start backend or dashboard")
    .action(run((c: AppContext, kind: string) => servicesStart(c, parseServiceKind(kind))));

  services
    .command("stop <service>")
    .description("Stop backend or dashboard")
    .action(run((c: AppContext, kind: string) => servicesStop(c, parseServiceKind(kind))));

  services.command("status").description("Show service status").action(run(servicesStatus));

  program
    .command("purge")
    .description("Delete all cluster data, certificates and logs")
    .option("-f, --force", "Skip all confirmation prompts")
    .action(run((c: AppContext, options: { force?: boolean }) => purge(c, options)));

  program.command("menu").description("Interactive menu").action(run(menu));

  return program;
}
