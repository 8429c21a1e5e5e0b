import type { AppContext } from "../lib/context";
import { generatePassword } from "../lib/crypto";
import * as ui from "../lib/ui";

interface DropOptions {
  force?: boolean;
}

interface UserOptions {
  username?: string;
  password?: string;
  generate?: boolean;
}

export async function dbCreate(ctx: AppContext): Promise<void> {
  const spin = ui.spinner("Creating database...").start();
  try {
    const run = await ctx.cluster.createDatabase();
    spin.succeed(`Database ready (schema version ${run.currentVersion})`);
    if (run.applied.length > 0) {
      ui.printKeyValue("Applied", run.applied.join(", "));
    }
  } catch (err) {
    spin.fail("Failed to create database");
    throw err;
  }
}

export async function dbDrop(ctx: AppContext, options: DropOptions = {}): Promise<void> {
  const { database_name } = await ctx.config.load();

  if (!options.force) {
    ui.warning(`This permanently deletes database "${database_name}" and everything in it.`);
    const confirmed = await ui.confirm(`Drop "${database_name}"?`);
    if (!confirmed) {
      ui.info("Cancelled.");
      return;
    }
  }

  const spin = ui.spinner(`Dropping ${database_name}...`).start();
  try {
    await ctx.cluster.dropDatabase();
    spin.succeed(`Database ${database_name} dropped`);
  } catch (err) {
    spin.fail(`Failed to drop ${database_name}`);
    throw err;
  }
}

export async function dbUser(ctx: AppContext, options: UserOptions = {}): Promise<void> {
  const password = options.generate ? generatePassword() : options.password;

  const spin = ui.spinner("Creating web console user...").start();
  try {
    const user = await ctx.cluster.createWebUser(options.username, password);
    spin.succeed(`User ${user.username} created`);
    ui.printCredentials(user);
    ui.muted(`Saved to ${user.file}`);
  } catch (err) {
    spin.fail("Failed to create user");
    throw err;
  }
}
