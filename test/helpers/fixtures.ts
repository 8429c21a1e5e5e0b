import { copyFile, mkdir, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

const CERTS = join(dirname(fileURLToPath(import.meta.url)), "..", "fixtures", "certs");

export type FixtureCert = "ca-a.crt" | "ca-b.crt" | "node-a.crt" | "client-a.crt";

export function fixturePath(name: FixtureCert): string {
  return join(CERTS, name);
}

export async function placeFixture(name: FixtureCert, target: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  await copyFile(fixturePath(name), target);
}

/** Key files are only checked for presence */
export async function placeKey(target: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, "placeholder key\n");
}
