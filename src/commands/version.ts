/**
 * `linkmux --version`: print the CLI version, then exit.
 */
import { readFile } from "node:fs/promises";

export async function readVersion(): Promise<string> {
  // src/commands/version.ts and dist/commands/version.js both sit two levels below the root
  const url = new URL("../../package.json", import.meta.url);
  const pkg: unknown = JSON.parse(await readFile(url, "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

export async function runVersion(): Promise<void> {
  console.log(`linkmux ${await readVersion()}`);
}
