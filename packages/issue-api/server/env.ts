import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

/** Read in this order; dotenv never overwrites a variable that is already set. */
export const ENV_FILES = [".env.local", ".env"] as const;

function packageRoot(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), "..");
}

let envLoaded = false;

/**
 * Loads the issue API's env files into `process.env`. Must run before
 * `loadConfig()`. Returns the paths that were actually read.
 *
 * `dir` defaults to the package root and is only read once per process;
 * an explicit `dir` is always read.
 */
export function loadServerEnv(dir?: string): string[] {
  if (dir === undefined && envLoaded) return [];

  const root = dir ?? packageRoot();
  const loaded: string[] = [];

  for (const name of ENV_FILES) {
    const path = resolve(root, name);
    if (!existsSync(path)) continue;

    const result = dotenv.config({ path });
    if (result.error) throw result.error;
    loaded.push(path);
  }

  if (dir === undefined) envLoaded = true;
  return loaded;
}
