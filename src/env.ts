import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parse } from "dotenv";

export type Env = Record<string, string | undefined>;

const ENV_FILES = [".env.local", ".env"];
const PREFIX = "ZIPCAST_";

/**
 * Fill ZIPCAST_* settings from .env.local, then .env, in cwd.
 * A variable that is already set, by the shell or an earlier file, keeps its value.
 */
export function loadEnv(cwd: string = process.cwd(), target: Env = process.env): void {
  for (const name of ENV_FILES) {
    const path = join(cwd, name);
    if (!existsSync(path)) continue;
    for (const [key, value] of Object.entries(parse(readFileSync(path)))) {
      if (key.startsWith(PREFIX) && !(key in target)) target[key] = value;
    }
  }
}

/** Trimmed value of an env var; blank counts as unset. */
export function getEnv(name: string, env: Env = process.env): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}
