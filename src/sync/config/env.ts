import os from "os";
import path from "path";
import { z } from "zod";
import { ConfigError } from "@/sync/types";

const envSchema = z.object({
  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),

  // Where config.json and the ledger live
  SYNC_HOME: z
    .string()
    .default(path.join(os.homedir(), "Library", "Application Support", "goodlinks2insta")),
  SYNC_LEDGER_PATH: z.string().optional(),
});

export type SyncEnv = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): SyncEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Sync environment validation failed:\n${problems}`);
  }
  return result.data;
}

let _env: SyncEnv | null = null;

export function getEnv(): SyncEnv {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

/** Expand a leading `~` the way a shell would. */
export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function appDir(env: SyncEnv = getEnv()): string {
  return path.resolve(expandHome(env.SYNC_HOME));
}

export function configPath(env: SyncEnv = getEnv()): string {
  return path.join(appDir(env), "config.json");
}
