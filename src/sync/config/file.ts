import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError, errorMessage } from "@/sync/types";
import { appDir, expandHome, getEnv, type SyncEnv } from "./env";

export const DEFAULT_LOG_FILE = "~/Library/Logs/goodlinks2insta.log";
export const DEFAULT_SOURCE_PATH =
  "~/Library/Group Containers/group.com.ngocluu.goodlinks/Data/data.sqlite";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const credentialsSchema = z.object({
  username: z.string().trim().min(1, "Instapaper email is required"),
  password: z.string().min(1, "Instapaper password is required"),
});

export const configFileSchema = credentialsSchema.extend({
  launch_goodlinks: z.boolean().default(true),
  // null or "" turns file logging off
  log_file: z.string().nullable().default(DEFAULT_LOG_FILE),
  source_path: z.string().default(DEFAULT_SOURCE_PATH),
  state_path: z.string().optional(),
  request_timeout_ms: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
});

export type Credentials = z.infer<typeof credentialsSchema>;
export type ConfigFile = z.input<typeof configFileSchema>;

export interface SyncConfig {
  credentials: Credentials;
  launchGoodLinks: boolean;
  logFile: string | null;
  sourcePath: string;
  statePath: string;
  requestTimeoutMs: number;
}

export function loadConfig(file: string, env: SyncEnv = getEnv()): SyncConfig {
  if (!fs.existsSync(file)) {
    throw new ConfigError(
      `Config file not found: ${file}\nRun 'goodlinks2insta init' to create it`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${file} (${errorMessage(error)})`, {
      cause: error,
    });
  }

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config in ${file}:\n${problems}`);
  }

  const parsed = result.data;
  const statePath = parsed.state_path ?? env.SYNC_LEDGER_PATH ?? path.join(appDir(env), "sync_ledger.db");

  return {
    credentials: { username: parsed.username, password: parsed.password },
    launchGoodLinks: parsed.launch_goodlinks,
    logFile: parsed.log_file ? path.resolve(expandHome(parsed.log_file)) : null,
    sourcePath: path.resolve(expandHome(parsed.source_path)),
    statePath: path.resolve(expandHome(statePath)),
    requestTimeoutMs: parsed.request_timeout_ms,
  };
}

/** Write a fresh config readable only by the current user. */
export function writeConfig(file: string, credentials: Credentials): ConfigFile {
  const config: ConfigFile = {
    username: credentials.username,
    password: credentials.password,
    launch_goodlinks: true,
    log_file: DEFAULT_LOG_FILE,
  };
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(config, null, 2) + "\n", { mode: 0o600 });
  fs.chmodSync(file, 0o600);
  return config;
}
