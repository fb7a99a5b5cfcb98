import fs from "fs";
import * as p from "@clack/prompts";
import { z } from "zod";
import { SyncEngine } from "@/sync";
import { configPath, getEnv, type SyncEnv } from "@/sync/config/env";
import { credentialsSchema, loadConfig, writeConfig, type SyncConfig } from "@/sync/config/file";
import { GoodLinksReader } from "@/sync/goodlinks/reader";
import { MacAppLauncher, type AppLauncher } from "@/sync/goodlinks/launcher";
import { InstapaperClient } from "@/sync/instapaper/client";
import { LedgerStore } from "@/sync/ledger/repository";
import { configureLogging } from "@/sync/logger";
import { ConfigError, errorMessage } from "@/sync/types";
import type { CliArgs } from "./args";
import { exitCodeFor, formatStatus } from "./format";

/** Process-level collaborators; tests swap them for in-process fakes. */
export interface CommandContext {
  env?: SyncEnv;
  launcher?: AppLauncher;
  fetch?: typeof fetch;
}

export interface EngineOptions {
  maxRetries?: number;
  launcher?: AppLauncher;
  fetch?: typeof fetch;
}

export function buildEngine(config: SyncConfig, ledger: LedgerStore, options: EngineOptions = {}): SyncEngine {
  return new SyncEngine({
    source: new GoodLinksReader(config.sourcePath),
    state: ledger,
    history: ledger,
    submitter: new InstapaperClient(config.credentials, {
      timeoutMs: config.requestTimeoutMs,
      maxRetries: options.maxRetries,
      fetch: options.fetch,
    }),
    launcher: options.launcher ?? new MacAppLauncher(),
    launchIfNeeded: config.launchGoodLinks,
  });
}

export async function runCommand(args: CliArgs, context: CommandContext = {}): Promise<number> {
  const env = context.env ?? getEnv();
  switch (args.command) {
    case "init":
      return runInit(args, env);
    case "sync":
      return runSync(args, env, context);
    case "status":
      return runStatus(env, context);
    case "reset":
      return runReset(env);
  }
}

const legacyStateSchema = z.array(z.string());

async function runInit(args: CliArgs, env: SyncEnv): Promise<number> {
  const file = configPath(env);
  p.intro("goodlinks2insta setup");

  if (fs.existsSync(file) && !args.force) {
    if (args.importPath) {
      // Keep the saved credentials, only seed the ledger
      const imported = importLegacyState(args.importPath, loadConfig(file, env));
      p.log.info(`Imported ${imported} previously synced links from ${args.importPath}`);
      p.outro(`Config left unchanged: ${file}`);
      return 0;
    }
    p.log.warn(`Config already exists: ${file}`);
    p.outro("Use --force to overwrite");
    return 0;
  }

  p.log.info("Use the email and password you log in to Instapaper with.");
  const username = await p.text({
    message: "Email",
    validate: (value) => (value.trim() ? undefined : "Email is required"),
  });
  if (p.isCancel(username)) {
    p.cancel("Setup cancelled.");
    return 1;
  }

  const password = await p.password({
    message: "Password",
    validate: (value) => (value ? undefined : "Password is required"),
  });
  if (p.isCancel(password)) {
    p.cancel("Setup cancelled.");
    return 1;
  }

  const credentials = credentialsSchema.safeParse({ username, password });
  if (!credentials.success) {
    p.log.error("Instapaper email and password are both required");
    p.outro("Make sure you've entered both fields and try again.");
    return 1;
  }

  writeConfig(file, credentials.data);
  p.log.success(`Config saved to ${file}`);

  if (args.importPath) {
    const imported = importLegacyState(args.importPath, loadConfig(file, env));
    p.log.info(`Imported ${imported} previously synced links from ${args.importPath}`);
  }

  p.outro("Run 'goodlinks2insta sync' to start syncing.");
  return 0;
}

function importLegacyState(file: string, config: SyncConfig): number {
  let ids: string[];
  try {
    const parsed = legacyStateSchema.safeParse(JSON.parse(fs.readFileSync(file, "utf8")));
    if (!parsed.success) {
      throw new ConfigError(`${file} is not a JSON array of link ids`);
    }
    ids = parsed.data;
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Cannot read ${file}: ${errorMessage(error)}`, { cause: error });
  }

  const ledger = new LedgerStore(config.statePath);
  try {
    return ledger.importLegacyIds(ids, new Date());
  } finally {
    ledger.close();
  }
}

async function runSync(args: CliArgs, env: SyncEnv, context: CommandContext): Promise<number> {
  const config = loadConfig(configPath(env), env);
  configureLogging({ quiet: args.quiet, logFile: config.logFile, level: env.SYNC_LOG_LEVEL });

  const ledger = new LedgerStore(config.statePath);
  try {
    const engine = buildEngine(config, ledger, {
      maxRetries: args.maxRetries,
      launcher: context.launcher,
      fetch: context.fetch,
    });
    const report = await engine.run({ dryRun: args.dryRun, mode: process.stdout.isTTY ? "interactive" : "automated" });
    return exitCodeFor(report);
  } finally {
    ledger.close();
  }
}

async function runStatus(env: SyncEnv, context: CommandContext): Promise<number> {
  const config = loadConfig(configPath(env), env);
  const ledger = new LedgerStore(config.statePath);
  try {
    const status = await buildEngine(config, ledger, { launcher: context.launcher }).getStatus();
    for (const line of formatStatus(status)) {
      console.log(line);
    }
    return 0;
  } finally {
    ledger.close();
  }
}

async function runReset(env: SyncEnv): Promise<number> {
  const config = loadConfig(configPath(env), env);
  const ledger = new LedgerStore(config.statePath);
  try {
    const removed = ledger.reset();
    console.log(removed > 0 ? `Sync state reset (${removed} links will be sent again)` : "No sync state to reset");
    return 0;
  } finally {
    ledger.close();
  }
}
