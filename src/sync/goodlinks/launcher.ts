import { execFile } from "child_process";
import { setTimeout as sleep } from "timers/promises";
import { promisify } from "util";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("goodlinks-launcher");

export interface AppLauncher {
  isRunning(): Promise<boolean>;
  launch(): Promise<void>;
  quit(): Promise<void>;
}

export type ExecFn = (file: string, args: string[]) => Promise<unknown>;

const execFileAsync: ExecFn = promisify(execFile);

export interface MacAppLauncherOptions {
  appName?: string;
  /** How long to give the app to come up after `open -a`. */
  startupDelayMs?: number;
  exec?: ExecFn;
}

/** Starts and stops GoodLinks through the macOS `open`, `pgrep` and `osascript` tools. */
export class MacAppLauncher implements AppLauncher {
  private appName: string;
  private startupDelayMs: number;
  private exec: ExecFn;

  constructor(options: MacAppLauncherOptions = {}) {
    this.appName = options.appName ?? "GoodLinks";
    this.startupDelayMs = options.startupDelayMs ?? 2_000;
    this.exec = options.exec ?? execFileAsync;
  }

  async isRunning(): Promise<boolean> {
    try {
      await this.exec("pgrep", ["-x", this.appName]);
      return true;
    } catch (error) {
      // pgrep exits 1 when nothing matched
      if (error instanceof Error && "code" in error && error.code === 1) {
        return false;
      }
      throw error;
    }
  }

  async launch(): Promise<void> {
    log.info(`Launching ${this.appName}...`);
    await this.exec("open", ["-a", this.appName]);
    if (this.startupDelayMs > 0) {
      await sleep(this.startupDelayMs);
    }
  }

  async quit(): Promise<void> {
    log.info(`Closing ${this.appName}`);
    await this.exec("osascript", ["-e", `tell application "${this.appName}" to quit`]);
  }
}
