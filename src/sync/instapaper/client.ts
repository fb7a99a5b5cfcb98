import { setTimeout as sleep } from "timers/promises";
import type { Credentials } from "@/sync/config/file";
import { AuthenticationFailedError, SubmissionFailedError, errorMessage } from "@/sync/types";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("instapaper-client");

const DEFAULT_BASE_URL = "https://www.instapaper.com";
const DEFAULT_TIMEOUT_MS = 30_000;

export interface LinkSubmitter {
  /** Resolves once the link is saved; rejects with `SubmissionFailedError` otherwise. */
  submit(url: string, title: string): Promise<void>;
}

export interface InstapaperClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Extra attempts for server errors, timeouts and dropped connections. */
  maxRetries?: number;
  /** Delay before the first retry; doubles on every further one. */
  backoffMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

/** Instapaper Simple API: one POST per link, HTTP Basic auth. */
export class InstapaperClient implements LinkSubmitter {
  private credentials: Credentials;
  private baseUrl: string;
  private timeoutMs: number;
  private maxRetries: number;
  private backoffMs: number;
  private fetchImpl: typeof fetch;
  private sleepImpl: (ms: number) => Promise<void>;

  constructor(credentials: Credentials, options: InstapaperClientOptions = {}) {
    this.credentials = credentials;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? 0;
    this.backoffMs = options.backoffMs ?? 1_000;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleepImpl = options.sleep ?? ((ms) => sleep(ms));
  }

  async submit(url: string, title: string): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        await this.add(url, title);
        return;
      } catch (error) {
        const failure =
          error instanceof SubmissionFailedError
            ? error
            : new SubmissionFailedError(`Unexpected error adding link: ${errorMessage(error)}`, false, undefined, {
                cause: error,
              });

        if (!failure.retryable || attempt >= this.maxRetries) {
          throw failure;
        }

        const waitMs = this.backoffMs * 2 ** attempt;
        log.warn(`${failure.message}, retrying in ${waitMs / 1000}s...`, { url, attempt: attempt + 1 });
        await this.sleepImpl(waitMs);
      }
    }
  }

  private async add(url: string, title: string): Promise<void> {
    const body = new URLSearchParams({ url });
    // Without a title Instapaper fetches the page's own
    if (title) body.set("title", title);

    let response: Response;
    try {
      response = await this.fetchImpl(new URL("/api/add", this.baseUrl).toString(), {
        method: "POST",
        headers: {
          Authorization: this.authorization(),
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new SubmissionFailedError(`Request timed out after ${this.timeoutMs}ms`, true, undefined, {
          cause: error,
        });
      }
      throw new SubmissionFailedError(`Connection error: ${errorMessage(error)}`, true, undefined, {
        cause: error,
      });
    }

    // Consumed on every path, success included
    let text: string;
    try {
      text = (await response.text()).trim();
    } catch (error) {
      throw new SubmissionFailedError(`Connection error: ${errorMessage(error)}`, true, response.status, {
        cause: error,
      });
    }

    log.debug("Instapaper add response", { url, status: response.status, body: text.slice(0, 200) });

    if (response.status === 201) return;

    if (response.status === 400) {
      throw new SubmissionFailedError("Instapaper rejected the link (400 bad request)", false, 400);
    }
    if (response.status === 403) {
      throw new AuthenticationFailedError(
        "Instapaper authentication failed - check your email and password\nRun 'goodlinks2insta init --force' to update your credentials"
      );
    }
    if (response.status >= 500) {
      throw new SubmissionFailedError(`Server error (status ${response.status})`, true, response.status);
    }
    const detail = text ? `: ${text.slice(0, 200)}` : "";
    throw new SubmissionFailedError(`Instapaper returned status ${response.status}${detail}`, false, response.status);
  }

  private authorization(): string {
    const { username, password } = this.credentials;
    return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
  }
}
