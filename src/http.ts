import { InterruptedError, UpstreamError } from "./errors";
import { logDebug, logWarn } from "./log";

export const USER_AGENT = "zipcast/0.1 (weather forecast CLI)";

/** Statuses worth another attempt: rate limiting and server-side trouble. */
export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const MAX_BACKOFF_MS = 120_000;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  /** Seconds; delay before retry n is factor * 2^(n-1), and 0 for the first retry. */
  backoffFactor: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 5,
  backoffFactor: 0.3,
  timeoutMs: 5_000,
};

export interface HttpClientOptions {
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  signal?: AbortSignal;
  policy?: Partial<RetryPolicy>;
}

export interface SendOptions {
  timeoutMs?: number;
}

export interface HttpClient {
  /** GET with retry on RETRY_STATUSES. Resolves with the parsed JSON body. */
  getJson(url: string, headers?: Record<string, string>): Promise<unknown>;
  /** Single attempt, no retry. Rejects on any non-2xx answer. */
  send(url: string, init: RequestInit, options?: SendOptions): Promise<Response>;
}

export function backoffDelayMs(retry: number, backoffFactor: number): number {
  if (retry <= 1) return 0;
  return Math.min(MAX_BACKOFF_MS, Math.round(backoffFactor * 1000 * 2 ** (retry - 1)));
}

/** Retry-After in seconds, as sent with 429 and 503. HTTP-date values are ignored. */
export function retryAfterMs(res: Response): number | null {
  if (res.status !== 429 && res.status !== 503) return null;
  const raw = res.headers.get("retry-after");
  if (!raw || !/^\d+$/.test(raw.trim())) return null;
  return Math.min(MAX_BACKOFF_MS, Number.parseInt(raw.trim(), 10) * 1000);
}

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new InterruptedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new InterruptedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

function requestLabel(method: string, url: string): string {
  return `${method} ${url}`;
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));
  const wait = options.sleep ?? sleep;
  const outer = options.signal;
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.policy };

  /**
   * One request whose timeout also covers reading the body through `read`.
   * Abort from the outer signal becomes InterruptedError, our own timeout an UpstreamError.
   */
  async function attempt<T>(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    read: (res: Response) => Promise<T>
  ): Promise<T> {
    const method = init.method ?? "GET";
    if (outer?.aborted) throw new InterruptedError();
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    outer?.addEventListener("abort", onAbort, { once: true });
    try {
      const res = await fetchImpl(url, { ...init, signal: controller.signal });
      return await read(res);
    } catch (err) {
      if (err instanceof UpstreamError) throw err;
      if (outer?.aborted) throw new InterruptedError();
      if (timedOut) {
        throw new UpstreamError(`${requestLabel(method, url)} timed out after ${timeoutMs}ms`, url, { cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new UpstreamError(`${requestLabel(method, url)} failed: ${reason}`, url, { cause: err });
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    }
  }

  async function getJson(url: string, headers: Record<string, string> = {}): Promise<unknown> {
    const init: RequestInit = {
      method: "GET",
      headers: { Accept: "application/json", "User-Agent": USER_AGENT, ...headers },
    };
    for (let retry = 0; ; retry++) {
      logDebug(`GET ${url}${retry > 0 ? ` (retry ${retry})` : ""}`);
      const outcome = await attempt(url, init, policy.timeoutMs, async (res) => {
        if (res.ok) {
          const body = await res.text();
          try {
            const parsed: unknown = JSON.parse(body);
            return { ok: true as const, body: parsed };
          } catch (err) {
            throw new UpstreamError(`${requestLabel("GET", url)} returned malformed JSON`, url, {
              status: res.status,
              cause: err,
            });
          }
        }
        const delayMs = retryAfterMs(res);
        // Release the connection; the error body is never shown.
        await res.body?.cancel();
        return { ok: false as const, status: res.status, statusText: res.statusText, delayMs };
      });
      if (outcome.ok) return outcome.body;

      const failure = `${requestLabel("GET", url)} failed: ${outcome.status} ${outcome.statusText}`.trim();
      if (!RETRY_STATUSES.has(outcome.status)) {
        throw new UpstreamError(failure, url, { status: outcome.status });
      }
      if (retry >= policy.maxRetries) {
        throw new UpstreamError(`${failure} (gave up after ${policy.maxRetries} retries)`, url, {
          status: outcome.status,
        });
      }
      const delay = outcome.delayMs ?? backoffDelayMs(retry + 1, policy.backoffFactor);
      logWarn(`${failure}; retrying in ${(delay / 1000).toFixed(1)}s`);
      await wait(delay, outer);
    }
  }

  async function send(url: string, init: RequestInit, sendOptions: SendOptions = {}): Promise<Response> {
    const method = init.method ?? "POST";
    const headers = new Headers(init.headers);
    if (!headers.has("User-Agent")) headers.set("User-Agent", USER_AGENT);
    logDebug(`${method} ${url}`);
    return attempt(url, { ...init, method, headers }, sendOptions.timeoutMs ?? policy.timeoutMs, async (res) => {
      if (!res.ok) {
        const detail = (await res.text()).trim().slice(0, 200);
        const message = `${requestLabel(method, url)} failed: ${res.status} ${res.statusText}`.trim();
        throw new UpstreamError(detail ? `${message}: ${detail}` : message, url, { status: res.status });
      }
      return res;
    });
  }

  return { getJson, send };
}
