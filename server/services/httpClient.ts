/**
 * Outbound HTTP for the market-data sources.
 *
 * Failure to fetch a page is an expected outcome that drives the fallback
 * chain, so `fetchPage` resolves to a result instead of throwing.
 */

import { Agent, fetch as undiciFetch } from 'undici';
import {
  FETCH_BACKOFF_MS,
  FETCH_RETRIES,
  FETCH_TIMEOUT_MS,
  MARKET_DATA_USER_AGENT,
  NETWORK_PROBE_TIMEOUT_MS,
} from '../config.js';
import { describeError, isAbortError } from '../lib/errors.js';

export const NETWORK_PROBE_URL = 'https://www.google.com/finance/';

export interface HttpResponseLike {
  status: number;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  headers: Record<string, string>;
  signal: AbortSignal;
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;
export type SleepFn = (ms: number) => Promise<void>;

export type FetchPageResult =
  | { ok: true; url: string; status: number; body: string }
  | { ok: false; url: string; reason: string; attempts: number };

export interface RetryPolicy {
  retries: number;
  backoffMs: number;
  timeoutMs: number;
}

export interface HttpClientOptions {
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  policy?: Partial<RetryPolicy>;
  probeUrl?: string;
  probeTimeoutMs?: number;
  userAgent?: string;
}

const keepAliveAgent = new Agent({
  keepAliveTimeout: 10_000,
  keepAliveMaxTimeout: 10_000,
  connect: { timeout: 10_000 },
});

const defaultFetch: FetchFn = (url, init) =>
  undiciFetch(url, { headers: init.headers, signal: init.signal, redirect: 'follow', dispatcher: keepAliveAgent });

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class HttpClient {
  readonly policy: RetryPolicy;
  private readonly fetchFn: FetchFn;
  private readonly sleepFn: SleepFn;
  private readonly headers: Record<string, string>;
  private readonly probeUrl: string;
  private readonly probeTimeoutMs: number;
  private probe: Promise<boolean> | null = null;

  constructor(options: HttpClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.sleepFn = options.sleep ?? wait;
    this.policy = {
      retries: Math.max(1, options.policy?.retries ?? FETCH_RETRIES),
      backoffMs: Math.max(0, options.policy?.backoffMs ?? FETCH_BACKOFF_MS),
      timeoutMs: Math.max(1, options.policy?.timeoutMs ?? FETCH_TIMEOUT_MS),
    };
    this.headers = {
      'User-Agent': options.userAgent ?? MARKET_DATA_USER_AGENT,
      'Accept-Language': 'en-US,en;q=0.9',
    };
    this.probeUrl = options.probeUrl ?? NETWORK_PROBE_URL;
    this.probeTimeoutMs = options.probeTimeoutMs ?? NETWORK_PROBE_TIMEOUT_MS;
  }

  sleep(ms: number): Promise<void> {
    return ms > 0 ? this.sleepFn(ms) : Promise.resolve();
  }

  /**
   * GET `url` until a 200 arrives or attempts run out. Waits
   * `backoffMs * 2^(attempt-1)` between attempts.
   */
  async fetchPage(url: string): Promise<FetchPageResult> {
    const { retries, backoffMs, timeoutMs } = this.policy;
    let reason = 'no attempt made';
    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        const resp = await this.fetchFn(url, { headers: this.headers, signal: AbortSignal.timeout(timeoutMs) });
        if (resp.status === 200) {
          const body = await resp.text();
          return { ok: true, url, status: resp.status, body };
        }
        reason = `HTTP ${resp.status}`;
        console.warn(`[http] ${reason} for ${url} (attempt ${attempt}/${retries})`);
      } catch (err: unknown) {
        reason = isAbortError(err) ? `timed out after ${timeoutMs}ms` : describeError(err);
        console.warn(`[http] request error for ${url} (attempt ${attempt}/${retries}): ${reason}`);
      }
      if (attempt < retries) {
        await this.sleep(backoffMs * 2 ** (attempt - 1));
      }
    }
    console.error(`[http] all ${retries} attempts failed for ${url}: ${reason}`);
    return { ok: false, url, reason, attempts: retries };
  }

  /**
   * One reachability check per client. Concurrent callers share the same
   * in-flight probe, so the first answer sticks for the process lifetime.
   */
  isNetworkAlive(): Promise<boolean> {
    if (!this.probe) {
      this.probe = this.runProbe();
    }
    return this.probe;
  }

  private async runProbe(): Promise<boolean> {
    try {
      const resp = await this.fetchFn(this.probeUrl, {
        headers: this.headers,
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      });
      const alive = resp.status === 200;
      console.log(`[http] network probe ${alive ? 'OK' : 'FAILED'} (HTTP ${resp.status})`);
      return alive;
    } catch (err: unknown) {
      console.warn(`[http] network probe failed (${describeError(err)}); using offline data`);
      return false;
    }
  }
}
