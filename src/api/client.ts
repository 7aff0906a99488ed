import type { z } from "zod";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("http");

export const API_BASE_URL = "https://api.github.com";

const BASE_BACKOFF_MS = 1000;
const RATE_LIMIT_BASE_BACKOFF_MS = 5000;
const JITTER_FACTOR = 0.25;

export interface HttpRequest {
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  body: Uint8Array;
  retryAfter?: string | null;
}

/**
 * Given a URL and headers, returns a status code and body, or rejects with a
 * TransportError when no response arrived at all.
 */
export type HttpTransport = (url: string, request: HttpRequest) => Promise<HttpResponse>;

export class TransportError extends Error {
  constructor(message: string, public readonly timedOut = false) {
    super(message);
    this.name = "TransportError";
  }
}

export class ApiError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly body: string;
  readonly url: string;
  readonly retryable: boolean;

  constructor(opts: { status: number; statusText: string; body: string; url: string }) {
    super(`GitHub error ${opts.status}: ${opts.statusText}`);
    this.name = "ApiError";
    this.status = opts.status;
    this.statusText = opts.statusText;
    this.body = opts.body;
    this.url = opts.url;
    this.retryable = opts.status >= 500 || opts.status === 429;
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    public readonly lastError: Error,
  ) {
    super(`Request to ${url} failed after ${attempts} attempts: ${lastError.message}`);
    this.name = "RetryExhaustedError";
  }
}

export class ResponseFormatError extends Error {
  constructor(public readonly url: string, detail: string) {
    super(`Unexpected response from ${url}: ${detail}`);
    this.name = "ResponseFormatError";
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof ApiError && err.status === 404;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Add ±25% jitter to a delay value. */
function addJitter(ms: number): number {
  const jitter = ms * JITTER_FACTOR * (2 * Math.random() - 1);
  return Math.max(0, ms + jitter);
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

/** Transport over the global fetch with a per-request AbortController timeout. */
export const fetchTransport: HttpTransport = async (url, request) => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);
  try {
    const res = await fetch(url, { headers: request.headers, signal: controller.signal, redirect: "follow" });
    const body = new Uint8Array(await res.arrayBuffer());
    return {
      status: res.status,
      statusText: res.statusText,
      body,
      retryAfter: res.headers.get("Retry-After"),
    };
  } catch (err) {
    if (isAbortError(err)) {
      throw new TransportError(`Request timed out after ${request.timeoutMs / 1000}s`, true);
    }
    throw new TransportError(`Network error: ${err instanceof Error ? err.message : String(err)}`);
  } finally {
    clearTimeout(timeoutId);
  }
};

export interface GitHubHttpOptions {
  token?: string;
  transport?: HttpTransport;
  /** Timeout for API and metadata requests, in milliseconds. */
  timeoutMs?: number;
  /** Timeout for archive downloads, in milliseconds. */
  downloadTimeoutMs?: number;
  maxRetries?: number;
  baseUrl?: string;
}

export type RequestKind = "metadata" | "download";

/**
 * Low-level GitHub HTTP access: headers, timeouts, retries and error mapping.
 * Anything above this layer only sees parsed values or ApiError /
 * RetryExhaustedError.
 */
export class GitHubHttp {
  readonly baseUrl: string;
  private readonly token?: string;
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly downloadTimeoutMs: number;
  private readonly maxRetries: number;

  constructor(opts: GitHubHttpOptions = {}) {
    this.baseUrl = opts.baseUrl ?? API_BASE_URL;
    this.token = opts.token;
    this.transport = opts.transport ?? fetchTransport;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.downloadTimeoutMs = opts.downloadTimeoutMs ?? 30_000;
    this.maxRetries = opts.maxRetries ?? 2;
  }

  get authenticated(): boolean {
    return Boolean(this.token);
  }

  private get apiHeaders(): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/vnd.github.v3+json" };
    if (this.token) headers.Authorization = `token ${this.token}`;
    return headers;
  }

  buildUrl(path: string, params?: Record<string, string | number | undefined>): string {
    let url = /^https?:\/\//.test(path) ? path : `${this.baseUrl}${path}`;
    if (params) {
      const defined: Record<string, string> = {};
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) defined[key] = String(value);
      }
      const query = new URLSearchParams(defined).toString();
      if (query) url += `?${query}`;
    }
    return url;
  }

  /** GET an API path and validate the JSON body against `schema`. */
  async getJson<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    params?: Record<string, string | number | undefined>,
  ): Promise<z.infer<S>> {
    const url = this.buildUrl(path, params);
    const res = await this.request(url, this.apiHeaders, "metadata");
    const text = new TextDecoder().decode(res.body);
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new ResponseFormatError(url, "body is not JSON");
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ResponseFormatError(url, parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
    }
    return parsed.data;
  }

  /** Raw file contents as text. Raw URLs get no API headers. */
  async getText(url: string): Promise<string> {
    const res = await this.request(url, this.rawHeaders(url), "metadata");
    return new TextDecoder().decode(res.body);
  }

  /** Binary download with the longer archive timeout. */
  async getBytes(url: string): Promise<Uint8Array> {
    const res = await this.request(url, this.rawHeaders(url), "download");
    return res.body;
  }

  private rawHeaders(url: string): Record<string, string> {
    return url.startsWith(this.baseUrl) ? this.apiHeaders : {};
  }

  /**
   * Sends a GET with retry, exponential backoff and rate-limit handling.
   * Retries on transport failures, 5xx and 429; other 4xx are thrown at once.
   */
  private async request(url: string, headers: Record<string, string>, kind: RequestKind): Promise<HttpResponse> {
    const timeoutMs = kind === "download" ? this.downloadTimeoutMs : this.timeoutMs;
    let lastError: Error | undefined;
    let waitMs = 0;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = addJitter(waitMs || BASE_BACKOFF_MS * Math.pow(2, attempt - 1));
        log.warn(`Retry ${attempt}/${this.maxRetries} for ${url} in ${Math.round(delay)}ms`);
        await sleep(delay);
      }
      waitMs = 0;

      let res: HttpResponse;
      try {
        res = await this.transport(url, { headers, timeoutMs });
      } catch (err) {
        if (err instanceof TransportError) {
          lastError = err;
          continue;
        }
        throw err;
      }

      if (res.status >= 200 && res.status < 300) {
        return res;
      }

      const bodyText = new TextDecoder().decode(res.body);
      const error = new ApiError({ status: res.status, statusText: detailOf(res, bodyText), body: bodyText, url });

      if (!error.retryable) {
        throw error;
      }

      if (res.status === 429) {
        const seconds = res.retryAfter ? parseInt(res.retryAfter, 10) : NaN;
        waitMs = Number.isNaN(seconds) ? RATE_LIMIT_BASE_BACKOFF_MS * Math.pow(2, attempt) : seconds * 1000;
      }
      lastError = error;
    }

    const failure = lastError ?? new Error("Unknown failure");
    if (failure instanceof ApiError) throw failure;
    throw new RetryExhaustedError(url, this.maxRetries + 1, failure);
  }
}

function detailOf(res: HttpResponse, bodyText: string): string {
  if (!bodyText) return res.statusText;
  try {
    const parsed: unknown = JSON.parse(bodyText);
    if (typeof parsed === "object" && parsed !== null && "message" in parsed && typeof parsed.message === "string") {
      return parsed.message;
    }
  } catch {
    // not JSON; fall back to the raw text
  }
  return bodyText.length > 200 ? res.statusText : bodyText;
}
