import axios, { AxiosInstance, AxiosProxyConfig, AxiosResponse } from "axios";
import pLimit from "p-limit";
import { NET } from "../config.js";
import { DownloaderError } from "../errors.js";
import { debug } from "../logger.js";
import { ChannelSettings } from "../types.js";

const concurrencyLimit = pLimit(NET.CONCURRENCY);

const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNABORTED"]);

interface CachedResponse {
  readonly expiresAt: number;
  readonly data: Buffer;
}

function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

function isRetryable(rawError: unknown): boolean {
  if (!axios.isAxiosError(rawError)) {
    return false;
  }
  const status = rawError.response?.status;
  const isNetworkIssue = rawError.code !== undefined && RETRYABLE_CODES.has(rawError.code);
  const isRetryableStatus = typeof status === "number" && status >= 500 && status < 600;
  return isNetworkIssue || isRetryableStatus;
}

async function executeWithRetry<T>(
  operation: () => Promise<AxiosResponse<T>>,
  attempt: number,
  verbose: boolean
): Promise<AxiosResponse<T>> {
  try {
    return await operation();
  } catch (rawError) {
    const nextAttempt = attempt + 1;
    if (nextAttempt >= NET.RETRY_ATTEMPTS || !isRetryable(rawError)) {
      throw rawError;
    }
    const backoff = NET.RETRY_BASE_DELAY_MS * 2 ** attempt;
    const url = axios.isAxiosError(rawError) ? rawError.config?.url ?? "unknown-url" : "unknown-url";
    debug(`HTTP retry (${nextAttempt}/${NET.RETRY_ATTEMPTS}) after ${backoff}ms for ${url}`, verbose);
    await sleep(backoff);
    return executeWithRetry(operation, nextAttempt, verbose);
  }
}

function describeFailure(rawError: unknown): { readonly reason: string; readonly status?: number } {
  if (axios.isAxiosError(rawError)) {
    const status = rawError.response?.status;
    return status === undefined ? { reason: rawError.message } : { reason: `HTTP error ${status}`, status };
  }
  return { reason: rawError instanceof Error ? rawError.message : String(rawError) };
}

/**
 * Translate a proxy URL from the settings into axios' proxy configuration.
 *
 * `https://` targets use `httpsProxy`, falling back to `httpProxy`.
 */
export function proxyFor(url: string, settings: ChannelSettings): AxiosProxyConfig | false {
  const raw = /^https:/i.test(url) ? settings.httpsProxy ?? settings.httpProxy : settings.httpProxy;
  if (!raw) {
    return false;
  }
  const parsed = new URL(raw);
  const protocol = parsed.protocol.replace(/:$/, "");
  return {
    protocol,
    host: parsed.hostname,
    port: parsed.port ? Number.parseInt(parsed.port, 10) : protocol === "https" ? 443 : 80,
    ...(settings.proxyUsername
      ? { auth: { username: settings.proxyUsername, password: settings.proxyPassword ?? "" } }
      : {})
  };
}

/**
 * Append the configured query string parameters for the URL's host.
 */
export function withQueryParams(url: string, settings: ChannelSettings): string {
  const params = settings.queryStringParams;
  if (!params) {
    return url;
  }
  const target = new URL(url);
  const extra = params[target.hostname];
  if (!extra) {
    return url;
  }
  for (const [key, value] of Object.entries(extra)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

/**
 * Fetches raw bytes over HTTP(S) with retries, bounded concurrency and a short-lived in-memory cache.
 */
export class Downloader {
  readonly client: AxiosInstance;
  private readonly cache = new Map<string, CachedResponse>();

  constructor(private readonly settings: ChannelSettings) {
    this.client = axios.create({
      timeout: Math.round(settings.timeout * 1000),
      maxRedirects: 5,
      responseType: "arraybuffer",
      headers: {
        "User-Agent": settings.userAgent,
        Accept: "application/json"
      }
    });
  }

  /**
   * Download the body of `url`.
   *
   * @param errorContext - Sentence prefixed to the failure message, e.g. `Error downloading channel.`
   * @throws DownloaderError once retries are exhausted or the failure is not retryable.
   */
  async fetch(url: string, errorContext: string): Promise<Buffer> {
    const cached = this.cache.get(url);
    if (cached && cached.expiresAt > Date.now()) {
      debug(`Using cached response for ${url}`, this.settings.debug);
      return cached.data;
    }

    let data: Buffer;
    try {
      const requestUrl = withQueryParams(url, this.settings);
      const proxy = proxyFor(url, this.settings);
      const response = await concurrencyLimit(() =>
        executeWithRetry(() => this.client.get<ArrayBuffer>(requestUrl, { proxy }), 0, this.settings.debug)
      );
      debug(`Downloaded ${url} with status ${response.status}`, this.settings.debug);
      data = Buffer.from(response.data);
    } catch (rawError) {
      const { reason, status } = describeFailure(rawError);
      throw new DownloaderError(`${errorContext} ${reason} downloading ${url}.`, {
        url,
        status,
        cause: rawError
      });
    }

    if (this.settings.cacheLength > 0) {
      this.cache.set(url, { expiresAt: Date.now() + this.settings.cacheLength * 1000, data });
    }
    return data;
  }
}
