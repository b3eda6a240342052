import { load, type CheerioAPI } from 'cheerio';
import { DecodeError, TransportError, toError } from './errors.js';
import type { SourceLogger } from './types.js';

const DEFAULT_USER_AGENT = 'BoardWatch/0.1 (+job board change tracker)';

export interface FetchClientOptions {
  userAgent?: string;
  headers?: Record<string, string>;
  /** Lower bound of the politeness delay before every attempt. */
  minDelayMs?: number;
  /** Upper bound (exclusive) of the politeness delay. */
  maxDelayMs?: number;
  maxAttempts?: number;
  /** Backoff after failed attempt n (from 0) is backoffUnitMs * 2^n. */
  backoffUnitMs?: number;
  /** Bounds a single attempt. */
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  /** Cancels the current attempt and every later one once aborted. */
  signal?: AbortSignal;
}

type HttpMethod = 'GET' | 'POST';

interface RequestSpec {
  method: HttpMethod;
  accept: string;
  headers?: Record<string, string>;
  body?: string;
}

const silentLogger: SourceLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve) => setTimeout(resolve, ms));
}

function asNonNegative(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) {
    return fallback;
  }

  return value;
}

export class FetchClient {
  private readonly userAgent: string;
  private readonly headers: Record<string, string>;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly maxAttempts: number;
  private readonly backoffUnitMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly signal?: AbortSignal;
  private readonly logger: SourceLogger;

  constructor(options: FetchClientOptions = {}, logger: SourceLogger = silentLogger) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.headers = options.headers ?? {};
    this.minDelayMs = asNonNegative(options.minDelayMs, 1000);
    this.maxDelayMs = asNonNegative(options.maxDelayMs, 3000);
    this.maxAttempts = Math.max(1, Math.floor(asNonNegative(options.maxAttempts, 3)));
    this.backoffUnitMs = asNonNegative(options.backoffUnitMs, 1000);
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : 30_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.signal = options.signal;
    this.logger = logger;
  }

  async getPage(url: string, headers?: Record<string, string>): Promise<string> {
    return this.request(url, { method: 'GET', accept: 'text/html,application/xhtml+xml,*/*', headers });
  }

  async getHtml(url: string, headers?: Record<string, string>): Promise<CheerioAPI> {
    const html = await this.getPage(url, headers);
    if (html.trim().length === 0) {
      throw new DecodeError(url, 'html', `Empty HTML document from ${url}`);
    }

    return load(html);
  }

  async getJson(url: string, headers?: Record<string, string>): Promise<unknown> {
    const text = await this.request(url, { method: 'GET', accept: 'application/json', headers });
    return this.decodeJson(url, text);
  }

  async postJson(url: string, body: unknown, headers?: Record<string, string>): Promise<unknown> {
    const text = await this.request(url, {
      method: 'POST',
      accept: 'application/json',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
    return this.decodeJson(url, text);
  }

  private decodeJson(url: string, text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new DecodeError(url, 'json', `Invalid JSON response from ${url}: ${toError(error).message}`, error);
    }
  }

  private async request(url: string, spec: RequestSpec): Promise<string> {
    let lastError: TransportError | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      await sleep(this.politenessDelayMs());
      this.throwIfAborted(url, spec.method, attempt);
      this.logger.debug(`Fetching ${url} (attempt ${attempt + 1})`, { url, method: spec.method, attempt: attempt + 1 });

      try {
        return await this.requestOnce(url, spec, attempt + 1);
      } catch (error) {
        lastError = this.toTransportError(error, url, spec.method, attempt + 1);
        this.throwIfAborted(url, spec.method, attempt + 1);
        this.logger.warn(`Attempt ${attempt + 1} failed for ${url}: ${lastError.message}`, {
          url,
          attempt: attempt + 1,
          status: lastError.status,
        });

        if (attempt < this.maxAttempts - 1) {
          await sleep(this.backoffUnitMs * 2 ** attempt);
        }
      }
    }

    throw (
      lastError ??
      new TransportError(url, `${spec.method} ${url} failed after ${this.maxAttempts} attempts`, {
        attempts: this.maxAttempts,
      })
    );
  }

  private async requestOnce(url: string, spec: RequestSpec, attempt: number): Promise<string> {
    const response = await this.fetchImpl(url, {
      method: spec.method,
      headers: this.buildHeaders(spec),
      body: spec.body,
      signal: this.signal
        ? AbortSignal.any([this.signal, AbortSignal.timeout(this.timeoutMs)])
        : AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new TransportError(url, `${spec.method} ${url} returned ${response.status}`, {
        status: response.status,
        attempts: attempt,
      });
    }

    return response.text();
  }

  private buildHeaders(spec: RequestSpec): Record<string, string> {
    return {
      'User-Agent': this.userAgent,
      Accept: spec.accept,
      ...this.headers,
      ...spec.headers,
    };
  }

  private toTransportError(error: unknown, url: string, method: HttpMethod, attempt: number): TransportError {
    if (error instanceof TransportError) {
      return error;
    }

    const cause = toError(error);
    return new TransportError(url, `${method} ${url} failed: ${cause.message}`, { attempts: attempt, cause });
  }

  private throwIfAborted(url: string, method: HttpMethod, attempts: number): void {
    if (this.signal?.aborted) {
      throw new TransportError(url, `${method} ${url} aborted after ${attempts} attempts`, {
        attempts,
        cause: this.signal.reason,
      });
    }
  }

  private politenessDelayMs(): number {
    if (this.maxDelayMs <= this.minDelayMs) {
      return this.minDelayMs;
    }

    return this.minDelayMs + Math.random() * (this.maxDelayMs - this.minDelayMs);
  }
}
