import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Dispatcher, Pool } from 'undici';

export interface HttpRequestOptions {
  method?: Dispatcher.HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  /** Retries on transport failures only; any HTTP status is returned as is */
  maxRetries?: number;
  retryDelayMs?: number;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  /** Parsed JSON when the body is JSON, the raw text otherwise */
  body: unknown;
}

/**
 * No HTTP response was obtained (connection refused, reset, timeout).
 */
export class HttpTransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HttpTransportError';
  }
}

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly logger = new Logger(HttpClientService.name);
  private readonly pools: Map<string, Pool> = new Map();
  private readonly defaultTimeout = 30000;
  private readonly defaultMaxRetries = 3;
  private readonly defaultRetryDelay = 1000;

  private getPool(origin: string): Pool {
    let pool = this.pools.get(origin);
    if (!pool) {
      pool = new Pool(origin, {
        connections: 10,
        pipelining: 1,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }

  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const parsedUrl = new URL(url);
    const path = parsedUrl.pathname + parsedUrl.search;
    const method = options.method ?? 'GET';

    const pool = this.getPool(parsedUrl.origin);
    const timeout = options.timeoutMs ?? this.defaultTimeout;
    const maxRetries = options.maxRetries ?? this.defaultMaxRetries;
    const retryDelay = options.retryDelayMs ?? this.defaultRetryDelay;

    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await pool.request({
          path,
          method,
          headers: options.headers,
          body: options.body,
          headersTimeout: timeout,
          bodyTimeout: timeout,
        });

        const text = await response.body.text();

        return {
          statusCode: response.statusCode,
          headers: response.headers,
          body: parseBody(text),
        };
      } catch (error) {
        lastError = error;
        if (attempt < maxRetries) {
          this.logger.warn(
            `${method} ${url} failed (attempt ${attempt + 1}/${maxRetries + 1}): ${describe(error)}; retrying`,
          );
          await this.delay(retryDelay * Math.pow(2, attempt));
        }
      }
    }

    this.logger.error(`${method} ${url} failed after ${maxRetries + 1} attempt(s): ${describe(lastError)}`);
    throw new HttpTransportError(`${method} ${url} failed: ${describe(lastError)}`, url, maxRetries + 1, {
      cause: lastError,
    });
  }

  async get(url: string, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  async post(
    url: string,
    body: unknown,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>,
  ): Promise<HttpResponse> {
    return this.request(url, {
      ...options,
      method: 'POST',
      body: JSON.stringify(body),
      headers: {
        'Content-Type': 'application/json',
        ...options?.headers,
      },
    });
  }

  async delete(url: string, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'DELETE' });
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  async onModuleDestroy(): Promise<void> {
    await this.destroy();
  }

  async destroy(): Promise<void> {
    const closePromises = Array.from(this.pools.values()).map((pool) => pool.close());
    await Promise.all(closePromises);
    this.pools.clear();
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
