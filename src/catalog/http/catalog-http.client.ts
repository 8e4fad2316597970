import { Logger } from '@nestjs/common';
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { Dispatcher, ProxyAgent, request } from 'undici';
import { CatalogFormatError, CatalogRequestError } from '../../common/errors';
import { sleep } from '../../common/utils/sleep';

export type QueryParams = Record<string, string | number | undefined>;

export interface CatalogHttpOptions {
  /** Name used in log lines, e.g. "entrez". */
  name: string;
  userAgent: string;
  timeoutMs: number;
  maxRetries: number;
  /** First backoff delay; doubles on every retry. */
  retryDelayMs: number;
  /** Minimum spacing between request starts. */
  minIntervalMs: number;
  /** Takes precedence over proxyUrl. Tests hand in a MockAgent here. */
  dispatcher?: Dispatcher;
  proxyUrl?: string;
}

export const DEFAULT_USER_AGENT =
  'idat-catalog/0.1 (methylation array metadata crawler)';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

interface OkResponse {
  statusCode: number;
  body: Dispatcher.ResponseData['body'];
}

export function buildUrl(url: string, query: QueryParams = {}): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
}

function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' && RETRYABLE_CODES.has(code);
}

function retryAfterMs(
  headers: Dispatcher.ResponseData['headers'],
): number | undefined {
  const header = headers['retry-after'];
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) return undefined;
  const seconds = parseInt(value, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

/**
 * HTTP access to a remote catalog: rate limited, retried, proxy aware.
 */
export class CatalogHttpClient {
  private readonly logger: Logger;
  private readonly options: CatalogHttpOptions;
  private readonly dispatcher?: Dispatcher;
  private nextSlot = 0;

  constructor(options: Partial<CatalogHttpOptions> & { name: string }) {
    this.options = {
      userAgent: DEFAULT_USER_AGENT,
      timeoutMs: 60_000,
      maxRetries: 3,
      retryDelayMs: 1000,
      minIntervalMs: 0,
      ...options,
    };
    this.logger = new Logger(`CatalogHttp:${this.options.name}`);
    this.dispatcher =
      this.options.dispatcher ??
      (this.options.proxyUrl ? new ProxyAgent(this.options.proxyUrl) : undefined);
  }

  async getText(url: string, query?: QueryParams): Promise<string> {
    const target = buildUrl(url, query);
    const res = await this.send(target);
    return res.body.text();
  }

  async getJson(url: string, query?: QueryParams): Promise<unknown> {
    const target = buildUrl(url, query);
    const text = await (await this.send(target)).body.text();
    try {
      return JSON.parse(text);
    } catch {
      throw new CatalogFormatError(
        target,
        `body is not JSON: ${text.slice(0, 200)}`,
      );
    }
  }

  /**
   * Streams the response body into `destination`, creating parent folders.
   * Returns the number of bytes written.
   */
  async download(url: string, destination: string): Promise<number> {
    const res = await this.send(url);
    await mkdir(path.dirname(destination), { recursive: true });

    let bytes = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        bytes += chunk.length;
        callback(null, chunk);
      },
    });
    await pipeline(res.body, counter, createWriteStream(destination));
    this.logger.debug(`Downloaded ${bytes} bytes from ${url}`);
    return bytes;
  }

  private async send(url: string): Promise<OkResponse> {
    let attempt = 0;

    for (;;) {
      await this.throttle();
      let delay = this.options.retryDelayMs * 2 ** attempt;

      try {
        const { statusCode, headers, body } = await request(url, {
          method: 'GET',
          headers: { 'user-agent': this.options.userAgent },
          dispatcher: this.dispatcher,
          headersTimeout: this.options.timeoutMs,
          bodyTimeout: this.options.timeoutMs,
        });

        if (statusCode >= 200 && statusCode < 300) {
          return { statusCode, body };
        }

        await body.dump();
        if (!RETRYABLE_STATUS.has(statusCode) || attempt >= this.options.maxRetries) {
          throw new CatalogRequestError(url, statusCode);
        }
        delay = retryAfterMs(headers) ?? delay;
        this.logger.warn(
          `${url} answered ${statusCode}, retry ${attempt + 1}/${this.options.maxRetries} in ${delay}ms`,
        );
      } catch (error) {
        if (error instanceof CatalogRequestError) throw error;
        if (!isRetryableError(error) || attempt >= this.options.maxRetries) {
          throw new CatalogRequestError(
            url,
            null,
            `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
          );
        }
        this.logger.warn(
          `${url} failed (${String(error)}), retry ${attempt + 1}/${this.options.maxRetries} in ${delay}ms`,
        );
      }

      attempt++;
      await sleep(delay);
    }
  }

  private async throttle(): Promise<void> {
    const now = Date.now();
    const wait = this.nextSlot - now;
    this.nextSlot = Math.max(now, this.nextSlot) + this.options.minIntervalMs;
    if (wait > 0) {
      await sleep(wait);
    }
  }
}
