import Bottleneck from 'bottleneck';
import pRetry from 'p-retry';
import type { Logger } from 'pino';
import pino from 'pino';
import { fetch, type Dispatcher } from 'undici';
import { z } from 'zod';

import { PriceUnavailableError } from '../domain/errors.js';

import type { PriceOracle, PriceQuote } from './priceOracle.js';

export type JupiterPriceClientOptions = {
  baseUrl: string;
  logger?: Logger;
  rateLimitRps?: number;
  requestTimeoutMs?: number;
  retryCount?: number;
  /** Lets tests route requests through an undici MockAgent. */
  dispatcher?: Dispatcher;
  now?: () => number;
};

const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
const DEFAULT_RETRY_COUNT = 3;
const DEFAULT_RATE_LIMIT_RPS = 10;
const MAX_IDS_PER_REQUEST = 50;
const PRICE_PATH = '/price/v3';

const priceEntrySchema = z
  .object({
    usdPrice: z.number().optional()
  })
  .passthrough();

const priceResponseSchema = z.record(z.string(), priceEntrySchema.nullable());

export function buildPriceQuery(assetIds: string[]): string {
  const query = new URLSearchParams();
  query.set('ids', [...new Set(assetIds)].join(','));
  return query.toString();
}

/**
 * Quotes USD prices from a Jupiter-style `/price/v3` endpoint. Requests are
 * rate limited, timed out and retried with exponential backoff on 429, 5xx
 * and network failures.
 */
export class JupiterPriceClient implements PriceOracle {
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly limiter: Bottleneck;
  private readonly requestTimeoutMs: number;
  private readonly retryCount: number;
  private readonly dispatcher?: Dispatcher;
  private readonly now: () => number;

  constructor(options: JupiterPriceClientOptions) {
    this.baseUrl = options.baseUrl;
    this.logger = options.logger ?? pino({ name: 'price-client' });
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retryCount = options.retryCount ?? DEFAULT_RETRY_COUNT;
    this.dispatcher = options.dispatcher;
    this.now = options.now ?? Date.now;

    const rateLimitRps = options.rateLimitRps ?? DEFAULT_RATE_LIMIT_RPS;
    const minTimeMs = Math.ceil(1000 / Math.max(1, rateLimitRps));
    this.limiter = new Bottleneck({ maxConcurrent: 1, minTime: minTimeMs });
  }

  async getPrice(assetId: string): Promise<PriceQuote | null> {
    const quotes = await this.getPrices([assetId]);
    return quotes.get(assetId) ?? null;
  }

  /** Quotes many assets at once; ids without a positive price are absent from the result. */
  async getPrices(assetIds: string[]): Promise<Map<string, PriceQuote>> {
    const unique = [...new Set(assetIds)];
    const quotes = new Map<string, PriceQuote>();

    for (let start = 0; start < unique.length; start += MAX_IDS_PER_REQUEST) {
      const batch = unique.slice(start, start + MAX_IDS_PER_REQUEST);
      const body = await this.withRetry(() => this.scheduleRequest(batch), batch);
      const asOf = this.now();

      for (const assetId of batch) {
        const usdPrice = body[assetId]?.usdPrice;
        if (usdPrice !== undefined && Number.isFinite(usdPrice) && usdPrice > 0) {
          quotes.set(assetId, { price: usdPrice, asOf });
        }
      }
    }

    return quotes;
  }

  private async withRetry<T>(fn: () => Promise<T>, assetIds: string[]): Promise<T> {
    try {
      return await pRetry(
        async () => {
          try {
            return await fn();
          } catch (error: unknown) {
            if (!isRetryableError(error)) {
              throw new pRetry.AbortError(error instanceof Error ? error : String(error));
            }
            throw error;
          }
        },
        {
          retries: this.retryCount,
          factor: 2,
          minTimeout: 100,
          maxTimeout: 2000,
          onFailedAttempt: (error) => {
            this.logger.warn(
              {
                assetIds,
                attemptNumber: error.attemptNumber,
                retriesLeft: error.retriesLeft,
                errorMessage: error.message
              },
              'price request attempt failed'
            );
          }
        }
      );
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PriceUnavailableError(assetIds.join(','), reason);
    }
  }

  private async scheduleRequest(assetIds: string[]): Promise<z.infer<typeof priceResponseSchema>> {
    return this.limiter.schedule(async () => {
      const url = new URL(`${PRICE_PATH}?${buildPriceQuery(assetIds)}`, this.baseUrl).toString();

      const controller = new AbortController();
      const timeoutHandle = setTimeout(() => controller.abort(), this.requestTimeoutMs);

      try {
        this.logger.debug({ count: assetIds.length }, 'requesting prices');

        const response = await fetch(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: controller.signal,
          ...(this.dispatcher ? { dispatcher: this.dispatcher } : {})
        });

        if (!response.ok) {
          const bodyText = await response.text();
          throw new PriceHttpError(response.status, bodyText || response.statusText);
        }

        const parsed = priceResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new PriceResponseError(`Unexpected price response: ${parsed.error.message}`);
        }

        return parsed.data;
      } catch (error: unknown) {
        if (isAbortError(error)) {
          throw new PriceNetworkError('Request timeout reached');
        }

        throw error;
      } finally {
        clearTimeout(timeoutHandle);
      }
    });
  }
}

class PriceHttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'PriceHttpError';
    this.statusCode = statusCode;
  }
}

class PriceNetworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PriceNetworkError';
  }
}

class PriceResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PriceResponseError';
  }
}

function isRetryableError(error: unknown): boolean {
  if (error instanceof PriceHttpError) {
    return error.statusCode === 429 || (error.statusCode >= 500 && error.statusCode < 600);
  }

  if (error instanceof PriceNetworkError) {
    return true;
  }

  // undici surfaces connection failures as TypeError('fetch failed')
  return error instanceof TypeError;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
