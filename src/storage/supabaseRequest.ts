import pRetry from 'p-retry';
import type { Logger } from 'pino';
import { z } from 'zod';

type SupabaseErrorLike = {
  message: string;
  code?: string;
};

export class SupabaseStoreError extends Error {
  readonly code: string | undefined;

  constructor(action: string, error: SupabaseErrorLike) {
    super(`Supabase ${action} failed: ${error.message}`);
    this.name = 'SupabaseStoreError';
    this.code = error.code;
  }
}

export type SupabaseRequestOptions = {
  logger: Logger;
  retryCount: number;
  requestTimeoutMs: number;
};

export const DEFAULT_SUPABASE_RETRY_COUNT = 3;
export const DEFAULT_SUPABASE_TIMEOUT_MS = 10_000;

/**
 * Runs one PostgREST request with a per-attempt timeout and bounded
 * exponential retry. `request` gets the attempt's abort signal to hand to
 * the query builder.
 */
export async function runSupabaseRequest<T>(
  action: string,
  request: (signal: AbortSignal) => Promise<T>,
  options: SupabaseRequestOptions
): Promise<T> {
  return pRetry(
    async () => {
      try {
        return await withTimeout(action, request, options.requestTimeoutMs);
      } catch (error: unknown) {
        if (!isRetryable(error)) {
          throw new pRetry.AbortError(error instanceof Error ? error : String(error));
        }
        throw error;
      }
    },
    {
      retries: options.retryCount,
      factor: 2,
      minTimeout: 100,
      maxTimeout: 2000,
      onFailedAttempt: (error) => {
        options.logger.warn(
          {
            action,
            attemptNumber: error.attemptNumber,
            retriesLeft: error.retriesLeft,
            errorMessage: error.message
          },
          'supabase request attempt failed'
        );
      }
    }
  );
}

async function withTimeout<T>(
  action: string,
  request: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timeoutHandle: NodeJS.Timeout | undefined;

  // the builder may ignore the signal, so the race bounds the attempt either way
  const timeout = new Promise<never>((_, rejectTimeout) => {
    timeoutHandle = setTimeout(() => {
      controller.abort();
      rejectTimeout(new SupabaseStoreError(action, { message: `request timed out after ${timeoutMs}ms` }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([request(controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

/** Schema, syntax and PostgREST request errors will not go away on retry. */
function isRetryable(error: unknown): boolean {
  if (error instanceof z.ZodError) {
    return false;
  }

  if (error instanceof SupabaseStoreError && error.code) {
    return !(error.code.startsWith('42') || error.code.startsWith('22') || error.code.startsWith('PGRST'));
  }

  return true;
}
