// src/utils/retry.ts
import mongoose from "mongoose";
import { logger } from "./logger";

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Writes that are not safe to repeat retry only when nothing reached the server. */
  idempotent?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function isServerSelectionError(err: unknown): boolean {
  return err instanceof mongoose.mongo.MongoServerSelectionError;
}

export function isTransientStoreError(err: unknown): boolean {
  if (isServerSelectionError(err)) return true;
  if (err instanceof mongoose.mongo.MongoNetworkError) return true;
  if (err instanceof mongoose.mongo.MongoError) {
    return (
      err.hasErrorLabel("RetryableWriteError") ||
      err.hasErrorLabel("TransientTransactionError")
    );
  }
  return false;
}

/**
 * Runs `op`, retrying transient document-store failures with exponential
 * backoff. Anything else is rethrown at once.
 */
export async function withRetry<T>(
  label: string,
  op: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = options.attempts ?? 3;
  const base = options.baseDelayMs ?? 100;
  const max = options.maxDelayMs ?? 2000;
  const idempotent = options.idempotent ?? true;
  const sleep = options.sleep ?? defaultSleep;

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await op();
    } catch (err) {
      const retryable = idempotent ? isTransientStoreError(err) : isServerSelectionError(err);
      if (!retryable || attempt >= attempts) throw err;

      const backoff = Math.min(base * 2 ** (attempt - 1), max);
      logger.warn("store operation failed, retrying", {
        op: label,
        attempt,
        backoffMs: backoff,
        error: err instanceof Error ? err.message : String(err),
      });
      await sleep(backoff);
    }
  }
}
