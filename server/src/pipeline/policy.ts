import { setTimeout as delay } from 'timers/promises';
import type { ProviderTarget, TargetPair } from '../types/media.js';
import { errorMessage } from '../errors.js';

const TRANSIENT_TOKENS = ['503', '429', '500', 'overloaded', 'unavailable', 'timeout'];

export interface RetryPolicyOptions {
  primaryAttempts: number;
  fallbackAttempts: number;
  backoffMs: number;
  /** Used in log lines, e.g. "stt" or "summary". */
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * An error is transient when its message, status or code mentions one of the
 * overload / rate-limit / timeout tokens. Everything else is permanent.
 */
export function isTransientError(error: unknown): boolean {
  const haystack: string[] = [errorMessage(error)];
  if (error && typeof error === 'object') {
    for (const key of ['status', 'statusCode', 'code'] as const) {
      const value: unknown = Reflect.get(error, key);
      if (typeof value === 'string' || typeof value === 'number') {
        haystack.push(String(value));
      }
    }
  }
  const text = haystack.join(' ').toLowerCase();
  return TRANSIENT_TOKENS.some((token) => text.includes(token));
}

/**
 * Run `op` against the primary target, then the fallback target.
 *
 * Transient failures are retried on the same target after `backoffMs` while
 * attempts remain; a permanent failure abandons the target at once. When both
 * targets are exhausted the last error is re-thrown as is.
 */
export async function withPolicy<T>(
  op: (target: ProviderTarget) => Promise<T>,
  targets: TargetPair,
  options: RetryPolicyOptions
): Promise<T> {
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const label = options.label ?? 'provider';
  const phases: Array<[ProviderTarget, number]> = [
    [targets.primary, options.primaryAttempts],
    [targets.fallback, options.fallbackAttempts],
  ];

  let lastError: unknown = new Error(`[Policy] ${label}: no attempts configured`);

  for (const [target, attempts] of phases) {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await op(target);
      } catch (error) {
        lastError = error;
        const transient = isTransientError(error);
        console.warn(
          `[Policy] ${label} ${target.name} attempt ${attempt}/${attempts} failed (${transient ? 'transient' : 'permanent'}): ${errorMessage(error)}`
        );
        if (!transient || attempt >= attempts) {
          break;
        }
        await sleep(options.backoffMs);
      }
    }
  }

  throw lastError;
}
