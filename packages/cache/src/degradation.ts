/**
 * Degradation Controller
 *
 * Circuit breaker around the cache layer. Cache errors are counted and
 * swallowed in favour of a fallback; once maxErrorCount errors have been
 * seen the cache is switched off until reset().
 *
 * State only changes synchronously between awaits, so concurrent guarded
 * calls on one event loop cannot lose an update.
 */

import { CacheDisabledError, CacheUnavailableError, type Clock } from '@cmdrecall/common';

export interface DegradationOptions {
  maxErrorCount: number;
  /** Start with the cache switched off */
  disabled?: boolean;
  clock?: Clock;
}

export interface RecordedError {
  operation: string;
  kind: string;
  message: string;
  at: number;
}

export interface CacheHealth {
  enabled: boolean;
  errorCount: number;
  maxErrorCount: number;
  /** Guarded calls that went straight to the fallback while disabled */
  skipped: number;
  lastError: RecordedError | null;
  errorsByKind: Record<string, number>;
}

/**
 * Class name of the root cause, looking through cache-layer wrappers
 */
export function errorKind(error: unknown): string {
  if (error instanceof CacheUnavailableError && error.cause instanceof Error) {
    return error.cause.name;
  }
  return error instanceof Error ? error.name : 'UnknownError';
}

export class DegradationController {
  private readonly maxErrorCount: number;
  private readonly clock: Clock;
  private enabled: boolean;
  private errorCount = 0;
  private skipped = 0;
  private lastError: RecordedError | null = null;
  private errorsByKind = new Map<string, number>();

  constructor(options: DegradationOptions) {
    this.maxErrorCount = options.maxErrorCount;
    this.clock = options.clock ?? Date.now;
    this.enabled = !options.disabled;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Run cacheOp, or fallback when the cache is off or cacheOp fails.
   * Errors from fallback propagate.
   */
  async guard<T>(
    operation: string,
    cacheOp: () => Promise<T>,
    fallback: () => T | Promise<T>
  ): Promise<T> {
    if (!this.enabled) {
      this.skipped++;
      if (this.skipped === 1) {
        console.warn(`[DEGRADE] ${new CacheDisabledError(operation).message}; further skips are silent`);
      }
      return fallback();
    }

    try {
      return await cacheOp();
    } catch (error) {
      this.recordError(operation, error);
    }
    return fallback();
  }

  recordError(operation: string, error: unknown): void {
    const kind = errorKind(error);
    const message = error instanceof Error ? error.message : String(error);

    this.errorCount++;
    this.errorsByKind.set(kind, (this.errorsByKind.get(kind) ?? 0) + 1);
    this.lastError = { operation, kind, message, at: this.clock() };

    console.warn(
      `[DEGRADE] Cache operation '${operation}' failed (${this.errorCount}/${this.maxErrorCount}): ${message}`
    );

    if (this.enabled && this.errorCount >= this.maxErrorCount) {
      this.enabled = false;
      console.error(`[DEGRADE] Cache disabled after ${this.errorCount} errors; falling back to translation only`);
    }
  }

  health(): CacheHealth {
    return {
      enabled: this.enabled,
      errorCount: this.errorCount,
      maxErrorCount: this.maxErrorCount,
      skipped: this.skipped,
      lastError: this.lastError,
      errorsByKind: Object.fromEntries(this.errorsByKind),
    };
  }

  /**
   * Re-enable the cache and forget every recorded error
   */
  reset(): void {
    this.enabled = true;
    this.errorCount = 0;
    this.skipped = 0;
    this.lastError = null;
    this.errorsByKind.clear();
  }
}
