/**
 * Shared utility functions
 */

import crypto from 'node:crypto';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Generate a deterministic hash-based ID
 */
export function generateHashId(input: string, length = 16): string {
  return crypto
    .createHash('sha256')
    .update(input, 'utf8')
    .digest('hex')
    .slice(0, length);
}

/**
 * Sleep for a given duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  factor?: number;
  /** Return false to rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
}

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(
  fn: (attempt: number) => T | Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelay = 1000,
    maxDelay = 30000,
    factor = 2,
    shouldRetry = () => true,
    onRetry,
  } = options;

  let delay = initialDelay;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error;
      }
      onRetry?.(error, attempt, delay);
      await sleep(delay);
      delay = Math.min(delay * factor, maxDelay);
    }
  }
}

/**
 * Clamp a number into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Whole and fractional days from `from` to `to`, never negative
 */
export function elapsedDays(from: number, to: number): number {
  return Math.max(0, (to - from) / MS_PER_DAY);
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Format a timestamp as ISO string
 */
export function formatTimestamp(date?: Date | number | string): string {
  if (!date) return new Date().toISOString();
  if (typeof date === 'string') return date;
  if (typeof date === 'number') return new Date(date).toISOString();
  return date.toISOString();
}
