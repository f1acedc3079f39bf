import { CacheUnavailableError, ValidationError } from '@cmdrecall/common';

/**
 * Run a cache-layer operation; any failure other than bad input comes back
 * as CacheUnavailableError naming the operation.
 */
export async function cacheOperation<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof CacheUnavailableError || error instanceof ValidationError) {
      throw error;
    }
    throw new CacheUnavailableError(operation, error);
  }
}
