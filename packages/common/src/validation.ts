/**
 * Zod validation schemas for cache settings
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

const unitInterval = z.number().min(0).max(1);

// ============================================================================
// Decay Schemas
// ============================================================================

export const decayCurveSchema = z.enum(['exponential', 'linear', 'none']);

export const decaySettingsSchema = z.object({
  curve: decayCurveSchema.default('exponential'),
  halfLifeDays: z.number().positive().default(30),
  linearSpanDays: z.number().positive().default(90),
  floor: unitInterval.default(0.1),
});

// ============================================================================
// Store Schemas
// ============================================================================

export const storeSettingsSchema = z.object({
  busyRetries: z.number().int().min(1).max(20).default(5),
  busyBaseDelayMs: z.number().int().min(1).max(5000).default(50),
  busyTimeoutMs: z.number().int().min(0).max(10000).default(1000),
});

// ============================================================================
// Safety Schemas
// ============================================================================

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

export const safetySettingsSchema = z.object({
  /** Extra regular expressions (case-insensitive) that mark a command dangerous */
  extraPatterns: z.array(z.string().min(1).refine(isValidPattern, 'Invalid regular expression')).default([]),
  /** Exact commands never flagged */
  allowList: z.array(z.string().min(1)).default([]),
});

// ============================================================================
// Cache Settings
// ============================================================================

export const cacheSettingsSchema = z
  .object({
    cacheEnabled: z.boolean().default(true),
    cacheDir: z.string().min(1).optional(),
    databaseFile: z.string().min(1).regex(/^[^/\\]+$/, 'Database file must be a bare file name').default('cache.db'),

    positiveWeight: z.number().positive().max(10).default(0.2),
    negativeWeight: z.number().positive().max(10).default(0.6),
    smoothing: z.number().positive().max(100).default(1),

    confidenceThreshold: unitInterval.default(0.8),
    autoCopyThreshold: unitInterval.default(0.9),
    similarityThreshold: unitInterval.default(0.7),
    jaccardWeight: unitInterval.default(0.5),

    maxCacheAgeDays: z.number().positive().default(30),
    cacheSizeLimit: z.number().int().min(1).default(1000),

    decay: decaySettingsSchema.default({}),
    maxErrorCount: z.number().int().min(1).max(100).default(3),
    store: storeSettingsSchema.default({}),
    safety: safetySettingsSchema.default({}),
  })
  .superRefine((settings, ctx) => {
    if (settings.autoCopyThreshold < settings.confidenceThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['autoCopyThreshold'],
        message: `must be >= confidenceThreshold (${settings.confidenceThreshold})`,
      });
    }
  });

export type CacheSettings = z.output<typeof cacheSettingsSchema>;
export type CacheSettingsInput = z.input<typeof cacheSettingsSchema>;
export type DecaySettings = z.output<typeof decaySettingsSchema>;
export type DecayCurve = z.output<typeof decayCurveSchema>;
export type StoreSettings = z.output<typeof storeSettingsSchema>;
export type SafetySettings = z.output<typeof safetySettingsSchema>;

// ============================================================================
// Utility Functions
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function validateBody<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', '),
  };
}

/**
 * Validate settings and fill in defaults. Throws ValidationError.
 */
export function parseSettings(input: unknown = {}): CacheSettings {
  const result = validateBody(cacheSettingsSchema, input ?? {});
  if (!result.success) {
    throw new ValidationError(`Invalid cache settings: ${result.error}`, { input });
  }
  return result.data;
}

/**
 * Settings with every default applied
 */
export function defaultSettings(): CacheSettings {
  return parseSettings({});
}
