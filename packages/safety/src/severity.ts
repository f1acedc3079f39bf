import type { Severity } from '@cmdrecall/common';

const RANK: Record<Severity, number> = {
  warning: 1,
  error: 2,
  critical: 3,
};

/**
 * Positive when a is more severe than b
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return RANK[a] - RANK[b];
}
