/**
 * Core type definitions shared across all packages
 */

// ============================================================================
// Cache Types
// ============================================================================

export interface CacheEntry {
  id: number;
  queryText: string;
  queryHash: string;
  command: string;
  confirmationCount: number;
  rejectionCount: number;
  /** Raw score in [0, 1], before time decay */
  confidenceScore: number;
  createdAt: number;
  lastUsedAt: number;
  osType?: string;
  shellType?: string;
}

export interface SimilarMatch {
  entry: CacheEntry;
  similarity: number;
}

// ============================================================================
// Feedback Types
// ============================================================================

export type FeedbackAction = 'confirm' | 'reject';

export interface FeedbackEvent {
  id: number;
  queryHash: string;
  command: string;
  action: FeedbackAction;
  timestamp: number;
}

// ============================================================================
// Safety Types
// ============================================================================

export type Severity = 'warning' | 'error' | 'critical';

export interface SafetyVerdict {
  dangerous: boolean;
  severity?: Severity;
  reason?: string;
}

/**
 * Oracle consulted before a cached command is used without asking
 */
export interface SafetyClassifier {
  classify(command: string): SafetyVerdict;
}

// ============================================================================
// Collaborator Types
// ============================================================================

export interface Translator {
  translate(query: string): Promise<string>;
}

/** Where the command shown to the user came from */
export type MatchSource = 'exact' | 'similar' | 'translation';

export interface ConfirmationRequest {
  query: string;
  command: string;
  source: MatchSource;
  /** Effective confidence of the entry behind the command */
  confidence: number;
  /** 1 for exact matches, 0 for fresh translations */
  similarity: number;
  safety: SafetyVerdict;
}

export type ConfirmationAnswer = 'confirmed' | 'rejected' | 'timedOut';

export interface ConfirmationPrompt {
  confirm(request: ConfirmationRequest): Promise<ConfirmationAnswer>;
}

/**
 * Clock used for every timestamp the cache writes or compares
 */
export type Clock = () => number;
