/**
 * Model Configuration
 *
 * Claude models the reasoning engine may run on, and the per-session defaults
 * for the agent loop.
 */

export const MODEL_IDS = [
  'claude-opus-4-20250514',
  'claude-sonnet-4-20250514',
  'claude-3-5-haiku-20241022',
] as const;

export type ModelId = (typeof MODEL_IDS)[number];

export interface ModelConfig {
  id: ModelId;
  tier: 'premium' | 'standard' | 'fast';
  maxOutputTokens: number;
}

export const MODEL_CONFIG: Record<ModelId, ModelConfig> = {
  'claude-opus-4-20250514': {
    id: 'claude-opus-4-20250514',
    tier: 'premium',
    maxOutputTokens: 32000,
  },
  'claude-sonnet-4-20250514': {
    id: 'claude-sonnet-4-20250514',
    tier: 'standard',
    maxOutputTokens: 16000,
  },
  'claude-3-5-haiku-20241022': {
    id: 'claude-3-5-haiku-20241022',
    tier: 'fast',
    maxOutputTokens: 8192,
  },
};

export const DEFAULT_MODEL: ModelId = 'claude-sonnet-4-20250514';

export interface SessionDefaults {
  /** Reasoning <-> tool execution cycles allowed per user message */
  turnBudget: number;
  llmTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  toolConcurrency: number;
}

export const DEFAULT_SESSION: SessionDefaults = {
  turnBudget: 8,
  llmTimeoutMs: 60000,
  maxRetries: 3,
  retryBaseDelayMs: 500,
  toolConcurrency: 4,
};

export function mergeSessionDefaults(overrides?: Partial<SessionDefaults>): SessionDefaults {
  return {
    turnBudget: overrides?.turnBudget ?? DEFAULT_SESSION.turnBudget,
    llmTimeoutMs: overrides?.llmTimeoutMs ?? DEFAULT_SESSION.llmTimeoutMs,
    maxRetries: overrides?.maxRetries ?? DEFAULT_SESSION.maxRetries,
    retryBaseDelayMs: overrides?.retryBaseDelayMs ?? DEFAULT_SESSION.retryBaseDelayMs,
    toolConcurrency: overrides?.toolConcurrency ?? DEFAULT_SESSION.toolConcurrency,
  };
}

/**
 * Output token ceiling for a model, clamped to what it supports.
 */
export function resolveMaxOutputTokens(model: ModelId, requested?: number): number {
  const limit = MODEL_CONFIG[model].maxOutputTokens;
  return requested === undefined ? Math.min(4096, limit) : Math.min(requested, limit);
}
