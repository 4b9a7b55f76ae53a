/**
 * Environment Configuration
 *
 * Validates every environment variable the agent reads with Zod and exposes a
 * typed config object. Invalid values fail fast with the full issue list.
 *
 * TO ADD A NEW VARIABLE:
 * 1. Add it to the schema below with a default where one makes sense
 * 2. Map it onto AgentConfig in loadConfig()
 */

import { z } from 'zod';
import { InvalidInputError } from '../core/errors.js';
import { DEFAULT_MODEL, DEFAULT_SESSION, MODEL_IDS, type ModelId } from '../core/models.js';
import type { LogLevel } from '../logging/logger.js';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
  /** Anthropic API key; optional so tests and offline tooling can load config */
  ANTHROPIC_API_KEY: z.string().min(1).optional(),

  /** Model used by the reasoning engine */
  ANALYST_MODEL: z.enum(MODEL_IDS).default(DEFAULT_MODEL),

  /** Output token ceiling per reasoning call */
  ANALYST_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(4096),

  /** Reasoning <-> tool cycles allowed per user message */
  TURN_BUDGET: z.coerce.number().int().min(1).max(50).default(DEFAULT_SESSION.turnBudget),

  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_SESSION.llmTimeoutMs),

  DATASET_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  /** Retries after the first attempt for transient failures */
  MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(DEFAULT_SESSION.maxRetries),

  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_SESSION.retryBaseDelayMs),

  /** Independent tool calls of one step executed at the same time */
  TOOL_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(DEFAULT_SESSION.toolConcurrency),

  /** Table rows shown to the model per tool result */
  MAX_ROWS_IN_RESULT: z.coerce.number().int().min(1).default(50),

  /** Most recent conversation messages sent to the model */
  CONTEXT_WINDOW_MESSAGES: z.coerce.number().int().min(2).default(60),

  /** Sessions idle for longer than this are discarded */
  SESSION_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),

  /** Charts kept in memory across all sessions; the oldest are evicted */
  MAX_ARTIFACTS: z.coerce.number().int().min(1).default(500),

  // ----------------------------------------
  // GOOGLE DRIVE DATASET SOURCE
  // ----------------------------------------

  DRIVE_FOLDER_ID: z.string().min(1).optional(),
  GOOGLE_OAUTH_CLIENT_ID: z.string().min(1).optional(),
  GOOGLE_OAUTH_CLIENT_SECRET: z.string().min(1).optional(),
  GOOGLE_OAUTH_REFRESH_TOKEN: z.string().min(1).optional(),

  // ----------------------------------------
  // STORAGE & LOGGING
  // ----------------------------------------

  /** SQLite file for the provenance log; ":memory:" keeps it in process */
  DATABASE_PATH: z.string().min(1).default('data/commerce-analyst.db'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

// ============================================
// TYPED CONFIG
// ============================================

export interface DriveConfig {
  folderId: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface AgentConfig {
  anthropicApiKey?: string;
  model: ModelId;
  maxOutputTokens: number;
  turnBudget: number;
  llmTimeoutMs: number;
  datasetTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  toolConcurrency: number;
  maxRowsInResult: number;
  contextWindowMessages: number;
  sessionIdleTimeoutMs: number;
  maxArtifacts: number;
  /** Present only when the folder and all OAuth credentials are configured */
  drive?: DriveConfig;
  databasePath: string;
  logLevel: LogLevel;
  environment: 'development' | 'production' | 'test';
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AgentConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidInputError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
  }

  const parsed = result.data;
  const { DRIVE_FOLDER_ID, GOOGLE_OAUTH_CLIENT_ID, GOOGLE_OAUTH_CLIENT_SECRET, GOOGLE_OAUTH_REFRESH_TOKEN } = parsed;

  return {
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    model: parsed.ANALYST_MODEL,
    maxOutputTokens: parsed.ANALYST_MAX_OUTPUT_TOKENS,
    turnBudget: parsed.TURN_BUDGET,
    llmTimeoutMs: parsed.LLM_TIMEOUT_MS,
    datasetTimeoutMs: parsed.DATASET_TIMEOUT_MS,
    maxRetries: parsed.MAX_RETRIES,
    retryBaseDelayMs: parsed.RETRY_BASE_DELAY_MS,
    toolConcurrency: parsed.TOOL_CONCURRENCY,
    maxRowsInResult: parsed.MAX_ROWS_IN_RESULT,
    contextWindowMessages: parsed.CONTEXT_WINDOW_MESSAGES,
    sessionIdleTimeoutMs: parsed.SESSION_IDLE_TIMEOUT_MS,
    maxArtifacts: parsed.MAX_ARTIFACTS,
    drive:
      DRIVE_FOLDER_ID && GOOGLE_OAUTH_CLIENT_ID && GOOGLE_OAUTH_CLIENT_SECRET && GOOGLE_OAUTH_REFRESH_TOKEN
        ? {
            folderId: DRIVE_FOLDER_ID,
            clientId: GOOGLE_OAUTH_CLIENT_ID,
            clientSecret: GOOGLE_OAUTH_CLIENT_SECRET,
            refreshToken: GOOGLE_OAUTH_REFRESH_TOKEN,
          }
        : undefined,
    databasePath: parsed.DATABASE_PATH,
    logLevel: parsed.LOG_LEVEL,
    environment: parsed.NODE_ENV,
  };
}
