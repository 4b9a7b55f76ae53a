/**
 * Runtime wiring
 *
 * Builds the shared pieces of one agent process from configuration: dataset
 * provider, artifact store, toolset, reasoning engine, provenance log and the
 * session manager on top of them.
 */

import type Database from 'better-sqlite3';
import { ProvenanceLogger } from './audit/provenance.js';
import { InvalidInputError } from './core/errors.js';
import type { AgentConfig } from './config/index.js';
import { GoogleDriveDatasetSource } from './datasets/google-drive.js';
import { DatasetProvider } from './datasets/provider.js';
import type { DatasetSource } from './datasets/source.js';
import { SessionManager } from './execution/session-manager.js';
import { createLogger, type StructuredLogger } from './logging/logger.js';
import { AnthropicReasoningEngine } from './reasoning/anthropic-engine.js';
import type { ReasoningEngine } from './reasoning/engine.js';
import { closeDatabase, getDatabase } from './storage/database.js';
import { ArtifactStore } from './tools/charts.js';
import { createToolRegistry } from './tools/analysis-tools.js';
import type { ToolRegistry } from './tools/registry.js';

export interface RuntimeOverrides {
  /** Replaces the Google Drive source */
  source?: DatasetSource;
  /** Replaces the Anthropic engine */
  engine?: ReasoningEngine;
  /** Used instead of the process database; the caller closes it */
  database?: Database.Database;
  logger?: StructuredLogger;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface AgentRuntime {
  config: AgentConfig;
  logger: StructuredLogger;
  datasets: DatasetProvider;
  artifacts: ArtifactStore;
  tools: ToolRegistry;
  engine: ReasoningEngine;
  provenance: ProvenanceLogger;
  sessions: SessionManager;
  /** End every session and close the process database */
  shutdown(): void;
}

export function createRuntime(config: AgentConfig, overrides: RuntimeOverrides = {}): AgentRuntime {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });

  let source = overrides.source;
  if (!source) {
    if (!config.drive) {
      throw new InvalidInputError(
        'No dataset source configured: set DRIVE_FOLDER_ID and the GOOGLE_OAUTH_* credentials'
      );
    }
    source = GoogleDriveDatasetSource.fromConfig(config.drive, logger);
  }

  const datasets = new DatasetProvider(source, {
    timeoutMs: config.datasetTimeoutMs,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    logger,
    sleep: overrides.sleep,
  });
  const artifacts = new ArtifactStore({ maxArtifacts: config.maxArtifacts });
  const tools = createToolRegistry({ datasets, artifacts }, logger);

  const engine =
    overrides.engine ??
    new AnthropicReasoningEngine({
      apiKey: config.anthropicApiKey,
      model: config.model,
      maxOutputTokens: config.maxOutputTokens,
      timeoutMs: config.llmTimeoutMs,
      contextWindowMessages: config.contextWindowMessages,
      maxRowsInResult: config.maxRowsInResult,
      logger,
    });

  const provenance = new ProvenanceLogger(overrides.database ?? getDatabase(config.databasePath), logger);

  const sessions = new SessionManager({
    engine,
    tools,
    defaults: {
      turnBudget: config.turnBudget,
      llmTimeoutMs: config.llmTimeoutMs,
      maxRetries: config.maxRetries,
      retryBaseDelayMs: config.retryBaseDelayMs,
      toolConcurrency: config.toolConcurrency,
    },
    idleTimeoutMs: config.sessionIdleTimeoutMs,
    logger,
    provenance,
    artifacts,
    sleep: overrides.sleep,
  });

  return {
    config,
    logger,
    datasets,
    artifacts,
    tools,
    engine,
    provenance,
    sessions,
    shutdown() {
      sessions.shutdown();
      if (!overrides.database) {
        closeDatabase();
      }
    },
  };
}
