/**
 * Commerce Analyst Agent
 *
 * Main exports for the commerce analyst agent library.
 */

// Core types
export * from './core/types.js';
export * from './core/models.js';
export * from './core/errors.js';
export { withRetry, withTimeout } from './core/retry.js';

// Configuration
export { loadConfig, type AgentConfig, type DriveConfig } from './config/index.js';

// Datasets
export { DatasetProvider, type DatasetReader, type DatasetProviderOptions } from './datasets/provider.js';
export { InMemoryDatasetSource, type DatasetSource, type SourceEntry } from './datasets/source.js';
export { GoogleDriveDatasetSource, createDriveClient, DRIVE_READONLY_SCOPE, type DriveFiles } from './datasets/google-drive.js';
export { parseTable } from './datasets/parser.js';
export { profileDataset } from './datasets/profiler.js';

// Tools
export { ToolRegistry, defineTool, type AnalysisTool, type ToolCatalog, type ToolContext } from './tools/registry.js';
export { createAnalysisTools, createToolRegistry } from './tools/analysis-tools.js';
export { ArtifactStore, renderChart, type ChartArtifact, type ChartConfig } from './tools/charts.js';
export { compileFilter, parseFilter } from './tools/filter-expression.js';
export { runQuery, type QuerySpec } from './tools/query.js';

// Reasoning
export type { ReasoningEngine, ReasoningOutcome, StepOptions } from './reasoning/engine.js';
export { AnthropicReasoningEngine, type MessagesClient } from './reasoning/anthropic-engine.js';

// Execution
export { AgentLoop } from './execution/agent-loop.js';
export { ConversationState } from './execution/conversation.js';
export { SessionManager, type SessionManagerOptions } from './execution/session-manager.js';
export { createRuntime, type AgentRuntime } from './runtime.js';

// Audit
export { ProvenanceLogger } from './audit/provenance.js';
export { openDatabase, getDatabase, closeDatabase } from './storage/database.js';

// Logging
export { getLogger, createLogger, StructuredLogger } from './logging/logger.js';

// HTTP
export { createApp, startServer } from './api/server.js';
