/**
 * Core Types for the Commerce Analyst Agent
 *
 * Shared shapes for datasets, tool declarations and results, conversation
 * messages and agent responses.
 */

import type { ErrorJSON } from './errors.js';

// =============================================================================
// DATASET TYPES
// =============================================================================

export type ColumnType = 'number' | 'string' | 'boolean';

export type Cell = number | string | boolean | null;

export type Row = Readonly<Record<string, Cell>>;

export interface ColumnSchema {
  readonly name: string;
  readonly type: ColumnType;
}

export interface Dataset {
  readonly identifier: string;
  readonly name: string;
  readonly mimeType: string;
  readonly schema: readonly ColumnSchema[];
  readonly rows: readonly Row[];
  /** MD5 hex digest of the raw bytes the dataset was parsed from */
  readonly fingerprint: string;
  readonly loadedAt: Date;
}

export interface DatasetSummary {
  identifier: string;
  name: string;
  mimeType: string;
}

// =============================================================================
// TOOL TYPES
// =============================================================================

export interface JSONSchema {
  /** Omitted only under anyOf */
  type?: string;
  properties?: Record<string, JSONSchema>;
  items?: JSONSchema;
  required?: string[];
  enum?: unknown[];
  description?: string;
  default?: unknown;
  minimum?: number;
  maximum?: number;
  minLength?: number;
  additionalProperties?: boolean | JSONSchema;
  anyOf?: JSONSchema[];
}

export interface ToolDeclaration {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JSONSchema;
}

export interface ToolInvocationRequest {
  /** Correlates the request with its ToolResult */
  readonly id: string;
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

export type StatisticOp = 'sum' | 'mean' | 'count' | 'min' | 'max' | 'distinct_count';

export type ChartType = 'bar' | 'line' | 'scatter' | 'pie';

export interface TablePayload {
  kind: 'table';
  /** Handle later tool calls use to reference this table */
  resultId: string;
  datasetId?: string;
  columns: ColumnSchema[];
  rows: Row[];
  rowCount: number;
}

export interface ScalarPayload {
  kind: 'scalar';
  datasetId: string;
  column: string;
  op: StatisticOp;
  value: number | string | null;
  rowsConsidered: number;
}

export interface ChartPayload {
  kind: 'chart';
  handle: string;
  chartType: ChartType;
  title: string;
  dataPoints: number;
}

export interface DatasetListPayload {
  kind: 'datasets';
  datasets: DatasetSummary[];
}

export interface ProfilePayload {
  kind: 'profile';
  profile: DatasetProfile;
}

export type ToolPayload =
  | TablePayload
  | ScalarPayload
  | ChartPayload
  | DatasetListPayload
  | ProfilePayload;

export type ToolResult =
  | {
      readonly callId: string;
      readonly toolName: string;
      readonly status: 'success';
      readonly payload: ToolPayload;
    }
  | {
      readonly callId: string;
      readonly toolName: string;
      readonly status: 'failure';
      readonly error: ErrorJSON;
    };

// =============================================================================
// PROFILE TYPES
// =============================================================================

export interface NumericSummary {
  min: number;
  max: number;
  mean: number;
  median: number;
  std: number;
}

export interface ColumnProfile {
  name: string;
  type: ColumnType;
  nullCount: number;
  distinctCount: number;
  numeric?: NumericSummary;
  topValues?: { value: string; count: number }[];
}

export type DataQualityIssue =
  | { type: 'high_missing_values'; columns: string[]; severity: 'high' }
  | { type: 'duplicate_rows'; count: number; percentage: number; severity: 'medium' }
  | { type: 'zero_variance'; column: string; severity: 'low' }
  | { type: 'high_cardinality'; column: string; uniqueRatio: number; severity: 'medium' };

export interface Correlation {
  column1: string;
  column2: string;
  /** Pearson coefficient */
  correlation: number;
}

export interface DatasetProfile {
  datasetId: string;
  rowCount: number;
  columnCount: number;
  fingerprint: string;
  columns: ColumnProfile[];
  sampleRows: Row[];
  issues: DataQualityIssue[];
  /** Strongest numeric column pairs first */
  correlations: Correlation[];
}

// =============================================================================
// CONVERSATION TYPES
// =============================================================================

export type AgentContent =
  | { kind: 'answer'; text: string }
  | { kind: 'clarification'; text: string }
  | { kind: 'tool_calls'; text?: string; calls: ToolInvocationRequest[] }
  | { kind: 'aborted'; text: string; reason: AbortReason };

interface MessageBase {
  readonly id: string;
  /** Position in the conversation, starting at 0 and increasing by one */
  readonly sequence: number;
  readonly timestamp: Date;
}

export interface UserMessage extends MessageBase {
  readonly role: 'user';
  readonly content: { readonly kind: 'text'; readonly text: string };
}

export interface AgentMessage extends MessageBase {
  readonly role: 'agent';
  readonly content: AgentContent;
}

export interface ToolMessage extends MessageBase {
  readonly role: 'tool';
  readonly content: ToolResult;
}

export type Message = UserMessage | AgentMessage | ToolMessage;

export type MessageInput =
  | Pick<UserMessage, 'role' | 'content'>
  | Pick<AgentMessage, 'role' | 'content'>
  | Pick<ToolMessage, 'role' | 'content'>;

// =============================================================================
// AGENT LOOP TYPES
// =============================================================================

export type LoopState =
  | 'awaiting_user_input'
  | 'reasoning'
  | 'executing_tools'
  | 'answered'
  | 'clarification_needed'
  | 'aborted';

export type AbortReason =
  | 'turn_budget_exhausted'
  | 'malformed_response'
  | 'reasoning_unavailable';

export type AgentResponse =
  | { kind: 'answer'; text: string; turns: number }
  | { kind: 'clarification'; text: string; turns: number }
  | { kind: 'aborted'; text: string; reason: AbortReason; turns: number };

export interface SessionInfo {
  id: string;
  state: LoopState;
  messageCount: number;
  turnBudget: number;
  createdAt: Date;
  lastActiveAt: Date;
}

// =============================================================================
// UTILITY TYPES
// =============================================================================

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}
