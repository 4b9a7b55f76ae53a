/**
 * Provenance Logger
 *
 * Audit trail of reasoning steps and tool executions per session and trace.
 * Arguments and results are stored as hashes only.
 */

import { v4 as uuidv4 } from 'uuid';
import { createHash } from 'crypto';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { getDatabase } from '../storage/database.js';
import type { Logger } from '../core/types.js';
import { getLogger } from '../logging/logger.js';

export type ProvenanceEventType = 'reasoning_step' | 'tool_call' | 'turn_aborted';

export interface LogParams {
  sessionId: string;
  /** One trace per user message */
  traceId: string;
  eventType: ProvenanceEventType;
  reasoning?: {
    engine: string;
    outcome: string;
    durationMs: number;
  };
  tool?: {
    name: string;
    callId: string;
    argsHash: string;
    resultHash: string;
    status: 'success' | 'failure';
    durationMs: number;
  };
  error?: {
    message: string;
    code: string;
  };
}

export interface ProvenanceRecord extends LogParams {
  id: string;
  timestamp: Date;
}

/** What the agent loop needs from an audit log */
export interface ProvenanceSink {
  log(params: LogParams): void;
}

const rowSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  session_id: z.string(),
  trace_id: z.string(),
  event_type: z.enum(['reasoning_step', 'tool_call', 'turn_aborted']),
  engine: z.string().nullable(),
  outcome: z.string().nullable(),
  tool_name: z.string().nullable(),
  call_id: z.string().nullable(),
  args_hash: z.string().nullable(),
  result_hash: z.string().nullable(),
  status: z.enum(['success', 'failure']).nullable(),
  duration_ms: z.number().nullable(),
  error_message: z.string().nullable(),
  error_code: z.string().nullable(),
});

type ProvenanceRow = z.infer<typeof rowSchema>;

const statsSchema = z.object({
  total_events: z.number(),
  reasoning_steps: z.number().nullable(),
  tool_calls: z.number().nullable(),
  tool_failures: z.number().nullable(),
  aborted_turns: z.number().nullable(),
});

export class ProvenanceLogger implements ProvenanceSink {
  private db: Database.Database;
  private logger: Logger;

  constructor(db?: Database.Database, logger?: Logger) {
    this.db = db ?? getDatabase();
    this.logger = logger ?? getLogger();
  }

  /**
   * Log a provenance record
   */
  log(params: LogParams): void {
    try {
      this.db.prepare(`
        INSERT INTO provenance (
          id, timestamp, session_id, trace_id, event_type,
          engine, outcome,
          tool_name, call_id, args_hash, result_hash, status, duration_ms,
          error_message, error_code
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        uuidv4(),
        new Date().toISOString(),
        params.sessionId,
        params.traceId,
        params.eventType,
        params.reasoning?.engine ?? null,
        params.reasoning?.outcome ?? null,
        params.tool?.name ?? null,
        params.tool?.callId ?? null,
        params.tool?.argsHash ?? null,
        params.tool?.resultHash ?? null,
        params.tool?.status ?? null,
        params.tool?.durationMs ?? params.reasoning?.durationMs ?? null,
        params.error?.message ?? null,
        params.error?.code ?? null
      );
    } catch (error) {
      // Auditing never fails a turn
      this.logger.error('provenance_log_failed', {
        error: error instanceof Error ? error.message : String(error),
        event_type: params.eventType,
      });
    }
  }

  findBySessionId(sessionId: string): ProvenanceRecord[] {
    const rows = this.db
      .prepare('SELECT * FROM provenance WHERE session_id = ? ORDER BY timestamp ASC, rowid ASC')
      .all(sessionId);
    return rows.map(row => this.rowToRecord(rowSchema.parse(row)));
  }

  findByTraceId(traceId: string): ProvenanceRecord[] {
    const rows = this.db
      .prepare('SELECT * FROM provenance WHERE trace_id = ? ORDER BY timestamp ASC, rowid ASC')
      .all(traceId);
    return rows.map(row => this.rowToRecord(rowSchema.parse(row)));
  }

  getStats(sessionId?: string): {
    totalEvents: number;
    reasoningSteps: number;
    toolCalls: number;
    toolFailures: number;
    abortedTurns: number;
  } {
    const where = sessionId ? 'WHERE session_id = ?' : '';
    const row = statsSchema.parse(
      this.db
        .prepare(`
          SELECT
            COUNT(*) as total_events,
            SUM(CASE WHEN event_type = 'reasoning_step' THEN 1 ELSE 0 END) as reasoning_steps,
            SUM(CASE WHEN event_type = 'tool_call' THEN 1 ELSE 0 END) as tool_calls,
            SUM(CASE WHEN event_type = 'tool_call' AND status = 'failure' THEN 1 ELSE 0 END) as tool_failures,
            SUM(CASE WHEN event_type = 'turn_aborted' THEN 1 ELSE 0 END) as aborted_turns
          FROM provenance
          ${where}
        `)
        .get(...(sessionId ? [sessionId] : []))
    );

    return {
      totalEvents: row.total_events,
      reasoningSteps: row.reasoning_steps ?? 0,
      toolCalls: row.tool_calls ?? 0,
      toolFailures: row.tool_failures ?? 0,
      abortedTurns: row.aborted_turns ?? 0,
    };
  }

  /**
   * Hash data for provenance storage
   */
  static hashData(data: unknown): string {
    const content = typeof data === 'string' ? data : JSON.stringify(data);
    return createHash('sha256').update(content).digest('hex').slice(0, 16);
  }

  private rowToRecord(row: ProvenanceRow): ProvenanceRecord {
    return {
      id: row.id,
      timestamp: new Date(row.timestamp),
      sessionId: row.session_id,
      traceId: row.trace_id,
      eventType: row.event_type,
      reasoning:
        row.engine !== null
          ? { engine: row.engine, outcome: row.outcome ?? '', durationMs: row.duration_ms ?? 0 }
          : undefined,
      tool:
        row.tool_name !== null
          ? {
              name: row.tool_name,
              callId: row.call_id ?? '',
              argsHash: row.args_hash ?? '',
              resultHash: row.result_hash ?? '',
              status: row.status ?? 'failure',
              durationMs: row.duration_ms ?? 0,
            }
          : undefined,
      error: row.error_message !== null ? { message: row.error_message, code: row.error_code ?? '' } : undefined,
    };
  }
}
