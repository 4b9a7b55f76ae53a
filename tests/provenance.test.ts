/**
 * Provenance Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { ProvenanceLogger } from '../src/audit/provenance.js';
import { loadConfig } from '../src/config/index.js';
import { InMemoryDatasetSource } from '../src/datasets/source.js';
import { createRuntime } from '../src/runtime.js';
import { closeDatabase, getDatabase, openDatabase } from '../src/storage/database.js';
import { ScriptedEngine, silentLogger } from './setup.js';

describe('ProvenanceLogger', () => {
  let db: Database.Database;
  let provenance: ProvenanceLogger;

  beforeEach(() => {
    db = openDatabase(':memory:');
    provenance = new ProvenanceLogger(db, silentLogger());
  });

  afterEach(() => {
    db.close();
  });

  function logTurn(sessionId: string, traceId: string): void {
    provenance.log({
      sessionId,
      traceId,
      eventType: 'reasoning_step',
      reasoning: { engine: 'scripted', outcome: 'tool_calls', durationMs: 40 },
    });
    provenance.log({
      sessionId,
      traceId,
      eventType: 'tool_call',
      tool: {
        name: 'query',
        callId: 'c-1',
        argsHash: ProvenanceLogger.hashData({ dataset_id: 'orders' }),
        resultHash: ProvenanceLogger.hashData('ok'),
        status: 'success',
        durationMs: 5,
      },
    });
    provenance.log({
      sessionId,
      traceId,
      eventType: 'tool_call',
      tool: { name: 'chart', callId: 'c-2', argsHash: 'a', resultHash: 'b', status: 'failure', durationMs: 2 },
      error: { message: 'result not found: res_1', code: 'NOT_FOUND' },
    });
  }

  it('should record events per session in order', () => {
    logTurn('s-1', 't-1');
    logTurn('s-2', 't-2');

    const records = provenance.findBySessionId('s-1');
    expect(records.map(r => r.eventType)).toEqual(['reasoning_step', 'tool_call', 'tool_call']);
    expect(records[0].reasoning).toEqual({ engine: 'scripted', outcome: 'tool_calls', durationMs: 40 });
    expect(records[0].tool).toBeUndefined();
    expect(records[2]).toMatchObject({
      traceId: 't-1',
      tool: { name: 'chart', callId: 'c-2', status: 'failure', durationMs: 2 },
      error: { message: 'result not found: res_1', code: 'NOT_FOUND' },
    });
  });

  it('should find events by trace', () => {
    logTurn('s-1', 't-1');
    provenance.log({
      sessionId: 's-1',
      traceId: 't-2',
      eventType: 'turn_aborted',
      error: { message: 'turn budget exhausted', code: 'turn_budget_exhausted' },
    });

    expect(provenance.findByTraceId('t-1')).toHaveLength(3);
    expect(provenance.findByTraceId('t-2').map(r => r.eventType)).toEqual(['turn_aborted']);
    expect(provenance.findByTraceId('t-3')).toEqual([]);
  });

  it('should summarize events', () => {
    logTurn('s-1', 't-1');
    logTurn('s-2', 't-2');

    expect(provenance.getStats('s-1')).toEqual({
      totalEvents: 3,
      reasoningSteps: 1,
      toolCalls: 2,
      toolFailures: 1,
      abortedTurns: 0,
    });
    expect(provenance.getStats().totalEvents).toBe(6);
  });

  it('should report zeros for an empty log', () => {
    expect(provenance.getStats()).toEqual({
      totalEvents: 0,
      reasoningSteps: 0,
      toolCalls: 0,
      toolFailures: 0,
      abortedTurns: 0,
    });
  });

  it('should hash data to a short stable digest', () => {
    const hash = ProvenanceLogger.hashData({ a: 1 });
    expect(hash).toHaveLength(16);
    expect(hash).toBe(ProvenanceLogger.hashData('{"a":1}'));
    expect(hash).not.toBe(ProvenanceLogger.hashData({ a: 2 }));
  });
});

describe('process database', () => {
  afterEach(() => {
    closeDatabase();
  });

  it('should return one database until it is closed', () => {
    const first = getDatabase(':memory:');
    expect(getDatabase(':memory:')).toBe(first);

    closeDatabase();

    expect(first.open).toBe(false);
    const second = getDatabase(':memory:');
    expect(second).not.toBe(first);
    expect(second.open).toBe(true);
  });

  it('should log to the process database by default', () => {
    getDatabase(':memory:');
    const provenance = new ProvenanceLogger(undefined, silentLogger());
    provenance.log({ sessionId: 's-1', traceId: 't-1', eventType: 'turn_aborted' });

    expect(new ProvenanceLogger(getDatabase(), silentLogger()).getStats().totalEvents).toBe(1);
  });

  it('should close the process database on runtime shutdown', () => {
    const runtime = createRuntime(loadConfig({ DATABASE_PATH: ':memory:', NODE_ENV: 'test' }), {
      source: new InMemoryDatasetSource(),
      engine: new ScriptedEngine([]),
      logger: silentLogger(),
    });
    const database = getDatabase();

    runtime.shutdown();

    expect(database.open).toBe(false);
  });

  it('should leave an injected database open on runtime shutdown', () => {
    const database = openDatabase(':memory:');
    const runtime = createRuntime(loadConfig({ DATABASE_PATH: ':memory:', NODE_ENV: 'test' }), {
      source: new InMemoryDatasetSource(),
      engine: new ScriptedEngine([]),
      database,
      logger: silentLogger(),
    });

    runtime.shutdown();

    expect(database.open).toBe(true);
    database.close();
  });
});
