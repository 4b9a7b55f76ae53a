/**
 * Agent Loop Tests
 *
 * State machine behavior against a scripted reasoning engine and the real
 * analysis toolset over in-memory datasets
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { z } from 'zod';
import { AgentLoop, ABORT_MESSAGES, type AgentLoopOptions } from '../src/execution/agent-loop.js';
import { ConversationState } from '../src/execution/conversation.js';
import { ProvenanceLogger } from '../src/audit/provenance.js';
import { openDatabase } from '../src/storage/database.js';
import { createToolRegistry } from '../src/tools/analysis-tools.js';
import { ArtifactStore } from '../src/tools/charts.js';
import { ToolRegistry, defineTool } from '../src/tools/registry.js';
import { DatasetProvider } from '../src/datasets/provider.js';
import { InMemoryDatasetSource } from '../src/datasets/source.js';
import {
  MalformedResponseError,
  SessionBusyError,
  SessionCancelledError,
  SourceUnavailableError,
} from '../src/core/errors.js';
import type { Message } from '../src/core/types.js';
import type { ReasoningOutcome } from '../src/reasoning/engine.js';
import {
  ORDERS_CSV,
  ScriptedEngine,
  call,
  deferred,
  lastMessage,
  silentLogger,
  wait,
  type ScriptStep,
} from './setup.js';

const answer = (text: string): ScriptStep => () => ({ kind: 'final_answer', text });

function scalarValue(message: Message): unknown {
  if (message.role !== 'tool' || message.content.status !== 'success' || message.content.payload.kind !== 'scalar') {
    throw new Error('expected a scalar tool result');
  }
  return message.content.payload.value;
}

describe('ConversationState', () => {
  it('should number messages in order and freeze them', () => {
    const state = new ConversationState();
    const first = state.append({ role: 'user', content: { kind: 'text', text: 'Hi' } });
    const second = state.append({ role: 'agent', content: { kind: 'answer', text: 'Hello' } });

    expect([first.sequence, second.sequence]).toEqual([0, 1]);
    expect(first.id).not.toBe(second.id);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.content)).toBe(true);
    expect(state.last()).toBe(second);
  });

  it('should return snapshots that later appends do not change', () => {
    const state = new ConversationState();
    state.append({ role: 'user', content: { kind: 'text', text: 'Hi' } });
    const snapshot = state.history();
    state.append({ role: 'agent', content: { kind: 'answer', text: 'Hello' } });

    expect(snapshot).toHaveLength(1);
    expect(state.length).toBe(2);
  });

  it('should find tables by result id, newest first', () => {
    const state = new ConversationState();
    for (const rowCount of [1, 2]) {
      state.append({
        role: 'tool',
        content: {
          callId: `c-${rowCount}`,
          toolName: 'query',
          status: 'success',
          payload: { kind: 'table', resultId: 'res_same', columns: [], rows: [], rowCount },
        },
      });
    }
    expect(state.findTable('res_same')?.rowCount).toBe(2);
    expect(state.findTable('res_other')).toBeUndefined();
  });
});

describe('AgentLoop', () => {
  let tools: ToolRegistry;
  let provenance: ProvenanceLogger;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    const logger = silentLogger();
    const datasets = new DatasetProvider(new InMemoryDatasetSource({ 'orders.csv': ORDERS_CSV }), { logger });
    tools = createToolRegistry({ datasets, artifacts: new ArtifactStore() }, logger);
    provenance = new ProvenanceLogger(openDatabase(':memory:'), logger);
    sleep = vi.fn(async (_ms: number) => {});
  });

  function createLoop(engine: ScriptedEngine, options: Partial<AgentLoopOptions> = {}): AgentLoop {
    return new AgentLoop({
      sessionId: 'session-1',
      engine,
      tools,
      logger: silentLogger(),
      provenance,
      sleep,
      retryBaseDelayMs: 1,
      ...options,
    });
  }

  describe('Answering', () => {
    it('should answer from tool results', async () => {
      const engine = new ScriptedEngine([
        () => ({
          kind: 'tool_calls',
          calls: [
            call('c-1', 'statistic', {
              dataset_id: 'orders',
              column: 'amount',
              op: 'sum',
              filter_expr: "category = 'Electronics'",
            }),
          ],
        }),
        history => ({ kind: 'final_answer', text: `Electronics sales total ${scalarValue(lastMessage(history))}.` }),
      ]);
      const loop = createLoop(engine);

      const response = await loop.handleUserMessage('What were total electronics sales?');

      expect(response).toEqual({ kind: 'answer', text: 'Electronics sales total 1244.', turns: 1 });
      expect(loop.getState()).toBe('answered');
      expect(loop.conversation.history().map(m => [m.sequence, m.role])).toEqual([
        [0, 'user'],
        [1, 'agent'],
        [2, 'tool'],
        [3, 'agent'],
      ]);
    });

    it('should answer directly without tools', async () => {
      const engine = new ScriptedEngine([answer('Hello! Ask me about your orders.')]);
      const response = await createLoop(engine).handleUserMessage('Hi');
      expect(response).toEqual({ kind: 'answer', text: 'Hello! Ask me about your orders.', turns: 0 });
    });

    it('should return clarifications and continue the same conversation', async () => {
      const engine = new ScriptedEngine([
        () => ({ kind: 'clarification', text: 'Which year do you mean?' }),
        history => ({ kind: 'final_answer', text: `Noted, ${history.length} messages so far.` }),
      ]);
      const loop = createLoop(engine);

      const first = await loop.handleUserMessage('How did sales do?');
      expect(first).toEqual({ kind: 'clarification', text: 'Which year do you mean?', turns: 0 });
      expect(loop.getState()).toBe('clarification_needed');

      const second = await loop.handleUserMessage('2024');
      expect(second).toEqual({ kind: 'answer', text: 'Noted, 3 messages so far.', turns: 0 });
    });

    it('should let a chart reference an earlier query result', async () => {
      const engine = new ScriptedEngine([
        () => ({ kind: 'tool_calls', calls: [call('c-1', 'query', { dataset_id: 'orders', group_by: ['category'] })] }),
        history => {
          const result = lastMessage(history);
          if (result.role !== 'tool' || result.content.status !== 'success' || result.content.payload.kind !== 'table') {
            throw new Error('expected a table');
          }
          return {
            kind: 'tool_calls',
            calls: [
              call('c-2', 'chart', { chart_type: 'bar', x: 'category', y: 'count', result_id: result.content.payload.resultId }),
            ],
          };
        },
        history => {
          const result = lastMessage(history);
          const ok = result.role === 'tool' && result.content.status === 'success';
          return { kind: 'final_answer', text: ok ? 'Chart ready.' : 'Chart failed.' };
        },
      ]);

      const response = await createLoop(engine).handleUserMessage('Chart orders per category');
      expect(response).toEqual({ kind: 'answer', text: 'Chart ready.', turns: 2 });
    });
  });

  describe('Tool Failures', () => {
    it('should feed failures back to the reasoning engine', async () => {
      const engine = new ScriptedEngine([
        () => ({
          kind: 'tool_calls',
          calls: [call('c-1', 'statistic', { dataset_id: 'orders', column: 'revenue', op: 'sum' })],
        }),
        history => {
          const result = lastMessage(history);
          if (result.role !== 'tool' || result.content.status !== 'failure') {
            throw new Error('expected a failure result');
          }
          return { kind: 'final_answer', text: `Recovered from ${result.content.error.code}.` };
        },
      ]);

      const response = await createLoop(engine).handleUserMessage('Sum the revenue');
      expect(response).toEqual({ kind: 'answer', text: 'Recovered from QUERY_ERROR.', turns: 1 });
      expect(provenance.getStats('session-1')).toMatchObject({ toolCalls: 1, toolFailures: 1 });
    });

    it('should append results in request order when tools finish out of order', async () => {
      const slowFirst = new ToolRegistry(
        [
          defineTool({
            name: 'slow',
            description: 'Finishes last',
            inputSchema: { type: 'object', properties: {} },
            args: z.object({}),
            async execute() {
              await wait(30);
              return { kind: 'datasets', datasets: [] };
            },
          }),
          defineTool({
            name: 'fast',
            description: 'Finishes first',
            inputSchema: { type: 'object', properties: {} },
            args: z.object({}),
            async execute() {
              return { kind: 'datasets', datasets: [] };
            },
          }),
        ],
        silentLogger()
      );
      const engine = new ScriptedEngine([
        () => ({ kind: 'tool_calls', calls: [call('c-slow', 'slow', {}), call('c-fast', 'fast', {})] }),
        answer('Both done.'),
      ]);
      const loop = createLoop(engine, { tools: slowFirst });

      await loop.handleUserMessage('Run both');

      const results = loop.conversation.history().filter(m => m.role === 'tool');
      expect(results.map(m => (m.role === 'tool' ? m.content.callId : ''))).toEqual(['c-slow', 'c-fast']);
    });
  });

  describe('Turn Budget', () => {
    it('should abort once the budget is spent without running further tools', async () => {
      const engine = new ScriptedEngine([
        () => ({ kind: 'tool_calls', calls: [call(`c-${Date.now()}`, 'list_datasets', {})] }),
      ]);
      const loop = createLoop(engine, { turnBudget: 2 });

      const response = await loop.handleUserMessage('Loop forever');

      expect(response).toEqual({
        kind: 'aborted',
        reason: 'turn_budget_exhausted',
        text: ABORT_MESSAGES.turn_budget_exhausted,
        turns: 2,
      });
      expect(engine.requests).toHaveLength(3);
      expect(loop.conversation.length).toBe(6);
      expect(lastMessage(loop.conversation.history()).content).toEqual({
        kind: 'aborted',
        text: ABORT_MESSAGES.turn_budget_exhausted,
        reason: 'turn_budget_exhausted',
      });
      expect(loop.getState()).toBe('aborted');
    });

    it('should reset the budget for each user message', async () => {
      let step = 0;
      const engine = new ScriptedEngine([
        (): ReasoningOutcome =>
          step++ % 2 === 0
            ? { kind: 'tool_calls', calls: [call(`c-${step}`, 'list_datasets', {})] }
            : { kind: 'final_answer', text: 'done' },
      ]);
      const loop = createLoop(engine, { turnBudget: 1 });

      expect(await loop.handleUserMessage('first')).toMatchObject({ kind: 'answer', turns: 1 });
      expect(await loop.handleUserMessage('second')).toMatchObject({ kind: 'answer', turns: 1 });
    });
  });

  describe('Malformed Responses', () => {
    it('should re-prompt once with a correction', async () => {
      const engine = new ScriptedEngine([
        () => {
          throw new MalformedResponseError("undeclared tool 'drop_table'");
        },
        answer('Recovered.'),
      ]);

      const response = await createLoop(engine).handleUserMessage('Delete everything');

      expect(response).toEqual({ kind: 'answer', text: 'Recovered.', turns: 0 });
      expect(engine.requests[0].options.correction).toBeUndefined();
      expect(engine.requests[1].options.correction).toContain("undeclared tool 'drop_table'");
    });

    it('should abort after a second malformed response', async () => {
      const engine = new ScriptedEngine([
        () => {
          throw new MalformedResponseError("undeclared tool 'drop_table'");
        },
      ]);
      const loop = createLoop(engine);

      const response = await loop.handleUserMessage('Delete everything');

      expect(response).toEqual({
        kind: 'aborted',
        reason: 'malformed_response',
        text: ABORT_MESSAGES.malformed_response,
        turns: 0,
      });
      expect(engine.requests).toHaveLength(2);
      expect(loop.conversation.history().map(m => m.role)).toEqual(['user', 'agent']);
      expect(sleep).not.toHaveBeenCalled();
      expect(provenance.getStats('session-1')).toMatchObject({ reasoningSteps: 2, abortedTurns: 1 });
    });
  });

  describe('Transient Failures', () => {
    it('should retry the reasoning step with backoff', async () => {
      let failures = 1;
      const engine = new ScriptedEngine([
        () => {
          if (failures-- > 0) throw new SourceUnavailableError('anthropic', 'overloaded');
          return { kind: 'final_answer', text: 'Back online.' };
        },
      ]);

      const response = await createLoop(engine).handleUserMessage('Hi');

      expect(response).toEqual({ kind: 'answer', text: 'Back online.', turns: 0 });
      expect(engine.requests).toHaveLength(2);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('should abort when the reasoning service stays unavailable', async () => {
      const engine = new ScriptedEngine([
        () => {
          throw new SourceUnavailableError('anthropic', 'overloaded');
        },
      ]);

      const response = await createLoop(engine, { maxRetries: 2 }).handleUserMessage('Hi');

      expect(response).toMatchObject({ kind: 'aborted', reason: 'reasoning_unavailable', turns: 0 });
      expect(engine.requests).toHaveLength(3);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it('should time out a hanging reasoning step', async () => {
      const engine = new ScriptedEngine([() => new Promise<ReasoningOutcome>(() => {})]);

      const response = await createLoop(engine, { llmTimeoutMs: 20, maxRetries: 0 }).handleUserMessage('Hi');

      expect(response).toMatchObject({ kind: 'aborted', reason: 'reasoning_unavailable' });
    });
  });

  describe('Cancellation', () => {
    it('should stop at the next iteration boundary', async () => {
      let loop: AgentLoop | undefined;
      const engine = new ScriptedEngine([
        () => {
          loop?.cancel();
          return { kind: 'tool_calls', calls: [call('c-1', 'list_datasets', {})] };
        },
      ]);
      loop = createLoop(engine);

      await expect(loop.handleUserMessage('Hi')).rejects.toBeInstanceOf(SessionCancelledError);
      expect(loop.conversation.history().map(m => m.role)).toEqual(['user']);
      expect(loop.getState()).toBe('aborted');
      await expect(loop.handleUserMessage('Again')).rejects.toBeInstanceOf(SessionCancelledError);
    });

    it('should pass an aborting signal to the reasoning step', async () => {
      let loop: AgentLoop | undefined;
      const engine = new ScriptedEngine([
        (_history, options) =>
          new Promise<ReasoningOutcome>((_resolve, reject) => {
            options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
            loop?.cancel();
          }),
      ]);
      loop = createLoop(engine);

      await expect(loop.handleUserMessage('Hi')).rejects.toBeInstanceOf(SessionCancelledError);
      expect(loop.getState()).toBe('aborted');
    });

    it('should refuse a second message while one is in flight', async () => {
      const gate = deferred();
      const engine = new ScriptedEngine([
        async () => {
          await gate.promise;
          return { kind: 'final_answer', text: 'done' };
        },
      ]);
      const loop = createLoop(engine);

      const first = loop.handleUserMessage('first');
      await expect(loop.handleUserMessage('second')).rejects.toBeInstanceOf(SessionBusyError);
      gate.resolve();
      expect(await first).toMatchObject({ kind: 'answer' });
    });
  });

  describe('Provenance', () => {
    it('should record reasoning steps and tool calls per trace', async () => {
      const engine = new ScriptedEngine([
        () => ({ kind: 'tool_calls', calls: [call('c-1', 'list_datasets', {})] }),
        answer('Two datasets.'),
      ]);
      await createLoop(engine).handleUserMessage('What data is there?');

      const records = provenance.findBySessionId('session-1');
      expect(records.map(r => r.eventType)).toEqual(['reasoning_step', 'tool_call', 'reasoning_step']);
      expect(new Set(records.map(r => r.traceId)).size).toBe(1);
      expect(records[1].tool).toMatchObject({
        name: 'list_datasets',
        callId: 'c-1',
        status: 'success',
        argsHash: ProvenanceLogger.hashData({}),
      });
      expect(records[2].reasoning).toMatchObject({ engine: 'scripted', outcome: 'final_answer' });
    });
  });
});
