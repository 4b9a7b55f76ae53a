/**
 * Agent Loop
 *
 * Per-session state machine driving one user message to a terminal outcome:
 *
 *   awaiting_user_input -> reasoning -> executing_tools -> reasoning ...
 *                                    -> answered | clarification_needed | aborted
 *
 * - Reasoning steps are bounded by a timeout and retried with backoff on
 *   transient failures
 * - A malformed reasoning response gets one corrective re-prompt
 * - Tool failures are recorded as failure results and fed back, never fatal
 * - At most `turnBudget` tool cycles per user message
 * - Cancellation is observed between iterations
 */

import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import {
  MalformedResponseError,
  SessionBusyError,
  SessionCancelledError,
  TurnBudgetExceededError,
  wrapError,
} from '../core/errors.js';
import { mergeSessionDefaults, type SessionDefaults } from '../core/models.js';
import { withRetry, withTimeout, sleep } from '../core/retry.js';
import type {
  AbortReason,
  AgentResponse,
  LoopState,
  ToolInvocationRequest,
  ToolResult,
} from '../core/types.js';
import { ProvenanceLogger, type ProvenanceSink } from '../audit/provenance.js';
import { getLogger, type StructuredLogger } from '../logging/logger.js';
import type { ReasoningEngine, ReasoningOutcome } from '../reasoning/engine.js';
import { correctionNote } from '../reasoning/prompts.js';
import type { ToolRegistry } from '../tools/registry.js';
import { ConversationState } from './conversation.js';

export interface AgentLoopOptions extends Partial<SessionDefaults> {
  sessionId: string;
  engine: ReasoningEngine;
  tools: ToolRegistry;
  logger?: StructuredLogger;
  provenance?: ProvenanceSink;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export const ABORT_MESSAGES: Record<AbortReason, string> = {
  turn_budget_exhausted:
    'I could not complete this analysis within the allowed number of steps. Try asking a narrower question.',
  malformed_response:
    'I could not complete this request because the reasoning step kept producing an unusable response. Please rephrase the question.',
  reasoning_unavailable:
    'I could not complete this request because the reasoning service is currently unavailable. Please try again later.',
};

type ReasoningResult = { ok: true; outcome: ReasoningOutcome } | { ok: false; reason: AbortReason; error: Error };

export class AgentLoop {
  readonly sessionId: string;
  readonly conversation = new ConversationState();
  private state: LoopState = 'awaiting_user_input';
  private readonly settings: SessionDefaults;
  private readonly engine: ReasoningEngine;
  private readonly tools: ToolRegistry;
  private readonly logger: StructuredLogger;
  private readonly provenance?: ProvenanceSink;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly abortController = new AbortController();

  constructor(options: AgentLoopOptions) {
    this.sessionId = options.sessionId;
    this.settings = mergeSessionDefaults(options);
    this.engine = options.engine;
    this.tools = options.tools;
    this.logger = (options.logger ?? getLogger()).child({ session_id: options.sessionId });
    this.provenance = options.provenance;
    this.sleep = options.sleep ?? sleep;
  }

  getState(): LoopState {
    return this.state;
  }

  get turnBudget(): number {
    return this.settings.turnBudget;
  }

  get cancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Request cancellation. An in-flight message stops at the next iteration
   * boundary with SessionCancelledError.
   */
  cancel(): void {
    if (!this.cancelled) {
      this.abortController.abort(new SessionCancelledError(this.sessionId));
    }
  }

  /**
   * Drive one user message to a terminal state. Throws only when the session
   * is busy or cancelled; every other failure ends as an aborted response.
   */
  async handleUserMessage(text: string): Promise<AgentResponse> {
    if (this.state === 'reasoning' || this.state === 'executing_tools') {
      throw new SessionBusyError(this.sessionId);
    }
    this.checkCancelled();

    const traceId = uuidv4();
    const logger = this.logger.child({ trace_id: traceId });
    this.conversation.append({ role: 'user', content: { kind: 'text', text } });

    let turns = 0;

    for (;;) {
      this.checkCancelled();
      this.state = 'reasoning';

      const result = await this.reason(traceId, logger);
      this.checkCancelled();

      if (!result.ok) {
        return this.abort(result.reason, turns, traceId, logger, result.error);
      }
      const outcome = result.outcome;

      switch (outcome.kind) {
        case 'final_answer':
          this.conversation.append({ role: 'agent', content: { kind: 'answer', text: outcome.text } });
          this.state = 'answered';
          return { kind: 'answer', text: outcome.text, turns };

        case 'clarification':
          this.conversation.append({ role: 'agent', content: { kind: 'clarification', text: outcome.text } });
          this.state = 'clarification_needed';
          return { kind: 'clarification', text: outcome.text, turns };

        case 'tool_calls': {
          if (turns >= this.settings.turnBudget) {
            return this.abort(
              'turn_budget_exhausted',
              turns,
              traceId,
              logger,
              new TurnBudgetExceededError(this.settings.turnBudget)
            );
          }
          turns++;
          this.conversation.append({
            role: 'agent',
            content: { kind: 'tool_calls', text: outcome.text, calls: outcome.calls },
          });

          this.state = 'executing_tools';
          const results = await this.executeTools(outcome.calls, traceId, logger);
          for (const toolResult of results) {
            this.conversation.append({ role: 'tool', content: toolResult });
          }
          break;
        }
      }
    }
  }

  private checkCancelled(): void {
    if (this.cancelled) {
      this.state = 'aborted';
      throw new SessionCancelledError(this.sessionId);
    }
  }

  /**
   * One reasoning step with retries; a malformed response is re-prompted once.
   */
  private async reason(traceId: string, logger: StructuredLogger): Promise<ReasoningResult> {
    let correction: string | undefined;

    for (;;) {
      const startTime = Date.now();
      try {
        const outcome = await withRetry(
          () =>
            withTimeout(
              signal =>
                this.engine.step(this.conversation.history(), this.tools, {
                  signal,
                  correction,
                }),
              this.settings.llmTimeoutMs,
              `${this.engine.name} reasoning step`,
              this.abortController.signal
            ),
          {
            maxRetries: this.settings.maxRetries,
            baseDelayMs: this.settings.retryBaseDelayMs,
            label: `${this.engine.name} reasoning step`,
            logger,
            signal: this.abortController.signal,
            sleep: this.sleep,
          }
        );

        const durationMs = Date.now() - startTime;
        logger.reasoningCompleted(outcome.kind, durationMs, outcome.kind === 'tool_calls' ? outcome.calls.length : 0);
        this.provenance?.log({
          sessionId: this.sessionId,
          traceId,
          eventType: 'reasoning_step',
          reasoning: { engine: this.engine.name, outcome: outcome.kind, durationMs },
        });
        return { ok: true, outcome };
      } catch (error) {
        this.checkCancelled();

        const wrapped = wrapError(error, `${this.engine.name} reasoning step`);
        this.provenance?.log({
          sessionId: this.sessionId,
          traceId,
          eventType: 'reasoning_step',
          reasoning: { engine: this.engine.name, outcome: 'error', durationMs: Date.now() - startTime },
          error: { message: wrapped.message, code: wrapped.code },
        });

        if (wrapped instanceof MalformedResponseError) {
          if (correction === undefined) {
            logger.warn('malformed_response_reprompt', { reason: wrapped.reason });
            correction = correctionNote(wrapped.reason);
            continue;
          }
          return { ok: false, reason: 'malformed_response', error: wrapped };
        }
        return { ok: false, reason: 'reasoning_unavailable', error: wrapped };
      }
    }
  }

  private async executeTools(
    calls: ToolInvocationRequest[],
    traceId: string,
    logger: StructuredLogger
  ): Promise<ToolResult[]> {
    const limit = pLimit(this.settings.toolConcurrency);

    // Promise.all keeps request order regardless of completion order
    return Promise.all(
      calls.map(call =>
        limit(async () => {
          const startTime = Date.now();
          const result = await this.tools.execute(call, {
            sessionId: this.sessionId,
            signal: this.abortController.signal,
            lookupTable: resultId => this.conversation.findTable(resultId),
          });
          const durationMs = Date.now() - startTime;

          logger.toolExecuted(
            call.toolName,
            durationMs,
            result.status === 'success',
            result.status === 'failure' ? result.error.code : undefined
          );
          this.provenance?.log({
            sessionId: this.sessionId,
            traceId,
            eventType: 'tool_call',
            tool: {
              name: call.toolName,
              callId: call.id,
              argsHash: ProvenanceLogger.hashData(call.arguments),
              resultHash: ProvenanceLogger.hashData(result.status === 'success' ? result.payload : result.error),
              status: result.status,
              durationMs,
            },
            error: result.status === 'failure' ? { message: result.error.message, code: result.error.code } : undefined,
          });
          return result;
        })
      )
    );
  }

  private abort(
    reason: AbortReason,
    turns: number,
    traceId: string,
    logger: StructuredLogger,
    error: Error & { code?: string }
  ): AgentResponse {
    const text = ABORT_MESSAGES[reason];
    this.conversation.append({ role: 'agent', content: { kind: 'aborted', text, reason } });
    this.state = 'aborted';

    logger.turnAborted(reason, turns, error);
    this.provenance?.log({
      sessionId: this.sessionId,
      traceId,
      eventType: 'turn_aborted',
      error: { message: error.message, code: error.code ?? 'UNKNOWN' },
    });
    return { kind: 'aborted', text, reason, turns };
  }
}
