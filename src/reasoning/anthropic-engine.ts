/**
 * Anthropic Reasoning Engine
 *
 * Adapter over the Messages API:
 * - Conversation messages become user/assistant turns with tool_use and
 *   tool_result blocks; consecutive same-role turns are merged
 * - Declared tools plus the clarification control tool are sent as `tools`
 * - The reply is decoded into exactly one outcome, validating every tool call
 *   against the catalog
 *
 * Retries and timeouts are applied by the caller; the SDK's own retries are
 * disabled so backoff happens in one place.
 */

import Anthropic from '@anthropic-ai/sdk';
import {
  MalformedResponseError,
  RateLimitError,
  SourceUnavailableError,
  TimeoutError,
  wrapError,
} from '../core/errors.js';
import { DEFAULT_MODEL, resolveMaxOutputTokens, type ModelId } from '../core/models.js';
import type { Logger, Message, ToolInvocationRequest, ToolResult } from '../core/types.js';
import { getLogger } from '../logging/logger.js';
import type { ToolCatalog } from '../tools/registry.js';
import { CLARIFICATION_TOOL, type ReasoningEngine, type ReasoningOutcome, type StepOptions } from './engine.js';
import { SYSTEM_PROMPT } from './prompts.js';

// =============================================================================
// CLIENT SHAPE
// =============================================================================

export interface ReplyBlock {
  type: string;
  text?: string;
  id?: string;
  name?: string;
  input?: unknown;
}

/** The part of a Messages API reply the engine reads */
export interface ModelReply {
  content: ReplyBlock[];
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal }
    ): Promise<ModelReply>;
  };
}

export interface AnthropicEngineOptions {
  /** Defaults to an SDK client built from apiKey */
  client?: MessagesClient;
  apiKey?: string;
  model?: ModelId;
  maxOutputTokens?: number;
  /** Transport timeout of the SDK client */
  timeoutMs?: number;
  /** Most recent messages sent per request */
  contextWindowMessages?: number;
  /** Table rows included per tool result */
  maxRowsInResult?: number;
  systemPrompt?: string;
  logger?: Logger;
}

const CLARIFICATION_DECLARATION: Anthropic.Tool = {
  name: CLARIFICATION_TOOL,
  description: 'Ask the user one clarifying question when the request is ambiguous. Do not combine with other tools.',
  input_schema: {
    type: 'object',
    properties: {
      question: { type: 'string', description: 'The question to show the user' },
    },
    required: ['question'],
  },
};

// =============================================================================
// SERIALIZATION
// =============================================================================

/**
 * Last `limit` messages, moved to start at a user text message so every
 * tool_result keeps its tool_use.
 */
export function windowHistory(history: readonly Message[], limit: number): readonly Message[] {
  if (history.length <= limit) return history;

  const cut = history.length - limit;
  for (let i = cut; i < history.length; i++) {
    if (history[i].role === 'user') return history.slice(i);
  }
  // The current turn alone exceeds the window; keep it whole
  for (let i = cut - 1; i >= 0; i--) {
    if (history[i].role === 'user') return history.slice(i);
  }
  return history;
}

function serializeResult(result: ToolResult, maxRows: number): string {
  if (result.status === 'failure') {
    return JSON.stringify({ error: { code: result.error.code, message: result.error.message } });
  }

  const payload = result.payload;
  if (payload.kind === 'table' && payload.rows.length > maxRows) {
    return JSON.stringify({
      ...payload,
      rows: payload.rows.slice(0, maxRows),
      truncated: true,
      note: `Showing ${maxRows} of ${payload.rowCount} rows`,
    });
  }
  return JSON.stringify(payload);
}

function toParam(message: Message, maxRows: number): Anthropic.MessageParam {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: [{ type: 'text', text: message.content.text }] };
    case 'tool':
      return {
        role: 'user',
        content: [
          {
            type: 'tool_result',
            tool_use_id: message.content.callId,
            content: serializeResult(message.content, maxRows),
            is_error: message.content.status === 'failure',
          },
        ],
      };
    case 'agent': {
      const content = message.content;
      if (content.kind !== 'tool_calls') {
        return { role: 'assistant', content: [{ type: 'text', text: content.text }] };
      }
      const blocks: Anthropic.ContentBlockParam[] = [];
      if (content.text) {
        blocks.push({ type: 'text', text: content.text });
      }
      for (const call of content.calls) {
        blocks.push({ type: 'tool_use', id: call.id, name: call.toolName, input: call.arguments });
      }
      return { role: 'assistant', content: blocks };
    }
  }
}

function blocksOf(param: Anthropic.MessageParam): Anthropic.ContentBlockParam[] {
  return typeof param.content === 'string' ? [{ type: 'text', text: param.content }] : [...param.content];
}

export function toMessageParams(
  history: readonly Message[],
  maxRows: number,
  correction?: string
): Anthropic.MessageParam[] {
  const params = history.map(message => toParam(message, maxRows));
  if (correction) {
    params.push({ role: 'user', content: [{ type: 'text', text: correction }] });
  }

  const merged: Anthropic.MessageParam[] = [];
  for (const param of params) {
    const previous = merged[merged.length - 1];
    if (previous && previous.role === param.role) {
      merged[merged.length - 1] = { role: param.role, content: [...blocksOf(previous), ...blocksOf(param)] };
    } else {
      merged.push(param);
    }
  }
  return merged;
}

// =============================================================================
// DECODING
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function decodeReply(reply: ModelReply, catalog: ToolCatalog): ReasoningOutcome {
  const text = reply.content
    .filter(block => block.type === 'text' && typeof block.text === 'string')
    .map(block => block.text ?? '')
    .join('')
    .trim();
  const toolUses = reply.content.filter(block => block.type === 'tool_use');

  if (toolUses.length === 0) {
    if (text === '') {
      throw new MalformedResponseError('empty response', { stop_reason: reply.stop_reason });
    }
    return { kind: 'final_answer', text };
  }

  const clarifications = toolUses.filter(block => block.name === CLARIFICATION_TOOL);
  if (clarifications.length > 0) {
    if (toolUses.length > 1) {
      throw new MalformedResponseError(`${CLARIFICATION_TOOL} must be the only tool call`);
    }
    const input = clarifications[0].input;
    const question = isRecord(input) && typeof input.question === 'string' ? input.question.trim() : '';
    if (question === '') {
      throw new MalformedResponseError(`${CLARIFICATION_TOOL} needs a non-empty question`);
    }
    return { kind: 'clarification', text: question };
  }

  const calls: ToolInvocationRequest[] = [];
  for (const block of toolUses) {
    if (!block.id || !block.name) {
      throw new MalformedResponseError('tool call without id or name');
    }
    const declared = catalog.declarations().some(declaration => declaration.name === block.name);
    if (!declared) {
      throw new MalformedResponseError(`undeclared tool '${block.name}'`, { tool: block.name });
    }
    const validation = catalog.validate(block.name, block.input);
    if (!validation.ok) {
      throw new MalformedResponseError(`invalid arguments for ${block.name}: ${validation.issues.join('; ')}`, {
        tool: block.name,
        issues: validation.issues,
      });
    }
    calls.push({ id: block.id, toolName: block.name, arguments: validation.arguments });
  }

  return { kind: 'tool_calls', text: text === '' ? undefined : text, calls };
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

function retryAfterMs(headers: Record<string, string | null | undefined> | undefined): number | undefined {
  const value = headers?.['retry-after'];
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

export function mapAnthropicError(error: unknown, timeoutMs: number): Error {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new TimeoutError('anthropic messages.create', timeoutMs);
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new SourceUnavailableError('anthropic', error.message);
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new RateLimitError('anthropic', retryAfterMs(error.headers));
  }
  if (error instanceof Anthropic.APIError && error.status !== undefined && error.status >= 500) {
    return new SourceUnavailableError('anthropic', error.message, error.status);
  }
  return wrapError(error, 'anthropic');
}

// =============================================================================
// ENGINE
// =============================================================================

export class AnthropicReasoningEngine implements ReasoningEngine {
  readonly name = 'anthropic';
  private client: MessagesClient;
  private model: ModelId;
  private maxOutputTokens: number;
  private timeoutMs: number;
  private contextWindowMessages: number;
  private maxRowsInResult: number;
  private systemPrompt: string;
  private logger: Logger;

  constructor(options: AnthropicEngineOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 600000;
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey, maxRetries: 0, timeout: this.timeoutMs });
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxOutputTokens = resolveMaxOutputTokens(this.model, options.maxOutputTokens);
    this.contextWindowMessages = options.contextWindowMessages ?? 60;
    this.maxRowsInResult = options.maxRowsInResult ?? 50;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    this.logger = options.logger ?? getLogger();
  }

  async step(history: readonly Message[], catalog: ToolCatalog, options: StepOptions = {}): Promise<ReasoningOutcome> {
    const messages = toMessageParams(
      windowHistory(history, this.contextWindowMessages),
      this.maxRowsInResult,
      options.correction
    );
    const tools: Anthropic.Tool[] = [
      ...catalog.declarations().map(declaration => ({
        name: declaration.name,
        description: declaration.description,
        input_schema: {
          type: 'object' as const,
          properties: declaration.inputSchema.properties,
          required: declaration.inputSchema.required,
        },
      })),
      CLARIFICATION_DECLARATION,
    ];

    const startTime = Date.now();
    let reply: ModelReply;
    try {
      reply = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxOutputTokens,
          system: this.systemPrompt,
          messages,
          tools,
        },
        { signal: options.signal }
      );
    } catch (error) {
      throw mapAnthropicError(error, this.timeoutMs);
    }

    this.logger.debug('reasoning_reply', {
      model: this.model,
      stop_reason: reply.stop_reason,
      input_tokens: reply.usage.input_tokens,
      output_tokens: reply.usage.output_tokens,
      duration_ms: Date.now() - startTime,
    });

    return decodeReply(reply, catalog);
  }
}
