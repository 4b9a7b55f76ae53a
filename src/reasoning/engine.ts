/**
 * Reasoning Engine contract
 *
 * One step maps the conversation so far to exactly one outcome: a final
 * answer, a batch of tool calls, or a clarification question for the user.
 */

import type { Message, ToolInvocationRequest } from '../core/types.js';
import type { ToolCatalog } from '../tools/registry.js';

export type ReasoningOutcome =
  | { kind: 'final_answer'; text: string }
  | { kind: 'tool_calls'; text?: string; calls: ToolInvocationRequest[] }
  | { kind: 'clarification'; text: string };

export interface StepOptions {
  signal?: AbortSignal;
  /** Note appended after the history when re-prompting after a malformed response */
  correction?: string;
}

export interface ReasoningEngine {
  readonly name: string;
  /**
   * Throws MalformedResponseError when the response cannot be decoded into an
   * outcome whose tool calls are all declared and valid.
   */
  step(history: readonly Message[], catalog: ToolCatalog, options?: StepOptions): Promise<ReasoningOutcome>;
}

/** Control tool through which the model asks the user a question */
export const CLARIFICATION_TOOL = 'ask_clarification';
