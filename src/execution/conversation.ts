/**
 * Conversation State
 *
 * Append-only, totally ordered message log of one session. Messages are
 * frozen on append and never modified or removed.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Message, MessageInput, TablePayload } from '../core/types.js';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function stamp(input: MessageInput, sequence: number): Message {
  const meta = { id: uuidv4(), sequence, timestamp: new Date() };
  switch (input.role) {
    case 'user':
      return { ...meta, role: 'user', content: input.content };
    case 'agent':
      return { ...meta, role: 'agent', content: input.content };
    case 'tool':
      return { ...meta, role: 'tool', content: input.content };
  }
}

export class ConversationState {
  private readonly messages: Message[] = [];

  append(input: MessageInput): Message {
    const message = deepFreeze(stamp(input, this.messages.length));
    this.messages.push(message);
    return message;
  }

  /** Snapshot of the messages in order */
  history(): readonly Message[] {
    return [...this.messages];
  }

  get length(): number {
    return this.messages.length;
  }

  last(): Message | undefined {
    return this.messages[this.messages.length - 1];
  }

  /**
   * Table payload of an earlier successful tool result, by its result id.
   */
  findTable(resultId: string): TablePayload | undefined {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const message = this.messages[i];
      if (
        message.role === 'tool' &&
        message.content.status === 'success' &&
        message.content.payload.kind === 'table' &&
        message.content.payload.resultId === resultId
      ) {
        return message.content.payload;
      }
    }
    return undefined;
  }
}
