/**
 * Session Manager
 *
 * Session boundary of the agent. Each session owns one AgentLoop and its
 * conversation; sessions share only the dataset provider and the artifact
 * store. Messages posted to one session are processed strictly in arrival
 * order, while different sessions run concurrently.
 */

import pLimit, { type LimitFunction } from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, SessionCancelledError } from '../core/errors.js';
import { mergeSessionDefaults, type SessionDefaults } from '../core/models.js';
import type { AgentResponse, Message, SessionInfo } from '../core/types.js';
import type { ProvenanceSink } from '../audit/provenance.js';
import { getLogger, type StructuredLogger } from '../logging/logger.js';
import type { ReasoningEngine } from '../reasoning/engine.js';
import type { ArtifactStore } from '../tools/charts.js';
import type { ToolRegistry } from '../tools/registry.js';
import { AgentLoop } from './agent-loop.js';

export interface SessionManagerOptions {
  engine: ReasoningEngine;
  tools: ToolRegistry;
  defaults?: Partial<SessionDefaults>;
  /** Sessions idle for longer than this are swept; 0 disables sweeping */
  idleTimeoutMs?: number;
  logger?: StructuredLogger;
  provenance?: ProvenanceSink;
  /** Charts of a discarded session are removed from this store */
  artifacts?: ArtifactStore;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface StartSessionOptions {
  turnBudget?: number;
}

interface SessionEntry {
  loop: AgentLoop;
  queue: LimitFunction;
  createdAt: Date;
  lastActiveAt: Date;
}

export class SessionManager {
  private sessions = new Map<string, SessionEntry>();
  private readonly defaults: SessionDefaults;
  private readonly idleTimeoutMs: number;
  private readonly logger: StructuredLogger;
  private sweepTimer: NodeJS.Timeout | undefined;

  constructor(private readonly options: SessionManagerOptions) {
    this.defaults = mergeSessionDefaults(options.defaults);
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30 * 60 * 1000;
    this.logger = options.logger ?? getLogger();
  }

  startSession(options: StartSessionOptions = {}): string {
    const sessionId = uuidv4();
    const loop = new AgentLoop({
      ...this.defaults,
      turnBudget: options.turnBudget ?? this.defaults.turnBudget,
      sessionId,
      engine: this.options.engine,
      tools: this.options.tools,
      logger: this.logger,
      provenance: this.options.provenance,
      sleep: this.options.sleep,
    });

    const now = new Date();
    this.sessions.set(sessionId, { loop, queue: pLimit(1), createdAt: now, lastActiveAt: now });
    this.logger.sessionStarted(sessionId, loop.turnBudget);
    return sessionId;
  }

  /**
   * Queue a user message; resolves with the terminal response for it.
   */
  async postMessage(sessionId: string, text: string): Promise<AgentResponse> {
    const entry = this.require(sessionId);
    entry.lastActiveAt = new Date();

    return entry.queue(async () => {
      // The session may have ended while this message waited
      if (!this.sessions.has(sessionId) || entry.loop.cancelled) {
        throw new SessionCancelledError(sessionId);
      }
      try {
        return await entry.loop.handleUserMessage(text);
      } finally {
        entry.lastActiveAt = new Date();
      }
    });
  }

  /**
   * End a session and discard its conversation. Any in-flight message stops
   * at its next iteration boundary.
   */
  endSession(sessionId: string): void {
    this.discard(sessionId, 'ended');
  }

  cancelSession(sessionId: string): void {
    this.discard(sessionId, 'cancelled');
  }

  getSession(sessionId: string): SessionInfo {
    const entry = this.require(sessionId);
    return {
      id: sessionId,
      state: entry.loop.getState(),
      messageCount: entry.loop.conversation.length,
      turnBudget: entry.loop.turnBudget,
      createdAt: entry.createdAt,
      lastActiveAt: entry.lastActiveAt,
    };
  }

  getHistory(sessionId: string): readonly Message[] {
    return this.require(sessionId).loop.conversation.history();
  }

  listSessions(): SessionInfo[] {
    return [...this.sessions.keys()].map(id => this.getSession(id));
  }

  /**
   * Discard sessions idle for longer than the idle timeout and not processing
   * a message. Returns the ids removed.
   */
  sweepIdle(now: Date = new Date()): string[] {
    const expired: string[] = [];
    if (this.idleTimeoutMs <= 0) return expired;

    for (const [id, entry] of this.sessions) {
      const busy = entry.queue.activeCount > 0 || entry.queue.pendingCount > 0;
      if (!busy && now.getTime() - entry.lastActiveAt.getTime() > this.idleTimeoutMs) {
        expired.push(id);
      }
    }
    for (const id of expired) {
      this.discard(id, 'expired');
    }
    return expired;
  }

  /**
   * Sweep idle sessions periodically until shutdown().
   */
  startSweeping(intervalMs: number = 60000): void {
    if (this.sweepTimer || this.idleTimeoutMs <= 0) return;
    this.sweepTimer = setInterval(() => this.sweepIdle(), intervalMs);
    this.sweepTimer.unref();
  }

  shutdown(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    for (const id of [...this.sessions.keys()]) {
      this.discard(id, 'ended');
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  private require(sessionId: string): SessionEntry {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new NotFoundError('session', sessionId);
    }
    return entry;
  }

  private discard(sessionId: string, reason: 'ended' | 'cancelled' | 'expired'): void {
    const entry = this.require(sessionId);
    // Queued messages still run and reject with SessionCancelledError
    entry.loop.cancel();
    this.sessions.delete(sessionId);
    this.options.artifacts?.removeSession(sessionId);
    this.logger.sessionEnded(sessionId, reason, entry.loop.conversation.length);
  }
}
