/**
 * Bounded per-session conversation history.
 *
 * Each session keeps at most `windowSize` turns; appending to a full window
 * drops the oldest. Sessions idle longer than `idleTimeoutMs` are evicted
 * lazily, both when they are next touched and by a sweep over the other
 * sessions that runs at most once per `sweepIntervalMs`. Operations on one
 * session are serialized; different sessions proceed independently.
 */

import type { ConversationMemoryConfig } from '../config/retrieval-config.js';
import { DEFAULT_CONFIG } from '../config/retrieval-config.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { ConfigError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('conversation-memory');

export type TurnRole = 'user' | 'assistant';

/** One utterance. Frozen once appended. */
export interface ConversationTurn {
  readonly role: TurnRole;
  readonly text: string;
  /** Epoch milliseconds */
  readonly timestamp: number;
}

export interface ConversationSession {
  id: string;
  turns: ConversationTurn[];
  lastAccessAt: number;
}

export interface NewTurn {
  role: TurnRole;
  text: string;
  /** Defaults to the memory's clock */
  timestamp?: number;
}

export interface ConversationMemoryOptions extends Partial<ConversationMemoryConfig> {
  /** Clock, injectable for tests */
  now?: () => number;
}

function assertPositiveInteger(name: string, value: number, allowZero: boolean = false): void {
  const min = allowZero ? 0 : 1;
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`memory.${name} must be an integer of at least ${min}, got ${value}`, 'INVALID_VALUE');
  }
}

export class ConversationMemory {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly mutex = new KeyedMutex();
  private readonly windowSize: number;
  private readonly idleTimeoutMs: number;
  private readonly sweepIntervalMs: number;
  private readonly maxSessions: number;
  private readonly now: () => number;
  private lastSweepAt: number;

  constructor(options: ConversationMemoryOptions = {}) {
    const defaults = DEFAULT_CONFIG.memory;
    this.windowSize = options.windowSize ?? defaults.windowSize;
    this.idleTimeoutMs = options.idleTimeoutMs ?? defaults.idleTimeoutMs;
    this.sweepIntervalMs = options.sweepIntervalMs ?? defaults.sweepIntervalMs;
    this.maxSessions = options.maxSessions ?? defaults.maxSessions;
    this.now = options.now ?? Date.now;

    assertPositiveInteger('windowSize', this.windowSize);
    assertPositiveInteger('idleTimeoutMs', this.idleTimeoutMs);
    assertPositiveInteger('sweepIntervalMs', this.sweepIntervalMs, true);
    assertPositiveInteger('maxSessions', this.maxSessions, true);

    this.lastSweepAt = this.now();
  }

  /**
   * Append a turn, creating the session on first use.
   *
   * @returns the stored (frozen) turn
   * @throws ValidationError `INVALID_SESSION` for an empty session id
   */
  async append(sessionId: string, turn: NewTurn): Promise<ConversationTurn> {
    assertSessionId(sessionId);
    return this.mutex.runExclusive(sessionId, () => {
      const now = this.now();
      this.maybeSweep(now, sessionId);

      let session = this.liveSession(sessionId, now);
      if (!session) {
        this.makeRoom(sessionId);
        session = { id: sessionId, turns: [], lastAccessAt: now };
        this.sessions.set(sessionId, session);
      }

      const stored: ConversationTurn = Object.freeze({
        role: turn.role,
        text: turn.text,
        timestamp: turn.timestamp ?? now,
      });
      session.turns.push(stored);
      if (session.turns.length > this.windowSize) {
        session.turns.splice(0, session.turns.length - this.windowSize);
      }
      session.lastAccessAt = now;
      return stored;
    });
  }

  /**
   * Chronological copy of a session's turns. Unknown, cleared and expired
   * sessions read as empty.
   */
  async read(sessionId: string): Promise<ConversationTurn[]> {
    assertSessionId(sessionId);
    return this.mutex.runExclusive(sessionId, () => {
      const now = this.now();
      this.maybeSweep(now, sessionId);

      const session = this.liveSession(sessionId, now);
      if (!session) return [];
      session.lastAccessAt = now;
      return [...session.turns];
    });
  }

  /**
   * Empty a session's turns, keeping the session. Unknown ids are a no-op.
   */
  async clear(sessionId: string): Promise<void> {
    assertSessionId(sessionId);
    await this.mutex.runExclusive(sessionId, () => {
      const now = this.now();
      this.maybeSweep(now, sessionId);

      const session = this.liveSession(sessionId, now);
      if (!session) return;
      session.turns = [];
      session.lastAccessAt = now;
      log.debug('Cleared session', { sessionId });
    });
  }

  /**
   * Evict every idle session not in use right now.
   *
   * @returns number of sessions evicted
   */
  evictIdle(): number {
    const now = this.now();
    this.lastSweepAt = now;
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session, now) && !this.mutex.isLocked(id)) {
        this.sessions.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) {
      log.debug('Evicted idle sessions', { evicted, remaining: this.sessions.size });
    }
    return evicted;
  }

  /** Number of sessions held, including ones not yet swept. */
  size(): number {
    return this.sessions.size;
  }

  private isExpired(session: ConversationSession, now: number): boolean {
    return now - session.lastAccessAt > this.idleTimeoutMs;
  }

  /**
   * The session if it exists and has not expired; an expired one is dropped.
   */
  private liveSession(sessionId: string, now: number): ConversationSession | undefined {
    const session = this.sessions.get(sessionId);
    if (session && this.isExpired(session, now)) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return session;
  }

  private maybeSweep(now: number, current: string): void {
    if (now - this.lastSweepAt < this.sweepIntervalMs) return;
    this.lastSweepAt = now;
    for (const [id, session] of this.sessions) {
      if (id !== current && this.isExpired(session, now) && !this.mutex.isLocked(id)) {
        this.sessions.delete(id);
      }
    }
  }

  /**
   * Evict the least recently accessed session not in use when a new session
   * would exceed `maxSessions`.
   */
  private makeRoom(incoming: string): void {
    if (this.maxSessions === 0 || this.sessions.size < this.maxSessions) return;

    let oldest: ConversationSession | undefined;
    for (const [id, session] of this.sessions) {
      if (id === incoming || this.mutex.isLocked(id)) continue;
      if (!oldest || session.lastAccessAt < oldest.lastAccessAt) oldest = session;
    }
    if (oldest) {
      this.sessions.delete(oldest.id);
      log.debug('Evicted least recently used session', { sessionId: oldest.id });
    }
  }
}

function assertSessionId(sessionId: string): void {
  if (!sessionId.trim()) {
    throw new ValidationError('Session id must not be empty', 'INVALID_SESSION');
  }
}
