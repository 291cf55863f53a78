/**
 * @fileoverview Live digest sessions, one per conversation.
 *
 * Starting a build supersedes the conversation's current session and bumps
 * its build generation; a build whose generation is no longer current is
 * dropped on commit. Every action and expiry close for a session runs through
 * a per-session serial queue.
 */

import { KeyedSerialQueue } from '../../../utils/keyed-queue.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import type { CloseReason } from '../types.js';
import type { DigestSessionMachine } from './machine.js';

/** Closed session ids remembered so stale buttons can say why. */
const CLOSED_HISTORY_LIMIT = 500;

export interface BuildToken {
  conversationId: string;
  generation: number;
}

export class DigestSessionRegistry {
  private readonly sessions = new Map<string, DigestSessionMachine>();
  private readonly generations = new Map<string, number>();
  private readonly closed = new Map<string, CloseReason>();
  private readonly queue = new KeyedSerialQueue();

  constructor(private readonly logger?: AppLogger) {}

  /**
   * Close any live session for the conversation and start a new build generation.
   */
  beginBuild(conversationId: string): BuildToken {
    const existing = this.sessions.get(conversationId);
    if (existing) {
      this.closeSession(conversationId, existing, 'superseded');
    }
    const generation = (this.generations.get(conversationId) ?? 0) + 1;
    this.generations.set(conversationId, generation);
    return { conversationId, generation };
  }

  isCurrent(token: BuildToken): boolean {
    return this.generations.get(token.conversationId) === token.generation;
  }

  /**
   * Install a finished build. Returns false, closing the machine, when a newer
   * build has started since `token` was issued.
   */
  commit(token: BuildToken, machine: DigestSessionMachine): boolean {
    if (!this.isCurrent(token)) {
      machine.close('superseded');
      this.remember(machine.sessionId, 'superseded');
      this.logger?.info('digest_build_superseded', { sessionId: machine.sessionId });
      return false;
    }
    this.sessions.set(token.conversationId, machine);
    return true;
  }

  get(conversationId: string): DigestSessionMachine | undefined {
    return this.sessions.get(conversationId);
  }

  /** Why a session id is no longer live, if it was seen. */
  closedReason(sessionId: string): CloseReason | undefined {
    return this.closed.get(sessionId);
  }

  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    return this.queue.run(sessionId, task);
  }

  /**
   * Drop the conversation's session if it is `machine` and has closed.
   */
  release(conversationId: string, machine: DigestSessionMachine): void {
    if (machine.status !== 'closed' || this.sessions.get(conversationId) !== machine) return;
    this.sessions.delete(conversationId);
    this.remember(machine.sessionId, machine.session.closeReason ?? 'expired');
  }

  /**
   * Close every expired session. Returns how many were closed.
   */
  async sweepExpired(now: Date): Promise<number> {
    const entries = [...this.sessions.entries()];
    const results = await Promise.all(
      entries.map(([conversationId, machine]) =>
        this.runExclusive(machine.sessionId, async () => {
          if (this.sessions.get(conversationId) !== machine || !machine.isExpired(now)) {
            return false;
          }
          this.closeSession(conversationId, machine, 'expired');
          return true;
        })
      )
    );
    const count = results.filter(Boolean).length;
    if (count > 0) {
      this.logger?.info('digest_sessions_expired', { count });
    }
    return count;
  }

  get size(): number {
    return this.sessions.size;
  }

  private closeSession(conversationId: string, machine: DigestSessionMachine, reason: CloseReason): void {
    machine.close(reason);
    this.sessions.delete(conversationId);
    this.remember(machine.sessionId, reason);
    this.logger?.debug('digest_session_closed', { sessionId: machine.sessionId, reason });
  }

  private remember(sessionId: string, reason: CloseReason): void {
    this.closed.set(sessionId, reason);
    if (this.closed.size > CLOSED_HISTORY_LIMIT) {
      const oldest = this.closed.keys().next();
      if (!oldest.done) this.closed.delete(oldest.value);
    }
  }
}
