/**
 * @fileoverview Digest session state machine.
 *
 * Owns one session's cursor and item states. Actions only ever apply to the
 * item at the cursor; the cursor only moves forward and skips acted items.
 * Side effects go through ActionEffects; when one throws, the cursor and item
 * states are left as they were. Effects that already completed are remembered
 * per message so a retry does not repeat them.
 */

import { AppError, errorMessage } from '../../../utils/errors.js';
import type {
  ActionEffects,
  ActionKind,
  ActionOutcome,
  CloseReason,
  DigestItem,
  DigestSession,
  SessionStatus,
} from '../types.js';

export interface CreateSessionOptions {
  sessionId: string;
  conversationId: string;
  items: DigestItem[];
  now: Date;
  ttlMs: number;
}

export function idempotencyKey(sessionId: string, itemIndex: number, action: ActionKind): string {
  return `${sessionId}:${itemIndex}:${action}`;
}

export class DigestSessionMachine {
  /** Keys of applied actions; cleared when the session closes. */
  private readonly appliedKeys = new Set<string>();
  /** `effect:messageId` pairs already carried out. */
  private readonly completedEffects = new Set<string>();

  private constructor(
    readonly session: DigestSession,
    private readonly ttlMs: number
  ) {}

  static create(options: CreateSessionOptions): DigestSessionMachine {
    const session: DigestSession = {
      sessionId: options.sessionId,
      conversationId: options.conversationId,
      items: options.items,
      cursor: 0,
      status: 'building',
      createdAt: options.now,
      expiresAt: new Date(options.now.getTime() + options.ttlMs),
    };
    const machine = new DigestSessionMachine(session, options.ttlMs);
    machine.moveCursorFrom(-1);
    return machine;
  }

  get sessionId(): string {
    return this.session.sessionId;
  }

  get status(): SessionStatus {
    return this.session.status;
  }

  currentItem(): DigestItem | null {
    const { cursor } = this.session;
    if (this.session.status !== 'active' || cursor === 'exhausted') return null;
    return this.session.items[cursor] ?? null;
  }

  isExpired(now: Date): boolean {
    return now.getTime() >= this.session.expiresAt.getTime();
  }

  close(reason: CloseReason): void {
    if (this.session.status === 'closed') return;
    this.session.status = 'closed';
    this.session.closeReason = reason;
    this.appliedKeys.clear();
    this.completedEffects.clear();
  }

  /**
   * Apply `action` to the item at `itemIndex`.
   */
  async apply(itemIndex: number, action: ActionKind, effects: ActionEffects, now: Date): Promise<ActionOutcome> {
    if (this.session.status === 'closed') {
      return { type: 'closed', reason: this.session.closeReason ?? 'expired' };
    }
    if (this.isExpired(now)) {
      this.close('expired');
      return { type: 'closed', reason: 'expired' };
    }
    if (this.session.status === 'exhausted') {
      return { type: 'exhausted' };
    }

    const key = idempotencyKey(this.session.sessionId, itemIndex, action);
    if (this.appliedKeys.has(key)) {
      return { type: 'noop', reason: 'duplicate' };
    }

    const item = this.session.items[itemIndex];
    if (!item) {
      return { type: 'noop', reason: 'not_current' };
    }
    if (item.state === 'acted') {
      return { type: 'noop', reason: 'already_acted' };
    }
    if (item.index !== this.session.cursor) {
      return { type: 'noop', reason: 'not_current' };
    }
    if ((action === 'add_event' || action === 'ignore_event') && !item.eventCandidate) {
      return { type: 'noop', reason: 'no_event_candidate' };
    }

    try {
      await this.dispatch(item, action, effects);
    } catch (error) {
      return { type: 'failed', error: errorMessage(error) };
    }

    this.appliedKeys.add(key);
    this.session.expiresAt = new Date(now.getTime() + this.ttlMs);
    return { type: 'applied' };
  }

  private async dispatch(item: DigestItem, action: ActionKind, effects: ActionEffects): Promise<void> {
    switch (action) {
      case 'mark_important': {
        await effects.setSenderImportant(item.sender.address);
        for (const other of this.session.items) {
          if (other.index >= item.index && other.groupKey === item.groupKey && other.state !== 'acted') {
            other.urgency = { ...other.urgency, tier: 'important' };
          }
        }
        return;
      }
      case 'forward': {
        for (const messageId of item.messageRefs) {
          await this.once('forward', messageId, () => effects.forward(messageId));
          await this.once('archive', messageId, () => effects.archive(messageId));
        }
        this.markActedAndAdvance(item);
        return;
      }
      case 'leave_unread': {
        this.moveCursorFrom(item.index);
        return;
      }
      case 'next': {
        if (effects.addEventOnNext && item.eventCandidate) {
          await this.createEvent(item, effects);
        }
        for (const messageId of item.messageRefs) {
          await this.once('archive', messageId, () => effects.archive(messageId));
        }
        this.markActedAndAdvance(item);
        return;
      }
      case 'add_event': {
        await this.createEvent(item, effects);
        return;
      }
      case 'ignore_event': {
        item.eventCandidate = undefined;
        return;
      }
    }
  }

  private async createEvent(item: DigestItem, effects: ActionEffects): Promise<void> {
    const candidate = item.eventCandidate;
    if (!candidate) {
      throw new AppError('Item has no event candidate', 'NO_EVENT_CANDIDATE', true);
    }
    item.createdEventId = await effects.createEvent(candidate);
    item.eventCandidate = undefined;
  }

  private async once(effect: string, messageId: string, run: () => Promise<void>): Promise<void> {
    const key = `${effect}:${messageId}`;
    if (this.completedEffects.has(key)) return;
    await run();
    this.completedEffects.add(key);
  }

  private markActedAndAdvance(item: DigestItem): void {
    item.state = 'acted';
    this.moveCursorFrom(item.index);
  }

  /**
   * Move to the first non-acted item after `from`, or exhaust the session.
   */
  private moveCursorFrom(from: number): void {
    const next = this.session.items.find((item) => item.index > from && item.state !== 'acted');
    if (!next) {
      this.session.cursor = 'exhausted';
      this.session.status = 'exhausted';
      return;
    }
    this.session.cursor = next.index;
    this.session.status = 'active';
    if (next.state === 'pending') {
      next.state = 'shown';
    }
  }
}
