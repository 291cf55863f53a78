/**
 * Digest domain types.
 */

import type { EventCandidate } from '../calendar-tagger/types.js';
import type { EmailAddress, Message } from '../mailbox/types.js';
import type { SummaryResult } from '../summarization/types.js';
import type { UrgencyResult } from '../urgency/types.js';

export type ItemState = 'pending' | 'shown' | 'acted';

export interface DigestItem {
  /** Position in presentation order (0-based). */
  index: number;
  /** Earliest underlying message. */
  messageRef: string;
  /** Every underlying message, chronological. */
  messageRefs: string[];
  sender: EmailAddress;
  subject: string;
  summary: SummaryResult;
  urgency: UrgencyResult;
  eventCandidate?: EventCandidate;
  /** Lower-cased sender address. */
  groupKey: string;
  groupSize: number;
  receivedAt: Date;
  readingMinutes: number;
  state: ItemState;
  createdEventId?: string;
}

/** Everything computed for one message before grouping. */
export interface MessageAnalysis {
  message: Message;
  summary: SummaryResult;
  urgency: UrgencyResult;
  eventCandidate: EventCandidate | null;
}

export type SessionStatus = 'building' | 'active' | 'exhausted' | 'closed';

export type CloseReason = 'expired' | 'superseded';

export type Cursor = number | 'exhausted';

export interface DigestSession {
  sessionId: string;
  conversationId: string;
  items: DigestItem[];
  cursor: Cursor;
  status: SessionStatus;
  createdAt: Date;
  expiresAt: Date;
  closeReason?: CloseReason;
}

export const ACTION_KINDS = [
  'mark_important',
  'forward',
  'leave_unread',
  'next',
  'add_event',
  'ignore_event',
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type NoopReason = 'already_acted' | 'not_current' | 'no_event_candidate' | 'duplicate';

export type ActionOutcome =
  | { type: 'applied' }
  | { type: 'noop'; reason: NoopReason }
  | { type: 'exhausted' }
  | { type: 'closed'; reason: CloseReason }
  | { type: 'failed'; error: string };

/**
 * Side effects an action may trigger. Supplied by the service so the state
 * machine never reaches the mailbox or calendar directly.
 */
export interface ActionEffects {
  setSenderImportant(address: string): Promise<void>;
  forward(messageId: string): Promise<void>;
  archive(messageId: string): Promise<void>;
  createEvent(candidate: EventCandidate): Promise<string>;
  /** Create the pending event when `next` archives an item. */
  addEventOnNext: boolean;
}

export interface DigestControl {
  label: string;
  itemIndex: number;
  action: ActionKind;
}

/** One transport message: HTML text plus the controls of its own items. */
export interface DigestBlock {
  text: string;
  controls: DigestControl[][];
  itemIndexes: number[];
}

export interface BuildDigestResult {
  sessionId: string;
  itemCount: number;
  /** Empty when the build was superseded by a newer one. */
  blocks: DigestBlock[];
}

export interface ApplyActionResult {
  outcome: ActionOutcome;
  block: DigestBlock | null;
  notice: string;
}
