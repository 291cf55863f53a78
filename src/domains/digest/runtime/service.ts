/**
 * @fileoverview Digest service: builds sessions and applies user actions.
 *
 * Wires summarization, urgency scoring and event detection to the mailbox
 * and calendar collaborators. Nothing here throws to the transport for an
 * action; collaborator failures come back as `failed` outcomes.
 */

import type { DateExtractor } from '../../../services/date/extractor.js';
import { AppError, errorMessage, safeExecute } from '../../../utils/errors.js';
import {
  createLogger,
  createRunId,
  createSessionId,
  withLogContext,
  type AppLogger,
} from '../../../utils/observability/index.js';
import { detectEvent } from '../../calendar-tagger/service/detect.js';
import type { CalendarCollaborator, ExistingEvent } from '../../calendar-tagger/types.js';
import type { MailboxCollaborator, Message } from '../../mailbox/types.js';
import { heuristicSummary } from '../../summarization/providers/heuristic.js';
import { finalizeSummary } from '../../summarization/service/postprocess.js';
import { toSummarySource } from '../../summarization/service/source.js';
import type { Summarizer } from '../../summarization/types.js';
import { NORMAL_URGENCY, scoreUrgency, type ScoreUrgencyOptions } from '../../urgency/service/scorer.js';
import { buildItems } from '../service/builder.js';
import { DigestSessionMachine } from '../service/machine.js';
import type { DigestSessionRegistry } from '../service/registry.js';
import {
  EMPTY_DIGEST_TEXT,
  EXHAUSTED_TEXT,
  STALE_TEXT,
  renderBlocks,
  textBlock,
  type RenderOptions,
} from '../service/render.js';
import type {
  ActionEffects,
  ActionKind,
  ActionOutcome,
  ApplyActionResult,
  BuildDigestResult,
  DigestBlock,
  MessageAnalysis,
} from '../types.js';

export interface DigestServiceSettings {
  timezone: string;
  itemMaxChars: number;
  combinedMaxChars: number;
  heuristicSentences: number;
  groupingThreshold: number;
  sessionTtlMs: number;
  maxMessageChars: number;
  maxEmails: number;
  /** Trailing window in hours; 0 keeps every message. */
  windowHours: number;
  addEventOnNext: boolean;
  forwardEmail?: string;
  threadWindowHours: number;
  calendarLookaheadDays: number;
  defaultEventMinutes: number;
}

export interface DigestServiceDeps {
  mailbox: MailboxCollaborator;
  /** Null disables event detection and creation. */
  calendar: CalendarCollaborator | null;
  summarizer: Summarizer;
  extractor: DateExtractor;
  registry: DigestSessionRegistry;
  urgency: ScoreUrgencyOptions;
  settings: DigestServiceSettings;
  now?: () => Date;
  logger?: AppLogger;
}

const HOUR_MS = 60 * 60 * 1000;

const APPLIED_NOTICES: Record<ActionKind, string> = {
  mark_important: '⭐ Sender marked important',
  forward: '📤 Forwarded and archived',
  leave_unread: '🚫 Left unread',
  next: '➡️ Archived',
  add_event: '📅 Added to calendar',
  ignore_event: '🙈 Event ignored',
};

const NOOP_NOTICES = {
  already_acted: 'That email was already handled.',
  not_current: 'That email is not the current one.',
  no_event_candidate: 'No event to add for this email.',
  duplicate: 'Already done.',
} as const;

function noticeFor(outcome: ActionOutcome, action: ActionKind): string {
  switch (outcome.type) {
    case 'applied':
      return APPLIED_NOTICES[action];
    case 'noop':
      return NOOP_NOTICES[outcome.reason];
    case 'exhausted':
      return EXHAUSTED_TEXT;
    case 'closed':
      return STALE_TEXT;
    case 'failed':
      return '⚠️ That did not work, please try again.';
  }
}

export class DigestService {
  private readonly log: AppLogger;
  private readonly now: () => Date;

  constructor(private readonly deps: DigestServiceDeps) {
    this.log = deps.logger ?? createLogger({ domain: 'digest' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Build a new session for the conversation, superseding any live one.
   * Messages are fetched from the mailbox when not supplied.
   */
  async buildDigest(conversationId: string, messages?: Message[]): Promise<BuildDigestResult> {
    const { registry, settings } = this.deps;
    const token = registry.beginBuild(conversationId);
    const sessionId = createSessionId();

    const context = { runId: createRunId('digest'), chatId: conversationId, sessionId };

    return withLogContext(context, async (): Promise<BuildDigestResult> => {
      const startTime = Date.now();
      const now = this.now();
      const selected = this.selectMessages(messages ?? await this.deps.mailbox.fetchUnread(), now);
      const existingEvents = await this.loadExistingEvents(now);

      const analyses = await Promise.all(
        selected.map((message) => this.analyzeMessage(message, selected, existingEvents, now))
      );
      const items = await buildItems(analyses, {
        summarizer: this.deps.summarizer,
        groupingThreshold: settings.groupingThreshold,
        combinedMaxChars: settings.combinedMaxChars,
        logger: this.log,
      });

      const machine = DigestSessionMachine.create({
        sessionId,
        conversationId,
        items,
        now,
        ttlMs: settings.sessionTtlMs,
      });
      if (!registry.commit(token, machine)) {
        return { sessionId, itemCount: 0, blocks: [] };
      }

      this.log.info('digest_built', {
        messageCount: selected.length,
        itemCount: items.length,
        durationMs: Date.now() - startTime,
      });

      const blocks = items.length === 0
        ? [textBlock(EMPTY_DIGEST_TEXT)]
        : renderBlocks(items, items.length, this.renderOptions());
      return { sessionId, itemCount: items.length, blocks };
    });
  }

  /**
   * Build only when there are messages to show. Returns null otherwise and
   * leaves the conversation's live session in place.
   */
  async buildDigestIfUnread(conversationId: string): Promise<BuildDigestResult | null> {
    const messages = this.selectMessages(await this.deps.mailbox.fetchUnread(), this.now());
    if (messages.length === 0) return null;
    return this.buildDigest(conversationId, messages);
  }

  /**
   * Apply one button press. Runs serially per session.
   */
  async applyAction(
    conversationId: string,
    sessionId: string,
    itemIndex: number,
    action: ActionKind
  ): Promise<ApplyActionResult> {
    const { registry } = this.deps;

    return registry.runExclusive(sessionId, () =>
      withLogContext({ chatId: conversationId, sessionId }, async (): Promise<ApplyActionResult> => {
        const machine = registry.get(conversationId);
        if (!machine || machine.sessionId !== sessionId) {
          const reason = registry.closedReason(sessionId) ?? 'expired';
          return { outcome: { type: 'closed', reason }, block: null, notice: STALE_TEXT };
        }

        const outcome = await machine.apply(itemIndex, action, this.effects(), this.now());
        registry.release(conversationId, machine);

        if (outcome.type === 'failed') {
          this.log.warn('digest_action_failed', { action, itemIndex, error: outcome.error });
        } else {
          this.log.info('digest_action', { action, itemIndex, status: outcome.type });
        }

        return {
          outcome,
          block: outcome.type === 'applied' ? this.currentBlock(machine) : null,
          notice: noticeFor(outcome, action),
        };
      })
    );
  }

  private currentBlock(machine: DigestSessionMachine): DigestBlock {
    const item = machine.currentItem();
    if (!item) return textBlock(EXHAUSTED_TEXT);
    const [block] = renderBlocks([item], machine.session.items.length, this.renderOptions());
    return block;
  }

  private renderOptions(): RenderOptions {
    return { timezone: this.deps.settings.timezone, maxChars: this.deps.settings.maxMessageChars };
  }

  private selectMessages(messages: readonly Message[], now: Date): Message[] {
    const { windowHours, maxEmails } = this.deps.settings;
    const cutoff = windowHours > 0 ? now.getTime() - windowHours * HOUR_MS : -Infinity;
    return messages
      .filter((message) => message.receivedAt.getTime() >= cutoff)
      .sort((a, b) => b.receivedAt.getTime() - a.receivedAt.getTime())
      .slice(0, maxEmails);
  }

  private async loadExistingEvents(now: Date): Promise<ExistingEvent[]> {
    const { calendar, settings } = this.deps;
    if (!calendar) return [];
    const result = await safeExecute(
      () => calendar.listUpcomingEvents({
        start: now,
        end: new Date(now.getTime() + settings.calendarLookaheadDays * 24 * HOUR_MS),
      }),
      'calendar_lookup'
    );
    return result.success ? result.data : [];
  }

  private threadActivity(message: Message, all: readonly Message[], now: Date): number {
    const since = now.getTime() - this.deps.settings.threadWindowHours * HOUR_MS;
    return all.filter((other) => {
      const at = other.receivedAt.getTime();
      return other.threadId === message.threadId && at >= since && at <= now.getTime();
    }).length;
  }

  private async analyzeMessage(
    message: Message,
    all: readonly Message[],
    existingEvents: readonly ExistingEvent[],
    now: Date
  ): Promise<MessageAnalysis> {
    const { settings } = this.deps;
    try {
      const summary = await this.deps.summarizer.summarize(toSummarySource(message), settings.itemMaxChars);
      const isSenderImportant = await this.deps.mailbox.isSenderImportant(message.sender.address);
      const urgency = scoreUrgency(
        message,
        summary,
        {
          isSenderImportant,
          threadActivity: this.threadActivity(message, all, now),
          now,
          extractor: this.deps.extractor,
        },
        { ...this.deps.urgency, logger: this.log }
      );
      const eventCandidate = this.deps.calendar
        ? detectEvent(message, summary, existingEvents, {
          extractor: this.deps.extractor,
          referenceDate: now,
          defaultDurationMinutes: settings.defaultEventMinutes,
        })
        : null;
      return { message, summary, urgency, eventCandidate };
    } catch (error) {
      this.log.warn('message_analysis_failed', { messageId: message.id, error: errorMessage(error) });
      const fallback = heuristicSummary(toSummarySource(message), settings.heuristicSentences);
      return {
        message,
        summary: finalizeSummary(fallback, 'heuristic', settings.itemMaxChars),
        urgency: NORMAL_URGENCY,
        eventCandidate: null,
      };
    }
  }

  private effects(): ActionEffects {
    const { mailbox, calendar, settings } = this.deps;
    return {
      setSenderImportant: (address) => mailbox.setSenderImportant(address, true),
      forward: async (messageId) => {
        if (!settings.forwardEmail) {
          throw new AppError('No forward address configured', 'FORWARD_NOT_CONFIGURED', false);
        }
        await mailbox.forward(messageId, settings.forwardEmail);
      },
      archive: (messageId) => mailbox.markReadAndArchive(messageId),
      createEvent: async (candidate) => {
        if (!calendar) {
          throw new AppError('Calendar is disabled', 'CALENDAR_DISABLED', false);
        }
        return calendar.createEvent(candidate);
      },
      addEventOnNext: settings.addEventOnNext,
    };
  }
}
