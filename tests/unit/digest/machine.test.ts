import { beforeEach, describe, expect, it } from 'vitest';
import { DigestSessionMachine, idempotencyKey } from '../../../src/domains/digest/service/machine.js';
import type { Cursor, DigestItem } from '../../../src/domains/digest/types.js';
import { REFERENCE_DATE } from '../../helpers/fixtures.js';
import { RecordingEffects, makeCandidate, makeItem } from '../../helpers/digest.js';

const TTL_MS = 30 * 60 * 1000;

function create(items: DigestItem[], now = REFERENCE_DATE): DigestSessionMachine {
  return DigestSessionMachine.create({ sessionId: 'dg_test', conversationId: 'chat-1', items, now, ttlMs: TTL_MS });
}

function cursorValue(cursor: Cursor): number {
  return cursor === 'exhausted' ? Number.POSITIVE_INFINITY : cursor;
}

describe('DigestSessionMachine', () => {
  let effects: RecordingEffects;

  beforeEach(() => {
    effects = new RecordingEffects();
  });

  describe('create', () => {
    it('starts at the first item and marks it shown', () => {
      const machine = create([makeItem(0), makeItem(1)]);

      expect(machine.status).toBe('active');
      expect(machine.session.cursor).toBe(0);
      expect(machine.currentItem()?.state).toBe('shown');
      expect(machine.session.items[1].state).toBe('pending');
      expect(machine.session.expiresAt).toEqual(new Date(REFERENCE_DATE.getTime() + TTL_MS));
    });

    it('is exhausted immediately with no items', async () => {
      const machine = create([]);

      expect(machine.status).toBe('exhausted');
      expect(machine.session.cursor).toBe('exhausted');
      expect(machine.currentItem()).toBeNull();
      await expect(machine.apply(0, 'next', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'exhausted' });
    });
  });

  describe('next', () => {
    it('archives every underlying message and advances', async () => {
      const machine = create([makeItem(0, { messageRefs: ['a1', 'a2'] }), makeItem(1)]);

      await expect(machine.apply(0, 'next', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'applied' });

      expect(effects.calls).toEqual(['archive:a1', 'archive:a2']);
      expect(machine.session.items[0].state).toBe('acted');
      expect(machine.session.cursor).toBe(1);
      expect(machine.currentItem()?.state).toBe('shown');
    });

    it('exhausts the session after the last item', async () => {
      const machine = create([makeItem(0)]);

      await machine.apply(0, 'next', effects, REFERENCE_DATE);

      expect(machine.status).toBe('exhausted');
      await expect(machine.apply(0, 'next', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'exhausted' });
      expect(effects.calls).toEqual(['archive:m0']);
    });

    it('creates the pending event first when configured', async () => {
      effects.addEventOnNext = true;
      const machine = create([makeItem(0, { eventCandidate: makeCandidate() }), makeItem(1)]);

      await machine.apply(0, 'next', effects, REFERENCE_DATE);

      expect(effects.calls).toEqual(['event:Planning', 'archive:m0']);
      expect(machine.session.items[0].createdEventId).toBe('evt-Planning');
      expect(machine.session.items[0].eventCandidate).toBeUndefined();
    });

    it('leaves the event alone by default', async () => {
      const machine = create([makeItem(0, { eventCandidate: makeCandidate() }), makeItem(1)]);

      await machine.apply(0, 'next', effects, REFERENCE_DATE);

      expect(effects.calls).toEqual(['archive:m0']);
      expect(machine.session.items[0].createdEventId).toBeUndefined();
    });
  });

  describe('leave_unread', () => {
    it('advances without touching the mailbox or calendar', async () => {
      const machine = create([makeItem(0, { eventCandidate: makeCandidate() }), makeItem(1)]);
      effects.addEventOnNext = true;

      await expect(machine.apply(0, 'leave_unread', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'applied' });

      expect(effects.calls).toEqual([]);
      expect(machine.session.items[0].state).toBe('shown');
      expect(machine.session.cursor).toBe(1);
    });

    it('exhausts on the last item', async () => {
      const machine = create([makeItem(0)]);

      await machine.apply(0, 'leave_unread', effects, REFERENCE_DATE);

      expect(machine.status).toBe('exhausted');
    });
  });

  describe('forward', () => {
    it('forwards then archives each message and advances', async () => {
      const machine = create([makeItem(0, { messageRefs: ['a1', 'a2'] }), makeItem(1)]);

      await machine.apply(0, 'forward', effects, REFERENCE_DATE);

      expect(effects.calls).toEqual(['forward:a1', 'archive:a1', 'forward:a2', 'archive:a2']);
      expect(machine.session.items[0].state).toBe('acted');
      expect(machine.session.cursor).toBe(1);
    });
  });

  describe('mark_important', () => {
    it('flags the sender without advancing and re-tiers later items from the same sender', async () => {
      const machine = create([
        makeItem(0, { groupKey: 'alice@example.com', sender: { name: 'Alice', address: 'alice@example.com' } }),
        makeItem(1),
        makeItem(2, { groupKey: 'alice@example.com' }),
      ]);

      await expect(machine.apply(0, 'mark_important', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'applied' });

      expect(effects.calls).toEqual(['important:alice@example.com']);
      expect(machine.session.cursor).toBe(0);
      expect(machine.session.items.map((item) => item.urgency.tier)).toEqual(['important', 'normal', 'important']);
    });

    it('is a duplicate the second time', async () => {
      const machine = create([makeItem(0), makeItem(1)]);

      await machine.apply(0, 'mark_important', effects, REFERENCE_DATE);

      await expect(machine.apply(0, 'mark_important', effects, REFERENCE_DATE)).resolves.toEqual({
        type: 'noop',
        reason: 'duplicate',
      });
      expect(effects.calls).toHaveLength(1);
    });
  });

  describe('event actions', () => {
    it('adds the event and clears the candidate without advancing', async () => {
      const machine = create([makeItem(0, { eventCandidate: makeCandidate() }), makeItem(1)]);

      await expect(machine.apply(0, 'add_event', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'applied' });

      expect(machine.session.cursor).toBe(0);
      expect(machine.session.items[0].createdEventId).toBe('evt-Planning');
      await expect(machine.apply(0, 'ignore_event', effects, REFERENCE_DATE)).resolves.toEqual({
        type: 'noop',
        reason: 'no_event_candidate',
      });
    });

    it('ignores the event without calling the calendar', async () => {
      const machine = create([makeItem(0, { eventCandidate: makeCandidate() })]);

      await machine.apply(0, 'ignore_event', effects, REFERENCE_DATE);

      expect(effects.calls).toEqual([]);
      expect(machine.session.items[0].eventCandidate).toBeUndefined();
      await expect(machine.apply(0, 'add_event', effects, REFERENCE_DATE)).resolves.toEqual({
        type: 'noop',
        reason: 'no_event_candidate',
      });
    });

    it('rejects event actions on items without a candidate', async () => {
      const machine = create([makeItem(0)]);

      await expect(machine.apply(0, 'add_event', effects, REFERENCE_DATE)).resolves.toEqual({
        type: 'noop',
        reason: 'no_event_candidate',
      });
    });
  });

  describe('guards', () => {
    it('rejects actions on items other than the current one', async () => {
      const machine = create([makeItem(0), makeItem(1)]);

      await expect(machine.apply(1, 'next', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'noop', reason: 'not_current' });
      await expect(machine.apply(7, 'next', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'noop', reason: 'not_current' });
      expect(effects.calls).toEqual([]);
    });

    it('reports already_acted for a different action on a handled item', async () => {
      const machine = create([makeItem(0), makeItem(1)]);

      await machine.apply(0, 'next', effects, REFERENCE_DATE);

      await expect(machine.apply(0, 'forward', effects, REFERENCE_DATE)).resolves.toEqual({
        type: 'noop',
        reason: 'already_acted',
      });
      await expect(machine.apply(0, 'next', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'noop', reason: 'duplicate' });
    });

    it('refuses going back to an item left unread', async () => {
      const machine = create([makeItem(0), makeItem(1)]);

      await machine.apply(0, 'leave_unread', effects, REFERENCE_DATE);

      await expect(machine.apply(0, 'forward', effects, REFERENCE_DATE)).resolves.toEqual({
        type: 'noop',
        reason: 'not_current',
      });
    });

    it('never moves the cursor backwards', async () => {
      const machine = create([makeItem(0), makeItem(1), makeItem(2), makeItem(3)]);
      const presses: Array<[number, 'next' | 'leave_unread' | 'mark_important' | 'forward']> = [
        [0, 'mark_important'],
        [0, 'leave_unread'],
        [0, 'next'],
        [1, 'forward'],
        [3, 'next'],
        [2, 'next'],
        [1, 'next'],
        [3, 'leave_unread'],
      ];

      let previous = cursorValue(machine.session.cursor);
      for (const [index, action] of presses) {
        await machine.apply(index, action, effects, REFERENCE_DATE);
        const current = cursorValue(machine.session.cursor);
        expect(current).toBeGreaterThanOrEqual(previous);
        previous = current;
      }
      expect(machine.status).toBe('exhausted');
    });
  });

  describe('failures', () => {
    it('leaves the session unchanged and allows a retry', async () => {
      const machine = create([makeItem(0, { messageRefs: ['a1', 'a2'] }), makeItem(1)]);
      effects.failOn = 'archive:a2';

      const outcome = await machine.apply(0, 'next', effects, REFERENCE_DATE);

      expect(outcome).toEqual({ type: 'failed', error: 'archive:a2 failed' });
      expect(machine.session.cursor).toBe(0);
      expect(machine.session.items[0].state).toBe('shown');

      effects.failOn = null;
      await expect(machine.apply(0, 'next', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'applied' });
      expect(machine.session.cursor).toBe(1);
    });

    it('does not archive a message twice when retrying next', async () => {
      const machine = create([makeItem(0, { messageRefs: ['a1', 'a2'] }), makeItem(1)]);
      effects.failOn = 'archive:a2';

      await machine.apply(0, 'next', effects, REFERENCE_DATE);
      effects.failOn = null;
      await machine.apply(0, 'next', effects, REFERENCE_DATE);

      expect(effects.calls).toEqual(['archive:a1', 'archive:a2']);
    });

    it('does not forward a message twice when retrying forward', async () => {
      const machine = create([makeItem(0, { messageRefs: ['a1', 'a2'] }), makeItem(1)]);
      effects.failOn = 'forward:a2';

      await expect(machine.apply(0, 'forward', effects, REFERENCE_DATE)).resolves.toEqual({
        type: 'failed',
        error: 'forward:a2 failed',
      });
      expect(machine.session.cursor).toBe(0);

      effects.failOn = null;
      await expect(machine.apply(0, 'forward', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'applied' });
      expect(effects.calls).toEqual(['forward:a1', 'archive:a1', 'forward:a2', 'archive:a2']);
      expect(machine.session.cursor).toBe(1);
    });

    it('creates the event once when archiving fails after creating it', async () => {
      effects.addEventOnNext = true;
      effects.failOn = 'archive:m0';
      const machine = create([makeItem(0, { eventCandidate: makeCandidate() })]);

      const outcome = await machine.apply(0, 'next', effects, REFERENCE_DATE);

      expect(outcome).toEqual({ type: 'failed', error: 'archive:m0 failed' });
      expect(machine.session.items[0].state).toBe('shown');
      expect(machine.session.items[0].createdEventId).toBe('evt-Planning');
      expect(machine.session.items[0].eventCandidate).toBeUndefined();

      effects.failOn = null;
      await expect(machine.apply(0, 'next', effects, REFERENCE_DATE)).resolves.toEqual({ type: 'applied' });
      expect(effects.calls).toEqual(['event:Planning', 'archive:m0']);
      expect(machine.status).toBe('exhausted');
    });

    it('keeps the tier when marking important fails', async () => {
      effects.failOn = 'important:sender0@example.com';
      const machine = create([makeItem(0)]);

      const outcome = await machine.apply(0, 'mark_important', effects, REFERENCE_DATE);

      expect(outcome.type).toBe('failed');
      expect(machine.session.items[0].urgency.tier).toBe('normal');
    });
  });

  describe('lifecycle', () => {
    it('closes on the first action after the TTL', async () => {
      const machine = create([makeItem(0)]);
      const late = new Date(REFERENCE_DATE.getTime() + TTL_MS);

      await expect(machine.apply(0, 'next', effects, late)).resolves.toEqual({ type: 'closed', reason: 'expired' });
      expect(machine.status).toBe('closed');
      expect(effects.calls).toEqual([]);
    });

    it('refreshes the TTL on every applied action', async () => {
      const machine = create([makeItem(0), makeItem(1)]);
      const later = new Date(REFERENCE_DATE.getTime() + TTL_MS - 1000);

      await machine.apply(0, 'leave_unread', effects, later);

      expect(machine.session.expiresAt).toEqual(new Date(later.getTime() + TTL_MS));
      expect(machine.isExpired(new Date(REFERENCE_DATE.getTime() + TTL_MS))).toBe(false);
    });

    it('reports the close reason once closed', async () => {
      const machine = create([makeItem(0)]);
      machine.close('superseded');
      machine.close('expired');

      await expect(machine.apply(0, 'next', effects, REFERENCE_DATE)).resolves.toEqual({
        type: 'closed',
        reason: 'superseded',
      });
      expect(machine.currentItem()).toBeNull();
    });
  });

  it('builds idempotency keys from session, item and action', () => {
    expect(idempotencyKey('dg_abc', 3, 'forward')).toBe('dg_abc:3:forward');
  });
});
