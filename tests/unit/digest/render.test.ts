import { describe, expect, it } from 'vitest';
import {
  EXHAUSTED_TEXT,
  renderBlocks,
  renderEventLine,
  renderItem,
  textBlock,
} from '../../../src/domains/digest/service/render.js';
import { makeSummary } from '../../helpers/fixtures.js';
import { makeCandidate, makeItem } from '../../helpers/digest.js';

describe('renderItem', () => {
  it('renders header, sender, subject, summary and reading time', () => {
    const item = makeItem(0, {
      sender: { name: 'Alice & Co', address: 'alice@example.com' },
      subject: 'Q1 <draft>',
      summary: makeSummary('Numbers look good.'),
      urgency: { score: 0.7, tier: 'urgent', reasons: ['keyword'] },
      readingMinutes: 2.5,
    });

    expect(renderItem(item, 3, 'UTC')).toBe(
      [
        '<b>1/3</b> 🔴 Urgent',
        '<b>From:</b> Alice &amp; Co &lt;alice@example.com&gt;',
        '<b>Subject:</b> Q1 &lt;draft&gt;',
        'Numbers look good.',
        '⏱ ~2.5 min read',
      ].join('\n')
    );
  });

  it('marks fallback summaries, group size and short reads', () => {
    const item = makeItem(1, {
      groupSize: 3,
      subject: '',
      summary: makeSummary('Offline summary.', { provider: 'local', fallbackUsed: true }),
      readingMinutes: 0,
    });

    expect(renderItem(item, 2, 'UTC').split('\n')).toEqual([
      '<b>2/2</b> 🟢 Normal',
      '<b>From:</b> sender1@example.com (3 messages)',
      '<b>Subject:</b> (no subject)',
      '<i>[Local summary]</i> Offline summary.',
      '⏱ &lt;1 min read',
    ]);
  });

  it('labels remote and heuristic fallbacks the same way', () => {
    const secondary = makeItem(0, { summary: makeSummary('x', { provider: 'secondary' }) });
    const heuristic = makeItem(0, { summary: makeSummary('x', { provider: 'heuristic' }) });

    expect(renderItem(secondary, 1, 'UTC').split('\n')[3]).toBe('<i>[Fallback summary]</i> x');
    expect(renderItem(heuristic, 1, 'UTC').split('\n')[3]).toBe('<i>[Fallback summary]</i> x');
  });

  it('appends the event line when there is a candidate', () => {
    const item = makeItem(0, {
      urgency: { score: 0.3, tier: 'important', reasons: ['important_sender'] },
      eventCandidate: makeCandidate(),
    });

    const lines = renderItem(item, 1, 'UTC').split('\n');
    expect(lines[0]).toBe('<b>1/1</b> ⭐ Important');
    expect(lines[5]).toBe('📅 Thu 29 Jan 10:00');
  });
});

describe('renderEventLine', () => {
  it('shows time range, place, link and conflicts in the local zone', () => {
    const candidate = makeCandidate({
      end: new Date('2026-01-29T11:30:00Z'),
      location: 'Room 4B',
      meetingLink: 'https://zoom.us/j/123?a=1&b=2',
      conflictsWith: ['e1', 'e2'],
    });

    expect(renderEventLine(candidate, 'Europe/Berlin')).toBe(
      '📅 Thu 29 Jan 11:00–12:30 · 📍 Room 4B · 🔗 https://zoom.us/j/123?a=1&amp;b=2 · ⚠️ Conflicts with 2 events'
    );
  });

  it('uses the singular for one conflict', () => {
    expect(renderEventLine(makeCandidate({ conflictsWith: ['e1'] }), 'UTC')).toBe(
      '📅 Thu 29 Jan 10:00 · ⚠️ Conflicts with 1 event'
    );
  });
});

describe('renderBlocks', () => {
  const items = [makeItem(0), makeItem(1, { eventCandidate: makeCandidate() }), makeItem(2)];

  it('puts everything in one block when it fits, numbering the buttons', () => {
    const [block, extra] = renderBlocks(items, 3, { timezone: 'UTC', maxChars: 4096 });

    expect(extra).toBeUndefined();
    expect(block.itemIndexes).toEqual([0, 1, 2]);
    expect(block.text).toBe(items.map((item) => renderItem(item, 3, 'UTC')).join('\n\n'));
    expect(block.controls.map((row) => row.map((control) => control.label))).toEqual([
      ['1. ⭐ Mark Important', '1. 📤 Forward'],
      ['1. 🚫 Leave Unread', '1. ➡️ Next Email'],
      ['2. ⭐ Mark Important', '2. 📤 Forward'],
      ['2. 🚫 Leave Unread', '2. ➡️ Next Email'],
      ['2. 📅 Add to Calendar', '2. 🙈 Ignore Event'],
      ['3. ⭐ Mark Important', '3. 📤 Forward'],
      ['3. 🚫 Leave Unread', '3. ➡️ Next Email'],
    ]);
    expect(block.controls[4][0]).toEqual({ label: '2. 📅 Add to Calendar', itemIndex: 1, action: 'add_event' });
  });

  it('splits between items to respect the limit', () => {
    const first = renderItem(items[0], 3, 'UTC');
    const blocks = renderBlocks(items, 3, { timezone: 'UTC', maxChars: first.length + 1 });

    expect(blocks.map((block) => block.itemIndexes)).toEqual([[0], [1], [2]]);
    expect(blocks[0].controls[0][0].label).toBe('⭐ Mark Important');
  });

  it('shortens the summary of an item that is too long by itself', () => {
    const long = makeItem(0, { summary: makeSummary('word '.repeat(100).trim()) });
    const [block] = renderBlocks([long], 1, { timezone: 'UTC', maxChars: 120 });
    const lines = block.text.split('\n');

    expect(block.text.length).toBeLessThanOrEqual(120);
    expect(lines[3]).toBe('word word word word wor...');
    expect(lines[4]).toBe('⏱ ~1 min read');
  });

  it('never cuts through an escaped entity', () => {
    const long = makeItem(0, { summary: makeSummary('&'.repeat(2000)) });
    const [block] = renderBlocks([long], 1, { timezone: 'UTC', maxChars: 4096 });
    const lines = block.text.split('\n');

    expect(block.text.length).toBe(4092);
    expect(lines[2]).toBe('<b>Subject:</b> Subject 0');
    expect(lines[3]).toBe(`${'&amp;'.repeat(799)}...`);
  });

  it('caps long sender names before escaping', () => {
    const item = makeItem(0, { sender: { name: 'N'.repeat(150), address: 'sender0@example.com' } });

    expect(renderItem(item, 1, 'UTC').split('\n')[1]).toBe(
      `<b>From:</b> ${'N'.repeat(97)}... &lt;sender0@example.com&gt;`
    );
  });

  it('builds control-free text blocks', () => {
    expect(textBlock(EXHAUSTED_TEXT)).toEqual({ text: 'No more emails in this digest.', controls: [], itemIndexes: [] });
  });
});
