import { describe, expect, it } from 'vitest';
import {
  hasNearDeadline,
  hasUrgentKeyword,
  scoreUrgency,
  tierRank,
  type ScoreUrgencyOptions,
} from '../../../src/domains/urgency/service/scorer.js';
import type { UrgencyClassifier, UrgencyContext } from '../../../src/domains/urgency/types.js';
import {
  REFERENCE_DATE,
  fixedExtractor,
  makeMessage,
  makeSummary,
  phraseExtractor,
  utcExtractor,
} from '../../helpers/fixtures.js';

const options: ScoreUrgencyOptions = {
  keywords: ['urgent', 'asap', 'action required'],
  threshold: 0.66,
  deadlineHorizonHours: 72,
  threadActivityMin: 3,
};

function context(overrides: Partial<UrgencyContext> = {}): UrgencyContext {
  return {
    isSenderImportant: false,
    threadActivity: 1,
    now: REFERENCE_DATE,
    extractor: fixedExtractor([]),
    ...overrides,
  };
}

const inOneDay = new Date('2026-01-27T09:00:00Z');
const inFiveDays = new Date('2026-01-31T09:00:00Z');

describe('hasUrgentKeyword', () => {
  it('matches whole words case-insensitively', () => {
    expect(hasUrgentKeyword('Please reply ASAP.', options.keywords)).toBe(true);
    expect(hasUrgentKeyword('Not urgently needed', options.keywords)).toBe(false);
  });

  it('lets multi-word keywords span any whitespace', () => {
    expect(hasUrgentKeyword('Action\nrequired by finance', options.keywords)).toBe(true);
  });

  it('never matches an empty keyword list', () => {
    expect(hasUrgentKeyword('urgent', [])).toBe(false);
    expect(hasUrgentKeyword('urgent', ['  '])).toBe(false);
  });
});

describe('hasNearDeadline', () => {
  it('needs a deadline cue right before the date', () => {
    const extractor = phraseExtractor('Tuesday', inOneDay);

    expect(hasNearDeadline('Report due by Tuesday', context({ extractor }), 72)).toBe(true);
    expect(hasNearDeadline('Deadline: Tuesday', context({ extractor }), 72)).toBe(true);
    expect(hasNearDeadline('Lunch on Tuesday', context({ extractor }), 72)).toBe(false);
  });

  it('ignores deadlines past the horizon or already gone', () => {
    const late = phraseExtractor('Saturday', inFiveDays);
    const past = phraseExtractor('Sunday', new Date('2026-01-25T09:00:00Z'));

    expect(hasNearDeadline('Due by Saturday', context({ extractor: late }), 72)).toBe(false);
    expect(hasNearDeadline('Due by Sunday', context({ extractor: past }), 72)).toBe(false);
  });

  it('resolves natural language dates', () => {
    const ctx = context({ extractor: utcExtractor });
    expect(hasNearDeadline('The report is due by tomorrow 5pm.', ctx, 72)).toBe(true);
  });
});

describe('scoreUrgency', () => {
  it('marks a keyword hit as urgent', () => {
    const message = makeMessage({ subject: 'URGENT: server down' });

    expect(scoreUrgency(message, null, context(), options)).toEqual({
      score: 0.7,
      tier: 'urgent',
      reasons: ['keyword'],
    });
  });

  it('reads keywords from the summary too', () => {
    const message = makeMessage({ subject: 'Status', bodyText: 'All fine.' });
    const result = scoreUrgency(message, makeSummary('Needs a reply asap.'), context(), options);

    expect(result.reasons).toEqual(['keyword']);
  });

  it('stays normal below the threshold', () => {
    const message = makeMessage({ subject: 'Re: plans', bodyText: 'Sounds good.' });

    expect(scoreUrgency(message, null, context({ threadActivity: 3 }), options)).toEqual({
      score: 0.3,
      tier: 'normal',
      reasons: ['thread_activity'],
    });
  });

  it('always treats an important sender as important', () => {
    const message = makeMessage({ subject: 'Hello', bodyText: 'Nothing pressing.' });

    expect(scoreUrgency(message, null, context({ isSenderImportant: true }), options)).toEqual({
      score: 0.3,
      tier: 'important',
      reasons: ['important_sender'],
    });
  });

  it('clamps combined signals and lists reasons in rule order', () => {
    const message = makeMessage({ subject: 'Urgent', bodyText: 'Invoice due by Tuesday.' });
    const ctx = context({
      isSenderImportant: true,
      threadActivity: 5,
      extractor: phraseExtractor('Tuesday', inOneDay),
    });

    expect(scoreUrgency(message, null, ctx, options)).toEqual({
      score: 1,
      tier: 'important',
      reasons: ['keyword', 'deadline', 'important_sender', 'thread_activity'],
    });
  });

  it('applies custom weights', () => {
    const message = makeMessage({ subject: 'Re: plans', bodyText: 'Sounds good.' });
    const result = scoreUrgency(message, null, context({ threadActivity: 4 }), {
      ...options,
      weights: { thread_activity: 0.8 },
    });

    expect(result).toEqual({ score: 0.8, tier: 'urgent', reasons: ['thread_activity'] });
  });

  it('is deterministic for identical inputs', () => {
    const message = makeMessage({ subject: 'asap', bodyText: 'Reply due by Tuesday.' });
    const ctx = context({ extractor: phraseExtractor('Tuesday', inOneDay) });

    expect(scoreUrgency(message, null, ctx, options)).toEqual(scoreUrgency(message, null, ctx, options));
  });

  describe('with a classifier', () => {
    const message = makeMessage({ subject: 'Hello', bodyText: 'Nothing pressing.' });

    function classifier(predict: () => number, ready = true): UrgencyClassifier {
      return { ready, predict };
    }

    it('uses a ready classifier score', () => {
      const result = scoreUrgency(message, null, context(), { ...options, classifier: classifier(() => 0.9) });
      expect(result).toEqual({ score: 0.9, tier: 'urgent', reasons: ['classifier'] });
    });

    it('keeps the important-sender override', () => {
      const result = scoreUrgency(message, null, context({ isSenderImportant: true }), {
        ...options,
        classifier: classifier(() => 0.1),
      });
      expect(result.tier).toBe('important');
    });

    it('falls back to rules when the classifier is not ready, throws, or is out of range', () => {
      const expected = { score: 0, tier: 'normal', reasons: [] };
      const notReady = classifier(() => 0.9, false);
      const throwing = classifier(() => {
        throw new Error('model missing');
      });
      const outOfRange = classifier(() => 1.5);

      for (const candidate of [notReady, throwing, outOfRange]) {
        expect(scoreUrgency(message, null, context(), { ...options, classifier: candidate })).toEqual(expected);
      }
    });
  });
});

describe('tierRank', () => {
  it('orders tiers', () => {
    expect(tierRank('important')).toBeGreaterThan(tierRank('urgent'));
    expect(tierRank('urgent')).toBeGreaterThan(tierRank('normal'));
  });
});
