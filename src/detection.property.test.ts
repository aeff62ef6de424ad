import * as fc from 'fast-check';
import { classifyResponse } from './detection';
import type { DetectionRule, ProbeResponse } from './types';

const polarityArb = fc.constantFrom<'found-on-match' | 'not-found-on-match'>('found-on-match', 'not-found-on-match');

const leafRuleArb: fc.Arbitrary<DetectionRule> = fc.oneof(
  fc.record({
    kind: fc.constant<'status-match'>('status-match'),
    status: fc.integer({ min: 100, max: 599 }),
    polarity: polarityArb,
  }),
  fc.record({
    kind: fc.constant<'body-contains'>('body-contains'),
    text: fc.string({ minLength: 1, maxLength: 6 }),
    polarity: polarityArb,
  }),
  fc.record({
    kind: fc.constant<'absence-of-marker'>('absence-of-marker'),
    marker: fc.string({ minLength: 1, maxLength: 6 }),
  })
);

const ruleArb: fc.Arbitrary<DetectionRule> = fc.oneof(
  leafRuleArb,
  fc.array(leafRuleArb, { minLength: 1, maxLength: 3 }).map((rules): DetectionRule => ({ kind: 'all-of', rules }))
);

const responseArb: fc.Arbitrary<ProbeResponse> = fc.record({
  status: fc.integer({ min: 100, max: 599 }),
  body: fc.string({ maxLength: 40 }),
  error: fc.constantFrom(null, 'timeout' as const, 'dns' as const),
});

describe('detection engine properties', () => {
  test('same response and rule always give the same classification', () => {
    fc.assert(
      fc.property(responseArb, ruleArb, (response, rule) => {
        const first = classifyResponse(response, rule);
        const second = classifyResponse({ ...response }, rule);
        expect(second).toEqual(first);
      })
    );
  });

  test('any transport error classifies as failed with its category', () => {
    fc.assert(
      fc.property(responseArb, ruleArb, (response, rule) => {
        const result = classifyResponse(response, rule);
        if (response.error) {
          expect(result).toEqual({ outcome: 'failed', detail: response.error, confidence: 0 });
        } else {
          expect(result.outcome).not.toBe('failed');
          expect(result.confidence).toBeGreaterThanOrEqual(50);
          expect(result.confidence).toBeLessThanOrEqual(100);
        }
      })
    );
  });

  test('absence-of-marker is the inverse of body-contains on the same text', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1, maxLength: 5 }), fc.string({ maxLength: 30 }), (marker, body) => {
        const response: ProbeResponse = { status: 200, body, error: null };
        const absence = classifyResponse(response, { kind: 'absence-of-marker', marker });
        const contains = classifyResponse(response, { kind: 'body-contains', text: marker, polarity: 'found-on-match' });
        expect(absence.outcome).toBe(contains.outcome === 'found' ? 'not-found' : 'found');
      })
    );
  });
});
