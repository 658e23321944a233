/**
 * Unit tests for the seedable random source
 */

import { describe, it, expect } from 'vitest';
import { createRandomSource, scenarioRandomSource } from '../../../src/q2s-core/random-source.js';

function draw(count: number, next: () => number): number[] {
  return Array.from({ length: count }, () => next());
}

describe('random-source', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRandomSource(42);
    const b = createRandomSource('42');

    expect(draw(5, () => a.next())).toEqual(draw(5, () => b.next()));
  });

  it('yields values in [0, 1)', () => {
    const source = createRandomSource('range');
    for (const value of draw(200, () => source.next())) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('derives distinct sequences per scenario', () => {
    const first = scenarioRandomSource(42, 1);
    const second = scenarioRandomSource(42, 2);

    expect(draw(5, () => first.next())).not.toEqual(draw(5, () => second.next()));
  });

  it('derives the same sequence for the same seed and scenario', () => {
    const a = scenarioRandomSource(7, 3);
    const b = scenarioRandomSource(7, 3);

    expect(draw(5, () => a.next())).toEqual(draw(5, () => b.next()));
  });

  describe('choice', () => {
    it('returns an element of the list', () => {
      const source = createRandomSource(1);
      for (let i = 0; i < 20; i++) {
        expect(['a', 'b', 'c']).toContain(source.choice(['a', 'b', 'c']));
      }
    });

    it('returns the only element of a singleton', () => {
      expect(createRandomSource(1).choice(['only'])).toBe('only');
    });

    it('throws on an empty list', () => {
      expect(() => createRandomSource(1).choice([])).toThrow(RangeError);
    });
  });
});
