import { describe, it, expect } from 'vitest';
import { MaxScoreNormalizer } from './normalize';

describe('MaxScoreNormalizer', () => {
  it('maps the best score to the ceiling', () => {
    expect(new MaxScoreNormalizer(1000).normalize([48, 24, 12])).toEqual([1000, 500, 250]);
  });

  it('clamps negative scores to zero', () => {
    expect(new MaxScoreNormalizer(100).normalize([10, -5])).toEqual([100, 0]);
  });

  it('gives zero to every score when none is positive', () => {
    expect(new MaxScoreNormalizer().normalize([0, 0])).toEqual([0, 0]);
    expect(new MaxScoreNormalizer().normalize([])).toEqual([]);
  });
});
