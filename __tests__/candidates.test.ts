import {
  describe,
  expect,
  it
} from 'vitest';

import {
  addCandidate,
  ALL_CANDIDATES,
  candidateBit,
  candidateCount,
  candidatesMask,
  candidateValues,
  formatCandidates,
  hasCandidate,
  NO_CANDIDATES,
  removeCandidates
} from '../src/candidates.ts';

describe('candidateBit', () => {
  it('maps 1 to the lowest bit and 9 to the ninth', () => {
    expect(candidateBit(1)).toBe(1);
    expect(candidateBit(9)).toBe(256);
  });

  it('throws for values outside 1-9', () => {
    expect(() => candidateBit(0)).toThrow('Invalid candidate: 0');
    expect(() => candidateBit(10)).toThrow('Invalid candidate: 10');
  });
});

describe('candidatesMask', () => {
  it('combines values into one mask', () => {
    expect(candidatesMask([1, 3, 9])).toBe(261);
  });

  it('ignores duplicates', () => {
    expect(candidatesMask([4, 4, 4])).toBe(candidateBit(4));
  });

  it('builds the full set from 1-9', () => {
    expect(candidatesMask([1, 2, 3, 4, 5, 6, 7, 8, 9])).toBe(ALL_CANDIDATES);
  });
});

describe('candidateValues', () => {
  it('lists values in ascending order', () => {
    expect(candidateValues(candidatesMask([9, 2, 5]))).toEqual([2, 5, 9]);
  });

  it('returns an empty list for no candidates', () => {
    expect(candidateValues(NO_CANDIDATES)).toEqual([]);
  });
});

describe('candidateCount', () => {
  it('counts the set bits', () => {
    expect(candidateCount(ALL_CANDIDATES)).toBe(9);
    expect(candidateCount(candidatesMask([2, 7]))).toBe(2);
    expect(candidateCount(NO_CANDIDATES)).toBe(0);
  });
});

describe('hasCandidate', () => {
  it('checks membership', () => {
    const mask = candidatesMask([1, 5]);
    expect(hasCandidate(mask, 5)).toBe(true);
    expect(hasCandidate(mask, 6)).toBe(false);
  });
});

describe('addCandidate and removeCandidates', () => {
  it('adds a single value', () => {
    expect(addCandidate(candidatesMask([1]), 3)).toBe(candidatesMask([1, 3]));
  });

  it('removes every value of the second mask', () => {
    expect(removeCandidates(ALL_CANDIDATES, candidatesMask([1, 2, 3]))).toBe(candidatesMask([4, 5, 6, 7, 8, 9]));
  });

  it('leaves values that are not present alone', () => {
    expect(removeCandidates(candidatesMask([2, 4]), candidatesMask([3]))).toBe(candidatesMask([2, 4]));
  });
});

describe('formatCandidates', () => {
  it('joins the digits', () => {
    expect(formatCandidates(candidatesMask([7, 1, 3]))).toBe('137');
  });
});
