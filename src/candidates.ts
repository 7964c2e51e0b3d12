/* eslint-disable no-bitwise -- Candidate sets are stored as 9-bit masks. */

import type { CellValue } from './grid.ts';

import {
  MAX_CELL_VALUE,
  MIN_CELL_VALUE
} from './grid.ts';
import { ensureInRange } from './typeGuards.ts';

/**
 * Bit `value - 1` is set when `value` is still a candidate.
 */
export type CandidateMask = number;

export const ALL_CANDIDATES: CandidateMask = (1 << MAX_CELL_VALUE) - 1;
export const NO_CANDIDATES: CandidateMask = 0;

export function addCandidate(mask: CandidateMask, value: CellValue): CandidateMask {
  return mask | candidateBit(value);
}

export function candidateBit(value: CellValue): CandidateMask {
  return 1 << (ensureInRange(value, MIN_CELL_VALUE, MAX_CELL_VALUE, `Invalid candidate: ${String(value)}`) - 1);
}

export function candidateCount(mask: CandidateMask): number {
  let count = 0;
  for (let rest = mask; rest !== 0; rest &= rest - 1) {
    count++;
  }
  return count;
}

export function candidatesMask(values: Iterable<CellValue>): CandidateMask {
  let mask = NO_CANDIDATES;
  for (const value of values) {
    mask |= candidateBit(value);
  }
  return mask;
}

export function candidateValues(mask: CandidateMask): CellValue[] {
  const values: CellValue[] = [];
  for (let value = MIN_CELL_VALUE; value <= MAX_CELL_VALUE; value++) {
    if (hasCandidate(mask, value)) {
      values.push(value);
    }
  }
  return values;
}

export function formatCandidates(mask: CandidateMask): string {
  return candidateValues(mask).join('');
}

export function hasCandidate(mask: CandidateMask, value: CellValue): boolean {
  return (mask & candidateBit(value)) !== 0;
}

export function removeCandidates(mask: CandidateMask, removed: CandidateMask): CandidateMask {
  return mask & ~removed;
}

/* eslint-enable no-bitwise -- End of mask helpers. */
