/**
 * Lexicographic candidate ordering for the adaptive allocator.
 *
 * Each mode maps a candidate to a tuple of numbers; candidates compare field by
 * field, lowest first, and the first differing field decides. Priority is
 * expressed by position in the tuple, never by weighting.
 */
import type { LoadMode } from '../eonsim.types';
import type { Candidate } from './allocator.helpers';

export type ScoreTuple = readonly number[];

/**
 * Ranking key of a candidate under `mode`.
 *
 * - normal: (watermark increase, resulting watermark, hops, offset, average watermark)
 * - high / extreme: (hops, offset, watermark increase, resulting watermark, average watermark)
 */
export function scoreTuple(candidate: Candidate, mode: LoadMode): ScoreTuple {
  const hops = candidate.route.path.hops;
  if (mode === 'normal')
    return [
      candidate.watermarkIncrease,
      candidate.resultingWatermark,
      hops,
      candidate.start,
      candidate.averageWatermark,
    ];
  return [
    hops,
    candidate.start,
    candidate.watermarkIncrease,
    candidate.resultingWatermark,
    candidate.averageWatermark,
  ];
}

/** Negative when `a` ranks before `b`, positive after, 0 when equal. */
export function compareTuples(a: ScoreTuple, b: ScoreTuple): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  return a.length - b.length;
}

/** Compare two candidates under `mode`. */
export function compareCandidates(a: Candidate, b: Candidate, mode: LoadMode): number {
  return compareTuples(scoreTuple(a, mode), scoreTuple(b, mode));
}
