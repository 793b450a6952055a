/**
 * Spectrum allocation strategies offered by the engine.
 *
 * Every strategy answers the same RMLSA question for one demand at a time:
 * which route, which modulation, and which contiguous slot range on every link
 * of that route. They differ in how many routes they look at and in what they
 * optimise while the network fills.
 *
 * @see {@link https://en.wikipedia.org/wiki/Elastic_optical_network|Elastic optical network - Wikipedia}
 */
import type { AllocatorName } from '../eonsim.types';

export interface AllocationMethod {
  readonly name: AllocatorName;
  /** Label used in reports. */
  readonly label: string;
}

export const allocation = {
  /**
   * Shortest-Path First-Fit. Routes over the single least-distance path and
   * takes the lowest-indexed window free on all of its links. Baseline.
   */
  SPFF: {
    name: 'SPFF',
    label: 'SPFF',
  },

  /**
   * Load-adaptive k-shortest-paths minimum-watermark heuristic. Reads the
   * watermark ratio and utilization before every demand and switches between
   * a watermark-minimising best-fit search (normal load), a short-path /
   * low-offset preference (high load) and an early-exit first-fit (extreme load).
   */
  ADAPTIVE: {
    name: 'ADAPTIVE',
    label: 'k-SP-MW',
  },

  /**
   * Simple k-shortest-paths minimum-watermark. First-fit on each of k paths,
   * keeps the one whose placement leaves the lowest global watermark.
   */
  MIN_WATERMARK: {
    name: 'MIN_WATERMARK',
    label: 'k-SP-MW (simple)',
  },
} as const satisfies Record<AllocatorName, AllocationMethod>;
