/**
 * Seeded demand generation and validation.
 *
 * Generation draws uniformly: an origin among all nodes, a destination among
 * the remaining nodes, and a bandwidth in `[minBandwidth, maxBandwidth)`. The
 * same seed over the same graph always yields the same sequence.
 */
import seedrandom from 'seedrandom';
import type { Demand } from '../eonsim.types';
import type { NetworkGraph, NodeId } from '../topology/graph';

/** Default bandwidth range in Gbps. */
export const DEMAND_BANDWIDTH_RANGE = { min: 50, max: 400 } as const;

export interface DemandGenerationOptions {
  /** Seed for the PRNG. Omit for an auto-seeded (non-reproducible) stream. */
  seed?: string | number;
  /** Custom uniform [0, 1) source; takes precedence over `seed`. */
  rng?: () => number;
  minBandwidth?: number;
  maxBandwidth?: number;
}

function pick<T>(items: readonly T[], rng: () => number): T {
  return items[Math.min(items.length - 1, Math.floor(rng() * items.length))];
}

/**
 * Generate `count` random demands over the nodes of `graph`.
 *
 * @throws RangeError for a negative count, fewer than two nodes, or an
 *   invalid bandwidth range.
 */
export function generateDemands(
  graph: NetworkGraph,
  count: number,
  options: DemandGenerationOptions = {}
): Demand[] {
  const min = options.minBandwidth ?? DEMAND_BANDWIDTH_RANGE.min;
  const max = options.maxBandwidth ?? DEMAND_BANDWIDTH_RANGE.max;
  if (!Number.isInteger(count) || count < 0)
    throw new RangeError(`demand count must be a non-negative integer (got ${count})`);
  if (!(min >= 0) || !(max >= min))
    throw new RangeError(`invalid bandwidth range [${min}, ${max})`);
  const nodes = graph.nodes();
  if (count > 0 && nodes.length < 2)
    throw new RangeError('demand generation needs at least two nodes');

  const rng =
    options.rng ??
    (options.seed === undefined ? seedrandom() : seedrandom(String(options.seed)));
  const demands: Demand[] = [];
  for (let i = 0; i < count; i++) {
    const source = pick(nodes, rng);
    const target = pick(
      nodes.filter((node) => node !== source),
      rng
    );
    demands.push({ source, target, bandwidth: min + rng() * (max - min) });
  }
  return demands;
}

/** Whether `source` can reach `target` in `graph` (distinct, known nodes). */
export function validateDemand(graph: NetworkGraph, source: NodeId, target: NodeId): boolean {
  return source !== target && graph.hasPath(source, target);
}
