import { DEFAULT_CONFIG, type SpectrumConfig } from '../config';
import type { AllocationOutcome, Allocator, Demand } from '../eonsim.types';
import type { SpectrumLedger } from '../spectrum/ledger';
import type { PathSource } from '../topology/paths';
import {
  commitPlacement,
  invalidDemand,
  isValidBandwidth,
  resolveRoute,
  type Route,
} from './allocator.helpers';

/**
 * Simple k-shortest-paths minimum-watermark allocator.
 *
 * First-fit on each of `kPaths` candidate paths; keeps the placement whose
 * simulated global watermark `max(watermark, start + slots)` is strictly the
 * lowest, so the shorter path wins ties. Kept alongside the adaptive variant
 * for comparison runs.
 */
export class MinWatermarkAllocator implements Allocator {
  readonly name = 'MIN_WATERMARK' as const;

  constructor(
    readonly ledger: SpectrumLedger,
    private readonly paths: PathSource,
    private readonly config: SpectrumConfig = DEFAULT_CONFIG
  ) {}

  allocate(demand: Demand): AllocationOutcome {
    if (!isValidBandwidth(demand)) return invalidDemand();
    const paths = this.paths.kShortestPaths(demand.source, demand.target, this.config.kPaths);
    if (!paths.length) return { status: 'blocked', reason: 'no-path', candidatesEvaluated: 0 };

    let best: { route: Route; start: number; watermark: number } | null = null;
    let evaluated = 0;
    let resolved = 0;
    for (const path of paths) {
      const route = resolveRoute(this.ledger, path, demand, this.config);
      if (!route) continue;
      resolved++;
      const start = this.ledger.findFirstFit(route.linkIndices, route.slots);
      if (start === null) continue;
      evaluated++;
      const watermark = Math.max(this.ledger.watermark, start + route.slots);
      if (!best || watermark < best.watermark) best = { route, start, watermark };
    }

    if (!best)
      return {
        status: 'blocked',
        reason: resolved ? 'no-spectrum' : 'unresolvable-link',
        candidatesEvaluated: evaluated,
      };
    return commitPlacement(this.ledger, demand, best.route, best.start, evaluated);
  }
}
