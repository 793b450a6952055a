import { DEFAULT_CONFIG, type SpectrumConfig } from '../config';
import type { AllocationOutcome, Allocator, Demand } from '../eonsim.types';
import type { SpectrumLedger } from '../spectrum/ledger';
import type { PathSource } from '../topology/paths';
import {
  commitPlacement,
  invalidDemand,
  isValidBandwidth,
  resolveRoute,
} from './allocator.helpers';

/**
 * Shortest-Path First-Fit baseline.
 *
 * One path (the least-distance one), one query: the lowest offset free on
 * every link. No path, an unresolvable hop, no window or a failed commit all
 * block the demand; there is no retry on an alternate path.
 */
export class FirstFitAllocator implements Allocator {
  readonly name = 'SPFF' as const;

  constructor(
    readonly ledger: SpectrumLedger,
    private readonly paths: PathSource,
    private readonly config: SpectrumConfig = DEFAULT_CONFIG
  ) {}

  allocate(demand: Demand): AllocationOutcome {
    if (!isValidBandwidth(demand)) return invalidDemand();
    const [path] = this.paths.kShortestPaths(demand.source, demand.target, 1);
    if (!path) return { status: 'blocked', reason: 'no-path', candidatesEvaluated: 0 };
    const route = resolveRoute(this.ledger, path, demand, this.config);
    if (!route)
      return { status: 'blocked', reason: 'unresolvable-link', candidatesEvaluated: 0 };
    const start = this.ledger.findFirstFit(route.linkIndices, route.slots);
    if (start === null)
      return { status: 'blocked', reason: 'no-spectrum', candidatesEvaluated: 0 };
    return commitPlacement(this.ledger, demand, route, start, 1);
  }
}
