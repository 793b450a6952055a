/**
 * Load-adaptive multipath allocator (k-SP-MW).
 *
 * Before every demand the allocator reads two signals from the live ledger:
 *
 *   ratio       = watermark / slotCapacity
 *   utilization = occupied cells / all cells
 *
 * and picks a mode, checked in this order:
 *
 *   extreme  ratio > extremeLoad.watermarkRatio OR utilization > extremeLoad.utilization
 *   high     ratio > highLoad.watermarkRatio    OR utilization > highLoad.utilization
 *   normal   otherwise
 *
 * | mode    | paths                | offsets / path            | decision                      |
 * |---------|----------------------|---------------------------|-------------------------------|
 * | normal  | `kPaths`             | `offsetCandidates.normal` | lowest watermark impact       |
 * | high    | `pathFanout.high`    | `offsetCandidates.high`   | short path, low offset first  |
 * | extreme | `pathFanout.extreme` | first-fit only            | first viable pair, stop       |
 *
 * Candidates are ranked with the lexicographic tuples of `allocator.compare`.
 * The single best candidate is committed; if that commit fails the demand is
 * blocked (no fallback to the runner-up).
 */
import { DEFAULT_CONFIG, type SpectrumConfig } from '../config';
import type { AllocationOutcome, Allocator, Demand, LoadMode } from '../eonsim.types';
import type { SpectrumLedger } from '../spectrum/ledger';
import type { PathSource } from '../topology/paths';
import { compareCandidates } from './allocator.compare';
import {
  commitPlacement,
  invalidDemand,
  isValidBandwidth,
  resolveRoute,
  scoreCandidate,
  type Candidate,
} from './allocator.helpers';

/** Load signals sampled from a ledger. */
export interface LoadSignals {
  watermarkRatio: number;
  utilization: number;
}

/** Search breadth for one mode. */
export interface SearchPlan {
  mode: LoadMode;
  paths: number;
  offsets: number;
}

export function loadSignals(ledger: SpectrumLedger): LoadSignals {
  return {
    watermarkRatio: ledger.capacity > 0 ? ledger.watermark / ledger.capacity : 0,
    utilization: ledger.utilization(),
  };
}

/** Map load signals to a mode (extreme checked before high). */
export function selectLoadMode(signals: LoadSignals, config: SpectrumConfig): LoadMode {
  const { extremeLoad, highLoad } = config;
  if (
    signals.watermarkRatio > extremeLoad.watermarkRatio ||
    signals.utilization > extremeLoad.utilization
  )
    return 'extreme';
  if (
    signals.watermarkRatio > highLoad.watermarkRatio ||
    signals.utilization > highLoad.utilization
  )
    return 'high';
  return 'normal';
}

export function searchPlan(mode: LoadMode, config: SpectrumConfig): SearchPlan {
  switch (mode) {
    case 'extreme':
      return { mode, paths: config.pathFanout.extreme, offsets: 1 };
    case 'high':
      return { mode, paths: config.pathFanout.high, offsets: config.offsetCandidates.high };
    default:
      return { mode, paths: config.kPaths, offsets: config.offsetCandidates.normal };
  }
}

export class AdaptiveAllocator implements Allocator {
  readonly name = 'ADAPTIVE' as const;

  constructor(
    readonly ledger: SpectrumLedger,
    private readonly paths: PathSource,
    private readonly config: SpectrumConfig = DEFAULT_CONFIG
  ) {}

  /** Mode the next demand would be handled in. */
  currentMode(): LoadMode {
    return selectLoadMode(loadSignals(this.ledger), this.config);
  }

  allocate(demand: Demand): AllocationOutcome {
    const plan = searchPlan(this.currentMode(), this.config);
    const { mode } = plan;
    if (!isValidBandwidth(demand)) return invalidDemand(mode);
    const paths = this.paths.kShortestPaths(demand.source, demand.target, plan.paths);
    if (!paths.length)
      return { status: 'blocked', reason: 'no-path', mode, candidatesEvaluated: 0 };

    let best: Candidate | null = null;
    let evaluated = 0;
    let resolved = 0;
    search: for (const path of paths) {
      const route = resolveRoute(this.ledger, path, demand, this.config);
      if (!route) continue;
      resolved++;
      const offsets = this.candidateOffsets(route.linkIndices, route.slots, plan);
      for (const start of offsets) {
        const candidate = scoreCandidate(this.ledger, route, start);
        evaluated++;
        if (mode === 'extreme') {
          best = candidate;
          break search;
        }
        if (!best || compareCandidates(candidate, best, mode) < 0) best = candidate;
      }
    }

    if (!best)
      return {
        status: 'blocked',
        reason: resolved ? 'no-spectrum' : 'unresolvable-link',
        mode,
        candidatesEvaluated: evaluated,
      };
    return commitPlacement(this.ledger, demand, best.route, best.start, evaluated, mode);
  }

  private candidateOffsets(links: number[], slots: number, plan: SearchPlan): number[] {
    if (plan.mode === 'extreme') {
      const start = this.ledger.findFirstFit(links, slots);
      return start === null ? [] : [start];
    }
    return this.ledger.findBestFitPositions(links, slots, plan.offsets);
  }
}
