/**
 * Helpers shared by the allocation strategies: turning a ranked path into a
 * sized route on a ledger, scoring a placement without mutating the ledger,
 * and committing the chosen one.
 */
import type { SpectrumConfig } from '../config';
import type { AllocationOutcome, Demand, LoadMode } from '../eonsim.types';
import type { ModulationFormat } from '../methods/modulation';
import type { SpectrumLedger } from '../spectrum/ledger';
import { pathCost } from '../spectrum/sizing';
import type { RankedPath } from '../topology/paths';

/** A path resolved against a ledger and sized for one demand. */
export interface Route {
  path: RankedPath;
  linkIndices: number[];
  modulation: ModulationFormat;
  slots: number;
}

/** A route plus an offset, scored against the current ledger state. */
export interface Candidate {
  route: Route;
  start: number;
  /** Highest per-link watermark of the route before placement. */
  currentWatermark: number;
  /** Highest per-link watermark of the route after placement. */
  resultingWatermark: number;
  /** `resultingWatermark - currentWatermark`. */
  watermarkIncrease: number;
  /** Mean per-link watermark of the route after placement. */
  averageWatermark: number;
}

/** Whether the requested bandwidth can be sized (finite and non-negative). */
export function isValidBandwidth(demand: Demand): boolean {
  return Number.isFinite(demand.bandwidth) && demand.bandwidth >= 0;
}

/** Blocked outcome for a demand whose bandwidth cannot be sized. */
export function invalidDemand(mode?: LoadMode): AllocationOutcome {
  return { status: 'blocked', reason: 'invalid-demand', candidatesEvaluated: 0, mode };
}

/**
 * Resolve `path` into ledger links and size the demand for its distance.
 *
 * @returns `null` when some hop does not map to a ledger link.
 */
export function resolveRoute(
  ledger: SpectrumLedger,
  path: RankedPath,
  demand: Demand,
  config: SpectrumConfig
): Route | null {
  const linkIndices = ledger.linkIndices(path.nodes);
  if (!linkIndices || !Number.isFinite(path.distanceKm)) return null;
  const cost = pathCost(path, demand.bandwidth, config);
  return { path, linkIndices, modulation: cost.modulation, slots: cost.slots };
}

/** Score placing `route` at `start` without touching the ledger. */
export function scoreCandidate(
  ledger: SpectrumLedger,
  route: Route,
  start: number
): Candidate {
  const end = start + route.slots;
  let current = 0;
  let sum = 0;
  for (const index of route.linkIndices) {
    const linkWatermark = ledger.linkWatermark(index);
    current = Math.max(current, linkWatermark);
    sum += Math.max(linkWatermark, end);
  }
  const resulting = Math.max(current, end);
  return {
    route,
    start,
    currentWatermark: current,
    resultingWatermark: resulting,
    watermarkIncrease: resulting - current,
    averageWatermark: sum / route.linkIndices.length,
  };
}

/**
 * Commit a chosen placement. A failed commit (cells taken since the query) is
 * reported as blocked; no other candidate is tried.
 */
export function commitPlacement(
  ledger: SpectrumLedger,
  demand: Demand,
  route: Route,
  start: number,
  candidatesEvaluated: number,
  mode?: LoadMode
): AllocationOutcome {
  if (!ledger.commit(route.linkIndices, start, route.slots))
    return { status: 'blocked', reason: 'commit-failed', candidatesEvaluated, mode };
  return {
    status: 'allocated',
    candidatesEvaluated,
    mode,
    circuit: {
      demand,
      path: route.path.nodes,
      linkIndices: route.linkIndices,
      start,
      slots: route.slots,
      modulation: route.modulation,
      distanceKm: route.path.distanceKm,
    },
  };
}
