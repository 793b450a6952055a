/**
 * Demand scheduler: orders a batch, dispatches each demand to one allocator
 * and accumulates the outcome.
 *
 * Processing is strictly sequential. The only reordering is the initial
 * stable sort; there is no deferral or retry queue, and a blocked demand is
 * final for the batch.
 */
import { DEFAULT_CONFIG, type SpectrumConfig } from '../config';
import { createAllocator } from '../allocator/allocator.factory';
import { isValidBandwidth } from '../allocator/allocator.helpers';
import type {
  AllocationOutcome,
  Allocator,
  AllocatorName,
  BatchResult,
  BlockReason,
  Circuit,
  Demand,
  TelemetryEntry,
} from '../eonsim.types';
import { allocation } from '../methods/allocation';
import { ordering, type OrderingName } from '../methods/ordering';
import { SpectrumLedger } from '../spectrum/ledger';
import type { NetworkGraph } from '../topology/graph';
import { GraphPathSource, type PathSource } from '../topology/paths';
import { onceWarn } from '../utils/warnings';
import { TelemetryBuffer, type TelemetryOptions, type TelemetryStreamOptions } from './scheduler.telemetry';

export interface SchedulerOptions {
  /** Demand ordering applied before dispatch. Default: `BANDWIDTH`. */
  ordering?: OrderingName;
  /** Path source consulted by `SMART` ordering; without one `SMART` orders by bandwidth only. */
  paths?: PathSource;
  telemetry?: TelemetryOptions;
  telemetryStream?: TelemetryStreamOptions;
}

/**
 * Stable sort of `demands`. Ties keep their original relative order.
 *
 * @param strategy `BANDWIDTH` (descending) or `SMART` (descending bandwidth,
 *   then descending shortest-path distance via `paths`).
 */
export function sortDemands(
  demands: readonly Demand[],
  strategy: OrderingName = ordering.BANDWIDTH.name,
  paths?: PathSource
): Demand[] {
  if (strategy === ordering.SMART.name && paths) {
    const distance = new Map<Demand, number>();
    for (const demand of demands) {
      const [shortest] = paths.kShortestPaths(demand.source, demand.target, 1);
      distance.set(demand, shortest ? shortest.distanceKm : Infinity);
    }
    return demands
      .slice()
      .sort(
        (a, b) =>
          b.bandwidth - a.bandwidth ||
          compareDescending(distance.get(a) ?? Infinity, distance.get(b) ?? Infinity)
      );
  }
  return demands.slice().sort((a, b) => b.bandwidth - a.bandwidth);
}

function compareDescending(a: number, b: number): number {
  if (a === b) return 0;
  return a > b ? -1 : 1;
}

function emptyReasonCounts(): Record<BlockReason, number> {
  return {
    'invalid-demand': 0,
    'no-path': 0,
    'unresolvable-link': 0,
    'no-spectrum': 0,
    'commit-failed': 0,
  };
}

/**
 * Drives one allocator (and therefore one ledger) through a batch.
 *
 * @example
 * const ledger = new SpectrumLedger(graph, config);
 * const allocator = new AdaptiveAllocator(ledger, new GraphPathSource(graph), config);
 * const result = new DemandScheduler(allocator).run(demands);
 */
export class DemandScheduler {
  private readonly telemetryBuffer: TelemetryBuffer;

  constructor(
    readonly allocator: Allocator,
    private readonly options: SchedulerOptions = {}
  ) {
    this.telemetryBuffer = new TelemetryBuffer(options.telemetry, options.telemetryStream);
  }

  private get config(): SpectrumConfig {
    return this.allocator.ledger.config;
  }

  /** Process every demand once, in sorted order, and summarise the batch. */
  run(demands: readonly Demand[]): BatchResult {
    const ledger = this.allocator.ledger;
    const ordered = sortDemands(demands, this.options.ordering, this.options.paths);
    const blockedByReason = emptyReasonCounts();
    const circuits: Circuit[] = [];
    let successful = 0;
    let blocked = 0;

    ordered.forEach((demand, seq) => {
      const outcome = this.dispatch(demand);
      if (outcome.status === 'allocated') {
        successful++;
        circuits.push(outcome.circuit);
      } else {
        blocked++;
        blockedByReason[outcome.reason]++;
      }
      this.telemetryBuffer.record(this.buildEntry(seq, demand, outcome));
    });

    const total = demands.length;
    return {
      algorithm: this.allocator.name,
      label: allocation[this.allocator.name].label,
      total,
      successful,
      blocked,
      watermark: ledger.watermark,
      utilization: ledger.utilization(),
      blockingProbability: total > 0 ? blocked / total : 0,
      blockedByReason,
      circuits,
    };
  }

  private dispatch(demand: Demand): AllocationOutcome {
    if (!isValidBandwidth(demand)) {
      onceWarn(
        this.config.warnings,
        'scheduler:invalid-demand',
        `[scheduler] demand ${String(demand.source)}->${String(demand.target)} has invalid bandwidth ${demand.bandwidth}; blocked`
      );
      return { status: 'blocked', reason: 'invalid-demand', candidatesEvaluated: 0 };
    }
    const outcome = this.allocator.allocate(demand);
    if (outcome.status === 'blocked' && outcome.reason === 'no-path')
      onceWarn(
        this.config.warnings,
        `scheduler:no-path:${String(demand.source)}:${String(demand.target)}`,
        `[scheduler] no path ${String(demand.source)}->${String(demand.target)}`
      );
    return outcome;
  }

  private buildEntry(seq: number, demand: Demand, outcome: AllocationOutcome): TelemetryEntry {
    const ledger = this.allocator.ledger;
    const entry: TelemetryEntry = {
      seq,
      source: demand.source,
      target: demand.target,
      bandwidth: demand.bandwidth,
      status: outcome.status,
      candidates: outcome.candidatesEvaluated,
      watermark: ledger.watermark,
      utilization: ledger.utilization(),
    };
    if (outcome.mode) entry.mode = outcome.mode;
    if (outcome.status === 'allocated') {
      entry.path = outcome.circuit.path;
      entry.start = outcome.circuit.start;
      entry.slots = outcome.circuit.slots;
    } else entry.reason = outcome.reason;
    return entry;
  }

  /** Recorded decisions, oldest first. */
  telemetry(): TelemetryEntry[] {
    return this.telemetryBuffer.entries();
  }

  /** Drop recorded decisions (streaming is unaffected). */
  clearTelemetry() {
    this.telemetryBuffer.clear();
  }

  exportTelemetryJSONL(): string {
    return this.telemetryBuffer.toJSONL();
  }

  exportTelemetryCSV(maxEntries?: number): string {
    return this.telemetryBuffer.toCSV(maxEntries);
  }
}

/** Options for {@link runBatch}. */
export interface BatchOptions extends SchedulerOptions {
  config?: SpectrumConfig;
}

/**
 * Run one strategy over `demands` on a fresh ledger for `graph`.
 *
 * The ledger is created here and owned by this call alone.
 */
export function runBatch(
  algorithm: AllocatorName,
  graph: NetworkGraph,
  demands: readonly Demand[],
  options: BatchOptions = {}
): BatchResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const paths = options.paths ?? new GraphPathSource(graph);
  const ledger = new SpectrumLedger(graph, config);
  const allocator = createAllocator(algorithm, ledger, paths, config);
  return new DemandScheduler(allocator, { ...options, paths }).run(demands);
}
