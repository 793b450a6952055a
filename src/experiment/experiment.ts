/**
 * Experiment loop: for each demand load, run several seeded trials of two
 * strategies (each trial on its own pair of fresh ledgers) and average the
 * results.
 *
 * Trial `r` of every load uses seed `r`, so loads differ only in demand count.
 */
import { DEFAULT_CONFIG, type SpectrumConfig } from '../config';
import { DEMAND_BANDWIDTH_RANGE, generateDemands } from '../demands/demands';
import type { AllocatorName } from '../eonsim.types';
import { allocation } from '../methods/allocation';
import type { OrderingName } from '../methods/ordering';
import { compareAlgorithms } from '../scheduler/scheduler.stats';
import type { NetworkGraph } from '../topology/graph';
import { GraphPathSource } from '../topology/paths';

export const DEFAULT_DEMAND_LOADS: readonly number[] = [50, 100, 150, 200];
export const DEFAULT_RUNS_PER_LOAD = 5;

export interface ExperimentOptions {
  loads?: readonly number[];
  runsPerLoad?: number;
  baseline?: AllocatorName;
  challenger?: AllocatorName;
  config?: SpectrumConfig;
  ordering?: OrderingName;
  minBandwidth?: number;
  maxBandwidth?: number;
  /** Print `[experiment]` progress lines. Default: false. */
  verbose?: boolean;
}

/** Averages over the trials of one load for one strategy. */
export interface AveragedMetrics {
  watermark: number;
  blockingProbability: number;
  utilization: number;
}

export interface LoadPoint {
  load: number;
  baseline: AveragedMetrics;
  challenger: AveragedMetrics;
  /** `baseline.watermark - challenger.watermark`. */
  watermarkImprovement: number;
  blockingImprovement: number;
}

export interface ExperimentReport {
  baseline: { name: AllocatorName; label: string };
  challenger: { name: AllocatorName; label: string };
  runsPerLoad: number;
  points: LoadPoint[];
  averageWatermarkImprovement: number;
  averageBlockingImprovement: number;
}

function mean(values: readonly number[]): number {
  return values.length ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

function average(samples: readonly AveragedMetrics[]): AveragedMetrics {
  return {
    watermark: mean(samples.map((s) => s.watermark)),
    blockingProbability: mean(samples.map((s) => s.blockingProbability)),
    utilization: mean(samples.map((s) => s.utilization)),
  };
}

/**
 * Run the full load sweep.
 *
 * @throws RangeError when `runsPerLoad` is not a positive integer or a load is negative.
 */
export function runExperiments(
  graph: NetworkGraph,
  options: ExperimentOptions = {}
): ExperimentReport {
  const loads = options.loads ?? DEFAULT_DEMAND_LOADS;
  const runs = options.runsPerLoad ?? DEFAULT_RUNS_PER_LOAD;
  const baseline = options.baseline ?? 'SPFF';
  const challenger = options.challenger ?? 'ADAPTIVE';
  const config = options.config ?? DEFAULT_CONFIG;
  const verbose = options.verbose ?? false;
  if (!Number.isInteger(runs) || runs < 1)
    throw new RangeError(`runsPerLoad must be a positive integer (got ${runs})`);

  const paths = new GraphPathSource(graph);
  const totalTrials = loads.length * runs;
  let trial = 0;
  if (verbose)
    console.log(`[experiment] loads=${loads.join(',')} runsPerLoad=${runs}`);

  const points: LoadPoint[] = loads.map((load) => {
    const baselineSamples: AveragedMetrics[] = [];
    const challengerSamples: AveragedMetrics[] = [];
    for (let run = 0; run < runs; run++) {
      trial++;
      const demands = generateDemands(graph, load, {
        seed: run,
        minBandwidth: options.minBandwidth ?? DEMAND_BANDWIDTH_RANGE.min,
        maxBandwidth: options.maxBandwidth ?? DEMAND_BANDWIDTH_RANGE.max,
      });
      const comparison = compareAlgorithms(graph, demands, {
        baseline,
        challenger,
        config,
        paths,
        ordering: options.ordering,
        telemetry: { enabled: false },
      });
      baselineSamples.push(comparison.baseline);
      challengerSamples.push(comparison.challenger);
    }
    const b = average(baselineSamples);
    const c = average(challengerSamples);
    if (verbose)
      console.log(
        `[experiment] load=${load} progress=${((trial / totalTrials) * 100).toFixed(1)}% ` +
          `${baseline}.watermark=${b.watermark.toFixed(2)} ${challenger}.watermark=${c.watermark.toFixed(2)} ` +
          `${baseline}.blocking=${b.blockingProbability.toFixed(3)} ${challenger}.blocking=${c.blockingProbability.toFixed(3)}`
      );
    return {
      load,
      baseline: b,
      challenger: c,
      watermarkImprovement: b.watermark - c.watermark,
      blockingImprovement: b.blockingProbability - c.blockingProbability,
    };
  });

  return {
    baseline: { name: baseline, label: allocation[baseline].label },
    challenger: { name: challenger, label: allocation[challenger].label },
    runsPerLoad: runs,
    points,
    averageWatermarkImprovement: mean(points.map((p) => p.watermarkImprovement)),
    averageBlockingImprovement: mean(points.map((p) => p.blockingImprovement)),
  };
}
