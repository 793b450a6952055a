/**
 * Derived statistics and head-to-head comparison of batch results.
 */
import type { AllocatorName, BatchResult, Demand } from '../eonsim.types';
import type { NetworkGraph } from '../topology/graph';
import { GraphPathSource } from '../topology/paths';
import { runBatch, type BatchOptions } from './scheduler';

export interface AlgorithmStatistics {
  totalDemands: number;
  successRate: number;
  blockingRate: number;
  watermark: number;
  utilization: number;
  /** Successful demands per watermark slot; 0 when nothing was placed. */
  spectrumEfficiency: number;
}

export function algorithmStatistics(result: BatchResult): AlgorithmStatistics {
  const total = result.successful + result.blocked;
  return {
    totalDemands: total,
    successRate: total > 0 ? result.successful / total : 0,
    blockingRate: total > 0 ? result.blocked / total : 0,
    watermark: result.watermark,
    utilization: result.utilization,
    spectrumEfficiency: result.watermark > 0 ? result.successful / result.watermark : 0,
  };
}

export interface Comparison {
  baseline: BatchResult;
  challenger: BatchResult;
  /** `baseline.watermark - challenger.watermark`; positive favours the challenger. */
  watermarkImprovement: number;
  /** `baseline.blockingProbability - challenger.blockingProbability`. */
  blockingImprovement: number;
}

export interface CompareOptions extends BatchOptions {
  /** Default: `SPFF`. */
  baseline?: AllocatorName;
  /** Default: `ADAPTIVE`. */
  challenger?: AllocatorName;
}

/**
 * Run two strategies over the same demand sequence, each on its own fresh
 * ledger, and report the difference.
 */
export function compareAlgorithms(
  graph: NetworkGraph,
  demands: readonly Demand[],
  options: CompareOptions = {}
): Comparison {
  const { baseline = 'SPFF', challenger = 'ADAPTIVE', ...batch } = options;
  // Path ranking is stateless apart from its cache, so both runs may share it.
  const paths = batch.paths ?? new GraphPathSource(graph);
  const first = runBatch(baseline, graph, demands, { ...batch, paths });
  const second = runBatch(challenger, graph, demands, { ...batch, paths });
  return {
    baseline: first,
    challenger: second,
    watermarkImprovement: first.watermark - second.watermark,
    blockingImprovement: first.blockingProbability - second.blockingProbability,
  };
}
