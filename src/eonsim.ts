/**
 * eonsim: routing, modulation and spectrum assignment for elastic optical networks.
 *
 * @example
 * import { createNsfnet, generateDemands, compareAlgorithms } from 'eonsim';
 * const graph = createNsfnet();
 * const demands = generateDemands(graph, 100, { seed: 1 });
 * const { watermarkImprovement } = compareAlgorithms(graph, demands);
 */
export * from './config';
export * from './eonsim.types';
export { modulation, MODULATION_TABLE, type ModulationFormat } from './methods/modulation';
export { allocation, type AllocationMethod } from './methods/allocation';
export { ordering, type OrderingName } from './methods/ordering';
export { warn, onceWarn, resetWarnings } from './utils/warnings';

export * from './topology/graph';
export { createNsfnet, NSFNET_NODE_COUNT } from './topology/nsfnet';
export * from './topology/paths';

export { SlotBitset } from './spectrum/bitset';
export { SpectrumLedger, type LedgerStats } from './spectrum/ledger';
export { selectModulation, requiredSlots, pathCost, type PathCost } from './spectrum/sizing';

export { FirstFitAllocator } from './allocator/allocator.firstFit';
export {
  AdaptiveAllocator,
  loadSignals,
  selectLoadMode,
  searchPlan,
  type LoadSignals,
  type SearchPlan,
} from './allocator/allocator.adaptive';
export { MinWatermarkAllocator } from './allocator/allocator.minWatermark';
export { createAllocator } from './allocator/allocator.factory';
export { scoreTuple, compareTuples, compareCandidates, type ScoreTuple } from './allocator/allocator.compare';

export * from './scheduler/scheduler';
export * from './scheduler/scheduler.telemetry';
export * from './scheduler/scheduler.stats';

export * from './demands/demands';
export * from './experiment/experiment';
export * from './experiment/experiment.exports';
