/**
 * Shared structural types for the spectrum engine (type imports only).
 */
import type { ModulationFormat } from './methods/modulation';
import type { NodeId, Path } from './topology/graph';
import type { SpectrumLedger } from './spectrum/ledger';

/** A bandwidth request between two nodes. */
export interface Demand {
  readonly source: NodeId;
  readonly target: NodeId;
  /** Requested line rate in Gbps. */
  readonly bandwidth: number;
}

/**
 * A committed placement: the demand, its route and the identical slot range
 * it holds on every link of that route.
 */
export interface Circuit {
  readonly demand: Demand;
  readonly path: Path;
  readonly linkIndices: readonly number[];
  /** First occupied slot. */
  readonly start: number;
  /** Slots held, guard band included. */
  readonly slots: number;
  readonly modulation: ModulationFormat;
  readonly distanceKm: number;
}

/** Why a demand could not be placed. */
export type BlockReason =
  | 'invalid-demand'
  | 'no-path'
  | 'unresolvable-link'
  | 'no-spectrum'
  | 'commit-failed';

export const BLOCK_REASONS: readonly BlockReason[] = [
  'invalid-demand',
  'no-path',
  'unresolvable-link',
  'no-spectrum',
  'commit-failed',
];

/** Load regime of the adaptive allocator. */
export type LoadMode = 'normal' | 'high' | 'extreme';

/** Identifier of an allocation strategy. */
export type AllocatorName = 'SPFF' | 'ADAPTIVE' | 'MIN_WATERMARK';

interface OutcomeBase {
  /** Load mode in effect, for allocators that have one. */
  mode?: LoadMode;
  /** Number of (path, offset) candidates scored before deciding. */
  candidatesEvaluated: number;
}

export interface Allocated extends OutcomeBase {
  status: 'allocated';
  circuit: Circuit;
}

export interface Blocked extends OutcomeBase {
  status: 'blocked';
  reason: BlockReason;
}

export type AllocationOutcome = Allocated | Blocked;

/**
 * An allocation strategy bound to one ledger. `allocate` either commits a
 * circuit or reports a block (an unsizable bandwidth blocks as
 * `invalid-demand`); it never throws for per-demand conditions.
 */
export interface Allocator {
  readonly name: AllocatorName;
  readonly ledger: SpectrumLedger;
  allocate(demand: Demand): AllocationOutcome;
}

/** Record produced for one batch run. */
export interface BatchResult {
  algorithm: AllocatorName;
  /** Human-readable algorithm label, e.g. `SPFF`. */
  label: string;
  total: number;
  successful: number;
  blocked: number;
  watermark: number;
  utilization: number;
  /** `blocked / total`, 0 for an empty batch. */
  blockingProbability: number;
  blockedByReason: Record<BlockReason, number>;
  circuits: Circuit[];
}

/** Per-demand decision record kept by the scheduler. */
export interface TelemetryEntry {
  /** Position in processing (sorted) order. */
  seq: number;
  source: NodeId;
  target: NodeId;
  bandwidth: number;
  status: AllocationOutcome['status'];
  reason?: BlockReason;
  mode?: LoadMode;
  candidates: number;
  path?: Path;
  start?: number;
  slots?: number;
  /** Global watermark after the decision. */
  watermark: number;
  /** Utilization after the decision. */
  utilization: number;
}
