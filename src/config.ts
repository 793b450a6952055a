/**
 * eonsim configuration contract & default instance.
 *
 * WHY THIS EXISTS
 * --------------
 * Every numeric knob of the spectrum engine (slot capacity, slot width, guard
 * band, modulation table, load thresholds, search breadth) lives in one value
 * so that a ledger, its allocators and the scheduler driving them agree on the
 * same numbers for the lifetime of a run.
 *
 * USAGE PATTERN
 * ------------
 *   import { createConfig } from 'eonsim';
 *   const config = createConfig({ slotCapacity: 160, kPaths: 4 });
 *   const ledger = new SpectrumLedger(graph, config);
 *
 * The returned object is deeply frozen. Build a new one with `createConfig`
 * instead of mutating; components capture the instance at construction time.
 */
import { MODULATION_TABLE, type ModulationFormat } from './methods/modulation';

/** Pair of load signals; a mode triggers when EITHER bound is exceeded. */
export interface LoadThresholds {
  /** Bound on `watermark / slotCapacity`. */
  readonly watermarkRatio: number;
  /** Bound on the fraction of occupied (link, slot) cells. */
  readonly utilization: number;
}

/**
 * Per-mode cap on the number of best-fit offsets evaluated per path. Extreme
 * load always takes the single first-fit offset and has no cap.
 */
export interface OffsetCandidates {
  readonly normal: number;
  readonly high: number;
}

/** Path fan-out used by the adaptive allocator once load leaves normal mode. */
export interface PathFanout {
  readonly high: number;
  readonly extreme: number;
}

export interface SpectrumConfig {
  /**
   * Emit guidance warnings (unknown nodes, duplicate links, invalid demands)
   * to stderr via `console.warn`.
   * Default: false
   */
  readonly warnings: boolean;

  /** Frequency slots per link. Default: 320. */
  readonly slotCapacity: number;

  /** Width of one slot in GHz. Default: 12.5. */
  readonly slotWidthGHz: number;

  /** Guard slots added to every allocation. Default: 1. */
  readonly guardBandSlots: number;

  /**
   * Modulation formats considered by slot sizing. Names must be unique.
   * Default: BPSK / QPSK / 8-QAM / 16-QAM.
   */
  readonly modulationTable: readonly ModulationFormat[];

  /** Candidate paths per demand for multipath allocators in normal load. Default: 3. */
  readonly kPaths: number;

  /** High-load trigger. Default: ratio > 0.70 or utilization > 0.10. */
  readonly highLoad: LoadThresholds;

  /** Extreme-load trigger. Default: ratio > 0.92 or utilization > 0.18. */
  readonly extremeLoad: LoadThresholds;

  /** Best-fit offsets searched per path in normal / high load. Default: 10 / 3. */
  readonly offsetCandidates: OffsetCandidates;

  /** Paths searched in high / extreme load. Default: 5 / 3. */
  readonly pathFanout: PathFanout;
}

/** Partial overrides accepted by {@link createConfig}; nested groups merge field by field. */
export interface SpectrumConfigOverrides {
  warnings?: boolean;
  slotCapacity?: number;
  slotWidthGHz?: number;
  guardBandSlots?: number;
  modulationTable?: readonly ModulationFormat[];
  kPaths?: number;
  highLoad?: Partial<LoadThresholds>;
  extremeLoad?: Partial<LoadThresholds>;
  offsetCandidates?: Partial<OffsetCandidates>;
  pathFanout?: Partial<PathFanout>;
}

/** Raised for an invalid static configuration; never for per-demand failures. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === 'object' && !Object.isFrozen(child))
      deepFreeze(child);
  }
  return Object.freeze(value);
}

function requirePositiveInteger(label: string, value: number) {
  if (!Number.isInteger(value) || value <= 0)
    throw new ConfigError(`${label} must be a positive integer (got ${value})`);
}

function requireFraction(label: string, value: number) {
  if (!Number.isFinite(value) || value < 0 || value > 1)
    throw new ConfigError(`${label} must lie in [0, 1] (got ${value})`);
}

/**
 * Validate a fully merged configuration.
 *
 * @throws ConfigError describing the first offending field.
 */
export function validateConfig(config: SpectrumConfig): void {
  requirePositiveInteger('slotCapacity', config.slotCapacity);
  if (!Number.isFinite(config.slotWidthGHz) || config.slotWidthGHz <= 0)
    throw new ConfigError(
      `slotWidthGHz must be a positive number (got ${config.slotWidthGHz})`
    );
  if (!Number.isInteger(config.guardBandSlots) || config.guardBandSlots < 0)
    throw new ConfigError(
      `guardBandSlots must be a non-negative integer (got ${config.guardBandSlots})`
    );
  if (!config.modulationTable.length)
    throw new ConfigError('modulationTable must contain at least one format');
  const names = new Set<string>();
  for (const format of config.modulationTable) {
    if (names.has(format.name))
      throw new ConfigError(`duplicate modulation format '${format.name}'`);
    names.add(format.name);
    if (!(format.maxReachKm > 0) || !(format.efficiency > 0))
      throw new ConfigError(
        `modulation '${format.name}' needs positive reach and efficiency`
      );
  }
  requirePositiveInteger('kPaths', config.kPaths);
  requireFraction('highLoad.watermarkRatio', config.highLoad.watermarkRatio);
  requireFraction('highLoad.utilization', config.highLoad.utilization);
  requireFraction('extremeLoad.watermarkRatio', config.extremeLoad.watermarkRatio);
  requireFraction('extremeLoad.utilization', config.extremeLoad.utilization);
  if (
    config.extremeLoad.watermarkRatio < config.highLoad.watermarkRatio ||
    config.extremeLoad.utilization < config.highLoad.utilization
  )
    throw new ConfigError('extremeLoad thresholds must not be below highLoad');
  requirePositiveInteger('offsetCandidates.normal', config.offsetCandidates.normal);
  requirePositiveInteger('offsetCandidates.high', config.offsetCandidates.high);
  requirePositiveInteger('pathFanout.high', config.pathFanout.high);
  requirePositiveInteger('pathFanout.extreme', config.pathFanout.extreme);
}

/**
 * Default configuration. Frozen; derive variants through {@link createConfig}.
 */
export const DEFAULT_CONFIG: SpectrumConfig = deepFreeze({
  warnings: false, // console guidance
  slotCapacity: 320, // slots per link
  slotWidthGHz: 12.5, // flexgrid granularity
  guardBandSlots: 1, // per allocation
  modulationTable: [...MODULATION_TABLE],
  kPaths: 3, // normal-mode fan-out
  highLoad: { watermarkRatio: 0.7, utilization: 0.1 },
  extremeLoad: { watermarkRatio: 0.92, utilization: 0.18 },
  offsetCandidates: { normal: 10, high: 3 },
  pathFanout: { high: 5, extreme: 3 },
});

/**
 * Merge overrides onto {@link DEFAULT_CONFIG}, validate, and freeze.
 *
 * @example
 * const small = createConfig({ slotCapacity: 20, highLoad: { utilization: 0.2 } });
 */
export function createConfig(
  overrides: SpectrumConfigOverrides = {}
): SpectrumConfig {
  const base = DEFAULT_CONFIG;
  const merged: SpectrumConfig = {
    warnings: overrides.warnings ?? base.warnings,
    slotCapacity: overrides.slotCapacity ?? base.slotCapacity,
    slotWidthGHz: overrides.slotWidthGHz ?? base.slotWidthGHz,
    guardBandSlots: overrides.guardBandSlots ?? base.guardBandSlots,
    modulationTable: (overrides.modulationTable ?? base.modulationTable).map(
      (format) => ({ ...format })
    ),
    kPaths: overrides.kPaths ?? base.kPaths,
    highLoad: { ...base.highLoad, ...overrides.highLoad },
    extremeLoad: { ...base.extremeLoad, ...overrides.extremeLoad },
    offsetCandidates: { ...base.offsetCandidates, ...overrides.offsetCandidates },
    pathFanout: { ...base.pathFanout, ...overrides.pathFanout },
  };
  validateConfig(merged);
  return deepFreeze(merged);
}
