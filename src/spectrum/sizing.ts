/**
 * Modulation selection and slot sizing.
 *
 * Both functions are pure: they read the configuration they are handed and
 * nothing else.
 */
import { ConfigError, DEFAULT_CONFIG, type SpectrumConfig } from '../config';
import type { ModulationFormat } from '../methods/modulation';
import type { RankedPath } from '../topology/paths';

/**
 * Pick the most spectrally efficient format whose reach covers `distanceKm`.
 *
 * When the distance exceeds every reach, the longest-reach format is returned
 * so that every finite path still gets an assignable modulation.
 *
 * @example
 * selectModulation(1000).name; // '8-QAM'
 * selectModulation(5000).name; // 'BPSK'
 * @throws RangeError when `distanceKm` is negative or not finite.
 * @throws ConfigError when the table is empty.
 */
export function selectModulation(
  distanceKm: number,
  table: readonly ModulationFormat[] = DEFAULT_CONFIG.modulationTable
): ModulationFormat {
  if (!Number.isFinite(distanceKm) || distanceKm < 0)
    throw new RangeError(`path distance must be finite and >= 0 (got ${distanceKm})`);
  if (!table.length) throw new ConfigError('modulation table is empty');

  let best: ModulationFormat | undefined;
  let longest = table[0];
  for (const format of table) {
    if (format.maxReachKm > longest.maxReachKm) longest = format;
    if (format.maxReachKm < distanceKm) continue;
    if (!best || format.efficiency > best.efficiency) best = format;
  }
  return best ?? longest;
}

/**
 * Slots needed to carry `bandwidthGbps` with the named modulation:
 * `max(1, floor(bandwidth / (efficiency × slotWidth)) + guardBandSlots)`.
 *
 * @throws ConfigError when `modulationName` is not in the configured table.
 * @throws RangeError when the bandwidth is negative or not finite.
 */
export function requiredSlots(
  bandwidthGbps: number,
  modulationName: string,
  config: SpectrumConfig = DEFAULT_CONFIG
): number {
  const format = config.modulationTable.find((m) => m.name === modulationName);
  if (!format) throw new ConfigError(`unknown modulation format '${modulationName}'`);
  if (!Number.isFinite(bandwidthGbps) || bandwidthGbps < 0)
    throw new RangeError(`bandwidth must be finite and >= 0 (got ${bandwidthGbps})`);
  const signal = Math.floor(bandwidthGbps / (format.efficiency * config.slotWidthGHz));
  return Math.max(1, signal + config.guardBandSlots);
}

/** Distance, modulation and slot requirement of carrying a demand on a path. */
export interface PathCost {
  distanceKm: number;
  modulation: ModulationFormat;
  slots: number;
}

/** Combine {@link selectModulation} and {@link requiredSlots} for one path. */
export function pathCost(
  path: RankedPath,
  bandwidthGbps: number,
  config: SpectrumConfig = DEFAULT_CONFIG
): PathCost {
  const modulation = selectModulation(path.distanceKm, config.modulationTable);
  return {
    distanceKm: path.distanceKm,
    modulation,
    slots: requiredSlots(bandwidthGbps, modulation.name, config),
  };
}
