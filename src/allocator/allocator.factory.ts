import { DEFAULT_CONFIG, type SpectrumConfig } from '../config';
import type { Allocator, AllocatorName } from '../eonsim.types';
import type { SpectrumLedger } from '../spectrum/ledger';
import type { PathSource } from '../topology/paths';
import { AdaptiveAllocator } from './allocator.adaptive';
import { FirstFitAllocator } from './allocator.firstFit';
import { MinWatermarkAllocator } from './allocator.minWatermark';

/** Instantiate the named strategy over `ledger`. */
export function createAllocator(
  name: AllocatorName,
  ledger: SpectrumLedger,
  paths: PathSource,
  config: SpectrumConfig = DEFAULT_CONFIG
): Allocator {
  switch (name) {
    case 'SPFF':
      return new FirstFitAllocator(ledger, paths, config);
    case 'ADAPTIVE':
      return new AdaptiveAllocator(ledger, paths, config);
    case 'MIN_WATERMARK':
      return new MinWatermarkAllocator(ledger, paths, config);
  }
}
