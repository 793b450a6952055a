/**
 * Modulation formats available to a transponder.
 *
 * Each format trades optical reach for spectral efficiency: the denser the
 * constellation, the more bits per hertz it carries and the shorter the
 * distance it survives before the signal becomes unrecoverable. Slot sizing
 * picks the densest format whose reach still covers the path.
 *
 * @see {@link https://en.wikipedia.org/wiki/Quadrature_amplitude_modulation|QAM - Wikipedia}
 * @see {@link https://en.wikipedia.org/wiki/Phase-shift_keying|Phase-shift keying - Wikipedia}
 */
export interface ModulationFormat {
  /** Display / lookup name, e.g. `16-QAM`. */
  readonly name: string;
  /** Maximum transparent reach in kilometres. */
  readonly maxReachKm: number;
  /** Spectral efficiency in bits/s/Hz. */
  readonly efficiency: number;
}

export const modulation = {
  /**
   * Binary phase-shift keying. Longest reach, one bit per symbol; the format
   * of last resort for paths beyond every other reach.
   */
  BPSK: {
    name: 'BPSK',
    maxReachKm: 4000,
    efficiency: 1,
  },

  /** Quadrature phase-shift keying. */
  QPSK: {
    name: 'QPSK',
    maxReachKm: 2000,
    efficiency: 2,
  },

  /** 8-point quadrature amplitude modulation. */
  QAM8: {
    name: '8-QAM',
    maxReachKm: 1000,
    efficiency: 3,
  },

  /**
   * 16-point quadrature amplitude modulation. Densest format in the default
   * table; only metro-scale paths qualify.
   */
  QAM16: {
    name: '16-QAM',
    maxReachKm: 500,
    efficiency: 4,
  },
} as const satisfies Record<string, ModulationFormat>;

/** Default table, ordered by descending reach. */
export const MODULATION_TABLE: readonly ModulationFormat[] = [
  modulation.BPSK,
  modulation.QPSK,
  modulation.QAM8,
  modulation.QAM16,
];
