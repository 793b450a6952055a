import { ConfigError, DEFAULT_CONFIG, createConfig } from '../src/config';

describe('config', () => {
  describe('DEFAULT_CONFIG', () => {
    it('uses 320 slots of 12.5 GHz with one guard slot', () => {
      expect([
        DEFAULT_CONFIG.slotCapacity,
        DEFAULT_CONFIG.slotWidthGHz,
        DEFAULT_CONFIG.guardBandSlots,
      ]).toEqual([320, 12.5, 1]);
    });
    it('lists the modulation formats by descending reach', () => {
      expect(DEFAULT_CONFIG.modulationTable.map((m) => m.name)).toEqual([
        'BPSK',
        'QPSK',
        '8-QAM',
        '16-QAM',
      ]);
    });
    it('carries the load thresholds', () => {
      expect([DEFAULT_CONFIG.highLoad, DEFAULT_CONFIG.extremeLoad]).toEqual([
        { watermarkRatio: 0.7, utilization: 0.1 },
        { watermarkRatio: 0.92, utilization: 0.18 },
      ]);
    });
    it('caps best-fit offsets in normal and high load only', () => {
      expect(DEFAULT_CONFIG.offsetCandidates).toEqual({ normal: 10, high: 3 });
    });
    it('is deeply frozen', () => {
      expect(Object.isFrozen(DEFAULT_CONFIG.offsetCandidates)).toBe(true);
    });
  });

  describe('createConfig()', () => {
    it('merges nested groups field by field', () => {
      const config = createConfig({ highLoad: { utilization: 0.15 } });
      expect(config.highLoad).toEqual({ watermarkRatio: 0.7, utilization: 0.15 });
    });
    it('keeps defaults for omitted fields', () => {
      expect(createConfig({ slotCapacity: 40 }).kPaths).toBe(3);
    });
    it('returns a frozen value', () => {
      expect(Object.isFrozen(createConfig())).toBe(true);
    });
    it('rejects a non-integer capacity', () => {
      expect(() => createConfig({ slotCapacity: 12.5 })).toThrow(ConfigError);
    });
    it('rejects a negative guard band', () => {
      expect(() => createConfig({ guardBandSlots: -1 })).toThrow(ConfigError);
    });
    it('rejects an empty modulation table', () => {
      expect(() => createConfig({ modulationTable: [] })).toThrow(ConfigError);
    });
    it('rejects duplicate modulation names', () => {
      const format = { name: 'BPSK', maxReachKm: 4000, efficiency: 1 };
      expect(() => createConfig({ modulationTable: [format, format] })).toThrow(
        "duplicate modulation format 'BPSK'"
      );
    });
    it('rejects extreme thresholds below high ones', () => {
      expect(() => createConfig({ extremeLoad: { watermarkRatio: 0.5 } })).toThrow(ConfigError);
    });
    it('rejects a zero offset budget', () => {
      expect(() => createConfig({ offsetCandidates: { high: 0 } })).toThrow(ConfigError);
    });
  });
});
