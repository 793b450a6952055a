import type { TelemetryEntry } from '../../src/eonsim.types';
import { TelemetryBuffer, csvCell } from '../../src/scheduler/scheduler.telemetry';

function entry(seq: number): TelemetryEntry {
  return {
    seq,
    source: 0,
    target: 1,
    bandwidth: 100,
    status: 'blocked',
    reason: 'no-spectrum',
    mode: 'extreme',
    candidates: 0,
    watermark: 320,
    utilization: 1,
  };
}

describe('TelemetryBuffer', () => {
  describe('Scenario: bounded buffer', () => {
    const buffer = new TelemetryBuffer({ maxEntries: 2 });
    [0, 1, 2].forEach((seq) => buffer.record(entry(seq)));
    it('drops the oldest entries first', () => {
      expect(buffer.entries().map((e) => e.seq)).toEqual([1, 2]);
    });
    it('exports the most recent entries as CSV', () => {
      expect(buffer.toCSV(1).split('\n')[1]).toBe('2,0,1,100,blocked,no-spectrum,extreme,0,,,,320,1');
    });
  });

  it('returns an empty CSV when nothing was recorded', () => {
    expect(new TelemetryBuffer().toCSV()).toBe('');
  });

  it('clears its entries', () => {
    const buffer = new TelemetryBuffer();
    buffer.record(entry(0));
    buffer.clear();
    expect(buffer.toJSONL()).toBe('');
  });

  it('streams entries even when the buffer is disabled', () => {
    const seen: number[] = [];
    const buffer = new TelemetryBuffer(
      { enabled: false },
      { enabled: true, onEntry: (e) => seen.push(e.seq) }
    );
    buffer.record(entry(4));
    expect([seen, buffer.entries()]).toEqual([[4], []]);
  });
});

describe('csvCell()', () => {
  it('joins arrays with dashes', () => {
    expect(csvCell(['A', 'C', 'B'])).toBe('A-C-B');
  });
  it('quotes cells containing commas', () => {
    expect(csvCell('a,b')).toBe('"a,b"');
  });
  it('doubles embedded quotes', () => {
    expect(csvCell('x"y')).toBe('"x""y"');
  });
  it('renders undefined as empty', () => {
    expect(csvCell(undefined)).toBe('');
  });
});
