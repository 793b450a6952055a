import * as path from 'path';
import { parseCliArgs } from '../../scripts/run-experiments';

describe('run-experiments CLI arguments', () => {
  it('parses loads, runs, strategies and ordering', () => {
    expect(
      parseCliArgs(['--loads=50, 100', '--runs=2', '--challenger=min_watermark', '--smart']).experiment
    ).toEqual({
      verbose: false,
      loads: [50, 100],
      runsPerLoad: 2,
      challenger: 'MIN_WATERMARK',
      ordering: 'SMART',
    });
  });
  it('resolves the output path', () => {
    expect(parseCliArgs(['--out=reports/sweep.csv']).out).toBe(path.resolve('reports/sweep.csv'));
  });
  it('enables verbose progress', () => {
    expect(parseCliArgs(['--verbose']).experiment.verbose).toBe(true);
  });
  it('rejects an unknown allocator', () => {
    expect(() => parseCliArgs(['--baseline=FF'])).toThrow('unknown allocator "FF"');
  });
  it('rejects a non-integer run count', () => {
    expect(() => parseCliArgs(['--runs=1.5'])).toThrow('--runs expects a positive integer (got "1.5")');
  });
  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--seed=3'])).toThrow('unknown flag --seed');
  });
});
