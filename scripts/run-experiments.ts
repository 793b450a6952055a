/*
 * Runs the load sweep over NSFNET and prints the summary table.
 * - `--out=<file>` also writes the report (format from extension: .csv, .json, else text)
 * Usage: npm run experiments -- --loads=50,100 --runs=3 --challenger=MIN_WATERMARK --out=reports/sweep.csv
 */
import * as path from 'path';
import { createNsfnet } from '../src/topology/nsfnet';
import type { AllocatorName } from '../src/eonsim.types';
import { runExperiments, type ExperimentOptions } from '../src/experiment/experiment';
import { formatExperimentSummary, writeExperimentReport } from '../src/experiment/experiment.exports';

export interface CliOptions {
  experiment: ExperimentOptions;
  out?: string;
}

const ALLOCATORS: readonly AllocatorName[] = ['SPFF', 'ADAPTIVE', 'MIN_WATERMARK'];

function allocatorName(value: string): AllocatorName {
  const name = ALLOCATORS.find((candidate) => candidate === value.toUpperCase());
  if (!name) throw new Error(`unknown allocator "${value}" (expected ${ALLOCATORS.join(', ')})`);
  return name;
}

function positiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new Error(`--${flag} expects a positive integer (got "${value}")`);
  return n;
}

/** Parse `--flag=value` arguments; unknown flags throw. */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const experiment: ExperimentOptions = { verbose: false };
  let out: string | undefined;
  for (const arg of argv) {
    const match = /^--([a-z-]+)(?:=(.*))?$/.exec(arg);
    if (!match) throw new Error(`unexpected argument "${arg}"`);
    const [, flag, value = ''] = match;
    switch (flag) {
      case 'loads':
        experiment.loads = value.split(',').map((v) => positiveInt(flag, v.trim()));
        break;
      case 'runs':
        experiment.runsPerLoad = positiveInt(flag, value);
        break;
      case 'baseline':
        experiment.baseline = allocatorName(value);
        break;
      case 'challenger':
        experiment.challenger = allocatorName(value);
        break;
      case 'smart':
        experiment.ordering = 'SMART';
        break;
      case 'verbose':
        experiment.verbose = true;
        break;
      case 'out':
        if (!value) throw new Error('--out expects a file path');
        out = path.resolve(value);
        break;
      default:
        throw new Error(`unknown flag --${flag}`);
    }
  }
  return { experiment, out };
}

async function main() {
  const { experiment, out } = parseCliArgs(process.argv.slice(2));
  const report = runExperiments(createNsfnet(), experiment);
  console.log(formatExperimentSummary(report));
  if (out) {
    await writeExperimentReport(report, out);
    console.log(`[experiment] report written to ${out}`);
  }
}

if (require.main === module)
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
