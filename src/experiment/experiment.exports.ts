/**
 * Text, CSV and JSON renderings of an {@link ExperimentReport}.
 */
import * as path from 'path';
import fs from 'fs-extra';
import { csvCell } from '../scheduler/scheduler.telemetry';
import type { ExperimentReport } from './experiment';

export type ReportFormat = 'text' | 'csv' | 'json';

/** Pad / truncate value to fixed width for a monospace table. */
function cell(value: string | number, width: number): string {
  const s = String(value);
  return s.length >= width ? s.slice(0, width) : s + ' '.repeat(width - s.length);
}

function signed(n: number, digits: number): string {
  return (n >= 0 ? '+' : '') + n.toFixed(digits);
}

/** Monospace summary table: one row per load plus the averaged improvements. */
export function formatExperimentSummary(report: ExperimentReport): string {
  const b = report.baseline.label;
  const c = report.challenger.label;
  const rows: string[] = [];
  rows.push(`Experiment summary (${report.runsPerLoad} runs per load)`);
  rows.push(`Baseline: ${b}  Challenger: ${c}`);
  rows.push('');
  rows.push(
    cell('Load', 6) +
      '  ' +
      cell('Base WM', 10) +
      ' ' +
      cell('Chal WM', 10) +
      ' ' +
      cell('Δ WM', 9) +
      ' ' +
      cell('Base Block', 11) +
      ' ' +
      cell('Chal Block', 11) +
      ' ' +
      'Δ Block'
  );
  rows.push('------  ---------- ---------- --------- ----------- ----------- -------');
  for (const point of report.points)
    rows.push(
      cell(point.load, 6) +
        '  ' +
        cell(point.baseline.watermark.toFixed(2), 10) +
        ' ' +
        cell(point.challenger.watermark.toFixed(2), 10) +
        ' ' +
        cell(signed(point.watermarkImprovement, 2), 9) +
        ' ' +
        cell(point.baseline.blockingProbability.toFixed(4), 11) +
        ' ' +
        cell(point.challenger.blockingProbability.toFixed(4), 11) +
        ' ' +
        signed(point.blockingImprovement, 4)
    );
  rows.push('');
  rows.push(`Average watermark improvement: ${signed(report.averageWatermarkImprovement, 2)} slots`);
  rows.push(`Average blocking improvement: ${signed(report.averageBlockingImprovement, 4)}`);
  return rows.join('\n');
}

export const EXPERIMENT_CSV_HEADERS = [
  'load',
  'baseline',
  'challenger',
  'baselineWatermark',
  'challengerWatermark',
  'watermarkImprovement',
  'baselineBlocking',
  'challengerBlocking',
  'blockingImprovement',
  'baselineUtilization',
  'challengerUtilization',
] as const;

/** One CSV row per load point, header first. */
export function exportExperimentCSV(report: ExperimentReport): string {
  const lines = [EXPERIMENT_CSV_HEADERS.join(',')];
  for (const p of report.points)
    lines.push(
      [
        p.load,
        report.baseline.label,
        report.challenger.label,
        p.baseline.watermark,
        p.challenger.watermark,
        p.watermarkImprovement,
        p.baseline.blockingProbability,
        p.challenger.blockingProbability,
        p.blockingImprovement,
        p.baseline.utilization,
        p.challenger.utilization,
      ]
        .map(csvCell)
        .join(',')
    );
  return lines.join('\n');
}

export function renderExperimentReport(report: ExperimentReport, format: ReportFormat): string {
  switch (format) {
    case 'csv':
      return exportExperimentCSV(report);
    case 'json':
      return JSON.stringify(report, null, 2);
    default:
      return formatExperimentSummary(report);
  }
}

/**
 * Write the report to `filePath`, creating parent directories.
 *
 * @param format Inferred from the extension when omitted (`.csv`, `.json`, else text).
 */
export async function writeExperimentReport(
  report: ExperimentReport,
  filePath: string,
  format?: ReportFormat
): Promise<void> {
  const ext = path.extname(filePath).toLowerCase();
  const resolved: ReportFormat = format ?? (ext === '.csv' ? 'csv' : ext === '.json' ? 'json' : 'text');
  await fs.outputFile(filePath, renderExperimentReport(report, resolved) + '\n', 'utf8');
}
