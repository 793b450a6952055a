/**
 * Per-demand decision telemetry for the scheduler.
 *
 * Entries are kept in a bounded in-memory buffer (oldest dropped first) and may
 * additionally be streamed to a callback as they are recorded. Exports produce
 * JSON Lines (one entry per line) or CSV with a fixed column order.
 */
import type { TelemetryEntry } from '../eonsim.types';

export interface TelemetryOptions {
  /** Record entries. Default: true. */
  enabled?: boolean;
  /** Buffer bound. Default: 500. */
  maxEntries?: number;
}

export interface TelemetryStreamOptions {
  enabled: boolean;
  onEntry: (entry: TelemetryEntry) => void;
}

/** Default bound of the in-memory buffer. */
export const DEFAULT_TELEMETRY_MAX_ENTRIES = 500;

/** Column order of the CSV export. */
export const TELEMETRY_CSV_HEADERS: readonly (keyof TelemetryEntry)[] = [
  'seq',
  'source',
  'target',
  'bandwidth',
  'status',
  'reason',
  'mode',
  'candidates',
  'path',
  'start',
  'slots',
  'watermark',
  'utilization',
];

/** Quote a CSV cell when it contains a delimiter, quote or newline. */
export function csvCell(value: unknown): string {
  if (value === undefined || value === null) return '';
  const text = Array.isArray(value) ? value.map(String).join('-') : String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export class TelemetryBuffer {
  private readonly buffer: TelemetryEntry[] = [];
  private readonly enabled: boolean;
  private readonly maxEntries: number;

  constructor(
    options: TelemetryOptions = {},
    private readonly stream?: TelemetryStreamOptions
  ) {
    this.enabled = options.enabled ?? true;
    this.maxEntries = Math.max(0, Math.floor(options.maxEntries ?? DEFAULT_TELEMETRY_MAX_ENTRIES));
  }

  /** Store (when enabled) and stream (when configured) one entry. */
  record(entry: TelemetryEntry) {
    if (this.enabled && this.maxEntries > 0) {
      this.buffer.push(entry);
      if (this.buffer.length > this.maxEntries) this.buffer.shift();
    }
    if (this.stream?.enabled) this.stream.onEntry(entry);
  }

  entries(): TelemetryEntry[] {
    return this.buffer.slice();
  }

  clear() {
    this.buffer.length = 0;
  }

  toJSONL(): string {
    return this.buffer.map((entry) => JSON.stringify(entry)).join('\n');
  }

  /**
   * CSV of the most recent `maxEntries` entries (header row included).
   *
   * @returns empty string when nothing was recorded.
   */
  toCSV(maxEntries = this.maxEntries): string {
    const recent = this.buffer.slice(-Math.max(1, maxEntries));
    if (!recent.length) return '';
    const lines = [TELEMETRY_CSV_HEADERS.join(',')];
    for (const entry of recent)
      lines.push(TELEMETRY_CSV_HEADERS.map((key) => csvCell(entry[key])).join(','));
    return lines.join('\n');
  }
}
