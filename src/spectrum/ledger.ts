/**
 * SpectrumLedger
 * ==============
 * Per-link slot occupancy for the whole network plus the global watermark.
 *
 * Layout:
 *  - one {@link SlotBitset} per link, rows indexed by the graph's link order;
 *  - `watermark`: 1 + highest occupied slot on any link (0 when empty).
 *
 * Watermark maintenance:
 *  - `commit` raises it to `max(watermark, start + slots)`;
 *  - `release` (and `reset`) recompute it with a full scan of every link.
 *
 * Query operations (`findFirstFit`, `findBestFitPositions`, `linkWatermark`,
 * `utilization`) never mutate. `commit` re-validates every targeted cell, so a
 * stale query result fails cleanly instead of double-booking a slot.
 *
 * Invalid arguments (empty link set, out-of-range link index, non-positive slot
 * count, out-of-range offset) make queries return `null` / `[]` and mutations
 * return `false`, leaving the grid untouched.
 */
import { DEFAULT_CONFIG, type SpectrumConfig } from '../config';
import type { Circuit } from '../eonsim.types';
import type { NetworkGraph, NodeId, Path } from '../topology/graph';
import { SlotBitset } from './bitset';

/** Snapshot returned by {@link SpectrumLedger.stats}. */
export interface LedgerStats {
  linkCount: number;
  capacity: number;
  watermark: number;
  utilization: number;
  occupiedCells: number;
  /** Successful commits since construction / last reset. */
  assignments: number;
}

export class SpectrumLedger {
  readonly config: SpectrumConfig;
  readonly linkCount: number;
  /** Slots per link. */
  readonly capacity: number;
  private readonly rows: SlotBitset[];
  private readonly graph?: NetworkGraph;
  private _watermark = 0;
  private _assignments = 0;

  /**
   * @param topology graph whose link order defines the rows, or a bare link count.
   * @param config engine configuration; `slotCapacity` sets the row width.
   */
  constructor(topology: NetworkGraph | number, config: SpectrumConfig = DEFAULT_CONFIG) {
    this.config = config;
    this.capacity = config.slotCapacity;
    if (typeof topology === 'number') {
      if (!Number.isInteger(topology) || topology < 0)
        throw new RangeError(`link count must be a non-negative integer (got ${topology})`);
      this.linkCount = topology;
    } else {
      this.graph = topology;
      this.linkCount = topology.linkCount;
    }
    this.rows = Array.from({ length: this.linkCount }, () => new SlotBitset(this.capacity));
  }

  /** Global watermark. */
  get watermark(): number {
    return this._watermark;
  }

  /** Successful commits since construction / last reset. */
  get assignments(): number {
    return this._assignments;
  }

  /**
   * Link indices along `path`, resolving each hop in either direction.
   *
   * @returns `null` when the ledger has no graph, the path has fewer than two
   *   nodes, or some hop is not a link.
   */
  linkIndices(path: Path): number[] | null {
    if (!this.graph || path.length < 2) return null;
    const indices: number[] = [];
    for (let i = 0; i + 1 < path.length; i++) {
      const link = this.graph.link(path[i], path[i + 1]);
      if (!link || link.index >= this.linkCount) return null;
      indices.push(link.index);
    }
    return indices;
  }

  /** Endpoints of a link row, when the ledger was built from a graph. */
  linkEndpoints(linkIndex: number): readonly [NodeId, NodeId] | undefined {
    const link = this.graph?.links()[linkIndex];
    return link ? [link.source, link.target] : undefined;
  }

  private validLink(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.linkCount;
  }

  private validLinks(links: readonly number[]): boolean {
    return links.length > 0 && links.every((index) => this.validLink(index));
  }

  private validSlots(slots: number): boolean {
    return Number.isInteger(slots) && slots > 0;
  }

  private validRange(start: number, slots: number): boolean {
    return (
      this.validSlots(slots) &&
      Number.isInteger(start) &&
      start >= 0 &&
      start + slots <= this.capacity
    );
  }

  /** Occupancy of the union of `links` (a slot is set when used on any of them). */
  private unionOf(links: readonly number[]): SlotBitset {
    return SlotBitset.union(
      this.capacity,
      links.map((index) => this.rows[index])
    );
  }

  /**
   * Offsets, ascending, at which `[start, start + slots)` is free on every link
   * (spectrum continuity). Empty for invalid arguments.
   */
  *feasibleOffsets(links: readonly number[], slots: number): Generator<number> {
    if (!this.validLinks(links) || !this.validSlots(slots)) return;
    const occupied = this.unionOf(links);
    let pos = 0;
    while (pos < this.capacity) {
      const runStart = occupied.nextClear(pos);
      if (runStart >= this.capacity) return;
      const runEnd = occupied.nextSet(runStart);
      for (let start = runStart; start + slots <= runEnd; start++) yield start;
      pos = runEnd;
    }
  }

  /**
   * Smallest offset whose window is free on every link of the set.
   *
   * @returns the offset, or `null` when no window fits (or arguments are invalid).
   */
  findFirstFit(links: readonly number[], slots: number): number | null {
    if (!this.validLinks(links) || !this.validSlots(slots)) return null;
    const occupied = this.unionOf(links);
    let pos = 0;
    while (pos < this.capacity) {
      const runStart = occupied.nextClear(pos);
      if (runStart >= this.capacity) return null;
      const runEnd = occupied.nextSet(runStart);
      if (runEnd - runStart >= slots) return runStart;
      pos = runEnd;
    }
    return null;
  }

  /**
   * Up to `maxPositions` feasible offsets ranked by watermark impact.
   *
   * Offsets whose window ends at or below the highest per-link watermark of the
   * set come first, by ascending offset. The rest follow ordered by
   * (watermark increase, resulting watermark, offset).
   */
  findBestFitPositions(
    links: readonly number[],
    slots: number,
    maxPositions: number
  ): number[] {
    if (!(maxPositions >= 1)) return [];
    const current = this.maxLinkWatermark(links);
    const noIncrease: number[] = [];
    const increase: Array<{ start: number; increase: number; resulting: number }> = [];
    for (const start of this.feasibleOffsets(links, slots)) {
      const resulting = Math.max(current, start + slots);
      if (resulting === current) noIncrease.push(start);
      else increase.push({ start, increase: resulting - current, resulting });
    }
    const ranked = noIncrease.slice(0, maxPositions);
    if (ranked.length < maxPositions && increase.length) {
      increase.sort(
        (a, b) =>
          a.increase - b.increase || a.resulting - b.resulting || a.start - b.start
      );
      for (const candidate of increase) {
        if (ranked.length >= maxPositions) break;
        ranked.push(candidate.start);
      }
    }
    return ranked;
  }

  /**
   * Occupy `[start, start + slots)` on every link.
   *
   * Re-checks every cell first; when any is occupied, or arguments are out of
   * range, nothing changes and `false` is returned.
   */
  commit(links: readonly number[], start: number, slots: number): boolean {
    if (!this.validLinks(links) || !this.validRange(start, slots)) return false;
    for (const index of links)
      if (!this.rows[index].isRangeFree(start, slots)) return false;
    for (const index of links) this.rows[index].setRange(start, slots);
    this._watermark = Math.max(this._watermark, start + slots);
    this._assignments++;
    return true;
  }

  /**
   * Free `[start, start + slots)` on every link, then recompute the watermark by
   * scanning all links.
   *
   * @returns `false` (no mutation) for invalid arguments.
   */
  release(links: readonly number[], start: number, slots: number): boolean {
    if (!this.validLinks(links) || !this.validRange(start, slots)) return false;
    for (const index of links) this.rows[index].clearRange(start, slots);
    this.recomputeWatermark();
    return true;
  }

  /** Release exactly the cells held by a committed circuit. */
  releaseCircuit(circuit: Circuit): boolean {
    return this.release(circuit.linkIndices, circuit.start, circuit.slots);
  }

  private recomputeWatermark() {
    let watermark = 0;
    for (const row of this.rows) watermark = Math.max(watermark, row.highestSet() + 1);
    this._watermark = watermark;
  }

  /** Highest occupied slot + 1 on one link; 0 when empty or out of range. */
  linkWatermark(linkIndex: number): number {
    if (!this.validLink(linkIndex)) return 0;
    return this.rows[linkIndex].highestSet() + 1;
  }

  /** Highest per-link watermark across `links` (0 for an empty / invalid set). */
  maxLinkWatermark(links: readonly number[]): number {
    let max = 0;
    for (const index of links) max = Math.max(max, this.linkWatermark(index));
    return max;
  }

  /** Whether `slot` is occupied on `linkIndex`. Out-of-range cells read as free. */
  isOccupied(linkIndex: number, slot: number): boolean {
    return this.validLink(linkIndex) && this.rows[linkIndex].has(slot);
  }

  /** Number of occupied (link, slot) cells. */
  occupiedCells(): number {
    let total = 0;
    for (const row of this.rows) total += row.count();
    return total;
  }

  /** Fraction of all (link, slot) cells occupied. */
  utilization(): number {
    const cells = this.linkCount * this.capacity;
    return cells > 0 ? this.occupiedCells() / cells : 0;
  }

  /** Fraction of one link's slots occupied; 0 when out of range. */
  linkUtilization(linkIndex: number): number {
    if (!this.validLink(linkIndex) || this.capacity === 0) return 0;
    return this.rows[linkIndex].count() / this.capacity;
  }

  /** Occupy every cell (saturated network). */
  fill() {
    for (const row of this.rows) row.fill();
    this.recomputeWatermark();
  }

  /** Free every cell and zero the counters. */
  reset() {
    for (const row of this.rows) row.clear();
    this._watermark = 0;
    this._assignments = 0;
  }

  stats(): LedgerStats {
    const occupiedCells = this.occupiedCells();
    const cells = this.linkCount * this.capacity;
    return {
      linkCount: this.linkCount,
      capacity: this.capacity,
      watermark: this._watermark,
      utilization: cells > 0 ? occupiedCells / cells : 0,
      occupiedCells,
      assignments: this._assignments,
    };
  }

  /**
   * Render the first `maxSlots` cells of the first `maxLinks` rows as `0`/`1`
   * strings, one line per link. Debug aid.
   *
   * @example
   * ledger.describe(2, 8);
   * // link 0 (0-1): 11100000
   * // link 1 (0-2): 00000000
   */
  describe(maxLinks = 5, maxSlots = 10): string {
    const lines: string[] = [];
    const links = Math.min(maxLinks, this.linkCount);
    const slots = Math.min(maxSlots, this.capacity);
    for (let index = 0; index < links; index++) {
      let cells = '';
      for (let slot = 0; slot < slots; slot++) cells += this.rows[index].has(slot) ? '1' : '0';
      const ends = this.linkEndpoints(index);
      const label = ends ? ` (${String(ends[0])}-${String(ends[1])})` : '';
      lines.push(`link ${index}${label}: ${cells}`);
    }
    return lines.join('\n');
  }
}
