import { warn } from '../utils/warnings';

/** Node identifier. Numbers and strings are distinct ids (`1` ≠ `'1'`). */
export type NodeId = number | string;

/** An ordered sequence of node ids, origin first. */
export type Path = readonly NodeId[];

/** Undirected, weighted link. `index` is its position in insertion order. */
export interface Link {
  readonly index: number;
  readonly source: NodeId;
  readonly target: NodeId;
  readonly distanceKm: number;
}

/** Neighbour entry returned by {@link NetworkGraph.neighbors}. */
export interface Adjacency {
  readonly node: NodeId;
  readonly link: Link;
}

/** Summary statistics of a topology. */
export interface TopologyStats {
  nodes: number;
  links: number;
  /** `2·L / (N·(N−1))`; 0 for fewer than two nodes. */
  density: number;
  connected: boolean;
  averageDegree: number;
  minDistanceKm: number;
  maxDistanceKm: number;
  totalDistanceKm: number;
}

export interface NetworkGraphOptions {
  /** Warn on duplicate links. Default: false. */
  warnings?: boolean;
}

/**
 * Undirected network graph with a stable link order.
 *
 * Links are numbered in the order they are first added; that numbering is what
 * a {@link SpectrumLedger} uses for its rows, so it never changes once
 * assigned. Adding a link that already exists (in either direction) replaces its
 * distance and keeps its index.
 */
export class NetworkGraph {
  private readonly adjacency = new Map<NodeId, Map<NodeId, Link>>();
  private readonly _links: Link[] = [];
  private readonly warnings: boolean;

  constructor(options: NetworkGraphOptions = {}) {
    this.warnings = options.warnings ?? false;
  }

  /** Add a node (idempotent). */
  addNode(id: NodeId): this {
    if (!this.adjacency.has(id)) this.adjacency.set(id, new Map());
    return this;
  }

  /**
   * Add (or update) the undirected link `a`–`b`.
   *
   * @throws RangeError for self loops or a non-positive / non-finite distance.
   */
  addLink(a: NodeId, b: NodeId, distanceKm: number): Link {
    if (a === b) throw new RangeError(`self loop on node ${String(a)}`);
    if (!Number.isFinite(distanceKm) || distanceKm <= 0)
      throw new RangeError(
        `link ${String(a)}-${String(b)} needs a positive distance (got ${distanceKm})`
      );
    this.addNode(a).addNode(b);
    const existing = this.link(a, b);
    const link: Link = {
      index: existing ? existing.index : this._links.length,
      source: existing ? existing.source : a,
      target: existing ? existing.target : b,
      distanceKm,
    };
    if (existing) {
      warn(
        this.warnings,
        `[graph] duplicate link ${String(a)}-${String(b)}; distance updated to ${distanceKm} km`
      );
      this._links[existing.index] = link;
    } else this._links.push(link);
    this.adjacency.get(a)?.set(b, link);
    this.adjacency.get(b)?.set(a, link);
    return link;
  }

  hasNode(id: NodeId): boolean {
    return this.adjacency.has(id);
  }

  /** Node ids in insertion order. */
  nodes(): NodeId[] {
    return Array.from(this.adjacency.keys());
  }

  /** Links in index order. */
  links(): readonly Link[] {
    return this._links;
  }

  get nodeCount(): number {
    return this.adjacency.size;
  }

  get linkCount(): number {
    return this._links.length;
  }

  /** The link joining `a` and `b` in either direction. */
  link(a: NodeId, b: NodeId): Link | undefined {
    return this.adjacency.get(a)?.get(b);
  }

  /** Neighbours of `id` in link insertion order; empty for unknown nodes. */
  neighbors(id: NodeId): Adjacency[] {
    const row = this.adjacency.get(id);
    if (!row) return [];
    return Array.from(row, ([node, link]) => ({ node, link })).sort(
      (x, y) => x.link.index - y.link.index
    );
  }

  degree(id: NodeId): number {
    return this.adjacency.get(id)?.size ?? 0;
  }

  /**
   * Total distance of a path in km. 0 for paths shorter than two nodes,
   * `Infinity` when some hop is not a link.
   */
  pathDistance(path: Path): number {
    let total = 0;
    for (let i = 0; i + 1 < path.length; i++) {
      const link = this.link(path[i], path[i + 1]);
      if (!link) return Infinity;
      total += link.distanceKm;
    }
    return total;
  }

  /** Whether any path joins `a` and `b` (breadth-first). */
  hasPath(a: NodeId, b: NodeId): boolean {
    if (!this.hasNode(a) || !this.hasNode(b)) return false;
    if (a === b) return true;
    const seen = new Set<NodeId>([a]);
    const queue: NodeId[] = [a];
    while (queue.length) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const { node } of this.neighbors(current)) {
        if (node === b) return true;
        if (!seen.has(node)) {
          seen.add(node);
          queue.push(node);
        }
      }
    }
    return false;
  }

  /** Connected when every node reaches the first one. Empty graphs are not connected. */
  isConnected(): boolean {
    const nodes = this.nodes();
    if (!nodes.length) return false;
    return nodes.every((node) => this.hasPath(nodes[0], node));
  }

  stats(): TopologyStats {
    const n = this.nodeCount;
    const distances = this._links.map((link) => link.distanceKm);
    return {
      nodes: n,
      links: this.linkCount,
      density: n > 1 ? (2 * this.linkCount) / (n * (n - 1)) : 0,
      connected: this.isConnected(),
      averageDegree: n > 0 ? (2 * this.linkCount) / n : 0,
      minDistanceKm: distances.length ? Math.min(...distances) : 0,
      maxDistanceKm: distances.length ? Math.max(...distances) : 0,
      totalDistanceKm: distances.reduce((sum, d) => sum + d, 0),
    };
  }
}
