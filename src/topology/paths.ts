/**
 * Path ranking over a {@link NetworkGraph}.
 *
 * - `shortestPath`: Dijkstra on link distance, with optional node / link
 *   exclusions (used as the spur search inside Yen's algorithm).
 * - `kShortestPaths`: Yen's loopless k-shortest paths, ascending distance.
 *
 * Ties are broken deterministically: nodes are settled in insertion order when
 * their tentative distances are equal, and equal-distance candidate paths keep
 * the order in which they were discovered (fewer hops first).
 *
 * @see {@link https://en.wikipedia.org/wiki/Yen%27s_algorithm|Yen's algorithm - Wikipedia}
 */
import type { NetworkGraph, NodeId, Path } from './graph';

/** A loop-free path with its precomputed length. */
export interface RankedPath {
  readonly nodes: Path;
  readonly distanceKm: number;
  /** Number of links traversed. */
  readonly hops: number;
}

/**
 * Supplies ranked candidate paths for a node pair. Implementations return at
 * most `k` loop-free paths in non-decreasing distance, or `[]` when the pair
 * is disconnected (or not part of the graph).
 */
export interface PathSource {
  kShortestPaths(source: NodeId, target: NodeId, k: number): RankedPath[];
}

/** Elements removed from the graph for one search. */
export interface PathExclusions {
  nodes?: ReadonlySet<NodeId>;
  /** Link indices. */
  links?: ReadonlySet<number>;
}

function rank(graph: NetworkGraph, nodes: NodeId[]): RankedPath {
  return { nodes, distanceKm: graph.pathDistance(nodes), hops: nodes.length - 1 };
}

/**
 * Dijkstra shortest path from `source` to `target`.
 *
 * @returns the path, or `null` when unreachable, unknown, excluded or identical endpoints.
 */
export function shortestPath(
  graph: NetworkGraph,
  source: NodeId,
  target: NodeId,
  exclusions: PathExclusions = {}
): RankedPath | null {
  if (source === target || !graph.hasNode(source) || !graph.hasNode(target))
    return null;
  const removedNodes = exclusions.nodes;
  const removedLinks = exclusions.links;
  if (removedNodes?.has(source) || removedNodes?.has(target)) return null;

  const dist = new Map<NodeId, number>([[source, 0]]);
  const previous = new Map<NodeId, NodeId>();
  const settled = new Set<NodeId>();
  const order = graph.nodes();

  for (;;) {
    // O(V²) selection keeps tie-breaking tied to node insertion order.
    let current: NodeId | undefined;
    let best = Infinity;
    for (const node of order) {
      if (settled.has(node)) continue;
      const d = dist.get(node);
      if (d !== undefined && d < best) {
        best = d;
        current = node;
      }
    }
    if (current === undefined) return null;
    if (current === target) break;
    settled.add(current);
    for (const { node, link } of graph.neighbors(current)) {
      if (settled.has(node) || removedNodes?.has(node)) continue;
      if (removedLinks?.has(link.index)) continue;
      const candidate = best + link.distanceKm;
      const known = dist.get(node);
      if (known === undefined || candidate < known) {
        dist.set(node, candidate);
        previous.set(node, current);
      }
    }
  }

  const nodes: NodeId[] = [target];
  let cursor: NodeId | undefined = previous.get(target);
  while (cursor !== undefined) {
    nodes.push(cursor);
    cursor = previous.get(cursor);
  }
  nodes.reverse();
  return rank(graph, nodes);
}

function samePrefix(path: Path, prefix: Path): boolean {
  if (path.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) if (path[i] !== prefix[i]) return false;
  return true;
}

function samePath(a: Path, b: Path): boolean {
  return a.length === b.length && samePrefix(a, b);
}

/**
 * Yen's k-shortest loopless paths.
 *
 * @returns up to `k` paths ordered by ascending distance (then hops, then
 *   discovery order); `[]` when disconnected or `k < 1`.
 */
export function kShortestPaths(
  graph: NetworkGraph,
  source: NodeId,
  target: NodeId,
  k: number
): RankedPath[] {
  if (!(k >= 1)) return [];
  const first = shortestPath(graph, source, target);
  if (!first) return [];
  const accepted: RankedPath[] = [first];
  const candidates: RankedPath[] = [];

  while (accepted.length < k) {
    const previous = accepted[accepted.length - 1].nodes;
    for (let i = 0; i + 1 < previous.length; i++) {
      const spurNode = previous[i];
      const rootPath = previous.slice(0, i + 1);

      const removedLinks = new Set<number>();
      for (const path of accepted) {
        if (path.nodes.length > i + 1 && samePrefix(path.nodes, rootPath)) {
          const link = graph.link(path.nodes[i], path.nodes[i + 1]);
          if (link) removedLinks.add(link.index);
        }
      }
      const removedNodes = new Set<NodeId>(rootPath.slice(0, -1));

      const spur = shortestPath(graph, spurNode, target, {
        nodes: removedNodes,
        links: removedLinks,
      });
      if (!spur) continue;
      const total = [...rootPath.slice(0, -1), ...spur.nodes];
      const known =
        accepted.some((p) => samePath(p.nodes, total)) ||
        candidates.some((p) => samePath(p.nodes, total));
      if (!known) candidates.push(rank(graph, total));
    }
    if (!candidates.length) break;
    // Stable sort: equal keys keep discovery order.
    candidates.sort((a, b) => a.distanceKm - b.distanceKm || a.hops - b.hops);
    const next = candidates.shift();
    if (!next) break;
    accepted.push(next);
  }
  return accepted;
}

/**
 * {@link PathSource} backed by Yen's algorithm on a graph. Results are cached
 * per `(source, target, k)`; the graph must not change while the source is in use.
 */
export class GraphPathSource implements PathSource {
  private readonly cache = new Map<NodeId, Map<NodeId, Map<number, RankedPath[]>>>();

  constructor(readonly graph: NetworkGraph) {}

  kShortestPaths(source: NodeId, target: NodeId, k: number): RankedPath[] {
    let bySource = this.cache.get(source);
    if (!bySource) this.cache.set(source, (bySource = new Map()));
    let byTarget = bySource.get(target);
    if (!byTarget) bySource.set(target, (byTarget = new Map()));
    const hit = byTarget.get(k);
    if (hit) return hit.slice();
    const paths = kShortestPaths(this.graph, source, target, k);
    byTarget.set(k, paths);
    return paths.slice();
  }
}
