import { NetworkGraph } from '../../src/topology/graph';
import { createNsfnet } from '../../src/topology/nsfnet';
import { GraphPathSource, kShortestPaths, shortestPath } from '../../src/topology/paths';

/**
 * A-B 1, B-D 1, A-C 2, C-D 2, B-C 1: four loopless A→D routes,
 * one of length 2 and three of length 4.
 */
function diamond(): NetworkGraph {
  const graph = new NetworkGraph();
  graph.addLink('A', 'B', 1);
  graph.addLink('B', 'D', 1);
  graph.addLink('A', 'C', 2);
  graph.addLink('C', 'D', 2);
  graph.addLink('B', 'C', 1);
  return graph;
}

describe('shortestPath()', () => {
  const graph = diamond();
  it('follows the least total distance', () => {
    expect(shortestPath(graph, 'A', 'D')?.nodes).toEqual(['A', 'B', 'D']);
  });
  it('reports distance and hops', () => {
    const path = shortestPath(graph, 'A', 'D');
    expect([path?.distanceKm, path?.hops]).toEqual([2, 2]);
  });
  it('honours excluded links', () => {
    const linkAB = graph.link('A', 'B')?.index ?? -1;
    expect(shortestPath(graph, 'A', 'D', { links: new Set([linkAB]) })?.nodes).toEqual([
      'A',
      'C',
      'D',
    ]);
  });
  it('returns null for identical endpoints', () => {
    expect(shortestPath(graph, 'A', 'A')).toBeNull();
  });
  it('returns null for an unknown node', () => {
    expect(shortestPath(graph, 'A', 'Z')).toBeNull();
  });
  it('returns null when unreachable', () => {
    const split = diamond();
    split.addLink('X', 'Y', 5);
    expect(shortestPath(split, 'A', 'X')).toBeNull();
  });
});

describe('kShortestPaths()', () => {
  const graph = diamond();
  const paths = kShortestPaths(graph, 'A', 'D', 10);
  it('enumerates every loopless route', () => {
    expect(paths.map((p) => p.nodes)).toEqual([
      ['A', 'B', 'D'],
      ['A', 'C', 'D'],
      ['A', 'B', 'C', 'D'],
      ['A', 'C', 'B', 'D'],
    ]);
  });
  it('orders by distance, fewer hops first on ties', () => {
    expect(paths.map((p) => [p.distanceKm, p.hops])).toEqual([
      [2, 2],
      [4, 2],
      [4, 3],
      [4, 3],
    ]);
  });
  it('stops at k', () => {
    expect(kShortestPaths(graph, 'A', 'D', 2)).toHaveLength(2);
  });
  it('returns [] for k < 1', () => {
    expect(kShortestPaths(graph, 'A', 'D', 0)).toEqual([]);
  });

  describe('Scenario: NSFNET pairs', () => {
    const nsfnet = createNsfnet();
    const pairs: Array<[number, number]> = [
      [0, 13],
      [3, 10],
      [2, 12],
      [6, 9],
    ];
    const results = pairs.map(([s, t]) => kShortestPaths(nsfnet, s, t, 5));
    it('returns five routes per pair', () => {
      expect(results.map((r) => r.length)).toEqual([5, 5, 5, 5]);
    });
    it('never revisits a node', () => {
      const looped = results.flat().filter((p) => new Set(p.nodes).size !== p.nodes.length);
      expect(looped).toEqual([]);
    });
    it('returns distances in non-decreasing order', () => {
      const unordered = results.filter((r) =>
        r.some((p, i) => i > 0 && p.distanceKm < r[i - 1].distanceKm)
      );
      expect(unordered).toEqual([]);
    });
    it('never returns the same route twice', () => {
      const duplicated = results.filter(
        (r) => new Set(r.map((p) => p.nodes.join('-'))).size !== r.length
      );
      expect(duplicated).toEqual([]);
    });
    it('starts with the Dijkstra route', () => {
      expect(results[0][0].nodes).toEqual(shortestPath(nsfnet, 0, 13)?.nodes);
    });
  });
});

describe('GraphPathSource', () => {
  const source = new GraphPathSource(diamond());
  it('returns the same ranking on repeated calls', () => {
    const first = source.kShortestPaths('A', 'D', 3).map((p) => p.nodes);
    expect(source.kShortestPaths('A', 'D', 3).map((p) => p.nodes)).toEqual(first);
  });
  it('hands out copies of the cached list', () => {
    source.kShortestPaths('A', 'D', 2).pop();
    expect(source.kShortestPaths('A', 'D', 2)).toHaveLength(2);
  });
  it('returns [] for a disconnected pair', () => {
    expect(source.kShortestPaths('A', 'Q', 3)).toEqual([]);
  });
});
