import { NetworkGraph } from '../../src/topology/graph';
import { NSFNET_NODE_COUNT, createNsfnet } from '../../src/topology/nsfnet';

describe('NetworkGraph', () => {
  describe('addLink()', () => {
    const graph = new NetworkGraph();
    graph.addLink('A', 'B', 100);
    graph.addLink('B', 'C', 250);
    it('numbers links in insertion order', () => {
      expect(graph.links().map((link) => link.index)).toEqual([0, 1]);
    });
    it('looks links up in either direction', () => {
      expect(graph.link('C', 'B')?.index).toBe(1);
    });
    it('registers both endpoints as nodes', () => {
      expect(graph.nodes()).toEqual(['A', 'B', 'C']);
    });
    it('throws on a self loop', () => {
      expect(() => graph.addLink('A', 'A', 10)).toThrow(RangeError);
    });
    it('throws on a non-positive distance', () => {
      expect(() => graph.addLink('A', 'C', 0)).toThrow(RangeError);
    });
  });

  describe('Scenario: re-adding an existing link', () => {
    const graph = new NetworkGraph();
    graph.addLink('A', 'B', 100);
    graph.addLink('B', 'C', 250);
    const updated = graph.addLink('B', 'A', 120);
    it('keeps the original index', () => {
      expect(updated.index).toBe(0);
    });
    it('updates the distance', () => {
      expect(graph.link('A', 'B')?.distanceKm).toBe(120);
    });
    it('does not add a link', () => {
      expect(graph.linkCount).toBe(2);
    });
  });

  describe('pathDistance()', () => {
    const graph = new NetworkGraph();
    graph.addLink(1, 2, 100);
    graph.addLink(2, 3, 50);
    it('sums link distances', () => {
      expect(graph.pathDistance([1, 2, 3])).toBe(150);
    });
    it('is 0 for a single node', () => {
      expect(graph.pathDistance([1])).toBe(0);
    });
    it('is Infinity when a hop is missing', () => {
      expect(graph.pathDistance([1, 3])).toBe(Infinity);
    });
    it('treats numeric and string ids as distinct', () => {
      expect(graph.pathDistance(['1', '2'])).toBe(Infinity);
    });
  });

  describe('connectivity', () => {
    const graph = new NetworkGraph();
    graph.addLink('A', 'B', 10);
    graph.addLink('C', 'D', 10);
    it('finds a path inside a component', () => {
      expect(graph.hasPath('B', 'A')).toBe(true);
    });
    it('finds no path across components', () => {
      expect(graph.hasPath('A', 'D')).toBe(false);
    });
    it('finds no path to an unknown node', () => {
      expect(graph.hasPath('A', 'Z')).toBe(false);
    });
    it('reports the graph as disconnected', () => {
      expect(graph.isConnected()).toBe(false);
    });
  });

  describe('neighbors()', () => {
    const graph = new NetworkGraph();
    graph.addLink('B', 'C', 10);
    graph.addLink('A', 'B', 10);
    it('lists neighbours by link index', () => {
      expect(graph.neighbors('B').map((n) => n.node)).toEqual(['C', 'A']);
    });
    it('is empty for an unknown node', () => {
      expect(graph.neighbors('Z')).toEqual([]);
    });
    it('reports the degree', () => {
      expect(graph.degree('B')).toBe(2);
    });
  });
});

describe('createNsfnet()', () => {
  const graph = createNsfnet();
  const stats = graph.stats();
  it('has 14 nodes', () => {
    expect(stats.nodes).toBe(NSFNET_NODE_COUNT);
  });
  it('has 23 links', () => {
    expect(stats.links).toBe(23);
  });
  it('is connected', () => {
    expect(stats.connected).toBe(true);
  });
  it('reports density 2L / (N(N-1))', () => {
    expect(stats.density).toBeCloseTo(46 / 182, 10);
  });
  it('spans 300 to 4800 km links', () => {
    expect([stats.minDistanceKm, stats.maxDistanceKm]).toEqual([300, 4800]);
  });
  it('keeps the table order for link indices', () => {
    expect(graph.link(13, 12)?.index).toBe(22);
  });
  it('returns independent graphs per call', () => {
    createNsfnet().addLink(0, 13, 100);
    expect(createNsfnet().linkCount).toBe(23);
  });
});
