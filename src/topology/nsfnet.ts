import { NetworkGraph, type NetworkGraphOptions } from './graph';

/**
 * NSFNET reference topology: 14 nodes (0..13) and 23 undirected links with
 * distances in km. Node `i` corresponds to site `i + 1` of the usual figure.
 */
const NSFNET_LINKS: ReadonlyArray<readonly [number, number, number]> = [
  [0, 1, 2100],
  [0, 2, 3000],
  [0, 6, 4800],
  [1, 2, 1200],
  [1, 3, 1500],
  [2, 5, 3600],
  [3, 4, 1200],
  [3, 6, 3900],
  [4, 5, 2400],
  [4, 6, 1200],
  [5, 6, 2700],
  [5, 9, 2100],
  [5, 8, 3600],
  [6, 7, 1500],
  [7, 8, 1500],
  [7, 10, 1500],
  [8, 9, 1500],
  [8, 11, 600],
  [8, 12, 600],
  [8, 13, 600],
  [10, 11, 1200],
  [11, 12, 600],
  [12, 13, 300],
];

export const NSFNET_NODE_COUNT = 14;

/** Build a fresh NSFNET graph. Link indices follow the table order above. */
export function createNsfnet(options: NetworkGraphOptions = {}): NetworkGraph {
  const graph = new NetworkGraph(options);
  for (let node = 0; node < NSFNET_NODE_COUNT; node++) graph.addNode(node);
  for (const [a, b, km] of NSFNET_LINKS) graph.addLink(a, b, km);
  return graph;
}
