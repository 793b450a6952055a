import { NetworkGraph } from '../../src/topology/graph';

/**
 * Triangle A-B, A-C, C-B (100 km each, links 0..2) plus a detached D-E link
 * (index 3) used to raise the global watermark without touching A→B routes.
 */
export function triangleWithSpur(): NetworkGraph {
  const graph = new NetworkGraph();
  graph.addLink('A', 'B', 100);
  graph.addLink('A', 'C', 100);
  graph.addLink('C', 'B', 100);
  graph.addLink('D', 'E', 100);
  return graph;
}

export const LINK_AB = 0;
export const LINK_AC = 1;
export const LINK_CB = 2;
export const LINK_DE = 3;
