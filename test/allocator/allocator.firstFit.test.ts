import { FirstFitAllocator } from '../../src/allocator/allocator.firstFit';
import { SpectrumLedger } from '../../src/spectrum/ledger';
import { GraphPathSource, type PathSource } from '../../src/topology/paths';
import { LINK_AB, LINK_AC, LINK_CB, triangleWithSpur } from './fixtures';

describe('FirstFitAllocator', () => {
  describe('Scenario: shortest path has free spectrum at the bottom', () => {
    const graph = triangleWithSpur();
    const ledger = new SpectrumLedger(graph);
    ledger.commit([LINK_AC, LINK_CB], 10, 10);
    const outcome = new FirstFitAllocator(ledger, new GraphPathSource(graph)).allocate({
      source: 'A',
      target: 'B',
      bandwidth: 200,
    });
    it('allocates', () => {
      expect(outcome.status).toBe('allocated');
    });
    it('uses the direct link at offset 0 with 16-QAM sizing', () => {
      expect(
        outcome.status === 'allocated'
          ? [outcome.circuit.path, outcome.circuit.start, outcome.circuit.slots, outcome.circuit.modulation.name]
          : null
      ).toEqual([['A', 'B'], 0, 5, '16-QAM']);
    });
    it('evaluates a single candidate', () => {
      expect(outcome.candidatesEvaluated).toBe(1);
    });
    it('raises the watermark only as far as needed', () => {
      expect(ledger.watermark).toBe(20);
    });
  });

  describe('Scenario: shortest path saturated', () => {
    const graph = triangleWithSpur();
    const ledger = new SpectrumLedger(graph);
    ledger.commit([LINK_AB], 0, ledger.capacity);
    const outcome = new FirstFitAllocator(ledger, new GraphPathSource(graph)).allocate({
      source: 'A',
      target: 'B',
      bandwidth: 100,
    });
    it('blocks for lack of spectrum without trying the detour', () => {
      expect(outcome.status === 'blocked' ? outcome.reason : outcome.status).toBe('no-spectrum');
    });
    it('leaves the detour untouched', () => {
      expect(ledger.linkWatermark(LINK_AC)).toBe(0);
    });
  });

  describe('blocked outcomes', () => {
    const graph = triangleWithSpur();
    it('blocks with no-path across components', () => {
      const ledger = new SpectrumLedger(graph);
      const outcome = new FirstFitAllocator(ledger, new GraphPathSource(graph)).allocate({
        source: 'A',
        target: 'E',
        bandwidth: 100,
      });
      expect(outcome).toEqual({ status: 'blocked', reason: 'no-path', candidatesEvaluated: 0 });
    });
    it('blocks with unresolvable-link when a hop is not a link', () => {
      const ledger = new SpectrumLedger(graph);
      const bogus: PathSource = {
        kShortestPaths: () => [{ nodes: ['A', 'E'], distanceKm: 100, hops: 1 }],
      };
      const outcome = new FirstFitAllocator(ledger, bogus).allocate({
        source: 'A',
        target: 'E',
        bandwidth: 100,
      });
      expect(outcome).toEqual({
        status: 'blocked',
        reason: 'unresolvable-link',
        candidatesEvaluated: 0,
      });
    });
  });
});
