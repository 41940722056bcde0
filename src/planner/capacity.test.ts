/**
 * Unit tests for the capacity planner
 */

import { describe, it, expect } from '@jest/globals';
import {
  bestFit,
  canFit,
  clusterCapacity,
  rebalanceSuggestions,
  utilization,
} from './capacity.js';
import { GraphModel } from '../graph/model.js';
import { createNode, createWorkload, graphOf } from '../__tests__/utils.js';

describe('Capacity Planner', () => {
  // pve1 is half full on cores, pve2 is empty
  const nodes = graphOf({ pve1: createNode(64), pve2: createNode(64) });
  const workloads = graphOf({ vm100: createWorkload('pve1', 32) });

  describe('utilization', () => {
    it('should compute used, free and percentages per node', () => {
      const [pve1, pve2] = utilization(nodes, workloads).nodes;

      expect(pve1).toEqual({
        node: 'pve1',
        total: { cores: 64, memory: 131072, disk: 2000 },
        used: { cores: 32, memory: 1024, disk: 10 },
        free: { cores: 32, memory: 130048, disk: 1990 },
        pct: { cores: 50, memory: 0.8, disk: 0.5 },
        status: 'healthy',
        vm_count: 1,
      });
      expect(pve2?.vm_count).toBe(0);
      expect(pve2?.pct).toEqual({ cores: 0, memory: 0, disk: 0 });
    });

    it('should classify busy and overloaded nodes', () => {
      const report = utilization(
        graphOf({ a: createNode(10), b: createNode(10), c: createNode(10) }),
        graphOf({
          vm1: createWorkload('a', 9),
          vm2: createWorkload('b', 7),
          vm3: createWorkload('c', 6),
        })
      );

      expect(report.nodes.map(n => n.status)).toEqual(['overloaded', 'busy', 'healthy']);
      expect(report.alerts).toEqual({ overloaded_nodes: ['a'], busy_nodes: ['b'] });
    });

    it('should classify on the most loaded dimension', () => {
      const report = utilization(
        graphOf({ a: createNode(64, 1000, 2000) }),
        graphOf({ vm1: createWorkload('a', 1, 900) })
      );

      expect(report.nodes[0]?.status).toBe('overloaded');
    });

    it('should honor custom thresholds', () => {
      const report = utilization(
        graphOf({ a: createNode(10) }),
        graphOf({ vm1: createWorkload('a', 7) }),
        { overloadedPercent: 65, busyPercent: 50 }
      );

      expect(report.nodes[0]?.status).toBe('overloaded');
    });

    it('should never report negative free capacity', () => {
      const report = utilization(
        graphOf({ a: createNode(4) }),
        graphOf({ vm1: createWorkload('a', 6) })
      );

      expect(report.nodes[0]?.free.cores).toBe(0);
      expect(report.nodes[0]?.pct.cores).toBe(150);
    });

    it('should attribute workloads declared through the legacy node field', () => {
      const report = utilization(nodes, graphOf({ vm1: { node: 'pve2', cores: 8 } }));

      expect(report.nodes[1]?.used.cores).toBe(8);
    });

    it('should exclude nodes with non-positive totals and warn', () => {
      const report = utilization(
        graphOf({
          good: createNode(8),
          bad: { cores_total: 0, memory_total: 4096, storage_total: 100 },
        }),
        GraphModel.empty()
      );

      expect(report.nodes.map(n => n.node)).toEqual(['good']);
      expect(report.warnings).toEqual([
        {
          node: 'bad',
          code: 'invalid_capacity',
          message: 'Node bad excluded: non-positive capacity (cores_total=0)',
        },
      ]);
    });

    it('should warn about a node record without capacity fields', () => {
      const report = utilization(graphOf({ bare: {} }), GraphModel.empty());

      expect(report.nodes).toEqual([]);
      expect(report.warnings[0]?.message).toBe('Node bare declares no capacity totals');
    });
  });

  describe('clusterCapacity', () => {
    it('should sum totals across valid nodes', () => {
      const result = clusterCapacity(
        nodes,
        graphOf({
          vm100: createWorkload('pve1', 32),
          vm200: createWorkload('pve9', 4),
        })
      );

      expect(result.node_count).toBe(2);
      expect(result.workload_count).toBe(2);
      expect(result.totals).toEqual({ cores: 128, memory: 262144, disk: 4000 });
      expect(result.used).toEqual({ cores: 32, memory: 1024, disk: 10 });
      expect(result.free).toEqual({ cores: 96, memory: 261120, disk: 3990 });
      expect(result.overall_utilization).toEqual({ cores: 25, memory: 0.4, disk: 0.3 });
      expect(result.unassigned_workloads).toEqual(['vm200']);
    });

    it('should report zero utilization without nodes', () => {
      const result = clusterCapacity(GraphModel.empty(), workloads);

      expect(result.node_count).toBe(0);
      expect(result.overall_utilization).toEqual({ cores: 0, memory: 0, disk: 0 });
      expect(result.unassigned_workloads).toEqual(['vm100']);
    });
  });

  describe('canFit', () => {
    it('should rank candidates by headroom', () => {
      const result = canFit(nodes, workloads, { cores: 16, memory: 4096, disk: 100 });

      expect(result.candidates).toEqual([
        { node: 'pve2', cores_after: 25, memory_after: 3.1, disk_after: 5, headroom: 48 },
        { node: 'pve1', cores_after: 75, memory_after: 3.9, disk_after: 5.5, headroom: 16 },
      ]);
      expect(result.best_fit).toBe('pve2');
      expect(result.can_place).toBe(true);
    });

    it('should break equal headroom by node name', () => {
      const result = canFit(
        graphOf({ zeta: createNode(32), alpha: createNode(32) }),
        GraphModel.empty(),
        { cores: 4, memory: 0, disk: 0 }
      );

      expect(result.candidates.map(c => c.node)).toEqual(['alpha', 'zeta']);
    });

    it('should require room in every dimension', () => {
      const result = canFit(nodes, workloads, { cores: 1, memory: 200000, disk: 0 });

      expect(result.candidates).toEqual([]);
      expect(result.best_fit).toBe('');
      expect(result.can_place).toBe(false);
    });

    it('should accept a request that fills a node exactly', () => {
      const result = canFit(nodes, workloads, { cores: 32, memory: 0, disk: 0 });

      expect(result.candidates.map(c => [c.node, c.headroom])).toEqual([
        ['pve2', 32],
        ['pve1', 0],
      ]);
    });
  });

  describe('bestFit', () => {
    const single = graphOf({ pve1: createNode(64) });
    const pending = graphOf({
      w1: createWorkload('', 50),
      w2: createWorkload('', 50),
    });

    it('should evaluate each workload independently by default', () => {
      const plan = bestFit(single, GraphModel.empty(), pending);

      expect(plan.cumulative).toBe(false);
      expect(plan.placements.map(p => [p.workload, p.node, p.headroom])).toEqual([
        ['w1', 'pve1', 14],
        ['w2', 'pve1', 14],
      ]);
      expect(plan.placed_count).toBe(2);
      expect(plan.unplaced).toEqual([]);
    });

    it('should charge earlier placements in cumulative mode', () => {
      const plan = bestFit(single, GraphModel.empty(), pending, { cumulative: true });

      expect(plan.placements[0]).toMatchObject({ workload: 'w1', node: 'pve1', can_place: true });
      expect(plan.placements[1]).toEqual({
        workload: 'w2',
        request: { cores: 50, memory: 1024, disk: 10 },
        node: '',
        can_place: false,
        headroom: 0,
        candidate_count: 0,
      });
      expect(plan.placed_count).toBe(1);
      expect(plan.unplaced).toEqual(['w2']);
    });

    it('should place the largest workloads first', () => {
      const plan = bestFit(
        nodes,
        workloads,
        graphOf({
          small: createWorkload('', 2),
          large: createWorkload('', 40),
          medium: createWorkload('', 8),
        })
      );

      expect(plan.placements.map(p => p.workload)).toEqual(['large', 'medium', 'small']);
      expect(plan.placements[0]).toMatchObject({ node: 'pve2', headroom: 24, candidate_count: 1 });
    });

    it('should spread workloads when cumulative', () => {
      const plan = bestFit(
        nodes,
        GraphModel.empty(),
        graphOf({ a: createWorkload('', 40), b: createWorkload('', 40) }),
        { cumulative: true }
      );

      expect(plan.placements.map(p => p.node)).toEqual(['pve1', 'pve2']);
    });
  });

  describe('rebalanceSuggestions', () => {
    const cluster = graphOf({ pve1: createNode(10), pve2: createNode(64) });

    it('should move workloads off overloaded nodes, lowest priority value first', () => {
      const plan = rebalanceSuggestions(
        cluster,
        graphOf({
          vmA: createWorkload('pve1', 5, 1024, 10, { priority: 3 }),
          vmB: createWorkload('pve1', 4, 1024, 10, { priority: 1 }),
        })
      );

      expect(plan.suggestions).toEqual([
        {
          workload: 'vmB',
          from: 'pve1',
          to: 'pve2',
          priority: 1,
          demand: { cores: 4, memory: 1024, disk: 10 },
          headroom: 60,
        },
        {
          workload: 'vmA',
          from: 'pve1',
          to: 'pve2',
          priority: 3,
          demand: { cores: 5, memory: 1024, disk: 10 },
          headroom: 59,
        },
      ]);
    });

    it('should suggest nothing for a healthy cluster', () => {
      expect(rebalanceSuggestions(nodes, workloads).suggestions).toEqual([]);
    });

    it('should skip workloads no other node can take', () => {
      const plan = rebalanceSuggestions(
        graphOf({ pve1: createNode(10), pve2: createNode(4) }),
        graphOf({ vmA: createWorkload('pve1', 9) })
      );

      expect(plan.suggestions).toEqual([]);
    });
  });

  describe('repeated calls', () => {
    // Workloads depend on each other in a cycle; placement ignores dependencies
    const cyclicWorkloads = graphOf({
      vm100: createWorkload('pve1', 16, 1024, 10, { depends: ['vm101'] }),
      vm101: createWorkload('pve2', 8, 1024, 10, { depends: ['vm100'] }),
    });
    const pending = graphOf({
      batch1: { cores: 24, memory: 2048, disk: 20 },
      batch2: { cores: 24, memory: 2048, disk: 20 },
    });

    it('should return identical results for the same snapshot', () => {
      const plans = [
        () => canFit(nodes, cyclicWorkloads, { cores: 24, memory: 2048, disk: 20 }),
        () => bestFit(nodes, cyclicWorkloads, pending),
        () => bestFit(nodes, cyclicWorkloads, pending, { cumulative: true }),
      ];

      for (const plan of plans) {
        expect(JSON.stringify(plan())).toBe(JSON.stringify(plan()));
      }
    });
  });
});
