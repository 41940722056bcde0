/**
 * Performance benchmarks for critical operations
 */

import { describe, it, expect } from '@jest/globals';
import { performance } from 'perf_hooks';
import { GraphModel } from '../../src/graph/model.js';
import { bottleneckRank, cascade } from '../../src/analyzers/dependency.js';
import { resilienceScore } from '../../src/analyzers/resilience.js';
import { bestFit, utilization } from '../../src/planner/capacity.js';
import type { RawResource } from '../../src/types/graph.js';

/**
 * Layered service graph: every resource depends on two resources of the layer below
 */
function layeredTable(layers: number, width: number): Record<string, RawResource> {
  const table: Record<string, RawResource> = {};
  for (let layer = 0; layer < layers; layer++) {
    for (let i = 0; i < width; i++) {
      const below = layer === 0 ? [] : [`svc-${layer - 1}-${i}`, `svc-${layer - 1}-${(i + 1) % width}`];
      table[`svc-${layer}-${i}`] = { host: `node-${i % 20}`, cores: 2, memory: 2048, disk: 20, depends: below };
    }
  }
  return table;
}

function nodeTable(count: number): Record<string, RawResource> {
  const table: Record<string, RawResource> = {};
  for (let i = 0; i < count; i++) {
    table[`node-${i}`] = { cores_total: 128, memory_total: 524288, storage_total: 8000 };
  }
  return table;
}

describe('Performance Benchmarks', () => {
  const iterations = 20;
  const graph = GraphModel.fromTable(layeredTable(10, 50));
  const nodes = GraphModel.fromTable(nodeTable(20));

  /**
   * Benchmark helper
   */
  function benchmark(name: string, fn: () => void, maxDurationMs: number): number {
    const times: number[] = [];

    // Warmup
    for (let i = 0; i < 3; i++) {
      fn();
    }

    for (let i = 0; i < iterations; i++) {
      const start = performance.now();
      fn();
      times.push(performance.now() - start);
    }

    const sorted = [...times].sort((a, b) => a - b);
    const avg = times.reduce((a, b) => a + b, 0) / times.length;
    const p95 = sorted[Math.floor(sorted.length * 0.95)] ?? avg;

    console.log(`\n${name}:`);
    console.log(`  Average: ${avg.toFixed(2)}ms`);
    console.log(`  P95: ${p95.toFixed(2)}ms`);

    expect(p95).toBeLessThan(maxDurationMs);

    return avg;
  }

  it('should rank a 500-resource graph in < 50ms (P95)', () => {
    benchmark('Bottleneck Ranking', () => bottleneckRank(graph), 50);
  });

  it('should simulate a full cascade in < 250ms (P95)', () => {
    const result = cascade(graph, 'svc-0-0', 20);
    expect(result.truncated).toBe(false);

    benchmark('Cascade Simulation', () => cascade(graph, 'svc-0-0', 20), 250);
  });

  it('should score resilience in < 1000ms (P95)', () => {
    benchmark('Resilience Scoring', () => resilienceScore(graph), 1000);
  });

  it('should compute utilization in < 50ms (P95)', () => {
    benchmark('Node Utilization', () => utilization(nodes, graph), 50);
  });

  it('should place 100 workloads cumulatively in < 500ms (P95)', () => {
    const pending = GraphModel.fromTable(layeredTable(2, 50));

    benchmark('Cumulative Placement', () => bestFit(nodes, graph, pending, { cumulative: true }), 500);
  });
});
