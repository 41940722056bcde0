/**
 * Dependency analyzer
 * Fan-in counting, bottleneck ranking and cascade-failure simulation over a
 * possibly cyclic dependency graph
 */

import type { GraphModel } from '../graph/model.js';
import type { NormalizedResource } from '../types/graph.js';
import type {
  BottleneckRanking,
  CascadeResult,
  CascadeWave,
  FanInResult,
  RankedResource,
} from '../types/analysis.js';

export const DEFAULT_CRITICAL_THRESHOLD = 3;
export const DEFAULT_IMPORTANT_THRESHOLD = 1;
export const DEFAULT_MAX_WAVES = 5;

/**
 * Resources that declare a dependency on `target`, in input order.
 * A target absent from the graph has no dependents.
 */
export function fanIn(graph: GraphModel, target: string): FanInResult {
  if (!graph.has(target)) {
    return { target, dependents: [], count: 0 };
  }

  const dependents = graph.resources
    .filter(resource => resource.dependencies.has(target))
    .map(resource => resource.name);

  return { target, dependents, count: dependents.length };
}

/**
 * Fan-in of every resource in one pass. References to names outside the graph are ignored.
 */
function fanInCounts(graph: GraphModel): Map<string, number> {
  const counts = new Map<string, number>(graph.names().map(name => [name, 0]));

  for (const resource of graph.resources) {
    for (const dependency of resource.dependencies) {
      const current = counts.get(dependency);
      if (current !== undefined) {
        counts.set(dependency, current + 1);
      }
    }
  }

  return counts;
}

function rankByFanIn(graph: GraphModel, counts: Map<string, number>): RankedResource[] {
  // Array.prototype.sort is stable: equal fan-in keeps input order
  return graph.resources
    .map(resource => ({ name: resource.name, fan_in: counts.get(resource.name) ?? 0 }))
    .sort((a, b) => b.fan_in - a.fan_in);
}

/**
 * Rank every resource by fan-in and classify criticality
 */
export function bottleneckRank(
  graph: GraphModel,
  criticalThreshold: number = DEFAULT_CRITICAL_THRESHOLD,
  importantThreshold: number = DEFAULT_IMPORTANT_THRESHOLD
): BottleneckRanking {
  const counts = fanInCounts(graph);
  const ranked = rankByFanIn(graph, counts);

  const critical = ranked.filter(r => r.fan_in >= criticalThreshold);
  const important = ranked.filter(
    r => r.fan_in >= importantThreshold && r.fan_in < criticalThreshold
  );
  const leaves = graph.resources
    .filter(resource => (counts.get(resource.name) ?? 0) === 0)
    .map(resource => resource.name);
  const roots = graph.resources
    .filter(resource => resource.dependencies.size === 0)
    .map(resource => resource.name);

  return {
    ranked,
    critical,
    important,
    leaves,
    roots,
    summary: {
      total_resources: graph.size,
      critical_count: critical.length,
      important_count: important.length,
      leaf_count: leaves.length,
      root_count: roots.length,
      max_fan_in: ranked[0]?.fan_in ?? 0,
    },
  };
}

function dependsOnAny(resource: NormalizedResource, failed: ReadonlySet<string>): boolean {
  for (const dependency of resource.dependencies) {
    if (failed.has(dependency)) {
      return true;
    }
  }
  return false;
}

/**
 * Simulate the failure of one resource as breadth-first waves.
 *
 * Wave 0 is the failed resource; wave k holds every not-yet-failed resource that
 * depends on anything failed in waves 0..k-1. Propagation stops on an empty wave
 * or after `maxWaves` propagation waves, which bounds the walk on cyclic graphs.
 */
export function cascade(
  graph: GraphModel,
  failedResource: string,
  maxWaves: number = DEFAULT_MAX_WAVES
): CascadeResult {
  if (!graph.has(failedResource)) {
    return {
      failed_resource: failedResource,
      waves: [],
      total_affected: 0,
      cascade_percent: 0,
      survivors: graph.names(),
      truncated: false,
    };
  }

  const failed = new Set<string>([failedResource]);
  const waves: CascadeWave[] = [{ wave: 0, failed: [failedResource] }];
  let truncated = false;

  for (let wave = 1; ; wave++) {
    const broken = graph.resources
      .filter(resource => !failed.has(resource.name) && dependsOnAny(resource, failed))
      .map(resource => resource.name);

    if (broken.length === 0) {
      break;
    }
    if (wave > maxWaves) {
      truncated = true;
      break;
    }

    waves.push({ wave, failed: broken });
    broken.forEach(name => failed.add(name));
  }

  const totalAffected = failed.size;

  return {
    failed_resource: failedResource,
    waves,
    total_affected: totalAffected,
    cascade_percent: graph.size === 0 ? 0 : Math.trunc((totalAffected * 100) / graph.size),
    survivors: graph.names().filter(name => !failed.has(name)),
    truncated,
  };
}

/**
 * What-if comparison: one cascade per target, worst first (ties keep target order)
 */
export function compareCascades(
  graph: GraphModel,
  targets: readonly string[],
  maxWaves: number = DEFAULT_MAX_WAVES
): CascadeResult[] {
  return targets
    .map(target => cascade(graph, target, maxWaves))
    .sort((a, b) => b.total_affected - a.total_affected);
}

/**
 * Resources with no replica, not a replica themselves and not named as the
 * `replica_of` of anything else, highest fan-in first
 */
export function singlePointsOfFailure(graph: GraphModel): RankedResource[] {
  const replicated = new Set<string>();
  for (const resource of graph.resources) {
    if (resource.replicaOf !== '') {
      replicated.add(resource.replicaOf);
    }
  }

  const counts = fanInCounts(graph);
  return rankByFanIn(graph, counts).filter(ranked => {
    const resource = graph.get(ranked.name);
    return (
      resource !== undefined &&
      resource.replica === '' &&
      resource.replicaOf === '' &&
      !replicated.has(resource.name)
    );
  });
}
