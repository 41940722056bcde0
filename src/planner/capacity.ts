/**
 * Capacity planner
 * Per-node utilization, candidate search and greedy placement over node
 * capacity totals and the demand of the workloads hosted on them
 */

import type { GraphModel } from '../graph/model.js';
import type { Demand, NormalizedResource } from '../types/graph.js';
import type {
  CapacityOptions,
  CapacityWarning,
  ClusterCapacity,
  FitResult,
  NodeStatus,
  NodeUtilization,
  Placement,
  PlacementCandidate,
  PlacementOptions,
  PlacementPlan,
  PlacementRequest,
  RebalancePlan,
  RebalanceSuggestion,
  UtilizationPercent,
  UtilizationReport,
} from '../types/capacity.js';

export const DEFAULT_OVERLOADED_PERCENT = 80;
export const DEFAULT_BUSY_PERCENT = 60;

interface ValidNode {
  name: string;
  total: Demand;
}

const ZERO: Demand = { cores: 0, memory: 0, disk: 0 };

function add(a: Demand, b: Demand): Demand {
  return { cores: a.cores + b.cores, memory: a.memory + b.memory, disk: a.disk + b.disk };
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function percent(used: number, total: number): number {
  return total > 0 ? round1((used * 100) / total) : 0;
}

function percentOf(used: Demand, total: Demand): UtilizationPercent {
  return {
    cores: percent(used.cores, total.cores),
    memory: percent(used.memory, total.memory),
    disk: percent(used.disk, total.disk),
  };
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Keep nodes whose three capacity totals are positive; report the rest
 */
function validateNodes(nodes: GraphModel): { valid: ValidNode[]; warnings: CapacityWarning[] } {
  const valid: ValidNode[] = [];
  const warnings: CapacityWarning[] = [];

  for (const node of nodes.resources) {
    const capacity = node.capacity;
    if (!capacity) {
      warnings.push({
        node: node.name,
        code: 'invalid_capacity',
        message: `Node ${node.name} declares no capacity totals`,
      });
      continue;
    }

    const dimensions: Array<[string, number]> = [
      ['cores_total', capacity.coresTotal],
      ['memory_total', capacity.memoryTotalMB],
      ['storage_total', capacity.storageTotalGB],
    ];
    const invalid = dimensions.filter(([, value]) => !(value > 0));

    if (invalid.length > 0) {
      const fields = invalid.map(([field, value]) => `${field}=${value}`).join(', ');
      warnings.push({
        node: node.name,
        code: 'invalid_capacity',
        message: `Node ${node.name} excluded: non-positive capacity (${fields})`,
      });
      continue;
    }

    valid.push({
      name: node.name,
      total: {
        cores: capacity.coresTotal,
        memory: capacity.memoryTotalMB,
        disk: capacity.storageTotalGB,
      },
    });
  }

  return { valid, warnings };
}

function classify(used: Demand, total: Demand, options: CapacityOptions): NodeStatus {
  const overloaded = options.overloadedPercent ?? DEFAULT_OVERLOADED_PERCENT;
  const busy = options.busyPercent ?? DEFAULT_BUSY_PERCENT;
  const ratios = [
    (used.cores * 100) / total.cores,
    (used.memory * 100) / total.memory,
    (used.disk * 100) / total.disk,
  ];

  if (ratios.some(ratio => ratio > overloaded)) return 'overloaded';
  if (ratios.some(ratio => ratio > busy)) return 'busy';
  return 'healthy';
}

/**
 * Utilization of every valid node. `extra` holds demands not (yet) present in
 * the workload table, such as placements made earlier in a cumulative batch.
 */
function computeUtilization(
  valid: readonly ValidNode[],
  workloads: GraphModel,
  options: CapacityOptions,
  extra: ReadonlyMap<string, readonly Demand[]> = new Map()
): NodeUtilization[] {
  const hosted = new Map<string, Demand[]>();
  for (const workload of workloads.resources) {
    if (workload.hostNode === '') continue;
    const demands = hosted.get(workload.hostNode) ?? [];
    demands.push(workload.demand);
    hosted.set(workload.hostNode, demands);
  }

  return valid.map(({ name, total }) => {
    const demands = [...(hosted.get(name) ?? []), ...(extra.get(name) ?? [])];
    const used = demands.reduce(add, ZERO);
    const free: Demand = {
      cores: Math.max(0, total.cores - used.cores),
      memory: Math.max(0, total.memory - used.memory),
      disk: Math.max(0, total.disk - used.disk),
    };

    return {
      node: name,
      total,
      used,
      free,
      pct: percentOf(used, total),
      status: classify(used, total, options),
      vm_count: demands.length,
    };
  });
}

/**
 * Nodes that can absorb `request` in all three dimensions, most headroom first;
 * equal headroom is broken by node name ascending
 */
function findCandidates(
  utilizations: readonly NodeUtilization[],
  request: PlacementRequest
): PlacementCandidate[] {
  return utilizations
    .filter(
      ({ used, total }) =>
        used.cores + request.cores <= total.cores &&
        used.memory + request.memory <= total.memory &&
        used.disk + request.disk <= total.disk
    )
    .map(({ node, used, total, free }) => ({
      node,
      cores_after: percent(used.cores + request.cores, total.cores),
      memory_after: percent(used.memory + request.memory, total.memory),
      disk_after: percent(used.disk + request.disk, total.disk),
      headroom: free.cores - request.cores,
    }))
    .sort((a, b) => b.headroom - a.headroom || compareNames(a.node, b.node));
}

/**
 * Used/free/percentage per node with a healthy/busy/overloaded status
 */
export function utilization(
  nodes: GraphModel,
  workloads: GraphModel,
  options: CapacityOptions = {}
): UtilizationReport {
  const { valid, warnings } = validateNodes(nodes);
  const report = computeUtilization(valid, workloads, options);

  return {
    nodes: report,
    alerts: {
      overloaded_nodes: report.filter(u => u.status === 'overloaded').map(u => u.node),
      busy_nodes: report.filter(u => u.status === 'busy').map(u => u.node),
    },
    warnings,
  };
}

/**
 * Totals, usage and overall utilization across every valid node
 */
export function clusterCapacity(
  nodes: GraphModel,
  workloads: GraphModel,
  options: CapacityOptions = {}
): ClusterCapacity {
  const { valid, warnings } = validateNodes(nodes);
  const report = computeUtilization(valid, workloads, options);
  const nodeNames = new Set(valid.map(node => node.name));

  const totals = report.map(u => u.total).reduce(add, ZERO);
  const used = report.map(u => u.used).reduce(add, ZERO);
  const free = report.map(u => u.free).reduce(add, ZERO);

  return {
    node_count: valid.length,
    workload_count: workloads.size,
    totals,
    used,
    free,
    overall_utilization: percentOf(used, totals),
    unassigned_workloads: workloads.resources
      .filter(workload => !nodeNames.has(workload.hostNode))
      .map(workload => workload.name),
    warnings,
  };
}

/**
 * Nodes that can take `request` given current usage, ranked by headroom
 */
export function canFit(
  nodes: GraphModel,
  workloads: GraphModel,
  request: PlacementRequest,
  options: CapacityOptions = {}
): FitResult {
  const { valid, warnings } = validateNodes(nodes);
  const candidates = findCandidates(computeUtilization(valid, workloads, options), request);

  return {
    request,
    candidates,
    best_fit: candidates[0]?.node ?? '',
    can_place: candidates.length > 0,
    warnings,
  };
}

/**
 * Greedy largest-first placement of pending workloads.
 *
 * By default every workload is evaluated against the current utilization only,
 * so two placements in the same batch can land on a node that cannot hold both.
 * With `cumulative` each placement is charged to its node before the next one.
 */
export function bestFit(
  nodes: GraphModel,
  workloads: GraphModel,
  pending: GraphModel,
  options: PlacementOptions = {}
): PlacementPlan {
  const cumulative = options.cumulative ?? false;
  const { valid, warnings } = validateNodes(nodes);
  const order = [...pending.resources].sort((a, b) => b.demand.cores - a.demand.cores);

  const placed = new Map<string, Demand[]>();
  let report = computeUtilization(valid, workloads, options);
  const placements: Placement[] = [];

  for (const workload of order) {
    const candidates = findCandidates(report, workload.demand);
    const best = candidates[0];

    placements.push({
      workload: workload.name,
      request: workload.demand,
      node: best?.node ?? '',
      can_place: best !== undefined,
      headroom: best?.headroom ?? 0,
      candidate_count: candidates.length,
    });

    if (cumulative && best) {
      const demands = placed.get(best.node) ?? [];
      demands.push(workload.demand);
      placed.set(best.node, demands);
      report = computeUtilization(valid, workloads, options, placed);
    }
  }

  return {
    placements,
    placed_count: placements.filter(p => p.can_place).length,
    unplaced: placements.filter(p => !p.can_place).map(p => p.workload),
    cumulative,
    warnings,
  };
}

/**
 * Move suggestions for workloads on overloaded nodes, lowest priority value first.
 * A workload with no other node able to take it gets no suggestion.
 */
export function rebalanceSuggestions(
  nodes: GraphModel,
  workloads: GraphModel,
  options: CapacityOptions = {}
): RebalancePlan {
  const { valid, warnings } = validateNodes(nodes);
  const report = computeUtilization(valid, workloads, options);
  const overloaded = new Set(report.filter(u => u.status === 'overloaded').map(u => u.node));

  const movable: NormalizedResource[] = workloads.resources
    .filter(workload => overloaded.has(workload.hostNode))
    .sort((a, b) => a.priority - b.priority);

  const suggestions: RebalanceSuggestion[] = [];
  for (const workload of movable) {
    const target = findCandidates(report, workload.demand).find(
      candidate => candidate.node !== workload.hostNode
    );
    if (!target) continue;

    suggestions.push({
      workload: workload.name,
      from: workload.hostNode,
      to: target.node,
      priority: workload.priority,
      demand: workload.demand,
      headroom: target.headroom,
    });
  }

  return { suggestions, warnings };
}
