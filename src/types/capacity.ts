/**
 * Capacity planning type definitions
 */

import type { Demand } from './graph.js';

export type NodeStatus = 'healthy' | 'busy' | 'overloaded';

/**
 * Per-dimension percentages, one decimal place
 */
export interface UtilizationPercent {
  cores: number;
  memory: number;
  disk: number;
}

export interface NodeUtilization {
  node: string;
  total: Demand;
  used: Demand;
  /** Never negative, even on an over-committed node */
  free: Demand;
  pct: UtilizationPercent;
  status: NodeStatus;
  vm_count: number;
}

export interface CapacityWarning {
  node: string;
  code: 'invalid_capacity';
  message: string;
}

export interface UtilizationReport {
  nodes: NodeUtilization[];
  alerts: {
    overloaded_nodes: string[];
    busy_nodes: string[];
  };
  warnings: CapacityWarning[];
}

export interface ClusterCapacity {
  node_count: number;
  workload_count: number;
  totals: Demand;
  used: Demand;
  free: Demand;
  overall_utilization: UtilizationPercent;
  /** Workloads whose host is not a valid node */
  unassigned_workloads: string[];
  warnings: CapacityWarning[];
}

/**
 * Placement request; memory in MB, disk in GB
 */
export type PlacementRequest = Demand;

export interface PlacementCandidate {
  node: string;
  /** Projected utilization percentages after placement */
  cores_after: number;
  memory_after: number;
  disk_after: number;
  /** Free cores minus requested cores */
  headroom: number;
}

export interface FitResult {
  request: PlacementRequest;
  candidates: PlacementCandidate[];
  /** '' when nothing fits */
  best_fit: string;
  can_place: boolean;
  warnings: CapacityWarning[];
}

export interface Placement {
  workload: string;
  request: PlacementRequest;
  /** '' when nothing fits */
  node: string;
  can_place: boolean;
  headroom: number;
  candidate_count: number;
}

export interface PlacementPlan {
  placements: Placement[];
  placed_count: number;
  unplaced: string[];
  cumulative: boolean;
  warnings: CapacityWarning[];
}

export interface RebalanceSuggestion {
  workload: string;
  from: string;
  to: string;
  priority: number;
  demand: Demand;
  headroom: number;
}

export interface RebalancePlan {
  suggestions: RebalanceSuggestion[];
  warnings: CapacityWarning[];
}

export interface CapacityOptions {
  /** A node is overloaded when any dimension exceeds this percentage (default 80) */
  overloadedPercent?: number;
  /** A node is busy when any dimension exceeds this percentage (default 60) */
  busyPercent?: number;
}

export interface PlacementOptions extends CapacityOptions {
  /** Charge each placement to its node before evaluating the next one */
  cumulative?: boolean;
}
