/**
 * Capacity tools
 * Utilization, cluster totals, placement checks, batch placement and rebalancing
 */

import { buildInventory } from '../inventory/index.js';
import { GraphModel } from '../graph/model.js';
import {
  bestFit,
  canFit,
  clusterCapacity,
  rebalanceSuggestions,
  utilization,
} from '../planner/capacity.js';
import type { AnalysisConfig } from '../config/schema.js';
import type { CapacityOptions } from '../types/capacity.js';
import type {
  CapacityArgs,
  CheckPlacementArgs,
  PlanPlacementsArgs,
  ToolCallResponse,
} from '../types/tools.js';
import { jsonResponse } from './response.js';

function capacityOptions(args: CapacityArgs, defaults: AnalysisConfig): CapacityOptions {
  return {
    overloadedPercent: args.overloadedPercent ?? defaults.overloadedPercent,
    busyPercent: args.busyPercent ?? defaults.busyPercent,
  };
}

export async function getNodeUtilization(
  args: CapacityArgs,
  defaults: AnalysisConfig
): Promise<ToolCallResponse> {
  const { nodes, workloads } = buildInventory(args.resources, args.nodes);
  return jsonResponse(utilization(nodes, workloads, capacityOptions(args, defaults)));
}

export async function getClusterCapacity(
  args: CapacityArgs,
  defaults: AnalysisConfig
): Promise<ToolCallResponse> {
  const { nodes, workloads } = buildInventory(args.resources, args.nodes);
  return jsonResponse(clusterCapacity(nodes, workloads, capacityOptions(args, defaults)));
}

export async function checkPlacement(
  args: CheckPlacementArgs,
  defaults: AnalysisConfig
): Promise<ToolCallResponse> {
  const { nodes, workloads } = buildInventory(args.resources, args.nodes);
  return jsonResponse(canFit(nodes, workloads, args.request, capacityOptions(args, defaults)));
}

export async function planPlacements(
  args: PlanPlacementsArgs,
  defaults: AnalysisConfig
): Promise<ToolCallResponse> {
  const { nodes, workloads } = buildInventory(args.resources, args.nodes);
  const pending = GraphModel.fromTable(args.pending);

  return jsonResponse(
    bestFit(nodes, workloads, pending, {
      ...capacityOptions(args, defaults),
      cumulative: args.cumulative ?? defaults.cumulativePlacement,
    })
  );
}

export async function suggestRebalance(
  args: CapacityArgs,
  defaults: AnalysisConfig
): Promise<ToolCallResponse> {
  const { nodes, workloads } = buildInventory(args.resources, args.nodes);
  return jsonResponse(rebalanceSuggestions(nodes, workloads, capacityOptions(args, defaults)));
}
