/**
 * Library entry point: the graph model, analyzers and planner without the MCP server
 */

export {
  GraphModel,
  normalizeResource,
  normalizedCapacity,
  normalizedDemand,
  normalizedDependencies,
  normalizedHost,
} from './graph/model.js';
export {
  bottleneckRank,
  cascade,
  compareCascades,
  fanIn,
  singlePointsOfFailure,
  DEFAULT_CRITICAL_THRESHOLD,
  DEFAULT_IMPORTANT_THRESHOLD,
  DEFAULT_MAX_WAVES,
} from './analyzers/dependency.js';
export { resilienceScore, type ResilienceOptions } from './analyzers/resilience.js';
export {
  bestFit,
  canFit,
  clusterCapacity,
  rebalanceSuggestions,
  utilization,
  DEFAULT_BUSY_PERCENT,
  DEFAULT_OVERLOADED_PERCENT,
} from './planner/capacity.js';
export { buildInventory, loadInventory, parseInventory, type Inventory } from './inventory/index.js';
export type * from './types/graph.js';
export type * from './types/analysis.js';
export type * from './types/capacity.js';
