/**
 * Dependency-graph tools
 * Fan-in, bottleneck ranking, cascade simulation and resilience scoring
 */

import { GraphModel } from '../graph/model.js';
import {
  bottleneckRank,
  cascade,
  compareCascades,
  fanIn,
  singlePointsOfFailure,
} from '../analyzers/dependency.js';
import { resilienceScore } from '../analyzers/resilience.js';
import type { AnalysisConfig } from '../config/schema.js';
import type {
  AnalyzeFanInArgs,
  CompareCascadesArgs,
  FindSinglePointsOfFailureArgs,
  RankBottlenecksArgs,
  ScoreResilienceArgs,
  SimulateCascadeArgs,
  ToolCallResponse,
} from '../types/tools.js';
import { jsonResponse } from './response.js';

export async function analyzeFanIn(args: AnalyzeFanInArgs): Promise<ToolCallResponse> {
  const graph = GraphModel.fromTable(args.resources);
  return jsonResponse(fanIn(graph, args.target));
}

export async function rankBottlenecks(
  args: RankBottlenecksArgs,
  defaults: AnalysisConfig
): Promise<ToolCallResponse> {
  const graph = GraphModel.fromTable(args.resources);
  return jsonResponse(
    bottleneckRank(
      graph,
      args.criticalThreshold ?? defaults.criticalThreshold,
      args.importantThreshold ?? defaults.importantThreshold
    )
  );
}

export async function simulateCascade(
  args: SimulateCascadeArgs,
  defaults: AnalysisConfig
): Promise<ToolCallResponse> {
  const graph = GraphModel.fromTable(args.resources);
  return jsonResponse(cascade(graph, args.failed, args.maxWaves ?? defaults.maxWaves));
}

export async function runCascadeComparison(
  args: CompareCascadesArgs,
  defaults: AnalysisConfig
): Promise<ToolCallResponse> {
  const graph = GraphModel.fromTable(args.resources);
  const results = compareCascades(graph, args.targets, args.maxWaves ?? defaults.maxWaves);

  return jsonResponse({
    worst: results[0]?.failed_resource ?? '',
    results,
  });
}

export async function findSinglePointsOfFailure(
  args: FindSinglePointsOfFailureArgs
): Promise<ToolCallResponse> {
  const graph = GraphModel.fromTable(args.resources);
  const spof = singlePointsOfFailure(graph);

  return jsonResponse({
    count: spof.length,
    single_points_of_failure: spof,
  });
}

export async function scoreResilience(
  args: ScoreResilienceArgs,
  defaults: AnalysisConfig
): Promise<ToolCallResponse> {
  const graph = GraphModel.fromTable(args.resources);
  return jsonResponse(
    resilienceScore(graph, {
      criticalThreshold: args.criticalThreshold ?? defaults.criticalThreshold,
      importantThreshold: args.importantThreshold ?? defaults.importantThreshold,
      maxWaves: args.maxWaves ?? defaults.maxWaves,
    })
  );
}
