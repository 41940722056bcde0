/**
 * Resilience scorer
 * Folds bottleneck ranking and cascade impact into a single 0-100 score
 */

import type { GraphModel } from '../graph/model.js';
import type { ResilienceAssessment, ResilienceScore } from '../types/analysis.js';
import {
  bottleneckRank,
  cascade,
  singlePointsOfFailure,
  DEFAULT_CRITICAL_THRESHOLD,
  DEFAULT_IMPORTANT_THRESHOLD,
  DEFAULT_MAX_WAVES,
} from './dependency.js';

export interface ResilienceOptions {
  criticalThreshold?: number;
  importantThreshold?: number;
  maxWaves?: number;
}

const HIGH_CASCADE_IMPACT = 50;
const HOTSPOT_FAN_IN = 5;

function assess(score: number): ResilienceAssessment {
  if (score >= 80) return 'robust';
  if (score >= 60) return 'moderate';
  if (score >= 40) return 'fragile';
  return 'critical';
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Score the graph: 100 minus a penalty for the share of critical resources
 * (doubled) minus the mean cascade percent of those critical resources
 */
export function resilienceScore(graph: GraphModel, options: ResilienceOptions = {}): ResilienceScore {
  const {
    criticalThreshold = DEFAULT_CRITICAL_THRESHOLD,
    importantThreshold = DEFAULT_IMPORTANT_THRESHOLD,
    maxWaves = DEFAULT_MAX_WAVES,
  } = options;

  const ranking = bottleneckRank(graph, criticalThreshold, importantThreshold);
  const total = graph.size;

  const impacts = ranking.critical.map(
    ({ name }): [string, number] => [name, cascade(graph, name, maxWaves).cascade_percent]
  );
  const impactSum = impacts.reduce((sum, [, impact]) => sum + impact, 0);

  const criticalCount = ranking.critical.length;
  const avgCascadeImpact = criticalCount === 0 ? 0 : impactSum / criticalCount;
  const criticalPenalty = total === 0 ? 0 : (criticalCount / total) * 100 * 2;
  const score = Math.round(Math.min(100, Math.max(0, 100 - criticalPenalty - avgCascadeImpact)));

  const recommendations: string[] = [];
  if (criticalCount > 0) {
    const names = ranking.critical.map(r => r.name).join(', ');
    recommendations.push(`Add redundancy for critical bottlenecks: ${names}`);
  }
  if (avgCascadeImpact > HIGH_CASCADE_IMPACT) {
    recommendations.push(
      `High average cascade impact (${round1(avgCascadeImpact)}%): decouple services from shared dependencies`
    );
  }
  const top = ranking.ranked[0];
  if (top && top.fan_in > HOTSPOT_FAN_IN) {
    recommendations.push(
      `${top.name} has ${top.fan_in} dependents: consider splitting or load-balancing it`
    );
  }

  return {
    score,
    assessment: assess(score),
    details: {
      total_resources: total,
      critical_count: criticalCount,
      critical_resources: ranking.critical.map(r => r.name),
      critical_penalty: round1(criticalPenalty),
      avg_cascade_impact: round1(avgCascadeImpact),
      cascade_impacts: Object.fromEntries(impacts),
      single_points_of_failure: singlePointsOfFailure(graph).length,
      max_fan_in: ranking.summary.max_fan_in,
    },
    recommendations,
  };
}
