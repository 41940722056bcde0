/**
 * Dependency analysis and resilience type definitions
 */

export interface FanInResult {
  target: string;
  dependents: string[];
  count: number;
}

export interface RankedResource {
  name: string;
  fan_in: number;
}

export interface BottleneckSummary {
  total_resources: number;
  critical_count: number;
  important_count: number;
  leaf_count: number;
  root_count: number;
  max_fan_in: number;
}

export interface BottleneckRanking {
  ranked: RankedResource[];
  critical: RankedResource[];
  important: RankedResource[];
  /** Resources nothing depends on */
  leaves: string[];
  /** Resources that depend on nothing */
  roots: string[];
  summary: BottleneckSummary;
}

export interface CascadeWave {
  wave: number;
  failed: string[];
}

export interface CascadeResult {
  failed_resource: string;
  waves: CascadeWave[];
  total_affected: number;
  cascade_percent: number;
  survivors: string[];
  /** Propagation stopped at the wave cap while resources were still failing */
  truncated: boolean;
}

export type ResilienceAssessment = 'robust' | 'moderate' | 'fragile' | 'critical';

export interface ResilienceDetails {
  total_resources: number;
  critical_count: number;
  critical_resources: string[];
  critical_penalty: number;
  avg_cascade_impact: number;
  cascade_impacts: Record<string, number>;
  single_points_of_failure: number;
  max_fan_in: number;
}

export interface ResilienceScore {
  score: number;
  assessment: ResilienceAssessment;
  details: ResilienceDetails;
  recommendations: string[];
}
