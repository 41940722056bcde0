/**
 * MCP Tool type definitions
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { PlacementRequestSchema, ResourceTableSchema } from '../inventory/schema.js';

/**
 * Tool descriptor interface
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * Tool call response interface - uses MCP SDK type
 */
export type ToolCallResponse = CallToolResult;

const thresholds = {
  criticalThreshold: z.number().int().optional(),
  importantThreshold: z.number().int().optional(),
};

const capacityThresholds = {
  overloadedPercent: z.number().min(0).max(100).optional(),
  busyPercent: z.number().min(0).max(100).optional(),
};

const maxWaves = z.number().int().min(0).max(100).optional();

export const AnalyzeFanInArgsSchema = z.object({
  resources: ResourceTableSchema,
  target: z.string().min(1),
});

export const RankBottlenecksArgsSchema = z.object({
  resources: ResourceTableSchema,
  ...thresholds,
});

export const SimulateCascadeArgsSchema = z.object({
  resources: ResourceTableSchema,
  failed: z.string().min(1),
  maxWaves,
});

export const CompareCascadesArgsSchema = z.object({
  resources: ResourceTableSchema,
  targets: z.array(z.string().min(1)).min(1),
  maxWaves,
});

export const FindSinglePointsOfFailureArgsSchema = z.object({
  resources: ResourceTableSchema,
});

export const ScoreResilienceArgsSchema = z.object({
  resources: ResourceTableSchema,
  ...thresholds,
  maxWaves,
});

export const CapacityArgsSchema = z.object({
  resources: ResourceTableSchema,
  nodes: ResourceTableSchema.optional(),
  ...capacityThresholds,
});

export const CheckPlacementArgsSchema = CapacityArgsSchema.extend({
  request: PlacementRequestSchema,
});

export const PlanPlacementsArgsSchema = CapacityArgsSchema.extend({
  pending: ResourceTableSchema,
  cumulative: z.boolean().optional(),
});

export type AnalyzeFanInArgs = z.infer<typeof AnalyzeFanInArgsSchema>;
export type RankBottlenecksArgs = z.infer<typeof RankBottlenecksArgsSchema>;
export type SimulateCascadeArgs = z.infer<typeof SimulateCascadeArgsSchema>;
export type CompareCascadesArgs = z.infer<typeof CompareCascadesArgsSchema>;
export type FindSinglePointsOfFailureArgs = z.infer<typeof FindSinglePointsOfFailureArgsSchema>;
export type ScoreResilienceArgs = z.infer<typeof ScoreResilienceArgsSchema>;
export type CapacityArgs = z.infer<typeof CapacityArgsSchema>;
export type CheckPlacementArgs = z.infer<typeof CheckPlacementArgsSchema>;
export type PlanPlacementsArgs = z.infer<typeof PlanPlacementsArgsSchema>;
