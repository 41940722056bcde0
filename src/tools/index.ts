/**
 * Tools registry and handlers
 * Central module for all MCP tools
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { AnalysisConfig } from '../config/schema.js';
import { defaultConfig } from '../config/defaults.js';
import { ErrorCode } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import {
  AnalyzeFanInArgsSchema,
  CapacityArgsSchema,
  CheckPlacementArgsSchema,
  CompareCascadesArgsSchema,
  FindSinglePointsOfFailureArgsSchema,
  PlanPlacementsArgsSchema,
  RankBottlenecksArgsSchema,
  ScoreResilienceArgsSchema,
  SimulateCascadeArgsSchema,
  type ToolCallResponse,
  type ToolDescriptor,
} from '../types/tools.js';
import {
  analyzeFanIn,
  findSinglePointsOfFailure,
  rankBottlenecks,
  runCascadeComparison,
  scoreResilience,
  simulateCascade,
} from './dependency.js';
import {
  checkPlacement,
  getClusterCapacity,
  getNodeUtilization,
  planPlacements,
  suggestRebalance,
} from './capacity.js';
import { errorResponse } from './response.js';
import { formatValidationErrors, validateToolArgs } from './validation.js';

interface RegisteredTool {
  descriptor: ToolDescriptor;
  run(args: unknown, defaults: AnalysisConfig): Promise<ToolCallResponse>;
}

/**
 * Pair a descriptor with its argument schema and handler; arguments are
 * validated before the handler sees them
 */
function defineTool<T>(
  descriptor: ToolDescriptor,
  schema: ZodType<T, ZodTypeDef, unknown>,
  handler: (args: T, defaults: AnalysisConfig) => Promise<ToolCallResponse>
): RegisteredTool {
  return {
    descriptor,
    async run(args, defaults) {
      const validation = validateToolArgs(schema, args ?? {});
      if (!validation.success) {
        return errorResponse('Invalid tool arguments', {
          code: ErrorCode.TOOL_INVALID_INPUT,
          details: formatValidationErrors(validation.issues),
        });
      }
      return handler(validation.data, defaults);
    },
  };
}

const resourcesProperty = {
  type: 'object',
  description:
    'Resource table keyed by name. Records may carry host/node, cores/memory (MB)/disk (GB), ' +
    'cores_total/memory_total/storage_total, depends (list) or depends_on (list or map), ' +
    'priority, replica and replica_of.',
  additionalProperties: { type: 'object' },
};

const nodesProperty = {
  type: 'object',
  description:
    'Optional: node table with cores_total/memory_total/storage_total. ' +
    'Defaults to the resources that carry capacity totals.',
  additionalProperties: { type: 'object' },
};

const thresholdProperties = {
  criticalThreshold: {
    type: 'integer',
    description: 'Fan-in at or above which a resource is critical (default: 3)',
  },
  importantThreshold: {
    type: 'integer',
    description: 'Fan-in at or above which a resource is important (default: 1)',
  },
};

const maxWavesProperty = {
  type: 'integer',
  description: 'Maximum number of propagation waves (default: 5)',
  minimum: 0,
  maximum: 100,
};

const capacityThresholdProperties = {
  overloadedPercent: {
    type: 'number',
    description: 'Utilization above which a node is overloaded (default: 80)',
    minimum: 0,
    maximum: 100,
  },
  busyPercent: {
    type: 'number',
    description: 'Utilization above which a node is busy (default: 60)',
    minimum: 0,
    maximum: 100,
  },
};

const demandProperties = {
  cores: { type: 'integer', minimum: 0 },
  memory: { type: 'integer', minimum: 0, description: 'MB' },
  disk: { type: 'integer', minimum: 0, description: 'GB' },
};

const TOOLS: RegisteredTool[] = [
  defineTool(
    {
      name: 'analyze_fan_in',
      description: 'List the resources that depend on a target resource. Returns dependents in input order and their count.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
          target: { type: 'string', description: 'Resource name' },
        },
        required: ['resources', 'target'],
      },
    },
    AnalyzeFanInArgsSchema,
    analyzeFanIn
  ),
  defineTool(
    {
      name: 'rank_bottlenecks',
      description: 'Rank every resource by fan-in and classify critical and important bottlenecks, leaves and roots.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
          ...thresholdProperties,
        },
        required: ['resources'],
      },
    },
    RankBottlenecksArgsSchema,
    rankBottlenecks
  ),
  defineTool(
    {
      name: 'simulate_cascade',
      description: 'Simulate the failure of one resource. Returns the failure waves, total affected, cascade percent and survivors.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
          failed: { type: 'string', description: 'Name of the failed resource' },
          maxWaves: maxWavesProperty,
        },
        required: ['resources', 'failed'],
      },
    },
    SimulateCascadeArgsSchema,
    simulateCascade
  ),
  defineTool(
    {
      name: 'compare_cascades',
      description: 'Run one cascade simulation per target and order them by impact, worst first.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
          targets: { type: 'array', items: { type: 'string' }, minItems: 1 },
          maxWaves: maxWavesProperty,
        },
        required: ['resources', 'targets'],
      },
    },
    CompareCascadesArgsSchema,
    runCascadeComparison
  ),
  defineTool(
    {
      name: 'find_single_points_of_failure',
      description: 'List resources without any replica relationship, highest fan-in first.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
        },
        required: ['resources'],
      },
    },
    FindSinglePointsOfFailureArgsSchema,
    findSinglePointsOfFailure
  ),
  defineTool(
    {
      name: 'score_resilience',
      description: 'Score the dependency graph from 0 to 100 with an assessment and recommendations.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
          ...thresholdProperties,
          maxWaves: maxWavesProperty,
        },
        required: ['resources'],
      },
    },
    ScoreResilienceArgsSchema,
    scoreResilience
  ),
  defineTool(
    {
      name: 'node_utilization',
      description: 'Per-node used/free capacity, utilization percentages and healthy/busy/overloaded status.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
          nodes: nodesProperty,
          ...capacityThresholdProperties,
        },
        required: ['resources'],
      },
    },
    CapacityArgsSchema,
    getNodeUtilization
  ),
  defineTool(
    {
      name: 'cluster_capacity',
      description: 'Cluster-wide capacity totals, usage and overall utilization.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
          nodes: nodesProperty,
          ...capacityThresholdProperties,
        },
        required: ['resources'],
      },
    },
    CapacityArgsSchema,
    getClusterCapacity
  ),
  defineTool(
    {
      name: 'check_placement',
      description: 'Find nodes that can take a resource request, ranked by remaining core headroom.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
          nodes: nodesProperty,
          request: {
            type: 'object',
            properties: demandProperties,
            required: ['cores', 'memory', 'disk'],
          },
          ...capacityThresholdProperties,
        },
        required: ['resources', 'request'],
      },
    },
    CheckPlacementArgsSchema,
    checkPlacement
  ),
  defineTool(
    {
      name: 'plan_placements',
      description: 'Greedily place pending workloads, largest core request first.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
          nodes: nodesProperty,
          pending: {
            type: 'object',
            description: 'Pending workloads keyed by name with cores/memory/disk',
            additionalProperties: { type: 'object', properties: demandProperties },
          },
          cumulative: {
            type: 'boolean',
            description: 'Charge each placement to its node before placing the next (default: false)',
          },
          ...capacityThresholdProperties,
        },
        required: ['resources', 'pending'],
      },
    },
    PlanPlacementsArgsSchema,
    planPlacements
  ),
  defineTool(
    {
      name: 'suggest_rebalance',
      description: 'Suggest moving workloads off overloaded nodes to the fitting node with most headroom.',
      inputSchema: {
        type: 'object',
        properties: {
          resources: resourcesProperty,
          nodes: nodesProperty,
          ...capacityThresholdProperties,
        },
        required: ['resources'],
      },
    },
    CapacityArgsSchema,
    suggestRebalance
  ),
];

/**
 * Get all available MCP tools
 */
export function listAllTools(): ToolDescriptor[] {
  return TOOLS.map(tool => tool.descriptor);
}

/**
 * Call a tool by name. `defaults` supplies thresholds the caller leaves out;
 * a handler failure is logged to `logger` with its stack.
 */
export async function callTool(
  name: string,
  args: unknown,
  defaults: AnalysisConfig = defaultConfig.analysis,
  logger?: Logger
): Promise<ToolCallResponse> {
  const tool = TOOLS.find(t => t.descriptor.name === name);
  if (!tool) {
    return errorResponse(`Unknown tool: ${name}`, {
      availableTools: listAllTools().map(t => t.name),
    });
  }

  try {
    return await tool.run(args, defaults);
  } catch (error) {
    logger?.error(`Tool ${name} failed`, error, { tool: name });
    return errorResponse(`Failed to execute tool ${name}`, {
      message: error instanceof Error ? error.message : String(error),
      code: ErrorCode.TOOL_EXECUTION_ERROR,
    });
  }
}

/**
 * Check if a tool name is valid
 */
export function isValidToolName(name: string): boolean {
  return TOOLS.some(tool => tool.descriptor.name === name);
}
