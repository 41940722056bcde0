/**
 * Resource registry and handlers
 * Reports over the configured inventory file, recomputed on every read
 */

import type { Config } from '../config/schema.js';
import { loadInventory } from '../inventory/index.js';
import { bottleneckRank } from '../analyzers/dependency.js';
import { resilienceScore } from '../analyzers/resilience.js';
import { clusterCapacity, utilization } from '../planner/capacity.js';
import { ErrorCode, InventoryError, ResourceError } from '../errors/index.js';
import {
  InventoryResourceURIs,
  SystemResourceURIs,
  type InventoryResourceURI,
  type ResourceContent,
  type ResourceDescriptor,
} from '../types/resources.js';

const INVENTORY_DESCRIPTORS: ReadonlyArray<Omit<ResourceDescriptor, 'mimeType'>> = [
  {
    uri: InventoryResourceURIs.SUMMARY,
    name: 'Inventory Summary',
    description: 'Resource, node and workload counts with cluster capacity totals',
  },
  {
    uri: InventoryResourceURIs.BOTTLENECKS,
    name: 'Bottleneck Ranking',
    description: 'Fan-in ranking with critical and important bottlenecks',
  },
  {
    uri: InventoryResourceURIs.RESILIENCE,
    name: 'Resilience Score',
    description: 'Resilience score, assessment and recommendations',
  },
  {
    uri: InventoryResourceURIs.UTILIZATION,
    name: 'Node Utilization',
    description: 'Per-node utilization with overloaded and busy alerts',
  },
];

function isInventoryResourceURI(uri: string): uri is InventoryResourceURI {
  return INVENTORY_DESCRIPTORS.some(descriptor => descriptor.uri === uri);
}

/**
 * Get all available MCP resources. Inventory reports are listed only when an
 * inventory path is configured.
 */
export function listAllResources(config: Config): ResourceDescriptor[] {
  const serverInfoResource: ResourceDescriptor = {
    uri: SystemResourceURIs.INFO,
    name: 'Server Information',
    description: 'Basic server information and capabilities',
    mimeType: 'application/json',
  };

  if (!config.inventory.path) {
    return [serverInfoResource];
  }

  return [
    serverInfoResource,
    ...INVENTORY_DESCRIPTORS.map(descriptor => ({ ...descriptor, mimeType: 'application/json' })),
  ];
}

function buildInventoryReport(uri: InventoryResourceURI, config: Config): unknown {
  const path = config.inventory.path;
  if (!path) {
    throw new InventoryError('No inventory path configured', ErrorCode.INVENTORY_NOT_CONFIGURED, {
      uri,
    });
  }

  const inventory = loadInventory(path);
  const { analysis } = config;
  const capacityOptions = {
    overloadedPercent: analysis.overloadedPercent,
    busyPercent: analysis.busyPercent,
  };

  switch (uri) {
    case InventoryResourceURIs.SUMMARY:
      return {
        path,
        resource_count: inventory.resources.size,
        node_count: inventory.nodes.size,
        workload_count: inventory.workloads.size,
        cluster: clusterCapacity(inventory.nodes, inventory.workloads, capacityOptions),
      };

    case InventoryResourceURIs.BOTTLENECKS:
      return bottleneckRank(
        inventory.resources,
        analysis.criticalThreshold,
        analysis.importantThreshold
      );

    case InventoryResourceURIs.RESILIENCE:
      return resilienceScore(inventory.resources, {
        criticalThreshold: analysis.criticalThreshold,
        importantThreshold: analysis.importantThreshold,
        maxWaves: analysis.maxWaves,
      });

    case InventoryResourceURIs.UTILIZATION:
      return utilization(inventory.nodes, inventory.workloads, capacityOptions);
  }
}

/**
 * Read a resource by URI
 */
export function readResource(uri: string, config: Config): ResourceContent[] {
  if (uri === SystemResourceURIs.INFO) {
    return [{
      uri,
      mimeType: 'application/json',
      text: JSON.stringify({
        name: config.mcp.serverName,
        version: config.mcp.serverVersion,
        description: 'Dependency-graph resilience and capacity-placement engine',
        capabilities: {
          resources: true,
          tools: true,
          inventory: Boolean(config.inventory.path),
        },
      }, null, 2),
    }];
  }

  if (isInventoryResourceURI(uri)) {
    return [{
      uri,
      mimeType: 'application/json',
      text: JSON.stringify(buildInventoryReport(uri, config), null, 2),
    }];
  }

  throw new ResourceError(`Unknown resource URI: ${uri}`, ErrorCode.RESOURCE_NOT_FOUND, { uri });
}

/**
 * Check if a URI is a valid resource
 */
export function isValidResourceURI(uri: string): boolean {
  return uri === SystemResourceURIs.INFO || isInventoryResourceURI(uri);
}
