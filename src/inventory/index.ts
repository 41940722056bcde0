/**
 * Inventory loading
 * Turns resource tables (from a JSON file or from tool arguments) into graph models
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { ZodError } from 'zod';
import { GraphModel } from '../graph/model.js';
import type { ResourceTable } from '../types/graph.js';
import { ErrorCode, InventoryError } from '../errors/index.js';
import { InventoryFileSchema } from './schema.js';

export interface Inventory {
  /** Every resource, for dependency analysis */
  resources: GraphModel;
  /** Placement targets */
  nodes: GraphModel;
  /** Resources hosted on the nodes */
  workloads: GraphModel;
}

/**
 * Build graph models from a resource table. Without an explicit node table the
 * nodes are the resources that carry capacity totals. Workloads never include
 * a capacity record or a resource named in the node table.
 */
export function buildInventory(resources: ResourceTable, nodes?: ResourceTable): Inventory {
  const graph = GraphModel.fromTable(resources);
  const { nodes: capacityNodes, workloads } = graph.partition();

  if (nodes) {
    const nodeGraph = GraphModel.fromTable(nodes);
    return {
      resources: graph,
      nodes: nodeGraph,
      workloads: new GraphModel(workloads.resources.filter(r => !nodeGraph.has(r.name))),
    };
  }

  return { resources: graph, nodes: capacityNodes, workloads };
}

/**
 * Validate a parsed inventory document
 */
export function parseInventory(data: unknown, source = 'inventory'): Inventory {
  try {
    const file = InventoryFileSchema.parse(data);
    return buildInventory(file.resources, file.nodes);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new InventoryError(
        `Invalid inventory ${source}: ${issues.join('; ')}`,
        ErrorCode.INVENTORY_INVALID,
        { source, issues },
        error
      );
    }
    throw error;
  }
}

/**
 * Read and validate an inventory JSON file
 */
export function loadInventory(path: string): Inventory {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new InventoryError(`Inventory file not found: ${fullPath}`, ErrorCode.INVENTORY_NOT_FOUND, {
      path: fullPath,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new InventoryError(
      `Failed to parse inventory file ${fullPath}: ${cause.message}`,
      ErrorCode.INVENTORY_PARSE_ERROR,
      { path: fullPath },
      cause
    );
  }

  return parseInventory(data, fullPath);
}

export { InventoryFileSchema, ResourceTableSchema, PlacementRequestSchema } from './schema.js';
