import { z } from 'zod';

/**
 * Zod schemas for resource tables arriving as JSON (inventory files, tool arguments)
 */

const quantity = z.number().int().nonnegative();

export const DependencyRefSchema = z.union([z.array(z.string()), z.record(z.unknown())]);

export const RawResourceSchema = z
  .object({
    host: z.string().optional(),
    node: z.string().optional(),
    cores: quantity.optional(),
    memory: quantity.optional(),
    disk: quantity.optional(),
    // Non-positive totals are accepted here and reported by the planner
    cores_total: z.number().int().optional(),
    memory_total: z.number().int().optional(),
    storage_total: z.number().int().optional(),
    depends: z.array(z.string()).optional(),
    depends_on: DependencyRefSchema.optional(),
    priority: z.number().int().optional(),
    replica: z.string().optional(),
    replica_of: z.string().optional(),
  })
  .passthrough();

export const ResourceTableSchema = z.record(RawResourceSchema);

export const InventoryFileSchema = z.object({
  resources: ResourceTableSchema,
  nodes: ResourceTableSchema.optional(),
});

export const PlacementRequestSchema = z.object({
  cores: quantity,
  memory: quantity,
  disk: quantity,
});

export type ResourceTableInput = z.infer<typeof ResourceTableSchema>;
export type InventoryFile = z.infer<typeof InventoryFileSchema>;
