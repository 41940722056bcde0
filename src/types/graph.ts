/**
 * Resource table and normalized graph type definitions
 */

/**
 * A dependency set as it arrives from an inventory: an ordered list, a JS Set,
 * or a map whose keys are the referenced names
 */
export type DependencyRef = readonly string[] | ReadonlySet<string> | Readonly<Record<string, unknown>>;

/**
 * Raw resource record. Every field is optional; unknown fields (ip, tags, vlan,
 * owner...) are carried along and ignored by the engine.
 */
export interface RawResource {
  host?: string;
  node?: string;
  cores?: number;
  memory?: number; // MB
  disk?: number; // GB
  cores_total?: number;
  memory_total?: number; // MB
  storage_total?: number; // GB
  depends?: DependencyRef;
  depends_on?: DependencyRef;
  priority?: number;
  replica?: string;
  replica_of?: string;
  [field: string]: unknown;
}

/**
 * Resource table keyed by unique resource name. Iteration order is the input order.
 */
export type ResourceTable =
  | Readonly<Record<string, RawResource>>
  | ReadonlyMap<string, RawResource>;

export interface Demand {
  cores: number;
  memory: number; // MB
  disk: number; // GB
}

export interface CapacityTotals {
  coresTotal: number;
  memoryTotalMB: number;
  storageTotalGB: number;
}

export const DEFAULT_PRIORITY = 5;

export interface NormalizedResource {
  name: string;
  /** '' when the resource declares no host */
  hostNode: string;
  demand: Demand;
  dependencies: ReadonlySet<string>;
  /** Present when the record carries any capacity field */
  capacity?: CapacityTotals;
  replica: string;
  replicaOf: string;
  priority: number;
}
