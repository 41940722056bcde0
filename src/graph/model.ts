/**
 * Graph model
 * Normalized, read-only view over a resource table. Every polymorphic field
 * (host/node, depends/depends_on, demand vs capacity fields) is resolved once
 * here so that analyzers never branch on representation.
 */

import {
  DEFAULT_PRIORITY,
  type CapacityTotals,
  type Demand,
  type DependencyRef,
  type NormalizedResource,
  type RawResource,
  type ResourceTable,
} from '../types/graph.js';

function isNameCollection(ref: DependencyRef): ref is readonly string[] | ReadonlySet<string> {
  return Array.isArray(ref) || ref instanceof Set;
}

function collectNames(ref: DependencyRef | undefined, into: Set<string>): void {
  if (ref === undefined) {
    return;
  }

  const names: Iterable<unknown> = isNameCollection(ref) ? ref : Object.keys(ref);
  for (const name of names) {
    if (typeof name === 'string' && name !== '') {
      into.add(name);
    }
  }
}

function amount(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.max(0, value) : 0;
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Host the resource runs on; `host` takes precedence over the legacy `node` field
 */
export function normalizedHost(resource: RawResource): string {
  const host = text(resource.host);
  return host !== '' ? host : text(resource.node);
}

/**
 * Union of `depends` and `depends_on`, whichever shapes they come in
 */
export function normalizedDependencies(resource: RawResource): ReadonlySet<string> {
  const names = new Set<string>();
  collectNames(resource.depends, names);
  collectNames(resource.depends_on, names);
  return names;
}

export function normalizedDemand(resource: RawResource): Demand {
  return {
    cores: amount(resource.cores),
    memory: amount(resource.memory),
    disk: amount(resource.disk),
  };
}

/**
 * Capacity totals, or undefined when the record carries no capacity field at all.
 * Totals are returned as given (non-positive values are rejected by the planner,
 * not here).
 */
export function normalizedCapacity(resource: RawResource): CapacityTotals | undefined {
  const { cores_total, memory_total, storage_total } = resource;
  if (cores_total === undefined && memory_total === undefined && storage_total === undefined) {
    return undefined;
  }

  const total = (value: unknown): number =>
    typeof value === 'number' && Number.isFinite(value) ? value : 0;

  return {
    coresTotal: total(cores_total),
    memoryTotalMB: total(memory_total),
    storageTotalGB: total(storage_total),
  };
}

export function normalizeResource(name: string, resource: RawResource): NormalizedResource {
  const priority = resource.priority;
  const capacity = normalizedCapacity(resource);

  return {
    name,
    hostNode: normalizedHost(resource),
    demand: normalizedDemand(resource),
    dependencies: normalizedDependencies(resource),
    ...(capacity ? { capacity } : {}),
    replica: text(resource.replica),
    replicaOf: text(resource.replica_of),
    priority:
      typeof priority === 'number' && Number.isFinite(priority) ? priority : DEFAULT_PRIORITY,
  };
}

function isMapTable(table: ResourceTable): table is ReadonlyMap<string, RawResource> {
  return table instanceof Map;
}

function tableEntries(table: ResourceTable): Array<[string, RawResource]> {
  if (isMapTable(table)) {
    return Array.from(table.entries());
  }
  return Object.entries(table);
}

/**
 * Immutable snapshot of normalized resources in input order
 */
export class GraphModel {
  readonly resources: readonly NormalizedResource[];
  private readonly byName: ReadonlyMap<string, NormalizedResource>;

  constructor(resources: readonly NormalizedResource[]) {
    const byName = new Map<string, NormalizedResource>();
    for (const resource of resources) {
      if (!byName.has(resource.name)) {
        byName.set(resource.name, resource);
      }
    }
    this.byName = byName;
    this.resources = Array.from(byName.values());
  }

  static fromTable(table: ResourceTable): GraphModel {
    return new GraphModel(tableEntries(table).map(([name, raw]) => normalizeResource(name, raw)));
  }

  static empty(): GraphModel {
    return new GraphModel([]);
  }

  get size(): number {
    return this.resources.length;
  }

  names(): string[] {
    return this.resources.map(r => r.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): NormalizedResource | undefined {
    return this.byName.get(name);
  }

  /**
   * Split into placement nodes (resources with capacity fields) and workloads (the rest)
   */
  partition(): { nodes: GraphModel; workloads: GraphModel } {
    return {
      nodes: new GraphModel(this.resources.filter(r => r.capacity !== undefined)),
      workloads: new GraphModel(this.resources.filter(r => r.capacity === undefined)),
    };
  }
}
