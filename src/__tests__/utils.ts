/**
 * Test utilities and fixtures
 */

import winston from 'winston';
import { GraphModel } from '../graph/model.js';
import { Logger } from '../logger/index.js';
import { defaultConfig } from '../config/defaults.js';
import type { RawResource, ResourceTable } from '../types/graph.js';
import type { CascadeResult } from '../types/analysis.js';
import type { ToolCallResponse } from '../types/tools.js';

/**
 * dns <- web, dns <- api <- cache
 */
export const SERVICE_TABLE: Record<string, RawResource> = {
  dns: { depends: [] },
  web: { depends: ['dns'] },
  api: { depends: ['dns'] },
  cache: { depends: ['api'] },
};

export function graphOf(table: ResourceTable): GraphModel {
  return GraphModel.fromTable(table);
}

/**
 * Node record with capacity totals; memory in MB, storage in GB
 */
export function createNode(cores: number, memoryMB = 131072, storageGB = 2000): RawResource {
  return { cores_total: cores, memory_total: memoryMB, storage_total: storageGB };
}

export function createWorkload(
  host: string,
  cores: number,
  memoryMB = 1024,
  diskGB = 10,
  overrides?: Partial<RawResource>
): RawResource {
  return { host, cores, memory: memoryMB, disk: diskGB, ...overrides };
}

/**
 * Every failed name across the waves, in wave order
 */
export function failedNames(result: CascadeResult): string[] {
  return result.waves.flatMap(wave => wave.failed);
}

/**
 * Parse the JSON text payload of a tool response
 */
export function parseToolJson<T = Record<string, unknown>>(response: ToolCallResponse): T {
  const item = response.content[0];
  if (!item || item.type !== 'text') {
    throw new Error('Expected a text content item');
  }
  return JSON.parse(item.text);
}

/**
 * Logger that discards everything; no console output and no log files
 */
export function createSilentLogger(): Logger {
  return new Logger(defaultConfig.logging, winston.createLogger({ silent: true }));
}
