/**
 * Unit tests for the graph model
 */

import { describe, it, expect } from '@jest/globals';
import {
  GraphModel,
  normalizedCapacity,
  normalizedDemand,
  normalizedDependencies,
  normalizedHost,
} from './model.js';
import type { RawResource } from '../types/graph.js';

describe('Graph Model', () => {
  describe('normalizedHost', () => {
    it('should prefer host over node', () => {
      expect(normalizedHost({ host: 'pve1', node: 'pve2' })).toBe('pve1');
    });

    it('should fall back to the legacy node field', () => {
      expect(normalizedHost({ node: 'pve2' })).toBe('pve2');
    });

    it('should fall back to node when host is empty', () => {
      expect(normalizedHost({ host: '', node: 'pve2' })).toBe('pve2');
    });

    it('should return an empty string without either field', () => {
      expect(normalizedHost({})).toBe('');
    });
  });

  describe('normalizedDependencies', () => {
    it('should normalize a list, a Set and a map identically', () => {
      const fromList = normalizedDependencies({ depends: ['dns', 'db'] });
      const fromSet = normalizedDependencies({ depends_on: new Set(['db', 'dns']) });
      const fromMap = normalizedDependencies({ depends_on: { dns: true, db: {} } });

      expect([...fromList].sort()).toEqual(['db', 'dns']);
      expect([...fromSet].sort()).toEqual(['db', 'dns']);
      expect([...fromMap].sort()).toEqual(['db', 'dns']);
    });

    it('should merge depends and depends_on without duplicates', () => {
      const deps = normalizedDependencies({ depends: ['dns', 'db'], depends_on: ['db', 'cache'] });

      expect([...deps]).toEqual(['dns', 'db', 'cache']);
    });

    it('should drop empty names', () => {
      expect(normalizedDependencies({ depends: ['', 'dns'] }).size).toBe(1);
    });

    it('should return an empty set when nothing is declared', () => {
      expect(normalizedDependencies({}).size).toBe(0);
    });
  });

  describe('normalizedDemand', () => {
    it('should default absent fields to zero', () => {
      expect(normalizedDemand({ cores: 4 })).toEqual({ cores: 4, memory: 0, disk: 0 });
    });

    it('should ignore non-numeric values', () => {
      const raw: RawResource = { cores: 2, memory: 2048, disk: 20, ip: '10.0.0.5' };
      expect(normalizedDemand(raw)).toEqual({ cores: 2, memory: 2048, disk: 20 });
    });
  });

  describe('normalizedCapacity', () => {
    it('should be undefined for a resource without capacity fields', () => {
      expect(normalizedCapacity({ cores: 4 })).toBeUndefined();
    });

    it('should keep non-positive totals as given', () => {
      expect(normalizedCapacity({ cores_total: 0, memory_total: 4096 })).toEqual({
        coresTotal: 0,
        memoryTotalMB: 4096,
        storageTotalGB: 0,
      });
    });
  });

  describe('GraphModel', () => {
    it('should keep input order for plain objects', () => {
      const graph = GraphModel.fromTable({ web: {}, dns: {}, api: {} });

      expect(graph.names()).toEqual(['web', 'dns', 'api']);
      expect(graph.size).toBe(3);
    });

    it('should accept a Map table', () => {
      const graph = GraphModel.fromTable(
        new Map<string, RawResource>([
          ['db', { priority: 1 }],
          ['app', { depends: ['db'] }],
        ])
      );

      expect(graph.names()).toEqual(['db', 'app']);
      expect(graph.get('db')?.priority).toBe(1);
      expect(graph.get('app')?.priority).toBe(5);
    });

    it('should not mutate the input table', () => {
      const table: Record<string, RawResource> = { app: { depends: ['db'], node: 'pve1' } };
      const snapshot = JSON.stringify(table);

      GraphModel.fromTable(table);

      expect(JSON.stringify(table)).toBe(snapshot);
    });

    it('should resolve replica markers', () => {
      const graph = GraphModel.fromTable({ db: { replica: 'db2' }, db2: { replica_of: 'db' } });

      expect(graph.get('db')?.replica).toBe('db2');
      expect(graph.get('db2')?.replicaOf).toBe('db');
      expect(graph.get('db')?.replicaOf).toBe('');
    });

    it('should partition nodes and workloads', () => {
      const graph = GraphModel.fromTable({
        pve1: { cores_total: 64, memory_total: 131072, storage_total: 2000 },
        vm1: { host: 'pve1', cores: 4 },
        vm2: { node: 'pve1', cores: 2 },
      });
      const { nodes, workloads } = graph.partition();

      expect(nodes.names()).toEqual(['pve1']);
      expect(workloads.names()).toEqual(['vm1', 'vm2']);
    });

    it('should report absent names', () => {
      const graph = GraphModel.empty();

      expect(graph.has('dns')).toBe(false);
      expect(graph.get('dns')).toBeUndefined();
      expect(graph.size).toBe(0);
    });
  });
});
