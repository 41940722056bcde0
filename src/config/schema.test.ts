/**
 * Unit tests for configuration schema
 */

import { describe, it, expect } from '@jest/globals';
import {
  AnalysisConfigSchema,
  InventoryConfigSchema,
  LogFormatSchema,
  LogLevelSchema,
  LoggingConfigSchema,
  NodeEnvSchema,
  PerformanceConfigSchema,
  TransportSchema,
} from './schema.js';

describe('Configuration Schema', () => {
  describe('LogLevelSchema', () => {
    it('should accept valid log levels', () => {
      for (const level of ['debug', 'info', 'warn', 'error']) {
        expect(() => LogLevelSchema.parse(level)).not.toThrow();
      }
    });

    it('should reject invalid log levels', () => {
      expect(() => LogLevelSchema.parse('trace')).toThrow();
    });
  });

  describe('LogFormatSchema', () => {
    it('should reject invalid log formats', () => {
      expect(() => LogFormatSchema.parse('xml')).toThrow();
    });
  });

  describe('NodeEnvSchema', () => {
    it('should reject invalid environments', () => {
      expect(() => NodeEnvSchema.parse('staging')).toThrow();
    });
  });

  describe('TransportSchema', () => {
    it('should accept stdio only', () => {
      expect(TransportSchema.parse('stdio')).toBe('stdio');
      expect(() => TransportSchema.parse('http')).toThrow();
    });
  });

  describe('LoggingConfigSchema', () => {
    it('should reject a zero file count', () => {
      expect(() => LoggingConfigSchema.parse({ maxFiles: 0 })).toThrow();
    });
  });

  describe('InventoryConfigSchema', () => {
    it('should make the path optional', () => {
      expect(InventoryConfigSchema.parse({})).toEqual({});
    });

    it('should reject an empty path', () => {
      expect(() => InventoryConfigSchema.parse({ path: '' })).toThrow();
    });
  });

  describe('AnalysisConfigSchema', () => {
    it('should fill in defaults', () => {
      expect(AnalysisConfigSchema.parse({ maxWaves: 2 })).toEqual({
        criticalThreshold: 3,
        importantThreshold: 1,
        maxWaves: 2,
        overloadedPercent: 80,
        busyPercent: 60,
        cumulativePlacement: false,
      });
    });

    it('should reject a negative wave limit', () => {
      expect(() => AnalysisConfigSchema.parse({ maxWaves: -1 })).toThrow();
    });

    it('should reject a fractional threshold', () => {
      expect(() => AnalysisConfigSchema.parse({ criticalThreshold: 2.5 })).toThrow();
    });

    it('should reject percentages above 100', () => {
      expect(() => AnalysisConfigSchema.parse({ busyPercent: 101 })).toThrow();
    });
  });

  describe('PerformanceConfigSchema', () => {
    it('should reject health check intervals under one second', () => {
      expect(() => PerformanceConfigSchema.parse({ healthCheckInterval: 500 })).toThrow();
    });
  });
});
