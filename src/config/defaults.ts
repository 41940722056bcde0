import type { Config } from './schema.js';

/**
 * Default configuration values
 * Used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  server: {
    nodeEnv: 'development',
  },
  logging: {
    level: 'info',
    format: 'json',
    dir: './logs',
    maxFiles: 10,
    maxSize: '10m',
  },
  mcp: {
    serverName: 'infragraph-mcp',
    serverVersion: '0.1.0',
    transport: 'stdio',
  },
  inventory: {
    path: undefined,
  },
  analysis: {
    criticalThreshold: 3,
    importantThreshold: 1,
    maxWaves: 5,
    overloadedPercent: 80,
    busyPercent: 60,
    cumulativePlacement: false,
  },
  performance: {
    enableHealthChecks: true,
    healthCheckInterval: 30000,
  },
};
