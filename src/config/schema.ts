import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export const TransportSchema = z.enum(['stdio']);

export const ServerConfigSchema = z.object({
  nodeEnv: NodeEnvSchema.default('development'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('json'),
  dir: z.string().default('./logs'),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z.string().default('10m'),
});

export const MCPConfigSchema = z.object({
  serverName: z.string().default('infragraph-mcp'),
  serverVersion: z.string().default('0.1.0'),
  transport: TransportSchema.default('stdio'),
});

export const InventoryConfigSchema = z.object({
  path: z.string().min(1).optional(),
});

export const AnalysisConfigSchema = z.object({
  criticalThreshold: z.number().int().default(3),
  importantThreshold: z.number().int().default(1),
  maxWaves: z.number().int().min(0).default(5),
  overloadedPercent: z.number().min(0).max(100).default(80),
  busyPercent: z.number().min(0).max(100).default(60),
  cumulativePlacement: z.boolean().default(false),
});

export const PerformanceConfigSchema = z.object({
  enableHealthChecks: z.boolean().default(true),
  healthCheckInterval: z.number().int().min(1000).default(30000),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  server: ServerConfigSchema,
  logging: LoggingConfigSchema,
  mcp: MCPConfigSchema,
  inventory: InventoryConfigSchema,
  analysis: AnalysisConfigSchema,
  performance: PerformanceConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type Transport = z.infer<typeof TransportSchema>;
export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
