import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { ZodError } from 'zod';
import { ConfigSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

type RawSection = Record<string, unknown>;
type RawConfig = Record<keyof Config, RawSection>;

const SECTIONS: ReadonlyArray<keyof Config> = [
  'server',
  'logging',
  'mcp',
  'inventory',
  'analysis',
  'performance',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private raw: RawConfig;
  private config: Config;

  constructor(private readonly configDir: string = join(process.cwd(), 'config')) {
    loadEnv();

    this.raw = {
      server: { ...defaultConfig.server },
      logging: { ...defaultConfig.logging },
      mcp: { ...defaultConfig.mcp },
      inventory: { ...defaultConfig.inventory },
      analysis: { ...defaultConfig.analysis },
      performance: { ...defaultConfig.performance },
    };

    this.loadFromFile();
    this.loadFromEnv();
    this.config = this.validate();
  }

  /**
   * Merge config/default.json over the defaults, section by section
   */
  private loadFromFile(): void {
    const configPath = join(this.configDir, 'default.json');
    if (!existsSync(configPath)) {
      return;
    }

    try {
      const fileConfig: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      if (!isRecord(fileConfig)) {
        console.warn(`Ignoring config file ${configPath}: expected a JSON object`);
        return;
      }
      for (const section of SECTIONS) {
        const value = fileConfig[section];
        if (isRecord(value)) {
          Object.assign(this.raw[section], value);
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Failed to load config file: ${message}`);
    }
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    const env = process.env;
    const { server, logging, mcp, inventory, analysis, performance } = this.raw;

    if (env['NODE_ENV']) {
      server['nodeEnv'] = env['NODE_ENV'];
    }

    // Logging configuration
    if (env['INFRAGRAPH_LOG_LEVEL']) {
      logging['level'] = env['INFRAGRAPH_LOG_LEVEL'];
    }
    if (env['INFRAGRAPH_LOG_FORMAT']) {
      logging['format'] = env['INFRAGRAPH_LOG_FORMAT'];
    }
    if (env['INFRAGRAPH_LOG_DIR']) {
      logging['dir'] = env['INFRAGRAPH_LOG_DIR'];
    }
    if (env['INFRAGRAPH_LOG_MAX_FILES']) {
      logging['maxFiles'] = parseInt(env['INFRAGRAPH_LOG_MAX_FILES'], 10);
    }
    if (env['INFRAGRAPH_LOG_MAX_SIZE']) {
      logging['maxSize'] = env['INFRAGRAPH_LOG_MAX_SIZE'];
    }

    // MCP configuration
    if (env['INFRAGRAPH_SERVER_NAME']) {
      mcp['serverName'] = env['INFRAGRAPH_SERVER_NAME'];
    }
    if (env['INFRAGRAPH_SERVER_VERSION']) {
      mcp['serverVersion'] = env['INFRAGRAPH_SERVER_VERSION'];
    }
    if (env['INFRAGRAPH_TRANSPORT']) {
      mcp['transport'] = env['INFRAGRAPH_TRANSPORT'];
    }

    // Inventory
    if (env['INFRAGRAPH_INVENTORY_PATH']) {
      inventory['path'] = env['INFRAGRAPH_INVENTORY_PATH'];
    }

    // Analysis thresholds
    if (env['INFRAGRAPH_CRITICAL_THRESHOLD']) {
      analysis['criticalThreshold'] = parseInt(env['INFRAGRAPH_CRITICAL_THRESHOLD'], 10);
    }
    if (env['INFRAGRAPH_IMPORTANT_THRESHOLD']) {
      analysis['importantThreshold'] = parseInt(env['INFRAGRAPH_IMPORTANT_THRESHOLD'], 10);
    }
    if (env['INFRAGRAPH_MAX_WAVES']) {
      analysis['maxWaves'] = parseInt(env['INFRAGRAPH_MAX_WAVES'], 10);
    }
    if (env['INFRAGRAPH_OVERLOADED_PERCENT']) {
      analysis['overloadedPercent'] = parseFloat(env['INFRAGRAPH_OVERLOADED_PERCENT']);
    }
    if (env['INFRAGRAPH_BUSY_PERCENT']) {
      analysis['busyPercent'] = parseFloat(env['INFRAGRAPH_BUSY_PERCENT']);
    }
    if (env['INFRAGRAPH_CUMULATIVE_PLACEMENT']) {
      analysis['cumulativePlacement'] = env['INFRAGRAPH_CUMULATIVE_PLACEMENT'] === 'true';
    }

    // Performance configuration
    if (env['INFRAGRAPH_ENABLE_HEALTH_CHECKS']) {
      performance['enableHealthChecks'] = env['INFRAGRAPH_ENABLE_HEALTH_CHECKS'] === 'true';
    }
    if (env['INFRAGRAPH_HEALTH_CHECK_INTERVAL']) {
      performance['healthCheckInterval'] = parseInt(env['INFRAGRAPH_HEALTH_CHECK_INTERVAL'], 10);
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(): Config {
    try {
      return ConfigSchema.parse(this.raw);
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, {
          issues,
        });
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigurationError(
        `Configuration validation failed: ${cause.message}`,
        undefined,
        cause
      );
    }
  }

  public getConfig(): Config {
    return this.config;
  }
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export type { Config, AnalysisConfig } from './schema.js';
