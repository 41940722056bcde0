import type { Logger } from '../logger/index.js';

/**
 * Health check system
 * Aggregates named checks into an overall server status
 */

export enum HealthStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNHEALTHY = 'unhealthy',
}

export interface HealthCheck {
  name: string;
  checker: () => Promise<HealthCheckResult>;
  /** Failure of a critical check marks the whole server unhealthy */
  critical: boolean;
}

export interface HealthCheckResult {
  status: HealthStatus;
  message?: string;
  metadata?: Record<string, unknown>;
}

export interface SystemHealth {
  status: HealthStatus;
  timestamp: number;
  uptime: number;
  checks: Record<string, HealthCheckResult>;
}

export class HealthManager {
  private logger: Logger;
  private checks: Map<string, HealthCheck> = new Map();
  private startTime: number;
  private checkInterval?: NodeJS.Timeout;

  constructor(logger: Logger) {
    this.logger = logger;
    this.startTime = Date.now();
  }

  registerCheck(name: string, checker: () => Promise<HealthCheckResult>, critical = false): void {
    this.checks.set(name, { name, checker, critical });
    this.logger.debug(`Registered health check: ${name} (critical: ${critical})`);
  }

  /**
   * Run every check. A throwing checker counts as unhealthy.
   */
  async check(): Promise<SystemHealth> {
    const results: Record<string, HealthCheckResult> = {};
    let overallStatus = HealthStatus.HEALTHY;

    for (const [name, check] of this.checks) {
      let result: HealthCheckResult;
      try {
        result = await check.checker();
      } catch (error) {
        this.logger.error(`Health check failed: ${name}`, error);
        result = {
          status: HealthStatus.UNHEALTHY,
          message: error instanceof Error ? error.message : String(error),
        };
      }
      results[name] = result;

      if (result.status === HealthStatus.UNHEALTHY && check.critical) {
        overallStatus = HealthStatus.UNHEALTHY;
      } else if (result.status !== HealthStatus.HEALTHY && overallStatus === HealthStatus.HEALTHY) {
        overallStatus = HealthStatus.DEGRADED;
      }
    }

    return {
      status: overallStatus,
      timestamp: Date.now(),
      uptime: Date.now() - this.startTime,
      checks: results,
    };
  }

  startPeriodicChecks(interval: number): void {
    if (this.checkInterval) {
      this.logger.warn('Periodic health checks already running');
      return;
    }

    this.logger.info(`Starting periodic health checks (interval: ${interval}ms)`);

    this.checkInterval = setInterval(() => {
      this.check()
        .then((health) => {
          if (health.status !== HealthStatus.HEALTHY) {
            this.logger.warn('Server health degraded', { health });
          }
        })
        .catch((error: unknown) => {
          this.logger.error('Periodic health check failed', error);
        });
    }, interval);
    this.checkInterval.unref();
  }

  stopPeriodicChecks(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = undefined;
      this.logger.info('Stopped periodic health checks');
    }
  }

  async isReady(): Promise<boolean> {
    const health = await this.check();
    return health.status !== HealthStatus.UNHEALTHY;
  }
}
