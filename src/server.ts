import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from './logger/index.js';
import type { Config } from './config/schema.js';
import { LifecycleManager } from './lifecycle/index.js';
import { HealthManager, HealthStatus } from './health/index.js';
import { listAllResources, readResource } from './resources/index.js';
import { listAllTools, callTool } from './tools/index.js';
import { loadInventory } from './inventory/index.js';
import { utilization } from './planner/capacity.js';
import { ErrorCode, MCPError } from './errors/index.js';

export interface ServerOptions {
  /** Install process signal handlers (default: true) */
  handleSignals?: boolean;
}

/**
 * InfraGraph MCP Server
 * Exposes the dependency analyzers and capacity planner as MCP tools and
 * inventory reports as MCP resources
 */
export class InfraGraphMCPServer {
  private server: Server;
  private logger: Logger;
  private config: Config;
  private lifecycle: LifecycleManager;
  private health: HealthManager;
  private transport?: Transport;

  constructor(config: Config, logger: Logger, options: ServerOptions = {}) {
    this.config = config;
    this.logger = logger;

    this.server = new Server(
      {
        name: config.mcp.serverName,
        version: config.mcp.serverVersion,
      },
      {
        capabilities: {
          resources: {},
          tools: {},
        },
      }
    );

    this.lifecycle = new LifecycleManager(logger, { handleSignals: options.handleSignals });
    this.health = new HealthManager(logger);

    this.setupLifecycleHooks();
    this.setupHealthChecks();
    this.setupMCPHandlers();
  }

  private setupLifecycleHooks(): void {
    this.lifecycle.onStartup('initialize-server', async () => {
      this.logger.info('Initializing MCP server', {
        name: this.config.mcp.serverName,
        version: this.config.mcp.serverVersion,
        inventory: this.config.inventory.path ?? null,
      });
    });

    this.lifecycle.onStartup('start-health-checks', async () => {
      if (this.config.performance.enableHealthChecks) {
        this.health.startPeriodicChecks(this.config.performance.healthCheckInterval);
      }
    });

    this.lifecycle.onShutdown('stop-health-checks', async () => {
      this.health.stopPeriodicChecks();
    });

    this.lifecycle.onShutdown('close-transport', async () => {
      if (this.transport) {
        this.logger.info('Closing MCP transport');
        await this.server.close();
      }
    });
  }

  private setupHealthChecks(): void {
    this.health.registerCheck(
      'server-alive',
      async () => ({
        status: HealthStatus.HEALTHY,
        message: 'Server is alive',
      }),
      true
    );

    this.health.registerCheck('inventory', async () => {
      const path = this.config.inventory.path;
      if (!path) {
        return { status: HealthStatus.HEALTHY, message: 'No inventory configured' };
      }

      const inventory = loadInventory(path);
      const { warnings } = utilization(inventory.nodes, inventory.workloads);
      return {
        status: warnings.length > 0 ? HealthStatus.DEGRADED : HealthStatus.HEALTHY,
        message: `${inventory.resources.size} resources, ${inventory.nodes.size} nodes`,
        metadata: { warnings },
      };
    });
  }

  private setupMCPHandlers(): void {
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      this.logger.debug('Received list_resources request');
      return { resources: listAllResources(this.config) };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const uri = request.params.uri;
      this.logger.debug('Received read_resource request', { uri });

      try {
        return { contents: readResource(uri, this.config) };
      } catch (error) {
        this.logger.error('Failed to read resource', error, { uri });
        const message = error instanceof Error ? error.message : 'Unknown error';
        throw new Error(`Failed to read resource ${uri}: ${message}`);
      }
    });

    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      this.logger.debug('Received list_tools request');
      return { tools: listAllTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const toolName = request.params.name;
      this.logger.debug('Received call_tool request', { tool: toolName });

      const result = await callTool(toolName, request.params.arguments, this.config.analysis, this.logger);
      if (result.isError) {
        this.logger.warn('Tool call returned an error', { tool: toolName });
      }
      return result;
    });
  }

  /**
   * Start the MCP server on the given transport, or on the configured one
   */
  async start(transport?: Transport): Promise<void> {
    try {
      await this.lifecycle.startup();

      if (transport) {
        this.transport = transport;
      } else if (this.config.mcp.transport === 'stdio') {
        this.logger.info('Starting MCP server with stdio transport');
        this.transport = new StdioServerTransport();
      } else {
        throw new MCPError(
          `Unsupported transport: ${String(this.config.mcp.transport)}`,
          ErrorCode.MCP_UNSUPPORTED_TRANSPORT
        );
      }

      await this.server.connect(this.transport);
      this.logger.info('MCP server started successfully');
    } catch (error) {
      this.logger.error('Failed to start MCP server', error);
      throw error;
    }
  }

  /**
   * Stop health checks and close the transport without exiting the process
   */
  async stop(): Promise<void> {
    this.health.stopPeriodicChecks();
    if (this.transport) {
      await this.server.close();
      this.transport = undefined;
    }
  }

  getHealth(): HealthManager {
    return this.health;
  }
}
