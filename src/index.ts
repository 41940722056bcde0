#!/usr/bin/env node

/**
 * InfraGraph MCP Server - Entry Point
 * Dependency-graph resilience and capacity-placement analysis over MCP
 */

import { getConfig } from './config/index.js';
import { getLogger } from './logger/index.js';
import { InfraGraphMCPServer } from './server.js';
import { ConfigurationError } from './errors/index.js';

async function main(): Promise<void> {
  try {
    const config = getConfig();
    const logger = getLogger(config.logging);

    logger.info('Starting InfraGraph MCP Server', {
      version: config.mcp.serverVersion,
      nodeEnv: config.server.nodeEnv,
    });

    const server = new InfraGraphMCPServer(config, logger);
    await server.start();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('Configuration error:', error.message);
      process.exit(1);
    }

    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
