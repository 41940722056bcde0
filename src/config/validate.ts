#!/usr/bin/env node

/**
 * Configuration Validation Script
 * Validates the configuration (and the configured inventory, if any) without starting the server
 */

import { getConfig } from './index.js';
import { loadInventory } from '../inventory/index.js';

try {
  console.log('Validating configuration...');
  const config = getConfig();
  console.log('Configuration is valid!');
  console.log('\nConfiguration:');
  console.log(JSON.stringify(config, null, 2));

  if (config.inventory.path) {
    const inventory = loadInventory(config.inventory.path);
    console.log(
      `\nInventory ${config.inventory.path}: ${inventory.resources.size} resources, ` +
        `${inventory.nodes.size} nodes`
    );
  }
  process.exit(0);
} catch (error) {
  console.error('Configuration validation failed:');
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}
