/**
 * MCP Resource type definitions
 */

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface ResourceContent {
  uri: string;
  mimeType: string;
  text: string;
}

export const SystemResourceURIs = {
  INFO: 'infragraph://server/info',
} as const;

/**
 * Reports computed over the configured inventory file
 */
export const InventoryResourceURIs = {
  SUMMARY: 'infragraph://inventory/summary',
  BOTTLENECKS: 'infragraph://analysis/bottlenecks',
  RESILIENCE: 'infragraph://analysis/resilience',
  UTILIZATION: 'infragraph://capacity/utilization',
} as const;

export type InventoryResourceURI = (typeof InventoryResourceURIs)[keyof typeof InventoryResourceURIs];
