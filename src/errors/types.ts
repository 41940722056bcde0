/**
 * Error types and error codes for the InfraGraph MCP server
 */

export enum ErrorCode {
  // General errors (1000-1999)
  CONFIGURATION_ERROR = 1002,

  // MCP Protocol errors (2000-2999)
  MCP_UNSUPPORTED_TRANSPORT = 2001,

  // Inventory errors (3000-3999)
  INVENTORY_NOT_CONFIGURED = 3000,
  INVENTORY_NOT_FOUND = 3001,
  INVENTORY_PARSE_ERROR = 3002,
  INVENTORY_INVALID = 3003,

  // Resource errors (5000-5999)
  RESOURCE_NOT_FOUND = 5000,

  // Tool errors (6000-6999)
  TOOL_EXECUTION_ERROR = 6000,
  TOOL_INVALID_INPUT = 6001,
}

export enum ErrorSeverity {
  MEDIUM = 'medium',
  HIGH = 'high',
}

export interface ErrorContext {
  [key: string]: unknown;
}
