import { ErrorCode, ErrorSeverity, type ErrorContext } from './types.js';

/**
 * Base error class for the InfraGraph MCP server
 * Carries a numeric code, a severity and free-form context
 */
export class InfraGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode,
    severity: ErrorSeverity,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'InfraGraphError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.originalError = originalError;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends InfraGraphError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * MCP protocol / transport errors
 */
export class MCPError extends InfraGraphError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'MCPError';
  }
}

/**
 * Inventory file errors (missing, unreadable or malformed resource tables)
 */
export class InventoryError extends InfraGraphError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.HIGH, context, originalError);
    this.name = 'InventoryError';
  }
}

/**
 * Resource errors
 */
export class ResourceError extends InfraGraphError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'ResourceError';
  }
}

export { ErrorCode, ErrorSeverity, type ErrorContext } from './types.js';
