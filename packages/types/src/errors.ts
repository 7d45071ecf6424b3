/**
 * Shared error types for consistent error handling across Agent Bridge packages.
 */
import { ZodError } from 'zod';

/**
 * Error codes for categorizing bridge errors
 */
export type BridgeErrorCode =
  | 'VALIDATION'    // Missing or malformed input
  | 'NOT_FOUND'     // Referenced agent, message or memory does not exist
  | 'CONFLICT'      // Lock held by another agent
  | 'FORBIDDEN'     // Caller is not the holder/recipient
  | 'INTERNAL';     // Anything else

/**
 * Custom error class for bridge errors.
 * Carries a code and structured details so both the CLI and the MCP
 * surface can report the same failure.
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: BridgeErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BridgeError';
  }

  /**
   * Create a validation error
   */
  static validation(message: string, details?: Record<string, unknown>): BridgeError {
    return new BridgeError(message, 'VALIDATION', details);
  }

  /**
   * Create a not found error
   */
  static notFound(resource: string, id?: string | number): BridgeError {
    const message = id !== undefined ? `${resource} '${id}' not found` : `${resource} not found`;
    return new BridgeError(message, 'NOT_FOUND', { resource, id });
  }

  static conflict(message: string, details?: Record<string, unknown>): BridgeError {
    return new BridgeError(message, 'CONFLICT', details);
  }

  static forbidden(message: string, details?: Record<string, unknown>): BridgeError {
    return new BridgeError(message, 'FORBIDDEN', details);
  }
}

export type ToolTextContent = { type: 'text'; text: string };

/**
 * Standard MCP tool response format
 */
export type ToolResponse = {
  content: ToolTextContent[];
  isError?: boolean;
};

/**
 * Standard MCP tool error response format
 */
export type MCPErrorResponse = ToolResponse & { isError: true };

/**
 * Normalize anything thrown into a BridgeError.
 * Zod failures become VALIDATION errors listing each issue.
 */
export function toBridgeError(error: unknown): BridgeError {
  if (error instanceof BridgeError) return error;
  if (error instanceof ZodError) {
    const issues = error.issues.map(i => `${i.path.join('.') || 'args'}: ${i.message}`);
    return BridgeError.validation(`Invalid arguments: ${issues.join('; ')}`, { issues });
  }
  if (error instanceof Error) return new BridgeError(error.message, 'INTERNAL');
  return new BridgeError(String(error), 'INTERNAL');
}

/**
 * Convert any error to a standard MCP tool error response
 */
export function toMCPError(error: unknown): MCPErrorResponse {
  const bridgeError = toBridgeError(error);
  return {
    content: [{ type: 'text', text: `Error: [${bridgeError.code}] ${bridgeError.message}` }],
    isError: true
  };
}

/**
 * Check if an error is a BridgeError with a specific code
 */
export function isBridgeError(error: unknown, code?: BridgeErrorCode): error is BridgeError {
  if (!(error instanceof BridgeError)) return false;
  if (code && error.code !== code) return false;
  return true;
}
