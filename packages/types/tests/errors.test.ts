import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { BridgeError, toMCPError, toBridgeError, isBridgeError } from '../src/errors.js';

describe('BridgeError', () => {
  it('should create an error with code and message', () => {
    const error = new BridgeError('Test error', 'INTERNAL');
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('INTERNAL');
    expect(error.name).toBe('BridgeError');
  });

  it('should include details if provided', () => {
    const details = { holder: 'worker' };
    const error = new BridgeError('Test error', 'CONFLICT', details);
    expect(error.details).toEqual(details);
  });

  describe('Factory methods', () => {
    it('validation() should create VALIDATION error', () => {
      const error = BridgeError.validation('Invalid input', { field: 'path' });
      expect(error.code).toBe('VALIDATION');
      expect(error.message).toBe('Invalid input');
      expect(error.details).toEqual({ field: 'path' });
    });

    it('notFound() should create NOT_FOUND error', () => {
      const error = BridgeError.notFound('Message', 42);
      expect(error.code).toBe('NOT_FOUND');
      expect(error.message).toBe("Message '42' not found");
      expect(error.details).toEqual({ resource: 'Message', id: 42 });
    });

    it('notFound() should handle missing id', () => {
      const error = BridgeError.notFound('Agent');
      expect(error.message).toBe('Agent not found');
    });

    it('conflict() should create CONFLICT error', () => {
      const error = BridgeError.conflict('Locked', { holder: 'worker' });
      expect(error.code).toBe('CONFLICT');
      expect(error.details).toEqual({ holder: 'worker' });
    });

    it('forbidden() should create FORBIDDEN error', () => {
      const error = BridgeError.forbidden('Not yours');
      expect(error.code).toBe('FORBIDDEN');
      expect(error.message).toBe('Not yours');
    });
  });
});

describe('toBridgeError', () => {
  it('should return BridgeError instances unchanged', () => {
    const error = BridgeError.forbidden('nope');
    expect(toBridgeError(error)).toBe(error);
  });

  it('should turn zod failures into VALIDATION errors', () => {
    const result = z.object({ path: z.string() }).safeParse({});
    expect(result.success).toBe(false);
    if (result.success) return;

    const error = toBridgeError(result.error);
    expect(error.code).toBe('VALIDATION');
    expect(error.message).toBe('Invalid arguments: path: Required');
  });

  it('should wrap plain errors as INTERNAL', () => {
    const error = toBridgeError(new Error('disk full'));
    expect(error.code).toBe('INTERNAL');
    expect(error.message).toBe('disk full');
  });
});

describe('toMCPError', () => {
  it('should convert BridgeError to MCPErrorResponse', () => {
    const mcpError = toMCPError(BridgeError.conflict('src/a.ts is locked by worker'));
    expect(mcpError.isError).toBe(true);
    expect(mcpError.content[0].text).toBe('Error: [CONFLICT] src/a.ts is locked by worker');
  });

  it('should convert standard Error to MCPErrorResponse', () => {
    const mcpError = toMCPError(new Error('Standard error'));
    expect(mcpError.content[0].text).toBe('Error: [INTERNAL] Standard error');
  });

  it('should convert string/unknown to MCPErrorResponse', () => {
    const mcpError = toMCPError('String error');
    expect(mcpError.isError).toBe(true);
    expect(mcpError.content[0].text).toBe('Error: [INTERNAL] String error');
  });
});

describe('isBridgeError', () => {
  it('should return true for BridgeError', () => {
    expect(isBridgeError(new BridgeError('Test', 'INTERNAL'))).toBe(true);
  });

  it('should return false for standard Error', () => {
    expect(isBridgeError(new Error('Test'))).toBe(false);
  });

  it('should filter by code if provided', () => {
    const error = new BridgeError('Test', 'NOT_FOUND');
    expect(isBridgeError(error, 'NOT_FOUND')).toBe(true);
    expect(isBridgeError(error, 'CONFLICT')).toBe(false);
  });
});
