import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from '../cli-response.ts';
import { ExitCodes } from '../exit-codes.ts';

describe('cli-response', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('createSuccessResponse', () => {
    it('wraps data with command and timestamp', () => {
      expect(createSuccessResponse('stats-overview', { totalCount: 3 })).toEqual({
        command: 'stats-overview',
        data: { totalCount: 3 },
        success: true,
        timestamp: '2024-01-01T00:00:00.000Z',
      });
    });

    it('attaches metadata when given', () => {
      const response = createSuccessResponse('stats-overview', [], { duration_ms: 12, loaded: 3 });

      expect(response.metadata).toEqual({ duration_ms: 12, loaded: 3 });
    });
  });

  describe('createErrorResponse', () => {
    it('carries the code and message', () => {
      expect(createErrorResponse('transactions-view', new Error('Transaction with ID 9 not found'), 'NOT_FOUND')).toEqual({
        command: 'transactions-view',
        error: { code: 'NOT_FOUND', message: 'Transaction with ID 9 not found' },
        success: false,
        timestamp: '2024-01-01T00:00:00.000Z',
      });
    });

    it('includes details when provided', () => {
      const response = createErrorResponse('fraud-predict', new Error('bad'), 'VALIDATION_ERROR', [
        { message: 'Required', path: 'amount' },
      ]);

      expect(response.error?.details).toEqual([{ message: 'Required', path: 'amount' }]);
    });
  });

  describe('exitCodeToErrorCode', () => {
    it('maps every exit code to its name', () => {
      expect(exitCodeToErrorCode(ExitCodes.SUCCESS)).toBe('SUCCESS');
      expect(exitCodeToErrorCode(ExitCodes.GENERAL_ERROR)).toBe('GENERAL_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.INVALID_ARGS)).toBe('INVALID_ARGS');
      expect(exitCodeToErrorCode(ExitCodes.NOT_FOUND)).toBe('NOT_FOUND');
      expect(exitCodeToErrorCode(ExitCodes.VALIDATION_ERROR)).toBe('VALIDATION_ERROR');
    });
  });
});
