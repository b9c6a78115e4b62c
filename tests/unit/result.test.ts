/**
 * Result Pattern Tests
 */

import { describe, it, expect } from 'vitest';

import {
  errorMessage,
  failure,
  success,
} from '@/types/index.js';

describe('Result', () => {
  it('wraps data in a success result', () => {
    const result = success({ id: 1 });

    expect(result).toEqual({ success: true, data: { id: 1 } });
  });

  it('builds a failure without details', () => {
    const result = failure('STORE_ERROR', 'disk full');

    expect(result).toEqual({
      success: false,
      error: { code: 'STORE_ERROR', message: 'disk full' },
    });
  });

  it('keeps details when given', () => {
    const result = failure('VALIDATION_ERROR', 'bad cost', { cost: -1 });

    expect(result.error.details).toEqual({ cost: -1 });
  });
});

describe('errorMessage', () => {
  it('reads the message of an Error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('passes strings through', () => {
    expect(errorMessage('plain failure')).toBe('plain failure');
  });

  it('falls back for anything else', () => {
    expect(errorMessage({ code: 1 })).toBe('Unknown error');
    expect(errorMessage(undefined, 'Tool failed')).toBe('Tool failed');
  });
});
