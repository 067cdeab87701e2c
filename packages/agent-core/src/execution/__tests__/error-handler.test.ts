import { describe, it, expect } from 'vitest';
import { ParseError } from '@bugtrail/agent-contracts';
import { DefaultErrorHandler } from '../error-handler.js';

describe('DefaultErrorHandler', () => {
  const parseError = new ParseError('Missing <action>', '<thoughts>x</thoughts>');

  it('should retry a parse error once', () => {
    const handler = new DefaultErrorHandler();

    expect(handler.onParseError(parseError, 1)).toEqual({ action: 'retry' });
    expect(handler.onParseError(parseError, 2)).toEqual({
      action: 'stop',
      reason: 'Unparseable reply after 2 attempts: Missing <action>',
    });
  });

  it('should back off exponentially on model errors', () => {
    const handler = new DefaultErrorHandler({ baseDelayMs: 100 });
    const error = new Error('rate limited');

    expect([1, 2, 3].map((attempt) => handler.onModelError(error, attempt))).toEqual([
      { action: 'retry', delayMs: 100 },
      { action: 'retry', delayMs: 200 },
      { action: 'retry', delayMs: 400 },
    ]);
    expect(handler.onModelError(error, 4)).toEqual({
      action: 'stop',
      reason: 'Model call failed after 4 attempts: rate limited',
    });
  });

  it('should describe non-Error failures', () => {
    const handler = new DefaultErrorHandler({ modelRetries: 0 });

    expect(handler.onModelError('socket hang up', 1)).toEqual({
      action: 'stop',
      reason: 'Model call failed after 1 attempts: socket hang up',
    });
  });
});
