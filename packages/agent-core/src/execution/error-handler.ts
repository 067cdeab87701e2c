/**
 * Default AgentErrorHandler.
 *
 *   parse error → retry once → stop
 *   model error → retry with exponential backoff (3x) → stop
 */

import type { ParseError } from '@bugtrail/agent-contracts';
import type { AgentErrorHandler, ErrorAction } from '@bugtrail/agent-sdk';

export interface DefaultErrorHandlerOptions {
  parseRetries?: number;
  modelRetries?: number;
  /** Delay before the first model retry; doubles each attempt */
  baseDelayMs?: number;
}

export class DefaultErrorHandler implements AgentErrorHandler {
  private readonly parseRetries: number;
  private readonly modelRetries: number;
  private readonly baseDelayMs: number;

  constructor(options: DefaultErrorHandlerOptions = {}) {
    this.parseRetries = options.parseRetries ?? 1;
    this.modelRetries = options.modelRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1_000;
  }

  onParseError(error: ParseError, attempt: number): ErrorAction {
    if (attempt <= this.parseRetries) {
      return { action: 'retry' };
    }
    return { action: 'stop', reason: `Unparseable reply after ${attempt} attempts: ${error.message}` };
  }

  onModelError(error: unknown, attempt: number): ErrorAction {
    if (attempt <= this.modelRetries) {
      return { action: 'retry', delayMs: this.baseDelayMs * 2 ** (attempt - 1) };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { action: 'stop', reason: `Model call failed after ${attempt} attempts: ${message}` };
  }
}
