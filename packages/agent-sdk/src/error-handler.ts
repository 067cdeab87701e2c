/**
 * AgentErrorHandler: defines what to do when a reply cannot be parsed or
 * the model call fails.
 *
 * Default behaviour in agent-core:
 *   parse error → retry once → stop
 *   model error → retry with exponential backoff (3x) → stop
 *
 * A retry re-issues the model call for the same iteration; it consumes a
 * model call but not an operation step.
 *
 * The `attempt` parameter is 1-based (first failure = attempt 1).
 */

import type { ParseError } from '@bugtrail/agent-contracts';

// ─────────────────────────────────────────────────────────────────────────────
// ErrorAction
// ─────────────────────────────────────────────────────────────────────────────

export type ErrorAction =
  | { action: 'retry'; delayMs?: number }
  | { action: 'stop'; reason: string };

// ─────────────────────────────────────────────────────────────────────────────
// AgentErrorHandler interface
// ─────────────────────────────────────────────────────────────────────────────

export interface AgentErrorHandler {
  /**
   * Called when the reply violates the tag grammar.
   * @param attempt 1-based attempt count
   */
  onParseError(error: ParseError, attempt: number): ErrorAction;

  /**
   * Called when the model call throws (timeout, rate limit, network error, etc.).
   * @param attempt 1-based attempt count
   */
  onModelError(error: unknown, attempt: number): ErrorAction;
}
