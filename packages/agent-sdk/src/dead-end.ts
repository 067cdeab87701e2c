/**
 * DeadEndStrategy: invoked when a node accumulates the configured number of
 * consecutive invalid attempts.
 *
 * The loop withholds further proposals against that node and stops the run
 * with outcome `dead_end` once the strategy returns. What recovery means
 * (backtracking to an exploratory ancestor, summarizing the dead path,
 * escalating to a human) is left to the strategy; there is no default.
 */

import type { OperationNode } from '@bugtrail/agent-contracts';

// ─────────────────────────────────────────────────────────────────────────────
// DeadEndContext
// ─────────────────────────────────────────────────────────────────────────────

export interface DeadEndContext {
  /** Node that reached the limit */
  node: Readonly<OperationNode>;
  /** Its rejected attempts, oldest first */
  attempts: ReadonlyArray<Readonly<OperationNode>>;
  /** Configured consecutive-invalid limit */
  limit: number;
  /** Operations finalized so far */
  operationCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// DeadEndStrategy interface
// ─────────────────────────────────────────────────────────────────────────────

export interface DeadEndStrategy {
  readonly name: string;
  onDeadEnd(ctx: DeadEndContext): Promise<void>;
}
