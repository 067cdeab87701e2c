/**
 * @module @bugtrail/agent-contracts/errors
 * Error classes raised by the memory and reasoning-state engine.
 *
 * Action failures are never errors; they reach the model as observation
 * text. A dead end is not an error either; see DeadEndStrategy.
 */

export type BugtrailErrorCode =
  | 'PARSE_ERROR'
  | 'CONSISTENCY_ERROR'
  | 'CHAIN_CONFLICT'
  | 'PROPOSAL_WITHHELD'
  | 'CONFIG_ERROR'
  | 'TIMEOUT';

export class BugtrailError extends Error {
  readonly code: BugtrailErrorCode;

  constructor(code: BugtrailErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Reply is missing, duplicating or misordering a tag, or carries a bad value.
 * The iteration fails locally; retry or abort is the caller's decision.
 */
export class ParseError extends BugtrailError {
  constructor(message: string, readonly reply?: string) {
    super('PARSE_ERROR', message);
  }
}

/**
 * `recordStep` called out of order or incompletely, or a node finalized twice.
 * Indicates a caller bug.
 */
export class ConsistencyError extends BugtrailError {
  constructor(message: string) {
    super('CONSISTENCY_ERROR', message);
  }
}

/**
 * Attempt to attach a second child to a node. Frontier tracking is broken.
 */
export class ChainConflictError extends BugtrailError {
  constructor(message: string, readonly parentId?: number) {
    super('CHAIN_CONFLICT', message);
  }
}

/**
 * Proposal against a node that reached the consecutive-invalid limit.
 */
export class ProposalWithheldError extends BugtrailError {
  constructor(message: string, readonly parentId: number) {
    super('PROPOSAL_WITHHELD', message);
  }
}

export class ConfigError extends BugtrailError {
  constructor(message: string, readonly issues: string[] = []) {
    super('CONFIG_ERROR', message);
  }
}

export class OperationTimeoutError extends BugtrailError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
  }
}
