/**
 * Run outcome of an agent loop.
 *
 *   submitted:  the action printed the submission sentinel
 *   dead_end:   the frontier reached the consecutive-invalid limit
 *   step_limit: the configured number of model calls was used up
 *   aborted:    the abort signal fired between iterations
 *   failed:     the error handler stopped the run
 */

export type LoopOutcome = 'submitted' | 'dead_end' | 'step_limit' | 'aborted' | 'failed';

export interface LoopResult {
  outcome: LoopOutcome;
  /** Submission text, or the reason the run stopped */
  message: string;
  /** Operations finalized during the run */
  operationCount: number;
  /** Model calls issued, retries included */
  modelCalls: number;
}
