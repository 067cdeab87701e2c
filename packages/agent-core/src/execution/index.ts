/**
 * Execution primitives
 */

export {
  AgentLoop,
  submissionOf,
  SUBMISSION_SENTINELS,
  type AgentLoopDeps,
  type AgentLoopRunOptions,
} from './agent-loop.js';
export { LoopStateMachine, type LoopState } from './state-machine.js';
export { DefaultErrorHandler, type DefaultErrorHandlerOptions } from './error-handler.js';
export { withTimeout, sleep } from './timeout.js';
