// ============================================
// bugtrail - Type Contracts
// ============================================

// Code context
export type {
  ChunkId,
  ChunkIdentity,
  ChunkActivity,
  CodeChunk,
  DecayParams,
  ChunkSelection,
  StructuralLines,
  EnclosingScope,
} from './code-context.js';
export { chunkKey, normalizeLines } from './code-context.js';

// Operation history
export type {
  OperationId,
  PropertyVocabulary,
  DeterminismProperty,
  ExplorationProperty,
  OperationProperty,
  OperationStatus,
  OperationNode,
  OperationDraft,
  OperationVerdict,
} from './operation.js';
export { PROPERTY_VALUES } from './operation.js';

// Replies
export type {
  ReplyTag,
  Decision,
  LoopPhase,
  FirstStepReply,
  SteadyReply,
  AgentReply,
} from './reply.js';
export { REPLY_TAG_ORDER, REFLECTION_TAGS, ACTION_TAGS } from './reply.js';

// Schemas
export {
  DecayConfigSchema,
  AgentLoopConfigSchema,
  ToolCodeContextSchema,
  ToolResponseSchema,
} from './agent-schemas.js';
export type {
  AgentLoopConfig,
  AgentLoopConfigInput,
  ToolCodeContext,
  ToolResponse,
} from './agent-schemas.js';

// Errors
export type { BugtrailErrorCode } from './errors.js';
export {
  BugtrailError,
  ParseError,
  ConsistencyError,
  ChainConflictError,
  ProposalWithheldError,
  ConfigError,
  OperationTimeoutError,
} from './errors.js';
