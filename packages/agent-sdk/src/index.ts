/**
 * @bugtrail/agent-sdk
 *
 * Extension-point interfaces of the debugging agent loop. Contains only
 * types; agent-core provides the runtime and the built-in implementations.
 */

// Model
export type { Prompt, ModelClient } from './model.js';

// Environment
export type {
  ExecutionResult,
  ExecutionEnvironment,
  InstalledTool,
  SourceReader,
  VersionControl,
} from './environment.js';

// Structure resolution
export type { StructureQuery, StructureResolver } from './structure-resolver.js';

// Dead end
export type { DeadEndContext, DeadEndStrategy } from './dead-end.js';

// Error handler
export type { ErrorAction, AgentErrorHandler } from './error-handler.js';

// Logger
export type { ILogger } from './logger.js';

// Loop result
export type { LoopOutcome, LoopResult } from './loop.js';
