/**
 * @bugtrail/agent-core
 *
 * Memory, reasoning state and the agent loop
 */

// Code-context memory - scored chunks
export * from './memory/index.js';

// Rendering of selected chunks into the prompt
export {
  ContextRenderer,
  groupChunks,
  renderLines,
  EOF_MARKER,
  GAP_MARKER,
} from './context/context-renderer.js';

// Reasoning history - operation tree and its rendering
export * from './history/index.js';

// Reply and citation parsing
export * from './executor/index.js';

// Prompt construction
export * from './prompt/index.js';

// Built-in tools, tool responses and structure resolvers
export * from './tools/index.js';

// Loop, state machine, error handling
export * from './execution/index.js';

// Configuration
export { parseAgentLoopConfig, parseAgentLoopConfigYAML, loadAgentLoopConfig } from './config/load-config.js';

// Logging
export { createLogger, LOG_PREFIX, type LoggerOptions } from './logging/logger.js';
