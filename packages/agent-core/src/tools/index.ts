/**
 * Built-in tools and the tool-response protocol
 */

export {
  CodeContextTools,
  describeLoad,
  NEARBY_TOOL,
  LINES_TOOL,
  type ChunkLoad,
  type BuiltinToolResult,
  type CodeContextToolsOptions,
} from './code-context-tools.js';
export { parseToolResponses, summarizeToolOutput, type ParsedToolResponse } from './tool-response.js';
export * from './parsers/index.js';
