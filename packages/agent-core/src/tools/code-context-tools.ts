/**
 * Built-in code-context tools.
 *
 * Actions starting with a built-in tool name never reach the environment:
 *
 *   get-nearby-code-context <file> <line>
 *   get-code-lines <file> <start> <end>
 *
 * Both register a chunk in the store and answer with a one-line observation.
 */

import type { ChunkId, ChunkIdentity } from '@bugtrail/agent-contracts';
import type { SourceReader, StructureResolver } from '@bugtrail/agent-sdk';
import type { CodeContextStore } from '../memory/code-context-store.js';
import { lineRange, splitSourceLines } from './parsers/file-structure.js';

export const NEARBY_TOOL = 'get-nearby-code-context';
export const LINES_TOOL = 'get-code-lines';

export interface ChunkLoad {
  identity: ChunkIdentity;
  eof: boolean;
}

export interface BuiltinToolResult {
  output: string;
  returncode: number;
  /** Chunks registered by the call */
  touched: ChunkId[];
}

export interface CodeContextToolsOptions {
  /** Lines loaded around a line when its function is too long (default 100) */
  windowSize?: number;
}

export class CodeContextTools {
  private readonly windowSize: number;

  constructor(
    private readonly store: CodeContextStore,
    private readonly resolver: StructureResolver,
    private readonly reader: SourceReader,
    options: CodeContextToolsOptions = {},
  ) {
    this.windowSize = options.windowSize ?? 100;
  }

  /**
   * Run a built-in tool, or return null when the command is not one.
   */
  async run(command: string): Promise<BuiltinToolResult | null> {
    const [name, ...args] = command.trim().split(/\s+/);

    if (name === NEARBY_TOOL) {
      const [file, line] = args;
      const lineNumber = parsePositive(line);
      if (!file || lineNumber === undefined) {
        return usage(`${NEARBY_TOOL} <file_path> <line_number>`);
      }
      return this.load(await this.nearby(file, lineNumber));
    }

    if (name === LINES_TOOL) {
      const [file, start, end] = args;
      const startLine = parsePositive(start);
      const endLine = parsePositive(end);
      if (!file || startLine === undefined || endLine === undefined) {
        return usage(`${LINES_TOOL} <file_path> <start_line> <end_line>`);
      }
      return this.load(await this.codeLines(file, startLine, endLine));
    }

    return null;
  }

  /**
   * The whole enclosing function when it fits the window, else a window
   * around the line clipped to the function, else a window in the file.
   */
  async nearby(filePath: string, line: number): Promise<ChunkLoad> {
    const total = splitSourceLines(await this.reader.read(filePath)).length;
    if (total === 0) {
      return { identity: { filePath, wholeFunction: false, lines: [] }, eof: false };
    }

    const half = Math.floor(this.windowSize / 2);
    const scope = await this.resolver.locate(filePath, line);
    const base = { filePath, className: scope.className, functionName: scope.functionName };

    if (scope.functionStart === undefined || scope.functionEnd === undefined) {
      return {
        identity: { ...base, wholeFunction: false, lines: lineRange(Math.max(1, line - half), Math.min(total, line + half)) },
        eof: false,
      };
    }

    const { functionStart, functionEnd } = scope;
    if (functionEnd - functionStart + 1 <= this.windowSize) {
      return { identity: { ...base, wholeFunction: true, lines: lineRange(functionStart, functionEnd) }, eof: false };
    }
    return {
      identity: {
        ...base,
        wholeFunction: false,
        lines: lineRange(Math.max(functionStart, line - half), Math.min(functionEnd, line + half)),
      },
      eof: false,
    };
  }

  /**
   * Explicit range, clamped to the file. `eof` when `end` is past the last line.
   */
  async codeLines(filePath: string, start: number, end: number): Promise<ChunkLoad> {
    const total = splitSourceLines(await this.reader.read(filePath)).length;
    if (total === 0) {
      return { identity: { filePath, wholeFunction: false, lines: [] }, eof: false };
    }
    return {
      identity: { filePath, wholeFunction: false, lines: lineRange(Math.max(1, start), Math.min(end, total)) },
      eof: end > total,
    };
  }

  /** Every line of a file, outside any class or function */
  async wholeFile(filePath: string): Promise<ChunkLoad> {
    const total = splitSourceLines(await this.reader.read(filePath)).length;
    return { identity: { filePath, wholeFunction: false, lines: lineRange(1, total) }, eof: false };
  }

  /**
   * Register a load in the store. Loads without lines register nothing.
   */
  register(load: ChunkLoad): ChunkId | undefined {
    if (load.identity.lines.length === 0) {return undefined;}
    return this.store.registerOrGet(load.identity, { eof: load.eof }).id;
  }

  private load(load: ChunkLoad): BuiltinToolResult {
    const id = this.register(load);
    return { output: describeLoad(load), returncode: 0, touched: id ? [id] : [] };
  }
}

export function describeLoad(load: ChunkLoad): string {
  const { identity } = load;
  if (identity.wholeFunction) {
    return `Function ${identity.functionName ?? ''} in file ${identity.filePath} is added into the code context.`;
  }
  const first = identity.lines[0];
  const last = identity.lines[identity.lines.length - 1];
  if (first === undefined || last === undefined) {
    return `No lines found for ${identity.filePath}`;
  }
  return `Lines ${first} to ${last} of file ${identity.filePath} are added into the code context.`;
}

function parsePositive(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {return undefined;}
  const n = Number(value);
  return n >= 1 ? n : undefined;
}

function usage(signature: string): BuiltinToolResult {
  return { output: `Usage: ${signature}`, returncode: 2, touched: [] };
}
