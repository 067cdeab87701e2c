/**
 * StructureResolver: locates signature and block-header lines of a file.
 *
 * Used by the context renderer to keep rendered slices readable (a loop body
 * is shown with its `for` header, a method with its class line) and by the
 * code-context tools to find the function around a line.
 *
 * Built-in (agent-core):
 *   IndentStructureResolver:     indentation-based, no dependencies
 *   TreeSitterStructureResolver: tree-sitter grammar, falls back to the above
 */

import type { EnclosingScope, StructuralLines } from '@bugtrail/agent-contracts';

export interface StructureQuery {
  /** Lines whose enclosing blocks are wanted */
  lines: readonly number[];
  /** Signature lines of this class are included */
  className?: string;
  /** Signature lines (and function range) of this function are included */
  functionName?: string;
}

export interface StructureResolver {
  resolve(filePath: string, query: StructureQuery): Promise<StructuralLines>;

  /** Innermost function (and its class) containing `line` */
  locate(filePath: string, line: number): Promise<EnclosingScope>;
}
