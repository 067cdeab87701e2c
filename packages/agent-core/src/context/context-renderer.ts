/**
 * ContextRenderer: turns a chunk selection into the code-context prompt block.
 *
 * Output per file, in selection order:
 *
 *   ## File: `pkg/mod.py`
 *     1 class A:
 *   ...
 *    12     def run(self):
 *    13         if self.ready:
 *
 * The rendered line set of a file is the union over its chunks of stored
 * lines, enclosing signatures and enclosing block headers. Identical state
 * renders to identical bytes.
 */

import type { ChunkSelection, CodeChunk } from '@bugtrail/agent-contracts';
import type { SourceReader, StructureResolver } from '@bugtrail/agent-sdk';
import { splitSourceLines } from '../tools/parsers/file-structure.js';

export const EOF_MARKER = '  [EOF]';
export const GAP_MARKER = '...';

export class ContextRenderer {
  constructor(
    private readonly resolver: StructureResolver,
    private readonly reader: SourceReader,
  ) {}

  async render(selection: ChunkSelection): Promise<string> {
    const sections: string[] = [];
    for (const [filePath, chunks] of selection) {
      const section = await this.renderFile(filePath, chunks);
      if (section) {sections.push(section);}
    }
    return sections.join('\n\n');
  }

  /**
   * Render one file; empty string when the file has no content or no line
   * to show.
   */
  async renderFile(filePath: string, chunks: readonly CodeChunk[]): Promise<string> {
    const fileLines = splitSourceLines(await this.reader.read(filePath));
    if (fileLines.length === 0) {return '';}

    const rendered = new Set<number>();
    for (const chunk of chunks) {
      for (const line of await this.linesOf(filePath, chunk)) {
        rendered.add(line);
      }
    }
    if (rendered.size === 0) {return '';}

    const eof = chunks.some((c) => c.eof);
    const body = renderLines(fileLines, [...rendered].sort((a, b) => a - b), eof);
    return `## File: \`${filePath}\`\n${body}`;
  }

  private async linesOf(filePath: string, chunk: CodeChunk): Promise<number[]> {
    const { identity } = chunk;
    const structure = await this.resolver.resolve(filePath, {
      lines: identity.lines,
      className: identity.className,
      functionName: identity.functionName,
    });

    const base = identity.wholeFunction && structure.functionLines.length > 0
      ? structure.functionLines
      : identity.lines;
    return [...base, ...structure.signatureLines, ...structure.blockHeaderLines];
  }
}

/**
 * Group chunks into a selection: files in first-seen order, chunks by
 * ascending minimum line.
 */
export function groupChunks(chunks: Iterable<CodeChunk>): ChunkSelection {
  const selection: ChunkSelection = new Map();
  for (const chunk of chunks) {
    const list = selection.get(chunk.identity.filePath) ?? [];
    if (!list.some((c) => c.id === chunk.id)) {list.push(chunk);}
    selection.set(chunk.identity.filePath, list);
  }
  for (const list of selection.values()) {
    list.sort((a, b) => (a.identity.lines[0] ?? 0) - (b.identity.lines[0] ?? 0));
  }
  return selection;
}

/**
 * Number and join lines. Width is the digit count of the largest requested
 * line plus one; lines outside the file are skipped and gaps become `...`.
 */
export function renderLines(fileLines: readonly string[], lineNumbers: readonly number[], eof = false): string {
  if (lineNumbers.length === 0) {return '';}
  const width = String(Math.max(...lineNumbers)).length + 1;

  const parts: string[] = [];
  let previous: number | undefined;
  for (const lineNumber of lineNumbers) {
    const text = fileLines[lineNumber - 1];
    if (lineNumber < 1 || text === undefined) {continue;}
    if (previous !== undefined && lineNumber > previous + 1) {parts.push(GAP_MARKER);}
    parts.push(`${String(lineNumber).padStart(width)} ${text}`);
    previous = lineNumber;
  }
  if (eof) {parts.push(EOF_MARKER);}
  return parts.join('\n');
}
