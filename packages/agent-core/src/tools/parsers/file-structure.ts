/**
 * FileStructure: the structural index both resolvers build for a file.
 *
 * Signatures are keyed by (className, functionName). A class signature is
 * stored under both (Class, '') and ('', Class) so that a lookup by class
 * alone or by a bare name finds it.
 */

import type { EnclosingScope, StructuralLines } from '@bugtrail/agent-contracts';
import type { StructureQuery } from '@bugtrail/agent-sdk';

export interface DefinitionRange {
  name: string;
  /** Innermost class containing the definition, empty at module level */
  className: string;
  start: number;
  end: number;
}

export interface FileStructure {
  signatures: Map<string, number[]>;
  functionRanges: Map<string, number[]>;
  /** line → header lines of every block group containing it */
  blockHeaders: Map<number, Set<number>>;
  functions: DefinitionRange[];
  classes: DefinitionRange[];
}

export function emptyStructure(): FileStructure {
  return {
    signatures: new Map(),
    functionRanges: new Map(),
    blockHeaders: new Map(),
    functions: [],
    classes: [],
  };
}

export function scopeKey(className: string, functionName: string): string {
  return `${className}\u0000${functionName}`;
}

export function lineRange(start: number, end: number): number[] {
  const lines: number[] = [];
  for (let line = start; line <= end; line++) {lines.push(line);}
  return lines;
}

export function addBlockHeaders(structure: FileStructure, start: number, end: number, headers: Iterable<number>): void {
  for (let line = start; line <= end; line++) {
    let set = structure.blockHeaders.get(line);
    if (!set) {
      set = new Set();
      structure.blockHeaders.set(line, set);
    }
    for (const header of headers) {set.add(header);}
  }
}

export function resolveInStructure(structure: FileStructure, query: StructureQuery): StructuralLines {
  const className = query.className ?? '';
  const functionName = query.functionName ?? '';

  const signatureLines = new Set<number>();
  const addSignature = (key: string): void => {
    for (const line of structure.signatures.get(key) ?? []) {signatureLines.add(line);}
  };
  if (className) {addSignature(scopeKey(className, ''));}
  if (functionName) {
    addSignature(scopeKey(className, functionName));
  } else if (className) {
    addSignature(scopeKey('', className));
  }

  const blockHeaderLines = new Set<number>();
  for (const line of query.lines) {
    for (const header of structure.blockHeaders.get(line) ?? []) {blockHeaderLines.add(header);}
  }

  const functionLines = functionName
    ? [...(structure.functionRanges.get(scopeKey(className, functionName)) ?? [])]
    : [];

  return {
    signatureLines: sortNumbers(signatureLines),
    blockHeaderLines: sortNumbers(blockHeaderLines),
    functionLines,
  };
}

export function locateInStructure(structure: FileStructure, line: number): EnclosingScope {
  const fn = innermost(structure.functions, line);
  const cls = innermost(structure.classes, line);
  const scope: EnclosingScope = {};
  if (cls) {scope.className = cls.name;}
  if (fn) {
    scope.functionName = fn.name;
    scope.functionStart = fn.start;
    scope.functionEnd = fn.end;
  }
  return scope;
}

function innermost(ranges: DefinitionRange[], line: number): DefinitionRange | undefined {
  let best: DefinitionRange | undefined;
  for (const range of ranges) {
    if (line < range.start || line > range.end) {continue;}
    if (!best || range.start > best.start) {best = range;}
  }
  return best;
}

function sortNumbers(values: Iterable<number>): number[] {
  return [...values].sort((a, b) => a - b);
}

/** Physical lines of a source file; a trailing newline does not add a line */
export function splitSourceLines(source: string): string[] {
  if (source === '') {return [];}
  const lines = source.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {lines.pop();}
  return lines;
}
