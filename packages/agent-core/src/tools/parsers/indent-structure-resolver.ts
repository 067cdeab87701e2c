/**
 * IndentStructureResolver: structure of Python sources from indentation.
 *
 * No grammar, no dependencies: logical lines are found by tracking brackets,
 * strings and backslash continuations; blocks end at the next statement that
 * is not indented deeper than their header.
 *
 * Recognized:
 *   - class / def / async def headers, decorators, multi-line signatures
 *   - if / for / while / with / try / match statements and their
 *     elif / else / except / finally / case clauses
 */

import type { EnclosingScope, StructuralLines } from '@bugtrail/agent-contracts';
import type { SourceReader, StructureQuery, StructureResolver } from '@bugtrail/agent-sdk';
import {
  addBlockHeaders,
  emptyStructure,
  lineRange,
  locateInStructure,
  resolveInStructure,
  scopeKey,
  splitSourceLines,
  type FileStructure,
} from './file-structure.js';

interface Statement {
  start: number;
  end: number;
  indent: number;
  /** First physical line, trimmed */
  head: string;
  /** Code of the last physical line, comment stripped, trimmed */
  tail: string;
}

type NodeKind = 'class' | 'def' | 'compound' | 'clause';

interface BlockNode {
  kind: NodeKind;
  name: string;
  /** First header line (decorators excluded) */
  start: number;
  /** First decorator line, when decorated */
  decoratorStart?: number;
  headerEnd: number;
  end: number;
  indent: number;
  /** Whether the header opens an indented body */
  opensBody: boolean;
  /** Compound statement a clause belongs to */
  owner?: BlockNode;
  /** Clauses of a compound statement (elif/else/except/finally/case) */
  clauses: BlockNode[];
  children: BlockNode[];
}

const CLASS_RE = /^class\s+([A-Za-z_]\w*)/;
const DEF_RE = /^(?:async\s+)?def\s+([A-Za-z_]\w*)/;
const COMPOUND_RE = /^(?:if|for|while|with|try|async\s+for|async\s+with)\b/;
const MATCH_RE = /^match\b[^=]*:$/;
const CLAUSE_RE = /^(?:elif|else|except|finally)\b/;
const CASE_RE = /^case\b.*:$/;

export class IndentStructureResolver implements StructureResolver {
  private readonly cache = new Map<string, { source: string; structure: FileStructure }>();

  constructor(private readonly reader: SourceReader) {}

  async resolve(filePath: string, query: StructureQuery): Promise<StructuralLines> {
    return resolveInStructure(await this.structureOf(filePath), query);
  }

  async locate(filePath: string, line: number): Promise<EnclosingScope> {
    return locateInStructure(await this.structureOf(filePath), line);
  }

  private async structureOf(filePath: string): Promise<FileStructure> {
    const source = await this.reader.read(filePath);
    const cached = this.cache.get(filePath);
    if (cached && cached.source === source) {return cached.structure;}
    const structure = buildIndentStructure(source);
    this.cache.set(filePath, { source, structure });
    return structure;
  }
}

/**
 * Build the structural index of a Python source.
 */
export function buildIndentStructure(source: string): FileStructure {
  const statements = scanStatements(splitSourceLines(source));
  const roots = buildTree(statements);
  const structure = emptyStructure();
  collectDefinitions(structure, roots, '');
  collectBlocks(structure, roots);
  return structure;
}

// ─── Logical lines ───────────────────────────────────────────────────────────

function scanStatements(lines: string[]): Statement[] {
  const statements: Statement[] = [];
  let depth = 0;
  let triple: string | null = null;
  let continued = false;
  let current: Omit<Statement, 'end' | 'tail'> | null = null;

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? '';
    if (!current) {
      const trimmed = raw.trim();
      if (trimmed === '' || trimmed.startsWith('#')) {continue;}
      current = { start: i + 1, indent: raw.length - raw.trimStart().length, head: trimmed };
    }

    let j = 0;
    let codeEnd = raw.length;
    while (j < raw.length) {
      const ch = raw[j];
      if (triple) {
        if (raw.startsWith(triple, j)) {
          triple = null;
          j += 3;
        } else {
          j += ch === '\\' ? 2 : 1;
        }
        continue;
      }
      if (ch === '#') {
        codeEnd = j;
        break;
      }
      if (raw.startsWith('"""', j) || raw.startsWith("'''", j)) {
        triple = raw.slice(j, j + 3);
        j += 3;
        continue;
      }
      if (ch === '"' || ch === "'") {
        j++;
        while (j < raw.length && raw[j] !== ch) {j += raw[j] === '\\' ? 2 : 1;}
        j++;
        continue;
      }
      if (ch === '(' || ch === '[' || ch === '{') {depth++;}
      if (ch === ')' || ch === ']' || ch === '}') {depth = Math.max(0, depth - 1);}
      j++;
    }

    const code = raw.slice(0, codeEnd).trimEnd();
    continued = triple === null && code.endsWith('\\');
    if (triple === null && depth === 0 && !continued) {
      statements.push({ ...current, end: i + 1, tail: code.trim() });
      current = null;
    }
  }

  if (current) {
    statements.push({ ...current, end: lines.length, tail: current.head });
  }
  return statements;
}

// ─── Block tree ──────────────────────────────────────────────────────────────

function classify(stmt: Statement, parent: BlockNode | undefined): { kind: NodeKind; name: string } | null {
  const cls = CLASS_RE.exec(stmt.head);
  if (cls) {return { kind: 'class', name: cls[1] ?? '' };}
  const def = DEF_RE.exec(stmt.head);
  if (def) {return { kind: 'def', name: def[1] ?? '' };}
  if (COMPOUND_RE.test(stmt.head)) {return { kind: 'compound', name: '' };}
  if (MATCH_RE.test(stmt.tail) && stmt.head.startsWith('match')) {return { kind: 'compound', name: 'match' };}
  if (CLAUSE_RE.test(stmt.head)) {return { kind: 'clause', name: '' };}
  if (parent?.name === 'match' && CASE_RE.test(stmt.tail) && stmt.head.startsWith('case')) {
    return { kind: 'clause', name: 'case' };
  }
  return null;
}

function buildTree(statements: Statement[]): BlockNode[] {
  const roots: BlockNode[] = [];
  const stack: BlockNode[] = [];
  let lastEnd = 0;
  let decoratorStart: number | undefined;

  const close = (node: BlockNode): void => {
    node.end = Math.max(node.headerEnd, lastEnd);
  };

  for (const stmt of statements) {
    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      if (!top || top.indent < stmt.indent) {break;}
      close(top);
      stack.pop();
    }

    const parent = stack[stack.length - 1];
    const siblings = parent ? parent.children : roots;

    if (stmt.head.startsWith('@')) {
      decoratorStart ??= stmt.start;
      lastEnd = stmt.end;
      continue;
    }

    const kind = classify(stmt, parent);
    if (kind) {
      const node: BlockNode = {
        kind: kind.kind,
        name: kind.name,
        start: stmt.start,
        headerEnd: stmt.end,
        end: stmt.end,
        indent: stmt.indent,
        opensBody: stmt.tail.endsWith(':'),
        clauses: [],
        children: [],
      };
      if ((node.kind === 'class' || node.kind === 'def') && decoratorStart !== undefined) {
        node.decoratorStart = decoratorStart;
      }

      if (node.kind === 'clause') {
        const owner = node.name === 'case' ? parent : clauseOwner(siblings, stmt.indent);
        if (owner) {
          node.owner = owner;
          owner.clauses.push(node);
        }
      }

      siblings.push(node);
      if (node.opensBody) {stack.push(node);}
    }

    decoratorStart = undefined;
    lastEnd = stmt.end;
  }

  while (stack.length > 0) {
    const top = stack.pop();
    if (top) {close(top);}
  }
  return roots;
}

function clauseOwner(siblings: BlockNode[], indent: number): BlockNode | undefined {
  const prev = siblings[siblings.length - 1];
  if (!prev || prev.indent !== indent) {return undefined;}
  if (prev.kind === 'compound') {return prev;}
  if (prev.kind === 'clause') {return prev.owner;}
  return undefined;
}

// ─── Index ───────────────────────────────────────────────────────────────────

function collectDefinitions(structure: FileStructure, nodes: BlockNode[], className: string, inFunction = false): void {
  for (const node of nodes) {
    const signatureStart = node.decoratorStart ?? node.start;
    const signature = lineRange(signatureStart, node.headerEnd);

    if (node.kind === 'class') {
      structure.classes.push({ name: node.name, className, start: node.start, end: node.end });
      if (!inFunction) {
        structure.signatures.set(scopeKey('', node.name), signature);
        structure.signatures.set(scopeKey(node.name, ''), signature);
      }
      collectDefinitions(structure, node.children, node.name, inFunction);
      continue;
    }

    if (node.kind === 'def') {
      structure.functions.push({ name: node.name, className, start: node.start, end: node.end });
      if (!inFunction) {
        structure.signatures.set(scopeKey(className, node.name), signature);
        structure.functionRanges.set(scopeKey(className, node.name), lineRange(node.start, node.end));
      }
      collectDefinitions(structure, node.children, className, true);
      continue;
    }

    collectDefinitions(structure, node.children, className, inFunction);
  }
}

function collectBlocks(structure: FileStructure, nodes: BlockNode[]): void {
  for (const node of nodes) {
    if (node.kind === 'compound') {
      const headers = [node.start, ...node.clauses.map((c) => c.start)];
      const end = Math.max(node.end, ...node.clauses.map((c) => c.end));
      addBlockHeaders(structure, node.start, end, headers);
    }
    collectBlocks(structure, node.children);
  }
}
