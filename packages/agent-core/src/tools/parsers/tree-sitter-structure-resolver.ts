/**
 * Tree-sitter structure resolver for Python sources.
 *
 * Features:
 * - Lazy loading (tree-sitter loaded only when first needed)
 * - Graceful fallback to IndentStructureResolver if the grammar is missing
 * - Same structural index as the fallback, built from the syntax tree
 */

import type { EnclosingScope, StructuralLines } from '@bugtrail/agent-contracts';
import type { ILogger, SourceReader, StructureQuery, StructureResolver } from '@bugtrail/agent-sdk';
import { buildIndentStructure } from './indent-structure-resolver.js';
import {
  addBlockHeaders,
  emptyStructure,
  lineRange,
  locateInStructure,
  resolveInStructure,
  scopeKey,
  type FileStructure,
} from './file-structure.js';

/**
 * The parts of a tree-sitter node this resolver reads
 */
export interface SyntaxNodeLike {
  type: string;
  text: string;
  startPosition: { row: number; column: number };
  endPosition: { row: number; column: number };
  children: SyntaxNodeLike[];
  childForFieldName(fieldName: string): SyntaxNodeLike | null;
}

interface ParserLike {
  setLanguage(language: unknown): void;
  parse(input: string, oldTree?: null, options?: { bufferSize?: number }): { rootNode: SyntaxNodeLike };
}

type ParserConstructor = new () => ParserLike;

// Module names kept in variables: both packages are optional at install time
const TREE_SITTER_MODULE = 'tree-sitter';
const PYTHON_GRAMMAR_MODULE = 'tree-sitter-python';

// Parser input buffer default; larger sources need an explicit size
const DEFAULT_BUFFER_SIZE = 32 * 1024;

const STATEMENT_BLOCKS = new Set([
  'if_statement',
  'for_statement',
  'while_statement',
  'with_statement',
  'try_statement',
  'match_statement',
]);

const CLAUSE_BLOCKS = new Set([
  'elif_clause',
  'else_clause',
  'except_clause',
  'finally_clause',
  'case_clause',
]);

export class TreeSitterStructureResolver implements StructureResolver {
  private parser: ParserLike | null = null;
  private loadAttempted = false;
  private loadError: Error | null = null;
  private readonly cache = new Map<string, { source: string; structure: FileStructure }>();

  constructor(
    private readonly reader: SourceReader,
    private readonly logger?: ILogger,
  ) {}

  /**
   * Lazy load tree-sitter and the Python grammar.
   *
   * Idempotent; resolves to false (and keeps the error) when either package
   * cannot be imported, in which case the indentation fallback is used.
   */
  async load(): Promise<boolean> {
    if (this.loadAttempted) {
      return this.parser !== null;
    }
    this.loadAttempted = true;

    try {
      const parserModule: unknown = await import(TREE_SITTER_MODULE);
      const grammarModule: unknown = await import(PYTHON_GRAMMAR_MODULE);
      const Parser = defaultExport(parserModule);
      if (!isParserConstructor(Parser)) {
        throw new Error(`${TREE_SITTER_MODULE} does not export a parser constructor`);
      }
      const parser = new Parser();
      parser.setLanguage(defaultExport(grammarModule));
      this.parser = parser;
      return true;
    } catch (error) {
      this.loadError = error instanceof Error ? error : new Error(String(error));
      this.logger?.warn('tree-sitter unavailable, using indentation resolver', {
        error: this.loadError.message,
      });
      return false;
    }
  }

  getLoadError(): Error | null {
    return this.loadError;
  }

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

    await this.load();
    const structure = this.parseStructure(filePath, source);
    this.cache.set(filePath, { source, structure });
    return structure;
  }

  private parseStructure(filePath: string, source: string): FileStructure {
    if (!this.parser) {return buildIndentStructure(source);}
    try {
      const bufferSize = Math.max(DEFAULT_BUFFER_SIZE, source.length * 2);
      return buildSyntaxStructure(this.parser.parse(source, null, { bufferSize }).rootNode);
    } catch (error) {
      this.logger?.warn('tree-sitter parse failed, using indentation resolver', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return buildIndentStructure(source);
    }
  }
}

/**
 * Build the structural index from a Python syntax tree.
 */
export function buildSyntaxStructure(root: SyntaxNodeLike): FileStructure {
  const structure = emptyStructure();
  collectSignatures(structure, root, '');
  collectScopes(structure, root, '');
  collectBlocks(structure, root);
  return structure;
}

// ─── Signatures ──────────────────────────────────────────────────────────────

function collectSignatures(
  structure: FileStructure,
  node: SyntaxNodeLike,
  className: string,
  decoratorStart?: number,
): void {
  if (node.type === 'decorated_definition') {
    const decorators = node.children.filter((c) => c.type === 'decorator');
    const start = decorators.length > 0
      ? Math.min(...decorators.map((d) => firstLine(d)))
      : decoratorStart;
    for (const child of node.children) {
      if (child.type !== 'decorator') {collectSignatures(structure, child, className, start);}
    }
    return;
  }

  if (node.type === 'class_definition') {
    const name = node.childForFieldName('name')?.text ?? '';
    const signature = signatureLines(node, decoratorStart);
    structure.signatures.set(scopeKey('', name), signature);
    structure.signatures.set(scopeKey(name, ''), signature);
    const body = firstChild(node, 'block');
    for (const child of body?.children ?? []) {collectSignatures(structure, child, name);}
    return;
  }

  if (node.type === 'function_definition') {
    const name = node.childForFieldName('name')?.text ?? '';
    structure.signatures.set(scopeKey(className, name), signatureLines(node, decoratorStart));
    structure.functionRanges.set(scopeKey(className, name), lineRange(firstLine(node), lastLine(node)));
    return;
  }

  for (const child of node.children) {collectSignatures(structure, child, className);}
}

function signatureLines(node: SyntaxNodeLike, decoratorStart?: number): number[] {
  const body = firstChild(node, 'block');
  const start = Math.min(firstLine(node), decoratorStart ?? Number.POSITIVE_INFINITY);
  // Body row (0-based) is the 1-based number of the line before the body
  const end = body ? body.startPosition.row : lastLine(node);
  return lineRange(start, Math.max(start, end));
}

// ─── Scopes (for locate) ─────────────────────────────────────────────────────

function collectScopes(structure: FileStructure, node: SyntaxNodeLike, className: string): void {
  let inner = className;
  if (node.type === 'class_definition') {
    const name = node.childForFieldName('name')?.text ?? '';
    structure.classes.push({ name, className, start: firstLine(node), end: lastLine(node) });
    inner = name;
  } else if (node.type === 'function_definition') {
    const name = node.childForFieldName('name')?.text ?? '';
    structure.functions.push({ name, className, start: firstLine(node), end: lastLine(node) });
  }
  for (const child of node.children) {collectScopes(structure, child, inner);}
}

// ─── Blocks ──────────────────────────────────────────────────────────────────

function collectBlocks(structure: FileStructure, node: SyntaxNodeLike): void {
  if (STATEMENT_BLOCKS.has(node.type)) {
    addBlockHeaders(structure, firstLine(node), lastLine(node), declarations(node));
  }
  for (const child of node.children) {collectBlocks(structure, child);}
}

function declarations(node: SyntaxNodeLike): number[] {
  const lines: number[] = [];
  if (STATEMENT_BLOCKS.has(node.type) || CLAUSE_BLOCKS.has(node.type)) {
    lines.push(firstLine(node));
  }
  for (const child of node.children) {
    if (CLAUSE_BLOCKS.has(child.type)) {
      lines.push(...declarations(child));
    } else if (child.type === 'block') {
      for (const grandchild of child.children) {
        if (CLAUSE_BLOCKS.has(grandchild.type)) {lines.push(...declarations(grandchild));}
      }
    }
  }
  return lines;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function firstLine(node: SyntaxNodeLike): number {
  return node.startPosition.row + 1;
}

function lastLine(node: SyntaxNodeLike): number {
  return node.endPosition.row + 1;
}

function firstChild(node: SyntaxNodeLike, type: string): SyntaxNodeLike | undefined {
  return node.children.find((c) => c.type === type);
}

function defaultExport(mod: unknown): unknown {
  if (typeof mod === 'object' && mod !== null && 'default' in mod) {
    return mod.default;
  }
  return mod;
}

function isParserConstructor(value: unknown): value is ParserConstructor {
  return typeof value === 'function';
}
