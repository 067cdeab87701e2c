/**
 * @module @bugtrail/agent-contracts/code-context
 * Code chunks tracked by the code-context store.
 *
 * A chunk is a labeled slice of one source file. Its identity is the tuple
 * (filePath, className, functionName, wholeFunction, lines); two loads that
 * produce the same tuple refer to the same chunk.
 */

/**
 * Stable chunk identifier: the serialized identity key.
 */
export type ChunkId = string;

/**
 * Identity of a code chunk.
 */
export interface ChunkIdentity {
  /** Path as the agent referred to it (relative to the task root or absolute) */
  filePath: string;
  /** Enclosing class, empty when the chunk is not inside a class */
  className?: string;
  /** Enclosing function, empty when the chunk is not inside a function */
  functionName?: string;
  /** True when the chunk stands for the whole enclosing function */
  wholeFunction: boolean;
  /** 1-based line numbers; order and duplicates do not affect identity */
  lines: readonly number[];
}

/**
 * Per-step activity of a chunk.
 *
 * Both sequences are indexed by operation step (index 0 = step 1) and have
 * exactly `steps` entries once exposed by the store.
 */
export interface ChunkActivity {
  accessed: number[];
  referred: number[];
  /** Memoized score, valid only for `scoreStep` */
  score?: number;
  scoreStep?: number;
}

/**
 * A chunk as owned by the store. Callers get read-only views; the identity
 * is frozen at registration.
 */
export interface CodeChunk {
  readonly id: ChunkId;
  readonly identity: Readonly<ChunkIdentity>;
  /** Step count at registration; steps before it are implicit zeros */
  readonly firstStep: number;
  /** Explicit range ran past the end of the file */
  readonly eof: boolean;
}

/**
 * Decay parameters of the referral score.
 */
export interface DecayParams {
  alpha: number;
  beta: number;
  /** Decay per step, in [0, 1) */
  gamma: number;
}

/**
 * Result of `select()`: chunks grouped by file, files in first-registration
 * order, chunks ordered by ascending minimum line.
 */
export type ChunkSelection = Map<string, CodeChunk[]>;

/**
 * Structural lines of a file region, as produced by a structure resolver.
 */
export interface StructuralLines {
  /** Class/function signature lines (decorators and multi-line headers included) */
  signatureLines: number[];
  /** Headers of loop/conditional blocks (and their sibling clauses) containing a line */
  blockHeaderLines: number[];
  /** Full line range of the named function, empty when it cannot be found */
  functionLines: number[];
}

/**
 * Enclosing definition of a line.
 */
export interface EnclosingScope {
  className?: string;
  functionName?: string;
  functionStart?: number;
  functionEnd?: number;
}

/**
 * Build the identity key of a chunk.
 *
 * Lines are sorted and de-duplicated so the key does not depend on the order
 * in which a tool produced them.
 */
export function chunkKey(identity: ChunkIdentity): ChunkId {
  const lines = normalizeLines(identity.lines);
  return [
    identity.filePath,
    identity.className ?? '',
    identity.functionName ?? '',
    identity.wholeFunction ? 'whole' : 'part',
    lines.join(','),
  ].join('|');
}

export function normalizeLines(lines: readonly number[]): number[] {
  return [...new Set(lines)].sort((a, b) => a - b);
}
