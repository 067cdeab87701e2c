/**
 * CodeContextStore: scored working memory of source code.
 *
 * Pure data structure: no I/O, no rendering, no step counter of its own
 * beyond the one the caller advances through recordStep().
 *
 * Features:
 *   - Identity-based dedup (same file/class/function/lines → same chunk)
 *   - Per-step activity: accessed (0/1) and referred (citation count)
 *   - Decayed score S = Σ (α·A_i + β·R_i)·γ^(M−i) over the full step window
 *   - Deterministic selection grouped by file
 *   - Serializable (toJSON) for run artifacts
 */

import {
  chunkKey,
  normalizeLines,
  ConsistencyError,
  type ChunkActivity,
  type ChunkId,
  type ChunkIdentity,
  type ChunkSelection,
  type CodeChunk,
  type DecayParams,
} from '@bugtrail/agent-contracts';

interface ScoreCache {
  step: number;
  alpha: number;
  beta: number;
  gamma: number;
  value: number;
}

// eof is the only field that changes after registration
type StoredChunk = Omit<CodeChunk, 'eof'> & { eof: boolean };

interface ChunkRecord {
  chunk: StoredChunk;
  /** Activity from firstStep + 1 onwards; earlier steps are implicit zeros */
  accessed: number[];
  referred: number[];
  cache?: ScoreCache;
}

export interface CodeContextSnapshot {
  steps: number;
  chunks: Array<CodeChunk & { accessed: number[]; referred: number[] }>;
}

export class CodeContextStore {
  // Insertion-ordered: registration order drives file order in select()
  private readonly records = new Map<ChunkId, ChunkRecord>();
  private stepCount = 0;

  /** Completed operation steps recorded so far */
  get steps(): number {
    return this.stepCount;
  }

  get size(): number {
    return this.records.size;
  }

  // ── Write ──────────────────────────────────────────────────────────────────

  /**
   * Return the chunk for an identity, registering it if unseen.
   * A new chunk backfills no history.
   */
  registerOrGet(identity: ChunkIdentity, options: { eof?: boolean } = {}): CodeChunk {
    const id = chunkKey(identity);
    const existing = this.records.get(id);
    if (existing) {
      if (options.eof) {existing.chunk.eof = true;}
      return existing.chunk;
    }

    const chunk: StoredChunk = {
      id,
      identity: Object.freeze({
        filePath: identity.filePath,
        className: identity.className || undefined,
        functionName: identity.functionName || undefined,
        wholeFunction: identity.wholeFunction,
        lines: Object.freeze(normalizeLines(identity.lines)),
      }),
      firstStep: this.stepCount,
      eof: options.eof ?? false,
    };
    this.records.set(id, { chunk, accessed: [], referred: [] });
    return chunk;
  }

  markEof(id: ChunkId): void {
    this.require(id).chunk.eof = true;
  }

  /**
   * Append one step of activity to every registered chunk.
   *
   * Must be called exactly once per completed operation, with
   * `step === steps + 1`. Validation happens before any append, so a failed
   * call leaves the store untouched.
   */
  recordStep(
    step: number,
    touched: Iterable<ChunkId>,
    referredCounts: ReadonlyMap<ChunkId, number> = new Map(),
  ): void {
    if (step !== this.stepCount + 1) {
      throw new ConsistencyError(
        `recordStep(${step}) out of order: ${this.stepCount} steps recorded, expected step ${this.stepCount + 1}`,
      );
    }

    const touchedIds = new Set(touched);
    for (const id of touchedIds) {
      if (!this.records.has(id)) {
        throw new ConsistencyError(`recordStep(${step}): touched chunk is not registered: ${id}`);
      }
    }
    for (const [id, count] of referredCounts) {
      if (!this.records.has(id)) {
        throw new ConsistencyError(`recordStep(${step}): referred chunk is not registered: ${id}`);
      }
      if (!Number.isInteger(count) || count < 0) {
        throw new ConsistencyError(`recordStep(${step}): invalid reference count ${count} for ${id}`);
      }
    }

    for (const [id, record] of this.records) {
      record.accessed.push(touchedIds.has(id) ? 1 : 0);
      record.referred.push(referredCounts.get(id) ?? 0);
    }
    this.stepCount = step;

    for (const record of this.records.values()) {
      const expected = this.stepCount - record.chunk.firstStep;
      if (record.accessed.length !== expected || record.referred.length !== expected) {
        throw new ConsistencyError(
          `Chunk ${record.chunk.id} skipped a step: ${record.accessed.length} entries, expected ${expected}`,
        );
      }
    }
  }

  // ── Read ───────────────────────────────────────────────────────────────────

  get(id: ChunkId): CodeChunk | undefined {
    return this.records.get(id)?.chunk;
  }

  has(id: ChunkId): boolean {
    return this.records.has(id);
  }

  /** All chunks in registration order */
  chunks(): CodeChunk[] {
    return [...this.records.values()].map((r) => r.chunk);
  }

  /**
   * Dense activity (length === steps), leading zeros for steps before the
   * chunk existed.
   */
  activity(id: ChunkId): ChunkActivity {
    const record = this.require(id);
    const padding = new Array<number>(record.chunk.firstStep).fill(0);
    return {
      accessed: [...padding, ...record.accessed],
      referred: [...padding, ...record.referred],
      score: record.cache?.value,
      scoreStep: record.cache?.step,
    };
  }

  /** Registered chunks of a file whose lines contain `line` */
  findContaining(filePath: string, line: number): CodeChunk[] {
    return this.chunks().filter(
      (c) => c.identity.filePath === filePath && c.identity.lines.includes(line),
    );
  }

  // ── Score ──────────────────────────────────────────────────────────────────

  /**
   * S = Σ_{i=1..M} (α·A_i + β·R_i)·γ^(M−i), M = steps.
   *
   * Leading zeros contribute nothing, so only the stored tail is summed
   * (Horner form). The cache only memoizes; it never changes the result.
   */
  score(id: ChunkId, params: DecayParams): number {
    const record = this.require(id);
    const { alpha, beta, gamma } = params;
    const cache = record.cache;
    if (
      cache
      && cache.step === this.stepCount
      && cache.alpha === alpha
      && cache.beta === beta
      && cache.gamma === gamma
    ) {
      return cache.value;
    }

    let value = 0;
    for (let i = 0; i < record.accessed.length; i++) {
      value = value * gamma + alpha * (record.accessed[i] ?? 0) + beta * (record.referred[i] ?? 0);
    }

    record.cache = { step: this.stepCount, alpha, beta, gamma, value };
    return value;
  }

  /**
   * Chunks with score > threshold, grouped by file.
   * Files keep first-registration order; chunks within a file are ordered by
   * ascending minimum line, ties broken by identity key.
   */
  select(threshold: number, params: DecayParams): ChunkSelection {
    const selection: ChunkSelection = new Map();
    for (const record of this.records.values()) {
      if (this.score(record.chunk.id, params) <= threshold) {continue;}
      const file = record.chunk.identity.filePath;
      const list = selection.get(file);
      if (list) {
        list.push(record.chunk);
      } else {
        selection.set(file, [record.chunk]);
      }
    }

    for (const list of selection.values()) {
      list.sort((a, b) => {
        const diff = minLine(a) - minLine(b);
        if (diff !== 0) {return diff;}
        return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
      });
    }
    return selection;
  }

  // ── Serialization ──────────────────────────────────────────────────────────

  toJSON(): CodeContextSnapshot {
    return {
      steps: this.stepCount,
      chunks: this.chunks().map((chunk) => ({ ...chunk, ...this.activity(chunk.id) })),
    };
  }

  // ── Private ────────────────────────────────────────────────────────────────

  private require(id: ChunkId): ChunkRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new ConsistencyError(`Unknown chunk: ${id}`);
    }
    return record;
  }
}

function minLine(chunk: CodeChunk): number {
  return chunk.identity.lines[0] ?? Number.POSITIVE_INFINITY;
}
