import { describe, it, expect, beforeEach } from 'vitest';
import { ConsistencyError, type ChunkIdentity } from '@bugtrail/agent-contracts';
import { CodeContextStore } from '../code-context-store.js';

const PARAMS = { alpha: 1, beta: 0.5, gamma: 0.9 };

function identity(overrides: Partial<ChunkIdentity> = {}): ChunkIdentity {
  return {
    filePath: 'src/app.py',
    wholeFunction: false,
    lines: [10, 11, 12],
    ...overrides,
  };
}

describe('CodeContextStore', () => {
  let store: CodeContextStore;

  beforeEach(() => {
    store = new CodeContextStore();
  });

  // ── Identity ──────────────────────────────────────────────────────

  describe('registerOrGet()', () => {
    it('should return the same chunk for the same identity', () => {
      const a = store.registerOrGet(identity({ lines: [12, 10, 11] }));
      const b = store.registerOrGet(identity({ lines: [10, 11, 12, 12] }));

      expect(b).toBe(a);
      expect(store.size).toBe(1);
      expect(a.identity.lines).toEqual([10, 11, 12]);
    });

    it('should treat whole-function and partial chunks as different', () => {
      store.registerOrGet(identity({ functionName: 'run', wholeFunction: true }));
      store.registerOrGet(identity({ functionName: 'run', wholeFunction: false }));

      expect(store.size).toBe(2);
    });

    it('should treat an empty class name like a missing one', () => {
      const a = store.registerOrGet(identity({ className: '' }));
      const b = store.registerOrGet(identity());

      expect(b).toBe(a);
      expect(a.identity.className).toBeUndefined();
    });

    it('should hand out chunks whose identity cannot be changed', () => {
      const chunk = store.registerOrGet(identity());

      expect(Object.isFrozen(chunk.identity)).toBe(true);
      expect(Object.isFrozen(chunk.identity.lines)).toBe(true);
      expect(() => Reflect.apply(Array.prototype.push, chunk.identity.lines, [40])).toThrow(TypeError);
      expect(() => Reflect.set(chunk.identity, 'filePath', 'other.py')).not.toThrow();
      expect(chunk.identity.filePath).toBe('src/app.py');
      expect(store.findContaining('src/app.py', 40)).toEqual([]);
      expect(store.registerOrGet(identity()).id).toBe(chunk.id);
    });

    it('should not follow later changes to the registered lines', () => {
      const lines = [10, 11, 12];
      const chunk = store.registerOrGet(identity({ lines }));
      lines.push(40);

      expect(chunk.identity.lines).toEqual([10, 11, 12]);
      expect(store.findContaining('src/app.py', 40)).toEqual([]);
    });

    it('should keep eof sticky once set', () => {
      const chunk = store.registerOrGet(identity(), { eof: true });
      store.registerOrGet(identity());

      expect(chunk.eof).toBe(true);
    });
  });

  // ── Activity ──────────────────────────────────────────────────────

  describe('recordStep()', () => {
    it('should keep every activity sequence as long as the step count', () => {
      const a = store.registerOrGet(identity({ lines: [1] }));
      store.recordStep(1, [a.id]);
      const b = store.registerOrGet(identity({ lines: [2] }));
      store.recordStep(2, [b.id], new Map([[a.id, 1]]));
      const c = store.registerOrGet(identity({ lines: [3] }));
      store.recordStep(3, []);

      for (const chunk of [a, b, c]) {
        const activity = store.activity(chunk.id);
        expect(activity.accessed).toHaveLength(store.steps);
        expect(activity.referred).toHaveLength(store.steps);
      }
      expect(store.activity(a.id)).toMatchObject({ accessed: [1, 0, 0], referred: [0, 1, 0] });
      expect(store.activity(b.id)).toMatchObject({ accessed: [0, 1, 0], referred: [0, 0, 0] });
      expect(store.activity(c.id)).toMatchObject({ accessed: [0, 0, 0], referred: [0, 0, 0] });
    });

    it('should reject a repeated step', () => {
      store.recordStep(1, []);

      expect(() => store.recordStep(1, [])).toThrow(ConsistencyError);
    });

    it('should reject a skipped step', () => {
      expect(() => store.recordStep(2, [])).toThrow(ConsistencyError);
      expect(store.steps).toBe(0);
    });

    it('should reject unknown chunks without appending anything', () => {
      const a = store.registerOrGet(identity());

      expect(() => store.recordStep(1, [a.id, 'missing'])).toThrow(ConsistencyError);
      expect(store.steps).toBe(0);
      expect(store.activity(a.id).accessed).toEqual([]);
    });

    it('should reject negative reference counts', () => {
      const a = store.registerOrGet(identity());

      expect(() => store.recordStep(1, [], new Map([[a.id, -1]]))).toThrow(ConsistencyError);
    });
  });

  // ── Score ─────────────────────────────────────────────────────────

  describe('score()', () => {
    it('should decay accessed and referred activity', () => {
      const chunk = store.registerOrGet(identity());
      store.recordStep(1, [chunk.id]);
      store.recordStep(2, [chunk.id], new Map([[chunk.id, 2]]));

      // (1·1 + 0.5·0)·0.9 + (1·1 + 0.5·2)·1
      expect(store.score(chunk.id, PARAMS)).toBeCloseTo(2.9, 10);
    });

    it('should count steps before registration as zeros', () => {
      store.recordStep(1, []);
      store.recordStep(2, []);
      const late = store.registerOrGet(identity());
      store.recordStep(3, [late.id]);
      store.recordStep(4, []);

      expect(store.score(late.id, PARAMS)).toBeCloseTo(0.9, 10);
    });

    it('should only weigh the last step when gamma is zero', () => {
      const chunk = store.registerOrGet(identity());
      store.recordStep(1, [chunk.id]);
      store.recordStep(2, [], new Map([[chunk.id, 4]]));

      expect(store.score(chunk.id, { alpha: 1, beta: 0.5, gamma: 0 })).toBe(2);
    });

    it('should be non-decreasing in alpha and beta', () => {
      const chunk = store.registerOrGet(identity());
      store.recordStep(1, [chunk.id], new Map([[chunk.id, 1]]));
      store.recordStep(2, [], new Map([[chunk.id, 3]]));
      store.recordStep(3, [chunk.id]);

      let previous = -1;
      for (const alpha of [0, 0.5, 1, 2]) {
        const value = store.score(chunk.id, { ...PARAMS, alpha });
        expect(value).toBeGreaterThanOrEqual(previous);
        previous = value;
      }
      previous = -1;
      for (const beta of [0, 0.25, 1, 4]) {
        const value = store.score(chunk.id, { ...PARAMS, beta });
        expect(value).toBeGreaterThanOrEqual(previous);
        previous = value;
      }
    });

    it('should memoize by step and refresh after a new step', () => {
      const chunk = store.registerOrGet(identity());
      store.recordStep(1, [chunk.id]);

      expect(store.score(chunk.id, PARAMS)).toBe(1);
      expect(store.activity(chunk.id)).toMatchObject({ score: 1, scoreStep: 1 });

      store.recordStep(2, []);
      expect(store.score(chunk.id, PARAMS)).toBeCloseTo(0.9, 10);
      expect(store.activity(chunk.id).scoreStep).toBe(2);
    });
  });

  // ── Select ────────────────────────────────────────────────────────

  describe('select()', () => {
    it('should group by file and order chunks by first line', () => {
      const late = store.registerOrGet(identity({ filePath: 'b.py', lines: [40, 41] }));
      const early = store.registerOrGet(identity({ filePath: 'b.py', lines: [5] }));
      const other = store.registerOrGet(identity({ filePath: 'a.py', lines: [1] }));
      store.recordStep(1, [late.id, early.id, other.id]);

      const selection = store.select(0, PARAMS);

      expect([...selection.keys()]).toEqual(['b.py', 'a.py']);
      expect(selection.get('b.py')?.map((c) => c.identity.lines[0])).toEqual([5, 40]);
    });

    it('should only include chunks scoring above the threshold', () => {
      const hot = store.registerOrGet(identity({ lines: [1] }));
      const cold = store.registerOrGet(identity({ lines: [2] }));
      store.recordStep(1, [cold.id]);
      store.recordStep(2, [hot.id]);

      // hot = 1, cold = 0.9
      const selection = store.select(0.95, PARAMS);

      expect(selection.get('src/app.py')?.map((c) => c.id)).toEqual([hot.id]);
    });

    it('should be empty before any step', () => {
      store.registerOrGet(identity());

      expect(store.select(0, PARAMS).size).toBe(0);
    });
  });

  describe('findContaining()', () => {
    it('should match chunks of the same file holding the line', () => {
      const a = store.registerOrGet(identity({ lines: [10, 11] }));
      store.registerOrGet(identity({ lines: [20] }));
      store.registerOrGet(identity({ filePath: 'other.py', lines: [10] }));

      expect(store.findContaining('src/app.py', 11)).toEqual([a]);
    });
  });

  describe('toJSON()', () => {
    it('should serialize dense activity that callers cannot write back', () => {
      store.recordStep(1, []);
      const chunk = store.registerOrGet(identity());
      store.recordStep(2, [chunk.id], new Map([[chunk.id, 1]]));

      const snapshot = store.toJSON();

      expect(snapshot.steps).toBe(2);
      expect(snapshot.chunks).toHaveLength(1);
      expect(snapshot.chunks[0]).toMatchObject({
        id: chunk.id,
        firstStep: 1,
        eof: false,
        accessed: [0, 1],
        referred: [0, 1],
      });

      snapshot.chunks[0]?.accessed.push(1);
      snapshot.chunks[0]?.referred.fill(7);
      expect(store.activity(chunk.id)).toMatchObject({ accessed: [0, 1], referred: [0, 1] });
    });
  });
});
