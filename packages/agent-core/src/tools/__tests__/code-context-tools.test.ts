import { describe, it, expect } from 'vitest';
import { makeSourceReader } from '@bugtrail/agent-sdk/testing';
import { CodeContextStore } from '../../memory/code-context-store.js';
import { IndentStructureResolver } from '../parsers/indent-structure-resolver.js';
import { CodeContextTools, describeLoad } from '../code-context-tools.js';

const SOURCE = [
  'import os',
  '',
  'class A:',
  '    def run(self, x):',
  '        if x:',
  '            y = 1',
  '        else:',
  '            y = 2',
  '        return y',
  '',
  'def helper():',
  '    return 3',
].join('\n');

function setup(windowSize?: number): { store: CodeContextStore; tools: CodeContextTools } {
  const reader = makeSourceReader({ 'mod.py': SOURCE });
  const store = new CodeContextStore();
  const tools = new CodeContextTools(store, new IndentStructureResolver(reader), reader, { windowSize });
  return { store, tools };
}

describe('CodeContextTools', () => {
  describe('nearby()', () => {
    it('should load the whole enclosing function when it fits the window', async () => {
      const load = await setup().tools.nearby('mod.py', 6);

      expect(load.identity).toEqual({
        filePath: 'mod.py',
        className: 'A',
        functionName: 'run',
        wholeFunction: true,
        lines: [4, 5, 6, 7, 8, 9],
      });
    });

    it('should clip the window to a long function', async () => {
      const load = await setup(4).tools.nearby('mod.py', 6);

      expect(load.identity.wholeFunction).toBe(false);
      expect(load.identity.functionName).toBe('run');
      expect(load.identity.lines).toEqual([4, 5, 6, 7, 8]);
    });

    it('should use a file window outside any function', async () => {
      const load = await setup(4).tools.nearby('mod.py', 1);

      expect(load.identity).toEqual({
        filePath: 'mod.py',
        className: undefined,
        functionName: undefined,
        wholeFunction: false,
        lines: [1, 2, 3],
      });
    });

    it('should load nothing from a missing file', async () => {
      const load = await setup().tools.nearby('missing.py', 3);

      expect(load.identity.lines).toEqual([]);
    });
  });

  describe('codeLines()', () => {
    it('should clamp the range and flag a range past the end', async () => {
      const load = await setup().tools.codeLines('mod.py', 10, 20);

      expect(load.identity.lines).toEqual([10, 11, 12]);
      expect(load.eof).toBe(true);
    });

    it('should not flag a range inside the file', async () => {
      const load = await setup().tools.codeLines('mod.py', 1, 12);

      expect(load.eof).toBe(false);
    });
  });

  describe('wholeFile()', () => {
    it('should cover every line of the file', async () => {
      const load = await setup().tools.wholeFile('mod.py');

      expect(load.identity).toEqual({ filePath: 'mod.py', wholeFunction: false, lines: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12] });
      expect(load.eof).toBe(false);
    });

    it('should register nothing for a missing file', async () => {
      const { store, tools } = setup();

      expect(tools.register(await tools.wholeFile('missing.py'))).toBeUndefined();
      expect(store.size).toBe(0);
    });
  });

  describe('run()', () => {
    it('should register the chunk and describe it', async () => {
      const { store, tools } = setup();

      const result = await tools.run('get-code-lines mod.py 10 20');

      expect(result?.output).toBe('Lines 10 to 12 of file mod.py are added into the code context.');
      expect(result?.returncode).toBe(0);
      expect(result?.touched).toHaveLength(1);
      const id = result?.touched[0] ?? '';
      expect(store.get(id)?.eof).toBe(true);
    });

    it('should name the function of a whole-function load', async () => {
      const result = await setup().tools.run('get-nearby-code-context mod.py 12');

      expect(result?.output).toBe('Function helper in file mod.py is added into the code context.');
    });

    it('should return the same chunk for a repeated load', async () => {
      const { store, tools } = setup();

      const first = await tools.run('get-nearby-code-context mod.py 6');
      const second = await tools.run('  get-nearby-code-context   mod.py 5 ');

      expect(second?.touched).toEqual(first?.touched);
      expect(store.size).toBe(1);
    });

    it('should report files without lines and register nothing', async () => {
      const { store, tools } = setup();

      const result = await tools.run('get-code-lines missing.py 1 5');

      expect(result).toEqual({ output: 'No lines found for missing.py', returncode: 0, touched: [] });
      expect(store.size).toBe(0);
    });

    it('should answer malformed arguments with usage', async () => {
      const result = await setup().tools.run('get-code-lines mod.py x');

      expect(result).toEqual({
        output: 'Usage: get-code-lines <file_path> <start_line> <end_line>',
        returncode: 2,
        touched: [],
      });
    });

    it('should return null for other commands', async () => {
      expect(await setup().tools.run('ls -la')).toBeNull();
    });
  });
});

describe('describeLoad', () => {
  it('should describe a partial load by its first and last line', () => {
    expect(describeLoad({ identity: { filePath: 'a.py', wholeFunction: false, lines: [3, 4, 5] }, eof: false }))
      .toBe('Lines 3 to 5 of file a.py are added into the code context.');
  });
});
