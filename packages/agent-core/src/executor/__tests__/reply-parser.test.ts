import { describe, it, expect } from 'vitest';
import { ParseError } from '@bugtrail/agent-contracts';
import { firstStepReply, steadyReply } from '@bugtrail/agent-sdk/testing';
import { parseReply, stripBackticks } from '../reply-parser.js';

describe('parseReply', () => {
  describe('first step', () => {
    it('should parse property, thoughts and action', () => {
      const reply = parseReply(
        firstStepReply({ property: 'non-deterministic', thoughts: ' reproduce first ', action: 'python repro.py' }),
        'first_step',
      );

      expect(reply).toEqual({
        kind: 'first_step',
        property: 'non-deterministic',
        thoughts: 'reproduce first',
        action: 'python repro.py',
      });
    });

    it('should reject reflection tags when nothing is incoming', () => {
      const text = steadyReply({ decision: 'keep', action: 'ls' });

      expect(() => parseReply(text, 'first_step')).toThrow(ParseError);
    });

    it('should ignore free text between elements', () => {
      const text = `Sure, here it is.\n${firstStepReply({ action: 'ls' })}\nDone.`;

      expect(parseReply(text, 'first_step').action).toBe('ls');
    });
  });

  describe('steady', () => {
    it('should parse the judgment and the next action', () => {
      const text = steadyReply({
        decision: 'drop',
        summary: 'nothing learned',
        lessons: 'the log is empty',
        property: 'deterministic',
        thoughts: 'look at [1](src/app.py:12)',
        action: 'cat src/app.py',
      });

      expect(parseReply(text, 'steady')).toEqual({
        kind: 'steady',
        decision: 'drop',
        summary: 'nothing learned',
        lessons: 'the log is empty',
        property: 'deterministic',
        thoughts: 'look at [1](src/app.py:12)',
        action: 'cat src/app.py',
      });
    });

    it('should require the judgment', () => {
      expect(() => parseReply(firstStepReply({ action: 'ls' }), 'steady')).toThrow('Missing <decision>');
    });

    it('should accept a case-insensitive decision', () => {
      const text = steadyReply({ decision: 'keep', action: 'ls' }).replace('keep', ' KEEP ');

      expect(parseReply(text, 'steady').decision).toBe('keep');
    });

    it('should reject an unknown decision', () => {
      const text = steadyReply({ decision: 'keep', action: 'ls' }).replace('keep', 'accept');

      expect(() => parseReply(text, 'steady')).toThrow('<decision> must be keep or drop, got "accept"');
    });
  });

  describe('grammar errors', () => {
    it('should reject duplicate tags', () => {
      const text = `${firstStepReply({ action: 'ls' })}\n<action>pwd</action>`;

      expect(() => parseReply(text, 'first_step')).toThrow('Duplicate <action>');
    });

    it('should reject tags out of order', () => {
      const text = '<thoughts>t</thoughts><property>deterministic</property><action>ls</action>';

      expect(() => parseReply(text, 'first_step')).toThrow('<property> must come before <thoughts>');
    });

    it('should reject unterminated tags', () => {
      expect(() => parseReply('<property>deterministic</property><thoughts>t', 'first_step'))
        .toThrow('Unterminated <thoughts>');
    });

    it('should reject unknown tags outside elements', () => {
      const text = `<plan>x</plan>${firstStepReply({ action: 'ls' })}`;

      expect(() => parseReply(text, 'first_step')).toThrow('Unknown tag <plan>');
    });

    it('should allow markup inside an element', () => {
      const reply = parseReply(firstStepReply({ thoughts: 'List<int> is fine here', action: 'ls' }), 'first_step');

      expect(reply.thoughts).toBe('List<int> is fine here');
    });

    it('should reject a property outside the vocabulary', () => {
      const text = firstStepReply({ property: 'exploratory', action: 'ls' });

      expect(() => parseReply(text, 'first_step')).toThrow(ParseError);
      expect(parseReply(text, 'first_step', 'exploration').property).toBe('exploratory');
    });

    it('should reject an empty action', () => {
      expect(() => parseReply(firstStepReply({ action: '``' }), 'first_step')).toThrow('<action> is empty');
    });

    it('should keep the raw reply on the error', () => {
      try {
        parseReply('no tags at all', 'first_step');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError);
        expect(error instanceof ParseError ? error.reply : undefined).toBe('no tags at all');
      }
    });
  });
});

describe('stripBackticks', () => {
  it('should remove a fenced block', () => {
    expect(stripBackticks('```bash\npytest -x\n```')).toBe('pytest -x');
  });

  it('should remove inline backticks', () => {
    expect(stripBackticks(' `ls -la` ')).toBe('ls -la');
  });

  it('should leave plain commands alone', () => {
    expect(stripBackticks('echo `date`x')).toBe('echo `date`x');
  });
});
