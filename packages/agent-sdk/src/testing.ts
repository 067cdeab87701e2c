/**
 * @bugtrail/agent-sdk/testing
 *
 * Ready-made fakes for testing agent-core and any code that works with SDK
 * types. Import from this sub-path, never from the main index.
 *
 * @example
 *   import { makeScriptedModel, makeFakeEnvironment } from '@bugtrail/agent-sdk/testing';
 *
 * All helpers use vitest's `vi.fn()`, so vitest must be available in the test env.
 */

import { vi } from 'vitest';
import type { OperationProperty } from '@bugtrail/agent-contracts';
import type { ModelClient, Prompt } from './model.js';
import type { ExecutionEnvironment, ExecutionResult, SourceReader, VersionControl } from './environment.js';
import type { DeadEndContext, DeadEndStrategy } from './dead-end.js';
import type { ILogger } from './logger.js';

// ─── Logger mock ──────────────────────────────────────────────────────────────

export function makeMockLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

// ─── ModelClient mock ─────────────────────────────────────────────────────────

export interface ScriptedModel extends ModelClient {
  /** Prompts received, in call order */
  readonly prompts: Prompt[];
}

/** Sequential replies; each call pops the next one; running out is a test bug */
export function makeScriptedModel(replies: Array<string | Error>): ScriptedModel {
  const queue = [...replies];
  const prompts: Prompt[] = [];
  return {
    prompts,
    invoke: vi.fn(async (prompt: Prompt): Promise<string> => {
      prompts.push(prompt);
      const next = queue.shift();
      if (next === undefined) {
        throw new Error(`Scripted model has no reply left (call ${prompts.length})`);
      }
      if (next instanceof Error) {throw next;}
      return next;
    }),
  };
}

// ─── ExecutionEnvironment mock ────────────────────────────────────────────────

export type CommandHandler = (command: string) => ExecutionResult | Promise<ExecutionResult>;

export interface FakeEnvironment extends ExecutionEnvironment {
  readonly commands: string[];
}

/**
 * Environment answering from a command → result table, or a handler.
 * Unknown commands exit with 127.
 */
export function makeFakeEnvironment(
  results: Record<string, ExecutionResult> | CommandHandler = {},
): FakeEnvironment {
  const commands: string[] = [];
  return {
    commands,
    execute: vi.fn(async (command: string): Promise<ExecutionResult> => {
      commands.push(command);
      if (typeof results === 'function') {return results(command);}
      return results[command] ?? { output: `${command}: command not found`, returncode: 127 };
    }),
  };
}

// ─── SourceReader mock ────────────────────────────────────────────────────────

export function makeSourceReader(files: Record<string, string>): SourceReader {
  return {
    read: vi.fn(async (filePath: string) => files[filePath] ?? ''),
  };
}

// ─── VersionControl mock ──────────────────────────────────────────────────────

/** Diffs are returned in order; the last one repeats */
export function makeVersionControl(diffs: string[] = ['']): VersionControl {
  let index = 0;
  return {
    diff: vi.fn(async () => {
      const diff = diffs[Math.min(index, diffs.length - 1)] ?? '';
      index++;
      return diff;
    }),
  };
}

// ─── DeadEndStrategy mock ─────────────────────────────────────────────────────

export interface RecordingDeadEndStrategy extends DeadEndStrategy {
  readonly calls: DeadEndContext[];
}

export function makeDeadEndStrategy(): RecordingDeadEndStrategy {
  const calls: DeadEndContext[] = [];
  return {
    name: 'recording',
    calls,
    onDeadEnd: vi.fn(async (ctx: DeadEndContext) => {
      calls.push(ctx);
    }),
  };
}

// ─── Reply builders ───────────────────────────────────────────────────────────

export interface ActionReplyParts {
  property?: OperationProperty;
  thoughts?: string;
  action: string;
}

/** Reply for an iteration with nothing to judge */
export function firstStepReply(parts: ActionReplyParts): string {
  return [
    `<property>${parts.property ?? 'deterministic'}</property>`,
    `<thoughts>${parts.thoughts ?? ''}</thoughts>`,
    `<action>${parts.action}</action>`,
  ].join('\n');
}

/** Reply judging the incoming operation and proposing the next one */
export function steadyReply(
  parts: ActionReplyParts & { decision: 'keep' | 'drop'; summary?: string; lessons?: string },
): string {
  return [
    `<decision>${parts.decision}</decision>`,
    `<summary>${parts.summary ?? ''}</summary>`,
    `<lessons>${parts.lessons ?? ''}</lessons>`,
    firstStepReply(parts),
  ].join('\n');
}
