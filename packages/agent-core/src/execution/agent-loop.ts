/**
 * AgentLoop: one model call per iteration over two memories.
 *
 * Each iteration:
 *   1. prompt  = task + tools + code context + lessons + diff + chain
 *                (+ the incoming operation in the steady phase)
 *   2. reply   = exactly one model call, parsed for the current phase
 *   3. judge   = finalize the incoming operation, then record its step in
 *                the code-context store; stop on a dead end
 *   4. act     = propose the next operation on the frontier, run its action
 *                (built-in tools first, then the environment) and store the
 *                observation, the touched chunks and the working-tree diff
 *
 * Strictly sequential. Cancellation is checked between iterations and
 * before every model call; an interrupted run leaves both memories
 * consistent.
 */

import {
  AgentLoopConfigSchema,
  ParseError,
  type AgentLoopConfig,
  type AgentLoopConfigInput,
  type AgentReply,
  type ChunkId,
  type CodeChunk,
  type LoopPhase,
  type OperationId,
  type SteadyReply,
} from '@bugtrail/agent-contracts';
import type {
  AgentErrorHandler,
  DeadEndStrategy,
  ExecutionEnvironment,
  ExecutionResult,
  ILogger,
  InstalledTool,
  LoopOutcome,
  LoopResult,
  ModelClient,
  Prompt,
  SourceReader,
  StructureResolver,
  VersionControl,
} from '@bugtrail/agent-sdk';
import { CodeContextStore } from '../memory/code-context-store.js';
import { ContextRenderer, groupChunks } from '../context/context-renderer.js';
import { CodeContextTools } from '../tools/code-context-tools.js';
import { parseToolResponses, summarizeToolOutput, type ParsedToolResponse } from '../tools/tool-response.js';
import { TreeSitterStructureResolver } from '../tools/parsers/tree-sitter-structure-resolver.js';
import { ReasoningTree, ROOT_ID } from '../history/reasoning-tree.js';
import { ChainRenderer } from '../history/chain-renderer.js';
import { parseReply } from '../executor/reply-parser.js';
import { countReferences, extractCitations } from '../executor/citation-parser.js';
import { PromptBuilder } from '../prompt/prompt-builder.js';
import { createLogger } from '../logging/logger.js';
import { DefaultErrorHandler } from './error-handler.js';
import { LoopStateMachine } from './state-machine.js';
import { sleep, withTimeout } from './timeout.js';

export const SUBMISSION_SENTINELS = ['COMPLETE_TASK_AND_SUBMIT_FINAL_OUTPUT', 'MINI_SWE_AGENT_FINAL_OUTPUT'];

// ═══════════════════════════════════════════════════════════════════════
// Public interfaces
// ═══════════════════════════════════════════════════════════════════════

export interface AgentLoopDeps {
  model: ModelClient;
  environment: ExecutionEnvironment;
  reader: SourceReader;
  versionControl: VersionControl;
  /** Defaults to tree-sitter with the indentation fallback */
  resolver?: StructureResolver;
  /** Invoked once when the frontier reaches the consecutive-invalid limit */
  deadEndStrategy?: DeadEndStrategy;
  errorHandler?: AgentErrorHandler;
  logger?: ILogger;
}

export interface AgentLoopRunOptions {
  /** Documentation of environment tools, appended to the built-in usage */
  toolUsage?: string;
  /** Environment tools listed in the prompt; statuses follow their responses */
  installedTools?: readonly InstalledTool[];
  /** Files shown whole in the code context for the entire run */
  defaultFiles?: readonly string[];
  signal?: AbortSignal;
}

type Stop = { stop: LoopOutcome; message: string };

type ActionOutcome =
  | { kind: 'observed' }
  | { kind: 'submitted'; submission: string };

type ActionRun = ExecutionResult & { submission?: string };

// ═══════════════════════════════════════════════════════════════════════
// AgentLoop
// ═══════════════════════════════════════════════════════════════════════

export class AgentLoop {
  readonly config: AgentLoopConfig;
  readonly store = new CodeContextStore();
  readonly tree: ReasoningTree;
  readonly state = new LoopStateMachine();

  private readonly renderer: ContextRenderer;
  private readonly chainRenderer: ChainRenderer;
  private readonly codeTools: CodeContextTools;
  private readonly prompts = new PromptBuilder();
  private readonly errorHandler: AgentErrorHandler;
  private readonly logger: ILogger;

  private incoming: OperationId | undefined;
  private installedTools: InstalledTool[] = [];
  private defaultChunks: ChunkId[] = [];
  private modelCalls = 0;
  private started = false;

  constructor(
    private readonly deps: AgentLoopDeps,
    config: AgentLoopConfigInput = {},
  ) {
    this.config = AgentLoopConfigSchema.parse(config);
    this.logger = deps.logger ?? createLogger('loop');
    this.errorHandler = deps.errorHandler ?? new DefaultErrorHandler();

    const resolver = deps.resolver ?? new TreeSitterStructureResolver(deps.reader, this.logger);
    this.tree = new ReasoningTree({ maxConsecutiveInvalid: this.config.maxConsecutiveInvalid });
    this.renderer = new ContextRenderer(resolver, deps.reader);
    this.chainRenderer = new ChainRenderer({ observationMaxLength: this.config.observationMaxLength });
    this.codeTools = new CodeContextTools(this.store, resolver, deps.reader, {
      windowSize: this.config.nearbyWindowSize,
    });
  }

  get phase(): LoopPhase {
    return this.incoming === undefined ? 'first_step' : 'steady';
  }

  /**
   * Run until submission, dead end, step limit, abort or a stop from the
   * error handler. A loop instance runs once.
   */
  async run(task: string, options: AgentLoopRunOptions = {}): Promise<LoopResult> {
    if (this.started) {
      throw new Error('AgentLoop.run() can only be called once per instance');
    }
    this.started = true;
    const { signal } = options;
    this.installedTools = (options.installedTools ?? []).map((tool) => ({ ...tool }));
    await this.loadDefaultFiles(options.defaultFiles ?? []);

    for (;;) {
      const limit = this.checkLimits(signal);
      if (limit) {return this.finish(limit.stop, limit.message);}

      const phase = this.phase;
      const prompt = await this.buildPrompt(task, options.toolUsage);
      const reply = await this.ask(prompt, phase, signal);
      if ('stop' in reply) {return this.finish(reply.stop, reply.message);}

      if (reply.kind === 'steady') {
        const deadEnd = await this.judge(reply);
        if (deadEnd) {return this.finish('dead_end', deadEnd);}
      }

      const outcome = await this.act(reply, signal);
      if (outcome.kind === 'submitted') {
        return this.finish('submitted', outcome.submission);
      }
      this.state.transition('steady');
    }
  }

  /** Tools as the prompt currently lists them */
  get tools(): ReadonlyArray<Readonly<InstalledTool>> {
    return this.installedTools;
  }

  private async loadDefaultFiles(paths: readonly string[]): Promise<void> {
    for (const filePath of paths) {
      try {
        const id = this.codeTools.register(await this.codeTools.wholeFile(filePath));
        if (id && !this.defaultChunks.includes(id)) {this.defaultChunks.push(id);}
      } catch (error) {
        this.logger.warn('Default file not loaded', { filePath, error: errorMessage(error) });
      }
    }
    if (this.defaultChunks.length > 0) {
      this.logger.info('Default files loaded', { chunks: this.defaultChunks.length });
    }
  }

  // ── Prompt ─────────────────────────────────────────────────────────────────

  private async buildPrompt(task: string, toolUsage?: string): Promise<Prompt> {
    const { scoreThreshold, decay, propertyVocabulary } = this.config;
    const selection = this.store.select(scoreThreshold, decay);
    const codeContext = await this.renderer.render(
      this.defaultChunks.length > 0
        ? groupChunks([...this.chunksOf(this.defaultChunks), ...[...selection.values()].flat()])
        : selection,
    );

    let incoming: string | undefined;
    if (this.incoming !== undefined) {
      const touched = this.tree.node(this.incoming).touched;
      const accessed = await this.renderer.render(groupChunks(this.chunksOf(touched)));
      incoming = this.chainRenderer.renderIncoming(this.tree, this.incoming, accessed);
    }

    return this.prompts.build({
      task,
      toolUsage,
      installedTools: this.installedTools,
      codeContext,
      lessons: this.chainRenderer.renderLessons(this.tree),
      codeChange: this.tree.node(this.tree.frontier()).codeChange,
      chain: this.chainRenderer.renderChain(this.tree),
      incoming,
      vocabulary: propertyVocabulary,
    });
  }

  // ── Model ──────────────────────────────────────────────────────────────────

  /**
   * One model reply parsed for the phase. Retries (by the error handler's
   * decision) issue further calls for the same iteration.
   */
  private async ask(prompt: Prompt, phase: LoopPhase, signal?: AbortSignal): Promise<AgentReply | Stop> {
    let modelAttempt = 0;
    let parseAttempt = 0;

    for (;;) {
      const limit = this.checkLimits(signal);
      if (limit) {return limit;}

      let text: string;
      this.modelCalls++;
      try {
        text = await withTimeout(
          'model call',
          this.config.modelTimeoutMs,
          (s) => this.deps.model.invoke(prompt, s),
          signal,
        );
      } catch (error) {
        if (signal?.aborted) {return { stop: 'aborted', message: 'Aborted during model call' };}
        modelAttempt++;
        const decision = this.errorHandler.onModelError(error, modelAttempt);
        this.logger.warn('Model call failed', {
          attempt: modelAttempt,
          action: decision.action,
          error: errorMessage(error),
        });
        if (decision.action === 'stop') {return { stop: 'failed', message: decision.reason };}
        if (decision.delayMs) {await sleep(decision.delayMs);}
        continue;
      }

      try {
        return parseReply(text, phase, this.config.propertyVocabulary);
      } catch (error) {
        if (!(error instanceof ParseError)) {throw error;}
        parseAttempt++;
        const decision = this.errorHandler.onParseError(error, parseAttempt);
        this.logger.warn('Unparseable reply', { attempt: parseAttempt, action: decision.action, error: error.message });
        if (decision.action === 'stop') {return { stop: 'failed', message: decision.reason };}
        if (decision.delayMs) {await sleep(decision.delayMs);}
      }
    }
  }

  // ── Reflection ─────────────────────────────────────────────────────────────

  /**
   * Finalize the incoming operation and record its step. Returns a stop
   * message when its parent reached the dead-end limit.
   */
  private async judge(reply: SteadyReply): Promise<string | undefined> {
    const id = this.incoming;
    if (id === undefined) {return undefined;}

    const valid = reply.decision === 'keep';
    this.tree.finalize(id, { valid, summary: reply.summary, lessons: reply.lessons });
    this.incoming = undefined;

    const node = this.tree.node(id);
    if (valid) {
      for (const [name, status] of Object.entries(node.toolStatus)) {this.setToolStatus(name, status);}
    }
    const references = countReferences(this.store, extractCitations(node.thoughts));
    this.store.recordStep(this.tree.operationCount, node.touched, references);

    this.logger.info('Operation judged', {
      phase: 'reflection',
      step: this.tree.operationCount,
      operation: id,
      decision: reply.decision,
    });

    const parentId = node.parent ?? ROOT_ID;
    if (!this.tree.deadEndCheck(parentId)) {return undefined;}

    const parent = this.tree.node(parentId);
    this.logger.warn('Dead end reached', {
      phase: 'dead_end',
      operation: parentId,
      consecutiveInvalid: parent.consecutiveInvalid,
    });
    await this.deps.deadEndStrategy?.onDeadEnd({
      node: parent,
      attempts: this.tree.invalidOps(parentId).slice(-this.tree.maxConsecutiveInvalid),
      limit: this.tree.maxConsecutiveInvalid,
      operationCount: this.tree.operationCount,
    });
    return `Operation #${parentId} was rejected ${parent.consecutiveInvalid} times in a row`;
  }

  // ── Action ─────────────────────────────────────────────────────────────────

  private async act(reply: AgentReply, signal?: AbortSignal): Promise<ActionOutcome> {
    const id = this.tree.propose(this.tree.frontier(), {
      thoughts: reply.thoughts,
      action: reply.action,
      property: reply.property,
    });
    this.incoming = id;

    const touched: ChunkId[] = [];
    let result: ExecutionResult;
    try {
      const run = await this.runAction(id, reply.action, touched, signal);
      if (run.submission !== undefined) {
        this.tree.recordObservation(id, `[returncode: ${run.returncode}]\n${run.output.trim()}`);
        return { kind: 'submitted', submission: run.submission };
      }
      result = run;
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn('Action failed', { phase: 'action', operation: id, error: message });
      result = { output: message, returncode: -1 };
    }

    const observation = `[returncode: ${result.returncode}]\n${result.output.trim()}`;
    this.tree.attachChunks(id, touched);
    this.tree.recordObservation(id, observation, await this.codeChangeAfter(id));

    this.logger.info('Action executed', {
      phase: 'action',
      operation: id,
      returncode: result.returncode,
      touched: touched.length,
    });
    return { kind: 'observed' };
  }

  /**
   * Built-in tools first, then the environment. Chunks are pushed to
   * `touched` as they register so a later failure keeps them.
   */
  private async runAction(
    id: OperationId,
    action: string,
    touched: ChunkId[],
    signal?: AbortSignal,
  ): Promise<ActionRun> {
    const builtin = await this.codeTools.run(action);
    if (builtin) {
      touched.push(...builtin.touched);
      return { output: builtin.output, returncode: builtin.returncode };
    }

    const raw = await this.execute(action, signal);
    const submission = submissionOf(raw.output);
    if (submission !== undefined) {return { ...raw, submission };}

    const responses = parseToolResponses(raw.output);
    this.applyToolStatus(id, responses);
    for (const { codeContext } of responses) {
      for (const location of codeContext) {
        const chunkId = this.codeTools.register(await this.codeTools.nearby(location.file_path, location.line_number));
        if (chunkId) {touched.push(chunkId);}
      }
    }
    return summarizeToolOutput(raw.output, raw.returncode, responses);
  }

  private applyToolStatus(id: OperationId, responses: readonly ParsedToolResponse[]): void {
    for (const { response } of responses) {
      const name = response.package_name;
      const status = response.status;
      if (!name || status === null || status === undefined) {continue;}
      this.tree.recordToolStatus(id, name, status);
      this.setToolStatus(name, status);
    }
  }

  private setToolStatus(name: string, status: string): void {
    const tool = this.installedTools.find((t) => t.name === name);
    if (tool) {tool.status = status;}
  }

  /** Working-tree diff, or the parent's when the diff cannot be taken */
  private async codeChangeAfter(id: OperationId): Promise<string> {
    try {
      return await this.deps.versionControl.diff();
    } catch (error) {
      this.logger.warn('Diff failed', { phase: 'action', operation: id, error: errorMessage(error) });
      return this.tree.node(this.tree.node(id).parent ?? ROOT_ID).codeChange;
    }
  }

  /**
   * Run a command in the environment. Failures and timeouts become results.
   */
  private async execute(command: string, signal?: AbortSignal): Promise<ExecutionResult> {
    try {
      return await withTimeout(
        'action',
        this.config.actionTimeoutMs,
        (s) => this.deps.environment.execute(command, s),
        signal,
      );
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn('Action failed', { phase: 'action', error: message });
      return { output: message, returncode: -1 };
    }
  }

  // ── Helpers ────────────────────────────────────────────────────────────────

  private checkLimits(signal?: AbortSignal): Stop | undefined {
    if (signal?.aborted) {
      return { stop: 'aborted', message: 'Aborted' };
    }
    const { stepLimit } = this.config;
    if (stepLimit > 0 && this.modelCalls >= stepLimit) {
      return { stop: 'step_limit', message: `Step limit of ${stepLimit} model calls reached` };
    }
    return undefined;
  }

  private chunksOf(ids: readonly ChunkId[]): CodeChunk[] {
    const chunks: CodeChunk[] = [];
    for (const id of ids) {
      const chunk = this.store.get(id);
      if (chunk) {chunks.push(chunk);}
    }
    return chunks;
  }

  private finish(outcome: LoopOutcome, message: string): LoopResult {
    this.state.transition(outcome, message);
    this.logger.info('Loop stopped', {
      phase: 'stop',
      outcome,
      operations: this.tree.operationCount,
      modelCalls: this.modelCalls,
    });
    return {
      outcome,
      message,
      operationCount: this.tree.operationCount,
      modelCalls: this.modelCalls,
    };
  }
}

/**
 * Text after the sentinel line, or undefined when the output is not a
 * submission.
 */
export function submissionOf(output: string): string | undefined {
  const lines = output.trimStart().split('\n');
  const first = lines[0]?.trim();
  if (first === undefined || !SUBMISSION_SENTINELS.includes(first)) {return undefined;}
  return lines.slice(1).join('\n');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
