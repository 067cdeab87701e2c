/**
 * @module @bugtrail/agent-contracts/operation
 * Operation history nodes.
 *
 * Nodes live in an append-only arena owned by the reasoning tree. Links are
 * plain indices: `parent` is a weak back-reference, `child` and `invalidOps`
 * are owned by the node.
 */

import type { ChunkId } from './code-context.js';

export type OperationId = number;

/**
 * Property vocabularies the model may classify an action with.
 */
export type PropertyVocabulary = 'determinism' | 'exploration';

export type DeterminismProperty = 'deterministic' | 'non-deterministic';
export type ExplorationProperty = 'exploitative' | 'exploratory';
export type OperationProperty = DeterminismProperty | ExplorationProperty;

export const PROPERTY_VALUES: Record<PropertyVocabulary, readonly OperationProperty[]> = {
  determinism: ['deterministic', 'non-deterministic'],
  exploration: ['exploitative', 'exploratory'],
};

/**
 * Lifecycle of a node.
 *
 * root:    the sentinel the chain grows from
 * pending: proposed, awaiting its observation and judgment
 * valid:   accepted into the chain
 * invalid: rejected, kept in the parent's invalidOps
 */
export type OperationStatus = 'root' | 'pending' | 'valid' | 'invalid';

export interface OperationNode {
  id: OperationId;
  status: OperationStatus;
  thoughts: string;
  action: string;
  property?: OperationProperty;
  observation: string;
  /** Undefined until judged */
  valid?: boolean;
  summary: string;
  lessons: string;
  /** Chunks the action loaded */
  touched: ChunkId[];
  /** Working-tree diff after the action ran */
  codeChange: string;
  /** Status each environment tool reported during the action, by package name */
  toolStatus: Record<string, string>;
  parent: OperationId | null;
  child: OperationId | null;
  invalidOps: OperationId[];
  consecutiveInvalid: number;
}

/**
 * What the model proposes for a new node.
 */
export interface OperationDraft {
  thoughts: string;
  action: string;
  property?: OperationProperty;
}

/**
 * Judgment of a pending node.
 */
export interface OperationVerdict {
  valid: boolean;
  summary?: string;
  lessons?: string;
}
