/**
 * ChainRenderer: text views of the reasoning tree for the prompt.
 *
 *   renderChain:    accepted operations, root to frontier
 *   renderLessons:  lessons of the chain and of every rejected attempt
 *   renderIncoming: the pending operation awaiting judgment
 */

import type { OperationId, OperationNode } from '@bugtrail/agent-contracts';
import { ROOT_ID, type ReasoningTree } from './reasoning-tree.js';

export interface ChainRendererOptions {
  /** Observations longer than this keep their head and tail (default 5000) */
  observationMaxLength?: number;
}

export class ChainRenderer {
  private readonly observationMaxLength: number;

  constructor(options: ChainRendererOptions = {}) {
    this.observationMaxLength = options.observationMaxLength ?? 5_000;
  }

  renderChain(tree: ReasoningTree): string {
    return tree
      .chain()
      .map((node, index) => {
        const parts = [
          `### Operation ${index + 1}`,
          field('Thoughts', node.thoughts),
          field('Action', node.action),
          field('Observation', truncateObservation(node.observation, this.observationMaxLength)),
        ];
        if (node.summary) {parts.push(field('Summary', node.summary));}
        return parts.join('\n');
      })
      .join('\n\n');
  }

  renderLessons(tree: ReasoningTree): string {
    const owners: Array<{ heading: string; node: Readonly<OperationNode> }> = [
      { heading: 'Before operation 1', node: tree.root },
      ...tree.chain().map((node, index) => ({ heading: `Operation ${index + 1}: ${node.action}`, node })),
    ];

    const groups: string[] = [];
    for (const { heading, node } of owners) {
      const lines: string[] = [];
      if (node.id !== ROOT_ID && node.lessons) {lines.push(`- ${node.lessons}`);}
      for (const rejected of tree.invalidOps(node.id)) {
        lines.push(rejected.lessons
          ? `- Rejected \`${rejected.action}\`: ${rejected.lessons}`
          : `- Rejected \`${rejected.action}\``);
      }
      if (lines.length > 0) {groups.push(`### ${heading}\n${lines.join('\n')}`);}
    }
    return groups.join('\n\n');
  }

  /**
   * The pending operation with the code its action loaded. Its diff is shown
   * only when the action changed the working tree relative to its parent.
   */
  renderIncoming(tree: ReasoningTree, id: OperationId, accessedCode = ''): string {
    const node = tree.node(id);
    const parent = tree.node(node.parent ?? ROOT_ID);

    const parts = [
      field('Thoughts', node.thoughts),
      field('Action', node.action),
      field('Observation', truncateObservation(node.observation, this.observationMaxLength)),
    ];
    if (accessedCode) {parts.push(field('Accessed code', accessedCode));}
    if (node.codeChange && node.codeChange !== parent.codeChange) {
      parts.push(field('Code change', node.codeChange));
    }
    return parts.join('\n');
  }
}

/**
 * Keep head and tail of a long observation around a marker naming the
 * number of characters removed.
 */
export function truncateObservation(text: string, maxLength: number): string {
  if (text.length <= maxLength) {return text;}
  const head = Math.floor(maxLength / 2);
  const tail = maxLength - head;
  const removed = text.length - maxLength;
  return `${text.slice(0, head)}\n... [${removed} characters truncated] ...\n${text.slice(text.length - tail)}`;
}

function field(label: string, value: string): string {
  return `${label}:\n${value}`;
}
