/**
 * ReasoningTree: backtracking history of operations.
 *
 * Append-only arena of nodes linked by index. The chain grows from the root
 * through `child` links; rejected attempts hang off their parent in
 * `invalidOps`. A parent whose consecutive rejections reach the limit is at
 * a dead end and takes no further proposals.
 *
 * The tree owns the operation counter: every finalized node, valid or not,
 * counts once.
 */

import {
  ChainConflictError,
  ConsistencyError,
  ProposalWithheldError,
  type ChunkId,
  type OperationDraft,
  type OperationId,
  type OperationNode,
  type OperationVerdict,
} from '@bugtrail/agent-contracts';

export interface ReasoningTreeOptions {
  /** Consecutive rejections that make a dead end (default 3) */
  maxConsecutiveInvalid?: number;
}

export const ROOT_ID: OperationId = 0;

export class ReasoningTree {
  private readonly nodes: OperationNode[] = [];
  private count = 0;
  readonly maxConsecutiveInvalid: number;

  constructor(options: ReasoningTreeOptions = {}) {
    this.maxConsecutiveInvalid = options.maxConsecutiveInvalid ?? 3;
    this.nodes.push(createNode(ROOT_ID, 'root', null, { thoughts: '', action: '' }));
  }

  /** Finalized operations so far (n_operations) */
  get operationCount(): number {
    return this.count;
  }

  get size(): number {
    return this.nodes.length;
  }

  get root(): Readonly<OperationNode> {
    return this.require(ROOT_ID);
  }

  node(id: OperationId): Readonly<OperationNode> {
    return this.require(id);
  }

  // ── Write ──────────────────────────────────────────────────────────────────

  /**
   * Add a pending candidate under a finalized parent.
   * Does not check that the parent is the frontier.
   */
  propose(parentId: OperationId, draft: OperationDraft): OperationId {
    const parent = this.require(parentId);
    if (parent.status !== 'root' && parent.status !== 'valid') {
      throw new ConsistencyError(`Cannot propose under ${parent.status} operation #${parentId}`);
    }
    if (this.deadEndCheck(parentId)) {
      throw new ProposalWithheldError(
        `Operation #${parentId} reached ${parent.consecutiveInvalid} consecutive invalid attempts`,
        parentId,
      );
    }

    const id = this.nodes.length;
    this.nodes.push(createNode(id, 'pending', parentId, draft));
    return id;
  }

  recordObservation(id: OperationId, observation: string, codeChange?: string): void {
    const node = this.requirePending(id);
    node.observation = observation;
    if (codeChange !== undefined) {node.codeChange = codeChange;}
  }

  /** Chunks loaded by the node's action; duplicates are dropped */
  attachChunks(id: OperationId, ids: Iterable<ChunkId>): void {
    const node = this.requirePending(id);
    for (const chunkId of ids) {
      if (!node.touched.includes(chunkId)) {node.touched.push(chunkId);}
    }
  }

  /** Latest status a tool reported while the node's action ran */
  recordToolStatus(id: OperationId, packageName: string, status: string): void {
    this.requirePending(id).toolStatus[packageName] = status;
  }

  /**
   * Judge a pending node. Valid nodes extend the chain and reset the parent's
   * rejection streak; invalid ones join the parent's invalidOps.
   */
  finalize(id: OperationId, verdict: OperationVerdict): void {
    const node = this.requirePending(id);
    const parent = this.require(node.parent ?? ROOT_ID);

    if (verdict.valid && parent.child !== null) {
      throw new ChainConflictError(
        `Operation #${parent.id} already continues with #${parent.child}; cannot attach #${id}`,
        parent.id,
      );
    }

    node.valid = verdict.valid;
    node.summary = verdict.summary ?? '';
    node.lessons = verdict.lessons ?? '';

    if (verdict.valid) {
      node.status = 'valid';
      parent.child = id;
      parent.consecutiveInvalid = 0;
    } else {
      node.status = 'invalid';
      parent.invalidOps.push(id);
      parent.consecutiveInvalid++;
    }
    this.count++;
  }

  // ── Read ───────────────────────────────────────────────────────────────────

  /** True when the node's rejection streak is exactly `limit` */
  deadEndCheck(id: OperationId, limit: number = this.maxConsecutiveInvalid): boolean {
    return this.require(id).consecutiveInvalid === limit;
  }

  /** Last node of the chain: follow `child` from the root */
  frontier(): OperationId {
    let node = this.require(ROOT_ID);
    while (node.child !== null) {
      node = this.require(node.child);
    }
    return node.id;
  }

  /** Chain nodes from the root's child to the frontier */
  chain(): Array<Readonly<OperationNode>> {
    const chain: OperationNode[] = [];
    let next = this.require(ROOT_ID).child;
    while (next !== null) {
      const node = this.require(next);
      chain.push(node);
      next = node.child;
    }
    return chain;
  }

  invalidOps(id: OperationId): Array<Readonly<OperationNode>> {
    return this.require(id).invalidOps.map((opId) => this.require(opId));
  }

  pending(): Array<Readonly<OperationNode>> {
    return this.nodes.filter((n) => n.status === 'pending');
  }

  toJSON(): { operationCount: number; nodes: OperationNode[] } {
    return {
      operationCount: this.count,
      nodes: this.nodes.map((n) => ({
        ...n,
        touched: [...n.touched],
        invalidOps: [...n.invalidOps],
        toolStatus: { ...n.toolStatus },
      })),
    };
  }

  // ── Private ────────────────────────────────────────────────────────────────

  private require(id: OperationId): OperationNode {
    const node = this.nodes[id];
    if (!node) {
      throw new ConsistencyError(`Unknown operation #${id}`);
    }
    return node;
  }

  private requirePending(id: OperationId): OperationNode {
    const node = this.require(id);
    if (node.status !== 'pending') {
      throw new ConsistencyError(`Operation #${id} is ${node.status}, not pending`);
    }
    return node;
  }
}

function createNode(
  id: OperationId,
  status: 'root' | 'pending',
  parent: OperationId | null,
  draft: OperationDraft,
): OperationNode {
  return {
    id,
    status,
    thoughts: draft.thoughts,
    action: draft.action,
    property: draft.property,
    observation: '',
    summary: '',
    lessons: '',
    touched: [],
    codeChange: '',
    toolStatus: {},
    parent,
    child: null,
    invalidOps: [],
    consecutiveInvalid: 0,
  };
}
