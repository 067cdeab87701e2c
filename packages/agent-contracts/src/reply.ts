/**
 * @module @bugtrail/agent-contracts/reply
 * Structured model replies.
 *
 * The reply grammar is a fixed sequence of tagged elements:
 *
 *   <decision>keep|drop</decision>   ┐
 *   <summary>...</summary>           ├ only when an incoming operation exists
 *   <lessons>...</lessons>           ┘
 *   <property>...</property>
 *   <thoughts>...</thoughts>
 *   <action>...</action>
 */

import type { OperationProperty } from './operation.js';

export type ReplyTag = 'decision' | 'summary' | 'lessons' | 'property' | 'thoughts' | 'action';

/** Document order of the tags */
export const REPLY_TAG_ORDER: readonly ReplyTag[] = [
  'decision',
  'summary',
  'lessons',
  'property',
  'thoughts',
  'action',
];

export const REFLECTION_TAGS: readonly ReplyTag[] = ['decision', 'summary', 'lessons'];
export const ACTION_TAGS: readonly ReplyTag[] = ['property', 'thoughts', 'action'];

export type Decision = 'keep' | 'drop';

/**
 * Which reply shape the loop expects.
 *
 * first_step: nothing to judge yet
 * steady:     an incoming operation awaits judgment
 */
export type LoopPhase = 'first_step' | 'steady';

interface ActionPart {
  property: OperationProperty;
  thoughts: string;
  action: string;
}

export interface FirstStepReply extends ActionPart {
  kind: 'first_step';
}

export interface SteadyReply extends ActionPart {
  kind: 'steady';
  decision: Decision;
  summary: string;
  lessons: string;
}

export type AgentReply = FirstStepReply | SteadyReply;
