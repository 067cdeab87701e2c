/**
 * Reply Parser
 *
 * Parses the tagged reply the model returns each iteration:
 *
 *   <decision>keep|drop</decision>     steady phase only
 *   <summary>...</summary>             steady phase only
 *   <lessons>...</lessons>             steady phase only
 *   <property>...</property>
 *   <thoughts>...</thoughts>
 *   <action>...</action>
 *
 * Tags appear at most once and in this order. Text between elements is
 * ignored; inside an element anything goes up to its closing tag.
 */

import {
  ParseError,
  PROPERTY_VALUES,
  REPLY_TAG_ORDER,
  type AgentReply,
  type Decision,
  type FirstStepReply,
  type LoopPhase,
  type OperationProperty,
  type PropertyVocabulary,
  type ReplyTag,
  type SteadyReply,
} from '@bugtrail/agent-contracts';

const TAG_RE = /<(\/?)([A-Za-z][\w-]*)>/g;
const DECISIONS: readonly Decision[] = ['keep', 'drop'];

export function parseReply(text: string, phase: 'first_step', vocabulary?: PropertyVocabulary): FirstStepReply;
export function parseReply(text: string, phase: 'steady', vocabulary?: PropertyVocabulary): SteadyReply;
export function parseReply(text: string, phase: LoopPhase, vocabulary?: PropertyVocabulary): AgentReply;
export function parseReply(
  text: string,
  phase: LoopPhase,
  vocabulary: PropertyVocabulary = 'determinism',
): AgentReply {
  const elements = extractElements(text);

  const reflectionPresent = elements.has('decision') || elements.has('summary') || elements.has('lessons');
  if (phase === 'first_step' && reflectionPresent) {
    throw new ParseError('Reply judges an operation but there is no incoming operation', text);
  }

  const property = parseProperty(requireElement(elements, 'property', text), vocabulary, text);
  const thoughts = requireElement(elements, 'thoughts', text).trim();
  const action = stripBackticks(requireElement(elements, 'action', text));
  if (!action) {
    throw new ParseError('<action> is empty', text);
  }

  if (phase === 'first_step') {
    return { kind: 'first_step', property, thoughts, action };
  }

  return {
    kind: 'steady',
    decision: parseDecision(requireElement(elements, 'decision', text), text),
    summary: requireElement(elements, 'summary', text).trim(),
    lessons: requireElement(elements, 'lessons', text).trim(),
    property,
    thoughts,
    action,
  };
}

/**
 * Remove a surrounding code fence or inline backticks.
 */
export function stripBackticks(value: string): string {
  const s = value.trim();
  if (s.startsWith('```')) {
    return s.replace(/^```[\w-]*\n?/, '').replace(/\n?```$/, '').trim();
  }
  if (s.length >= 2 && s.startsWith('`') && s.endsWith('`')) {
    return s.slice(1, -1).trim();
  }
  return s;
}

// ─── Elements ────────────────────────────────────────────────────────────────

function extractElements(text: string): Map<ReplyTag, string> {
  const elements = new Map<ReplyTag, string>();
  let lastOrder = -1;
  let from = 0;

  for (;;) {
    TAG_RE.lastIndex = from;
    const match = TAG_RE.exec(text);
    if (!match) {break;}

    const raw = match[0];
    const slash = match[1];
    const name = match[2];
    const tag = asReplyTag(name);
    if (!tag) {
      throw new ParseError(`Unknown tag ${raw}`, text);
    }
    if (slash) {
      throw new ParseError(`Closing ${raw} without an opening tag`, text);
    }
    if (elements.has(tag)) {
      throw new ParseError(`Duplicate <${tag}>`, text);
    }
    const order = REPLY_TAG_ORDER.indexOf(tag);
    if (order < lastOrder) {
      throw new ParseError(`<${tag}> must come before <${REPLY_TAG_ORDER[lastOrder] ?? ''}>`, text);
    }

    const contentStart = match.index + raw.length;
    const close = `</${tag}>`;
    const contentEnd = text.indexOf(close, contentStart);
    if (contentEnd === -1) {
      throw new ParseError(`Unterminated <${tag}>`, text);
    }

    elements.set(tag, text.slice(contentStart, contentEnd));
    lastOrder = order;
    from = contentEnd + close.length;
  }
  return elements;
}

function asReplyTag(name: string | undefined): ReplyTag | undefined {
  return REPLY_TAG_ORDER.find((t) => t === name);
}

function requireElement(elements: Map<ReplyTag, string>, tag: ReplyTag, text: string): string {
  const value = elements.get(tag);
  if (value === undefined) {
    throw new ParseError(`Missing <${tag}>`, text);
  }
  return value;
}

// ─── Values ──────────────────────────────────────────────────────────────────

function parseDecision(value: string, text: string): Decision {
  const normalized = value.trim().toLowerCase();
  const decision = DECISIONS.find((d) => d === normalized);
  if (!decision) {
    throw new ParseError(`<decision> must be keep or drop, got "${value.trim()}"`, text);
  }
  return decision;
}

function parseProperty(value: string, vocabulary: PropertyVocabulary, text: string): OperationProperty {
  const normalized = value.trim().toLowerCase();
  const allowed = PROPERTY_VALUES[vocabulary];
  const property = allowed.find((p) => p === normalized);
  if (!property) {
    throw new ParseError(`<property> must be one of ${allowed.join(', ')}, got "${value.trim()}"`, text);
  }
  return property;
}
