/**
 * Builds the prompt for one loop iteration.
 *
 * Pure string assembly from rendered sections. The system part carries
 * instructions and the reply format; the user part carries the state: code
 * context, lessons, diff, chain and, in the steady phase, the incoming
 * operation.
 */

import { PROPERTY_VALUES, type PropertyVocabulary } from '@bugtrail/agent-contracts';
import type { InstalledTool, Prompt } from '@bugtrail/agent-sdk';
import { LINES_TOOL, NEARBY_TOOL } from '../tools/code-context-tools.js';

export const SUBMIT_COMMAND = 'echo COMPLETE_TASK_AND_SUBMIT_FINAL_OUTPUT';

export interface PromptInput {
  task: string;
  /** Extra tool documentation appended to the built-in tool usage */
  toolUsage?: string;
  /** Environment tools with their latest status */
  installedTools?: readonly InstalledTool[];
  codeContext: string;
  lessons: string;
  codeChange: string;
  chain: string;
  /** Rendered incoming operation; present exactly in the steady phase */
  incoming?: string;
  vocabulary: PropertyVocabulary;
}

const EMPTY = '(none)';

const TOOL_USAGE = `Built-in tools (handled by the agent, not the shell):
- \`${NEARBY_TOOL} <file_path> <line_number>\` loads the function around a line into the code context.
- \`${LINES_TOOL} <file_path> <start_line> <end_line>\` loads an explicit line range into the code context.
Cite code in your thoughts as \`[index](file_path:line)\`; cited code stays in the code context longer.
When the fix is complete, run \`${SUBMIT_COMMAND}\` followed by nothing else.`;

const REFLECTION_INSTRUCTIONS = `Judge the incoming operation first.
Keep it when its observation moves the investigation forward; drop it otherwise.
Summarize what it established and record any lesson worth remembering, even for a kept operation.`;

const ACTION_INSTRUCTIONS = `Then propose exactly one next action: a single shell command or built-in tool call.
Build on the reasoning chain and avoid repeating rejected attempts listed under lessons.`;

export class PromptBuilder {
  build(input: PromptInput): Prompt {
    return {
      system: buildSystem(input),
      user: buildUser(input),
    };
  }
}

function buildSystem(input: PromptInput): string {
  const steady = input.incoming !== undefined;
  const toolUsage = [TOOL_USAGE, renderInstalledTools(input.installedTools ?? []), input.toolUsage ?? '']
    .filter((part) => part !== '')
    .join('\n\n');

  const parts = [
    `# Task\n${input.task}`,
    `# Tools\n${toolUsage}`,
  ];
  if (steady) {parts.push(`# Reflection\n${REFLECTION_INSTRUCTIONS}`);}
  parts.push(`# Action\n${ACTION_INSTRUCTIONS}`);
  parts.push(`# Response format\n${responseFormat(steady, input.vocabulary)}`);
  return parts.join('\n\n');
}

function buildUser(input: PromptInput): string {
  const sections: Array<[string, string]> = [
    ['Code context', input.codeContext],
    ['Lessons', input.lessons],
    ['Code change', input.codeChange],
    ['Reasoning chain', input.chain],
  ];
  if (input.incoming !== undefined) {sections.push(['Incoming operation', input.incoming]);}
  return sections.map(([title, body]) => `# ${title}\n${body.trim() || EMPTY}`).join('\n\n');
}

/**
 * One `##` entry per installed tool, with its status when it reported one.
 */
export function renderInstalledTools(tools: readonly InstalledTool[]): string {
  if (tools.length === 0) {return '';}
  const entries = tools.map((tool) => {
    const title = tool.status ? `## ${tool.name} (status: ${tool.status})` : `## ${tool.name}`;
    const help = tool.help.trim();
    return help ? `${title}\n${help}` : title;
  });
  return `Installed tools:\n\n${entries.join('\n\n')}`;
}

/**
 * Reply skeleton the parser accepts for the phase.
 */
export function responseFormat(steady: boolean, vocabulary: PropertyVocabulary): string {
  const lines: string[] = [];
  if (steady) {
    lines.push(
      '<decision>keep or drop</decision>',
      '<summary>what the incoming operation established</summary>',
      '<lessons>what to remember from it</lessons>',
    );
  }
  lines.push(
    `<property>${PROPERTY_VALUES[vocabulary].join(' or ')}</property>`,
    '<thoughts>your reasoning, with citations</thoughts>',
    '<action>one command</action>',
  );
  return `Reply with these tags, once each, in this order:\n${lines.join('\n')}`;
}
