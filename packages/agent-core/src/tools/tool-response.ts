/**
 * <tool-response> protocol.
 *
 * Tools running inside the environment print JSON blocks between
 * `<tool-response>` and `</tool-response>`. Output without tags is tried as a
 * bare JSON document; anything that does not validate is ignored.
 */

import {
  ToolCodeContextSchema,
  ToolResponseSchema,
  type ToolCodeContext,
  type ToolResponse,
} from '@bugtrail/agent-contracts';

const START_TAG = '<tool-response>';
const END_TAG = '</tool-response>';

export interface ParsedToolResponse {
  response: ToolResponse;
  /** Valid code locations; malformed entries are dropped */
  codeContext: ToolCodeContext[];
}

export function parseToolResponses(raw: string): ParsedToolResponse[] {
  const bodies = extractBodies(raw);
  const parsed: ParsedToolResponse[] = [];
  for (const body of bodies.length > 0 ? bodies : [raw]) {
    const json = parseJson(body);
    if (json === undefined) {continue;}
    const result = ToolResponseSchema.safeParse(json);
    if (!result.success) {continue;}

    const codeContext: ToolCodeContext[] = [];
    for (const entry of result.data.code_context ?? []) {
      const location = ToolCodeContextSchema.safeParse(entry);
      if (location.success) {codeContext.push(location.data);}
    }
    parsed.push({ response: result.data, codeContext });
  }
  return parsed;
}

/**
 * Observation text and exit code of a command whose output may carry tool
 * responses. Without responses the raw output is used.
 */
export function summarizeToolOutput(
  output: string,
  returncode: number,
  responses: readonly ParsedToolResponse[],
): { output: string; returncode: number } {
  const last = responses[responses.length - 1];
  if (!last) {return { output: output.trim(), returncode };}
  return {
    output: responses.map((r) => r.response.output ?? '').join('\n'),
    returncode: last.response.returncode ?? returncode,
  };
}

function extractBodies(raw: string): string[] {
  const bodies: string[] = [];
  let from = 0;
  for (;;) {
    const start = raw.indexOf(START_TAG, from);
    if (start === -1) {break;}
    const end = raw.indexOf(END_TAG, start + START_TAG.length);
    if (end === -1) {break;}
    bodies.push(raw.slice(start + START_TAG.length, end).trim());
    from = end + END_TAG.length;
  }
  return bodies;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
