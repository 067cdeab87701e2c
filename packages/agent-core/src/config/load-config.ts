/**
 * Agent loop configuration: YAML file → validated AgentLoopConfig.
 *
 * Every field has a default, so an empty file (or no file) yields the
 * default configuration.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYAML } from 'yaml';
import {
  AgentLoopConfigSchema,
  ConfigError,
  type AgentLoopConfig,
} from '@bugtrail/agent-contracts';

export function parseAgentLoopConfig(raw: unknown): AgentLoopConfig {
  const result = AgentLoopConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid agent loop config: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function parseAgentLoopConfigYAML(text: string): AgentLoopConfig {
  let raw: unknown;
  try {
    raw = parseYAML(text);
  } catch (error) {
    throw new ConfigError(
      `Invalid agent loop config YAML: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseAgentLoopConfig(raw);
}

export async function loadAgentLoopConfig(filePath: string): Promise<AgentLoopConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Failed to read agent loop config ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseAgentLoopConfigYAML(text);
}
