/**
 * Local tool detection (ssh/scp on PATH)
 */

import which from 'which';
import { DeployError } from '../utils/errors.js';

export const REQUIRED_TOOLS = ['ssh', 'scp'] as const;

/**
 * Resolve a command to its path, or null when it is not installed
 */
export type ToolLookup = (command: string) => Promise<string | null>;

export const whichLookup: ToolLookup = (command) => which(command, { nothrow: true });

/**
 * List the tools that cannot be found
 */
export async function findMissingTools(
  tools: readonly string[] = REQUIRED_TOOLS,
  lookup: ToolLookup = whichLookup
): Promise<string[]> {
  const missing: string[] = [];

  for (const tool of tools) {
    if ((await lookup(tool)) === null) {
      missing.push(tool);
    }
  }

  return missing;
}

/**
 * Fail before any other work if a required tool is missing
 */
export async function ensureTools(
  tools: readonly string[] = REQUIRED_TOOLS,
  lookup: ToolLookup = whichLookup
): Promise<void> {
  const missing = await findMissingTools(tools, lookup);

  if (missing.length > 0) {
    throw new DeployError('environment', `Missing required commands: ${missing.join(', ')}`);
  }
}
