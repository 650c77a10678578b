/**
 * CLI configuration
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { createDeployCommand, type DeployCommandDependencies } from './commands/deploy.js';

const packageJsonSchema = z.object({ version: z.string() });

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, '../../package.json');
    const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Create CLI program
 */
export function createProgram(dependencies: DeployCommandDependencies = {}): Command {
  const program = new Command();

  program
    .name('venus-deploy')
    .description('Package a directory and deploy it to a Venus OS device over SSH')
    .version(getVersion());

  program.addCommand(createDeployCommand(dependencies), { isDefault: true });

  return program;
}
