#!/usr/bin/env tsx
/**
 * Region Atlas CLI Entry Point
 *
 * @module region-atlas-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { toError } from '../src/core/errors.js';

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));
  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('region-atlas')
    .description('Reconcile GB/T 2260 administrative division codes into one dataset')
    .version(getVersion(), '-V, --version', 'Output the version number');

  registerCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${toError(error).message}`);
  process.exit(EXIT_CODES.ERRORS);
});
