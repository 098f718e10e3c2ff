/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRefreshCacheCommand } from './refresh-cache.js';
import { registerUpdateCommand } from './update.js';

export { executeUpdate, registerUpdateCommand, type UpdateCommandOptions } from './update.js';
export {
  executeRefreshCache,
  registerRefreshCacheCommand,
  type RefreshCacheCommandOptions,
} from './refresh-cache.js';

/**
 * Register every command on the program
 */
export function registerCommands(program: Command): void {
  registerUpdateCommand(program);
  registerRefreshCacheCommand(program);
}
