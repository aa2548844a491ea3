/**
 * bastion shell — Interactive session against one live runtime
 */

import { Command } from 'commander';
import { launchShell } from '../tui/shell.js';
import { hostFor, runAction } from './context.js';

export const shellCommand = new Command('shell')
  .description('Start an interactive session')
  .action(async (_options: unknown, command: Command) => {
    await runAction(command, () => launchShell(hostFor(command)));
  });
