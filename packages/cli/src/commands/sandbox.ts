/**
 * bastion sandbox — Manage the Sandbox passphrase and read the journal
 *
 * Usage:
 *   bastion sandbox set-passphrase <passphrase> [--current <passphrase>]
 *   bastion sandbox journal <passphrase> [-n <count>]
 */

import { Command } from 'commander';
import { outcomeColor, t } from '../tui/theme.js';
import { fail, hostFor, runAction } from './context.js';

const setPassphraseCommand = new Command('set-passphrase')
  .description('Set or change the Sandbox passphrase')
  .argument('<passphrase>', 'New passphrase')
  .option('--current <passphrase>', 'Current passphrase, required to change it')
  .action(async (passphrase: string, options: { current?: string }, command: Command) => {
    await runAction(command, () => {
      const result = hostFor(command).credentials.setPassphrase(passphrase, options.current);
      if (!result.ok) {
        fail(command, result.error);
        return;
      }
      // eslint-disable-next-line no-console
      console.log(t.green('Sandbox passphrase set.'));
    });
  });

const journalCommand = new Command('journal')
  .description('Decrypt and show Sandbox decisions')
  .argument('<passphrase>', 'Sandbox passphrase')
  .option('-n, --count <n>', 'Number of entries to show', '20')
  .action(async (passphrase: string, options: { count: string }, command: Command) => {
    await runAction(command, () => {
      const host = hostFor(command);
      if (host.journal === null) {
        fail(command, 'The Sandbox journal is turned off in config.json');
        return;
      }
      const count = Number.parseInt(options.count, 10);
      const entries = host.journal.entries(host.credentials.unlock(passphrase));
      const shown = Number.isInteger(count) && count > 0 ? entries.slice(-count) : entries;
      if (shown.length === 0) {
        // eslint-disable-next-line no-console
        console.log(t.muted('(journal is empty)'));
        return;
      }
      for (const e of shown) {
        // eslint-disable-next-line no-console
        console.log(
          `${t.muted(e.timestamp)}  ${outcomeColor(e.decision)(e.decision.padEnd(15))}  ` +
            `${e.actor_id}  ${e.action_kind}${e.reason === '' ? '' : `  ${t.muted(e.reason)}`}`,
        );
      }
    });
  });

export const sandboxCommand = new Command('sandbox')
  .description("Manage the Sandbox (Captain's Log)")
  .addCommand(setPassphraseCommand)
  .addCommand(journalCommand);
