/**
 * bastion audit — Tail the persisted audit log
 *
 * Reads `logs/audit.jsonl` with dedupe-on-read and prints the newest
 * entries, oldest first. Sandbox decisions are never in this log.
 */

import { Command } from 'commander';
import { tailAuditLog } from '@bastion/runtime-host';
import { outcomeColor, t } from '../tui/theme.js';
import { fail, hostFor, runAction } from './context.js';

export const auditCommand = new Command('audit')
  .description('Show the most recent audit log entries')
  .option('-n, --count <n>', 'Number of entries to show', '20')
  .option('--json', 'Output as JSON')
  .action(async (options: { count: string; json?: boolean }, command: Command) => {
    await runAction(command, () => {
      const count = Number.parseInt(options.count, 10);
      if (!Number.isInteger(count) || count < 1) {
        fail(command, `--count must be a positive integer, got ${options.count}`);
        return;
      }

      const entries = tailAuditLog(hostFor(command).stateIO, count);

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(entries, null, 2));
        return;
      }

      if (entries.length === 0) {
        // eslint-disable-next-line no-console
        console.log(t.muted('(no audit entries)'));
        return;
      }
      for (const e of entries) {
        // eslint-disable-next-line no-console
        console.log(
          `${t.muted(e.timestamp)}  ${outcomeColor(e.decision)(e.decision.padEnd(15))}  ` +
            `${e.actor_id}  ${e.action_kind}${e.reason === '' ? '' : `  ${t.muted(e.reason)}`}`,
        );
      }
    });
  });
