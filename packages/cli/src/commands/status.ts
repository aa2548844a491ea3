/**
 * bastion status — Show the home directory, configuration and audit health
 */

import { Command } from 'commander';
import { readAuditLog } from '@bastion/runtime-host';
import { t } from '../tui/theme.js';
import { hostFor, runAction } from './context.js';

export const statusCommand = new Command('status')
  .description('Show home directory, configuration, and audit log statistics')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    await runAction(command, () => {
      const host = hostFor(command);
      const { stats } = readAuditLog(host.stateIO);
      const status = {
        home: host.paths.root,
        config: host.paths.config,
        sandbox_passphrase_set: host.credentials.isConfigured(),
        sandbox_journal: host.config.sandbox.journal,
        scrypt: host.config.scrypt,
        redaction_patterns: host.config.redaction.patterns.length,
        audit: stats,
      };

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(status, null, 2));
        return;
      }

      const row = (label: string, value: string): string => `  ${t.dim(label.padEnd(22))}${value}`;
      const lines = [
        '',
        t.blue('─── Bastion Status ──────────────────────────────'),
        row('home', status.home),
        row('config', status.config),
        row('sandbox passphrase', status.sandbox_passphrase_set ? t.green('set') : t.amber('not set')),
        row('sandbox journal', status.sandbox_journal ? 'on' : 'off'),
        row('scrypt cost', `N=${status.scrypt.N} r=${status.scrypt.r} p=${status.scrypt.p}`),
        row('redaction patterns', `${status.redaction_patterns} custom`),
        row('audit entries', String(stats.parsedEvents)),
        row('duplicates dropped', String(stats.duplicates)),
        row('unreadable lines', String(stats.parseErrors)),
      ];
      if (stats.partialTrailingLine) {
        lines.push(t.amber('  last audit line was cut short and was skipped'));
      }
      // eslint-disable-next-line no-console
      console.log(lines.join('\n'));
    });
  });
