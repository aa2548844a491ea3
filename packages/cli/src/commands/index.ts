/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/bastion.ts and src/index.ts.
 */

import { program } from 'commander';
import { auditCommand } from './audit.js';
import { sandboxCommand } from './sandbox.js';
import { shellCommand } from './shell.js';
import { statusCommand } from './status.js';

program
  .name('bastion')
  .description(
    'Bastion — policy and isolation core for a local multi-agent runtime.\n' +
      'Every action is checked against capability grants and the current mode.',
  )
  .version('0.1.0')
  .option('--home <dir>', 'Home directory (default: $BASTION_HOME or ~/.bastion)');

program.addCommand(shellCommand);
program.addCommand(statusCommand);
program.addCommand(auditCommand);
program.addCommand(sandboxCommand);

export { program };
