/**
 * Bastion Runtime Host — Home directory resolution
 *
 * Precedence (highest to lowest):
 *   1. explicit override (the CLI's --home flag)
 *   2. BASTION_HOME environment variable
 *   3. ~/.bastion
 *
 * Layout under the home directory:
 *   config.json   optional, see config.ts
 *   device.key    machine key for non-Sandbox partitions
 *   state/        credential and partition documents
 *   logs/         audit, runtime events, Sandbox journal
 */

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export interface ResolveHomeOptions {
  readonly home?: string | undefined;
  /** Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export interface HomePaths {
  readonly root: string;
  readonly config: string;
  readonly deviceKey: string;
}

/** Resolve the home directory and create it if missing. */
export function resolveHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const fromEnv = env['BASTION_HOME'];

  let home: string;
  if (opts.home !== undefined && opts.home !== '') {
    home = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.bastion');
  }

  const root = resolve(home);
  mkdirSync(root, { recursive: true, mode: 0o700 });
  return root;
}

export function homePaths(root: string): HomePaths {
  return {
    root,
    config: join(root, 'config.json'),
    deviceKey: join(root, 'device.key'),
  };
}
