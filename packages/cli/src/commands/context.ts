/**
 * Shared command plumbing: open the host for the resolved home directory and
 * report failures on stderr with a `[bastion <command>]` prefix.
 */

import type { Command } from 'commander';
import { BastionError } from '@bastion/kernel';
import { openHost, resolveHome } from '@bastion/runtime-host';
import type { Host } from '@bastion/runtime-host';

type GlobalOptions = {
  home?: string;
};

export function hostFor(command: Command): Host {
  const { home } = command.optsWithGlobals<GlobalOptions>();
  return openHost({ home: resolveHome({ home }) });
}

/** The command path below the program name, e.g. `sandbox set-passphrase`. */
function commandPath(command: Command): string {
  const names: string[] = [];
  for (let c: Command | null = command; c !== null && c.parent !== null; c = c.parent) {
    names.unshift(c.name());
  }
  return names.join(' ');
}

/**
 * Run an action; BastionErrors (bad config, wrong passphrase) become one
 * stderr line and exit code 1. Anything else propagates.
 */
export async function runAction(command: Command, action: () => void | Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (!(err instanceof BastionError)) throw err;
    // eslint-disable-next-line no-console
    console.error(`[bastion ${commandPath(command)}] ${err.message}`);
    process.exitCode = 1;
  }
}

export function fail(command: Command, message: string): void {
  // eslint-disable-next-line no-console
  console.error(`[bastion ${commandPath(command)}] ${message}`);
  process.exitCode = 1;
}
