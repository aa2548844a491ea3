#!/usr/bin/env node
/**
 * bin/bastion.ts — entry point for the `bastion` command.
 *
 * `bastion` alone in a TTY opens the interactive shell, unless
 * BASTION_NO_TUI is set. Everything else goes through Commander.
 */

import { program } from '../commands/index.js'

const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const bare          = process.argv.length <= 2
const isInteractive = isTTY && bare && process.env['BASTION_NO_TUI'] === undefined

await program.parseAsync(isInteractive ? [...process.argv, 'shell'] : process.argv)
