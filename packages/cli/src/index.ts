/**
 * @bastion/cli
 *
 * The `bastion` command: an interactive shell over one runtime, plus
 * status, audit and Sandbox management commands.
 */

export { program } from './commands/index.js';
export type { ShellContext, ShellLine, ShellReply, Tone } from './tui/dispatch.js';
export { dispatch } from './tui/dispatch.js';
export { EchoBackend } from './tui/echo-backend.js';
