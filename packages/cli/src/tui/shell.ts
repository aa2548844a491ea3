/**
 * shell.ts — Bastion interactive readline shell.
 *
 * One runtime lives for the whole session: actors, collaborations and
 * approvals exist only while the shell is open, while the audit log and
 * partitions persist under the home directory.
 *
 * Lines are handled strictly one at a time. A command that is still running
 * holds back the next one, so output never interleaves.
 */

import * as readline from 'node:readline'
import type { Host } from '@bastion/runtime-host'
import { dispatch } from './dispatch.js'
import type { ShellLine } from './dispatch.js'
import { EchoBackend } from './echo-backend.js'
import { buildPS1 } from './prompt.js'
import { t, toneColor } from './theme.js'

function render(lines: ReadonlyArray<ShellLine>): void {
  for (const { tone, text } of lines) {
    process.stdout.write('  ' + toneColor(tone)(text) + '\n')
  }
}

function renderHeader(host: Host): void {
  process.stdout.write(
    '\n  ' + t.blue.bold('B A S T I O N') + '  ' + t.muted('local agent runtime') +
    '\n  ' + t.dim('home ') + t.text(host.paths.root) +
    '\n  ' + t.dim("type 'help' for commands") + '\n',
  )
}

/**
 * launchShell — resolves when the user quits or closes stdin.
 */
export function launchShell(host: Host): Promise<void> {
  const ctx = { runtime: host.runtime, backend: new EchoBackend() }
  renderHeader(host)

  const rl = readline.createInterface({
    input:       process.stdin,
    output:      process.stdout,
    terminal:    process.stdin.isTTY === true,
    historySize: 50,
  })

  let closed = false
  let quitting = false

  const showPrompt = (): void => {
    if (closed) return
    rl.setPrompt(buildPS1(host.runtime.currentMode()))
    rl.prompt()
  }

  let queue: Promise<void> = Promise.resolve()

  return new Promise<void>(resolve => {
    rl.on('line', (input: string) => {
      queue = queue
        .then(async () => {
          if (quitting) return
          const reply = await dispatch(ctx, input)
          render(reply.lines)
          if (reply.quit) {
            quitting = true
            rl.close()
            return
          }
          showPrompt()
        })
        .catch((err: unknown) => {
          render([{ tone: 'error', text: err instanceof Error ? err.message : String(err) }])
          showPrompt()
        })
    })

    rl.on('close', () => {
      closed = true
      void queue.then(() => resolve())
    })

    showPrompt()
  })
}
