import type { ShellLine } from '../dispatch.js'

type HelpSection = readonly [label: string, entries: ReadonlyArray<readonly [command: string, description: string]>]

const SECTIONS: ReadonlyArray<HelpSection> = [
  ['actors', [
    ['status',                        'mode, actor count, pending approvals'],
    ['actors',                        'list actors'],
    ['spawn <name>',                  'spawn an agent under Primus'],
    ['subchat <parent> [name]',       'open a SubChat under Primus or an agent'],
    ['close <actor>',                 'close an actor and its SubChats'],
    ['narrow <actor> <cap> <value>',  'narrow one capability for this session'],
  ]],
  ['memory', [
    ['write <actor> <key> <text>',    "write to the actor's own partition"],
    ['read <actor> <owner> <class> <key>', 'read from a partition'],
    ['personality <actor> [<target> <text>]', 'read, or propose a personality edit'],
    ['setting <actor> <name> [value]', 'read, or propose a settings change'],
    ['share <owner> <reader> <key>…', 'share keys with a collaboration partner'],
  ]],
  ['agents', [
    ['collab <a> <b>',                'open a collaboration between two agents'],
    ['join <agent> <collab-id>',      'join an open collaboration'],
    ['msg <from> <to> <text>',        'send a message between agents'],
    ['inbox <agent>',                 'read and clear an inbox'],
    ['revoke <a> <b>',                'withdraw messaging authorization for a pair'],
  ]],
  ['conversation', [
    ['chat <actor> <prompt>',         'one turn against the local echo backend'],
    ['history <actor>',               "the actor's conversation history"],
    ['internet <actor> [purpose]',    'request internet access'],
  ]],
  ['approvals', [
    ['pending',                       'list pending approvals'],
    ['approve <id>',                  'approve and replay'],
    ['reject <id>',                   'reject'],
  ]],
  ['sandbox', [
    ['sandbox enter <passphrase> [allow-edits]', "enter Captain's Log"],
    ['sandbox exit',                  'leave and queue held edits for review'],
  ]],
  ['system', [
    ['audit [n]',                     'last n audit records of this session'],
    ['help',                          'show this help'],
    ['quit',                          'leave the shell'],
  ]],
]

/** renderHelp — shell commands grouped by section. */
export function renderHelp(): ReadonlyArray<ShellLine> {
  const lines: ShellLine[] = []
  for (const [label, entries] of SECTIONS) {
    lines.push({ tone: 'muted', text: `─── ${label}` })
    for (const [command, description] of entries) {
      lines.push({ tone: 'info', text: command.padEnd(36) + description })
    }
  }
  return lines
}
