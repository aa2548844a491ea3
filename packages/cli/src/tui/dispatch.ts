/**
 * dispatch.ts — shell command routing, independent of the terminal.
 *
 * Every command returns coloured-by-tone lines instead of writing them, so
 * the readline shell only renders and the router can be tested against an
 * in-memory runtime.
 */

import {
  BastionError,
  DecisionOutcome,
  homePartition,
  InternetAccess,
  PartitionClass,
  PERSONALITY_KEY,
  RagWriteScope,
} from '@bastion/kernel'
import type {
  ActionResult,
  ActorEntry,
  ApprovalResult,
  BastionRuntime,
  ContextRequest,
  GrantNarrowing,
  InferenceBackend,
} from '@bastion/kernel'
import { renderHelp } from './output/help.js'

export type Tone = 'info' | 'ok' | 'warn' | 'error' | 'muted'

export interface ShellLine {
  readonly tone: Tone
  readonly text: string
}

export interface ShellReply {
  readonly lines: ReadonlyArray<ShellLine>
  readonly quit: boolean
}

export interface ShellContext {
  readonly runtime: BastionRuntime
  readonly backend: InferenceBackend
}

type Handler = (ctx: ShellContext, args: ReadonlyArray<string>) => Promise<ReadonlyArray<ShellLine>>

/** A malformed command line. Reported as one error line. */
class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

const encoder = new TextEncoder()
const decoder = new TextDecoder()

const line = (tone: Tone, text: string): ShellLine => ({ tone, text })

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export async function dispatch(ctx: ShellContext, input: string): Promise<ShellReply> {
  const [command = '', ...args] = input.trim().split(/\s+/).filter(part => part !== '')
  if (command === '') return { lines: [], quit: false }
  if (command === 'quit' || command === 'exit') return { lines: [line('muted', 'bye')], quit: true }

  const handler = Object.hasOwn(HANDLERS, command) ? HANDLERS[command] : undefined
  if (handler === undefined) {
    return {
      lines: [line('error', `unknown command: ${command}`), line('muted', "type 'help' for available commands")],
      quit: false,
    }
  }

  try {
    return { lines: await handler(ctx, args), quit: false }
  } catch (err) {
    if (err instanceof UsageError || err instanceof BastionError) {
      return { lines: [line('error', err.message)], quit: false }
    }
    throw err
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function arg(args: ReadonlyArray<string>, index: number, usage: string): string {
  const value = args[index]
  if (value === undefined) throw new UsageError(`usage: ${usage}`)
  return value
}

function rest(args: ReadonlyArray<string>, from: number, usage: string): string {
  const text = args.slice(from).join(' ')
  if (text === '') throw new UsageError(`usage: ${usage}`)
  return text
}

/** Find an actor by id, or by name when exactly one open actor has it. */
function resolveActor(ctx: ShellContext, ref: string): ActorEntry {
  const entries = ctx.runtime.listActors()
  const byId = entries.find(e => e.actor.id === ref)
  if (byId !== undefined) return byId
  const byName = entries.filter(e => !e.closed && e.actor.name === ref)
  if (byName.length === 1 && byName[0] !== undefined) return byName[0]
  throw new UsageError(byName.length > 1 ? `ambiguous actor name: ${ref}` : `unknown actor: ${ref}`)
}

function actorId(ctx: ShellContext, ref: string): string {
  return resolveActor(ctx, ref).actor.id
}

function describe<T>(result: ActionResult<T>, done: (value: T) => string): ShellLine {
  switch (result.status) {
    case 'done':
      return line('ok', done(result.value))
    case 'denied':
      return line('error', `denied: ${result.reason}`)
    case 'pending':
      return line('warn', `needs approval: ${result.approval_id} (${result.reason})`)
    case 'failed':
      return line('error', `${result.error}: ${result.code}`)
    default: {
      const unhandled: never = result
      throw new Error(`Unhandled result: ${JSON.stringify(unhandled)}`)
    }
  }
}

function describeApproval(result: ApprovalResult, verb: string): ShellLine {
  return result.ok
    ? line('ok', `${verb} ${result.approval.id} (${result.approval.action.kind})`)
    : line('error', result.error)
}

function parsePartitionClass(value: string): PartitionClass {
  const match = Object.values(PartitionClass).find(c => c === value)
  if (match === undefined) {
    throw new UsageError(`unknown partition class: ${value} (${Object.values(PartitionClass).join(', ')})`)
  }
  return match
}

function parseFlag(value: string): boolean {
  if (value === 'on' || value === 'true') return true
  if (value === 'off' || value === 'false') return false
  throw new UsageError(`expected on or off, got ${value}`)
}

function parseNarrowing(capability: string, value: string): GrantNarrowing {
  switch (capability) {
    case 'internet_access': {
      const level = Object.values(InternetAccess).find(v => v === value)
      if (level === undefined) throw new UsageError(`unknown internet level: ${value}`)
      return { internet_access: level }
    }
    case 'rag_write_scope': {
      const scope = Object.values(RagWriteScope).find(v => v === value)
      if (scope === undefined) throw new UsageError(`unknown write scope: ${value}`)
      return { rag_write_scope: scope }
    }
    case 'agent_to_agent':
      return { agent_to_agent: parseFlag(value) }
    case 'subchat_cross_access':
      return { subchat_cross_access: parseFlag(value) }
    case 'personality_write':
      return { personality_write: parseFlag(value) }
    case 'settings_write':
      return { settings_write: parseFlag(value) }
    default:
      throw new UsageError(`unknown capability: ${capability}`)
  }
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

const HANDLERS: Readonly<Record<string, Handler>> = {
  help: async () => renderHelp(),

  status: async ({ runtime }) => {
    const entries = runtime.listActors()
    const open = entries.filter(e => !e.closed).length
    return [
      line('info', `mode: ${runtime.currentMode()}`),
      line('info', `actors: ${open} open, ${entries.length - open} closed`),
      line('info', `pending approvals: ${runtime.pendingApprovals().length}`),
    ]
  },

  actors: async ({ runtime }) =>
    runtime.listActors().map(({ actor, closed }) =>
      line(
        closed ? 'muted' : 'info',
        `${actor.id}  ${actor.kind}  ${actor.name}` +
          (actor.parent_id !== null ? `  parent=${actor.parent_id}` : '') +
          (closed ? '  (closed)' : ''),
      ),
    ),

  spawn: async ({ runtime }, args) => {
    const agent = runtime.spawnAgent(arg(args, 0, 'spawn <name>'))
    return [line('ok', `spawned ${agent.id}`)]
  },

  subchat: async (ctx, args) => {
    const parent = resolveActor(ctx, arg(args, 0, 'subchat <parent> [name]')).actor
    const sub = ctx.runtime.openSubChat(parent.id, args[1] ?? `${parent.name}-chat`)
    return [line('ok', `opened ${sub.id} under ${parent.id}`)]
  },

  close: async (ctx, args) => {
    const closed = await ctx.runtime.closeActor(actorId(ctx, arg(args, 0, 'close <actor>')))
    return [line('ok', `closed ${closed.join(', ')}`)]
  },

  narrow: async (ctx, args) => {
    const usage = 'narrow <actor> <capability> <value>'
    const id = actorId(ctx, arg(args, 0, usage))
    const grant = ctx.runtime.narrow(id, parseNarrowing(arg(args, 1, usage), arg(args, 2, usage)))
    return [line('ok', `${id}: ${JSON.stringify(grant)}`)]
  },

  write: async (ctx, args) => {
    const usage = 'write <actor> <key> <text>'
    const actor = resolveActor(ctx, arg(args, 0, usage)).actor
    const key = arg(args, 1, usage)
    const result = await ctx.runtime.write(actor.id, homePartition(actor), key, encoder.encode(rest(args, 2, usage)))
    return [describe(result, () => `wrote ${key}`)]
  },

  read: async (ctx, args) => {
    const usage = 'read <actor> <owner> <class> <key>'
    const reader = actorId(ctx, arg(args, 0, usage))
    const partition = { owner_id: actorId(ctx, arg(args, 1, usage)), class: parsePartitionClass(arg(args, 2, usage)) }
    const result = await ctx.runtime.read(reader, partition, arg(args, 3, usage))
    return [describe(result, bytes => (bytes.length === 0 ? '(empty)' : decoder.decode(bytes)))]
  },

  personality: async (ctx, args) => {
    const usage = 'personality <actor> [<target> <text>]'
    const actor = actorId(ctx, arg(args, 0, usage))
    if (args.length === 1) {
      return [describe(await ctx.runtime.readPersonality(actor), text => (text === '' ? '(empty)' : text))]
    }
    const target = actorId(ctx, arg(args, 1, usage))
    const result = await ctx.runtime.writePersonality(actor, target, rest(args, 2, usage))
    return [describe(result, outcome => (outcome === 'held' ? 'held for review at Sandbox exit' : 'personality updated'))]
  },

  setting: async (ctx, args) => {
    const usage = 'setting <actor> <name> [value]'
    const actor = actorId(ctx, arg(args, 0, usage))
    const name = arg(args, 1, usage)
    if (args.length === 2) {
      return [describe(await ctx.runtime.readSetting(actor, name), value => `${name} = ${value === '' ? '(unset)' : value}`)]
    }
    const result = await ctx.runtime.writeSetting(actor, name, rest(args, 2, usage))
    return [describe(result, outcome => (outcome === 'held' ? 'held for review at Sandbox exit' : `${name} updated`))]
  },

  share: async (ctx, args) => {
    const usage = 'share <owner> <reader> <key>...'
    const owner = actorId(ctx, arg(args, 0, usage))
    const reader = actorId(ctx, arg(args, 1, usage))
    const keys = args.slice(2)
    if (keys.length === 0) throw new UsageError(`usage: ${usage}`)
    return [describe(await ctx.runtime.shareMemory(owner, reader, keys), () => `shared ${keys.join(', ')}`)]
  },

  internet: async (ctx, args) => {
    const actor = actorId(ctx, arg(args, 0, 'internet <actor> [purpose]'))
    const purpose = args.length > 1 ? args.slice(1).join(' ') : 'shell request'
    return [describe(await ctx.runtime.requestInternet(actor, purpose), () => 'internet access granted')]
  },

  collab: async (ctx, args) => {
    const usage = 'collab <a> <b>'
    const a = actorId(ctx, arg(args, 0, usage))
    const b = actorId(ctx, arg(args, 1, usage))
    return [describe(await ctx.runtime.openCollaboration(a, b), id => `collaboration ${id} open`)]
  },

  join: async (ctx, args) => {
    const usage = 'join <agent> <collab-id>'
    const agent = actorId(ctx, arg(args, 0, usage))
    const collab = arg(args, 1, usage)
    return [describe(await ctx.runtime.joinCollaboration(agent, collab), () => `joined ${collab}`)]
  },

  msg: async (ctx, args) => {
    const usage = 'msg <from> <to> <text>'
    const from = actorId(ctx, arg(args, 0, usage))
    const to = actorId(ctx, arg(args, 1, usage))
    return [describe(await ctx.runtime.sendMessage(from, to, rest(args, 2, usage)), () => 'delivered')]
  },

  inbox: async (ctx, args) => {
    const messages = ctx.runtime.inbox(actorId(ctx, arg(args, 0, 'inbox <agent>')))
    if (messages.length === 0) return [line('muted', '(empty)')]
    return messages.map(m => line('info', `${m.sent_at}  ${m.sender_id} → ${m.receiver_id}: ${m.body}`))
  },

  revoke: async (ctx, args) => {
    const usage = 'revoke <a> <b>'
    const revoked = ctx.runtime.revokePair(actorId(ctx, arg(args, 0, usage)), actorId(ctx, arg(args, 1, usage)))
    return [revoked ? line('ok', 'pair authorization withdrawn') : line('muted', 'pair was not authorized')]
  },

  chat: async (ctx, args) => {
    const usage = 'chat <actor> <prompt>'
    const actor = resolveActor(ctx, arg(args, 0, usage)).actor
    const prompt = rest(args, 1, usage)
    const owner = actor.personality === null ? null : resolveActor(ctx, actor.personality.owner_id).actor
    const requests: ContextRequest[] = owner === null ? [] : [{ partition: homePartition(owner), key: PERSONALITY_KEY }]
    const result = await ctx.runtime.chat(actor.id, prompt, requests, ctx.backend)
    const lines = [describe(result, reply => reply.reply)]
    if (result.status === 'done') {
      for (const withheld of result.value.context.withheld) {
        lines.push(line('muted', `withheld ${withheld.key}: ${withheld.reason}`))
      }
    }
    return lines
  },

  history: async (ctx, args) => {
    const result = await ctx.runtime.history(actorId(ctx, arg(args, 0, 'history <actor>')))
    if (result.status !== 'done') return [describe(result, () => '')]
    if (result.value.length === 0) return [line('muted', '(no turns)')]
    return result.value.flatMap(turn => [line('info', `${turn.at}  > ${turn.prompt}`), line('muted', `  ${turn.reply}`)])
  },

  pending: async ({ runtime }) => {
    const approvals = runtime.pendingApprovals()
    if (approvals.length === 0) return [line('muted', '(none)')]
    return approvals.map(a => line('warn', `${a.id}  ${a.actor_id}  ${a.action.kind}  ${a.reason}  (${a.origin})`))
  },

  approve: async ({ runtime }, args) =>
    [describeApproval(await runtime.approve(arg(args, 0, 'approve <id>')), 'approved')],

  reject: async ({ runtime }, args) =>
    [describeApproval(await runtime.reject(arg(args, 0, 'reject <id>')), 'rejected')],

  sandbox: async ({ runtime }, args) => {
    const usage = 'sandbox enter <passphrase> [allow-edits] | sandbox exit'
    const sub = arg(args, 0, usage)
    if (sub === 'enter') {
      const allowEdits = args[2] === 'allow-edits'
      await runtime.enterSandbox({ passphrase: arg(args, 1, usage), allowEdits })
      return [line('ok', allowEdits ? 'entered Sandbox (edits held for review)' : 'entered Sandbox')]
    }
    if (sub === 'exit') {
      const queued = await runtime.exitSandbox()
      return [
        line('ok', 'left Sandbox'),
        ...queued.map(a => line('warn', `review ${a.id}: ${a.action.kind}`)),
      ]
    }
    throw new UsageError(`usage: ${usage}`)
  },

  audit: async ({ runtime }, args) => {
    const count = args[0] === undefined ? 10 : Number.parseInt(args[0], 10)
    if (!Number.isInteger(count) || count < 1) throw new UsageError('usage: audit [n]')
    const records = runtime.auditTail(count)
    if (records.length === 0) return [line('muted', '(no decisions yet)')]
    return records.map(r =>
      line(
        r.decision === DecisionOutcome.Allow ? 'ok' : r.decision === DecisionOutcome.Deny ? 'error' : 'warn',
        `${r.timestamp}  ${r.decision}  ${r.actor_id}  ${r.action_kind}${r.reason === '' ? '' : `  ${r.reason}`}`,
      ),
    )
  },
}
