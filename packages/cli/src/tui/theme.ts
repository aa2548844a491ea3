import chalk, { type ChalkInstance } from 'chalk'
import { DecisionOutcome, Mode } from '@bastion/kernel'
import type { Tone } from './dispatch.js'

export const t = {
  blue:    chalk.hex('#4FC3F7'),
  blueDim: chalk.hex('#0277BD'),
  text:    chalk.hex('#C8C8C0'),
  white:   chalk.hex('#F2F2EC'),
  dim:     chalk.hex('#444444'),
  muted:   chalk.hex('#666666'),
  amber:   chalk.hex('#D4880A'),
  green:   chalk.hex('#81C784'),
  red:     chalk.hex('#CF6679'),
  violet:  chalk.hex('#B39DDB'),
} as const

const _modeColors: Record<Mode, ChalkInstance> = {
  [Mode.Normal]:          t.green,
  [Mode.ApprovalPending]: t.amber,
  [Mode.Sandbox]:         t.violet,
}

export const modeColor = (mode: Mode): ChalkInstance => _modeColors[mode]

const _outcomeColors: Record<DecisionOutcome, ChalkInstance> = {
  [DecisionOutcome.Allow]:           t.green,
  [DecisionOutcome.Deny]:            t.red,
  [DecisionOutcome.RequireApproval]: t.amber,
}

export const outcomeColor = (outcome: DecisionOutcome): ChalkInstance => _outcomeColors[outcome]

const _toneColors: Record<Tone, ChalkInstance> = {
  info:  t.text,
  ok:    t.green,
  warn:  t.amber,
  error: t.red,
  muted: t.muted,
}

export const toneColor = (tone: Tone): ChalkInstance => _toneColors[tone]
