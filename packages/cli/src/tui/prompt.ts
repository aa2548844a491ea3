import type { Mode } from '@bastion/kernel'
import { modeColor, t } from './theme.js'

/**
 * buildPS1 — the shell prompt, coloured by the current mode.
 *
 * Format: [bastion:Normal] ❯
 */
export function buildPS1(mode: Mode): string {
  return (
    t.blueDim('[') +
    t.blue.bold('bastion') +
    t.blueDim(':') +
    modeColor(mode)(mode) +
    t.blueDim(']') +
    t.blueDim(' ❯ ')
  )
}
