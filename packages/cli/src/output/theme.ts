/**
 * output/theme.ts — colour palette for human-readable output.
 *
 * Formatters take a Theme rather than importing chalk directly so the same
 * code renders coloured terminal output and plain text.
 */

import chalk from 'chalk'
import { ValidationOutcome } from '@contractcheck/validator'

export type Paint = (text: string) => string

export interface Theme {
  readonly accent: Paint
  readonly text: Paint
  readonly dim: Paint
  readonly muted: Paint
  readonly ok: Paint
  readonly error: Paint
  readonly warn: Paint
}

export const chalkTheme: Theme = {
  accent: chalk.hex('#4FC3F7'),
  text:   chalk.hex('#C8C8C0'),
  dim:    chalk.hex('#666666'),
  muted:  chalk.hex('#8A8A84'),
  ok:     chalk.hex('#81C784'),
  error:  chalk.hex('#CF6679'),
  warn:   chalk.hex('#D4880A'),
}

const identity: Paint = (text) => text

export const plainTheme: Theme = {
  accent: identity,
  text:   identity,
  dim:    identity,
  muted:  identity,
  ok:     identity,
  error:  identity,
  warn:   identity,
}

export const outcomeColor = (theme: Theme, outcome: ValidationOutcome): Paint =>
  outcome === ValidationOutcome.Accepted ? theme.ok : theme.error
