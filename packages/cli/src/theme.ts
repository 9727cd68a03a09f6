import chalk, { type ChalkInstance } from 'chalk'
import type { DiagnosticLevel } from '@aclforge/renderer'

export interface Theme {
  readonly text:  ChalkInstance
  readonly muted: ChalkInstance
  readonly amber: ChalkInstance
  readonly green: ChalkInstance
  readonly red:   ChalkInstance
}

export const themeFor = (instance: ChalkInstance): Theme => ({
  text:  instance.hex('#C8C8C0'),
  muted: instance.hex('#666666'),
  amber: instance.hex('#D4880A'),
  green: instance.hex('#81C784'),
  red:   instance.hex('#CF6679'),
})

export const t: Theme = themeFor(chalk)

export const levelColor = (theme: Theme, level: DiagnosticLevel): ChalkInstance =>
  level === 'warn' ? theme.amber : theme.muted
