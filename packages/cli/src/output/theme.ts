import chalk, { Chalk, type ChalkInstance } from 'chalk'

export interface Theme {
  readonly blue:  ChalkInstance
  readonly text:  ChalkInstance
  readonly muted: ChalkInstance
  readonly amber: ChalkInstance
  readonly green: ChalkInstance
  readonly red:   ChalkInstance
}

export const createTheme = (instance: ChalkInstance = chalk): Theme => ({
  blue:  instance.hex('#4FC3F7'),
  text:  instance.hex('#C8C8C0'),
  muted: instance.hex('#666666'),
  amber: instance.hex('#D4880A'),
  green: instance.hex('#81C784'),
  red:   instance.hex('#CF6679'),
})

export const t = createTheme()

/** No escape codes, whatever the terminal supports. */
export const plain = createTheme(new Chalk({ level: 0 }))

export const enabledColor = (theme: Theme, enabled: boolean): ChalkInstance =>
  enabled ? theme.green : theme.muted
