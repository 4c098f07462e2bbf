/**
 * neuroreport CLI - Colors Utility
 *
 * Terminal colors using tuiuiu.js text-utils.
 * Supports NO_COLOR and FORCE_COLOR environment variables.
 */

import { colorize, style, styles as tuiStyles } from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'
import type { GenerationStatus } from '../../types.js'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  // Respect FORCE_COLOR
  if (process.env.FORCE_COLOR !== undefined) return true
  // Check if stderr is a TTY (all UI goes to stderr)
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

type StyleName = keyof typeof tuiStyles

// Wrappers that respect NO_COLOR
const color = (col: string) => (text: string): string => enabled ? colorize(text, col) : text
const styled = (name: StyleName) => (text: string): string => enabled ? style(text, name) : text

/**
 * Teal palette
 *
 * - cyan:        commands
 * - cyanBright:  highlights and option flags
 * - blueBright:  options and cached status
 * - gray:        labels and descriptions
 */
const ansi = {
  // Styles
  bold: styled('bold'),
  dim: styled('dim'),

  // Teal palette
  teal: color('cyan'),
  brightTeal: color('cyanBright'),
  slateTeal: color('blueBright'),
  paleSlate: color('blue'),

  // Neutrals
  white: color('whiteBright'),
  gray: color('gray'),
  lightGray: color('white'),

  // Semantic
  red: color('redBright'),
  green: color('greenBright'),
  yellow: color('yellowBright'),
}

export { ansi }

/**
 * Help/version formatter for cli-args-parser
 */
export const neuroreportFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.teal(s)),
  'version': s => ansi.brightTeal(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.teal(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.brightTeal(s),
  'option-type': s => ansi.slateTeal(s),
  'option-default': s => ansi.dim(ansi.paleSlate(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.slateTeal(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.teal(s),
}

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.teal(text)),
  key: (text: string) => ansi.brightTeal(text),
  path: (text: string) => ansi.paleSlate(text),
  subject: (text: string) => ansi.bold(ansi.teal(text)),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),
  info: (text: string) => ansi.teal(text),

  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  highlight: (text: string) => ansi.bold(ansi.brightTeal(text)),
  muted: (text: string) => ansi.dim(text),
}

const STATUS_COLORS: Record<GenerationStatus, (text: string) => string> = {
  generated: ansi.green,
  cached: ansi.slateTeal,
  protected: ansi.yellow,
  skipped: ansi.gray,
  failed: ansi.red
}

export function colorStatus(status: GenerationStatus): string {
  return STATUS_COLORS[status](status)
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  info: enabled ? ansi.teal('ℹ') : '[INFO]',
  bullet: enabled ? ansi.slateTeal('•') : '*',
  arrow: enabled ? ansi.teal('→') : '->',
  lock: enabled ? '🔒' : '[LOCKED]',
}

// Format a labeled value
export function labeled(label: string, value: string): string {
  return `${c.label(label + ':')} ${value}`
}

// Print utilities (stderr; stdout carries data only)
export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
  info: (msg: string) => console.error(`${symbols.info} ${c.info(msg)}`),
  item: (text: string) => console.error(`  ${symbols.bullet} ${text}`),
}
