/**
 * CLI UI utilities - TTY-aware output
 *
 * - stdout carries data only (reports, JSON, listings)
 * - stderr carries progress, warnings and errors
 */

import { Table, renderToString, getSpinnerConfig } from 'tuiuiu.js'
import type { SpinnerStyle } from 'tuiuiu.js'

// Detect if running in interactive terminal
export const isTTY = process.stdout.isTTY ?? false
export const isStderrTTY = process.stderr.isTTY ?? false

let quiet = false

/**
 * Suppress non-essential stderr output (log, success)
 */
export function setQuiet(value: boolean): void {
  quiet = value
}

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (!quiet) {
    console.error(message)
  }
}

/**
 * Log verbose message (only with verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(`[neuroreport] ${message}`)
  }
}

/**
 * Log error to stderr (always shown)
 */
export function error(message: string): void {
  console.error(`Error: ${message}`)
}

/**
 * Log success message
 */
export function success(message: string): void {
  if (!quiet) {
    console.error(`✓ ${message}`)
  }
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string): void {
  console.error(`Warning: ${message}`)
}

export interface Spinner {
  start(): void
  stop(finalText?: string): void
  update(text: string): void
  succeed(msg?: string): void
  fail(msg?: string): void
}

/**
 * Simple spinner for stderr
 * Uses tuiuiu.js spinner frames but renders imperatively to stderr
 */
export function createSpinner(text: string, style: SpinnerStyle = 'dots'): Spinner {
  if (!isStderrTTY || quiet) {
    // No-op spinner for non-TTY
    return {
      start: () => { log(text) },
      stop: () => {},
      update: (_text: string) => {},
      succeed: (msg?: string) => { if (msg) success(msg) },
      fail: (msg?: string) => { if (msg) console.error(`✗ ${msg}`) }
    }
  }

  const config = getSpinnerConfig(style)
  let frameIndex = 0
  let interval: ReturnType<typeof setInterval> | null = null
  let currentText = text

  const render = () => {
    const frame = config.frames[frameIndex % config.frames.length]
    process.stderr.write(`\r\x1b[K${frame} ${currentText}`)
    frameIndex++
  }

  const clear = () => {
    if (interval) clearInterval(interval)
    interval = null
    process.stderr.write('\r\x1b[K')
  }

  return {
    start: () => {
      render()
      interval = setInterval(render, config.interval)
    },
    stop: (finalText?: string) => {
      clear()
      if (finalText) console.error(finalText)
    },
    update: (newText: string) => {
      currentText = newText
    },
    succeed: (msg?: string) => {
      clear()
      console.error(`✓ ${msg || currentText}`)
    },
    fail: (msg?: string) => {
      clear()
      console.error(`✗ ${msg || currentText}`)
    }
  }
}

/**
 * Wrap an async operation with a spinner
 */
export async function withSpinner<T>(
  text: string,
  operation: () => Promise<T>,
  options: { successText?: string; failText?: string } = {}
): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()

  try {
    const result = await operation()
    spinner.succeed(options.successText)
    return result
  } catch (err) {
    spinner.fail(options.failText)
    throw err
  }
}

/**
 * Format data as a table using tuiuiu.js (tab-separated when piped)
 */
export function formatTable(
  columns: Array<{ key: string; header: string; align?: 'left' | 'center' | 'right' }>,
  data: Array<Record<string, string>>,
  options: { borderStyle?: 'single' | 'round' | 'ascii' | 'none' } = {}
): string {
  if (!isTTY) {
    const headers = columns.map(col => col.header).join('\t')
    const rows = data.map(row => columns.map(col => row[col.key] ?? '').join('\t'))
    return [headers, ...rows].join('\n')
  }

  const table = Table({
    columns: columns.map(col => ({
      key: col.key,
      header: col.header,
      align: col.align || 'left'
    })),
    data,
    borderStyle: options.borderStyle || 'round',
    showHeader: true
  })

  return renderToString(table)
}

/**
 * Format simple rows as a table (shorthand)
 */
export function formatSimpleTable(headers: string[], rows: string[][]): string {
  const columns = headers.map((header, i) => ({ key: `col${i}`, header }))
  const data = rows.map(row => {
    const record: Record<string, string> = {}
    row.forEach((cell, i) => { record[`col${i}`] = cell })
    return record
  })

  return formatTable(columns, data)
}

/**
 * Print a styled header
 */
export function header(text: string): void {
  if (!quiet) {
    console.error(`\n${text}\n${'─'.repeat(text.length)}`)
  }
}
