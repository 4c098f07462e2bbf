/**
 * Whole-run mutual exclusion through a sentinel file in the workspace root.
 *
 * The file is created with O_CREAT | O_EXCL ('wx'); a run that finds it
 * refuses to start. It is removed on release, on SIGINT/SIGTERM and on
 * process exit.
 */

import fs from 'node:fs'
import { ConcurrentRunDetectedError } from './errors.js'

export interface LockInfo {
  pid: number
  startedAt: string
  subject?: string
}

const SIGNALS = ['SIGINT', 'SIGTERM'] as const

function describeHolder(content: string): string | undefined {
  const fields = new Map<string, string>()
  for (const line of content.split(/\r?\n/)) {
    const sep = line.indexOf(':')
    if (sep > 0) fields.set(line.slice(0, sep).trim(), line.slice(sep + 1).trim())
  }
  const pid = fields.get('pid')
  if (!pid) return undefined
  const startedAt = fields.get('started_at')
  return startedAt ? `pid ${pid}, started ${startedAt}` : `pid ${pid}`
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

export class RunLock {
  private held = false
  private readonly onSignal = (signal: NodeJS.Signals) => {
    this.release()
    process.exit(signal === 'SIGINT' ? 130 : 143)
  }
  private readonly onExit = () => this.release()

  constructor(readonly lockPath: string) {}

  get isHeld(): boolean {
    return this.held
  }

  /**
   * Create the sentinel. Throws ConcurrentRunDetectedError if it already exists.
   */
  acquire(subject?: string): LockInfo {
    const info: LockInfo = { pid: process.pid, startedAt: new Date().toISOString(), subject }

    let fd: number
    try {
      fd = fs.openSync(this.lockPath, 'wx')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') {
        throw new ConcurrentRunDetectedError(this.lockPath, this.readHolder())
      }
      throw err
    }

    try {
      const lines = [`pid: ${info.pid}`, `started_at: ${info.startedAt}`]
      if (subject) lines.push(`subject: ${subject}`)
      fs.writeSync(fd, lines.join('\n') + '\n')
    } catch (err) {
      fs.closeSync(fd)
      fs.rmSync(this.lockPath, { force: true })
      throw err
    }
    fs.closeSync(fd)

    this.held = true
    for (const signal of SIGNALS) {
      process.once(signal, this.onSignal)
    }
    process.once('exit', this.onExit)
    return info
  }

  release(): void {
    if (!this.held) return
    this.held = false

    for (const signal of SIGNALS) {
      process.removeListener(signal, this.onSignal)
    }
    process.removeListener('exit', this.onExit)
    fs.rmSync(this.lockPath, { force: true })
  }

  private readHolder(): string | undefined {
    try {
      return describeHolder(fs.readFileSync(this.lockPath, 'utf-8'))
    } catch {
      return undefined
    }
  }
}

/**
 * Run `fn` while holding the lock; always released afterwards
 */
export async function withRunLock<T>(
  lockPath: string,
  subject: string | undefined,
  fn: () => Promise<T>
): Promise<T> {
  const lock = new RunLock(lockPath)
  lock.acquire(subject)
  try {
    return await fn()
  } finally {
    lock.release()
  }
}
