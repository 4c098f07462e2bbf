/**
 * neuroreport CLI - Init Command
 *
 * Initialize a new .neuroreport configuration in the current directory
 */

import fs from 'node:fs'
import path from 'node:path'
import type { CLIArgs } from '../../types.js'
import { CONFIG_DIR, CONFIG_FILE, createDefaultConfig } from '../../lib/config-loader.js'
import { c } from '../lib/colors.js'
import * as ui from '../ui.js'

interface InitContext {
  args: CLIArgs
  subject?: string
  jsonOutput: boolean
}

export async function runInit(context: InitContext, cwd: string = process.cwd()): Promise<number> {
  const { args, jsonOutput } = context
  const configDir = path.join(cwd, CONFIG_DIR)
  const existing = path.join(configDir, CONFIG_FILE)

  if (fs.existsSync(existing) && !args.force) {
    if (jsonOutput) {
      ui.output(JSON.stringify({ error: 'already_initialized', path: existing }))
    } else {
      ui.error(`Already initialized at ${existing}`)
      ui.log('Use --force to reinitialize')
    }
    return 1
  }

  const subject = context.subject ?? path.basename(cwd)
  const configPath = createDefaultConfig(configDir, subject)

  if (jsonOutput) {
    ui.output(JSON.stringify({ action: 'init', subject, configPath }))
  } else {
    ui.success(`Created ${c.path(configPath)}`)
    ui.log(`Put data files under ${c.path('data/')} and run ${c.command('neuroreport run')}`)
  }
  return 0
}
