/**
 * neuroreport CLI - Protected Command
 *
 * List section files edited by hand since they were generated
 */

import path from 'node:path'
import { listProtectedArtifacts } from '../../lib/workflow.js'
import { c, symbols } from '../lib/colors.js'
import type { CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runProtected(context: CommandContext): Promise<number> {
  const { settings, jsonOutput } = context
  const found = listProtectedArtifacts(settings)

  if (jsonOutput) {
    ui.output(JSON.stringify(found, null, 2))
    return 0
  }

  if (found.length === 0) {
    ui.log(`${symbols.success} No hand-edited sections`)
    return 0
  }

  ui.log(`${symbols.lock} ${found.length} hand-edited section file(s) will not be regenerated:`)
  for (const item of found) {
    ui.output(path.relative(settings.workspaceRoot, item.path))
  }
  ui.log(c.muted('Use --force to regenerate them'))
  return 0
}
