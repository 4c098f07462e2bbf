/**
 * neuroreport CLI - Render Command
 *
 * Render the current manifest; two-stage unless --two-stage=false
 */

import { runRender } from '../../lib/workflow.js'
import { c } from '../lib/colors.js'
import { toWorkflowOptions, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runRenderCommand(context: CommandContext): Promise<number> {
  const outcome = await runRender(context.settings, toWorkflowOptions(context))

  if (context.jsonOutput) {
    ui.output(JSON.stringify(outcome, null, 2))
  } else {
    ui.success(`Report rendered: ${c.path(outcome.outputPath)}`)
    ui.output(outcome.outputPath)
  }
  return 0
}
