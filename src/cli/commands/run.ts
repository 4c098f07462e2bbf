/**
 * neuroreport CLI - Run Command
 *
 * Generate every section, write the manifest, then render the report
 */

import { formatRunReport, formatRunReportJson } from '../../lib/run-report.js'
import { runWorkflow } from '../../lib/workflow.js'
import { c } from '../lib/colors.js'
import { exitCodeFor, toWorkflowOptions, type CommandContext } from '../lib/context.js'
import { describeOutcome } from '../lib/progress.js'
import * as ui from '../ui.js'

export async function runRun(context: CommandContext): Promise<number> {
  const { args, verbose, jsonOutput } = context

  const result = await runWorkflow(context.settings, toWorkflowOptions(context))

  if (jsonOutput) {
    ui.output(JSON.stringify({
      ...formatRunReportJson(result.report),
      manifest: { path: result.manifestPath, entries: result.manifestEntries },
      render: result.render ?? null
    }, null, 2))
    return exitCodeFor(result.report, args.strict)
  }

  ui.log(formatRunReport(result.report, verbose ? describeOutcome : undefined))
  ui.success(`Manifest written: ${c.path(result.manifestPath)} (${result.manifestEntries.length} sections)`)

  if (result.render) {
    ui.success(`Report rendered: ${c.path(result.render.outputPath)}`)
    ui.output(result.render.outputPath)
  }

  return exitCodeFor(result.report, args.strict)
}
