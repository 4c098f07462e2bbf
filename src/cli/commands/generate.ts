/**
 * neuroreport CLI - Generate Command
 *
 * Generate sections and write the manifest without rendering
 */

import { formatRunReport, formatRunReportJson } from '../../lib/run-report.js'
import { runGeneration } from '../../lib/workflow.js'
import { c } from '../lib/colors.js'
import { exitCodeFor, toWorkflowOptions, type CommandContext } from '../lib/context.js'
import { describeOutcome } from '../lib/progress.js'
import * as ui from '../ui.js'

export async function runGenerate(context: CommandContext): Promise<number> {
  const { args, verbose, jsonOutput } = context

  const result = await runGeneration(context.settings, toWorkflowOptions(context))

  if (jsonOutput) {
    ui.output(JSON.stringify({
      ...formatRunReportJson(result.report),
      manifest: { path: result.manifestPath, entries: result.manifestEntries }
    }, null, 2))
  } else {
    ui.log(formatRunReport(result.report, verbose ? describeOutcome : undefined))
    ui.success(`Manifest written: ${c.path(result.manifestPath)} (${result.manifestEntries.length} sections)`)
  }

  return exitCodeFor(result.report, args.strict)
}
