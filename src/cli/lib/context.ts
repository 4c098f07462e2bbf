import type { WorkflowSettings } from '../../lib/config-loader.js'
import type { WorkflowOptions } from '../../lib/workflow.js'
import { delay } from '../../lib/timeout.js'
import type { CLIArgs, RunReport } from '../../types.js'
import * as ui from '../ui.js'
import { createGenerationReporter, createRenderReporter } from './progress.js'

export interface CommandContext {
  args: CLIArgs
  settings: WorkflowSettings
  subject?: string
  verbose: boolean
  quiet: boolean
  jsonOutput: boolean
}

/** Exit code for a strict run with failed domains */
export const EXIT_DOMAIN_FAILURES = 2

/**
 * Split a comma-separated --domains value
 */
export function parseDomainList(value: string | undefined): string[] | undefined {
  if (!value) return undefined
  const domains = value.split(',').map(d => d.trim()).filter(Boolean)
  return domains.length > 0 ? domains : undefined
}

/**
 * Enrichment wait shown as a spinner on stderr
 */
export function waitWithSpinner(ms: number): Promise<void> {
  return ui.withSpinner(`Waiting ${Math.round(ms / 1000)}s for enrichment`, () => delay(ms), {
    successText: 'Enrichment wait finished'
  })
}

export function toWorkflowOptions(context: CommandContext): WorkflowOptions {
  const { args, verbose, jsonOutput } = context
  return {
    subject: context.subject,
    force: args.force ?? false,
    protectEdits: args['protect-edits'],
    twoStage: args['two-stage'],
    render: args.render,
    domains: parseDomainList(args.domains),
    onGenerationEvent: jsonOutput ? undefined : createGenerationReporter(verbose),
    onRenderEvent: jsonOutput ? undefined : createRenderReporter(verbose),
    delay: jsonOutput ? undefined : waitWithSpinner
  }
}

export function exitCodeFor(report: RunReport, strict: boolean | undefined): number {
  return strict && report.failures.length > 0 ? EXIT_DOMAIN_FAILURES : 0
}
