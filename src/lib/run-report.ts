/**
 * Run report construction and formatting
 */

import type { DomainOutcome, GenerationStatus, RunReport } from '../types.js'
import { GENERATION_STATUSES } from '../types.js'

export function emptyCounts(): Record<GenerationStatus, number> {
  return { generated: 0, cached: 0, protected: 0, skipped: 0, failed: 0 }
}

export function createRunReport(
  outcomes: DomainOutcome[],
  meta: { subject?: string; startedAt: Date; finishedAt: Date }
): RunReport {
  const sorted = [...outcomes].sort((a, b) => a.sectionOrdinal - b.sectionOrdinal)
  const counts = emptyCounts()
  const failures: RunReport['failures'] = []

  for (const outcome of sorted) {
    counts[outcome.status]++
    if (outcome.status === 'failed') {
      failures.push({ key: outcome.key, message: outcome.message ?? 'unknown error' })
    }
  }

  return {
    subject: meta.subject,
    startedAt: meta.startedAt.toISOString(),
    finishedAt: meta.finishedAt.toISOString(),
    counts,
    outcomes: sorted,
    failures
  }
}

export function hasFailures(report: RunReport): boolean {
  return report.failures.length > 0
}

/**
 * Format run report for display
 */
export function formatRunReport(
  report: RunReport,
  formatItem?: (outcome: DomainOutcome) => string
): string {
  const lines: string[] = []
  const width = Math.max(...GENERATION_STATUSES.map(s => s.length)) + 1

  lines.push('')
  lines.push(report.subject ? `Generation Summary (${report.subject}):` : 'Generation Summary:')
  for (const status of GENERATION_STATUSES) {
    const label = `${status[0].toUpperCase()}${status.slice(1)}:`
    lines.push(`  ${label.padEnd(width + 1)} ${report.counts[status]}`)
  }
  lines.push('')

  if (report.failures.length > 0) {
    lines.push('Failures:')
    for (const failure of report.failures) {
      lines.push(`  ✗ ${failure.key}: ${failure.message}`)
    }
    lines.push('')
  }

  if (formatItem) {
    lines.push('Details:')
    for (const outcome of report.outcomes) {
      lines.push(`  ${formatItem(outcome)}`)
    }
  }

  return lines.join('\n')
}

/**
 * Format run report as JSON
 */
export function formatRunReportJson(report: RunReport): object {
  return {
    subject: report.subject,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    counts: report.counts,
    outcomes: report.outcomes.map(outcome => ({
      key: outcome.key,
      section: outcome.sectionOrdinal,
      status: outcome.status,
      artifacts: outcome.artifacts,
      code: outcome.code,
      message: outcome.message,
      duration: outcome.durationMs
    })),
    failures: report.failures
  }
}
