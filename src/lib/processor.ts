/**
 * Domain processors
 *
 * The built-in processor writes a Quarto section with one score table.
 * A custom processor can be loaded from a module configured under
 * `generation.processor`.
 */

import { pathToFileURL } from 'node:url'
import type { DomainProcessor, ProcessInput, Row, VariantTag } from '../types.js'
import { scoreColumn } from './availability.js'
import { ProcessorLoadError, toError } from './errors.js'

const RATER_TITLES: Record<VariantTag, string> = {
  default: '',
  self: 'Self-Report',
  parent: 'Parent Report',
  teacher: 'Teacher Report',
  observer: 'Observer Report'
}

function cell(value: string | undefined): string {
  return (value ?? '').trim().replace(/\|/g, '\\|')
}

function testName(row: Row): string {
  return cell(row.test_name) || cell(row.test)
}

/**
 * Deterministic Markdown: the same input always yields the same text
 */
export class MarkdownDomainProcessor implements DomainProcessor {
  process({ spec, rows, rater }: ProcessInput): string {
    const title = spec.title ?? spec.labels[0]
    const anchor = rater === 'default' ? spec.key : `${spec.key}-${rater}`
    const lines: string[] = []

    lines.push(`## ${title} {#sec-${anchor}}`)
    lines.push('')
    if (rater !== 'default') {
      lines.push(`### ${RATER_TITLES[rater]}`)
      lines.push('')
    }

    lines.push('| Test | Scale | Score | Value |')
    lines.push('|------|-------|-------|-------|')
    for (const row of rows) {
      const column = scoreColumn(row)
      if (!column) continue
      lines.push(`| ${testName(row)} | ${cell(row.scale)} | ${column} | ${cell(row[column])} |`)
    }
    lines.push('')

    return lines.join('\n')
  }
}

function isDomainProcessor(value: unknown): value is DomainProcessor {
  return value !== null && typeof value === 'object' && 'process' in value && typeof value.process === 'function'
}

/**
 * Import a processor module. It must export a DomainProcessor as default
 * or a `createProcessor()` factory.
 */
export async function loadDomainProcessor(modulePath: string): Promise<DomainProcessor> {
  let mod: unknown
  try {
    mod = await import(pathToFileURL(modulePath).href)
  } catch (err) {
    const error = toError(err)
    throw new ProcessorLoadError(modulePath, error.message, error)
  }

  if (mod === null || typeof mod !== 'object') {
    throw new ProcessorLoadError(modulePath, 'module has no exports')
  }

  if ('default' in mod && isDomainProcessor(mod.default)) {
    return mod.default
  }

  if ('createProcessor' in mod && typeof mod.createProcessor === 'function') {
    let created: unknown
    try {
      created = await mod.createProcessor()
    } catch (err) {
      const error = toError(err)
      throw new ProcessorLoadError(modulePath, `createProcessor() failed: ${error.message}`, error)
    }
    if (isDomainProcessor(created)) {
      return created
    }
    throw new ProcessorLoadError(modulePath, 'createProcessor() did not return an object with process()')
  }

  throw new ProcessorLoadError(modulePath, 'no default export or createProcessor() found')
}
