/**
 * Renders generation and render events on stderr
 */

import path from 'node:path'
import type { GenerationEvent } from '../../lib/orchestrator.js'
import type { RenderEvent } from '../../lib/render.js'
import type { DomainOutcome } from '../../types.js'
import * as ui from '../ui.js'
import { c, colorStatus, symbols } from './colors.js'

export function describeOutcome(outcome: DomainOutcome): string {
  const ordinal = String(outcome.sectionOrdinal).padStart(2, '0')
  const files = outcome.artifacts.map(a => path.basename(a)).join(', ')
  const parts = [`${ordinal} ${c.key(outcome.key.padEnd(12))} ${colorStatus(outcome.status)}`]
  if (files) parts.push(c.path(files))
  if (outcome.message && outcome.status !== 'generated' && outcome.status !== 'cached') {
    parts.push(c.muted(`(${outcome.message})`))
  }
  return parts.join('  ')
}

export function createGenerationReporter(verbose: boolean): (event: GenerationEvent) => void {
  return event => {
    switch (event.type) {
      case 'domain-start':
        ui.verbose(`[${event.index + 1}/${event.total}] ${event.spec.key}`, verbose)
        break
      case 'domain-done': {
        const { outcome } = event
        if (outcome.status === 'failed') {
          ui.warn(`${outcome.key}: ${outcome.message ?? 'failed'}`)
        } else if (outcome.status === 'protected') {
          ui.log(`${symbols.lock} ${c.key(outcome.key)} kept (hand-edited)`)
        }
        ui.verbose(describeOutcome(outcome), verbose)
        break
      }
    }
  }
}

export function createRenderReporter(verbose: boolean): (event: RenderEvent) => void {
  return event => {
    switch (event.type) {
      case 'enrichment-triggered':
        ui.verbose('Enrichment triggered', verbose)
        break
      case 'pass-start':
        ui.log(`${symbols.arrow} Render pass ${event.pass}`)
        break
      case 'pass-done':
        ui.verbose(`Render pass ${event.pass} done${event.outputPath ? `: ${event.outputPath}` : ''}`, verbose)
        break
      case 'pass-failed':
        ui.warn(`Render pass ${event.pass} failed: ${event.error}`)
        break
      case 'waiting':
        ui.verbose(`Enrichment wait: ${event.ms}ms`, verbose)
        break
      case 'relocated':
        ui.verbose(`Output moved to ${event.outputPath}`, verbose)
        break
    }
  }
}
