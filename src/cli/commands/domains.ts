/**
 * neuroreport CLI - Domains Command
 *
 * Show the registry in section order
 */

import { DomainRegistry } from '../../lib/domain-registry.js'
import type { CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runDomains(context: Pick<CommandContext, 'jsonOutput'>): Promise<number> {
  const specs = new DomainRegistry().listSpecs()

  if (context.jsonOutput) {
    ui.output(JSON.stringify(specs, null, 2))
    return 0
  }

  ui.output(ui.formatSimpleTable(
    ['#', 'Key', 'Source', 'Raters', 'Labels'],
    specs.map(spec => [
      String(spec.sectionOrdinal).padStart(2, '0'),
      spec.key,
      spec.dataSource,
      spec.raterCapable ? 'yes' : 'no',
      spec.labels.join(' | ')
    ])
  ))
  return 0
}
