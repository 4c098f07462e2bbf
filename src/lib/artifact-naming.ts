import path from 'node:path'
import type { DomainSpec, VariantTag } from '../types.js'
import { RATER_ORDER } from '../types.js'

export interface ArtifactLayout {
  artifactsDir: string
  artifactPrefix: string
  artifactExtension: string
}

/**
 * `<dir>/<prefix><NN>_<key>[_<rater>]<ext>`, e.g. `_02-09_adhd_parent.qmd`
 */
export function artifactPath(spec: DomainSpec, variant: VariantTag, layout: ArtifactLayout): string {
  const ordinal = String(spec.sectionOrdinal).padStart(2, '0')
  const suffix = variant === 'default' ? '' : `_${variant}`
  return path.join(
    layout.artifactsDir,
    `${layout.artifactPrefix}${ordinal}_${spec.key}${suffix}${layout.artifactExtension}`
  )
}

/**
 * Every path a domain can produce: the single artifact, or one per rater in RATER_ORDER
 */
export function allVariantPaths(spec: DomainSpec, layout: ArtifactLayout): string[] {
  if (!spec.raterCapable) {
    return [artifactPath(spec, 'default', layout)]
  }
  return RATER_ORDER.map(rater => artifactPath(spec, rater, layout))
}
