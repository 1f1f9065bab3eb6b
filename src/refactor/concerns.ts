import { NoActivePassesError } from './errors'
import { instructionBodyFor } from './templates'
import { CONCERN_ORDER, type ConcernName, type ConcernTemplate, type PipelineConfig } from './types'

const template = (name: ConcernName): ConcernTemplate => Object.freeze({ name, instructionBody: instructionBodyFor(name) })

export const CONCERN_TEMPLATES: Readonly<Record<ConcernName, ConcernTemplate>> = Object.freeze({
  Security: template('Security'),
  Performance: template('Performance'),
  Memory: template('Memory'),
  Correctness: template('Correctness'),
  Maintainability: template('Maintainability'),
  Reliability: template('Reliability')
})

export function isConcernName(value: string): value is ConcernName {
  return CONCERN_ORDER.some((c) => c === value)
}

/**
 * Parse a loose concern label ("security", " Performance ") into its canonical name.
 */
export function toConcernName(label: string): ConcernName | undefined {
  const trimmed = label.trim().toLowerCase()
  return CONCERN_ORDER.find((c) => c.toLowerCase() === trimmed)
}

/**
 * Enabled concerns in canonical order. Iteration order of the configured set never matters.
 */
export function activePasses(config: Pick<PipelineConfig, 'enabledConcerns'>): ConcernTemplate[] {
  const passes = CONCERN_ORDER.filter((name) => config.enabledConcerns.has(name)).map((name) => CONCERN_TEMPLATES[name])
  if (!passes.length) throw new NoActivePassesError()
  return passes
}
