import { BudgetExceededError } from './errors'
import type { PipelineConfig, SourceArtifact } from './types'

// rough estimate, same ratio the model adapter uses for its context warning
export const CHARS_PER_TOKEN = 4

export function estimateCost(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN)
}

export type BudgetCheck = { ok: true; cost: number } | { ok: false; error: BudgetExceededError }

/**
 * Fail-closed size check, run once before any model call. Never truncates.
 */
export function checkBudget(artifact: SourceArtifact, config: Pick<PipelineConfig, 'maxArtifactCost'>): BudgetCheck {
  const cost = estimateCost(artifact.text)
  if (cost > config.maxArtifactCost) {
    return { ok: false, error: new BudgetExceededError(cost, config.maxArtifactCost) }
  }
  return { ok: true, cost }
}
