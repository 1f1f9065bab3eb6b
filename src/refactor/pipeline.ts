import { createLogger } from '../logger'
import { checkBudget } from './budget'
import { activePasses } from './concerns'
import { MalformedResponseError, NoActivePassesError } from './errors'
import { executePass } from './executor'
import { buildPassPrompt } from './prompt'
import type {
  ConcernTemplate,
  FinalReport,
  ModelCollaborator,
  PassOutcome,
  PassResult,
  PipelineConfig,
  PipelineOutcome,
  SourceArtifact
} from './types'

const log = createLogger('pipeline')

export interface PipelineOptions {
  model?: string
  /**
   * Checked at the top of every pass and handed to the model call, which may abort mid-stream.
   * Either way the run ends in `halted-cancelled`.
   */
  signal?: AbortSignal
  onProgress?: (message: string) => void
}

function aggregate(artifact: SourceArtifact, passes: PassResult[], finalText: string): FinalReport {
  const last = passes[passes.length - 1]
  return {
    detectedLanguage: last.detectedLanguage,
    metadata: artifact.metadata,
    rationalePerConcern: passes.map((p) => ({ concern: p.concern, rationale: p.rationale })),
    finalText
  }
}

/**
 * Run every enabled concern over the artifact, feeding each pass the previous pass's code.
 * Ends in `completed` with a report, or in one of the halted states with a message and no partial result.
 * `ModelInvocationError` from the collaborator propagates unless the run was cancelled.
 */
export async function runRefactorPipeline(
  artifact: SourceArtifact,
  config: PipelineConfig,
  model: ModelCollaborator,
  opts: PipelineOptions = {}
): Promise<PipelineOutcome> {
  const budget = checkBudget(artifact, config)
  if (!budget.ok) {
    log.warn('refactor halted: over budget', { cost: budget.error.actualCost, max: budget.error.maxCost })
    return {
      state: 'halted-budget',
      message: budget.error.message,
      actualCost: budget.error.actualCost,
      maxCost: budget.error.maxCost
    }
  }

  let passes: ConcernTemplate[]
  try {
    passes = activePasses(config)
  } catch (e) {
    if (!(e instanceof NoActivePassesError)) throw e
    log.warn('refactor halted: no concerns enabled')
    return { state: 'halted-no-passes', message: e.message }
  }

  log.info(`refactor started: ${passes.map((p) => p.name).join(' -> ')}`, { cost: budget.cost })

  let currentText = artifact.text
  const results: PassResult[] = []

  for (let i = 0; i < passes.length; i++) {
    const concern = passes[i]
    if (opts.signal?.aborted) {
      log.warn(`refactor cancelled before ${concern.name} pass`)
      return {
        state: 'halted-cancelled',
        message: `Refactor cancelled before the ${concern.name} pass; no changes were kept.`,
        completedPasses: results.length
      }
    }

    opts.onProgress?.(`[${concern.name}] pass ${i + 1}/${passes.length}...`)
    const payload = buildPassPrompt(concern, currentText, artifact.metadata, config.userInstructions, i === 0)
    let outcome: PassOutcome
    try {
      outcome = await executePass(payload, model, { model: opts.model, format: 'json', signal: opts.signal })
    } catch (e) {
      if (!opts.signal?.aborted) throw e
      log.warn(`refactor cancelled during ${concern.name} pass`)
      return {
        state: 'halted-cancelled',
        message: `Refactor cancelled during the ${concern.name} pass; no changes were kept.`,
        completedPasses: results.length
      }
    }

    if (outcome.kind === 'refusal') {
      log.warn(`${concern.name} pass refused`, { discarded: results.length })
      return { state: 'halted-refusal', message: outcome.explanation, concern: concern.name }
    }
    if (outcome.kind === 'malformed') {
      const err = new MalformedResponseError(concern.name, outcome.rawResponse, outcome.reason)
      log.warn(`${concern.name} pass returned a malformed response`, { reason: outcome.reason, discarded: results.length })
      return { state: 'halted-malformed', message: err.message, concern: concern.name, rawResponse: err.rawResponse }
    }

    log.debug(`${concern.name} pass done`, { before: currentText.length, after: outcome.result.rewrittenText.length })
    results.push(outcome.result)
    currentText = outcome.result.rewrittenText
  }

  log.info('refactor completed', { passes: results.length })
  return { state: 'completed', report: aggregate(artifact, results, currentText), passes: results }
}
