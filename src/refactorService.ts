import { parseRefactorSettings, toPipelineConfig } from './config'
import { createLogger } from './logger'
import { renderReport } from './refactor/format'
import { runRefactorPipeline } from './refactor/pipeline'
import type { ModelCollaborator, PipelineConfig, PipelineOutcome, Retriever } from './refactor/types'

const log = createLogger('service')

export type RefactorDeps = {
  retriever: Retriever
  model: ModelCollaborator
  modelName?: string
  signal?: AbortSignal
  onProgress?: (m: string) => void
  env?: NodeJS.ProcessEnv
  /** Files refactored at once by `conductRefactorBatch`. */
  concurrency?: number
}

export const DEFAULT_BATCH_CONCURRENCY = 2

export type RefactorRun = {
  /** Rendered report when the run completed, otherwise the halt explanation. */
  output: string
  outcome: PipelineOutcome
}

export type BatchEntry = { locator: string; ok: true; run: RefactorRun } | { locator: string; ok: false; error: Error }

export function renderOutcome(outcome: PipelineOutcome, config: Pick<PipelineConfig, 'outputIsStructured'>): string {
  if (outcome.state === 'completed') return renderReport(outcome.report, config.outputIsStructured)
  return outcome.message
}

async function refactorWithConfig(locator: string, config: PipelineConfig, deps: RefactorDeps): Promise<RefactorRun> {
  const artifact = await deps.retriever.fetch(locator)
  const outcome = await runRefactorPipeline(artifact, config, deps.model, {
    model: deps.modelName,
    signal: deps.signal,
    onProgress: deps.onProgress
  })
  return { output: renderOutcome(outcome, config), outcome }
}

/**
 * Retrieve one file, run every enabled concern over it and render the result.
 * Retrieval and model invocation errors propagate unchanged.
 */
export async function conductRefactor(locator: string, settings: unknown, deps: RefactorDeps): Promise<RefactorRun> {
  const config = toPipelineConfig(parseRefactorSettings(settings), deps.env)
  return refactorWithConfig(locator, config, deps)
}

/**
 * Refactor several files, at most `deps.concurrency` at a time. Runs share nothing;
 * each entry carries its own result or error, in input order.
 */
export async function conductRefactorBatch(
  locators: string[],
  settings: unknown,
  deps: RefactorDeps
): Promise<BatchEntry[]> {
  const config = toPipelineConfig(parseRefactorSettings(settings), deps.env)
  const concurrency = Math.max(1, Math.trunc(deps.concurrency ?? DEFAULT_BATCH_CONCURRENCY))
  log.info(`batch refactor of ${locators.length} file(s), ${concurrency} at a time`)

  const entries = new Array<BatchEntry>(locators.length)
  let next = 0
  const worker = async () => {
    while (next < locators.length) {
      const idx = next++
      const locator = locators[idx]
      try {
        entries[idx] = { locator, ok: true, run: await refactorWithConfig(locator, config, deps) }
      } catch (e) {
        entries[idx] = { locator, ok: false, error: e instanceof Error ? e : new Error(String(e)) }
      }
    }
  }

  await Promise.all(Array.from({ length: Math.min(concurrency, locators.length) }, () => worker()))
  return entries
}
