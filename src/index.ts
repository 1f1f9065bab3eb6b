export * from './refactor/types'
export * from './refactor/errors'
export { checkBudget, estimateCost, type BudgetCheck } from './refactor/budget'
export { activePasses, CONCERN_TEMPLATES, isConcernName, toConcernName } from './refactor/concerns'
export { buildPassPrompt, numberLines } from './refactor/prompt'
export { classifyResponse, decodeResponse, executePass, PassResponseSchema, type PassResponse } from './refactor/executor'
export { runRefactorPipeline, type PipelineOptions } from './refactor/pipeline'
export { artifactLabel, renderReport } from './refactor/format'
export {
  loadEnvironment,
  parseConcernList,
  parseRefactorSettings,
  RefactorSettingsSchema,
  toPipelineConfig,
  type RefactorSettings,
  type RefactorSettingsInput
} from './config'
export { OllamaModel } from './llm'
export { FileRetriever } from './retrieval'
export {
  conductRefactor,
  conductRefactorBatch,
  DEFAULT_BATCH_CONCURRENCY,
  renderOutcome,
  type BatchEntry,
  type RefactorDeps,
  type RefactorRun
} from './refactorService'
