// Data model for a single refactor run

export const CONCERN_ORDER = [
  'Security',
  'Performance',
  'Memory',
  'Correctness',
  'Maintainability',
  'Reliability'
] as const

export type ConcernName = (typeof CONCERN_ORDER)[number]

export type ArtifactMetadata = Readonly<Record<string, string>>

export interface SourceArtifact {
  readonly text: string
  /**
   * Identifying information supplied by the retriever. Carries at least a `url` or a `filename`.
   */
  readonly metadata: ArtifactMetadata
}

export interface ConcernTemplate {
  readonly name: ConcernName
  readonly instructionBody: string
}

export interface PipelineConfig {
  readonly enabledConcerns: ReadonlySet<ConcernName>
  readonly maxArtifactCost: number
  readonly outputIsStructured: boolean
  readonly userInstructions?: string
}

export interface PassResult {
  concern: ConcernName
  detectedLanguage: string
  rationale: string
  rewrittenText: string
  /**
   * Metadata object echoed back by the model for this pass.
   */
  metadata: Record<string, unknown>
}

export interface ConcernRationale {
  concern: ConcernName
  rationale: string
}

export interface FinalReport {
  detectedLanguage: string
  metadata: ArtifactMetadata
  rationalePerConcern: ConcernRationale[]
  finalText: string
}

export interface PromptPayload {
  concern: ConcernName
  system: string
  user: string
}

export type PassOutcome =
  | { kind: 'success'; result: PassResult }
  | { kind: 'refusal'; explanation: string }
  | { kind: 'malformed'; rawResponse: string; reason: string }

export type PipelineOutcome =
  | { state: 'completed'; report: FinalReport; passes: PassResult[] }
  | { state: 'halted-budget'; message: string; actualCost: number; maxCost: number }
  | { state: 'halted-no-passes'; message: string }
  | { state: 'halted-refusal'; message: string; concern: ConcernName }
  | { state: 'halted-malformed'; message: string; concern: ConcernName; rawResponse: string }
  | { state: 'halted-cancelled'; message: string; completedPasses: number }

export type HaltedOutcome = Exclude<PipelineOutcome, { state: 'completed' }>

export type InvokeOptions = {
  system?: string
  model?: string
  format?: 'json'
  signal?: AbortSignal
}

/**
 * Anything that can turn a prompt into a reply. Implementations throw `ModelInvocationError`
 * on transport or quota failures and never retry.
 */
export interface ModelCollaborator {
  invoke(promptText: string, options?: InvokeOptions): Promise<string>
}

export interface Retriever {
  fetch(locator: string): Promise<SourceArtifact>
}
