/**
 * Refactor configuration: environment loading and validation of the settings surface.
 */
import appRootPath from 'app-root-path'
import dotenv from 'dotenv-flow'
import { z } from 'zod'
import { toConcernName } from './refactor/concerns'
import { ConfigurationError } from './refactor/errors'
import { CONCERN_ORDER, type ConcernName, type PipelineConfig } from './refactor/types'

export const DEFAULT_MAX_CODE_TOKENS = 8000
export const DEFAULT_MODEL = 'llama3.1:8b'

let envLoaded = false

/** Load `.env`, `.env.local`, `.env.<NODE_ENV>` … from the project root. Safe to call more than once. */
export function loadEnvironment() {
  if (envLoaded) return
  dotenv.config({ path: appRootPath.path, silent: true })
  envLoaded = true
}

// Tool configurations store each option as `{ value }`; plain values are accepted too.
const unwrap = (v: unknown) => (typeof v === 'object' && v !== null && !Array.isArray(v) && 'value' in v ? v.value : v)

const flag = () => z.preprocess(unwrap, z.boolean().default(false))

export const RefactorSettingsSchema = z
  .object({
    enable_security: flag(),
    enable_performance: flag(),
    enable_memory: flag(),
    enable_correctness: flag(),
    enable_maintainability: flag(),
    enable_reliability: flag(),
    max_code_size_tokens: z.preprocess(unwrap, z.number().int().positive().optional()),
    json_output: z.preprocess(unwrap, z.boolean().optional()),
    additional_instructions: z.preprocess(unwrap, z.string().nullish())
  })
  .strict()

export type RefactorSettings = z.infer<typeof RefactorSettingsSchema>
export type RefactorSettingsInput = z.input<typeof RefactorSettingsSchema>

const ENABLE_KEYS = {
  Security: 'enable_security',
  Performance: 'enable_performance',
  Memory: 'enable_memory',
  Correctness: 'enable_correctness',
  Maintainability: 'enable_maintainability',
  Reliability: 'enable_reliability'
} as const satisfies Record<ConcernName, keyof RefactorSettings>

export function parseRefactorSettings(raw: unknown): RefactorSettings {
  const parsed = RefactorSettingsSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`)
    )
  }
  return parsed.data
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined
  return value === '1' || value.toLowerCase() === 'true'
}

function envInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined
  const n = Number(value)
  if (!Number.isInteger(n) || n <= 0) throw new ConfigurationError([`${name}: expected a positive integer, got "${value}"`])
  return n
}

/**
 * Build the per-run pipeline config. Options missing from the settings fall back to the environment,
 * then to built-in defaults.
 */
export function toPipelineConfig(settings: RefactorSettings, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const enabledConcerns = new Set<ConcernName>(CONCERN_ORDER.filter((c) => settings[ENABLE_KEYS[c]]))
  const instructions = settings.additional_instructions
  return {
    enabledConcerns,
    maxArtifactCost:
      settings.max_code_size_tokens ??
      envInt('REFACTOR_MAX_CODE_TOKENS', env.REFACTOR_MAX_CODE_TOKENS) ??
      DEFAULT_MAX_CODE_TOKENS,
    outputIsStructured: settings.json_output ?? envFlag(env.REFACTOR_JSON_OUTPUT) ?? false,
    userInstructions: instructions?.trim() ? instructions : undefined
  }
}

/**
 * Parse a comma separated concern list ("security,performance"). Unknown names are a configuration error.
 */
export function parseConcernList(list: string): ConcernName[] {
  const names: ConcernName[] = []
  const unknown: string[] = []
  for (const part of list.split(',')) {
    if (!part.trim()) continue
    const name = toConcernName(part)
    if (name) names.push(name)
    else unknown.push(part.trim())
  }
  if (unknown.length) throw new ConfigurationError(unknown.map((u) => `unknown concern "${u}"`))
  return names
}

export function enableFlagsFor(concerns: ConcernName[]): RefactorSettingsInput {
  const flags: RefactorSettingsInput = {}
  for (const c of concerns) flags[ENABLE_KEYS[c]] = true
  return flags
}

export function resolveModelName(env: NodeJS.ProcessEnv = process.env) {
  return env.REFACTOR_MODEL || DEFAULT_MODEL
}
