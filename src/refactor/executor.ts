import { z } from 'zod'
import { createLogger } from '../logger'
import type { InvokeOptions, ModelCollaborator, PassOutcome, PromptPayload } from './types'

const log = createLogger('executor')

export const PassResponseSchema = z.object({
  language: z.string(),
  metadata: z.record(z.unknown()),
  thoughts: z.string(),
  refactored_code: z.string()
})

export type PassResponse = z.infer<typeof PassResponseSchema>

const RefusalSchema = z.object({ final_answer: z.string() })

const REFUSAL_PATTERN =
  /\bas an ai(?: language model)?\b|\b(?:i|we)(?: am|'m| are|'re)? (?:cannot|can't|can not|unable to|not able to)\b/i

type Decoded = { kind: 'json'; value: unknown } | { kind: 'text'; text: string }

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch {
    return { ok: false }
  }
}

/**
 * Find the JSON document in a model reply: the whole reply, a ```json fence, or the outermost braces.
 * Replies with no JSON in them come back as plain text.
 */
export function decodeResponse(raw: string): Decoded {
  const candidates = [raw.trim()]
  const fenced = raw.match(/```(?:json)?\s*\n([\s\S]*?)```/i)
  if (fenced) candidates.push(fenced[1].trim())
  const start = raw.indexOf('{')
  const end = raw.lastIndexOf('}')
  if (start !== -1 && end > start) candidates.push(raw.slice(start, end + 1))

  for (const candidate of candidates) {
    const parsed = tryParse(candidate)
    if (parsed.ok) return { kind: 'json', value: parsed.value }
  }
  return { kind: 'text', text: raw }
}

// A reply that opens a JSON document or a code fence was an answer attempt, even if it does not parse.
function attemptedJSON(text: string): boolean {
  const trimmed = text.trim()
  return trimmed.startsWith('{') || trimmed.startsWith('[') || trimmed.includes('```')
}

export function isRefusalText(text: string): boolean {
  return REFUSAL_PATTERN.test(text)
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`).join(', ')
}

/**
 * Decide once what a reply means. Only `success` may be chained into the next pass.
 */
export function classifyResponse(payload: PromptPayload, raw: string): PassOutcome {
  const decoded = decodeResponse(raw)

  if (decoded.kind === 'text') {
    if (attemptedJSON(decoded.text)) return { kind: 'malformed', rawResponse: raw, reason: 'response is not valid JSON' }
    if (decoded.text.trim() && isRefusalText(decoded.text)) return { kind: 'refusal', explanation: decoded.text }
    return { kind: 'malformed', rawResponse: raw, reason: 'response is not JSON' }
  }

  const value = decoded.value
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { kind: 'malformed', rawResponse: raw, reason: 'response is not a JSON object' }
  }

  const parsed = PassResponseSchema.safeParse(value)
  if (parsed.success) {
    return {
      kind: 'success',
      result: {
        concern: payload.concern,
        detectedLanguage: parsed.data.language,
        rationale: parsed.data.thoughts,
        rewrittenText: parsed.data.refactored_code,
        metadata: parsed.data.metadata
      }
    }
  }

  const refusal = RefusalSchema.safeParse(value)
  if (refusal.success && !('refactored_code' in value)) {
    return { kind: 'refusal', explanation: refusal.data.final_answer }
  }

  return { kind: 'malformed', rawResponse: raw, reason: describeIssues(parsed.error) }
}

/**
 * Run one pass: a single model call, no retry. Invocation errors propagate to the caller.
 */
export async function executePass(
  payload: PromptPayload,
  model: ModelCollaborator,
  options: Omit<InvokeOptions, 'system'> = {}
): Promise<PassOutcome> {
  const raw = await model.invoke(payload.user, { ...options, system: payload.system })
  log.debug(`${payload.concern} pass raw response`, raw)
  return classifyResponse(payload, raw)
}
