import { BASE_INSTRUCTIONS, CLOSING_INSTRUCTIONS, RESPONSE_FORMAT } from './templates'
import type { ArtifactMetadata, ConcernTemplate, PromptPayload } from './types'

const METADATA_FENCE = '----- CODE METADATA -----'
const CODE_FENCE = '----- CODE TO REFACTOR -----'

/**
 * Prefix every line with its 1-based number. The numbers are a reading aid for the model only.
 */
export function numberLines(text: string): string {
  if (!text) return ''
  return text
    .split(/\r?\n/)
    .map((line, i) => `${i + 1}: ${line}`)
    .join('\n')
}

export function formatUserInstructions(userInstructions?: string): string {
  if (!userInstructions?.trim()) return ''
  return `In addition to the instructions above, follow these user-provided instructions:\n${userInstructions}`
}

export function buildPassPrompt(
  concern: ConcernTemplate,
  currentText: string,
  artifactMetadata: ArtifactMetadata,
  userInstructions: string | undefined,
  isFirstPass: boolean
): PromptPayload {
  const sections = [
    `Refactor focus: ${concern.name}`,
    concern.instructionBody,
    isFirstPass
      ? ''
      : 'This code has already been through earlier refactor passes. Keep their changes unless they are wrong for this category.',
    [METADATA_FENCE, JSON.stringify(artifactMetadata, null, 2), METADATA_FENCE].join('\n'),
    [CODE_FENCE, numberLines(currentText), CODE_FENCE].join('\n'),
    formatUserInstructions(userInstructions),
    'The line numbers above are for reference only. Do not include them in refactored_code.',
    CLOSING_INSTRUCTIONS
  ]

  return {
    concern: concern.name,
    system: `${BASE_INSTRUCTIONS}\n\n${RESPONSE_FORMAT}`,
    user: sections.filter(Boolean).join('\n\n')
  }
}
