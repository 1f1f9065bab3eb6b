import ollama from 'ollama'
import { DEFAULT_MODEL } from './config'
import { createLogger } from './logger'
import { CHARS_PER_TOKEN } from './refactor/budget'
import { ModelInvocationError } from './refactor/errors'
import type { InvokeOptions, ModelCollaborator } from './refactor/types'

const log = createLogger('ollama')

const modelSettings: Record<string, { maxContext: number }> = {
  'llama3.2': {
    maxContext: 128000
  },
  'llama3.1:8b': {
    maxContext: 64000
  },
  'qwen2.5-coder:7b': {
    maxContext: 32000
  },
  'gpt-oss:20b': {
    maxContext: 32000
  }
}

const MODEL_MAX_CTX = 128000

export function maxContextFor(model: string): number {
  return modelSettings[model]?.maxContext || MODEL_MAX_CTX
}

/**
 * Model collaborator backed by a local Ollama server. One streamed chat call per invocation, no retries.
 */
export class OllamaModel implements ModelCollaborator {
  constructor(private readonly defaultModel: string = DEFAULT_MODEL) {}

  async invoke(promptText: string, options: InvokeOptions = {}): Promise<string> {
    const model = options.model || this.defaultModel
    const maxContext = maxContextFor(model)
    const tokenCount = Math.ceil(((options.system?.length ?? 0) + promptText.length) / CHARS_PER_TOKEN)

    log.debug('LLM token count', tokenCount)
    if (tokenCount > maxContext) {
      log.warn(
        `LLM prompt token count (${tokenCount}) exceeds model max context (${maxContext}). Prompt may be truncated or rejected.`
      )
    }

    const messages = [
      ...(options.system ? [{ role: 'system', content: options.system }] : []),
      { role: 'user', content: promptText }
    ]

    const signal = options.signal
    let onAbort: (() => void) | undefined
    let fullMessage = ''
    try {
      const response = await ollama.chat({
        model,
        messages,
        format: options.format,
        options: { num_ctx: maxContext },
        stream: true
      })
      if (signal?.aborted) {
        response.abort()
        throw new Error('The operation was aborted.')
      }
      onAbort = () => response.abort()
      signal?.addEventListener('abort', onAbort, { once: true })
      for await (const chunk of response) {
        if (chunk.message?.content) fullMessage += chunk.message.content
      }
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new ModelInvocationError(`Model call to ${model} failed: ${reason}`, { cause: err })
    } finally {
      if (onAbort) signal?.removeEventListener('abort', onAbort)
    }

    log.debug('LLM raw response', fullMessage)
    return fullMessage
  }
}
