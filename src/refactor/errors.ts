/**
 * Errors raised by the refactor pipeline and its collaborators.
 */
import type { ConcernName } from './types'

export class BudgetExceededError extends Error {
  readonly actualCost: number
  readonly maxCost: number

  constructor(actualCost: number, maxCost: number) {
    super(
      `File is too large to be refactored (${actualCost} tokens, limit ${maxCost}). ` +
        `Raise max_code_size_tokens, or split this file so that it is smaller.`
    )
    this.name = 'BudgetExceededError'
    this.actualCost = actualCost
    this.maxCost = maxCost
  }
}

export class NoActivePassesError extends Error {
  constructor() {
    super(
      'No refactor concerns are enabled. Enable at least one of: security, performance, memory, correctness, maintainability, reliability.'
    )
    this.name = 'NoActivePassesError'
  }
}

export class MalformedResponseError extends Error {
  readonly concern: ConcernName
  readonly rawResponse: string
  readonly reason: string

  constructor(concern: ConcernName, rawResponse: string, reason: string) {
    super(`The ${concern} pass returned a response that could not be used (${reason}). Raw response:\n${rawResponse}`)
    this.name = 'MalformedResponseError'
    this.concern = concern
    this.rawResponse = rawResponse
    this.reason = reason
  }
}

export class ModelInvocationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ModelInvocationError'
  }
}

export class RetrievalError extends Error {
  readonly locator: string

  constructor(locator: string, message: string, options?: { cause?: unknown }) {
    super(`Could not retrieve ${locator}: ${message}`, options)
    this.name = 'RetrievalError'
    this.locator = locator
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid refactor configuration: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}
