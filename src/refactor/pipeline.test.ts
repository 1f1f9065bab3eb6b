import { describe, expect, it } from 'vitest'
import { codeSection, passReply, ScriptedModel } from '../../test/scriptedModel'
import { MalformedResponseError, ModelInvocationError } from './errors'
import { runRefactorPipeline } from './pipeline'
import { numberLines } from './prompt'
import type { ConcernName, PipelineConfig, SourceArtifact } from './types'

const configFor = (concerns: ConcernName[], overrides: Partial<PipelineConfig> = {}): PipelineConfig => ({
  enabledConcerns: new Set(concerns),
  maxArtifactCost: 1000,
  outputIsStructured: false,
  ...overrides
})

const artifact: SourceArtifact = { text: 'a=1', metadata: { filename: 'calc.py' } }

describe('runRefactorPipeline', () => {
  it('completes a single security pass', async () => {
    const model = new ScriptedModel([passReply({ thoughts: 'spacing only', refactored_code: 'a = 1  # spaced' })])
    const outcome = await runRefactorPipeline(artifact, configFor(['Security']), model)

    expect(outcome.state).toBe('completed')
    if (outcome.state !== 'completed') return
    expect(outcome.report).toEqual({
      detectedLanguage: 'python',
      metadata: { filename: 'calc.py' },
      rationalePerConcern: [{ concern: 'Security', rationale: 'spacing only' }],
      finalText: 'a = 1  # spaced'
    })
  })

  it('halts on a malformed reply and drops the earlier passes', async () => {
    const broken = passReply({ thoughts: 'made it faster' })
    const model = new ScriptedModel([passReply({ refactored_code: 'SECURITY_PASS_OUTPUT' }), broken])
    const outcome = await runRefactorPipeline(artifact, configFor(['Security', 'Performance']), model)

    expect(outcome).toEqual({
      state: 'halted-malformed',
      concern: 'Performance',
      rawResponse: broken,
      message: new MalformedResponseError('Performance', broken, 'refactored_code: Required').message
    })
    if (outcome.state !== 'halted-malformed') return
    expect(outcome.message).toContain(broken)
    expect(outcome.message).not.toContain('SECURITY_PASS_OUTPUT')
  })

  it('rejects an oversized artifact without calling the model', async () => {
    const model = new ScriptedModel([])
    const big = { text: 'x'.repeat(200), metadata: { filename: 'big.py' } }
    const outcome = await runRefactorPipeline(big, configFor(['Security'], { maxArtifactCost: 10 }), model)

    expect(outcome.state).toBe('halted-budget')
    if (outcome.state !== 'halted-budget') return
    expect(outcome.actualCost).toBe(50)
    expect(outcome.maxCost).toBe(10)
    expect(outcome.message).toContain('50 tokens')
    expect(outcome.message).toContain('limit 10')
    expect(model.calls).toHaveLength(0)
  })

  it('halts when no concern is enabled', async () => {
    const model = new ScriptedModel([])
    const outcome = await runRefactorPipeline(artifact, configFor([]), model)
    expect(outcome.state).toBe('halted-no-passes')
    expect(model.calls).toHaveLength(0)
  })

  it('returns a refusal verbatim as a plain message', async () => {
    const refusal = 'I cannot refactor this file: it is only a fragment of a larger module.'
    const model = new ScriptedModel([JSON.stringify({ final_answer: refusal })])
    const outcome = await runRefactorPipeline(artifact, configFor(['Security']), model)

    expect(outcome).toEqual({ state: 'halted-refusal', concern: 'Security', message: refusal })
    expect('report' in outcome).toBe(false)
  })

  it('drops earlier passes when a later pass refuses', async () => {
    const model = new ScriptedModel([
      passReply({ refactored_code: 'MEMORY_PASS_OUTPUT' }),
      'As an AI language model, I cannot return the whole file.'
    ])
    const outcome = await runRefactorPipeline(artifact, configFor(['Memory', 'Reliability']), model)
    expect(outcome).toEqual({
      state: 'halted-refusal',
      concern: 'Reliability',
      message: 'As an AI language model, I cannot return the whole file.'
    })
  })

  it('feeds each pass exactly the previous pass output', async () => {
    const outputs = ['step one\nline two', 'step two\n\nline three', 'step three']
    const model = new ScriptedModel(outputs.map((code) => passReply({ refactored_code: code })))
    const outcome = await runRefactorPipeline(
      { text: 'original\ncode', metadata: { filename: 'x.py' } },
      configFor(['Security', 'Correctness', 'Reliability']),
      model
    )

    expect(model.calls.map((c) => codeSection(c.prompt))).toEqual([
      numberLines('original\ncode'),
      numberLines(outputs[0]),
      numberLines(outputs[1])
    ])
    expect(outcome.state === 'completed' && outcome.report.finalText).toBe('step three')
  })

  it('runs all concerns in canonical order with json format requested', async () => {
    const model = new ScriptedModel(() => passReply({ refactored_code: 'a=1' }))
    await runRefactorPipeline(
      artifact,
      configFor(['Reliability', 'Maintainability', 'Correctness', 'Memory', 'Performance', 'Security']),
      model,
      { model: 'llama3.2' }
    )
    const focus = model.calls.map((c) => c.prompt.split('\n')[0])
    expect(focus).toEqual([
      'Refactor focus: Security',
      'Refactor focus: Performance',
      'Refactor focus: Memory',
      'Refactor focus: Correctness',
      'Refactor focus: Maintainability',
      'Refactor focus: Reliability'
    ])
    expect(model.calls[0].options.model).toBe('llama3.2')
    expect(model.calls[0].options.format).toBe('json')
  })

  it('leaves the text unchanged when every pass is a no-op', async () => {
    const text = 'def f(x):\n    return x + 1\n'
    const model = new ScriptedModel(() => passReply({ thoughts: 'nothing to change', refactored_code: text }))
    const outcome = await runRefactorPipeline(
      { text, metadata: { filename: 'f.py' } },
      configFor(['Security', 'Performance', 'Memory']),
      model
    )
    expect(outcome.state === 'completed' && outcome.report.finalText).toBe(text)
  })

  it('keeps the artifact metadata rather than what the model echoes', async () => {
    const model = new ScriptedModel([passReply({ refactored_code: 'a=1', metadata: { filename: 'renamed.py' } })])
    const outcome = await runRefactorPipeline(artifact, configFor(['Security']), model)
    expect(outcome.state).toBe('completed')
    if (outcome.state !== 'completed') return
    expect(outcome.report.metadata).toEqual({ filename: 'calc.py' })
    expect(outcome.passes[0].metadata).toEqual({ filename: 'renamed.py' })
  })

  it('stops at the next pass boundary once cancelled', async () => {
    const controller = new AbortController()
    const model = new ScriptedModel(() => {
      controller.abort()
      return passReply({ refactored_code: 'a = 1' })
    })
    const progress: string[] = []
    const outcome = await runRefactorPipeline(artifact, configFor(['Security', 'Performance']), model, {
      signal: controller.signal,
      onProgress: (m) => progress.push(m)
    })

    expect(outcome).toEqual({
      state: 'halted-cancelled',
      message: 'Refactor cancelled before the Performance pass; no changes were kept.',
      completedPasses: 1
    })
    expect(model.calls).toHaveLength(1)
    expect(progress).toEqual(['[Security] pass 1/2...'])
  })

  it('reports an abort during a model call as cancelled', async () => {
    const controller = new AbortController()
    const model = new ScriptedModel((_prompt, _options, i) => {
      if (i === 0) return passReply({ refactored_code: 'a = 1' })
      controller.abort()
      throw new ModelInvocationError('Model call to llama3.2 failed: The operation was aborted.')
    })
    const outcome = await runRefactorPipeline(artifact, configFor(['Security', 'Performance']), model, {
      signal: controller.signal
    })

    expect(outcome).toEqual({
      state: 'halted-cancelled',
      message: 'Refactor cancelled during the Performance pass; no changes were kept.',
      completedPasses: 1
    })
  })

  it('propagates model invocation errors', async () => {
    const model = new ScriptedModel([new ModelInvocationError('connection refused')])
    await expect(runRefactorPipeline(artifact, configFor(['Security']), model)).rejects.toThrow('connection refused')
  })
})
