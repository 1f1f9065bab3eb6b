import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { cmdRefactor, parseCliArgs } from '../src/cli'
import { FileRetriever } from '../src/retrieval'
import { passReply, ScriptedModel } from './scriptedModel'

let workDir: string

beforeAll(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'refactor-cli-'))
  await fs.writeFile(path.join(workDir, 'main.c'), 'int main(){return 0;}\n', 'utf8')
})

afterAll(async () => {
  if (workDir) await fs.rm(workDir, { recursive: true, force: true })
})

describe('parseCliArgs', () => {
  it('maps flags onto settings', () => {
    expect(parseCliArgs(['a.py', '--concerns', 'security,memory', '--json', '--max-tokens', '500'], {})).toEqual({
      files: ['a.py'],
      settings: { enable_security: true, enable_memory: true, json_output: true, max_code_size_tokens: 500 },
      model: undefined,
      out: undefined
    })
  })

  it('takes default concerns from the environment', () => {
    const args = parseCliArgs(['a.py', '--instructions', 'keep comments'], { REFACTOR_CONCERNS: 'performance' })
    expect(args.settings).toEqual({ enable_performance: true, additional_instructions: 'keep comments' })
  })

  it('reads the batch concurrency', () => {
    expect(parseCliArgs(['a.py', 'b.py', '--concurrency', '3'], {}).concurrency).toBe(3)
    expect(parseCliArgs(['a.py'], {}).concurrency).toBeUndefined()
  })

  it('rejects bad invocations', () => {
    expect(() => parseCliArgs([], {})).toThrow('No input file given')
    expect(() => parseCliArgs(['a.py', 'b.py', '--out', 'x.md'], {})).toThrow('--out can only be used with a single file')
    expect(() => parseCliArgs(['a.py', '--fast'], {})).toThrow('Unknown option --fast')
    expect(() => parseCliArgs(['a.py', '--max-tokens', 'many'], {})).toThrow('--max-tokens expects a positive integer, got "many"')
    expect(() => parseCliArgs(['a.py', '--model'], {})).toThrow('Missing value for --model')
    expect(() => parseCliArgs(['a.py', '--concurrency', '0'], {})).toThrow('--concurrency expects a positive integer, got "0"')
  })
})

describe('cmdRefactor', () => {
  it('writes the rendered result to --out', async () => {
    const model = new ScriptedModel([
      passReply({ language: 'c', thoughts: 'fine as is', refactored_code: 'int main(){return 0;}\n' })
    ])
    const out = path.join(workDir, 'out', 'main.md')
    const ok = await cmdRefactor(
      { files: ['main.c'], settings: { enable_correctness: true }, out },
      { retriever: new FileRetriever(workDir), model, env: {} }
    )

    expect(ok).toBe(true)
    const written = await fs.readFile(out, 'utf8')
    expect(written.split('\n').slice(0, 3)).toEqual(['## Code Refactor', '- Language: **c**', '- File: **main.c**'])
    expect(written).toContain('```c\nint main(){return 0;}\n\n```')
  })

  it('reports failure when a run halts', async () => {
    const model = new ScriptedModel([JSON.stringify({ final_answer: 'I cannot do that.' })])
    const out = path.join(workDir, 'refused.md')
    const ok = await cmdRefactor(
      { files: ['main.c'], settings: { enable_security: true }, out },
      { retriever: new FileRetriever(workDir), model, env: {} }
    )
    expect(ok).toBe(false)
    expect(await fs.readFile(out, 'utf8')).toBe('I cannot do that.')
  })
})
