#!/usr/bin/env node
import { enableFlagsFor, loadEnvironment, parseConcernList, resolveModelName, type RefactorSettingsInput } from './config'
import { atomicWrite } from './interfaces/atomicWrite'
import { OllamaModel } from './llm'
import { createLogger } from './logger'
import { FileRetriever } from './retrieval'
import { conductRefactor, conductRefactorBatch, DEFAULT_BATCH_CONCURRENCY, type RefactorDeps } from './refactorService'

const log = createLogger('cli')

export type CliArgs = {
  files: string[]
  settings: RefactorSettingsInput
  model?: string
  out?: string
  concurrency?: number
}

const USAGE = [
  'Usage: refactor <file> [file...] [options]',
  'Options:',
  '  --concerns <list>       comma separated: security,performance,memory,correctness,maintainability,reliability',
  '  --json                  print the structured report instead of markdown',
  '  --instructions <text>   extra instructions passed to every pass',
  '  --max-tokens <n>        size limit for a file, in estimated tokens',
  '  --model <name>          model to use',
  '  --out <path>            write the result to a file (single file only)',
  `  --concurrency <n>       files refactored at once in a batch (default ${DEFAULT_BATCH_CONCURRENCY})`
].join('\n')

export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliArgs {
  const files: string[] = []
  let concerns = env.REFACTOR_CONCERNS || ''
  const settings: RefactorSettingsInput = {}
  let model: string | undefined
  let out: string | undefined
  let concurrency: number | undefined

  const valueFor = (flag: string, i: number) => {
    const v = argv[i + 1]
    if (v === undefined || v.startsWith('--')) throw new Error(`Missing value for ${flag}`)
    return v
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--json') settings.json_output = true
    else if (arg === '--concerns') concerns = valueFor(arg, i++)
    else if (arg === '--instructions') settings.additional_instructions = valueFor(arg, i++)
    else if (arg === '--max-tokens') {
      const raw = valueFor(arg, i++)
      const n = Number(raw)
      if (!Number.isInteger(n) || n <= 0) throw new Error(`--max-tokens expects a positive integer, got "${raw}"`)
      settings.max_code_size_tokens = n
    } else if (arg === '--concurrency') {
      const raw = valueFor(arg, i++)
      const n = Number(raw)
      if (!Number.isInteger(n) || n <= 0) throw new Error(`--concurrency expects a positive integer, got "${raw}"`)
      concurrency = n
    } else if (arg === '--model') model = valueFor(arg, i++)
    else if (arg === '--out') out = valueFor(arg, i++)
    else if (arg.startsWith('--')) throw new Error(`Unknown option ${arg}`)
    else files.push(arg)
  }

  if (!files.length) throw new Error('No input file given')
  if (out && files.length > 1) throw new Error('--out can only be used with a single file')

  return { files, settings: { ...enableFlagsFor(parseConcernList(concerns)), ...settings }, model, out, concurrency }
}

export async function cmdRefactor(args: CliArgs, deps: RefactorDeps) {
  if (args.files.length === 1) {
    const { output, outcome } = await conductRefactor(args.files[0], args.settings, deps)
    if (args.out) {
      await atomicWrite(args.out, output)
      log.info('Refactor result written to', args.out)
    } else {
      console.log(output)
    }
    return outcome.state === 'completed'
  }

  const entries = await conductRefactorBatch(args.files, args.settings, {
    ...deps,
    concurrency: args.concurrency ?? deps.concurrency
  })
  let allCompleted = true
  for (const entry of entries) {
    console.log(`\n=== ${entry.locator} ===`)
    if (entry.ok) {
      console.log(entry.run.output)
      if (entry.run.outcome.state !== 'completed') allCompleted = false
    } else {
      log.error(entry.error.message)
      allCompleted = false
    }
  }
  return allCompleted
}

async function main(argv: string[]) {
  loadEnvironment()
  try {
    const args = parseCliArgs(argv)
    const model = args.model || resolveModelName()
    const ok = await cmdRefactor(args, {
      retriever: new FileRetriever(),
      model: new OllamaModel(model),
      modelName: model,
      onProgress: (m) => log.info(m)
    })
    process.exit(ok ? 0 : 1)
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : err)
    console.error(USAGE)
    process.exit(1)
  }
}

if (require.main === module) {
  void main(process.argv.slice(2))
}
