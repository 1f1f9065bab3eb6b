import fsp from 'node:fs/promises'
import path from 'node:path'
import { RetrievalError } from './refactor/errors'
import type { Retriever, SourceArtifact } from './refactor/types'

/**
 * Reads a local file into an artifact labelled by its file name.
 */
export class FileRetriever implements Retriever {
  constructor(private readonly baseDir: string = process.cwd()) {}

  async fetch(locator: string): Promise<SourceArtifact> {
    const filePath = path.resolve(this.baseDir, locator)
    let text: string
    try {
      text = await fsp.readFile(filePath, 'utf8')
    } catch (e) {
      const reason = e instanceof Error && 'code' in e && e.code === 'ENOENT' ? 'file not found' : String(e)
      throw new RetrievalError(locator, reason, { cause: e })
    }
    if (!text.trim()) throw new RetrievalError(locator, 'file is empty, nothing to refactor')
    if (text.includes('\u0000')) throw new RetrievalError(locator, 'file is not text; select a code file')
    return { text, metadata: { filename: path.basename(filePath), path: filePath } }
  }
}
