import fsp from 'node:fs/promises'
import path from 'node:path'

/**
 * Write through a `.partial` sibling and rename, so readers never see a half-written result.
 */
export async function atomicWrite(filePath: string, data: string) {
  const dir = path.dirname(filePath)
  const tmp = path.join(dir, `.${path.basename(filePath)}.partial`)
  await fsp.mkdir(dir, { recursive: true })
  await fsp.writeFile(tmp, data, 'utf8')
  await fsp.rename(tmp, filePath)
}
