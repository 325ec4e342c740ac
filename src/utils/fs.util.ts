import fs from 'node:fs/promises'
import path from 'node:path'

export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8')
  } catch (err) {
    if (isNotFoundError(err)) return null
    throw err
  }
}

export async function writeFileEnsuringDir(filePath: string, data: string | Buffer): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true })
  await fs.writeFile(filePath, data)
  return filePath
}
