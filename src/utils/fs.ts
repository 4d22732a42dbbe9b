import { readFile, stat } from 'node:fs/promises'

interface FSX {
  readonly exists: (path: string) => Promise<boolean>
  readonly isFile: (path: string) => Promise<boolean>
  readonly readText: (path: string) => Promise<string>
  readonly readJson: (path: string) => Promise<unknown>
}

async function exists(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() || s.isDirectory() } catch { return false }
}

async function isFile(path: string): Promise<boolean> {
  try { return (await stat(path)).isFile() } catch { return false }
}

async function readText(path: string): Promise<string> {
  return await readFile(path, 'utf8')
}

/** Parse a JSON file; undefined when the file is missing or malformed. */
async function readJson(path: string): Promise<unknown> {
  try { const buf = await readFile(path, 'utf8'); const parsed: unknown = JSON.parse(buf); return parsed } catch { return undefined }
}

export const fsx: FSX = { exists, isFile, readText, readJson }
