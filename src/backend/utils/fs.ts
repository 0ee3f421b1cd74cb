import { access, mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

export async function readTextFile(path: string): Promise<string> {
  return readFile(path, 'utf-8')
}

/** Writes `content`, creating any missing parent directories. */
export async function writeTextFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, content, 'utf-8')
}

/** `<satellite>_<UTC time>`, safe to use as a file name. */
export function generateReportName(satellite: string, at: Date): string {
  const timestamp = at.toISOString().replace(/[:.]/g, '-').slice(0, 19)
  const safeName = satellite.trim().replace(/[^A-Za-z0-9-]+/g, '-')
  return `${safeName}_${timestamp}`
}
