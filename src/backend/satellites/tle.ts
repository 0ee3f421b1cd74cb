import { basename } from 'node:path'
import { ElementSetError } from '@backend/errors'
import type { TwoLineElement } from '@backend/types'
import { fileExists, readTextFile } from '../utils/fs'
import { logger } from '../utils/logger'

/** Accepts bare two-line sets and three-line sets with a name line. */
export const parseTleText = (text: string, fallbackName: string): TwoLineElement | null => {
  const lines = text
    .trim()
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0)

  const [line0, line1, line2] = lines

  const isTwoLineFormat = lines.length === 2 && line0?.startsWith('1 ') && line1?.startsWith('2 ')
  const isThreeLineFormat = lines.length >= 3 && line1?.startsWith('1 ') && line2?.startsWith('2 ')

  return isTwoLineFormat && line0 && line1
    ? { name: fallbackName, line1: line0, line2: line1 }
    : isThreeLineFormat && line0 && line1 && line2
      ? { name: line0.replace(/^0\s+/, ''), line1, line2 }
      : null
}

export async function loadTleFile(path: string): Promise<TwoLineElement> {
  if (!(await fileExists(path))) {
    throw new ElementSetError(`Element set file not found: ${path}`)
  }

  const tle = parseTleText(await readTextFile(path), basename(path).replace(/\.[^.]+$/, ''))
  if (!tle) {
    throw new ElementSetError(`No two-line element set in ${path}`)
  }

  logger.satellite(tle.name, `Loaded element set from ${path}`)
  return tle
}
