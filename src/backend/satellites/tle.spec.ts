import { mkdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { TEST_TLE } from '@/test-fixtures'
import { ElementSetError } from '@backend/errors'
import { loadTleFile, parseTleText } from '@backend/satellites/tle'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

describe('TLE files', () => {
  describe('parseTleText', () => {
    it('should read a three-line set with its name', () => {
      const text = `${TEST_TLE.name}\n${TEST_TLE.line1}\n${TEST_TLE.line2}\n`

      expect(parseTleText(text, 'fallback')).toEqual(TEST_TLE)
    })

    it('should use the fallback name for a bare two-line set', () => {
      expect(parseTleText(`${TEST_TLE.line1}\n${TEST_TLE.line2}`, 'noaa19')).toEqual({
        name: 'noaa19',
        line1: TEST_TLE.line1,
        line2: TEST_TLE.line2,
      })
    })

    it('should strip the catalogue name prefix and CRLF line endings', () => {
      const text = `0 NOAA 19\r\n${TEST_TLE.line1}\r\n\r\n${TEST_TLE.line2}\r\n`

      expect(parseTleText(text, 'fallback')?.name).toBe('NOAA 19')
    })

    it('should return null for anything else', () => {
      expect(parseTleText('', 'x')).toBeNull()
      expect(parseTleText('just a name\nand some text', 'x')).toBeNull()
    })
  })

  describe('loadTleFile', () => {
    const testDir = join(tmpdir(), `doppler-tle-test-${Date.now()}`)

    beforeEach(async () => {
      await mkdir(testDir, { recursive: true })
    })

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true })
    })

    it('should load an element set from disk', async () => {
      const path = join(testDir, 'noaa19.tle')
      await writeFile(path, `${TEST_TLE.line1}\n${TEST_TLE.line2}\n`)

      expect(await loadTleFile(path)).toEqual({ ...TEST_TLE, name: 'noaa19' })
    })

    it('should reject a missing file', async () => {
      await expect(loadTleFile(join(testDir, 'missing.tle'))).rejects.toThrow(ElementSetError)
    })

    it('should reject a file without an element set', async () => {
      const path = join(testDir, 'empty.tle')
      await writeFile(path, 'nothing here\n')

      await expect(loadTleFile(path)).rejects.toThrow('No two-line element set')
    })
  })
})
