import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { FileScanner, globToRegex } from './FileScanner'
import fs from 'fs'
import path from 'path'
import os from 'os'

describe('FileScanner', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scanner-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  function touch(...segments: string[]): string {
    const filePath = path.join(tempDir, ...segments)
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(filePath, '')
    return filePath
  }

  it('should list every regular file in name order', async () => {
    const b = touch('b.java')
    const a = touch('src', 'A.java')
    const readme = touch('README.md')

    const { files, errors } = await new FileScanner(tempDir).scan()

    expect(files).toEqual([readme, b, a])
    expect(errors).toEqual([])
  })

  it('should not follow symbolic links', async () => {
    const real = touch('real', 'A.java')
    fs.symlinkSync(path.join(tempDir, 'real'), path.join(tempDir, 'linked'))
    fs.symlinkSync(real, path.join(tempDir, 'B.java'))

    const { files } = await new FileScanner(tempDir).scan()

    expect(files).toEqual([real])
  })

  it('should not loop on a link to an ancestor', async () => {
    const a = touch('A.java')
    fs.symlinkSync(tempDir, path.join(tempDir, 'loop'))

    const { files } = await new FileScanner(tempDir).scan()

    expect(files).toEqual([a])
  })

  it('should skip excluded files and directories', async () => {
    const kept = touch('src', 'A.java')
    touch('build', 'Generated.java')
    touch('src', 'ATest.java')
    touch('src', 'deep', 'build', 'Other.java')

    const scanner = new FileScanner(tempDir, ['build/', '**/*Test.java', '**/build/**'])
    const { files } = await scanner.scan()

    expect(files).toEqual([kept])
  })

  it('should report directories it cannot read', async () => {
    const missing = path.join(tempDir, 'missing')

    const { files, errors } = await new FileScanner(missing).scan()

    expect(files).toEqual([])
    expect(errors).toHaveLength(1)
    expect(errors[0].path).toBe(missing)
    expect(errors[0].error.message).toMatch(`Cannot read directory ${missing}:`)
  })

  describe('globToRegex', () => {
    it('should keep single stars within one segment', () => {
      expect(globToRegex('*.java').test('A.java')).toBe(true)
      expect(globToRegex('*.java').test('src/A.java')).toBe(false)
    })

    it('should let double stars span directories', () => {
      expect(globToRegex('**/*.java').test('A.java')).toBe(true)
      expect(globToRegex('**/*.java').test('src/main/A.java')).toBe(true)
      expect(globToRegex('src/**').test('src/main/A.java')).toBe(true)
    })

    it('should match a single character with a question mark', () => {
      expect(globToRegex('A?.kt').test('AB.kt')).toBe(true)
      expect(globToRegex('A?.kt').test('A/.kt')).toBe(false)
    })

    it('should treat dots literally', () => {
      expect(globToRegex('a.kt').test('abkt')).toBe(false)
    })
  })
})
