import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { ConfigLoader } from './ConfigLoader'
import fs from 'fs'
import path from 'path'
import os from 'os'

describe('ConfigLoader', () => {
  let tempDir: string
  let testConfigPath: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'))
    testConfigPath = path.join(tempDir, 'test-srcfmt.config.json')
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  describe('config loading', () => {
    it('should load default config when no config file exists', () => {
      const loader = new ConfigLoader('/non/existent/path.json')
      const config = loader.getConfig()

      expect(config.formatters).toEqual(['java'])
      expect(config.engine.timeout).toBe(10000)
      expect(config.engine.commands).toEqual({})
      expect(config.exclude).toEqual([])
      expect(config.concurrency).toBe(1)
      expect(loader.getConfigPath()).toBeNull()
    })

    it('should load and validate config from file', () => {
      const testConfig = {
        formatters: ['kotlin', 'java'],
        engine: {
          timeout: 3000,
          commands: {
            kotlin: { command: 'ktlint --format --stdin-path={filepath}' },
          },
        },
        exclude: ['build/'],
        concurrency: 4,
      }

      fs.writeFileSync(testConfigPath, JSON.stringify(testConfig))
      const loader = new ConfigLoader(testConfigPath)
      const config = loader.getConfig()

      expect(config.formatters).toEqual(['kotlin', 'java'])
      expect(config.engine.timeout).toBe(3000)
      expect(config.engine.commands.kotlin?.command).toBe('ktlint --format --stdin-path={filepath}')
      expect(config.exclude).toEqual(['build/'])
      expect(config.concurrency).toBe(4)
      expect(loader.getConfigPath()).toBe(testConfigPath)
    })

    it('should apply defaults for missing config fields', () => {
      fs.writeFileSync(testConfigPath, JSON.stringify({ engine: { timeout: 500 } }))
      const loader = new ConfigLoader(testConfigPath)
      const config = loader.getConfig()

      expect(config.formatters).toEqual(['java']) // default
      expect(config.engine.timeout).toBe(500)
      expect(config.engine.commands).toEqual({}) // default
      expect(config.concurrency).toBe(1) // default
    })

    it('should handle invalid JSON gracefully', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      fs.writeFileSync(testConfigPath, 'invalid json {')
      const loader = new ConfigLoader(testConfigPath)
      expect(loader.getConfig()).toEqual(ConfigLoader.DEFAULT_CONFIG)
      expect(loader.getConfigPath()).toBeNull()
    })

    it('should handle invalid config schema gracefully', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      fs.writeFileSync(testConfigPath, JSON.stringify({ formatters: ['python'] }))
      const loader = new ConfigLoader(testConfigPath)
      expect(loader.getConfig().formatters).toEqual(['java'])
    })

    it('should reject engine commands for unknown formatters', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      fs.writeFileSync(testConfigPath, JSON.stringify({ engine: { commands: { scala: { command: 'fmt' } } } }))
      const loader = new ConfigLoader(testConfigPath)
      expect(loader.getConfig().engine.commands).toEqual({})
    })
  })

  describe('config discovery', () => {
    it('should find the config file in a parent directory', () => {
      const configPath = path.join(tempDir, '.srcfmt.config.json')
      fs.writeFileSync(configPath, JSON.stringify({ concurrency: 8 }))
      const nested = path.join(tempDir, 'src', 'main')
      fs.mkdirSync(nested, { recursive: true })

      const loader = new ConfigLoader(undefined, nested)

      expect(loader.getConfig().concurrency).toBe(8)
      expect(loader.getConfigPath()).toBe(configPath)
    })

    it('should prefer SRCFMT_CONFIG over the search', () => {
      fs.writeFileSync(path.join(tempDir, '.srcfmt.config.json'), JSON.stringify({ concurrency: 8 }))
      fs.writeFileSync(testConfigPath, JSON.stringify({ concurrency: 3 }))
      vi.stubEnv('SRCFMT_CONFIG', testConfigPath)

      const loader = new ConfigLoader(undefined, tempDir)

      expect(loader.getConfig().concurrency).toBe(3)
    })
  })
})
