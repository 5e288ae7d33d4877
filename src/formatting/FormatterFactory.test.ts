import { describe, it, expect } from 'vitest'
import { FormatterFactory } from './FormatterFactory'
import { ConfigLoader } from '../config/ConfigLoader'
import { ConfigurationError, FormatterConfiguration, ProfileHandle } from '../contracts'

describe('FormatterFactory', () => {
  const defaultProfile: ProfileHandle = { source: 'default', location: null }
  const config: FormatterConfiguration = {
    profile: defaultProfile,
    sourceLevel: null,
    encoding: 'utf-8',
    lineSeparator: 'lf',
    header: null,
  }
  const engineConfig = ConfigLoader.DEFAULT_CONFIG.engine

  it('should create formatters in the order given', () => {
    const formatters = FormatterFactory.createFormatters(['kotlin', 'java'], engineConfig, defaultProfile)

    expect(formatters.map((f) => f.name)).toEqual(['kotlin', 'java'])
  })

  it('should ignore duplicate names', () => {
    const formatters = FormatterFactory.createFormatters(['java', 'kotlin', 'java'], engineConfig, defaultProfile)

    expect(formatters.map((f) => f.name)).toEqual(['java', 'kotlin'])
  })

  it('should decide applicability by extension', () => {
    const [java, kotlin] = FormatterFactory.createFormatters(['java', 'kotlin'], engineConfig, defaultProfile)

    expect(java.isApplicable('/src/Main.java')).toBe(true)
    expect(java.isApplicable('/src/MAIN.JAVA')).toBe(true)
    expect(java.isApplicable('/src/Main.kt')).toBe(false)
    expect(kotlin.isApplicable('/src/Main.kt')).toBe(true)
    expect(kotlin.isApplicable('/build.gradle.kts')).toBe(true)
    expect(kotlin.isApplicable('/README.md')).toBe(false)
  })

  it('should format with the builtin engine when no command is configured', async () => {
    const [java] = FormatterFactory.createFormatters(['java'], engineConfig, defaultProfile)

    expect(await java.format('class A {\nint x;\n}', config, 'A.java')).toBe('class A {\n    int x;\n}\n')
  })

  it('should fail when the profile cannot be loaded', () => {
    const profile: ProfileHandle = { source: 'explicit', location: '/non/existent/profile.json' }

    expect(() => FormatterFactory.createFormatters(['java'], engineConfig, profile)).toThrow(ConfigurationError)
  })

  it('should not load the profile when every formatter has a command', () => {
    const profile: ProfileHandle = { source: 'explicit', location: '/non/existent/profile.xml' }
    const commands = { java: { command: 'google-java-format -' } }

    const formatters = FormatterFactory.createFormatters(['java'], { timeout: 1000, commands }, profile)

    expect(formatters).toHaveLength(1)
  })

  it('should list every available formatter', () => {
    expect(FormatterFactory.availableFormatters()).toEqual([
      { name: 'java', shortDescription: 'Java source formatter' },
      { name: 'kotlin', shortDescription: 'Kotlin source and script formatter' },
    ])
  })
})
