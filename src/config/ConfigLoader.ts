import fs from 'fs'
import path from 'path'
import { ProjectConfig } from '../contracts/types'
import { ProjectConfigSchema } from '../contracts/schemas'
import { z } from 'zod'

export const CONFIG_FILE_NAMES = ['.srcfmt.config.json', 'srcfmt.config.json']

export class ConfigLoader {
  static readonly DEFAULT_CONFIG: ProjectConfig = {
    formatters: ['java'],
    engine: {
      timeout: 10000,
      commands: {},
    },
    exclude: [],
    concurrency: 1,
  }

  private readonly config: ProjectConfig
  private loadedFrom: string | null = null

  /**
   * @param configPath Explicit config file; otherwise SRCFMT_CONFIG, then a
   *   search from startDir upwards
   * @param startDir Directory the search starts from (default: cwd)
   */
  constructor(private configPath?: string, private startDir: string = process.cwd()) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    // Start from the given directory and walk up
    let currentDir = path.resolve(this.startDir)

    while (true) {
      for (const configName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      const parent = path.dirname(currentDir)
      if (parent === currentDir) {
        return null
      }
      currentDir = parent
    }
  }

  private loadConfig(): ProjectConfig {
    const configPath = this.configPath ?? process.env.SRCFMT_CONFIG ?? this.findConfigFile()
    this.loadedFrom = null

    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)

      // Validate and apply defaults
      const validated = ProjectConfigSchema.parse(parsedConfig)
      this.loadedFrom = configPath
      return validated
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return ConfigLoader.DEFAULT_CONFIG
    }
  }

  getConfig(): ProjectConfig {
    return this.config
  }

  /**
   * Path of the file the current config came from, null for the defaults
   */
  getConfigPath(): string | null {
    return this.loadedFrom
  }
}
