import type { FileError } from './errors'

export type FormatterName = 'java' | 'kotlin'

export type LineSeparator = 'lf' | 'cr' | 'crlf'

export type SupportedEncoding = 'utf-8' | 'utf-16le' | 'latin1' | 'ascii'

export interface ProfileHandle {
  source: 'explicit' | 'home' | 'default'
  location: string | null
}

/**
 * Options shared by every formatter invocation of a run. Built once by
 * resolveConfiguration and frozen.
 */
export interface FormatterConfiguration {
  readonly profile: Readonly<ProfileHandle>
  readonly sourceLevel: string | null
  readonly encoding: SupportedEncoding
  readonly lineSeparator: LineSeparator
  readonly header: string | null
}

export interface FileTask {
  path: string
  originalBytes: Buffer
  encoding: SupportedEncoding
}

export type FileStatus = 'changed' | 'unchanged' | 'skipped' | 'failed'

export interface FileOutcome {
  path: string
  status: FileStatus
  formatters: string[]
  error?: FileError
}

export interface RunSummary {
  visited: number
  changed: number
  unchanged: number
  skipped: number
  failed: number
  cancelled: boolean
  outcomes: FileOutcome[]
}

export interface EngineCommand {
  command: string
  stdin?: boolean
  args?: string[]
  profileArgs?: string[]
  levelArgs?: string[]
}

export interface ProjectConfig {
  formatters: FormatterName[]
  engine: {
    timeout: number
    commands: Partial<Record<FormatterName, EngineCommand>>
  }
  exclude: string[]
  concurrency: number
}

export interface CliOptions {
  conf?: string
  level?: string
  header?: string
  encoding?: string
  linesep?: string
  jobs?: string
  verbose: boolean
  help: boolean
  path?: string
}
