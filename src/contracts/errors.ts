export const ExitCode = {
  OK: 0,
  FILES_FAILED: 1,
  FATAL: 2,
  INTERRUPTED: 130,
  MISSING_PATH: 255,
} as const

/**
 * Errors that stop a run before any file is touched.
 */
export class FatalError extends Error {
  readonly exitCode: number

  constructor(message: string, exitCode: number = ExitCode.FATAL) {
    super(message)
    this.name = 'FatalError'
    this.exitCode = exitCode
  }
}

export class InvalidArgumentError extends FatalError {
  constructor(message: string, exitCode: number = ExitCode.FATAL) {
    super(message, exitCode)
    this.name = 'InvalidArgumentError'
  }
}

export class ConfigurationError extends FatalError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class InvalidPathError extends FatalError {
  constructor(readonly path: string) {
    super(`unsupported path: ${path}`)
    this.name = 'InvalidPathError'
  }
}

/**
 * Errors attributed to a single file. They are reported in the file's
 * outcome and never abort the run.
 */
export class FileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FileError'
  }
}

export class EncodingError extends FileError {
  constructor(message: string) {
    super(message)
    this.name = 'EncodingError'
  }
}

export class FormatError extends FileError {
  constructor(readonly formatter: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FormatError'
  }
}

export class IOError extends FileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'IOError'
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
