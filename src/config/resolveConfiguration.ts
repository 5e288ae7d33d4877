import fs from 'fs'
import os from 'os'
import path from 'path'
import { fileURLToPath } from 'url'
import {
  CliOptions,
  ConfigurationError,
  FileError,
  FormatterConfiguration,
  ProfileHandle,
  SupportedEncoding,
  errorMessage,
} from '../contracts'
import { DEFAULT_ENCODING, decode, parseEncoding } from '../pipeline/encoding'
import { parseLineSeparator } from '../pipeline/lineEndings'
import { normalizeHeader } from '../pipeline/header'
import { debugLog } from '../logging/debugLog'

export const HOME_PROFILE_FILE = 'formatter-profile.json'

export interface ResolveEnvironment {
  homeDir?: string
}

/**
 * Accepts a plain path or a file: URL
 */
export function toFilePath(location: string): string {
  return location.startsWith('file:') ? fileURLToPath(location) : path.resolve(location)
}

function assertReadableFile(filePath: string, what: string, given: string): void {
  try {
    if (!fs.statSync(filePath).isFile()) {
      throw new ConfigurationError(`${what} ${given} is not a file`)
    }
    fs.accessSync(filePath, fs.constants.R_OK)
  } catch (error) {
    if (error instanceof ConfigurationError) throw error
    throw new ConfigurationError(`Cannot read ${what} ${given}: ${errorMessage(error)}`)
  }
}

/**
 * Pick the profile: the explicit one, else the per-user file, else none.
 */
export function resolveProfile(conf: string | undefined, homeDir: string = os.homedir()): ProfileHandle {
  if (conf !== undefined) {
    let location: string
    try {
      location = toFilePath(conf)
    } catch (error) {
      throw new ConfigurationError(`Invalid formatter profile location ${conf}: ${errorMessage(error)}`)
    }
    assertReadableFile(location, 'formatter profile', conf)
    return { source: 'explicit', location }
  }

  const homeProfile = path.join(homeDir, HOME_PROFILE_FILE)
  if (fs.existsSync(homeProfile)) {
    return { source: 'home', location: homeProfile }
  }

  return { source: 'default', location: null }
}

export function loadHeader(headerArg: string, encoding: SupportedEncoding): string | null {
  const headerPath = toFilePath(headerArg)
  assertReadableFile(headerPath, 'header file', headerArg)

  try {
    return normalizeHeader(decode(fs.readFileSync(headerPath), encoding).text)
  } catch (error) {
    const reason = error instanceof FileError ? error.message : errorMessage(error)
    throw new ConfigurationError(`Cannot read header file ${headerArg}: ${reason}`)
  }
}

/**
 * Build the run configuration from the command line options. Argument values
 * are checked before any file is opened.
 */
export function resolveConfiguration(
  options: CliOptions,
  env: ResolveEnvironment = {}
): FormatterConfiguration {
  const lineSeparator = options.linesep !== undefined ? parseLineSeparator(options.linesep) : 'lf'
  const encoding = options.encoding !== undefined ? parseEncoding(options.encoding) : DEFAULT_ENCODING

  const profile = resolveProfile(options.conf, env.homeDir)
  const header = options.header !== undefined ? loadHeader(options.header, encoding) : null

  debugLog({
    event: 'configuration_resolved',
    profile,
    sourceLevel: options.level ?? null,
    encoding,
    lineSeparator,
    hasHeader: header !== null,
  })

  return Object.freeze({
    profile: Object.freeze(profile),
    sourceLevel: options.level ?? null,
    encoding,
    lineSeparator,
    header,
  })
}
