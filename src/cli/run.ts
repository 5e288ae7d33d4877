import path from 'path'
import { parseArgs, parseJobs } from './args'
import { formatHelp } from './help'
import { ConfigLoader } from '../config/ConfigLoader'
import { HOME_PROFILE_FILE, resolveConfiguration } from '../config/resolveConfiguration'
import { parseLineSeparator } from '../pipeline/lineEndings'
import { parseEncoding } from '../pipeline/encoding'
import { FormatterFactory } from '../formatting/FormatterFactory'
import { TraversalEngine } from '../traversal/TraversalEngine'
import { debugLog } from '../logging/debugLog'
import { ExitCode, FatalError, FileOutcome, FormatterConfiguration, RunSummary } from '../contracts'

export interface RunEnvironment {
  cwd?: string
  homeDir?: string
  signal?: AbortSignal
}

export function formatSummary(summary: RunSummary): string {
  const line =
    `${summary.visited} file(s) visited: ${summary.changed} changed, ${summary.unchanged} unchanged, ` +
    `${summary.skipped} skipped, ${summary.failed} failed`
  return summary.cancelled ? `${line} (interrupted)` : line
}

function reportOutcome(outcome: FileOutcome, verbose: boolean): void {
  if (outcome.status === 'failed') {
    console.error(`Failed to format ${outcome.path}: ${outcome.error?.message ?? 'unknown error'}`)
  } else if (verbose) {
    console.log(`${outcome.status.padEnd(9)} ${outcome.path}`)
  }
}

function describeProfile(config: FormatterConfiguration, homeDir: string | undefined): string {
  switch (config.profile.source) {
    case 'explicit':
      return `Using command line configuration at ${config.profile.location}`
    case 'home':
      return `Using home directory configuration at ${config.profile.location}`
    default:
      return `No command line configuration parameter found, nor home directory configuration of ` +
        `${path.join(homeDir ?? '~', HOME_PROFILE_FILE)}. Using engine default formatting`
  }
}

/**
 * Run the formatter command line and return the process exit status
 */
export async function run(argv: readonly string[], env: RunEnvironment = {}): Promise<number> {
  try {
    const options = parseArgs(argv)

    if (options.help) {
      console.log(formatHelp())
      return ExitCode.OK
    }

    // Argument values are checked before the path
    if (options.linesep !== undefined) parseLineSeparator(options.linesep)
    if (options.encoding !== undefined) parseEncoding(options.encoding)
    const jobs = options.jobs !== undefined ? parseJobs(options.jobs) : undefined

    if (options.path === undefined) {
      console.error('Missing file or directory parameter.')
      console.log(formatHelp())
      return ExitCode.MISSING_PATH
    }

    const configuration = resolveConfiguration(options, { homeDir: env.homeDir })
    const configLoader = new ConfigLoader(undefined, env.cwd)
    const projectConfig = configLoader.getConfig()
    const formatters = FormatterFactory.createFormatters(
      projectConfig.formatters,
      projectConfig.engine,
      configuration.profile
    )

    if (options.verbose) {
      console.log(describeProfile(configuration, env.homeDir))
      const configPath = configLoader.getConfigPath()
      console.log(
        configPath !== null
          ? `Using project configuration at ${configPath}`
          : 'No project configuration found, using defaults'
      )
      console.log(`Registered formatters : ${formatters.map((formatter) => formatter.name).join(', ')}`)
    }

    const root = path.resolve(env.cwd ?? process.cwd(), options.path)
    const engine = new TraversalEngine({
      concurrency: jobs ?? projectConfig.concurrency,
      exclude: projectConfig.exclude,
      signal: env.signal,
      onOutcome: (outcome) => reportOutcome(outcome, options.verbose),
    })

    const summary = await engine.visit(root, formatters, configuration)
    debugLog({ event: 'run_complete', ...formatSummaryFields(summary) })
    console.log(formatSummary(summary))

    if (summary.cancelled) {
      return ExitCode.INTERRUPTED
    }
    return summary.failed > 0 ? ExitCode.FILES_FAILED : ExitCode.OK
  } catch (error) {
    if (error instanceof FatalError) {
      console.error(`srcfmt: ${error.message}`)
      return error.exitCode
    }
    throw error
  }
}

function formatSummaryFields(summary: RunSummary): Record<string, number | boolean> {
  const { visited, changed, unchanged, skipped, failed, cancelled } = summary
  return { visited, changed, unchanged, skipped, failed, cancelled }
}
