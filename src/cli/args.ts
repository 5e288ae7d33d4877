import { CliOptions, InvalidArgumentError, JobsSchema } from '../contracts'

type ValueKey = 'conf' | 'level' | 'header' | 'encoding' | 'linesep' | 'jobs'
type FlagKey = 'verbose' | 'help'

export type OptionSpec =
  | { kind: 'value'; short: string; long: string; key: ValueKey; argName: string; description: string }
  | { kind: 'flag'; short: string; long: string; key: FlagKey; description: string }

export const OPTIONS: OptionSpec[] = [
  { kind: 'value', short: 'c', long: 'conf', key: 'conf', argName: 'profile', description: 'formatter profile to use (path or file: URL)' },
  { kind: 'value', short: 'l', long: 'level', key: 'level', argName: 'version', description: 'source level' },
  { kind: 'value', short: 'H', long: 'header', key: 'header', argName: 'txtFile', description: 'source file header' },
  { kind: 'value', short: 'e', long: 'encoding', key: 'encoding', argName: 'charset', description: 'source encoding' },
  { kind: 'value', short: 's', long: 'linesep', key: 'linesep', argName: 'lf|cr|crlf', description: 'line separator' },
  { kind: 'value', short: 'j', long: 'jobs', key: 'jobs', argName: 'n', description: 'number of files formatted in parallel' },
  { kind: 'flag', short: 'v', long: 'verbose', key: 'verbose', description: 'report every file' },
  { kind: 'flag', short: 'h', long: 'help', key: 'help', description: 'Shows this help' },
]

function findOption(arg: string): { spec: OptionSpec | undefined; inline: string | undefined } {
  if (arg.startsWith('--')) {
    const eq = arg.indexOf('=')
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq)
    return {
      spec: OPTIONS.find((option) => option.long === name),
      inline: eq === -1 ? undefined : arg.slice(eq + 1),
    }
  }
  return {
    spec: OPTIONS.find((option) => option.short === arg.slice(1, 2)),
    inline: arg.length > 2 ? arg.slice(2) : undefined,
  }
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { verbose: false, help: false }
  const positionals: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === '--') {
      positionals.push(...argv.slice(i + 1))
      break
    }

    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg)
      continue
    }

    const { spec, inline } = findOption(arg)
    if (!spec) {
      throw new InvalidArgumentError(`Unrecognized option: ${arg}`)
    }

    if (spec.kind === 'flag') {
      if (inline !== undefined) {
        throw new InvalidArgumentError(`Option ${spec.long} takes no argument`)
      }
      options[spec.key] = true
      continue
    }

    const value = inline ?? argv[++i]
    if (value === undefined) {
      throw new InvalidArgumentError(`Missing argument for option: ${spec.long}`)
    }
    options[spec.key] = value
  }

  if (positionals.length > 1) {
    throw new InvalidArgumentError(`Expected one file or directory, got ${positionals.length}: ${positionals.join(' ')}`)
  }
  options.path = positionals[0]

  return options
}

export function parseJobs(value: string): number {
  const parsed = JobsSchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidArgumentError('jobs : must be an integer between 1 and 64')
  }
  return parsed.data
}
