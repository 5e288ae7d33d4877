import { spawn } from 'child_process'
import { FormatRequest, FormattingEngine } from './Formatter'
import { EngineCommand, FormatError } from '../contracts'

export const DEFAULT_ENGINE_TIMEOUT = 10000

/**
 * Engine that pipes the source through an external formatter process
 */
export class CommandEngine implements FormattingEngine {
  readonly name: string

  constructor(
    private readonly commandConfig: EngineCommand,
    private readonly timeout: number = DEFAULT_ENGINE_TIMEOUT
  ) {
    this.name = `command:${commandConfig.command.split(' ')[0]}`
  }

  /**
   * Build the executable and argument list for a request
   */
  buildInvocation(request: FormatRequest): { cmd: string; args: string[] } {
    const substitute = (arg: string): string =>
      arg
        .replaceAll('{filepath}', request.filePath)
        .replaceAll('{profile}', request.profile.location ?? '')
        .replaceAll('{level}', request.sourceLevel ?? '')

    // Parse command safely without shell
    const [cmd, ...commandArgs] = this.commandConfig.command.split(' ').filter((part) => part.length > 0)

    const args = commandArgs.map(substitute)
    if (request.profile.location !== null) {
      args.push(...(this.commandConfig.profileArgs ?? []).map(substitute))
    }
    if (request.sourceLevel !== null) {
      args.push(...(this.commandConfig.levelArgs ?? []).map(substitute))
    }
    args.push(...(this.commandConfig.args ?? []).map(substitute))

    return { cmd, args }
  }

  format(source: string, request: FormatRequest): Promise<string> {
    const { cmd, args } = this.buildInvocation(request)

    return new Promise((resolve, reject) => {
      const child = spawn(cmd, args, {
        timeout: this.timeout,
      })

      let stdout = ''
      let stderr = ''

      child.stdout.on('data', (data: Buffer | string) => {
        stdout += data.toString()
      })

      child.stderr.on('data', (data: Buffer | string) => {
        stderr += data.toString()
      })

      child.on('error', (error: Error) => {
        reject(new FormatError(request.language, `Formatter error: ${error.message}`, { cause: error }))
      })

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (signal !== null) {
          reject(new FormatError(request.language, `Formatter terminated by ${signal} (timeout ${this.timeout}ms)`))
        } else if (code !== 0) {
          reject(new FormatError(request.language, `Formatter exited with code ${code}: ${stderr.trim()}`))
        } else {
          resolve(stdout || source) // Fallback to original if no output
        }
      })

      // Send content via stdin if configured (default: true)
      if (this.commandConfig.stdin !== false) {
        // The process may exit before reading its input; the close handler reports it
        child.stdin.on('error', () => undefined)
        child.stdin.write(source)
        child.stdin.end()
      }
    })
  }
}
