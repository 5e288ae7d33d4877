import fs from 'fs'
import { z } from 'zod'
import { FormatRequest, FormattingEngine } from './Formatter'
import { splitLines } from '../pipeline/lineEndings'
import {
  BuiltinProfile,
  BuiltinProfileSchema,
  ConfigurationError,
  FormatError,
  ProfileHandle,
  errorMessage,
} from '../contracts'

interface OpenBracket {
  char: string
  line: number
}

interface ScanState {
  stack: OpenBracket[]
  inBlockComment: boolean
  inTextBlock: boolean
}

interface OutputLine {
  text: string
  verbatim: boolean
}

const OPENERS = '{(['
const CLOSERS: Record<string, string> = { '}': '{', ')': '(', ']': '[' }

/**
 * Engine used when no external formatter command is configured. Re-indents
 * lines by bracket depth, trims trailing whitespace and limits blank lines.
 * Multi-line text blocks are copied verbatim.
 */
export class BuiltinEngine implements FormattingEngine {
  readonly name = 'builtin'
  private readonly profile: BuiltinProfile

  constructor(profile: Partial<BuiltinProfile> = {}) {
    this.profile = BuiltinProfileSchema.parse(profile)
  }

  /**
   * Read the engine options from a profile. A handle without a location
   * gives the defaults.
   */
  static fromProfile(handle: Readonly<ProfileHandle>): BuiltinEngine {
    if (handle.location === null) {
      return new BuiltinEngine()
    }

    try {
      const raw = fs.readFileSync(handle.location, 'utf-8')
      return new BuiltinEngine(BuiltinProfileSchema.parse(JSON.parse(raw)))
    } catch (error) {
      if (error instanceof z.ZodError) {
        const details = error.errors.map((e) => `${e.path.join('.') || '<root>'}: ${e.message}`).join(', ')
        throw new ConfigurationError(`Invalid formatter profile ${handle.location}: ${details}`)
      }
      if (error instanceof SyntaxError) {
        throw new ConfigurationError(`Invalid JSON in formatter profile ${handle.location}`)
      }
      throw new ConfigurationError(`Cannot read formatter profile ${handle.location}: ${errorMessage(error)}`)
    }
  }

  getProfile(): BuiltinProfile {
    return { ...this.profile }
  }

  async format(source: string, request: FormatRequest): Promise<string> {
    const state: ScanState = { stack: [], inBlockComment: false, inTextBlock: false }
    const output: OutputLine[] = []

    splitLines(source).forEach((line, index) => {
      const lineNumber = index + 1

      if (state.inTextBlock) {
        output.push({ text: line, verbatim: true })
        this.scan(line, state, lineNumber, request)
        return
      }

      const trimmed = line.trim()
      if (trimmed === '') {
        output.push({ text: '', verbatim: false })
        return
      }

      if (state.inBlockComment) {
        const prefix = trimmed.startsWith('*') ? ' ' : ''
        output.push({ text: this.indentation(state.stack.length) + prefix + trimmed, verbatim: false })
      } else {
        const level = Math.max(0, state.stack.length - this.countLeadingClosers(trimmed))
        output.push({ text: this.indentation(level) + trimmed, verbatim: false })
      }

      this.scan(trimmed, state, lineNumber, request)
    })

    this.assertBalanced(state, request)

    return this.joinLines(output)
  }

  private scan(line: string, state: ScanState, lineNumber: number, request: FormatRequest): void {
    let i = 0

    while (i < line.length) {
      if (state.inBlockComment) {
        const close = line.indexOf('*/', i)
        if (close === -1) return
        state.inBlockComment = false
        i = close + 2
        continue
      }

      if (state.inTextBlock) {
        const close = line.indexOf('"""', i)
        if (close === -1) return
        state.inTextBlock = false
        i = close + 3
        continue
      }

      if (line.startsWith('//', i)) return

      if (line.startsWith('/*', i)) {
        state.inBlockComment = true
        i += 2
        continue
      }

      if (line.startsWith('"""', i)) {
        state.inTextBlock = true
        i += 3
        continue
      }

      const ch = line[i]

      // Kotlin backquoted identifiers, such as test names, may hold quotes
      if (ch === '`' && request.language === 'kotlin') {
        const end = line.indexOf('`', i + 1)
        if (end === -1) {
          throw new FormatError(request.language, `${request.filePath}:${lineNumber}: unterminated backquoted identifier`)
        }
        i = end + 1
        continue
      }

      if (ch === '"' || ch === "'") {
        const end = this.findClosingQuote(line, i + 1, ch)
        if (end === -1) {
          const kind = ch === '"' ? 'string' : 'character'
          throw new FormatError(request.language, `${request.filePath}:${lineNumber}: unterminated ${kind} literal`)
        }
        i = end + 1
        continue
      }

      if (OPENERS.includes(ch)) {
        state.stack.push({ char: ch, line: lineNumber })
      } else if (ch in CLOSERS) {
        const open = state.stack.pop()
        if (!open || open.char !== CLOSERS[ch]) {
          throw new FormatError(request.language, `${request.filePath}:${lineNumber}: unbalanced '${ch}'`)
        }
      }
      i++
    }
  }

  private findClosingQuote(line: string, start: number, quote: string): number {
    let j = start
    while (j < line.length) {
      if (line[j] === '\\') {
        j += 2
      } else if (line[j] === quote) {
        return j
      } else {
        j++
      }
    }
    return -1
  }

  private assertBalanced(state: ScanState, request: FormatRequest): void {
    if (state.inBlockComment) {
      throw new FormatError(request.language, `${request.filePath}: unterminated block comment`)
    }
    if (state.inTextBlock) {
      throw new FormatError(request.language, `${request.filePath}: unterminated text block`)
    }
    const unclosed = state.stack[state.stack.length - 1]
    if (unclosed) {
      throw new FormatError(
        request.language,
        `${request.filePath}:${unclosed.line}: '${unclosed.char}' is never closed`
      )
    }
  }

  private countLeadingClosers(trimmed: string): number {
    let count = 0
    while (count < trimmed.length && trimmed[count] in CLOSERS) {
      count++
    }
    return count
  }

  private indentation(level: number): string {
    return this.profile.indentStyle === 'tab'
      ? '\t'.repeat(level)
      : ' '.repeat(level * this.profile.indentSize)
  }

  private joinLines(output: OutputLine[]): string {
    const lines: string[] = []
    let blankRun = 0

    for (const line of output) {
      if (line.verbatim || line.text !== '') {
        blankRun = 0
        lines.push(line.text)
        continue
      }
      // Leading blank lines go, longer runs are cut down
      if (lines.length === 0) continue
      blankRun++
      if (blankRun <= this.profile.maxBlankLines) {
        lines.push('')
      }
    }

    while (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop()
    }

    return lines.length > 0 ? `${lines.join('\n')}\n` : ''
  }
}
