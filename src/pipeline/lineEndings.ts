import { InvalidArgumentError, LineSeparator, LineSeparatorSchema } from '../contracts'

const LINE_BREAK = /\r\n|\r|\n/g

export const LINE_SEPARATORS: Record<LineSeparator, string> = {
  lf: '\n',
  cr: '\r',
  crlf: '\r\n',
}

export function parseLineSeparator(value: string): LineSeparator {
  const parsed = LineSeparatorSchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidArgumentError("linesep : must be one of ['lf', 'cr', 'crlf']")
  }
  return parsed.data
}

/**
 * Replace every end-of-line sequence with the given separator.
 */
export function normalizeLineEndings(text: string, separator: LineSeparator): string {
  return text.replace(LINE_BREAK, LINE_SEPARATORS[separator])
}

export function splitLines(text: string): string[] {
  return text.split(LINE_BREAK)
}
