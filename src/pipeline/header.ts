/**
 * Header maintenance. Works on text whose line breaks are all `\n`.
 *
 * A text has a header when it starts with:
 *  - the configured header itself, followed by a line break or the end of the text
 *  - a block comment that is not a doc comment (`/*`, not `/**`), provided nothing
 *    but whitespace follows the closing `*\/` on its line
 *  - a run of consecutive `//` lines
 */

export interface HeaderBlock {
  text: string
  end: number
}

/**
 * Normalize header text loaded from a file. Returns null for a blank header.
 */
export function normalizeHeader(raw: string): string | null {
  const header = raw
    .replace(/\r\n|\r/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/^\n+/, '')
    .replace(/\n+$/, '')

  return header.length > 0 ? header : null
}

export function findHeader(text: string, header: string): HeaderBlock | null {
  if (text.startsWith(header) && (text.length === header.length || text[header.length] === '\n')) {
    return { text: header, end: header.length }
  }

  if (text.startsWith('/*') && !text.startsWith('/**')) {
    const close = text.indexOf('*/', 2)
    if (close === -1) {
      return null
    }
    const lineEnd = text.indexOf('\n', close + 2)
    const end = lineEnd === -1 ? text.length : lineEnd
    if (text.slice(close + 2, end).trim() !== '') {
      return null
    }
    return { text: text.slice(0, end).trimEnd(), end }
  }

  if (text.startsWith('//')) {
    let end = 0
    let lineStart = 0
    while (lineStart < text.length && text.startsWith('//', lineStart)) {
      const lineEnd = text.indexOf('\n', lineStart)
      end = lineEnd === -1 ? text.length : lineEnd
      lineStart = end + 1
    }
    const lines = text.slice(0, end).split('\n').map((line) => line.trimEnd())
    return { text: lines.join('\n'), end }
  }

  return null
}

/**
 * Insert, replace or keep the header at the top of the text.
 */
export function applyHeader(text: string, header: string): string {
  const existing = findHeader(text, header)

  if (!existing) {
    return text.length > 0 ? `${header}\n\n${text}` : `${header}\n`
  }

  if (existing.text === header) {
    return text
  }

  const rest = text.slice(existing.end).replace(/^\n+/, '')
  return rest.length > 0 ? `${header}\n\n${rest}` : `${header}\n`
}
