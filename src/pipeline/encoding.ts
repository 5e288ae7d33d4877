import { EncodingError, InvalidArgumentError, SupportedEncoding } from '../contracts'

export const DEFAULT_ENCODING: SupportedEncoding = 'utf-8'

const CHARSET_ALIASES = new Map<string, SupportedEncoding>([
  ['utf-8', 'utf-8'],
  ['utf8', 'utf-8'],
  ['utf-16le', 'utf-16le'],
  ['utf16le', 'utf-16le'],
  ['ucs-2', 'utf-16le'],
  ['ucs2', 'utf-16le'],
  ['latin1', 'latin1'],
  ['iso-8859-1', 'latin1'],
  ['iso8859-1', 'latin1'],
  ['ascii', 'ascii'],
  ['us-ascii', 'ascii'],
])

const NODE_ENCODINGS: Record<SupportedEncoding, BufferEncoding> = {
  'utf-8': 'utf8',
  'utf-16le': 'utf16le',
  latin1: 'latin1',
  ascii: 'ascii',
}

const BOM = '\uFEFF'
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

export interface DecodedText {
  text: string
  bom: boolean
}

/**
 * Resolve a charset name given on the command line.
 */
export function parseEncoding(name: string): SupportedEncoding {
  const encoding = CHARSET_ALIASES.get(name.trim().toLowerCase())
  if (!encoding) {
    throw new InvalidArgumentError(
      `encoding : unsupported charset '${name}', must be one of ['utf-8', 'utf-16le', 'latin1', 'ascii']`
    )
  }
  return encoding
}

export function decode(bytes: Buffer, encoding: SupportedEncoding): DecodedText {
  let text: string

  switch (encoding) {
    case 'utf-8':
    case 'utf-16le':
      try {
        text = new TextDecoder(encoding, { fatal: true, ignoreBOM: true }).decode(bytes)
      } catch {
        throw new EncodingError(`content is not valid ${encoding}`)
      }
      break
    case 'ascii': {
      const offset = bytes.findIndex((byte) => byte > 0x7f)
      if (offset !== -1) {
        throw new EncodingError(`content is not valid ascii (byte 0x${bytes[offset].toString(16)} at offset ${offset})`)
      }
      text = bytes.toString('ascii')
      break
    }
    default:
      text = bytes.toString('latin1')
      break
  }

  if (text.startsWith(BOM)) {
    return { text: text.slice(BOM.length), bom: true }
  }
  return { text, bom: false }
}

export function encode(text: string, encoding: SupportedEncoding, bom: boolean = false): Buffer {
  const limit = encoding === 'ascii' ? 0x7f : encoding === 'latin1' ? 0xff : null

  if (limit === null) {
    if (LONE_SURROGATE.test(text)) {
      throw new EncodingError(`content contains an unpaired surrogate and cannot be written as ${encoding}`)
    }
  } else {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) > limit) {
        throw new EncodingError(
          `character U+${text.charCodeAt(i).toString(16).toUpperCase().padStart(4, '0')} cannot be written as ${encoding}`
        )
      }
    }
  }

  return Buffer.from(bom ? BOM + text : text, NODE_ENCODINGS[encoding])
}
