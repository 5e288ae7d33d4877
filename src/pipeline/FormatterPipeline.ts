import { SourceFormatter } from '../formatting/Formatter'
import { FormatError, FormatterConfiguration, errorMessage } from '../contracts'
import { decode, encode } from './encoding'
import { applyHeader } from './header'
import { normalizeLineEndings } from './lineEndings'
import { debugLog } from '../logging/debugLog'

/**
 * Threads a file's content through the formatters, the header pass and the
 * line ending pass.
 */
export class FormatterPipeline {
  async apply(
    rawContent: Buffer,
    formatters: readonly SourceFormatter[],
    config: FormatterConfiguration,
    filePath: string
  ): Promise<Buffer> {
    const { text: decoded, bom } = decode(rawContent, config.encoding)

    let text = decoded
    for (const formatter of formatters) {
      text = await this.runFormatter(formatter, text, config, filePath)
    }

    if (config.header !== null) {
      text = applyHeader(normalizeLineEndings(text, 'lf'), config.header)
    }

    // Last, so that whatever convention the formatters emitted is unified
    text = normalizeLineEndings(text, config.lineSeparator)

    return encode(text, config.encoding, bom)
  }

  private async runFormatter(
    formatter: SourceFormatter,
    text: string,
    config: FormatterConfiguration,
    filePath: string
  ): Promise<string> {
    try {
      const formatted = await formatter.format(text, config, filePath)
      debugLog({
        event: 'formatter_applied',
        formatter: formatter.name,
        file: filePath,
        changed: formatted !== text,
      })
      return formatted
    } catch (error) {
      if (error instanceof FormatError) {
        throw error
      }
      throw new FormatError(formatter.name, `${formatter.name}: ${errorMessage(error)}`, { cause: error })
    }
  }
}
