import { FormattingEngine, SourceFormatter } from '../Formatter'
import { FormatterConfiguration, FormatterName } from '../../contracts'
import * as path from 'path'

/**
 * Base implementation of the SourceFormatter interface. Applicability is
 * decided by file extension; the formatting itself goes to the engine.
 */
export abstract class BaseFormatter implements SourceFormatter {
  abstract readonly name: FormatterName
  abstract readonly shortDescription: string

  constructor(protected readonly engine: FormattingEngine) {}

  /**
   * Get the file extension from a file path
   */
  protected getFileExtension(filePath: string): string {
    return path.extname(filePath).toLowerCase()
  }

  isApplicable(filePath: string): boolean {
    const extension = this.getFileExtension(filePath)
    return this.getSupportedExtensions().includes(extension)
  }

  /**
   * Get the list of supported file extensions
   * Must be implemented by subclasses
   */
  protected abstract getSupportedExtensions(): string[]

  format(content: string, config: FormatterConfiguration, filePath: string): Promise<string> {
    return this.engine.format(content, {
      filePath,
      language: this.name,
      profile: config.profile,
      sourceLevel: config.sourceLevel,
    })
  }
}
