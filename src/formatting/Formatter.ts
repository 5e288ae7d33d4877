import type { FormatterConfiguration, FormatterName, ProfileHandle } from '../contracts'

/**
 * A formatter variant. Every variant exposes the same capability; callers never
 * dispatch on the concrete class.
 */
export interface SourceFormatter {
  readonly name: FormatterName

  /**
   * One-line description shown in the help output
   */
  readonly shortDescription: string

  /**
   * Check if this formatter handles the given file
   */
  isApplicable(filePath: string): boolean

  /**
   * Format the given content
   * @param content Decoded file content
   * @param config Options shared by the whole run
   * @param filePath The file the content was read from
   * @returns The formatted content; rejects with FormatError when the content cannot be processed
   */
  format(content: string, config: FormatterConfiguration, filePath: string): Promise<string>
}

/**
 * What a formatting engine receives along with the source text
 */
export interface FormatRequest {
  filePath: string
  language: FormatterName
  profile: Readonly<ProfileHandle>
  sourceLevel: string | null
}

/**
 * The engine that performs the syntax-aware reformatting
 */
export interface FormattingEngine {
  readonly name: string
  format(source: string, request: FormatRequest): Promise<string>
}
