export type { SourceFormatter, FormattingEngine, FormatRequest } from './Formatter'
export { FormatterFactory } from './FormatterFactory'
export { CommandEngine } from './CommandEngine'
export { BuiltinEngine } from './BuiltinEngine'
export { BaseFormatter } from './formatters/BaseFormatter'
export { JavaFormatter } from './formatters/JavaFormatter'
export { KotlinFormatter } from './formatters/KotlinFormatter'
