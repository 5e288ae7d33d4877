export * from './contracts'
export * from './formatting'
export { FormatterPipeline } from './pipeline/FormatterPipeline'
export { applyHeader, findHeader, normalizeHeader } from './pipeline/header'
export type { HeaderBlock } from './pipeline/header'
export { normalizeLineEndings, parseLineSeparator, LINE_SEPARATORS } from './pipeline/lineEndings'
export { decode, encode, parseEncoding, DEFAULT_ENCODING } from './pipeline/encoding'
export { FileRewriter, nodeFileSystem } from './rewrite/FileRewriter'
export type { RewriterFileSystem } from './rewrite/FileRewriter'
export { FileScanner, globToRegex } from './traversal/FileScanner'
export { TraversalEngine } from './traversal/TraversalEngine'
export type { TraversalOptions } from './traversal/TraversalEngine'
export { ConfigLoader } from './config/ConfigLoader'
export { resolveConfiguration, resolveProfile, loadHeader, HOME_PROFILE_FILE } from './config/resolveConfiguration'
export { run } from './cli/run'
