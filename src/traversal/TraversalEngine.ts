import { Stats, promises as fs } from 'fs'
import { SourceFormatter } from '../formatting/Formatter'
import { FormatterPipeline } from '../pipeline/FormatterPipeline'
import { FileRewriter } from '../rewrite/FileRewriter'
import { FileScanner } from './FileScanner'
import { debugLog } from '../logging/debugLog'
import {
  FileError,
  FileOutcome,
  FileTask,
  FormatterConfiguration,
  IOError,
  InvalidPathError,
  RunSummary,
  errorMessage,
} from '../contracts'

export interface TraversalOptions {
  /** Number of files processed at the same time (default: 1) */
  concurrency?: number
  /** Globs, relative to a directory root, of paths not to visit */
  exclude?: readonly string[]
  /** Stops new files from being started once aborted */
  signal?: AbortSignal
  /** Called as each file completes */
  onOutcome?: (outcome: FileOutcome) => void
  pipeline?: FormatterPipeline
  rewriter?: FileRewriter
}

/**
 * Walks a file or directory and runs the pipeline and rewriter on every
 * regular file found.
 */
export class TraversalEngine {
  private readonly concurrency: number
  private readonly pipeline: FormatterPipeline
  private readonly rewriter: FileRewriter

  constructor(private readonly options: TraversalOptions = {}) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1))
    this.pipeline = options.pipeline ?? new FormatterPipeline()
    this.rewriter = options.rewriter ?? new FileRewriter()
  }

  async visit(
    root: string,
    formatters: readonly SourceFormatter[],
    config: FormatterConfiguration
  ): Promise<RunSummary> {
    const { files, failures } = await this.discover(root)

    debugLog({
      event: 'traversal_start',
      root,
      fileCount: files.length,
      formatters: formatters.map((f) => f.name),
      concurrency: this.concurrency,
    })

    const outcomes = new Array<FileOutcome | undefined>(files.length)
    let next = 0

    const worker = async (): Promise<void> => {
      while (next < files.length && !this.options.signal?.aborted) {
        const index = next++
        const outcome = await this.processFile(files[index], formatters, config)
        outcomes[index] = outcome
        this.options.onOutcome?.(outcome)
      }
    }

    await Promise.all(Array.from({ length: Math.min(this.concurrency, files.length) }, worker))

    for (const failure of failures) {
      this.options.onOutcome?.(failure)
    }

    const completed = outcomes.filter((outcome): outcome is FileOutcome => outcome !== undefined)
    return this.summarize(completed, failures, completed.length < files.length)
  }

  /**
   * Run the formatters that apply to one file and rewrite it when its
   * content changed. Failures are returned, never thrown.
   */
  async processFile(
    filePath: string,
    formatters: readonly SourceFormatter[],
    config: FormatterConfiguration
  ): Promise<FileOutcome> {
    const applicable = formatters.filter((formatter) => formatter.isApplicable(filePath))
    const names = applicable.map((formatter) => formatter.name)

    if (applicable.length === 0) {
      return { path: filePath, status: 'skipped', formatters: [] }
    }

    try {
      const task = await this.createTask(filePath, config)
      const output = await this.pipeline.apply(task.originalBytes, applicable, config, task.path)
      const changed = await this.rewriter.rewrite(task.path, output, task.originalBytes)
      return { path: filePath, status: changed ? 'changed' : 'unchanged', formatters: names }
    } catch (error) {
      const fileError = error instanceof FileError
        ? error
        : new IOError(errorMessage(error), { cause: error })
      debugLog({ event: 'file_failed', file: filePath, error: fileError.name, message: fileError.message })
      return { path: filePath, status: 'failed', formatters: names, error: fileError }
    }
  }

  private async createTask(filePath: string, config: FormatterConfiguration): Promise<FileTask> {
    try {
      // Rewrite the target, not a link pointing at it
      const target = await fs.realpath(filePath)
      return { path: target, originalBytes: await fs.readFile(target), encoding: config.encoding }
    } catch (error) {
      throw new IOError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error })
    }
  }

  private async discover(root: string): Promise<{ files: string[]; failures: FileOutcome[] }> {
    let stats: Stats
    try {
      stats = await fs.stat(root)
    } catch {
      throw new InvalidPathError(root)
    }

    if (stats.isFile()) {
      return { files: [root], failures: [] }
    }

    if (!stats.isDirectory()) {
      throw new InvalidPathError(root)
    }

    const scanner = new FileScanner(root, this.options.exclude)
    const { files, errors } = await scanner.scan()
    return {
      files,
      failures: errors.map(({ path, error }): FileOutcome => ({ path, status: 'failed', formatters: [], error })),
    }
  }

  /**
   * Directory failures count as failed but not as visited files
   */
  private summarize(fileOutcomes: FileOutcome[], directoryFailures: FileOutcome[], cancelled: boolean): RunSummary {
    const outcomes = [...fileOutcomes, ...directoryFailures]
    const count = (status: FileOutcome['status']) =>
      outcomes.filter((outcome) => outcome.status === status).length

    return {
      visited: fileOutcomes.length,
      changed: count('changed'),
      unchanged: count('unchanged'),
      skipped: count('skipped'),
      failed: count('failed'),
      cancelled,
      outcomes,
    }
  }
}
