import { Dirent, promises as fs } from 'fs'
import path from 'path'
import { IOError, errorMessage } from '../contracts'
import { debugLog } from '../logging/debugLog'

export interface ScanResult {
  files: string[]
  errors: Array<{ path: string; error: IOError }>
}

/**
 * Convert an exclude glob to a regex. `**` spans directories, `*` and `?`
 * stay within one path segment.
 */
export function globToRegex(pattern: string): RegExp {
  const regex = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&') // Escape regex special chars except * and ?
    .replace(/\*\*\//g, '___ANY_DIRS___')
    .replace(/\*\*/g, '___DOUBLE_STAR___')
    .replace(/\*/g, '[^/]*')
    .replace(/\?/g, '[^/]')
    .replace(/___ANY_DIRS___/g, '(?:.*/)?')
    .replace(/___DOUBLE_STAR___/g, '.*')

  return new RegExp(`^${regex}$`)
}

/**
 * Lists the regular files under a directory. Symbolic links are never
 * followed, so the walk cannot loop.
 */
export class FileScanner {
  private readonly excludes: RegExp[]

  constructor(private readonly rootDir: string, exclude: readonly string[] = []) {
    this.excludes = exclude.map(globToRegex)
  }

  isExcluded(entryPath: string, isDirectory: boolean): boolean {
    if (this.excludes.length === 0) {
      return false
    }
    const relativePath = path.relative(this.rootDir, entryPath).split(path.sep).join('/')
    const candidates = isDirectory ? [relativePath, `${relativePath}/`] : [relativePath]
    return this.excludes.some((regex) => candidates.some((candidate) => regex.test(candidate)))
  }

  async scan(): Promise<ScanResult> {
    const result: ScanResult = { files: [], errors: [] }
    await this.walk(this.rootDir, result)
    return result
  }

  private async walk(currentDir: string, result: ScanResult): Promise<void> {
    let entries: Dirent[]
    try {
      entries = await fs.readdir(currentDir, { withFileTypes: true })
    } catch (error) {
      result.errors.push({
        path: currentDir,
        error: new IOError(`Cannot read directory ${currentDir}: ${errorMessage(error)}`, { cause: error }),
      })
      return
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name)

      if (entry.isSymbolicLink()) {
        debugLog({ event: 'symlink_skipped', path: fullPath })
        continue
      }

      if (entry.isDirectory()) {
        if (!this.isExcluded(fullPath, true)) {
          await this.walk(fullPath, result)
        }
      } else if (entry.isFile()) {
        if (!this.isExcluded(fullPath, false)) {
          result.files.push(fullPath)
        }
      }
    }
  }
}
