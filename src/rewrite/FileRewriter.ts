import { promises as fs } from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { IOError, errorMessage } from '../contracts'
import { debugLog } from '../logging/debugLog'

/**
 * File system operations the rewriter depends on
 */
export interface RewriterFileSystem {
  readFile(filePath: string): Promise<Buffer>
  stat(filePath: string): Promise<{ mode: number }>
  writeFile(filePath: string, data: Buffer, mode: number): Promise<void>
  chmod(filePath: string, mode: number): Promise<void>
  rename(from: string, to: string): Promise<void>
  unlink(filePath: string): Promise<void>
}

export const nodeFileSystem: RewriterFileSystem = {
  readFile: (filePath) => fs.readFile(filePath),
  stat: (filePath) => fs.stat(filePath),
  writeFile: (filePath, data, mode) => fs.writeFile(filePath, data, { mode, flag: 'wx' }),
  chmod: (filePath, mode) => fs.chmod(filePath, mode),
  rename: (from, to) => fs.rename(from, to),
  unlink: (filePath) => fs.unlink(filePath),
}

/**
 * Persists new file content with write-to-temp-then-rename, so the original
 * stays intact until the replace happens.
 */
export class FileRewriter {
  constructor(private readonly fileSystem: RewriterFileSystem = nodeFileSystem) {}

  static temporaryPathFor(filePath: string): string {
    return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${uuidv4()}.tmp`)
  }

  /**
   * Replace the file content when it differs
   * @param currentBytes Content already read from disk; read again when omitted
   * @returns Whether the file was replaced
   */
  async rewrite(filePath: string, newBytes: Buffer, currentBytes?: Buffer): Promise<boolean> {
    const current = currentBytes ?? (await this.read(filePath))
    if (current.equals(newBytes)) {
      return false
    }

    let mode: number
    try {
      mode = (await this.fileSystem.stat(filePath)).mode & 0o7777
    } catch (error) {
      throw new IOError(`Cannot stat ${filePath}: ${errorMessage(error)}`, { cause: error })
    }

    const tempPath = FileRewriter.temporaryPathFor(filePath)
    try {
      await this.fileSystem.writeFile(tempPath, newBytes, mode)
      // The mode given to writeFile is filtered by the umask
      await this.fileSystem.chmod(tempPath, mode)
      await this.fileSystem.rename(tempPath, filePath)
    } catch (error) {
      await this.removeTemporary(tempPath)
      throw new IOError(`Cannot rewrite ${filePath}: ${errorMessage(error)}`, { cause: error })
    }

    debugLog({ event: 'file_rewritten', file: filePath, bytes: newBytes.length })
    return true
  }

  private async read(filePath: string): Promise<Buffer> {
    try {
      return await this.fileSystem.readFile(filePath)
    } catch (error) {
      throw new IOError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error })
    }
  }

  private async removeTemporary(tempPath: string): Promise<void> {
    try {
      await this.fileSystem.unlink(tempPath)
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined
      if (code !== 'ENOENT') {
        debugLog({ event: 'temp_cleanup_failed', file: tempPath, error: errorMessage(error) })
      }
    }
  }
}
