import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when SRCFMT_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.SRCFMT_DEBUG === 'true' || process.env.SRCFMT_DEBUG === '1'

export const debugLogPath = (): string => join(homedir(), '.srcfmt', 'debug.log')

export const debugLog = (message: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return

  const logPath = debugLogPath()

  // Ensure directory exists
  mkdirSync(join(homedir(), '.srcfmt'), { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}
