#!/usr/bin/env node

import { run } from './run'
import { ExitCode } from '../contracts'

// Only run if this is the main module
if (require.main === module) {
  const controller = new AbortController()
  process.once('SIGINT', () => {
    console.error('srcfmt: interrupted, finishing files in progress')
    controller.abort()
  })

  run(process.argv.slice(2), { signal: controller.signal })
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error('srcfmt: unexpected error:', error)
      process.exit(ExitCode.FATAL)
    })
}
