/**
 * CLI Logger
 *
 * Diagnostics go to stderr: stdout carries only the JSON document the
 * orchestration tool reads.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  error: (msg: string) => void
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) console.error(msg)
    },
    verbose: (msg: string) => {
      if (verbose) console.error(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (!quiet) console.error(`  ✓ ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    }
  }
}
