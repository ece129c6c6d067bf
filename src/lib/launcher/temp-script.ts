import type {Logger} from '../logger.js'
import type {ProcessHooks} from './types.js'
import {existsSync, rmSync} from 'node:fs'
import * as path from 'node:path'
import {CLEANUP_SIGNALS} from '../constants.js'

const FALLBACK_SCRIPT_NAME = 'setup'

// Malformed percent-encoding keeps the raw segment
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    return segment
  }
}

/**
 * `<tempDir>/<stem>.<pid><ext>`, named after the last URL path segment so the
 * extension survives and the path is unique to this process.
 */
export function buildTempScriptPath(tempDir: string, scriptUrl: string, pid: number): string {
  const segment = path.posix.basename(new URL(scriptUrl).pathname)
  const name = segment.length > 0 ? decodeSegment(segment).replaceAll(/[^\w.-]/g, '_') : FALLBACK_SCRIPT_NAME
  const ext = path.extname(name)
  const stem = ext.length > 0 ? name.slice(0, -ext.length) : name
  return path.join(tempDir, `${stem.length > 0 ? stem : FALLBACK_SCRIPT_NAME}.${pid}${ext}`)
}

/**
 * Synchronous so it can run inside `exit` and signal handlers.
 */
export function removeTempScript(scriptPath: string, logger: Logger): boolean {
  if (!existsSync(scriptPath)) {
    return false
  }
  rmSync(scriptPath, {force: true})
  logger.info('Temporary script cleaned up')
  return true
}

export interface CleanupRegistration {
  readonly dispose: () => void
}

export interface CleanupOptions {
  /** Whether this process created the file. Files it did not create are left alone. */
  readonly isOwned?: () => boolean
  /**
   * Hand the signal to a running child. Returns true when one received it; the
   * launcher then unwinds once the child closes.
   */
  readonly forwardSignal?: (signal: NodeJS.Signals) => boolean
}

/**
 * Remove the script when the process exits or is interrupted. Without a child
 * to forward to, signal handlers terminate with the conventional
 * `128 + signal number` status.
 */
export function registerTempScriptCleanup(
  scriptPath: string,
  hooks: ProcessHooks,
  logger: Logger,
  options: CleanupOptions = {},
): CleanupRegistration {
  const isOwned = options.isOwned ?? (() => true)
  const forwardSignal = options.forwardSignal ?? (() => false)
  const removeIfOwned = () => {
    if (isOwned()) {
      removeTempScript(scriptPath, logger)
    }
  }

  const unsubscribers = [hooks.onExit(removeIfOwned)]

  for (const [signal, signalNumber] of CLEANUP_SIGNALS) {
    unsubscribers.push(
      hooks.onSignal(signal, () => {
        logger.warning(`Interrupted by ${signal}`)
        if (forwardSignal(signal)) {
          return
        }
        removeIfOwned()
        hooks.exit(128 + signalNumber)
      }),
    )
  }

  return {
    dispose: () => {
      for (const unsubscribe of unsubscribers) {
        unsubscribe()
      }
    },
  }
}
