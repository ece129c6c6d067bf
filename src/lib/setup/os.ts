import type {OperatingSystem} from '../types.js'
import type {Logger} from './types.js'
import {getPlatformIdentifier} from '../../utils/env.js'

// Checked in order; the first pattern contained in the identifier wins
const PLATFORM_PATTERNS: readonly (readonly [pattern: string, os: OperatingSystem])[] = [
  ['linux', 'Linux'],
  ['darwin', 'macOS'],
  ['cygwin', 'Windows'],
  ['mingw32', 'Windows'],
  ['mingw64', 'Windows'],
  ['msys', 'Windows'],
  ['windows_nt', 'Windows'],
]

/**
 * Classify a kernel/platform identifier (`uname -s` output or `os.type()`).
 * Matching is a case-insensitive substring test; anything unmatched is Unknown.
 */
export function classifyPlatform(identifier: string): OperatingSystem {
  const normalized = identifier.trim().toLowerCase()
  if (normalized.length === 0) {
    return 'Unknown'
  }

  for (const [pattern, os] of PLATFORM_PATTERNS) {
    if (normalized.includes(pattern)) {
      return os
    }
  }
  return 'Unknown'
}

export function detectOperatingSystem(logger: Logger, identifier: string = getPlatformIdentifier()): OperatingSystem {
  const os = classifyPlatform(identifier)
  logger.info(`Detected OS: ${os}`)
  logger.debug('Platform identifier', {identifier})
  return os
}
