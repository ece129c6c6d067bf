import * as os from 'node:os'
import * as path from 'node:path'
import process from 'node:process'

import {SSH_DIR_NAME, SSH_KEY_FILE_NAME} from '../lib/constants.js'

export function getHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME ?? env.USERPROFILE
  if (home != null && home.trim().length > 0) {
    return home
  }
  return os.homedir()
}

export function getSshDir(homeDir: string): string {
  return path.join(homeDir, SSH_DIR_NAME)
}

export function getSshKeyPath(homeDir: string): string {
  return path.join(getSshDir(homeDir), SSH_KEY_FILE_NAME)
}

/**
 * Kernel name as `uname -s` would report it. Node reports `Windows_NT` under
 * Git Bash and MSYS, which the detector maps to Windows.
 */
export function getPlatformIdentifier(): string {
  return os.type()
}

export function isRootUser(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0
}

/**
 * Environment for a child process, without unset entries.
 */
export function toExecEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value != null) {
      result[key] = value
    }
  }
  return result
}
