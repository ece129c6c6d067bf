// Launcher
export const DEFAULT_SCRIPT_URL = 'https://raw.githubusercontent.com/priyangshu-datta/setup-git/main/bundle/setup.mjs'
export const SCRIPT_FILE_MODE = 0o755

// Remote host
export const DEFAULT_REMOTE_HOST = 'github.com'
export const SSH_REMOTE_USER = 'git'
export const SSH_SUCCESS_PHRASE = 'successfully authenticated'

// Git
export const DEFAULT_BRANCH = 'main'
export const DEFAULT_CLONE_REPOSITORY = 'dotfiles'
export const GIT_FOR_WINDOWS_URL = 'https://git-scm.com/download/win'

// SSH
export const SSH_DIR_NAME = '.ssh'
export const SSH_DIR_MODE = 0o700
export const SSH_KEY_TYPE = 'ed25519'
export const SSH_KEY_FILE_NAME = 'id_ed25519'

// Packages installed on every supported Linux distribution
export const REQUIRED_PACKAGES = ['git', 'curl'] as const

// Signals that trigger launcher cleanup, with their conventional numbers
export const CLEANUP_SIGNALS: readonly (readonly [NodeJS.Signals, number])[] = [
  ['SIGHUP', 1],
  ['SIGINT', 2],
  ['SIGTERM', 15],
]
