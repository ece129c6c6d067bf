import type {Logger} from '../logger.js'
import type {LauncherInputs} from '../types.js'

/**
 * Fetches a remote script into a local file that must not exist yet
 */
export interface ScriptDownloader {
  readonly download: (url: string, dest: string) => Promise<void>
}

/**
 * Runs a child process attached to the current terminal and resolves with its
 * exit status
 */
export interface ProcessRunner {
  readonly run: (command: string, args: readonly string[]) => Promise<number>
  /** Signal the running child. False when no child is running. */
  readonly kill: (signal: NodeJS.Signals) => boolean
}

/**
 * Process lifecycle hooks. Each subscription returns its own unsubscribe.
 */
export interface ProcessHooks {
  readonly onExit: (listener: () => void) => () => void
  readonly onSignal: (signal: NodeJS.Signals, listener: () => void) => () => void
  readonly exit: (code: number) => void
}

export interface LauncherDependencies {
  readonly inputs: LauncherInputs
  readonly logger: Logger
  readonly downloader: ScriptDownloader
  readonly runner: ProcessRunner
  readonly hooks: ProcessHooks
  readonly tempDir: string
  readonly pid: number
  /** Node executable used for JavaScript scripts. */
  readonly execPath: string
}

export interface ScriptCommand {
  readonly command: string
  readonly args: readonly string[]
}
