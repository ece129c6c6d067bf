import type {Logger} from '../logger.js'
import type {GitIdentity, OperatingSystem, SetupInputs} from '../types.js'

// Re-export Logger for convenience in setup modules
export type {Logger}

/**
 * Adapter for exec operations (for testing)
 */
export interface ExecAdapter {
  readonly exec: (commandLine: string, args?: string[], options?: ExecOptions) => Promise<number>
  readonly getExecOutput: (commandLine: string, args?: string[], options?: ExecOptions) => Promise<ExecOutput>
}

export interface ExecOptions {
  readonly cwd?: string
  readonly env?: Record<string, string>
  readonly silent?: boolean
  readonly ignoreReturnCode?: boolean
}

export interface ExecOutput {
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
}

/**
 * Looks up executables on the search path
 */
export interface CommandLocator {
  readonly exists: (command: string) => Promise<boolean>
}

export interface PromptOptions {
  /** Returned when the answer is blank. */
  readonly defaultValue?: string
  /** Ask again until the answer is non-blank. */
  readonly required?: boolean
}

/**
 * Interactive terminal input
 */
export interface Prompter {
  readonly ask: (question: string, options?: PromptOptions) => Promise<string>
  readonly waitForEnter: (message: string) => Promise<void>
}

/**
 * Plain operator-facing text (banner, public key, checklists)
 */
export interface Output {
  readonly line: (text?: string) => void
}

/**
 * Everything a setup step needs. The detected OS travels here rather than in
 * process-wide state.
 */
export interface SetupContext {
  readonly os: OperatingSystem
  readonly inputs: SetupInputs
  readonly logger: Logger
  readonly output: Output
  readonly exec: ExecAdapter
  readonly commands: CommandLocator
  readonly prompter: Prompter
  /** Environment handed to child processes; the agent step adds its variables here. */
  readonly env: NodeJS.ProcessEnv
  readonly homeDir: string
  readonly cwd: string
  readonly hostname: string
  readonly isRoot: boolean
  readonly now: () => Date
}

export type SetupDependencies = Omit<SetupContext, 'os'> & {
  /** Kernel name as reported by `uname -s` or `os.type()`. */
  readonly platformIdentifier: string
}

/**
 * OS-specific behaviour, selected once from the detected OS.
 */
export interface PlatformStrategy {
  readonly os: OperatingSystem
  readonly installPrerequisites: (ctx: SetupContext) => Promise<void>
  readonly ensureAgent: (ctx: SetupContext, keyPath: string) => Promise<void>
}

export type {GitIdentity}
