import type {ProcessHooks} from './launcher/types.js'
import type {Logger} from './logger.js'
import type {CommandLocator, ExecAdapter, ExecOutput, Output, SetupContext} from './setup/types.js'
import type {SetupInputs} from './types.js'
import {EventEmitter} from 'node:events'
import {vi} from 'vitest'
import {createPrompter} from './setup/prompter.js'

/**
 * Mock logger for tests. All methods are vi.fn() spies.
 */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
  }
}

export function createMockExecAdapter(overrides: Partial<ExecAdapter> = {}): ExecAdapter {
  return {
    exec: vi.fn().mockResolvedValue(0),
    getExecOutput: vi.fn().mockResolvedValue({exitCode: 0, stdout: '', stderr: ''}),
    ...overrides,
  }
}

/**
 * Output that records every line it is given.
 */
export function createRecordingOutput(): Output & {readonly lines: string[]} {
  const lines: string[] = []
  return {
    lines,
    line: vi.fn((text?: string) => {
      lines.push(text ?? '')
    }),
  }
}

export function createMockCommandLocator(available: readonly string[] = []): CommandLocator {
  return {
    exists: vi.fn(async (command: string) => available.includes(command)),
  }
}

/**
 * Prompter that answers from a fixed script and records every question asked.
 * Running out of answers fails the test.
 */
export function createScriptedPrompter(answers: readonly string[] = []) {
  const remaining = [...answers]
  const questions: string[] = []
  const prompter = createPrompter(async (question: string) => {
    questions.push(question)
    const answer = remaining.shift()
    if (answer == null) {
      throw new Error(`Unexpected prompt: ${question}`)
    }
    return answer
  })
  return {prompter, questions}
}

export const DEFAULT_TEST_INPUTS: SetupInputs = {
  remoteHost: 'github.com',
  defaultBranch: 'main',
  cloneRepository: false,
  debug: false,
}

export function createTestContext(overrides: Partial<SetupContext> = {}): SetupContext {
  return {
    os: 'Linux',
    inputs: DEFAULT_TEST_INPUTS,
    logger: createMockLogger(),
    output: createRecordingOutput(),
    exec: createMockExecAdapter(),
    commands: createMockCommandLocator(),
    prompter: createScriptedPrompter().prompter,
    env: {},
    homeDir: '/home/tester',
    cwd: '/home/tester/work',
    hostname: 'workstation',
    isRoot: false,
    now: () => new Date(2026, 2, 14, 9, 30),
    ...overrides,
  }
}

/**
 * Fake `git config --global` store backed by a Map. Reads of unset keys exit 1
 * with empty output, like git.
 */
export function createGitConfigExec(initial: Record<string, string> = {}) {
  const store = new Map<string, string>(Object.entries(initial))
  const writes: [string, string][] = []

  const getExecOutput = vi.fn(async (command: string, args: string[] = []): Promise<ExecOutput> => {
    if (command === 'git' && args[0] === 'config' && args[1] === '--global' && args.length === 3) {
      const value = store.get(args[2] ?? '')
      return value == null ? {exitCode: 1, stdout: '', stderr: ''} : {exitCode: 0, stdout: `${value}\n`, stderr: ''}
    }
    return {exitCode: 0, stdout: '', stderr: ''}
  })

  const exec = vi.fn(async (command: string, args: string[] = []): Promise<number> => {
    if (command === 'git' && args[0] === 'config' && args[1] === '--global' && args.length === 4) {
      const key = args[2] ?? ''
      const value = args[3] ?? ''
      store.set(key, value)
      writes.push([key, value])
    }
    return 0
  })

  return {adapter: {exec, getExecOutput} satisfies ExecAdapter, store, writes}
}

/**
 * Process hooks backed by a local emitter. `emit('SIGINT')` simulates a signal
 * and `exitCodes` records every requested exit.
 */
export function createFakeProcessHooks() {
  const emitter = new EventEmitter()
  const exitCodes: number[] = []

  const subscribe = (event: string, listener: () => void) => {
    emitter.on(event, listener)
    return () => {
      emitter.off(event, listener)
    }
  }

  const hooks: ProcessHooks = {
    onExit: listener => subscribe('exit', listener),
    onSignal: (signal, listener) => subscribe(signal, listener),
    exit: (code: number) => {
      exitCodes.push(code)
    },
  }

  return {
    hooks,
    exitCodes,
    emit: (event: string) => emitter.emit(event),
    listenerCount: (event: string) => emitter.listenerCount(event),
  }
}
