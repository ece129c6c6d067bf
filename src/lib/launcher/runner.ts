import type {ChildProcess} from 'node:child_process'
import type {ProcessHooks, ProcessRunner} from './types.js'
import {spawn} from 'node:child_process'
import * as os from 'node:os'
import process from 'node:process'

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals))

export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (signal == null) {
    return 1
  }
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0)
}

/**
 * Spawn with stdio inherited so the child owns the terminal for its prompts.
 */
export function createProcessRunner(): ProcessRunner {
  let active: ChildProcess | null = null

  return {
    run: async (command: string, args: readonly string[]) =>
      new Promise<number>((resolve, reject) => {
        const child = spawn(command, [...args], {stdio: 'inherit'})
        active = child
        child.once('error', error => {
          active = null
          reject(error)
        })
        child.once('close', (code, signal) => {
          active = null
          resolve(code ?? signalExitCode(signal))
        })
      }),
    kill: signal => active != null && active.kill(signal),
  }
}

export function createProcessHooks(): ProcessHooks {
  return {
    onExit: listener => {
      process.on('exit', listener)
      return () => {
        process.off('exit', listener)
      }
    },
    onSignal: (signal, listener) => {
      process.on(signal, listener)
      return () => {
        process.off(signal, listener)
      }
    },
    exit: code => {
      process.exit(code)
    },
  }
}
