import type {CommandLocator, ExecAdapter, Output} from './setup/types.js'
import * as core from '@actions/core'
import * as exec from '@actions/exec'
import * as io from '@actions/io'

/**
 * Create exec adapter from @actions/exec
 */
export function createExecAdapter(): ExecAdapter {
  return {
    exec: exec.exec,
    getExecOutput: exec.getExecOutput,
  }
}

/**
 * Create command locator from @actions/io
 */
export function createCommandLocator(): CommandLocator {
  return {
    exists: async (command: string) => (await io.which(command, false)).length > 0,
  }
}

export function createConsoleOutput(): Output {
  return {
    line: (text?: string) => core.info(text ?? ''),
  }
}
