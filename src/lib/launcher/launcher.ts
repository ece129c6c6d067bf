import type {LauncherInputs} from '../types.js'
import type {LauncherDependencies, ScriptCommand} from './types.js'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import process from 'node:process'
import {toErrorMessage} from '../../utils/errors.js'
import {SCRIPT_FILE_MODE} from '../constants.js'
import {parseLauncherInputs} from '../inputs.js'
import {createLogger} from '../logger.js'
import {createScriptDownloader, isExistingFileError} from './download.js'
import {createProcessHooks, createProcessRunner} from './runner.js'
import {buildTempScriptPath, registerTempScriptCleanup, removeTempScript} from './temp-script.js'

const NODE_SCRIPT_EXTENSIONS = new Set(['.js', '.mjs', '.cjs'])
const NODE_SHEBANG = /^#!.*\bnode\b/

/**
 * JavaScript (by extension or shebang) runs under the current Node executable.
 * Anything else is executed directly and relies on its own shebang.
 */
export async function resolveScriptCommand(scriptPath: string, execPath: string): Promise<ScriptCommand> {
  if (NODE_SCRIPT_EXTENSIONS.has(path.extname(scriptPath).toLowerCase())) {
    return {command: execPath, args: [scriptPath]}
  }

  const contents = await fs.readFile(scriptPath, 'utf8')
  const firstLine = contents.split('\n', 1)[0] ?? ''
  if (NODE_SHEBANG.test(firstLine)) {
    return {command: execPath, args: [scriptPath]}
  }
  return {command: scriptPath, args: []}
}

/**
 * Download the setup script, run it attached to the terminal and forward its
 * exit status. The temporary file is removed on every exit path, unless it
 * already existed before the download. Interrupts are passed to a running
 * child, whose exit then ends the launcher.
 */
export async function runLauncher(deps: LauncherDependencies): Promise<number> {
  const {inputs, logger, hooks} = deps
  const scriptPath = buildTempScriptPath(deps.tempDir, inputs.scriptUrl, deps.pid)
  let owned = true
  const cleanup = registerTempScriptCleanup(scriptPath, hooks, logger, {
    isOwned: () => owned,
    forwardSignal: signal => deps.runner.kill(signal),
  })

  logger.debug('Launcher starting', {scriptUrl: inputs.scriptUrl, scriptPath})

  try {
    logger.info('Downloading setup script...')
    try {
      await deps.downloader.download(inputs.scriptUrl, scriptPath)
    } catch (error) {
      owned = !isExistingFileError(error)
      logger.error(`Failed to download script from ${inputs.scriptUrl}`, {error: toErrorMessage(error)})
      return 1
    }

    logger.info('Making script executable...')
    await fs.chmod(scriptPath, SCRIPT_FILE_MODE)

    const {command, args} = await resolveScriptCommand(scriptPath, deps.execPath)
    logger.success('Running setup...')
    const exitCode = await deps.runner.run(command, args)

    if (exitCode === 0) {
      logger.success('Setup completed!')
    } else {
      logger.error(`Setup exited with status ${exitCode}`)
    }
    return exitCode
  } catch (error) {
    logger.error('Launcher failed', {error: toErrorMessage(error)})
    return 1
  } finally {
    if (owned) {
      removeTempScript(scriptPath, logger)
    }
    cleanup.dispose()
  }
}

export function createLauncherDependencies(inputs: LauncherInputs): LauncherDependencies {
  return {
    inputs,
    logger: createLogger({component: 'launcher'}, {debug: inputs.debug}),
    downloader: createScriptDownloader(),
    runner: createProcessRunner(),
    hooks: createProcessHooks(),
    tempDir: os.tmpdir(),
    pid: process.pid,
    execPath: process.execPath,
  }
}

/**
 * Entry point used by the launcher bin.
 */
export async function runLauncherCli(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let inputs: LauncherInputs
  try {
    inputs = parseLauncherInputs(env)
  } catch (error) {
    createLogger({component: 'launcher'}).error(toErrorMessage(error))
    return 1
  }

  return runLauncher(createLauncherDependencies(inputs))
}
