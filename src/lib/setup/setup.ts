import type {CloneResult, ConnectionStatus, GitIdentity, OperatingSystem, SetupInputs, SetupResult, SshKeyResult} from '../types.js'
import type {Logger, SetupContext, SetupDependencies} from './types.js'
import * as os from 'node:os'
import process from 'node:process'
import {getHomeDir, getPlatformIdentifier, isRootUser} from '../../utils/env.js'
import {isFatalSetupError, toErrorMessage} from '../../utils/errors.js'
import {formatRemoteName} from '../../utils/format.js'
import {createCommandLocator, createConsoleOutput, createExecAdapter} from '../adapters.js'
import {parseSetupInputs} from '../inputs.js'
import {createLogger} from '../logger.js'
import {cloneRepository} from './clone.js'
import {verifyConnection} from './connection.js'
import {configureGitIdentity} from './git-identity.js'
import {detectOperatingSystem} from './os.js'
import {selectPlatformStrategy} from './platform/index.js'
import {createTerminalPrompter} from './prompter.js'
import {setupSshKey} from './ssh-key.js'

const BANNER_RULE = '='.repeat(34)

/**
 * Wire the production collaborators: @actions/exec for child processes,
 * @actions/io for PATH lookups, readline for prompts.
 */
export function createSetupDependencies(inputs: SetupInputs, logger: Logger): SetupDependencies {
  return {
    platformIdentifier: getPlatformIdentifier(),
    inputs,
    logger,
    output: createConsoleOutput(),
    exec: createExecAdapter(),
    commands: createCommandLocator(),
    prompter: createTerminalPrompter(),
    env: process.env,
    homeDir: getHomeDir(),
    cwd: process.cwd(),
    hostname: os.hostname(),
    isRoot: isRootUser(),
    now: () => new Date(),
  }
}

/**
 * Run the setup procedure.
 *
 * Steps run strictly in order and stop at the first failure:
 * 1. Detect the operating system and select its strategy
 * 2. Install git and curl
 * 3. Configure the global git identity
 * 4. Generate the SSH key, load it into an agent, show it to the operator
 * 5. Verify SSH authentication against the remote host
 * 6. Clone a repository (only when enabled)
 */
export async function runSetup(deps: SetupDependencies): Promise<SetupResult> {
  const startTime = Date.now()
  const {platformIdentifier, ...collaborators} = deps
  const {logger, output} = deps
  const remoteName = formatRemoteName(deps.inputs.remoteHost)

  let detectedOs: OperatingSystem | null = null
  let identity: GitIdentity | null = null
  let sshKey: SshKeyResult | null = null
  let connection: ConnectionStatus | null = null
  let clone: CloneResult | null = null

  const finish = (exitCode: number): SetupResult => ({
    exitCode,
    os: detectedOs,
    identity,
    sshKey,
    connection,
    clone,
    duration: Date.now() - startTime,
  })

  output.line(BANNER_RULE)
  output.line(`   ${remoteName} Setup Script`)
  output.line(BANNER_RULE)

  try {
    detectedOs = detectOperatingSystem(logger, platformIdentifier)
    const ctx: SetupContext = {...collaborators, os: detectedOs}
    const strategy = selectPlatformStrategy(detectedOs)

    await strategy.installPrerequisites(ctx)
    identity = await configureGitIdentity(ctx)
    sshKey = await setupSshKey(ctx, strategy, identity)
    connection = await verifyConnection(ctx)
    if (ctx.inputs.cloneRepository) {
      clone = await cloneRepository(ctx)
    }

    output.line()
    logger.success(`${remoteName} setup completed!`)
    output.line('Next steps:')
    output.line('- Configure your dotfiles repository')
    output.line('- Run any additional setup scripts from your repo')

    const result = finish(0)
    logger.debug('Setup finished', {duration: result.duration, keyGenerated: sshKey.generated})
    return result
  } catch (error) {
    if (isFatalSetupError(error)) {
      logger.error(error.message)
      for (const line of error.remediation) {
        output.line(line)
      }
    } else {
      logger.error('Setup failed', {error: toErrorMessage(error)})
    }
    return finish(1)
  }
}

/**
 * Entry point used by the setup bin: parse configuration, wire collaborators,
 * run, and report the exit status.
 */
export async function runSetupCli(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let inputs: SetupInputs
  try {
    inputs = parseSetupInputs(env)
  } catch (error) {
    createLogger({component: 'setup'}).error(toErrorMessage(error))
    return 1
  }

  const logger = createLogger({component: 'setup'}, {debug: inputs.debug})
  const result = await runSetup(createSetupDependencies(inputs, logger))
  return result.exitCode
}
