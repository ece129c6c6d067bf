import type {CloneResult} from '../types.js'
import type {SetupContext} from './types.js'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import {toExecEnv} from '../../utils/env.js'
import {FatalSetupError} from '../../utils/errors.js'
import {formatRemoteName} from '../../utils/format.js'
import {DEFAULT_CLONE_REPOSITORY, SSH_REMOTE_USER} from '../constants.js'

const NAME_PATTERN = /^[\w.-]+$/

function assertValidName(value: string, label: string): void {
  if (!NAME_PATTERN.test(value) || value === '.' || value === '..') {
    throw new FatalSetupError(`Invalid ${label}: ${value}`)
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory()
  } catch {
    return false
  }
}

export function buildCloneUrl(host: string, owner: string, repository: string): string {
  return `${SSH_REMOTE_USER}@${host}:${owner}/${repository}.git`
}

/**
 * Clone `<owner>/<repository>` over SSH into the working directory, skipping
 * when a directory of that name already exists.
 */
export async function cloneRepository(ctx: SetupContext): Promise<CloneResult> {
  const {logger, prompter} = ctx
  logger.info('Cloning configuration repository...')

  const owner = await prompter.ask(`Enter your ${formatRemoteName(ctx.inputs.remoteHost)} username: `, {
    required: true,
  })
  assertValidName(owner, 'username')
  const repository = await prompter.ask(`Enter repository name (default: ${DEFAULT_CLONE_REPOSITORY}): `, {
    defaultValue: DEFAULT_CLONE_REPOSITORY,
  })
  assertValidName(repository, 'repository name')

  const directory = path.join(ctx.cwd, repository)
  if (await isDirectory(directory)) {
    logger.warning(`Directory ${repository} already exists. Skipping clone.`)
    return {directory, cloned: false}
  }

  await ctx.exec.exec('git', ['clone', buildCloneUrl(ctx.inputs.remoteHost, owner, repository)], {
    cwd: ctx.cwd,
    env: toExecEnv(ctx.env),
  })
  logger.success('Repository cloned successfully')
  return {directory, cloned: true}
}
