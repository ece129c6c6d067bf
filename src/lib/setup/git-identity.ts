import type {ExecAdapter, GitIdentity, SetupContext} from './types.js'

/**
 * Read a global git setting. Unset and blank values read as null.
 */
export async function getGlobalGitConfig(key: string, execAdapter: ExecAdapter): Promise<string | null> {
  const result = await execAdapter.getExecOutput('git', ['config', '--global', key], {
    ignoreReturnCode: true,
    silent: true,
  })
  const value = result.stdout.trim()
  if (result.exitCode === 0 && value.length > 0) {
    return value
  }
  return null
}

export async function setGlobalGitConfig(key: string, value: string, execAdapter: ExecAdapter): Promise<void> {
  await execAdapter.exec('git', ['config', '--global', key, value], {silent: true})
}

/**
 * Fill in the global git identity and default branch.
 *
 * Existing non-empty values are never overwritten. Empty ones are prompted for
 * and written. The default branch is written only when it differs, so a run
 * against a configured machine performs no prompts and no writes.
 */
export async function configureGitIdentity(ctx: SetupContext): Promise<GitIdentity> {
  const {exec, logger, prompter} = ctx
  logger.info('Configuring Git identity...')

  let name = await getGlobalGitConfig('user.name', exec)
  if (name == null) {
    name = await prompter.ask('Enter your full name: ', {required: true})
    await setGlobalGitConfig('user.name', name, exec)
  } else {
    logger.debug('Git user.name already set', {name})
  }

  let email = await getGlobalGitConfig('user.email', exec)
  if (email == null) {
    email = await prompter.ask('Enter your GitHub email: ', {required: true})
    await setGlobalGitConfig('user.email', email, exec)
  } else {
    logger.debug('Git user.email already set', {email})
  }

  const defaultBranch = ctx.inputs.defaultBranch
  const currentBranch = await getGlobalGitConfig('init.defaultBranch', exec)
  if (currentBranch !== defaultBranch) {
    await setGlobalGitConfig('init.defaultBranch', defaultBranch, exec)
  }

  logger.success('Git identity configured')
  return {name, email}
}
