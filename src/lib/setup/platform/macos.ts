import type {PlatformStrategy, SetupContext} from '../types.js'
import {ensureAgentWithKey} from '../ssh-agent.js'

async function installPrerequisites(ctx: SetupContext): Promise<void> {
  if (await ctx.commands.exists('git')) {
    ctx.logger.debug('git already available')
    return
  }

  ctx.logger.info('Installing Xcode Command Line Tools...')
  const exitCode = await ctx.exec.exec('xcode-select', ['--install'], {ignoreReturnCode: true})
  if (exitCode !== 0) {
    ctx.logger.warning('xcode-select did not start the installer', {exitCode})
  }
  ctx.logger.info('Press Enter when installation completes')
  await ctx.prompter.waitForEnter('')
}

export const macosStrategy: PlatformStrategy = {
  os: 'macOS',
  installPrerequisites,
  ensureAgent: ensureAgentWithKey,
}
