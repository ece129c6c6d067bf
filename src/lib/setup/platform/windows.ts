import type {PlatformStrategy, SetupContext} from '../types.js'
import {FatalSetupError} from '../../../utils/errors.js'
import {GIT_FOR_WINDOWS_URL} from '../../constants.js'
import {ensureAgentIfMissing} from '../ssh-agent.js'

// No package manager is driven on Windows; git must already be installed
async function installPrerequisites(ctx: SetupContext): Promise<void> {
  if (!(await ctx.commands.exists('git'))) {
    throw new FatalSetupError('Git not found. Please install Git for Windows:', [GIT_FOR_WINDOWS_URL])
  }
  ctx.logger.debug('git already available')
}

export const windowsStrategy: PlatformStrategy = {
  os: 'Windows',
  installPrerequisites,
  ensureAgent: ensureAgentIfMissing,
}
