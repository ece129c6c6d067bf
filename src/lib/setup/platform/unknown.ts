import type {PlatformStrategy, SetupContext} from '../types.js'

export const unknownStrategy: PlatformStrategy = {
  os: 'Unknown',
  installPrerequisites: async (ctx: SetupContext) => {
    ctx.logger.warning('Unsupported operating system. Please install git and curl manually.')
  },
  ensureAgent: async (ctx: SetupContext) => {
    ctx.logger.warning('Skipping SSH agent setup on an unsupported operating system')
  },
}
