import type {CommandLocator, PlatformStrategy, SetupContext} from '../types.js'
import {REQUIRED_PACKAGES} from '../../constants.js'
import {ensureAgentWithKey} from '../ssh-agent.js'

export interface LinuxPackageManager {
  readonly binary: string
  readonly distribution: string
  readonly commands: readonly (readonly string[])[]
}

// Priority order: the first manager found on the search path is used
export const LINUX_PACKAGE_MANAGERS: readonly LinuxPackageManager[] = [
  {
    binary: 'apt-get',
    distribution: 'Debian/Ubuntu',
    commands: [
      ['apt-get', 'update'],
      ['apt-get', 'install', '-y', ...REQUIRED_PACKAGES],
    ],
  },
  {
    binary: 'yum',
    distribution: 'RHEL/CentOS',
    commands: [['yum', 'install', '-y', ...REQUIRED_PACKAGES]],
  },
  {
    binary: 'dnf',
    distribution: 'Fedora',
    commands: [['dnf', 'install', '-y', ...REQUIRED_PACKAGES]],
  },
  {
    binary: 'pacman',
    distribution: 'Arch',
    commands: [['pacman', '-Syu', '--noconfirm', ...REQUIRED_PACKAGES]],
  },
]

export async function findPackageManager(commands: CommandLocator): Promise<LinuxPackageManager | null> {
  for (const manager of LINUX_PACKAGE_MANAGERS) {
    if (await commands.exists(manager.binary)) {
      return manager
    }
  }
  return null
}

/**
 * Prefix a command with sudo unless the process already runs as root.
 */
export function elevate(argv: readonly string[], isRoot: boolean): {command: string; args: string[]} {
  const [command = '', ...args] = argv
  return isRoot ? {command, args} : {command: 'sudo', args: [command, ...args]}
}

async function installPrerequisites(ctx: SetupContext): Promise<void> {
  const manager = await findPackageManager(ctx.commands)
  if (manager == null) {
    ctx.logger.warning('Unsupported Linux package manager. Please install git and curl manually.')
    return
  }

  ctx.logger.info(`Installing required packages (${manager.distribution})...`)
  for (const argv of manager.commands) {
    const {command, args} = elevate(argv, ctx.isRoot)
    await ctx.exec.exec(command, args)
  }
}

export const linuxStrategy: PlatformStrategy = {
  os: 'Linux',
  installPrerequisites,
  ensureAgent: ensureAgentWithKey,
}
