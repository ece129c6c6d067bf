import type {SshKeyResult} from '../types.js'
import type {GitIdentity, PlatformStrategy, SetupContext} from './types.js'
import * as fs from 'node:fs/promises'
import {getSshDir, getSshKeyPath} from '../../utils/env.js'
import {formatDateStamp, formatRemoteName} from '../../utils/format.js'
import {SSH_DIR_MODE, SSH_KEY_TYPE} from '../constants.js'

const RULE = '-'.repeat(50)

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target)
    return true
  } catch {
    return false
  }
}

/**
 * Create the SSH directory if needed and restrict it to the owner.
 */
export async function ensureSshDirectory(sshDir: string): Promise<void> {
  await fs.mkdir(sshDir, {recursive: true, mode: SSH_DIR_MODE})
  await fs.chmod(sshDir, SSH_DIR_MODE)
}

/**
 * Generate `~/.ssh/id_ed25519` unless it already exists. Existing keys are
 * never regenerated or overwritten.
 */
export async function ensureSshKey(ctx: SetupContext, identity: GitIdentity): Promise<SshKeyResult> {
  const {logger} = ctx
  const keyPath = getSshKeyPath(ctx.homeDir)
  const publicKeyPath = `${keyPath}.pub`

  logger.info('Setting up SSH keys...')
  await ensureSshDirectory(getSshDir(ctx.homeDir))

  if (await pathExists(keyPath)) {
    logger.info('SSH key already exists')
    return {keyPath, publicKeyPath, generated: false}
  }

  logger.info('Generating new SSH key...')
  const comment = await ctx.prompter.ask('Enter email for SSH key (press Enter to use Git email): ', {
    defaultValue: identity.email,
  })
  await ctx.exec.exec('ssh-keygen', ['-t', SSH_KEY_TYPE, '-C', comment, '-f', keyPath, '-N', '', '-q'])
  logger.success('SSH key generated')
  return {keyPath, publicKeyPath, generated: true}
}

export function buildKeyTitle(hostname: string, date: Date): string {
  return `${hostname}-${formatDateStamp(date)}`
}

/**
 * Print the public key with registration instructions and block until the
 * operator confirms it has been added to the remote host.
 */
export async function presentPublicKey(ctx: SetupContext, publicKeyPath: string): Promise<void> {
  const {logger, output} = ctx
  const host = ctx.inputs.remoteHost
  const remoteName = formatRemoteName(host)
  const publicKey = (await fs.readFile(publicKeyPath, 'utf8')).trim()

  logger.info('Your public key:')
  output.line(RULE)
  output.line(publicKey)
  output.line(RULE)

  logger.success('SSH key setup complete')
  output.line()
  logger.warning('ACTION REQUIRED:')
  output.line('1. Copy the public key above')
  output.line(`2. Add it to your ${remoteName} account:`)
  output.line(`   https://${host}/settings/ssh/new`)
  output.line(`3. Title: ${buildKeyTitle(ctx.hostname, ctx.now())}`)
  output.line()
  await ctx.prompter.waitForEnter(`Press Enter after adding the key to ${remoteName}...`)
}

export async function setupSshKey(
  ctx: SetupContext,
  strategy: PlatformStrategy,
  identity: GitIdentity,
): Promise<SshKeyResult> {
  const key = await ensureSshKey(ctx, identity)
  await strategy.ensureAgent(ctx, key.keyPath)
  await presentPublicKey(ctx, key.publicKeyPath)
  return key
}
