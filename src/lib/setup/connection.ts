import type {ConnectionStatus} from '../types.js'
import type {SetupContext} from './types.js'
import {toExecEnv} from '../../utils/env.js'
import {FatalSetupError} from '../../utils/errors.js'
import {formatRemoteName} from '../../utils/format.js'
import {SSH_REMOTE_USER, SSH_SUCCESS_PHRASE} from '../constants.js'

const REJECTED_PATTERN = /permission denied/i
const UNREACHABLE_PATTERN =
  /could not resolve hostname|connection timed out|operation timed out|connection refused|network is unreachable|no route to host|connection closed by|connection reset by/i

/**
 * Classify the combined output of `ssh -T`. Success is recognised only by the
 * host's greeting; everything else is a failure of some kind.
 */
export function classifyConnectionOutput(output: string): ConnectionStatus {
  if (output.toLowerCase().includes(SSH_SUCCESS_PHRASE)) {
    return 'authenticated'
  }
  if (REJECTED_PATTERN.test(output)) {
    return 'rejected'
  }
  if (UNREACHABLE_PATTERN.test(output)) {
    return 'unreachable'
  }
  return 'unknown'
}

export function buildSshTestArgs(host: string): string[] {
  return ['-T', '-o', 'StrictHostKeyChecking=accept-new', `${SSH_REMOTE_USER}@${host}`]
}

/**
 * Authenticate against the remote host with the configured key. Any outcome
 * other than a successful greeting ends the procedure; there is no retry.
 */
export async function verifyConnection(ctx: SetupContext): Promise<ConnectionStatus> {
  const host = ctx.inputs.remoteHost
  const remoteName = formatRemoteName(host)
  ctx.logger.info(`Testing ${remoteName} connection...`)

  const result = await ctx.exec.getExecOutput('ssh', buildSshTestArgs(host), {
    ignoreReturnCode: true,
    silent: true,
    env: toExecEnv(ctx.env),
  })
  const status = classifyConnectionOutput(`${result.stdout}\n${result.stderr}`)
  ctx.logger.debug('SSH connection test finished', {status, exitCode: result.exitCode})

  switch (status) {
    case 'authenticated':
      ctx.logger.success(`SSH connection to ${remoteName} verified!`)
      return status
    case 'unreachable':
      throw new FatalSetupError(`Could not reach ${host} over SSH. Please verify:`, [
        '1. Network connection is up',
        `2. ${host} resolves and port 22 is not blocked`,
        '3. Proxy or firewall settings allow outgoing SSH',
      ])
    case 'rejected':
    case 'unknown':
      throw new FatalSetupError('SSH connection failed. Please verify:', [
        `1. Key added to ${remoteName}`,
        '2. SSH agent running',
        '3. Key added to agent (ssh-add -l)',
      ])
  }
}
