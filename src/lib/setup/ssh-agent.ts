import type {SetupContext} from './types.js'
import {toExecEnv} from '../../utils/env.js'

export type AgentStatus = 'has-identities' | 'no-identities' | 'unreachable'

export interface AgentEnvironment {
  readonly SSH_AUTH_SOCK?: string
  readonly SSH_AGENT_PID?: string
}

const AGENT_VARIABLE_PATTERN = /^(SSH_AUTH_SOCK|SSH_AGENT_PID)=([^;\n]+);/gm

/**
 * Parse the Bourne-shell output of `ssh-agent -s`.
 */
export function parseAgentOutput(stdout: string): AgentEnvironment {
  let socket: string | undefined
  let pid: string | undefined
  for (const match of stdout.matchAll(AGENT_VARIABLE_PATTERN)) {
    if (match[1] === 'SSH_AUTH_SOCK') {
      socket = match[2]
    } else {
      pid = match[2]
    }
  }
  return {
    ...(socket == null ? {} : {SSH_AUTH_SOCK: socket}),
    ...(pid == null ? {} : {SSH_AGENT_PID: pid}),
  }
}

/**
 * `ssh-add -l` exits 0 when keys are loaded, 1 when the agent holds none and
 * 2 when no agent can be contacted.
 */
export async function probeAgent(ctx: SetupContext): Promise<AgentStatus> {
  const {exitCode} = await ctx.exec.getExecOutput('ssh-add', ['-l'], {
    ignoreReturnCode: true,
    silent: true,
    env: toExecEnv(ctx.env),
  })
  if (exitCode === 0) {
    return 'has-identities'
  }
  return exitCode === 1 ? 'no-identities' : 'unreachable'
}

/**
 * Start an agent and export its socket and pid to later child processes.
 */
export async function startAgent(ctx: SetupContext): Promise<AgentEnvironment> {
  const {stdout} = await ctx.exec.getExecOutput('ssh-agent', ['-s'], {silent: true, env: toExecEnv(ctx.env)})
  const agentEnv = parseAgentOutput(stdout)
  if (agentEnv.SSH_AUTH_SOCK == null) {
    throw new Error('ssh-agent did not report SSH_AUTH_SOCK')
  }

  ctx.env.SSH_AUTH_SOCK = agentEnv.SSH_AUTH_SOCK
  if (agentEnv.SSH_AGENT_PID != null) {
    ctx.env.SSH_AGENT_PID = agentEnv.SSH_AGENT_PID
  }
  ctx.logger.info('Started SSH agent', {pid: agentEnv.SSH_AGENT_PID})
  return agentEnv
}

export async function addKeyToAgent(ctx: SetupContext, keyPath: string): Promise<boolean> {
  const exitCode = await ctx.exec.exec('ssh-add', [keyPath], {
    ignoreReturnCode: true,
    silent: true,
    env: toExecEnv(ctx.env),
  })
  if (exitCode !== 0) {
    ctx.logger.warning('Could not add SSH key to the agent', {identityFile: keyPath, exitCode})
    return false
  }
  ctx.logger.debug('SSH key added to agent', {identityFile: keyPath})
  return true
}

/**
 * Linux and macOS: reuse a reachable agent or start one, then load the key.
 */
export async function ensureAgentWithKey(ctx: SetupContext, keyPath: string): Promise<void> {
  const status = await probeAgent(ctx)
  if (status === 'unreachable') {
    await startAgent(ctx)
  } else {
    ctx.logger.debug('Reusing running SSH agent', {status})
  }
  await addKeyToAgent(ctx, keyPath)
}

/**
 * Windows: leave an agent that already holds keys alone (Git Bash shares the
 * Windows OpenSSH agent). Otherwise load the key, starting an agent first when
 * none is reachable.
 */
export async function ensureAgentIfMissing(ctx: SetupContext, keyPath: string): Promise<void> {
  const status = await probeAgent(ctx)
  if (status === 'has-identities') {
    ctx.logger.info('SSH agent already running with keys loaded')
    return
  }
  if (status === 'unreachable') {
    await startAgent(ctx)
  }
  await addKeyToAgent(ctx, keyPath)
}
