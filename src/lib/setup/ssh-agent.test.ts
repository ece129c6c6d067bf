import type {ExecOutput} from './types.js'
import {describe, expect, it, vi} from 'vitest'
import {createMockExecAdapter, createTestContext} from '../test-helpers.js'
import {ensureAgentIfMissing, ensureAgentWithKey, parseAgentOutput, probeAgent} from './ssh-agent.js'

const AGENT_OUTPUT = [
  'SSH_AUTH_SOCK=/tmp/ssh-abc123/agent.4242; export SSH_AUTH_SOCK;',
  'SSH_AGENT_PID=4243; export SSH_AGENT_PID;',
  'echo Agent pid 4243;',
].join('\n')

function createAgentExec(sshAddListExitCode: number) {
  const getExecOutput = vi.fn(async (command: string, args: string[] = []): Promise<ExecOutput> => {
    if (command === 'ssh-add' && args[0] === '-l') {
      return {exitCode: sshAddListExitCode, stdout: '', stderr: ''}
    }
    if (command === 'ssh-agent') {
      return {exitCode: 0, stdout: AGENT_OUTPUT, stderr: ''}
    }
    return {exitCode: 0, stdout: '', stderr: ''}
  })
  return createMockExecAdapter({getExecOutput})
}

describe('parseAgentOutput', () => {
  it('extracts socket and pid', () => {
    // #when
    const result = parseAgentOutput(AGENT_OUTPUT)

    // #then
    expect(result).toEqual({SSH_AUTH_SOCK: '/tmp/ssh-abc123/agent.4242', SSH_AGENT_PID: '4243'})
  })

  it('returns an empty environment for unrelated output', () => {
    expect(parseAgentOutput('Could not open a connection to your authentication agent.')).toEqual({})
  })
})

describe('probeAgent', () => {
  it.each([
    [0, 'has-identities'],
    [1, 'no-identities'],
    [2, 'unreachable'],
  ] as const)('maps ssh-add -l exit code %i to %s', async (exitCode, expected) => {
    // #given
    const ctx = createTestContext({exec: createAgentExec(exitCode)})

    // #when
    const status = await probeAgent(ctx)

    // #then
    expect(status).toBe(expected)
  })
})

describe('ensureAgentWithKey', () => {
  it('starts an agent when none is reachable and exports its variables', async () => {
    // #given
    const exec = createAgentExec(2)
    const env: NodeJS.ProcessEnv = {PATH: '/usr/bin'}
    const ctx = createTestContext({exec, env})

    // #when
    await ensureAgentWithKey(ctx, '/home/tester/.ssh/id_ed25519')

    // #then
    expect(env.SSH_AUTH_SOCK).toBe('/tmp/ssh-abc123/agent.4242')
    expect(env.SSH_AGENT_PID).toBe('4243')
    expect(exec.exec).toHaveBeenCalledWith('ssh-add', ['/home/tester/.ssh/id_ed25519'], {
      ignoreReturnCode: true,
      silent: true,
      env: {PATH: '/usr/bin', SSH_AUTH_SOCK: '/tmp/ssh-abc123/agent.4242', SSH_AGENT_PID: '4243'},
    })
  })

  it('reuses a reachable agent and still adds the key', async () => {
    // #given
    const exec = createAgentExec(1)
    const ctx = createTestContext({exec})

    // #when
    await ensureAgentWithKey(ctx, '/home/tester/.ssh/id_ed25519')

    // #then
    expect(exec.getExecOutput).not.toHaveBeenCalledWith('ssh-agent', ['-s'], expect.anything())
    expect(exec.exec).toHaveBeenCalledWith('ssh-add', ['/home/tester/.ssh/id_ed25519'], expect.anything())
  })

  it('warns when the key cannot be added', async () => {
    // #given
    const exec = createAgentExec(1)
    vi.mocked(exec.exec).mockResolvedValue(1)
    const ctx = createTestContext({exec})

    // #when
    await ensureAgentWithKey(ctx, '/home/tester/.ssh/id_ed25519')

    // #then
    expect(ctx.logger.warning).toHaveBeenCalledWith('Could not add SSH key to the agent', {
      identityFile: '/home/tester/.ssh/id_ed25519',
      exitCode: 1,
    })
  })

  it('fails when ssh-agent reports no socket', async () => {
    // #given
    const exec = createMockExecAdapter({
      getExecOutput: vi.fn(async (command: string) =>
        command === 'ssh-agent' ? {exitCode: 0, stdout: '', stderr: ''} : {exitCode: 2, stdout: '', stderr: ''},
      ),
    })
    const ctx = createTestContext({exec})

    // #when / #then
    await expect(ensureAgentWithKey(ctx, '/home/tester/.ssh/id_ed25519')).rejects.toThrow(
      'ssh-agent did not report SSH_AUTH_SOCK',
    )
  })
})

describe('ensureAgentIfMissing', () => {
  it('does nothing when the agent already holds keys', async () => {
    // #given
    const exec = createAgentExec(0)
    const ctx = createTestContext({os: 'Windows', exec})

    // #when
    await ensureAgentIfMissing(ctx, 'C:/Users/tester/.ssh/id_ed25519')

    // #then
    expect(exec.exec).not.toHaveBeenCalled()
    expect(exec.getExecOutput).toHaveBeenCalledTimes(1)
  })

  it('adds the key to a reachable agent that holds none, without starting another', async () => {
    // #given
    const exec = createAgentExec(1)
    const ctx = createTestContext({os: 'Windows', exec})

    // #when
    await ensureAgentIfMissing(ctx, 'C:/Users/tester/.ssh/id_ed25519')

    // #then
    expect(exec.getExecOutput).not.toHaveBeenCalledWith('ssh-agent', expect.anything(), expect.anything())
    expect(exec.exec).toHaveBeenCalledWith('ssh-add', ['C:/Users/tester/.ssh/id_ed25519'], expect.anything())
    expect(ctx.env).toEqual({})
  })

  it('starts an agent and adds the key when none is reachable', async () => {
    // #given
    const exec = createAgentExec(2)
    const ctx = createTestContext({os: 'Windows', exec})

    // #when
    await ensureAgentIfMissing(ctx, 'C:/Users/tester/.ssh/id_ed25519')

    // #then
    expect(exec.getExecOutput).toHaveBeenCalledWith('ssh-agent', ['-s'], expect.anything())
    expect(exec.exec).toHaveBeenCalledWith('ssh-add', ['C:/Users/tester/.ssh/id_ed25519'], expect.anything())
  })
})
