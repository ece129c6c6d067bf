import {describe, expect, it} from 'vitest'
import {createGitConfigExec, createScriptedPrompter, createTestContext} from '../test-helpers.js'
import {configureGitIdentity, getGlobalGitConfig} from './git-identity.js'

describe('getGlobalGitConfig', () => {
  it('returns the trimmed value', async () => {
    // #given
    const {adapter} = createGitConfigExec({'user.name': 'Ada Lovelace'})

    // #when
    const value = await getGlobalGitConfig('user.name', adapter)

    // #then
    expect(value).toBe('Ada Lovelace')
    expect(adapter.getExecOutput).toHaveBeenCalledWith('git', ['config', '--global', 'user.name'], {
      ignoreReturnCode: true,
      silent: true,
    })
  })

  it('returns null for an unset key', async () => {
    // #given
    const {adapter} = createGitConfigExec()

    // #when
    const value = await getGlobalGitConfig('user.email', adapter)

    // #then
    expect(value).toBeNull()
  })

  it('returns null for a whitespace-only value', async () => {
    // #given
    const {adapter} = createGitConfigExec({'user.email': '   '})

    // #when
    const value = await getGlobalGitConfig('user.email', adapter)

    // #then
    expect(value).toBeNull()
  })
})

describe('configureGitIdentity', () => {
  it('prompts for and writes missing name and email', async () => {
    // #given
    const git = createGitConfigExec()
    const {prompter, questions} = createScriptedPrompter(['Ada Lovelace', 'ada@example.com'])
    const ctx = createTestContext({exec: git.adapter, prompter})

    // #when
    const identity = await configureGitIdentity(ctx)

    // #then
    expect(identity).toEqual({name: 'Ada Lovelace', email: 'ada@example.com'})
    expect(questions).toEqual(['Enter your full name: ', 'Enter your GitHub email: '])
    expect(git.writes).toEqual([
      ['user.name', 'Ada Lovelace'],
      ['user.email', 'ada@example.com'],
      ['init.defaultBranch', 'main'],
    ])
  })

  it('performs no prompts and no writes when everything is already configured', async () => {
    // #given
    const git = createGitConfigExec({
      'user.name': 'Ada Lovelace',
      'user.email': 'ada@example.com',
      'init.defaultBranch': 'main',
    })
    const {prompter, questions} = createScriptedPrompter()
    const ctx = createTestContext({exec: git.adapter, prompter})

    // #when
    const identity = await configureGitIdentity(ctx)

    // #then
    expect(identity).toEqual({name: 'Ada Lovelace', email: 'ada@example.com'})
    expect(questions).toEqual([])
    expect(git.writes).toEqual([])
    expect(git.adapter.exec).not.toHaveBeenCalled()
  })

  it('only prompts for the missing value', async () => {
    // #given
    const git = createGitConfigExec({'user.name': 'Ada Lovelace'})
    const {prompter, questions} = createScriptedPrompter(['ada@example.com'])
    const ctx = createTestContext({exec: git.adapter, prompter})

    // #when
    await configureGitIdentity(ctx)

    // #then
    expect(questions).toEqual(['Enter your GitHub email: '])
    expect(git.store.get('user.name')).toBe('Ada Lovelace')
    expect(git.store.get('user.email')).toBe('ada@example.com')
  })

  it('forces the default branch when it differs', async () => {
    // #given
    const git = createGitConfigExec({
      'user.name': 'Ada Lovelace',
      'user.email': 'ada@example.com',
      'init.defaultBranch': 'master',
    })
    const ctx = createTestContext({exec: git.adapter})

    // #when
    await configureGitIdentity(ctx)

    // #then
    expect(git.writes).toEqual([['init.defaultBranch', 'main']])
  })

  it('is idempotent across two runs', async () => {
    // #given
    const git = createGitConfigExec()
    const {prompter, questions} = createScriptedPrompter(['Ada Lovelace', 'ada@example.com'])
    const ctx = createTestContext({exec: git.adapter, prompter})
    await configureGitIdentity(ctx)
    const writesAfterFirstRun = git.writes.length

    // #when
    await configureGitIdentity(ctx)

    // #then
    expect(git.writes).toHaveLength(writesAfterFirstRun)
    expect(questions).toHaveLength(2)
  })
})
