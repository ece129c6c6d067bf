import {describe, expect, it} from 'vitest'
import {DEFAULT_SCRIPT_URL} from './constants.js'
import {parseLauncherInputs, parseSetupInputs} from './inputs.js'

describe('parseLauncherInputs', () => {
  it('uses defaults when nothing is set', () => {
    expect(parseLauncherInputs({})).toEqual({scriptUrl: DEFAULT_SCRIPT_URL, debug: false})
  })

  it('reads an overridden script URL and debug flag', () => {
    // #given
    const env = {GIT_BOOTSTRAP_SCRIPT_URL: 'https://example.test/setup.js', GIT_BOOTSTRAP_DEBUG: 'yes'}

    // #when
    const inputs = parseLauncherInputs(env)

    // #then
    expect(inputs).toEqual({scriptUrl: 'https://example.test/setup.js', debug: true})
  })

  it('treats blank values as unset', () => {
    expect(parseLauncherInputs({GIT_BOOTSTRAP_SCRIPT_URL: '  ', GIT_BOOTSTRAP_DEBUG: ''})).toEqual({
      scriptUrl: DEFAULT_SCRIPT_URL,
      debug: false,
    })
  })

  it('rejects non-http URLs', () => {
    expect(() => parseLauncherInputs({GIT_BOOTSTRAP_SCRIPT_URL: 'ftp://example.test/setup.js'})).toThrow(
      'Invalid configuration: GIT_BOOTSTRAP_SCRIPT_URL must use http or https',
    )
  })

  it('rejects values that are not URLs', () => {
    expect(() => parseLauncherInputs({GIT_BOOTSTRAP_SCRIPT_URL: 'setup.js'})).toThrow(
      'GIT_BOOTSTRAP_SCRIPT_URL must be a valid URL',
    )
  })
})

describe('parseSetupInputs', () => {
  it('uses defaults when nothing is set', () => {
    expect(parseSetupInputs({})).toEqual({
      remoteHost: 'github.com',
      defaultBranch: 'main',
      cloneRepository: false,
      debug: false,
    })
  })

  it('reads every variable', () => {
    // #given
    const env = {
      GIT_BOOTSTRAP_REMOTE_HOST: 'git.example.test',
      GIT_BOOTSTRAP_DEFAULT_BRANCH: 'trunk',
      GIT_BOOTSTRAP_CLONE: 'TRUE',
      GIT_BOOTSTRAP_DEBUG: '0',
    }

    // #when
    const inputs = parseSetupInputs(env)

    // #then
    expect(inputs).toEqual({
      remoteHost: 'git.example.test',
      defaultBranch: 'trunk',
      cloneRepository: true,
      debug: false,
    })
  })

  it('ignores unrelated variables', () => {
    expect(parseSetupInputs({PATH: '/usr/bin', HOME: '/home/tester'}).remoteHost).toBe('github.com')
  })

  it('rejects an unrecognised boolean', () => {
    expect(() => parseSetupInputs({GIT_BOOTSTRAP_CLONE: 'sometimes'})).toThrow(
      'Invalid configuration: GIT_BOOTSTRAP_CLONE must be one of true, false, 1, 0, yes, no',
    )
  })

  it('rejects a host with a user or path', () => {
    expect(() => parseSetupInputs({GIT_BOOTSTRAP_REMOTE_HOST: 'git@github.com'})).toThrow(
      'GIT_BOOTSTRAP_REMOTE_HOST must be a hostname',
    )
  })

  it('reports every invalid variable at once', () => {
    expect(() =>
      parseSetupInputs({GIT_BOOTSTRAP_REMOTE_HOST: 'bad host', GIT_BOOTSTRAP_DEFAULT_BRANCH: '-bad branch'}),
    ).toThrow(
      'Invalid configuration: GIT_BOOTSTRAP_REMOTE_HOST must be a hostname; GIT_BOOTSTRAP_DEFAULT_BRANCH must be a valid branch name',
    )
  })
})
