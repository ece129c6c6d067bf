export {cloneRepository} from './clone.js'
export {classifyConnectionOutput, verifyConnection} from './connection.js'
export {configureGitIdentity} from './git-identity.js'
export {classifyPlatform, detectOperatingSystem} from './os.js'
export {selectPlatformStrategy} from './platform/index.js'
export {createPrompter, createTerminalPrompter} from './prompter.js'
export {createSetupDependencies, runSetup, runSetupCli} from './setup.js'
export {ensureSshKey, setupSshKey} from './ssh-key.js'
export type {
  CommandLocator,
  ExecAdapter,
  ExecOptions,
  ExecOutput,
  Output,
  PlatformStrategy,
  Prompter,
  PromptOptions,
  SetupContext,
  SetupDependencies,
} from './types.js'
