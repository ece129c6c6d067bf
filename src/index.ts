// Public API - lib exports
export {
  CLEANUP_SIGNALS,
  DEFAULT_BRANCH,
  DEFAULT_REMOTE_HOST,
  DEFAULT_SCRIPT_URL,
  REQUIRED_PACKAGES,
  SSH_KEY_FILE_NAME,
  SSH_KEY_TYPE,
} from './lib/constants.js'

export {parseLauncherInputs, parseSetupInputs} from './lib/inputs.js'

export {createLogger, redactSensitiveFields} from './lib/logger.js'
export type {LogContext, Logger, LoggerOptions} from './lib/logger.js'

export {OPERATING_SYSTEMS} from './lib/types.js'
export type {
  CloneResult,
  ConnectionStatus,
  GitIdentity,
  LauncherInputs,
  OperatingSystem,
  SetupInputs,
  SetupResult,
  SshKeyResult,
} from './lib/types.js'

export {resolveScriptCommand, runLauncher, runLauncherCli} from './lib/launcher/index.js'
export type {LauncherDependencies, ProcessHooks, ProcessRunner, ScriptDownloader} from './lib/launcher/index.js'

export {
  classifyConnectionOutput,
  classifyPlatform,
  createSetupDependencies,
  runSetup,
  runSetupCli,
  selectPlatformStrategy,
} from './lib/setup/index.js'
export type {
  CommandLocator,
  ExecAdapter,
  Output,
  PlatformStrategy,
  Prompter,
  SetupContext,
  SetupDependencies,
} from './lib/setup/index.js'

// Public API - utils exports
export {FatalSetupError, isFatalSetupError, toError, toErrorMessage} from './utils/errors.js'
