export {createScriptDownloader, downloadScript, isExistingFileError} from './download.js'
export {createLauncherDependencies, resolveScriptCommand, runLauncher, runLauncherCli} from './launcher.js'
export {createProcessHooks, createProcessRunner, signalExitCode} from './runner.js'
export {buildTempScriptPath, registerTempScriptCleanup, removeTempScript} from './temp-script.js'
export type {CleanupOptions, CleanupRegistration} from './temp-script.js'
export type {LauncherDependencies, ProcessHooks, ProcessRunner, ScriptCommand, ScriptDownloader} from './types.js'
