import type {LauncherInputs, SetupInputs} from './types.js'
import process from 'node:process'
import {z} from 'zod'
import {DEFAULT_BRANCH, DEFAULT_REMOTE_HOST, DEFAULT_SCRIPT_URL} from './constants.js'

const HOSTNAME_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]*[a-z0-9])?)*$/i
const BRANCH_PATTERN = /^[\w.-][\w./-]*$/

// Unset and blank variables both fall back to the default
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim().length === 0 ? undefined : value
}

const booleanFlag = z.preprocess(
  blankToUndefined,
  z
    .string()
    .trim()
    .toLowerCase()
    .refine(value => ['true', 'false', '1', '0', 'yes', 'no'].includes(value), {
      message: 'must be one of true, false, 1, 0, yes, no',
    })
    .transform(value => value === 'true' || value === '1' || value === 'yes')
    .optional(),
)

const scriptUrl = z.preprocess(
  blankToUndefined,
  z
    .string()
    .trim()
    .url({message: 'must be a valid URL'})
    .refine(value => /^https?:\/\//i.test(value), {message: 'must use http or https'})
    .optional(),
)

const remoteHost = z.preprocess(
  blankToUndefined,
  z.string().trim().regex(HOSTNAME_PATTERN, {message: 'must be a hostname'}).optional(),
)

const defaultBranch = z.preprocess(
  blankToUndefined,
  z.string().trim().regex(BRANCH_PATTERN, {message: 'must be a valid branch name'}).optional(),
)

const LauncherEnvSchema = z.object({
  GIT_BOOTSTRAP_SCRIPT_URL: scriptUrl,
  GIT_BOOTSTRAP_DEBUG: booleanFlag,
})

const SetupEnvSchema = z.object({
  GIT_BOOTSTRAP_REMOTE_HOST: remoteHost,
  GIT_BOOTSTRAP_DEFAULT_BRANCH: defaultBranch,
  GIT_BOOTSTRAP_CLONE: booleanFlag,
  GIT_BOOTSTRAP_DEBUG: booleanFlag,
})

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`).join('; ')
}

/**
 * Parse launcher configuration from environment variables.
 *
 * @throws Error listing every invalid variable
 */
export function parseLauncherInputs(env: NodeJS.ProcessEnv = process.env): LauncherInputs {
  const parsed = LauncherEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`)
  }

  return {
    scriptUrl: parsed.data.GIT_BOOTSTRAP_SCRIPT_URL ?? DEFAULT_SCRIPT_URL,
    debug: parsed.data.GIT_BOOTSTRAP_DEBUG ?? false,
  }
}

/**
 * Parse setup procedure configuration from environment variables.
 *
 * @throws Error listing every invalid variable
 */
export function parseSetupInputs(env: NodeJS.ProcessEnv = process.env): SetupInputs {
  const parsed = SetupEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`)
  }

  return {
    remoteHost: parsed.data.GIT_BOOTSTRAP_REMOTE_HOST ?? DEFAULT_REMOTE_HOST,
    defaultBranch: parsed.data.GIT_BOOTSTRAP_DEFAULT_BRANCH ?? DEFAULT_BRANCH,
    cloneRepository: parsed.data.GIT_BOOTSTRAP_CLONE ?? false,
    debug: parsed.data.GIT_BOOTSTRAP_DEBUG ?? false,
  }
}
