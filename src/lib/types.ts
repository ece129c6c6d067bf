export const OPERATING_SYSTEMS = ['Linux', 'macOS', 'Windows', 'Unknown'] as const
export type OperatingSystem = (typeof OPERATING_SYSTEMS)[number]

// Launcher configuration (parsed from the environment)
export interface LauncherInputs {
  readonly scriptUrl: string
  readonly debug: boolean
}

// Setup procedure configuration (parsed from the environment)
export interface SetupInputs {
  readonly remoteHost: string
  readonly defaultBranch: string
  readonly cloneRepository: boolean
  readonly debug: boolean
}

export interface GitIdentity {
  readonly name: string
  readonly email: string
}

export interface SshKeyResult {
  readonly keyPath: string
  readonly publicKeyPath: string
  readonly generated: boolean
}

export type ConnectionStatus = 'authenticated' | 'rejected' | 'unknown' | 'unreachable'

export interface CloneResult {
  readonly directory: string
  readonly cloned: boolean
}

export interface SetupResult {
  readonly exitCode: number
  readonly os: OperatingSystem | null
  readonly identity: GitIdentity | null
  readonly sshKey: SshKeyResult | null
  readonly connection: ConnectionStatus | null
  readonly clone: CloneResult | null
  readonly duration: number
}
