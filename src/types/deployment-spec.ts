/** Format tag of the configuration artifact. */
export type ContentFormat = 'text' | 'xml' | 'set'

/** How staged content combines with the candidate configuration. */
export type LoadMode = 'merge' | 'overwrite' | 'replace'

export type Credentials =
  | { readonly user: string; readonly kind: 'password'; readonly password: string }
  | { readonly user: string; readonly kind: 'assumed' }

export type ConsoleDescriptor =
  | { readonly mode: 'telnet'; readonly host: string; readonly port: number }
  | { readonly mode: 'serial'; readonly device: string }

export interface CommitOptions {
  readonly comment?: string
  /** Ask the device to roll back unless a confirming commit arrives within this many minutes. */
  readonly confirmMinutes?: number
  /** Pause between commit-check and commit, 1 to 4 seconds. */
  readonly preCommitWaitSeconds?: number
}

export interface DeploymentSpec {
  readonly host: string
  readonly port?: number
  readonly credentials: Credentials
  readonly filePath: string
  readonly format: ContentFormat
  /** Load mode flags as given by the caller; see resolveLoadMode. */
  readonly overwrite: boolean
  readonly replace: boolean
  /** Console path only: merge instead of the console default of overwrite. */
  readonly merge: boolean
  /** Session timeout in seconds; 0 keeps the transport default. */
  readonly timeoutSeconds: number
  readonly commit: CommitOptions
  readonly checkMode: boolean
  readonly returnDiff: boolean
  readonly diffSinkPath?: string
  /** Presence selects the console transport. */
  readonly console?: ConsoleDescriptor
  /** Console path only: directory the console tool saves device facts into. */
  readonly saveDir?: string
  /** Load warnings containing any of these strings are not promoted to errors. */
  readonly ignoreWarnings: readonly string[]
}
