export type DeployErrorKind =
  | 'validation_error'
  | 'connect_error'
  | 'lock_error'
  | 'load_error'
  | 'check_error'
  | 'commit_error'
  | 'unlock_error'
  | 'console_error'
  | 'diff_sink_error'

export interface TransportResult {
  readonly changed: boolean
  readonly diff?: string
  readonly error?: { readonly kind: DeployErrorKind; readonly message: string }
}
