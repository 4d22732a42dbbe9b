import type { DeployErrorKind } from '../types/transport-result'

export interface ErrorInfo {
  readonly code: string
  readonly message: string
  readonly remedy?: string
}

/**
 * A failed deployment stage. `kind` names the stage; `cause` keeps the driver error.
 */
export class DeployError extends Error {
  public readonly kind: DeployErrorKind

  public constructor(kind: DeployErrorKind, message: string, options?: { readonly cause?: unknown }) {
    super(message, options)
    this.name = 'DeployError'
    this.kind = kind
  }
}

export function isDeployError(err: unknown): err is DeployError {
  return err instanceof DeployError
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function normalize(s: string): string {
  return (s || '').toLowerCase()
}

/**
 * Map a failed stage and the device's raw message to a code plus a remedy hint.
 */
export function describeError(kind: DeployErrorKind, raw: string): ErrorInfo {
  const txt = normalize(raw)
  const code = kind.toUpperCase()
  if (txt.includes('authentication') || txt.includes('permission denied') || txt.includes('access denied')) {
    return { code: `${code}_AUTH`, message: raw, remedy: 'Check --user and --passwd (or NCD_PASSWORD), or the SSH keys the session uses.' }
  }
  if (txt.includes('timed out') || txt.includes('etimedout') || txt.includes('timeout')) {
    return { code: `${code}_TIMEOUT`, message: raw, remedy: 'Raise --timeout or check reachability of the management port.' }
  }
  if (txt.includes('econnrefused') || txt.includes('unreachable') || txt.includes('enotfound')) {
    return { code: `${code}_UNREACHABLE`, message: raw, remedy: 'Verify --host and --port; bootstrap the device with --console telnet|serial first.' }
  }
  switch (kind) {
    case 'validation_error':
      return { code, message: raw, remedy: 'Fix the command options and run again.' }
    case 'lock_error':
      return { code, message: raw, remedy: 'Another session holds the configuration lock; wait for it to finish or clear it on the device.' }
    case 'load_error':
      return { code, message: raw, remedy: 'Check the file syntax and --format; pass --ignore-warning for warnings that are expected.' }
    case 'check_error':
      return { code, message: raw, remedy: 'The device rejected the candidate configuration; nothing was committed.' }
    case 'commit_error':
      return { code, message: raw, remedy: 'The commit did not complete and the lock was released; inspect the device before retrying.' }
    case 'diff_sink_error':
      return { code, message: raw, remedy: 'The device change may already be committed; fix --diffs-file and inspect the device.' }
    case 'console_error':
      return { code, message: raw, remedy: 'Check the console target and that the console tool (NCD_CONSOLE_CMD) is installed.' }
    default:
      return { code, message: raw }
  }
}
