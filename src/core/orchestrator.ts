import { setTimeout as delay } from 'node:timers/promises'
import type { DeploymentSpec, LoadMode } from '../types/deployment-spec'
import type { DeployErrorKind, TransportResult } from '../types/transport-result'
import type { ConsoleTransportSession, RpcTransportSession, TransportKind, TransportSession } from './transport/transport-interface'
import { DiffReporter, type DiffSink } from './diff-reporter'
import { DeployError, errorMessage, isDeployError } from '../utils/errors'
import { logger } from '../utils/logger'

export type DeploymentStage =
  | 'CONNECTING'
  | 'LOCKED'
  | 'LOADED'
  | 'DIFFED'
  | 'CHECKED'
  | 'COMMITTED'
  | 'UNLOCKED'
  | 'APPLIED'
  | 'SUCCESS'
  | 'FAILED'

export interface OrchestratorOptions {
  /** Called on entry to every state, terminal ones included. */
  readonly onStage?: (stage: DeploymentStage) => void
  readonly sleep?: (ms: number) => Promise<void>
  readonly sinkFor?: (path: string) => DiffSink
}

interface RunProgress {
  changed: boolean
  diff?: string
}

const PRE_COMMIT_WAIT_MIN = 1
const PRE_COMMIT_WAIT_MAX = 4

/**
 * Resolve the load mode from the caller's flags for the given transport.
 * Throws a validation_error when the flags are contradictory.
 */
export function resolveLoadMode(spec: Pick<DeploymentSpec, 'overwrite' | 'replace' | 'merge'>, kind: TransportKind): LoadMode {
  if (spec.overwrite && spec.replace) {
    throw new DeployError('validation_error', 'Invalid options: overwrite and replace are mutually exclusive')
  }
  if (kind === 'console') {
    if (spec.replace) throw new DeployError('validation_error', 'Invalid options: replace is not supported over the console')
    if (spec.merge && spec.overwrite) throw new DeployError('validation_error', 'Invalid options: merge and overwrite are mutually exclusive')
    return spec.merge ? 'merge' : 'overwrite'
  }
  if (spec.overwrite) return 'overwrite'
  if (spec.replace) return 'replace'
  return 'merge'
}

/**
 * Reject a deployment spec the selected transport cannot run. Runs before any transport call.
 */
export function validateDeploymentSpec(spec: DeploymentSpec, kind: TransportKind): LoadMode {
  const fail = (msg: string): never => { throw new DeployError('validation_error', `Invalid options: ${msg}`) }
  const mode = resolveLoadMode(spec, kind)
  if (spec.host.trim().length === 0) fail('host is required')
  if (spec.filePath.trim().length === 0) fail('file is required')
  if (!Number.isInteger(spec.timeoutSeconds) || spec.timeoutSeconds < 0) fail(`timeout must be a whole number of seconds >= 0, got ${spec.timeoutSeconds}`)
  const wait = spec.commit.preCommitWaitSeconds
  if (wait !== undefined && (!Number.isInteger(wait) || wait < PRE_COMMIT_WAIT_MIN || wait > PRE_COMMIT_WAIT_MAX)) {
    fail(`pre-commit wait must be between ${PRE_COMMIT_WAIT_MIN} and ${PRE_COMMIT_WAIT_MAX} seconds, got ${wait}`)
  }
  const confirm = spec.commit.confirmMinutes
  if (confirm !== undefined && (!Number.isInteger(confirm) || confirm < 1)) fail(`confirm must be a whole number of minutes >= 1, got ${confirm}`)
  if ((spec.console !== undefined) !== (kind === 'console')) fail(`console descriptor does not match the ${kind} transport`)
  if (kind === 'console' && spec.checkMode) fail('check mode is not supported over the console')
  return mode
}

/**
 * Open the transport, run fn, and close whatever happens inside fn.
 * A failed open leaves nothing to close.
 */
async function withSession<T>(transport: TransportSession, fn: () => Promise<T>): Promise<T> {
  await transport.open()
  try {
    return await fn()
  } finally {
    try {
      await transport.close()
    } catch (err) {
      logger.warn(`Close failed: ${errorMessage(err)}`)
    }
  }
}

/**
 * Hold the configuration lock for the duration of fn. Unlock is attempted
 * exactly once after a successful lock; its failure is only logged.
 */
async function withLock<T>(transport: RpcTransportSession, fn: () => Promise<T>): Promise<T> {
  await transport.lock()
  try {
    return await fn()
  } finally {
    try {
      await transport.unlock()
    } catch (err) {
      logger.warn(errorMessage(err))
    }
  }
}

/**
 * DeploymentOrchestrator drives one deployment through the selected transport.
 */
export class DeploymentOrchestrator {
  private readonly onStage: (stage: DeploymentStage) => void
  private readonly sleep: (ms: number) => Promise<void>
  private readonly sinkFor: (path: string) => DiffSink

  public constructor(private readonly transport: TransportSession, opts: OrchestratorOptions = {}) {
    this.onStage = opts.onStage ?? ((): void => {})
    this.sleep = opts.sleep ?? (async (ms: number): Promise<void> => { await delay(ms) })
    this.sinkFor = opts.sinkFor ?? ((path: string): DiffSink => new DiffReporter(path))
  }

  public async run(spec: DeploymentSpec): Promise<TransportResult> {
    const progress: RunProgress = { changed: false }
    try {
      const mode = validateDeploymentSpec(spec, this.transport.kind)
      if (this.transport.kind === 'rpc') await this.runRpc(spec, mode, this.transport, progress)
      else await this.runConsole(spec, mode, this.transport, progress)
      if (progress.diff !== undefined && spec.diffSinkPath !== undefined) {
        await this.sinkFor(spec.diffSinkPath).write(progress.diff)
      }
      this.enter('SUCCESS')
      return this.result(spec, progress)
    } catch (err) {
      if (!isDeployError(err)) throw err
      logger.error(err.message)
      this.enter('FAILED')
      return this.result(spec, progress, { kind: err.kind, message: err.message })
    }
  }

  private async runRpc(spec: DeploymentSpec, mode: LoadMode, t: RpcTransportSession, progress: RunProgress): Promise<void> {
    this.enter('CONNECTING')
    await withSession(t, async () => {
      await withLock(t, async () => {
        this.enter('LOCKED')
        await t.load({ filePath: spec.filePath, format: spec.format, mode, ignoreWarnings: spec.ignoreWarnings })
        this.enter('LOADED')
        const diff = await t.diff()
        this.enter('DIFFED')
        if (diff.trim().length === 0) {
          logger.info('No configuration changes to commit')
          return
        }
        progress.diff = diff
        await t.check()
        this.enter('CHECKED')
        if (spec.checkMode) {
          logger.info('Check mode: configuration validated, commit skipped')
          progress.changed = true
          return
        }
        const wait = spec.commit.preCommitWaitSeconds
        if (wait !== undefined) {
          logger.debug(`Waiting ${wait}s before commit`)
          await this.sleep(wait * 1000)
        }
        await t.commit({ comment: spec.commit.comment, confirmMinutes: spec.commit.confirmMinutes })
        progress.changed = true
        this.enter('COMMITTED')
        if (spec.commit.confirmMinutes !== undefined) {
          logger.note(`Commit will roll back in ${spec.commit.confirmMinutes} minute(s) unless a confirming commit is issued`)
        }
      })
      this.enter('UNLOCKED')
    })
  }

  private async runConsole(spec: DeploymentSpec, mode: LoadMode, t: ConsoleTransportSession, progress: RunProgress): Promise<void> {
    this.enter('CONNECTING')
    const outcome = await withSession(t, async () => await t.apply({
      filePath: spec.filePath,
      format: spec.format,
      merge: mode === 'merge',
      saveDir: spec.saveDir
    }))
    this.enter('APPLIED')
    progress.changed = outcome.changed
  }

  private result(spec: DeploymentSpec, progress: RunProgress, error?: { readonly kind: DeployErrorKind; readonly message: string }): TransportResult {
    const withDiff: boolean = progress.diff !== undefined && (spec.returnDiff || spec.checkMode)
    return {
      changed: progress.changed,
      ...(withDiff ? { diff: progress.diff } : {}),
      ...(error ? { error } : {})
    }
  }

  private enter(stage: DeploymentStage): void {
    logger.debug(`stage ${stage}`)
    this.onStage(stage)
  }
}
