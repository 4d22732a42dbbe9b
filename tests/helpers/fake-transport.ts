import type { ConsoleApplyArgs, ConsoleOutcome, ConsoleTransportSession, RpcTransportSession, TransportLoadArgs } from '../../src/core/transport/transport-interface'
import type { CommitRequest } from '../../src/core/session/session-types'
import type { DeployErrorKind } from '../../src/types/transport-result'
import type { DeploymentSpec } from '../../src/types/deployment-spec'
import { DeployError } from '../../src/utils/errors'

export type RpcCall = 'open' | 'close' | 'lock' | 'unlock' | 'load' | 'diff' | 'check' | 'commit'

const KIND_OF: Readonly<Record<RpcCall, DeployErrorKind>> = {
  open: 'connect_error',
  close: 'connect_error',
  lock: 'lock_error',
  unlock: 'unlock_error',
  load: 'load_error',
  diff: 'load_error',
  check: 'check_error',
  commit: 'commit_error'
}

/**
 * Recording RPC transport. `failOn` makes the named stages reject the way the
 * real transport does; `diff` is what the diff stage returns.
 */
export class FakeRpcTransport implements RpcTransportSession {
  public readonly kind = 'rpc' as const
  public readonly calls: RpcCall[] = []
  public readonly loads: TransportLoadArgs[] = []
  public readonly commits: CommitRequest[] = []

  public constructor(private readonly opts: { readonly diff?: string; readonly failOn?: readonly RpcCall[] } = {}) {}

  public count(call: RpcCall): number {
    return this.calls.filter((c) => c === call).length
  }

  private step(call: RpcCall): void {
    this.calls.push(call)
    if (this.opts.failOn?.includes(call)) throw new DeployError(KIND_OF[call], `${call} failed: simulated`)
  }

  public async open(): Promise<void> { this.step('open') }
  public async close(): Promise<void> { this.step('close') }
  public async lock(): Promise<void> { this.step('lock') }
  public async unlock(): Promise<void> { this.step('unlock') }
  public async load(args: TransportLoadArgs): Promise<void> { this.step('load'); this.loads.push(args) }
  public async diff(): Promise<string> { this.step('diff'); return this.opts.diff ?? '' }
  public async check(): Promise<void> { this.step('check') }
  public async commit(args: CommitRequest): Promise<void> { this.step('commit'); this.commits.push(args) }
}

export class FakeConsoleTransport implements ConsoleTransportSession {
  public readonly kind = 'console' as const
  public readonly calls: string[] = []
  public readonly applied: ConsoleApplyArgs[] = []

  public constructor(private readonly outcome: ConsoleOutcome | DeployError = { changed: true }) {}

  public async open(): Promise<void> { this.calls.push('open') }
  public async close(): Promise<void> { this.calls.push('close') }
  public async apply(args: ConsoleApplyArgs): Promise<ConsoleOutcome> {
    this.calls.push('apply')
    this.applied.push(args)
    if (this.outcome instanceof DeployError) throw this.outcome
    return this.outcome
  }
}

export function makeSpec(overrides: Partial<DeploymentSpec> = {}): DeploymentSpec {
  return {
    host: 'router1.example.net',
    port: 830,
    credentials: { user: 'netops', kind: 'password', password: 'test-secret' },
    filePath: '/tmp/netcfg-test.set',
    format: 'set',
    overwrite: false,
    replace: false,
    merge: false,
    timeoutSeconds: 0,
    commit: {},
    checkMode: false,
    returnDiff: false,
    ignoreWarnings: [],
    ...overrides
  }
}
