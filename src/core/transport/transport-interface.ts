import type { ContentFormat, LoadMode } from '../../types/deployment-spec'
import type { CommitRequest } from '../session/session-types'

export type TransportKind = 'rpc' | 'console'

export interface TransportLoadArgs {
  readonly filePath: string
  readonly format: ContentFormat
  readonly mode: LoadMode
  readonly ignoreWarnings: readonly string[]
}

export interface ConsoleApplyArgs {
  readonly filePath: string
  readonly format: ContentFormat
  readonly merge: boolean
  readonly saveDir?: string
}

export interface ConsoleOutcome {
  readonly changed: boolean
}

/**
 * Fine-grained stages over a lockable management session.
 * Every method rejects with a DeployError naming its stage.
 */
export interface RpcTransportSession {
  readonly kind: 'rpc'
  open(): Promise<void>
  close(): Promise<void>
  lock(): Promise<void>
  unlock(): Promise<void>
  load(args: TransportLoadArgs): Promise<void>
  diff(): Promise<string>
  check(): Promise<void>
  commit(args: CommitRequest): Promise<void>
}

/**
 * Single-shot apply over a console session. There is no lock, diff or check stage.
 */
export interface ConsoleTransportSession {
  readonly kind: 'console'
  open(): Promise<void>
  close(): Promise<void>
  apply(args: ConsoleApplyArgs): Promise<ConsoleOutcome>
}

export type TransportSession = RpcTransportSession | ConsoleTransportSession
