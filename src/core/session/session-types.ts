/**
 * Driver-level session capabilities consumed by the transports.
 * Drivers own the wire protocol; nothing above this layer frames messages.
 */
import type { ContentFormat, LoadMode } from '../../types/deployment-spec'

export interface SessionTarget {
  readonly host: string
  readonly port?: number
  readonly user: string
  /** Absent when the channel is already authenticated (SSH keys, agent). */
  readonly password?: string
  /** Whole-session timeout in seconds; undefined keeps the driver default. */
  readonly timeoutSeconds?: number
}

export interface LoadRequest {
  readonly content: string
  readonly format: ContentFormat
  readonly mode: LoadMode
}

export interface LoadReport {
  /** Warnings the device raised while staging; the transport decides whether they are fatal. */
  readonly warnings: readonly string[]
}

export interface CommitRequest {
  readonly comment?: string
  readonly confirmMinutes?: number
}

/**
 * A persistent, lockable management session on one device.
 */
export interface ManagementSession {
  readonly id: string
  open(target: SessionTarget): Promise<void>
  close(): Promise<void>
  lock(): Promise<void>
  unlock(): Promise<void>
  load(req: LoadRequest): Promise<LoadReport>
  /** Textual difference between candidate and active configuration; empty when identical. */
  diff(): Promise<string>
  commitCheck(): Promise<void>
  commit(req: CommitRequest): Promise<void>
}

export type ConsoleTarget =
  | { readonly mode: 'telnet'; readonly host: string; readonly port: number; readonly user: string; readonly password?: string; readonly timeoutSeconds?: number }
  | { readonly mode: 'serial'; readonly device: string; readonly user: string; readonly password?: string; readonly timeoutSeconds?: number }

export interface ConsoleApplyRequest {
  readonly filePath: string
  readonly format: ContentFormat
  /** Console loads overwrite unless merge is set. */
  readonly merge: boolean
  readonly saveDir?: string
}

export interface ConsoleApplyReport {
  readonly changed: boolean
  readonly failed: boolean
  readonly message?: string
}

/**
 * An out-of-band console session. Staging, validation and commit happen in one apply.
 */
export interface ConsoleSession {
  readonly id: string
  open(target: ConsoleTarget): Promise<void>
  close(): Promise<void>
  apply(req: ConsoleApplyRequest): Promise<ConsoleApplyReport>
}
