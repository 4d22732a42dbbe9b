import { readFile } from 'node:fs/promises'
import type { ManagementSession, SessionTarget, CommitRequest } from '../session/session-types'
import type { RpcTransportSession, TransportLoadArgs } from './transport-interface'
import type { DeployErrorKind } from '../../types/transport-result'
import { DeployError, errorMessage } from '../../utils/errors'
import { logger } from '../../utils/logger'

/**
 * RpcTransport: runs each deployment stage as one call on a management session
 * and tags any failure with the stage it came from.
 */
export class RpcTransport implements RpcTransportSession {
  public readonly kind = 'rpc' as const

  public constructor(private readonly session: ManagementSession, private readonly target: SessionTarget) {}

  public async open(): Promise<void> {
    const where = this.target.port !== undefined ? `${this.target.host}:${this.target.port}` : this.target.host
    logger.debug(`Opening ${this.session.id} session to ${where}`)
    await stage('connect_error', 'Connect', () => this.session.open(this.target))
  }

  public async close(): Promise<void> {
    await this.session.close()
  }

  public async lock(): Promise<void> {
    await stage('lock_error', 'Lock', () => this.session.lock())
  }

  public async unlock(): Promise<void> {
    await stage('unlock_error', 'Unlock', () => this.session.unlock())
  }

  public async load(args: TransportLoadArgs): Promise<void> {
    let content: string
    try {
      content = await readFile(args.filePath, 'utf8')
    } catch (err) {
      throw new DeployError('load_error', `Load failed: cannot read ${args.filePath}: ${errorMessage(err)}`, { cause: err })
    }
    const report = await stage('load_error', 'Load', () => this.session.load({ content, format: args.format, mode: args.mode }))
    const fatal: string[] = []
    for (const w of report.warnings) {
      if (isIgnored(w, args.ignoreWarnings)) logger.warn(`Ignored load warning: ${w}`)
      else fatal.push(w)
    }
    if (fatal.length > 0) throw new DeployError('load_error', `Load failed: ${fatal.join('; ')}`)
  }

  public async diff(): Promise<string> {
    return await stage('load_error', 'Diff', () => this.session.diff())
  }

  public async check(): Promise<void> {
    await stage('check_error', 'Commit check', () => this.session.commitCheck())
  }

  public async commit(args: CommitRequest): Promise<void> {
    await stage('commit_error', 'Commit', () => this.session.commit(args))
  }
}

function isIgnored(warning: string, patterns: readonly string[]): boolean {
  const w = warning.toLowerCase()
  return patterns.some((p) => p.length > 0 && w.includes(p.toLowerCase()))
}

async function stage<T>(kind: DeployErrorKind, label: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    throw new DeployError(kind, `${label} failed: ${errorMessage(err)}`, { cause: err })
  }
}
