import { createTwoFilesPatch } from 'diff'
import type {
  CommitRequest,
  ConsoleApplyReport,
  ConsoleApplyRequest,
  ConsoleSession,
  ConsoleTarget,
  LoadReport,
  LoadRequest,
  ManagementSession,
  SessionTarget
} from '../session-types'
import { fsx } from '../../../utils/fs'

// Locks are per host and shared by every virtual session in the process.
const LOCKS: Set<string> = new Set()

function lines(text: string): string[] {
  return text.split(/\r?\n/).map((l) => l.trimEnd()).filter((l) => l.length > 0)
}

function joinLines(ls: readonly string[]): string {
  return ls.length === 0 ? '' : `${ls.join('\n')}\n`
}

function mergeLines(base: string, incoming: string): string {
  const out: string[] = lines(base)
  const seen: Set<string> = new Set(out)
  for (const l of lines(incoming)) {
    if (!seen.has(l)) { out.push(l); seen.add(l) }
  }
  return joinLines(out)
}

/**
 * VirtualManagementSession: hermetic in-memory device used for local dry runs and tests.
 * Configuration is kept as normalized lines; diffs are unified diffs of active vs candidate.
 */
export class VirtualManagementSession implements ManagementSession {
  public readonly id: string = 'virtual'
  private host: string | undefined
  private active: string
  private candidate: string
  private locked = false
  public readonly commits: CommitRequest[] = []

  public constructor(args: { readonly active?: string } = {}) {
    this.active = joinLines(lines(args.active ?? ''))
    this.candidate = this.active
  }

  /** Seed the active configuration from NCD_VIRTUAL_ACTIVE when it names a readable file. */
  public static async fromEnv(): Promise<VirtualManagementSession> {
    const seed: string | undefined = process.env.NCD_VIRTUAL_ACTIVE
    if (seed && await fsx.exists(seed)) return new VirtualManagementSession({ active: await fsx.readText(seed) })
    return new VirtualManagementSession()
  }

  public get activeConfig(): string { return this.active }

  public async open(target: SessionTarget): Promise<void> {
    if (target.host.trim().length === 0) throw new Error('no host given')
    this.host = target.host
  }

  public async close(): Promise<void> {
    if (this.locked && this.host !== undefined) LOCKS.delete(this.host)
    this.locked = false
    this.host = undefined
  }

  public async lock(): Promise<void> {
    const host = this.requireOpen()
    if (LOCKS.has(host)) throw new Error(`configuration database locked by another session on ${host}`)
    LOCKS.add(host)
    this.locked = true
  }

  public async unlock(): Promise<void> {
    const host = this.requireOpen()
    if (!this.locked) throw new Error('configuration database is not locked by this session')
    LOCKS.delete(host)
    this.locked = false
    // Uncommitted candidate changes are discarded with the lock.
    this.candidate = this.active
  }

  public async load(req: LoadRequest): Promise<LoadReport> {
    this.requireLocked()
    const content: string = req.format === 'xml' ? req.content : joinLines(lines(req.content))
    if (lines(content).length === 0) throw new Error('configuration file is empty')
    const warnings: string[] = []
    if (req.format === 'set') {
      for (const l of lines(content)) {
        if (!/^(set|delete|deactivate|activate)\s/.test(l)) warnings.push(`unknown command: ${l}`)
      }
    }
    this.candidate = req.mode === 'merge' ? mergeLines(this.candidate, content) : joinLines(lines(content))
    return { warnings }
  }

  public async diff(): Promise<string> {
    this.requireLocked()
    if (this.candidate === this.active) return ''
    return createTwoFilesPatch('active', 'candidate', this.active, this.candidate, undefined, undefined, { context: 3 })
  }

  public async commitCheck(): Promise<void> {
    this.requireLocked()
    if (lines(this.candidate).length === 0) throw new Error('candidate configuration is empty')
  }

  public async commit(req: CommitRequest): Promise<void> {
    this.requireLocked()
    this.active = this.candidate
    this.commits.push(req)
  }

  private requireOpen(): string {
    if (this.host === undefined) throw new Error('session is not open')
    return this.host
  }

  private requireLocked(): void {
    this.requireOpen()
    if (!this.locked) throw new Error('configuration database is not locked')
  }
}

/**
 * VirtualConsoleSession: accepts any readable file and reports it applied.
 */
export class VirtualConsoleSession implements ConsoleSession {
  public readonly id: string = 'virtual'
  private opened = false
  public readonly applied: ConsoleApplyRequest[] = []

  public async open(_target: ConsoleTarget): Promise<void> { this.opened = true }

  public async close(): Promise<void> { this.opened = false }

  public async apply(req: ConsoleApplyRequest): Promise<ConsoleApplyReport> {
    if (!this.opened) throw new Error('console is not open')
    if (!(await fsx.exists(req.filePath))) return { changed: false, failed: true, message: `file not found: ${req.filePath}` }
    this.applied.push(req)
    return { changed: true, failed: false }
  }
}
