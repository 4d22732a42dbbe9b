import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { RpcTransport } from '../core/transport/rpc-transport'
import { VirtualManagementSession } from '../core/session/drivers/virtual'
import { DeploymentOrchestrator } from '../core/orchestrator'
import type { ManagementSession } from '../core/session/session-types'
import { DeployError } from '../utils/errors'
import { makeSpec } from '../../tests/helpers/fake-transport'

let dir: string

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'netcfg-rpc-'))
  await writeFile(join(dir, 'domain.set'), 'set system host-name r1\nset system domain-name example.net\n', 'utf8')
  await writeFile(join(dir, 'typo.set'), 'set system host-name r1\nsett system ntp server 10.0.0.5\n', 'utf8')
})

afterAll(async () => {
  await rm(dir, { recursive: true, force: true })
})

function stubSession(overrides: Partial<ManagementSession>): ManagementSession {
  return {
    id: 'stub',
    open: async () => {},
    close: async () => {},
    lock: async () => {},
    unlock: async () => {},
    load: async () => ({ warnings: [] }),
    diff: async () => '',
    commitCheck: async () => {},
    commit: async () => {},
    ...overrides
  }
}

async function caught(p: Promise<unknown>): Promise<DeployError> {
  try {
    await p
  } catch (err) {
    if (err instanceof DeployError) return err
    throw err
  }
  throw new Error('expected a DeployError')
}

describe('RpcTransport', () => {
  it('stages a merge and returns a unified diff', async () => {
    const session = new VirtualManagementSession({ active: 'set system host-name r1\n' })
    const t = new RpcTransport(session, { host: 'rpc-diff', user: 'netops' })
    await t.open()
    await t.lock()
    await t.load({ filePath: join(dir, 'domain.set'), format: 'set', mode: 'merge', ignoreWarnings: [] })
    const diff = await t.diff()
    expect(diff).toContain('--- active')
    expect(diff).toContain('+++ candidate')
    expect(diff).toContain('+set system domain-name example.net')
    expect(diff).not.toContain('-set system host-name r1')
    await t.unlock()
    await t.close()
  })

  it('promotes load warnings to a load_error', async () => {
    const t = new RpcTransport(new VirtualManagementSession(), { host: 'rpc-warn', user: 'netops' })
    await t.open()
    await t.lock()
    const err = await caught(t.load({ filePath: join(dir, 'typo.set'), format: 'set', mode: 'merge', ignoreWarnings: [] }))
    expect(err.kind).toBe('load_error')
    expect(err.message).toBe('Load failed: unknown command: sett system ntp server 10.0.0.5')
    await t.close()
  })

  it('drops warnings that match an ignore pattern, case-insensitively', async () => {
    const t = new RpcTransport(new VirtualManagementSession(), { host: 'rpc-ignore', user: 'netops' })
    await t.open()
    await t.lock()
    await t.load({ filePath: join(dir, 'typo.set'), format: 'set', mode: 'merge', ignoreWarnings: ['UNKNOWN COMMAND'] })
    expect(await t.diff()).toContain('+sett system ntp server 10.0.0.5')
    await t.close()
  })

  it('reports an unreadable file as a load_error', async () => {
    const t = new RpcTransport(stubSession({}), { host: 'rpc-missing', user: 'netops' })
    const missing = join(dir, 'missing.conf')
    const err = await caught(t.load({ filePath: missing, format: 'text', mode: 'merge', ignoreWarnings: [] }))
    expect(err.kind).toBe('load_error')
    expect(err.message.startsWith(`Load failed: cannot read ${missing}:`)).toBe(true)
  })

  it('tags each stage failure with its kind', async () => {
    const boom = (msg: string) => async (): Promise<never> => { throw new Error(msg) }
    const t = new RpcTransport(stubSession({
      open: boom('connection refused'),
      lock: boom('configuration database locked by admin'),
      commitCheck: boom('missing mandatory statement'),
      commit: boom('commit failed on re0')
    }), { host: 'rpc-stub', user: 'netops' })
    const summary = (e: DeployError): string => `${e.kind}: ${e.message}`
    expect(summary(await caught(t.open()))).toBe('connect_error: Connect failed: connection refused')
    expect(summary(await caught(t.lock()))).toBe('lock_error: Lock failed: configuration database locked by admin')
    expect(summary(await caught(t.check()))).toBe('check_error: Commit check failed: missing mandatory statement')
    expect(summary(await caught(t.commit({})))).toBe('commit_error: Commit failed: commit failed on re0')
  })

  it('refuses a lock another session already holds', async () => {
    const first = new VirtualManagementSession()
    const second = new VirtualManagementSession()
    await first.open({ host: 'rpc-shared', user: 'a' })
    await first.lock()
    const t = new RpcTransport(second, { host: 'rpc-shared', user: 'b' })
    await t.open()
    const err = await caught(t.lock())
    expect(err.message).toBe('Lock failed: configuration database locked by another session on rpc-shared')
    await first.unlock()
    await first.close()
  })
})

describe('orchestrator over a virtual device', () => {
  class RejectingSession extends VirtualManagementSession {
    public override async commitCheck(): Promise<void> {
      throw new Error('statement not valid on this platform')
    }
  }

  it('leaves the active configuration untouched and the lock free after a failed check', async () => {
    const active = 'set system host-name r1\n'
    const session = new RejectingSession({ active })
    const t = new RpcTransport(session, { host: 'rpc-check', user: 'netops' })
    const res = await new DeploymentOrchestrator(t).run(makeSpec({ host: 'rpc-check', filePath: join(dir, 'domain.set') }))
    expect(res.error).toEqual({ kind: 'check_error', message: 'Commit check failed: statement not valid on this platform' })
    expect(session.activeConfig).toBe(active)
    const other = new VirtualManagementSession()
    await other.open({ host: 'rpc-check', user: 'netops' })
    await expect(other.lock()).resolves.toBeUndefined()
    await other.close()
  })

  it('commits and reports no change on a second identical run', async () => {
    const session = new VirtualManagementSession({ active: 'set system host-name r1\n' })
    const spec = makeSpec({ host: 'rpc-twice', filePath: join(dir, 'domain.set'), commit: { comment: 'add domain' } })
    const first = await new DeploymentOrchestrator(new RpcTransport(session, { host: 'rpc-twice', user: 'netops' })).run(spec)
    expect(first).toEqual({ changed: true })
    expect(session.activeConfig).toBe('set system host-name r1\nset system domain-name example.net\n')
    expect(session.commits).toEqual([{ comment: 'add domain', confirmMinutes: undefined }])
    const second = await new DeploymentOrchestrator(new RpcTransport(session, { host: 'rpc-twice', user: 'netops' })).run(spec)
    expect(second).toEqual({ changed: false })
    expect(session.commits).toHaveLength(1)
  })
})
