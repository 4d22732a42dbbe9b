import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadConfig } from '../core/config'

let cwd: string

beforeEach(async () => {
  cwd = await mkdtemp(join(tmpdir(), 'netcfg-cfg-'))
})

afterEach(async () => {
  await rm(cwd, { recursive: true, force: true })
})

describe('loadConfig', () => {
  it('returns empty defaults without a config file', async () => {
    expect(await loadConfig(cwd)).toEqual({})
  })

  it('reads a valid config', async () => {
    await writeFile(join(cwd, 'netcfg.config.json'), JSON.stringify({ driver: 'virtual', user: 'netops', timeout: 60, ignoreWarnings: ['statement not found'] }), 'utf8')
    expect(await loadConfig(cwd)).toEqual({ driver: 'virtual', user: 'netops', timeout: 60, ignoreWarnings: ['statement not found'] })
  })

  it('rejects malformed JSON', async () => {
    await writeFile(join(cwd, 'netcfg.config.json'), '{ "driver": ', 'utf8')
    await expect(loadConfig(cwd)).rejects.toThrow('netcfg.config.json: not valid JSON')
  })

  it('lists schema violations', async () => {
    await writeFile(join(cwd, 'netcfg.config.json'), JSON.stringify({ port: 70000, colour: 'blue' }), 'utf8')
    const err = await loadConfig(cwd).then(() => undefined, (e: unknown) => e)
    expect(err).toBeInstanceOf(Error)
    const message = err instanceof Error ? err.message : ''
    expect(message.startsWith('netcfg.config.json: ')).toBe(true)
    expect(message).toContain('/ must NOT have additional properties')
    expect(message).toContain('/port must be <= 65535')
  })
})
