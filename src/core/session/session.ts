import type { ConsoleSession, ManagementSession } from './session-types'

function isManagementSession(v: unknown): v is ManagementSession {
  if (v === null || typeof v !== 'object') return false
  const methods = ['open', 'close', 'lock', 'unlock', 'load', 'diff', 'commitCheck', 'commit'] as const
  return methods.every((m) => typeof Reflect.get(v, m) === 'function')
}

/**
 * Load a management session driver by id. `virtual` is built in; any other id
 * is resolved as a module exporting `createSession()`.
 */
export async function loadManagementSession(id: string): Promise<ManagementSession> {
  const normalized = id.trim()
  if (normalized.toLowerCase() === 'virtual') {
    const mod = await import('./drivers/virtual')
    return await mod.VirtualManagementSession.fromEnv()
  }
  let mod: unknown
  try {
    mod = await import(normalized)
  } catch (err) {
    throw new Error(`Unknown session driver: ${id}`, { cause: err })
  }
  const factory: unknown = mod !== null && typeof mod === 'object' ? Reflect.get(mod, 'createSession') : undefined
  if (typeof factory !== 'function') throw new Error(`Session driver ${id} does not export createSession()`)
  const session: unknown = await factory()
  if (!isManagementSession(session)) throw new Error(`Session driver ${id} returned an incomplete session`)
  return session
}

/**
 * Load a console session driver: `cli` runs the external console tool, `virtual` is in-process.
 */
export async function loadConsoleSession(id: string): Promise<ConsoleSession> {
  const normalized = id.trim().toLowerCase()
  if (normalized === 'virtual') {
    const mod = await import('./drivers/virtual')
    return new mod.VirtualConsoleSession()
  }
  if (normalized === 'cli') {
    const mod = await import('./drivers/console-cli')
    return new mod.ConsoleCliSession()
  }
  throw new Error(`Unknown console driver: ${id}`)
}
