import type { DeploymentSpec } from '../../types/deployment-spec'
import type { ConsoleTarget, SessionTarget } from '../session/session-types'
import type { TransportSession } from './transport-interface'
import { loadConsoleSession, loadManagementSession } from '../session/session'
import { RpcTransport } from './rpc-transport'
import { ConsoleTransport } from './console-transport'

export interface TransportDrivers {
  readonly driver: string
  readonly consoleDriver: string
}

function timeoutOf(spec: DeploymentSpec): number | undefined {
  return spec.timeoutSeconds > 0 ? spec.timeoutSeconds : undefined
}

function passwordOf(spec: DeploymentSpec): string | undefined {
  return spec.credentials.kind === 'password' ? spec.credentials.password : undefined
}

export function sessionTarget(spec: DeploymentSpec): SessionTarget {
  return { host: spec.host, port: spec.port, user: spec.credentials.user, password: passwordOf(spec), timeoutSeconds: timeoutOf(spec) }
}

export function consoleTarget(spec: DeploymentSpec): ConsoleTarget | undefined {
  const c = spec.console
  if (c === undefined) return undefined
  const common = { user: spec.credentials.user, password: passwordOf(spec), timeoutSeconds: timeoutOf(spec) }
  return c.mode === 'telnet' ? { mode: 'telnet', host: c.host, port: c.port, ...common } : { mode: 'serial', device: c.device, ...common }
}

/**
 * Pick the transport for a spec: a console descriptor selects the console
 * transport, otherwise the RPC transport over a management session.
 */
export async function createTransport(spec: DeploymentSpec, drivers: TransportDrivers): Promise<TransportSession> {
  const target = consoleTarget(spec)
  if (target !== undefined) return new ConsoleTransport(await loadConsoleSession(drivers.consoleDriver), target)
  return new RpcTransport(await loadManagementSession(drivers.driver), sessionTarget(spec))
}
