import { VirtualManagementSession } from '../../src/core/session/drivers/virtual'

export function createSession(): VirtualManagementSession {
  return new VirtualManagementSession({ active: 'set system host-name stub\n' })
}
