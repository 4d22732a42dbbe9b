import { describe, it, expect } from 'vitest'
import { DeployError, describeError, errorMessage, isDeployError } from '../utils/errors'

describe('describeError', () => {
  it('recognises authentication failures in any stage', () => {
    const info = describeError('connect_error', 'Connect failed: Authentication failed for netops')
    expect(info.code).toBe('CONNECT_ERROR_AUTH')
    expect(info.remedy).toBe('Check --user and --passwd (or NCD_PASSWORD), or the SSH keys the session uses.')
  })

  it('recognises timeouts and unreachable hosts', () => {
    expect(describeError('connect_error', 'Connect failed: connect ETIMEDOUT 10.0.0.1:830').code).toBe('CONNECT_ERROR_TIMEOUT')
    expect(describeError('connect_error', 'Connect failed: connect ECONNREFUSED 10.0.0.1:830').code).toBe('CONNECT_ERROR_UNREACHABLE')
  })

  it('falls back to a remedy per stage', () => {
    expect(describeError('lock_error', 'Lock failed: held by admin')).toEqual({
      code: 'LOCK_ERROR',
      message: 'Lock failed: held by admin',
      remedy: 'Another session holds the configuration lock; wait for it to finish or clear it on the device.'
    })
    expect(describeError('unlock_error', 'Unlock failed: gone')).toEqual({ code: 'UNLOCK_ERROR', message: 'Unlock failed: gone' })
  })
})

describe('DeployError', () => {
  it('keeps kind and cause', () => {
    const cause = new Error('socket closed')
    const err = new DeployError('commit_error', 'Commit failed: socket closed', { cause })
    expect(isDeployError(err)).toBe(true)
    expect(err.kind).toBe('commit_error')
    expect(err.cause).toBe(cause)
    expect(err.name).toBe('DeployError')
    expect(isDeployError(cause)).toBe(false)
  })

  it('extracts messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage('plain')).toBe('plain')
  })
})
