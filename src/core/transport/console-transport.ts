import type { ConsoleApplyReport, ConsoleSession, ConsoleTarget } from '../session/session-types'
import type { ConsoleApplyArgs, ConsoleOutcome, ConsoleTransportSession } from './transport-interface'
import { DeployError, errorMessage } from '../../utils/errors'
import { logger } from '../../utils/logger'

/**
 * ConsoleTransport: one out-of-band apply. Every fault is a console_error
 * carrying the console tool's own message.
 */
export class ConsoleTransport implements ConsoleTransportSession {
  public readonly kind = 'console' as const

  public constructor(private readonly session: ConsoleSession, private readonly target: ConsoleTarget) {}

  public async open(): Promise<void> {
    const where = this.target.mode === 'telnet' ? `telnet ${this.target.host}:${this.target.port}` : `serial ${this.target.device}`
    logger.debug(`Opening ${this.session.id} console over ${where}`)
    try {
      await this.session.open(this.target)
    } catch (err) {
      throw new DeployError('console_error', `Console connect failed: ${errorMessage(err)}`, { cause: err })
    }
  }

  public async close(): Promise<void> {
    await this.session.close()
  }

  public async apply(args: ConsoleApplyArgs): Promise<ConsoleOutcome> {
    let report: ConsoleApplyReport
    try {
      report = await this.session.apply({ filePath: args.filePath, format: args.format, merge: args.merge, saveDir: args.saveDir })
    } catch (err) {
      throw new DeployError('console_error', `Console apply failed: ${errorMessage(err)}`, { cause: err })
    }
    if (report.failed) {
      throw new DeployError('console_error', `Console apply failed: ${report.message ?? 'the console tool reported a failure'}`)
    }
    return { changed: report.changed }
  }
}
