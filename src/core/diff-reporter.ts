import { writeFile } from 'node:fs/promises'
import { DeployError, errorMessage } from '../utils/errors'
import { logger } from '../utils/logger'

export interface DiffSink {
  write(diff: string): Promise<void>
}

/**
 * Writes the computed diff to a file, replacing whatever it held.
 * Unencodable characters are replaced on the way out; a failure to open or
 * write the file is a diff_sink_error.
 */
export class DiffReporter implements DiffSink {
  public constructor(private readonly path: string) {}

  public async write(diff: string): Promise<void> {
    // Buffer.from substitutes U+FFFD for lone surrogates instead of throwing.
    const bytes: Buffer = Buffer.from(diff, 'utf8')
    try {
      await writeFile(this.path, bytes, { flag: 'w' })
    } catch (err) {
      throw new DeployError('diff_sink_error', `Writing diff to ${this.path} failed: ${errorMessage(err)}`, { cause: err })
    }
    logger.debug(`Diff written to ${this.path} (${bytes.length} bytes)`)
  }
}
