import type { ConsoleApplyReport, ConsoleApplyRequest, ConsoleSession, ConsoleTarget } from '../session-types'
import { proc } from '../../../utils/process'
import { logger } from '../../../utils/logger'
import { constants } from '../../../constants'

function lastLine(text: string): string | undefined {
  const ls = text.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0)
  return ls[ls.length - 1]
}

/**
 * Build the console tool's argument list. The tool logs in over the console,
 * loads the file, commits it and exits non-zero on any failure.
 */
export function buildConsoleArgs(target: ConsoleTarget, req: ConsoleApplyRequest): string[] {
  const args: string[] = []
  if (target.mode === 'telnet') args.push(`--telnet=${target.host},${target.port}`)
  else args.push(`--port=${target.device}`)
  args.push('--user', target.user)
  if (target.password !== undefined) args.push('--passwd', target.password)
  if (target.timeoutSeconds !== undefined) args.push('--timeout', String(target.timeoutSeconds))
  args.push('--format', req.format)
  if (req.merge) args.push('--merge')
  if (req.saveDir !== undefined) args.push('--savedir', req.saveDir)
  args.push('--file', req.filePath)
  return args
}

/**
 * ConsoleCliSession drives an external console-configuration tool, one process per apply.
 */
export class ConsoleCliSession implements ConsoleSession {
  public readonly id: string = 'cli'
  private target: ConsoleTarget | undefined

  public constructor(private readonly command: string = process.env.NCD_CONSOLE_CMD ?? constants.DEFAULT_CONSOLE_COMMAND) {}

  public async open(target: ConsoleTarget): Promise<void> {
    if (!(await proc.has(this.command))) throw new Error(`console tool not found: ${this.command}`)
    this.target = target
  }

  public async close(): Promise<void> {
    this.target = undefined
  }

  public async apply(req: ConsoleApplyRequest): Promise<ConsoleApplyReport> {
    if (this.target === undefined) throw new Error('console is not open')
    const args = buildConsoleArgs(this.target, req)
    logger.debug(`$ ${this.command} ${args.join(' ')}`)
    const res = await proc.run({ cmd: this.command, args })
    if (!res.ok) {
      const message: string = lastLine(res.stderr) ?? lastLine(res.stdout) ?? `${this.command} exited with code ${res.exitCode}`
      return { changed: false, failed: true, message }
    }
    return { changed: true, failed: false }
  }
}
