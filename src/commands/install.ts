import { Command, InvalidArgumentError } from 'commander'
import { resolve } from 'node:path'
import Ajv2020 from 'ajv/dist/2020'
import type { ConsoleDescriptor, Credentials, DeploymentSpec } from '../types/deployment-spec'
import type { TransportResult } from '../types/transport-result'
import type { TransportKind } from '../core/transport/transport-interface'
import { DeploymentOrchestrator, validateDeploymentSpec, type DeploymentStage } from '../core/orchestrator'
import { createTransport } from '../core/transport/select'
import { loadConfig, type NetcfgConfig } from '../core/config'
import { formatFromPath, formatFromTag } from '../core/format'
import { installSummarySchema } from '../schemas/install-summary.schema'
import { constants } from '../constants'
import { DeployError, describeError, errorMessage, isDeployError } from '../utils/errors'
import { formatDiffHuman, formatDuration } from '../utils/format'
import { fsx } from '../utils/fs'
import { logger } from '../utils/logger'
import { spinner, type Spinner } from '../utils/ui'

export interface InstallOptions {
  readonly host?: string
  readonly user?: string
  readonly passwd?: string
  readonly port?: number
  readonly console?: string
  readonly consoleTarget?: string
  readonly format?: string
  readonly overwrite?: boolean
  readonly replace?: boolean
  readonly merge?: boolean
  readonly timeout?: number
  readonly comment?: string
  readonly confirm?: number
  readonly checkCommitWait?: number
  readonly logfile?: string
  readonly diffsFile?: string
  readonly savedir?: string
  readonly check?: boolean
  readonly diff?: boolean
  readonly ignoreWarning?: readonly string[]
  readonly driver?: string
  readonly consoleDriver?: string
  readonly json?: boolean
}

const STAGE_LABELS: Readonly<Record<DeploymentStage, string>> = {
  CONNECTING: 'connecting',
  LOCKED: 'locked configuration',
  LOADED: 'configuration staged',
  DIFFED: 'diff computed',
  CHECKED: 'commit check passed',
  COMMITTED: 'committed',
  UNLOCKED: 'unlocked',
  APPLIED: 'applied over console',
  SUCCESS: 'done',
  FAILED: 'failed'
}

function parseWhole(name: string): (value: string) => number {
  return (value: string): number => {
    const n = Number(value)
    if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError(`${name} must be a whole number`)
    return n
  }
}

function collect(value: string, previous: readonly string[] = []): readonly string[] {
  return [...previous, value]
}

function consoleDescriptor(opts: InstallOptions, host: string): ConsoleDescriptor | undefined {
  const mode = (opts.console ?? 'none').toLowerCase()
  if (mode === 'none') return undefined
  if (mode === 'telnet') return { mode: 'telnet', host: opts.consoleTarget ?? host, port: opts.port ?? constants.DEFAULT_TELNET_PORT }
  if (mode === 'serial') return { mode: 'serial', device: opts.consoleTarget ?? constants.DEFAULT_SERIAL_DEVICE }
  throw new DeployError('validation_error', `Invalid options: console must be telnet, serial or none, got ${opts.console ?? ''}`)
}

/**
 * Turn command options, config defaults and the environment into a deployment spec.
 * Checks that the file exists; everything else is left to the orchestrator.
 */
export async function buildDeploymentSpec(file: string, opts: InstallOptions, cfg: NetcfgConfig, cwd: string): Promise<DeploymentSpec> {
  const filePath: string = resolve(cwd, file)
  if (!(await fsx.isFile(filePath))) throw new DeployError('validation_error', `Invalid options: file not found: ${filePath}`)
  let format = formatFromPath(filePath)
  if (opts.format !== undefined) {
    const tagged = formatFromTag(opts.format)
    if (tagged === undefined) throw new DeployError('validation_error', `Invalid options: format must be text, xml or set, got ${opts.format}`)
    format = tagged
  }
  const host: string = opts.host ?? 'localhost'
  const user: string = opts.user ?? cfg.user ?? process.env.USER ?? 'root'
  const password: string | undefined = opts.passwd ?? process.env.NCD_PASSWORD
  const credentials: Credentials = password !== undefined && password.length > 0
    ? { user, kind: 'password', password }
    : { user, kind: 'assumed' }
  const consoleDesc = consoleDescriptor(opts, host)
  return {
    host,
    port: consoleDesc === undefined ? (opts.port ?? cfg.port ?? constants.DEFAULT_RPC_PORT) : undefined,
    credentials,
    filePath,
    format,
    overwrite: opts.overwrite === true,
    replace: opts.replace === true,
    merge: opts.merge === true,
    timeoutSeconds: opts.timeout ?? cfg.timeout ?? 0,
    commit: {
      comment: opts.comment,
      confirmMinutes: opts.confirm,
      preCommitWaitSeconds: opts.checkCommitWait
    },
    checkMode: opts.check === true,
    returnDiff: opts.diff === true,
    diffSinkPath: opts.diffsFile !== undefined ? resolve(cwd, opts.diffsFile) : undefined,
    console: consoleDesc,
    saveDir: opts.savedir !== undefined ? resolve(cwd, opts.savedir) : undefined,
    ignoreWarnings: [...(cfg.ignoreWarnings ?? []), ...(opts.ignoreWarning ?? [])]
  }
}

/**
 * Register the `install` command.
 */
export function registerInstallCommand(program: Command): void {
  const ajv = new Ajv2020({ allErrors: true, strict: false })
  const validate = ajv.compile<unknown>(installSummarySchema)
  const annotate = (obj: Record<string, unknown>): Record<string, unknown> => {
    const ok: boolean = validate(obj)
    const errs: string[] = Array.isArray(validate.errors) ? validate.errors.map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim()) : []
    if (process.env.NCD_SCHEMA_STRICT === '1' && errs.length > 0) { process.exitCode = 1 }
    return { ...obj, schemaOk: ok, schemaErrors: errs }
  }
  program
    .command('install')
    .description('Install a configuration file on a device as one locked transaction')
    .argument('<file>', 'Configuration file (.conf/.text, .xml or .set)')
    .option('--host <host>', 'Device hostname or address', 'localhost')
    .option('--user <user>', 'Login user (defaults to $USER)')
    .option('--passwd <password>', 'Login password (or NCD_PASSWORD); omit for key-based login')
    .option('--port <port>', 'Management port (830) or telnet console port (23)', parseWhole('port'))
    .option('--console <mode>', 'Bootstrap over the console: telnet | serial | none', 'none')
    .option('--console-target <target>', 'Telnet host (defaults to --host) or serial device (defaults to /dev/ttyUSB0)')
    .option('--format <tag>', 'Content format: text | xml | set (default: from file extension)')
    .option('--overwrite', 'Replace the whole configuration with the file')
    .option('--replace', 'Apply replace: tags in the file')
    .option('--merge', 'Console only: merge instead of overwriting')
    .option('--timeout <seconds>', 'Session timeout in seconds (0 keeps the driver default)', parseWhole('timeout'))
    .option('--comment <text>', 'Commit comment')
    .option('--confirm <minutes>', 'Commit confirmed: roll back after N minutes unless confirmed', parseWhole('confirm'))
    .option('--check-commit-wait <seconds>', 'Pause 1-4 seconds between commit check and commit', parseWhole('check-commit-wait'))
    .option('--logfile <path>', 'Append a log of this run to a file')
    .option('--diffs-file <path>', 'Write the configuration diff to a file')
    .option('--savedir <dir>', 'Console only: directory to save device facts into')
    .option('--check', 'Check mode: stage and validate, never commit')
    .option('--diff', 'Show the configuration diff')
    .option('--ignore-warning <text>', 'Do not fail on load warnings containing text (repeatable)', collect)
    .option('--driver <id>', 'Management session driver module (or NCD_DRIVER; virtual for a local dry run)')
    .option('--console-driver <id>', 'Console session driver: cli | virtual (default: cli)')
    .option('--json', 'Output JSON result')
    .action(async (file: string, opts: InstallOptions): Promise<void> => {
      const cwd: string = process.cwd()
      const t0: number = Date.now()
      const jsonMode: boolean = opts.json === true || process.env.NCD_JSON === '1' || process.env.NCD_NDJSON === '1'
      if (jsonMode) logger.setJsonOnly(true)
      let host: string = opts.host ?? 'localhost'
      let kind: TransportKind = (opts.console ?? 'none').toLowerCase() === 'none' ? 'rpc' : 'console'
      let checkMode: boolean = opts.check === true
      let sp: Spinner | undefined
      const emit = (result: TransportResult): void => {
        const remedy: string | undefined = result.error ? describeError(result.error.kind, result.error.message).remedy : undefined
        if (result.error) process.exitCode = 1
        if (jsonMode) {
          logger.json(annotate({
            action: 'install',
            host,
            transport: kind,
            changed: result.changed,
            checkMode,
            ...(result.diff !== undefined ? { diff: result.diff } : {}),
            ...(result.error ? { error: { ...result.error, ...(remedy ? { remedy } : {}) } } : {}),
            durationMs: Date.now() - t0,
            final: true
          }))
          return
        }
        if (result.diff !== undefined && opts.diff === true) {
          logger.section('Configuration diff')
          // eslint-disable-next-line no-console
          console.log(formatDiffHuman(result.diff))
        }
        if (result.error) {
          if (remedy) logger.note(remedy)
          return
        }
        const verb: string = checkMode ? 'validated (check mode)' : (result.changed ? (kind === 'console' ? 'applied' : 'committed') : 'unchanged')
        logger.success(`${host}: configuration ${verb} in ${formatDuration(Date.now() - t0)}`)
      }
      try {
        const cfg: NetcfgConfig = await loadConfig(cwd)
        const logfile: string | undefined = opts.logfile ?? cfg.logfile
        if (logfile !== undefined) logger.setLogFile(resolve(cwd, logfile))
        const spec: DeploymentSpec = await buildDeploymentSpec(file, opts, cfg, cwd)
        host = spec.host
        kind = spec.console !== undefined ? 'console' : 'rpc'
        checkMode = spec.checkMode
        if (spec.credentials.kind === 'password') logger.setRedactors([spec.credentials.password])
        validateDeploymentSpec(spec, kind)
        const driverId: string | undefined = opts.driver ?? process.env.NCD_DRIVER ?? cfg.driver
        // Relative driver modules are resolved against the working directory, not this file.
        const driver: string | undefined = driverId !== undefined && driverId.startsWith('.') ? resolve(cwd, driverId) : driverId
        if (kind === 'rpc' && driver === undefined) {
          throw new DeployError('validation_error', 'Invalid options: no session driver configured; pass --driver <module> or set NCD_DRIVER (virtual for a local dry run)')
        }
        const transport = await createTransport(spec, {
          driver: driver ?? '',
          consoleDriver: opts.consoleDriver ?? cfg.consoleDriver ?? constants.DEFAULT_CONSOLE_DRIVER
        })
        logger.info(`Installing ${spec.filePath} on ${host} over ${kind === 'console' ? `${spec.console?.mode ?? ''} console` : 'RPC session'}`)
        const progress: Spinner = spinner(`${host}: connecting`)
        sp = progress
        const onStage = (stage: DeploymentStage): void => {
          if (process.env.NCD_NDJSON === '1') logger.json({ action: 'install', event: 'stage', stage, host })
          if (stage === 'SUCCESS') progress.succeed(`${host}: ${STAGE_LABELS[stage]}`)
          else if (stage === 'FAILED') progress.fail(`${host}: ${STAGE_LABELS[stage]}`)
          else progress.update(`${host}: ${STAGE_LABELS[stage]}`)
        }
        const result: TransportResult = await new DeploymentOrchestrator(transport, { onStage }).run(spec)
        emit(result)
      } catch (err) {
        sp?.fail(`${host}: ${STAGE_LABELS.FAILED}`)
        if (isDeployError(err)) {
          logger.error(err.message)
          emit({ changed: false, error: { kind: err.kind, message: err.message } })
          return
        }
        logger.error(errorMessage(err))
        if (jsonMode) logger.json({ action: 'install', ok: false, message: errorMessage(err), final: true })
        process.exitCode = 1
      }
    })
}
