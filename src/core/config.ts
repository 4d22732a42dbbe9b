import { join } from 'node:path'
import Ajv2020 from 'ajv/dist/2020'
import { configSchema } from '../schemas/config.schema'
import { constants } from '../constants'
import { fsx } from '../utils/fs'

/** Project defaults read from netcfg.config.json; command options win over these. */
export interface NetcfgConfig {
  readonly driver?: string
  readonly consoleDriver?: string
  readonly user?: string
  readonly port?: number
  readonly timeout?: number
  readonly logfile?: string
  readonly ignoreWarnings?: readonly string[]
}

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validateConfig = ajv.compile<NetcfgConfig>(configSchema)

/**
 * Load and validate the config file in cwd. A missing file yields empty defaults;
 * a file that is not valid JSON or does not match the schema is an error.
 */
export async function loadConfig(cwd: string): Promise<NetcfgConfig> {
  const path: string = join(cwd, constants.CONFIG_FILE)
  if (!(await fsx.isFile(path))) return {}
  const data: unknown = await fsx.readJson(path)
  if (data === undefined) throw new Error(`${constants.CONFIG_FILE}: not valid JSON`)
  if (!validateConfig(data)) {
    const errs: string[] = (validateConfig.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? ''}`.trim())
    throw new Error(`${constants.CONFIG_FILE}: ${errs.join('; ')}`)
  }
  return data
}
