import fs from 'fs'
import { GluegunPrint } from 'gluegun'
import { ZodError } from 'zod'
import {
  formatZodParsingError,
  loadProtocolSpecification,
  ProtocolSpecification,
} from '@stakebridge/ledger-common'

export const DEFAULT_CONFIG_FILE = 'stakebridge.yml'

/** `--config`, then `STAKEBRIDGE_CONFIG`, then `stakebridge.yml` if present */
export const resolveConfigFile = (configFile?: string): string | undefined => {
  if (configFile) {
    return configFile
  }
  if (process.env.STAKEBRIDGE_CONFIG) {
    return process.env.STAKEBRIDGE_CONFIG
  }
  return fs.existsSync(DEFAULT_CONFIG_FILE) ? DEFAULT_CONFIG_FILE : undefined
}

export const loadConfig = (
  print: GluegunPrint,
  configFile: string,
): ProtocolSpecification | undefined => {
  try {
    return loadProtocolSpecification(configFile)
  } catch (error) {
    if (error instanceof ZodError) {
      print.error(formatZodParsingError(error, configFile))
    } else {
      print.error(`Failed to load ledger configuration from ${configFile}: ${error}`)
    }
    process.exitCode = 1
    return undefined
  }
}
