import { GluegunToolbox } from 'gluegun'
import chalk from 'chalk'
import { isHexString } from 'ethers'
import { attestationDomain } from '@stakebridge/ledger-common'

import {
  formatData,
  parseOutputFormat,
  positionalArguments,
  readTextFile,
  stringOption,
} from '../../command-helpers'
import { loadConfig, resolveConfigFile } from '../../config'
import { describeAttestation } from '../../attestations'

const HELP = `
${chalk.bold('stakebridge attestation decode')} [options] <attestation>

${chalk.dim('Options:')}

  -c, --config <file>           Ledger configuration; recovers the signer under its dispute domain
  -h, --help                    Show usage information
  -o, --output table|json|yaml  Choose the output format: table (default), JSON, or YAML

The attestation is given as hex or as the path of a file holding the hex.
`

module.exports = {
  name: 'decode',
  alias: [],
  description: 'Decode an attestation and recover its signer',
  run: async (toolbox: GluegunToolbox) => {
    const { print, parameters } = toolbox

    const { h, help } = parameters.options
    const outputFormat = parseOutputFormat(
      print,
      stringOption(parameters, 'o', 'output') ?? 'table',
    )

    if (help || h) {
      print.info(HELP)
      return
    }
    if (!outputFormat) {
      process.exitCode = 1
      return
    }

    const [input] = positionalArguments(parameters)
    if (!input) {
      print.error('No attestation provided')
      process.exitCode = 1
      return
    }

    const configFile = resolveConfigFile(stringOption(parameters, 'c', 'config'))
    const specification = configFile ? loadConfig(print, configFile) : undefined
    if (configFile && !specification) {
      return
    }

    try {
      const data = isHexString(input) ? input : readTextFile(input)
      const domain = specification ? attestationDomain(specification.disputes) : undefined
      print.info(formatData(describeAttestation(data, domain), outputFormat))
    } catch (error) {
      print.error(String(error))
      process.exitCode = 1
    }
  },
}
