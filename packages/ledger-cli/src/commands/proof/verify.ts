import { GluegunToolbox } from 'gluegun'
import chalk from 'chalk'
import { StorageLayout } from '@stakebridge/ledger-common'

import {
  formatData,
  parseOutputFormat,
  positionalArguments,
  readJsonFile,
  stringOption,
} from '../../command-helpers'
import { loadConfig, resolveConfigFile } from '../../config'
import { ProofFile, verifyProofFile } from '../../proofs'

const HELP = `
${chalk.bold('stakebridge proof verify')} [options] <proof-file>

${chalk.dim('Options:')}

  -c, --config <file>           Ledger configuration with the counterpart storage layout
  -h, --help                    Show usage information
  -o, --output table|json|yaml  Choose the output format: table (default), JSON, or YAML

The proof file is a JSON object with the block ("block"), the eth_getProof
response for the account ("address", "accountProof", "storageProof") and
either "curator" and "subgraphId" or a raw storage "slot".
`

module.exports = {
  name: 'verify',
  alias: [],
  description: 'Verify an account and storage proof against a block header',
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

    const [proofFile] = positionalArguments(parameters)
    if (!proofFile) {
      print.error('No proof file provided')
      process.exitCode = 1
      return
    }

    let layout = StorageLayout.parse({})
    const configFile = resolveConfigFile(stringOption(parameters, 'c', 'config'))
    if (configFile) {
      const specification = loadConfig(print, configFile)
      if (!specification) {
        return
      }
      layout = specification.migration.storageLayout
    }

    try {
      const file = ProofFile.parse(readJsonFile(proofFile))
      print.info(formatData(verifyProofFile(file, layout), outputFormat))
    } catch (error) {
      print.error(String(error))
      process.exitCode = 1
    }
  },
}
