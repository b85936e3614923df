import { GluegunToolbox } from 'gluegun'
import chalk from 'chalk'
import { isAddress, isHexString } from 'ethers'
import { curatorSignalSlot, StorageLayout } from '@stakebridge/ledger-common'

import {
  formatData,
  parseOutputFormat,
  positionalArguments,
  stringOption,
} from '../../command-helpers'
import { loadConfig, resolveConfigFile } from '../../config'

const HELP = `
${chalk.bold('stakebridge proof curator-slot')} [options] <curator> <subgraph-id>

${chalk.dim('Options:')}

  -c, --config <file>           Ledger configuration with the counterpart storage layout
  -h, --help                    Show usage information
  -o, --output table|json|yaml  Choose the output format: table (default), JSON, or YAML
`

module.exports = {
  name: 'curator-slot',
  alias: [],
  description: `Compute the storage slot of a curator's signal on a subgraph`,
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

    const [curator, subgraphId] = positionalArguments(parameters)
    if (!curator || !isAddress(curator)) {
      print.error(`Invalid curator address '${curator}'`)
      process.exitCode = 1
      return
    }
    if (!subgraphId || !isHexString(subgraphId, 32)) {
      print.error(`Invalid subgraph id '${subgraphId}': Must be a 32 byte hex string`)
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

    print.info(
      formatData(
        {
          curator,
          subgraphId,
          subgraphsMappingSlot: layout.subgraphsMappingSlot,
          curatorSignalSlotOffset: layout.curatorSignalSlotOffset,
          slot: curatorSignalSlot(curator, subgraphId, layout),
        },
        outputFormat,
      ),
    )
  },
}
