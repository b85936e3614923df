import { GluegunToolbox } from 'gluegun'
import chalk from 'chalk'

import {
  formatData,
  parseOutputFormat,
  positionalArguments,
  readTextFile,
  stringOption,
} from '../../command-helpers'
import { decodeHeaderInput, formatHeader, parseHeaderInput } from '../../headers'

const HELP = `
${chalk.bold('stakebridge header decode')} [options] <header-file>

${chalk.dim('Options:')}

  -b, --block-hash <hash>       Expected block hash (defaults to the hash in the file)
  -h, --help                    Show usage information
  -o, --output table|json|yaml  Choose the output format: table (default), JSON, or YAML

The header file holds either the RLP-encoded header as hex or the JSON block
returned by eth_getBlockByHash.
`

module.exports = {
  name: 'decode',
  alias: [],
  description: 'Decode a block header and check its hash',
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

    const [headerFile] = positionalArguments(parameters)
    if (!headerFile) {
      print.error('No header file provided')
      process.exitCode = 1
      return
    }

    try {
      const input = parseHeaderInput(readTextFile(headerFile))
      const header = decodeHeaderInput(input, stringOption(parameters, 'b', 'blockHash'))
      print.info(formatData(formatHeader(header), outputFormat))
    } catch (error) {
      print.error(String(error))
      process.exitCode = 1
    }
  },
}
