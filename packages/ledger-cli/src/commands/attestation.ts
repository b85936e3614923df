import { GluegunToolbox } from 'gluegun'

export default {
  name: 'attestation',
  alias: [],
  description: 'Inspect query attestations',
  hidden: false,
  dashed: false,
  run: async (toolbox: GluegunToolbox) => {
    const { print } = toolbox
    print.info(toolbox.command?.description)
    print.printCommands(toolbox, ['attestation'])
    process.exitCode = -1
  },
}
