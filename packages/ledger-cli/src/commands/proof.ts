import { GluegunToolbox } from 'gluegun'

export default {
  name: 'proof',
  alias: [],
  description: 'Verify state proofs against block headers',
  hidden: false,
  dashed: false,
  run: async (toolbox: GluegunToolbox) => {
    const { print } = toolbox
    print.info(toolbox.command?.description)
    print.printCommands(toolbox, ['proof'])
    process.exitCode = -1
  },
}
