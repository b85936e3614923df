import { GluegunToolbox } from 'gluegun'

export default {
  name: 'header',
  alias: [],
  description: 'Decode and check block headers',
  hidden: false,
  dashed: false,
  run: async (toolbox: GluegunToolbox) => {
    const { print } = toolbox
    print.info(toolbox.command?.description)
    print.printCommands(toolbox, ['header'])
    process.exitCode = -1
  },
}
