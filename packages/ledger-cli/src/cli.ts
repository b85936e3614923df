import { build } from 'gluegun'

export const run = async (argv: string[]) => {
  const cli = build()
    .brand('stakebridge')
    .help()
    .version()
    .src(__dirname)
    .defaultCommand()
    .create()

  return await cli.run(argv)
}
