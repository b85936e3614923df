#!/usr/bin/env node
import { print } from 'gluegun'
import { run } from './cli'

run(process.argv).catch((error) => {
  print.error(String(error))
  process.exitCode = 1
})
