import fs from 'fs'
import yaml from 'yaml'
import { GluegunParameters, GluegunPrint } from 'gluegun'
import { table, getBorderCharacters } from 'table'

export enum OutputFormat {
  Table = 'table',
  Json = 'json',
  Yaml = 'yaml',
}

export type DisplayValue = string | number | boolean | null

export type DisplayRow = Record<string, DisplayValue>

export const formatData = (data: DisplayRow | DisplayRow[], format: OutputFormat): string =>
  format === OutputFormat.Json
    ? JSON.stringify(data, null, 2)
    : format === OutputFormat.Yaml
    ? yaml.stringify(data).trim()
    : Array.isArray(data)
    ? data.length === 0
      ? 'No data'
      : table([Object.keys(data[0]), ...data.map((row) => Object.values(row).map(String))], {
          border: getBorderCharacters('norc'),
        }).trim()
    : table([Object.keys(data), Object.values(data).map(String)], {
        border: getBorderCharacters('norc'),
      }).trim()

export function parseOutputFormat(
  print: GluegunPrint,
  outputFormat: string,
): OutputFormat | undefined {
  switch (outputFormat) {
    case OutputFormat.Table:
      print.colors.enable()
      return OutputFormat.Table
    case OutputFormat.Json:
      print.colors.disable()
      return OutputFormat.Json
    case OutputFormat.Yaml:
      print.colors.disable()
      return OutputFormat.Yaml
    default:
      print.error(`Invalid output format "${outputFormat}"`)
      return
  }
}

// The argument parser reads 0x-prefixed arguments as numbers, so the typed
// text is looked up again in argv
export function argumentText(value: unknown, argv: string[] = process.argv): string | undefined {
  if (typeof value === 'string') {
    return value
  }
  if (typeof value !== 'number') {
    return undefined
  }
  return argv.find((arg) => /^0x[0-9a-f]+$/i.test(arg) && Number(arg) === value) ?? String(value)
}

export function positionalArguments(
  parameters: GluegunParameters,
  argv: string[] = process.argv,
): string[] {
  return (parameters.array ?? []).flatMap((value: unknown) => argumentText(value, argv) ?? [])
}

/** The value of the first of `names` given as an option with a value */
export function stringOption(
  parameters: GluegunParameters,
  ...names: string[]
): string | undefined {
  for (const name of names) {
    const text = argumentText(parameters.options[name])
    if (text !== undefined) {
      return text
    }
  }
  return undefined
}

export function flagOption(parameters: GluegunParameters, ...names: string[]): boolean {
  return names.some((name) => parameters.options[name] === true)
}

export function readTextFile(file: string): string {
  return fs.readFileSync(file, 'utf-8').trim()
}

export function readJsonFile(file: string): unknown {
  return JSON.parse(readTextFile(file))
}
