import { argumentText, formatData, OutputFormat } from '../command-helpers'

describe('formatData', () => {
  test('JSON', () => {
    expect(formatData({ status: 'Pending', count: 2 }, OutputFormat.Json)).toEqual(
      '{\n  "status": "Pending",\n  "count": 2\n}',
    )
  })

  test('YAML', () => {
    expect(formatData({ status: 'Pending', count: 2 }, OutputFormat.Yaml)).toEqual(
      'status: Pending\ncount: 2',
    )
  })

  test('Table of a single row', () => {
    expect(formatData({ a: 'x', b: 'y' }, OutputFormat.Table)).toEqual(
      ['┌───┬───┐', '│ a │ b │', '├───┼───┤', '│ x │ y │', '└───┴───┘'].join('\n'),
    )
  })

  test('Table of several rows', () => {
    expect(
      formatData(
        [
          { a: 'x', b: 1 },
          { a: 'z', b: null },
        ],
        OutputFormat.Table,
      ),
    ).toEqual(
      [
        '┌───┬──────┐',
        '│ a │ b    │',
        '├───┼──────┤',
        '│ x │ 1    │',
        '├───┼──────┤',
        '│ z │ null │',
        '└───┴──────┘',
      ].join('\n'),
    )
  })

  test('Empty table', () => {
    expect(formatData([], OutputFormat.Table)).toEqual('No data')
  })
})

describe('argumentText', () => {
  const argv = ['node', 'stakebridge', 'proof', 'curator-slot', '0xabc', 'file.json']

  test('Keeps strings', () => {
    expect(argumentText('file.json', argv)).toEqual('file.json')
  })

  test('Recovers hex arguments read as numbers', () => {
    expect(argumentText(Number('0xabc'), argv)).toEqual('0xabc')
  })

  test('Falls back to the number itself', () => {
    expect(argumentText(2748, ['node', 'stakebridge'])).toEqual('2748')
  })

  test('Ignores flags', () => {
    expect(argumentText(true, argv)).toBeUndefined()
  })
})
