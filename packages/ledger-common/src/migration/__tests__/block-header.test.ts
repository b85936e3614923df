import { encodeRlp, keccak256 } from 'ethers'
import { LedgerErrorCode } from '../../errors'
import { catchLedgerError } from '../../__tests__/util'
import { blockHash, decodeBlockHeader, encodeBlockHeader } from '../block-header'
import { headerFields } from './l1-state'

const stateRoot = '0x' + 'ab'.repeat(32)

describe('Block headers', () => {
  test('Decodes a header matching the expected hash', () => {
    const header = encodeBlockHeader(headerFields(stateRoot))
    expect(decodeBlockHeader(header, keccak256(header))).toEqual({
      hash: keccak256(header),
      parentHash: '0x' + '11'.repeat(32),
      stateRoot,
      number: 16n,
      timestamp: 1_700_000_000n,
    })
    expect(blockHash(header)).toEqual(keccak256(header))
  })

  test('Accepts headers from before London', () => {
    const header = encodeBlockHeader({ ...headerFields(stateRoot), baseFeePerGas: undefined })
    expect(decodeBlockHeader(header, blockHash(header)).stateRoot).toEqual(stateRoot)
  })

  test('Optional fields end at the first missing one', () => {
    const withoutBaseFee = { ...headerFields(stateRoot), baseFeePerGas: undefined }
    expect(
      encodeBlockHeader({ ...withoutBaseFee, withdrawalsRoot: '0x' + '77'.repeat(32) }),
    ).toEqual(encodeBlockHeader(withoutBaseFee))
  })

  test('Rejects a header with another hash', () => {
    const header = encodeBlockHeader(headerFields(stateRoot))
    const other = encodeBlockHeader(headerFields('0x' + 'cd'.repeat(32)))
    expect(catchLedgerError(() => decodeBlockHeader(header, blockHash(other))).code).toEqual(
      LedgerErrorCode.LE032,
    )
  })

  test('Rejects a header that is not hex', () => {
    expect(
      catchLedgerError(() => decodeBlockHeader('header', '0x' + '00'.repeat(32))).code,
    ).toEqual(LedgerErrorCode.LE033)
  })

  test.each([
    ['a byte string', encodeRlp('0x1234')],
    ['a short list', encodeRlp(['0x01', '0x02'])],
    [
      'a list with a short state root',
      encodeRlp(
        Array.from({ length: 15 }, (_, i) =>
          i === 3 ? '0x' + 'ab'.repeat(20) : '0x' + '01'.repeat(32),
        ),
      ),
    ],
  ])('Rejects %s', (_, header) => {
    expect(catchLedgerError(() => decodeBlockHeader(header, keccak256(header))).code).toEqual(
      LedgerErrorCode.LE033,
    )
  })
})
