/**
 * Format dispatch: bytes on disk or on the wire to typed tables and back.
 */

import { promisify } from 'node:util'
import * as zlib from 'node:zlib'
import type { CacheFormat, DataTable } from '@brrealty/contracts'
import type { ColumnTypes } from '../types.js'
import { decodeBinary, encodeBinary } from './binary.js'
import { decodeText, encodeText } from './text.js'

const gzip = promisify(zlib.gzip)
const gunzip = promisify(zlib.gunzip)

export { TableDecodeError, DEFAULT_COLUMN_TYPES } from './text.js'

/** File extension for each format; also used to build remote URLs. */
export const FORMAT_EXTENSIONS: Record<CacheFormat, string> = {
  'csv.gz': '.csv.gz',
  csv: '.csv',
  msgpack: '.msgpack',
}

export async function decodeTable(format: CacheFormat, bytes: Uint8Array, columns?: ColumnTypes): Promise<DataTable> {
  switch (format) {
    case 'csv.gz': {
      const text = (await gunzip(bytes)).toString('utf8')
      return decodeText(text, columns)
    }
    case 'csv':
      return decodeText(Buffer.from(bytes).toString('utf8'), columns)
    case 'msgpack':
      return decodeBinary(bytes)
  }
}

export async function encodeTable(format: CacheFormat, table: DataTable): Promise<Uint8Array> {
  switch (format) {
    case 'csv.gz':
      return gzip(Buffer.from(encodeText(table), 'utf8'))
    case 'csv':
      return Buffer.from(encodeText(table), 'utf8')
    case 'msgpack':
      return encodeBinary(table)
  }
}
