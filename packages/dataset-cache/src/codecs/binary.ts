/**
 * Pre-typed binary codec (MessagePack).
 *
 * Rows keep their native cell types, so no column table is involved.
 * Decoded payloads are still validated: a cache file is external input.
 */

import { decode, encode } from '@msgpack/msgpack'
import { z } from 'zod'
import { errorMessage } from '@brrealty/contracts'
import type { DataTable } from '@brrealty/contracts'
import { TableDecodeError } from './text.js'

const BINARY_VERSION = 1

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

const rowSchema = z
  .object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    value: z.number().nullable(),
  })
  .catchall(cellSchema)

const payloadSchema = z.object({
  version: z.literal(BINARY_VERSION),
  rows: z.array(rowSchema),
})

export function encodeBinary(table: DataTable): Uint8Array {
  return encode({ version: BINARY_VERSION, rows: table })
}

/**
 * @throws TableDecodeError for bytes that are not a versioned row payload
 */
export function decodeBinary(bytes: Uint8Array): DataTable {
  let payload: unknown
  try {
    payload = decode(bytes)
  } catch (error) {
    throw new TableDecodeError(`Invalid MessagePack payload: ${errorMessage(error)}`)
  }

  const parsed = payloadSchema.safeParse(payload)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new TableDecodeError(
      `Unexpected binary cache layout${issue ? ` at ${issue.path.join('.')}: ${issue.message}` : ''}`
    )
  }
  return parsed.data.rows
}
