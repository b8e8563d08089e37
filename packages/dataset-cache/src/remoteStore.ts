/**
 * Read-only cache published over HTTP, e.g. as release assets:
 *
 * ```
 * https://example.test/releases/download/cache-latest/bcb_series.csv.gz
 * ```
 *
 * Every failure (404, other statuses, network errors, timeouts, bad bytes)
 * surfaces as CacheMissError so callers can fall through to a live fetch.
 */

import type { DataTable } from '@brrealty/contracts'
import { CacheMissError, errorMessage } from '@brrealty/contracts'
import type { Logger } from '@brrealty/logger'
import { columnsFor, formatFor } from './catalog.js'
import { FORMAT_EXTENSIONS, decodeTable } from './codecs/index.js'
import type { CacheCatalog, CachedTable, CacheStore } from './types.js'

const DEFAULT_TIMEOUT_MS = 30000

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface RemoteCacheStoreOptions {
  /** Directory URL holding `<name><extension>` assets */
  baseUrl: string
  catalog?: CacheCatalog
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number
  /** Defaults to the global fetch */
  fetchImpl?: FetchLike
  logger?: Logger
}

export class RemoteCacheStore implements CacheStore {
  readonly kind = 'remote'

  private readonly baseUrl: string
  private readonly catalog: CacheCatalog
  private readonly timeoutMs: number
  private readonly fetchImpl: FetchLike
  private readonly logger?: Logger

  constructor(options: RemoteCacheStoreOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.catalog = options.catalog ?? {}
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
    this.logger = options.logger
  }

  urlFor(name: string): string {
    return `${this.baseUrl}/${encodeURIComponent(name)}${FORMAT_EXTENSIONS[formatFor(this.catalog, name)]}`
  }

  async load(name: string): Promise<CachedTable> {
    const format = formatFor(this.catalog, name)
    const location = this.urlFor(name)
    const { bytes, cachedAt } = await this.download(name, location)

    let table: DataTable
    try {
      table = await decodeTable(format, bytes, columnsFor(this.catalog, name))
    } catch (error) {
      throw new CacheMissError(
        `Cannot decode ${location}: ${errorMessage(error)}`,
        { name, location, reason: 'decode_failed' },
        error
      )
    }

    this.logger?.debug('Remote cache hit', { cache: name, format, rows: table.length })
    return { entry: { name, format, location }, table, cachedAt }
  }

  /**
   * GET with the timeout covering both headers and body.
   */
  private async download(name: string, location: string): Promise<{ bytes: Uint8Array; cachedAt?: string }> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await this.fetchImpl(location, { signal: controller.signal })
      if (!response.ok) {
        throw new CacheMissError(`Remote cache returned HTTP ${response.status} for "${name}"`, {
          name,
          location,
          reason: response.status === 404 ? 'not_found' : `http_${response.status}`,
          status: response.status,
        })
      }
      return { bytes: new Uint8Array(await response.arrayBuffer()), cachedAt: lastModified(response) }
    } catch (error) {
      if (error instanceof CacheMissError) {
        throw error
      }
      const reason = error instanceof Error && error.name === 'AbortError' ? 'timeout' : 'network'
      throw new CacheMissError(`Remote cache unreachable: ${errorMessage(error)}`, { name, location, reason }, error)
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

function lastModified(response: Response): string | undefined {
  const header = response.headers.get('last-modified')
  if (header === null) {
    return undefined
  }
  const parsed = Date.parse(header)
  return Number.isNaN(parsed) ? undefined : new Date(parsed).toISOString()
}
