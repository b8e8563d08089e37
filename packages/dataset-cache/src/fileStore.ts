/**
 * Local directory cache.
 *
 * Layout:
 * ```
 * <dir>/bcb_series.csv.gz
 * <dir>/b3_stocks.msgpack
 * <dir>/_metadata.json     { "bcb_series": { "cachedAt": "...", "format": "csv.gz", "rows": 1234 } }
 * ```
 *
 * Loads try the catalogued format first, then the other formats. Saves
 * always use the catalogued format and record the write time.
 */

import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import type { CacheEntry, CacheFormat, DataTable } from '@brrealty/contracts'
import { CacheMissError, errorMessage, isCacheFormat } from '@brrealty/contracts'
import type { Logger } from '@brrealty/logger'
import { columnsFor, formatCandidates, formatFor } from './catalog.js'
import { FORMAT_EXTENSIONS, decodeTable, encodeTable } from './codecs/index.js'
import { cacheAgeDays, isStale } from './freshness.js'
import type { CacheCatalog, CacheFileStatus, CachedTable, SaveOptions, WritableCacheStore } from './types.js'

const METADATA_FILE = '_metadata.json'

const metadataSchema = z.record(
  z.object({
    cachedAt: z.string(),
    format: z.string(),
    rows: z.number().int().nonnegative().optional(),
    source: z.string().optional(),
  })
)

type CacheMetadata = z.infer<typeof metadataSchema>

export interface FileCacheStoreOptions {
  /** Cache directory; created on first save */
  dir: string
  catalog?: CacheCatalog
  logger?: Logger
  /** Clock for cachedAt and staleness (tests) */
  now?: () => Date
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Split a file name into cache name and format, longest extension first.
 */
function parseFileName(file: string): { name: string; format: CacheFormat } | undefined {
  const formats = Object.keys(FORMAT_EXTENSIONS)
    .filter(isCacheFormat)
    .sort((a, b) => FORMAT_EXTENSIONS[b].length - FORMAT_EXTENSIONS[a].length)

  for (const format of formats) {
    const extension = FORMAT_EXTENSIONS[format]
    if (file.endsWith(extension) && file.length > extension.length) {
      return { name: file.slice(0, -extension.length), format }
    }
  }
  return undefined
}

export class FileCacheStore implements WritableCacheStore {
  readonly kind = 'file'

  readonly dir: string
  private readonly catalog: CacheCatalog
  private readonly logger?: Logger
  private readonly now: () => Date

  constructor(options: FileCacheStoreOptions) {
    this.dir = options.dir
    this.catalog = options.catalog ?? {}
    this.logger = options.logger
    this.now = options.now ?? (() => new Date())
  }

  pathFor(name: string, format: CacheFormat = formatFor(this.catalog, name)): string {
    return path.join(this.dir, `${name}${FORMAT_EXTENSIONS[format]}`)
  }

  async load(name: string): Promise<CachedTable> {
    for (const format of formatCandidates(this.catalog, name)) {
      const location = this.pathFor(name, format)

      let bytes: Buffer
      try {
        bytes = await readFile(location)
      } catch (error) {
        if (isNotFound(error)) {
          continue
        }
        throw new CacheMissError(`Cannot read ${location}`, { name, location, reason: 'read_failed' }, error)
      }

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

      const metadata = await this.readMetadata()
      this.logger?.debug('Local cache hit', { cache: name, format, rows: table.length })
      return { entry: { name, format, location }, table, cachedAt: metadata[name]?.cachedAt }
    }

    throw new CacheMissError(`"${name}" is not in the local cache`, {
      name,
      location: this.dir,
      reason: 'not_found',
    })
  }

  async save(name: string, table: DataTable, options: SaveOptions = {}): Promise<CacheEntry> {
    const format = formatFor(this.catalog, name)
    const location = this.pathFor(name, format)

    await mkdir(this.dir, { recursive: true })
    await this.writeAtomic(location, await encodeTable(format, table))

    const metadata = await this.readMetadata()
    metadata[name] = {
      cachedAt: options.cachedAt ?? this.now().toISOString(),
      format,
      rows: table.length,
      source: options.source,
    }
    await this.writeAtomic(path.join(this.dir, METADATA_FILE), JSON.stringify(metadata, null, 2))

    this.logger?.info('Saved dataset to local cache', { cache: name, format, rows: table.length, location })
    return { name, format, location }
  }

  /**
   * Every cache file in the directory with its metadata and staleness.
   * A missing directory lists as empty.
   */
  async list(): Promise<CacheFileStatus[]> {
    let files: string[]
    try {
      files = await readdir(this.dir)
    } catch (error) {
      if (isNotFound(error)) {
        return []
      }
      throw error
    }

    const metadata = await this.readMetadata()
    const now = this.now()
    const statuses: CacheFileStatus[] = []

    for (const file of files.sort()) {
      const parsed = parseFileName(file)
      if (parsed === undefined) {
        continue
      }
      const location = path.join(this.dir, file)
      const info = await stat(location)
      const meta = metadata[parsed.name]
      const settings = this.catalog[parsed.name]

      statuses.push({
        name: parsed.name,
        format: parsed.format,
        location,
        sizeBytes: info.size,
        cachedAt: meta?.cachedAt,
        rows: meta?.rows,
        source: meta?.source,
        ageDays: meta === undefined ? undefined : cacheAgeDays(meta.cachedAt, now),
        stale: isStale(meta?.cachedAt, settings, now),
      })
    }
    return statuses
  }

  /**
   * Remove the cache files for `names` in every format, or every cache file
   * when no names are given, and drop their metadata. Files that are not
   * cache files stay. Returns the entries that were deleted.
   */
  async clear(names?: readonly string[]): Promise<CacheEntry[]> {
    let files: string[]
    try {
      files = await readdir(this.dir)
    } catch (error) {
      if (isNotFound(error)) {
        return []
      }
      throw error
    }

    const wanted = names === undefined ? undefined : new Set(names)
    const removed: CacheEntry[] = []
    for (const file of files.sort()) {
      const parsed = parseFileName(file)
      if (parsed === undefined || (wanted !== undefined && !wanted.has(parsed.name))) {
        continue
      }
      const location = path.join(this.dir, file)
      await rm(location, { force: true })
      removed.push({ name: parsed.name, format: parsed.format, location })
    }

    const metadataLocation = path.join(this.dir, METADATA_FILE)
    if (wanted === undefined) {
      await rm(metadataLocation, { force: true })
    } else {
      const metadata = await this.readMetadata()
      const kept = Object.fromEntries(Object.entries(metadata).filter(([name]) => !wanted.has(name)))
      if (Object.keys(kept).length !== Object.keys(metadata).length) {
        await this.writeAtomic(metadataLocation, JSON.stringify(kept, null, 2))
      }
    }

    this.logger?.info('Cleared local cache', { dir: this.dir, removed: removed.map((entry) => entry.name) })
    return removed
  }

  /**
   * Unreadable or malformed metadata is treated as empty, with a warning;
   * it only affects staleness reporting.
   */
  private async readMetadata(): Promise<CacheMetadata> {
    const location = path.join(this.dir, METADATA_FILE)
    let raw: string
    try {
      raw = await readFile(location, 'utf8')
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger?.warn('Cannot read cache metadata', { location, error: errorMessage(error) })
      }
      return {}
    }

    try {
      const parsed = metadataSchema.safeParse(JSON.parse(raw))
      if (parsed.success) {
        return parsed.data
      }
      this.logger?.warn('Ignoring malformed cache metadata', { location, issues: parsed.error.issues.length })
    } catch (error) {
      this.logger?.warn('Ignoring malformed cache metadata', { location, error: errorMessage(error) })
    }
    return {}
  }

  private async writeAtomic(location: string, data: Uint8Array | string): Promise<void> {
    const temporary = `${location}.${process.pid}.tmp`
    await writeFile(temporary, data)
    await rename(temporary, location)
  }
}
