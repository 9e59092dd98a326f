/**
 * Read-only offline chart database backed by one JSON file per source.
 *
 * File shape: `{ "NZAA": { "name": "Auckland", "charts": [{ "name", "url" }] } }`
 * Loaded on first use and kept for the life of the process. A failed read
 * is not kept, so the next lookup tries the file again.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import type { FailureKind } from '../errors.js'
import { parseJsonWith } from '../kit/json.js'

const offlineChartSchema = z.object({
  name: z.string(),
  url: z.string().min(1),
  category: z.string().optional(),
})

const offlineAirportSchema = z.object({
  name: z.string().optional(),
  charts: z.array(offlineChartSchema),
})

const offlineDatabaseSchema = z.record(z.string(), offlineAirportSchema)

export type OfflineChartEntry = z.infer<typeof offlineChartSchema>
export type OfflineAirportEntry = z.infer<typeof offlineAirportSchema>

export type OfflineLookup =
  | { ok: true; entry: OfflineAirportEntry | undefined }
  | { ok: false; kind: FailureKind; details: string }

export interface OfflineChartStore {
  lookup(sourceId: string, identifier: string): Promise<OfflineLookup>
}

type LoadedDatabase =
  | { ok: true; airports: ReadonlyMap<string, OfflineAirportEntry> }
  | { ok: false; kind: FailureKind; details: string }

export class JsonFileChartStore implements OfflineChartStore {
  private readonly databases = new Map<string, Promise<LoadedDatabase>>()

  constructor(private readonly dataDir: string) {}

  async lookup(sourceId: string, identifier: string): Promise<OfflineLookup> {
    const database = await this.load(sourceId)
    if (!database.ok) return database
    return { ok: true, entry: database.airports.get(identifier.toUpperCase()) }
  }

  private load(sourceId: string): Promise<LoadedDatabase> {
    let pending = this.databases.get(sourceId)
    if (!pending) {
      pending = readDatabase(join(this.dataDir, `${sourceId}.json`)).then((database) => {
        if (!database.ok) this.databases.delete(sourceId)
        return database
      })
      this.databases.set(sourceId, pending)
    }
    return pending
  }
}

async function readDatabase(path: string): Promise<LoadedDatabase> {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    return {
      ok: false,
      kind: 'UpstreamUnavailable',
      details: `Offline database unreadable at ${path}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    }
  }

  const parsed = parseJsonWith(raw, offlineDatabaseSchema)
  if (!parsed.ok) {
    return {
      ok: false,
      kind: 'ParseMismatch',
      details: `Offline database ${path}: ${parsed.error}`,
    }
  }

  const airports = new Map<string, OfflineAirportEntry>()
  for (const [icao, entry] of Object.entries(parsed.value)) {
    airports.set(icao.toUpperCase(), entry)
  }
  return { ok: true, airports }
}

/** In-memory store, for tests and embedding callers. */
export class MemoryChartStore implements OfflineChartStore {
  private readonly sources: ReadonlyMap<string, ReadonlyMap<string, OfflineAirportEntry>>

  constructor(data: Record<string, Record<string, OfflineAirportEntry>>) {
    const sources = new Map<string, ReadonlyMap<string, OfflineAirportEntry>>()
    for (const [sourceId, airports] of Object.entries(data)) {
      const entries = Object.entries(airports).map(
        ([icao, entry]) => [icao.toUpperCase(), entry] as const
      )
      sources.set(sourceId, new Map(entries))
    }
    this.sources = sources
  }

  async lookup(sourceId: string, identifier: string): Promise<OfflineLookup> {
    const airports = this.sources.get(sourceId)
    if (!airports) {
      return {
        ok: false,
        kind: 'UpstreamUnavailable',
        details: `No offline database for ${sourceId}`,
      }
    }
    return { ok: true, entry: airports.get(identifier.toUpperCase()) }
  }
}
