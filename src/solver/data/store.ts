// Opening stores: in-memory, and a JSON file in a per-user cache directory.
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import type { OpeningRecord, OpeningStore } from '../opening'
import { isScoreMetric } from '../scoring'

export const STORE_FILE = 'openings.json'
const STORE_VERSION = 1

export function defaultCacheDir(): string {
  return process.env.WORDLE_CACHE_DIR || path.join(os.homedir(), '.cache', 'wordle-engine')
}

export class MemoryOpeningStore implements OpeningStore {
  private records = new Map<string, OpeningRecord>()

  async get(key: string): Promise<OpeningRecord | null> {
    return this.records.get(key) ?? null
  }

  async put(record: OpeningRecord): Promise<void> {
    this.records.set(record.key, { ...record })
  }

  keys(): string[] {
    return [...this.records.keys()]
  }
}

interface StoreFile {
  version: typeof STORE_VERSION
  records: OpeningRecord[]
}

function isRecord(r: unknown): r is OpeningRecord {
  return (
    typeof r === 'object' &&
    r !== null &&
    'key' in r &&
    typeof r.key === 'string' &&
    'guess' in r &&
    typeof r.guess === 'string' &&
    'score' in r &&
    typeof r.score === 'number' &&
    'metric' in r &&
    typeof r.metric === 'string' &&
    isScoreMetric(r.metric) &&
    'size' in r &&
    typeof r.size === 'number' &&
    'createdAt' in r &&
    typeof r.createdAt === 'string'
  )
}

// Basic runtime validation to ensure shape before trusting the file
function parseStoreFile(raw: string): OpeningRecord[] | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return null
  }
  if (typeof parsed !== 'object' || parsed === null) return null
  if (!('version' in parsed) || parsed.version !== STORE_VERSION) return null
  if (!('records' in parsed) || !Array.isArray(parsed.records)) return null
  const records: unknown[] = parsed.records
  return records.filter(isRecord)
}

/** One JSON file holding every opening computed on this machine */
export class FileOpeningStore implements OpeningStore {
  readonly file: string

  constructor(dir: string = defaultCacheDir()) {
    this.file = path.join(dir, STORE_FILE)
  }

  /** Missing or corrupt files read as empty */
  async readAll(): Promise<OpeningRecord[]> {
    let raw: string
    try {
      raw = await fs.readFile(this.file, 'utf8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return []
      throw err
    }
    return parseStoreFile(raw) ?? []
  }

  async get(key: string): Promise<OpeningRecord | null> {
    const records = await this.readAll()
    return records.find((r) => r.key === key) ?? null
  }

  async put(record: OpeningRecord): Promise<void> {
    const records = (await this.readAll()).filter((r) => r.key !== record.key)
    records.push(record)
    const body: StoreFile = { version: STORE_VERSION, records }
    await fs.mkdir(path.dirname(this.file), { recursive: true })
    await fs.writeFile(this.file, JSON.stringify(body, null, 2) + '\n', 'utf8')
  }
}
