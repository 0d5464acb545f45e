#!/usr/bin/env tsx
/* eslint-disable no-console */
/**
 * Opening precomputation
 * ----------------------
 * Scores every word of a list as the first guess (|D|² feedback evaluations),
 * spread over a pool of worker threads, and stores the winner in the opening
 * cache keyed by the list's FNV-1a hash, length, size and metric:
 *
 *   <cache-dir>/openings.json   (default ~/.cache/wordle-engine, or $WORDLE_CACHE_DIR)
 *
 * A later run over the same list is served from the cache.
 *
 * CLI flags:
 *   --words <file>     word list, one word per line (required)
 *   --metric <m>       entropy | minimax (default entropy)
 *   --workers <n>      pool size (default min(8, cpus))
 *   --chunk <n>        dictionary words per task (default 512)
 *   --cache-dir <dir>  override the cache directory
 *   --no-cache         compute without touching the cache
 */

import { Command } from 'commander'
import path from 'node:path'
import { performance } from 'node:perf_hooks'
import { loadDictionary } from '../../src/solver/data/loader'
import { FileOpeningStore, MemoryOpeningStore } from '../../src/solver/data/store'
import { hex32 } from '../../src/solver/hash'
import { OpeningBook } from '../../src/solver/opening'
import { isScoreMetric } from '../../src/solver/scoring'
import { DEFAULT_CHUNK_SIZE } from '../../src/solver/search'
import { WorkerPool, defaultPoolSize } from '../../src/worker/pool'

interface Options {
  words: string
  metric: string
  workers: number
  chunk: number
  cache: boolean
  cacheDir?: string
}

const program = new Command()
program
  .requiredOption('--words <file>', 'word list (one word per line)')
  .option('--metric <m>', 'entropy | minimax', 'entropy')
  .option('--workers <n>', 'worker threads', (v) => parseInt(v, 10), defaultPoolSize())
  .option('--chunk <n>', 'dictionary words per task', (v) => parseInt(v, 10), DEFAULT_CHUNK_SIZE)
  .option('--cache-dir <dir>', 'opening cache directory')
  .option('--no-cache', 'do not read or write the opening cache')
  .parse(process.argv)

const opts = program.opts<Options>()

async function main() {
  const metric = opts.metric
  if (!isScoreMetric(metric)) throw new Error(`Unknown metric: ${metric}`)
  const dictionary = await loadDictionary(path.resolve(opts.words))
  const store = opts.cache ? new FileOpeningStore(opts.cacheDir) : new MemoryOpeningStore()
  const pool = new WorkerPool(dictionary, { size: opts.workers })
  let lastPct = -1
  const book = new OpeningBook(dictionary, {
    runner: pool,
    store,
    metric,
    chunkSize: opts.chunk,
    onProgress: (f) => {
      const pct = Math.floor(f * 100)
      if (pct === lastPct) return
      lastPct = pct
      process.stdout.write(`\r[precompute] ${pct}%`)
    },
  })
  console.log(
    `[precompute] N=${dictionary.size} L=${dictionary.length} hash=0x${hex32(dictionary.hash)} metric=${metric} workers=${pool.size}`,
  )
  const t0 = performance.now()
  try {
    const res = await book.initialize()
    if (lastPct >= 0) process.stdout.write('\n')
    const dt = performance.now() - t0
    console.log(
      `[done] opening=${res.guess} score=${res.score.toFixed(4)} source=${book.source} time=${dt.toFixed(1)}ms`,
    )
    if (store instanceof FileOpeningStore) console.log(`[cache] ${store.file} key=${book.key}`)
  } finally {
    await pool.close()
  }
}

main().catch((err) => {
  console.error('[fatal]', err)
  process.exit(1)
})
