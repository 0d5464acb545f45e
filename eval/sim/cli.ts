#!/usr/bin/env tsx
/* eslint-env node */
/* eslint-disable no-console */
/**
 * Solver simulator CLI
 * Plays every policy against a set of secrets using worker threads and
 * reports success rate and attempt histograms. With --pick-best the scoring
 * metric that solved the most secrets is saved to the opening cache as this
 * list's preferred strategy (read by `suggest --metric preferred`).
 */

import { Command } from 'commander'
import fs from 'node:fs'
import path from 'node:path'
import { Worker } from 'node:worker_threads'
import { loadDictionary } from '../../src/solver/data/loader'
import { FileOpeningStore } from '../../src/solver/data/store'
import { OpeningBook, savePreferred } from '../../src/solver/opening'
import type { ScoreMetric } from '../../src/solver/scoring'
import type { StrategyResult } from '../../src/solver/search'
import { pickByPositionalFrequency, isPolicyId, type PolicyId } from '../../src/policy/policies'
import { CandidateSet } from '../../src/solver/filter'
import type { Dictionary } from '../../src/solver/dictionary'
import { WorkerPool, defaultPoolSize } from '../../src/worker/pool'
import {
  formatTable,
  pickBest,
  sampleSecrets,
  splitEven,
  summarize,
  type ShardInput,
  type ShardResult,
} from './core'
import type { ShardReply } from './worker'

interface Options {
  words: string
  policies: string
  limit?: number
  attempts: number
  concurrency: number
  seed: number
  out?: string
  cache: boolean
  cacheDir?: string
  pickBest: boolean
}

function parsePolicies(csv: string): PolicyId[] {
  const out: PolicyId[] = []
  for (const raw of csv.split(',')) {
    const s = raw.trim()
    if (!s) continue
    if (!isPolicyId(s)) throw new Error(`Unknown policy: ${s}`)
    out.push(s)
  }
  return out
}

async function runJobs(jobs: ShardInput[], concurrency: number): Promise<ShardResult[]> {
  const results: ShardResult[] = []
  let active = 0
  let idx = 0
  let completed = 0

  return await new Promise<ShardResult[]>((resolve, reject) => {
    const next = () => {
      if (completed === jobs.length) return resolve(results)
      while (active < concurrency && idx < jobs.length) {
        const job = jobs[idx++]!
        active++
        const startTs = Date.now()
        process.stdout.write(`Start ${job.policy} (${job.secrets.length} secrets)\n`)
        const worker = new Worker(new URL('./worker.ts', import.meta.url), {
          // Preload tsx so worker.ts and its imports load as TypeScript.
          execArgv: ['--import', 'tsx'],
          workerData: job,
        })
        worker.once('message', (msg: ShardReply) => {
          active--
          if ('error' in msg) {
            console.error(`[error] shard for ${job.policy}: ${msg.error}`)
            return reject(new Error(msg.error))
          }
          results.push(msg.shardResult)
          completed++
          process.stdout.write(`Done  ${job.policy} in ${Date.now() - startTs}ms\n`)
          next()
        })
        worker.once('error', (err) => {
          active--
          console.error(`[error] worker crash for ${job.policy}:`, err)
          reject(err)
        })
      }
    }
    next()
  })
}

/** Entropy/minimax openings go through the opening book (parallel scan, persisted) */
async function openingFor(
  policy: PolicyId,
  dictionary: Dictionary,
  opts: Options,
  pool: WorkerPool,
  books: Map<ScoreMetric, StrategyResult>,
): Promise<string> {
  if (policy === 'positional-frequency') {
    return pickByPositionalFrequency(CandidateSet.all(dictionary))
  }
  const book = new OpeningBook(dictionary, {
    runner: pool,
    metric: policy,
    store: opts.cache ? new FileOpeningStore(opts.cacheDir) : undefined,
  })
  const res = await book.initialize()
  books.set(policy, res)
  console.log(`[opening] ${policy}: ${res.guess} (score ${res.score.toFixed(4)}, ${book.source})`)
  return res.guess
}

async function main() {
  const program = new Command()
  program
    .requiredOption('--words <file>', 'word list (one word per line)')
    .option('--policies <csv>', 'Policies CSV', 'entropy,minimax,positional-frequency')
    .option('--limit <n>', 'Play only n sampled secrets', (v) => Number(v))
    .option('--attempts <n>', 'Max attempts per game', (v) => Number(v), 6)
    .option('--concurrency <n>', 'Max parallel workers', (v) => Number(v), defaultPoolSize())
    .option('--seed <n>', 'Seed for sampling secrets', (v) => Number(v), 1)
    .option('--out <file>', 'Write a JSON summary here')
    .option('--cache-dir <dir>', 'Opening cache directory')
    .option('--no-cache', 'Do not read or write the opening cache')
    .option('--pick-best', 'Record the metric that solved the most secrets as preferred', false)
  program.parse(process.argv)
  const opts = program.opts<Options>()

  const policies = parsePolicies(opts.policies)
  if (policies.length === 0) {
    console.error('[error] no policies specified')
    process.exit(1)
  }
  const concurrency = Math.max(1, opts.concurrency || 1)
  const dictionary = await loadDictionary(path.resolve(opts.words))
  const secrets = sampleSecrets(dictionary.words, opts.limit ?? dictionary.size, opts.seed)
  console.log(
    `[sim] dictionary=${dictionary.size} secrets=${secrets.length} policies=${policies.join(',')} concurrency=${concurrency}`,
  )

  const pool = new WorkerPool(dictionary, { size: concurrency })
  const jobs: ShardInput[] = []
  const books = new Map<ScoreMetric, StrategyResult>()
  try {
    for (const policy of policies) {
      const opening = await openingFor(policy, dictionary, opts, pool, books)
      for (const part of splitEven(secrets, concurrency)) {
        jobs.push({
          words: [...dictionary.words],
          length: dictionary.length,
          policy,
          secrets: part,
          attempts: opts.attempts,
          opening,
        })
      }
    }
  } finally {
    await pool.close()
  }

  const rows = summarize(await runJobs(jobs, concurrency))
  console.log('\n' + formatTable(rows) + '\n')
  if (opts.pickBest) {
    const best = pickBest(rows)
    const opening = best ? books.get(best.metric) : undefined
    if (!best || !opening) {
      console.log('[pick-best] no entropy or minimax results to choose from')
    } else if (!opts.cache) {
      console.log(`[pick-best] ${best.metric} (${best.row.solved}/${best.row.games}); not saved with --no-cache`)
    } else {
      const store = new FileOpeningStore(opts.cacheDir)
      await savePreferred(store, dictionary, { guess: opening.guess, score: opening.score, metric: best.metric })
      console.log(
        `[pick-best] ${best.metric} solved ${best.row.solved}/${best.row.games}, opening ${opening.guess} saved to ${store.file}`,
      )
    }
  }
  if (opts.out) {
    const outPath = path.resolve(opts.out)
    fs.mkdirSync(path.dirname(outPath), { recursive: true })
    const summary = {
      meta: {
        timestamp: new Date().toISOString(),
        words: opts.words,
        dictionarySize: dictionary.size,
        secrets: secrets.length,
        attempts: opts.attempts,
        seed: opts.seed,
      },
      rows,
    }
    fs.writeFileSync(outPath, JSON.stringify(summary, null, 2) + '\n', 'utf8')
    console.log(`[done] results written to ${outPath}`)
  }
}

main().catch((err) => {
  console.error('[fatal]', err)
  process.exit(1)
})
