#!/usr/bin/env tsx
/* eslint-disable no-console */
/**
 * suggest.ts
 * Replays a game's feedback through a solver session and prints the next
 * suggestion with the top alternatives.
 *
 * Usage example:
 *   tsx scripts/suggest.ts \
 *     --words data/wordlists/sample-5.txt \
 *     --history "crane:-y--g,slate:--g-g" \
 *     [--metric entropy|minimax|preferred] [--top 5] [--workers 4] [--no-cache]
 *
 * `preferred` uses the metric the simulator saved with --pick-best, else entropy.
 *
 * Feedback is one symbol per letter: g (exact), y (present), - (absent).
 */

import { Command } from 'commander'
import path from 'node:path'
import { loadDictionary } from '../src/solver/data/loader'
import { FileOpeningStore, MemoryOpeningStore } from '../src/solver/data/store'
import { OpeningBook, loadPreferredMetric } from '../src/solver/opening'
import { patternToString } from '../src/solver/pattern'
import { isScoreMetric, type ScoreMetric } from '../src/solver/scoring'
import { SolverSession } from '../src/solver/session'
import { WorkerPool, defaultPoolSize } from '../src/worker/pool'

interface Options {
  words: string
  history: string
  metric: string
  top: number
  workers: number
  attempts: number
  cache: boolean
  cacheDir?: string
}

function parseHistory(text: string): Array<{ guess: string; feedback: string }> {
  const out: Array<{ guess: string; feedback: string }> = []
  for (const raw of text.split(',')) {
    const item = raw.trim()
    if (!item) continue
    const sep = item.indexOf(':')
    if (sep < 0) throw new Error(`Expected guess:feedback, got "${item}"`)
    out.push({ guess: item.slice(0, sep).trim().toLowerCase(), feedback: item.slice(sep + 1).trim() })
  }
  return out
}

async function main() {
  const program = new Command()
  program
    .requiredOption('--words <file>', 'word list (one word per line)')
    .option('--history <list>', 'comma separated guess:feedback pairs', '')
    .option('--metric <m>', 'entropy | minimax | preferred', 'entropy')
    .option('--top <n>', 'alternatives to list', (v) => parseInt(v, 10), 5)
    .option('--workers <n>', 'worker threads for the opening scan', (v) => parseInt(v, 10), defaultPoolSize())
    .option('--attempts <n>', 'guesses allowed', (v) => parseInt(v, 10), 6)
    .option('--cache-dir <dir>', 'opening cache directory')
    .option('--no-cache', 'do not read or write the opening cache')
  program.parse(process.argv)
  const opts = program.opts<Options>()

  if (opts.metric !== 'preferred' && !isScoreMetric(opts.metric)) {
    throw new Error(`Unknown metric: ${opts.metric}`)
  }
  const history = parseHistory(opts.history)
  const dictionary = await loadDictionary(path.resolve(opts.words))
  const store = opts.cache ? new FileOpeningStore(opts.cacheDir) : new MemoryOpeningStore()
  const metric: ScoreMetric = isScoreMetric(opts.metric)
    ? opts.metric
    : ((await loadPreferredMetric(store, dictionary)) ?? 'entropy')
  console.log(`[metric] ${metric}`)

  const pool = new WorkerPool(dictionary, { size: opts.workers })
  const book = new OpeningBook(dictionary, { runner: pool, metric, store })
  try {
    await book.initialize()
  } finally {
    await pool.close()
  }

  const session = new SolverSession(dictionary, book, { maxGuesses: opts.attempts })
  for (const { guess, feedback } of history) {
    const state = session.record(guess, feedback)
    const last = session.history[session.history.length - 1]
    const shown = last ? patternToString(last.pattern, dictionary.length) : feedback
    console.log(`[turn] ${guess} ${shown} -> ${session.remaining} left (${state})`)
  }

  console.log(`[state] ${session.state} remaining=${session.remaining} attemptsLeft=${session.attemptsLeft}`)
  if (session.isTerminal()) {
    if (session.state === 'solved') console.log(`[solved] ${session.candidates().join(', ')}`)
    return
  }
  console.log(`[suggest] ${session.suggest()}`)
  for (const s of session.suggestions(opts.top)) {
    console.log(
      `  ${s.guess}${s.isCandidate ? '*' : ' '} score=${s.score.toFixed(4)} E[left]=${s.expectedRemaining.toFixed(2)} worst=${s.worstCase} buckets=${s.buckets}`,
    )
  }
  if (session.remaining <= 10) console.log(`[candidates] ${session.candidates().join(', ')}`)
}

main().catch((err) => {
  console.error('[fatal]', err)
  process.exit(1)
})
