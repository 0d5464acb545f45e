// Simulation core shared by the CLI, the shard worker and tests.
import { Dictionary } from '../../src/solver/dictionary'
import { CandidateSet } from '../../src/solver/filter'
import { mulberry32 } from '../../src/solver/random'
import { Referee } from '../../src/solver/referee'
import { pickGuess, type PolicyId } from '../../src/policy/policies'
import { isScoreMetric, type ScoreMetric } from '../../src/solver/scoring'

export interface GameResult {
  secret: string
  solved: boolean
  attempts: number
  remaining: number // candidates left when the game ended
  guesses: string[]
}

export interface GameOptions {
  maxGuesses: number
  /** Precomputed first guess; computed with the policy when omitted */
  opening?: string
  chunkSize?: number
}

export function simulateGame(
  dictionary: Dictionary,
  policy: PolicyId,
  secret: string,
  opts: GameOptions,
): GameResult {
  const cs = CandidateSet.all(dictionary)
  const referee = new Referee(secret, { maxGuesses: opts.maxGuesses, dictionary })
  const guesses: string[] = []
  while (referee.status === 'playing' && !cs.isEmpty()) {
    const guess =
      guesses.length === 0 && opts.opening ? opts.opening : pickGuess(policy, cs, opts.chunkSize)
    const pat = referee.play(guess)
    guesses.push(guess)
    cs.applyFeedback(guess, pat)
  }
  return {
    secret,
    solved: referee.status === 'won',
    attempts: referee.attempts,
    remaining: cs.size,
    guesses,
  }
}

/** Data passed from the main thread */
export interface ShardInput {
  words: string[]
  length: number
  policy: PolicyId
  secrets: string[]
  attempts: number
  opening?: string
  chunkSize?: number
}

/** Aggregate statistics returned to the parent */
export interface ShardResult {
  policy: PolicyId
  games: number
  solved: number
  attemptHist: number[] // indices 0..attempts-1 for attempts used (success), last index = fails
  totalAttemptsSolved: number
  remainingOnFailAccum: number
  totalTimeMs: number
}

export function runShard(input: ShardInput): ShardResult {
  const dictionary = new Dictionary(input.words, { length: input.length })
  const attemptHist = new Array<number>(input.attempts + 1).fill(0)
  let solved = 0
  let totalAttemptsSolved = 0
  let remainingOnFailAccum = 0
  const start = Date.now()
  for (const secret of input.secrets) {
    const r = simulateGame(dictionary, input.policy, secret, {
      maxGuesses: input.attempts,
      opening: input.opening,
      chunkSize: input.chunkSize,
    })
    if (r.solved) {
      solved++
      totalAttemptsSolved += r.attempts
      attemptHist[r.attempts - 1]!++
    } else {
      attemptHist[input.attempts]!++
      remainingOnFailAccum += r.remaining
    }
  }
  return {
    policy: input.policy,
    games: input.secrets.length,
    solved,
    attemptHist,
    totalAttemptsSolved,
    remainingOnFailAccum,
    totalTimeMs: Date.now() - start,
  }
}

/** Deterministic sample without replacement (partial Fisher-Yates), in list order */
export function sampleSecrets(words: readonly string[], limit: number, seed: number): string[] {
  if (limit >= words.length) return [...words]
  const rng = mulberry32(seed)
  const idx = [...words.keys()]
  for (let i = 0; i < limit; i++) {
    const j = i + Math.floor(rng() * (idx.length - i))
    const tmp = idx[i]!
    idx[i] = idx[j]!
    idx[j] = tmp
  }
  return idx
    .slice(0, limit)
    .sort((a, b) => a - b)
    .map((i) => words[i]!)
}

/** Split into at most `parts` contiguous, non-empty slices */
export function splitEven<T>(items: readonly T[], parts: number): T[][] {
  const n = Math.max(1, Math.min(parts, items.length))
  const out: T[][] = []
  for (let k = 0; k < n; k++) {
    const from = Math.floor((k * items.length) / n)
    const to = Math.floor(((k + 1) * items.length) / n)
    if (to > from) out.push(items.slice(from, to))
  }
  return out
}

export interface RowSummary {
  policy: PolicyId
  games: number
  solved: number
  successRate: number
  avgAttempts: number
  avgRemainingOnFail: number
  attemptHist: number[]
}

/** Merge shards per policy; rows sorted by policy id */
export function summarize(shards: readonly ShardResult[]): RowSummary[] {
  const byPolicy = new Map<PolicyId, ShardResult>()
  for (const s of shards) {
    const acc = byPolicy.get(s.policy)
    if (!acc) {
      byPolicy.set(s.policy, { ...s, attemptHist: [...s.attemptHist] })
      continue
    }
    acc.games += s.games
    acc.solved += s.solved
    acc.totalAttemptsSolved += s.totalAttemptsSolved
    acc.remainingOnFailAccum += s.remainingOnFailAccum
    acc.totalTimeMs += s.totalTimeMs
    s.attemptHist.forEach((v, i) => {
      acc.attemptHist[i] = (acc.attemptHist[i] ?? 0) + v
    })
  }
  const rows: RowSummary[] = []
  for (const s of byPolicy.values()) {
    const fails = s.games - s.solved
    rows.push({
      policy: s.policy,
      games: s.games,
      solved: s.solved,
      successRate: s.games > 0 ? s.solved / s.games : 0,
      avgAttempts: s.solved > 0 ? s.totalAttemptsSolved / s.solved : 0,
      avgRemainingOnFail: fails > 0 ? s.remainingOnFailAccum / fails : 0,
      attemptHist: s.attemptHist,
    })
  }
  rows.sort((a, b) => a.policy.localeCompare(b.policy))
  return rows
}

/**
 * Row of the scoring policy that solved the most secrets; fewer average
 * attempts, then policy name, break ties. Only entropy and minimax rows can
 * win since only they have an opening book.
 */
export function pickBest(rows: readonly RowSummary[]): { metric: ScoreMetric; row: RowSummary } | null {
  let best: { metric: ScoreMetric; row: RowSummary } | null = null
  for (const row of rows) {
    const metric = row.policy
    if (!isScoreMetric(metric)) continue
    if (
      !best ||
      row.solved > best.row.solved ||
      (row.solved === best.row.solved &&
        (row.avgAttempts < best.row.avgAttempts ||
          (row.avgAttempts === best.row.avgAttempts && metric.localeCompare(best.metric) < 0)))
    ) {
      best = { metric, row }
    }
  }
  return best
}

export function formatTable(rows: readonly RowSummary[]): string {
  const cols = ['POLICY', 'GAMES', 'SOLVED', 'SUCCESS%', 'AVG_ATT', 'AVG_REM_FAIL', 'HIST']
  const widths = [22, 7, 7, 9, 8, 13, 0]
  const pad = (s: string, i: number) => s.padEnd(widths[i] ?? 0)
  const out = [cols.map(pad).join(' ').trimEnd()]
  for (const r of rows) {
    out.push(
      [
        r.policy,
        String(r.games),
        String(r.solved),
        (r.successRate * 100).toFixed(2),
        r.avgAttempts.toFixed(2),
        r.avgRemainingOnFail.toFixed(1),
        r.attemptHist.join('/'),
      ]
        .map(pad)
        .join(' ')
        .trimEnd(),
    )
  }
  return out.join('\n')
}
