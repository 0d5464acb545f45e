/* Dictionary scan worker (node:worker_threads): scores one chunk per task */
import { parentPort, workerData } from 'node:worker_threads'
import { Dictionary } from '../solver/dictionary'
import { CandidateSet } from '../solver/filter'
import { scanChunk } from '../solver/search'
import type { ScoreMetric, ScoredGuess } from '../solver/scoring'

/** Sent once at spawn; the dictionary never changes for a worker's lifetime */
export interface ScanWorkerData {
  words: string[]
  length: number
}

// Message definitions (incoming)
export type Msg =
  | {
      id: number
      type: 'scan'
      payload: {
        scanId: number
        start: number
        end: number
        metric: ScoreMetric
        // present on the first task of a scan for this worker
        candidates?: number[]
      }
    }

// Outgoing messages (replies)
export type OutMsg =
  | { id: number; type: 'result'; scanId: number; best: ScoredGuess | null }
  | { id: number; type: 'error'; error: { name: string; message: string; stack?: string } }

interface LoadedScan {
  scanId: number
  candidates: CandidateSet
  secrets: string[]
}

function main(): void {
  const port = parentPort
  if (!port) return
  const data: ScanWorkerData = workerData
  const dictionary = new Dictionary(data.words, { length: data.length })
  let loaded: LoadedScan | null = null

  const reply = (msg: OutMsg) => port.postMessage(msg)

  port.on('message', (msg: Msg) => {
    switch (msg.type) {
      case 'scan': {
        const { scanId, start, end, metric, candidates } = msg.payload
        try {
          if (candidates) {
            const cs = CandidateSet.fromIndices(dictionary, candidates)
            loaded = { scanId, candidates: cs, secrets: cs.words() }
          }
          if (!loaded || loaded.scanId !== scanId) {
            throw new Error(`candidates for scan ${scanId} were never sent`)
          }
          const best = scanChunk(loaded.candidates, loaded.secrets, { start, end }, metric)
          reply({ id: msg.id, type: 'result', scanId, best })
        } catch (err) {
          const e = err instanceof Error ? err : new Error(String(err))
          reply({ id: msg.id, type: 'error', error: { name: e.name, message: e.message, stack: e.stack } })
        }
        return
      }
    }
  })
}

main()
