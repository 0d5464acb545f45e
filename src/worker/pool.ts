/** Bounded pool of scan workers implementing ScanRunner over node:worker_threads. */
import os from 'node:os'
import { Worker } from 'node:worker_threads'
import type { Msg as WorkerMsg, OutMsg, ScanWorkerData } from './scan.worker'
import type { Dictionary } from '../solver/dictionary'
import { InvalidStateError, SearchFaultError } from '../solver/errors'
import type { ScanRequest, ScanRunner } from '../solver/search'
import type { ScoredGuess } from '../solver/scoring'

export function defaultPoolSize(): number {
  return Math.max(1, Math.min(8, os.cpus().length))
}

// Workers load TypeScript sources directly, so tsx is preloaded in each thread.
const WORKER_URL = new URL('./scan.worker.ts', import.meta.url)
const WORKER_EXEC_ARGV = ['--import', 'tsx']

interface Slot {
  worker: Worker
  busy: boolean
  loadedScan: number // scan whose candidates this worker holds
}

interface ActiveScan {
  scanId: number
  request: ScanRequest
  candidates: number[]
  results: Array<ScoredGuess | null>
  next: number // next chunk to dispatch
  remaining: number
  byTask: Map<number, number> // message id -> chunk index
  resolve: (value: Array<ScoredGuess | null>) => void
  reject: (error: unknown) => void
}

export interface WorkerPoolOptions {
  size?: number
}

export class WorkerPool implements ScanRunner {
  readonly dictionary: Dictionary
  readonly size: number
  private slots: Slot[] = []
  private msgId = 1
  private scanSeq = 0
  private active: ActiveScan | null = null
  private closed = false
  private fault: Error | null = null

  constructor(dictionary: Dictionary, opts: WorkerPoolOptions = {}) {
    const size = opts.size ?? defaultPoolSize()
    if (!Number.isInteger(size) || size < 1) throw new RangeError(`pool size must be >= 1, got ${size}`)
    this.dictionary = dictionary
    this.size = size
  }

  private spawn(): Slot {
    const data: ScanWorkerData = { words: [...this.dictionary.words], length: this.dictionary.length }
    const worker = new Worker(WORKER_URL, { execArgv: WORKER_EXEC_ARGV, workerData: data })
    const slot: Slot = { worker, busy: false, loadedScan: -1 }
    worker.on('message', (msg: OutMsg) => this.handleMessage(slot, msg))
    worker.on('error', (err) => this.crash(err))
    worker.on('exit', (code) => {
      if (!this.closed) this.crash(new Error(`scan worker exited with code ${code}`))
    })
    return slot
  }

  private post(slot: Slot, msg: WorkerMsg): void {
    slot.worker.postMessage(msg)
  }

  scan(request: ScanRequest): Promise<Array<ScoredGuess | null>> {
    if (this.closed) {
      const reason = this.fault ? `pool is broken: ${this.fault.message}` : 'pool is closed'
      return Promise.reject(new InvalidStateError(reason))
    }
    if (this.active) {
      return Promise.reject(new InvalidStateError('a scan is already in progress'))
    }
    if (request.dictionary !== this.dictionary && request.dictionary.hash !== this.dictionary.hash) {
      return Promise.reject(new InvalidStateError('pool was started for a different dictionary'))
    }
    if (request.chunks.length === 0) return Promise.resolve([])
    while (this.slots.length < this.size) this.slots.push(this.spawn())

    return new Promise<Array<ScoredGuess | null>>((resolve, reject) => {
      this.active = {
        scanId: ++this.scanSeq,
        request,
        candidates: request.candidates.indexArray(),
        results: new Array<ScoredGuess | null>(request.chunks.length).fill(null),
        next: 0,
        remaining: request.chunks.length,
        byTask: new Map(),
        resolve,
        reject,
      }
      this.pump()
    })
  }

  private pump(): void {
    const scan = this.active
    if (!scan) return
    for (const slot of this.slots) {
      if (scan.next >= scan.request.chunks.length) return
      if (slot.busy) continue
      const chunkIdx = scan.next++
      const chunk = scan.request.chunks[chunkIdx]!
      const id = this.msgId++
      scan.byTask.set(id, chunkIdx)
      slot.busy = true
      const first = slot.loadedScan !== scan.scanId
      slot.loadedScan = scan.scanId
      this.post(slot, {
        id,
        type: 'scan',
        payload: {
          scanId: scan.scanId,
          start: chunk.start,
          end: chunk.end,
          metric: scan.request.metric,
          candidates: first ? scan.candidates : undefined,
        },
      })
    }
  }

  private handleMessage(slot: Slot, msg: OutMsg): void {
    switch (msg.type) {
      case 'result': {
        slot.busy = false
        const scan = this.active
        const chunkIdx = scan?.byTask.get(msg.id)
        if (scan && chunkIdx !== undefined) {
          scan.byTask.delete(msg.id)
          scan.results[chunkIdx] = msg.best
          scan.remaining--
          scan.request.onChunkDone?.()
          if (scan.remaining === 0) {
            this.active = null
            scan.resolve(scan.results)
            return
          }
        }
        this.pump()
        return
      }
      case 'error': {
        slot.busy = false
        const scan = this.active
        const chunkIdx = scan?.byTask.get(msg.id)
        if (scan && chunkIdx !== undefined) {
          const chunk = scan.request.chunks[chunkIdx]!
          const cause = new Error(msg.error.message)
          cause.name = msg.error.name
          if (msg.error.stack) cause.stack = msg.error.stack
          this.fail(
            new SearchFaultError(`chunk ${chunk.start}..${chunk.end} failed: ${msg.error.message}`, {
              cause,
            }),
          )
          return
        }
        this.pump()
        return
      }
    }
  }

  private fail(error: Error): void {
    const scan = this.active
    if (!scan) return
    this.active = null
    scan.reject(error)
  }

  private crash(err: Error): void {
    if (this.closed) return
    this.fault = err
    this.closed = true
    this.fail(new SearchFaultError('scan worker crashed', { cause: err }))
    for (const slot of this.slots) void slot.worker.terminate()
    this.slots = []
  }

  /** Terminate every worker; a scan still running is rejected */
  async close(): Promise<void> {
    if (this.closed && this.slots.length === 0) return
    this.closed = true
    this.fail(new InvalidStateError('pool closed'))
    const slots = this.slots
    this.slots = []
    await Promise.all(slots.map((s) => s.worker.terminate()))
  }
}
