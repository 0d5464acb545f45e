/* eslint-env node */
import { parentPort, workerData } from 'node:worker_threads'
import { runShard, type ShardInput, type ShardResult } from './core'

export type ShardReply = { done: true; shardResult: ShardResult } | { done: true; error: string }

function main() {
  if (!parentPort) return
  const input: ShardInput = workerData
  let reply: ShardReply
  try {
    reply = { done: true, shardResult: runShard(input) }
  } catch (err) {
    reply = { done: true, error: err instanceof Error ? err.message : String(err) }
  }
  parentPort.postMessage(reply)
}

main()
