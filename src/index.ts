export * from './solver'
export { MemoryOpeningStore, FileOpeningStore, defaultCacheDir } from './solver/data/store'
export { loadWordList, loadDictionary, parseWordList } from './solver/data/loader'
export { WorkerPool, defaultPoolSize } from './worker/pool'
export { pickGuess, POLICY_IDS, type PolicyId } from './policy/policies'
