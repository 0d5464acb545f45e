// Word list loader for plain-text lists: one word per line, '#' comments.
// Normalizes case and drops duplicates so the Dictionary receives a clean list.
import fs from 'node:fs/promises'
import { Dictionary, type DictionaryOptions } from '../dictionary'

export function parseWordList(raw: string): string[] {
  const seen = new Set<string>()
  const words: string[] = []
  for (const line of raw.split(/\r?\n/)) {
    const w = line.replace(/#.*$/, '').trim().toLowerCase()
    if (!w || seen.has(w)) continue
    seen.add(w)
    words.push(w)
  }
  return words
}

export async function loadWordList(file: string): Promise<string[]> {
  return parseWordList(await fs.readFile(file, 'utf8'))
}

export async function loadDictionary(file: string, opts?: DictionaryOptions): Promise<Dictionary> {
  return new Dictionary(await loadWordList(file), opts)
}
