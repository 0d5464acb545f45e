import { fileURLToPath } from 'node:url'
import { Dictionary } from '../dictionary'

export const SAMPLE_WORDS_FILE = fileURLToPath(
  new URL('../../../data/wordlists/sample-5.txt', import.meta.url),
)

// apple/angle/ankle/ample share a-..le, so every one of them splits the rest 1/1/2
export const FOUR = ['apple', 'angle', 'ankle', 'ample']

export function fourWords(): Dictionary {
  return new Dictionary(FOUR)
}
