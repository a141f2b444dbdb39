import fs from 'fs'
import os from 'os'
import path from 'path'
import { Alphabet } from '../lib/alphabet.js'
import type { SentenceAlphabets } from '../lib/conll.js'
import type { Sentence } from '../lib/types.js'

export function tmpDir(prefix = 'nereval-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

// words: EU=2 rejects=3 John=4, tags: B-ORG=1 O=2 B-PER=3
export function toyAlphabets(): SentenceAlphabets {
  const word = new Alphabet('word', ['<_UNK>', '_PAD'])
  for (const w of ['EU', 'rejects', 'John']) word.add(w)
  const char = new Alphabet('character', ['<_UNK>', '_PAD_CHAR'])
  for (const c of 'EUrejctsJohn') char.add(c)
  const tag = new Alphabet('ner', ['_PAD_NER'])
  for (const t of ['B-ORG', 'O', 'B-PER']) tag.add(t)
  word.close()
  char.close()
  tag.close()
  return { word, char, tag }
}

export function sentence(words: number[], tags: number[], chars?: number[][]): Sentence {
  return { words, tags, chars: chars ?? words.map(() => [2]), length: words.length }
}
