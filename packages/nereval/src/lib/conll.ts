import fs from 'fs';
import type { Alphabet } from './alphabet.js';
import { CorpusFormatError, FrozenStateError } from './errors.js';
import type { RawSentence, Sentence } from './types.js';

export const MAX_CHAR_LENGTH = 45;

const DIGIT_RE = /\d/g;

export function normalizeWord(word: string, normalizeDigits = true): string {
  return normalizeDigits ? word.replace(DIGIT_RE, '0') : word;
}

/**
 * Parse a column-based tagged corpus: one token per line, whitespace separated,
 * the word in the first column and the gold tag in the last; sentences separated
 * by blank lines. Feature columns in between are ignored.
 */
export function parseConll(text: string, source = '<input>'): RawSentence[] {
  const sentences: RawSentence[] = [];
  let current: RawSentence = { words: [], tags: [] };

  const lines = text.split(/\r?\n/);
  for (let li = 0; li < lines.length; li++) {
    const line = lines[li]!.trim();
    if (!line) {
      if (current.words.length > 0) {
        sentences.push(current);
        current = { words: [], tags: [] };
      }
      continue;
    }

    const cols = line.split(/\s+/);
    const word = cols[0];
    const tag = cols[cols.length - 1];
    if (cols.length < 2 || word === undefined || tag === undefined) {
      throw new CorpusFormatError(`${source}:${li + 1}: expected at least a word and a tag column, got '${line}'`);
    }
    current.words.push(word);
    current.tags.push(tag);
  }

  if (current.words.length > 0) sentences.push(current);
  return sentences;
}

export function readConllFile(filePath: string): RawSentence[] {
  return parseConll(fs.readFileSync(filePath, 'utf8'), filePath);
}

export interface SentenceAlphabets {
  word: Alphabet;
  char: Alphabet;
  tag: Alphabet;
}

export interface EncodeOptions {
  normalizeDigits?: boolean;
  maxCharLength?: number;
}

export function encodeSentence(raw: RawSentence, alphabets: SentenceAlphabets, opts?: EncodeOptions): Sentence {
  const normalizeDigits = opts?.normalizeDigits ?? true;
  const maxCharLength = opts?.maxCharLength ?? MAX_CHAR_LENGTH;

  const words = raw.words.map(w => alphabets.word.getIndex(normalizeWord(w, normalizeDigits)));
  const chars = raw.words.map(w => Array.from(w).slice(0, maxCharLength).map(c => alphabets.char.getIndex(c)));
  const tags = raw.tags.map(t => alphabets.tag.getIndex(t));

  return { words, chars, tags, length: words.length };
}

/** Encode a corpus through frozen alphabets; ids must not depend on test-time data. */
export function encodeSentences(raw: RawSentence[], alphabets: SentenceAlphabets, opts?: EncodeOptions): Sentence[] {
  for (const a of [alphabets.word, alphabets.char, alphabets.tag]) {
    if (!a.isFrozen) throw new FrozenStateError(`Alphabet '${a.name}' must be closed before encoding data`);
  }
  return raw.map(s => encodeSentence(s, alphabets, opts));
}
