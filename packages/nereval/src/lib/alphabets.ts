import fs from 'fs';
import { Alphabet } from './alphabet.js';
import { normalizeWord, readConllFile, type SentenceAlphabets } from './conll.js';
import { knownToDict, type EmbeddingDict } from './embedding.js';
import type { Logger } from './logger.js';
import type { RawSentence } from './types.js';

export const UNK_WORD = '<_UNK>';
export const PAD_WORD = '_PAD';
export const PAD_CHAR = '_PAD_CHAR';
export const PAD_TAG = '_PAD_NER';

export const WORD_RESERVED = [UNK_WORD, PAD_WORD] as const;
export const CHAR_RESERVED = [UNK_WORD, PAD_CHAR] as const;
export const TAG_RESERVED = [PAD_TAG] as const;

/** Leading tag ids the decoder never selects. */
export const NUM_SYMBOLIC_TAGS = TAG_RESERVED.length;

export function emptyAlphabets(): SentenceAlphabets {
  return {
    word: new Alphabet('word', WORD_RESERVED),
    char: new Alphabet('character', CHAR_RESERVED),
    tag: new Alphabet('ner', TAG_RESERVED)
  };
}

export interface CreateAlphabetsOptions {
  /** persisted alphabets are loaded from / saved to this directory; omit to keep them in memory */
  alphabetDirectory?: string;
  train: RawSentence[];
  /** dev/test corpora: contribute tags, and words the embedding dictionary knows */
  extra?: RawSentence[][];
  embeddingDict?: EmbeddingDict;
  maxVocabularySize?: number;
  minOccurrence?: number;
  normalizeDigits?: boolean;
  logger?: Logger;
}

function alphabetsExist(directory: string): boolean {
  const names = ['word', 'character', 'ner'];
  return names.every(n => fs.existsSync(Alphabet.filePath(directory, n)));
}

/**
 * Build the word, character and tag alphabets from the full training corpus, then
 * freeze them. When `alphabetDirectory` already holds all three, they are loaded
 * instead so ids stay stable across runs.
 */
export function createAlphabets(opts: CreateAlphabetsOptions): SentenceAlphabets {
  const dir = opts.alphabetDirectory;
  const logger = opts.logger;

  if (dir !== undefined && alphabetsExist(dir)) {
    logger?.info(`Loading saved alphabets from ${dir}`);
    const loaded = {
      word: Alphabet.load(dir, 'word'),
      char: Alphabet.load(dir, 'character'),
      tag: Alphabet.load(dir, 'ner')
    };
    logSizes(loaded, logger);
    return loaded;
  }

  const maxVocabularySize = opts.maxVocabularySize ?? 50000;
  const minOccurrence = opts.minOccurrence ?? 1;
  const normalizeDigits = opts.normalizeDigits ?? true;
  const dict = opts.embeddingDict;

  const alphabets = emptyAlphabets();
  const counts = new Map<string, number>();

  for (const sentence of opts.train) {
    for (let i = 0; i < sentence.words.length; i++) {
      const raw = sentence.words[i]!;
      for (const ch of raw) alphabets.char.add(ch);
      const word = normalizeWord(raw, normalizeDigits);
      counts.set(word, (counts.get(word) ?? 0) + 1);
      alphabets.tag.add(sentence.tags[i]!);
    }
  }

  const singletons = new Set<string>();
  for (const [word, count] of counts) {
    if (count <= minOccurrence) singletons.add(word);
  }

  // words the dictionary knows survive the frequency cutoff
  if (dict) {
    for (const word of counts.keys()) {
      if (knownToDict(dict, word)) counts.set(word, (counts.get(word) ?? 0) + minOccurrence);
    }
  }

  const reserved = new Set<string>(WORD_RESERVED);
  let vocab = [...counts.entries()]
    .filter(([word, count]) => count > minOccurrence && !reserved.has(word))
    .sort((a, b) => b[1] - a[1])
    .map(([word]) => word);

  const capacity = Math.max(0, maxVocabularySize - WORD_RESERVED.length);
  if (vocab.length > capacity) vocab = vocab.slice(0, capacity);

  for (const corpus of opts.extra ?? []) {
    const seen = new Set(vocab);
    for (const sentence of corpus) {
      for (let i = 0; i < sentence.words.length; i++) {
        alphabets.tag.add(sentence.tags[i]!);
        const word = normalizeWord(sentence.words[i]!, normalizeDigits);
        if (dict && !seen.has(word) && !reserved.has(word) && knownToDict(dict, word)) {
          seen.add(word);
          vocab.push(word);
        }
      }
    }
  }

  for (const word of vocab) {
    const id = alphabets.word.add(word);
    if (singletons.has(word)) alphabets.word.addSingleton(id);
  }

  if (dir !== undefined) {
    alphabets.word.save(dir);
    alphabets.char.save(dir);
    alphabets.tag.save(dir);
  }

  alphabets.word.close();
  alphabets.char.close();
  alphabets.tag.close();

  logSizes(alphabets, logger);
  return alphabets;
}

function logSizes(alphabets: SentenceAlphabets, logger?: Logger) {
  logger?.info(`Word Alphabet Size: ${alphabets.word.size()}`);
  logger?.info(`Character Alphabet Size: ${alphabets.char.size()}`);
  logger?.info(`NER Alphabet Size: ${alphabets.tag.size()}`);
}

export interface CreateAlphabetsFromFilesOptions extends Omit<CreateAlphabetsOptions, 'train' | 'extra'> {
  trainPath: string;
  dataPaths?: string[];
}

export function createAlphabetsFromFiles(opts: CreateAlphabetsFromFilesOptions): SentenceAlphabets {
  const { trainPath, dataPaths, ...rest } = opts;
  if (rest.alphabetDirectory !== undefined && alphabetsExist(rest.alphabetDirectory)) {
    return createAlphabets({ ...rest, train: [] });
  }
  return createAlphabets({
    ...rest,
    train: readConllFile(trainPath),
    extra: (dataPaths ?? []).map(p => readConllFile(p))
  });
}
