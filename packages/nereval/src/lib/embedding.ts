import fs from 'fs';
import { UNK_ID, type Alphabet } from './alphabet.js';
import { DictionaryFormatError } from './errors.js';
import type { Logger } from './logger.js';
import { uniformVector } from './random.js';
import type { Matrix, RandomSource } from './types.js';

export type EmbeddingDict = ReadonlyMap<string, readonly number[]>;

export interface LoadedEmbeddings {
  dict: EmbeddingDict;
  dim: number;
}

export function knownToDict(dict: EmbeddingDict, word: string): boolean {
  return dict.has(word) || dict.has(word.toLowerCase());
}

/**
 * Parse a whitespace text table, one `word v1 ... vd` row per line.
 * The width is fixed by the first row; every other row must match it.
 */
export function parseEmbeddingDict(text: string, source = '<input>'): LoadedEmbeddings {
  const dict = new Map<string, number[]>();
  let dim = -1;

  const lines = text.split(/\r?\n/);
  for (let li = 0; li < lines.length; li++) {
    const line = lines[li]!.trim();
    if (!line) continue;

    const [word, ...rest] = line.split(/\s+/);
    if (word === undefined || rest.length === 0) {
      throw new DictionaryFormatError(`${source}:${li + 1}: row has no vector`);
    }
    if (dim < 0) dim = rest.length;
    else if (rest.length !== dim) {
      throw new DictionaryFormatError(`${source}:${li + 1}: expected ${dim} values for '${word}', got ${rest.length}`);
    }

    const vec = rest.map(Number);
    if (vec.some(v => !Number.isFinite(v))) {
      throw new DictionaryFormatError(`${source}:${li + 1}: non-numeric value in vector for '${word}'`);
    }
    dict.set(word, vec);
  }

  return { dict, dim: Math.max(dim, 0) };
}

export function loadEmbeddingDict(filePath: string): LoadedEmbeddings {
  return parseEmbeddingDict(fs.readFileSync(filePath, 'utf8'), filePath);
}

export interface EmbeddingTable {
  table: Matrix;
  oov: number;
}

/**
 * One row per word id. Dictionary rows (exact match, then lowercase) are copied
 * verbatim; the unknown row and every other row are drawn uniformly from
 * [-sqrt(3/dim), sqrt(3/dim)].
 */
export function buildEmbeddingTable(
  alphabet: Alphabet,
  dict: EmbeddingDict,
  dim: number,
  random: RandomSource,
  logger?: Logger
): EmbeddingTable {
  const scale = Math.sqrt(3.0 / dim);
  const table: Matrix = [];
  let oov = 0;

  for (const [word, id] of alphabet.items()) {
    if (id === UNK_ID) {
      table.push(uniformVector(random, dim, scale));
      continue;
    }

    const vec = dict.get(word) ?? dict.get(word.toLowerCase());
    if (vec === undefined) {
      table.push(uniformVector(random, dim, scale));
      oov++;
      continue;
    }

    if (vec.length !== dim) {
      throw new DictionaryFormatError(`Embedding for '${word}' has width ${vec.length}, expected ${dim}`);
    }
    table.push(vec.slice());
  }

  logger?.info(`oov: ${oov}`);
  return { table, oov };
}
