import type { Batch, Sentence } from './types.js';

export const PAD_ID = 0;

function padRow(row: readonly number[], width: number): number[] {
  const out = row.slice(0, width);
  while (out.length < width) out.push(PAD_ID);
  return out;
}

export function makeBatch(sentences: readonly Sentence[]): Batch {
  const lengths = sentences.map(s => s.length);
  const maxLength = Math.max(0, ...lengths);
  let maxChars = 1;
  for (const s of sentences) {
    for (const c of s.chars) maxChars = Math.max(maxChars, c.length);
  }

  const words = sentences.map(s => padRow(s.words, maxLength));
  const tags = sentences.map(s => padRow(s.tags, maxLength));
  const chars = sentences.map(s => {
    const rows: number[][] = [];
    for (let j = 0; j < maxLength; j++) rows.push(padRow(s.chars[j] ?? [], maxChars));
    return rows;
  });
  const charLengths = sentences.map(s => Array.from({ length: maxLength }, (_, j) => Math.min(s.chars[j]?.length ?? 0, maxChars)));
  const mask = lengths.map(len => Array.from({ length: maxLength }, (_, j) => j < len));

  return { words, chars, charLengths, tags, mask, lengths };
}

/**
 * Fixed-size batches over the dataset in its original order. The returned
 * iterable can be walked any number of times and yields the same batches each
 * time; the final batch is short when the dataset size is not a multiple of
 * `batchSize`.
 */
export function iterateBatches(sentences: readonly Sentence[], batchSize: number): Iterable<Batch> {
  if (!Number.isInteger(batchSize) || batchSize < 1) throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);

  return {
    *[Symbol.iterator]() {
      for (let start = 0; start < sentences.length; start += batchSize) {
        yield makeBatch(sentences.slice(start, start + batchSize));
      }
    }
  };
}

export function countBatches(numSentences: number, batchSize: number): number {
  return Math.ceil(numSentences / batchSize);
}

/** Recover each sentence's non-padded rows from a batch. */
export function unpadBatch(batch: Batch): Sentence[] {
  return batch.lengths.map((length, i) => ({
    words: (batch.words[i] ?? []).slice(0, length),
    chars: (batch.chars[i] ?? []).slice(0, length).map((row, j) => row.slice(0, batch.charLengths[i]?.[j] ?? 0)),
    tags: (batch.tags[i] ?? []).slice(0, length),
    length
  }));
}
