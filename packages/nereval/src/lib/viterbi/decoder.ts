import { ShapeMismatchError } from '../errors.js';
import type { DecodeOptions, EmissionTensor, Matrix, Prediction } from '../types.js';

interface VCell {
  score: number;
  prev: number | null;
}

function validateShapes(emissions: EmissionTensor, transitions: Matrix, lengths: readonly number[], leadingSymbolic: number): number {
  const numTags = transitions.length;
  for (let i = 0; i < numTags; i++) {
    if (transitions[i]!.length !== numTags) {
      throw new ShapeMismatchError(`Transition matrix must be square: row ${i} has ${transitions[i]!.length} entries, expected ${numTags}`);
    }
  }

  if (!Number.isInteger(leadingSymbolic) || leadingSymbolic < 0 || leadingSymbolic >= numTags) {
    throw new ShapeMismatchError(`leadingSymbolic ${leadingSymbolic} leaves no candidate tags out of ${numTags}`);
  }

  if (lengths.length !== emissions.length) {
    throw new ShapeMismatchError(`Got ${lengths.length} lengths for a batch of ${emissions.length} sentences`);
  }

  for (let b = 0; b < emissions.length; b++) {
    const sent = emissions[b]!;
    const len = lengths[b]!;
    if (!Number.isInteger(len) || len < 0 || len > sent.length) {
      throw new ShapeMismatchError(`Sentence ${b}: length ${len} outside [0, ${sent.length}]`);
    }
    for (let t = 0; t < len; t++) {
      if (sent[t]!.length !== numTags) {
        throw new ShapeMismatchError(`Sentence ${b}, position ${t}: ${sent[t]!.length} emission scores for ${numTags} tags`);
      }
    }
  }

  return numTags;
}

/**
 * Max-sum trellis search for one sentence over tags [first, numTags).
 * Ties go to the lowest tag id, both for back-pointers and for the final tag.
 */
function decodeSentence(emit: Matrix, transitions: Matrix, length: number, first: number, numTags: number): Prediction {
  if (length === 0) return { tags: [], score: 0 };

  const lattice: VCell[][] = [];

  const start: VCell[] = [];
  for (let y = first; y < numTags; y++) {
    start[y] = { score: emit[0]![y]!, prev: null };
  }
  lattice.push(start);

  for (let t = 1; t < length; t++) {
    const col: VCell[] = [];
    const prevCol = lattice[t - 1]!;
    const row = emit[t]!;
    for (let y = first; y < numTags; y++) {
      let bestScore = -Infinity;
      let bestPrev: number | null = null;

      for (let p = first; p < numTags; p++) {
        const score = prevCol[p]!.score + transitions[p]![y]!;
        if (bestPrev === null || score > bestScore) {
          bestScore = score;
          bestPrev = p;
        }
      }

      col[y] = { score: bestScore + row[y]!, prev: bestPrev };
    }
    lattice.push(col);
  }

  const lastCol = lattice[length - 1]!;
  let lastTag = first;
  for (let y = first + 1; y < numTags; y++) {
    if (lastCol[y]!.score > lastCol[lastTag]!.score) lastTag = y;
  }

  const tags = new Array<number>(length);
  let cur: number | null = lastTag;
  for (let t = length - 1; t >= 0 && cur !== null; t--) {
    tags[t] = cur;
    cur = lattice[t]![cur]!.prev;
  }

  return { tags, score: lastCol[lastTag]!.score };
}

/**
 * Decode every sentence of a batch independently.
 *
 * `emissions[b][t][y]` scores tag y at position t of sentence b and
 * `transitions[p][y]` scores tag p followed by tag y. The returned tag
 * sequences are length-aligned to `lengths` and never contain a tag below
 * `leadingSymbolic`. Inputs are left untouched.
 */
export function viterbiDecode(
  emissions: EmissionTensor,
  transitions: Matrix,
  lengths: readonly number[],
  opts: Pick<DecodeOptions, 'leadingSymbolic'>
): Prediction[] {
  const numTags = validateShapes(emissions, transitions, lengths, opts.leadingSymbolic);
  return emissions.map((emit, b) => decodeSentence(emit, transitions, lengths[b]!, opts.leadingSymbolic, numTags));
}

/** Batch-shaped prediction matrix, `fillerTag` beyond each sentence's length. */
export function padPredictions(predictions: readonly Prediction[], maxLength: number, fillerTag = 0): Matrix {
  return predictions.map(p => {
    const row = p.tags.slice(0, maxLength);
    while (row.length < maxLength) row.push(fillerTag);
    return row;
  });
}

/** Sum of emission and transition scores along a fixed tag path. */
export function pathScore(emit: Matrix, transitions: Matrix, tags: readonly number[]): number {
  let score = 0;
  for (let t = 0; t < tags.length; t++) {
    const y = tags[t]!;
    score += emit[t]?.[y] ?? 0;
    if (t > 0) score += transitions[tags[t - 1]!]?.[y] ?? 0;
  }
  return score;
}
