
export type Matrix = number[][];

/** Per-token emission scores for a batch: sentences x positions x tags. */
export type EmissionTensor = number[][][];

export interface RawSentence {
  words: string[];
  tags: string[];
}

/**
 * Id-encoded sentence. `words`, `chars` and `tags` all have `length` entries;
 * each inner char sequence has its own length.
 */
export interface Sentence {
  words: number[];
  chars: number[][];
  tags: number[];
  length: number;
}

/**
 * Rectangular stack of sentences padded to the longest one with id 0.
 * `mask[i][j]` is true exactly when `j < lengths[i]`.
 */
export interface Batch {
  words: Matrix;
  chars: number[][][];
  charLengths: Matrix;
  tags: Matrix;
  mask: boolean[][];
  lengths: number[];
}

export interface Prediction {
  tags: number[];
  score: number;
}

export interface ScoreReport {
  readonly accuracy: number;
  readonly precision: number;
  readonly recall: number;
  readonly f1: number;
}

/** Source of uniform numbers in [0, 1). */
export type RandomSource = () => number;

export interface DecodeOptions {
  // tags below this id are reserved markers and never predicted
  leadingSymbolic: number;
  // written at positions beyond a sentence's length
  fillerTag?: number;
}

export interface TaggerOutput {
  /** batch-shaped, filler tag beyond each sentence length */
  predictions: Matrix;
  scores: number[];
}
