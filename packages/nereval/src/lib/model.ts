import fs from 'fs';
import { z } from 'zod';
import { CheckpointLoadError, ShapeMismatchError } from './errors.js';
import { uniformVector } from './random.js';
import type { Batch, DecodeOptions, EmissionTensor, Matrix, RandomSource, TaggerOutput } from './types.js';
import { padPredictions, viterbiDecode } from './viterbi/decoder.js';

export const MODEL_FLAVORS = ['std', 'weight_drop'] as const;

/** Dropout placement of the network; all flavors decode identically in eval mode. */
export type ModelFlavor = typeof MODEL_FLAVORS[number];

export const CHECKPOINT_FORMAT = 'nereval-crf';
export const CHECKPOINT_VERSION = 1;

const matrix = z.array(z.array(z.number()));

const CheckpointSchema = z.object({
  format: z.literal(CHECKPOINT_FORMAT),
  version: z.literal(CHECKPOINT_VERSION),
  flavor: z.enum(MODEL_FLAVORS),
  params: z.object({
    wordEmbedding: matrix,
    emissionWeight: matrix,
    emissionBias: z.array(z.number()),
    transitions: matrix
  })
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;

interface CrfParams {
  wordEmbedding: Matrix;
  emissionWeight: Matrix;
  emissionBias: number[];
  transitions: Matrix;
}

/**
 * The only capability the evaluation driver needs from a network: per-batch
 * decoding into batch-shaped tag ids plus one path score per sentence.
 */
export interface SequenceTagger {
  readonly flavor: ModelFlavor;
  readonly numTags: number;
  readonly training: boolean;
  train(): void;
  eval(): void;
  decode(batch: Batch, opts: DecodeOptions): TaggerOutput;
  loadCheckpoint(data: unknown): void;
  checkpoint(): Checkpoint;
}

export interface TaggerOptions {
  /** initial word vectors, one row per word id; the tagger takes ownership */
  wordEmbedding: Matrix;
  numTags: number;
  random: RandomSource;
  /** dropout on embedded inputs, 'std' flavor, training mode only */
  pEm?: number;
  /** dropout on emission weights, 'weight_drop' flavor, training mode only */
  pOut?: number;
}

function checkProbability(name: string, p: number) {
  if (!(p >= 0 && p < 1)) throw new RangeError(`${name} must be in [0, 1), got ${p}`);
}

function dropout(values: readonly number[], p: number, random: RandomSource): number[] {
  if (p === 0) return values.slice();
  const keep = 1 / (1 - p);
  return values.map(v => (random() < p ? 0 : v * keep));
}

function dot(a: readonly number[], b: readonly number[]): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i]! * (b[i] ?? 0);
  return s;
}

function checkMatrix(name: string, m: Matrix, rows: number, cols: number) {
  if (m.length !== rows) throw new CheckpointLoadError(`${name}: expected ${rows} rows, got ${m.length}`);
  m.forEach((row, i) => {
    if (row.length !== cols) throw new CheckpointLoadError(`${name}: row ${i} has ${row.length} columns, expected ${cols}`);
  });
}

/**
 * CRF tagger whose emission layer is linear in the word embedding:
 * emission[t][y] = bias[y] + weight[y] . embedding[word_t].
 * Subclasses decide where dropout goes while training.
 */
abstract class LinearCrfTagger implements SequenceTagger {
  abstract readonly flavor: ModelFlavor;
  readonly numTags: number;
  readonly embeddingDim: number;
  protected readonly random: RandomSource;
  protected params: CrfParams;
  private isTraining = true;

  constructor(opts: TaggerOptions) {
    const vocabularySize = opts.wordEmbedding.length;
    if (vocabularySize === 0) throw new ShapeMismatchError('Word embedding table is empty');
    if (!Number.isInteger(opts.numTags) || opts.numTags < 1) throw new ShapeMismatchError(`numTags must be positive, got ${opts.numTags}`);

    const dim = opts.wordEmbedding[0]!.length;
    opts.wordEmbedding.forEach((row, i) => {
      if (row.length !== dim) throw new ShapeMismatchError(`Embedding row ${i} has width ${row.length}, expected ${dim}`);
    });

    this.numTags = opts.numTags;
    this.embeddingDim = dim;
    this.random = opts.random;

    const bound = Math.sqrt(6 / (dim + opts.numTags));
    this.params = {
      wordEmbedding: opts.wordEmbedding,
      emissionWeight: Array.from({ length: opts.numTags }, () => uniformVector(opts.random, dim, bound)),
      emissionBias: new Array<number>(opts.numTags).fill(0),
      transitions: Array.from({ length: opts.numTags }, () => new Array<number>(opts.numTags).fill(0))
    };
  }

  get training(): boolean {
    return this.isTraining;
  }

  get vocabularySize(): number {
    return this.params.wordEmbedding.length;
  }

  train() {
    this.isTraining = true;
  }

  eval() {
    this.isTraining = false;
  }

  protected abstract embed(wordId: number): number[];
  protected abstract currentEmissionWeight(): Matrix;

  protected lookup(wordId: number): number[] {
    const row = this.params.wordEmbedding[wordId];
    if (row === undefined) throw new ShapeMismatchError(`Word id ${wordId} outside embedding table of ${this.vocabularySize} rows`);
    return row;
  }

  emissions(batch: Batch): EmissionTensor {
    const weight = this.currentEmissionWeight();
    const bias = this.params.emissionBias;
    const zero = new Array<number>(this.numTags).fill(0);

    return batch.words.map((row, i) => {
      const length = batch.lengths[i] ?? 0;
      return row.map((wordId, j) => {
        if (j >= length) return zero.slice();
        const x = this.embed(wordId);
        return weight.map((w, y) => (bias[y] ?? 0) + dot(w, x));
      });
    });
  }

  decode(batch: Batch, opts: DecodeOptions): TaggerOutput {
    const preds = viterbiDecode(this.emissions(batch), this.params.transitions, batch.lengths, opts);
    const maxLength = batch.words[0]?.length ?? 0;
    return {
      predictions: padPredictions(preds, maxLength, opts.fillerTag ?? 0),
      scores: preds.map(p => p.score)
    };
  }

  /** Replace every parameter, or none: the checkpoint is validated in full first. */
  loadCheckpoint(data: unknown) {
    const parsed = CheckpointSchema.safeParse(data);
    if (!parsed.success) {
      throw new CheckpointLoadError(`Malformed checkpoint: ${parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')}`);
    }
    const cp = parsed.data;
    if (cp.flavor !== this.flavor) {
      throw new CheckpointLoadError(`Checkpoint was saved from a '${cp.flavor}' network, cannot restore into '${this.flavor}'`);
    }

    const { wordEmbedding, emissionWeight, emissionBias, transitions } = cp.params;
    checkMatrix('wordEmbedding', wordEmbedding, this.vocabularySize, this.embeddingDim);
    checkMatrix('emissionWeight', emissionWeight, this.numTags, this.embeddingDim);
    if (emissionBias.length !== this.numTags) {
      throw new CheckpointLoadError(`emissionBias: expected ${this.numTags} entries, got ${emissionBias.length}`);
    }
    checkMatrix('transitions', transitions, this.numTags, this.numTags);

    this.params = { wordEmbedding, emissionWeight, emissionBias, transitions };
  }

  checkpoint(): Checkpoint {
    const copy = (m: Matrix) => m.map(r => r.slice());
    return {
      format: CHECKPOINT_FORMAT,
      version: CHECKPOINT_VERSION,
      flavor: this.flavor,
      params: {
        wordEmbedding: copy(this.params.wordEmbedding),
        emissionWeight: copy(this.params.emissionWeight),
        emissionBias: this.params.emissionBias.slice(),
        transitions: copy(this.params.transitions)
      }
    };
  }
}

export class StdDropoutCrfTagger extends LinearCrfTagger {
  readonly flavor = 'std' as const;
  private readonly pEm: number;

  constructor(opts: TaggerOptions) {
    super(opts);
    this.pEm = opts.pEm ?? 0;
    checkProbability('pEm', this.pEm);
  }

  protected embed(wordId: number): number[] {
    const row = this.lookup(wordId);
    return this.training ? dropout(row, this.pEm, this.random) : row;
  }

  protected currentEmissionWeight(): Matrix {
    return this.params.emissionWeight;
  }
}

export class WeightDropCrfTagger extends LinearCrfTagger {
  readonly flavor = 'weight_drop' as const;
  private readonly pOut: number;

  constructor(opts: TaggerOptions) {
    super(opts);
    this.pOut = opts.pOut ?? 0;
    checkProbability('pOut', this.pOut);
  }

  protected embed(wordId: number): number[] {
    return this.lookup(wordId);
  }

  // a fresh weight mask per batch while training
  protected currentEmissionWeight(): Matrix {
    const w = this.params.emissionWeight;
    return this.training ? w.map(row => dropout(row, this.pOut, this.random)) : w;
  }
}

export const TAGGER_FLAVORS: Record<ModelFlavor, (opts: TaggerOptions) => SequenceTagger> = {
  std: opts => new StdDropoutCrfTagger(opts),
  weight_drop: opts => new WeightDropCrfTagger(opts)
};

export function createTagger(flavor: ModelFlavor, opts: TaggerOptions): SequenceTagger {
  return TAGGER_FLAVORS[flavor](opts);
}

export function readCheckpointFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new CheckpointLoadError(`Cannot read checkpoint ${filePath}`, { cause: err });
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new CheckpointLoadError(`Checkpoint ${filePath} is not valid JSON`, { cause: err });
  }
}

export function saveCheckpointFile(tagger: SequenceTagger, filePath: string) {
  fs.writeFileSync(filePath, JSON.stringify(tagger.checkpoint()) + '\n', 'utf8');
}
