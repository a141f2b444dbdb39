import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import { createAlphabetsFromFiles, NUM_SYMBOLIC_TAGS } from './alphabets.js';
import { countBatches, iterateBatches } from './batch.js';
import type { EvalConfig } from './config.js';
import { encodeSentences, readConllFile, type SentenceAlphabets } from './conll.js';
import { buildEmbeddingTable, loadEmbeddingDict, type LoadedEmbeddings } from './embedding.js';
import { createLogger, type Logger } from './logger.js';
import { createTagger, readCheckpointFile, type ModelFlavor, type SequenceTagger, type TaggerOptions } from './model.js';
import { mulberry32 } from './random.js';
import { ExternalScorer, formatResultLine, type Scorer } from './scorer.js';
import type { RandomSource, ScoreReport, Sentence } from './types.js';
import { ConllWriter } from './writer.js';

export interface DecodeAndScoreOptions {
  tagger: SequenceTagger;
  alphabets: SentenceAlphabets;
  sentences: readonly Sentence[];
  batchSize: number;
  /** rendered predictions */
  evalFile: string;
  /** raw scorer report */
  scoreFile: string;
  /** append-only metrics log */
  resultFile: string;
  scorer: Scorer;
  leadingSymbolic?: number;
  logger?: Logger;
}

/**
 * Decode every batch into the prediction file, score it and append one metrics
 * line. Any failure aborts the run before the metrics line is written.
 */
export async function decodeAndScore(opts: DecodeAndScoreOptions): Promise<ScoreReport> {
  const { tagger, alphabets, sentences, batchSize, logger } = opts;
  const leadingSymbolic = opts.leadingSymbolic ?? NUM_SYMBOLIC_TAGS;
  const writer = new ConllWriter(alphabets.word, alphabets.tag);
  const numBatches = countBatches(sentences.length, batchSize);

  tagger.eval();
  writer.start(opts.evalFile);
  try {
    let b = 0;
    for (const batch of iterateBatches(sentences, batchSize)) {
      const { predictions } = tagger.decode(batch, { leadingSymbolic, fillerTag: 0 });
      writer.write(batch.words, predictions, batch.tags, batch.lengths);
      logger?.debug(`decoded batch ${++b}/${numBatches}`);
    }
  } finally {
    writer.close();
  }

  const report = await opts.scorer.score(opts.evalFile, opts.scoreFile);
  fs.appendFileSync(opts.resultFile, formatResultLine(report) + '\n', 'utf8');
  return report;
}

export interface EvaluateDeps {
  scorer?: Scorer;
  logger?: Logger;
  random?: RandomSource;
  /** already-loaded dictionary; skips reading `embeddingDict` */
  embeddings?: LoadedEmbeddings;
  createTagger?: (flavor: ModelFlavor, opts: TaggerOptions) => SequenceTagger;
}

export function checkpointPath(prefix: string): string {
  return `${prefix}_best.json`;
}

export async function evaluate(config: EvalConfig, deps: EvaluateDeps = {}): Promise<ScoreReport> {
  const logger = deps.logger ?? createLogger('NERCRF', config.logLevel);
  const random = deps.random ?? mulberry32(config.seed);

  for (const dir of [config.resultsFolder, config.tmpFolder, config.alphabetsFolder, path.dirname(config.resultFilePath), path.dirname(config.evalFilename)]) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const scoreFile = path.join(config.tmpFolder, `score_${randomUUID().slice(0, 6)}`);

  const embeddings: LoadedEmbeddings = deps.embeddings
    ?? (config.embeddingDict !== undefined ? loadEmbeddingDict(config.embeddingDict) : { dict: new Map<string, number[]>(), dim: config.embeddingDim });
  const dim = embeddings.dim > 0 ? embeddings.dim : config.embeddingDim;

  logger.info('Creating Alphabets');
  const alphabets = createAlphabetsFromFiles({
    alphabetDirectory: path.join(config.alphabetsFolder, config.datasetName),
    trainPath: config.train,
    dataPaths: [config.dev, config.test],
    embeddingDict: embeddings.dict,
    maxVocabularySize: config.maxVocabularySize,
    minOccurrence: config.minOccurrence,
    normalizeDigits: config.normalizeDigits,
    logger
  });

  logger.info('Reading Data');
  const sentences = encodeSentences(readConllFile(config.test), alphabets, { normalizeDigits: config.normalizeDigits });
  const numTokens = sentences.reduce((n, s) => n + s.length, 0);
  logger.info(`${sentences.length} sentences, ${numTokens} tokens`);

  const { table } = buildEmbeddingTable(alphabets.word, embeddings.dict, dim, random, logger);

  logger.info('constructing network...');
  const tagger = (deps.createTagger ?? createTagger)(config.dropout, {
    wordEmbedding: table,
    numTags: alphabets.tag.size(),
    random,
    pEm: config.pEm,
    pOut: config.pOut
  });

  if (config.restore) {
    const cpPath = checkpointPath(config.saveCheckpoint);
    logger.info(`Restoring parameters from ${cpPath}`);
    tagger.loadCheckpoint(readCheckpointFile(cpPath));
  }
  logger.info(`Network: flavor=${tagger.flavor}, tags=${tagger.numTags}, embedding dim=${dim}`);

  const scorer = deps.scorer ?? new ExternalScorer({
    scriptPath: config.scorer,
    rawFormat: config.evaluateRawFormat,
    outsideTag: config.oTag,
    timeoutMs: config.scorerTimeout
  });

  const report = await decodeAndScore({
    tagger,
    alphabets,
    sentences,
    batchSize: config.batchSize,
    evalFile: config.evalFilename,
    scoreFile,
    resultFile: config.resultFilePath,
    scorer,
    logger
  });

  logger.info(formatResultLine(report));
  logger.info('Evaluation finished!');
  return report;
}
