// Curated public API
export type { Batch, DecodeOptions, EmissionTensor, Matrix, Prediction, RandomSource, RawSentence, ScoreReport, Sentence, TaggerOutput } from './lib/types.js';
export {
  NerEvalError, FrozenStateError, ShapeMismatchError, ClosedWriterError, WriterStateError, ScoreParseError,
  ScorerTimeoutError, ScorerProcessError, CheckpointLoadError, DictionaryFormatError, CorpusFormatError, ConfigError
} from './lib/errors.js';
export { Alphabet, UNK_ID } from './lib/alphabet.js';
export { createAlphabets, createAlphabetsFromFiles, emptyAlphabets, NUM_SYMBOLIC_TAGS, PAD_TAG, UNK_WORD } from './lib/alphabets.js';
export type { CreateAlphabetsOptions } from './lib/alphabets.js';
export { parseConll, readConllFile, encodeSentence, encodeSentences, normalizeWord, MAX_CHAR_LENGTH } from './lib/conll.js';
export type { SentenceAlphabets, EncodeOptions } from './lib/conll.js';
export { parseEmbeddingDict, loadEmbeddingDict, buildEmbeddingTable } from './lib/embedding.js';
export type { EmbeddingDict, EmbeddingTable, LoadedEmbeddings } from './lib/embedding.js';
export { iterateBatches, makeBatch, unpadBatch, PAD_ID } from './lib/batch.js';
export { viterbiDecode, padPredictions, pathScore } from './lib/viterbi/decoder.js';
export { createTagger, readCheckpointFile, saveCheckpointFile, MODEL_FLAVORS, StdDropoutCrfTagger, WeightDropCrfTagger } from './lib/model.js';
export type { Checkpoint, ModelFlavor, SequenceTagger, TaggerOptions } from './lib/model.js';
export { ConllWriter, parsePredictionFile } from './lib/writer.js';
export { ExternalScorer, parseScoreReport, parseSummaryLine, runProcess, formatResultLine, MAX_TIMEOUT_MS } from './lib/scorer.js';
export type { Scorer, ExternalScorerOptions } from './lib/scorer.js';
export { evaluate, decodeAndScore } from './lib/evaluate.js';
export type { EvaluateDeps, DecodeAndScoreOptions } from './lib/evaluate.js';
export { parseConfig, parseArgv, EvalConfigSchema } from './lib/config.js';
export type { EvalConfig } from './lib/config.js';
export { createLogger, silentLogger } from './lib/logger.js';
export type { Logger, LogLevel } from './lib/logger.js';
export { mulberry32 } from './lib/random.js';
