import minimist from 'minimist';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import { MODEL_FLAVORS } from './model.js';
import { MAX_TIMEOUT_MS } from './scorer.js';

export const EvalConfigSchema = z.object({
  train: z.string().min(1),
  dev: z.string().min(1),
  test: z.string().min(1),
  embeddingDict: z.string().min(1).optional(),
  // width of the sampled vectors when no dictionary is given
  embeddingDim: z.coerce.number().int().positive().default(100),
  datasetName: z.string().min(1).default('conll03'),
  alphabetsFolder: z.string().min(1).default('data/alphabets'),
  resultsFolder: z.string().min(1).default('results'),
  tmpFolder: z.string().min(1).default('tmp'),
  resultFilePath: z.string().min(1).default('results/hyperparameters_tuning'),
  evalFilename: z.string().min(1),
  batchSize: z.coerce.number().int().positive().default(16),
  oTag: z.string().min(1).default('O'),
  evaluateRawFormat: z.boolean().default(false),
  restore: z.boolean().default(false),
  saveCheckpoint: z.string().default(''),
  dropout: z.enum(MODEL_FLAVORS).default('weight_drop'),
  pEm: z.coerce.number().min(0).lt(1).default(0.33),
  pOut: z.coerce.number().min(0).lt(1).default(0.33),
  scorer: z.string().min(1).default('examples/eval/conll03eval.v2'),
  scorerTimeout: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).default(60000),
  seed: z.coerce.number().int().default(1234),
  maxVocabularySize: z.coerce.number().int().positive().default(50000),
  minOccurrence: z.coerce.number().int().nonnegative().default(1),
  normalizeDigits: z.boolean().default(true),
  logLevel: z.enum(LOG_LEVELS).default('info')
}).refine(c => !c.restore || c.saveCheckpoint.length > 0, {
  message: '--restore needs --save_checkpoint',
  path: ['saveCheckpoint']
});

export type EvalConfig = z.infer<typeof EvalConfigSchema>;
export type EvalConfigInput = z.input<typeof EvalConfigSchema>;

export function parseConfig(input: unknown): EvalConfig {
  const parsed = EvalConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
  return parsed.data;
}

/** Command-line flag -> config key. */
const FLAGS: Record<string, keyof EvalConfigInput> = {
  train: 'train',
  dev: 'dev',
  test: 'test',
  embedding_dict: 'embeddingDict',
  embedding_dim: 'embeddingDim',
  dataset_name: 'datasetName',
  alphabets_folder: 'alphabetsFolder',
  results_folder: 'resultsFolder',
  tmp_folder: 'tmpFolder',
  result_file_path: 'resultFilePath',
  eval_filename: 'evalFilename',
  batch_size: 'batchSize',
  o_tag: 'oTag',
  evaluate_raw_format: 'evaluateRawFormat',
  restore: 'restore',
  save_checkpoint: 'saveCheckpoint',
  dropout: 'dropout',
  p_em: 'pEm',
  p_out: 'pOut',
  scorer: 'scorer',
  scorer_timeout: 'scorerTimeout',
  seed: 'seed',
  max_vocabulary_size: 'maxVocabularySize',
  min_occurrence: 'minOccurrence',
  normalize_digits: 'normalizeDigits',
  log_level: 'logLevel'
};

const BOOLEAN_FLAGS = ['evaluate_raw_format', 'restore', 'normalize_digits'];

export function parseArgv(argv: string[]): EvalConfig {
  const args = minimist(argv, {
    string: Object.keys(FLAGS).filter(f => !BOOLEAN_FLAGS.includes(f)),
    boolean: BOOLEAN_FLAGS,
    default: { normalize_digits: true },
    unknown: arg => {
      if (arg.startsWith('-')) throw new ConfigError(`Unknown option ${arg}`);
      return true;
    }
  });

  const input: Record<string, unknown> = {};
  for (const [flag, key] of Object.entries(FLAGS)) {
    const value: unknown = args[flag];
    if (value !== undefined && value !== '') input[key] = value;
  }
  return parseConfig(input);
}

export const USAGE = `Usage: nereval --train <path> --dev <path> --test <path> --eval_filename <path> [options]

  --embedding_dict <path>      pretrained vectors, one 'word v1 ... vd' row per line
  --embedding_dim <n>          vector width when no dictionary is given (100)
  --dataset_name <name>        alphabet sub-directory (conll03)
  --alphabets_folder <dir>     (data/alphabets)
  --results_folder <dir>       (results)
  --tmp_folder <dir>           scorer reports (tmp)
  --result_file_path <path>    metrics log (results/hyperparameters_tuning)
  --batch_size <n>             (16)
  --o_tag <tag>                outside tag passed to the scorer (O)
  --evaluate_raw_format        score raw tags (-r)
  --restore                    load <save_checkpoint>_best.json
  --save_checkpoint <prefix>
  --dropout std|weight_drop    network flavor (weight_drop)
  --scorer <path>              (examples/eval/conll03eval.v2)
  --scorer_timeout <ms>        (60000)
  --seed <n>                   (1234)
  --log_level debug|info|warn|error|silent`;
