#!/usr/bin/env node
/**
 * Evaluate a CRF tagger on the test split and append its CoNLL scores.
 *
 * Usage:
 *   npm run evaluate -- --train data/train.txt --dev data/dev.txt --test data/test.txt \
 *     --eval_filename tmp/test_predictions.txt --restore --save_checkpoint models/ner
 */

import { parseArgv, USAGE } from '../lib/config.js'
import { evaluate } from '../lib/evaluate.js'

async function main() {
  const argv = process.argv.slice(2)
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(USAGE)
    return
  }
  await evaluate(parseArgv(argv))
}

main().catch(err => { console.error(err instanceof Error ? `${err.name}: ${err.message}` : err); process.exit(1) })
