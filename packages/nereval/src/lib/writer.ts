import fs from 'fs';
import type { Alphabet } from './alphabet.js';
import { ClosedWriterError, WriterStateError } from './errors.js';
import type { Matrix } from './types.js';

export interface PredictionLine {
  word: string;
  predicted: string;
  gold: string;
}

/**
 * Renders decoded batches as `word predicted gold`, one token per line and a
 * blank line after every sentence, which is the layout the CoNLL scorer reads.
 *
 * closed -> start(path) -> open -> close() -> closed
 */
export class ConllWriter {
  private fd: number | null = null;
  private currentPath: string | null = null;

  constructor(private readonly wordAlphabet: Alphabet, private readonly tagAlphabet: Alphabet) {}

  get isOpen(): boolean {
    return this.fd !== null;
  }

  get path(): string | null {
    return this.currentPath;
  }

  start(filePath: string) {
    if (this.fd !== null) throw new WriterStateError(`Writer already open on ${this.currentPath}`);
    this.fd = fs.openSync(filePath, 'w');
    this.currentPath = filePath;
  }

  /** Rows may be padded; only the first `lengths[i]` tokens of sentence i are written. */
  write(words: Matrix, predictions: Matrix, gold: Matrix, lengths: readonly number[]) {
    if (this.fd === null) throw new ClosedWriterError('write() called on a closed writer');

    let out = '';
    for (let i = 0; i < lengths.length; i++) {
      const len = lengths[i]!;
      for (let j = 0; j < len; j++) {
        const w = this.wordAlphabet.getInstance(words[i]?.[j] ?? -1);
        const p = this.tagAlphabet.getInstance(predictions[i]?.[j] ?? -1);
        const g = this.tagAlphabet.getInstance(gold[i]?.[j] ?? -1);
        out += `${w} ${p} ${g}\n`;
      }
      out += '\n';
    }

    fs.writeSync(this.fd, out, null, 'utf8');
  }

  close() {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.fsyncSync(fd);
    fs.closeSync(fd);
  }
}

/** Inverse of the writer's layout: one array of lines per sentence. */
export function parsePredictionFile(text: string): PredictionLine[][] {
  const sentences: PredictionLine[][] = [];
  let current: PredictionLine[] = [];

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) {
      if (current.length > 0) {
        sentences.push(current);
        current = [];
      }
      continue;
    }
    const [word, predicted, gold] = line.split(/\s+/);
    if (word === undefined || predicted === undefined || gold === undefined) continue;
    current.push({ word, predicted, gold });
  }

  if (current.length > 0) sentences.push(current);
  return sentences;
}
