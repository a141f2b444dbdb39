import { spawn } from 'child_process';
import fs from 'fs';
import { ScoreParseError, ScorerProcessError, ScorerTimeoutError } from './errors.js';
import type { ScoreReport } from './types.js';

export interface Scorer {
  /** Score the rendered prediction file, keeping the raw report at `scoreFile`. */
  score(predictionFile: string, scoreFile: string): Promise<ScoreReport>;
}

export interface ParseScoreOptions {
  /** conlleval prints a `processed N tokens ...` line first, then the summary */
  summaryLine?: number;
}

function parseField(field: string, label: string, percent: boolean): number {
  const colon = field.indexOf(':');
  if (colon < 0) throw new ScoreParseError(`${label} field '${field.trim()}' has no 'label: value' shape`);

  let value = field.slice(colon + 1).trim();
  if (percent) {
    if (!value.endsWith('%')) throw new ScoreParseError(`${label} value '${value}' is missing its '%'`);
    value = value.slice(0, -1).trim();
  }

  const n = Number(value);
  if (value === '' || !Number.isFinite(n)) throw new ScoreParseError(`${label} value '${value}' is not a number`);
  return n;
}

/**
 * Parse a `;`-delimited summary line: accuracy, precision and recall as
 * `label: value%`, then F1 as `label: value`.
 */
export function parseSummaryLine(line: string): ScoreReport {
  const fields = line.split(';');
  const [acc, prec, rec, f1] = fields;
  if (fields.length !== 4 || acc === undefined || prec === undefined || rec === undefined || f1 === undefined) {
    throw new ScoreParseError(`Expected 4 ';'-separated fields in scorer summary, got ${fields.length}: '${line.trim()}'`);
  }
  return Object.freeze({
    accuracy: parseField(acc, 'accuracy', true),
    precision: parseField(prec, 'precision', true),
    recall: parseField(rec, 'recall', true),
    f1: parseField(f1, 'F1', false)
  });
}

export function parseScoreReport(text: string, opts?: ParseScoreOptions): ScoreReport {
  const index = opts?.summaryLine ?? 1;
  const line = text.split(/\r?\n/)[index];
  if (line === undefined || line.trim() === '') {
    throw new ScoreParseError(`Scorer report has no summary on line ${index + 1}`);
  }
  return parseSummaryLine(line);
}

/** Largest delay setTimeout honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface RunProcessOptions {
  /** file piped into the process's standard input */
  stdinPath?: string;
  timeoutMs: number;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
}

/**
 * Run a command to completion. A non-zero exit or a failed spawn rejects with
 * ScorerProcessError; running past `timeoutMs` kills the process and rejects
 * with ScorerTimeoutError.
 */
export function runProcess(command: string, args: readonly string[], opts: RunProcessOptions): Promise<ProcessResult> {
  if (!Number.isInteger(opts.timeoutMs) || opts.timeoutMs < 1 || opts.timeoutMs > MAX_TIMEOUT_MS) {
    return Promise.reject(new RangeError(`timeoutMs must be an integer in [1, ${MAX_TIMEOUT_MS}], got ${opts.timeoutMs}`));
  }

  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let input: fs.ReadStream | null = null;
    let settled = false;

    const finish = (err: Error | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (err) {
        input?.destroy();
        reject(err);
      } else resolve({ stdout: Buffer.concat(stdout).toString('utf8'), stderr: Buffer.concat(stderr).toString('utf8') });
    };

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      finish(new ScorerTimeoutError(command, opts.timeoutMs));
    }, opts.timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', err => {
      finish(new ScorerProcessError(`Failed to run '${command}': ${err.message}`, null, '', { cause: err }));
    });

    child.on('close', (code, signal) => {
      if (code === 0) {
        finish(null);
        return;
      }
      const errText = Buffer.concat(stderr).toString('utf8');
      const how = code !== null ? `exited with status ${code}` : `was killed by ${signal ?? 'a signal'}`;
      finish(new ScorerProcessError(`Scorer '${command}' ${how}${errText ? `: ${errText.trim()}` : ''}`, code, errText));
    });

    child.stdin.on('error', (err: NodeJS.ErrnoException) => {
      // EPIPE: the scorer stopped reading early; its exit status decides the outcome
      if (err.code !== 'EPIPE') finish(new ScorerProcessError(`Cannot write to scorer stdin: ${err.message}`, null, '', { cause: err }));
    });

    if (opts.stdinPath !== undefined) {
      input = fs.createReadStream(opts.stdinPath);
      input.on('error', err => {
        child.kill('SIGKILL');
        finish(new ScorerProcessError(`Cannot read scorer input ${opts.stdinPath}: ${err.message}`, null, '', { cause: err }));
      });
      input.pipe(child.stdin);
    } else {
      child.stdin.end();
    }
  });
}

export interface ExternalScorerOptions {
  /** path of the conlleval-compatible script */
  scriptPath: string;
  /** pass `-r`: tags are raw, without IOB prefixes */
  rawFormat?: boolean;
  outsideTag?: string;
  timeoutMs?: number;
  summaryLine?: number;
}

/** Runs `<script> [-r] -o <outside_tag> < predictions > scoreFile` and parses the report. */
export class ExternalScorer implements Scorer {
  constructor(private readonly opts: ExternalScorerOptions) {}

  args(): string[] {
    const args: string[] = [];
    if (this.opts.rawFormat) args.push('-r');
    args.push('-o', this.opts.outsideTag ?? 'O');
    return args;
  }

  async score(predictionFile: string, scoreFile: string): Promise<ScoreReport> {
    const { stdout } = await runProcess(this.opts.scriptPath, this.args(), {
      stdinPath: predictionFile,
      timeoutMs: this.opts.timeoutMs ?? 60000
    });
    fs.writeFileSync(scoreFile, stdout, 'utf8');
    return parseScoreReport(stdout, { summaryLine: this.opts.summaryLine });
  }
}

export function formatResultLine(report: ScoreReport): string {
  return `test acc: ${report.accuracy.toFixed(2)}%, precision: ${report.precision.toFixed(2)}%, recall: ${report.recall.toFixed(2)}%, F1: ${report.f1.toFixed(2)}%`;
}
