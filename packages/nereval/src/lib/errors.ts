
export class NerEvalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An alphabet was mutated after close(), or read for encoding before it. */
export class FrozenStateError extends NerEvalError {}

/** Emission / transition / length dimensions disagree. */
export class ShapeMismatchError extends NerEvalError {}

export class ClosedWriterError extends NerEvalError {}

/** start() on a writer that is already open. */
export class WriterStateError extends NerEvalError {}

export class ScoreParseError extends NerEvalError {}

export class ScorerTimeoutError extends NerEvalError {
  constructor(readonly command: string, readonly timeoutMs: number) {
    super(`Scorer '${command}' did not finish within ${timeoutMs}ms`);
  }
}

export class ScorerProcessError extends NerEvalError {
  constructor(message: string, readonly exitCode: number | null, readonly stderr: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CheckpointLoadError extends NerEvalError {}

export class DictionaryFormatError extends NerEvalError {}

export class CorpusFormatError extends NerEvalError {}

export class ConfigError extends NerEvalError {}
