/**
 * Failures that are NOT refusals. A refusal is a normal outcome carrying
 * the canonical refusal text; these propagate to the caller as errors.
 */

export class GeneratorFault extends Error {
  readonly status?: number;

  constructor(message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = 'GeneratorFault';
    this.status = options.status;
  }
}

export class EmbeddingFault extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'EmbeddingFault';
  }
}

/**
 * Missing or corrupt index artifacts. Fatal: ingestion must be rerun.
 */
export class IndexLoadFault extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'IndexLoadFault';
  }
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}
