export type VocabErrorCode = 'NETWORK' | 'EXTRACTION' | 'VALIDATION' | 'PIPELINE';

export class VocabError extends Error {
  readonly code: VocabErrorCode;

  constructor(code: VocabErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Transport failure, timeout or non-2xx answer from an upstream service. */
export class NetworkError extends VocabError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super('NETWORK', message, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

/** The expected element is missing from an upstream page. */
export class ExtractionError extends VocabError {
  readonly url: string;

  constructor(url: string, message: string) {
    super('EXTRACTION', message);
    this.url = url;
  }
}

export class ValidationError extends VocabError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

/** Raised once the enrichment loop stopped early and the vocabulary was written to `savedTo`. */
export class PipelineError extends VocabError {
  readonly savedTo: string;

  constructor(message: string, savedTo: string, cause: unknown) {
    super('PIPELINE', message, { cause });
    this.savedTo = savedTo;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
