export type TaggerErrorCode =
  | 'NORMALIZATION_FAILED'
  | 'LOOKUP_FAILED'
  | 'EXTRACTION_FAILED'
  | 'WRITE_FAILED'
  | 'CONFIGURATION_INVALID'
  | 'INPUT_INVALID';

export class TaggerError extends Error {
  constructor(
    readonly code: TaggerErrorCode,
    message: string,
    readonly fatal: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TaggerError';
  }
}

/** A row is missing the fields needed to identify the person. */
export class NormalizationError extends TaggerError {
  constructor(message: string, readonly missingFields: string[] = []) {
    super('NORMALIZATION_FAILED', message, false);
    this.name = 'NormalizationError';
  }
}

export class LookupError extends TaggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LOOKUP_FAILED', message, false, options);
    this.name = 'LookupError';
  }
}

export class ExtractionError extends TaggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', message, false, options);
    this.name = 'ExtractionError';
  }
}

export class WriteError extends TaggerError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super('WRITE_FAILED', `Could not write output file: ${path} (${describeError(options?.cause)})`, true, options);
    this.name = 'WriteError';
  }
}

export class ConfigurationError extends TaggerError {
  constructor(message: string, readonly variables: string[] = []) {
    super('CONFIGURATION_INVALID', message, true);
    this.name = 'ConfigurationError';
  }
}

export class InputError extends TaggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INPUT_INVALID', message, true, options);
    this.name = 'InputError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
