export type EngineErrorCode =
  | 'ExtractionDegraded'
  | 'EmbeddingUnavailable'
  | 'AIProviderError'
  | 'InconsistentScoreRequest'
  | 'DuplicateThresholdInvalid'
  | 'ConfigurationError'
  | 'ResultNotFound'
  | 'OperationCancelled';

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly fatal: boolean;

  constructor(code: EngineErrorCode, message: string, fatal: boolean = false) {
    super(message);
    this.name = code;
    this.code = code;
    this.fatal = fatal;
  }
}

export class ExtractionDegraded extends EngineError {
  constructor(message: string) {
    super('ExtractionDegraded', message);
  }
}

export class EmbeddingUnavailable extends EngineError {
  constructor(message: string) {
    super('EmbeddingUnavailable', message);
  }
}

export type AIProviderErrorKind = 'timeout' | 'rate_limit' | 'network' | 'server' | 'malformed' | 'rejected';

export class AIProviderError extends EngineError {
  readonly kind: AIProviderErrorKind;

  constructor(kind: AIProviderErrorKind, message: string) {
    super('AIProviderError', message);
    this.kind = kind;
  }

  get retryable(): boolean {
    return this.kind !== 'malformed' && this.kind !== 'rejected';
  }
}

export class InconsistentScoreRequest extends EngineError {
  constructor(message: string) {
    super('InconsistentScoreRequest', message);
  }
}

export class DuplicateThresholdInvalid extends EngineError {
  constructor(value: unknown) {
    super('DuplicateThresholdInvalid', `Duplicate similarity threshold must be within [0, 1], got ${String(value)}`, true);
  }
}

export class ConfigurationError extends EngineError {
  constructor(message: string) {
    super('ConfigurationError', message, true);
  }
}

export class ResultNotFound extends EngineError {
  constructor(jobId: string, fingerprint: string) {
    super('ResultNotFound', `No match result for fingerprint ${fingerprint} under job ${jobId}`);
  }
}

export class OperationCancelled extends EngineError {
  constructor(message: string = 'Operation cancelled') {
    super('OperationCancelled', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
