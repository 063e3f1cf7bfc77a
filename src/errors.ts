export type ProviderStage = 'retrieval' | 'generation' | 'embedding';
export type ProviderFailureKind = 'rate_limit' | 'unavailable' | 'bad_response';

/**
 * A retrieval, embedding or generation backend failed or answered with something unusable.
 */
export class ExternalProviderError extends Error {
  readonly stage: ProviderStage;
  readonly kind: ProviderFailureKind;

  constructor(stage: ProviderStage, kind: ProviderFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExternalProviderError';
    this.stage = stage;
    this.kind = kind;
  }
}

/**
 * Thrown by the citation binder under the `reject` policy.
 */
export class UnsupportedClaimError extends Error {
  readonly unsupportedSegments: string[];

  constructor(unsupportedSegments: string[]) {
    super(`Unsupported claim: ${unsupportedSegments.length} segment(s) have no supporting source`);
    this.name = 'UnsupportedClaimError';
    this.unsupportedSegments = unsupportedSegments;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const RATE_LIMIT_MARKERS = ['quota', 'rate limit', '429', 'insufficient_quota'];

/**
 * Classify an unknown backend failure. HTTP 429 and quota/rate-limit messages count as
 * rate limiting; everything else means the backend is unavailable.
 */
export function classifyProviderFailure(error: unknown): ProviderFailureKind {
  if (typeof error === 'object' && error !== null && 'status' in error && error.status === 429) {
    return 'rate_limit';
  }
  const text = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return RATE_LIMIT_MARKERS.some((marker) => text.includes(marker)) ? 'rate_limit' : 'unavailable';
}

export function toProviderError(stage: ProviderStage, error: unknown): ExternalProviderError {
  if (error instanceof ExternalProviderError) {
    return error;
  }
  const label = stage === 'retrieval' ? 'Retrieval failed' : stage === 'generation' ? 'Generation failed' : 'Embedding failed';
  const detail = error instanceof Error ? error.message : String(error);
  return new ExternalProviderError(stage, classifyProviderFailure(error), `${label}: ${detail}`, { cause: error });
}
