/**
 * Error hierarchy for Effect-based code
 * Every failure channel in the reporter is one of these, discriminated by `_tag`
 */

export abstract class KadenaError extends Error {
  abstract readonly _tag: string;
  abstract readonly module: string;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============= Configuration Errors =============
export class ConfigError extends KadenaError {
  readonly _tag = 'ConfigError';
  readonly module = 'config';
}

export class FileError extends KadenaError {
  readonly _tag = 'FileError';
  readonly module = 'config';

  constructor(
    message: string,
    public readonly path?: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

// ============= Validation Errors =============
export class ValidationError extends KadenaError {
  readonly _tag = 'ValidationError';
  readonly module = 'validation';

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class ParseError extends KadenaError {
  readonly _tag = 'ParseError';
  readonly module = 'validation';

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

// ============= Not Found Errors =============
export class NotFoundError extends KadenaError {
  readonly _tag = 'NotFoundError';
  readonly module = 'general';
}

// ============= Network Errors =============
export class NetworkError extends KadenaError {
  readonly _tag = 'NetworkError';
  readonly module = 'network';
}

export class TimeoutError extends KadenaError {
  readonly _tag = 'TimeoutError';
  readonly module = 'network';
}

export class HttpStatusError extends KadenaError {
  readonly _tag = 'HttpStatusError';
  readonly module = 'network';

  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string = '',
    cause?: unknown,
  ) {
    super(message, cause);
  }

  get retryable(): boolean {
    return this.status >= 500;
  }
}

// ============= Chainweb Errors =============
export class ChainwebError extends KadenaError {
  readonly _tag = 'ChainwebError';
  readonly module = 'chainweb';
}

export class TransactionFailedError extends KadenaError {
  readonly _tag = 'TransactionFailedError';
  readonly module = 'chainweb';

  constructor(
    message: string,
    public readonly requestKey?: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

// ============= Keystore Errors =============
export class KeystoreError extends KadenaError {
  readonly _tag = 'KeystoreError';
  readonly module = 'keystore';
}

export class AccountExistsError extends KadenaError {
  readonly _tag = 'AccountExistsError';
  readonly module = 'keystore';
}

export class AccountLockedError extends KadenaError {
  readonly _tag = 'AccountLockedError';
  readonly module = 'keystore';
}

export class ConfirmPasswordError extends KadenaError {
  readonly _tag = 'ConfirmPasswordError';
  readonly module = 'keystore';
}

export class DecryptionError extends KadenaError {
  readonly _tag = 'DecryptionError';
  readonly module = 'keystore';
}

// ============= Feed Errors =============
export class PriceSourceError extends KadenaError {
  readonly _tag = 'PriceSourceError';
  readonly module = 'feeds';

  constructor(
    message: string,
    public readonly source?: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

// ============= Reporter Errors =============
export class ReporterError extends KadenaError {
  readonly _tag = 'ReporterError';
  readonly module = 'reporter';
}

export type HttpError = NetworkError | TimeoutError | HttpStatusError;

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
