export type EngineErrorCode =
  | 'VALIDATION'
  | 'INSUFFICIENT_FUNDS'
  | 'DUPLICATE_POSITION'
  | 'POSITION_NOT_FOUND'
  | 'PRICE_UNAVAILABLE'
  | 'STORAGE_CONFLICT'
  | 'CORRUPTED_STATE';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  /** Transient errors are retried by the engine and never reach the caller. */
  abstract readonly transient: boolean;
}

export class ValidationError extends EngineError {
  readonly code = 'VALIDATION';
  readonly transient = false;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class InsufficientFundsError extends EngineError {
  readonly code = 'INSUFFICIENT_FUNDS';
  readonly transient = false;
  readonly availableUsd: number;
  readonly requestedUsd: number;

  constructor(availableUsd: number, requestedUsd: number) {
    super(`Available capital $${availableUsd.toFixed(2)} is below the requested $${requestedUsd.toFixed(2)}`);
    this.name = 'InsufficientFundsError';
    this.availableUsd = availableUsd;
    this.requestedUsd = requestedUsd;
  }
}

export class DuplicatePositionError extends EngineError {
  readonly code = 'DUPLICATE_POSITION';
  readonly transient = false;
  readonly positionKey: string;

  constructor(positionKey: string) {
    super(`Position ${positionKey} is already open`);
    this.name = 'DuplicatePositionError';
    this.positionKey = positionKey;
  }
}

export class PositionNotFoundError extends EngineError {
  readonly code = 'POSITION_NOT_FOUND';
  readonly transient = false;
  readonly positionKey: string;

  constructor(positionKey: string) {
    super(`No open position ${positionKey}`);
    this.name = 'PositionNotFoundError';
    this.positionKey = positionKey;
  }
}

export class PriceUnavailableError extends EngineError {
  readonly code = 'PRICE_UNAVAILABLE';
  readonly transient = true;
  readonly assetId: string;

  constructor(assetId: string, reason: string) {
    super(`Price unavailable for ${assetId}: ${reason}`);
    this.name = 'PriceUnavailableError';
    this.assetId = assetId;
  }
}

export class StorageConflictError extends EngineError {
  readonly code = 'STORAGE_CONFLICT';
  readonly transient = true;
  readonly userId: string;
  readonly expectedVersion: number;
  readonly remoteVersion: number;

  constructor(userId: string, expectedVersion: number, remoteVersion: number) {
    super(`Stored portfolio ${userId} is at version ${remoteVersion}, expected ${expectedVersion}`);
    this.name = 'StorageConflictError';
    this.userId = userId;
    this.expectedVersion = expectedVersion;
    this.remoteVersion = remoteVersion;
  }
}

export class CorruptedStateError extends EngineError {
  readonly code = 'CORRUPTED_STATE';
  readonly transient = false;
  readonly userId: string;

  constructor(userId: string, message: string) {
    super(`Portfolio ${userId} halted: ${message}`);
    this.name = 'CorruptedStateError';
    this.userId = userId;
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
