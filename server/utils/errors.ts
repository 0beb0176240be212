/**
 * Error taxonomy for attribute sync and messaging
 *
 * Every failure the service raises on purpose is an AppError carrying an
 * ErrorCode; raw pg and amqplib errors are attached as `cause`.
 */

export enum ErrorCode {
  // Validation
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_IDENTITY = 'INVALID_IDENTITY',
  IDENTITY_ATTRIBUTE = 'IDENTITY_ATTRIBUTE',

  // Database
  DATABASE_ERROR = 'DATABASE_ERROR',
  TRANSACTION_FAILED = 'TRANSACTION_FAILED',

  // Messaging
  TOPOLOGY_FAILED = 'TOPOLOGY_FAILED',
  CHANNEL_CLOSED = 'CHANNEL_CLOSED',

  // System
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  REQUEST_TIMEOUT = 'REQUEST_TIMEOUT'
}

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/**
 * Raised when the identity attribute is requested through the generic
 * attribute path. Identities are resolved by name with `fetchIdentity`.
 */
export class IdentityAttributeError extends AppError {
  constructor(operation: 'fetch' | 'update') {
    super(
      `AttributeType.Identity can't be used with ${operation}(); resolve identities with fetchIdentity() instead`,
      ErrorCode.IDENTITY_ATTRIBUTE
    );
    this.name = 'IdentityAttributeError';
  }
}

/** A stored identity value is not a UUID. */
export class InvalidIdentityError extends AppError {
  constructor(public readonly value: string) {
    super(`Invalid player identity stored: ${value}`, ErrorCode.INVALID_IDENTITY);
    this.name = 'InvalidIdentityError';
  }
}

export class InvalidAttributeValueError extends AppError {
  constructor(public readonly attribute: string, public readonly value: string, reason: string) {
    super(`Invalid value "${value}" for attribute ${attribute}: ${reason}`, ErrorCode.INVALID_INPUT);
    this.name = 'InvalidAttributeValueError';
  }
}

export class StoreError extends AppError {
  constructor(message: string, public readonly transient: boolean, options?: { cause?: unknown }) {
    super(message, ErrorCode.DATABASE_ERROR, options);
    this.name = 'StoreError';
  }
}

export class AttributeUpdateError extends AppError {
  constructor(
    public readonly playerId: string,
    public readonly attribute: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to update ${attribute} for player ${playerId}`, ErrorCode.TRANSACTION_FAILED, options);
    this.name = 'AttributeUpdateError';
  }
}

export class TopologyError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.TOPOLOGY_FAILED, options);
    this.name = 'TopologyError';
  }
}

export class BrokerConnectionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.SERVICE_UNAVAILABLE, options);
    this.name = 'BrokerConnectionError';
  }
}

export class ChannelReadinessTimeoutError extends AppError {
  constructor(public readonly timeoutMs: number) {
    super(`RabbitMQ channel initialization timed out after ${timeoutMs}ms`, ErrorCode.REQUEST_TIMEOUT);
    this.name = 'ChannelReadinessTimeoutError';
  }
}

export class ChannelClosedError extends AppError {
  constructor() {
    super('RabbitMQ channel was closed before it became ready', ErrorCode.CHANNEL_CLOSED);
    this.name = 'ChannelClosedError';
  }
}

/** Reads the `code` of a pg or socket error, when there is one. */
export function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
