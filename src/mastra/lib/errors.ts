import type { Recommendation } from './types';

export type RejectionCode = 'INSUFFICIENT_FUNDS' | 'INSUFFICIENT_SHARES';

/**
 * A recommendation the executor declined to apply. Returned, never thrown.
 */
export class ExecutionRejectionError extends Error {
  constructor(
    readonly code: RejectionCode,
    readonly recommendation: Recommendation,
    message: string,
  ) {
    super(message);
    this.name = 'ExecutionRejectionError';
  }
}

export class InsufficientFundsError extends ExecutionRejectionError {
  constructor(
    recommendation: Recommendation,
    readonly available: number,
  ) {
    super(
      'INSUFFICIENT_FUNDS',
      recommendation,
      `Cannot buy ${recommendation.shares} ${recommendation.symbol} for $${recommendation.cost.toFixed(2)}: only $${available.toFixed(2)} available`,
    );
    this.name = 'InsufficientFundsError';
  }
}

export class InsufficientSharesError extends ExecutionRejectionError {
  constructor(
    recommendation: Recommendation,
    readonly held: number,
  ) {
    super(
      'INSUFFICIENT_SHARES',
      recommendation,
      `Cannot sell ${recommendation.shares} ${recommendation.symbol}: only ${held} held`,
    );
    this.name = 'InsufficientSharesError';
  }
}

export const isExecutionRejection = (error: unknown): error is ExecutionRejectionError =>
  error instanceof ExecutionRejectionError;
