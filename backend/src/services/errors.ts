/**
 * services/errors.ts — Error types raised by the scoring engine
 *
 * Each carries a stable `code` and the HTTP status the API answers with.
 */

export type ScoringErrorCode =
  | 'INVALID_WEIGHT'
  | 'MARKET_NOT_AVAILABLE'
  | 'DATASET_INVALID'
  | 'DUPLICATE_MARKET'
  | 'DATASET_NOT_LOADED';

export class ScoringError extends Error {
  code: ScoringErrorCode;
  status: number;
  constructor(message: string, code: ScoringErrorCode, status: number) {
    super(message);
    this.name = 'ScoringError';
    this.code = code;
    this.status = status;
  }
}

/** A comparison target is missing from the filtered, ranked set. */
export class MarketNotAvailableError extends ScoringError {
  markets: string[];
  constructor(markets: string[]) {
    super(
      `${markets.join(', ')} not available under current filter`,
      'MARKET_NOT_AVAILABLE',
      404,
    );
    this.name = 'MarketNotAvailableError';
    this.markets = markets;
  }
}

export class DatasetError extends ScoringError {
  constructor(message: string, code: 'DATASET_INVALID' | 'DUPLICATE_MARKET' | 'DATASET_NOT_LOADED' = 'DATASET_INVALID') {
    super(message, code, code === 'DATASET_NOT_LOADED' ? 503 : 500);
    this.name = 'DatasetError';
  }
}
