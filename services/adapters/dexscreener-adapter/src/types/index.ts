// Core types for the DexScreener adapter

import { ClassifiedError, ErrorCategory, ErrorContext, ErrorSeverity } from '@dexstream/shared-core';

// ============================================================================
// Upstream query enumerations
// ============================================================================

export enum Chain {
  SOLANA = 'solana',
  ETHEREUM = 'ethereum',
  BASE = 'base',
  BSC = 'bsc',
  POLYGON = 'polygon',
  ARBITRUM = 'arbitrum',
  OPTIMISM = 'optimism',
  AVALANCHE = 'avalanche'
}

export enum Timeframe {
  M5 = 'm5',
  H1 = 'h1',
  H6 = 'h6',
  H24 = 'h24'
}

export enum RankBy {
  TRENDING_SCORE_H6 = 'trendingScoreH6',
  VOLUME = 'volume',
  TRANSACTIONS = 'txns',
  PRICE_CHANGE_H24 = 'priceChangeH24',
  PRICE_CHANGE_H6 = 'priceChangeH6',
  PRICE_CHANGE_H1 = 'priceChangeH1',
  LIQUIDITY = 'liquidity',
  FDV = 'fdv',
  MARKET_CAP = 'marketCap'
}

export enum SortOrder {
  DESC = 'desc',
  ASC = 'asc'
}

export enum DexId {
  // Solana
  RAYDIUM = 'raydium',
  PUMPFUN = 'pumpfun',
  PUMPSWAP = 'pumpswap',
  ORCA = 'orca',
  JUPITER = 'jupiter',
  METEORA = 'meteora',
  // Ethereum / EVM
  UNISWAP_V2 = 'uniswap',
  UNISWAP_V3 = 'uniswapv3',
  SUSHISWAP = 'sushiswap',
  PANCAKESWAP = 'pancakeswap',
  // Base
  AERODROME = 'aerodrome',
  BASESWAP = 'baseswap'
}

// ============================================================================
// Decoded records
// ============================================================================

export enum RecordKind {
  TRADING_PAIR = 'trading_pair',
  OHLC = 'ohlc',
  TOKEN_PROFILE = 'token_profile'
}

/**
 * Token identity within a pair
 */
export interface TokenInfo {
  name: string;
  symbol: string;
  address: string;
}

/**
 * Decoded trading pair.
 * Numeric fields are `null` when the upstream value was NaN/Infinity.
 */
export interface TradingPairRecord {
  kind: RecordKind.TRADING_PAIR;
  chain: string;
  dexId: string;
  pairAddress: string;
  baseToken: TokenInfo;
  quoteToken: TokenInfo;
  price: number | null;
  priceUsd: number | null;
  priceChange24h: number | null;
  liquidityUsd: number | null;
  volumeUsd: number | null;
  fdv: number | null;
  /** Pair creation time, unix seconds */
  pairCreatedAt: number | null;
  /** Trailing field of the numeric block; surfaced as-is, never interpreted */
  reserved: number | null;
}

/**
 * Decoded OHLC candle
 */
export interface OHLCRecord {
  kind: RecordKind.OHLC;
  symbol: string;
  /** Candle open time, unix seconds */
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Decoded token profile
 */
export interface TokenProfileRecord {
  kind: RecordKind.TOKEN_PROFILE;
  symbol: string;
  name: string;
  description: string;
  websites: string[];
  socials: Record<string, string>;
}

export type DecodedRecord = TradingPairRecord | OHLCRecord | TokenProfileRecord;

// ============================================================================
// Error Types
// ============================================================================

/**
 * Base adapter error
 */
export class AdapterError extends Error implements ClassifiedError {
  public code: string;
  public override cause?: Error;
  public context?: ErrorContext;
  public category: ErrorCategory = ErrorCategory.UNKNOWN;
  public severity: ErrorSeverity = ErrorSeverity.MEDIUM;
  public retryable = false;

  constructor(
    message: string,
    code: string,
    cause?: Error,
    context?: ErrorContext
  ) {
    super(message);
    this.name = 'AdapterError';
    this.code = code;
    if (cause !== undefined) {
      this.cause = cause;
    }
    if (context !== undefined) {
      this.context = context;
    }
  }
}

/**
 * Connection-related errors (connect failure, timeout)
 */
export class ConnectionError extends AdapterError {
  constructor(message: string, cause?: Error, context?: ErrorContext) {
    super(message, 'CONNECTION_ERROR', cause, context);
    this.name = 'ConnectionError';
    this.category = ErrorCategory.CONNECTION;
    this.retryable = true;
  }
}

/**
 * Transport failure on an established connection; drives Backoff
 */
export class ConnectionLostError extends AdapterError {
  constructor(message: string, cause?: Error, context?: ErrorContext) {
    super(message, 'CONNECTION_LOST', cause, context);
    this.name = 'ConnectionLostError';
    this.category = ErrorCategory.NETWORK;
    this.retryable = true;
  }
}

/**
 * Maximum reconnect attempts reached; terminal
 */
export class RetryExhaustedError extends AdapterError {
  public readonly attempts: number;

  constructor(attempts: number, cause?: Error, context?: ErrorContext) {
    super(`Reconnect attempts exhausted after ${attempts} attempts`, 'RETRY_EXHAUSTED', cause, context);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.category = ErrorCategory.CONNECTION;
    this.severity = ErrorSeverity.CRITICAL;
  }
}

/**
 * Data parsing errors
 */
export class DataParsingError extends AdapterError {
  constructor(message: string, cause?: Error, context?: ErrorContext) {
    super(message, 'DATA_PARSING_ERROR', cause, context);
    this.name = 'DataParsingError';
    this.category = ErrorCategory.DATA_PARSING;
    this.severity = ErrorSeverity.LOW;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends AdapterError {
  constructor(message: string, cause?: Error, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', cause, context);
    this.name = 'ConfigurationError';
    this.category = ErrorCategory.CONFIGURATION;
    this.severity = ErrorSeverity.HIGH;
  }
}
