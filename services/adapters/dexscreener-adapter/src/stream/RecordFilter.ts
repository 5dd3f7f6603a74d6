/**
 * 解码后记录筛选
 *
 * 纯谓词: 只决定记录是否转发，从不修改记录。
 * 链、DEX、流动性、成交量、FDV 和存在时长条件只作用于交易对记录；
 * 符号列表同时作用于 OHLC 和简介记录。
 */

import { DecodedRecord, RecordKind, TradingPairRecord } from '../types';

export interface RecordFilterOptions {
  chains?: string[];
  dexIds?: string[];
  minLiquidityUsd?: number;
  minVolumeUsd?: number;
  minFdv?: number;
  /** 交易对最大存在时长（小时） */
  maxAgeHours?: number;
  /** 符号白名单，不区分大小写 */
  symbols?: string[];
}

const SECONDS_PER_HOUR = 3600;

function toLookup(values?: string[]): Set<string> | null {
  if (!values || values.length === 0) {
    return null;
  }
  return new Set(values.map(value => value.toLowerCase()));
}

function meetsMinimum(value: number | null, minimum?: number): boolean {
  if (minimum === undefined) {
    return true;
  }
  return value !== null && value >= minimum;
}

export class RecordFilter {
  private readonly options: RecordFilterOptions;
  private readonly chains: Set<string> | null;
  private readonly dexIds: Set<string> | null;
  private readonly symbols: Set<string> | null;
  private readonly now: () => number;

  constructor(options: RecordFilterOptions = {}, now: () => number = Date.now) {
    this.options = { ...options };
    this.chains = toLookup(options.chains);
    this.dexIds = toLookup(options.dexIds);
    this.symbols = toLookup(options.symbols);
    this.now = now;
  }

  /**
   * 是否没有任何筛选条件
   */
  isEmpty(): boolean {
    const { minLiquidityUsd, minVolumeUsd, minFdv, maxAgeHours } = this.options;
    return !this.chains && !this.dexIds && !this.symbols
      && minLiquidityUsd === undefined && minVolumeUsd === undefined
      && minFdv === undefined && maxAgeHours === undefined;
  }

  matches(record: DecodedRecord): boolean {
    switch (record.kind) {
      case RecordKind.TRADING_PAIR:
        return this.matchesPair(record);
      case RecordKind.OHLC:
      case RecordKind.TOKEN_PROFILE:
        return this.matchesSymbol(record.symbol);
    }
  }

  apply(records: readonly DecodedRecord[]): DecodedRecord[] {
    return records.filter(record => this.matches(record));
  }

  private matchesPair(pair: TradingPairRecord): boolean {
    if (this.chains && !this.chains.has(pair.chain.toLowerCase())) {
      return false;
    }
    if (this.dexIds && !this.dexIds.has(pair.dexId.toLowerCase())) {
      return false;
    }
    if (!this.matchesSymbol(pair.baseToken.symbol)) {
      return false;
    }

    const { minLiquidityUsd, minVolumeUsd, minFdv, maxAgeHours } = this.options;
    if (!meetsMinimum(pair.liquidityUsd, minLiquidityUsd)
      || !meetsMinimum(pair.volumeUsd, minVolumeUsd)
      || !meetsMinimum(pair.fdv, minFdv)) {
      return false;
    }

    if (maxAgeHours !== undefined) {
      if (pair.pairCreatedAt === null) {
        return false;
      }
      const ageHours = (this.now() / 1000 - pair.pairCreatedAt) / SECONDS_PER_HOUR;
      if (ageHours > maxAgeHours) {
        return false;
      }
    }

    return true;
  }

  private matchesSymbol(symbol: string): boolean {
    return !this.symbols || this.symbols.has(symbol.toLowerCase());
  }
}
