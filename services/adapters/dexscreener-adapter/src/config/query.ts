/**
 * 行情流查询参数
 *
 * 查询决定上游推送哪些交易对: 时间窗口、排序维度和一组筛选条件。
 * 所有筛选条件都编码在 WebSocket URL 的查询串中，参数顺序固定。
 */

import { Chain, DexId, RankBy, SortOrder, Timeframe } from '../types';

export const DEFAULT_STREAM_ENDPOINT = 'wss://io.dexscreener.com/dex/screener/v5/pairs';

/**
 * 数值区间筛选
 */
export interface RangeFilter {
  min?: number;
  max?: number;
}

/**
 * 按统计窗口划分的区间筛选
 */
export interface WindowedRangeFilter {
  h24?: RangeFilter;
  h6?: RangeFilter;
  h1?: RangeFilter;
}

export interface QueryFilters {
  chainIds: Chain[];
  dexIds: DexId[];
  liquidity?: RangeFilter;
  volume?: WindowedRangeFilter;
  txns?: WindowedRangeFilter;
  /** 交易对存在时长（小时） */
  pairAge?: RangeFilter;
  priceChange?: WindowedRangeFilter;
  fdv?: RangeFilter;
  marketCap?: RangeFilter;
  enhancedTokenInfo?: boolean;
  activeBoostsMin?: number;
  recentPurchasedImpressionsMin?: number;
  /** 最大存在时长（小时），launchpad 查询使用 */
  maxAge?: number;
  /** 1 表示附带简介数据 */
  profile?: number;
  /** launchpad 进度上限（百分比） */
  maxLaunchpadProgress?: number;
}

export interface StreamQuery {
  timeframe: Timeframe;
  rankBy: RankBy;
  order: SortOrder;
  filters: QueryFilters;
}

const WINDOWS = ['h24', 'h6', 'h1'] as const;

export function createDefaultQuery(): StreamQuery {
  return {
    timeframe: Timeframe.H24,
    rankBy: RankBy.TRENDING_SCORE_H6,
    order: SortOrder.DESC,
    filters: {
      chainIds: [Chain.SOLANA],
      dexIds: []
    }
  };
}

function pushRange(params: Array<[string, string]>, prefix: string, range?: RangeFilter): void {
  if (!range) {
    return;
  }
  if (range.min !== undefined) {
    params.push([`${prefix}[min]`, String(range.min)]);
  }
  if (range.max !== undefined) {
    params.push([`${prefix}[max]`, String(range.max)]);
  }
}

function pushWindowedRange(params: Array<[string, string]>, prefix: string, ranges?: WindowedRangeFilter): void {
  if (!ranges) {
    return;
  }
  for (const window of WINDOWS) {
    pushRange(params, `${prefix}[${window}]`, ranges[window]);
  }
}

/**
 * 将筛选条件展开为有序的查询参数
 */
export function buildFilterParams(filters: QueryFilters): Array<[string, string]> {
  const params: Array<[string, string]> = [];

  filters.chainIds.forEach((chain, i) => params.push([`filters[chainIds][${i}]`, chain]));
  filters.dexIds.forEach((dex, i) => params.push([`filters[dexIds][${i}]`, dex]));

  pushRange(params, 'filters[liquidity]', filters.liquidity);
  pushWindowedRange(params, 'filters[volume]', filters.volume);
  pushWindowedRange(params, 'filters[txns]', filters.txns);
  pushRange(params, 'filters[pairAge]', filters.pairAge);
  pushWindowedRange(params, 'filters[priceChange]', filters.priceChange);
  pushRange(params, 'filters[fdv]', filters.fdv);
  pushRange(params, 'filters[marketCap]', filters.marketCap);

  if (filters.enhancedTokenInfo) {
    params.push(['filters[enhancedTokenInfo]', 'true']);
  }
  if (filters.activeBoostsMin !== undefined) {
    params.push(['filters[activeBoosts][min]', String(filters.activeBoostsMin)]);
  }
  if (filters.recentPurchasedImpressionsMin !== undefined) {
    params.push(['filters[recentPurchasedImpressions][min]', String(filters.recentPurchasedImpressionsMin)]);
  }

  if (filters.maxAge !== undefined) {
    params.push(['maxAge', String(filters.maxAge)]);
  }
  if (filters.profile !== undefined) {
    params.push(['profile', String(filters.profile)]);
  }
  if (filters.maxLaunchpadProgress !== undefined) {
    params.push(['maxLaunchpadProgress', String(filters.maxLaunchpadProgress)]);
  }

  return params;
}

/**
 * 构造行情流 URL
 * 参数名中的方括号按上游要求原样保留
 */
export function buildStreamUrl(query: StreamQuery, endpoint: string = DEFAULT_STREAM_ENDPOINT): string {
  const params: Array<[string, string]> = [
    ['rankBy[key]', query.rankBy],
    ['rankBy[order]', query.order],
    ...buildFilterParams(query.filters)
  ];

  const base = `${endpoint.replace(/\/+$/, '')}/${query.timeframe}/1`;
  return `${base}?${params.map(([key, value]) => `${key}=${value}`).join('&')}`;
}

// ============================================================================
// 查询预设
// ============================================================================

export const QUERY_PRESETS = {
  /** 热门交易对 */
  trending(chain: Chain = Chain.SOLANA, timeframe: Timeframe = Timeframe.H24): StreamQuery {
    return {
      timeframe,
      rankBy: RankBy.TRENDING_SCORE_H6,
      order: SortOrder.DESC,
      filters: { chainIds: [chain], dexIds: [] }
    };
  },

  /** 成交量排行 */
  topVolume(chain: Chain = Chain.SOLANA, minLiquidity = 25000, minTxns = 50): StreamQuery {
    return {
      timeframe: Timeframe.H1,
      rankBy: RankBy.VOLUME,
      order: SortOrder.DESC,
      filters: {
        chainIds: [chain],
        dexIds: [],
        liquidity: { min: minLiquidity },
        txns: { h24: { min: minTxns } }
      }
    };
  },

  /** 涨幅排行 */
  gainers(chain: Chain = Chain.SOLANA, minLiquidity = 25000, minVolume = 10000): StreamQuery {
    return {
      timeframe: Timeframe.H1,
      rankBy: RankBy.PRICE_CHANGE_H24,
      order: SortOrder.DESC,
      filters: {
        chainIds: [chain],
        dexIds: [],
        liquidity: { min: minLiquidity },
        volume: { h24: { min: minVolume } },
        txns: { h24: { min: 50 } }
      }
    };
  },

  /** 新上线交易对 */
  newPairs(chain: Chain = Chain.SOLANA, maxAgeHours = 24): StreamQuery {
    return {
      timeframe: Timeframe.H1,
      rankBy: RankBy.TRENDING_SCORE_H6,
      order: SortOrder.DESC,
      filters: { chainIds: [chain], dexIds: [], pairAge: { max: maxAgeHours } }
    };
  },

  /** 成交笔数排行 */
  topTransactions(chain: Chain = Chain.SOLANA): StreamQuery {
    return {
      timeframe: Timeframe.H1,
      rankBy: RankBy.TRANSACTIONS,
      order: SortOrder.DESC,
      filters: { chainIds: [chain], dexIds: [] }
    };
  },

  /** 仅推广中的交易对 */
  boostedOnly(chain: Chain = Chain.SOLANA): StreamQuery {
    return {
      timeframe: Timeframe.H1,
      rankBy: RankBy.TRENDING_SCORE_H6,
      order: SortOrder.DESC,
      filters: { chainIds: [chain], dexIds: [], enhancedTokenInfo: true, activeBoostsMin: 1 }
    };
  },

  /** launchpad 热门 */
  pumpfunTrending(dex: DexId = DexId.PUMPFUN, maxAge = 3, maxLaunchpadProgress = 99.99): StreamQuery {
    return {
      timeframe: Timeframe.H1,
      rankBy: RankBy.TRENDING_SCORE_H6,
      order: SortOrder.DESC,
      filters: {
        chainIds: [Chain.SOLANA],
        dexIds: [dex],
        maxAge,
        profile: 1,
        maxLaunchpadProgress
      }
    };
  }
} as const;

export type QueryPresetName = keyof typeof QUERY_PRESETS;
