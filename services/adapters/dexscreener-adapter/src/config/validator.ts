/**
 * DexStream 适配器配置验证器
 *
 * 结构校验使用 Joi schema，跨字段约束和可疑取值在其后单独检查
 */

import * as Joi from 'joi';
import { Chain, ConfigurationError, DexId, RankBy, SortOrder, Timeframe } from '../types';
import { ADAPTER_ENVIRONMENTS, DexStreamAdapterConfig } from './index';
import { RangeFilter, WindowedRangeFilter } from './query';

/**
 * 配置验证错误详情
 */
export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * 配置验证结果
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
}

/** 超过该请求速率时给出警告 */
const RATE_LIMIT_WARNING_THRESHOLD = 10;

const rangeSchema = Joi.object({
  min: Joi.number(),
  max: Joi.number()
});

const windowedRangeSchema = Joi.object({
  h24: rangeSchema,
  h6: rangeSchema,
  h1: rangeSchema
});

const positiveInteger = Joi.number().integer().min(1);

export const adapterConfigSchema = Joi.object({
  name: Joi.string(),
  version: Joi.string(),
  environment: Joi.string().valid(...ADAPTER_ENVIRONMENTS).required(),
  endpoint: Joi.string().uri({ scheme: ['ws', 'wss'] }).required(),

  query: Joi.object({
    timeframe: Joi.string().valid(...Object.values(Timeframe)).required(),
    rankBy: Joi.string().valid(...Object.values(RankBy)).required(),
    order: Joi.string().valid(...Object.values(SortOrder)).required(),
    filters: Joi.object({
      chainIds: Joi.array().items(Joi.string().valid(...Object.values(Chain))).min(1).required(),
      dexIds: Joi.array().items(Joi.string().valid(...Object.values(DexId))).required(),
      liquidity: rangeSchema,
      volume: windowedRangeSchema,
      txns: windowedRangeSchema,
      pairAge: rangeSchema,
      priceChange: windowedRangeSchema,
      fdv: rangeSchema,
      marketCap: rangeSchema,
      enhancedTokenInfo: Joi.boolean(),
      activeBoostsMin: Joi.number().integer().min(0),
      recentPurchasedImpressionsMin: Joi.number().integer().min(0),
      maxAge: Joi.number().min(0),
      profile: Joi.number().valid(0, 1),
      maxLaunchpadProgress: Joi.number().min(0).max(100)
    }).required()
  }).required(),

  connection: Joi.object({
    connectTimeout: Joi.number().integer().min(100).required(),
    heartbeatInterval: Joi.number().integer().min(100).required(),
    heartbeatTimeout: Joi.number().integer().min(100).required()
  }).required(),

  retry: Joi.object({
    maxRetries: positiveInteger.required(),
    backoffBase: Joi.number().min(1).required(),
    initialDelay: Joi.number().integer().min(0).required(),
    maxDelay: Joi.number().integer().min(0).required(),
    jitter: Joi.boolean().required()
  }).required(),

  rateLimit: Joi.object({
    requestsPerSecond: Joi.number().positive().required(),
    burst: positiveInteger.required()
  }).required(),

  decoder: Joi.object({
    enhancedMaxStringLength: positiveInteger.max(65535).required(),
    profileDescriptionCap: positiveInteger.required(),
    profileStringCap: positiveInteger.required(),
    maxWebsites: Joi.number().integer().min(0).required(),
    maxSocials: Joi.number().integer().min(0).required()
  }).required(),

  filter: Joi.object({
    chains: Joi.array().items(Joi.string()),
    dexIds: Joi.array().items(Joi.string()),
    minLiquidityUsd: Joi.number().min(0),
    minVolumeUsd: Joi.number().min(0),
    minFdv: Joi.number().min(0),
    maxAgeHours: Joi.number().positive(),
    symbols: Joi.array().items(Joi.string())
  }).required(),

  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'debug').required(),
    format: Joi.string().valid('json', 'text').required()
  }).required()
});

function checkRange(field: string, range: RangeFilter | undefined, errors: ValidationError[]): void {
  if (range?.min !== undefined && range.max !== undefined && range.min > range.max) {
    errors.push({ field, message: `min ${range.min} exceeds max ${range.max}`, value: range });
  }
}

function checkWindowedRange(field: string, ranges: WindowedRangeFilter | undefined, errors: ValidationError[]): void {
  if (!ranges) {
    return;
  }
  checkRange(`${field}.h24`, ranges.h24, errors);
  checkRange(`${field}.h6`, ranges.h6, errors);
  checkRange(`${field}.h1`, ranges.h1, errors);
}

/**
 * 跨字段约束，仅在结构校验通过后执行
 */
function validateConstraints(config: DexStreamAdapterConfig): ValidationError[] {
  const errors: ValidationError[] = [];

  if (config.retry.maxDelay < config.retry.initialDelay) {
    errors.push({
      field: 'retry.maxDelay',
      message: 'maxDelay must not be less than initialDelay',
      value: config.retry.maxDelay
    });
  }

  const filters = config.query.filters;
  checkRange('query.filters.liquidity', filters.liquidity, errors);
  checkWindowedRange('query.filters.volume', filters.volume, errors);
  checkWindowedRange('query.filters.txns', filters.txns, errors);
  checkRange('query.filters.pairAge', filters.pairAge, errors);
  checkWindowedRange('query.filters.priceChange', filters.priceChange, errors);
  checkRange('query.filters.fdv', filters.fdv, errors);
  checkRange('query.filters.marketCap', filters.marketCap, errors);

  return errors;
}

function collectWarnings(config: DexStreamAdapterConfig): ValidationError[] {
  const warnings: ValidationError[] = [];

  if (config.rateLimit.requestsPerSecond > RATE_LIMIT_WARNING_THRESHOLD) {
    warnings.push({
      field: 'rateLimit.requestsPerSecond',
      message: `Request rate above ${RATE_LIMIT_WARNING_THRESHOLD}/s may trigger upstream throttling`,
      value: config.rateLimit.requestsPerSecond
    });
  }

  if (config.retry.maxRetries === 1) {
    warnings.push({
      field: 'retry.maxRetries',
      message: 'A single failed connection attempt is terminal',
      value: config.retry.maxRetries
    });
  }

  if (config.connection.heartbeatTimeout < config.connection.heartbeatInterval / 10) {
    warnings.push({
      field: 'connection.heartbeatTimeout',
      message: 'Heartbeat timeout is much shorter than the heartbeat interval',
      value: config.connection.heartbeatTimeout
    });
  }

  if (config.environment === 'production' && config.logging.level === 'debug') {
    warnings.push({
      field: 'logging.level',
      message: 'Debug logging is enabled in production',
      value: config.logging.level
    });
  }

  return warnings;
}

/**
 * 验证配置
 */
export function validateConfig(config: unknown): ValidationResult {
  const { error, value } = adapterConfigSchema.validate(config, { abortEarly: false, allowUnknown: true });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => ({
        field: detail.path.join('.'),
        message: detail.message,
        value: detail.context?.value
      })),
      warnings: []
    };
  }

  const validated: DexStreamAdapterConfig = value;
  const errors = validateConstraints(validated);
  return {
    valid: errors.length === 0,
    errors,
    warnings: collectWarnings(validated)
  };
}

/**
 * 验证配置，失败时抛出 ConfigurationError
 */
export function validateConfigOrThrow(config: unknown): void {
  const result = validateConfig(config);
  if (!result.valid) {
    const summary = result.errors.map(error => `${error.field}: ${error.message}`).join('; ');
    throw new ConfigurationError(`Configuration validation failed: ${summary}`, undefined, {
      errorCount: result.errors.length
    });
  }
}
