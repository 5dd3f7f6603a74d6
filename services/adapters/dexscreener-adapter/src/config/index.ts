/**
 * DexStream 适配器配置系统
 *
 * 提供完整的配置管理功能，包括：
 * - 配置结构设计
 * - 开发/测试/生产环境预设
 * - 到连接管理器配置的转换
 */

import { BaseConfig, LoggingConfig } from '@dexstream/shared-core';
import { ConnectionManagerConfig, RateLimitConfig } from '../connector/interfaces';
import { DecoderOptions, DEFAULT_DECODER_OPTIONS } from '../protocol/interfaces';
import type { RecordFilterOptions } from '../stream/RecordFilter';
import { buildStreamUrl, createDefaultQuery, DEFAULT_STREAM_ENDPOINT, StreamQuery } from './query';

export * from './query';

export type AdapterEnvironment = 'development' | 'testing' | 'production';

export const ADAPTER_ENVIRONMENTS: readonly AdapterEnvironment[] = ['development', 'testing', 'production'];

/**
 * 连接配置
 */
export interface ConnectionSettings {
  /** 连接建立超时 (毫秒) */
  connectTimeout: number;
  /** 心跳间隔 (毫秒) */
  heartbeatInterval: number;
  /** 心跳确认超时 (毫秒) */
  heartbeatTimeout: number;
}

/**
 * 重试配置
 */
export interface RetrySettings {
  /** 连续连接尝试的总次数上限 */
  maxRetries: number;
  /** 退避倍数 */
  backoffBase: number;
  /** 首次退避延迟 (毫秒) */
  initialDelay: number;
  /** 退避延迟上限 (毫秒) */
  maxDelay: number;
  /** 是否启用 ±25% 抖动 */
  jitter: boolean;
}

/**
 * 适配器配置
 */
export interface DexStreamAdapterConfig extends BaseConfig {
  environment: AdapterEnvironment;

  /** 行情流 WebSocket 端点 (不含时间窗口路径) */
  endpoint: string;

  /** 上游查询 */
  query: StreamQuery;

  connection: ConnectionSettings;

  retry: RetrySettings;

  /** 出站请求限流 (连接尝试与发送的消息) */
  rateLimit: RateLimitConfig;

  decoder: DecoderOptions;

  /** 解码后的记录筛选 */
  filter: RecordFilterOptions;

  logging: LoggingConfig;
}

// ============================================================================
// 默认配置
// ============================================================================

export const DEFAULT_CONNECTION_SETTINGS: ConnectionSettings = {
  connectTimeout: 10000,
  heartbeatInterval: 20000,
  heartbeatTimeout: 30000
};

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxRetries: 5,
  backoffBase: 2,
  initialDelay: 1000,
  maxDelay: 60000,
  jitter: false
};

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  requestsPerSecond: 4,
  burst: 4
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'info',
  format: 'json'
};

export function createDefaultConfig(): DexStreamAdapterConfig {
  return {
    name: 'dexscreener-adapter',
    version: '1.0.0',
    environment: 'development',
    endpoint: DEFAULT_STREAM_ENDPOINT,
    query: createDefaultQuery(),
    connection: { ...DEFAULT_CONNECTION_SETTINGS },
    retry: { ...DEFAULT_RETRY_SETTINGS },
    rateLimit: { ...DEFAULT_RATE_LIMIT },
    decoder: { ...DEFAULT_DECODER_OPTIONS },
    filter: {},
    logging: { ...DEFAULT_LOGGING_CONFIG }
  };
}

// ============================================================================
// 配置预设
// ============================================================================

/**
 * 开发环境配置
 */
export function createDevelopmentConfig(): DexStreamAdapterConfig {
  const config = createDefaultConfig();
  return {
    ...config,
    environment: 'development',
    retry: { ...config.retry, maxRetries: 10, maxDelay: 10000 },
    logging: { level: 'debug', format: 'text' }
  };
}

/**
 * 测试环境配置
 */
export function createTestingConfig(): DexStreamAdapterConfig {
  const config = createDefaultConfig();
  return {
    ...config,
    environment: 'testing',
    connection: { ...config.connection, connectTimeout: 5000 },
    retry: { ...config.retry, maxRetries: 3, initialDelay: 500, maxDelay: 5000 },
    logging: { ...config.logging, level: 'debug' }
  };
}

/**
 * 生产环境配置
 */
export function createProductionConfig(): DexStreamAdapterConfig {
  const config = createDefaultConfig();
  return {
    ...config,
    environment: 'production',
    retry: { ...config.retry, jitter: true }
  };
}

/**
 * 获取环境预设配置，未知环境回退到开发配置
 */
export function getEnvironmentConfig(environment?: string): DexStreamAdapterConfig {
  switch (environment) {
    case 'testing':
      return createTestingConfig();
    case 'production':
      return createProductionConfig();
    case 'development':
    default:
      return createDevelopmentConfig();
  }
}

/**
 * 将适配器配置转换为连接管理器配置
 */
export function toConnectionManagerConfig(config: DexStreamAdapterConfig): ConnectionManagerConfig {
  return {
    url: buildStreamUrl(config.query, config.endpoint),
    connectTimeout: config.connection.connectTimeout,
    heartbeat: {
      interval: config.connection.heartbeatInterval,
      timeout: config.connection.heartbeatTimeout
    },
    reconnect: {
      initialDelay: config.retry.initialDelay,
      maxDelay: config.retry.maxDelay,
      backoffMultiplier: config.retry.backoffBase,
      maxRetries: config.retry.maxRetries,
      jitter: config.retry.jitter
    },
    rateLimit: { ...config.rateLimit }
  };
}
