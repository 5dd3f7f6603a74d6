/**
 * DexStream 适配器配置管理器
 *
 * 合并顺序: 环境预设 < 配置文件 < DEXSTREAM_* 环境变量
 */

import {
  BaseConfigManager,
  ConfigLoadResult,
  ConfigManagerOptions,
  ConfigSource,
  EnvMapping
} from '@dexstream/shared-core';
import { ConfigurationError } from '../types';
import { ConnectionManagerConfig } from '../connector/interfaces';
import { DexStreamAdapterConfig, getEnvironmentConfig, toConnectionManagerConfig } from './index';
import { ValidationError, validateConfig } from './validator';

export interface AdapterConfigManagerOptions extends ConfigManagerOptions {
  /** 配置文件路径；未指定时依次查找 config/{environment}.yaml 和 config/config.yaml */
  configPath?: string;
  /** 环境预设，默认取 DEXSTREAM_ENV 或 NODE_ENV */
  environment?: string;
}

export const ADAPTER_ENV_MAPPINGS: readonly EnvMapping[] = [
  { env: 'DEXSTREAM_ENDPOINT', path: 'endpoint', type: 'string' },
  { env: 'DEXSTREAM_TIMEFRAME', path: 'query.timeframe', type: 'string' },
  { env: 'DEXSTREAM_RANK_BY', path: 'query.rankBy', type: 'string' },
  { env: 'DEXSTREAM_ORDER', path: 'query.order', type: 'string' },
  { env: 'DEXSTREAM_CHAINS', path: 'query.filters.chainIds', type: 'json' },
  { env: 'DEXSTREAM_DEX_IDS', path: 'query.filters.dexIds', type: 'json' },
  { env: 'DEXSTREAM_CONNECT_TIMEOUT', path: 'connection.connectTimeout', type: 'number' },
  { env: 'DEXSTREAM_HEARTBEAT_INTERVAL', path: 'connection.heartbeatInterval', type: 'number' },
  { env: 'DEXSTREAM_HEARTBEAT_TIMEOUT', path: 'connection.heartbeatTimeout', type: 'number' },
  { env: 'DEXSTREAM_MAX_RETRIES', path: 'retry.maxRetries', type: 'number' },
  { env: 'DEXSTREAM_BACKOFF_BASE', path: 'retry.backoffBase', type: 'number' },
  { env: 'DEXSTREAM_INITIAL_DELAY', path: 'retry.initialDelay', type: 'number' },
  { env: 'DEXSTREAM_MAX_DELAY', path: 'retry.maxDelay', type: 'number' },
  { env: 'DEXSTREAM_JITTER', path: 'retry.jitter', type: 'boolean' },
  { env: 'DEXSTREAM_RATE_LIMIT', path: 'rateLimit.requestsPerSecond', type: 'number' },
  { env: 'DEXSTREAM_RATE_BURST', path: 'rateLimit.burst', type: 'number' },
  { env: 'DEXSTREAM_LOG_LEVEL', path: 'logging.level', type: 'string' },
  { env: 'DEXSTREAM_LOG_FORMAT', path: 'logging.format', type: 'string' }
];

/**
 * 适配器配置管理器
 */
export class AdapterConfigManager extends BaseConfigManager<DexStreamAdapterConfig> {
  private readonly environment: string;
  private readonly configPath?: string;
  private warnings: ValidationError[] = [];

  constructor(options: AdapterConfigManagerOptions = {}) {
    super(options);

    const env = options.env ?? process.env;
    this.environment = options.environment ?? env['DEXSTREAM_ENV'] ?? env['NODE_ENV'] ?? 'development';
    this.configPath = options.configPath;

    this.addValidator((config) => {
      const result = validateConfig(config);
      this.warnings = result.warnings;
      return result.errors.map(error => `${error.field}: ${error.message}`);
    });
  }

  /**
   * 最近一次加载产生的警告
   */
  getWarnings(): ValidationError[] {
    return [...this.warnings];
  }

  /**
   * 生成连接管理器配置，需先加载
   */
  getConnectionConfig(): ConnectionManagerConfig {
    const config = this.getConfig();
    if (!config) {
      throw new ConfigurationError('Configuration not loaded');
    }
    return toConnectionManagerConfig(config);
  }

  protected getDefaultSources(): ConfigSource[] {
    if (this.configPath) {
      return [
        { type: 'default', source: 'default', priority: 1 },
        { type: 'file', source: this.configPath, priority: 2 }
      ];
    }

    return [
      { type: 'default', source: 'default', priority: 1 },
      { type: 'file', source: 'config/config.yaml', priority: 2 },
      { type: 'file', source: `config/${this.environment}.yaml`, priority: 3 }
    ];
  }

  protected getDefaultConfig(): DexStreamAdapterConfig {
    return getEnvironmentConfig(this.environment);
  }

  protected getEnvMappings(): EnvMapping[] {
    return [...ADAPTER_ENV_MAPPINGS];
  }
}

/**
 * 加载并验证适配器配置，验证失败时抛出 ConfigurationError
 */
export async function loadAdapterConfig(
  options: AdapterConfigManagerOptions = {}
): Promise<ConfigLoadResult<DexStreamAdapterConfig>> {
  const manager = new AdapterConfigManager(options);
  const result = await manager.load();

  if (result.hasValidationErrors) {
    throw new ConfigurationError(
      `Configuration validation failed: ${(result.validationErrors ?? []).join('; ')}`,
      undefined,
      { sources: result.sources.map(source => source.source) }
    );
  }
  return result;
}
