/**
 * 配置管理器基类
 * 提供统一的配置加载、合并、验证功能
 *
 * 合并顺序: 默认配置 < 配置文件 (按 priority) < 环境变量映射
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { mergeWith, cloneDeep, set } from 'lodash';
import {
  BaseConfig,
  ConfigSource,
  ConfigManagerOptions,
  ConfigLoadResult,
  ConfigUpdateEvent,
  ConfigValidator,
  ConfigValidationRule,
  ConfigTransformer,
  ConfigEventHandler,
  ConfigRecord,
  EnvMapping,
  EnvValueType
} from './types';

/**
 * 判断值是否为普通对象
 */
export function isConfigRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 解析环境变量值
 */
export function parseEnvValue(value: string, type: EnvValueType): unknown {
  switch (type) {
    case 'number': {
      const num = Number(value);
      if (value.trim() === '' || Number.isNaN(num)) {
        throw new Error(`Invalid number: ${value}`);
      }
      return num;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (lower === 'true' || lower === '1' || lower === 'yes') return true;
      if (lower === 'false' || lower === '0' || lower === 'no') return false;
      throw new Error(`Invalid boolean: ${value}`);
    }
    case 'json':
      return JSON.parse(value);
    case 'string':
    default:
      return value;
  }
}

/**
 * 合并配置片段，数组整体替换而不是按下标合并
 */
export function mergeConfig<T>(target: T, source: ConfigRecord): T {
  return mergeWith(target, source, (_targetValue: unknown, sourceValue: unknown) =>
    Array.isArray(sourceValue) ? [...sourceValue] : undefined
  );
}

export abstract class BaseConfigManager<T extends BaseConfig> extends EventEmitter {
  protected config: T | null = null;
  protected options: ConfigManagerOptions;
  protected validators: ConfigValidator<T>[] = [];
  protected validationRules: ConfigValidationRule[] = [];
  protected transformers: ConfigTransformer<T>[] = [];
  protected loadTimestamp = 0;

  constructor(options: ConfigManagerOptions = {}) {
    super();
    this.options = {
      enableValidation: true,
      enableEnvOverride: true,
      ...options
    };
  }

  /**
   * 加载配置
   */
  async load(): Promise<ConfigLoadResult<T>> {
    try {
      const sources = [...(this.options.sources || this.getDefaultSources())];
      let mergedConfig: T = cloneDeep(this.getDefaultConfig());
      const usedSources: ConfigSource[] = [];

      // 按优先级排序并合并配置
      sources.sort((a, b) => a.priority - b.priority);

      for (const source of sources) {
        const sourceConfig = await this.loadFromSource(source);
        if (sourceConfig) {
          mergedConfig = mergeConfig(mergedConfig, sourceConfig);
          usedSources.push(source);
        }
      }

      // 环境变量映射覆盖
      if (this.options.enableEnvOverride) {
        const envConfig = this.loadFromEnvMappings(this.getEnvMappings());
        if (Object.keys(envConfig).length > 0) {
          mergedConfig = mergeConfig(mergedConfig, envConfig);
        }
      }

      for (const transformer of this.transformers) {
        mergedConfig = transformer(mergedConfig);
      }

      const validationErrors = this.options.enableValidation ? this.validate(mergedConfig) : [];

      this.config = mergedConfig;
      this.loadTimestamp = Date.now();

      const loadResult: ConfigLoadResult<T> = {
        config: cloneDeep(this.config),
        sources: usedSources,
        timestamp: this.loadTimestamp,
        hasValidationErrors: validationErrors.length > 0,
        validationErrors: validationErrors.length > 0 ? validationErrors : undefined
      };

      const event: ConfigUpdateEvent<T> = {
        type: validationErrors.length > 0 ? 'validation_failed' : 'loaded',
        config: loadResult.config,
        timestamp: this.loadTimestamp
      };
      this.emit('config', event);

      return loadResult;
    } catch (error) {
      const event: ConfigUpdateEvent<T> = {
        type: 'error',
        error: error instanceof Error ? error : new Error(String(error)),
        timestamp: Date.now()
      };
      this.emit('config', event);
      throw error;
    }
  }

  /**
   * 获取当前配置
   */
  getConfig(): T | null {
    return this.config ? cloneDeep(this.config) : null;
  }

  /**
   * 获取配置的某个属性
   */
  get<K extends keyof T>(key: K): T[K] | undefined {
    return this.config?.[key];
  }

  /**
   * 检查配置是否已加载
   */
  isValid(): boolean {
    return this.config !== null && this.loadTimestamp > 0;
  }

  addValidator(validator: ConfigValidator<T>): void {
    this.validators.push(validator);
  }

  /**
   * 添加 Joi 验证规则
   */
  addValidationRule(rule: ConfigValidationRule): void {
    this.validationRules.push(rule);
  }

  addTransformer(transformer: ConfigTransformer<T>): void {
    this.transformers.push(transformer);
  }

  onConfigUpdate(handler: ConfigEventHandler<T>): void {
    this.on('config', handler);
  }

  async reload(): Promise<ConfigLoadResult<T>> {
    return this.load();
  }

  /**
   * 执行全部验证器和验证规则
   */
  protected validate(config: T): string[] {
    const errors: string[] = [];

    for (const rule of this.validationRules) {
      const { error } = rule.schema.validate(config, { abortEarly: false, allowUnknown: true });
      if (error) {
        if (rule.message) {
          errors.push(`${rule.name}: ${rule.message}`);
        }
        for (const detail of error.details) {
          errors.push(`${rule.name}: ${detail.message}`);
        }
      }
    }

    for (const validator of this.validators) {
      const result = validator(config);
      if (result === false) {
        errors.push('Config validator rejected configuration');
      } else if (typeof result === 'string') {
        errors.push(result);
      } else if (Array.isArray(result)) {
        errors.push(...result);
      }
    }

    return errors;
  }

  /**
   * 从配置源加载配置
   */
  protected async loadFromSource(source: ConfigSource): Promise<ConfigRecord | null> {
    switch (source.type) {
      case 'file':
        return this.loadFromFile(source.source);
      case 'env':
        return this.loadFromEnvPrefix(source.source);
      case 'default':
        // 默认配置已作为合并基础
        return {};
      default:
        throw new Error(`Unsupported config source type: ${String(source.type)}`);
    }
  }

  /**
   * 从文件加载配置，文件不存在时返回 null
   */
  protected async loadFromFile(filePath: string): Promise<ConfigRecord | null> {
    if (!fs.existsSync(filePath)) {
      return null;
    }

    const content = await fs.promises.readFile(filePath, 'utf-8');
    const ext = path.extname(filePath).toLowerCase();

    let parsed: unknown;
    switch (ext) {
      case '.json':
        parsed = JSON.parse(content);
        break;
      case '.yaml':
      case '.yml':
        parsed = yaml.parse(content);
        break;
      default:
        throw new Error(`Unsupported config file format: ${ext}`);
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isConfigRecord(parsed)) {
      throw new Error(`Config file must contain an object: ${filePath}`);
    }
    return parsed;
  }

  /**
   * 按前缀读取环境变量，PREFIX_A_B 映射为 { a: { b } }
   */
  protected loadFromEnvPrefix(prefix: string): ConfigRecord {
    const config: ConfigRecord = {};
    const envPrefix = prefix.toUpperCase() + '_';
    const env = this.options.env || process.env;

    for (const [key, value] of Object.entries(env)) {
      if (value !== undefined && key.startsWith(envPrefix)) {
        const keyPath = key.slice(envPrefix.length).toLowerCase().split('_');
        set(config, keyPath, this.guessValue(value));
      }
    }

    return config;
  }

  /**
   * 按映射表读取环境变量
   */
  protected loadFromEnvMappings(mappings: EnvMapping[]): ConfigRecord {
    const config: ConfigRecord = {};
    const env = this.options.env || process.env;

    for (const mapping of mappings) {
      const raw = env[mapping.env];
      if (raw === undefined) {
        continue;
      }
      try {
        set(config, mapping.path, parseEnvValue(raw, mapping.type));
      } catch (error) {
        throw new Error(
          `Failed to parse environment variable ${mapping.env}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    return config;
  }

  /**
   * 推断无类型环境变量的值
   */
  private guessValue(value: string): unknown {
    if (/^-?\d+$/.test(value)) {
      return parseInt(value, 10);
    }
    if (/^-?\d+\.\d+$/.test(value)) {
      return parseFloat(value);
    }
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  }

  /** 环境变量映射表，子类按需覆盖 */
  protected getEnvMappings(): EnvMapping[] {
    return [];
  }

  // 抽象方法，由子类实现
  protected abstract getDefaultSources(): ConfigSource[];
  protected abstract getDefaultConfig(): T;
}
