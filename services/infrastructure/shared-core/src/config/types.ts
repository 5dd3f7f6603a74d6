/**
 * 配置管理核心类型定义
 */

import { Schema } from 'joi';

export interface BaseConfig {
  /** 配置名称 */
  name?: string;
  /** 配置版本 */
  version?: string;
  /** 环境类型 */
  environment?: string;
}

export interface ConfigSource {
  /** 配置来源类型 */
  type: 'file' | 'env' | 'default';
  /** 配置来源路径或标识 */
  source: string;
  /** 优先级（数字越大优先级越高） */
  priority: number;
}

/**
 * 环境变量值类型
 */
export type EnvValueType = 'string' | 'number' | 'boolean' | 'json';

/**
 * 环境变量到配置路径的映射
 */
export interface EnvMapping {
  /** 环境变量名 */
  env: string;
  /** 点分隔的配置路径，如 retry.maxRetries */
  path: string;
  /** 值类型 */
  type: EnvValueType;
}

export interface ConfigManagerOptions {
  /** 配置来源列表 */
  sources?: ConfigSource[];
  /** 是否启用配置验证 */
  enableValidation?: boolean;
  /** 是否启用环境变量覆盖 */
  enableEnvOverride?: boolean;
  /** 环境变量读取来源，默认 process.env */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigValidationRule {
  /** 验证规则名称 */
  name: string;
  /** Joi验证schema */
  schema: Schema;
  /** 错误消息 */
  message?: string;
}

export interface ConfigLoadResult<T> {
  /** 配置数据 */
  config: T;
  /** 加载来源 */
  sources: ConfigSource[];
  /** 加载时间戳 */
  timestamp: number;
  /** 是否有验证错误 */
  hasValidationErrors: boolean;
  /** 验证错误列表 */
  validationErrors?: string[];
}

export interface ConfigUpdateEvent<T> {
  /** 事件类型 */
  type: 'loaded' | 'error' | 'validation_failed';
  /** 配置数据 */
  config?: T;
  /** 错误信息 */
  error?: Error;
  /** 事件时间戳 */
  timestamp: number;
}

/** 普通对象形式的配置片段 */
export type ConfigRecord = Record<string, unknown>;

export type ConfigValidator<T> = (config: T) => boolean | string | string[];

export type ConfigTransformer<T> = (config: T) => T;

export type ConfigEventHandler<T> = (event: ConfigUpdateEvent<T>) => void;
