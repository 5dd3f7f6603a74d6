/**
 * 错误处理核心类型定义
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  CONNECTION = 'connection',
  CONFIGURATION = 'configuration',
  NETWORK = 'network',
  TIMEOUT = 'timeout',
  RATE_LIMIT = 'rate_limit',
  DATA_PARSING = 'data_parsing',
  UNKNOWN = 'unknown'
}

export interface ErrorContext {
  /** 组件名称 */
  component?: string;
  /** 操作名称 */
  operation?: string;
  /** 相关数据 */
  [key: string]: unknown;
}

/**
 * 带分类信息的服务错误
 */
export interface ClassifiedError extends Error {
  /** 错误代码 */
  code: string;
  /** 错误分类 */
  category: ErrorCategory;
  /** 错误严重程度 */
  severity: ErrorSeverity;
  /** 是否可通过重试恢复 */
  retryable: boolean;
  /** 错误上下文 */
  context?: ErrorContext;
}

/**
 * 将未知抛出值规范化为 Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

