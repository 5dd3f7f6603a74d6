/**
 * 监控系统核心类型定义
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingConfig {
  /** 日志级别 */
  level: LogLevel;
  /** 输出格式 */
  format: 'json' | 'text';
}

export interface LoggerOptions extends LoggingConfig {
  /** 组件名称，写入每条日志的默认元数据 */
  component: string;
  /** 静默模式（测试使用） */
  silent?: boolean;
}

export interface MetricDefinition {
  name: string;
  description: string;
  type: 'counter' | 'gauge';
  labels?: string[];
}
