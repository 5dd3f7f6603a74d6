/**
 * 日志工厂
 * 基于 winston 创建组件日志器，日志级别由调用方配置显式传入
 */

import * as winston from 'winston';
import { LoggerOptions } from './types';

export type Logger = winston.Logger;

/**
 * 创建组件日志器
 */
export function createLogger(options: LoggerOptions): Logger {
  const { level, format, component, silent = false } = options;

  return winston.createLogger({
    level,
    silent,
    defaultMeta: { component },
    transports: [
      new winston.transports.Console({
        format: format === 'json'
          ? winston.format.combine(
              winston.format.timestamp(),
              winston.format.json()
            )
          : winston.format.combine(
              winston.format.timestamp(),
              winston.format.simple()
            )
      })
    ]
  });
}
