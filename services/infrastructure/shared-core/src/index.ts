/**
 * DexStream Shared Core Library
 * 行情流服务共享核心库
 */

// 配置管理
export * from './config/types';
export * from './config/base-manager';

// 错误处理
export * from './error/types';

// 日志与监控
export * from './monitoring/types';
export * from './monitoring/logger';
export * from './monitoring/metrics';

// 通用工具
export * from './utils/delay';

// 版本信息
export const VERSION = '1.0.0';
