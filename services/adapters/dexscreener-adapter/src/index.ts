/**
 * DexScreener Adapter SDK
 * DexScreener 行情流适配器: 二进制帧解码、重连连接管理和记录编排
 */

export * from './types';
export * from './protocol';
export * from './connector';
export * from './config';
export * from './config/validator';
export { AdapterConfigManager, ADAPTER_ENV_MAPPINGS, loadAdapterConfig } from './config/manager';
export type { AdapterConfigManagerOptions } from './config/manager';
export * from './stream';

// 版本信息
export const VERSION = '1.0.0';
