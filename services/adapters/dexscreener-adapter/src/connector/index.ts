/**
 * DexScreener WebSocket 连接管理器 - 入口文件
 */

// 核心接口
export * from './interfaces';

// 核心类
export { HeartbeatManager } from './HeartbeatManager';
export { ReconnectStrategy } from './ReconnectStrategy';
export { ConnectionManager, createWebSocket } from './ConnectionManager';
export type { ConnectionManagerOptions } from './ConnectionManager';

// 请求头与指标
export { buildBrowserHeaders, USER_AGENTS, UPSTREAM_ORIGIN } from './headers';
export * from './metrics';

// 工具函数
export { RateLimiter, toBuffer, truncateString } from './utils';
