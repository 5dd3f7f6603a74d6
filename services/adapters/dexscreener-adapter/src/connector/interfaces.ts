/**
 * DexScreener 连接管理器核心接口定义
 */

import { DecodeOutcome } from '../protocol';
import { RetryExhaustedError } from '../types';

// ============================================================================
// 连接状态枚举
// ============================================================================

/**
 * 连接状态
 * Disconnected → Connecting → Connected → (失败) Backoff → Connecting → …
 * 只有显式关闭才进入 Stopped
 */
export enum ConnectionState {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  BACKOFF = 'backoff',
  STOPPED = 'stopped'
}

/**
 * 连接状态的数值编码，用于 connection_state 指标
 */
export const CONNECTION_STATE_CODES: Readonly<Record<ConnectionState, number>> = {
  [ConnectionState.DISCONNECTED]: 0,
  [ConnectionState.CONNECTING]: 1,
  [ConnectionState.CONNECTED]: 2,
  [ConnectionState.BACKOFF]: 3,
  [ConnectionState.STOPPED]: 4
};

/**
 * 连接事件类型
 */
export enum ConnectionEvent {
  STATE_CHANGED = 'state_changed',
  CONNECTED = 'connected',
  DISCONNECTED = 'disconnected',
  FRAME_DECODED = 'frame_decoded',
  TEXT_FRAME = 'text_frame',
  FRAME_ERROR = 'frame_error',
  HEARTBEAT_RECEIVED = 'heartbeat_received',
  HEARTBEAT_TIMEOUT = 'heartbeat_timeout',
  RECONNECT_SCHEDULED = 'reconnect_scheduled',
  RETRY_EXHAUSTED = 'retry_exhausted'
}

// ============================================================================
// 配置接口
// ============================================================================

/**
 * 心跳配置
 */
export interface HeartbeatConfig {
  /** 发送 ping 的间隔 (ms) */
  interval: number;

  /** 等待 pong 的超时时间 (ms)，超时视为连接失败 */
  timeout: number;
}

/**
 * 重连配置
 */
export interface ReconnectConfig {
  /** 初始重连延迟 (ms) */
  initialDelay: number;

  /** 最大重连延迟 (ms) */
  maxDelay: number;

  /** 退避倍数 */
  backoffMultiplier: number;

  /** 连续连接尝试的最大次数，达到后视为重试耗尽 */
  maxRetries: number;

  /** 是否添加随机抖动 (开启后延迟不再单调) */
  jitter: boolean;
}

/**
 * 出站请求限流配置
 */
export interface RateLimitConfig {
  /** 每秒请求数上限 */
  requestsPerSecond: number;

  /** 令牌桶容量 */
  burst: number;
}

/**
 * 连接管理器配置
 */
export interface ConnectionManagerConfig {
  /** WebSocket 端点 (含查询参数) */
  url: string;

  /** 连接超时时间 (ms) */
  connectTimeout: number;

  heartbeat: HeartbeatConfig;

  reconnect: ReconnectConfig;

  rateLimit: RateLimitConfig;
}

// ============================================================================
// 传输抽象
// ============================================================================

export type SocketPayload = Buffer | ArrayBuffer | Buffer[];

/**
 * 连接管理器依赖的最小 socket 接口，ws 的 WebSocket 满足该接口
 */
export interface StreamSocket {
  readonly readyState: number;

  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: SocketPayload, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'pong', listener: (data: Buffer) => void): unknown;

  removeAllListeners(): unknown;
  send(data: string | Buffer, cb?: (error?: Error) => void): void;
  ping(data?: Buffer): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

/** WebSocket readyState.OPEN */
export const SOCKET_OPEN = 1;

/**
 * socket 工厂，测试中注入 MockWebSocket
 */
export type SocketFactory = (url: string, headers: Record<string, string>) => StreamSocket;

// ============================================================================
// 统计接口
// ============================================================================

/**
 * 心跳统计信息
 */
export interface HeartbeatStats {
  pingsSent: number;
  pongsReceived: number;
  heartbeatTimeouts: number;
  lastPingTime?: number;
  lastPongTime?: number;
  /** 平均往返时间 (ms) */
  avgRoundTripTime: number;
}

/**
 * 重连统计信息
 */
export interface ReconnectStats {
  /** 当前连续失败次数 */
  attempts: number;
  lastAttemptTime: number;
  nextRetryTime: number;
  currentDelay: number;
}

/**
 * 连接统计信息
 */
export interface ConnectionStats {
  connectionId: string;
  state: ConnectionState;
  connectedAt?: number;
  connectionAttempts: number;
  successfulConnections: number;
  failedConnections: number;
  reconnectsScheduled: number;
  framesReceived: number;
  textFramesIgnored: number;
  bytesReceived: number;
  lastError?: string;
}

// ============================================================================
// 事件数据接口
// ============================================================================

export interface StateChangeEventData {
  connectionId: string;
  oldState: ConnectionState;
  newState: ConnectionState;
  timestamp: number;
  reason?: string;
}

export interface ConnectionEventData {
  connectionId: string;
  timestamp: number;
  url: string;
  attempt: number;
}

export interface DisconnectionEventData {
  connectionId: string;
  timestamp: number;
  reason: string;
  willReconnect: boolean;
}

export interface FrameDecodedEventData {
  connectionId: string;
  timestamp: number;
  frameSize: number;
  outcomes: DecodeOutcome[];
}

export interface ReconnectScheduledEventData {
  connectionId: string;
  timestamp: number;
  attempt: number;
  delay: number;
  reason: string;
}

export interface HeartbeatEventData {
  timestamp: number;
  pingTime?: number;
  roundTripTime?: number;
}

export interface HeartbeatTimeoutEventData {
  timestamp: number;
  lastPingTime: number;
  timeout: number;
}

/**
 * 连接循环结束的原因
 */
export type ConnectionExit =
  | { reason: 'stopped' }
  | { reason: 'retry_exhausted'; error: RetryExhaustedError };
