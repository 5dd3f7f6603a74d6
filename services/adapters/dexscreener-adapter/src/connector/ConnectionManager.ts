/**
 * DexScreener WebSocket 连接管理器
 *
 * 功能:
 * - 连接生命周期: Disconnected → Connecting → Connected → Backoff → Connecting …
 * - 连接超时、socket 错误、异常关闭和心跳超时都转入 Backoff
 * - 指数退避重连，连续失败达到上限时以 RetryExhaustedError 结束
 * - 出站请求 (连接尝试与发送的消息) 经令牌桶限流
 * - 每个二进制帧交给 MessageDecoder，解码结果通过 FRAME_DECODED 事件转发
 *
 * 连接状态与重连计数只由本类的事件循环修改。
 * 关闭是协作式的: stop() 触发 AbortSignal，在帧读取之间或退避等待开始时生效。
 */

import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { v4 as uuidv4 } from 'uuid';
import {
  cancellableDelay,
  createLogger,
  DelayCancelledError,
  Logger,
  MetricsRegistry,
  toError
} from '@dexstream/shared-core';
import {
  CONNECTION_STATE_CODES,
  ConnectionEvent,
  ConnectionEventData,
  ConnectionExit,
  ConnectionManagerConfig,
  ConnectionState,
  ConnectionStats,
  DisconnectionEventData,
  FrameDecodedEventData,
  HeartbeatEventData,
  HeartbeatTimeoutEventData,
  ReconnectScheduledEventData,
  ReconnectStats,
  SOCKET_OPEN,
  SocketFactory,
  SocketPayload,
  StateChangeEventData,
  StreamSocket
} from './interfaces';
import { HeartbeatManager } from './HeartbeatManager';
import { ReconnectStrategy } from './ReconnectStrategy';
import { RateLimiter, toBuffer, truncateString } from './utils';
import { buildBrowserHeaders } from './headers';
import {
  FrameOutcomeLabel,
  METRIC_CHUNKS_SKIPPED_TOTAL,
  METRIC_CONNECTION_STATE,
  METRIC_FRAMES_TOTAL,
  METRIC_RECONNECTS_TOTAL,
  METRIC_RECORDS_TOTAL,
  registerAdapterMetrics
} from './metrics';
import { DecodeOutcome, MessageDecoder, SkipReason } from '../protocol';
import {
  ConnectionError,
  ConnectionLostError,
  DataParsingError,
  RetryExhaustedError
} from '../types';

export interface ConnectionManagerOptions {
  /** socket 工厂，默认使用 ws */
  socketFactory?: SocketFactory;
  decoder?: MessageDecoder;
  logger?: Logger;
  metrics?: MetricsRegistry;
  /** 抖动使用的随机源 */
  random?: () => number;
}

/**
 * 默认 socket 工厂
 */
export const createWebSocket: SocketFactory = (url, headers) => new WebSocket(url, { headers });

export class ConnectionManager extends EventEmitter {
  public readonly id: string;

  private _state: ConnectionState = ConnectionState.DISCONNECTED;
  private readonly config: ConnectionManagerConfig;
  private readonly socketFactory: SocketFactory;
  private readonly decoder: MessageDecoder;
  private readonly logger: Logger;
  private readonly metrics?: MetricsRegistry;
  private readonly reconnectStrategy: ReconnectStrategy;
  private readonly rateLimiter: RateLimiter;

  private socket: StreamSocket | null = null;
  private abortController = new AbortController();
  private runPromise: Promise<ConnectionExit> | null = null;
  private headerRotation = 0;
  private stats: ConnectionStats;

  constructor(config: ConnectionManagerConfig, options: ConnectionManagerOptions = {}) {
    super();

    this.id = uuidv4();
    this.config = config;
    this.socketFactory = options.socketFactory ?? createWebSocket;
    this.logger = options.logger ?? createLogger({ level: 'info', format: 'json', component: 'connection-manager' });
    this.decoder = options.decoder ?? new MessageDecoder({}, this.logger);
    this.metrics = options.metrics;
    this.reconnectStrategy = new ReconnectStrategy(config.reconnect, options.random);
    this.rateLimiter = new RateLimiter(config.rateLimit.burst, config.rateLimit.requestsPerSecond);
    this.stats = this.initializeStats();

    if (this.metrics) {
      registerAdapterMetrics(this.metrics);
      this.metrics.setGauge(METRIC_CONNECTION_STATE, CONNECTION_STATE_CODES[this._state]);
    }
  }

  /**
   * 获取当前连接状态
   */
  public get state(): ConnectionState {
    return this._state;
  }

  /**
   * 启动连接循环
   * 返回的 Promise 在显式关闭或重试耗尽时完成，重复调用返回同一个 Promise
   */
  public start(): Promise<ConnectionExit> {
    if (this.runPromise) {
      return this.runPromise;
    }
    if (this._state === ConnectionState.STOPPED) {
      return Promise.resolve({ reason: 'stopped' });
    }

    this.logger.debug('Starting connection loop', {
      connectionId: this.id,
      url: this.config.url,
      maxRetries: this.config.reconnect.maxRetries,
      maxBackoffMs: this.reconnectStrategy.estimateTotalBackoff()
    });

    this.abortController = new AbortController();
    this.runPromise = this.runLoop(this.abortController.signal);
    return this.runPromise;
  }

  /**
   * 请求关闭并等待连接循环退出
   */
  public async stop(): Promise<void> {
    this.abortController.abort();

    if (this.runPromise) {
      await this.runPromise;
    } else {
      this.setState(ConnectionState.STOPPED, 'Stop requested');
    }
  }

  /**
   * 发送消息 (经过限流)
   */
  public async send(data: string | Buffer): Promise<void> {
    await this.rateLimiter.acquire(this.abortController.signal);

    const socket = this.socket;
    if (!socket || this._state !== ConnectionState.CONNECTED || socket.readyState !== SOCKET_OPEN) {
      throw new ConnectionError(`Cannot send in state: ${this._state}`, undefined, { connectionId: this.id });
    }

    await new Promise<void>((resolve, reject) => {
      socket.send(data, (error) => {
        if (error) {
          reject(new ConnectionError(`Send failed: ${error.message}`, error, { connectionId: this.id }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * 获取连接统计
   */
  public getStats(): ConnectionStats {
    return { ...this.stats, state: this._state };
  }

  public getReconnectStats(): ReconnectStats {
    return this.reconnectStrategy.getStats();
  }

  // ============================================================================
  // 私有方法 - 连接循环
  // ============================================================================

  private async runLoop(signal: AbortSignal): Promise<ConnectionExit> {
    while (!signal.aborted) {
      let failure: Error;

      try {
        await this.rateLimiter.acquire(signal);
        const socket = await this.openSocket(signal);
        failure = await this.runSession(socket, signal);
      } catch (error) {
        if (error instanceof DelayCancelledError) {
          break;
        }
        failure = toError(error);
        this.stats.failedConnections++;
      }

      if (signal.aborted) {
        break;
      }

      const exhausted = await this.backoff(failure, signal);
      if (exhausted) {
        this.setState(ConnectionState.STOPPED, exhausted.message);
        return { reason: 'retry_exhausted', error: exhausted };
      }
    }

    this.setState(ConnectionState.STOPPED, 'Stop requested');
    return { reason: 'stopped' };
  }

  /**
   * 建立 WebSocket 连接，超时或失败时拒绝
   */
  private openSocket(signal: AbortSignal): Promise<StreamSocket> {
    this.setState(ConnectionState.CONNECTING);
    this.stats.connectionAttempts++;

    const headers = buildBrowserHeaders(this.headerRotation++);
    const timeout = this.config.connectTimeout;
    this.logger.debug('Opening connection', {
      connectionId: this.id,
      url: this.config.url,
      attempt: this.reconnectStrategy.getStats().attempts + 1,
      userAgent: headers['User-Agent']
    });

    return new Promise((resolve, reject) => {
      const socket = this.socketFactory(this.config.url, headers);
      let settled = false;

      const settle = (error: Error | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);

        if (error) {
          this.discardSocket(socket);
          reject(error);
        } else {
          resolve(socket);
        }
      };

      const onAbort = (): void => {
        settle(new DelayCancelledError('Connect cancelled'));
      };

      const timer = setTimeout(() => {
        settle(new ConnectionError(`Connection timeout after ${timeout}ms`, undefined, { url: this.config.url }));
      }, timeout);

      socket.on('open', () => {
        settle(null);
      });
      socket.on('error', (error) => {
        settle(new ConnectionError(`Connection failed: ${error.message}`, error, { url: this.config.url }));
      });
      socket.on('close', (code) => {
        settle(new ConnectionError(`Connection closed before open: ${code}`, undefined, { url: this.config.url, code }));
      });

      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * 已连接阶段: 读取帧并维持心跳，直到连接丢失或收到关闭请求
   * 返回导致会话结束的错误
   */
  private runSession(socket: StreamSocket, signal: AbortSignal): Promise<Error> {
    this.socket = socket;
    this.reconnectStrategy.reset();
    this.stats.successfulConnections++;
    this.stats.connectedAt = Date.now();
    this.setState(ConnectionState.CONNECTED);

    const connected: ConnectionEventData = {
      connectionId: this.id,
      timestamp: Date.now(),
      url: this.config.url,
      attempt: this.stats.connectionAttempts
    };
    this.emit(ConnectionEvent.CONNECTED, connected);

    return new Promise((resolve) => {
      const heartbeat = new HeartbeatManager(socket, this.config.heartbeat);
      let ended = false;

      const end = (reason: Error): void => {
        if (ended) {
          return;
        }
        ended = true;
        heartbeat.stop();
        heartbeat.removeAllListeners();
        signal.removeEventListener('abort', onAbort);
        this.socket = null;
        this.discardSocket(socket);

        const disconnected: DisconnectionEventData = {
          connectionId: this.id,
          timestamp: Date.now(),
          reason: reason.message,
          willReconnect: !signal.aborted
        };
        this.emit(ConnectionEvent.DISCONNECTED, disconnected);
        resolve(reason);
      };

      const onAbort = (): void => {
        end(new ConnectionLostError('Shutdown requested'));
      };

      socket.on('message', (data, isBinary) => {
        this.handleMessage(data, isBinary);
      });
      socket.on('close', (code, reason) => {
        const text = reason.toString();
        end(new ConnectionLostError(`Socket closed: ${code}${text ? ` ${text}` : ''}`, undefined, { code }));
      });
      socket.on('error', (error) => {
        end(new ConnectionLostError(`Socket error: ${error.message}`, error));
      });

      heartbeat.on(ConnectionEvent.HEARTBEAT_RECEIVED, (data: HeartbeatEventData) => {
        this.emit(ConnectionEvent.HEARTBEAT_RECEIVED, { ...data, connectionId: this.id });
      });
      heartbeat.on(ConnectionEvent.HEARTBEAT_TIMEOUT, (data: HeartbeatTimeoutEventData) => {
        this.logger.warn('Heartbeat timeout', { connectionId: this.id, ...data });
        this.emit(ConnectionEvent.HEARTBEAT_TIMEOUT, { ...data, connectionId: this.id });
        end(new ConnectionLostError(`Heartbeat timeout after ${data.timeout}ms`));
      });
      heartbeat.start();

      signal.addEventListener('abort', onAbort, { once: true });
      if (signal.aborted) {
        onAbort();
      }
    });
  }

  /**
   * 记录失败并等待退避间隔；连续失败达到上限时返回 RetryExhaustedError
   */
  private async backoff(failure: Error, signal: AbortSignal): Promise<RetryExhaustedError | null> {
    const attempt = this.reconnectStrategy.recordFailure();
    this.stats.lastError = failure.message;

    if (!this.reconnectStrategy.shouldReconnect()) {
      const error = new RetryExhaustedError(attempt, failure, { connectionId: this.id, url: this.config.url });
      this.logger.error('Reconnect attempts exhausted', {
        connectionId: this.id,
        attempts: attempt,
        lastError: failure.message
      });
      this.emit(ConnectionEvent.RETRY_EXHAUSTED, error);
      return error;
    }

    const delay = this.reconnectStrategy.getNextDelay();
    this.setState(ConnectionState.BACKOFF, failure.message);
    this.stats.reconnectsScheduled++;
    this.metrics?.incrementCounter(METRIC_RECONNECTS_TOTAL);

    this.logger.warn('Scheduling reconnect', {
      connectionId: this.id,
      attempt,
      delay,
      reason: failure.message
    });

    const scheduled: ReconnectScheduledEventData = {
      connectionId: this.id,
      timestamp: Date.now(),
      attempt,
      delay,
      reason: failure.message
    };
    this.emit(ConnectionEvent.RECONNECT_SCHEDULED, scheduled);

    try {
      await cancellableDelay(delay, signal);
    } catch (error) {
      if (!(error instanceof DelayCancelledError)) {
        throw error;
      }
    }
    return null;
  }

  // ============================================================================
  // 私有方法 - 帧处理
  // ============================================================================

  private handleMessage(data: SocketPayload, isBinary: boolean): void {
    const frame = toBuffer(data);

    if (!isBinary) {
      const text = frame.toString('utf8');
      this.stats.textFramesIgnored++;
      this.recordFrame('text');
      this.logger.debug('Ignoring text frame', {
        connectionId: this.id,
        length: text.length,
        preview: truncateString(text, 80)
      });
      this.emit(ConnectionEvent.TEXT_FRAME, text);
      return;
    }

    this.stats.framesReceived++;
    this.stats.bytesReceived += frame.length;

    let outcomes: DecodeOutcome[];
    try {
      outcomes = this.decoder.decode(frame);
    } catch (error) {
      const cause = toError(error);
      const parsingError = new DataParsingError(`Frame decoding failed: ${cause.message}`, cause, {
        frameSize: frame.length
      });
      this.stats.lastError = parsingError.message;
      this.logger.error('Frame decoding failed', {
        connectionId: this.id,
        code: parsingError.code,
        cause: cause.message,
        frameSize: frame.length
      });
      this.emit(ConnectionEvent.FRAME_ERROR, parsingError);
      return;
    }

    this.recordOutcomes(outcomes);
    if (outcomes.length === 0) {
      return;
    }

    const event: FrameDecodedEventData = {
      connectionId: this.id,
      timestamp: Date.now(),
      frameSize: frame.length,
      outcomes
    };
    this.emit(ConnectionEvent.FRAME_DECODED, event);
  }

  private recordOutcomes(outcomes: DecodeOutcome[]): void {
    const unrecognized = outcomes.length === 1
      && outcomes[0].status === 'skipped'
      && outcomes[0].reason === SkipReason.UNRECOGNIZED_FRAME;
    this.recordFrame(unrecognized ? 'unrecognized' : 'decoded');

    if (!this.metrics) {
      return;
    }
    for (const outcome of outcomes) {
      if (outcome.status === 'decoded') {
        this.metrics.incrementCounter(METRIC_RECORDS_TOTAL, 1, { kind: outcome.record.kind });
      } else if (outcome.reason !== SkipReason.UNRECOGNIZED_FRAME) {
        this.metrics.incrementCounter(METRIC_CHUNKS_SKIPPED_TOTAL, 1, { reason: outcome.reason });
      }
    }
  }

  private recordFrame(outcome: FrameOutcomeLabel): void {
    this.metrics?.incrementCounter(METRIC_FRAMES_TOTAL, 1, { outcome });
  }

  // ============================================================================
  // 私有方法 - 工具
  // ============================================================================

  /**
   * 释放 socket: 移除监听器并关闭，之后的错误只记录 debug 日志
   */
  private discardSocket(socket: StreamSocket): void {
    socket.removeAllListeners();
    socket.on('error', (error) => {
      this.logger.debug('Socket error after teardown', { connectionId: this.id, error: error.message });
    });

    if (socket.readyState === SOCKET_OPEN) {
      socket.close(1000, 'Client shutdown');
    } else {
      socket.terminate();
    }
  }

  private setState(newState: ConnectionState, reason?: string): void {
    const oldState = this._state;
    if (oldState === newState) {
      return;
    }
    this._state = newState;
    this.metrics?.setGauge(METRIC_CONNECTION_STATE, CONNECTION_STATE_CODES[newState]);

    this.logger.info('Connection state changed', {
      connectionId: this.id,
      from: oldState,
      to: newState,
      reason
    });

    const event: StateChangeEventData = {
      connectionId: this.id,
      oldState,
      newState,
      timestamp: Date.now(),
      reason
    };
    this.emit(ConnectionEvent.STATE_CHANGED, event);
  }

  private initializeStats(): ConnectionStats {
    return {
      connectionId: this.id,
      state: this._state,
      connectionAttempts: 0,
      successfulConnections: 0,
      failedConnections: 0,
      reconnectsScheduled: 0,
      framesReceived: 0,
      textFramesIgnored: 0,
      bytesReceived: 0
    };
  }
}
