/**
 * WebSocket 心跳管理器
 *
 * - 每隔 interval 发送一次 ping
 * - 发送后 timeout 内未收到 pong 视为心跳超时，由连接管理器转入 Backoff
 * - 上一个 ping 未确认时不重复发送
 */

import { EventEmitter } from 'events';
import {
  ConnectionEvent,
  HeartbeatConfig,
  HeartbeatEventData,
  HeartbeatStats,
  HeartbeatTimeoutEventData,
  SOCKET_OPEN,
  StreamSocket
} from './interfaces';

const ROUND_TRIP_WINDOW = 100;

export class HeartbeatManager extends EventEmitter {
  private readonly config: HeartbeatConfig;
  private readonly socket: StreamSocket;
  private stats: HeartbeatStats;

  private pingTimer?: NodeJS.Timeout;
  private pongTimer?: NodeJS.Timeout;
  private awaitingPongSince?: number;
  private isRunning = false;
  private roundTripTimes: number[] = [];

  constructor(socket: StreamSocket, config: HeartbeatConfig) {
    super();
    this.socket = socket;
    this.config = config;
    this.stats = this.initializeStats();

    this.socket.on('pong', () => {
      this.handlePong();
    });
  }

  /**
   * 启动心跳
   */
  public start(): void {
    if (this.isRunning) {
      return;
    }
    this.isRunning = true;
    this.pingTimer = setInterval(() => {
      this.sendPing();
    }, this.config.interval);
  }

  /**
   * 停止心跳并清理定时器
   */
  public stop(): void {
    this.isRunning = false;
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = undefined;
    }
    this.clearPongTimer();
  }

  /**
   * 发送 ping 并启动 pong 超时计时
   */
  public sendPing(): void {
    if (!this.isRunning || this.awaitingPongSince !== undefined || this.socket.readyState !== SOCKET_OPEN) {
      return;
    }

    const now = Date.now();
    this.awaitingPongSince = now;
    this.stats.pingsSent++;
    this.stats.lastPingTime = now;

    this.socket.ping();

    this.pongTimer = setTimeout(() => {
      this.handleTimeout(now);
    }, this.config.timeout);
  }

  public getStats(): HeartbeatStats {
    return { ...this.stats };
  }

  public isAwaitingPong(): boolean {
    return this.awaitingPongSince !== undefined;
  }

  private handlePong(): void {
    const now = Date.now();
    this.stats.pongsReceived++;
    this.stats.lastPongTime = now;

    const pingTime = this.awaitingPongSince;
    this.clearPongTimer();

    const event: HeartbeatEventData = { timestamp: now };
    if (pingTime !== undefined) {
      const roundTripTime = now - pingTime;
      this.updateRoundTripTime(roundTripTime);
      event.pingTime = pingTime;
      event.roundTripTime = roundTripTime;
    }

    this.emit(ConnectionEvent.HEARTBEAT_RECEIVED, event);
  }

  private handleTimeout(pingTime: number): void {
    this.clearPongTimer();
    this.stats.heartbeatTimeouts++;

    const event: HeartbeatTimeoutEventData = {
      timestamp: Date.now(),
      lastPingTime: pingTime,
      timeout: this.config.timeout
    };
    this.emit(ConnectionEvent.HEARTBEAT_TIMEOUT, event);
  }

  private clearPongTimer(): void {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = undefined;
    }
    this.awaitingPongSince = undefined;
  }

  private updateRoundTripTime(roundTripTime: number): void {
    this.roundTripTimes.push(roundTripTime);
    if (this.roundTripTimes.length > ROUND_TRIP_WINDOW) {
      this.roundTripTimes.shift();
    }
    this.stats.avgRoundTripTime =
      this.roundTripTimes.reduce((sum, time) => sum + time, 0) / this.roundTripTimes.length;
  }

  private initializeStats(): HeartbeatStats {
    return {
      pingsSent: 0,
      pongsReceived: 0,
      heartbeatTimeouts: 0,
      lastPingTime: undefined,
      lastPongTime: undefined,
      avgRoundTripTime: 0
    };
  }
}
