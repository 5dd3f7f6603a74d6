/**
 * DexScreener WebSocket 重连策略实现
 *
 * 功能:
 * - 指数退避: delay(n) = min(initialDelay × multiplier^(n-1), maxDelay)
 * - 可选随机抖动 (默认关闭，保证延迟随失败次数单调不减)
 * - 连续失败计数，进入 Connected 后立即重置
 * - 达到最大尝试次数后不再重连
 */

import { ReconnectConfig, ReconnectStats } from './interfaces';

/** 抖动幅度 ±25% */
const JITTER_RATIO = 0.25;
const MIN_JITTERED_DELAY = 100;

export class ReconnectStrategy {
  private readonly config: ReconnectConfig;
  private attempts = 0;
  private lastAttemptTime = 0;
  private currentDelay: number;
  private readonly random: () => number;

  constructor(config: ReconnectConfig, random: () => number = Math.random) {
    this.config = { ...config };
    this.currentDelay = config.initialDelay;
    this.random = random;
  }

  /**
   * 记录一次失败的连接尝试，返回当前连续失败次数
   */
  public recordFailure(): number {
    this.attempts++;
    this.lastAttemptTime = Date.now();
    return this.attempts;
  }

  /**
   * 是否还允许下一次连接尝试
   */
  public shouldReconnect(): boolean {
    return this.attempts < this.config.maxRetries;
  }

  /**
   * 计算第 attempt 次失败后的退避延迟
   */
  public getDelay(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    let delay = Math.min(
      this.config.initialDelay * Math.pow(this.config.backoffMultiplier, exponent),
      this.config.maxDelay
    );

    if (this.config.jitter) {
      const jitterRange = delay * JITTER_RATIO;
      const jitter = (this.random() - 0.5) * 2 * jitterRange;
      delay = Math.max(MIN_JITTERED_DELAY, delay + jitter);
    }

    return Math.round(delay);
  }

  /**
   * 按当前失败次数计算下次重连延迟
   */
  public getNextDelay(): number {
    this.currentDelay = this.getDelay(this.attempts);
    return this.currentDelay;
  }

  /**
   * 连接成功后重置计数器
   */
  public reset(): void {
    this.attempts = 0;
    this.currentDelay = this.config.initialDelay;
  }

  /**
   * 获取重连统计信息
   */
  public getStats(): ReconnectStats {
    return {
      attempts: this.attempts,
      lastAttemptTime: this.lastAttemptTime,
      nextRetryTime: this.lastAttemptTime + this.currentDelay,
      currentDelay: this.currentDelay
    };
  }

  /**
   * 估算耗尽全部尝试所需的累计等待时间 (不含抖动)
   */
  public estimateTotalBackoff(): number {
    let total = 0;
    for (let attempt = 1; attempt < this.config.maxRetries; attempt++) {
      total += Math.min(
        this.config.initialDelay * Math.pow(this.config.backoffMultiplier, attempt - 1),
        this.config.maxDelay
      );
    }
    return total;
  }
}
