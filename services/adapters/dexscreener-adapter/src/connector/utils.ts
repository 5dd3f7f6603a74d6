/**
 * 连接器工具函数
 */

import { cancellableDelay } from '@dexstream/shared-core';
import { SocketPayload } from './interfaces';

/**
 * 令牌桶速率限制器
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per second

  constructor(maxTokens: number, refillRate: number) {
    this.maxTokens = maxTokens;
    this.refillRate = refillRate;
    this.tokens = maxTokens;
    this.lastRefill = Date.now();
  }

  /**
   * 尝试消费 tokens
   */
  tryConsume(tokens = 1): boolean {
    this.refill();

    if (this.tokens >= tokens) {
      this.tokens -= tokens;
      return true;
    }

    return false;
  }

  /**
   * 获取下次可以消费的时间 (ms)
   */
  getTimeUntilRefill(tokens = 1): number {
    this.refill();

    if (this.tokens >= tokens) {
      return 0;
    }

    const neededTokens = tokens - this.tokens;
    return Math.ceil((neededTokens / this.refillRate) * 1000);
  }

  /**
   * 等待直到可以消费一个 token；signal 触发时以 DelayCancelledError 拒绝
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    while (!this.tryConsume()) {
      await cancellableDelay(this.getTimeUntilRefill(), signal);
    }
  }

  private refill(): void {
    const now = Date.now();
    const timePassed = (now - this.lastRefill) / 1000;
    const tokensToAdd = timePassed * this.refillRate;

    this.tokens = Math.min(this.maxTokens, this.tokens + tokensToAdd);
    this.lastRefill = now;
  }
}

/**
 * 将 ws 消息负载统一为 Buffer
 */
export function toBuffer(data: SocketPayload): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

/**
 * 截断字符串用于日志
 */
export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength - 3) + '...';
}
