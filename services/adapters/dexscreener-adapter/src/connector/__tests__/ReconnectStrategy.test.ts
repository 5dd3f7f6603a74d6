/**
 * Unit Tests for ReconnectStrategy
 */

import { ReconnectStrategy } from '../ReconnectStrategy';
import { ReconnectConfig } from '../interfaces';

const BASE_CONFIG: ReconnectConfig = {
  initialDelay: 1000,
  maxDelay: 60000,
  backoffMultiplier: 2,
  maxRetries: 5,
  jitter: false
};

describe('ReconnectStrategy', () => {
  describe('退避延迟', () => {
    it('应该按指数增长', () => {
      const strategy = new ReconnectStrategy(BASE_CONFIG);

      expect([1, 2, 3, 4, 5].map(attempt => strategy.getDelay(attempt))).toEqual([1000, 2000, 4000, 8000, 16000]);
    });

    it('应该不超过最大延迟', () => {
      const strategy = new ReconnectStrategy({ ...BASE_CONFIG, maxDelay: 5000 });

      expect(strategy.getDelay(3)).toBe(4000);
      expect(strategy.getDelay(4)).toBe(5000);
      expect(strategy.getDelay(30)).toBe(5000);
    });

    it('关闭抖动时延迟随失败次数单调不减', () => {
      const strategy = new ReconnectStrategy({ ...BASE_CONFIG, maxDelay: 20000, maxRetries: 50 });
      const delays: number[] = [];

      for (let i = 0; i < 40; i++) {
        strategy.recordFailure();
        delays.push(strategy.getNextDelay());
      }

      for (let i = 1; i < delays.length; i++) {
        expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1]);
      }
      expect(delays[delays.length - 1]).toBe(20000);
    });

    it('开启抖动时应该在 ±25% 范围内', () => {
      const low = new ReconnectStrategy({ ...BASE_CONFIG, jitter: true }, () => 0);
      const high = new ReconnectStrategy({ ...BASE_CONFIG, jitter: true }, () => 1);

      expect(low.getDelay(3)).toBe(3000);
      expect(high.getDelay(3)).toBe(5000);
    });
  });

  describe('重试次数', () => {
    it('连续失败达到上限后不再重连', () => {
      const strategy = new ReconnectStrategy({ ...BASE_CONFIG, maxRetries: 3 });

      expect(strategy.recordFailure()).toBe(1);
      expect(strategy.shouldReconnect()).toBe(true);
      expect(strategy.recordFailure()).toBe(2);
      expect(strategy.shouldReconnect()).toBe(true);
      expect(strategy.recordFailure()).toBe(3);
      expect(strategy.shouldReconnect()).toBe(false);
    });

    it('reset 后应该从初始延迟重新开始', () => {
      const strategy = new ReconnectStrategy(BASE_CONFIG);
      strategy.recordFailure();
      strategy.recordFailure();
      strategy.recordFailure();
      expect(strategy.getNextDelay()).toBe(4000);

      strategy.reset();

      expect(strategy.getStats().attempts).toBe(0);
      expect(strategy.getStats().currentDelay).toBe(1000);
      strategy.recordFailure();
      expect(strategy.getNextDelay()).toBe(1000);
    });
  });

  describe('累计等待', () => {
    it('应该估算耗尽全部尝试的累计等待时间', () => {
      const strategy = new ReconnectStrategy(BASE_CONFIG);

      // 5 次尝试之间有 4 次等待: 1000 + 2000 + 4000 + 8000
      expect(strategy.estimateTotalBackoff()).toBe(15000);
    });
  });
});
