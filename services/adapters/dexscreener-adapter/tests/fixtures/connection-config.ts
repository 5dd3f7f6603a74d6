/**
 * 测试用连接配置
 */

import { ConnectionManagerConfig } from '../../src/connector';

export const TEST_STREAM_URL = 'wss://stream.test/dex/screener/pairs/h24/1';

export function createConnectionConfig(overrides: Partial<ConnectionManagerConfig> = {}): ConnectionManagerConfig {
  return {
    url: TEST_STREAM_URL,
    connectTimeout: 500,
    heartbeat: { interval: 20000, timeout: 5000 },
    reconnect: { initialDelay: 1000, maxDelay: 60000, backoffMultiplier: 2, maxRetries: 5, jitter: false },
    rateLimit: { requestsPerSecond: 4, burst: 4 },
    ...overrides
  };
}
