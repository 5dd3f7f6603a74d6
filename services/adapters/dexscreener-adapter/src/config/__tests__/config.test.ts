/**
 * 适配器配置单元测试
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  buildStreamUrl,
  createDefaultConfig,
  createDefaultQuery,
  getEnvironmentConfig,
  QUERY_PRESETS,
  StreamQuery,
  toConnectionManagerConfig
} from '../index';
import { validateConfig, validateConfigOrThrow } from '../validator';
import { AdapterConfigManager, loadAdapterConfig } from '../manager';
import { Chain, ConfigurationError, DexId, RankBy, SortOrder, Timeframe } from '../../types';

const ENDPOINT = 'wss://io.dexscreener.com/dex/screener/v5/pairs';

describe('查询与 URL 构造', () => {
  it('默认查询应该生成热门 Solana 交易对 URL', () => {
    expect(buildStreamUrl(createDefaultQuery())).toBe(
      `${ENDPOINT}/h24/1?rankBy[key]=trendingScoreH6&rankBy[order]=desc&filters[chainIds][0]=solana`
    );
  });

  it('应该按固定顺序输出筛选参数', () => {
    const query: StreamQuery = {
      timeframe: Timeframe.H6,
      rankBy: RankBy.LIQUIDITY,
      order: SortOrder.ASC,
      filters: {
        chainIds: [Chain.ETHEREUM, Chain.BASE],
        dexIds: [DexId.UNISWAP_V3],
        marketCap: { min: 1000 },
        fdv: { max: 1000000 },
        priceChange: { h6: { min: -5, max: 50 } },
        pairAge: { min: 1, max: 48 },
        liquidity: { min: 5000 },
        enhancedTokenInfo: true,
        activeBoostsMin: 1
      }
    };

    expect(buildStreamUrl(query, 'wss://stream.test/pairs/')).toBe(
      'wss://stream.test/pairs/h6/1?rankBy[key]=liquidity&rankBy[order]=asc'
      + '&filters[chainIds][0]=ethereum&filters[chainIds][1]=base'
      + '&filters[dexIds][0]=uniswapv3'
      + '&filters[liquidity][min]=5000'
      + '&filters[pairAge][min]=1&filters[pairAge][max]=48'
      + '&filters[priceChange][h6][min]=-5&filters[priceChange][h6][max]=50'
      + '&filters[fdv][max]=1000000'
      + '&filters[marketCap][min]=1000'
      + '&filters[enhancedTokenInfo]=true&filters[activeBoosts][min]=1'
    );
  });

  it('涨幅预设应该包含流动性、成交量和成交笔数筛选', () => {
    expect(buildStreamUrl(QUERY_PRESETS.gainers(Chain.BASE))).toBe(
      `${ENDPOINT}/h1/1?rankBy[key]=priceChangeH24&rankBy[order]=desc`
      + '&filters[chainIds][0]=base&filters[liquidity][min]=25000'
      + '&filters[volume][h24][min]=10000&filters[txns][h24][min]=50'
    );
  });

  it('launchpad 预设应该附带 launchpad 参数', () => {
    expect(buildStreamUrl(QUERY_PRESETS.pumpfunTrending())).toBe(
      `${ENDPOINT}/h1/1?rankBy[key]=trendingScoreH6&rankBy[order]=desc`
      + '&filters[chainIds][0]=solana&filters[dexIds][0]=pumpfun'
      + '&maxAge=3&profile=1&maxLaunchpadProgress=99.99'
    );
  });

  it('其他预设应该设置对应的排序和筛选', () => {
    expect(QUERY_PRESETS.topVolume().filters).toEqual({
      chainIds: [Chain.SOLANA],
      dexIds: [],
      liquidity: { min: 25000 },
      txns: { h24: { min: 50 } }
    });
    expect(QUERY_PRESETS.newPairs(Chain.BSC, 6).filters.pairAge).toEqual({ max: 6 });
    expect(QUERY_PRESETS.topTransactions().rankBy).toBe(RankBy.TRANSACTIONS);
    expect(QUERY_PRESETS.boostedOnly().filters.activeBoostsMin).toBe(1);
    expect(QUERY_PRESETS.trending(Chain.POLYGON, Timeframe.M5).timeframe).toBe(Timeframe.M5);
  });
});

describe('环境预设', () => {
  it('应该按环境返回预设配置', () => {
    expect(getEnvironmentConfig('testing').retry.maxRetries).toBe(3);
    expect(getEnvironmentConfig('production').retry.jitter).toBe(true);
    expect(getEnvironmentConfig('development').logging).toEqual({ level: 'debug', format: 'text' });
    expect(getEnvironmentConfig('staging').environment).toBe('development');
  });

  it('应该转换为连接管理器配置', () => {
    expect(toConnectionManagerConfig(createDefaultConfig())).toEqual({
      url: `${ENDPOINT}/h24/1?rankBy[key]=trendingScoreH6&rankBy[order]=desc&filters[chainIds][0]=solana`,
      connectTimeout: 10000,
      heartbeat: { interval: 20000, timeout: 30000 },
      reconnect: { initialDelay: 1000, maxDelay: 60000, backoffMultiplier: 2, maxRetries: 5, jitter: false },
      rateLimit: { requestsPerSecond: 4, burst: 4 }
    });
  });
});

describe('validateConfig', () => {
  it('默认配置应该通过验证且没有警告', () => {
    expect(validateConfig(createDefaultConfig())).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('应该报告结构错误的字段路径', () => {
    const config = createDefaultConfig();
    config.retry.maxRetries = 0;

    const result = validateConfig(config);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{
      field: 'retry.maxRetries',
      message: '"retry.maxRetries" must be greater than or equal to 1',
      value: 0
    }]);
  });

  it('应该拒绝非 WebSocket 端点和未知链', () => {
    const config = {
      ...createDefaultConfig(),
      endpoint: 'https://io.dexscreener.com',
      query: { ...createDefaultQuery(), filters: { chainIds: ['tron'], dexIds: [] } }
    };

    const fields = validateConfig(config).errors.map(error => error.field);

    expect(fields).toEqual(['endpoint', 'query.filters.chainIds.0']);
  });

  it('应该检查跨字段约束', () => {
    const config = createDefaultConfig();
    config.retry.maxDelay = 500;
    config.query.filters.liquidity = { min: 10, max: 5 };

    expect(validateConfig(config).errors).toEqual([
      { field: 'retry.maxDelay', message: 'maxDelay must not be less than initialDelay', value: 500 },
      { field: 'query.filters.liquidity', message: 'min 10 exceeds max 5', value: { min: 10, max: 5 } }
    ]);
  });

  it('应该对可疑配置给出警告', () => {
    const config = createDefaultConfig();
    config.environment = 'production';
    config.logging.level = 'debug';
    config.rateLimit.requestsPerSecond = 20;

    const result = validateConfig(config);

    expect(result.valid).toBe(true);
    expect(result.warnings.map(warning => warning.field)).toEqual(['rateLimit.requestsPerSecond', 'logging.level']);
  });

  it('validateConfigOrThrow 应该抛出 ConfigurationError', () => {
    const config = createDefaultConfig();
    config.retry.maxDelay = 500;

    expect(() => validateConfigOrThrow(config)).toThrow(ConfigurationError);
    expect(() => validateConfigOrThrow(config)).toThrow(
      'Configuration validation failed: retry.maxDelay: maxDelay must not be less than initialDelay'
    );
  });
});

describe('AdapterConfigManager', () => {
  let tmpDir: string;
  let missingFile: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dexstream-adapter-config-'));
    missingFile = path.join(tmpDir, 'missing.yaml');
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('应该加载环境预设', async () => {
    const manager = new AdapterConfigManager({ environment: 'testing', configPath: missingFile, env: {} });
    const result = await manager.load();

    expect(result.hasValidationErrors).toBe(false);
    expect(result.config.environment).toBe('testing');
    expect(result.config.retry.maxRetries).toBe(3);
    expect(result.sources).toEqual([{ type: 'default', source: 'default', priority: 1 }]);
  });

  it('应该从 NODE_ENV 选择环境', async () => {
    const manager = new AdapterConfigManager({ configPath: missingFile, env: { NODE_ENV: 'production' } });
    const result = await manager.load();

    expect(result.config.environment).toBe('production');
    expect(result.config.retry.jitter).toBe(true);
  });

  it('应该应用 DEXSTREAM_* 环境变量', async () => {
    const manager = new AdapterConfigManager({
      environment: 'development',
      configPath: missingFile,
      env: {
        DEXSTREAM_MAX_RETRIES: '8',
        DEXSTREAM_CHAINS: '["base","bsc"]',
        DEXSTREAM_JITTER: 'true',
        DEXSTREAM_LOG_LEVEL: 'warn'
      }
    });
    const result = await manager.load();

    expect(result.hasValidationErrors).toBe(false);
    expect(result.config.retry.maxRetries).toBe(8);
    expect(result.config.retry.jitter).toBe(true);
    expect(result.config.query.filters.chainIds).toEqual(['base', 'bsc']);
    expect(result.config.logging.level).toBe('warn');
  });

  it('应该合并 YAML 配置文件并生成连接配置', async () => {
    const file = path.join(tmpDir, 'adapter.yaml');
    fs.writeFileSync(file, [
      'query:',
      '  timeframe: h6',
      '  filters:',
      '    chainIds: [ethereum]',
      'rateLimit:',
      '  requestsPerSecond: 2',
      ''
    ].join('\n'));

    const manager = new AdapterConfigManager({ environment: 'production', configPath: file, env: {} });
    const result = await manager.load();

    expect(result.config.rateLimit).toEqual({ requestsPerSecond: 2, burst: 4 });
    expect(manager.getConnectionConfig().url).toBe(
      `${ENDPOINT}/h6/1?rankBy[key]=trendingScoreH6&rankBy[order]=desc&filters[chainIds][0]=ethereum`
    );
  });

  it('应该记录验证错误和警告', async () => {
    const invalid = new AdapterConfigManager({ configPath: missingFile, env: { DEXSTREAM_MAX_RETRIES: '0' } });
    const result = await invalid.load();

    expect(result.hasValidationErrors).toBe(true);
    expect(result.validationErrors).toEqual(['retry.maxRetries: "retry.maxRetries" must be greater than or equal to 1']);

    const noisy = new AdapterConfigManager({ configPath: missingFile, env: { DEXSTREAM_RATE_LIMIT: '20' } });
    await noisy.load();
    expect(noisy.getWarnings().map(warning => warning.field)).toEqual(['rateLimit.requestsPerSecond']);
  });

  it('加载前获取连接配置应该抛出异常', () => {
    const manager = new AdapterConfigManager({ configPath: missingFile, env: {} });

    expect(() => manager.getConnectionConfig()).toThrow('Configuration not loaded');
  });

  it('loadAdapterConfig 应该在验证失败时抛出 ConfigurationError', async () => {
    await expect(loadAdapterConfig({ configPath: missingFile, env: { DEXSTREAM_MAX_DELAY: '10' } }))
      .rejects.toBeInstanceOf(ConfigurationError);
  });
});
