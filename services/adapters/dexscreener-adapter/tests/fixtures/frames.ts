/**
 * 二进制帧构造工具
 * 为解码器和连接测试生成 pairs / ohlc / profiles 帧
 */

export type PrefixWidth = 'u8' | 'varwidth';

export interface PairFixture {
  chain: string;
  dexId: string;
  pairAddress: string;
  baseName: string;
  baseSymbol: string;
  baseAddress: string;
  quoteName: string;
  quoteSymbol: string;
  quoteAddress: string;
  /** price, priceUsd, priceChange24h, liquidityUsd, volumeUsd, fdv, pairCreatedAt, reserved */
  metrics: number[];
}

export const DEFAULT_PAIR: PairFixture = {
  chain: 'solana',
  dexId: 'raydium',
  pairAddress: 'PairAddr1111',
  baseName: 'Test Token',
  baseSymbol: 'TEST',
  baseAddress: 'BaseAddr1111',
  quoteName: 'Wrapped SOL',
  quoteSymbol: 'SOL',
  quoteAddress: 'QuoteAddr111',
  metrics: [1.5, 1.5, 12.5, 50000, 120000, 1000000, 1700000000, 0]
};

export function u16le(value: number): Buffer {
  const buf = Buffer.alloc(2);
  buf.writeUInt16LE(value, 0);
  return buf;
}

export function u32le(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32LE(value, 0);
  return buf;
}

export function f64le(values: number[]): Buffer {
  const buf = Buffer.alloc(values.length * 8);
  values.forEach((value, index) => buf.writeDoubleLE(value, index * 8));
  return buf;
}

/**
 * 编码长度前缀字符串
 */
export function encodeString(value: string, prefix: PrefixWidth = 'u8'): Buffer {
  const bytes = Buffer.from(value, 'utf8');
  return Buffer.concat([encodeLength(bytes.length, prefix), bytes]);
}

export function encodeLength(length: number, prefix: PrefixWidth): Buffer {
  if (prefix === 'u8' || length < 0x80) {
    return Buffer.from([length & 0xff]);
  }
  return Buffer.from([0x80 | (length >> 8), length & 0xff]);
}

/**
 * 补零到 8 字节对齐
 */
export function padTo8(buf: Buffer): Buffer {
  const padding = (8 - (buf.length % 8)) % 8;
  return Buffer.concat([buf, Buffer.alloc(padding)]);
}

/**
 * 帧头: 0x00 0x0A <version> 0x0A <keyword> <u32 count>
 */
export function frameHeader(version: string, keyword: string, count: number): Buffer {
  return Buffer.concat([
    Buffer.from([0x00, 0x0a]),
    Buffer.from(version, 'latin1'),
    Buffer.from([0x0a]),
    Buffer.from(keyword, 'ascii'),
    u32le(count)
  ]);
}

/**
 * 构造 512 字节的交易对分块
 */
export function buildPairChunk(overrides: Partial<PairFixture> = {}, prefix: PrefixWidth = 'u8', size = 512): Buffer {
  const pair = { ...DEFAULT_PAIR, ...overrides };
  const strings = Buffer.concat([
    pair.chain,
    pair.dexId,
    pair.pairAddress,
    pair.baseName,
    pair.baseSymbol,
    pair.baseAddress,
    pair.quoteName,
    pair.quoteSymbol,
    pair.quoteAddress
  ].map(value => encodeString(value, prefix)));

  const body = Buffer.concat([padTo8(strings), f64le(pair.metrics)]);
  if (body.length > size) {
    throw new Error(`pair fixture exceeds ${size} bytes`);
  }
  return Buffer.concat([body, Buffer.alloc(size - body.length)]);
}

export function buildPairsFrame(chunks: Buffer[], version = '1.3.0', declaredCount = chunks.length): Buffer {
  return Buffer.concat([frameHeader(version, 'pairs', declaredCount), ...chunks]);
}

/**
 * 构造 OHLC 分块体: symbol, 对齐, [timestamp, open, high, low, close, volume]
 */
export function buildOhlcBody(symbol: string, values: number[]): Buffer {
  return Buffer.concat([padTo8(encodeString(symbol, 'varwidth')), f64le(values)]);
}

export interface ProfileFixture {
  symbol: string;
  name: string;
  description: string;
  websites: string[];
  socials: Array<[string, string]>;
}

export function buildProfileBody(profile: ProfileFixture): Buffer {
  return Buffer.concat([
    encodeString(profile.symbol, 'varwidth'),
    encodeString(profile.name, 'varwidth'),
    encodeString(profile.description, 'varwidth'),
    Buffer.from([profile.websites.length]),
    ...profile.websites.map(site => encodeString(site, 'varwidth')),
    Buffer.from([profile.socials.length]),
    ...profile.socials.flatMap(([key, value]) => [encodeString(key, 'varwidth'), encodeString(value, 'varwidth')])
  ]);
}

/**
 * 自定界分块: u16 长度 + 分块体
 */
export function delimited(body: Buffer): Buffer {
  return Buffer.concat([u16le(body.length), body]);
}

export function buildEnhancedFrame(keyword: 'ohlc' | 'profiles' | 'pairs', chunks: Buffer[], declaredCount = chunks.length): Buffer {
  return Buffer.concat([frameHeader('2.0.0', keyword, declaredCount), ...chunks]);
}
