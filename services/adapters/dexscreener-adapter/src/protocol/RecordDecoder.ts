/**
 * 记录解码器
 *
 * 每个分块按固定阶段推进:
 *   READ_HEADER → READ_STRINGS → ALIGN → READ_METRICS → VALIDATE → 输出 / 丢弃
 *
 * 字符串为变长字段，决定数值块的起始偏移，因此先读字符串，对齐后再读数值块。
 * 任一阶段失败都以 ChunkDecodeFailure 的形式转换为跳过结果，不影响同帧其他分块。
 */

import {
  ChunkDecodeFailure,
  DecoderOptions,
  DEFAULT_DECODER_OPTIONS,
  LEGACY_MAX_STRING_LENGTH,
  MAX_TIMESTAMP_SECONDS,
  MessageKind,
  MessageType,
  OHLC_METRIC_COUNT,
  PAIR_CHUNK_SIZE,
  PAIR_METRIC_COUNT,
  PAIR_STRING_FIELDS,
  ProtocolVersion,
  SkipReason,
  StringDecodeOptions
} from './interfaces';
import {
  alignTo8,
  decodeAlignedF64Block,
  decodeLengthPrefixedString,
  readU8,
  sanitizeDouble,
  sanitizeText
} from './FieldDecoders';
import {
  DecodedRecord,
  OHLCRecord,
  RecordKind,
  TokenProfileRecord,
  TradingPairRecord
} from '../types';

export enum DecodeStage {
  READ_HEADER = 'read_header',
  READ_STRINGS = 'read_strings',
  ALIGN = 'align',
  READ_METRICS = 'read_metrics',
  VALIDATE = 'validate'
}

export type RecordResult<R extends DecodedRecord = DecodedRecord> =
  | { ok: true; record: R }
  | { ok: false; reason: SkipReason; detail: string; stage: DecodeStage };

export class RecordDecoder {
  private readonly options: DecoderOptions;

  constructor(options: Partial<DecoderOptions> = {}) {
    this.options = { ...DEFAULT_DECODER_OPTIONS, ...options };
  }

  /**
   * 按消息类型解码一个分块，不抛出异常
   */
  public decode(kind: MessageKind, chunk: Buffer, version: ProtocolVersion): RecordResult {
    switch (kind.type) {
      case MessageType.PAIRS:
        return this.decodePair(chunk, version, kind.chunkSize);
      case MessageType.OHLC:
        return this.decodeOhlc(chunk);
      case MessageType.PROFILES:
        return this.decodeProfile(chunk);
    }
  }

  /**
   * 解码固定大小的交易对分块
   */
  public decodePair(
    chunk: Buffer,
    version: ProtocolVersion,
    chunkSize: number = PAIR_CHUNK_SIZE
  ): RecordResult<TradingPairRecord> {
    const run = new StageRunner();

    return run.guard(() => {
      run.enter(DecodeStage.READ_HEADER);
      if (chunk.length !== chunkSize) {
        throw new ChunkDecodeFailure(
          SkipReason.TRUNCATED_FIELD,
          `pair chunk has ${chunk.length} bytes, expected ${chunkSize}`
        );
      }

      run.enter(DecodeStage.READ_STRINGS);
      const stringOptions = this.stringOptions(version);
      const strings: string[] = [];
      let offset = 0;
      for (let i = 0; i < PAIR_STRING_FIELDS; i++) {
        const read = decodeLengthPrefixedString(chunk, offset, stringOptions, PAIR_FIELD_NAMES[i]);
        strings.push(sanitizeText(read.value));
        offset = read.offset;
      }

      run.enter(DecodeStage.ALIGN);
      offset = alignTo8(offset);

      run.enter(DecodeStage.READ_METRICS);
      const metrics = decodeAlignedF64Block(chunk, offset, PAIR_METRIC_COUNT).value.map(sanitizeDouble);

      run.enter(DecodeStage.VALIDATE);
      const [chain, dexId, pairAddress, baseName, baseSymbol, baseAddress, quoteName, quoteSymbol, quoteAddress] = strings;
      const [price, priceUsd, priceChange24h, liquidityUsd, volumeUsd, fdv, createdAt, reserved] = metrics;

      const record: TradingPairRecord = {
        kind: RecordKind.TRADING_PAIR,
        chain,
        dexId,
        pairAddress,
        baseToken: { name: baseName, symbol: baseSymbol, address: baseAddress },
        quoteToken: { name: quoteName, symbol: quoteSymbol, address: quoteAddress },
        price,
        priceUsd,
        priceChange24h,
        liquidityUsd,
        volumeUsd,
        fdv,
        pairCreatedAt: normalizeTimestamp(createdAt),
        reserved
      };

      validatePair(record);
      return record;
    });
  }

  /**
   * 解码 OHLC 分块 (不含 u16 长度头)
   */
  public decodeOhlc(body: Buffer): RecordResult<OHLCRecord> {
    const run = new StageRunner();

    return run.guard(() => {
      run.enter(DecodeStage.READ_HEADER);
      assertNonEmptyBody(body);

      run.enter(DecodeStage.READ_STRINGS);
      const symbol = decodeLengthPrefixedString(body, 0, this.stringOptions(ProtocolVersion.ENHANCED), 'symbol');

      run.enter(DecodeStage.ALIGN);
      const offset = alignTo8(symbol.offset);

      run.enter(DecodeStage.READ_METRICS);
      const [timestamp, open, high, low, close, volume] = decodeAlignedF64Block(body, offset, OHLC_METRIC_COUNT).value;

      run.enter(DecodeStage.VALIDATE);
      const record: OHLCRecord = {
        kind: RecordKind.OHLC,
        symbol: sanitizeText(symbol.value, this.options.profileStringCap),
        timestamp,
        open,
        high,
        low,
        close,
        volume
      };

      validateOhlc(record);
      return record;
    });
  }

  /**
   * 解码代币简介分块 (不含 u16 长度头)
   */
  public decodeProfile(body: Buffer): RecordResult<TokenProfileRecord> {
    const run = new StageRunner();

    return run.guard(() => {
      run.enter(DecodeStage.READ_HEADER);
      assertNonEmptyBody(body);

      run.enter(DecodeStage.READ_STRINGS);
      const opts = this.stringOptions(ProtocolVersion.ENHANCED);
      const cap = this.options.profileStringCap;

      const symbol = decodeLengthPrefixedString(body, 0, opts, 'symbol');
      const name = decodeLengthPrefixedString(body, symbol.offset, opts, 'name');
      const description = decodeLengthPrefixedString(body, name.offset, opts, 'description');

      const websiteCount = readU8(body, description.offset, 'website count');
      let offset = websiteCount.offset;
      const websites: string[] = [];
      for (let i = 0; i < websiteCount.value; i++) {
        const website = decodeLengthPrefixedString(body, offset, opts, `website[${i}]`);
        offset = website.offset;
        const url = sanitizeText(website.value, cap);
        if (url && websites.length < this.options.maxWebsites) {
          websites.push(url);
        }
      }

      const socialCount = readU8(body, offset, 'social count');
      offset = socialCount.offset;
      const socials: Record<string, string> = {};
      let socialsKept = 0;
      for (let i = 0; i < socialCount.value; i++) {
        const key = decodeLengthPrefixedString(body, offset, opts, `social[${i}].key`);
        const value = decodeLengthPrefixedString(body, key.offset, opts, `social[${i}].value`);
        offset = value.offset;

        const socialKey = sanitizeText(key.value, cap);
        if (socialKey && socialsKept < this.options.maxSocials) {
          socials[socialKey] = sanitizeText(value.value, cap);
          socialsKept++;
        }
      }

      run.enter(DecodeStage.VALIDATE);
      const record: TokenProfileRecord = {
        kind: RecordKind.TOKEN_PROFILE,
        symbol: sanitizeText(symbol.value, cap),
        name: sanitizeText(name.value, cap),
        description: sanitizeText(description.value, this.options.profileDescriptionCap),
        websites,
        socials
      };

      if (!record.symbol && !record.name) {
        throw new ChunkDecodeFailure(SkipReason.INVARIANT_VIOLATION, 'profile has neither symbol nor name');
      }
      return record;
    });
  }

  private stringOptions(version: ProtocolVersion): StringDecodeOptions {
    return version === ProtocolVersion.LEGACY
      ? { prefix: 'u8', maxLength: LEGACY_MAX_STRING_LENGTH }
      : { prefix: 'varwidth', maxLength: this.options.enhancedMaxStringLength };
  }
}

// ============================================================================
// 内部工具
// ============================================================================

const PAIR_FIELD_NAMES = [
  'chain',
  'dexId',
  'pairAddress',
  'baseToken.name',
  'baseToken.symbol',
  'baseToken.address',
  'quoteToken.name',
  'quoteToken.symbol',
  'quoteToken.address'
];

/**
 * 跟踪当前阶段，并将异常转换为跳过结果
 */
class StageRunner {
  private stage = DecodeStage.READ_HEADER;

  enter(stage: DecodeStage): void {
    this.stage = stage;
  }

  guard<R extends DecodedRecord>(body: () => R): RecordResult<R> {
    try {
      return { ok: true, record: body() };
    } catch (error) {
      if (error instanceof ChunkDecodeFailure) {
        return { ok: false, reason: error.reason, detail: error.message, stage: this.stage };
      }
      if (error instanceof RangeError) {
        return { ok: false, reason: SkipReason.TRUNCATED_FIELD, detail: error.message, stage: this.stage };
      }
      return {
        ok: false,
        reason: SkipReason.INVARIANT_VIOLATION,
        detail: error instanceof Error ? error.message : String(error),
        stage: this.stage
      };
    }
  }
}

function assertNonEmptyBody(body: Buffer): void {
  if (body.length === 0) {
    throw new ChunkDecodeFailure(SkipReason.INVALID_LENGTH, 'chunk body is empty');
  }
}

/**
 * 超出 [0, 2100-01-01) 的创建时间视为未知
 */
function normalizeTimestamp(value: number | null): number | null {
  if (value === null || value < 0 || value >= MAX_TIMESTAMP_SECONDS) {
    return null;
  }
  return value;
}

function validatePair(record: TradingPairRecord): void {
  if (!record.pairAddress) {
    throw new ChunkDecodeFailure(SkipReason.INVARIANT_VIOLATION, 'pairAddress is empty');
  }
  if (!record.baseToken.address) {
    throw new ChunkDecodeFailure(SkipReason.INVARIANT_VIOLATION, 'baseToken.address is empty');
  }

  const nonNegative: Array<[string, number | null]> = [
    ['price', record.price],
    ['priceUsd', record.priceUsd],
    ['liquidityUsd', record.liquidityUsd],
    ['volumeUsd', record.volumeUsd],
    ['fdv', record.fdv]
  ];
  for (const [field, value] of nonNegative) {
    if (value !== null && value < 0) {
      throw new ChunkDecodeFailure(SkipReason.INVARIANT_VIOLATION, `${field} is negative: ${value}`);
    }
  }

  const signals = [record.price, record.priceUsd, record.volumeUsd, record.liquidityUsd];
  if (!signals.some(value => value !== null && value !== 0)) {
    throw new ChunkDecodeFailure(SkipReason.INVARIANT_VIOLATION, 'no price, volume or liquidity present');
  }
}

function validateOhlc(record: OHLCRecord): void {
  const fields: Array<[string, number]> = [
    ['timestamp', record.timestamp],
    ['open', record.open],
    ['high', record.high],
    ['low', record.low],
    ['close', record.close],
    ['volume', record.volume]
  ];
  for (const [field, value] of fields) {
    if (!Number.isFinite(value)) {
      throw new ChunkDecodeFailure(SkipReason.INVARIANT_VIOLATION, `${field} is not finite`);
    }
  }

  if (!record.symbol) {
    throw new ChunkDecodeFailure(SkipReason.INVARIANT_VIOLATION, 'symbol is empty');
  }
  if (record.timestamp < 0 || record.timestamp >= MAX_TIMESTAMP_SECONDS) {
    throw new ChunkDecodeFailure(SkipReason.INVARIANT_VIOLATION, `timestamp out of range: ${record.timestamp}`);
  }
  if (record.volume < 0) {
    throw new ChunkDecodeFailure(SkipReason.INVARIANT_VIOLATION, `volume is negative: ${record.volume}`);
  }
  if (record.high < Math.max(record.open, record.close)) {
    throw new ChunkDecodeFailure(
      SkipReason.INVARIANT_VIOLATION,
      `high ${record.high} below max(open, close) ${Math.max(record.open, record.close)}`
    );
  }
  if (record.low > Math.min(record.open, record.close)) {
    throw new ChunkDecodeFailure(
      SkipReason.INVARIANT_VIOLATION,
      `low ${record.low} above min(open, close) ${Math.min(record.open, record.close)}`
    );
  }
}
