/**
 * DexScreener 二进制协议解码接口定义
 *
 * 定义帧、分块、字段解码结果以及每个分块的解码结果 (DecodeOutcome)
 */

import { DecodedRecord } from '../types';

// ============================================================================
// 协议版本与消息类型
// ============================================================================

export enum ProtocolVersion {
  /** 1.3.0: 仅 pairs 消息，1 字节长度前缀 */
  LEGACY = 'legacy',
  /** 2.0.0: 支持 ohlc / profiles 消息，可变宽度长度前缀 */
  ENHANCED = 'enhanced'
}

/** 帧头签名: 0x00 0x0A <版本号> 0x0A */
export const FRAME_SIGNATURE = Buffer.from([0x00, 0x0a]);

export const VERSION_TAGS: ReadonlyMap<string, ProtocolVersion> = new Map([
  ['1.3.0', ProtocolVersion.LEGACY],
  ['2.0.0', ProtocolVersion.ENHANCED]
]);

/** 版本号最大长度 (含结束符前的字节) */
export const MAX_VERSION_TAG_LENGTH = 16;

/** pairs 消息固定分块大小 */
export const PAIR_CHUNK_SIZE = 512;

/** pairs 分块中的字符串字段数量 */
export const PAIR_STRING_FIELDS = 9;

/** pairs 分块中的 double 数量 */
export const PAIR_METRIC_COUNT = 8;

/** OHLC 分块中的 double 数量 */
export const OHLC_METRIC_COUNT = 6;

/** 合法时间戳上限 (2100-01-01, 秒) */
export const MAX_TIMESTAMP_SECONDS = 4102444800;

export enum MessageType {
  PAIRS = 'pairs',
  OHLC = 'ohlc',
  PROFILES = 'profiles'
}

/**
 * 消息类型标签，由 MessageDecoder 选定一次，下游不再重新判断
 */
export type MessageKind =
  | { type: MessageType.PAIRS; chunkSize: number }
  | { type: MessageType.OHLC }
  | { type: MessageType.PROFILES };

/**
 * 解析后的帧头
 */
export interface FrameHeader {
  version: ProtocolVersion;
  kind: MessageKind;
  /** 帧内声明的记录数，仅作参考 */
  declaredCount: number;
  /** payload 在帧中的起始偏移 */
  payloadOffset: number;
}

// ============================================================================
// 解码结果
// ============================================================================

export enum SkipReason {
  TRUNCATED_FIELD = 'truncated_field',
  INVALID_LENGTH = 'invalid_length',
  INVARIANT_VIOLATION = 'invariant_violation',
  UNRECOGNIZED_FRAME = 'unrecognized_frame'
}

export interface DecodedOutcome<R extends DecodedRecord = DecodedRecord> {
  status: 'decoded';
  chunkIndex: number;
  /** 分块在帧中的字节偏移 */
  offset: number;
  record: R;
}

export interface SkippedOutcome {
  status: 'skipped';
  /** 帧级结果 (UNRECOGNIZED_FRAME) 为 -1 */
  chunkIndex: number;
  offset: number;
  reason: SkipReason;
  detail: string;
}

export type DecodeOutcome<R extends DecodedRecord = DecodedRecord> = DecodedOutcome<R> | SkippedOutcome;

/**
 * 字段/分块级解码失败，仅在协议模块内部传播，由 MessageDecoder 转换为 SkippedOutcome
 */
export class ChunkDecodeFailure extends Error {
  constructor(public readonly reason: SkipReason, detail: string) {
    super(detail);
    this.name = 'ChunkDecodeFailure';
  }
}

/**
 * 字段解码结果：值 + 读取后的偏移
 */
export interface FieldRead<T> {
  value: T;
  offset: number;
}

// ============================================================================
// 解码选项
// ============================================================================

export interface StringDecodeOptions {
  /** 长度前缀宽度策略 */
  prefix: 'u8' | 'varwidth';
  /** 声明长度上限 */
  maxLength: number;
}

export interface DecoderOptions {
  /** ENHANCED 帧字符串长度上限 */
  enhancedMaxStringLength: number;
  /** 简介描述截断长度 */
  profileDescriptionCap: number;
  /** 其他简介字符串截断长度 */
  profileStringCap: number;
  /** 网站列表最大数量 */
  maxWebsites: number;
  /** 社交链接最大数量 */
  maxSocials: number;
}

export const LEGACY_MAX_STRING_LENGTH = 100;

export const DEFAULT_DECODER_OPTIONS: DecoderOptions = {
  enhancedMaxStringLength: 1024,
  profileDescriptionCap: 500,
  profileStringCap: 200,
  maxWebsites: 10,
  maxSocials: 20
};

/**
 * 解码统计
 */
export interface DecoderStats {
  framesProcessed: number;
  framesUnrecognized: number;
  recordsDecoded: number;
  chunksSkipped: Record<SkipReason, number>;
  lastDecodedAt: number;
}
