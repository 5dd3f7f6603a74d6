/**
 * DexScreener 消息解码器
 *
 * 功能:
 * - 校验帧头签名与协议版本
 * - 识别消息类型 (pairs / ohlc / profiles)，选定一次后不再判断
 * - 将 payload 切分为分块: pairs 按固定步长切分，ohlc / profiles 读取 u16 长度自定界
 * - 逐块调用 RecordDecoder，单块失败只产生跳过结果
 */

import { Logger } from '@dexstream/shared-core';
import {
  DecodeOutcome,
  DecoderOptions,
  DecoderStats,
  FRAME_SIGNATURE,
  FrameHeader,
  MAX_VERSION_TAG_LENGTH,
  MessageKind,
  MessageType,
  PAIR_CHUNK_SIZE,
  ProtocolVersion,
  SkipReason,
  SkippedOutcome,
  VERSION_TAGS
} from './interfaces';
import { isZeroFilled } from './FieldDecoders';
import { RecordDecoder } from './RecordDecoder';

const MESSAGE_KEYWORDS: ReadonlyArray<[MessageType, Buffer]> = [
  [MessageType.PAIRS, Buffer.from('pairs', 'ascii')],
  [MessageType.OHLC, Buffer.from('ohlc', 'ascii')],
  [MessageType.PROFILES, Buffer.from('profiles', 'ascii')]
];

const NEWLINE = 0x0a;

export type HeaderResult =
  | { ok: true; header: FrameHeader }
  | { ok: false; detail: string };

/**
 * 解析帧头，不抛出异常
 */
export function parseFrameHeader(frame: Buffer): HeaderResult {
  if (frame.length < FRAME_SIGNATURE.length + 1 || !frame.subarray(0, FRAME_SIGNATURE.length).equals(FRAME_SIGNATURE)) {
    return { ok: false, detail: 'bad_signature' };
  }

  const versionStart = FRAME_SIGNATURE.length;
  const searchEnd = Math.min(frame.length, versionStart + MAX_VERSION_TAG_LENGTH + 1);
  const versionEnd = frame.subarray(versionStart, searchEnd).indexOf(NEWLINE);
  if (versionEnd <= 0) {
    return { ok: false, detail: 'bad_signature: missing version tag' };
  }

  const tag = frame.toString('latin1', versionStart, versionStart + versionEnd);
  const version = VERSION_TAGS.get(tag);
  if (version === undefined) {
    return { ok: false, detail: `unknown_version: ${tag}` };
  }

  const bodyStart = versionStart + versionEnd + 1;
  let found: { type: MessageType; index: number; length: number } | null = null;
  for (const [type, keyword] of MESSAGE_KEYWORDS) {
    const index = frame.indexOf(keyword, bodyStart);
    if (index >= 0 && (found === null || index < found.index)) {
      found = { type, index, length: keyword.length };
    }
  }

  if (found === null) {
    return { ok: false, detail: 'unknown_message_type' };
  }
  if (version === ProtocolVersion.LEGACY && found.type !== MessageType.PAIRS) {
    return { ok: false, detail: `unsupported_message_type: ${found.type} in legacy frame` };
  }

  const countOffset = found.index + found.length;
  if (countOffset + 4 > frame.length) {
    return { ok: false, detail: 'truncated_header: missing record count' };
  }

  const kind: MessageKind = found.type === MessageType.PAIRS
    ? { type: MessageType.PAIRS, chunkSize: PAIR_CHUNK_SIZE }
    : { type: found.type };

  return {
    ok: true,
    header: {
      version,
      kind,
      declaredCount: frame.readUInt32LE(countOffset),
      payloadOffset: countOffset + 4
    }
  };
}

export class MessageDecoder {
  private readonly recordDecoder: RecordDecoder;
  private readonly logger?: Logger;
  private stats: DecoderStats;

  constructor(options: Partial<DecoderOptions> = {}, logger?: Logger) {
    this.recordDecoder = new RecordDecoder(options);
    this.logger = logger;
    this.stats = this.initializeStats();
  }

  /**
   * 解码一帧，返回按分块顺序排列的结果
   */
  public decode(frame: Buffer): DecodeOutcome[] {
    this.stats.framesProcessed++;

    const headerResult = parseFrameHeader(frame);
    if (!headerResult.ok) {
      this.stats.framesUnrecognized++;
      this.logger?.warn('Discarding unrecognized frame', { detail: headerResult.detail, size: frame.length });
      return [{
        status: 'skipped',
        chunkIndex: -1,
        offset: 0,
        reason: SkipReason.UNRECOGNIZED_FRAME,
        detail: headerResult.detail
      }];
    }

    const { header } = headerResult;
    const outcomes = header.kind.type === MessageType.PAIRS
      ? this.decodeFixedChunks(frame, header, header.kind.chunkSize)
      : this.decodeSelfDelimitedChunks(frame, header);

    const decoded = outcomes.filter(outcome => outcome.status === 'decoded').length;
    if (decoded !== header.declaredCount) {
      this.logger?.debug('Record count differs from frame header', {
        declared: header.declaredCount,
        decoded,
        kind: header.kind.type
      });
    }

    this.recordStats(outcomes);
    return outcomes;
  }

  /**
   * 获取解码统计
   */
  public getStats(): DecoderStats {
    return { ...this.stats, chunksSkipped: { ...this.stats.chunksSkipped } };
  }

  public resetStats(): void {
    this.stats = this.initializeStats();
  }

  /**
   * 固定步长切分，末尾不足一块的非零字节记为截断
   */
  private decodeFixedChunks(frame: Buffer, header: FrameHeader, chunkSize: number): DecodeOutcome[] {
    const outcomes: DecodeOutcome[] = [];
    let offset = header.payloadOffset;
    let chunkIndex = 0;

    while (offset + chunkSize <= frame.length) {
      const chunk = frame.subarray(offset, offset + chunkSize);
      outcomes.push(this.toOutcome(header, chunk, chunkIndex, offset));
      offset += chunkSize;
      chunkIndex++;
    }

    const remainder = frame.subarray(offset);
    if (remainder.length > 0 && !isZeroFilled(remainder)) {
      outcomes.push(skipped(
        chunkIndex,
        offset,
        SkipReason.TRUNCATED_FIELD,
        `trailing partial chunk of ${remainder.length} bytes`
      ));
    }

    return outcomes;
  }

  /**
   * u16 长度自定界切分
   * 长度为 0 → INVALID_LENGTH 并继续；长度越界 → TRUNCATED_FIELD 并停止
   */
  private decodeSelfDelimitedChunks(frame: Buffer, header: FrameHeader): DecodeOutcome[] {
    const outcomes: DecodeOutcome[] = [];
    let offset = header.payloadOffset;
    let chunkIndex = 0;

    while (offset < frame.length) {
      if (isZeroFilled(frame.subarray(offset))) {
        break; // 尾部填充
      }

      if (offset + 2 > frame.length) {
        outcomes.push(skipped(chunkIndex, offset, SkipReason.TRUNCATED_FIELD, 'chunk length prefix truncated'));
        break;
      }

      const length = frame.readUInt16LE(offset);
      if (length === 0) {
        outcomes.push(skipped(chunkIndex, offset, SkipReason.INVALID_LENGTH, 'chunk declares zero length'));
        offset += 2;
        chunkIndex++;
        continue;
      }

      const bodyStart = offset + 2;
      if (bodyStart + length > frame.length) {
        outcomes.push(skipped(
          chunkIndex,
          offset,
          SkipReason.TRUNCATED_FIELD,
          `chunk declares ${length} bytes, only ${frame.length - bodyStart} remain`
        ));
        break;
      }

      outcomes.push(this.toOutcome(header, frame.subarray(bodyStart, bodyStart + length), chunkIndex, offset));
      offset = bodyStart + length;
      chunkIndex++;
    }

    return outcomes;
  }

  private toOutcome(header: FrameHeader, chunk: Buffer, chunkIndex: number, offset: number): DecodeOutcome {
    const result = this.recordDecoder.decode(header.kind, chunk, header.version);
    if (result.ok) {
      return { status: 'decoded', chunkIndex, offset, record: result.record };
    }
    return skipped(chunkIndex, offset, result.reason, `${result.stage}: ${result.detail}`);
  }

  private recordStats(outcomes: DecodeOutcome[]): void {
    for (const outcome of outcomes) {
      if (outcome.status === 'decoded') {
        this.stats.recordsDecoded++;
      } else {
        this.stats.chunksSkipped[outcome.reason]++;
      }
    }
    this.stats.lastDecodedAt = Date.now();
  }

  private initializeStats(): DecoderStats {
    return {
      framesProcessed: 0,
      framesUnrecognized: 0,
      recordsDecoded: 0,
      chunksSkipped: {
        [SkipReason.TRUNCATED_FIELD]: 0,
        [SkipReason.INVALID_LENGTH]: 0,
        [SkipReason.INVARIANT_VIOLATION]: 0,
        [SkipReason.UNRECOGNIZED_FRAME]: 0
      },
      lastDecodedAt: 0
    };
  }
}

function skipped(chunkIndex: number, offset: number, reason: SkipReason, detail: string): SkippedOutcome {
  return { status: 'skipped', chunkIndex, offset, reason, detail };
}
