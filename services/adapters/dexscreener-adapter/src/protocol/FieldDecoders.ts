/**
 * 字段解码器
 *
 * 纯函数，将字节窗口转换为基础值:
 * - 长度前缀字符串 (1 字节或可变宽度前缀)
 * - 8 字节对齐的小端 IEEE-754 double 块
 * - 无符号整数
 *
 * 所有偏移均相对于传入的 buffer 起点；记录解码器传入分块视图，
 * 因此对齐总是相对分块起点计算。
 */

import {
  ChunkDecodeFailure,
  FieldRead,
  SkipReason,
  StringDecodeOptions
} from './interfaces';

// C0/C1 控制字符与 DEL
const CONTROL_CHARS = /[\u0000-\u001F\u007F-\u009F]/g;

/**
 * 将 NaN / ±Infinity 映射为 null (缺失)，其余值原样返回
 */
export function sanitizeDouble(value: number | null): number | null {
  if (value === null || !Number.isFinite(value)) {
    return null;
  }
  return value;
}

/**
 * 向上取整到 8 的倍数
 */
export function alignTo8(offset: number): number {
  return (offset + 7) & ~7;
}

/**
 * 返回 start 处合法 UTF-8 序列的字节数，非法时返回 0
 *
 * 拒绝过长编码、代理区码点和超过 U+10FFFF 的序列。
 */
function utf8SequenceLength(bytes: Buffer, start: number): number {
  const lead = bytes[start];
  let length: number;
  let low = 0x80;
  let high = 0xbf;

  if (lead <= 0x7f) {
    return 1;
  } else if (lead >= 0xc2 && lead <= 0xdf) {
    length = 2;
  } else if (lead >= 0xe0 && lead <= 0xef) {
    length = 3;
    if (lead === 0xe0) {
      low = 0xa0;
    }
    if (lead === 0xed) {
      high = 0x9f;
    }
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    length = 4;
    if (lead === 0xf0) {
      low = 0x90;
    }
    if (lead === 0xf4) {
      high = 0x8f;
    }
  } else {
    return 0;
  }

  if (start + length > bytes.length) {
    return 0;
  }
  // 只有第二个字节的范围受首字节约束
  const second = bytes[start + 1];
  if (second < low || second > high) {
    return 0;
  }
  for (let i = start + 2; i < start + length; i++) {
    if (bytes[i] < 0x80 || bytes[i] > 0xbf) {
      return 0;
    }
  }
  return length;
}

/**
 * UTF-8 解码，逐字节丢弃无法解码的字节
 *
 * 输入中本身编码的 U+FFFD (EF BF BD) 会被保留。
 */
export function decodeUtf8Lossy(bytes: Buffer): string {
  const kept: Buffer[] = [];
  let runStart = 0;
  let offset = 0;

  while (offset < bytes.length) {
    const length = utf8SequenceLength(bytes, offset);
    if (length > 0) {
      offset += length;
      continue;
    }
    if (offset > runStart) {
      kept.push(bytes.subarray(runStart, offset));
    }
    offset++;
    runStart = offset;
  }
  if (runStart === 0) {
    return bytes.toString('utf8');
  }
  if (offset > runStart) {
    kept.push(bytes.subarray(runStart, offset));
  }
  return Buffer.concat(kept).toString('utf8');
}

/**
 * 清理字符串: 去除控制字符、首尾空白，并按码点截断
 */
export function sanitizeText(value: string, cap?: number): string {
  const cleaned = value.replace(CONTROL_CHARS, '').trim();
  if (cap === undefined) {
    return cleaned;
  }
  const codePoints = Array.from(cleaned);
  return codePoints.length > cap ? codePoints.slice(0, cap).join('') : cleaned;
}

export function readU8(buffer: Buffer, offset: number, field = 'u8'): FieldRead<number> {
  if (offset < 0 || offset + 1 > buffer.length) {
    throw new ChunkDecodeFailure(SkipReason.TRUNCATED_FIELD, `${field} at offset ${offset} exceeds ${buffer.length} bytes`);
  }
  return { value: buffer.readUInt8(offset), offset: offset + 1 };
}

export function readU16LE(buffer: Buffer, offset: number, field = 'u16'): FieldRead<number> {
  if (offset < 0 || offset + 2 > buffer.length) {
    throw new ChunkDecodeFailure(SkipReason.TRUNCATED_FIELD, `${field} at offset ${offset} exceeds ${buffer.length} bytes`);
  }
  return { value: buffer.readUInt16LE(offset), offset: offset + 2 };
}

export function readU32LE(buffer: Buffer, offset: number, field = 'u32'): FieldRead<number> {
  if (offset < 0 || offset + 4 > buffer.length) {
    throw new ChunkDecodeFailure(SkipReason.TRUNCATED_FIELD, `${field} at offset ${offset} exceeds ${buffer.length} bytes`);
  }
  return { value: buffer.readUInt32LE(offset), offset: offset + 4 };
}

/**
 * 读取长度前缀字符串
 *
 * - u8: 1 字节长度
 * - varwidth: 首字节最高位为 1 时使用 2 字节长度 ((b0 & 0x7f) << 8 | b1)，否则 1 字节
 *
 * 声明长度超过上限 → INVALID_LENGTH；剩余字节不足 → TRUNCATED_FIELD
 */
export function decodeLengthPrefixedString(
  buffer: Buffer,
  offset: number,
  options: StringDecodeOptions,
  field = 'string'
): FieldRead<string> {
  const first = readU8(buffer, offset, `${field} length`);
  let length = first.value;
  let start = first.offset;

  if (options.prefix === 'varwidth' && (first.value & 0x80) !== 0) {
    const second = readU8(buffer, first.offset, `${field} length`);
    length = ((first.value & 0x7f) << 8) | second.value;
    start = second.offset;
  }

  if (length > options.maxLength) {
    throw new ChunkDecodeFailure(
      SkipReason.INVALID_LENGTH,
      `${field} declares ${length} bytes, ceiling is ${options.maxLength}`
    );
  }

  const end = start + length;
  if (end > buffer.length) {
    throw new ChunkDecodeFailure(
      SkipReason.TRUNCATED_FIELD,
      `${field} declares ${length} bytes at offset ${start}, only ${buffer.length - start} remain`
    );
  }

  return { value: decodeUtf8Lossy(buffer.subarray(start, end)), offset: end };
}

/**
 * 对齐到 8 字节边界后读取 count 个小端 double (未清洗的原始值)
 */
export function decodeAlignedF64Block(buffer: Buffer, offset: number, count: number): FieldRead<number[]> {
  const aligned = alignTo8(offset);
  const end = aligned + count * 8;

  if (end > buffer.length) {
    throw new ChunkDecodeFailure(
      SkipReason.TRUNCATED_FIELD,
      `f64 block of ${count} values at offset ${aligned} needs ${end - aligned} bytes, only ${Math.max(0, buffer.length - aligned)} remain`
    );
  }

  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(buffer.readDoubleLE(aligned + i * 8));
  }

  return { value: values, offset: end };
}

/**
 * 判断字节区间是否全为 0
 */
export function isZeroFilled(bytes: Buffer): boolean {
  for (const byte of bytes) {
    if (byte !== 0) {
      return false;
    }
  }
  return true;
}
