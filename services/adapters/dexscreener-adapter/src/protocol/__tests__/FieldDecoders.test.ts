/**
 * Unit Tests for FieldDecoders
 */

import {
  alignTo8,
  decodeAlignedF64Block,
  decodeLengthPrefixedString,
  decodeUtf8Lossy,
  readU16LE,
  sanitizeDouble,
  sanitizeText
} from '../FieldDecoders';
import { ChunkDecodeFailure, SkipReason } from '../interfaces';
import { encodeString, f64le } from '../../../tests/fixtures/frames';

function expectFailure(fn: () => unknown, reason: SkipReason): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(ChunkDecodeFailure);
    if (error instanceof ChunkDecodeFailure) {
      expect(error.reason).toBe(reason);
    }
    return;
  }
  throw new Error('expected ChunkDecodeFailure');
}

describe('sanitizeDouble', () => {
  it('应该将 NaN 和 ±Infinity 映射为 null', () => {
    expect(sanitizeDouble(NaN)).toBeNull();
    expect(sanitizeDouble(Infinity)).toBeNull();
    expect(sanitizeDouble(-Infinity)).toBeNull();
  });

  it('有限值应该原样返回，包括 0 和负数', () => {
    expect(sanitizeDouble(0)).toBe(0);
    expect(sanitizeDouble(-0.5)).toBe(-0.5);
    expect(sanitizeDouble(1e300)).toBe(1e300);
  });

  it('应该是幂等的', () => {
    const inputs = [NaN, Infinity, -Infinity, 0, 42.125, -7, Number.MAX_VALUE, Number.MIN_VALUE, null];
    for (const input of inputs) {
      const once = sanitizeDouble(input);
      expect(sanitizeDouble(once)).toBe(once);
    }
  });
});

describe('decodeLengthPrefixedString', () => {
  it('应该读取 1 字节长度前缀字符串并返回新的偏移', () => {
    const buf = Buffer.concat([encodeString('solana'), encodeString('raydium')]);

    const first = decodeLengthPrefixedString(buf, 0, { prefix: 'u8', maxLength: 100 });
    const second = decodeLengthPrefixedString(buf, first.offset, { prefix: 'u8', maxLength: 100 });

    expect(first).toEqual({ value: 'solana', offset: 7 });
    expect(second).toEqual({ value: 'raydium', offset: 15 });
  });

  it('应该在高位标志置位时读取 2 字节长度', () => {
    const value = 'x'.repeat(300);
    const buf = encodeString(value, 'varwidth');

    expect(buf[0]).toBe(0x81);
    expect(buf[1]).toBe(0x2c);
    expect(decodeLengthPrefixedString(buf, 0, { prefix: 'varwidth', maxLength: 1024 })).toEqual({ value, offset: 302 });
  });

  it('legacy 模式下高位字节被当作 1 字节长度', () => {
    const buf = Buffer.concat([Buffer.from([0x81]), Buffer.alloc(200, 0x61)]);

    expectFailure(() => decodeLengthPrefixedString(buf, 0, { prefix: 'u8', maxLength: 100 }), SkipReason.INVALID_LENGTH);
  });

  it('声明长度超过上限时应该报告 INVALID_LENGTH，且不越界读取', () => {
    const buf = Buffer.from([101, 0x61, 0x62]);

    expectFailure(() => decodeLengthPrefixedString(buf, 0, { prefix: 'u8', maxLength: 100 }), SkipReason.INVALID_LENGTH);
  });

  it('剩余字节不足时应该报告 TRUNCATED_FIELD', () => {
    const full = encodeString('pairaddress');
    for (let cut = 0; cut < full.length; cut++) {
      expectFailure(
        () => decodeLengthPrefixedString(full.subarray(0, cut), 0, { prefix: 'u8', maxLength: 100 }),
        SkipReason.TRUNCATED_FIELD
      );
    }
  });

  it('varwidth 前缀的第二个字节缺失时应该报告 TRUNCATED_FIELD', () => {
    expectFailure(
      () => decodeLengthPrefixedString(Buffer.from([0x80]), 0, { prefix: 'varwidth', maxLength: 1024 }),
      SkipReason.TRUNCATED_FIELD
    );
  });

  it('应该丢弃无效的 UTF-8 字节而不是中止', () => {
    const buf = Buffer.from([5, 0x41, 0xff, 0x42, 0xc3, 0x43]);

    expect(decodeLengthPrefixedString(buf, 0, { prefix: 'u8', maxLength: 100 })).toEqual({ value: 'ABC', offset: 6 });
  });
});

describe('decodeAlignedF64Block', () => {
  it('应该从下一个 8 字节边界开始读取', () => {
    const buf = Buffer.concat([Buffer.alloc(8, 0xee), f64le([3.25, -1])]);

    for (let offset = 1; offset <= 8; offset++) {
      expect(decodeAlignedF64Block(buf, offset, 2)).toEqual({ value: [3.25, -1], offset: 24 });
    }
  });

  it('只在相对分块起点为 8 的倍数的偏移读取 double', () => {
    const buf = Buffer.alloc(128);
    const reads: number[] = [];
    const spy = jest.spyOn(buf, 'readDoubleLE').mockImplementation((offset?: number) => {
      reads.push(offset ?? 0);
      return 0;
    });

    for (let start = 0; start <= 40; start++) {
      decodeAlignedF64Block(buf, start, 8);
    }

    expect(reads.length).toBe(41 * 8);
    expect(reads.every(offset => offset % 8 === 0)).toBe(true);
    spy.mockRestore();
  });

  it('原样返回 NaN 等原始值，由调用方清洗', () => {
    const buf = f64le([NaN, Infinity]);
    const { value } = decodeAlignedF64Block(buf, 0, 2);

    expect(Number.isNaN(value[0])).toBe(true);
    expect(value[1]).toBe(Infinity);
  });

  it('字节不足时应该报告 TRUNCATED_FIELD', () => {
    const buf = Buffer.alloc(70);

    expectFailure(() => decodeAlignedF64Block(buf, 3, 8), SkipReason.TRUNCATED_FIELD);
  });
});

describe('辅助函数', () => {
  it('alignTo8 应该向上取整', () => {
    expect([0, 1, 7, 8, 9, 15, 16].map(alignTo8)).toEqual([0, 8, 8, 8, 16, 16, 16]);
  });

  it('sanitizeText 应该去除控制字符并按码点截断', () => {
    expect(sanitizeText('  A\u0000B\u0007C\n ')).toBe('ABC');
    expect(sanitizeText('🚀🚀🚀', 2)).toBe('🚀🚀');
  });

  it('decodeUtf8Lossy 应该保留合法多字节字符', () => {
    expect(decodeUtf8Lossy(Buffer.from('行情', 'utf8'))).toBe('行情');
  });

  it('decodeUtf8Lossy 应该丢弃非法字节但保留输入中的 U+FFFD', () => {
    const bytes = Buffer.from([0x41, 0xef, 0xbf, 0xbd, 0xff, 0x42, 0xe8, 0xa1, 0x43]);
    expect(decodeUtf8Lossy(bytes)).toBe('A\uFFFDBC');
  });

  it('decodeUtf8Lossy 应该拒绝过长编码和截断的多字节序列', () => {
    expect(decodeUtf8Lossy(Buffer.from([0xc0, 0xaf, 0x58]))).toBe('X');
    expect(decodeUtf8Lossy(Buffer.from([0x59, 0xf0, 0x9f, 0x9a]))).toBe('Y');
  });

  it('readU16LE 越界时应该报告 TRUNCATED_FIELD', () => {
    expectFailure(() => readU16LE(Buffer.from([1]), 0), SkipReason.TRUNCATED_FIELD);
  });
});
