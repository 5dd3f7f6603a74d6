/**
 * 二进制协议解码模块导出
 */

export * from './interfaces';
export * from './FieldDecoders';
export { RecordDecoder, DecodeStage } from './RecordDecoder';
export type { RecordResult } from './RecordDecoder';
export { MessageDecoder, parseFrameHeader } from './MessageDecoder';
export type { HeaderResult } from './MessageDecoder';
