/**
 * Codec contract for transport-safe value encoding
 * 传输安全值编码的编解码器约定
 */

import type { EnumItem } from '../datatypes/EnumItem';
import { SerdeError } from '../utils/SerdeError';
import type { TypeTag } from './TypeTag';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Enum lookup a codec may consult while decoding
 * 解码时可查询的枚举查找接口
 */
export interface EnumLookup {
  getItem(enumType: string, name: string): EnumItem | undefined;
}

export interface CodecContext {
  enums: EnumLookup;
}

/**
 * Encoder/decoder pair for one family of type tags
 * 单一类型标签族的编码器/解码器对
 */
export interface ValueCodec<T = unknown> {
  /** Tags served by this codec 此编解码器服务的标签 */
  readonly tags: readonly TypeTag[];

  /** Whether a live value belongs to this codec 实时值是否属于此编解码器 */
  is(value: unknown): value is T;

  encode(value: T, context: CodecContext): JsonValue;

  /**
   * Rebuild a value; throws a CODEC_FAILURE SerdeError on malformed data
   * 重建值；数据格式错误时抛出 CODEC_FAILURE
   */
  decode(data: unknown, context: CodecContext): T;
}

export function codecFailure(tag: TypeTag, message: string, details?: unknown): SerdeError {
  return new SerdeError('CODEC_FAILURE', `[${tag}] ${message}`, details);
}

/**
 * Read a fixed-length array of numbers
 * 读取定长数字数组
 */
export function readNumbers(data: unknown, length: number, tag: TypeTag): number[] {
  if (!Array.isArray(data) || data.length !== length) {
    throw codecFailure(tag, `expected an array of ${length} numbers`, data);
  }
  const out: number[] = [];
  for (const v of data) {
    if (typeof v !== 'number') {
      throw codecFailure(tag, `expected a number, got ${typeof v}`, data);
    }
    out.push(v);
  }
  return out;
}

export function readString(data: unknown, tag: TypeTag): string {
  if (typeof data !== 'string') {
    throw codecFailure(tag, `expected a string, got ${typeof data}`, data);
  }
  return data;
}
