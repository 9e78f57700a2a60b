/**
 * Closed registry mapping type tags to codecs
 * 类型标签到编解码器的封闭注册表
 */

import { DataType } from '../datatypes/DataType';
import { BUILTIN_CODECS } from './Codecs';
import { TypeTag, isTypeTag } from './TypeTag';
import type { ValueCodec } from './ValueCodec';

export class CodecRegistry {
  private readonly codecs = new Map<TypeTag, ValueCodec>();

  constructor(codecs: readonly ValueCodec[] = BUILTIN_CODECS) {
    for (const codec of codecs) {
      for (const tag of codec.tags) {
        if (tag === TypeTag.Reference) {
          throw new Error('[CodecRegistry] Reference values are linked by id and take no codec');
        }
        if (this.codecs.has(tag)) {
          throw new Error(`[CodecRegistry] tag ${tag} already has a codec`);
        }
        this.codecs.set(tag, codec);
      }
    }
  }

  /**
   * Codec for a raw tag string, if one is registered
   * 获取原始标签字符串对应的编解码器
   */
  get(tag: string): ValueCodec | undefined {
    return isTypeTag(tag) ? this.codecs.get(tag) : undefined;
  }

  has(tag: string): boolean {
    return this.get(tag) !== undefined;
  }

  /**
   * Registered tags
   * 已注册的标签
   */
  get tags(): TypeTag[] {
    return Array.from(this.codecs.keys());
  }
}

/**
 * Runtime type tag of a free-form value (attributes carry no schema)
 * 自由值的运行时类型标签（特性没有 schema）
 */
export function typeTagOf(value: unknown): TypeTag | undefined {
  switch (typeof value) {
    case 'string':
      return TypeTag.String;
    case 'boolean':
      return TypeTag.Boolean;
    case 'number':
      return TypeTag.Number;
    default:
      return value instanceof DataType ? value.typeTag : undefined;
  }
}
