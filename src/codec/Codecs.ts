/**
 * Built-in codec table
 * 内置编解码器表
 *
 * Encodings are JSON-safe arrays and strings. Field order per type:
 * 编码为 JSON 安全的数组与字符串，各类型字段顺序如下：
 *
 * - NumberRange: [min, max]
 * - Vector2: [x, y] / Vector3: [x, y, z]
 * - CFrame: [x, y, z, r00, r01, r02, r10, r11, r12, r20, r21, r22]
 * - BrickColor: palette name
 * - Color3: [r, g, b] as 0..1 floats / Color3uint8: [r, g, b] as 0..255 bytes
 * - Enum: "Category.Member"
 * - PhysicalProperties: [density, friction, elasticity, frictionWeight, elasticityWeight] or null
 * - NumberSequence: [[time, value, envelope], ...]
 * - Font: [family, weightName, styleName]
 * - UDim2: [xScale, xOffset, yScale, yOffset] / UDim: [scale, offset]
 */

import { BrickColor } from '../datatypes/BrickColor';
import { CFrame } from '../datatypes/CFrame';
import { Color3 } from '../datatypes/Color3';
import { EnumItem } from '../datatypes/EnumItem';
import { Font } from '../datatypes/Font';
import { NumberRange } from '../datatypes/NumberRange';
import { NumberSequence, NumberSequenceKeypoint } from '../datatypes/NumberSequence';
import { PhysicalProperties } from '../datatypes/PhysicalProperties';
import { UDim } from '../datatypes/UDim';
import { UDim2 } from '../datatypes/UDim2';
import { Vector2 } from '../datatypes/Vector2';
import { Vector3 } from '../datatypes/Vector3';
import { TypeTag } from './TypeTag';
import type { CodecContext, ValueCodec } from './ValueCodec';
import { codecFailure, readNumbers, readString } from './ValueCodec';

const stringCodec: ValueCodec<string> = {
  tags: [TypeTag.String, TypeTag.Content],
  is(value: unknown): value is string {
    return typeof value === 'string';
  },
  encode: v => v,
  decode: data => readString(data, TypeTag.String)
};

const booleanCodec: ValueCodec<boolean> = {
  tags: [TypeTag.Bool, TypeTag.Boolean],
  is(value: unknown): value is boolean {
    return typeof value === 'boolean';
  },
  encode: v => v,
  decode(data: unknown): boolean {
    if (typeof data !== 'boolean') throw codecFailure(TypeTag.Bool, 'expected a boolean', data);
    return data;
  }
};

const numberCodec: ValueCodec<number> = {
  tags: [TypeTag.Int, TypeTag.Int64, TypeTag.Float, TypeTag.Double, TypeTag.Number],
  is(value: unknown): value is number {
    return typeof value === 'number';
  },
  encode: v => v,
  decode(data: unknown): number {
    if (typeof data !== 'number') throw codecFailure(TypeTag.Number, 'expected a number', data);
    return data;
  }
};

const numberRangeCodec: ValueCodec<NumberRange> = {
  tags: [TypeTag.NumberRange],
  is(value: unknown): value is NumberRange {
    return value instanceof NumberRange;
  },
  encode: v => [v.min, v.max],
  decode(data: unknown): NumberRange {
    const [min, max] = readNumbers(data, 2, TypeTag.NumberRange);
    return new NumberRange(min, max);
  }
};

const vector2Codec: ValueCodec<Vector2> = {
  tags: [TypeTag.Vector2],
  is(value: unknown): value is Vector2 {
    return value instanceof Vector2;
  },
  encode: v => [v.x, v.y],
  decode(data: unknown): Vector2 {
    const [x, y] = readNumbers(data, 2, TypeTag.Vector2);
    return new Vector2(x, y);
  }
};

const vector3Codec: ValueCodec<Vector3> = {
  tags: [TypeTag.Vector3],
  is(value: unknown): value is Vector3 {
    return value instanceof Vector3;
  },
  encode: v => [v.x, v.y, v.z],
  decode(data: unknown): Vector3 {
    const [x, y, z] = readNumbers(data, 3, TypeTag.Vector3);
    return new Vector3(x, y, z);
  }
};

const cframeCodec: ValueCodec<CFrame> = {
  tags: [TypeTag.CFrame],
  is(value: unknown): value is CFrame {
    return value instanceof CFrame;
  },
  encode: v => v.components(),
  decode(data: unknown): CFrame {
    const c = readNumbers(data, 12, TypeTag.CFrame);
    return new CFrame(c[0], c[1], c[2], c[3], c[4], c[5], c[6], c[7], c[8], c[9], c[10], c[11]);
  }
};

const brickColorCodec: ValueCodec<BrickColor> = {
  tags: [TypeTag.BrickColor],
  is(value: unknown): value is BrickColor {
    return value instanceof BrickColor;
  },
  encode: v => v.name,
  decode: data => BrickColor.named(readString(data, TypeTag.BrickColor))
};

const color3Codec: ValueCodec<Color3> = {
  tags: [TypeTag.Color3],
  is(value: unknown): value is Color3 {
    return value instanceof Color3;
  },
  encode: v => [v.r, v.g, v.b],
  decode(data: unknown): Color3 {
    const [r, g, b] = readNumbers(data, 3, TypeTag.Color3);
    return new Color3(r, g, b);
  }
};

// Quantized storage: channels travel as bytes
const color3uint8Codec: ValueCodec<Color3> = {
  tags: [TypeTag.Color3uint8],
  is(value: unknown): value is Color3 {
    return value instanceof Color3;
  },
  encode: v => v.toRGB(),
  decode(data: unknown): Color3 {
    const rgb = readNumbers(data, 3, TypeTag.Color3uint8);
    if (rgb.some(c => !Number.isInteger(c) || c < 0 || c > 255)) {
      throw codecFailure(TypeTag.Color3uint8, 'channels must be integers in 0..255', data);
    }
    return Color3.fromRGB(rgb[0], rgb[1], rgb[2]);
  }
};

/**
 * Resolve an enum item through the context; accepts a leading `Enum.`
 * 通过上下文解析枚举项；允许前缀 `Enum.`
 */
function lookupEnum(context: CodecContext, enumType: string, name: string, tag: TypeTag): EnumItem {
  const item = context.enums.getItem(enumType, name);
  if (!item) throw codecFailure(tag, `unknown enum item ${enumType}.${name}`);
  return item;
}

const enumCodec: ValueCodec<EnumItem> = {
  tags: [TypeTag.Enum],
  is(value: unknown): value is EnumItem {
    return value instanceof EnumItem;
  },
  encode: v => `${v.enumType}.${v.name}`,
  decode(data: unknown, context: CodecContext): EnumItem {
    let text = readString(data, TypeTag.Enum);
    if (text.startsWith('Enum.') && text.indexOf('.', 5) > 0) {
      text = text.slice(5);
    }
    const dot = text.indexOf('.');
    if (dot <= 0 || dot === text.length - 1) {
      throw codecFailure(TypeTag.Enum, `expected "Category.Member", got "${text}"`);
    }
    return lookupEnum(context, text.slice(0, dot), text.slice(dot + 1), TypeTag.Enum);
  }
};

const physicalPropertiesCodec: ValueCodec<PhysicalProperties | null | undefined> = {
  tags: [TypeTag.PhysicalProperties],
  is(value: unknown): value is PhysicalProperties | null | undefined {
    return value === null || value === undefined || value instanceof PhysicalProperties;
  },
  encode(v: PhysicalProperties | null | undefined) {
    if (!v) return null;
    return [v.density, v.friction, v.elasticity, v.frictionWeight, v.elasticityWeight];
  },
  decode(data: unknown): PhysicalProperties | null {
    // absent custom physics stays absent
    if (data === null) return null;
    const [density, friction, elasticity, frictionWeight, elasticityWeight] =
      readNumbers(data, 5, TypeTag.PhysicalProperties);
    return new PhysicalProperties(density, friction, elasticity, frictionWeight, elasticityWeight);
  }
};

const numberSequenceCodec: ValueCodec<NumberSequence> = {
  tags: [TypeTag.NumberSequence],
  is(value: unknown): value is NumberSequence {
    return value instanceof NumberSequence;
  },
  encode: v => v.keypoints.map(k => [k.time, k.value, k.envelope]),
  decode(data: unknown): NumberSequence {
    if (!Array.isArray(data)) throw codecFailure(TypeTag.NumberSequence, 'expected an array of keypoints', data);
    const keypoints = data.map((entry: unknown) => {
      const [time, value, envelope] = readNumbers(entry, 3, TypeTag.NumberSequence);
      return new NumberSequenceKeypoint(time, value, envelope);
    });
    return new NumberSequence(keypoints);
  }
};

const fontCodec: ValueCodec<Font> = {
  tags: [TypeTag.Font],
  is(value: unknown): value is Font {
    return value instanceof Font;
  },
  encode: v => [v.family, v.weight.name, v.style.name],
  decode(data: unknown, context: CodecContext): Font {
    if (!Array.isArray(data) || data.length !== 3) {
      throw codecFailure(TypeTag.Font, 'expected [family, weight, style]', data);
    }
    const family = readString(data[0], TypeTag.Font);
    const weight = lookupEnum(context, 'FontWeight', readString(data[1], TypeTag.Font), TypeTag.Font);
    const style = lookupEnum(context, 'FontStyle', readString(data[2], TypeTag.Font), TypeTag.Font);
    return new Font(family, weight, style);
  }
};

const udim2Codec: ValueCodec<UDim2> = {
  tags: [TypeTag.UDim2],
  is(value: unknown): value is UDim2 {
    return value instanceof UDim2;
  },
  encode: v => [v.x.scale, v.x.offset, v.y.scale, v.y.offset],
  decode(data: unknown): UDim2 {
    const [xs, xo, ys, yo] = readNumbers(data, 4, TypeTag.UDim2);
    return UDim2.fromScalars(xs, xo, ys, yo);
  }
};

const udimCodec: ValueCodec<UDim> = {
  tags: [TypeTag.UDim],
  is(value: unknown): value is UDim {
    return value instanceof UDim;
  },
  encode: v => [v.scale, v.offset],
  decode(data: unknown): UDim {
    const [scale, offset] = readNumbers(data, 2, TypeTag.UDim);
    return new UDim(scale, offset);
  }
};

export const BUILTIN_CODECS: readonly ValueCodec[] = [
  stringCodec,
  booleanCodec,
  numberCodec,
  numberRangeCodec,
  vector2Codec,
  vector3Codec,
  cframeCodec,
  brickColorCodec,
  color3Codec,
  color3uint8Codec,
  enumCodec,
  physicalPropertiesCodec,
  numberSequenceCodec,
  fontCodec,
  udim2Codec,
  udimCodec
];
