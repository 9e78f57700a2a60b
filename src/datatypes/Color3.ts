import { TypeTag } from '../codec/TypeTag';
import { DataType, sameNumber } from './DataType';

function toByte(c: number): number {
  return Math.min(255, Math.max(0, Math.round(c * 255)));
}

/**
 * RGB colour with components in 0..1
 * 分量范围 0..1 的 RGB 颜色
 */
export class Color3 extends DataType {
  readonly typeTag = TypeTag.Color3;

  constructor(readonly r = 0, readonly g = 0, readonly b = 0) {
    super();
  }

  /**
   * Create from 0..255 channel bytes
   * 从 0..255 通道字节创建
   */
  static fromRGB(r: number, g: number, b: number): Color3 {
    return new Color3(r / 255, g / 255, b / 255);
  }

  /**
   * Channels quantized to bytes
   * 量化为字节的通道
   */
  toRGB(): [number, number, number] {
    return [toByte(this.r), toByte(this.g), toByte(this.b)];
  }

  equals(other: unknown): boolean {
    return other instanceof Color3 && sameNumber(other.r, this.r) && sameNumber(other.g, this.g) && sameNumber(other.b, this.b);
  }
}
