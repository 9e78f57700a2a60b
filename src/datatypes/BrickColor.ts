import { TypeTag } from '../codec/TypeTag';
import { DataType } from './DataType';
import palette from './brickPalette.json';

const SWATCHES: ReadonlySet<string> = new Set(Object.keys(palette));

/**
 * Named colour swatch from a fixed palette
 * 固定调色板中的命名色样
 */
export class BrickColor extends DataType {
  readonly typeTag = TypeTag.BrickColor;

  static readonly DEFAULT_NAME = 'Medium stone grey';

  private constructor(readonly name: string) {
    super();
  }

  /**
   * Swatch by canonical name; unknown names fall back to the default swatch
   * 按规范名称获取色样；未知名称回退到默认色样
   */
  static named(name: string): BrickColor {
    return new BrickColor(SWATCHES.has(name) ? name : BrickColor.DEFAULT_NAME);
  }

  equals(other: unknown): boolean {
    return other instanceof BrickColor && other.name === this.name;
  }

  toString(): string {
    return this.name;
  }
}
