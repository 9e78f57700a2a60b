import { TypeTag } from '../codec/TypeTag';
import { DataType } from './DataType';
import type { EnumItem } from './EnumItem';

/**
 * Font face: family asset plus weight and style enum items
 * 字体：字族资源加字重与样式枚举项
 */
export class Font extends DataType {
  readonly typeTag = TypeTag.Font;

  constructor(readonly family: string, readonly weight: EnumItem, readonly style: EnumItem) {
    super();
  }

  equals(other: unknown): boolean {
    return (
      other instanceof Font &&
      other.family === this.family &&
      other.weight.equals(this.weight) &&
      other.style.equals(this.style)
    );
  }
}
