import { TypeTag } from '../codec/TypeTag';
import { DataType } from './DataType';

/**
 * One member of a named enumeration
 * 命名枚举中的一个成员
 */
export class EnumItem extends DataType {
  readonly typeTag = TypeTag.Enum;

  constructor(readonly enumType: string, readonly name: string, readonly value: number) {
    super();
  }

  equals(other: unknown): boolean {
    return (
      other instanceof EnumItem &&
      other.enumType === this.enumType &&
      other.name === this.name &&
      other.value === this.value
    );
  }

  toString(): string {
    return `Enum.${this.enumType}.${this.name}`;
  }
}
