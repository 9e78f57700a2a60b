import { TypeTag } from '../codec/TypeTag';
import { DataType, sameNumber } from './DataType';

/**
 * One-axis offset: relative scale plus fixed offset
 * 单轴偏移：相对比例加固定偏移
 */
export class UDim extends DataType {
  readonly typeTag = TypeTag.UDim;

  constructor(readonly scale = 0, readonly offset = 0) {
    super();
  }

  equals(other: unknown): boolean {
    return other instanceof UDim && sameNumber(other.scale, this.scale) && sameNumber(other.offset, this.offset);
  }
}
