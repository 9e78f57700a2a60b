import { TypeTag } from '../codec/TypeTag';
import { DataType } from './DataType';
import { UDim } from './UDim';

/**
 * Two-axis offset
 * 双轴偏移
 */
export class UDim2 extends DataType {
  readonly typeTag = TypeTag.UDim2;

  constructor(readonly x: UDim = new UDim(), readonly y: UDim = new UDim()) {
    super();
  }

  static fromScalars(xScale: number, xOffset: number, yScale: number, yOffset: number): UDim2 {
    return new UDim2(new UDim(xScale, xOffset), new UDim(yScale, yOffset));
  }

  equals(other: unknown): boolean {
    return other instanceof UDim2 && other.x.equals(this.x) && other.y.equals(this.y);
  }
}
