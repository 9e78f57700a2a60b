import { TypeTag } from '../codec/TypeTag';
import { DataType, sameNumber } from './DataType';

export class NumberRange extends DataType {
  readonly typeTag = TypeTag.NumberRange;
  readonly max: number;

  constructor(readonly min: number, max?: number) {
    super();
    this.max = max ?? min;
    if (this.max < min) {
      throw new RangeError(`NumberRange: max ${this.max} is below min ${min}`);
    }
  }

  equals(other: unknown): boolean {
    return other instanceof NumberRange && sameNumber(other.min, this.min) && sameNumber(other.max, this.max);
  }
}
