import { TypeTag } from '../codec/TypeTag';
import { DataType, sameNumber } from './DataType';

export class Vector2 extends DataType {
  readonly typeTag = TypeTag.Vector2;

  constructor(readonly x = 0, readonly y = 0) {
    super();
  }

  equals(other: unknown): boolean {
    return other instanceof Vector2 && sameNumber(other.x, this.x) && sameNumber(other.y, this.y);
  }

  static readonly zero = new Vector2();
}
