import { TypeTag } from '../codec/TypeTag';
import { DataType, sameNumber } from './DataType';

/**
 * Three-component vector
 * 三维向量
 */
export class Vector3 extends DataType {
  readonly typeTag = TypeTag.Vector3;

  constructor(readonly x = 0, readonly y = 0, readonly z = 0) {
    super();
  }

  equals(other: unknown): boolean {
    return other instanceof Vector3 && sameNumber(other.x, this.x) && sameNumber(other.y, this.y) && sameNumber(other.z, this.z);
  }

  static readonly zero = new Vector3();
  static readonly one = new Vector3(1, 1, 1);
}
