import { TypeTag } from '../codec/TypeTag';
import { DataType, sameNumber } from './DataType';

export class NumberSequenceKeypoint {
  constructor(readonly time: number, readonly value: number, readonly envelope = 0) {}

  equals(other: NumberSequenceKeypoint): boolean {
    return sameNumber(other.time, this.time) && sameNumber(other.value, this.value) && sameNumber(other.envelope, this.envelope);
  }
}

/**
 * Piecewise numeric curve over time 0..1
 * 时间 0..1 上的分段数值曲线
 */
export class NumberSequence extends DataType {
  readonly typeTag = TypeTag.NumberSequence;
  readonly keypoints: readonly NumberSequenceKeypoint[];

  constructor(keypoints: readonly NumberSequenceKeypoint[]) {
    super();
    if (keypoints.length === 0) {
      throw new RangeError('NumberSequence: at least one keypoint is required');
    }
    this.keypoints = [...keypoints];
  }

  /**
   * Flat curve holding `value` from time 0 to 1
   * 从时间 0 到 1 保持 `value` 的平直曲线
   */
  static constant(value: number): NumberSequence {
    return new NumberSequence([new NumberSequenceKeypoint(0, value), new NumberSequenceKeypoint(1, value)]);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof NumberSequence)) return false;
    if (other.keypoints.length !== this.keypoints.length) return false;
    return this.keypoints.every((k, i) => {
      const o = other.keypoints[i];
      return o !== undefined && k.equals(o);
    });
  }
}
