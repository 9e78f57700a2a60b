import { TypeTag } from '../codec/TypeTag';
import { DataType, sameNumber } from './DataType';

/**
 * Affine transform: translation plus a 3x3 rotation basis (row-major)
 * 仿射变换：平移加 3x3 旋转基（行主序）
 */
export class CFrame extends DataType {
  readonly typeTag = TypeTag.CFrame;

  constructor(
    readonly x = 0, readonly y = 0, readonly z = 0,
    readonly r00 = 1, readonly r01 = 0, readonly r02 = 0,
    readonly r10 = 0, readonly r11 = 1, readonly r12 = 0,
    readonly r20 = 0, readonly r21 = 0, readonly r22 = 1
  ) {
    super();
  }

  /**
   * Translation followed by the nine rotation entries
   * 平移分量后接九个旋转分量
   */
  components(): number[] {
    return [
      this.x, this.y, this.z,
      this.r00, this.r01, this.r02,
      this.r10, this.r11, this.r12,
      this.r20, this.r21, this.r22
    ];
  }

  equals(other: unknown): boolean {
    if (!(other instanceof CFrame)) return false;
    const a = this.components();
    const b = other.components();
    return a.every((v, i) => sameNumber(v, b[i]));
  }

  static readonly identity = new CFrame();
}
