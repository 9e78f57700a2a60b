import { TypeTag } from '../codec/TypeTag';
import { DataType, sameNumber } from './DataType';

/**
 * Custom material physics
 * 自定义材质物理属性
 */
export class PhysicalProperties extends DataType {
  readonly typeTag = TypeTag.PhysicalProperties;

  constructor(
    readonly density: number,
    readonly friction: number,
    readonly elasticity: number,
    readonly frictionWeight = 1,
    readonly elasticityWeight = 1
  ) {
    super();
  }

  equals(other: unknown): boolean {
    return (
      other instanceof PhysicalProperties &&
      sameNumber(other.density, this.density) &&
      sameNumber(other.friction, this.friction) &&
      sameNumber(other.elasticity, this.elasticity) &&
      sameNumber(other.frictionWeight, this.frictionWeight) &&
      sameNumber(other.elasticityWeight, this.elasticityWeight)
    );
  }
}
