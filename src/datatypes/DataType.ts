import type { TypeTag } from '../codec/TypeTag';

/**
 * Base class of immutable host value types
 * 不可变宿主值类型的基类
 */
export abstract class DataType {
  abstract readonly typeTag: TypeTag;

  /**
   * Structural equality
   * 结构相等
   */
  abstract equals(other: unknown): boolean;
}

/**
 * Number equality where NaN equals NaN
 * NaN 与 NaN 相等的数值比较
 */
export function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/**
 * Equality used by default diffing: value types compare structurally,
 * everything else by identity
 * 默认值比较使用的相等：值类型按结构比较，其余按标识比较
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b) || a === b) return true;
  if (a instanceof DataType) return a.equals(b);
  return false;
}
