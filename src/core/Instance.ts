/**
 * Instance handle - pure numeric handle with generation
 * 实例句柄 - 带世代号的纯数字句柄
 *
 * Format: 28 bits index + 20 bits generation = 48 bits (< 2^53 safe)
 * 格式：28位索引 + 20位世代号 = 48位（< 2^53安全）
 */
export type Instance = number;

const INDEX_BITS = 28;
const INDEX_MASK = (1 << INDEX_BITS) - 1;
const INDEX_BASE = 1 << INDEX_BITS;

/** No instance (used as "no parent") 无实例（表示“无父对象”） */
export const NULL_INSTANCE: Instance = 0;

export function makeInstance(index: number, generation: number): Instance {
  return generation * INDEX_BASE + index;
}

/**
 * Extract index from handle
 * 从句柄提取索引
 */
export function indexOf(instance: Instance): number {
  return instance & INDEX_MASK;
}

/**
 * Extract generation from handle
 * 从句柄提取世代号
 */
export function genOf(instance: Instance): number {
  return Math.floor(instance / INDEX_BASE);
}
