/**
 * Serialized record shapes
 * 序列化记录结构
 */

import { z } from 'zod';
import { SerdeError } from '../utils/SerdeError';

/**
 * Attribute entry: its runtime type tag and encoded value
 * 特性条目：运行时类型标签与编码值
 */
export type AttributeEntry = [typeTag: string, value: unknown];

/**
 * One serialized object and its subtree
 * 单个序列化对象及其子树
 */
export interface SerializedRecord {
  /** Class name 类名 */
  Type: string;
  /** Pre-order id, unique within one tree 先序编号，在一棵树内唯一 */
  Id: number;
  /** Non-default properties; reference properties hold target ids 非默认属性；引用属性保存目标编号 */
  Properties: Record<string, unknown>;
  Tags?: string[];
  Attributes?: Record<string, AttributeEntry>;
  Children?: SerializedRecord[];
}

export const SerializedRecordSchema: z.ZodType<SerializedRecord> = z.lazy(() =>
  z.object({
    Type: z.string().min(1),
    Id: z.number().int().positive(),
    Properties: z.record(z.unknown()),
    Tags: z.array(z.string()).optional(),
    Attributes: z.record(z.tuple([z.string(), z.unknown()])).optional(),
    Children: z.array(SerializedRecordSchema).optional()
  })
);

/**
 * Validate a record tree at the call boundary
 * 在调用边界校验记录树
 */
export function parseSerializedRecord(value: unknown): SerializedRecord {
  const parsed = SerializedRecordSchema.safeParse(value);
  if (!parsed.success) {
    throw new SerdeError('MALFORMED_INPUT', `Invalid serialized record: ${parsed.error.message}`, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Visit a record tree in pre-order
 * 先序遍历记录树
 */
export function forEachRecord(root: SerializedRecord, fn: (record: SerializedRecord, depth: number) => void): void {
  const visit = (record: SerializedRecord, depth: number): void => {
    fn(record, depth);
    for (const child of record.Children ?? []) {
      visit(child, depth + 1);
    }
  };
  visit(root, 0);
}
