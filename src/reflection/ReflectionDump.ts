/**
 * Reflection dump shapes and boundary validation
 * 反射转储结构与边界校验
 */

import { z } from 'zod';
import { SerdeError } from '../utils/SerdeError';

// Dumps mix plain tag names with descriptor objects; only strings drive rules
const TagListSchema = z.array(z.union([z.string(), z.record(z.unknown())])).optional();

export const SecuritySchema = z.union([
  z.string(),
  z.object({ Read: z.string(), Write: z.string() })
]);

export const ValueTypeSchema = z.object({
  Category: z.string(),
  Name: z.string()
});

export const MemberDescriptorSchema = z.object({
  Name: z.string(),
  MemberType: z.string(),
  Security: SecuritySchema.optional(),
  ValueType: ValueTypeSchema.optional(),
  Tags: TagListSchema
}).passthrough();

export const ClassDescriptorSchema = z.object({
  Name: z.string().min(1),
  Superclass: z.string().optional(),
  Tags: TagListSchema,
  Members: z.array(MemberDescriptorSchema).default([])
}).passthrough();

export const EnumDescriptorSchema = z.object({
  Name: z.string().min(1),
  Items: z.array(z.object({ Name: z.string().min(1), Value: z.number() }).passthrough())
}).passthrough();

export const ReflectionDumpSchema = z.object({
  Version: z.number().optional(),
  Classes: z.array(ClassDescriptorSchema),
  Enums: z.array(EnumDescriptorSchema).default([])
}).passthrough();

export type Security = z.infer<typeof SecuritySchema>;
export type MemberDescriptor = z.infer<typeof MemberDescriptorSchema>;
export type ClassDescriptor = z.infer<typeof ClassDescriptorSchema>;
export type EnumDescriptor = z.infer<typeof EnumDescriptorSchema>;
export type ReflectionDump = z.infer<typeof ReflectionDumpSchema>;

/**
 * Validate an already-parsed dump
 * 校验已解析的转储
 *
 * @throws SerdeError MALFORMED_INPUT with the zod issues in `details`
 */
export function parseReflectionDump(value: unknown): ReflectionDump {
  const parsed = ReflectionDumpSchema.safeParse(value);
  if (!parsed.success) {
    throw new SerdeError('MALFORMED_INPUT', `Invalid reflection dump: ${parsed.error.message}`, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Validate a dump from JSON text
 * 从 JSON 文本校验转储
 */
export function parseReflectionDumpJson(text: string): ReflectionDump {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    throw new SerdeError('MALFORMED_INPUT', `Reflection dump is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseReflectionDump(value);
}

/**
 * String tags of a class or member
 * 类或成员的字符串标签
 */
export function tagNames(tags: ReadonlyArray<string | Record<string, unknown>> | undefined): string[] {
  return (tags ?? []).filter((t): t is string => typeof t === 'string');
}

/**
 * Read and write security levels of a member
 * 成员的读写安全级别
 */
export function securityLevels(security: Security | undefined): { read: string; write: string } {
  if (security === undefined) return { read: 'None', write: 'None' };
  if (typeof security === 'string') return { read: security, write: security };
  return { read: security.Read, write: security.Write };
}
