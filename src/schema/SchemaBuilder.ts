/**
 * Derives per-class property schemas from a reflection dump
 * 从反射转储推导每个类的属性 schema
 */

import type { CodecRegistry } from '../codec/CodecRegistry';
import { TypeTag } from '../codec/TypeTag';
import type { ClassDescriptor, MemberDescriptor, ReflectionDump } from '../reflection/ReflectionDump';
import { securityLevels, tagNames } from '../reflection/ReflectionDump';
import { SerdeError } from '../utils/SerdeError';
import type { SchemaOptions } from '../utils/SerdeOptions';
import type { ClassSchema, PropertySpec } from './ClassSchema';
import { EnumRegistry } from './EnumRegistry';

export interface BuiltSchema {
  classes: ReadonlyMap<string, ClassSchema>;
  instantiable: ReadonlySet<string>;
  /** Property tags with no codec (references excluded) 没有编解码器的属性标签（不含引用） */
  unknownTypeTags: ReadonlySet<string>;
  enums: EnumRegistry;
}

/**
 * Property spec for a member, or undefined when the member is not data
 * 成员的属性描述；成员不是数据时返回 undefined
 */
export function propertyOf(member: MemberDescriptor, options: Required<SchemaOptions>): PropertySpec | undefined {
  if (member.MemberType !== 'Property') return undefined;

  const tags = tagNames(member.Tags);
  if (tags.some(t => options.skippedMemberTags.includes(t))) return undefined;

  // unreadable or unwritable from outside, so never round-trippable
  const { read, write } = securityLevels(member.Security);
  if (read !== options.publicSecurity || write !== options.publicSecurity) return undefined;

  if (options.ignoredProperties.includes(member.Name)) return undefined;
  if (!member.ValueType) return undefined;

  let typeTag: string;
  switch (member.ValueType.Category) {
    case 'Class':
      typeTag = TypeTag.Reference;
      break;
    case 'Enum':
      typeTag = TypeTag.Enum;
      break;
    default:
      typeTag = member.ValueType.Name;
  }

  return Object.freeze({ name: member.Name, typeTag, isReference: typeTag === TypeTag.Reference });
}

/**
 * Build every class schema in the dump. Superclasses are built on demand,
 * so the dump may list classes in any order.
 * 构建转储中所有类的 schema。父类按需构建，转储中的类可按任意顺序排列。
 */
export function buildSchema(
  dump: ReflectionDump,
  options: Required<SchemaOptions>,
  codecs: CodecRegistry
): BuiltSchema {
  const descriptors = new Map<string, ClassDescriptor>();
  for (const descriptor of dump.Classes) {
    if (tagNames(descriptor.Tags).includes(options.serviceTag)) continue;
    descriptors.set(descriptor.Name, descriptor);
  }

  const classes = new Map<string, ClassSchema>();
  const instantiable = new Set<string>();
  const unknownTypeTags = new Set<string>();
  const inProgress = new Set<string>();

  const resolve = (name: string): ClassSchema | undefined => {
    const done = classes.get(name);
    if (done) return done;

    const descriptor = descriptors.get(name);
    if (!descriptor) return undefined;

    if (inProgress.has(name)) {
      throw new SerdeError('MALFORMED_INPUT', `Invalid reflection dump: superclass cycle through ${name}`);
    }
    inProgress.add(name);

    const properties = new Map<string, PropertySpec>();
    for (const member of descriptor.Members) {
      const spec = propertyOf(member, options);
      if (!spec) continue;
      properties.set(spec.name, spec);
      if (!spec.isReference && !codecs.has(spec.typeTag)) {
        unknownTypeTags.add(spec.typeTag);
      }
    }

    const superclass = descriptor.Superclass ? resolve(descriptor.Superclass) : undefined;
    if (superclass) {
      for (const [propName, spec] of superclass.properties) {
        if (!properties.has(propName)) {
          properties.set(propName, Object.freeze({ ...spec }));
        }
      }
    }

    inProgress.delete(name);

    const tags = tagNames(descriptor.Tags);
    const schema: ClassSchema = Object.freeze({
      name,
      superclass: descriptor.Superclass,
      tags,
      properties
    });
    classes.set(name, schema);
    if (!tags.includes(options.notCreatableTag)) {
      instantiable.add(name);
    }
    return schema;
  };

  for (const name of descriptors.keys()) {
    resolve(name);
  }

  const enums = new EnumRegistry();
  for (const descriptor of dump.Enums) {
    enums.register(descriptor);
  }

  return { classes, instantiable, unknownTypeTags, enums };
}
