/**
 * Enum items reflected from the dump
 * 从转储反射得到的枚举项
 */

import type { EnumLookup } from '../codec/ValueCodec';
import { EnumItem } from '../datatypes/EnumItem';
import type { EnumDescriptor } from '../reflection/ReflectionDump';

export class EnumRegistry implements EnumLookup {
  private readonly enums = new Map<string, Map<string, EnumItem>>();

  /**
   * Register every item of a reflected enum
   * 注册反射枚举的所有项
   */
  register(descriptor: EnumDescriptor): void {
    let items = this.enums.get(descriptor.Name);
    if (!items) {
      items = new Map();
      this.enums.set(descriptor.Name, items);
    }
    for (const item of descriptor.Items) {
      items.set(item.Name, new EnumItem(descriptor.Name, item.Name, item.Value));
    }
  }

  getItem(enumType: string, name: string): EnumItem | undefined {
    return this.enums.get(enumType)?.get(name);
  }
}
