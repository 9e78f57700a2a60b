/**
 * In-process object world implementing the host model
 * 实现宿主模型的进程内对象世界
 *
 * Instances are numeric generation-tagged handles. Classes are declared up
 * front with the default value of every property they add.
 * 实例为带世代号的数字句柄。类需预先声明，并给出其新增属性的默认值。
 *
 * @example
 * ```typescript
 * const world = new InstanceWorld()
 *   .defineClass({ name: 'Instance', creatable: false })
 *   .defineClass({ name: 'Leaf', superclass: 'Instance', properties: { X: 0 } });
 *
 * const leaf = world.create('Leaf');
 * world.set(leaf, 'X', 5);
 * ```
 */

import { ChildrenIndex } from '../hierarchy/ChildrenIndex';
import type { HostModel } from '../model/HostModel';
import { TagRegistry } from '../tag/TagRegistry';
import { TagStore } from '../tag/TagStore';
import type { Instance } from './Instance';
import { NULL_INSTANCE } from './Instance';
import { InstanceManager } from './InstanceManager';

/**
 * Class declaration
 * 类声明
 */
export interface InstanceClass {
  name: string;
  superclass?: string;
  /** Defaults to true 默认为 true */
  creatable?: boolean;
  /** Property name → default value 属性名 → 默认值 */
  properties?: Record<string, unknown>;
}

export class InstanceWorld implements HostModel<Instance> {
  private readonly classes = new Map<string, InstanceClass>();
  private readonly handles = new InstanceManager();
  private readonly classOf = new Map<Instance, string>();
  private readonly values = new Map<Instance, Map<string, unknown>>();
  private readonly attributes = new Map<Instance, Map<string, unknown>>();
  private readonly hierarchy = new ChildrenIndex();
  private readonly tagNames = new TagRegistry();
  private readonly tagStore = new TagStore();

  /**
   * Declare a class; its superclass must already be declared
   * 声明类；其父类必须已声明
   */
  defineClass(cls: InstanceClass): this {
    if (this.classes.has(cls.name)) {
      throw new Error(`Class ${cls.name} is already defined`);
    }
    if (cls.superclass !== undefined && !this.classes.has(cls.superclass)) {
      throw new Error(`Superclass ${cls.superclass} of ${cls.name} is not defined`);
    }
    this.classes.set(cls.name, cls);
    return this;
  }

  isObject(value: unknown): value is Instance {
    return typeof value === 'number' && this.handles.isAlive(value);
  }

  isAlive(instance: Instance): boolean {
    return this.handles.isAlive(instance);
  }

  getClassName(instance: Instance): string {
    return this.classNameOf(instance);
  }

  create(className: string): Instance {
    const cls = this.classes.get(className);
    if (!cls) {
      throw new Error(`Unknown class ${className}`);
    }
    if (cls.creatable === false) {
      throw new Error(`Class ${className} is not creatable`);
    }

    const instance = this.handles.create();
    this.classOf.set(instance, className);
    return instance;
  }

  /**
   * Destroy an instance and all of its descendants
   * 销毁实例及其所有后代
   */
  destroy(instance: Instance): void {
    if (!this.handles.isAlive(instance)) return;

    const doomed = [instance, ...this.hierarchy.getDescendants(instance)];
    for (const i of doomed) {
      this.hierarchy.clearInstance(i);
      this.tagStore.clearInstance(i);
      this.attributes.delete(i);
      this.values.delete(i);
      this.classOf.delete(i);
      this.handles.destroy(i);
    }
  }

  get(instance: Instance, property: string): unknown {
    const className = this.classNameOf(instance);
    const stored = this.values.get(instance);
    if (stored?.has(property)) {
      return stored.get(property);
    }

    const declared = this.findDefault(className, property);
    if (!declared) {
      throw new Error(`${property} is not a valid member of ${className}`);
    }
    return declared.value;
  }

  set(instance: Instance, property: string, value: unknown): void {
    const className = this.classNameOf(instance);
    if (!this.findDefault(className, property)) {
      throw new Error(`${property} is not a valid member of ${className}`);
    }

    let stored = this.values.get(instance);
    if (!stored) {
      stored = new Map();
      this.values.set(instance, stored);
    }
    stored.set(property, value);
  }

  getParent(instance: Instance): Instance | undefined {
    const parent = this.hierarchy.parentOfInstance(instance);
    return parent === NULL_INSTANCE ? undefined : parent;
  }

  setParent(instance: Instance, parent: Instance | undefined): void {
    this.assertAlive(instance);
    if (parent === undefined) {
      this.hierarchy.link(instance, NULL_INSTANCE);
      return;
    }

    this.assertAlive(parent);
    if (this.hierarchy.wouldCreateCycle(instance, parent)) {
      throw new Error(`Cannot parent ${this.classNameOf(instance)} under its own descendant`);
    }
    this.hierarchy.link(instance, parent);
  }

  getChildren(instance: Instance): readonly Instance[] {
    return this.hierarchy.childrenOf(instance);
  }

  getDescendants(instance: Instance): Instance[] {
    return this.hierarchy.getDescendants(instance);
  }

  getTags(instance: Instance): readonly string[] {
    return this.tagStore.getInstanceTags(instance).flatMap((id) => {
      const name = this.tagNames.tagName(id);
      return name === undefined ? [] : [name];
    });
  }

  addTag(instance: Instance, tag: string): void {
    this.assertAlive(instance);
    this.tagStore.add(instance, this.tagNames.tagId(tag));
  }

  hasTag(instance: Instance, tag: string): boolean {
    return this.tagStore.has(instance, this.tagNames.tagId(tag));
  }

  removeTag(instance: Instance, tag: string): void {
    this.tagStore.remove(instance, this.tagNames.tagId(tag));
  }

  /**
   * Live instances carrying a tag
   * 具有指定标签的存活实例
   */
  getTagged(tag: string): Instance[] {
    return this.tagStore.getInstancesWithTag(this.tagNames.tagId(tag));
  }

  getAttributes(instance: Instance): ReadonlyMap<string, unknown> {
    return this.attributes.get(instance) ?? new Map<string, unknown>();
  }

  getAttribute(instance: Instance, name: string): unknown {
    return this.attributes.get(instance)?.get(name);
  }

  /**
   * Set an attribute; `undefined` removes it
   * 设置特性；`undefined` 表示删除
   */
  setAttribute(instance: Instance, name: string, value: unknown): void {
    this.assertAlive(instance);
    let attrs = this.attributes.get(instance);
    if (value === undefined) {
      attrs?.delete(name);
      if (attrs?.size === 0) this.attributes.delete(instance);
      return;
    }
    if (!attrs) {
      attrs = new Map();
      this.attributes.set(instance, attrs);
    }
    attrs.set(name, value);
  }

  aliveCount(): number {
    return this.handles.aliveCount();
  }

  /**
   * Walk the class chain for a declared property
   * 沿类链查找已声明的属性
   */
  private findDefault(className: string, property: string): { value: unknown } | undefined {
    let cls = this.classes.get(className);
    while (cls) {
      const props = cls.properties;
      if (props && Object.prototype.hasOwnProperty.call(props, property)) {
        return { value: props[property] };
      }
      cls = cls.superclass === undefined ? undefined : this.classes.get(cls.superclass);
    }
    return undefined;
  }

  private classNameOf(instance: Instance): string {
    const className = this.classOf.get(instance);
    if (className === undefined || !this.handles.isAlive(instance)) {
      throw new Error(`Instance ${instance} is not alive`);
    }
    return className;
  }

  private assertAlive(instance: Instance): void {
    if (!this.handles.isAlive(instance)) {
      throw new Error(`Instance ${instance} is not alive`);
    }
  }
}
