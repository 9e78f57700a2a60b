/**
 * Lazily captures each class's default property values
 * 惰性捕获每个类的默认属性值
 */

import type { HostModel } from '../model/HostModel';
import { SerdeError } from '../utils/SerdeError';
import type { SchemaRegistry } from './SchemaRegistry';

export class DefaultResolver<H> {
  // monotonic: entries are added once and never invalidated
  private readonly defaults = new Map<string, ReadonlyMap<string, unknown>>();

  constructor(private readonly schema: SchemaRegistry, private readonly model: HostModel<H>) {}

  isResolved(className: string): boolean {
    return this.defaults.has(className);
  }

  /**
   * Default values of a class, instantiating a throwaway object the first time
   * 类的默认值；首次调用时创建一次性对象
   *
   * The transient object is destroyed on every exit path.
   * 临时对象在所有退出路径上都会被销毁。
   */
  resolve(className: string): ReadonlyMap<string, unknown> {
    const cached = this.defaults.get(className);
    if (cached) return cached;

    const schema = this.schema.requireClass(className);
    const transient = this.createTransient(className);
    const values = new Map<string, unknown>();
    try {
      for (const name of schema.properties.keys()) {
        values.set(name, this.model.get(transient, name));
      }
    } catch (e) {
      throw new SerdeError(
        'DEFAULTS_UNAVAILABLE',
        `Cannot read defaults of ${className}: ${e instanceof Error ? e.message : String(e)}`,
        e
      );
    } finally {
      this.model.destroy(transient);
    }

    this.defaults.set(className, values);
    return values;
  }

  private createTransient(className: string): H {
    try {
      return this.model.create(className);
    } catch (e) {
      throw new SerdeError('DEFAULTS_UNAVAILABLE', `Cannot create ${className} to read defaults`, e);
    }
  }

  get resolvedClassNames(): string[] {
    return Array.from(this.defaults.keys());
  }
}
