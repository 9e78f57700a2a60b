/**
 * Host object model the serializer drives
 * 序列化器驱动的宿主对象模型
 *
 * `H` is the handle type. Handles are used as identity keys, so two handles
 * for the same live object must be `===` equal.
 * `H` 为句柄类型。句柄用作标识键，同一实时对象的两个句柄必须 `===` 相等。
 */
export interface HostModel<H> {
  /** Whether a value is a live object handle 值是否为存活对象句柄 */
  isObject(value: unknown): value is H;

  getClassName(object: H): string;

  /** Create an object by class name 按类名创建对象 */
  create(className: string): H;

  destroy(object: H): void;

  /** Read a property; may throw for unreadable properties 读取属性；不可读时可能抛出 */
  get(object: H, property: string): unknown;

  set(object: H, property: string, value: unknown): void;

  getParent(object: H): H | undefined;

  /** Link to a parent, or detach with `undefined` 链接到父对象，传 `undefined` 则分离 */
  setParent(object: H, parent: H | undefined): void;

  /** Children in order 有序子对象 */
  getChildren(object: H): readonly H[];

  getTags(object: H): readonly string[];

  addTag(object: H, tag: string): void;

  /** Attributes in insertion order 按插入顺序的特性 */
  getAttributes(object: H): ReadonlyMap<string, unknown>;

  setAttribute(object: H, name: string, value: unknown): void;
}
