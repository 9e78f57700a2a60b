/**
 * Stable type tags for property and attribute values
 * 属性和特性值的稳定类型标签
 *
 * Values match the value-type names a reflection dump uses, plus the
 * derived `Enum` and `Reference` tags and the runtime attribute names.
 * 取值与反射转储中的值类型名称一致，另含派生的 `Enum`、`Reference` 标签及运行时特性名称。
 */
export enum TypeTag {
  String = 'string',
  Content = 'Content',
  Bool = 'bool',
  Boolean = 'boolean',
  Int = 'int',
  Int64 = 'int64',
  Float = 'float',
  Double = 'double',
  Number = 'number',
  NumberRange = 'NumberRange',
  Vector2 = 'Vector2',
  Vector3 = 'Vector3',
  CFrame = 'CFrame',
  BrickColor = 'BrickColor',
  Color3 = 'Color3',
  Color3uint8 = 'Color3uint8',
  Enum = 'Enum',
  PhysicalProperties = 'PhysicalProperties',
  NumberSequence = 'NumberSequence',
  Font = 'Font',
  UDim = 'UDim',
  UDim2 = 'UDim2',
  Reference = 'Reference'
}

const TAGS: ReadonlySet<string> = new Set<string>(Object.values(TypeTag));

/**
 * Narrow a raw tag string to a known TypeTag
 * 将原始标签字符串收窄为已知 TypeTag
 */
export function isTypeTag(tag: string): tag is TypeTag {
  return TAGS.has(tag);
}
