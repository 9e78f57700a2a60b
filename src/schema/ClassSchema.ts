/**
 * Per-class property schema
 * 每个类的属性 schema
 */

export interface PropertySpec {
  readonly name: string;
  /** Codec tag, `Reference`, or a tag with no codec 编解码标签、`Reference` 或无编解码器的标签 */
  readonly typeTag: string;
  readonly isReference: boolean;
}

export interface ClassSchema {
  readonly name: string;
  readonly superclass?: string;
  readonly tags: readonly string[];
  /** Own properties first, then inherited ones 先自身属性，后继承属性 */
  readonly properties: ReadonlyMap<string, PropertySpec>;
}
