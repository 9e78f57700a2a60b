/**
 * Value type exports
 * 值类型导出
 */

export { DataType, valuesEqual } from './DataType';
export { Vector2 } from './Vector2';
export { Vector3 } from './Vector3';
export { CFrame } from './CFrame';
export { Color3 } from './Color3';
export { BrickColor } from './BrickColor';
export { NumberRange } from './NumberRange';
export { EnumItem } from './EnumItem';
export { PhysicalProperties } from './PhysicalProperties';
export { NumberSequence, NumberSequenceKeypoint } from './NumberSequence';
export { Font } from './Font';
export { UDim } from './UDim';
export { UDim2 } from './UDim2';
